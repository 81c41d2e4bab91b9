import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import 'express-async-errors';

import type { AppServices } from '@/bootstrap.js';
import type { AppConfig } from '@/config/app-config.js';
import { env } from '@/config/environment.js';
import logger from '@/config/logger.js';
import { errorHandler, notFoundHandler } from '@/middleware/error.js';
import { createRoutes } from '@/routes/index.js';

export function createApp(services: AppServices, config: AppConfig): express.Express {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", 'data:'],
        },
      },
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: config.server.corsOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    })
  );

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.server.rateLimitWindowMs,
    max: config.server.rateLimitMaxRequests,
    message: {
      success: false,
      error: {
        kind: 'ValidationError',
        message: 'Too many requests from this IP, please try again later.',
      },
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(limiter);

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Compression
  app.use(compression());

  // Logging
  app.use(
    morgan('combined', {
      skip: () => env.NODE_ENV === 'test',
      stream: {
        write: (message: string) => {
          logger.info(message.trim());
        },
      },
    })
  );

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: config.server.version,
      environment: env.NODE_ENV,
      database: services.connection.isConnected() ? 'connected' : 'disconnected',
    });
  });

  // API routes
  app.use('/api', createRoutes(services));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
