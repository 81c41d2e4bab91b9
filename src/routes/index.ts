import { Router } from 'express';
import type { AppServices } from '@/bootstrap.js';
import { createResourceRoutes } from './resources.js';
import { createToolRoutes } from './tools.js';

export function createRoutes(services: AppServices): Router {
  const router = Router();

  // Mount tool routes
  router.use('/tools', createToolRoutes(services.registry));

  // Mount resource routes
  router.use('/resources', createResourceRoutes(services.resources));

  // Health check for API routes
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      message: 'API routes are healthy',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
