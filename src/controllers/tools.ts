import { Request, Response } from 'express';
import logger from '@/config/logger.js';
import { STATUS_BY_KIND } from '@/middleware/error.js';
import { errorKindOf, type ToolRegistry } from '@/services/tool-registry.js';
import type { ErrorBlock } from '@/types/tools.js';
import { sendErrorResponse, sendSuccessResponse } from '@/utils/validation-helpers.js';

function readArguments(validated: unknown): unknown {
  if (typeof validated === 'object' && validated !== null && 'arguments' in validated) {
    return validated.arguments;
  }
  return {};
}

export class ToolsController {
  constructor(private readonly registry: ToolRegistry) {}

  listTools = (_req: Request, res: Response): void => {
    sendSuccessResponse(res, { tools: this.registry.list() });
  };

  /**
   * Tool failures keep the result in the body and map the error kind to a status
   */
  callTool = async (req: Request, res: Response): Promise<void> => {
    const name = req.params.name ?? '';
    logger.info('Tool call requested over HTTP', { tool: name, ip: req.ip });

    const result = await this.registry.call(name, readArguments(req.validatedData));
    const kind = errorKindOf(result);

    if (!kind) {
      sendSuccessResponse(res, result);
      return;
    }

    const block = result.content.find((item): item is ErrorBlock => item.type === 'error');
    sendErrorResponse(
      res,
      STATUS_BY_KIND[kind],
      { kind, message: block?.message ?? 'Tool call failed' },
      { result }
    );
  };
}
