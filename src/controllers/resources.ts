import { Request, Response } from 'express';
import type { ResourceService } from '@/services/resources.js';
import { sendSuccessResponse } from '@/utils/validation-helpers.js';

export class ResourcesController {
  constructor(private readonly resources: ResourceService) {}

  listResources = (_req: Request, res: Response): void => {
    sendSuccessResponse(res, { resources: this.resources.list() });
  };

  // NotFoundError propagates to the error handler
  readResource = async (req: Request, res: Response): Promise<void> => {
    const content = await this.resources.read(req.params.name ?? '');
    sendSuccessResponse(res, content);
  };
}
