import { Router } from 'express';
import { ResourcesController } from '@/controllers/resources.js';
import { validateRequest } from '@/middleware/validation.js';
import type { ResourceService } from '@/services/resources.js';
import { namedParamsSchema } from '@/types/http.js';

export function createResourceRoutes(resources: ResourceService): Router {
  const router = Router();
  const resourcesController = new ResourcesController(resources);

  // GET /api/resources
  router.get('/', resourcesController.listResources);

  // GET /api/resources/:name, by name (`tables`) or URI-encoded URI
  router.get(
    '/:name',
    validateRequest(namedParamsSchema, 'params'),
    resourcesController.readResource
  );

  return router;
}
