import { Router } from 'express';
import { ToolsController } from '@/controllers/tools.js';
import { validateRequest } from '@/middleware/validation.js';
import type { ToolRegistry } from '@/services/tool-registry.js';
import { toolCallBodySchema } from '@/types/http.js';

export function createToolRoutes(registry: ToolRegistry): Router {
  const router = Router();
  const toolsController = new ToolsController(registry);

  /**
   * GET /api/tools
   *
   * Lists every registered tool with its name, title, description and category
   */
  router.get('/', toolsController.listTools);

  /**
   * POST /api/tools/:name
   *
   * Body: { "arguments": { ... } }
   *
   * Response: { "success": true, "result": { "content": [...], "data": {...} } }
   * Failures: { "success": false, "error": { "kind", "message" }, "result" } with
   * 400, 404, 422, 504 or 500 by error kind
   */
  router.post('/:name', validateRequest(toolCallBodySchema), toolsController.callTool);

  return router;
}
