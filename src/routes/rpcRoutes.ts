import { Router } from 'express';
import { callToolHandler, listToolsHandler } from '../controllers/rpcController.js';
import { rpcRateLimiter } from '../middleware/rateLimit.js';
import type { ToolRegistry } from '../services/tools.js';

export function createRpcRouter(registry: ToolRegistry, limitPerMinute: number): Router {
  const router = Router();
  const limiter = rpcRateLimiter(limitPerMinute);

  router.get('/rpc/tools', listToolsHandler(registry));
  router.post('/rpc/tools/call', limiter, callToolHandler(registry));

  return router;
}
