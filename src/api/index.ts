import { Router } from 'express';
import { createCaptionsRouter } from './captions';
import { createFontsRouter } from './fonts';
import { createHealthRouter } from './health';
import { ApiContext } from './context';

export type { ApiContext } from './context';

export function createApiRouter(ctx: ApiContext): Router {
  const router = Router();

  router.use('/captions', createCaptionsRouter(ctx));
  router.use('/fonts', createFontsRouter(ctx));
  router.use('/health', createHealthRouter(ctx));

  return router;
}
