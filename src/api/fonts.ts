import { Router, Request, Response } from 'express';
import { asyncHandler } from './asyncHandler';
import { ApiContext } from './context';

export function createFontsRouter(ctx: ApiContext): Router {
  const router = Router();

  /**
   * GET /api/fonts
   * Font families accepted as settings.font_family
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const snapshot = await ctx.fonts.snapshot();
      res.json({ fonts: snapshot.availableFontNames() });
    })
  );

  /**
   * POST /api/fonts/refresh
   * Rescan system and custom fonts, e.g. after adding files to the fonts directory
   */
  router.post(
    '/refresh',
    asyncHandler(async (_req: Request, res: Response) => {
      const snapshot = await ctx.fonts.refresh();
      res.json({ fonts: snapshot.availableFontNames() });
    })
  );

  return router;
}
