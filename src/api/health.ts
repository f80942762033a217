import { Router, Request, Response } from 'express';
import { asyncHandler } from './asyncHandler';
import { ApiContext } from './context';

export function createHealthRouter(ctx: ApiContext): Router {
  const router = Router();

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      // Check FFmpeg
      const ffmpegVersion = await ctx.ffmpeg.getVersion();
      const ffmpegAvailable = ffmpegVersion !== null;

      const fonts = await ctx.fonts.snapshot();
      const fontCount = fonts.availableFontNames().length;

      const allServicesOk = ffmpegAvailable && fontCount > 0 && ctx.transcriptionConfigured;

      res.json({
        status: allServicesOk ? 'healthy' : 'degraded',
        services: {
          ffmpeg: {
            available: ffmpegAvailable,
            version: ffmpegVersion,
          },
          fonts: {
            count: fontCount,
          },
          transcription: {
            configured: ctx.transcriptionConfigured,
          },
        },
      });
    })
  );

  return router;
}
