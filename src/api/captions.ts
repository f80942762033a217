import { Router, Request, Response } from 'express';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { asyncHandler } from './asyncHandler';
import { ApiContext } from './context';
import { ValidationError } from '../captions/errors';
import { isRecord } from '../utils/guards';
import { CaptionRequest } from '../captions/types';
import { isCaptionFailure } from '../pipelines/captionPipeline';
import { config } from '../config';

const CAPTION_FILE_EXTENSIONS = ['.ass', '.srt', '.txt'];

/**
 * Parsed POST /api/captions body
 */
export interface CaptionRequestBody {
  request: CaptionRequest;
  jobId?: string;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`'${key}' must be a string.`);
  }
  return value;
}

function optionalInteger(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`'${key}' must be an integer.`);
  }
  return value;
}

/**
 * Maps the snake_case request body onto a CaptionRequest. Style settings,
 * replace rules and exclude ranges are validated later by the pipeline.
 */
export function parseCaptionRequestBody(body: unknown): CaptionRequestBody {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object.');
  }

  const videoUrl = optionalString(body, 'video_url');
  if (!videoUrl) {
    throw new ValidationError("'video_url' is required.");
  }

  return {
    request: {
      videoUrl,
      captions: optionalString(body, 'captions'),
      settings: body.settings,
      replace: body.replace,
      excludeTimeRanges: body.exclude_time_ranges,
      language: optionalString(body, 'language'),
      playResX: optionalInteger(body, 'PlayResX'),
      playResY: optionalInteger(body, 'PlayResY'),
    },
    jobId: optionalString(body, 'id'),
  };
}

/**
 * Caption files are small text documents, kept in memory
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.maxCaptionFileSize,
  },
  fileFilter: (_req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();

    if (CAPTION_FILE_EXTENSIONS.includes(ext)) {
      cb(null, true);
    } else {
      cb(new ValidationError(`Unsupported file type: ${ext}`));
    }
  },
});

export function createCaptionsRouter(ctx: ApiContext): Router {
  const router = Router();

  /**
   * Creates the job and runs it to completion
   */
  async function generate(res: Response, parsed: CaptionRequestBody): Promise<void> {
    const job = await ctx.store.create(parsed.request, parsed.jobId);
    const result = await ctx.pipeline.runJob(job.id);

    if (isCaptionFailure(result)) {
      const { statusCode, ...failure } = result;
      res.status(statusCode).json({ jobId: job.id, ...failure });
      return;
    }

    res.json({
      jobId: job.id,
      outputPath: result.outputPath,
      downloadUrl: `/outputs/${path.basename(result.outputPath)}`,
    });
  }

  /**
   * POST /api/captions
   * Generate an ASS subtitle file
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      await generate(res, parseCaptionRequestBody(req.body));
    })
  );

  /**
   * POST /api/captions/upload
   * Same as POST /api/captions with the captions sent as a file ("captions")
   * and the remaining fields as a JSON string ("payload")
   */
  router.post(
    '/upload',
    upload.single('captions'),
    asyncHandler(async (req: Request, res: Response) => {
      if (!req.file) {
        res.status(400).json({ error: 'No caption file uploaded' });
        return;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(typeof req.body.payload === 'string' ? req.body.payload : '{}');
      } catch {
        throw new ValidationError("'payload' must be a JSON object.");
      }

      const parsed = parseCaptionRequestBody(payload);
      parsed.request.captions = req.file.buffer.toString('utf-8');
      await generate(res, parsed);
    })
  );

  /**
   * GET /api/captions
   * List all jobs
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const jobs = await ctx.store.list();
      res.json({ jobs });
    })
  );

  /**
   * GET /api/captions/:id
   * Get job details
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const job = await ctx.store.get(req.params.id ?? '');

      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      res.json({ job });
    })
  );

  /**
   * GET /api/captions/:id/download
   * Download the generated subtitle file
   */
  router.get(
    '/:id/download',
    asyncHandler(async (req: Request, res: Response) => {
      const job = await ctx.store.get(req.params.id ?? '');

      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      if (job.status !== 'completed' || !job.outputPath || !fs.existsSync(job.outputPath)) {
        res.status(409).json({ error: 'Subtitle file not available', status: job.status });
        return;
      }

      res.download(job.outputPath, path.basename(job.outputPath));
    })
  );

  /**
   * DELETE /api/captions/:id
   * Delete a job and its files
   */
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const deleted = await ctx.store.delete(req.params.id ?? '');

      if (!deleted) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      res.json({ success: true });
    })
  );

  return router;
}
