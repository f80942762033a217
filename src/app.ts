import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createApiRouter, ApiContext } from './api';
import { statusCodeFor, toCaptionFailure } from './captions/errors';
import { config } from './config';

/**
 * Builds the Express application around the given services
 */
export function createApp(ctx: ApiContext, outputsDir: string = config.outputsDir): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // API routes
  app.use('/api', createApiRouter(ctx));

  // Serve generated subtitle files
  app.use('/outputs', express.static(outputsDir));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Error:', err.message);

    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      res.status(413).json({ error: 'File too large' });
      return;
    }

    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    const status = statusCodeFor(err);
    if (status === 500 && config.nodeEnv !== 'development') {
      res.status(500).json({ error: 'Internal server error' });
      return;
    }

    res.status(status).json(toCaptionFailure(err));
  });

  return app;
}
