import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import apiRouter from './api';
import { config } from './config';
import { RequestError } from './documents';
import { FormatError, PreconditionViolation } from './subtitles';
import { logger } from './utils/logger';

export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: config.maxUploadSize }));

  // API routes
  app.use('/api', apiRouter);

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestError) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    if (err instanceof FormatError || err instanceof PreconditionViolation) {
      res.status(400).json({ error: err.message });
      return;
    }

    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      res.status(413).json({ error: 'File too large' });
      return;
    }

    if (err.message.includes('Unsupported file type')) {
      res.status(400).json({ error: err.message });
      return;
    }

    logger.error('Error:', err.message);
    res.status(500).json({
      error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
