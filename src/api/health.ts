import { Router, type Request, type Response } from 'express';
import { documentStore } from '../documents';
import { config } from '../config';

const router = Router();

/**
 * GET /api/health
 * Health check endpoint
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    uptimeSeconds: Math.round(process.uptime()),
    documents: {
      open: documentStore.size,
      limit: config.maxDocuments,
    },
    config: {
      defaultSubtitleLengthMs: config.defaultSubtitleLengthMs,
      subtitleSpacingMs: config.subtitleSpacingMs,
    },
  });
});

export default router;
