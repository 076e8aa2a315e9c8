import { Router } from 'express';
import documentsRouter from './documents';
import uploadRouter from './upload';
import healthRouter from './health';

const router = Router();

router.use('/documents', documentsRouter);
router.use('/upload', uploadRouter);
router.use('/health', healthRouter);

export default router;
