import { Router, type Request, type Response } from 'express';
import multer from 'multer';
import path from 'path';
import { documentStore } from '../documents';
import { config } from '../config';

const router = Router();

/**
 * Keep uploads in memory; documents never touch the disk
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.maxUploadSize,
  },
  fileFilter: (_req, file, cb) => {
    const ext = path.extname(file.originalname).toLowerCase();

    if (ext === '.srt') {
      cb(null, true);
    } else {
      cb(new Error(`Unsupported file type: ${ext}`));
    }
  },
});

/**
 * POST /api/upload
 * Open a document from an uploaded SRT file
 */
router.post('/', upload.single('file'), (req: Request, res: Response) => {
  const file = req.file;

  if (!file) {
    res.status(400).json({ error: 'No file uploaded' });
    return;
  }

  const text = file.buffer.toString('utf-8').replace(/^\uFEFF/, '');
  const session = documentStore.create({ name: file.originalname, text });

  res.status(201).json({
    message: 'SRT file uploaded',
    document: {
      id: session.id,
      name: session.name,
      size: file.size,
      recordCount: session.document.records().length,
    },
  });
});

export default router;
