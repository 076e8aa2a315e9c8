import { Router, type Request, type Response } from 'express';
import {
  documentStore,
  type DocumentSession,
  RequestError,
  runEdit,
  runNavigation,
  runPlayback,
  toRequestBody,
} from '../documents';
import { logger } from '../utils/logger';

const router = Router();

function getSession(req: Request): DocumentSession {
  const session = documentStore.get(req.params.id ?? '');
  if (!session) {
    throw new RequestError(404, 'Document not found');
  }
  return session;
}

function summarize(session: DocumentSession) {
  const { document } = session;
  return {
    id: session.id,
    name: session.name,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    point: document.point,
    subtitleId: document.currentId(),
    records: document.records(),
    issues: document.validate(),
  };
}

/**
 * GET /api/documents
 * List open documents
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({ documents: documentStore.list() });
});

/**
 * POST /api/documents
 * Open a document from SRT text
 */
router.post('/', (req: Request, res: Response) => {
  const body = toRequestBody(req.body ?? {});
  const name = typeof body.name === 'string' ? body.name : undefined;
  const text = typeof body.text === 'string' ? body.text : undefined;

  if (body.name !== undefined && name === undefined) {
    res.status(400).json({ error: 'name must be a string' });
    return;
  }

  if (body.text !== undefined && text === undefined) {
    res.status(400).json({ error: 'text must be a string' });
    return;
  }

  const session = documentStore.create({ name, text });
  res.status(201).json({ document: summarize(session) });
});

/**
 * GET /api/documents/:id
 * Get document contents, parsed records and validation issues
 */
router.get('/:id', (req: Request, res: Response) => {
  const session = getSession(req);
  res.json({ document: { ...summarize(session), text: session.document.text } });
});

/**
 * GET /api/documents/:id/download
 * Download the buffer as an SRT file
 */
router.get('/:id/download', (req: Request, res: Response) => {
  const session = getSession(req);
  const fileName = session.name.endsWith('.srt') ? session.name : `${session.name}.srt`;

  res.attachment(fileName);
  res.type('application/x-subrip');
  res.send(session.document.text);
});

/**
 * DELETE /api/documents/:id
 * Close a document
 */
router.delete('/:id', (req: Request, res: Response) => {
  if (!documentStore.delete(req.params.id ?? '')) {
    res.status(404).json({ error: 'Document not found' });
    return;
  }

  res.json({ message: 'Document closed' });
});

/**
 * PUT /api/documents/:id/point
 * Place the cursor at an offset
 */
router.put('/:id/point', (req: Request, res: Response) => {
  const session = getSession(req);
  const { offset } = toRequestBody(req.body);

  if (typeof offset !== 'number' || !Number.isSafeInteger(offset)) {
    res.status(400).json({ error: 'offset must be an integer' });
    return;
  }

  const point = session.document.goto(offset);
  res.json({ point, subtitleId: session.document.currentId() });
});

/**
 * POST /api/documents/:id/navigate
 * Move the cursor between subtitles and fields
 */
router.post('/:id/navigate', (req: Request, res: Response) => {
  const session = getSession(req);
  res.json(runNavigation(session.document, req.body));
});

/**
 * POST /api/documents/:id/playback
 * Follow the player's current position
 */
router.post('/:id/playback', (req: Request, res: Response) => {
  const session = getSession(req);
  res.json(runPlayback(session.document, req.body));
});

/**
 * POST /api/documents/:id/edit
 * Apply an edit and return the player commands it implies
 */
router.post('/:id/edit', (req: Request, res: Response) => {
  const session = getSession(req);
  const result = runEdit(session.document, req.body);

  documentStore.touch(session.id);
  logger.debug(`Document ${session.id}: ${result.operation}`);

  res.json(result);
});

export default router;
