import { v4 as uuidv4 } from 'uuid';
import { type InsertionTimingOptions, SubtitleDocument } from '../subtitles';
import {
  type CreateDocumentRequest,
  type DocumentListItem,
  type DocumentSession,
  RequestError,
} from './types';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface DocumentStoreOptions {
  maxDocuments: number;
  timing: InsertionTimingOptions;
}

/**
 * In-memory store of open documents, one engine instance per document
 */
export class DocumentStore {
  private sessions = new Map<string, DocumentSession>();
  private options: DocumentStoreOptions;

  constructor(options?: Partial<DocumentStoreOptions>) {
    this.options = {
      maxDocuments: options?.maxDocuments ?? config.maxDocuments,
      timing: options?.timing ?? {
        defaultDurationMs: config.defaultSubtitleLengthMs,
        spacingMs: config.subtitleSpacingMs,
      },
    };
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Opens a new document
   */
  create(request: CreateDocumentRequest): DocumentSession {
    if (this.sessions.size >= this.options.maxDocuments) {
      throw new RequestError(409, `Document limit of ${this.options.maxDocuments} reached`);
    }

    const now = new Date();
    const session: DocumentSession = {
      id: uuidv4(),
      name: request.name?.trim() || 'untitled.srt',
      document: new SubtitleDocument(request.text ?? '', this.options.timing),
      createdAt: now,
      updatedAt: now,
    };

    this.sessions.set(session.id, session);
    logger.info(
      `Opened document ${session.id} (${session.name}, ${session.document.records().length} subtitles)`
    );

    return session;
  }

  /**
   * Gets a document by ID
   */
  get(documentId: string): DocumentSession | null {
    return this.sessions.get(documentId) ?? null;
  }

  /**
   * Marks a document as modified
   */
  touch(documentId: string): void {
    const session = this.sessions.get(documentId);
    if (session) {
      session.updatedAt = new Date();
    }
  }

  /**
   * Lists all documents, most recently created first
   */
  list(): DocumentListItem[] {
    const items = [...this.sessions.values()].map((session) => ({
      id: session.id,
      name: session.name,
      recordCount: session.document.records().length,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    }));

    return items.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Closes a document
   */
  delete(documentId: string): boolean {
    const deleted = this.sessions.delete(documentId);
    if (deleted) {
      logger.info(`Closed document ${documentId}`);
    }
    return deleted;
  }
}

// Singleton instance
export const documentStore = new DocumentStore();
