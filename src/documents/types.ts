import type { SubtitleDocument } from '../subtitles';

/**
 * An open document held by the host
 */
export interface DocumentSession {
  id: string;
  name: string;
  document: SubtitleDocument;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Request body for creating a document
 */
export interface CreateDocumentRequest {
  name?: string;
  text?: string;
}

/**
 * Document summary for list views
 */
export interface DocumentListItem {
  id: string;
  name: string;
  recordCount: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Command for the media player, issued by the host after an edit
 */
export type HostCommand =
  | { type: 'seek'; positionMs: number }
  | { type: 'reload' };

/**
 * Error with an HTTP status, raised for bad requests and unknown resources
 */
export class RequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'RequestError';
    this.status = status;
  }
}
