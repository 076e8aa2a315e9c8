import {
  adjustTime,
  DEFAULT_INSERTION_TIMING,
  deleteRecord,
  insertRecords,
  renumber,
  sanitize,
  setTime,
  shiftRecords,
  sortRecords,
} from './mutations';
import {
  fieldOffset,
  findBackward,
  findForward,
  findId,
  findRecordAtTime,
  findStart,
  findStop,
  findText,
  findTextEnd,
  relativePointInText,
} from './navigation';
import {
  locateRecords,
  normalizeLineEndings,
  recordById,
  scanRecordAt,
  textSpan,
  toSubtitleRecord,
  validateSrtContent,
} from './srtParser';
import { TextBuffer } from './textBuffer';
import type {
  InsertionTimingOptions,
  Placement,
  SubtitleRecord,
  TextSpan,
  TimeAdjustedHook,
  TimeField,
  ValidationIssue,
} from './types';

export interface InsertRequest {
  count?: number;
  placement?: Placement;
  /** Defaults to the cursor */
  anchor?: number;
}

/**
 * One SRT document: its buffer, cursor and time-adjustment listeners.
 *
 * Records are never stored; every query scans the buffer, so nothing can go
 * stale after an edit. Navigation methods return the new cursor offset, or
 * null without moving when there is nowhere to go.
 */
export class SubtitleDocument {
  private readonly buffer: TextBuffer;
  private readonly timing: InsertionTimingOptions;
  private readonly listeners = new Set<TimeAdjustedHook>();

  constructor(text: string = '', timing: Partial<InsertionTimingOptions> = {}) {
    this.buffer = new TextBuffer(normalizeLineEndings(text));
    this.timing = { ...DEFAULT_INSERTION_TIMING, ...timing };
  }

  get text(): string {
    return this.buffer.text;
  }

  get point(): number {
    return this.buffer.point;
  }

  goto(offset: number): number {
    return this.buffer.goto(offset);
  }

  /**
   * Registers a listener for every timestamp change
   * @returns Function that removes the listener
   */
  onTimeAdjusted(listener: TimeAdjustedHook): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  records(): SubtitleRecord[] {
    return locateRecords(this.buffer.text).map(toSubtitleRecord);
  }

  currentRecord(): SubtitleRecord | null {
    const record = scanRecordAt(this.buffer.text, this.buffer.point);
    return record ? toSubtitleRecord(record) : null;
  }

  currentId(): number | null {
    return scanRecordAt(this.buffer.text, this.buffer.point)?.id ?? null;
  }

  recordById(id: number): SubtitleRecord | null {
    const record = recordById(this.buffer.text, id);
    return record ? toSubtitleRecord(record) : null;
  }

  currentTextSpan(): TextSpan | null {
    const record = scanRecordAt(this.buffer.text, this.buffer.point);
    return record ? textSpan(record) : null;
  }

  validate(): ValidationIssue[] {
    return validateSrtContent(this.buffer.text);
  }

  // Navigation

  gotoId(id?: number): number | null {
    return this.move(findId(this.buffer.text, this.buffer.point, id));
  }

  /**
   * Moves to the record playing at `ms`; reports null when the cursor is
   * already there
   */
  gotoIdAtTime(ms: number): number | null {
    const record = findRecordAtTime(locateRecords(this.buffer.text), ms);
    if (!record) return null;

    const target = fieldOffset(record, 'id');
    if (target === null || target === this.buffer.point) return null;
    return this.move(target);
  }

  gotoStart(): number | null {
    return this.move(findStart(this.buffer.text, this.buffer.point));
  }

  gotoStop(): number | null {
    return this.move(findStop(this.buffer.text, this.buffer.point));
  }

  gotoText(): number | null {
    return this.move(findText(this.buffer.text, this.buffer.point));
  }

  gotoTextEnd(): number | null {
    return this.move(findTextEnd(this.buffer.text, this.buffer.point));
  }

  forwardId(): number | null {
    return this.move(findForward(this.buffer.text, this.buffer.point, 'id'));
  }

  backwardId(): number | null {
    return this.move(findBackward(this.buffer.text, this.buffer.point, 'id'));
  }

  forwardText(): number | null {
    return this.move(findForward(this.buffer.text, this.buffer.point, 'text'));
  }

  backwardText(): number | null {
    return this.move(findBackward(this.buffer.text, this.buffer.point, 'text'));
  }

  forwardTextEnd(): number | null {
    return this.move(findForward(this.buffer.text, this.buffer.point, 'text-end'));
  }

  backwardTextEnd(): number | null {
    return this.move(findBackward(this.buffer.text, this.buffer.point, 'text-end'));
  }

  forwardStart(): number | null {
    return this.move(findForward(this.buffer.text, this.buffer.point, 'start'));
  }

  backwardStart(): number | null {
    return this.move(findBackward(this.buffer.text, this.buffer.point, 'start'));
  }

  forwardStop(): number | null {
    return this.move(findForward(this.buffer.text, this.buffer.point, 'stop'));
  }

  backwardStop(): number | null {
    return this.move(findBackward(this.buffer.text, this.buffer.point, 'stop'));
  }

  relativePointInText(offset: number = this.buffer.point): number | null {
    return relativePointInText(this.buffer.text, offset);
  }

  // Mutations

  setTime(recordId: number, field: TimeField, timeMs: number, hook?: TimeAdjustedHook): number | null {
    return setTime(this.buffer, recordId, field, timeMs, this.notifier(hook));
  }

  adjustTime(
    recordId: number,
    field: TimeField,
    deltaMs: number,
    hook?: TimeAdjustedHook
  ): number | null {
    return adjustTime(this.buffer, recordId, field, deltaMs, this.notifier(hook));
  }

  shiftRecords(
    ids: readonly number[] | 'all',
    deltaMs: number,
    hook?: TimeAdjustedHook
  ): number | null {
    return shiftRecords(this.buffer, ids, deltaMs, this.notifier(hook));
  }

  insertRecords(request: InsertRequest = {}): number {
    return insertRecords(this.buffer, { ...this.timing, ...request });
  }

  deleteRecord(anchor?: number): SubtitleRecord | null {
    return deleteRecord(this.buffer, anchor ?? this.buffer.point);
  }

  renumber(): void {
    renumber(this.buffer);
  }

  sort(): void {
    sortRecords(this.buffer);
  }

  sanitize(): void {
    sanitize(this.buffer);
  }

  private move(target: number | null): number | null {
    return target === null ? null : this.buffer.goto(target);
  }

  private notifier(hook?: TimeAdjustedHook): TimeAdjustedHook {
    return (recordId, newTimeMs) => {
      for (const listener of this.listeners) {
        listener(recordId, newTimeMs);
      }
      hook?.(recordId, newTimeMs);
    };
  }
}
