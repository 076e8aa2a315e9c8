/**
 * A single subtitle cue as it appears in an SRT document
 */
export interface SubtitleRecord {
  /** Subtitle ID (1-based, consecutive after renumbering) */
  id: number;
  /** Start time in milliseconds */
  startMs: number;
  /** Stop time in milliseconds */
  stopMs: number;
  /** The subtitle text, possibly empty or multi-line */
  text: string;
}

/**
 * Half-open range of buffer offsets
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * A subtitle record together with the buffer offsets of its fields.
 * Computed from the buffer on demand and stale after any edit.
 */
export interface LocatedRecord extends SubtitleRecord {
  /** 0-based index in physical buffer order */
  position: number;
  /** Offset of the beginning of the ID line */
  start: number;
  idSpan: TextSpan;
  startSpan: TextSpan;
  stopSpan: TextSpan;
  textField: TextSpan;
}

export type TimeField = 'start' | 'stop';

export type Placement = 'before' | 'after';

/**
 * Which record owns the blank-line gap between two records when resolving
 * an offset: navigation gives it to the following record, deletion to the
 * preceding one.
 */
export type GapOwnership = 'following' | 'preceding';

export type RecordField = 'id' | 'start' | 'stop' | 'text' | 'text-end';

/**
 * Called synchronously after a timestamp changes
 */
export type TimeAdjustedHook = (recordId: number, newTimeMs: number) => void;

/**
 * Timing defaults for newly inserted records
 */
export interface InsertionTimingOptions {
  /** Duration of an inserted record when no gap constrains it */
  defaultDurationMs: number;
  /** Pause kept between adjacent records */
  spacingMs: number;
}

export interface PlannedTiming {
  startMs: number;
  stopMs: number;
}

export type ValidationIssueCode = 'missing-id' | 'invalid-timestamp' | 'start-after-stop';

export interface ValidationIssue {
  code: ValidationIssueCode;
  /** 1-based line number */
  line: number;
  offset: number;
  message: string;
}
