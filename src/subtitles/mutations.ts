import { PreconditionViolation } from './errors';
import {
  isAnchorPair,
  isBlankLine,
  locateRecords,
  normalizeLineEndings,
  recordById,
  render,
  resolveRecord,
  toSubtitleRecord,
} from './srtParser';
import { TextBuffer } from './textBuffer';
import { clampMsecs, formatTimestamp } from './timestamp';
import type {
  InsertionTimingOptions,
  LocatedRecord,
  Placement,
  PlannedTiming,
  SubtitleRecord,
  TimeAdjustedHook,
  TimeField,
} from './types';

export const DEFAULT_INSERTION_TIMING: InsertionTimingOptions = {
  defaultDurationMs: 1000,
  spacingMs: 100,
};

export interface InsertOptions extends Partial<InsertionTimingOptions> {
  /** Offset used to find the neighboring record; defaults to the cursor */
  anchor?: number;
  count?: number;
  placement?: Placement;
}

function timeOf(record: LocatedRecord, field: TimeField): number {
  return field === 'start' ? record.startMs : record.stopMs;
}

function spanOf(record: LocatedRecord, field: TimeField): { start: number; end: number } {
  return field === 'start' ? record.startSpan : record.stopSpan;
}

/**
 * Sets a timestamp of the record with the given ID
 * @param buffer - Document buffer
 * @param recordId - Subtitle ID
 * @param field - Which timestamp to rewrite
 * @param timeMs - New time, clamped at zero
 * @param hook - Called once with the stored value
 * @returns The stored value, or null if no record has that ID
 */
export function setTime(
  buffer: TextBuffer,
  recordId: number,
  field: TimeField,
  timeMs: number,
  hook?: TimeAdjustedHook
): number | null {
  const record = recordById(buffer.text, recordId);
  if (!record) return null;

  const value = clampMsecs(timeMs);
  const span = spanOf(record, field);
  buffer.replace(span.start, span.end, formatTimestamp(value));
  hook?.(recordId, value);

  return value;
}

/**
 * Adds `deltaMs` to a timestamp, clamping the result at zero. Only that
 * timestamp's text changes; start <= stop is not enforced.
 * @returns The adjusted value, or null if no record has that ID
 */
export function adjustTime(
  buffer: TextBuffer,
  recordId: number,
  field: TimeField,
  deltaMs: number,
  hook?: TimeAdjustedHook
): number | null {
  const record = recordById(buffer.text, recordId);
  if (!record) return null;

  return setTime(buffer, recordId, field, timeOf(record, field) + deltaMs, hook);
}

/**
 * Moves start and stop of the selected records by the same delta. A record
 * that would start before zero moves only as far as zero so its duration
 * stays intact.
 * @param ids - Subtitle IDs to move, or 'all'
 * @param hook - Called once per record with its new start time
 * @returns Number of records moved, or null (buffer untouched) when an ID is unknown
 */
export function shiftRecords(
  buffer: TextBuffer,
  ids: readonly number[] | 'all',
  deltaMs: number,
  hook?: TimeAdjustedHook
): number | null {
  const text = buffer.text;
  const records = locateRecords(text);
  let targets: LocatedRecord[];

  if (ids === 'all') {
    targets = records;
  } else {
    const wanted = new Set(ids.map(String));
    const present = new Set(records.map((record) => idText(text, record)));
    for (const id of wanted) {
      if (!present.has(id)) return null;
    }
    targets = records.filter((record) => wanted.has(idText(text, record)));
  }

  // Every timestamp is formatted before the first edit
  const moved = targets.map((record) => {
    const delta = Math.max(Math.round(deltaMs), -record.startMs);
    const startMs = clampMsecs(record.startMs + delta);
    const stopMs = clampMsecs(record.stopMs + delta);
    return {
      record,
      startMs,
      start: formatTimestamp(startMs),
      stop: formatTimestamp(stopMs),
    };
  });

  // Edit from the end so offsets of earlier records stay valid
  for (const { record, start, stop } of [...moved].reverse()) {
    buffer.replace(record.stopSpan.start, record.stopSpan.end, stop);
    buffer.replace(record.startSpan.start, record.startSpan.end, start);
  }

  for (const { record, startMs } of moved) {
    hook?.(record.id, startMs);
  }

  return targets.length;
}

function idText(buffer: string, record: LocatedRecord): string {
  return buffer.slice(record.idSpan.start, record.idSpan.end);
}

/**
 * Computes start and stop times for `count` records inserted between a
 * record stopping at `lowerMs` and one starting at `upperMs`. Either bound may
 * be missing at the edges of the document.
 */
export function planInsertion(
  lowerMs: number | null,
  upperMs: number | null,
  count: number,
  options: InsertionTimingOptions = DEFAULT_INSERTION_TIMING
): PlannedTiming[] {
  const { defaultDurationMs, spacingMs } = options;
  const firstStart = lowerMs === null ? 0 : lowerMs + spacingMs;
  let duration = defaultDurationMs;

  if (upperMs !== null) {
    const slot = Math.floor((upperMs - firstStart) / count);
    const fitted = Math.min(defaultDurationMs, slot - spacingMs);
    if (fitted > 0) {
      duration = fitted;
    }
  }

  const timings: PlannedTiming[] = [];
  for (let i = 0; i < count; i++) {
    const startMs = firstStart + i * (duration + spacingMs);
    timings.push({ startMs, stopMs: startMs + duration });
  }
  return timings;
}

/**
 * Inserts `count` empty records next to the record at the anchor, or into a
 * document that has none. IDs are provisional until the next renumber.
 * @returns Offset of the first new record's text field; the cursor is moved there
 */
export function insertRecords(buffer: TextBuffer, options: InsertOptions = {}): number {
  const count = options.count ?? 1;
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new PreconditionViolation(`Insert count must be a positive integer, got ${count}`);
  }

  const placement = options.placement ?? 'after';
  const timing: InsertionTimingOptions = {
    defaultDurationMs: options.defaultDurationMs ?? DEFAULT_INSERTION_TIMING.defaultDurationMs,
    spacingMs: options.spacingMs ?? DEFAULT_INSERTION_TIMING.spacingMs,
  };

  const text = buffer.text;
  const records = locateRecords(text);
  const firstRecord = records[0];
  const lastRecord = records[records.length - 1];

  if (!firstRecord || !lastRecord) {
    return insertIntoEmpty(buffer, count, timing);
  }

  const current =
    resolveRecord(records, text, options.anchor ?? buffer.point) ??
    (placement === 'before' ? firstRecord : lastRecord);

  const previous = placement === 'before' ? records[current.position - 1] : current;
  const next = placement === 'before' ? current : records[current.position + 1];
  const timings = planInsertion(previous?.stopMs ?? null, next?.startMs ?? null, count, timing);
  const firstId = placement === 'before' ? current.id : current.id + 1;
  const blocks = timings.map((entry, i) =>
    render({ id: firstId + i, startMs: entry.startMs, stopMs: entry.stopMs, text: '' })
  );
  const firstBlock = blocks[0] ?? '';

  // Every block ends with its empty text line; a blank line separates blocks
  let textOffset: number;
  if (placement === 'before') {
    buffer.insert(current.start, blocks.map((block) => `${block}\n\n`).join(''));
    textOffset = current.start + firstBlock.length;
  } else {
    const at = current.textField.end;
    buffer.insert(at, blocks.map((block) => `\n\n${block}`).join(''));
    textOffset = at + 2 + firstBlock.length;
  }

  return buffer.goto(textOffset);
}

function insertIntoEmpty(
  buffer: TextBuffer,
  count: number,
  timing: InsertionTimingOptions
): number {
  const timings = planInsertion(null, null, count, timing);
  const blocks = timings.map((entry, i) =>
    render({ id: i + 1, startMs: entry.startMs, stopMs: entry.stopMs, text: '' })
  );
  const kept = buffer.text.trimEnd();
  const prefix = kept ? `${kept}\n\n` : '';
  const firstBlock = blocks[0] ?? '';

  buffer.reset(prefix + blocks.map((block) => `${block}\n`).join('\n'), 0);
  return buffer.goto(prefix.length + firstBlock.length);
}

/**
 * Deletes the record at the anchor together with one blank line next to it:
 * the one after it, or for the last record the one before it. Further blank
 * or stray lines in the gap stay. An anchor in the gap before a record
 * deletes the record before the gap.
 * @returns The deleted record, or null if no record encloses the anchor
 */
export function deleteRecord(buffer: TextBuffer, anchor: number = buffer.point): SubtitleRecord | null {
  const text = buffer.text;
  const records = locateRecords(text);
  const record = resolveRecord(records, text, anchor, 'preceding');
  if (!record) return null;

  const next = records[record.position + 1];
  const previous = records[record.position - 1];
  let from = record.start;
  let to = text.length;

  if (next) {
    to = Math.min(separatorEnd(text, record), next.start);
  } else if (previous) {
    from = hasOwnEmptyLine(text, previous)
      ? previous.textField.start
      : Math.min(previous.textField.end + 1, record.start);
  }

  buffer.replace(from, to, '');
  buffer.goto(from);
  return toSubtitleRecord(record);
}

/**
 * True when the record's empty text sits on a line of its own, which then
 * doubles as the separator after it
 */
function hasOwnEmptyLine(buffer: string, record: LocatedRecord): boolean {
  return record.text === '' && buffer[record.textField.start - 1] === '\n';
}

/**
 * Offset just past the record's last line and, unless that line already
 * separates it, one following blank line
 */
function separatorEnd(buffer: string, record: LocatedRecord): number {
  const lineEnd = (from: number): number => {
    const newline = buffer.indexOf('\n', from);
    return newline === -1 ? buffer.length : newline + 1;
  };

  const end = lineEnd(record.textField.end);
  if (hasOwnEmptyLine(buffer, record) || end >= buffer.length) return end;

  const after = lineEnd(end);
  return isBlankLine(buffer.slice(end, after).replace(/\n$/, '')) ? after : end;
}

/**
 * Rewrites every ID to its 1-based position in the buffer
 */
export function renumber(buffer: TextBuffer): void {
  const text = buffer.text;
  const records = locateRecords(text);

  for (const record of [...records].reverse()) {
    const id = String(record.position + 1);
    if (idText(text, record) !== id) {
      buffer.replace(record.idSpan.start, record.idSpan.end, id);
    }
  }
}

/**
 * Reorders records by start time (ties keep their order), then renumbers.
 * The cursor stays with the record it was in.
 */
export function sortRecords(buffer: TextBuffer): void {
  const text = buffer.text;
  const records = locateRecords(text);
  const firstRecord = records[0];
  if (!firstRecord) return;

  const blocks = records.map((record) => {
    const end = records[record.position + 1]?.start ?? text.length;
    return text.slice(record.start, end).replace(/(?:\n[ \t]*)+$/, '');
  });

  const owner = resolveRecord(records, text, buffer.point);
  const offsetInBlock = owner ? Math.max(0, buffer.point - owner.start) : null;

  const order = [...records].sort((a, b) => a.startMs - b.startMs);
  const prefix = text.slice(0, firstRecord.start);
  let sorted = prefix;
  let point = buffer.point;

  order.forEach((record, i) => {
    if (i > 0) sorted += '\n\n';
    const block = blocks[record.position] ?? '';
    if (owner && offsetInBlock !== null && record.position === owner.position) {
      point = sorted.length + Math.min(offsetInBlock, block.length);
    }
    sorted += block;
  });

  if (text.endsWith('\n')) sorted += '\n';

  buffer.reset(sorted, point);
  renumber(buffer);
}

interface SanitizedLine {
  text: string;
  /** Index of the input line this came from; -1 for an added separator */
  source: number;
  /** Leading characters removed from the input line */
  trimmed: number;
}

function sanitizeLines(content: string): SanitizedLine[] {
  const lines = normalizeLineEndings(content)
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''));
  const output: SanitizedLine[] = [];

  const separate = (source: number): void => {
    const last = output[output.length - 1];
    if (last && last.text !== '') output.push({ text: '', source, trimmed: 0 });
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const next = lines[i + 1];

    if (next !== undefined && isAnchorPair(line, next)) {
      separate(-1);
      const id = line.trimStart();
      const times = next.trimStart();
      output.push({ text: id, source: i, trimmed: line.length - id.length });
      output.push({ text: times, source: i + 1, trimmed: next.length - times.length });
      i++;
    } else if (line === '') {
      separate(i);
    } else {
      output.push({ text: line, source: i, trimmed: 0 });
    }
  }

  while (output[output.length - 1]?.text === '') output.pop();
  return output;
}

function joinLines(lines: SanitizedLine[]): string {
  return lines.length > 0 ? `${lines.map((line) => line.text).join('\n')}\n` : '';
}

/**
 * Normalizes whitespace: no trailing blanks on any line, no leading blanks
 * on ID and timestamp lines, exactly one blank line between records and none
 * at either end of the document, which ends in a single newline.
 */
export function sanitizeText(content: string): string {
  return joinLines(sanitizeLines(content));
}

/**
 * Applies sanitizeText to the buffer. The cursor stays on its line and
 * column; on a removed blank line it moves to the start of the next kept line.
 */
export function sanitize(buffer: TextBuffer): void {
  const before = buffer.text;
  const output = sanitizeLines(before);
  const after = joinLines(output);
  if (after === before) return;

  const head = before.slice(0, buffer.point);
  const lineIndex = head.split('\n').length - 1;
  const column = head.length - (head.lastIndexOf('\n') + 1);

  let point = after.length;
  let offset = 0;
  for (const line of output) {
    if (line.source >= lineIndex) {
      const shifted = line.source === lineIndex ? column - line.trimmed : 0;
      point = offset + Math.min(Math.max(shifted, 0), line.text.length);
      break;
    }
    offset += line.text.length + 1;
  }

  buffer.reset(after, point);
}
