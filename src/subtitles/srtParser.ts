import { FormatError } from './errors';
import { formatTimestamp, parseTimestamp, TIMESTAMP_SOURCE } from './timestamp';
import type {
  GapOwnership,
  LocatedRecord,
  SubtitleRecord,
  TextSpan,
  ValidationIssue,
} from './types';

const ID_LINE = /^[ \t]*(\d+)[ \t]*$/;
const TIMESTAMP_LINE = new RegExp(
  `^[ \\t]*(${TIMESTAMP_SOURCE})[ \\t]+-->[ \\t]+(${TIMESTAMP_SOURCE})[ \\t]*$`
);
const BLANK_LINE = /^[ \t]*$/;

/**
 * One line of the buffer; `end` is the offset of its newline (or buffer end)
 */
export interface Line {
  text: string;
  start: number;
  end: number;
}

interface Anchor {
  id: number;
  idSpan: TextSpan;
  startSpan: TextSpan;
  stopSpan: TextSpan;
  startMs: number;
  stopMs: number;
}

/**
 * Converts CRLF and lone CR line endings to LF
 */
export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Splits a buffer into lines with their offsets. A buffer ending in a
 * newline yields a final empty line at the buffer end.
 */
export function splitLines(buffer: string): Line[] {
  const lines: Line[] = [];
  let start = 0;

  for (;;) {
    const end = buffer.indexOf('\n', start);
    if (end === -1) {
      lines.push({ text: buffer.slice(start), start, end: buffer.length });
      return lines;
    }
    lines.push({ text: buffer.slice(start, end), start, end });
    start = end + 1;
  }
}

export function isBlankLine(text: string): boolean {
  return BLANK_LINE.test(text);
}

interface TimestampLine {
  startText: string;
  stopText: string;
  startMs: number;
  stopMs: number;
}

/**
 * Reads a "start --> stop" line; null unless both timestamps parse
 */
function readTimestampLine(text: string): TimestampLine | null {
  const match = TIMESTAMP_LINE.exec(text);
  if (!match?.[1] || !match[2]) return null;

  try {
    return {
      startText: match[1],
      stopText: match[2],
      startMs: parseTimestamp(match[1]),
      stopMs: parseTimestamp(match[2]),
    };
  } catch (error) {
    if (error instanceof FormatError) return null;
    throw error;
  }
}

/**
 * True when `line` is an ID line and `next` a timestamp line
 */
export function isAnchorPair(line: string, next: string | undefined): boolean {
  return next !== undefined && ID_LINE.test(line) && readTimestampLine(next) !== null;
}

function matchAnchor(lines: Line[], index: number): Anchor | null {
  const idLine = lines[index];
  const timeLine = lines[index + 1];
  if (!idLine || !timeLine) return null;

  const idMatch = ID_LINE.exec(idLine.text);
  const times = readTimestampLine(timeLine.text);
  if (!idMatch?.[1] || !times) return null;

  const digits = idMatch[1];
  const idStart = idLine.start + idLine.text.indexOf(digits);

  const { startText, stopText } = times;
  const startColumn = timeLine.text.indexOf(startText);
  const stopColumn = timeLine.text.indexOf(stopText, startColumn + startText.length);

  return {
    id: parseInt(digits, 10),
    idSpan: { start: idStart, end: idStart + digits.length },
    startSpan: {
      start: timeLine.start + startColumn,
      end: timeLine.start + startColumn + startText.length,
    },
    stopSpan: {
      start: timeLine.start + stopColumn,
      end: timeLine.start + stopColumn + stopText.length,
    },
    startMs: times.startMs,
    stopMs: times.stopMs,
  };
}

/**
 * Finds every subtitle record in the buffer, in physical order
 * @param buffer - Raw SRT text (LF line endings)
 * @returns Records with the offsets of their fields
 */
export function locateRecords(buffer: string): LocatedRecord[] {
  const lines = splitLines(buffer);
  const records: LocatedRecord[] = [];
  let index = 0;

  while (index < lines.length) {
    const anchor = matchAnchor(lines, index);
    const idLine = lines[index];
    const timeLine = lines[index + 1];

    if (!anchor || !idLine || !timeLine) {
      index++;
      continue;
    }

    // Text runs until a blank line, the next anchor or the buffer end
    let next = index + 2;
    while (next < lines.length) {
      const line = lines[next];
      if (!line || isBlankLine(line.text) || matchAnchor(lines, next)) break;
      next++;
    }

    const textLines = lines.slice(index + 2, next);
    const firstTextLine = textLines[0];
    const lastTextLine = textLines[textLines.length - 1];
    let textField: TextSpan;

    if (firstTextLine && lastTextLine) {
      textField = { start: firstTextLine.start, end: lastTextLine.end };
    } else {
      const emptyLine = lines[index + 2];
      const position =
        emptyLine && !matchAnchor(lines, index + 2) ? emptyLine.start : timeLine.end;
      textField = { start: position, end: position };
    }

    records.push({
      id: anchor.id,
      startMs: anchor.startMs,
      stopMs: anchor.stopMs,
      text: textLines.map((line) => line.text).join('\n'),
      position: records.length,
      start: idLine.start,
      idSpan: anchor.idSpan,
      startSpan: anchor.startSpan,
      stopSpan: anchor.stopSpan,
      textField,
    });

    index = next;
  }

  return records;
}

/**
 * Resolves the record that encloses `offset` among already located records.
 *
 * Record k owns its own lines through the end of its text. The gap after it,
 * up to the ID line of record k+1, belongs to k+1 under 'following' and to k
 * under 'preceding'. Whitespace before the first record belongs to the first
 * record under either policy; anything else before it resolves to nothing.
 */
export function resolveRecord(
  records: LocatedRecord[],
  buffer: string,
  offset: number,
  gap: GapOwnership = 'following'
): LocatedRecord | null {
  const first = records[0];
  if (!first) return null;

  const point = Math.min(Math.max(offset, 0), buffer.length);

  if (point < first.start) {
    return isBlankText(buffer.slice(point, first.start)) ? first : null;
  }

  let current = first;
  for (const record of records) {
    if (record.start > point) break;
    current = record;
  }

  const next = records[current.position + 1];
  if (!next || point <= current.textField.end) {
    return current;
  }

  switch (gap) {
    case 'following':
      return next;
    case 'preceding':
      return current;
  }
}

function isBlankText(text: string): boolean {
  return /^\s*$/.test(text);
}

/**
 * Scans the buffer for the record enclosing `offset`
 * @param buffer - Raw SRT text
 * @param offset - Cursor offset
 * @param gap - Which record owns the blank lines between two records
 * @returns The enclosing record or null if none can be resolved
 */
export function scanRecordAt(
  buffer: string,
  offset: number,
  gap: GapOwnership = 'following'
): LocatedRecord | null {
  return resolveRecord(locateRecords(buffer), buffer, offset, gap);
}

/**
 * Finds the first record whose ID digits are exactly `id` written in decimal;
 * "01" is not record 1
 */
export function recordById(buffer: string, id: number): LocatedRecord | null {
  const digits = String(id);
  return (
    locateRecords(buffer).find(
      (record) => buffer.slice(record.idSpan.start, record.idSpan.end) === digits
    ) ?? null
  );
}

/**
 * Offsets of the record's text field; empty when the subtitle has no text
 */
export function textSpan(record: LocatedRecord): TextSpan {
  return { start: record.textField.start, end: record.textField.end };
}

/**
 * Strips the offsets from a located record
 */
export function toSubtitleRecord(record: LocatedRecord): SubtitleRecord {
  return {
    id: record.id,
    startMs: record.startMs,
    stopMs: record.stopMs,
    text: record.text,
  };
}

/**
 * Serializes one record as "id\nstart --> stop\ntext" without a trailing
 * blank line
 */
export function render(record: SubtitleRecord): string {
  const start = formatTimestamp(record.startMs);
  const stop = formatTimestamp(record.stopMs);
  return `${record.id}\n${start} --> ${stop}\n${record.text}`;
}

/**
 * Parses SRT content into subtitle records
 * @param content - The raw SRT file content
 * @returns Array of parsed records in document order
 */
export function parseSrtContent(content: string): SubtitleRecord[] {
  return locateRecords(normalizeLineEndings(content)).map(toSubtitleRecord);
}

/**
 * Generates canonical SRT content from records, keeping their IDs
 * @param records - Records in the order they should appear
 * @returns SRT content with one blank line between records
 */
export function generateSrtContent(records: SubtitleRecord[]): string {
  if (records.length === 0) return '';

  // Text never contains a blank line, so a triple newline can only come from
  // an empty-text record whose own empty line already separates it
  const content = records.map(render).join('\n\n').replace(/\n{3,}/g, '\n\n');
  return content.endsWith('\n') ? content : `${content}\n`;
}

/**
 * Reports structural problems: blocks that do not start with an ID, ID lines
 * without a valid timestamp line, and records that stop before they start
 * @param buffer - Raw SRT text
 * @returns Issues in buffer order
 */
export function validateSrtContent(buffer: string): ValidationIssue[] {
  const lines = splitLines(buffer);
  const issues: ValidationIssue[] = [];
  let blockStart = true;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (!line) continue;

    if (isBlankLine(line.text)) {
      blockStart = true;
      continue;
    }

    const anchor = matchAnchor(lines, index);
    if (anchor) {
      if (anchor.startMs > anchor.stopMs) {
        issues.push({
          code: 'start-after-stop',
          line: index + 2,
          offset: anchor.startSpan.start,
          message: `Subtitle ${anchor.id} starts after it stops`,
        });
      }
      blockStart = false;
      index++;
      continue;
    }

    if (!blockStart) continue;
    blockStart = false;

    if (!ID_LINE.test(line.text)) {
      issues.push({
        code: 'missing-id',
        line: index + 1,
        offset: line.start,
        message: `Expected subtitle ID, found "${line.text.trim()}"`,
      });
      continue;
    }

    const timeLine = lines[index + 1];
    issues.push({
      code: 'invalid-timestamp',
      line: index + 2,
      offset: timeLine?.start ?? line.end,
      message: describeTimestampProblem(timeLine?.text),
    });
    index++;
  }

  return issues;
}

function describeTimestampProblem(text: string | undefined): string {
  if (text === undefined || isBlankLine(text)) {
    return 'Missing timestamp line';
  }

  const parts = text.trim().split(/\s*-->\s*/);
  if (parts.length !== 2) {
    return `Expected "start --> stop", found "${text.trim()}"`;
  }

  for (const part of parts) {
    try {
      parseTimestamp(part);
    } catch (error) {
      if (error instanceof FormatError) return error.message;
      throw error;
    }
  }

  return `Expected "start --> stop", found "${text.trim()}"`;
}
