import { locateRecords, recordById, resolveRecord, scanRecordAt } from './srtParser';
import type { LocatedRecord, RecordField } from './types';

/*
 * Every function here answers "where would the cursor go" for a buffer and
 * an offset. A null result means there is nothing to move to; callers keep
 * the cursor where it is.
 */

/**
 * Offset a field of `record` lives at. `text-end` has no offset when the
 * text is empty.
 */
export function fieldOffset(record: LocatedRecord, field: RecordField): number | null {
  switch (field) {
    case 'id':
      return record.idSpan.start;
    case 'start':
      return record.startSpan.start;
    case 'stop':
      return record.stopSpan.start;
    case 'text':
      return record.textField.start;
    case 'text-end':
      return record.textField.end > record.textField.start ? record.textField.end : null;
  }
}

/**
 * Start of an ID: of the record enclosing `offset` when `id` is omitted,
 * otherwise of the record with that ID
 */
export function findId(buffer: string, offset: number, id?: number): number | null {
  const record = id === undefined ? scanRecordAt(buffer, offset) : recordById(buffer, id);
  return record ? record.idSpan.start : null;
}

/**
 * Picks the record playing at `ms`. Walks records in buffer order while they
 * start at or before `ms`; the first one still running wins. Between two
 * records the earlier one is returned, before the first start the first
 * record, after the last stop the last record.
 */
export function findRecordAtTime(records: LocatedRecord[], ms: number): LocatedRecord | null {
  let visited: LocatedRecord | null = null;

  for (const record of records) {
    if (record.startMs > ms) break;
    if (record.stopMs >= ms) return record;
    visited = record;
  }

  return visited ?? records[0] ?? null;
}

export function findIdAtTime(buffer: string, ms: number): number | null {
  const record = findRecordAtTime(locateRecords(buffer), ms);
  return record ? record.idSpan.start : null;
}

export function findStart(buffer: string, offset: number): number | null {
  return findField(buffer, offset, 'start');
}

export function findStop(buffer: string, offset: number): number | null {
  return findField(buffer, offset, 'stop');
}

export function findText(buffer: string, offset: number): number | null {
  return findField(buffer, offset, 'text');
}

/**
 * End of the enclosing record's text; null when the text is empty
 */
export function findTextEnd(buffer: string, offset: number): number | null {
  return findField(buffer, offset, 'text-end');
}

function findField(buffer: string, offset: number, field: RecordField): number | null {
  const record = scanRecordAt(buffer, offset);
  return record ? fieldOffset(record, field) : null;
}

/**
 * Field of the record after the enclosing one
 */
export function findForward(buffer: string, offset: number, field: RecordField): number | null {
  return findNeighborField(buffer, offset, field, 1);
}

/**
 * Field of the record before the enclosing one
 */
export function findBackward(buffer: string, offset: number, field: RecordField): number | null {
  return findNeighborField(buffer, offset, field, -1);
}

function findNeighborField(
  buffer: string,
  offset: number,
  field: RecordField,
  direction: 1 | -1
): number | null {
  const records = locateRecords(buffer);
  const current = resolveRecord(records, buffer, offset);
  if (!current) return null;

  const neighbor = records[current.position + direction];
  return neighbor ? fieldOffset(neighbor, field) : null;
}

/**
 * Distance of `offset` from the start of the enclosing record's text.
 * Null when no record encloses the offset or the record has no text, so an
 * empty text field is never confused with the first column of real text.
 */
export function relativePointInText(buffer: string, offset: number): number | null {
  const record = scanRecordAt(buffer, offset);
  if (!record || record.text === '') return null;
  return offset - record.textField.start;
}
