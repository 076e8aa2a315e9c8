import { describe, it, expect } from 'vitest';
import {
  findBackward,
  findForward,
  findId,
  findIdAtTime,
  findRecordAtTime,
  findStart,
  findStop,
  findText,
  findTextEnd,
  relativePointInText,
} from './navigation';
import { locateRecords } from './srtParser';
import type { RecordField } from './types';

const SAMPLE =
  '1\n00:01:01,000 --> 00:01:05,123\nFoo.\n\n' +
  '2\n00:02:02,234 --> 00:02:10,345\nBar.\n\n' +
  '3\n00:03:03,456 --> 00:03:15,567\nBaz.\n';

const EMPTY_TEXT =
  '1\n00:00:01,000 --> 00:00:02,000\n\n' + '2\n00:00:03,000 --> 00:00:04,000\nB\n';

describe('findId', () => {
  it('should find the ID of the enclosing record', () => {
    expect(findId(SAMPLE, 35)).toBe(0);
    expect(findId(SAMPLE, 72)).toBe(38);
  });

  it('should give the blank line between records to the next record', () => {
    expect(findId(SAMPLE, 37)).toBe(38);
  });

  it('should find a record by ID', () => {
    expect(findId(SAMPLE, 0, 3)).toBe(76);
    expect(findId(SAMPLE, 0, 9)).toBeNull();
  });
});

describe('findIdAtTime', () => {
  it('should find the record playing at a time', () => {
    expect(findIdAtTime(SAMPLE, 61000)).toBe(0);
    expect(findIdAtTime(SAMPLE, 61001)).toBe(0);
    expect(findIdAtTime(SAMPLE, 65123)).toBe(0);
    expect(findIdAtTime(SAMPLE, 122234)).toBe(38);
    expect(findIdAtTime(SAMPLE, 183456)).toBe(76);
  });

  it('should pick the earlier record between two records', () => {
    expect(findIdAtTime(SAMPLE, 100000)).toBe(0);
    expect(findIdAtTime(SAMPLE, 130346)).toBe(38);
  });

  it('should clamp to the first and last record', () => {
    expect(findIdAtTime(SAMPLE, 0)).toBe(0);
    expect(findIdAtTime(SAMPLE, 60999)).toBe(0);
    expect(findIdAtTime(SAMPLE, 200000)).toBe(76);
  });

  it('should return null without records', () => {
    expect(findIdAtTime('', 5)).toBeNull();
  });

  it('should stop at the first record that starts too late', () => {
    const unsorted =
      '1\n00:00:10,000 --> 00:00:11,000\nA\n\n' + '2\n00:00:01,000 --> 00:00:02,000\nB\n';
    expect(findRecordAtTime(locateRecords(unsorted), 1500)?.id).toBe(1);
  });
});

describe('field lookups', () => {
  it('should find the fields of the enclosing record', () => {
    expect(findStart(SAMPLE, 72)).toBe(40);
    expect(findStop(SAMPLE, 72)).toBe(57);
    expect(findText(SAMPLE, 72)).toBe(70);
    expect(findTextEnd(SAMPLE, 72)).toBe(74);
  });

  it('should report no text end for an empty text field', () => {
    expect(findText(EMPTY_TEXT, 0)).toBe(32);
    expect(findTextEnd(EMPTY_TEXT, 0)).toBeNull();
  });

  it('should return null when nothing encloses the offset', () => {
    expect(findStart('', 0)).toBeNull();
  });
});

describe('findForward / findBackward', () => {
  it('should move to a field of the neighboring record', () => {
    expect(findForward(SAMPLE, 0, 'id')).toBe(38);
    expect(findForward(SAMPLE, 0, 'start')).toBe(40);
    expect(findForward(SAMPLE, 40, 'stop')).toBe(95);
    expect(findBackward(SAMPLE, 80, 'text')).toBe(70);
    expect(findBackward(SAMPLE, 110, 'text-end')).toBe(74);
  });

  it('should stop at the document edges', () => {
    expect(findForward(SAMPLE, 76, 'id')).toBeNull();
    expect(findBackward(SAMPLE, 0, 'id')).toBeNull();
  });

  it('should come back to the same field after a move forward and back', () => {
    const fields: RecordField[] = ['id', 'start', 'stop', 'text', 'text-end'];
    for (const field of fields) {
      const forward = findForward(SAMPLE, 38, field);
      expect(forward).not.toBeNull();
      if (forward === null) continue;

      const back = findBackward(SAMPLE, forward, field);
      expect(back).not.toBeNull();
      if (back === null) continue;

      expect(findForward(SAMPLE, back, field)).toBe(forward);
    }
  });
});

describe('relativePointInText', () => {
  it('should measure the distance from the text start', () => {
    expect(relativePointInText(SAMPLE, 70)).toBe(0);
    expect(relativePointInText(SAMPLE, 72)).toBe(2);
  });

  it('should be null for empty text or no record', () => {
    expect(relativePointInText(EMPTY_TEXT, 32)).toBeNull();
    expect(relativePointInText('', 0)).toBeNull();
  });
});
