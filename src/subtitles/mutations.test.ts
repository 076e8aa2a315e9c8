import { describe, it, expect, vi } from 'vitest';
import {
  adjustTime,
  deleteRecord,
  insertRecords,
  planInsertion,
  renumber,
  sanitize,
  sanitizeText,
  setTime,
  shiftRecords,
  sortRecords,
} from './mutations';
import { locateRecords, parseSrtContent } from './srtParser';
import { TextBuffer } from './textBuffer';
import { PreconditionViolation } from './errors';

const SAMPLE =
  '1\n00:01:01,000 --> 00:01:05,123\nFoo.\n\n' +
  '2\n00:02:02,234 --> 00:02:10,345\nBar.\n\n' +
  '3\n00:03:03,456 --> 00:03:15,567\nBaz.\n';

function ids(buffer: TextBuffer): number[] {
  return locateRecords(buffer.text).map((record) => record.id);
}

describe('setTime', () => {
  it('should rewrite only the selected timestamp', () => {
    const buffer = new TextBuffer(SAMPLE);
    const hook = vi.fn();

    expect(setTime(buffer, 2, 'stop', 131000, hook)).toBe(131000);
    expect(buffer.text).toBe(SAMPLE.replace('00:02:10,345', '00:02:11,000'));
    expect(hook).toHaveBeenCalledTimes(1);
    expect(hook).toHaveBeenCalledWith(2, 131000);
  });

  it('should return null for an unknown ID', () => {
    const buffer = new TextBuffer(SAMPLE);
    const hook = vi.fn();

    expect(setTime(buffer, 7, 'start', 0, hook)).toBeNull();
    expect(buffer.text).toBe(SAMPLE);
    expect(hook).not.toHaveBeenCalled();
  });
});

describe('adjustTime', () => {
  it('should add the delta to a timestamp', () => {
    const buffer = new TextBuffer(SAMPLE);

    expect(adjustTime(buffer, 1, 'start', -500)).toBe(60500);
    expect(buffer.text).toBe(SAMPLE.replace('00:01:01,000', '00:01:00,500'));
  });

  it('should clamp the result at zero', () => {
    const buffer = new TextBuffer('1\n00:00:00,050 --> 00:00:01,000\nA\n');
    const hook = vi.fn();

    expect(adjustTime(buffer, 1, 'start', -100, hook)).toBe(0);
    expect(parseSrtContent(buffer.text)[0]?.startMs).toBe(0);
    expect(hook).toHaveBeenCalledWith(1, 0);
  });

  it('should keep a cursor after the timestamp in place when the text grows', () => {
    const buffer = new TextBuffer('1\n99:59:59,999 --> 99:59:59,999\n', 32);

    adjustTime(buffer, 1, 'stop', 1);
    expect(buffer.text).toBe('1\n99:59:59,999 --> 100:00:00,000\n');
    expect(buffer.point).toBe(33);
  });

  it('should return null for an unknown ID', () => {
    const buffer = new TextBuffer(SAMPLE);
    expect(adjustTime(buffer, 4, 'stop', 100)).toBeNull();
    expect(buffer.text).toBe(SAMPLE);
  });
});

describe('shiftRecords', () => {
  it('should move start and stop of the selected records', () => {
    const buffer = new TextBuffer(SAMPLE);
    const hook = vi.fn();

    expect(shiftRecords(buffer, [2], 1000, hook)).toBe(1);
    expect(parseSrtContent(buffer.text).map((record) => [record.startMs, record.stopMs])).toEqual([
      [61000, 65123],
      [123234, 131345],
      [183456, 195567],
    ]);
    expect(hook.mock.calls).toEqual([[2, 123234]]);
  });

  it('should keep durations of records that would start before zero', () => {
    const buffer = new TextBuffer(SAMPLE);
    const hook = vi.fn();

    expect(shiftRecords(buffer, 'all', -61500, hook)).toBe(3);
    expect(parseSrtContent(buffer.text).map((record) => [record.startMs, record.stopMs])).toEqual([
      [0, 4123],
      [60734, 68845],
      [121956, 134067],
    ]);
    expect(hook.mock.calls).toEqual([
      [1, 0],
      [2, 60734],
      [3, 121956],
    ]);
  });

  it('should leave the buffer untouched when an ID is unknown', () => {
    const buffer = new TextBuffer(SAMPLE);
    expect(shiftRecords(buffer, [2, 7], 1000)).toBeNull();
    expect(buffer.text).toBe(SAMPLE);
  });

  it('should leave the buffer untouched when a shifted time is out of range', () => {
    const unsorted =
      '1\n00:00:05,000 --> 00:00:06,000\nA\n\n' + '2\n00:00:00,000 --> 00:00:01,000\nB\n';
    const buffer = new TextBuffer(unsorted);
    const hook = vi.fn();

    expect(() => shiftRecords(buffer, 'all', Number.MAX_SAFE_INTEGER - 3000, hook)).toThrow(
      PreconditionViolation
    );
    expect(buffer.text).toBe(unsorted);
    expect(hook).not.toHaveBeenCalled();
  });

  it('should match IDs by their exact digits', () => {
    const buffer = new TextBuffer('01\n00:00:01,000 --> 00:00:02,000\nA\n');
    expect(shiftRecords(buffer, [1], 10)).toBeNull();
  });
});

describe('planInsertion', () => {
  it('should use the default duration without an upper bound', () => {
    expect(planInsertion(null, null, 1)).toEqual([{ startMs: 0, stopMs: 1000 }]);
    expect(planInsertion(null, null, 2)).toEqual([
      { startMs: 0, stopMs: 1000 },
      { startMs: 1100, stopMs: 2100 },
    ]);
  });

  it('should start after the previous record with spacing', () => {
    expect(planInsertion(65123, 122234, 1)).toEqual([{ startMs: 65223, stopMs: 66223 }]);
  });

  it('should share a narrow gap between the new records', () => {
    expect(planInsertion(1000, 2000, 3)).toEqual([
      { startMs: 1100, stopMs: 1300 },
      { startMs: 1400, stopMs: 1600 },
      { startMs: 1700, stopMs: 1900 },
    ]);
  });

  it('should fall back to the default duration when the gap is too small', () => {
    expect(planInsertion(1000, 1150, 2)).toEqual([
      { startMs: 1100, stopMs: 2100 },
      { startMs: 2200, stopMs: 3200 },
    ]);
  });

  it('should honor custom timing options', () => {
    expect(planInsertion(null, null, 2, { defaultDurationMs: 500, spacingMs: 50 })).toEqual([
      { startMs: 0, stopMs: 500 },
      { startMs: 550, stopMs: 1050 },
    ]);
  });
});

describe('insertRecords', () => {
  it('should append an empty record after the last one', () => {
    const buffer = new TextBuffer(SAMPLE, 110);

    expect(insertRecords(buffer)).toBe(146);
    expect(buffer.point).toBe(146);
    expect(buffer.text).toBe(
      SAMPLE.slice(0, 112) + '\n\n4\n00:03:15,667 --> 00:03:16,667\n' + '\n'
    );

    const added = locateRecords(buffer.text)[3];
    expect(added).toMatchObject({ id: 4, startMs: 195667, stopMs: 196667, text: '' });
    expect(added?.textField.start).toBe(146);
  });

  it('should insert between two records with a provisional ID', () => {
    const buffer = new TextBuffer(SAMPLE, 72);

    expect(insertRecords(buffer)).toBe(108);
    expect(buffer.text).toBe(
      SAMPLE.slice(0, 74) + '\n\n3\n00:02:10,445 --> 00:02:11,445\n' + SAMPLE.slice(74)
    );
    expect(ids(buffer)).toEqual([1, 2, 3, 3]);

    renumber(buffer);
    expect(ids(buffer)).toEqual([1, 2, 3, 4]);
  });

  it('should insert before the first record starting at zero', () => {
    const buffer = new TextBuffer(SAMPLE, 0);

    expect(insertRecords(buffer, { count: 2, placement: 'before' })).toBe(32);
    expect(buffer.text).toBe(
      '1\n00:00:00,000 --> 00:00:01,000\n\n\n' +
        '2\n00:00:01,100 --> 00:00:02,100\n\n\n' +
        SAMPLE
    );
    expect(ids(buffer)).toEqual([1, 2, 1, 2, 3]);
  });

  it('should subdivide a short gap', () => {
    const buffer = new TextBuffer(
      '1\n00:00:00,000 --> 00:00:01,000\nA\n\n2\n00:00:02,000 --> 00:00:03,000\nB\n'
    );

    insertRecords(buffer, { count: 3 });
    expect(parseSrtContent(buffer.text).map((record) => [record.startMs, record.stopMs])).toEqual([
      [0, 1000],
      [1100, 1300],
      [1400, 1600],
      [1700, 1900],
      [2000, 3000],
    ]);
  });

  it('should create records in an empty document', () => {
    const buffer = new TextBuffer('');

    expect(insertRecords(buffer, { count: 2 })).toBe(32);
    expect(buffer.text).toBe(
      '1\n00:00:00,000 --> 00:00:01,000\n\n\n2\n00:00:01,100 --> 00:00:02,100\n\n'
    );
  });

  it('should reject a count below one', () => {
    expect(() => insertRecords(new TextBuffer(SAMPLE), { count: 0 })).toThrow(
      PreconditionViolation
    );
  });
});

describe('deleteRecord', () => {
  it('should remove the record and its separator', () => {
    const buffer = new TextBuffer(SAMPLE, 72);

    expect(deleteRecord(buffer)).toEqual({
      id: 2,
      startMs: 122234,
      stopMs: 130345,
      text: 'Bar.',
    });
    expect(buffer.text).toBe(SAMPLE.slice(0, 38) + SAMPLE.slice(76));
    expect(buffer.point).toBe(38);

    renumber(buffer);
    expect(buffer.text).toBe(
      '1\n00:01:01,000 --> 00:01:05,123\nFoo.\n\n2\n00:03:03,456 --> 00:03:15,567\nBaz.\n'
    );
  });

  it('should delete the record before a gap', () => {
    const buffer = new TextBuffer(SAMPLE);
    expect(deleteRecord(buffer, 75)?.id).toBe(2);
  });

  it('should delete the last record with the separator before it', () => {
    const buffer = new TextBuffer(SAMPLE, 110);

    expect(deleteRecord(buffer)?.id).toBe(3);
    expect(buffer.text).toBe(SAMPLE.slice(0, 75));
    expect(buffer.point).toBe(75);
  });

  it('should take the empty text line of the previous record with the last one', () => {
    const buffer = new TextBuffer(
      '1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n'
    );
    buffer.goto(buffer.length);

    expect(deleteRecord(buffer)?.id).toBe(2);
    expect(buffer.text).toBe('1\n00:00:01,000 --> 00:00:02,000\n');
    expect(buffer.point).toBe(32);
  });

  it('should remove only one blank line of a wider gap', () => {
    const buffer = new TextBuffer(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n' +
        '2\n00:00:03,000 --> 00:00:04,000\nB\n\n\n' +
        '3\n00:00:05,000 --> 00:00:06,000\nC\n'
    );

    expect(deleteRecord(buffer, buffer.text.indexOf('B'))?.id).toBe(2);
    expect(buffer.text).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n\n3\n00:00:05,000 --> 00:00:06,000\nC\n'
    );
  });

  it('should count an empty text line as the separator', () => {
    const buffer = new TextBuffer(
      '1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n'
    );

    expect(deleteRecord(buffer, 0)?.id).toBe(1);
    expect(buffer.text).toBe('2\n00:00:03,000 --> 00:00:04,000\nB\n');
  });

  it('should empty a document with a single record', () => {
    const buffer = new TextBuffer('1\n00:00:01,000 --> 00:00:02,000\nA\n');
    expect(deleteRecord(buffer)?.text).toBe('A');
    expect(buffer.text).toBe('');
  });

  it('should return null without records', () => {
    expect(deleteRecord(new TextBuffer(''))).toBeNull();
  });
});

describe('renumber', () => {
  const gapped =
    '5\n00:00:01,000 --> 00:00:02,000\nA\n\n' +
    '9\n00:00:03,000 --> 00:00:04,000\nB\n\n' +
    '12\n00:00:05,000 --> 00:00:06,000\nC\n';

  it('should number records by position', () => {
    const buffer = new TextBuffer(gapped);
    renumber(buffer);
    expect(buffer.text).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n' +
        '2\n00:00:03,000 --> 00:00:04,000\nB\n\n' +
        '3\n00:00:05,000 --> 00:00:06,000\nC\n'
    );
  });

  it('should change nothing on a second run', () => {
    const buffer = new TextBuffer(gapped);
    renumber(buffer);
    const once = buffer.text;
    renumber(buffer);
    expect(buffer.text).toBe(once);
  });

  it('should drop leading zeros from IDs', () => {
    const buffer = new TextBuffer('01\n00:00:01,000 --> 00:00:02,000\nA\n');
    renumber(buffer);
    expect(buffer.text).toBe('1\n00:00:01,000 --> 00:00:02,000\nA\n');
  });

  it('should keep the cursor on its character', () => {
    const buffer = new TextBuffer('12\n00:00:01,000 --> 00:00:02,000\nA\n', 5);
    renumber(buffer);
    expect(buffer.point).toBe(4);
  });
});

describe('sortRecords', () => {
  const unsorted =
    '1\n00:00:05,000 --> 00:00:06,000\nC\n\n' +
    '2\n00:00:01,000 --> 00:00:02,000\nA\n\n' +
    '3\n00:00:05,000 --> 00:00:07,000\nC2\n\n' +
    '4\n00:00:03,000 --> 00:00:04,000\nB\n';

  it('should order records by start time, keeping ties in place', () => {
    const buffer = new TextBuffer(unsorted);
    sortRecords(buffer);
    expect(buffer.text).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n' +
        '2\n00:00:03,000 --> 00:00:04,000\nB\n\n' +
        '3\n00:00:05,000 --> 00:00:06,000\nC\n\n' +
        '4\n00:00:05,000 --> 00:00:07,000\nC2\n'
    );
  });

  it('should move the cursor with its record', () => {
    const buffer = new TextBuffer(unsorted, unsorted.indexOf('C2') + 1);
    sortRecords(buffer);
    expect(buffer.point).toBe(buffer.text.indexOf('C2') + 1);
  });

  it('should keep records with empty text', () => {
    const buffer = new TextBuffer(
      '1\n00:00:05,000 --> 00:00:06,000\n\n2\n00:00:01,000 --> 00:00:02,000\nA\n'
    );
    sortRecords(buffer);
    expect(buffer.text).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\nA\n\n2\n00:00:05,000 --> 00:00:06,000\n'
    );
  });
});

describe('sanitizeText', () => {
  const messy =
    '\n \n  1  \n  00:00:01,000 --> 00:00:02,000 \n  indented text  \n\n\n\n' +
    '2\n00:00:03,000 --> 00:00:04,000\n\n \n' +
    '3\n00:00:05,000 --> 00:00:06,000\nC\t\n\n\n';
  const clean =
    '1\n00:00:01,000 --> 00:00:02,000\n  indented text\n\n' +
    '2\n00:00:03,000 --> 00:00:04,000\n\n' +
    '3\n00:00:05,000 --> 00:00:06,000\nC\n';

  it('should normalize whitespace around and between records', () => {
    expect(sanitizeText(messy)).toBe(clean);
  });

  it('should separate an empty record from the next ID line', () => {
    expect(
      sanitizeText('1\n00:00:01,000 --> 00:00:02,000\n2\n00:00:03,000 --> 00:00:04,000\nB')
    ).toBe('1\n00:00:01,000 --> 00:00:02,000\n\n2\n00:00:03,000 --> 00:00:04,000\nB\n');
  });

  it('should drop blank lines after an empty last record', () => {
    expect(sanitizeText('1\n00:00:01,000 --> 00:00:02,000\n\n\n')).toBe(
      '1\n00:00:01,000 --> 00:00:02,000\n'
    );
  });

  it('should reduce a blank document to nothing', () => {
    expect(sanitizeText(' \n\t\n')).toBe('');
  });

  it('should be idempotent', () => {
    for (const text of [messy, SAMPLE, '1\n00:00:01,000 --> 00:00:02,000\n\n\n', '']) {
      const once = sanitizeText(text);
      expect(sanitizeText(once)).toBe(once);
    }
  });

  it('should keep the cursor on its line and column', () => {
    const buffer = new TextBuffer(messy, messy.indexOf('indented'));
    sanitize(buffer);
    expect(buffer.text).toBe(clean);
    expect(buffer.point).toBe(clean.indexOf('indented'));
  });

  it('should move a cursor on a removed blank line to the next kept line', () => {
    const buffer = new TextBuffer(messy, messy.indexOf('2\n00:00:03') - 1);
    sanitize(buffer);
    expect(buffer.point).toBe(clean.indexOf('2\n00:00:03'));
  });

  it('should leave a canonical buffer and its cursor alone', () => {
    const buffer = new TextBuffer(SAMPLE, 40);
    sanitize(buffer);
    expect(buffer.text).toBe(SAMPLE);
    expect(buffer.point).toBe(40);
  });
});
