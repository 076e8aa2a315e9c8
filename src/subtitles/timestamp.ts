import { FormatError, PreconditionViolation } from './errors';

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;
const MS_PER_SECOND = 1000;

/** Hours take two or more digits, minutes and seconds stay below 60 */
export const TIMESTAMP_SOURCE = '\\d{2,}:[0-5]\\d:[0-5]\\d,\\d{3}';

const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d),(\d{3})$/;

/**
 * Converts an SRT timestamp (HH:MM:SS,mmm) to milliseconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm"
 * @returns Time in milliseconds
 * @throws FormatError if the text deviates from the format in any way, or
 *   names a time past Number.MAX_SAFE_INTEGER milliseconds
 */
export function parseTimestamp(timestamp: string): number {
  const match = TIMESTAMP_PATTERN.exec(timestamp);

  if (!match) {
    throw new FormatError(`Invalid SRT timestamp format: ${timestamp}`, timestamp);
  }

  const [, hours = '0', minutes = '0', seconds = '0', millis = '0'] = match;

  const total =
    parseInt(hours, 10) * MS_PER_HOUR +
    parseInt(minutes, 10) * MS_PER_MINUTE +
    parseInt(seconds, 10) * MS_PER_SECOND +
    parseInt(millis, 10);

  if (!Number.isSafeInteger(total)) {
    throw new FormatError(`SRT timestamp out of range: ${timestamp}`, timestamp);
  }

  return total;
}

/**
 * Converts milliseconds to SRT timestamp format (HH:MM:SS,mmm)
 * @param msecs - Non-negative integer number of milliseconds
 * @returns Timestamp with hours padded to at least two digits
 * @throws PreconditionViolation for negative, fractional or non-finite input
 */
export function formatTimestamp(msecs: number): string {
  if (!Number.isSafeInteger(msecs) || msecs < 0) {
    throw new PreconditionViolation(
      `Timestamp must be a non-negative integer number of milliseconds, got ${msecs}`
    );
  }

  const hours = Math.floor(msecs / MS_PER_HOUR);
  const minutes = Math.floor((msecs % MS_PER_HOUR) / MS_PER_MINUTE);
  const secs = Math.floor((msecs % MS_PER_MINUTE) / MS_PER_SECOND);
  const ms = msecs % MS_PER_SECOND;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')},` +
    `${ms.toString().padStart(3, '0')}`
  );
}

/**
 * Rounds to whole milliseconds and clamps at zero
 */
export function clampMsecs(msecs: number): number {
  if (!Number.isFinite(msecs)) return 0;
  return Math.max(0, Math.round(msecs));
}
