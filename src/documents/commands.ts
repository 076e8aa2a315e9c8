import type { SubtitleDocument, SubtitleRecord, TimeAdjustedHook, TimeField } from '../subtitles';
import { type HostCommand, RequestError } from './types';

type RequestBody = Readonly<Record<string, unknown>>;

/**
 * Checks that a request body is a JSON object
 */
export function toRequestBody(value: unknown): RequestBody {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new RequestError(400, 'Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

function readInteger(body: RequestBody, key: string): number | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new RequestError(400, `${key} must be an integer`);
  }
  return value;
}

function requireInteger(body: RequestBody, key: string): number {
  const value = readInteger(body, key);
  if (value === undefined) {
    throw new RequestError(400, `Missing required field: ${key}`);
  }
  return value;
}

function requireNonNegative(body: RequestBody, key: string): number {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new RequestError(400, `${key} must be a non-negative number`);
  }
  return value;
}

function readChoice<T extends string>(
  body: RequestBody,
  key: string,
  choices: readonly T[]
): T | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    throw new RequestError(400, `${key} must be one of: ${choices.join(', ')}`);
  }
  return choice;
}

function requireChoice<T extends string>(body: RequestBody, key: string, choices: readonly T[]): T {
  const value = readChoice(body, key, choices);
  if (value === undefined) {
    throw new RequestError(400, `Missing required field: ${key}`);
  }
  return value;
}

function readIntegerList(body: RequestBody, key: string): number[] | undefined {
  const value = body[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new RequestError(400, `${key} must be an array of integers`);
  }

  const list: number[] = [];
  for (const item of value) {
    if (typeof item !== 'number' || !Number.isSafeInteger(item)) {
      throw new RequestError(400, `${key} must be an array of integers`);
    }
    list.push(item);
  }
  return list;
}

// Navigation

const NAVIGATION = {
  id: (document, body) => document.gotoId(readInteger(body, 'id')),
  start: (document) => document.gotoStart(),
  stop: (document) => document.gotoStop(),
  text: (document) => document.gotoText(),
  'text-end': (document) => document.gotoTextEnd(),
  'forward-id': (document) => document.forwardId(),
  'backward-id': (document) => document.backwardId(),
  'forward-text': (document) => document.forwardText(),
  'backward-text': (document) => document.backwardText(),
  'forward-text-end': (document) => document.forwardTextEnd(),
  'backward-text-end': (document) => document.backwardTextEnd(),
  'forward-start': (document) => document.forwardStart(),
  'backward-start': (document) => document.backwardStart(),
  'forward-stop': (document) => document.forwardStop(),
  'backward-stop': (document) => document.backwardStop(),
} satisfies Record<string, (document: SubtitleDocument, body: RequestBody) => number | null>;

export type NavigationCommand = keyof typeof NAVIGATION;

export const NAVIGATION_COMMANDS = Object.keys(NAVIGATION);

function isNavigationCommand(value: unknown): value is NavigationCommand {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(NAVIGATION, value);
}

export interface NavigationResult {
  moved: boolean;
  offset: number | null;
  point: number;
  subtitleId: number | null;
}

/**
 * Runs a cursor movement described by a request body
 */
export function runNavigation(document: SubtitleDocument, payload: unknown): NavigationResult {
  const body = toRequestBody(payload);
  const command = body.command;

  if (!isNavigationCommand(command)) {
    throw new RequestError(400, `command must be one of: ${NAVIGATION_COMMANDS.join(', ')}`);
  }

  const offset = NAVIGATION[command](document, body);
  return {
    moved: offset !== null,
    offset,
    point: document.point,
    subtitleId: document.currentId(),
  };
}

export interface PlaybackResult {
  moved: boolean;
  point: number;
  subtitleId: number | null;
}

/**
 * Follows a playback position reported by the media player
 */
export function runPlayback(document: SubtitleDocument, payload: unknown): PlaybackResult {
  const body = toRequestBody(payload);
  const positionMs = requireNonNegative(body, 'positionMs');
  const offset = document.gotoIdAtTime(positionMs);

  return {
    moved: offset !== null,
    point: document.point,
    subtitleId: document.currentId(),
  };
}

// Editing

export const EDIT_OPERATIONS = [
  'set-time',
  'adjust-time',
  'shift',
  'insert',
  'delete',
  'renumber',
  'sort',
  'sanitize',
] as const;

export type EditOperation = (typeof EDIT_OPERATIONS)[number];

const TIME_FIELDS: readonly TimeField[] = ['start', 'stop'];

export interface EditResult {
  operation: EditOperation;
  /** Time value, record count, text offset or deleted record, by operation */
  value: number | SubtitleRecord | null;
  point: number;
  subtitleId: number | null;
  commands: HostCommand[];
}

/**
 * Applies an edit described by a request body. Time changes become seek
 * commands for the player; structural edits ask it to reload the subtitles.
 */
export function runEdit(document: SubtitleDocument, payload: unknown): EditResult {
  const body = toRequestBody(payload);
  const operation = requireChoice(body, 'operation', EDIT_OPERATIONS);
  const commands: HostCommand[] = [];
  const seek: TimeAdjustedHook = (_recordId, newTimeMs) => {
    commands.push({ type: 'seek', positionMs: newTimeMs });
  };

  let value: number | SubtitleRecord | null = null;

  switch (operation) {
    case 'set-time': {
      const recordId = requireInteger(body, 'recordId');
      const field = requireChoice(body, 'field', TIME_FIELDS);
      value = document.setTime(recordId, field, requireNonNegative(body, 'timeMs'), seek);
      if (value === null) throw new RequestError(404, `Subtitle ${recordId} not found`);
      break;
    }
    case 'adjust-time': {
      const recordId = requireInteger(body, 'recordId');
      const field = requireChoice(body, 'field', TIME_FIELDS);
      value = document.adjustTime(recordId, field, requireInteger(body, 'deltaMs'), seek);
      if (value === null) throw new RequestError(404, `Subtitle ${recordId} not found`);
      break;
    }
    case 'shift': {
      const recordIds = readIntegerList(body, 'recordIds');
      value = document.shiftRecords(recordIds ?? 'all', requireInteger(body, 'deltaMs'), seek);
      if (value === null) throw new RequestError(404, 'One or more subtitles not found');
      commands.push({ type: 'reload' });
      break;
    }
    case 'insert': {
      const count = readInteger(body, 'count') ?? 1;
      if (count < 1) throw new RequestError(400, 'count must be at least 1');
      value = document.insertRecords({
        count,
        placement: readChoice(body, 'placement', ['before', 'after'] as const),
      });
      commands.push({ type: 'reload' });
      break;
    }
    case 'delete': {
      value = document.deleteRecord();
      if (value === null) throw new RequestError(404, 'No subtitle at cursor');
      commands.push({ type: 'reload' });
      break;
    }
    case 'renumber':
      document.renumber();
      commands.push({ type: 'reload' });
      break;
    case 'sort':
      document.sort();
      commands.push({ type: 'reload' });
      break;
    case 'sanitize':
      document.sanitize();
      commands.push({ type: 'reload' });
      break;
  }

  return {
    operation,
    value,
    point: document.point,
    subtitleId: document.currentId(),
    commands,
  };
}
