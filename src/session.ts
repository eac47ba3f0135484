import type { KeyEvent, KeySession } from './types';
import { SessionFormatError } from './errors';

export interface SessionRecorder {
  /** Begin a new session, discarding any unfinished one. */
  start(now: number, metadata?: Record<string, unknown>): void;
  /** Append an event while recording; ignored otherwise. */
  record(event: KeyEvent): void;
  /** Close the session and return it, or null when not recording. */
  stop(now: number): KeySession | null;
  /** Session being recorded, or the last one stopped. */
  current(): KeySession | null;
  readonly recording: boolean;
}

export function createSessionRecorder(): SessionRecorder {
  let session: KeySession | null = null;
  let recording = false;

  return {
    start(now: number, metadata: Record<string, unknown> = {}) {
      session = { startTime: now, endTime: 0, metadata: { ...metadata }, events: [] };
      recording = true;
    },

    record(event: KeyEvent) {
      if (recording && session) session.events.push(event);
    },

    stop(now: number) {
      if (!recording || !session) return null;
      recording = false;
      session.endTime = now;
      return session;
    },

    current() {
      return session;
    },

    get recording() {
      return recording;
    },
  };
}

export function serializeSession(session: KeySession): string {
  return JSON.stringify(
    {
      startTime: session.startTime,
      endTime: session.endTime,
      metadata: session.metadata,
      events: session.events.map((e) => ({
        key: e.key,
        type: e.type,
        timestamp: e.timestamp,
        ...(e.code !== undefined && { code: e.code }),
      })),
    },
    null,
    2,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, field: string, where: string): number {
  const value = record[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SessionFormatError(`${where}.${field} must be a finite number`);
  }
  return value;
}

function readEvent(value: unknown, index: number): KeyEvent {
  const where = `events[${index}]`;
  if (!isRecord(value)) throw new SessionFormatError(`${where} must be an object`);
  const { key, type, code } = value;
  if (typeof key !== 'string' || key.length === 0) {
    throw new SessionFormatError(`${where}.key must be a non-empty string`);
  }
  if (type !== 'press' && type !== 'release') {
    throw new SessionFormatError(`${where}.type must be 'press' or 'release'`);
  }
  if (code !== undefined && typeof code !== 'string') {
    throw new SessionFormatError(`${where}.code must be a string`);
  }
  const timestamp = readNumber(value, 'timestamp', where);
  return code === undefined ? { key, type, timestamp } : { key, type, timestamp, code };
}

/** Parse a session written by serializeSession. */
export function parseSession(text: string): KeySession {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new SessionFormatError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(data)) throw new SessionFormatError('session must be an object');

  const metadata = data.metadata ?? {};
  if (!isRecord(metadata)) throw new SessionFormatError('session.metadata must be an object');
  if (!Array.isArray(data.events)) throw new SessionFormatError('session.events must be an array');

  return {
    startTime: readNumber(data, 'startTime', 'session'),
    endTime: readNumber(data, 'endTime', 'session'),
    metadata,
    events: data.events.map(readEvent),
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** File name for a session saved at `date`, local time: session_YYYYMMDD_HHMMSS.json */
export function sessionFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `session_${day}_${time}.json`;
}
