/**
 * Message channel from the worker to whoever displays the run log.
 *
 * Plugged into the logger as an extra pino destination: every record is
 * rendered as one `[HH:MM:SS] message (key=value, ...)` line, kept in a
 * bounded ring buffer, queued for `drain()` and pushed to subscribers.
 */

import { pino, type DestinationStream } from 'pino';
import { z } from 'zod';
import { formatClock } from '../shared/timing.js';

export interface LogLine {
  /** Monotonic sequence number, starting at 1. */
  seq: number;
  level: string;
  text: string;
}

export type LogListener = (line: LogLine) => void;

/** Record fields that never appear in the rendered line. */
const HIDDEN_KEYS = new Set([
  'level',
  'time',
  'pid',
  'hostname',
  'msg',
  'module',
  'component',
  'sessionId',
  'err',
]);

const recordSchema = z
  .object({
    level: z.union([z.string(), z.number()]).optional(),
    time: z.union([z.string(), z.number()]).optional(),
    msg: z.string().optional(),
  })
  .passthrough();

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

function levelLabel(level: string | number | undefined): string {
  if (typeof level === 'number') {
    return pino.levels.labels[level] ?? String(level);
  }
  return level ?? 'info';
}

/**
 * Renders one serialized pino record. Input that is not a JSON object is
 * passed through as the message.
 */
export function formatRecord(raw: string, now: () => Date = () => new Date()): { level: string; text: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { level: 'info', text: `[${formatClock(now())}] ${raw.trim()}` };
  }

  const parsed = recordSchema.safeParse(json);
  if (!parsed.success) {
    return { level: 'info', text: `[${formatClock(now())}] ${raw.trim()}` };
  }

  const record = parsed.data;
  const time = record.time !== undefined ? new Date(record.time) : now();
  const clock = formatClock(Number.isNaN(time.getTime()) ? now() : time);

  const extras = Object.entries(record)
    .filter(([key, value]) => !HIDDEN_KEYS.has(key) && value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  const message = record.msg ?? '';
  const text = extras.length > 0 ? `[${clock}] ${message} (${extras.join(', ')})` : `[${clock}] ${message}`;
  return { level: levelLabel(record.level), text };
}

export class LogChannel implements DestinationStream {
  private readonly capacity: number;
  private readonly buffer: LogLine[] = [];
  private readonly pending: LogLine[] = [];
  private readonly listeners = new Set<LogListener>();
  private readonly now: () => Date;
  private seq = 0;

  constructor(capacity = 500, now: () => Date = () => new Date()) {
    this.capacity = Math.max(1, capacity);
    this.now = now;
  }

  /** pino destination entry point; one serialized record per call. */
  write(chunk: string): void {
    for (const raw of chunk.split('\n')) {
      if (raw.trim()) {
        const { level, text } = formatRecord(raw, this.now);
        this.push({ seq: ++this.seq, level, text });
      }
    }
  }

  /** Lines not yet drained, oldest first; empties the queue. */
  drain(): LogLine[] {
    return this.pending.splice(0, this.pending.length);
  }

  /** Up to `limit` most recent lines, oldest first. */
  recent(limit = this.capacity): LogLine[] {
    return this.buffer.slice(Math.max(0, this.buffer.length - limit));
  }

  /** Registers a push listener; returns the function that removes it. */
  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.buffer.length;
  }

  private push(line: LogLine): void {
    this.buffer.push(line);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
    this.pending.push(line);
    if (this.pending.length > this.capacity) {
      this.pending.shift();
    }

    for (const listener of this.listeners) {
      try {
        listener(line);
      } catch {
        // A listener that throws is detached; logging here would re-enter this stream.
        this.listeners.delete(listener);
      }
    }
  }
}
