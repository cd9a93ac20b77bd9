import { randomUUID } from 'crypto';
import { TRACE_ID_PATTERN } from '../core/schemas.js';
import type { TraceId } from '../core/types.js';

/** `YYYY-MM-DDTHH:mm:ssZ`, milliseconds dropped rather than rounded. */
export function formatUtcSeconds(date: Date): string {
  return date.toISOString().slice(0, 19) + 'Z';
}

export function newTraceId(now: Date = new Date()): TraceId {
  const createdAt = new Date(Math.floor(now.getTime() / 1000) * 1000);
  return Object.freeze({ uniqueId: randomUUID(), createdAt });
}

export function formatTraceId(id: TraceId): string {
  return `${id.uniqueId}:${formatUtcSeconds(id.createdAt)}`;
}

export function parseTraceId(text: string): TraceId {
  const match = TRACE_ID_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Malformed trace id: ${text}`);
  }
  const createdAt = new Date(match[2]);
  if (Number.isNaN(createdAt.getTime()) || formatUtcSeconds(createdAt) !== match[2]) {
    throw new Error(`Trace id carries an invalid timestamp: ${match[2]}`);
  }
  return Object.freeze({ uniqueId: match[1], createdAt });
}
