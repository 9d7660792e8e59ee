// This module holds the pino options handed to Fastify and the helpers that shape RPC payloads for logs.

import { createHash } from 'node:crypto';
import pino, { type LevelWithSilent, type LoggerOptions } from 'pino';
import { SERVER_NAME } from '../version.js';

// Limits for values copied into log lines: nesting depth, string length, and entries per array or object.
const LOG_LIMITS = {
  depth: 4,
  stringLength: 1024,
  entries: 30
} as const;

// Caller credentials that reach Fastify's request serializer.
export const REDACTED_HEADER_PATHS = ['req.headers.authorization', 'req.headers.cookie', 'req.headers["x-api-key"]'];

const SENSITIVE_KEY = /token|authorization|cookie|api_?key/i;

// Same value, same marker, so repeated credentials can still be correlated across lines.
function redactedMarker(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return `[redacted:${createHash('sha256').update(text).digest('hex').slice(0, 12)}]`;
}

function clipString(value: string): string {
  const overflow = value.length - LOG_LIMITS.stringLength;
  return overflow > 0 ? `${value.slice(0, LOG_LIMITS.stringLength)}...[truncated:${overflow}]` : value;
}

// This helper copies params, results and error details into a bounded, credential-free shape.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return clipString(value);
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if (depth >= LOG_LIMITS.depth) {
    return '[depth-limited]';
  }

  // Raw request bodies are summarized instead of dumped.
  if (Buffer.isBuffer(value)) {
    return `[buffer:${value.length}]`;
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, LOG_LIMITS.entries).map((item) => sanitizeForLog(item, depth + 1));
    return value.length > LOG_LIMITS.entries ? [...items, `[+${value.length - LOG_LIMITS.entries} items]`] : items;
  }

  const entries = Object.entries(value);
  const shaped: Record<string, unknown> = {};
  for (const [key, entry] of entries.slice(0, LOG_LIMITS.entries)) {
    shaped[key] = SENSITIVE_KEY.test(key) ? redactedMarker(entry) : sanitizeForLog(entry, depth + 1);
  }
  if (entries.length > LOG_LIMITS.entries) {
    shaped['[+keys]'] = entries.length - LOG_LIMITS.entries;
  }
  return shaped;
}

// This helper reduces a thrown value to name, message, stack and the RPC or app error code when there is one.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const shaped: Record<string, unknown> = { name: error.name, message: error.message, stack: error.stack };
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    shaped.code = error.code;
  }
  return shaped;
}

export function buildLoggerOptions(level: LevelWithSilent = 'info'): LoggerOptions {
  return {
    level,
    base: { service: SERVER_NAME },
    redact: { paths: REDACTED_HEADER_PATHS, remove: true },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
