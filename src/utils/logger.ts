// This module holds the pino options for the server and shapes tool arguments, headers and errors for log lines.

import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';
import { AppError } from './errors.js';

const LOG_LIMITS = {
  depth: 4,
  stringLength: 512,
  arrayItems: 20,
  objectKeys: 20
} as const;

export const REDACTED = '[redacted]';

// The bearer header, the configured MCP token and cookies are the only credentials this server sees.
const CREDENTIAL_KEY = /^(authorization|cookie|(mcp_)?auth_?token|access_?token|token)$/i;

const REDACT_PATHS = ['req.headers.authorization', 'req.headers.cookie', 'headers.authorization', 'headers.cookie'];

function clip(value: string): string {
  if (value.length <= LOG_LIMITS.stringLength) {
    return value;
  }

  return `${value.slice(0, LOG_LIMITS.stringLength)}...[truncated:${value.length - LOG_LIMITS.stringLength}]`;
}

// This helper bounds JSON-shaped values (tool arguments, header snapshots, error details) and masks credential keys.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (typeof value === 'string') {
    return clip(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (depth >= LOG_LIMITS.depth) {
    return '[depth-limited]';
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > LOG_LIMITS.arrayItems) {
      items.push(`[+${value.length - LOG_LIMITS.arrayItems} items]`);
    }
    return items;
  }

  const entries = Object.entries(value);
  const shaped: Record<string, unknown> = Object.fromEntries(
    entries
      .slice(0, LOG_LIMITS.objectKeys)
      .map(([key, entry]): [string, unknown] => [
        key,
        CREDENTIAL_KEY.test(key) ? REDACTED : sanitizeForLog(entry, depth + 1)
      ])
  );
  if (entries.length > LOG_LIMITS.objectKeys) {
    shaped['[omittedKeys]'] = entries.length - LOG_LIMITS.objectKeys;
  }

  return shaped;
}

// Expected failures carry their code and status; anything else keeps its stack.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return {
      name: error.name,
      code: error.code,
      statusCode: error.statusCode,
      message: error.message
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
