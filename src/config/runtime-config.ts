// This module parses process environment variables into one immutable runtime configuration.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: string;
  authToken?: string;
  publicBaseUrl: string;
  allowedOrigins: string[];
  authorizationServers: string[];
  requiredScopes: string[];
  resourceDocumentation?: string;
}

// This helper treats blank environment values the same as unset ones.
function emptyToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }

  return value;
}

// This helper splits one delimited environment value into trimmed, non-empty entries.
export function splitList(value: string | undefined, separator: RegExp = /,/): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const envSchema = z.object({
  MCP_AUTH_TOKEN: optionalString,
  HOST: z.preprocess(emptyToUndefined, z.string().trim().default('0.0.0.0')),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  MCP_PUBLIC_BASE_URL: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  MCP_ALLOWED_ORIGINS: optionalString,
  MCP_AUTHORIZATION_SERVERS: z
    .string()
    .optional()
    .transform((value) => splitList(value))
    .pipe(z.array(z.string().url())),
  MCP_REQUIRED_SCOPE: optionalString,
  MCP_RESOURCE_DOCUMENTATION: z.preprocess(emptyToUndefined, z.string().trim().url().optional())
});

// This helper derives a reachable default base URL when no public URL is configured.
function defaultPublicBaseUrl(host: string, port: number): string {
  const reachableHost = host === '0.0.0.0' || host === '::' ? 'localhost' : host;
  const formattedHost = reachableHost.includes(':') ? `[${reachableHost}]` : reachableHost;
  return `http://${formattedHost}:${port}`;
}

// This function loads configuration once at startup and fails fast on malformed values.
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(
      500,
      'invalid_config',
      'Environment configuration is invalid.',
      parsed.error.issues.map((issue) => ({
        variable: issue.path.join('.'),
        message: issue.message
      }))
    );
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    authToken: values.MCP_AUTH_TOKEN,
    publicBaseUrl: stripTrailingSlash(values.MCP_PUBLIC_BASE_URL ?? defaultPublicBaseUrl(values.HOST, values.PORT)),
    allowedOrigins: splitList(values.MCP_ALLOWED_ORIGINS),
    authorizationServers: values.MCP_AUTHORIZATION_SERVERS,
    requiredScopes: splitList(values.MCP_REQUIRED_SCOPE, /[\s,]+/),
    resourceDocumentation: values.MCP_RESOURCE_DOCUMENTATION
  };
}
