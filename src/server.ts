// This module wires all HTTP routes, middleware behavior, and request lifecycle logging.

import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyRequest } from 'fastify';
import type { LoggerOptions } from 'pino';
import type { RuntimeConfig } from './config/runtime-config.js';
import { registerOAuthRoutes } from './http/oauth.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { ToolRegistry } from './mcp/tool-registry.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface CreateServerOptions {
  config: RuntimeConfig;
  registry: ToolRegistry;
  // Overrides the pino options derived from config; tests pass false.
  logger?: boolean | LoggerOptions;
}

// The slice of a Fastify app that shutdown needs.
export interface ClosableServer {
  log: FastifyBaseLogger;
  close(): Promise<unknown>;
}

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(request: FastifyRequest): unknown {
  const headers = request.headers;
  return sanitizeForLog({
    host: headers.host ?? null,
    origin: headers.origin ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null,
    'mcp-protocol-version': headers['mcp-protocol-version'] ?? null
  });
}

// This function builds and configures the full HTTP application.
export function createServer(options: CreateServerOptions): FastifyInstance {
  const { config, registry } = options;

  const app = Fastify({
    logger: options.logger ?? buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    connectionTimeout: 60_000,
    requestTimeout: 30_000,
    trustProxy: true
  });

  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // The JSON-RPC dispatcher owns body parsing so malformed JSON becomes a protocol error instead of a 400.
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn(
      {
        event: 'http_request_timeout',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_request_timeout'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION
    };
  });

  registerOAuthRoutes(app, config);
  registerMcpRoutes(app, { config, registry });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    return reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    return reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return app;
}

// This function closes the app for one shutdown signal and resolves the process exit code.
export async function shutdownServer(app: ClosableServer, signal: string): Promise<number> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

  try {
    await app.close();
  } catch (error) {
    app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
    return 1;
  }

  app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
  return 0;
}
