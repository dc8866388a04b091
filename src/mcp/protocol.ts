// This module implements a streamable HTTP JSON-RPC endpoint for MCP tool discovery and execution.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RuntimeConfig } from '../config/runtime-config.js';
import { createMcpAuthGuard } from '../http/auth.js';
import type {
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  ToolCallResult
} from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_ENDPOINT_PATH } from '../utils/oauth.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { ToolRegistry, ToolRuntimeContext } from './tool-registry.js';

export const JSON_RPC_ERROR_CODES = {
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603
} as const;

const SUPPORTED_METHODS = ['initialize', 'notifications/initialized', 'ping', 'tools/list', 'tools/call'] as const;

export type SupportedMethod = (typeof SUPPORTED_METHODS)[number];

export interface McpDispatchDeps {
  registry: ToolRegistry;
}

export interface McpRouteDeps extends McpDispatchDeps {
  config: RuntimeConfig;
}

export type EnvelopeParseResult = { ok: true; request: JsonRpcRequest } | { ok: false; response: JsonRpcErrorResponse };

function isSupportedMethod(method: string): method is SupportedMethod {
  return (SUPPORTED_METHODS as readonly string[]).includes(method);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper creates a canonical JSON-RPC success payload.
function rpcResult(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// This helper creates a canonical JSON-RPC error payload and omits empty data.
function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

function invalidRequest(id: JsonRpcId, reason: string): EnvelopeParseResult {
  return {
    ok: false,
    response: rpcError(id, JSON_RPC_ERROR_CODES.invalidRequest, 'Invalid Request', { reason })
  };
}

// This function parses one raw HTTP body into a validated JSON-RPC request envelope.
export function parseRpcEnvelope(body: string | undefined): EnvelopeParseResult {
  if (body === undefined || body.trim().length === 0) {
    return invalidRequest(null, 'Missing JSON-RPC request payload.');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return invalidRequest(null, 'Request body is not valid JSON.');
  }

  if (!isPlainObject(payload)) {
    return invalidRequest(null, 'Expected a single JSON-RPC request object.');
  }

  const rawId = payload.id;
  let id: JsonRpcId | undefined;
  if (rawId !== undefined) {
    if (!isJsonRpcId(rawId)) {
      return invalidRequest(null, 'id must be a string, number, or null.');
    }
    id = rawId;
  }

  const echoId = id ?? null;
  if (payload.jsonrpc !== '2.0') {
    return invalidRequest(echoId, 'jsonrpc must be "2.0".');
  }

  const method = payload.method;
  if (typeof method !== 'string') {
    return invalidRequest(echoId, 'method must be a string.');
  }

  const rawParams = payload.params;
  let params: Record<string, unknown> | undefined;
  if (rawParams !== undefined) {
    if (!isPlainObject(rawParams)) {
      return invalidRequest(echoId, 'params must be an object when present.');
    }
    params = rawParams;
  }

  return {
    ok: true,
    request: { jsonrpc: '2.0', id, method, params }
  };
}

// This helper wraps one tool failure message into a tool-level error result.
function toolErrorResult(message: string): ToolCallResult {
  return {
    content: [{ type: 'text', text: message }],
    isError: true
  };
}

// This function handles tools/call and keeps dispatch failures apart from tool failures.
async function handleToolCall(
  requestId: JsonRpcId,
  params: Record<string, unknown>,
  deps: McpDispatchDeps,
  rpcTraceId: string,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse> {
  const name = params.name;
  if (typeof name !== 'string') {
    logger.warn(
      {
        event: 'mcp_tool_call_invalid_name',
        rpcTraceId,
        rpcRequestId: requestId,
        providedNameType: typeof name
      },
      'mcp_tool_call_invalid_name'
    );
    return rpcError(requestId, JSON_RPC_ERROR_CODES.invalidParams, 'tools/call requires params.name as string.', {
      reason: 'missing tool name'
    });
  }

  const tool = deps.registry.get(name);
  if (!tool) {
    logger.warn({ event: 'mcp_tool_not_found', rpcTraceId, toolName: name }, 'mcp_tool_not_found');
    return rpcError(requestId, JSON_RPC_ERROR_CODES.invalidParams, `Unknown tool: ${name}`, {
      reason: 'unknown tool',
      tool: name
    });
  }

  const args = params.arguments ?? {};
  logger.info(
    {
      event: 'mcp_tool_call_requested',
      rpcTraceId,
      rpcRequestId: requestId,
      toolName: name,
      arguments: sanitizeForLog(args)
    },
    'mcp_tool_call_requested'
  );

  const bound = tool.bind(args);
  if (!bound.ok) {
    logger.warn(
      {
        event: 'mcp_tool_call_invalid_arguments',
        rpcTraceId,
        toolName: name,
        violations: bound.violations
      },
      'mcp_tool_call_invalid_arguments'
    );
    return rpcError(requestId, JSON_RPC_ERROR_CODES.invalidParams, 'Invalid params', {
      reason: 'invalid arguments',
      tool: name,
      violations: bound.violations
    });
  }

  const context: ToolRuntimeContext = {
    logger: logger.child({ toolName: name })
  };
  const startedAt = Date.now();

  try {
    const result = await bound.invoke(context);

    logger.info(
      {
        event: 'mcp_tool_execution_completed',
        rpcTraceId,
        toolName: name,
        isError: result.isError,
        durationMs: Date.now() - startedAt
      },
      'mcp_tool_execution_completed'
    );

    return rpcResult(requestId, result);
  } catch (error) {
    const appError = normalizeError(error);

    logger.error(
      {
        event: 'mcp_tool_execution_failed',
        rpcTraceId,
        toolName: name,
        code: appError.code,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_execution_failed'
    );

    return rpcResult(requestId, toolErrorResult(appError.message));
  }
}

// This function routes one supported method over the closed method set.
async function routeRpcRequest(
  request: JsonRpcRequest,
  method: SupportedMethod,
  deps: McpDispatchDeps,
  rpcTraceId: string,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse> {
  const requestId = request.id ?? null;

  switch (method) {
    case 'initialize':
      // Client capabilities and protocol version are accepted as sent; no negotiation failure path exists.
      return rpcResult(requestId, {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {
          tools: {}
        },
        serverInfo: {
          name: MCP_SERVER_NAME,
          version: MCP_SERVER_VERSION
        }
      });

    case 'notifications/initialized':
    case 'ping':
      return rpcResult(requestId, {});

    case 'tools/list':
      return rpcResult(requestId, {
        tools: deps.registry.toMcpTools()
      });

    case 'tools/call':
      return handleToolCall(requestId, request.params ?? {}, deps, rpcTraceId, logger);
  }
}

// This function handles one JSON-RPC request and returns either a response object or null for notifications.
export async function handleRpcRequest(
  request: JsonRpcRequest,
  deps: McpDispatchDeps,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse | null> {
  const requestId = request.id ?? null;
  const isNotification = requestId === null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method,
      notification: isNotification
    },
    'mcp_rpc_request_received'
  );

  let response: JsonRpcResponse;
  try {
    response = isSupportedMethod(request.method)
      ? await routeRpcRequest(request, request.method, deps, rpcTraceId, logger)
      : rpcError(requestId, JSON_RPC_ERROR_CODES.methodNotFound, 'Method not found', { method: request.method });
  } catch (error) {
    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    response = rpcError(requestId, JSON_RPC_ERROR_CODES.internalError, 'Internal error');
  }

  logger.info(
    {
      event: 'mcp_rpc_request_completed',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method,
      outcome: 'error' in response ? 'error' : 'result',
      durationMs: Date.now() - startedAt
    },
    'mcp_rpc_request_completed'
  );

  return isNotification ? null : response;
}

// This function registers streamable HTTP MCP routes with auth and protocol handling.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  const authGuard = createMcpAuthGuard(deps.config);

  fastify.post(MCP_ENDPOINT_PATH, async (request: FastifyRequest, reply: FastifyReply) => {
    const decision = authGuard(request, reply);
    if (!decision.admitted) {
      return reply;
    }

    const requestLogger = request.log.child({ component: 'mcp' });
    const envelope = parseRpcEnvelope(typeof request.body === 'string' ? request.body : undefined);
    if (!envelope.ok) {
      requestLogger.warn(
        {
          event: 'mcp_post_invalid_request_object',
          data: envelope.response.error.data
        },
        'mcp_post_invalid_request_object'
      );
      return reply.send(envelope.response);
    }

    const response = await handleRpcRequest(envelope.request, deps, requestLogger);
    if (!response) {
      return reply.code(202).send();
    }

    return reply.send(response);
  });

  // This route keeps the server-to-client SSE stream disabled; only POST is served once admitted.
  fastify.get(MCP_ENDPOINT_PATH, async (request, reply) => {
    const decision = authGuard(request, reply);
    if (!decision.admitted) {
      return reply;
    }

    request.log.info({ event: 'mcp_sse_stream_rejected' }, 'mcp_sse_stream_rejected');

    return reply
      .code(405)
      .header('allow', 'POST')
      .send({
        ok: false,
        error: {
          code: 'method_not_allowed',
          message: 'This server does not offer an SSE stream. Use POST /mcp.'
        }
      });
  });
}
