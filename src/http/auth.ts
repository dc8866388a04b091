// This module contains the bearer token and origin admission gate for the MCP endpoint.

import { createHash, timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RuntimeConfig } from '../config/runtime-config.js';
import { buildBearerChallenge, getResourceMetadataUrl } from '../utils/oauth.js';

const BEARER_PREFIX = 'Bearer ';

export interface AuthRequestInput {
  origin?: string;
  authorization?: string;
  configuredToken?: string;
  allowedOrigins?: readonly string[];
  resourceMetadataUrl: string;
}

export type AuthRejectionStatus = 401 | 403 | 500;

export type AuthDecision =
  | { admitted: true }
  | {
      admitted: false;
      status: AuthRejectionStatus;
      code: string;
      message: string;
      challenge?: string;
    };

// This helper extracts bearer tokens from Authorization headers using the case-sensitive scheme prefix.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }

  return authHeader.slice(BEARER_PREFIX.length).trim();
}

// This helper compares secrets in constant time; digests keep the comparison length-independent.
export function constantTimeEquals(left: string, right: string): boolean {
  const leftDigest = createHash('sha256').update(left, 'utf8').digest();
  const rightDigest = createHash('sha256').update(right, 'utf8').digest();
  return timingSafeEqual(leftDigest, rightDigest);
}

// This function decides whether one request may reach the MCP dispatcher.
export function evaluateAuthRequest(input: AuthRequestInput): AuthDecision {
  const configuredToken = input.configuredToken?.trim();
  if (!configuredToken) {
    return {
      admitted: false,
      status: 500,
      code: 'server_misconfigured',
      message: 'Server is not configured: MCP_AUTH_TOKEN is missing.'
    };
  }

  const allowedOrigins = input.allowedOrigins ?? [];
  if (allowedOrigins.length > 0 && input.origin !== undefined && !allowedOrigins.includes(input.origin)) {
    return {
      admitted: false,
      status: 403,
      code: 'origin_not_allowed',
      message: `Origin is not allowed: ${input.origin}`
    };
  }

  const token = extractBearerToken(input.authorization);
  if (token === null) {
    return {
      admitted: false,
      status: 401,
      code: 'unauthorized',
      message: 'Expected Authorization: Bearer <token>.',
      challenge: buildBearerChallenge(input.resourceMetadataUrl)
    };
  }

  if (!constantTimeEquals(token, configuredToken)) {
    return {
      admitted: false,
      status: 401,
      code: 'unauthorized',
      message: 'Invalid MCP access token.',
      challenge: buildBearerChallenge(input.resourceMetadataUrl)
    };
  }

  return { admitted: true };
}

// This guard evaluates admission and writes the rejection response itself when access is denied.
export function createMcpAuthGuard(config: RuntimeConfig) {
  const resourceMetadataUrl = getResourceMetadataUrl(config);

  return function mcpAuthGuard(request: FastifyRequest, reply: FastifyReply): AuthDecision {
    const decision = evaluateAuthRequest({
      origin: request.headers.origin,
      authorization: request.headers.authorization,
      configuredToken: config.authToken,
      allowedOrigins: config.allowedOrigins,
      resourceMetadataUrl
    });

    if (decision.admitted) {
      request.log.debug(
        {
          event: 'mcp_auth_success',
          requestId: request.id
        },
        'mcp_auth_success'
      );
      return decision;
    }

    const logPayload = {
      event: 'mcp_auth_denied',
      requestId: request.id,
      status: decision.status,
      code: decision.code,
      origin: request.headers.origin ?? null
    };
    if (decision.status === 500) {
      request.log.error(logPayload, 'mcp_auth_denied');
    } else {
      request.log.warn(logPayload, 'mcp_auth_denied');
    }

    if (decision.challenge) {
      reply.header('WWW-Authenticate', decision.challenge);
    }

    reply.code(decision.status).send({
      ok: false,
      error: {
        code: decision.code,
        message: decision.message
      }
    });

    return decision;
  };
}
