// This module provides shared configuration and tool fixtures for the HTTP and dispatcher test suites.

import pino from 'pino';
import { z } from 'zod';
import type { RuntimeConfig } from '../../src/config/runtime-config.js';
import { defineTool, type ToolHandler, ToolRegistryBuilder, type ToolRegistry } from '../../src/mcp/tool-registry.js';
import type { ToolCallResult } from '../../src/types/mcp.js';

export const TEST_TOKEN = 'test-secret';
export const TEST_BASE_URL = 'https://mcp.example.test';
export const TEST_RESOURCE_METADATA_URL = `${TEST_BASE_URL}/.well-known/oauth-protected-resource/mcp`;
export const TEST_CHALLENGE = `Bearer realm="mcp", resource_metadata="${TEST_RESOURCE_METADATA_URL}"`;

export const silentLogger = pino({ level: 'silent' });

export function makeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    host: '127.0.0.1',
    port: 8080,
    logLevel: 'silent',
    authToken: TEST_TOKEN,
    publicBaseUrl: TEST_BASE_URL,
    allowedOrigins: [],
    authorizationServers: [],
    requiredScopes: [],
    ...overrides
  };
}

export const echoSchema = z.object({ message: z.string() }).strict();
export const emptySchema = z.object({}).strict();

export function textResult(text: string): ToolCallResult {
  return {
    content: [{ type: 'text', text }],
    isError: false
  };
}

// This helper builds a registry with one echo tool and one tool that always throws.
export function buildTestRegistry(
  echoHandler: ToolHandler<z.output<typeof echoSchema>> = (args) => textResult(args.message)
): ToolRegistry {
  return new ToolRegistryBuilder()
    .register(
      defineTool({
        name: 'echo',
        description: 'Echo the message back.',
        inputSchema: echoSchema,
        handler: echoHandler
      })
    )
    .register(
      defineTool({
        name: 'explode',
        description: 'Always fails.',
        inputSchema: emptySchema,
        handler: () => {
          throw new Error('boom');
        }
      })
    )
    .build();
}
