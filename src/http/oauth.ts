// This module exposes the unauthenticated OAuth protected-resource discovery endpoints.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RuntimeConfig } from '../config/runtime-config.js';
import {
  buildProtectedResourceMetadata,
  MCP_ENDPOINT_PATH,
  PROTECTED_RESOURCE_METADATA_PATH
} from '../utils/oauth.js';

// This function registers discovery routes; metadata is computed once because configuration is immutable.
export function registerOAuthRoutes(fastify: FastifyInstance, config: RuntimeConfig): void {
  const metadata = buildProtectedResourceMetadata(config);

  const sendProtectedResourceMetadata = async (request: FastifyRequest, reply: FastifyReply) => {
    request.log.debug(
      {
        event: 'oauth_protected_resource_metadata_served',
        path: request.url,
        authorizationServers: metadata.authorization_servers.length
      },
      'oauth_protected_resource_metadata_served'
    );

    return reply.header('cache-control', 'no-store').send(metadata);
  };

  fastify.get(PROTECTED_RESOURCE_METADATA_PATH, sendProtectedResourceMetadata);
  fastify.get(`${PROTECTED_RESOURCE_METADATA_PATH}${MCP_ENDPOINT_PATH}`, sendProtectedResourceMetadata);
}
