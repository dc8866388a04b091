// This module provides OAuth helpers for protected-resource discovery metadata and bearer challenges.

import type { RuntimeConfig } from '../config/runtime-config.js';

export const MCP_ENDPOINT_PATH = '/mcp';
export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource';

// Realm advertised in every bearer challenge issued by the MCP endpoint.
export const BEARER_REALM = 'mcp';

export interface ProtectedResourceMetadata {
  resource: string;
  authorization_servers: string[];
  bearer_methods_supported: ['header'];
  scopes_supported?: string[];
  resource_documentation?: string;
}

type DiscoveryConfig = Pick<
  RuntimeConfig,
  'publicBaseUrl' | 'authorizationServers' | 'requiredScopes' | 'resourceDocumentation'
>;

// This function returns one canonical MCP resource URL used for OAuth resource binding.
export function getMcpResourceUrl(config: Pick<RuntimeConfig, 'publicBaseUrl'>): string {
  return `${config.publicBaseUrl}${MCP_ENDPOINT_PATH}`;
}

// This function returns the RFC 9728 metadata URL scoped to the MCP resource path.
export function getResourceMetadataUrl(config: Pick<RuntimeConfig, 'publicBaseUrl'>): string {
  return `${config.publicBaseUrl}${PROTECTED_RESOURCE_METADATA_PATH}${MCP_ENDPOINT_PATH}`;
}

// This function builds OAuth protected-resource metadata as defined by RFC 9728.
export function buildProtectedResourceMetadata(config: DiscoveryConfig): ProtectedResourceMetadata {
  const metadata: ProtectedResourceMetadata = {
    resource: getMcpResourceUrl(config),
    authorization_servers: [...config.authorizationServers],
    bearer_methods_supported: ['header']
  };

  if (config.requiredScopes.length > 0) {
    metadata.scopes_supported = [...config.requiredScopes];
  }

  if (config.resourceDocumentation) {
    metadata.resource_documentation = config.resourceDocumentation;
  }

  return metadata;
}

// This function creates one RFC 6750 WWW-Authenticate header with a resource metadata hint.
export function buildBearerChallenge(resourceMetadataUrl: string): string {
  return `Bearer realm="${BEARER_REALM}", resource_metadata="${resourceMetadataUrl}"`;
}
