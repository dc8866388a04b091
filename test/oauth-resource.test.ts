// This test suite verifies protected-resource discovery metadata and bearer challenge formatting.

import { describe, expect, it } from 'vitest';
import {
  buildBearerChallenge,
  buildProtectedResourceMetadata,
  getMcpResourceUrl,
  getResourceMetadataUrl
} from '../src/utils/oauth.js';
import { makeConfig, TEST_BASE_URL } from './support/fixtures.js';

describe('oauth discovery metadata', () => {
  it('derives the canonical resource and metadata urls from the public base url', () => {
    const config = makeConfig();
    expect(getMcpResourceUrl(config)).toBe('https://mcp.example.test/mcp');
    expect(getResourceMetadataUrl(config)).toBe('https://mcp.example.test/.well-known/oauth-protected-resource/mcp');
  });

  it('degrades to an empty authorization server list and omits unset optional fields', () => {
    expect(buildProtectedResourceMetadata(makeConfig())).toEqual({
      resource: `${TEST_BASE_URL}/mcp`,
      authorization_servers: [],
      bearer_methods_supported: ['header']
    });
  });

  it('publishes configured servers, scopes, and documentation in order', () => {
    const metadata = buildProtectedResourceMetadata(
      makeConfig({
        authorizationServers: ['https://auth-b.example.test', 'https://auth-a.example.test'],
        requiredScopes: ['mcp:tools'],
        resourceDocumentation: 'https://docs.example.test/mcp'
      })
    );

    expect(metadata).toEqual({
      resource: `${TEST_BASE_URL}/mcp`,
      authorization_servers: ['https://auth-b.example.test', 'https://auth-a.example.test'],
      bearer_methods_supported: ['header'],
      scopes_supported: ['mcp:tools'],
      resource_documentation: 'https://docs.example.test/mcp'
    });
  });

  it('does not share list instances with the configuration', () => {
    const config = makeConfig({ authorizationServers: ['https://auth.example.test'] });
    const metadata = buildProtectedResourceMetadata(config);
    metadata.authorization_servers.push('https://other.example.test');
    expect(config.authorizationServers).toEqual(['https://auth.example.test']);
  });

  it('formats the bearer challenge with realm and resource metadata hint', () => {
    expect(buildBearerChallenge('https://mcp.example.test/.well-known/oauth-protected-resource/mcp')).toBe(
      'Bearer realm="mcp", resource_metadata="https://mcp.example.test/.well-known/oauth-protected-resource/mcp"'
    );
  });
});
