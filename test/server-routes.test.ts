// This test suite verifies HTTP-level admission on /mcp, the unauthenticated discovery and liveness routes, and shutdown.

import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { RuntimeConfig } from '../src/config/runtime-config.js';
import { createServer, shutdownServer } from '../src/server.js';
import { buildTestRegistry, makeConfig, silentLogger, TEST_CHALLENGE, TEST_TOKEN } from './support/fixtures.js';

const apps: FastifyInstance[] = [];

function buildApp(overrides: Partial<RuntimeConfig> = {}): FastifyInstance {
  const app = createServer({ config: makeConfig(overrides), registry: buildTestRegistry(), logger: false });
  apps.push(app);
  return app;
}

const listRequest = JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/list' });

function postMcp(app: FastifyInstance, headers: Record<string, string>, payload: string = listRequest) {
  return app.inject({
    method: 'POST',
    url: '/mcp',
    headers: { 'content-type': 'application/json', ...headers },
    payload
  });
}

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

describe('mcp endpoint admission', () => {
  it('challenges requests without credentials', async () => {
    const response = await postMcp(buildApp(), {});

    expect(response.statusCode).toBe(401);
    expect(response.headers['www-authenticate']).toBe(TEST_CHALLENGE);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'unauthorized', message: 'Expected Authorization: Bearer <token>.' }
    });
  });

  it('challenges a wrong token with 401', async () => {
    const response = await postMcp(buildApp(), { authorization: 'Bearer wrong-secret' });

    expect(response.statusCode).toBe(401);
    expect(response.headers['www-authenticate']).toBe(TEST_CHALLENGE);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'unauthorized', message: 'Invalid MCP access token.' }
    });
  });

  it('rejects a disallowed origin with 403 even when the token is correct', async () => {
    const app = buildApp({ allowedOrigins: ['https://app.example.test'] });
    const response = await postMcp(app, {
      authorization: `Bearer ${TEST_TOKEN}`,
      origin: 'https://evil.example.test'
    });

    expect(response.statusCode).toBe(403);
    expect(response.headers['www-authenticate']).toBeUndefined();
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'origin_not_allowed', message: 'Origin is not allowed: https://evil.example.test' }
    });

    const allowed = await postMcp(app, { authorization: `Bearer ${TEST_TOKEN}`, origin: 'https://app.example.test' });
    expect(allowed.statusCode).toBe(200);
  });

  it('answers 500 for every request while the token is unset', async () => {
    const app = buildApp({ authToken: undefined });
    const expected = {
      ok: false,
      error: { code: 'server_misconfigured', message: 'Server is not configured: MCP_AUTH_TOKEN is missing.' }
    };

    const valid = await postMcp(app, { authorization: 'Bearer anything' });
    expect(valid.statusCode).toBe(500);
    expect(valid.headers['www-authenticate']).toBeUndefined();
    expect(valid.json()).toEqual(expected);

    const garbage = await postMcp(app, {}, 'not json');
    expect(garbage.statusCode).toBe(500);
    expect(garbage.json()).toEqual(expected);

    const stream = await app.inject({ method: 'GET', url: '/mcp' });
    expect(stream.statusCode).toBe(500);
    expect(stream.json()).toEqual(expected);
  });

  it('admits GET requests before declining the stream', async () => {
    const app = buildApp({ allowedOrigins: ['https://app.example.test'] });

    const anonymous = await app.inject({ method: 'GET', url: '/mcp' });
    expect(anonymous.statusCode).toBe(401);
    expect(anonymous.headers['www-authenticate']).toBe(TEST_CHALLENGE);

    const foreign = await app.inject({
      method: 'GET',
      url: '/mcp',
      headers: { authorization: `Bearer ${TEST_TOKEN}`, origin: 'https://evil.example.test' }
    });
    expect(foreign.statusCode).toBe(403);
    expect(foreign.json()).toEqual({
      ok: false,
      error: { code: 'origin_not_allowed', message: 'Origin is not allowed: https://evil.example.test' }
    });
  });
});

describe('discovery routes', () => {
  it('serves protected-resource metadata at both well-known paths without auth', async () => {
    const app = buildApp({ authToken: undefined });
    const expected = {
      resource: 'https://mcp.example.test/mcp',
      authorization_servers: [],
      bearer_methods_supported: ['header']
    };

    for (const url of ['/.well-known/oauth-protected-resource', '/.well-known/oauth-protected-resource/mcp']) {
      const response = await app.inject({ method: 'GET', url });
      expect(response.statusCode).toBe(200);
      expect(response.headers['cache-control']).toBe('no-store');
      expect(response.json()).toEqual(expected);
    }
  });

  it('includes configured authorization servers and scopes', async () => {
    const app = buildApp({
      authorizationServers: ['https://auth.example.test'],
      requiredScopes: ['mcp:tools']
    });
    const response = await app.inject({ method: 'GET', url: '/.well-known/oauth-protected-resource/mcp' });

    expect(response.json()).toEqual({
      resource: 'https://mcp.example.test/mcp',
      authorization_servers: ['https://auth.example.test'],
      bearer_methods_supported: ['header'],
      scopes_supported: ['mcp:tools']
    });
  });
});

describe('service routes', () => {
  it('reports liveness and version', async () => {
    const app = buildApp();

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true, status: 'alive' });

    const version = await app.inject({ method: 'GET', url: '/version' });
    expect(version.json()).toEqual({
      ok: true,
      name: 'locale-time-mcp',
      version: '0.1.0',
      protocolVersion: '2025-06-18'
    });
  });

  it('answers unknown routes with a structured 404', async () => {
    const response = await buildApp().inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: GET /nope' }
    });
  });
});

describe('shutdown', () => {
  it('closes the app and resolves a clean exit code', async () => {
    const app = createServer({ config: makeConfig(), registry: buildTestRegistry(), logger: false });
    const closed = vi.fn();
    app.addHook('onClose', async () => {
      closed();
    });

    await expect(shutdownServer(app, 'SIGTERM')).resolves.toBe(0);
    expect(closed).toHaveBeenCalledTimes(1);
  });

  it('resolves a failure exit code when closing rejects', async () => {
    const close = vi.fn(async () => {
      throw new Error('close failed');
    });

    await expect(shutdownServer({ log: silentLogger, close }, 'SIGINT')).resolves.toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
