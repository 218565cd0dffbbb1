import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(4000);
    expect(config.auth).toEqual({ enabled: false, jwtSecret: undefined });
    expect(config.mesh).toEqual({
      mode: 'static',
      cache: {
        enabled: true,
        search: { ttl: 300, maxSize: 100 },
        document: { ttl: 600, maxSize: 100 },
        updates: { ttl: 300, maxSize: 50 },
        summary: { ttl: 600, maxSize: 100 },
      },
      adapterTimeoutMs: 5000,
      contentByteLimit: 10000,
      notionApiVersion: '2022-06-28',
      openai: undefined,
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      AUTH_ENABLED: 'true',
      JWT_SECRET: 'test-secret',
      CACHE_ENABLED: 'false',
      SEARCH_CACHE_TTL: '60',
      ADAPTER_MODE: 'live',
      ADAPTER_TIMEOUT_MS: '2500',
      OPENAI_API_KEY: 'test-key',
    });

    expect(config.port).toBe(8080);
    expect(config.auth).toEqual({ enabled: true, jwtSecret: 'test-secret' });
    expect(config.mesh.mode).toBe('live');
    expect(config.mesh.cache?.enabled).toBe(false);
    expect(config.mesh.cache?.search).toEqual({ ttl: 60, maxSize: 100 });
    expect(config.mesh.adapterTimeoutMs).toBe(2500);
    expect(config.mesh.openai).toEqual({ apiKey: 'test-key', model: 'gpt-4o-mini' });
  });

  it('should treat blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', OPENAI_API_KEY: '' }).port).toBe(4000);
  });

  it('should reject non-integer numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid PORT: "abc" must be an integer >= 1');
    expect(() => loadConfig({ DOCUMENT_CACHE_SIZE: '1.5' })).toThrow('Invalid DOCUMENT_CACHE_SIZE');
    expect(() => loadConfig({ ADAPTER_TIMEOUT_MS: '0' })).toThrow('Invalid ADAPTER_TIMEOUT_MS');
  });

  it('should reject unknown booleans and modes', () => {
    expect(() => loadConfig({ CACHE_ENABLED: 'maybe' })).toThrow('Invalid CACHE_ENABLED: "maybe" must be true or false');
    expect(() => loadConfig({ ADAPTER_MODE: 'mock' })).toThrow('Invalid ADAPTER_MODE: "mock" must be static or live');
  });

  it('should require a secret when auth is enabled', () => {
    expect(() => loadConfig({ AUTH_ENABLED: 'true' })).toThrow('JWT_SECRET is required when AUTH_ENABLED=true');
  });
});
