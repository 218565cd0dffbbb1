/**
 * Gateway configuration, read from the environment once at startup
 */

import type { AdapterMode, DocMeshConfig } from '@docmesh/core';

export interface GatewayConfig {
  port: number;
  auth: {
    enabled: boolean;
    jwtSecret?: string;
  };
  mesh: Omit<DocMeshConfig, 'logger' | 'clock' | 'summarizer' | 'adapters'>;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min = 1): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: "${raw}" must be an integer >= ${min}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Invalid ${name}: "${raw}" must be true or false`);
  }
}

function readMode(env: Env): AdapterMode {
  const raw = readString(env, 'ADAPTER_MODE') ?? 'static';
  if (raw !== 'static' && raw !== 'live') {
    throw new Error(`Invalid ADAPTER_MODE: "${raw}" must be static or live`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): GatewayConfig {
  const authEnabled = readBool(env, 'AUTH_ENABLED', false);
  const jwtSecret = readString(env, 'JWT_SECRET');
  if (authEnabled && !jwtSecret) {
    throw new Error('JWT_SECRET is required when AUTH_ENABLED=true');
  }

  const openaiKey = readString(env, 'OPENAI_API_KEY');

  return {
    port: readInt(env, 'PORT', 4000),
    auth: { enabled: authEnabled, jwtSecret },
    mesh: {
      mode: readMode(env),
      cache: {
        enabled: readBool(env, 'CACHE_ENABLED', true),
        search: { ttl: readInt(env, 'SEARCH_CACHE_TTL', 300), maxSize: readInt(env, 'SEARCH_CACHE_SIZE', 100) },
        document: { ttl: readInt(env, 'DOCUMENT_CACHE_TTL', 600), maxSize: readInt(env, 'DOCUMENT_CACHE_SIZE', 100) },
        updates: { ttl: readInt(env, 'UPDATES_CACHE_TTL', 300), maxSize: readInt(env, 'UPDATES_CACHE_SIZE', 50) },
        summary: { ttl: readInt(env, 'SUMMARY_CACHE_TTL', 600), maxSize: readInt(env, 'SUMMARY_CACHE_SIZE', 100) },
      },
      adapterTimeoutMs: readInt(env, 'ADAPTER_TIMEOUT_MS', 5000),
      contentByteLimit: readInt(env, 'CONTENT_BYTE_LIMIT', 10000),
      notionApiVersion: readString(env, 'NOTION_API_VERSION') ?? '2022-06-28',
      openai: openaiKey ? { apiKey: openaiKey, model: readString(env, 'OPENAI_MODEL') ?? 'gpt-4o-mini' } : undefined,
    },
  };
}
