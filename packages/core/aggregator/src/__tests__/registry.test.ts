/**
 * Unit tests for AdapterRegistry
 */

import { describe, it, expect, vi } from 'vitest';
import { AdapterRegistry } from '../registry.js';
import { MockAdapter, makeIdentity } from './helpers.js';

describe('AdapterRegistry', () => {
  it('should build one adapter per registered source', () => {
    const registry = new AdapterRegistry([
      { source: 'gdrive', create: () => new MockAdapter('gdrive') },
      { source: 'notion', create: () => new MockAdapter('notion') },
    ]);

    const adapters = registry.resolve(makeIdentity([]));

    expect([...adapters.keys()]).toEqual(['gdrive', 'notion']);
  });

  it('should leave unregistered sources out of the map', () => {
    const registry = new AdapterRegistry([{ source: 'gdrive', create: () => new MockAdapter('gdrive') }]);

    const adapters = registry.resolve(makeIdentity([]), ['gdrive', 'slack']);

    expect(adapters.has('slack')).toBe(false);
    expect(adapters.size).toBe(1);
  });

  it('should only construct the requested sources', () => {
    const createNotion = vi.fn(() => new MockAdapter('notion'));
    const registry = new AdapterRegistry([
      { source: 'gdrive', create: () => new MockAdapter('gdrive') },
      { source: 'notion', create: createNotion },
    ]);

    registry.resolve(makeIdentity([]), ['gdrive']);

    expect(createNotion).not.toHaveBeenCalled();
  });

  it('should pass the identity to the factory', () => {
    const create = vi.fn(() => new MockAdapter('gdrive'));
    const registry = new AdapterRegistry([{ source: 'gdrive', create }]);
    const identity = makeIdentity(['gdrive:read']);

    registry.resolve(identity);

    expect(create).toHaveBeenCalledWith(identity);
  });

  it('should build a fresh instance per request by default', () => {
    const registry = new AdapterRegistry([{ source: 'gdrive', create: () => new MockAdapter('gdrive') }]);
    const identity = makeIdentity([]);

    const first = registry.resolve(identity).get('gdrive');
    const second = registry.resolve(identity).get('gdrive');

    expect(first).not.toBe(second);
  });

  it('should reuse instances per caller when the registration allows it', () => {
    const registry = new AdapterRegistry([
      { source: 'gdrive', create: () => new MockAdapter('gdrive'), reuse: true },
    ]);

    const first = registry.resolve(makeIdentity([], 'user-1')).get('gdrive');
    const again = registry.resolve(makeIdentity([], 'user-1')).get('gdrive');
    const other = registry.resolve(makeIdentity([], 'user-2')).get('gdrive');

    expect(first).toBe(again);
    expect(first).not.toBe(other);
  });

  it('should build a new instance after clearInstances', () => {
    const registry = new AdapterRegistry([
      { source: 'gdrive', create: () => new MockAdapter('gdrive'), reuse: true },
    ]);
    const identity = makeIdentity([]);

    const first = registry.resolve(identity).get('gdrive');
    registry.clearInstances();

    expect(registry.resolve(identity).get('gdrive')).not.toBe(first);
  });

  it('should reject duplicate registrations', () => {
    const registry = new AdapterRegistry([{ source: 'gdrive', create: () => new MockAdapter('gdrive') }]);

    expect(() => registry.register({ source: 'gdrive', create: () => new MockAdapter('gdrive') })).toThrow(
      'already registered'
    );
  });

  it('should reject an adapter that reports a different source', () => {
    const registry = new AdapterRegistry([{ source: 'gdrive', create: () => new MockAdapter('notion') }]);

    expect(() => registry.resolve(makeIdentity([]))).toThrow('reports source "notion"');
  });

  it('should list registered sources in canonical order', () => {
    const registry = new AdapterRegistry([
      { source: 'confluence', create: () => new MockAdapter('confluence') },
      { source: 'gdrive', create: () => new MockAdapter('gdrive') },
    ]);

    expect(registry.sources).toEqual(['gdrive', 'confluence']);
  });
});
