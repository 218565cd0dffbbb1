/**
 * Adapter registry: one lookup table built at startup, parameterized per
 * request only by the caller's identity
 */

import { createHash } from 'node:crypto';
import { LRUCache } from 'lru-cache';
import type { IdentityContext, SourceAdapter, SourceId } from './types.js';
import { SOURCE_IDS } from './types.js';

export interface AdapterRegistration {
  source: SourceId;
  /** Must not perform network I/O */
  create(identity: IdentityContext): SourceAdapter;
  /**
   * Reuse one instance per caller and credential. Only set this for
   * adapters that are stateless beyond their credential and safe to call
   * concurrently.
   */
  reuse?: boolean;
}

export interface AdapterRegistryConfig {
  /** Max reusable instances kept across requests */
  maxReusableInstances?: number;
}

export class AdapterRegistry {
  private registrations = new Map<SourceId, AdapterRegistration>();
  private instances: LRUCache<string, SourceAdapter>;

  constructor(registrations: AdapterRegistration[] = [], config: AdapterRegistryConfig = {}) {
    this.instances = new LRUCache<string, SourceAdapter>({
      max: config.maxReusableInstances ?? 500,
    });

    for (const registration of registrations) {
      this.register(registration);
    }
  }

  register(registration: AdapterRegistration): void {
    if (this.registrations.has(registration.source)) {
      throw new Error(`Adapter for source "${registration.source}" is already registered`);
    }
    this.registrations.set(registration.source, registration);
  }

  has(source: SourceId): boolean {
    return this.registrations.has(source);
  }

  /**
   * Registered sources in canonical order
   */
  get sources(): SourceId[] {
    return SOURCE_IDS.filter((source) => this.registrations.has(source));
  }

  /**
   * Build adapters for the identity. Unregistered sources are absent from
   * the map rather than an error.
   */
  resolve(identity: IdentityContext, sources: readonly SourceId[] = SOURCE_IDS): Map<SourceId, SourceAdapter> {
    const adapters = new Map<SourceId, SourceAdapter>();

    for (const source of sources) {
      const registration = this.registrations.get(source);
      if (!registration || adapters.has(source)) continue;

      adapters.set(source, this.instantiate(registration, identity));
    }

    return adapters;
  }

  /**
   * Drop every reusable instance, e.g. after credentials rotate
   */
  clearInstances(): void {
    this.instances.clear();
  }

  private instantiate(registration: AdapterRegistration, identity: IdentityContext): SourceAdapter {
    if (!registration.reuse) {
      return this.checked(registration, registration.create(identity));
    }

    const key = this.instanceKey(registration.source, identity);
    const existing = this.instances.get(key);
    if (existing) return existing;

    const adapter = this.checked(registration, registration.create(identity));
    this.instances.set(key, adapter);
    return adapter;
  }

  private checked(registration: AdapterRegistration, adapter: SourceAdapter): SourceAdapter {
    if (adapter.source !== registration.source) {
      throw new Error(
        `Adapter registered for "${registration.source}" reports source "${adapter.source}"`
      );
    }
    return adapter;
  }

  private instanceKey(source: SourceId, identity: IdentityContext): string {
    const credential = createHash('sha256')
      .update(identity.accessToken ?? '')
      .digest('hex');
    return `${source}:${identity.userId}:${credential}`;
  }
}
