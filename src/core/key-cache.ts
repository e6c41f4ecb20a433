import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { KeyObject } from 'node:crypto';
import { KeyRole } from '../types/key-role.type';

export const KEY_EVICTED_EVENT = 'idp.key.evicted';

export interface KeyEvictedEvent {
  role: KeyRole;
}

export interface KeyCacheOptions {
  /** Lifetime of an entry set without an explicit TTL. Zero or less never expires. */
  defaultTtl: number;
  /** Period of the expiry sweep. Zero or less disables the sweep. */
  cleanupInterval: number;
  now?: () => number;
}

export interface KeyCacheEntry {
  role: KeyRole;
  key: KeyObject;
  expiresAt?: number;
}

/**
 * Two-slot TTL cache for the consent key pair.
 *
 * Expired entries are removed by a periodic sweep, which publishes
 * {@link KEY_EVICTED_EVENT} for every removed role. The sweep never fetches
 * anything itself; the {@link KeyRefresher} listens for the event.
 */
@Injectable()
export class KeyCache implements OnModuleInit, OnModuleDestroy {
  private readonly entries = new Map<KeyRole, KeyCacheEntry>();
  private readonly now: () => number;
  private janitor: NodeJS.Timeout | null = null;
  private flushes = 0;

  constructor(
    private readonly options: KeyCacheOptions,
    private readonly events: EventEmitter2
  ) {
    this.now = options.now ?? Date.now;
  }

  onModuleInit() {
    this.start();
  }

  onModuleDestroy() {
    this.stop();
  }

  start() {
    if (this.janitor || this.options.cleanupInterval <= 0) return;

    this.janitor = setInterval(
      () => this.deleteExpired(),
      this.options.cleanupInterval
    );
    this.janitor.unref();
  }

  stop() {
    if (this.janitor) {
      clearInterval(this.janitor);
      this.janitor = null;
    }
  }

  set(role: KeyRole, key: KeyObject, ttl: number = this.options.defaultTtl) {
    this.entries.set(role, {
      role,
      key,
      expiresAt: ttl > 0 ? this.now() + ttl : undefined,
    });
  }

  get(role: KeyRole): KeyObject | undefined {
    const entry = this.entries.get(role);
    if (!entry || this.isExpired(entry, this.now())) {
      return undefined;
    }
    return entry.key;
  }

  has(role: KeyRole): boolean {
    return this.get(role) !== undefined;
  }

  /** Removes expired entries, then announces each removal. */
  deleteExpired(): KeyRole[] {
    const now = this.now();
    const evicted: KeyRole[] = [];

    for (const [role, entry] of this.entries.entries()) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(role);
        evicted.push(role);
      }
    }

    for (const role of evicted) {
      const event: KeyEvictedEvent = { role };
      this.events.emit(KEY_EVICTED_EVENT, event);
    }
    return evicted;
  }

  /** Drops every entry. Flushed roles are not announced as evicted. */
  flush() {
    this.entries.clear();
    this.flushes++;
  }

  /** Changes on every flush; a writer that began earlier must not store its result. */
  get generation(): number {
    return this.flushes;
  }

  private isExpired(entry: KeyCacheEntry, now: number): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= now;
  }
}
