import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import type { KeyObject } from 'node:crypto';
import { setImmediate } from 'node:timers/promises';
import { KeyRole } from '../types/key-role.type';
import { KEY_EVICTED_EVENT, KeyCache, KeyEvictedEvent } from './key-cache';

export const KEY_REFRESH_FAILED_EVENT = 'idp.key.refresh_failed';

export interface KeyRefreshFailedEvent {
  role: KeyRole;
  failures: number;
  error: unknown;
}

export interface RoleKeyFetcher {
  fetchKey(role: KeyRole): Promise<KeyObject>;
}

/**
 * Background worker that re-fetches a key after the cache evicts it.
 *
 * Each eviction gets exactly one fetch attempt. A failed attempt leaves the
 * role absent until an explicit re-prime, so every failure is logged at
 * error and published as {@link KEY_REFRESH_FAILED_EVENT}. A fetch that
 * settles after the cache was flushed is discarded.
 */
@Injectable()
export class KeyRefresher implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KeyRefresher.name);
  private readonly inFlight = new Map<KeyRole, Promise<void>>();
  private readonly failures = new Map<KeyRole, number>();
  private readonly listener = (event: KeyEvictedEvent) =>
    this.enqueue(event.role);
  private subscribed = false;

  constructor(
    private readonly cache: KeyCache,
    private readonly fetcher: RoleKeyFetcher,
    private readonly events: EventEmitter2
  ) {}

  onModuleInit() {
    this.start();
  }

  onModuleDestroy() {
    this.stop();
  }

  start() {
    if (this.subscribed) return;
    this.events.on(KEY_EVICTED_EVENT, this.listener);
    this.subscribed = true;
  }

  stop() {
    this.events.off(KEY_EVICTED_EVENT, this.listener);
    this.subscribed = false;
  }

  consecutiveFailures(role: KeyRole): number {
    return this.failures.get(role) ?? 0;
  }

  /** Resolves once every scheduled refresh has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  enqueue(role: KeyRole) {
    if (this.inFlight.has(role)) return;

    const task = this.refresh(role).finally(() => this.inFlight.delete(role));
    this.inFlight.set(role, task);
  }

  private async refresh(role: KeyRole): Promise<void> {
    // leave the sweep that published the eviction before doing any I/O
    await setImmediate();

    const generation = this.cache.generation;
    try {
      const key = await this.fetcher.fetchKey(role);
      if (this.cache.generation !== generation) {
        this.logger.debug(`Dropped ${role} key fetched before the cache was flushed`);
        return;
      }
      this.cache.set(role, key);
      this.failures.delete(role);
      this.logger.debug(`✓ Refreshed ${role} key`);
    } catch (error) {
      const failures = this.consecutiveFailures(role) + 1;
      this.failures.set(role, failures);

      this.logger.error(
        `❌ Refreshing ${role} key failed (${failures} in a row), key unavailable until the next connect`,
        error instanceof Error ? error.stack : String(error)
      );
      const event: KeyRefreshFailedEvent = { role, failures, error };
      this.events.emit(KEY_REFRESH_FAILED_EVENT, event);
    }
  }
}
