import { NotFoundError } from '../errors.js';
import type { IndexStore } from './types.js';

export const DEFAULT_DISPOSE_GRACE_MS = 5000;

export interface ClientStats {
  createdAt: Date;
  lastUsed: Date;
  usageCount: number;
  disposed: boolean;
}

export interface IndexClientRegistryOptions {
  /** How long a disposed client stays registered before it is closed. */
  graceMs?: number;
  /** Called after a client is closed, e.g. to release native handles. */
  collectGarbage?: () => void;
}

interface Entry {
  client: IndexStore;
  stats: ClientStats;
  evictTimer: ReturnType<typeof setTimeout> | null;
}

/**
 * Owns index clients by id. Clients are created on first `acquire` and
 * closed on disposal; nothing is shared through module state.
 */
export class IndexClientRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly graceMs: number;
  private readonly collectGarbage: (() => void) | undefined;

  constructor(
    private readonly factory: (id: string) => IndexStore,
    options: IndexClientRegistryOptions = {},
  ) {
    this.graceMs = options.graceMs ?? DEFAULT_DISPOSE_GRACE_MS;
    this.collectGarbage = options.collectGarbage;
  }

  acquire(id: string): IndexStore {
    const existing = this.entries.get(id);
    if (existing) {
      if (existing.stats.disposed) {
        throw new NotFoundError(`Index client ${id} has been disposed`);
      }
      existing.stats.lastUsed = new Date();
      existing.stats.usageCount++;
      return existing.client;
    }

    const now = new Date();
    const entry: Entry = {
      client: this.factory(id),
      stats: { createdAt: now, lastUsed: now, usageCount: 1, disposed: false },
      evictTimer: null,
    };
    this.entries.set(id, entry);
    return entry.client;
  }

  has(id: string): boolean {
    const entry = this.entries.get(id);
    return entry !== undefined && !entry.stats.disposed;
  }

  getStats(id: string): ClientStats | null {
    const entry = this.entries.get(id);
    return entry ? { ...entry.stats } : null;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  /** Mark the client disposed now; close and evict it after the grace period. */
  dispose(id: string): void {
    const entry = this.entries.get(id);
    if (!entry || entry.stats.disposed) return;

    entry.stats.disposed = true;
    entry.evictTimer = setTimeout(() => {
      this.disposeNow(id).catch((error: unknown) => {
        console.error(`Index registry: failed to close client ${id}:`, error);
      });
    }, this.graceMs);
  }

  async disposeNow(id: string): Promise<void> {
    const entry = this.entries.get(id);
    if (!entry) return;

    if (entry.evictTimer) clearTimeout(entry.evictTimer);
    this.entries.delete(id);
    await entry.client.close();
    this.collectGarbage?.();
  }

  async disposeAll(): Promise<void> {
    for (const id of [...this.entries.keys()]) {
      await this.disposeNow(id);
    }
  }
}
