/**
 * Single-consumer request queue in front of the index.
 *
 * Every index call is marshalled through one worker, so calls never overlap.
 * Requests carry a timeout; a request that times out before it starts is
 * dropped from the queue and never runs.
 */

import { QueueFullError, SyncError, TimeoutError } from '../errors.js';
import type { Metadata } from '../types.js';
import type {
  AddOptions,
  AddResult,
  CollectionInfo,
  GetOptions,
  GetResult,
  IndexStore,
  QueryResult,
  UpdateOptions,
  WhereDocumentFilter,
  WhereFilter,
} from './types.js';

export const DEFAULT_MAX_QUEUE_SIZE = 1000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_DEGRADED_THRESHOLD = 100;

export interface IndexWorkerOptions {
  maxQueueSize?: number;
  timeoutMs?: number;
  /** Queue depth at which health reports degraded. */
  degradedThreshold?: number;
}

export interface WorkerHealth {
  status: 'healthy' | 'degraded';
  queueDepth: number;
  threshold: number;
  processed: number;
  failed: number;
}

interface QueuedJob {
  label: string;
  start(): Promise<void>;
  fail(error: Error): void;
}

export class IndexWorker {
  private readonly queue: QueuedJob[] = [];
  private readonly maxQueueSize: number;
  private readonly timeoutMs: number;
  private readonly threshold: number;
  private running = false;
  private stopped = false;
  private processed = 0;
  private failed = 0;

  constructor(options: IndexWorkerOptions = {}) {
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.threshold = options.degradedThreshold ?? DEFAULT_DEGRADED_THRESHOLD;
  }

  /** Queue `run` behind every earlier request and resolve with its result. */
  enqueue<T>(label: string, run: () => Promise<T>, timeoutMs: number = this.timeoutMs): Promise<T> {
    if (this.stopped) {
      return Promise.reject(new SyncError('CONFIGURATION', `Index worker is stopped; rejected ${label}`));
    }
    if (this.queue.length >= this.maxQueueSize) {
      this.failed++;
      return Promise.reject(
        new QueueFullError(`Index worker queue is full (${this.maxQueueSize}); rejected ${label}`),
      );
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const settle = (action: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        action();
      };

      const job: QueuedJob = {
        label,
        start: async () => {
          if (settled) return;
          try {
            const value = await run();
            settle(() => {
              this.processed++;
              resolve(value);
            });
          } catch (error) {
            settle(() => {
              this.failed++;
              reject(error);
            });
          }
        },
        fail: (error) =>
          settle(() => {
            this.failed++;
            reject(error);
          }),
      };

      const timer = setTimeout(() => {
        const index = this.queue.indexOf(job);
        if (index >= 0) this.queue.splice(index, 1);
        job.fail(new TimeoutError(`Index request ${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.queue.push(job);
      this.pump();
    });
  }

  getHealth(): WorkerHealth {
    const queueDepth = this.queue.length;
    return {
      status: queueDepth >= this.threshold ? 'degraded' : 'healthy',
      queueDepth,
      threshold: this.threshold,
      processed: this.processed,
      failed: this.failed,
    };
  }

  /** Reject everything still queued and refuse new requests. */
  stop(): void {
    this.stopped = true;
    for (const job of this.queue.splice(0)) {
      job.fail(new SyncError('CONFIGURATION', `Index worker stopped before ${job.label} ran`));
    }
  }

  private pump(): void {
    if (this.running) return;
    this.running = true;
    void this.drain();
  }

  private async drain(): Promise<void> {
    try {
      let job = this.queue.shift();
      while (job) {
        await job.start();
        job = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}

/** IndexStore whose calls all run one at a time on an IndexWorker. */
export class QueuedIndexStore implements IndexStore {
  constructor(
    private readonly inner: IndexStore,
    readonly worker: IndexWorker = new IndexWorker(),
  ) {}

  listCollections(limit?: number, offset?: number): Promise<string[]> {
    return this.worker.enqueue('listCollections', () => this.inner.listCollections(limit, offset));
  }

  createCollection(name: string, metadata?: Metadata): Promise<CollectionInfo> {
    return this.worker.enqueue('createCollection', () => this.inner.createCollection(name, metadata));
  }

  getCollection(name: string): Promise<CollectionInfo | null> {
    return this.worker.enqueue('getCollection', () => this.inner.getCollection(name));
  }

  deleteCollection(name: string): Promise<boolean> {
    return this.worker.enqueue('deleteCollection', () => this.inner.deleteCollection(name));
  }

  addDocuments(
    collection: string,
    documents: string[],
    ids: string[],
    metadatas?: Metadata[],
    options?: AddOptions,
  ): Promise<AddResult> {
    return this.worker.enqueue('addDocuments', () =>
      this.inner.addDocuments(collection, documents, ids, metadatas, options),
    );
  }

  queryDocuments(
    collection: string,
    queryTexts: string[],
    nResults?: number,
    where?: WhereFilter,
    whereDocument?: WhereDocumentFilter,
  ): Promise<QueryResult> {
    return this.worker.enqueue('queryDocuments', () =>
      this.inner.queryDocuments(collection, queryTexts, nResults, where, whereDocument),
    );
  }

  getDocuments(collection: string, options?: GetOptions): Promise<GetResult> {
    return this.worker.enqueue('getDocuments', () => this.inner.getDocuments(collection, options));
  }

  updateDocuments(
    collection: string,
    ids: string[],
    documents?: string[],
    metadatas?: Metadata[],
    options?: UpdateOptions,
  ): Promise<number> {
    return this.worker.enqueue('updateDocuments', () =>
      this.inner.updateDocuments(collection, ids, documents, metadatas, options),
    );
  }

  deleteDocuments(collection: string, ids: string[], expandChunks?: boolean): Promise<number> {
    return this.worker.enqueue('deleteDocuments', () => this.inner.deleteDocuments(collection, ids, expandChunks));
  }

  getCollectionCount(): Promise<number> {
    return this.worker.enqueue('getCollectionCount', () => this.inner.getCollectionCount());
  }

  getDocumentCount(collection: string): Promise<number> {
    return this.worker.enqueue('getDocumentCount', () => this.inner.getDocumentCount(collection));
  }

  async close(): Promise<void> {
    await this.worker.enqueue('close', () => this.inner.close());
    this.worker.stop();
  }
}
