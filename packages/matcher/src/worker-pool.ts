/**
 * Fixed-size pool of match worker threads.
 *
 * Workers are spawned on first use and kept for the lifetime of the pool. Each
 * task goes to one worker (round-robin) and resolves with that worker's
 * response. Idle workers are unref'd so an open pool never keeps the process
 * alive; call {@link MatchWorkerPool.close} to terminate them.
 *
 * When a worker fails, its pending chunks, and every chunk after it, are
 * computed in process instead.
 *
 * @module matcher/worker-pool
 */
import { Worker } from 'worker_threads';
import os from 'os';
import { logger } from '@subseq/shared/logger';
import { runMatchChunk, type MatchChunkRequest, type MatchChunkResponse } from './match-chunk.js';

/** A chunk request before the pool assigns its id. */
export type MatchChunkTask = Omit<MatchChunkRequest, 'id'>;

interface PendingChunk {
  resolve: (response: MatchChunkResponse) => void;
  reject: (err: Error) => void;
}

interface PooledWorker {
  worker: Worker;
  pending: Map<number, PendingChunk>;
}

/** One worker per available core, leaving one for the calling thread. */
export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism() - 1);
}

/**
 * Start the sibling worker entry. From TypeScript sources the entry is
 * imported by an eval'd bootstrap, with tsx registered in the worker.
 */
function startWorker(): Worker {
  if (import.meta.url.endsWith('.ts')) {
    const entry = new URL('./match-worker.ts', import.meta.url);
    return new Worker(`import(${JSON.stringify(entry.href)});`, {
      eval: true,
      execArgv: ['--import', 'tsx'],
    });
  }
  return new Worker(new URL('./match-worker.js', import.meta.url));
}

export class MatchWorkerPool {
  readonly size: number;
  private workers: PooledWorker[] = [];
  private nextId = 0;
  private failed = false;

  constructor(size: number = defaultPoolSize()) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /**
   * Run every task and resolve with one response per task, in task order.
   */
  async map(tasks: readonly MatchChunkTask[]): Promise<MatchChunkResponse[]> {
    if (tasks.length === 0) return [];
    if (!this.failed) this.spawnWorkers();

    return Promise.all(
      tasks.map((task, slot) => {
        const id = this.nextId++;
        const pooled = this.workers[slot % this.workers.length];
        if (this.failed || !pooled) return Promise.resolve(runMatchChunk({ ...task, id }));

        return this.dispatch(pooled, { ...task, id }).catch((err: unknown) => {
          logger.warn(`[matcher] worker chunk ${id} failed, computing in process:`, err);
          return runMatchChunk({ ...task, id });
        });
      }),
    );
  }

  /** Terminate every worker. The pool respawns on the next {@link map}. */
  async close(): Promise<void> {
    const workers = this.workers;
    this.workers = [];
    await Promise.all(workers.map(({ worker }) => worker.terminate()));
  }

  private spawnWorkers(): void {
    while (this.workers.length < this.size) {
      this.workers.push(this.spawn());
    }
  }

  private spawn(): PooledWorker {
    const worker = startWorker();
    const pooled: PooledWorker = { worker, pending: new Map() };

    worker.on('message', (response: MatchChunkResponse) => {
      const entry = pooled.pending.get(response.id);
      if (!entry) return;
      pooled.pending.delete(response.id);
      if (pooled.pending.size === 0) worker.unref();

      if (response.error !== undefined) entry.reject(new Error(response.error));
      else entry.resolve(response);
    });

    worker.on('error', (err) => {
      logger.warn(`[matcher] match worker ${worker.threadId} crashed:`, err);
      this.failed = true;
      this.drop(pooled, err);
    });

    worker.on('exit', (code) => {
      this.drop(pooled, new Error(`match worker exited with code ${code}`));
    });

    worker.unref();
    return pooled;
  }

  private dispatch(pooled: PooledWorker, request: MatchChunkRequest): Promise<MatchChunkResponse> {
    return new Promise((resolve, reject) => {
      pooled.pending.set(request.id, { resolve, reject });
      pooled.worker.ref();
      pooled.worker.postMessage(request);
    });
  }

  /** Remove a dead worker and reject whatever it still owed. */
  private drop(pooled: PooledWorker, err: Error): void {
    this.workers = this.workers.filter((candidate) => candidate !== pooled);
    for (const entry of pooled.pending.values()) entry.reject(err);
    pooled.pending.clear();
  }
}
