/**
 * Rule Thread Pool - Fixed-size pool of rule workers
 *
 * Batches are handed to whichever worker is idle and results are delivered
 * in completion order. A worker that dies mid-batch has every record of
 * that batch annotated as a worker failure and is replaced.
 */

import { Worker } from 'worker_threads';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import type { RuleRecord, TranslationStrategy } from './types';
import type { SyntaxDatabaseSnapshot } from './syntax-database';
import type { LoggerOptions } from './run-logger';
import { WorkerPoolError, errorMessage } from './errors';
import { annotateFailure } from './unit-processor';
import { workerResponseSchema } from './worker-protocol';
import type { WorkerInit, WorkerRequest, WorkerResponse } from './worker-protocol';

export interface WorkUnit {
  index: number;
  record: RuleRecord;
}

export type UnitCallback = (index: number, record: RuleRecord) => void;

/** What a worker thread runs: a script path, or code evaluated in place */
export interface WorkerEntry {
  filename: string;
  eval: boolean;
}

export type WorkerFactory = (entry: WorkerEntry, workerData: WorkerInit) => Worker;

export const createWorker: WorkerFactory = (entry, workerData) =>
  new Worker(entry.filename, { eval: entry.eval, workerData });

export interface ThreadPoolConfig {
  size: number;
  snapshot: SyntaxDatabaseSnapshot;
  strategy: TranslationStrategy;
  logger: LoggerOptions;
  createWorker?: WorkerFactory;
}

interface Batch {
  id: number;
  units: WorkUnit[];
}

interface ManagedWorker {
  id: number;
  worker: Worker;
  status: 'starting' | 'ready' | 'busy' | 'dead';
  batch: Batch | null;
}

interface ActiveRun {
  remaining: number;
  onUnit: UnitCallback;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Locate the worker entry point: the compiled script next to this module,
 * or a bootstrap that registers tsx's require hook and loads the source.
 */
export function resolveWorkerEntry(directory: string = __dirname): WorkerEntry {
  const compiled = path.join(directory, 'rule-worker.js');
  if (fs.existsSync(compiled)) {
    return { filename: compiled, eval: false };
  }
  const source = JSON.stringify(path.join(directory, 'rule-worker.ts'));
  return { filename: `require('tsx/cjs');require(${source});`, eval: true };
}

export class RuleThreadPool extends EventEmitter {
  private config: ThreadPoolConfig;
  private workers: Map<number, ManagedWorker> = new Map();
  private queue: Batch[] = [];
  private run: ActiveRun | null = null;
  private fatal: Error | null = null;
  private nextWorkerId = 0;
  private nextBatchId = 0;
  private isShuttingDown = false;

  constructor(config: ThreadPoolConfig) {
    super();
    if (!Number.isInteger(config.size) || config.size < 1) {
      throw new WorkerPoolError(`Pool size must be a positive integer, got ${config.size}`);
    }
    this.config = config;
  }

  /**
   * Start every worker and wait until each has loaded its database.
   * Rejects with WorkerPoolError if any worker fails to start.
   */
  async start(): Promise<void> {
    const starting: Promise<ManagedWorker>[] = [];
    for (let i = 0; i < this.config.size; i++) {
      starting.push(this.spawnWorker());
    }
    try {
      await Promise.all(starting);
    } catch (error) {
      await this.shutdown();
      throw error;
    }
    this.emit('started', { workerCount: this.workers.size });
  }

  /**
   * Process units in batches; `onUnit` is called exactly once per unit
   */
  process(units: WorkUnit[], batchSize: number, onUnit: UnitCallback): Promise<void> {
    if (this.fatal) {
      return Promise.reject(this.fatal);
    }
    if (this.run) {
      return Promise.reject(new WorkerPoolError('Pool is already processing'));
    }
    if (units.length === 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.run = { remaining: units.length, onUnit, resolve, reject };
      for (let i = 0; i < units.length; i += batchSize) {
        this.queue.push({ id: this.nextBatchId++, units: units.slice(i, i + batchSize) });
      }
      this.dispatch();
    });
  }

  async shutdown(): Promise<void> {
    this.isShuttingDown = true;
    this.queue = [];
    const exits = Array.from(this.workers.values()).map(managed => managed.worker.terminate());
    this.workers.clear();
    await Promise.all(exits);
  }

  private spawnWorker(): Promise<ManagedWorker> {
    return new Promise<ManagedWorker>((resolve, reject) => {
      const id = this.nextWorkerId++;
      const factory = this.config.createWorker ?? createWorker;
      const workerData: WorkerInit = {
        workerId: id,
        strategy: this.config.strategy,
        snapshot: this.config.snapshot,
        logger: { ...this.config.logger, quiet: true }
      };

      let worker: Worker;
      try {
        worker = factory(resolveWorkerEntry(), workerData);
      } catch (error) {
        reject(new WorkerPoolError(`Worker ${id} could not be created: ${errorMessage(error)}`));
        return;
      }

      const managed: ManagedWorker = { id, worker, status: 'starting', batch: null };
      this.workers.set(id, managed);

      const failStart = (message: string): void => {
        managed.status = 'dead';
        this.workers.delete(id);
        reject(new WorkerPoolError(`Worker ${id} failed to start: ${message}`));
      };

      worker.on('message', (message: unknown) => {
        const parsed = workerResponseSchema.safeParse(message);
        if (!parsed.success) {
          const problem = `malformed message from worker: ${parsed.error.message}`;
          if (managed.status === 'starting') {
            failStart(problem);
            void worker.terminate();
          } else {
            this.handleCrash(managed, new Error(problem));
          }
          return;
        }
        const response = parsed.data;
        switch (response.type) {
          case 'ready':
            managed.status = 'ready';
            resolve(managed);
            this.dispatch();
            break;

          case 'init-error':
            failStart(response.message);
            void worker.terminate();
            break;

          case 'results':
            this.complete(managed, response);
            break;
        }
      });

      worker.on('error', (error: Error) => {
        if (managed.status === 'starting') {
          failStart(error.message);
          return;
        }
        this.handleCrash(managed, error);
      });

      worker.on('exit', (code: number) => {
        if (managed.status === 'starting') {
          failStart(`exited with code ${code}`);
          return;
        }
        if (!this.isShuttingDown) {
          this.handleCrash(managed, new Error(`exited with code ${code}`));
        }
      });
    });
  }

  private dispatch(): void {
    for (const managed of this.workers.values()) {
      if (this.queue.length === 0) {
        return;
      }
      if (managed.status !== 'ready') {
        continue;
      }
      const batch = this.queue.shift();
      if (!batch) {
        return;
      }
      managed.status = 'busy';
      managed.batch = batch;
      const request: WorkerRequest = { type: 'batch', batchId: batch.id, units: batch.units };
      managed.worker.postMessage(request);
    }
  }

  private complete(managed: ManagedWorker, response: Extract<WorkerResponse, { type: 'results' }>): void {
    const batch = managed.batch;
    if (!batch || batch.id !== response.batchId) {
      return;
    }
    managed.batch = null;
    managed.status = 'ready';

    const pending = new Map(batch.units.map(unit => [unit.index, unit.record]));
    for (const result of response.results) {
      const original = pending.get(result.index);
      if (!original) {
        continue;
      }
      pending.delete(result.index);
      this.deliver(result.index, 'record' in result ? result.record : annotateFailure(original, result.error));
    }
    for (const [index, record] of pending) {
      this.deliver(index, annotateFailure(record, `worker ${managed.id} returned no result`));
    }

    this.dispatch();
  }

  private handleCrash(managed: ManagedWorker, error: Error): void {
    if (managed.status === 'dead') {
      return;
    }
    managed.status = 'dead';
    this.workers.delete(managed.id);
    this.emit('worker-error', { workerId: managed.id, error });

    const batch = managed.batch;
    managed.batch = null;
    if (batch) {
      for (const unit of batch.units) {
        this.deliver(unit.index, annotateFailure(unit.record, `worker ${managed.id} failed: ${error.message}`));
      }
    }

    if (this.isShuttingDown) {
      return;
    }
    void managed.worker.terminate();
    void this.spawnWorker().then(
      () => this.dispatch(),
      (spawnError: Error) => {
        this.fatal = spawnError;
        this.abort(spawnError);
      }
    );
  }

  private deliver(index: number, record: RuleRecord): void {
    const run = this.run;
    if (!run) {
      return;
    }
    run.onUnit(index, record);
    run.remaining--;
    if (run.remaining === 0) {
      this.run = null;
      run.resolve();
    }
  }

  private abort(error: Error): void {
    const run = this.run;
    this.run = null;
    this.queue = [];
    run?.reject(error);
  }
}
