/**
 * Processing Coordinator - Validates and translates every rule record
 *
 * Each record is an isolated unit of work. Units run either on a pool of
 * worker threads or inline on the calling thread; in both modes exactly
 * one result comes back per input record, in completion order.
 */

import { EventEmitter } from 'events';
import * as os from 'os';
import type { ExecutionMode, ProgressEvent, RuleRecord, TranslationStrategy } from './types';
import type { SyntaxDatabase } from './syntax-database';
import { RunLogger } from './run-logger';
import { UnitProcessor } from './unit-processor';
import { RuleThreadPool } from './thread-pool';
import type { WorkUnit } from './thread-pool';
import { WorkerPoolError } from './errors';

export interface CoordinatorOptions {
  /** Default worker count when processAll is not given one */
  workerCount?: number;
  /** Forces an execution mode; otherwise threads when workerCount > 1 */
  mode?: ExecutionMode;
  /** Records per dispatched batch (default 256) */
  batchSize?: number;
  /** Emit progress every N completions (default 1000) */
  progressInterval?: number;
  logger?: RunLogger;
}

const DEFAULT_BATCH_SIZE = 256;
const DEFAULT_PROGRESS_INTERVAL = 1000;

export class ProcessingCoordinator extends EventEmitter {
  private options: CoordinatorOptions;
  private logger: RunLogger;

  constructor(options: CoordinatorOptions = {}) {
    super();
    this.options = options;
    this.logger = options.logger ?? new RunLogger({ quiet: true });
  }

  /**
   * Process every record; resolves with one result per input record.
   * Rejects with WorkerPoolError only when the pool itself cannot run.
   */
  async processAll(
    records: RuleRecord[],
    db: SyntaxDatabase,
    strategy: TranslationStrategy,
    workerCount?: number
  ): Promise<RuleRecord[]> {
    const count = workerCount ?? this.options.workerCount ?? os.availableParallelism();
    if (!Number.isInteger(count) || count < 1) {
      throw new WorkerPoolError(`Worker count must be a positive integer, got ${count}`);
    }
    if (records.length === 0) {
      return [];
    }

    const batchSize = Math.max(1, this.options.batchSize ?? DEFAULT_BATCH_SIZE);
    const mode = this.options.mode ?? (count > 1 ? 'threads' : 'inline');
    const progress = new ProgressTracker(
      records.length,
      this.options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL,
      event => this.reportProgress(event)
    );

    this.logger.info('Processing rules', { records: records.length, mode, workers: count, strategy });

    const results = mode === 'inline'
      ? await this.runInline(records, db, strategy, batchSize, progress)
      : await this.runThreaded(records, db, strategy, count, batchSize, progress);

    progress.finish();
    return results;
  }

  private async runInline(
    records: RuleRecord[],
    db: SyntaxDatabase,
    strategy: TranslationStrategy,
    batchSize: number,
    progress: ProgressTracker
  ): Promise<RuleRecord[]> {
    const processor = new UnitProcessor(db, strategy, this.logger);
    const results: RuleRecord[] = [];

    for (let start = 0; start < records.length; start += batchSize) {
      for (const record of records.slice(start, start + batchSize)) {
        results.push(processor.process(record));
        progress.tick();
      }
      await yieldToEventLoop();
    }
    return results;
  }

  private async runThreaded(
    records: RuleRecord[],
    db: SyntaxDatabase,
    strategy: TranslationStrategy,
    workerCount: number,
    batchSize: number,
    progress: ProgressTracker
  ): Promise<RuleRecord[]> {
    const batches = Math.ceil(records.length / batchSize);
    const pool = new RuleThreadPool({
      size: Math.min(workerCount, batches),
      snapshot: db.toSnapshot(),
      strategy,
      logger: this.logger.options
    });
    pool.on('started', ({ workerCount: started }: { workerCount: number }) => {
      this.logger.debug('Worker pool started', { workers: started });
    });
    pool.on('worker-error', ({ workerId, error }: { workerId: number; error: Error }) => {
      this.logger.error('Worker failed; replacing it', { worker: workerId, error: error.message });
    });

    const units: WorkUnit[] = records.map((record, index) => ({ index, record }));
    const results: RuleRecord[] = [];

    try {
      await pool.start();
      await pool.process(units, batchSize, (_index, record) => {
        results.push(record);
        progress.tick();
      });
    } finally {
      await pool.shutdown();
    }
    return results;
  }

  private reportProgress(event: ProgressEvent): void {
    this.emit('progress', event);
    this.logger.info('Processing progress', {
      completed: event.completed,
      total: event.total,
      elapsedMs: event.elapsedMs
    });
  }
}

/**
 * Restore `(listName, lineNumber)` order after completion-order collection
 */
export function sortByProvenance(records: RuleRecord[]): RuleRecord[] {
  return [...records].sort((a, b) => {
    if (a.listName !== b.listName) {
      return a.listName < b.listName ? -1 : 1;
    }
    return a.lineNumber - b.lineNumber;
  });
}

class ProgressTracker {
  private completed = 0;
  private lastReported = 0;
  private startedAt = Date.now();

  constructor(
    private total: number,
    private interval: number,
    private report: (event: ProgressEvent) => void
  ) {}

  tick(): void {
    this.completed++;
    if (this.interval > 0 && this.completed % this.interval === 0) {
      this.emit();
    }
  }

  finish(): void {
    if (this.lastReported !== this.completed) {
      this.emit();
    }
  }

  private emit(): void {
    this.lastReported = this.completed;
    this.report({ completed: this.completed, total: this.total, elapsedMs: Date.now() - this.startedAt });
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
