/**
 * Integration tests for worker-thread execution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { Worker } from 'worker_threads';
import { RuleThreadPool, createWorker, resolveWorkerEntry } from '../../src/thread-pool';
import type { WorkerFactory } from '../../src/thread-pool';
import { ProcessingCoordinator, sortByProvenance } from '../../src/processing-coordinator';
import { DEFAULT_LOGGER_OPTIONS } from '../../src/run-logger';
import { Inclusion, TranslationStatus, TranslationStrategy, ValidationStatus } from '../../src/types';
import type { RuleRecord } from '../../src/types';
import { WorkerPoolError } from '../../src/errors';
import { bundledDatabase, makeRecord } from '../helpers/records';

function manyRecords(count: number): RuleRecord[] {
  const rules = ['||example.com^', '||example.com^$3p', 'example.com#%#x()', 'adserver banner', 'example.com##'];
  return Array.from({ length: count }, (_, i) =>
    makeRecord(`${rules[i % rules.length]}`, { listName: i % 2 === 0 ? 'even' : 'odd', lineNumber: i + 1 })
  );
}

// Reports ready, then exits on the first batch it is given
const CRASHING_WORKER = [
  "const { parentPort } = require('worker_threads');",
  "parentPort.on('message', () => process.exit(3));",
  "parentPort.postMessage({ type: 'ready' });"
].join('\n');

describe('resolveWorkerEntry()', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'filter-unifier-pool-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should prefer a compiled worker next to the module', () => {
    fs.writeFileSync(path.join(tempDir, 'rule-worker.js'), '');

    expect(resolveWorkerEntry(tempDir)).toEqual({ filename: path.join(tempDir, 'rule-worker.js'), eval: false });
  });

  it('should fall back to a bootstrap that loads the TypeScript source through tsx', () => {
    const source = path.join(tempDir, 'rule-worker.ts');

    expect(resolveWorkerEntry(tempDir)).toEqual({
      filename: `require('tsx/cjs');require(${JSON.stringify(source)});`,
      eval: true
    });
  });
});

describe('RuleThreadPool', () => {
  it('should reject a non-positive size', () => {
    expect(() => new RuleThreadPool({
      size: 0,
      snapshot: bundledDatabase().toSnapshot(),
      strategy: TranslationStrategy.DROP,
      logger: DEFAULT_LOGGER_OPTIONS
    })).toThrow('Pool size must be a positive integer, got 0');
  });

  it('should fail to start when a worker cannot build its database', async () => {
    const pool = new RuleThreadPool({
      size: 1,
      snapshot: {
        files: [{
          fileName: 'broken.json',
          descriptor: { dialect: 'd', patterns: [{ name: 'p', category: 'c', matcher: { type: 'regex', expression: '(' } }] }
        }],
        options: { canonicalDialect: 'd', commentMarker: '!' }
      },
      strategy: TranslationStrategy.DROP,
      logger: DEFAULT_LOGGER_OPTIONS
    });

    const started = pool.start();

    await expect(started).rejects.toThrow(WorkerPoolError);
    await expect(started).rejects.toThrow(/^Worker 0 failed to start: Invalid regex matcher in pattern 'd\/p'/);
  });

  it('should process every unit exactly once across workers', async () => {
    const db = bundledDatabase();
    const pool = new RuleThreadPool({
      size: 2,
      snapshot: db.toSnapshot(),
      strategy: TranslationStrategy.COMMENT_OUT,
      logger: DEFAULT_LOGGER_OPTIONS
    });
    const records = manyRecords(9);
    const seen: number[] = [];
    const started: number[] = [];
    pool.on('started', ({ workerCount }: { workerCount: number }) => started.push(workerCount));

    try {
      await pool.start();
      expect(started).toEqual([2]);
      await pool.process(records.map((record, index) => ({ index, record })), 2, (index, record) => {
        seen.push(index);
        expect(record.validationStatus).not.toBe(ValidationStatus.UNKNOWN);
      });
    } finally {
      await pool.shutdown();
    }

    expect(seen.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('should annotate the in-flight batch and replace a worker that dies', async () => {
    const spawned: Worker[] = [];
    const factory: WorkerFactory = (entry, workerData) => {
      const worker = spawned.length === 0
        ? createWorker({ filename: CRASHING_WORKER, eval: true }, workerData)
        : createWorker(entry, workerData);
      spawned.push(worker);
      return worker;
    };
    const pool = new RuleThreadPool({
      size: 1,
      snapshot: bundledDatabase().toSnapshot(),
      strategy: TranslationStrategy.COMMENT_OUT,
      logger: DEFAULT_LOGGER_OPTIONS,
      createWorker: factory
    });
    const failedWorkers: number[] = [];
    pool.on('worker-error', ({ workerId }: { workerId: number }) => failedWorkers.push(workerId));
    const records = manyRecords(6);
    const results = new Map<number, RuleRecord>();

    try {
      await pool.start();
      await pool.process(records.map((record, index) => ({ index, record })), 3, (index, record) => {
        expect(results.has(index)).toBe(false);
        results.set(index, record);
      });
    } finally {
      await pool.shutdown();
    }

    expect(results.size).toBe(6);
    expect(failedWorkers).toEqual([0]);
    expect(spawned).toHaveLength(2);
    for (const index of [0, 1, 2]) {
      expect(results.get(index)).toEqual({
        ...records[index],
        validationStatus: ValidationStatus.ERROR,
        translationStatus: TranslationStatus.ERROR,
        processingError: 'worker 0 failed: exited with code 3',
        errorKind: 'worker',
        inclusion: Inclusion.EXCLUDE
      });
    }
    for (const index of [3, 4, 5]) {
      expect(results.get(index)?.errorKind).not.toBe('worker');
      expect(results.get(index)?.validationStatus).not.toBe(ValidationStatus.UNKNOWN);
    }
  });
});

describe('ProcessingCoordinator threads mode', () => {
  it('should produce the same records as inline execution', async () => {
    const db = bundledDatabase();
    const records = manyRecords(25);

    const threaded = await new ProcessingCoordinator({ mode: 'threads', batchSize: 4 })
      .processAll(records, db, TranslationStrategy.COMMENT_OUT, 2);
    const inline = await new ProcessingCoordinator({ mode: 'inline' })
      .processAll(records, db, TranslationStrategy.COMMENT_OUT, 1);

    expect(threaded).toHaveLength(25);
    expect(sortByProvenance(threaded)).toEqual(sortByProvenance(inline));
  });
});
