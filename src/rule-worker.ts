/**
 * Rule Worker - Worker thread entry point
 *
 * Rebuilds its own syntax database and logger from workerData, then
 * processes batches of records one isolated unit at a time.
 */

import { parentPort, workerData } from 'worker_threads';
import type { MessagePort } from 'worker_threads';
import { SyntaxDatabase } from './syntax-database';
import { RunLogger } from './run-logger';
import { UnitProcessor } from './unit-processor';
import { errorMessage } from './errors';
import {
  ruleRecordSchema,
  workerInitSchema,
  workerRequestSchema
} from './worker-protocol';
import type { UnitResult, WorkerResponse } from './worker-protocol';

function send(port: MessagePort, response: WorkerResponse): void {
  port.postMessage(response);
}

function createProcessor(port: MessagePort): UnitProcessor | null {
  const init = workerInitSchema.safeParse(workerData);
  if (!init.success) {
    send(port, { type: 'init-error', message: `invalid worker data: ${init.error.message}` });
    return null;
  }

  try {
    const { snapshot, strategy, logger, workerId } = init.data;
    const db = SyntaxDatabase.fromDescriptors(
      snapshot.files.map(file => ({ fileName: file.fileName, content: file.descriptor })),
      snapshot.options
    );
    return new UnitProcessor(db, strategy, new RunLogger(logger, { worker: workerId }));
  } catch (error) {
    send(port, { type: 'init-error', message: errorMessage(error) });
    return null;
  }
}

function processUnit(processor: UnitProcessor, unit: { index: number; record?: unknown }): UnitResult {
  const record = ruleRecordSchema.safeParse(unit.record);
  if (!record.success) {
    return { index: unit.index, error: `malformed rule record: ${record.error.message}` };
  }
  return { index: unit.index, record: processor.process(record.data) };
}

export function runWorker(port: MessagePort): void {
  const processor = createProcessor(port);
  if (!processor) {
    return;
  }

  port.on('message', (message: unknown) => {
    // A malformed request throws and takes the worker down; the pool
    // annotates the in-flight batch.
    const request = workerRequestSchema.parse(message);
    send(port, {
      type: 'results',
      batchId: request.batchId,
      results: request.units.map(unit => processUnit(processor, unit))
    });
  });

  send(port, { type: 'ready' });
}

if (parentPort) {
  runWorker(parentPort);
}
