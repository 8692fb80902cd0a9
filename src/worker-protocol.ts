/**
 * Messages exchanged between the thread pool and rule workers
 */

import { z } from 'zod';
import {
  Inclusion,
  RuleKind,
  TranslationStatus,
  TranslationStrategy,
  ValidationStatus
} from './types';

export const ruleRecordSchema = z.object({
  rawRule: z.string(),
  listName: z.string(),
  lineNumber: z.number(),
  originalLine: z.string(),
  kind: z.nativeEnum(RuleKind),
  validationStatus: z.nativeEnum(ValidationStatus),
  translationStatus: z.nativeEnum(TranslationStatus),
  processingError: z.string().optional(),
  errorKind: z.enum(['validation', 'translation', 'worker']).optional(),
  matchedPattern: z.string().optional(),
  notes: z.string().optional(),
  inclusion: z.nativeEnum(Inclusion),
  metadata: z.object({ key: z.string(), value: z.string() }).optional()
});

export const workerInitSchema = z.object({
  workerId: z.number().int(),
  strategy: z.nativeEnum(TranslationStrategy),
  snapshot: z.object({
    files: z.array(z.object({ fileName: z.string(), descriptor: z.unknown() })),
    options: z.object({ canonicalDialect: z.string(), commentMarker: z.string() })
  }),
  logger: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    filePath: z.string().optional(),
    maxSize: z.number(),
    verbose: z.boolean(),
    quiet: z.boolean()
  })
});

export type WorkerInit = z.infer<typeof workerInitSchema>;

export const workerRequestSchema = z.object({
  type: z.literal('batch'),
  batchId: z.number().int(),
  units: z.array(z.object({ index: z.number().int(), record: z.unknown() }))
});

export type WorkerRequest = z.infer<typeof workerRequestSchema>;

const unitResultSchema = z.union([
  z.object({ index: z.number().int(), record: ruleRecordSchema }),
  z.object({ index: z.number().int(), error: z.string() })
]);

export type UnitResult = z.infer<typeof unitResultSchema>;

export const workerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready') }),
  z.object({ type: z.literal('init-error'), message: z.string() }),
  z.object({ type: z.literal('results'), batchId: z.number().int(), results: z.array(unitResultSchema) })
]);

export type WorkerResponse = z.infer<typeof workerResponseSchema>;
