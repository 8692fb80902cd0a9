/**
 * Pipeline - fetch, parse, process, generate
 */

import { RuleKind, TranslationStatus, ValidationStatus } from './types';
import type { ExecutionMode, RuleRecord, RunSummary, TranslationStrategy } from './types';
import type { LoadedConfig } from './config';
import { SyntaxDatabase } from './syntax-database';
import { ListFetcher } from './list-fetcher';
import { ListParser } from './list-parser';
import { ListGenerator } from './list-generator';
import { ProcessingCoordinator, sortByProvenance } from './processing-coordinator';
import { RunLogger } from './run-logger';

export interface PipelineOptions {
  strategy?: TranslationStrategy;
  workerCount?: number;
  mode?: ExecutionMode;
  output?: string;
  now?: Date;
  logger?: RunLogger;
}

export async function runPipeline(config: LoadedConfig, options: PipelineOptions = {}): Promise<RunSummary> {
  const logger = options.logger ?? new RunLogger({ quiet: true });
  const strategy = options.strategy ?? config.translationStrategy;
  const outputPath = options.output ?? config.output;

  const db = SyntaxDatabase.load(config.patternsDir, {
    canonicalDialect: config.canonicalDialect,
    commentMarker: config.commentMarker
  });
  logger.info('Loaded syntax database', { patterns: db.size, directory: config.patternsDir });

  const fetcher = new ListFetcher(
    {
      maxParallel: config.maxParallelDownloads,
      timeoutMs: config.downloadTimeoutMs,
      retries: config.downloadRetries,
      retryDelayMs: config.downloadRetryDelayMs,
      baseDir: config.baseDir
    },
    logger.child({ stage: 'fetch' })
  );
  const fetched = await fetcher.fetchAll(
    Object.entries(config.lists).map(([name, location]) => ({ name, location }))
  );

  const parser = new ListParser(logger.child({ stage: 'parse' }));
  const parsed: RuleRecord[] = [];
  const listsFailed: string[] = [];
  let totalLines = 0;
  for (const list of fetched) {
    if (list.content === null) {
      listsFailed.push(list.name);
      continue;
    }
    totalLines += list.content.split(/\r?\n/).length;
    parsed.push(...parser.parse(list.content, list.name));
  }

  const rules = parsed.filter(record => record.kind === RuleKind.RULE);
  const metadata = parsed.filter(record => record.kind === RuleKind.METADATA);

  const coordinator = new ProcessingCoordinator({
    workerCount: config.maxProcessingWorkers,
    mode: options.mode,
    batchSize: config.batchSize,
    progressInterval: config.progressInterval,
    logger: logger.child({ stage: 'process' })
  });
  const processed = sortByProvenance(
    await coordinator.processAll(rules, db, strategy, options.workerCount)
  );

  const generator = new ListGenerator(
    {
      title: config.list.title,
      version: config.list.version,
      expires: config.list.expires,
      commentMarker: config.commentMarker
    },
    logger.child({ stage: 'generate' })
  );
  generator.add(metadata);
  generator.add(processed);
  generator.write(outputPath, options.now ?? new Date());

  const stats = generator.getStats();
  const summary: RunSummary = {
    listsFetched: fetched.length - listsFailed.length,
    listsFailed,
    totalLines,
    rules: processed.length,
    validation: countValidation(processed),
    translation: countTranslation(processed),
    written: stats.written,
    disabled: stats.disabled,
    excluded: stats.excluded,
    duplicates: stats.duplicates,
    outputPath
  };

  logger.info('Run complete', {
    rules: summary.rules,
    written: summary.written,
    disabled: summary.disabled,
    excluded: summary.excluded,
    listsFailed: listsFailed.length
  });
  return summary;
}

function countValidation(records: RuleRecord[]): Record<ValidationStatus, number> {
  const counts: Record<ValidationStatus, number> = {
    [ValidationStatus.UNKNOWN]: 0,
    [ValidationStatus.VALID]: 0,
    [ValidationStatus.NEEDS_TRANSLATION]: 0,
    [ValidationStatus.UNSUPPORTED]: 0,
    [ValidationStatus.ERROR]: 0
  };
  for (const record of records) {
    counts[record.validationStatus]++;
  }
  return counts;
}

function countTranslation(records: RuleRecord[]): Record<TranslationStatus, number> {
  const counts: Record<TranslationStatus, number> = {
    [TranslationStatus.NOT_APPLICABLE]: 0,
    [TranslationStatus.TRANSLATED]: 0,
    [TranslationStatus.FAILED]: 0,
    [TranslationStatus.ERROR]: 0
  };
  for (const record of records) {
    counts[record.translationStatus]++;
  }
  return counts;
}
