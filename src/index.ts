#!/usr/bin/env node
/**
 * filter-unifier - Main entry point
 */

import { CLI } from './cli';
import { enforceNodeVersion } from './version-checker';

export async function main(args: string[]): Promise<number> {
  enforceNodeVersion();

  const cli = new CLI();
  return await cli.run(args);
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

// Export for library use and testing
export * from './types';
export * from './errors';
export { CLI, VERSION } from './cli';
export { loadConfig, parseConfig, writeDefaultConfig, bundledPatternsDir } from './config';
export type { LoadedConfig, UnifierConfig } from './config';
export { SyntaxDatabase } from './syntax-database';
export type { DescriptorSource, SyntaxDatabaseSnapshot } from './syntax-database';
export { compileMatcher, compileTemplate } from './pattern-matcher';
export { RuleValidator } from './rule-validator';
export { RuleTranslator } from './rule-translator';
export { UnitProcessor, annotateFailure } from './unit-processor';
export { ProcessingCoordinator, sortByProvenance } from './processing-coordinator';
export type { CoordinatorOptions } from './processing-coordinator';
export { ListParser } from './list-parser';
export { ListFetcher } from './list-fetcher';
export type { ListSource, ListFetcherOptions } from './list-fetcher';
export { ListGenerator } from './list-generator';
export { runPipeline } from './pipeline';
export type { PipelineOptions } from './pipeline';
export { RunLogger } from './run-logger';
export type { LoggerOptions } from './run-logger';
export { OutputFormatter } from './output-formatter';
export { checkNodeVersion, compareVersions } from './version-checker';
