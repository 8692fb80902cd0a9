/**
 * CLI Interface - Main command-line interface
 */

import * as os from 'os';
import { z } from 'zod';
import { TranslationStrategy } from './types';
import { DEFAULT_CONFIG_FILE, loadConfig, writeDefaultConfig } from './config';
import type { LoadedConfig } from './config';
import { SyntaxDatabase } from './syntax-database';
import { ListParser } from './list-parser';
import { UnitProcessor } from './unit-processor';
import { runPipeline } from './pipeline';
import { RunLogger } from './run-logger';
import { OutputFormatter } from './output-formatter';
import { errorMessage } from './errors';

export const VERSION = '1.0.0';

export interface CLIOptions {
  positional: string[];
  config?: string;
  strategy?: TranslationStrategy;
  workers?: number;
  output?: string;
  limit?: number;
  verbose: boolean;
  force: boolean;
}

const strategySchema = z.nativeEnum(TranslationStrategy);

const VALUE_FLAGS = new Set(['--config', '--strategy', '--workers', '--output', '--limit']);

export class CLI {
  private formatter = new OutputFormatter();

  /**
   * Main entry point for CLI
   *
   * Parses arguments and routes to the subcommand handler:
   * - run: Build the unified list from the configured lists
   * - check: Classify and translate a single rule
   * - patterns: List the loaded syntax patterns
   * - init: Create a starter config file
   * - log: Show recent run log entries
   */
  async run(args: string[]): Promise<number> {
    try {
      if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
        this.displayUsage();
        return args.length === 0 ? 1 : 0;
      }

      if (args[0] === '--version' || args[0] === '-v' || args[0] === 'version') {
        console.log(`filter-unifier v${VERSION}`);
        return 0;
      }

      const subcommand = args[0];
      const options = this.parseArgs(args.slice(1));

      switch (subcommand) {
        case 'run':
          return await this.handleRun(options);

        case 'check':
          if (options.positional.length < 1) {
            console.error('Error: check command requires a rule argument');
            console.error('Usage: filter-unifier check "<rule>"');
            return 1;
          }
          return this.handleCheck(options.positional[0], options);

        case 'patterns':
          return this.handlePatterns(options);

        case 'init':
          return this.handleInit(options);

        case 'log':
          return this.handleLog(options);

        default:
          console.error(`Error: unknown command '${subcommand}'`);
          this.displayUsage();
          return 1;
      }
    } catch (error) {
      this.formatter.displayError(errorMessage(error));
      return 1;
    }
  }

  /**
   * Parse flags shared by every subcommand
   *
   * Supports:
   * - --config <path>: Config file location
   * - --strategy <name>: Translation strategy override
   * - --workers <n>: Worker thread count override
   * - --output <path>: Output file override
   * - --limit <n>: Number of log entries to show
   * - --verbose: Echo progress to stdout
   * - --force: Overwrite an existing config on init
   */
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = { positional: [], verbose: false, force: false };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--verbose') {
        options.verbose = true;
        continue;
      }
      if (arg === '--force') {
        options.force = true;
        continue;
      }
      if (!VALUE_FLAGS.has(arg)) {
        if (arg.startsWith('--')) {
          throw new Error(`Unknown flag '${arg}'`);
        }
        options.positional.push(arg);
        continue;
      }

      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`${arg} requires a value`);
      }
      i++;

      switch (arg) {
        case '--config':
          options.config = value;
          break;
        case '--output':
          options.output = value;
          break;
        case '--strategy': {
          const parsed = strategySchema.safeParse(value);
          if (!parsed.success) {
            throw new Error(`Unknown strategy '${value}' (expected one of: ${Object.values(TranslationStrategy).join(', ')})`);
          }
          options.strategy = parsed.data;
          break;
        }
        case '--workers':
          options.workers = positiveInteger(arg, value);
          break;
        case '--limit':
          options.limit = positiveInteger(arg, value);
          break;
      }
    }

    return options;
  }

  /**
   * Display usage information
   */
  private displayUsage(): void {
    console.log(`
filter-unifier - Merge ad-blocking filter lists into one canonical list

Usage:
  filter-unifier run [flags]          Fetch, validate, translate and write the unified list
  filter-unifier check "<rule>"       Show how a single rule is classified and translated
  filter-unifier patterns             List the loaded syntax patterns
  filter-unifier init [--force]       Create a starter ${DEFAULT_CONFIG_FILE}
  filter-unifier log [--limit <n>]    Show recent run log entries

Flags:
  --config <path>                     Config file (default: ${DEFAULT_CONFIG_FILE})
  --strategy <name>                   rewrite | comment_out_untranslatable | drop | passthrough
  --workers <n>                       Worker threads (1 runs inline)
  --output <path>                     Output file
  --limit <n>                         Log entries to show (default: 50)
  --verbose                           Echo progress to stdout

Examples:
  filter-unifier init
  filter-unifier run --workers 4
  filter-unifier check "example.com#?#div:contains(Sponsored)"
    `.trim());
  }

  /**
   * Handle run command - full pipeline
   */
  private async handleRun(options: CLIOptions): Promise<number> {
    const config = loadConfig(options.config);
    const logger = this.createLogger(config, options);
    const strategy = options.strategy ?? config.translationStrategy;

    this.formatter.displayBanner({
      version: VERSION,
      lists: Object.keys(config.lists).length,
      strategy,
      workers: options.workers ?? config.maxProcessingWorkers ?? os.availableParallelism()
    });

    const summary = await runPipeline(config, {
      strategy,
      workerCount: options.workers,
      output: options.output,
      logger
    });
    this.formatter.displaySummary(summary);
    return 0;
  }

  /**
   * Handle check command - classify one rule without writing anything
   */
  private handleCheck(rule: string, options: CLIOptions): number {
    const config = loadConfig(options.config);
    const db = this.loadDatabase(config);
    const record = new ListParser().parseLine(1, rule, 'check');
    if (!record) {
      console.error('Error: rule is empty');
      return 1;
    }

    const processor = new UnitProcessor(db, options.strategy ?? config.translationStrategy);
    this.formatter.displayCheckResult(processor.process(record));
    return 0;
  }

  /**
   * Handle patterns command - list the pattern database
   */
  private handlePatterns(options: CLIOptions): number {
    const config = loadConfig(options.config);
    const db = this.loadDatabase(config);
    this.formatter.displayPatterns(db.all(), db.canonicalDialect);
    return 0;
  }

  /**
   * Handle init command - create a starter config file
   */
  private handleInit(options: CLIOptions): number {
    const target = options.config ?? DEFAULT_CONFIG_FILE;
    writeDefaultConfig(target, options.force);
    console.log(`✅ Created ${target}`);
    this.formatter.displayInfo('Add your filter lists under "lists", then run: filter-unifier run');
    return 0;
  }

  /**
   * Handle log command - show the tail of the run log
   */
  private handleLog(options: CLIOptions): number {
    const config = loadConfig(options.config);
    if (!config.log.file) {
      this.formatter.displayInfo('No run log configured (set "log.file" in the config)');
      return 0;
    }

    const logger = new RunLogger({ level: config.log.level, filePath: config.log.file, quiet: true });
    const entries = logger.read({ limit: options.limit ?? 50 });
    if (entries.length === 0) {
      this.formatter.displayInfo(`No entries in ${config.log.file}`);
      return 0;
    }
    this.formatter.displayLogEntries(entries);
    return 0;
  }

  private loadDatabase(config: LoadedConfig): SyntaxDatabase {
    return SyntaxDatabase.load(config.patternsDir, {
      canonicalDialect: config.canonicalDialect,
      commentMarker: config.commentMarker
    });
  }

  private createLogger(config: LoadedConfig, options: CLIOptions): RunLogger {
    return new RunLogger({
      level: config.log.level,
      filePath: config.log.file,
      maxSize: config.log.maxSize,
      verbose: options.verbose
    });
  }
}

function positiveInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}
