/**
 * Configuration - Loads and validates filter-unifier.json
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { TranslationStrategy } from './types';
import { ConfigError, errorMessage } from './errors';

export const DEFAULT_CONFIG_FILE = 'filter-unifier.json';

const positiveInt = z.number().int().positive();

export const configSchema = z
  .object({
    lists: z.record(z.string(), z.string().min(1)).default({}),
    output: z.string().min(1).default('output/unified-list.txt'),
    patternsDir: z.string().min(1).optional(),
    canonicalDialect: z.string().min(1).default('brave'),
    commentMarker: z.string().min(1).default('!'),
    translationStrategy: z.nativeEnum(TranslationStrategy).default(TranslationStrategy.COMMENT_OUT),
    maxProcessingWorkers: positiveInt.optional(),
    batchSize: positiveInt.default(256),
    progressInterval: positiveInt.default(1000),
    maxParallelDownloads: positiveInt.default(5),
    downloadTimeoutMs: positiveInt.default(30000),
    downloadRetries: z.number().int().nonnegative().default(2),
    downloadRetryDelayMs: z.number().int().nonnegative().default(1000),
    list: z
      .object({
        title: z.string().min(1).default('Unified Filter List'),
        version: z.string().min(1).default('1.0'),
        expires: z.string().min(1).default('7 days')
      })
      .strict()
      .default({}),
    log: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        file: z.string().min(1).optional(),
        maxSize: positiveInt.default(10 * 1024 * 1024)
      })
      .strict()
      .default({})
  })
  .strict();

export type UnifierConfig = z.infer<typeof configSchema>;

/**
 * Configuration with every path made absolute
 */
export interface LoadedConfig extends Omit<UnifierConfig, 'patternsDir'> {
  patternsDir: string;
  /** Directory relative paths were resolved against */
  baseDir: string;
  /** Config file that was read, or null when defaults were used */
  configPath: string | null;
}

/**
 * Directory holding the pattern descriptors shipped with the package
 */
export function bundledPatternsDir(): string {
  // Sources run from src/, the build from dist/src/
  const candidates = [
    path.join(__dirname, '..', 'patterns'),
    path.join(__dirname, '..', '..', 'patterns')
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? candidates[0];
}

/**
 * Parse and validate a configuration value
 * @throws ConfigError listing every invalid key
 */
export function parseConfig(value: unknown, source: string = 'configuration'): UnifierConfig {
  const result = configSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }
  return result.data;
}

/**
 * Load configuration from a JSON file. A missing file means defaults,
 * resolved against the current directory.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): LoadedConfig {
  const absolutePath = path.resolve(configPath);

  let raw: string | null = null;
  try {
    raw = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw new ConfigError(`Cannot read config file '${absolutePath}': ${errorMessage(error)}`);
    }
  }

  if (raw === null) {
    return resolvePaths(parseConfig({}), process.cwd(), null);
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file '${absolutePath}' is not valid JSON: ${errorMessage(error)}`);
  }
  return resolvePaths(parseConfig(value, `config file '${absolutePath}'`), path.dirname(absolutePath), absolutePath);
}

/**
 * Write a starter configuration file
 * @throws ConfigError if the file exists and `force` is not set
 */
export function writeDefaultConfig(configPath: string, force: boolean = false): void {
  if (fs.existsSync(configPath) && !force) {
    throw new ConfigError(`${configPath} already exists (use --force to overwrite)`);
  }

  const starter = {
    lists: {
      example: 'lists/example.txt'
    },
    output: 'output/unified-list.txt',
    translationStrategy: TranslationStrategy.COMMENT_OUT,
    list: {
      title: 'Unified Filter List',
      version: '1.0',
      expires: '7 days'
    },
    log: {
      level: 'info',
      file: 'logs/filter-unifier.log'
    }
  };

  try {
    fs.mkdirSync(path.dirname(path.resolve(configPath)), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify(starter, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not write config file '${configPath}': ${errorMessage(error)}`);
  }
}

function resolvePaths(config: UnifierConfig, baseDir: string, configPath: string | null): LoadedConfig {
  return {
    ...config,
    output: path.resolve(baseDir, config.output),
    patternsDir: config.patternsDir ? path.resolve(baseDir, config.patternsDir) : bundledPatternsDir(),
    log: {
      ...config.log,
      file: config.log.file ? path.resolve(baseDir, config.log.file) : undefined
    },
    baseDir,
    configPath
  };
}
