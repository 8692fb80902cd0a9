/**
 * Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  bundledPatternsDir,
  loadConfig,
  parseConfig,
  writeDefaultConfig
} from '../../src/config';
import { ConfigError } from '../../src/errors';
import { TranslationStrategy } from '../../src/types';
import { PATTERNS_DIR } from '../helpers/records';

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'filter-unifier-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('parseConfig()', () => {
    it('should fill in defaults', () => {
      expect(parseConfig({})).toEqual({
        lists: {},
        output: 'output/unified-list.txt',
        canonicalDialect: 'brave',
        commentMarker: '!',
        translationStrategy: TranslationStrategy.COMMENT_OUT,
        batchSize: 256,
        progressInterval: 1000,
        maxParallelDownloads: 5,
        downloadTimeoutMs: 30000,
        downloadRetries: 2,
        downloadRetryDelayMs: 1000,
        list: { title: 'Unified Filter List', version: '1.0', expires: '7 days' },
        log: { level: 'info', maxSize: 10 * 1024 * 1024 }
      });
    });

    it('should accept every strategy by its wire name', () => {
      for (const strategy of ['rewrite', 'comment_out_untranslatable', 'drop', 'passthrough']) {
        expect(parseConfig({ translationStrategy: strategy }).translationStrategy).toBe(strategy);
      }
    });

    it('should list every invalid key', () => {
      const parse = (): unknown => parseConfig({ batchSize: 0, lists: { a: '' } }, 'test config');

      expect(parse).toThrow(ConfigError);
      expect(parse).toThrow(/^Invalid test config:\n/);
      expect(parse).toThrow(/  - lists\.a: /);
      expect(parse).toThrow(/  - batchSize: /);
    });

    it('should reject unknown keys', () => {
      expect(() => parseConfig({ workers: 4 })).toThrow(/  - \(root\): Unrecognized key/);
    });

    it('should reject an unknown strategy', () => {
      expect(() => parseConfig({ translationStrategy: 'translate' })).toThrow(/translationStrategy/);
    });

    it('should reject a non-object configuration', () => {
      expect(() => parseConfig([])).toThrow(ConfigError);
    });
  });

  describe('loadConfig()', () => {
    it('should use defaults resolved against the working directory when the file is missing', () => {
      const cwd = vi.spyOn(process, 'cwd').mockReturnValue(tempDir);

      const config = loadConfig(path.join(tempDir, 'absent.json'));

      expect(cwd).toHaveBeenCalled();
      expect(config.configPath).toBeNull();
      expect(config.baseDir).toBe(tempDir);
      expect(config.output).toBe(path.join(tempDir, 'output', 'unified-list.txt'));
      expect(config.patternsDir).toBe(bundledPatternsDir());
      expect(config.log.file).toBeUndefined();
    });

    it('should resolve relative paths against the config file directory', () => {
      const dir = path.join(tempDir, 'project');
      fs.mkdirSync(dir);
      const file = path.join(dir, 'filter-unifier.json');
      fs.writeFileSync(file, JSON.stringify({
        lists: { local: 'lists/a.txt' },
        output: 'build/list.txt',
        patternsDir: 'syntax',
        log: { file: 'logs/run.log', level: 'debug' }
      }));

      const config = loadConfig(file);

      expect(config.configPath).toBe(file);
      expect(config.baseDir).toBe(dir);
      expect(config.output).toBe(path.join(dir, 'build', 'list.txt'));
      expect(config.patternsDir).toBe(path.join(dir, 'syntax'));
      expect(config.log).toEqual({ level: 'debug', file: path.join(dir, 'logs', 'run.log'), maxSize: 10 * 1024 * 1024 });
      expect(config.lists).toEqual({ local: 'lists/a.txt' });
    });

    it('should report invalid JSON', () => {
      const file = path.join(tempDir, 'bad.json');
      fs.writeFileSync(file, '{ lists: ');

      expect(() => loadConfig(file)).toThrow(ConfigError);
      expect(() => loadConfig(file)).toThrow(`Config file '${file}' is not valid JSON: `);
    });

    it('should name the file in validation errors', () => {
      const file = path.join(tempDir, 'invalid.json');
      fs.writeFileSync(file, JSON.stringify({ commentMarker: '' }));

      expect(() => loadConfig(file)).toThrow(`Invalid config file '${file}':\n  - commentMarker: `);
    });

    it('should report a config path that cannot be read', () => {
      expect(() => loadConfig(tempDir)).toThrow(`Cannot read config file '${tempDir}': `);
    });
  });

  describe('writeDefaultConfig()', () => {
    it('should write a starter file that loads cleanly', () => {
      const file = path.join(tempDir, 'nested', 'filter-unifier.json');

      writeDefaultConfig(file);

      const config = loadConfig(file);
      expect(config.lists).toEqual({ example: 'lists/example.txt' });
      expect(config.translationStrategy).toBe(TranslationStrategy.COMMENT_OUT);
      expect(config.log.file).toBe(path.join(tempDir, 'nested', 'logs', 'filter-unifier.log'));
    });

    it('should refuse to overwrite without force', () => {
      const file = path.join(tempDir, 'filter-unifier.json');
      fs.writeFileSync(file, '{}');

      expect(() => writeDefaultConfig(file)).toThrow(`${file} already exists (use --force to overwrite)`);
      expect(fs.readFileSync(file, 'utf-8')).toBe('{}');
    });

    it('should overwrite with force', () => {
      const file = path.join(tempDir, 'filter-unifier.json');
      fs.writeFileSync(file, '{}');

      writeDefaultConfig(file, true);

      expect(JSON.parse(fs.readFileSync(file, 'utf-8')).output).toBe('output/unified-list.txt');
    });
  });

  describe('bundledPatternsDir()', () => {
    it('should find the shipped pattern descriptors', () => {
      expect(bundledPatternsDir()).toBe(PATTERNS_DIR);
    });
  });
});
