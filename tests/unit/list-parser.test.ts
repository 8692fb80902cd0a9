/**
 * Unit tests for ListParser
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ListParser } from '../../src/list-parser';
import {
  Inclusion,
  RuleKind,
  TranslationStatus,
  ValidationStatus
} from '../../src/types';

describe('ListParser', () => {
  const parser = new ListParser();

  describe('parseLine()', () => {
    it('should skip blank lines', () => {
      expect(parser.parseLine(1, '', 'l')).toBeNull();
      expect(parser.parseLine(2, '   \t', 'l')).toBeNull();
    });

    it('should build a pending rule record with provenance', () => {
      expect(parser.parseLine(7, '  ||example.com^  ', 'easylist')).toEqual({
        rawRule: '||example.com^',
        listName: 'easylist',
        lineNumber: 7,
        originalLine: '  ||example.com^  ',
        kind: RuleKind.RULE,
        validationStatus: ValidationStatus.UNKNOWN,
        translationStatus: TranslationStatus.NOT_APPLICABLE,
        inclusion: Inclusion.PENDING
      });
    });

    it('should classify list headers and comments', () => {
      expect(parser.parseLine(1, '[Adblock Plus 2.0]', 'l')?.kind).toBe(RuleKind.COMMENT);
      expect(parser.parseLine(1, '! just a remark', 'l')?.kind).toBe(RuleKind.COMMENT);
      expect(parser.parseLine(1, '# hosts-style comment', 'l')?.kind).toBe(RuleKind.COMMENT);
      expect(parser.parseLine(1, '!', 'l')?.kind).toBe(RuleKind.COMMENT);
    });

    it('should extract metadata headers', () => {
      const record = parser.parseLine(1, '! Last modified: 2026-01-02', 'l');

      expect(record?.kind).toBe(RuleKind.METADATA);
      expect(record?.metadata).toEqual({ key: 'last_modified', value: '2026-01-02' });
    });

    it('should keep URLs in metadata values', () => {
      expect(parser.parseLine(1, '! Homepage: https://example.org/lists', 'l')?.metadata).toEqual({
        key: 'homepage',
        value: 'https://example.org/lists'
      });
    });

    it('should not mistake a bare URL comment for metadata', () => {
      const record = parser.parseLine(1, '! https://example.org/issue/1', 'l');

      expect(record?.kind).toBe(RuleKind.COMMENT);
      expect(record?.metadata).toBeUndefined();
    });

    it('should treat preprocessor directives as rules', () => {
      expect(parser.parseLine(1, '!#if env_firefox', 'l')?.kind).toBe(RuleKind.RULE);
      expect(parser.parseLine(1, '!#include extra.txt', 'l')?.kind).toBe(RuleKind.RULE);
    });

    it('should treat cosmetic rules without domains as rules', () => {
      for (const line of ['##.ad', '#@#.ad', '#?#div:has(.ad)', '#$#body { overflow: auto; }', '#%#//scriptlet("x")']) {
        expect(parser.parseLine(1, line, 'l')?.kind).toBe(RuleKind.RULE);
      }
    });
  });

  describe('parse()', () => {
    it('should number lines from one and skip blanks', () => {
      const content = '[Adblock Plus 2.0]\n! Title: Test List\n\n||ads.example^\r\nexample.com##.banner\n';

      const records = parser.parse(content, 'test');

      expect(records.map(r => [r.lineNumber, r.kind, r.rawRule])).toEqual([
        [1, RuleKind.COMMENT, '[Adblock Plus 2.0]'],
        [2, RuleKind.METADATA, '! Title: Test List'],
        [4, RuleKind.RULE, '||ads.example^'],
        [5, RuleKind.RULE, 'example.com##.banner']
      ]);
      expect(records[1].metadata).toEqual({ key: 'title', value: 'Test List' });
    });

    it('should return nothing for empty content', () => {
      expect(parser.parse('', 'empty')).toEqual([]);
    });
  });

  describe('parseFile()', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'filter-unifier-parse-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read a local list', () => {
      const file = path.join(tempDir, 'list.txt');
      fs.writeFileSync(file, '! Title: Local\n||local.example^\n');

      const records = parser.parseFile(file, 'local');

      expect(records).toHaveLength(2);
      expect(records[1].listName).toBe('local');
    });
  });
});
