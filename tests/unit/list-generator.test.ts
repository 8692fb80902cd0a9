/**
 * Unit tests for ListGenerator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ListGenerator } from '../../src/list-generator';
import { GenerationError } from '../../src/errors';
import { Inclusion, RuleKind } from '../../src/types';
import { makeRecord } from '../helpers/records';

const NOW = new Date('2026-03-04T05:06:07.890Z');

describe('ListGenerator', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'filter-unifier-gen-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function populated(): ListGenerator {
    const generator = new ListGenerator({ title: 'Unified', version: '2.1', expires: '4 days', commentMarker: '!' });
    generator.add([
      makeRecord('! Title: EasyList', {
        kind: RuleKind.METADATA,
        listName: 'easylist',
        metadata: { key: 'title', value: 'EasyList' }
      }),
      makeRecord('! Homepage: https://example.org', {
        kind: RuleKind.METADATA,
        metadata: { key: 'homepage', value: 'https://example.org' }
      }),
      makeRecord('! a comment', { kind: RuleKind.COMMENT }),
      makeRecord('||b.example^', { inclusion: Inclusion.INCLUDE }),
      makeRecord('||a.example^', { inclusion: Inclusion.INCLUDE, lineNumber: 2 }),
      makeRecord('||a.example^', { inclusion: Inclusion.INCLUDE, lineNumber: 3 }),
      makeRecord('! UNTRANSLATED (unsupported): x # Reason: none', { inclusion: Inclusion.DISABLED }),
      makeRecord('example.com##', { inclusion: Inclusion.EXCLUDE })
    ]);
    return generator;
  }

  it('should render header, sorted rules, untranslated section and footer', () => {
    expect(populated().render(NOW)).toBe([
      '! Title: Unified',
      '! Version: 2.1',
      '! Last Updated: 2026-03-04 05:06:07 UTC',
      '! Expires: 4 days',
      '! Rule Count: 3 unique rules',
      '!',
      '! Original List Titles:',
      '!  - EasyList (from easylist)',
      '!',
      '! Source Homepage: https://example.org',
      '!',
      '! --- BEGIN RULES ---',
      '!',
      '||a.example^',
      '||b.example^',
      '',
      '!',
      '! --- UNTRANSLATED/COMMENTED RULES ---',
      '!',
      '! UNTRANSLATED (unsupported): x # Reason: none',
      '',
      '!',
      '! --- END RULES ---',
      ''
    ].join('\n'));
  });

  it('should count written, disabled, excluded and duplicate rules', () => {
    expect(populated().getStats()).toEqual({ written: 2, disabled: 1, excluded: 1, duplicates: 1 });
  });

  it('should omit empty sections', () => {
    const generator = new ListGenerator({ title: 'T', version: '1.0', expires: '7 days', commentMarker: '!' });
    generator.add([makeRecord('||a^', { inclusion: Inclusion.INCLUDE })]);

    expect(generator.render(NOW)).toBe([
      '! Title: T',
      '! Version: 1.0',
      '! Last Updated: 2026-03-04 05:06:07 UTC',
      '! Expires: 7 days',
      '! Rule Count: 1 unique rules',
      '!',
      '!',
      '! --- BEGIN RULES ---',
      '!',
      '||a^',
      '',
      '!',
      '! --- END RULES ---',
      ''
    ].join('\n'));
  });

  it('should write only one copy of a rule that is both active and disabled', () => {
    const generator = new ListGenerator({ title: 'T', version: '1.0', expires: '7 days', commentMarker: '!' });
    generator.add([
      makeRecord('||dup^', { inclusion: Inclusion.INCLUDE }),
      makeRecord('||dup^', { inclusion: Inclusion.DISABLED })
    ]);

    expect(generator.getStats()).toEqual({ written: 1, disabled: 0, excluded: 0, duplicates: 1 });
  });

  it('should count records that were never finalized as excluded', () => {
    const generator = new ListGenerator({ title: 'T', version: '1.0', expires: '7 days', commentMarker: '!' });
    generator.add([makeRecord('||pending^')]);

    expect(generator.getStats().excluded).toBe(1);
  });

  describe('write()', () => {
    it('should create the output directory and write the list', () => {
      const output = path.join(tempDir, 'nested', 'out', 'list.txt');
      const generator = populated();

      generator.write(output, NOW);

      expect(fs.readFileSync(output, 'utf-8')).toBe(generator.render(NOW));
    });

    it('should raise GenerationError when the file cannot be written', () => {
      const generator = populated();

      expect(() => generator.write(tempDir, NOW)).toThrow(GenerationError);
      expect(() => generator.write(tempDir, NOW)).toThrow(`Could not write output list '${tempDir}'`);
    });
  });
});
