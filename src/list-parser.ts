/**
 * List Parser - Splits raw filter list content into rule records
 */

import * as fs from 'fs';
import {
  Inclusion,
  RuleKind,
  TranslationStatus,
  ValidationStatus
} from './types';
import type { RuleRecord } from './types';
import type { RunLogger } from './run-logger';

const HEADER_PATTERN = /^\[Adblock/i;
const METADATA_PATTERN = /^!\s*([A-Za-z][A-Za-z\s]*?)\s*:\s*(?!\/\/)(.+)$/;
// `#` starts a comment unless it opens a cosmetic separator (`##`, `#@#`, `#?#`, `#$#`, `#%#`)
const HASH_COMMENT_PATTERN = /^#(?![#@?$%])/;

export class ListParser {
  constructor(private logger?: RunLogger) {}

  /**
   * Parse one line; blank lines yield null
   */
  parseLine(lineNumber: number, line: string, listName: string): RuleRecord | null {
    const trimmed = line.trim();
    if (trimmed === '') {
      return null;
    }

    const base: RuleRecord = {
      rawRule: trimmed,
      listName,
      lineNumber,
      originalLine: line,
      kind: RuleKind.RULE,
      validationStatus: ValidationStatus.UNKNOWN,
      translationStatus: TranslationStatus.NOT_APPLICABLE,
      inclusion: Inclusion.PENDING
    };

    if (HEADER_PATTERN.test(trimmed) || HASH_COMMENT_PATTERN.test(trimmed)) {
      return { ...base, kind: RuleKind.COMMENT };
    }

    // `!#if`, `!#endif`, `!#include` are preprocessor directives, not comments
    if (trimmed.startsWith('!') && !trimmed.startsWith('!#')) {
      const match = METADATA_PATTERN.exec(trimmed);
      if (match) {
        return {
          ...base,
          kind: RuleKind.METADATA,
          metadata: {
            key: match[1].toLowerCase().replace(/\s+/g, '_'),
            value: match[2].trim()
          }
        };
      }
      return { ...base, kind: RuleKind.COMMENT };
    }

    return base;
  }

  /**
   * Parse the full content of a list, in line order
   */
  parse(content: string, listName: string): RuleRecord[] {
    const lines = content.split(/\r?\n/);
    const records: RuleRecord[] = [];

    for (let i = 0; i < lines.length; i++) {
      const record = this.parseLine(i + 1, lines[i], listName);
      if (record) {
        records.push(record);
      }
    }

    if (records.length === 0) {
      this.logger?.warn('List has no content', { list: listName });
    } else {
      this.logger?.info('Parsed list', { list: listName, lines: lines.length, records: records.length });
    }
    return records;
  }

  /**
   * Read and parse a local list file
   */
  parseFile(filePath: string, listName: string): RuleRecord[] {
    return this.parse(fs.readFileSync(filePath, 'utf-8'), listName);
  }
}
