/**
 * List Generator - Writes the unified filter list
 */

import * as fs from 'fs';
import * as path from 'path';
import { Inclusion, RuleKind } from './types';
import type { RuleRecord } from './types';
import type { RunLogger } from './run-logger';
import { GenerationError, errorMessage } from './errors';

export interface ListGeneratorOptions {
  title: string;
  version: string;
  /** Update interval advertised to blockers, e.g. `7 days` */
  expires: string;
  commentMarker: string;
}

export interface GenerationStats {
  written: number;
  disabled: number;
  excluded: number;
  duplicates: number;
}

export class ListGenerator {
  private active: Set<string> = new Set();
  private untranslated: Set<string> = new Set();
  private originalTitles: string[] = [];
  private homepages: string[] = [];
  private excluded = 0;
  private duplicates = 0;

  constructor(
    private options: ListGeneratorOptions,
    private logger?: RunLogger
  ) {}

  /**
   * Add finalized rule records and the lists' metadata records
   */
  add(records: Iterable<RuleRecord>): void {
    for (const record of records) {
      if (record.kind === RuleKind.METADATA) {
        this.addMetadata(record);
        continue;
      }
      if (record.kind !== RuleKind.RULE) {
        continue;
      }

      switch (record.inclusion) {
        case Inclusion.INCLUDE:
          this.addText(this.active, record);
          break;
        case Inclusion.DISABLED:
          this.addText(this.untranslated, record);
          break;
        case Inclusion.EXCLUDE:
        case Inclusion.PENDING:
          this.excluded++;
          break;
      }
    }
  }

  getStats(): GenerationStats {
    return {
      written: this.active.size,
      disabled: this.untranslated.size,
      excluded: this.excluded,
      duplicates: this.duplicates
    };
  }

  /**
   * Render the list: header, sorted active rules, sorted untranslated section, footer
   */
  render(now: Date = new Date()): string {
    const m = this.options.commentMarker;
    const lines: string[] = [
      `${m} Title: ${this.options.title}`,
      `${m} Version: ${this.options.version}`,
      `${m} Last Updated: ${formatTimestamp(now)}`,
      `${m} Expires: ${this.options.expires}`,
      `${m} Rule Count: ${this.active.size + this.untranslated.size} unique rules`,
      m
    ];

    if (this.originalTitles.length > 0) {
      lines.push(`${m} Original List Titles:`);
      for (const title of this.originalTitles) {
        lines.push(`${m}  - ${title}`);
      }
      lines.push(m);
    }
    for (const homepage of this.homepages) {
      lines.push(`${m} Source Homepage: ${homepage}`);
    }

    lines.push(m, `${m} --- BEGIN RULES ---`, m);
    lines.push(...Array.from(this.active).sort());

    if (this.untranslated.size > 0) {
      lines.push('', m, `${m} --- UNTRANSLATED/COMMENTED RULES ---`, m);
      lines.push(...Array.from(this.untranslated).sort());
    }

    lines.push('', m, `${m} --- END RULES ---`);
    return lines.join('\n') + '\n';
  }

  /**
   * Render and write the list, creating the output directory if needed
   */
  write(outputPath: string, now: Date = new Date()): void {
    const content = this.render(now);
    try {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      fs.writeFileSync(outputPath, content, 'utf-8');
    } catch (error) {
      throw new GenerationError(`Could not write output list '${outputPath}': ${errorMessage(error)}`);
    }
    this.logger?.info('Generated unified list', { output: outputPath, ...this.getStats() });
  }

  private addText(target: Set<string>, record: RuleRecord): void {
    const text = record.rawRule.trim();
    if (this.active.has(text) || this.untranslated.has(text)) {
      this.duplicates++;
      this.logger?.debug('Duplicate rule skipped', { list: record.listName, line: record.lineNumber });
      return;
    }
    target.add(text);
  }

  private addMetadata(record: RuleRecord): void {
    const metadata = record.metadata;
    if (!metadata) {
      return;
    }
    if (metadata.key === 'title') {
      this.originalTitles.push(`${metadata.value} (from ${record.listName})`);
    } else if (metadata.key === 'homepage') {
      this.homepages.push(metadata.value);
    }
  }
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}
