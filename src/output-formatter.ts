/**
 * OutputFormatter - Console output for the filter-unifier CLI
 *
 * Provides consistent feedback to users with:
 * - Startup banner with version and run configuration
 * - Run summary with per-status counts
 * - Single-rule check results with ✅ / 🔁 / ⚠️ / ❌ markers
 * - Pattern database listing
 * - Run log entries
 */

import { Inclusion, TranslationStatus, ValidationStatus } from './types';
import type { LogEntry, RuleRecord, RunSummary, SyntaxPattern } from './types';

export interface BannerConfig {
  version: string;
  lists: number;
  strategy: string;
  workers: number;
}

export class OutputFormatter {
  /**
   * Display startup banner with the run configuration
   */
  displayBanner(config: BannerConfig): void {
    const banner = [
      '╔═══════════════════════════════════════════════════════════╗',
      `║  🧹 filter-unifier v${config.version.padEnd(38)}║`,
      `║  Lists: ${String(config.lists).padEnd(50)}║`,
      `║  Strategy: ${config.strategy.padEnd(47)}║`,
      `║  Workers: ${String(config.workers).padEnd(48)}║`,
      '╚═══════════════════════════════════════════════════════════╝'
    ];

    console.log(banner.join('\n'));
  }

  /**
   * Display the outcome of a full run
   */
  displaySummary(summary: RunSummary): void {
    const lines = [
      `✅ Wrote ${summary.written} rules to ${summary.outputPath}`,
      `Lists: ${summary.listsFetched} fetched, ${summary.listsFailed.length} failed`,
      `Rules processed: ${summary.rules} (${summary.totalLines} lines read)`,
      `Validation: ${formatCounts(summary.validation)}`,
      `Translation: ${formatCounts(summary.translation)}`,
      `Untranslated (commented out): ${summary.disabled}`,
      `Excluded: ${summary.excluded}`,
      `Duplicates skipped: ${summary.duplicates}`
    ];
    console.log(lines.join('\n'));

    for (const name of summary.listsFailed) {
      this.displayWarning(`List '${name}' could not be retrieved`);
    }
  }

  /**
   * Display how a single rule was classified and what would be written
   */
  displayCheckResult(record: RuleRecord): void {
    const lines = [`${statusIcon(record)} ${record.validationStatus.toUpperCase()}: ${record.originalLine.trim()}`];

    if (record.matchedPattern) {
      lines.push(`Pattern: ${record.matchedPattern}`);
    }
    if (record.translationStatus !== TranslationStatus.NOT_APPLICABLE) {
      lines.push(`Translation: ${record.translationStatus}`);
    }
    if (record.processingError) {
      lines.push(`Reason: ${record.processingError}`);
    } else if (record.notes) {
      lines.push(`Notes: ${record.notes}`);
    }
    lines.push(record.inclusion === Inclusion.EXCLUDE ? 'Output: (not written)' : `Output: ${record.rawRule}`);

    console.log(lines.join('\n'));
  }

  /**
   * Display the loaded pattern database in priority order
   */
  displayPatterns(patterns: readonly SyntaxPattern[], canonicalDialect: string): void {
    console.log(`${patterns.length} patterns (canonical dialect: ${canonicalDialect})`);
    for (const pattern of patterns) {
      const translation = pattern.dialect === canonicalDialect
        ? 'canonical'
        : pattern.template ? `→ ${pattern.template.source}` : 'no translation';
      console.log(`  ${String(pattern.priority).padStart(4)}  ${pattern.id.padEnd(36)} ${pattern.matcher.type.padEnd(6)} ${translation}`);
    }
  }

  /**
   * Display run log entries, oldest first
   */
  displayLogEntries(entries: readonly LogEntry[]): void {
    for (const entry of entries) {
      const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
      console.log(`${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${entry.message}${context}`);
    }
  }

  /**
   * Display error message
   */
  displayError(message: string): void {
    console.error(`❌ Error: ${message}`);
  }

  /**
   * Display warning message
   */
  displayWarning(message: string): void {
    console.warn(`⚠️  Warning: ${message}`);
  }

  /**
   * Display info message
   */
  displayInfo(message: string): void {
    console.log(`ℹ️  ${message}`);
  }
}

function statusIcon(record: RuleRecord): string {
  switch (record.validationStatus) {
    case ValidationStatus.VALID:
      return '✅';
    case ValidationStatus.NEEDS_TRANSLATION:
      return '🔁';
    case ValidationStatus.UNSUPPORTED:
    case ValidationStatus.UNKNOWN:
      return '⚠️ ';
    case ValidationStatus.ERROR:
      return '❌';
  }
}

function formatCounts(counts: Record<string, number>): string {
  const parts = Object.entries(counts)
    .filter(([, count]) => count > 0)
    .map(([status, count]) => `${status}=${count}`);
  return parts.length > 0 ? parts.join(', ') : 'none';
}
