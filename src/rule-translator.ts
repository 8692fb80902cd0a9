/**
 * Rule Translator - Rewrites or dispositions classified rule records
 */

import {
  Inclusion,
  TranslationStatus,
  TranslationStrategy,
  ValidationStatus
} from './types';
import type { RuleRecord } from './types';
import type { SyntaxDatabase } from './syntax-database';
import { TranslationError, errorMessage } from './errors';

const STRATEGIES = new Set<string>(Object.values(TranslationStrategy));

export class RuleTranslator {
  /**
   * Resolve a validated record into its final form.
   *
   * A template on the matched pattern is applied under every strategy; the
   * strategy decides what happens to rules that have none. Never throws.
   */
  translate(record: RuleRecord, db: SyntaxDatabase, strategy: TranslationStrategy): RuleRecord {
    switch (record.validationStatus) {
      case ValidationStatus.VALID:
        return { ...record, translationStatus: TranslationStatus.NOT_APPLICABLE, inclusion: Inclusion.INCLUDE };

      case ValidationStatus.ERROR:
        // Terminal: malformed rules are never translated
        return { ...record, translationStatus: TranslationStatus.NOT_APPLICABLE, inclusion: Inclusion.EXCLUDE };

      case ValidationStatus.UNKNOWN:
        return this.fail(record, 'record has not been validated');

      case ValidationStatus.NEEDS_TRANSLATION:
      case ValidationStatus.UNSUPPORTED:
        try {
          return this.resolve(record, db, strategy);
        } catch (error) {
          return this.fail(record, errorMessage(error));
        }
    }
  }

  private resolve(record: RuleRecord, db: SyntaxDatabase, strategy: TranslationStrategy): RuleRecord {
    if (!STRATEGIES.has(strategy)) {
      throw new TranslationError(`unknown translation strategy '${String(strategy)}'`);
    }

    const pattern = record.matchedPattern === undefined ? undefined : db.patternById(record.matchedPattern);
    if (record.matchedPattern !== undefined && !pattern) {
      throw new TranslationError(`matched pattern '${record.matchedPattern}' is not in the syntax database`);
    }
    if (record.validationStatus === ValidationStatus.NEEDS_TRANSLATION && !pattern?.template) {
      throw new TranslationError('rule needs translation but its pattern has no template');
    }

    if (pattern?.template) {
      const text = record.rawRule.trim();
      const captures = pattern.matcher.match(text);
      if (!captures) {
        throw new TranslationError(`pattern '${pattern.id}' no longer matches the rule text`);
      }
      return {
        ...record,
        rawRule: pattern.template.apply(captures),
        translationStatus: TranslationStatus.TRANSLATED,
        inclusion: Inclusion.INCLUDE,
        notes: `Translated from '${text}' using ${pattern.id}`
      };
    }

    return this.fallback(record, db, strategy);
  }

  /**
   * Apply the strategy to a rule that has no translation template
   */
  private fallback(record: RuleRecord, db: SyntaxDatabase, strategy: TranslationStrategy): RuleRecord {
    const failed = { ...record, translationStatus: TranslationStatus.FAILED };

    switch (strategy) {
      // Nothing to rewrite with, so rewrite keeps the rule visible as a comment
      case TranslationStrategy.COMMENT_OUT:
      case TranslationStrategy.REWRITE: {
        const original = record.originalLine.trim() || record.rawRule.trim();
        const reason = record.notes ?? 'No specific reason.';
        return {
          ...failed,
          rawRule: `${db.commentMarker} UNTRANSLATED (${record.validationStatus}): ${original} # Reason: ${reason}`,
          inclusion: Inclusion.DISABLED
        };
      }

      case TranslationStrategy.PASSTHROUGH:
        return { ...failed, inclusion: Inclusion.INCLUDE };

      case TranslationStrategy.DROP:
        return { ...failed, inclusion: Inclusion.EXCLUDE };
    }
  }

  private fail(record: RuleRecord, message: string): RuleRecord {
    return {
      ...record,
      translationStatus: TranslationStatus.ERROR,
      processingError: message,
      errorKind: 'translation',
      inclusion: Inclusion.EXCLUDE
    };
  }
}
