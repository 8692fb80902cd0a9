/**
 * Unit Processor - Validates then translates a single rule record
 *
 * Shared by the inline runner and by each worker thread. The boundary of
 * `process` is the fault isolation boundary for one record.
 */

import { Inclusion, TranslationStatus, ValidationStatus } from './types';
import type { RuleRecord, TranslationStrategy } from './types';
import type { SyntaxDatabase } from './syntax-database';
import { RuleValidator } from './rule-validator';
import { RuleTranslator } from './rule-translator';
import { errorMessage } from './errors';
import type { RunLogger } from './run-logger';

export class UnitProcessor {
  private validator: RuleValidator;
  private translator: RuleTranslator;

  constructor(
    private db: SyntaxDatabase,
    private strategy: TranslationStrategy,
    private logger?: RunLogger
  ) {
    this.validator = new RuleValidator();
    this.translator = new RuleTranslator();
  }

  process(record: RuleRecord): RuleRecord {
    try {
      const validated = this.validator.validate(record, this.db);
      const result = this.translator.translate(validated, this.db, this.strategy);
      this.trace(result);
      return result;
    } catch (error) {
      const failed = annotateFailure(record, errorMessage(error));
      this.logger?.error('Rule processing failed', {
        list: record.listName,
        line: record.lineNumber,
        error: failed.processingError
      });
      return failed;
    }
  }

  private trace(result: RuleRecord): void {
    if (!this.logger?.isEnabled('debug')) {
      return;
    }
    this.logger.debug('Rule processed', {
      list: result.listName,
      line: result.lineNumber,
      validation: result.validationStatus,
      translation: result.translationStatus,
      pattern: result.matchedPattern,
      error: result.processingError
    });
  }
}

/**
 * Mark the original record as failed by an unexpected error
 */
export function annotateFailure(record: RuleRecord, message: string): RuleRecord {
  return {
    ...record,
    validationStatus: ValidationStatus.ERROR,
    translationStatus: TranslationStatus.ERROR,
    processingError: message || 'unknown worker failure',
    errorKind: 'worker',
    inclusion: Inclusion.EXCLUDE
  };
}
