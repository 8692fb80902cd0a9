/**
 * Rule Validator - Classifies one rule record against the syntax database
 */

import { RuleKind, ValidationStatus } from './types';
import type { RuleRecord, SyntaxPattern } from './types';
import type { SyntaxDatabase } from './syntax-database';
import { errorMessage } from './errors';

// ##, #@#, #?#, #@?#, #$#, #@$#, #%#, #@%#
const COSMETIC_SEPARATOR = /#@?[?$%]?#/;
const REGEX_RULE = /^\/(.+)\/(?:\$([^/]*))?$/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export class RuleValidator {
  /**
   * Classify a record. Never throws: structural problems and unexpected
   * failures become ValidationStatus.ERROR with a diagnostic.
   *
   * The first pattern that matches, in priority order, decides the outcome.
   */
  validate(record: RuleRecord, db: SyntaxDatabase): RuleRecord {
    try {
      if (record.kind !== RuleKind.RULE) {
        return this.fail(record, `record kind '${record.kind}' is not a filter rule`);
      }

      const text = record.rawRule.trim();
      const problem = this.checkStructure(text);
      if (problem) {
        return this.fail(record, problem);
      }

      const pattern = this.firstMatch(text, db.matchersFor(record.kind));
      if (!pattern) {
        return this.classify(record, ValidationStatus.UNSUPPORTED, undefined, 'Does not match any known rule syntax');
      }

      if (db.isCanonical(pattern)) {
        return this.classify(record, ValidationStatus.VALID, pattern, `Matches ${pattern.id}`);
      }

      if (pattern.template) {
        return this.classify(
          record,
          ValidationStatus.NEEDS_TRANSLATION,
          pattern,
          this.describe(`Translatable ${pattern.dialect} ${pattern.category} syntax (${pattern.id})`, pattern)
        );
      }

      return this.classify(
        record,
        ValidationStatus.UNSUPPORTED,
        pattern,
        this.describe(`No translation for ${pattern.dialect} ${pattern.category} syntax (${pattern.id})`, pattern)
      );
    } catch (error) {
      return this.fail(record, `validation failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Structural pre-checks. Returns a diagnostic, or null when the rule
   * text is well-formed enough to classify.
   */
  checkStructure(text: string): string | null {
    if (text === '') {
      return 'empty rule body';
    }

    if (CONTROL_CHARS.test(text)) {
      return 'rule contains control characters';
    }

    if (text === '@@') {
      return 'exception rule has an empty pattern body';
    }

    const separator = COSMETIC_SEPARATOR.exec(text);
    if (separator) {
      const selector = text.slice(separator.index + separator[0].length).trim();
      if (selector === '') {
        return `cosmetic rule has an empty selector after '${separator[0]}'`;
      }
      return null;
    }

    let options: string | undefined;
    const regexRule = REGEX_RULE.exec(text);
    if (regexRule) {
      try {
        new RegExp(regexRule[1]);
      } catch (error) {
        return `invalid regular expression: ${errorMessage(error)}`;
      }
      options = regexRule[2];
    } else {
      const optionsStart = text.lastIndexOf('$');
      options = optionsStart === -1 ? undefined : text.slice(optionsStart + 1);
    }

    if (options !== undefined) {
      if (options.trim() === '') {
        return 'rule has an empty option list';
      }
      if (options.split(',').some(option => option.trim() === '')) {
        return `empty option in option list '${options}'`;
      }
    }

    return null;
  }

  private firstMatch(text: string, patterns: readonly SyntaxPattern[]): SyntaxPattern | undefined {
    return patterns.find(pattern => pattern.matcher.match(text) !== null);
  }

  private describe(summary: string, pattern: SyntaxPattern): string {
    return pattern.notes ? `${summary}: ${pattern.notes}` : summary;
  }

  private classify(
    record: RuleRecord,
    status: ValidationStatus,
    pattern: SyntaxPattern | undefined,
    notes: string
  ): RuleRecord {
    return {
      ...record,
      validationStatus: status,
      processingError: undefined,
      errorKind: undefined,
      matchedPattern: pattern?.id,
      notes
    };
  }

  private fail(record: RuleRecord, message: string): RuleRecord {
    return {
      ...record,
      validationStatus: ValidationStatus.ERROR,
      processingError: message,
      errorKind: 'validation',
      matchedPattern: undefined,
      notes: undefined
    };
  }
}
