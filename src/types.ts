/**
 * Core type definitions for filter-unifier
 */

// ============================================================================
// Rule Record Types
// ============================================================================

export enum RuleKind {
  RULE = 'rule',
  COMMENT = 'comment',
  METADATA = 'metadata'
}

export enum ValidationStatus {
  UNKNOWN = 'unknown',
  VALID = 'valid',
  NEEDS_TRANSLATION = 'needs_translation',
  UNSUPPORTED = 'unsupported',
  ERROR = 'error'
}

export enum TranslationStatus {
  NOT_APPLICABLE = 'not_applicable',
  TRANSLATED = 'translated',
  FAILED = 'failed',
  ERROR = 'error'
}

export enum TranslationStrategy {
  REWRITE = 'rewrite',
  COMMENT_OUT = 'comment_out_untranslatable',
  DROP = 'drop',
  PASSTHROUGH = 'passthrough'
}

/**
 * Whether the list generator writes a record.
 * DISABLED records are written as comments in their own section.
 */
export enum Inclusion {
  PENDING = 'pending',
  INCLUDE = 'include',
  DISABLED = 'disabled',
  EXCLUDE = 'exclude'
}

/** Which stage produced a record's processingError */
export type ProcessingErrorKind = 'validation' | 'translation' | 'worker';

export interface RuleRecord {
  /** Rule body without list decoration; canonical text once translated */
  rawRule: string;
  listName: string;
  lineNumber: number;
  originalLine: string;
  kind: RuleKind;
  validationStatus: ValidationStatus;
  translationStatus: TranslationStatus;
  /** Present iff one of the statuses is ERROR */
  processingError?: string;
  errorKind?: ProcessingErrorKind;
  /** Id of the first pattern that matched during validation */
  matchedPattern?: string;
  notes?: string;
  inclusion: Inclusion;
  metadata?: {
    key: string;
    value: string;
  };
}

// ============================================================================
// Syntax Pattern Types
// ============================================================================

export type MatcherType = 'regex' | 'token' | 'prefix' | 'glob';

export interface MatchCaptures {
  /** Capture groups in order; undefined for groups that did not participate */
  groups: Array<string | undefined>;
  named: Record<string, string | undefined>;
}

export interface Matcher {
  type: MatcherType;
  expression: string;
  match(text: string): MatchCaptures | null;
}

export interface Template {
  source: string;
  apply(captures: MatchCaptures): string;
}

export interface SyntaxPattern {
  /** `<dialect>/<name>`, unique within a database */
  id: string;
  name: string;
  dialect: string;
  category: string;
  kinds: readonly RuleKind[];
  matcher: Matcher;
  template?: Template;
  /** Effective rank: explicit priority, or declaration order */
  priority: number;
  /** Declaration index across the whole load set */
  order: number;
  notes?: string;
  sourceFile: string;
}

export interface SyntaxDatabaseOptions {
  canonicalDialect: string;
  commentMarker: string;
}

// ============================================================================
// Processing Types
// ============================================================================

export interface ProgressEvent {
  completed: number;
  total: number;
  elapsedMs: number;
}

export type ExecutionMode = 'threads' | 'inline';

// ============================================================================
// Fetching Types
// ============================================================================

export interface FetchedList {
  name: string;
  location: string;
  content: string | null;
  error?: string;
}

// ============================================================================
// Logging Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;      // ISO 8601
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

// ============================================================================
// Pipeline Types
// ============================================================================

export interface RunSummary {
  listsFetched: number;
  listsFailed: string[];
  totalLines: number;
  rules: number;
  validation: Record<ValidationStatus, number>;
  translation: Record<TranslationStatus, number>;
  written: number;
  disabled: number;
  excluded: number;
  duplicates: number;
  outputPath: string;
}
