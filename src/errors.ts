/**
 * Error types
 *
 * Only failures that stop a run are thrown. Per-rule problems are recorded
 * on the RuleRecord as a status plus diagnostic instead.
 */

export class UnifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The syntax pattern database could not be built */
export class LoadError extends UnifierError {}

/** The configuration file is unreadable or invalid */
export class ConfigError extends UnifierError {}

/** A translation template could not be applied to a rule */
export class TranslationError extends UnifierError {}

/** The worker pool could not start or lost a worker it could not replace */
export class WorkerPoolError extends UnifierError {}

/** The output list could not be written */
export class GenerationError extends UnifierError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
