/**
 * Error types that must unwind the call stack.
 * Recoverable collaborator outcomes are modelled as result unions instead.
 */

/** Source credentials rejected; ingestion cannot continue for any account. */
export class FatalIngestionError extends Error {
  readonly accountId: string;

  constructor(message: string, accountId: string) {
    super(message);
    this.name = 'FatalIngestionError';
    this.accountId = accountId;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class InvalidTierThresholdsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTierThresholdsError';
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** Normalize anything thrown into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
