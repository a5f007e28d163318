/**
 * Custom error classes for docgov with helpful user-facing messages
 */

export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_CONFIG'
  | 'INVALID_SNAPSHOT'
  | 'DIFF_FAILED'
  | 'COLLECTION_FAILED'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'UNKNOWN_ERROR';

/** Process exit code for fatal errors (1 is reserved for gate failures) */
export const FATAL_EXIT_CODE = 2;

/**
 * Base error class for docgov with code and suggestion
 */
export class GovernanceError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'GovernanceError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display with color support
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    let output = `${red}Error [${this.code}]:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

/** Malformed or missing policy pack / input file. Fatal before any analysis. */
export class ConfigError extends GovernanceError {
  constructor(message: string, code: ErrorCode = 'INVALID_CONFIG', suggestion?: string) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
  }
}

/** A revision reference the version-control collaborator cannot resolve. */
export class DiffError extends GovernanceError {
  constructor(message: string, public ref?: string, suggestion?: string) {
    super(message, 'DIFF_FAILED', suggestion);
    this.name = 'DiffError';
  }
}

/** One gap-signal source was unreachable. Caught at the collector boundary. */
export class CollectionFailureError extends GovernanceError {
  constructor(message: string, suggestion?: string) {
    super(message, 'COLLECTION_FAILED', suggestion);
    this.name = 'CollectionFailure';
  }
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  policyPackNotFound(path: string): ConfigError {
    return new ConfigError(
      `Policy pack not found at ${path}`,
      'CONFIG_NOT_FOUND',
      `Run 'docgov init' to write a default policy pack, or pass --policy-pack <path>.`
    );
  },

  invalidPolicyPack(path: string, details: string): ConfigError {
    return new ConfigError(
      `Invalid policy pack at ${path}: ${details}`,
      'INVALID_CONFIG',
      `Check the policy pack against the keys documented in 'docgov init --help'.`
    );
  },

  snapshotNotFound(path: string): ConfigError {
    return new ConfigError(
      `KPI snapshot not found at ${path}`,
      'CONFIG_NOT_FOUND',
      `Run 'docgov kpi snapshot' to produce one.`
    );
  },

  invalidSnapshot(path: string, details: string): ConfigError {
    return new ConfigError(
      `Invalid KPI snapshot at ${path}: ${details}`,
      'INVALID_SNAPSHOT',
      `A snapshot needs a numeric qualityScore; document and gap counts must be non-negative numbers.`
    );
  },

  unresolvableRef(ref: string, reason?: string): DiffError {
    return new DiffError(
      `Cannot resolve revision '${ref}'${reason ? `: ${reason}` : ''}`,
      ref,
      `Check that the ref exists locally. In CI, fetch enough history (e.g. fetch-depth: 0).`
    );
  },

  diffFailed(base: string, head: string, reason: string): DiffError {
    return new DiffError(
      `git diff ${base}...${head} failed: ${reason}`,
      undefined,
      `Run the command from inside the repository or pass --repo <path>.`
    );
  },

  collectionFailed(source: string, reason: string): CollectionFailureError {
    return new CollectionFailureError(`${source} collection failed: ${reason}`);
  },

  fileReadError(path: string, reason?: string): GovernanceError {
    return new GovernanceError(
      `Failed to read file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_READ_ERROR',
      `Check that the file exists and you have read permissions.`
    );
  },

  fileWriteError(path: string, reason?: string): GovernanceError {
    return new GovernanceError(
      `Failed to write file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_WRITE_ERROR',
      `Check that you have write permissions for the directory.`
    );
  },

  unknown(error: unknown): GovernanceError {
    const message = error instanceof Error ? error.message : String(error);
    return new GovernanceError(`An unexpected error occurred: ${message}`, 'UNKNOWN_ERROR');
  },
};

/**
 * Type guard to check if an error is a GovernanceError
 */
export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isGovernanceError(error)) {
    return error.format(useColor);
  }
  return errors.unknown(error).format(useColor);
}

/**
 * Exit code for an error that escaped a command. Gate failures are verdicts,
 * not errors, so everything that reaches here is fatal.
 */
export function exitCodeFor(_error: unknown): number {
  return FATAL_EXIT_CODE;
}

/**
 * Print a fatal error and set the fatal exit code.
 * Commands return after calling this; nothing else is written.
 */
export function handleError(error: unknown): void {
  console.error(formatError(error, process.stderr.isTTY === true));
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = exitCodeFor(error);
}
