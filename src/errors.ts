/**
 * Harness error codes and classes
 *
 * Only failures of the harness itself are thrown: a bad configuration or a
 * failed build of the target. Anything that goes wrong while talking to the
 * target is reported as an `Outcome` variant instead (see probe.ts), so a
 * misbehaving server can never abort a run.
 *
 * Error Code Ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Build errors
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  /** Invalid CLI flag or config file */
  CONFIG_ERROR: 1001,

  /** The target build command failed or could not start */
  BUILD_ERROR: 2001,
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Maps error codes to their string names
 */
export const ErrorCodeName: Record<ErrorCodeType, string> = {
  [ErrorCode.CONFIG_ERROR]: 'CONFIG_ERROR',
  [ErrorCode.BUILD_ERROR]: 'BUILD_ERROR',
};

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for all errors raised by the harness.
 *
 * @example
 * ```typescript
 * try {
 *   const options = resolveOptions(flags, loadConfigFile(path));
 * } catch (error) {
 *   if (error instanceof HarnessError) {
 *     console.error(`[${error.codeName}] ${error.message}`);
 *   }
 * }
 * ```
 */
export class HarnessError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly codeName: string
  ) {
    super(message);
    this.name = 'HarnessError';
  }

  toJSON(): { name: string; message: string; code: number; codeName: string } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: this.codeName,
    };
  }
}

/**
 * Thrown when CLI flags or a config file carry an invalid value.
 *
 * Error Code: 1001 (CONFIG_ERROR)
 */
export class ConfigError extends HarnessError {
  /**
   * @param source - Where the bad value came from (a file path or `--flag`)
   */
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message, ErrorCode.CONFIG_ERROR, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the target executable could not be built.
 *
 * Error Code: 2001 (BUILD_ERROR)
 */
export class BuildError extends HarnessError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly output: string
  ) {
    super(message, ErrorCode.BUILD_ERROR, 'BUILD_ERROR');
    this.name = 'BuildError';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard to check if an error carries a specific harness error code
 */
export function isErrorCode(error: unknown, code: ErrorCodeType): error is HarnessError {
  return error instanceof HarnessError && error.code === code;
}

/**
 * Renders any thrown value as a one-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
