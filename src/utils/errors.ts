/**
 * Error types and codes for binpick.
 * Every error raised by the library extends BinpickError.
 */

/**
 * Base error class for all binpick errors.
 */
export class BinpickError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BinpickError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends BinpickError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S003
 */
export class SystemError extends BinpickError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Asset pattern errors.
 * Error code: D001
 */
export class DetectionError extends BinpickError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DetectionError';
  }
}

/**
 * Requested platform or architecture has no rule.
 * Raised when a detector is built, before any asset name is looked at.
 */
export class UnsupportedTargetError extends BinpickError {
  constructor(
    public readonly kind: 'os' | 'arch',
    public readonly target: string
  ) {
    super(
      kind === 'os' ? ErrorCodes.UNSUPPORTED_OS : ErrorCodes.UNSUPPORTED_ARCH,
      `unsupported target ${kind === 'os' ? 'OS' : 'arch'}: ${target}`,
      { kind, target }
    );
    this.name = 'UnsupportedTargetError';
  }
}

/**
 * GitHub API errors.
 * Error codes: G001-G003
 */
export class GitHubError extends BinpickError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GitHubError';
  }
}

export const ErrorCodes = {
  // Target errors (T001-T002)
  UNSUPPORTED_OS: 'T001',
  UNSUPPORTED_ARCH: 'T002',

  // Detection errors (D001); ambiguity and misses are results, not errors
  INVALID_PATTERN: 'D001',

  // Config errors (C001-C003)
  CONFIG_LOAD: 'C001',
  CONFIG_INVALID: 'C002',
  UNKNOWN_TOOL: 'C003',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  INVALID_SCHEMA: 'S003',

  // GitHub errors (G001-G003)
  RELEASE_NOT_FOUND: 'G001',
  RATE_LIMITED: 'G002',
  API_ERROR: 'G003',
} as const;

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
