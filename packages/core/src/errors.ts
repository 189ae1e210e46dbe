/**
 * Error Types
 *
 * Typed errors for conditions the pipeline cannot recover from.
 * Malformed program lines are not errors: the interpreter skips and logs them.
 */

/**
 * Base class for pathview errors with a stable code
 */
export abstract class PathviewError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * The program source (or a config file) is missing or unreadable.
 * No partial geometry is produced.
 */
export class InputReadError extends PathviewError {
  readonly code = 'INPUT_UNREADABLE';
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Failed to read file: ${path}${reason}`, { cause });
    this.path = path;
  }
}

/**
 * Viewer configuration failed validation
 */
export class ConfigError extends PathviewError {
  readonly code = 'CONFIG_INVALID';
  readonly issues: string[];

  constructor(message = 'Invalid viewer configuration', issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}
