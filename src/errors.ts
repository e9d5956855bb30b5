/**
 * Typed error classes for simcheck
 *
 * Library code throws these instead of calling process.exit(), so the example
 * loop and the tests can tell setup failures apart from per-example failures.
 *
 * Only the main entry point (index.ts) should catch these and set exit codes.
 */

/** Exit code for bad arguments and missing dependencies */
export const EXIT_USAGE = 2;

/**
 * Base error class for all simcheck errors
 */
export class HarnessError extends Error {
  constructor(message: string, public code: number = 1) {
    super(message);
    this.name = "HarnessError";
    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Bad or conflicting command-line arguments
 */
export class UsageError extends HarnessError {
  constructor(message: string, code: number = EXIT_USAGE) {
    super(message, code);
    this.name = "UsageError";
  }
}

/**
 * Neither -c nor -l was given (or the list file named no configs)
 */
export class NoInputSpecifiedError extends UsageError {
  constructor(message: string = "must provide -c CONFIG.json or -l LIST.txt") {
    super(message);
    this.name = "NoInputSpecifiedError";
  }
}

/**
 * Both -c and -l were given
 */
export class ConflictingInputsError extends UsageError {
  constructor(message: string = "choose either -c or -l, not both.") {
    super(message);
    this.name = "ConflictingInputsError";
  }
}

/**
 * Invalid settings file (simcheck.config.yaml and friends)
 */
export class ConfigurationError extends HarnessError {
  constructor(message: string, code: number = EXIT_USAGE) {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

/**
 * A tool the harness needs (the parallel launcher) is not installed
 */
export class DependencyMissingError extends HarnessError {
  constructor(message: string, code: number = EXIT_USAGE) {
    super(message, code);
    this.name = "DependencyMissingError";
  }
}

/**
 * The simulation executable is missing or not executable
 */
export class ExecutableNotFoundError extends DependencyMissingError {
  constructor(message: string) {
    super(message);
    this.name = "ExecutableNotFoundError";
  }
}

/**
 * The run directory could not be created or the executable not staged
 */
export class SandboxCreateFailedError extends HarnessError {
  constructor(message: string, code: number = EXIT_USAGE) {
    super(message, code);
    this.name = "SandboxCreateFailedError";
  }
}

/**
 * An example's configuration file does not exist
 */
export class ConfigNotFoundError extends HarnessError {
  constructor(public path: string) {
    super(`config not found: ${path}`);
    this.name = "ConfigNotFoundError";
  }
}

/**
 * An example's configuration is not a JSON object (or its runTime block is not)
 */
export class MalformedConfigError extends HarnessError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedConfigError";
  }
}

/**
 * The patched configuration could not be written
 */
export class PatchWriteFailedError extends HarnessError {
  constructor(message: string) {
    super(message);
    this.name = "PatchWriteFailedError";
  }
}

/**
 * Early exit request (for --help)
 * Not an error per se: execution stops with code 0
 */
export class EarlyExitRequest extends HarnessError {
  constructor(message: string = "", code: number = 0) {
    super(message, code);
    this.name = "EarlyExitRequest";
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
