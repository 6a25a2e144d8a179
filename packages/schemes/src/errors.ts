/**
 * Error Types
 *
 * The schemes themselves never throw: a capability or algebra that breaks
 * its contract produces a wrong result or diverges. These errors come from
 * the bundled capabilities (invalid input) and from the law checker.
 */

/**
 * Base class for all errors raised by this package.
 */
export class RefoldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RefoldError";
  }
}

/**
 * Thrown when a value is outside the domain of a bundled capability,
 * e.g. projecting a negative number as a natural.
 */
export class PreconditionError extends RefoldError {
  constructor(
    message: string,
    public readonly value: unknown,
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}

/**
 * Thrown by `assertLaws` on the first counterexample.
 */
export class LawViolationError extends RefoldError {
  constructor(
    public readonly law: string,
    public readonly counterexample: unknown,
    public readonly iteration: number,
  ) {
    super(`Law "${law}" failed at iteration ${iteration}`);
    this.name = "LawViolationError";
  }
}

/**
 * Thrown when a config file or `REFOLD_*` variable holds a value of the
 * wrong type.
 */
export class ConfigError extends RefoldError {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(`${message} (from ${source})`);
    this.name = "ConfigError";
  }
}
