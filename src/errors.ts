/**
 * Custom error classes for sentiment-state-classifier.
 *
 * All errors thrown by this library are instances of `ClassifierError`
 * (or one of its subclasses) so consumers can distinguish them from
 * unrelated runtime errors with a single `instanceof` check. Every one of
 * them is raised before the classifier mutates any state.
 */

/**
 * Base error class for all errors emitted by sentiment-state-classifier.
 *
 * @example
 * ```ts
 * try {
 *   classifier.classifySentiment("alice", tokens);
 * } catch (err) {
 *   if (err instanceof ClassifierError) {
 *     // library-specific error handling
 *   }
 * }
 * ```
 */
export class ClassifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClassifierError";
    // Restore prototype chain in environments that transpile ES6 classes.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Identifies which input constraint a {@link ValidationError} reports. */
export type ValidationConstraint =
  | "empty-input"
  | "input-too-long"
  | "vocabulary-empty"
  | "token-out-of-range"
  | "length-mismatch"
  | "batch-too-large"
  | "value-out-of-range"
  | "invalid-snapshot";

/**
 * Thrown when a call's input breaks a numeric-range or shape constraint.
 *
 * @example
 * ```ts
 * try {
 *   classifier.setVocabulary("trainer", batch);
 * } catch (err) {
 *   if (err instanceof ValidationError && err.constraint === "length-mismatch") {
 *     console.error(err.issues);
 *   }
 * }
 * ```
 */
export class ValidationError extends ClassifierError {
  /** Machine-readable constraint code. */
  readonly constraint: ValidationConstraint;
  /** One human-readable line per failed check. */
  readonly issues: string[];

  constructor(constraint: ValidationConstraint, issues: string[]) {
    super(`Validation failed (${constraint}): ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.constraint = constraint;
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a caller lacks the role a mutating entry point requires. */
export class PermissionError extends ClassifierError {
  readonly role: string;
  readonly account: string;

  constructor(role: string, account: string) {
    super(`Account "${account}" is missing role "${role}"`);
    this.name = "PermissionError";
    this.role = role;
    this.account = account;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown by guarded entry points while the system is paused. */
export class SuspendedError extends ClassifierError {
  constructor(operation: string) {
    super(`Cannot run ${operation} while the classifier is paused`);
    this.name = "SuspendedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by the fixed-point helpers when a result leaves the safe-integer
 * range. Validated inputs keep every intermediate value far from that range.
 */
export class ArithmeticOverflowError extends ClassifierError {
  constructor(operation: string) {
    super(`Fixed-point ${operation} left the safe integer range`);
    this.name = "ArithmeticOverflowError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
