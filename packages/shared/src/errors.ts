/**
 * Tessera Error Hierarchy
 *
 * Structured error classes shared by every Tessera package.
 * All errors extend TesseraError which provides:
 * - Unique error codes for programmatic handling
 * - A `recoverable` flag separating programming errors from conditions
 *   the engine absorbs and reports
 * - Rich metadata for debugging
 * - Serialization support for devtools and logs
 *
 * @example Throwing errors
 * ```typescript
 * throw new TypeMismatchError([0, 1], 'state:number', 'state:string');
 * throw ReentrantUpdateError.overflow(10, [['0'], ['0']]);
 * ```
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   engine.runPass(App);
 * } catch (error) {
 *   if (isTypeMismatchError(error)) {
 *     // A call-site changed its hook type between passes
 *   } else if (isTesseraError(error)) {
 *     console.log(error.code, error.toJSON());
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., HOOK_TYPE_MISMATCH, ATOM_STALE_HANDLE)
 */
export type TesseraErrorCode =
  // Hooks / state store
  | "HOOK_TYPE_MISMATCH"
  // Atoms
  | "ATOM_STALE_HANDLE"
  // Scheduler
  | "SCHEDULER_REENTRANT_OVERFLOW"
  // Identity
  | "IDENTITY_DRIFT"
  | "IDENTITY_SCOPE_UNBALANCED"
  // Validation
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_CONSTRAINT"
  // State/Lifecycle
  | "STATE_INVALID"
  | "STATE_TRANSITION"
  | "STATE_DISPOSED"
  // Context
  | "CONTEXT_NOT_FOUND"
  | "CONTEXT_INVALID"
  // Reactivity
  | "REACTIVITY_CIRCULAR"
  | "REACTIVITY_DISPOSED";

/**
 * Serialized error format
 */
export interface SerializedTesseraError {
  name: string;
  code: TesseraErrorCode;
  message: string;
  recoverable: boolean;
  details?: Record<string, unknown>;
  cause?: SerializedTesseraError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all Tessera errors.
 * Provides consistent structure, serialization, and type identification.
 */
export class TesseraError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: TesseraErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  /**
   * Recoverable errors are absorbed by the engine and reported as diagnostics.
   * Everything else aborts the current pass.
   */
  readonly recoverable: boolean;

  constructor(
    code: TesseraErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
    recoverable = false,
  ) {
    super(message, { cause });
    this.name = "TesseraError";
    this.code = code;
    this.details = details;
    this.recoverable = recoverable;

    Object.setPrototypeOf(this, new.target.prototype);

    // V8 only
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor?: Function) => void;
    };
    if (typeof ErrorWithCapture.captureStackTrace === "function") {
      ErrorWithCapture.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error (JSON-safe)
   */
  toJSON(): SerializedTesseraError {
    const serialized: SerializedTesseraError = {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause) {
      if (this.cause instanceof TesseraError) {
        serialized.cause = this.cause.toJSON();
      } else if (this.cause instanceof Error) {
        serialized.cause = {
          message: this.cause.message,
          name: this.cause.name,
        };
      }
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedTesseraError): TesseraError {
    let cause: Error | undefined;
    if (json.cause) {
      cause =
        "code" in json.cause
          ? TesseraError.fromJSON(json.cause)
          : new Error(json.cause.message);
    }

    return new TesseraError(json.code, json.message, json.details, cause, json.recoverable);
  }
}

// =============================================================================
// Hook / State Store Errors
// =============================================================================

/**
 * Thrown when the state stored at a call-site was created by a different kind
 * of hook than the one now reading it. This is a programming error (usually a
 * conditional hook call shifting identities) and is never retried.
 *
 * @example
 * ```typescript
 * throw new TypeMismatchError([0, 1], 'state:number', 'state:string');
 * ```
 */
export class TypeMismatchError extends TesseraError {
  /** Dotted identity of the offending call-site */
  readonly identity: string;

  /** Tag of the value already stored */
  readonly storedTag: string;

  /** Tag the caller asked for */
  readonly requestedTag: string;

  constructor(identity: readonly number[], storedTag: string, requestedTag: string) {
    const key = identity.length === 0 ? "<root>" : identity.join(".");
    super(
      "HOOK_TYPE_MISMATCH",
      `Hook type mismatch at ${key}: stored '${storedTag}', requested '${requestedTag}'. ` +
        "Hooks must be called in the same order on every render.",
      { identity: key, storedTag, requestedTag },
    );
    this.name = "TypeMismatchError";
    this.identity = key;
    this.storedTag = storedTag;
    this.requestedTag = requestedTag;
  }
}

// =============================================================================
// Atom Errors
// =============================================================================

/**
 * Describes a write to an atom or state cell that no longer exists.
 * Recoverable: the write is dropped and this error travels inside a
 * diagnostic instead of being thrown.
 */
export class StaleHandleError extends TesseraError {
  /** Debug label of the disposed target */
  readonly target: string;

  constructor(target: string, message?: string) {
    super(
      "ATOM_STALE_HANDLE",
      message ?? `Write to disposed '${target}' was ignored`,
      { target },
      undefined,
      true,
    );
    this.name = "StaleHandleError";
    this.target = target;
  }
}

// =============================================================================
// Scheduler Errors
// =============================================================================

/**
 * Thrown when writes made while flushing keep scheduling renders past the
 * configured round limit.
 */
export class ReentrantUpdateError extends TesseraError {
  /** Component identities rendered in each round, oldest first */
  readonly chain: string[][];

  constructor(message: string, chain: string[][], details: Record<string, unknown> = {}) {
    super("SCHEDULER_REENTRANT_OVERFLOW", message, { ...details, chain });
    this.name = "ReentrantUpdateError";
    this.chain = chain;
  }

  static overflow(maxRounds: number, chain: string[][]): ReentrantUpdateError {
    const last = chain[chain.length - 1] ?? [];
    return new ReentrantUpdateError(
      `Too many reentrant updates: still scheduling renders after ${maxRounds} rounds ` +
        `(last round: ${last.map((key) => key || "<root>").join(", ") || "none"})`,
      chain,
      { maxRounds },
    );
  }
}

// =============================================================================
// Identity Errors
// =============================================================================

/**
 * Identity allocation problems.
 *
 * `IDENTITY_DRIFT` is recoverable and only ever reported; an unbalanced scope
 * release is a programming error.
 */
export class IdentityError extends TesseraError {
  constructor(
    message: string,
    code: "IDENTITY_DRIFT" | "IDENTITY_SCOPE_UNBALANCED" = "IDENTITY_SCOPE_UNBALANCED",
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details, undefined, code === "IDENTITY_DRIFT");
    this.name = "IdentityError";
  }

  static drift(owner: string, previousSlots: number, currentSlots: number): IdentityError {
    return new IdentityError(
      `Component ${owner || "<root>"} rendered ${currentSlots} hook slots, previously ${previousSlots}. ` +
        "State after the first changed call-site may be bound to the wrong hook.",
      "IDENTITY_DRIFT",
      { owner, previousSlots, currentSlots },
    );
  }

  static unbalanced(expected: string, received: string): IdentityError {
    return new IdentityError(
      `Scope ${received || "<root>"} released while ${expected || "<root>"} is the innermost scope`,
      "IDENTITY_SCOPE_UNBALANCED",
      { expected, received },
    );
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input or configuration validation fails.
 *
 * @example
 * ```typescript
 * throw new ValidationError('maxReentrantRounds', 'Must be a positive integer');
 * ```
 */
export class ValidationError extends TesseraError {
  /** Field or parameter that failed validation */
  readonly field: string;

  /** Expected type or format (optional) */
  readonly expected?: string;

  /** Actual value received (optional) */
  readonly received?: string;

  constructor(
    field: string,
    message: string,
    options: {
      expected?: string;
      received?: string;
      code?: "VALIDATION_REQUIRED" | "VALIDATION_TYPE" | "VALIDATION_CONSTRAINT";
    } = {},
    cause?: Error,
  ) {
    const code = options.code || "VALIDATION_CONSTRAINT";

    super(
      code,
      message,
      {
        field,
        ...(options.expected && { expected: options.expected }),
        ...(options.received && { received: options.received }),
      },
      cause,
    );
    this.name = "ValidationError";
    this.field = field;
    this.expected = options.expected;
    this.received = options.received;
  }

  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message || `${field} is required`, {
      code: "VALIDATION_REQUIRED",
    });
  }

  static type(field: string, expected: string, received?: string): ValidationError {
    const msg = received
      ? `${field} must be ${expected}, received ${received}`
      : `${field} must be ${expected}`;
    return new ValidationError(field, msg, {
      expected,
      received,
      code: "VALIDATION_TYPE",
    });
  }
}

// =============================================================================
// State/Lifecycle Errors
// =============================================================================

/**
 * Error thrown when an operation is attempted in an invalid state.
 *
 * @example
 * ```typescript
 * throw new StateError('rendering', 'idle', 'runPass() cannot be nested');
 * ```
 */
export class StateError extends TesseraError {
  /** Current state */
  readonly current: string;

  /** Expected/required state (optional) */
  readonly expectedState?: string;

  constructor(
    current: string,
    expectedState: string | undefined,
    message: string,
    code: "STATE_INVALID" | "STATE_TRANSITION" | "STATE_DISPOSED" = "STATE_INVALID",
    cause?: Error,
  ) {
    super(code, message, { current, ...(expectedState && { expectedState }) }, cause);
    this.name = "StateError";
    this.current = current;
    this.expectedState = expectedState;
  }

  static disposed(what: string): StateError {
    return new StateError("disposed", undefined, `${what} has been disposed`, "STATE_DISPOSED");
  }
}

// =============================================================================
// Context Errors
// =============================================================================

/**
 * Error thrown when a hook or logging context is missing.
 */
export class ContextError extends TesseraError {
  constructor(
    message: string,
    code: "CONTEXT_NOT_FOUND" | "CONTEXT_INVALID" = "CONTEXT_NOT_FOUND",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ContextError";
  }

  static notFound(): ContextError {
    return new ContextError(
      "Context not found. Ensure you are running within Context.run().",
      "CONTEXT_NOT_FOUND",
    );
  }

  /**
   * Hook called while no engine is rendering
   */
  static outsideRender(hook: string): ContextError {
    return new ContextError(
      `Invalid hook call: ${hook}() can only be called while a HookEngine is rendering.\n` +
        "Possible causes:\n" +
        "1. Calling a hook outside a component or runPass()\n" +
        "2. Calling a hook from an event handler or effect callback",
      "CONTEXT_NOT_FOUND",
      { hook },
    );
  }
}

// =============================================================================
// Reactivity Errors
// =============================================================================

/**
 * Error thrown for reactivity/reaction system issues.
 */
export class ReactivityError extends TesseraError {
  constructor(
    message: string,
    code: "REACTIVITY_CIRCULAR" | "REACTIVITY_DISPOSED" = "REACTIVITY_CIRCULAR",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ReactivityError";
  }

  static circular(name?: string): ReactivityError {
    return new ReactivityError(
      name
        ? `Circular dependency detected in reaction '${name}'`
        : "Circular dependency detected in reaction",
      "REACTIVITY_CIRCULAR",
      { name },
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isTesseraError(error: unknown): error is TesseraError {
  return error instanceof TesseraError;
}

export function isTypeMismatchError(error: unknown): error is TypeMismatchError {
  return error instanceof TypeMismatchError;
}

export function isStaleHandleError(error: unknown): error is StaleHandleError {
  return error instanceof StaleHandleError;
}

export function isReentrantUpdateError(error: unknown): error is ReentrantUpdateError {
  return error instanceof ReentrantUpdateError;
}

export function isIdentityError(error: unknown): error is IdentityError {
  return error instanceof IdentityError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

export function isReactivityError(error: unknown): error is ReactivityError {
  return error instanceof ReactivityError;
}

/**
 * True for Tessera errors that must abort the current pass. Errors thrown by
 * user code (effects, reaction computations) are reported instead.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof TesseraError && !error.recoverable;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as a Tessera error if it isn't already.
 */
export function wrapAsTesseraError(
  error: unknown,
  defaultCode: TesseraErrorCode = "STATE_INVALID",
): TesseraError {
  if (error instanceof TesseraError) {
    return error;
  }
  const err = ensureError(error);
  return new TesseraError(defaultCode, err.message, {}, err);
}
