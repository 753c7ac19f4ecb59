export type StakingErrorCode =
  | "PERMISSION_DENIED"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "ARITHMETIC_OVERFLOW"
  | "INSUFFICIENT_BALANCE"
  | "INVARIANT_VIOLATION";

/**
 * Abort reason of a pool operation. The operation that throws it has left
 * all state untouched; callers retry with corrected arguments.
 */
export class StakingError extends Error {
  constructor(message: string, public readonly code: StakingErrorCode, public readonly details?: unknown) {
    super(message);
    this.name = "StakingError";
  }
}

export class PermissionDeniedError extends StakingError {
  constructor(message = "Caller is not permitted", details?: unknown) {
    super(message, "PERMISSION_DENIED", details);
    this.name = "PermissionDeniedError";
  }
}

export class AlreadyExistsError extends StakingError {
  constructor(message = "Already initialized", details?: unknown) {
    super(message, "ALREADY_EXISTS", details);
    this.name = "AlreadyExistsError";
  }
}

export class NotFoundError extends StakingError {
  constructor(message = "Not initialized", details?: unknown) {
    super(message, "NOT_FOUND", details);
    this.name = "NotFoundError";
  }
}

export class InvalidArgumentError extends StakingError {
  constructor(message = "Invalid argument", details?: unknown) {
    super(message, "INVALID_ARGUMENT", details);
    this.name = "InvalidArgumentError";
  }
}

export class ArithmeticOverflowError extends StakingError {
  constructor(message = "Arithmetic overflow", details?: unknown) {
    super(message, "ARITHMETIC_OVERFLOW", details);
    this.name = "ArithmeticOverflowError";
  }
}

export class InsufficientBalanceError extends StakingError {
  constructor(message = "Insufficient balance", details?: unknown) {
    super(message, "INSUFFICIENT_BALANCE", details);
    this.name = "InsufficientBalanceError";
  }
}

// Raised when an operation would commit with an internal invariant broken,
// e.g. a bearer asset that was neither deposited, burned nor destroyed.
export class InvariantViolationError extends StakingError {
  constructor(message: string, details?: unknown) {
    super(message, "INVARIANT_VIOLATION", details);
    this.name = "InvariantViolationError";
  }
}
