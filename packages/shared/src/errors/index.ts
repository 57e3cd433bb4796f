/**
 * Protocol Error Taxonomy
 *
 * Every abort in the ledger is one of these classes. A thrown error inside
 * a transaction rolls back every participant of that transaction.
 */

export type ProtocolErrorCode =
  | "PRECONDITION_VIOLATION"
  | "REENTRANCY_VIOLATION"
  | "ORACLE_FAILURE"
  | "AUTHORIZATION_FAILURE"
  | "RANGE_VIOLATION"
  | "ARITHMETIC_FAILURE";

export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

// ============================================
// PRECONDITION VIOLATIONS
// ============================================

export class PreconditionViolationError extends ProtocolError {
  constructor(message: string, code: ProtocolErrorCode = "PRECONDITION_VIOLATION") {
    super(message, code);
    this.name = "PreconditionViolationError";
  }
}

export class ReentrancyViolationError extends PreconditionViolationError {
  constructor(
    message: string,
    public readonly blockNumber: bigint
  ) {
    super(message, "REENTRANCY_VIOLATION");
    this.name = "ReentrancyViolationError";
  }
}

export class OracleFailureError extends PreconditionViolationError {
  constructor(
    message: string,
    public readonly underlying?: Error
  ) {
    super(message, "ORACLE_FAILURE");
    this.name = "OracleFailureError";
  }
}

// ============================================
// AUTHORIZATION
// ============================================

export class AuthorizationError extends ProtocolError {
  constructor(
    message: string,
    public readonly caller: string
  ) {
    super(message, "AUTHORIZATION_FAILURE");
    this.name = "AuthorizationError";
  }
}

// ============================================
// GOVERNANCE BOUNDS
// ============================================

export class RangeViolationError extends ProtocolError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value: string
  ) {
    super(message, "RANGE_VIOLATION");
    this.name = "RangeViolationError";
  }
}

// ============================================
// ARITHMETIC
// ============================================

export class ArithmeticError extends ProtocolError {
  constructor(
    message: string,
    public readonly operation: "add" | "sub" | "mul" | "div"
  ) {
    super(message, "ARITHMETIC_FAILURE");
    this.name = "ArithmeticError";
  }
}

// ============================================
// HELPERS
// ============================================

/**
 * Throws a PreconditionViolationError unless the condition holds
 */
export function ensure(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionViolationError(message);
  }
}
