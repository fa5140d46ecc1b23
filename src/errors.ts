/**
 * Error handling for the pool engine
 */

export enum ErrorCodes {
  // Pool errors (1xx)
  NO_LIQUIDITY = 100,
  INSUFFICIENT_LIQUIDITY = 101,
  INSUFFICIENT_BALANCE = 102,
  RATIO_MISMATCH = 103,

  // Trade errors (2xx)
  VALIDATION = 200,
  ZERO_OUTPUT = 201,

  // Transfer errors (3xx)
  TRANSFER_FAILED = 300,

  // Guard errors (4xx)
  REENTRANCY = 400,
  INVALID_STATE = 401,
  INVARIANT_VIOLATION = 402,

  // Math errors (5xx)
  ARITHMETIC = 500,
}

export class AmmError extends Error {
  readonly code: ErrorCodes;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodes,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'AmmError';
    this.code = code;
    this.details = details;
  }
}

/** Zero, negative or empty input */
export class ValidationError extends AmmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.VALIDATION, message, details);
    this.name = 'ValidationError';
  }

  static nonPositive(field: string, value: bigint): ValidationError {
    return new ValidationError(`${field} must be positive, got ${value}`, {
      field,
      value: value.toString(),
    });
  }
}

/** Deposit into an active pool at a ratio other than the current reserves */
export class RatioMismatchError extends AmmError {
  constructor(amountA: bigint, amountB: bigint, reserveA: bigint, reserveB: bigint) {
    super(
      ErrorCodes.RATIO_MISMATCH,
      `Ratio mismatch: ${amountA}:${amountB} does not match reserves ${reserveA}:${reserveB}`,
      {
        amountA: amountA.toString(),
        amountB: amountB.toString(),
        reserveA: reserveA.toString(),
        reserveB: reserveB.toString(),
      }
    );
    this.name = 'RatioMismatchError';
  }
}

/** A deposit that would mint zero shares */
export class InsufficientLiquidityError extends AmmError {
  constructor(amountA: bigint, totalShares: bigint, reserveA: bigint) {
    super(
      ErrorCodes.INSUFFICIENT_LIQUIDITY,
      `Insufficient liquidity minted: ${amountA} of A against ${totalShares} shares over reserve ${reserveA}`,
      {
        amountA: amountA.toString(),
        totalShares: totalShares.toString(),
        reserveA: reserveA.toString(),
      }
    );
    this.name = 'InsufficientLiquidityError';
  }
}

export class InsufficientBalanceError extends AmmError {
  constructor(holder: string, required: bigint, available: bigint) {
    super(
      ErrorCodes.INSUFFICIENT_BALANCE,
      `Insufficient balance for ${holder}: required ${required}, available ${available}`,
      { holder, required: required.toString(), available: available.toString() }
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class NoLiquidityError extends AmmError {
  constructor(reserveIn: bigint, reserveOut: bigint) {
    super(
      ErrorCodes.NO_LIQUIDITY,
      `No liquidity: reserves ${reserveIn}/${reserveOut}`,
      { reserveIn: reserveIn.toString(), reserveOut: reserveOut.toString() }
    );
    this.name = 'NoLiquidityError';
  }
}

export class ZeroOutputError extends AmmError {
  constructor(amountIn: bigint, reserveIn: bigint, reserveOut: bigint) {
    super(
      ErrorCodes.ZERO_OUTPUT,
      `Swap of ${amountIn} yields no output against reserves ${reserveIn}/${reserveOut}`,
      {
        amountIn: amountIn.toString(),
        reserveIn: reserveIn.toString(),
        reserveOut: reserveOut.toString(),
      }
    );
    this.name = 'ZeroOutputError';
  }
}

/** Overflow, underflow or division by zero */
export class ArithmeticError extends AmmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ARITHMETIC, message, details);
    this.name = 'ArithmeticError';
  }

  static overflow(operation: string, a: bigint, b: bigint): ArithmeticError {
    return new ArithmeticError(`Overflow in ${operation}: ${a} and ${b}`, {
      operation,
      a: a.toString(),
      b: b.toString(),
    });
  }

  static underflow(operation: string, a: bigint, b: bigint): ArithmeticError {
    return new ArithmeticError(`Underflow in ${operation}: ${a} and ${b}`, {
      operation,
      a: a.toString(),
      b: b.toString(),
    });
  }

  static divisionByZero(numerator: bigint): ArithmeticError {
    return new ArithmeticError(`Division by zero: ${numerator} / 0`, {
      numerator: numerator.toString(),
    });
  }
}

/** The ledger collaborator rejected a transfer */
export class TransferFailure extends AmmError {
  constructor(
    asset: string,
    direction: 'in' | 'out',
    account: string,
    amount: bigint,
    reason: string,
    options?: ErrorOptions
  ) {
    super(
      ErrorCodes.TRANSFER_FAILED,
      `Transfer ${direction} of ${amount} ${asset} for ${account} failed: ${reason}`,
      { asset, direction, account, amount: amount.toString(), reason },
      options
    );
    this.name = 'TransferFailure';
  }
}

export class ReentrancyError extends AmmError {
  constructor(attempted: string, inProgress: string) {
    super(
      ErrorCodes.REENTRANCY,
      `Reentrant call: ${attempted} while ${inProgress} is in progress`,
      { attempted, inProgress }
    );
    this.name = 'ReentrancyError';
  }
}

export class InvalidStateError extends AmmError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_STATE, message);
    this.name = 'InvalidStateError';
  }
}

export class InvariantViolationError extends AmmError {
  constructor(invariant: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVARIANT_VIOLATION, `Invariant violated: ${invariant}`, details);
    this.name = 'InvariantViolationError';
  }
}
