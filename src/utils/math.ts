/**
 * Integer math for the pool engine
 *
 * All values are unsigned and bounded by MAX_UINT256. Nothing wraps: a result
 * outside [0, MAX_UINT256] throws ArithmeticError.
 */

import { ArithmeticError } from '../errors.js';

/** Largest representable amount (2^256 - 1) */
export const MAX_UINT256 = 2n ** 256n - 1n;

function checkRange(value: bigint, operation: string, a: bigint, b: bigint): bigint {
  if (value > MAX_UINT256) {
    throw ArithmeticError.overflow(operation, a, b);
  }
  if (value < 0n) {
    throw ArithmeticError.underflow(operation, a, b);
  }
  return value;
}

function checkOperand(value: bigint, operation: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new ArithmeticError(`Operand out of range in ${operation}: ${value}`, {
      operation,
      value: value.toString(),
    });
  }
}

export function add(a: bigint, b: bigint): bigint {
  checkOperand(a, 'add');
  checkOperand(b, 'add');
  return checkRange(a + b, 'add', a, b);
}

export function sub(a: bigint, b: bigint): bigint {
  checkOperand(a, 'sub');
  checkOperand(b, 'sub');
  return checkRange(a - b, 'sub', a, b);
}

export function mul(a: bigint, b: bigint): bigint {
  checkOperand(a, 'mul');
  checkOperand(b, 'mul');
  return checkRange(a * b, 'mul', a, b);
}

/**
 * Floor division. bigint division truncates toward zero, which is floor for
 * the non-negative operands accepted here.
 */
export function div(a: bigint, b: bigint): bigint {
  checkOperand(a, 'div');
  checkOperand(b, 'div');
  if (b === 0n) {
    throw ArithmeticError.divisionByZero(a);
  }
  return a / b;
}

/**
 * Integer square root, Babylonian method.
 *
 * Returns floor(sqrt(y)): 0 for 0, 1 for 1..3, otherwise iterates
 * x = (y / x + x) / 2 from y / 2 + 1 until it stops decreasing.
 */
export function isqrt(y: bigint): bigint {
  checkOperand(y, 'isqrt');
  if (y > 3n) {
    let z = y;
    let x = y / 2n + 1n;
    while (x < z) {
      z = x;
      x = (y / x + x) / 2n;
    }
    return z;
  }
  return y === 0n ? 0n : 1n;
}

/**
 * Calculate the constant product K = reserveA * reserveB
 *
 * K is only compared, never stored, so it is left unbounded.
 */
export function calculateK(reserveA: bigint, reserveB: bigint): bigint {
  checkOperand(reserveA, 'calculateK');
  checkOperand(reserveB, 'calculateK');
  return reserveA * reserveB;
}
