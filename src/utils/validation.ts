/**
 * Input checks shared by the liquidity manager and the swap engine
 */

import type { Provider } from '../types.js';
import { ValidationError } from '../errors.js';

export function requireProvider(provider: Provider, field: string = 'provider'): void {
  if (provider.trim().length === 0) {
    throw new ValidationError(`empty ${field}`, { field });
  }
}

/**
 * Reject zero with `zeroMessage` and negative values with a generic message
 */
export function requireAmount(field: string, value: bigint, zeroMessage: string): void {
  if (value === 0n) {
    throw new ValidationError(zeroMessage, { field });
  }
  if (value < 0n) {
    throw ValidationError.nonPositive(field, value);
  }
}
