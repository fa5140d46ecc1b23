/**
 * Asset ledger collaborator
 *
 * The pool never holds balances itself; it asks one ledger per asset to move
 * value between a caller and the pool account.
 */

import type { Provider } from './types.js';
import { InsufficientBalanceError, TransferFailure, ValidationError } from './errors.js';
import { add, sub } from './utils/math.js';
import { config } from './config.js';

export interface AssetLedger {
  /** Asset identifier reported in swap notifications */
  readonly asset: string;

  /**
   * Move `amount` from `from` into the pool. Throws when the balance or the
   * allowance granted to the pool is short, and must move nothing when it
   * throws: the pool only refunds transfers that returned.
   */
  transferIn(from: Provider, amount: bigint): void;

  /**
   * Move `amount` from the pool to `to`. Throws when the pool's balance is
   * short, which halts the pool.
   */
  transferOut(to: Provider, amount: bigint): void;

  /**
   * Return an amount taken by transferIn during an operation that aborted.
   * Ledgers that track allowances restore them here; without it the pool
   * refunds through transferOut.
   */
  refund?(to: Provider, amount: bigint): void;
}

/**
 * In-memory ledger for a mintable test asset.
 *
 * Accounts approve the pool to pull up to an allowance; transferIn consumes it.
 */
export class MemoryLedger implements AssetLedger {
  readonly asset: string;
  readonly poolAccount: string;
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(asset: string, poolAccount: string = config.POOL_ACCOUNT) {
    this.asset = asset;
    this.poolAccount = poolAccount;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Allowance `owner` has granted the pool */
  allowance(owner: string): bigint {
    return this.allowances.get(owner) ?? 0n;
  }

  mint(account: string, amount: bigint): this {
    if (amount < 0n) {
      throw ValidationError.nonPositive('mint amount', amount);
    }
    this.balances.set(account, add(this.balanceOf(account), amount));
    return this;
  }

  approve(owner: string, amount: bigint): this {
    if (amount < 0n) {
      throw ValidationError.nonPositive('allowance', amount);
    }
    this.allowances.set(owner, amount);
    return this;
  }

  transferIn(from: Provider, amount: bigint): void {
    const allowance = this.allowance(from);
    if (allowance < amount) {
      throw new TransferFailure(this.asset, 'in', from, amount, 'insufficient allowance', {
        cause: new InsufficientBalanceError(`${from} allowance`, amount, allowance),
      });
    }
    this.move(from, this.poolAccount, amount, 'in', from);
    this.allowances.set(from, allowance - amount);
  }

  transferOut(to: Provider, amount: bigint): void {
    this.move(this.poolAccount, to, amount, 'out', to);
  }

  refund(to: Provider, amount: bigint): void {
    this.move(this.poolAccount, to, amount, 'out', to);
    this.allowances.set(to, add(this.allowance(to), amount));
  }

  private move(
    from: string,
    to: string,
    amount: bigint,
    direction: 'in' | 'out',
    counterparty: string
  ): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TransferFailure(this.asset, direction, counterparty, amount, 'insufficient balance', {
        cause: new InsufficientBalanceError(from, amount, balance),
      });
    }
    this.balances.set(from, sub(balance, amount));
    this.balances.set(to, add(this.balanceOf(to), amount));
  }
}
