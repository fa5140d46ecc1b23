/**
 * Pool state
 *
 * The authoritative record of reserves and provider shares. Only the
 * liquidity manager and the swap engine mutate it, and only from inside
 * transact().
 */

import type { PoolInfo, PoolSnapshot, PoolStatus, Provider, Reserves } from './types.js';
import { add, sub, calculateK } from './utils/math.js';
import {
  InsufficientBalanceError,
  InvalidStateError,
  InvariantViolationError,
  ReentrancyError,
} from './errors.js';
import { logger } from './utils/logger.js';

const log = logger.child('Pool');

export class PoolState {
  private _reserveA = 0n;
  private _reserveB = 0n;
  private _totalShares = 0n;
  private readonly balances = new Map<Provider, bigint>();
  private activeOperation: string | null = null;
  private haltReason: string | null = null;

  get reserveA(): bigint {
    return this._reserveA;
  }

  get reserveB(): bigint {
    return this._reserveB;
  }

  get totalShares(): bigint {
    return this._totalShares;
  }

  get reserves(): Reserves {
    return { reserveA: this._reserveA, reserveB: this._reserveB };
  }

  /**
   * Get the constant product K
   */
  get k(): bigint {
    return calculateK(this._reserveA, this._reserveB);
  }

  get status(): PoolStatus {
    return this._totalShares === 0n ? 'uninitialized' : 'active';
  }

  /** Name of the operation currently holding the pool, if any */
  get operationInProgress(): string | null {
    return this.activeOperation;
  }

  /**
   * True once reserve accounting can no longer be trusted to match the
   * ledgers. A halted pool refuses every further operation.
   */
  get halted(): boolean {
    return this.haltReason !== null;
  }

  sharesOf(provider: Provider): bigint {
    return this.balances.get(provider) ?? 0n;
  }

  /** Providers holding a non-zero balance */
  providers(): Provider[] {
    return [...this.balances].filter(([, balance]) => balance > 0n).map(([provider]) => provider);
  }

  snapshot(): PoolSnapshot {
    return {
      reserveA: this._reserveA,
      reserveB: this._reserveB,
      totalShares: this._totalShares,
      shares: new Map(this.balances),
    };
  }

  // ========== MUTATION PRIMITIVES ==========

  creditReserves(amountA: bigint, amountB: bigint): void {
    this.requireTransaction('creditReserves');
    const reserveA = add(this._reserveA, amountA);
    const reserveB = add(this._reserveB, amountB);
    this._reserveA = reserveA;
    this._reserveB = reserveB;
  }

  /**
   * Throws ArithmeticError if either reserve would go negative
   */
  debitReserves(amountA: bigint, amountB: bigint): void {
    this.requireTransaction('debitReserves');
    const reserveA = sub(this._reserveA, amountA);
    const reserveB = sub(this._reserveB, amountB);
    this._reserveA = reserveA;
    this._reserveB = reserveB;
  }

  mintShares(provider: Provider, amount: bigint): void {
    this.requireTransaction('mintShares');
    const totalShares = add(this._totalShares, amount);
    this.balances.set(provider, add(this.sharesOf(provider), amount));
    this._totalShares = totalShares;
  }

  burnShares(provider: Provider, amount: bigint): void {
    this.requireTransaction('burnShares');
    const balance = this.sharesOf(provider);
    if (balance < amount) {
      throw new InsufficientBalanceError(provider, amount, balance);
    }
    // Zero balances stay in the map; sharesOf treats them as absent.
    this.balances.set(provider, balance - amount);
    this._totalShares = sub(this._totalShares, amount);
  }

  // ========== GUARDS ==========

  /**
   * Check share conservation and that reserves are empty exactly when no
   * shares are outstanding.
   */
  assertInvariants(): void {
    let sum = 0n;
    for (const balance of this.balances.values()) {
      sum += balance;
    }
    if (sum !== this._totalShares) {
      throw new InvariantViolationError('share conservation', {
        totalShares: this._totalShares.toString(),
        sum: sum.toString(),
      });
    }

    const empty = this._reserveA === 0n && this._reserveB === 0n;
    const funded = this._reserveA > 0n && this._reserveB > 0n;
    if (this._totalShares === 0n ? !empty : !funded) {
      throw new InvariantViolationError('reserves backed by shares', {
        reserveA: this._reserveA.toString(),
        reserveB: this._reserveB.toString(),
        totalShares: this._totalShares.toString(),
      });
    }
  }

  /**
   * Run `body` as one indivisible operation.
   *
   * Entry is refused once the pool is halted, and while another operation
   * holds it. If `body` or the
   * final invariant check throws, every field is restored to its value at
   * entry and the error is rethrown.
   */
  transact<T>(operation: string, body: () => T): T {
    if (this.haltReason !== null) {
      throw new InvalidStateError(`Pool halted: ${this.haltReason}`);
    }
    if (this.activeOperation !== null) {
      throw new ReentrancyError(operation, this.activeOperation);
    }

    this.activeOperation = operation;
    const before = this.snapshot();
    try {
      const result = body();
      this.assertInvariants();
      return result;
    } catch (error) {
      this.restore(before);
      log.debug(`${operation} rolled back: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    } finally {
      this.activeOperation = null;
    }
  }

  /**
   * Stop the pool for good. Survives the rollback of the operation that
   * calls it.
   */
  halt(reason: string): void {
    if (this.haltReason !== null) return;
    this.haltReason = reason;
    log.error(`Pool halted: ${reason}`);
  }

  private restore(snapshot: PoolSnapshot): void {
    this._reserveA = snapshot.reserveA;
    this._reserveB = snapshot.reserveB;
    this._totalShares = snapshot.totalShares;
    this.balances.clear();
    for (const [provider, balance] of snapshot.shares) {
      this.balances.set(provider, balance);
    }
  }

  private requireTransaction(primitive: string): void {
    if (this.activeOperation === null) {
      throw new InvalidStateError(`${primitive} called outside a pool transaction`);
    }
  }

  /**
   * Serialize pool state for display
   */
  toJSON(): Omit<PoolInfo, 'price'> {
    const shares: Record<Provider, string> = {};
    for (const provider of this.providers()) {
      shares[provider] = this.sharesOf(provider).toString();
    }
    return {
      status: this.status,
      reserveA: this._reserveA.toString(),
      reserveB: this._reserveB.toString(),
      totalShares: this._totalShares.toString(),
      k: this.k.toString(),
      shares,
    };
  }
}
