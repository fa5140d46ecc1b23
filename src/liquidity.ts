/**
 * Liquidity management: deposits mint shares, withdrawals burn them
 */

import type { Provider, RemoveLiquidityResult } from './types.js';
import type { AssetLedger } from './ledger.js';
import type { PoolEvents } from './events.js';
import { PoolState } from './pool.js';
import { atomic } from './transaction.js';
import { div, isqrt, mul } from './utils/math.js';
import { requireAmount, requireProvider } from './utils/validation.js';
import {
  InsufficientBalanceError,
  InsufficientLiquidityError,
  NoLiquidityError,
  RatioMismatchError,
} from './errors.js';
import { logger } from './utils/logger.js';

const log = logger.child('Liquidity');

/** One ledger per side of the pair */
export interface PairLedgers {
  a: AssetLedger;
  b: AssetLedger;
}

/**
 * Manager for liquidity operations (add/remove)
 */
export class LiquidityManager {
  private readonly pool: PoolState;
  private readonly ledgers: PairLedgers;
  private readonly events: PoolEvents;

  constructor(pool: PoolState, ledgers: PairLedgers, events: PoolEvents) {
    this.pool = pool;
    this.ledgers = ledgers;
    this.events = events;
  }

  /**
   * Shares a deposit of (amountA, amountB) would mint against the current pool.
   *
   * The first deposit mints isqrt(amountA * amountB). Later deposits must match
   * the reserve ratio exactly and mint in proportion to amountA.
   */
  calculateSharesMinted(amountA: bigint, amountB: bigint): bigint {
    const { reserveA, reserveB, totalShares } = this.pool;

    let minted: bigint;
    if (totalShares === 0n) {
      minted = isqrt(mul(amountA, amountB));
    } else {
      if (mul(amountB, reserveA) !== mul(amountA, reserveB)) {
        throw new RatioMismatchError(amountA, amountB, reserveA, reserveB);
      }
      minted = div(mul(amountA, totalShares), reserveA);
    }

    if (minted === 0n) {
      throw new InsufficientLiquidityError(amountA, totalShares, reserveA);
    }
    return minted;
  }

  /**
   * Deposit both assets and mint shares to `provider`
   */
  addLiquidity(provider: Provider, amountA: bigint, amountB: bigint): bigint {
    requireProvider(provider);
    requireAmount('amountA', amountA, 'zero amount');
    requireAmount('amountB', amountB, 'zero amount');

    const bootstrap = this.pool.totalShares === 0n;
    const sharesMinted = atomic(this.pool, 'addLiquidity', (settlement) => {
      const minted = this.calculateSharesMinted(amountA, amountB);

      settlement.pull(this.ledgers.a, provider, amountA);
      settlement.pull(this.ledgers.b, provider, amountB);

      this.pool.creditReserves(amountA, amountB);
      this.pool.mintShares(provider, minted);
      return minted;
    });

    if (bootstrap) {
      log.info(`Pool activated: ${amountA} A + ${amountB} B = ${sharesMinted} shares`);
    } else {
      log.debug(`Liquidity added by ${provider}: ${amountA} A + ${amountB} B = ${sharesMinted} shares`);
    }
    this.events.emit('LiquidityAdded', { provider, amountA, amountB, sharesMinted });

    return sharesMinted;
  }

  /**
   * Amounts a removal of `shareAmount` would pay out. Floor division leaves
   * any remainder in the pool.
   */
  quoteRemove(shareAmount: bigint): RemoveLiquidityResult {
    requireAmount('shareAmount', shareAmount, 'zero liquidity');

    const { reserveA, reserveB, totalShares } = this.pool;
    if (totalShares === 0n) {
      throw new NoLiquidityError(reserveA, reserveB);
    }
    if (shareAmount > totalShares) {
      throw new InsufficientBalanceError('pool', shareAmount, totalShares);
    }

    return {
      amountA: div(mul(shareAmount, reserveA), totalShares),
      amountB: div(mul(shareAmount, reserveB), totalShares),
    };
  }

  /**
   * Burn `shareAmount` of `provider`'s shares and pay out the proportional
   * reserves
   */
  removeLiquidity(provider: Provider, shareAmount: bigint): RemoveLiquidityResult {
    requireProvider(provider);
    requireAmount('shareAmount', shareAmount, 'zero liquidity');

    const result = atomic(this.pool, 'removeLiquidity', (settlement) => {
      const balance = this.pool.sharesOf(provider);
      if (balance < shareAmount) {
        throw new InsufficientBalanceError(provider, shareAmount, balance);
      }

      const { amountA, amountB } = this.quoteRemove(shareAmount);

      this.pool.burnShares(provider, shareAmount);
      this.pool.debitReserves(amountA, amountB);
      this.pool.assertInvariants();

      settlement.push(this.ledgers.a, provider, amountA);
      settlement.push(this.ledgers.b, provider, amountB);
      return { amountA, amountB };
    });

    if (this.pool.status === 'uninitialized') {
      log.info(`Pool drained by ${provider}: ${result.amountA} A + ${result.amountB} B`);
    } else {
      log.debug(`Liquidity removed by ${provider}: ${shareAmount} shares = ${result.amountA} A + ${result.amountB} B`);
    }
    this.events.emit('LiquidityRemoved', {
      provider,
      amountA: result.amountA,
      amountB: result.amountB,
      sharesBurned: shareAmount,
    });

    return result;
  }

  /**
   * The amount of B that matches `amountA` at the current reserve ratio
   */
  quoteAmountB(amountA: bigint): bigint {
    requireAmount('amountA', amountA, 'zero amount');

    const { reserveA, reserveB } = this.pool;
    if (this.pool.totalShares === 0n) {
      throw new NoLiquidityError(reserveA, reserveB);
    }

    const numerator = mul(amountA, reserveB);
    const amountB = div(numerator, reserveA);
    if (amountB * reserveA !== numerator) {
      throw new RatioMismatchError(amountA, amountB, reserveA, reserveB);
    }
    return amountB;
  }
}
