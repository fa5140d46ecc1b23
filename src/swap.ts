/**
 * Swap execution against the constant-product curve
 */

import type { Provider, SwapDirection } from './types.js';
import type { PoolEvents } from './events.js';
import type { PairLedgers } from './liquidity.js';
import { FEE_CONFIG } from './types.js';
import { PoolState } from './pool.js';
import { atomic } from './transaction.js';
import { add, div, mul } from './utils/math.js';
import { requireAmount, requireProvider } from './utils/validation.js';
import { InvariantViolationError, NoLiquidityError, ZeroOutputError } from './errors.js';
import { logger } from './utils/logger.js';

const log = logger.child('Swap');

/**
 * Output for `amountIn` against the given reserves, after the 0.3% fee.
 *
 * amountOut = floor(amountIn * 997 * reserveOut / (reserveIn * 1000 + amountIn * 997))
 *
 * The result is always strictly below reserveOut.
 */
export function priceOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
  requireAmount('amountIn', amountIn, 'zero input');
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new NoLiquidityError(reserveIn, reserveOut);
  }

  const amountInWithFee = mul(amountIn, FEE_CONFIG.FEE_MULTIPLIER);
  const numerator = mul(amountInWithFee, reserveOut);
  const denominator = add(mul(reserveIn, FEE_CONFIG.FEE_DENOMINATOR), amountInWithFee);
  return div(numerator, denominator);
}

/**
 * Engine for the two directional swaps
 */
export class SwapEngine {
  private readonly pool: PoolState;
  private readonly ledgers: PairLedgers;
  private readonly events: PoolEvents;

  constructor(pool: PoolState, ledgers: PairLedgers, events: PoolEvents) {
    this.pool = pool;
    this.ledgers = ledgers;
    this.events = events;
  }

  /**
   * Get a quote for a swap against the current reserves without executing
   */
  quote(direction: SwapDirection, amountIn: bigint): bigint {
    const { reserveA, reserveB } = this.pool;
    return direction === 'AtoB'
      ? priceOut(amountIn, reserveA, reserveB)
      : priceOut(amountIn, reserveB, reserveA);
  }

  swapAForB(trader: Provider, amountAIn: bigint): bigint {
    return this.swap('AtoB', trader, amountAIn);
  }

  swapBForA(trader: Provider, amountBIn: bigint): bigint {
    return this.swap('BtoA', trader, amountBIn);
  }

  private swap(direction: SwapDirection, trader: Provider, amountIn: bigint): bigint {
    requireProvider(trader, 'trader');
    requireAmount('amountIn', amountIn, 'zero input');

    const ledgerIn = direction === 'AtoB' ? this.ledgers.a : this.ledgers.b;
    const ledgerOut = direction === 'AtoB' ? this.ledgers.b : this.ledgers.a;

    const amountOut = atomic(this.pool, direction === 'AtoB' ? 'swapAForB' : 'swapBForA', (settlement) => {
      const kBefore = this.pool.k;
      const out = this.quote(direction, amountIn);
      if (out === 0n) {
        const [reserveIn, reserveOut] = direction === 'AtoB'
          ? [this.pool.reserveA, this.pool.reserveB]
          : [this.pool.reserveB, this.pool.reserveA];
        throw new ZeroOutputError(amountIn, reserveIn, reserveOut);
      }

      settlement.pull(ledgerIn, trader, amountIn);

      if (direction === 'AtoB') {
        this.pool.creditReserves(amountIn, 0n);
        this.pool.debitReserves(0n, out);
      } else {
        this.pool.creditReserves(0n, amountIn);
        this.pool.debitReserves(out, 0n);
      }

      const kAfter = this.pool.k;
      if (kAfter < kBefore) {
        throw new InvariantViolationError('constant product decreased', {
          kBefore: kBefore.toString(),
          kAfter: kAfter.toString(),
        });
      }
      this.pool.assertInvariants();

      settlement.push(ledgerOut, trader, out);
      return out;
    });

    log.debug(`Swap by ${trader}: ${amountIn} ${ledgerIn.asset} -> ${amountOut} ${ledgerOut.asset}`);
    this.events.emit('Swap', {
      trader,
      assetIn: ledgerIn.asset,
      assetOut: ledgerOut.asset,
      amountIn,
      amountOut,
    });

    return amountOut;
  }
}
