/**
 * Read-only price views over the pool
 */

import type { Reserves } from './types.js';
import { PoolState } from './pool.js';

export class PriceOracle {
  private readonly pool: PoolState;

  constructor(pool: PoolState) {
    this.pool = pool;
  }

  /**
   * Units of B per unit of A, truncated to an integer. 0 on an empty pool.
   */
  getPrice(): bigint {
    const { reserveA, reserveB } = this.pool;
    if (reserveA === 0n) return 0n;
    return reserveB / reserveA;
  }

  getReserves(): Reserves {
    return this.pool.reserves;
  }
}
