/**
 * Dex: the public surface of a single constant-product pair
 */

import type {
  PoolEventName,
  PoolInfo,
  PoolStatus,
  Provider,
  RemoveLiquidityResult,
  Reserves,
} from './types.js';
import type { PoolEventListener } from './events.js';
import type { AssetLedger } from './ledger.js';
import { PoolState } from './pool.js';
import { PoolEvents } from './events.js';
import { LiquidityManager } from './liquidity.js';
import { SwapEngine, priceOut } from './swap.js';
import { PriceOracle } from './price.js';

export interface DexOptions {
  /** Existing pool state to operate on; a fresh, empty pool by default */
  pool?: PoolState;
}

export class Dex {
  readonly liquidity: LiquidityManager;
  readonly swaps: SwapEngine;
  readonly oracle: PriceOracle;
  private readonly pool: PoolState;
  private readonly events = new PoolEvents();

  constructor(ledgerA: AssetLedger, ledgerB: AssetLedger, options: DexOptions = {}) {
    this.pool = options.pool ?? new PoolState();
    const ledgers = { a: ledgerA, b: ledgerB };
    this.liquidity = new LiquidityManager(this.pool, ledgers, this.events);
    this.swaps = new SwapEngine(this.pool, ledgers, this.events);
    this.oracle = new PriceOracle(this.pool);
  }

  // ========== LIQUIDITY ==========

  addLiquidity(provider: Provider, amountA: bigint, amountB: bigint): bigint {
    return this.liquidity.addLiquidity(provider, amountA, amountB);
  }

  removeLiquidity(provider: Provider, shareAmount: bigint): RemoveLiquidityResult {
    return this.liquidity.removeLiquidity(provider, shareAmount);
  }

  // ========== SWAP ==========

  swapAForB(trader: Provider, amountAIn: bigint): bigint {
    return this.swaps.swapAForB(trader, amountAIn);
  }

  swapBForA(trader: Provider, amountBIn: bigint): bigint {
    return this.swaps.swapBForA(trader, amountBIn);
  }

  priceOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    return priceOut(amountIn, reserveIn, reserveOut);
  }

  // ========== VIEWS ==========

  getPrice(): bigint {
    return this.oracle.getPrice();
  }

  getReserves(): Reserves {
    return this.oracle.getReserves();
  }

  shares(provider: Provider): bigint {
    return this.pool.sharesOf(provider);
  }

  get totalShares(): bigint {
    return this.pool.totalShares;
  }

  get status(): PoolStatus {
    return this.pool.status;
  }

  get k(): bigint {
    return this.pool.k;
  }

  get halted(): boolean {
    return this.pool.halted;
  }

  // ========== NOTIFICATIONS ==========

  on<E extends PoolEventName>(name: E, listener: PoolEventListener<E>): () => void {
    return this.events.on(name, listener);
  }

  off<E extends PoolEventName>(name: E, listener: PoolEventListener<E>): void {
    this.events.off(name, listener);
  }

  toJSON(): PoolInfo {
    return {
      ...this.pool.toJSON(),
      price: this.getPrice().toString(),
    };
  }
}
