/**
 * Constant-product AMM engine
 *
 * A single two-asset liquidity pool with integer-exact share accounting and a
 * 0.3% fee swap curve.
 */

export { Dex } from './dex.js';
export type { DexOptions } from './dex.js';
export { PoolState } from './pool.js';
export { LiquidityManager } from './liquidity.js';
export type { PairLedgers } from './liquidity.js';
export { SwapEngine, priceOut } from './swap.js';
export { PriceOracle } from './price.js';
export { PoolEvents } from './events.js';
export type { PoolEventListener } from './events.js';
export { MemoryLedger } from './ledger.js';
export type { AssetLedger } from './ledger.js';
export { Settlement, atomic } from './transaction.js';
export type { LedgerTransfer } from './transaction.js';
export { add, sub, mul, div, isqrt, calculateK, MAX_UINT256 } from './utils/math.js';
export { Logger, logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { config } from './config.js';
export type { Config } from './config.js';
export * from './errors.js';
export * from './types.js';
