/**
 * Core types for the constant-product pool engine
 */

/** Identity of a liquidity provider or trader */
export type Provider = string;

/** Which side of the pair an amount belongs to */
export type AssetSide = 'A' | 'B';

/** Swap direction: AtoB sells A for B, BtoA sells B for A */
export type SwapDirection = 'AtoB' | 'BtoA';

/** Lifecycle of the pool as a whole */
export type PoolStatus = 'uninitialized' | 'active';

/** Current reserves of the pool */
export interface Reserves {
  reserveA: bigint;
  reserveB: bigint;
}

/** Point-in-time copy of every invariant-protected field */
export interface PoolSnapshot extends Reserves {
  totalShares: bigint;
  shares: ReadonlyMap<Provider, bigint>;
}

/** Amounts paid out by a liquidity removal */
export interface RemoveLiquidityResult {
  amountA: bigint;
  amountB: bigint;
}

/** Serialized pool info for display */
export interface PoolInfo {
  status: PoolStatus;
  reserveA: string;
  reserveB: string;
  totalShares: string;
  k: string;
  price: string;
  shares: Record<Provider, string>;
}

// ========== NOTIFICATIONS ==========

export interface LiquidityAddedEvent {
  provider: Provider;
  amountA: bigint;
  amountB: bigint;
  sharesMinted: bigint;
}

export interface LiquidityRemovedEvent {
  provider: Provider;
  amountA: bigint;
  amountB: bigint;
  sharesBurned: bigint;
}

export interface SwapEvent {
  trader: Provider;
  assetIn: string;
  assetOut: string;
  amountIn: bigint;
  amountOut: bigint;
}

export interface PoolEventMap {
  LiquidityAdded: LiquidityAddedEvent;
  LiquidityRemoved: LiquidityRemovedEvent;
  Swap: SwapEvent;
}

export type PoolEventName = keyof PoolEventMap;

/** Fee configuration: 0.3% taken from the input side */
export const FEE_CONFIG = {
  FEE_MULTIPLIER: 997n,      // amountIn kept after fee, per mille
  FEE_DENOMINATOR: 1000n,
} as const;
