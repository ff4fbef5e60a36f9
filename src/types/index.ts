/**
 * Shared domain types for the settlement engine.
 *
 * Amounts are fixed-point decimals (see utils/math). Timestamps are integer
 * milliseconds since the epoch, taken from the message envelope, never from
 * the wall clock.
 */

import type BigNumber from 'bignumber.js';
import type { Collateral, LpToken, Notional, Usd } from '../utils/math';

export type Timestamp = number;
export type Address = string;
export type PositionId = number;
export type OrderId = number;

export type DirectionToBase = 'long' | 'short';

/**
 * One page of a listing. `nextStartAfter` is set only when more entries remain.
 */
export interface Page<T, C = number> {
    items: T[];
    nextStartAfter?: C;
}

export type MarketType = 'collateral-is-quote' | 'collateral-is-base';

export interface MarketId {
    base: string;
    quote: string;
    marketType: MarketType;
}

/**
 * Upper bound on the trader's gains as a multiple of collateral. Infinite
 * gains are only reachable in collateral-is-base markets.
 */
export type MaxGains = BigNumber | 'infinite';

// ═══════════════════════════════════════════════════════════════════════════════
// PRICES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PricePoint {
    timestamp: Timestamp;
    /** Price of one unit of notional, expressed in collateral */
    priceNotional: BigNumber;
    /** Price of the base asset in quote */
    priceBase: BigNumber;
    /** Price of one unit of collateral in USD */
    priceUsd: BigNumber;
    marketType: MarketType;
    isNotionalUsd: boolean;
}

export interface StoredPrice {
    priceBase: BigNumber;
    priceUsd: BigNumber;
}

/**
 * How spot prices reach the market. Manual markets accept prices from one
 * admin; oracle markets compose feed values provided by a PriceFeedSource.
 */
export type SpotPriceConfig =
    | { kind: 'manual'; admin: Address }
    | { kind: 'oracle'; feeds: SpotPriceFeed[]; feedsUsd: SpotPriceFeed[] };

export interface SpotPriceFeed {
    id: string;
    /** Use 1 / price of this feed */
    inverted: boolean;
}

export interface PriceFeedSource {
    read(feedId: string, now: Timestamp): BigNumber | undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POSITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type LiquidationReason = 'liquidated' | 'max-gains' | 'stop-loss' | 'take-profit';

export type PositionCloseReason = { kind: 'direct' } | { kind: 'liquidated'; reason: LiquidationReason };

export interface CollateralAndUsd {
    collateral: Collateral;
    usd: Usd;
}

/**
 * Collateral reserved to cover costs until the next liquifunding
 */
export interface LiquidationMargin {
    borrow: Collateral;
    funding: Collateral;
    deltaNeutrality: Collateral;
    crank: Collateral;
}

export interface Position {
    id: PositionId;
    owner: Address;
    depositCollateral: CollateralAndUsd;
    activeCollateral: Collateral;
    counterCollateral: Collateral;
    /** Signed: positive is long notional */
    notionalSize: Notional;
    createdAt: Timestamp;
    pricePointCreatedAt: Timestamp;
    liquifundedAt: Timestamp;
    nextLiquifunding: Timestamp;
    staleAt: Timestamp;
    tradingFee: CollateralAndUsd;
    fundingFee: CollateralAndUsd;
    borrowFee: CollateralAndUsd;
    crankFee: CollateralAndUsd;
    deltaNeutralityFee: CollateralAndUsd;
    /** Crank fee owed but not yet covered by margin */
    pendingCrankFee: Usd;
    liquidationMargin: LiquidationMargin;
    /** Notional prices, absent when unreachable */
    liquidationPrice?: BigNumber;
    takeProfitPrice?: BigNumber;
    stopLossOverride?: BigNumber;
    stopLossOverrideNotional?: BigNumber;
    takeProfitOverride?: BigNumber;
    takeProfitOverrideNotional?: BigNumber;
}

export interface ClosedPosition {
    owner: Address;
    id: PositionId;
    directionToBase: DirectionToBase;
    createdAt: Timestamp;
    pricePointCreatedAt: Timestamp;
    liquifundedAt: Timestamp;
    tradingFee: CollateralAndUsd;
    fundingFee: CollateralAndUsd;
    borrowFee: CollateralAndUsd;
    crankFee: CollateralAndUsd;
    deltaNeutralityFee: CollateralAndUsd;
    depositCollateral: CollateralAndUsd;
    pnl: CollateralAndUsd;
    notionalSize: Notional;
    entryPrice: BigNumber;
    closeTime: Timestamp;
    settlementTime: Timestamp;
    reason: PositionCloseReason;
    activeCollateral: Collateral;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIQUIDITY
// ═══════════════════════════════════════════════════════════════════════════════

export interface LiquidityStats {
    locked: Collateral;
    unlocked: Collateral;
    totalLp: LpToken;
    totalXlp: LpToken;
}

export interface UnstakingXlp {
    xlpAmount: LpToken;
    collected: LpToken;
    unstakeStarted: Timestamp;
    unstakeDurationMs: number;
    lastCollected: Timestamp;
}

export interface LiquidityStatsByAddr {
    lp: LpToken;
    xlp: LpToken;
    lastAccrueKey: number;
    lpAccruedYield: Collateral;
    xlpAccruedYield: Collateral;
    crankRewards: Collateral;
    unstaking?: UnstakingXlp;
    cooldownEnds?: Timestamp;
}

export interface YieldPerToken {
    lp: BigNumber;
    xlp: BigNumber;
}

export type ResetLpStatus = { kind: 'begin' } | { kind: 'last-saw'; addr: Address };

// ═══════════════════════════════════════════════════════════════════════════════
// FEES
// ═══════════════════════════════════════════════════════════════════════════════

export interface AllFees {
    /** Owed to liquidity providers, pending claim */
    wallets: Collateral;
    protocol: Collateral;
    /** Pays crank rewards */
    crank: Collateral;
}

export interface OpenInterest {
    long: Notional;
    short: Notional;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIMIT ORDERS
// ═══════════════════════════════════════════════════════════════════════════════

export interface LimitOrder {
    orderId: OrderId;
    owner: Address;
    /** Base price that activates the order */
    triggerPrice: BigNumber;
    collateral: Collateral;
    leverage: BigNumber;
    direction: DirectionToBase;
    maxGains: MaxGains;
    stopLossOverride?: BigNumber;
    takeProfitOverride?: BigNumber;
    crankFee: CollateralAndUsd;
    createdAt: Timestamp;
}

export type LimitOrderResult =
    | { kind: 'success'; positionId: PositionId }
    | { kind: 'failure'; reason: string };

export interface ExecutedLimitOrder {
    order: LimitOrder;
    result: LimitOrderResult;
    timestamp: Timestamp;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CRANK
// ═══════════════════════════════════════════════════════════════════════════════

export type CrankWorkInfo =
    | { kind: 'close-all-positions'; position: PositionId }
    | { kind: 'reset-lp-balances' }
    | { kind: 'liquifunding'; position: PositionId; liquifundedAt: Timestamp; priceTimestamp: Timestamp }
    | { kind: 'unpend-liquidation-prices'; position: PositionId }
    | { kind: 'liquidation'; position: PositionId; reason: LiquidationReason; priceTimestamp: Timestamp }
    | { kind: 'limit-order'; orderId: OrderId; priceTimestamp: Timestamp }
    | { kind: 'completed'; priceTimestamp: Timestamp };

// ═══════════════════════════════════════════════════════════════════════════════
// OUTGOING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Instruction to an external token contract. The engine never holds
 * balances of other parties, it only records what must be sent.
 */
export type OutgoingMessage =
    | { kind: 'token-transfer'; recipient: Address; amount: Collateral }
    | { kind: 'position-nft-mint'; owner: Address; positionId: PositionId }
    | { kind: 'position-nft-burn'; owner: Address; positionId: PositionId };
