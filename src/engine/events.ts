/**
 * Market events.
 *
 * Tagged union, serialized as-is (decimals become strings through
 * BigNumber#toJSON). The `version` field is bumped whenever a payload
 * changes shape so indexers can keep decoding older history.
 */

import type BigNumber from 'bignumber.js';
import { EVENT_SCHEMA_VERSION } from '../config/constants';
import type {
    Address,
    ClosedPosition,
    CrankWorkInfo,
    LimitOrder,
    LimitOrderResult,
    LiquidityStats,
    OrderId,
    PositionId,
    Timestamp,
} from '../types';

export type FeeSource = 'trading' | 'borrow' | 'crank' | 'delta-neutrality';

export type PositionUpdateKind =
    | 'add-collateral-impact-leverage'
    | 'remove-collateral-impact-leverage'
    | 'add-collateral-impact-size'
    | 'remove-collateral-impact-size'
    | 'leverage'
    | 'max-gains'
    | 'trigger-order';

export type MarketEventBody =
    | { type: 'spot-price'; timestamp: Timestamp; priceBase: BigNumber; priceNotional: BigNumber; priceUsd: BigNumber }
    | {
          type: 'position-open';
          positionId: PositionId;
          owner: Address;
          depositCollateral: BigNumber;
          activeCollateral: BigNumber;
          counterCollateral: BigNumber;
          notionalSize: BigNumber;
          tradingFee: BigNumber;
          deltaNeutralityFee: BigNumber;
      }
    | {
          type: 'position-update';
          positionId: PositionId;
          kind: PositionUpdateKind;
          activeCollateralDelta: BigNumber;
          counterCollateralDelta: BigNumber;
          notionalSizeDelta: BigNumber;
          tradingFee: BigNumber;
          deltaNeutralityFee: BigNumber;
      }
    | { type: 'position-close'; closed: ClosedPosition }
    | {
          type: 'liquifunding';
          positionId: PositionId;
          start: Timestamp;
          end: Timestamp;
          borrowFee: BigNumber;
          fundingFee: BigNumber;
          crankFee: BigNumber;
          exposure: BigNumber;
      }
    | { type: 'fee'; source: FeeSource; amount: BigNumber; protocol: BigNumber; lp: BigNumber; xlp: BigNumber }
    | { type: 'delta-neutrality-fee'; positionId: PositionId; amount: BigNumber; fundTotal: BigNumber }
    | { type: 'funding-rate-change'; time: Timestamp; longRate: BigNumber; shortRate: BigNumber }
    | { type: 'borrow-fee-change'; time: Timestamp; total: BigNumber; lp: BigNumber; xlp: BigNumber }
    | { type: 'liquidity-deposit'; addr: Address; amount: BigNumber; shares: BigNumber; stakedToXlp: boolean }
    | { type: 'liquidity-withdraw'; addr: Address; shares: BigNumber; collateral: BigNumber }
    | { type: 'lp-stake'; addr: Address; amount: BigNumber }
    | { type: 'xlp-unstake'; addr: Address; amount: BigNumber; endsAt: Timestamp }
    | { type: 'xlp-unstake-stopped'; addr: Address; restored: BigNumber }
    | { type: 'unstaked-lp-collected'; addr: Address; amount: BigNumber }
    | { type: 'yield-claim'; addr: Address; amount: BigNumber }
    | { type: 'yield-reinvest'; addr: Address; amount: BigNumber; stakedToXlp: boolean }
    | { type: 'liquidity-stats'; stats: LiquidityStats }
    | { type: 'lp-reset'; addr: Address | null }
    | { type: 'crank-work'; work: CrankWorkInfo }
    | { type: 'crank-exec-batch'; requested: number; paying: number; actual: number }
    | { type: 'crank-rewards'; recipient: Address; amount: BigNumber }
    | { type: 'limit-order-placed'; order: LimitOrder }
    | { type: 'limit-order-canceled'; orderId: OrderId; owner: Address }
    | { type: 'limit-order-triggered'; orderId: OrderId; result: LimitOrderResult }
    | { type: 'close-all-positions'; requestedBy: Address }
    | { type: 'config-update'; fields: string[] }
    | { type: 'dao-fees-transfer'; recipient: Address; amount: BigNumber }
    | { type: 'crank-funds'; amount: BigNumber };

export type MarketEvent = MarketEventBody & { version: typeof EVENT_SCHEMA_VERSION };

export type MarketEventType = MarketEvent['type'];

export const stampEvent = (body: MarketEventBody): MarketEvent => ({ ...body, version: EVENT_SCHEMA_VERSION });
