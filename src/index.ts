/**
 * Public entry point of the settlement engine
 */

export { Market, MARKET_CONFIG } from './market/market';
export type { ExecuteData, ExecuteResult, MarketOptions } from './market/market';
export { receivedCollateral, takesFunds, needsFreshPrice } from './market/messages';
export type { ExecuteMsg, ExecuteMsgType, Funds, MessageInfo } from './market/messages';
export type { ClosedCursor, LiquidityProvider, StatusResponse } from './market/queries';

export {
    DEFAULT_MARKET_CONFIG,
    loadMarketConfigFromEnv,
    mergeMarketConfig,
    validateMarketConfig,
} from './config/marketConfig';
export type { CollateralAsset, MarketConfig, MarketConfigUpdate, MaxLiquidity } from './config/marketConfig';

export { PerpError, isPerpError } from './utils/errors';
export type { ErrorDomain, ErrorId, ErrorPayload } from './utils/errors';
export { Decimal, toDecimal } from './utils/math';
export { getAuditTrail, clearAuditTrail } from './utils/logger';

export type { MarketEvent, MarketEventBody, MarketEventType, PositionUpdateKind } from './engine/events';
export type { CrankBatchResult, CrankStats } from './engine/crankScheduler';
export type { LpInfo } from './engine/liquidityPool';
export type { PositionView, SlippageAssert } from './engine/positionLifecycle';
export type { PriceHistoryPage } from './engine/priceHistory';
export * from './types';
