/**
 * Market
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Entry point for one perpetual-futures market. Owns the store, routes each
 * ExecuteMsg to the engine inside a transaction and exposes the queries.
 *
 * RESULT CONTRACT:
 * - success → { ok: true, data, events, messages }
 * - PerpError → state rolled back, { ok: false, error }
 * - anything else → state rolled back, rethrown
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError, isPerpError, type ErrorPayload } from '../utils/errors';
import {
    CONFIG_LOG_PREFIX,
    DEFAULT_MARKET_CONFIG,
    mergeMarketConfig,
    validateMarketConfig,
    type MarketConfig,
} from '../config/marketConfig';
import { KvStore, createRepositories, type Repositories } from '../storage';
import type { Order } from '../storage/kvStore';
import { MessageContext } from '../engine/context';
import type { MarketEvent } from '../engine/events';
import { crankExecBatch, crankStats, requestCloseAll, type CrankBatchResult, type CrankStats } from '../engine/crankScheduler';
import { initFeeSeries, provideCrankFunds, transferDaoFees } from '../engine/feeEngine';
import {
    cancelLimitOrder,
    limitOrderHistory,
    limitOrdersByOwner,
    placeLimitOrder,
} from '../engine/limitOrderBook';
import {
    claimYield,
    collectUnstakedLp,
    depositLiquidity,
    loadLiquidityStats,
    lpInfo,
    reinvestYield,
    stakeLp,
    stopUnstakingXlp,
    unstakeXlp,
    withdrawLiquidity,
    type LpInfo,
} from '../engine/liquidityPool';
import {
    addCollateralImpactLeverage,
    addCollateralImpactSize,
    closePositionByOwner,
    openPosition,
    positionView,
    removeCollateralImpactLeverage,
    removeCollateralImpactSize,
    setTriggerOrder,
    updateLeverage,
    updateMaxGains,
    type PositionView,
} from '../engine/positionLifecycle';
import {
    appendPrice,
    composeFeeds,
    latestAsOf,
    priceHistory,
    spotPrice,
    type PriceHistoryPage,
} from '../engine/priceHistory';
import type {
    Address,
    ClosedPosition,
    ExecutedLimitOrder,
    LimitOrder,
    LiquidityStats,
    MarketId,
    OrderId,
    OutgoingMessage,
    Page,
    Position,
    PositionId,
    PriceFeedSource,
    PricePoint,
    Timestamp,
} from '../types';
import { receivedCollateral, needsFreshPrice, type ExecuteMsg, type MessageInfo } from './messages';
import {
    closedPosition,
    closedPositionHistory,
    liquidityProviders,
    positionsByOwner,
    status,
    type ClosedCursor,
    type LiquidityProvider,
    type StatusResponse,
} from './queries';

export const MARKET_CONFIG = {
    logPrefix: '[MARKET]',
};

export type ExecuteData =
    | { kind: 'none' }
    | { kind: 'position'; position: Position }
    | { kind: 'closed'; closed: ClosedPosition }
    | { kind: 'amount'; amount: BigNumber }
    | { kind: 'limit-order'; order: LimitOrder }
    | { kind: 'crank'; batch: CrankBatchResult }
    | { kind: 'price'; price: PricePoint };

export type ExecuteResult =
    | { ok: true; data: ExecuteData; events: MarketEvent[]; messages: OutgoingMessage[] }
    | { ok: false; error: ErrorPayload };

export interface MarketOptions {
    config?: MarketConfig;
    /** Time the market is instantiated, seeds the fee rate series */
    createdAt?: Timestamp;
    /** Source of feed values for oracle-priced markets */
    priceFeeds?: PriceFeedSource;
}

const NONE: ExecuteData = { kind: 'none' };

export class Market {
    readonly id: MarketId;
    private readonly store = new KvStore();
    private readonly repos: Repositories;
    private readonly priceFeeds?: PriceFeedSource;
    private config: MarketConfig;

    constructor(id: MarketId, options: MarketOptions = {}) {
        this.id = id;
        this.config = options.config ?? DEFAULT_MARKET_CONFIG;
        validateMarketConfig(this.config);
        this.priceFeeds = options.priceFeeds;
        this.repos = createRepositories(this.store);
        initFeeSeries(this.repos, this.config, options.createdAt ?? 0);
        logger.info(`${MARKET_CONFIG.logPrefix} instantiated ${id.base}/${id.quote} (${id.marketType})`);
    }

    get currentConfig(): MarketConfig {
        return this.config;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // EXECUTE
    // ═══════════════════════════════════════════════════════════════════════════

    execute(info: MessageInfo, msg: ExecuteMsg): ExecuteResult {
        const ctx = this.context(info.sender, info.now);
        try {
            const data = this.store.transaction(() => {
                const funds = receivedCollateral(this.config.collateral, msg.type, info.funds);
                if (needsFreshPrice(msg.type)) this.appendOraclePrice(ctx, false);
                return this.dispatch(ctx, msg, funds);
            });
            this.config = ctx.config;
            return { ok: true, data, events: ctx.events, messages: ctx.messages };
        } catch (err) {
            if (isPerpError(err)) {
                logger.warn(`${MARKET_CONFIG.logPrefix} ${msg.type} from ${info.sender} rejected: ${err.message}`);
                return { ok: false, error: err.toPayload() };
            }
            logger.error(`${MARKET_CONFIG.logPrefix} ${msg.type} from ${info.sender} failed unexpectedly`, { err });
            throw err;
        }
    }

    private context(sender: Address, now: Timestamp): MessageContext {
        return new MessageContext({
            sender,
            now,
            config: this.config,
            market: this.id,
            repos: this.repos,
            journal: this.store.journal,
        });
    }

    private requireAdmin(ctx: MessageContext): void {
        if (ctx.sender !== ctx.config.dao) {
            throw new PerpError('market', 'Auth', `${ctx.sender} is not the market admin`);
        }
    }

    /**
     * Append a price composed from the oracle feeds. Does nothing for manual
     * markets unless `explicit`, and nothing when a price exists at `now`.
     */
    private appendOraclePrice(ctx: MessageContext, explicit: boolean): PricePoint | undefined {
        const source = ctx.config.spotPrice;
        if (source.kind === 'manual') {
            if (explicit) throw new PerpError('spot-price', 'Auth', 'market uses manual prices');
            return undefined;
        }
        if (ctx.repos.prices.points.has(ctx.now)) {
            return explicit ? latestAsOf(ctx.repos, ctx.market, ctx.now) : undefined;
        }
        if (!this.priceFeeds) {
            throw new PerpError('spot-price', 'PriceNotFound', 'oracle market has no price feed source');
        }
        const priceBase = composeFeeds(source.feeds, this.priceFeeds, ctx.now);
        const priceUsd = source.feedsUsd.length > 0 ? composeFeeds(source.feedsUsd, this.priceFeeds, ctx.now) : undefined;
        return appendPrice(ctx, priceBase, priceUsd);
    }

    private dispatch(ctx: MessageContext, msg: ExecuteMsg, funds: BigNumber | undefined): ExecuteData {
        const sender = ctx.sender;
        const amount = (): BigNumber => {
            if (!funds) throw PerpError.invariant(`${msg.type} reached dispatch without funds`);
            return funds;
        };
        const position = (p: Position | undefined): ExecuteData => (p ? { kind: 'position', position: p } : NONE);

        switch (msg.type) {
            case 'open-position':
                return position(
                    openPosition(ctx, {
                        owner: sender,
                        collateral: amount(),
                        leverage: msg.leverage,
                        direction: msg.direction,
                        maxGains: msg.maxGains,
                        slippageAssert: msg.slippageAssert,
                        stopLossOverride: msg.stopLossOverride,
                        takeProfitOverride: msg.takeProfitOverride,
                    })
                );
            case 'update-position-add-collateral-impact-leverage':
                return position(addCollateralImpactLeverage(ctx, msg.id, amount()));
            case 'update-position-add-collateral-impact-size':
                return position(addCollateralImpactSize(ctx, msg.id, amount(), msg.slippageAssert));
            case 'update-position-remove-collateral-impact-leverage':
                return position(removeCollateralImpactLeverage(ctx, msg.id, msg.amount));
            case 'update-position-remove-collateral-impact-size':
                return position(removeCollateralImpactSize(ctx, msg.id, msg.amount, msg.slippageAssert));
            case 'update-position-leverage':
                return position(updateLeverage(ctx, msg.id, msg.leverage, msg.slippageAssert));
            case 'update-position-max-gains':
                return position(updateMaxGains(ctx, msg.id, msg.maxGains));
            case 'set-trigger-order':
                return position(setTriggerOrder(ctx, msg.id, msg.stopLossOverride, msg.takeProfitOverride));
            case 'close-position':
                return { kind: 'closed', closed: closePositionByOwner(ctx, msg.id, msg.slippageAssert) };
            case 'close-all-positions':
                this.requireAdmin(ctx);
                requestCloseAll(ctx);
                return NONE;
            case 'deposit-liquidity':
                return { kind: 'amount', amount: depositLiquidity(ctx, sender, amount(), msg.stakeToXlp) };
            case 'reinvest-yield':
                return { kind: 'amount', amount: reinvestYield(ctx, sender, msg.amount, msg.stakeToXlp) };
            case 'withdraw-liquidity':
                return { kind: 'amount', amount: withdrawLiquidity(ctx, sender, msg.lpAmount) };
            case 'claim-yield':
                return { kind: 'amount', amount: claimYield(ctx, sender) };
            case 'stake-lp':
                return { kind: 'amount', amount: stakeLp(ctx, sender, msg.amount) };
            case 'unstake-xlp':
                return { kind: 'amount', amount: unstakeXlp(ctx, sender, msg.amount) };
            case 'stop-unstaking-xlp':
                stopUnstakingXlp(ctx, sender);
                return NONE;
            case 'collect-unstaked-lp':
                collectUnstakedLp(ctx, sender);
                return NONE;
            case 'place-limit-order':
                return {
                    kind: 'limit-order',
                    order: placeLimitOrder(ctx, {
                        owner: sender,
                        triggerPrice: msg.triggerPrice,
                        collateral: amount(),
                        leverage: msg.leverage,
                        direction: msg.direction,
                        maxGains: msg.maxGains,
                        stopLossOverride: msg.stopLossOverride,
                        takeProfitOverride: msg.takeProfitOverride,
                    }),
                };
            case 'cancel-limit-order':
                return { kind: 'limit-order', order: cancelLimitOrder(ctx, msg.orderId) };
            case 'crank':
                return { kind: 'crank', batch: crankExecBatch(ctx, msg.execs, msg.rewards) };
            case 'set-manual-price': {
                const source = ctx.config.spotPrice;
                if (source.kind !== 'manual' || source.admin !== sender) {
                    throw new PerpError('spot-price', 'Auth', `${sender} may not set the spot price`);
                }
                return { kind: 'price', price: appendPrice(ctx, msg.priceBase, msg.priceUsd) };
            }
            case 'append-oracle-price': {
                const price = this.appendOraclePrice(ctx, true);
                return price ? { kind: 'price', price } : NONE;
            }
            case 'provide-crank-funds':
                provideCrankFunds(ctx, amount());
                return NONE;
            case 'transfer-dao-fees':
                return { kind: 'amount', amount: transferDaoFees(ctx) };
            case 'update-config': {
                this.requireAdmin(ctx);
                ctx.config = mergeMarketConfig(ctx.config, msg.update);
                const fields = Object.keys(msg.update);
                ctx.emit({ type: 'config-update', fields });
                logger.info(`${CONFIG_LOG_PREFIX} updated ${fields.join(', ')}`);
                return NONE;
            }
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUERIES
    // ═══════════════════════════════════════════════════════════════════════════

    private query<T>(now: Timestamp, fn: (ctx: MessageContext) => T): T {
        return fn(this.context('', now));
    }

    status(now: Timestamp): StatusResponse {
        return this.query(now, status);
    }

    spotPrice(now: Timestamp, at?: Timestamp): PricePoint {
        return this.query(now, (ctx) => (at === undefined ? spotPrice(ctx) : latestAsOf(ctx.repos, ctx.market, at)));
    }

    spotPriceHistory(options: { startAfter?: Timestamp; limit?: number; order?: Order } = {}): PriceHistoryPage {
        return priceHistory(this.repos, this.id, options);
    }

    crankStats(now: Timestamp): CrankStats {
        return this.query(now, crankStats);
    }

    position(now: Timestamp, id: PositionId): PositionView {
        return this.query(now, (ctx) => positionView(ctx, id));
    }

    positions(now: Timestamp, owner: Address, startAfter?: PositionId, limit?: number): Page<PositionView> {
        return this.query(now, (ctx) => positionsByOwner(ctx, owner, startAfter, limit));
    }

    closedPosition(id: PositionId): ClosedPosition {
        return this.query(0, (ctx) => closedPosition(ctx, id));
    }

    closedPositionHistory(owner: Address, startAfter?: ClosedCursor, limit?: number): Page<ClosedPosition, ClosedCursor> {
        return this.query(0, (ctx) => closedPositionHistory(ctx, owner, startAfter, limit));
    }

    liquidityStats(): LiquidityStats {
        return this.query(0, loadLiquidityStats);
    }

    lpInfo(now: Timestamp, addr: Address): LpInfo {
        return this.query(now, (ctx) => lpInfo(ctx, addr));
    }

    liquidityProviders(startAfter?: Address, limit?: number): Page<LiquidityProvider, Address> {
        return this.query(0, (ctx) => liquidityProviders(ctx, startAfter, limit));
    }

    limitOrders(owner: Address, startAfter?: OrderId, limit?: number): Page<LimitOrder> {
        return this.query(0, (ctx) => limitOrdersByOwner(ctx, owner, startAfter, limit));
    }

    limitOrderHistory(owner: Address, startAfter?: OrderId, limit?: number): Page<ExecutedLimitOrder> {
        return this.query(0, (ctx) => limitOrderHistory(ctx, owner, startAfter, limit));
    }
}
