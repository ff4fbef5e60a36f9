/**
 * Limit Order Book
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Orders that open a position once the price reaches a trigger. Collateral
 * and the crank fee are taken at placement; the crank executes the order
 * at the first price point that crosses the trigger.
 *
 * Triggers are stored as notional prices:
 *   long notional orders fire when price ≤ trigger
 *   short notional orders fire when price ≥ trigger
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError, isPerpError } from '../utils/errors';
import { mul } from '../utils/math';
import { QUERY_CONSTANTS } from '../config/constants';
import type { PriceKey } from '../storage/keys';
import type {
    Address,
    DirectionToBase,
    ExecutedLimitOrder,
    LimitOrder,
    LimitOrderResult,
    MaxGains,
    OrderId,
    Page,
    PricePoint,
} from '../types';
import type { MessageContext } from './context';
import { collectCrankFee, collectTradingFee } from './feeEngine';
import { baseToNotionalPrice, spotPrice, usdToCollateral } from './priceHistory';
import { ensureNotStale, openPosition, priceKeyCeil, priceKeyFloor } from './positionLifecycle';
import { leverageToNotional, validateMinimumDeposit } from './positionMath';

export const ORDER_CONFIG = {
    logPrefix: '[ORDERS]',
};

export interface PlaceLimitOrderParams {
    owner: Address;
    triggerPrice: BigNumber;
    collateral: BigNumber;
    leverage: BigNumber;
    direction: DirectionToBase;
    maxGains: MaxGains;
    stopLossOverride?: BigNumber;
    takeProfitOverride?: BigNumber;
}

const isNotionalLongOrder = (ctx: MessageContext, order: Pick<LimitOrder, 'direction' | 'leverage'>): boolean =>
    leverageToNotional(ctx.market.marketType, order.direction, order.leverage).isPositive();

function triggerMap(ctx: MessageContext, notionalLong: boolean) {
    const { orders } = ctx.repos;
    return notionalLong ? orders.longTriggers : orders.shortTriggers;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PLACE / CANCEL
// ═══════════════════════════════════════════════════════════════════════════════

export function placeLimitOrder(ctx: MessageContext, params: PlaceLimitOrderParams): LimitOrder {
    ensureNotStale(ctx);
    const price = spotPrice(ctx);
    if (params.triggerPrice.lte(0)) {
        throw new PerpError('limit-order', 'Conversion', 'trigger price must be positive');
    }
    validateMinimumDeposit(ctx.config, price, params.collateral);

    const crankFee = {
        collateral: usdToCollateral(price, ctx.config.crankFeeCharged),
        usd: ctx.config.crankFeeCharged,
    };
    const orderFee = mul(params.collateral, ctx.config.limitOrderFee);
    const collateral = params.collateral.minus(crankFee.collateral).minus(orderFee);
    if (collateral.lte(0)) {
        throw new PerpError('limit-order', 'InsufficientMargin', 'limit order collateral does not cover fees', {
            collateral: params.collateral.toFixed(),
            crankFee: crankFee.collateral.toFixed(),
            orderFee: orderFee.toFixed(),
        });
    }
    collectCrankFee(ctx, crankFee.collateral);
    if (!orderFee.isZero()) collectTradingFee(ctx, orderFee);

    const { orders } = ctx.repos;
    const order: LimitOrder = {
        orderId: orders.lastOrderId.next(),
        owner: params.owner,
        triggerPrice: params.triggerPrice,
        collateral,
        leverage: params.leverage,
        direction: params.direction,
        maxGains: params.maxGains,
        stopLossOverride: params.stopLossOverride,
        takeProfitOverride: params.takeProfitOverride,
        crankFee,
        createdAt: ctx.now,
    };
    const key: PriceKey = [baseToNotionalPrice(ctx.market, order.triggerPrice), order.orderId];
    orders.orders.set(order.orderId, order);
    orders.triggerKeys.set(order.orderId, key);
    triggerMap(ctx, isNotionalLongOrder(ctx, order)).set(key, true);
    orders.byOwner.set([order.owner, order.orderId], true);

    ctx.emit({ type: 'limit-order-placed', order });
    logger.info(
        `${ORDER_CONFIG.logPrefix} PLACED id=${order.orderId} owner=${order.owner} ${order.direction} ` +
        `trigger=${order.triggerPrice.toFixed()} collateral=${collateral.toFixed()}`
    );
    return order;
}

function removeOrder(ctx: MessageContext, order: LimitOrder): void {
    const { orders } = ctx.repos;
    const key = orders.triggerKeys.load(order.orderId, `trigger key for limit order ${order.orderId}`);
    triggerMap(ctx, isNotionalLongOrder(ctx, order)).delete(key);
    orders.triggerKeys.delete(order.orderId);
    orders.byOwner.delete([order.owner, order.orderId]);
    orders.orders.delete(order.orderId);
}

export function cancelLimitOrder(ctx: MessageContext, orderId: OrderId): LimitOrder {
    const order = ctx.repos.orders.get(orderId);
    if (order.owner !== ctx.sender) {
        throw new PerpError('limit-order', 'Auth', `limit order ${orderId} is not owned by ${ctx.sender}`, { orderId });
    }
    removeOrder(ctx, order);
    ctx.transfer(order.owner, order.collateral);
    ctx.emit({ type: 'limit-order-canceled', orderId, owner: order.owner });
    logger.info(`${ORDER_CONFIG.logPrefix} CANCELED id=${orderId} owner=${order.owner}`);
    return order;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * First order triggered at `price`: long notional orders from the highest
 * trigger down, then short notional orders from the lowest trigger up
 */
export function triggeredLimitOrder(ctx: MessageContext, price: PricePoint): OrderId | undefined {
    const { orders } = ctx.repos;
    const long = orders.longTriggers.range({ min: { key: priceKeyFloor(price.priceNotional), inclusive: true }, order: 'desc', limit: 1 })[0];
    if (long) return long[0][1];
    const short = orders.shortTriggers.first({ max: { key: priceKeyCeil(price.priceNotional), inclusive: true } });
    return short?.[0][1];
}

/**
 * Open the order's position at `price`. A failed open refunds the
 * collateral and is recorded; the order is removed either way.
 */
export function executeLimitOrder(ctx: MessageContext, orderId: OrderId, price: PricePoint): LimitOrderResult {
    const { orders } = ctx.repos;
    const order = orders.get(orderId);
    removeOrder(ctx, order);

    let result: LimitOrderResult;
    try {
        const pos = ctx.journal.run(() =>
            openPosition(ctx, {
                owner: order.owner,
                collateral: order.collateral,
                leverage: order.leverage,
                direction: order.direction,
                maxGains: order.maxGains,
                stopLossOverride: order.stopLossOverride,
                takeProfitOverride: order.takeProfitOverride,
                prepaidCrankFee: order.crankFee,
                atPrice: price,
            })
        );
        result = { kind: 'success', positionId: pos.id };
        logger.info(`${ORDER_CONFIG.logPrefix} EXECUTED id=${orderId} position=${pos.id}`);
    } catch (err) {
        if (!isPerpError(err)) throw err;
        ctx.transfer(order.owner, order.collateral);
        result = { kind: 'failure', reason: err.description };
        logger.warn(`${ORDER_CONFIG.logPrefix} FAILED id=${orderId} owner=${order.owner} reason=${err.description}`);
    }

    const executed: ExecutedLimitOrder = { order, result, timestamp: price.timestamp };
    orders.history.set([order.owner, orderId], executed);
    ctx.emit({ type: 'limit-order-triggered', orderId, result });
    return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

const pageLimit = (limit?: number): number => Math.min(limit ?? QUERY_CONSTANTS.DEFAULT_LIMIT, QUERY_CONSTANTS.MAX_LIMIT);

export function limitOrdersByOwner(ctx: MessageContext, owner: Address, startAfter?: OrderId, limit?: number): Page<LimitOrder> {
    const { orders } = ctx.repos;
    const n = pageLimit(limit);
    const entries = orders.byOwner.range({
        min: { key: [owner, startAfter ?? 0], inclusive: startAfter === undefined },
        max: { key: [owner, Number.MAX_SAFE_INTEGER], inclusive: true },
        limit: n + 1,
    });
    const items = entries.slice(0, n).map(([[, id]]) => orders.get(id));
    const last = items[items.length - 1];
    return { items, nextStartAfter: entries.length > n && last ? last.orderId : undefined };
}

export function limitOrderHistory(ctx: MessageContext, owner: Address, startAfter?: OrderId, limit?: number): Page<ExecutedLimitOrder> {
    const n = pageLimit(limit);
    const entries = ctx.repos.orders.history.range({
        max: { key: [owner, startAfter ?? Number.MAX_SAFE_INTEGER], inclusive: startAfter === undefined },
        min: { key: [owner, 0], inclusive: true },
        order: 'desc',
        limit: n + 1,
    });
    const items = entries.slice(0, n).map(([, executed]) => executed);
    const last = items[items.length - 1];
    return { items, nextStartAfter: entries.length > n && last ? last.order.orderId : undefined };
}
