/**
 * Price History
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Append-only record of spot prices keyed by timestamp. A point is valid as of
 * its own timestamp and every later time until superseded. The crank walks
 * these points in order; everything else asks for the latest one.
 *
 * USD pricing of collateral:
 *   - base is USD, collateral is quote → 1 / priceBase
 *   - base is USD, collateral is base  → 1
 *   - quote is USD, collateral is quote → 1
 *   - quote is USD, collateral is base  → priceBase
 *   - neither side USD                  → must be supplied
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError } from '../utils/errors';
import { ONE, div, mul } from '../utils/math';
import { QUERY_CONSTANTS } from '../config/constants';
import type { Repositories } from '../storage';
import type { Order } from '../storage/kvStore';
import type { MarketId, PriceFeedSource, PricePoint, SpotPriceFeed, StoredPrice, Timestamp } from '../types';
import type { MessageContext } from './context';

export const PRICE_CONFIG = {
    logPrefix: '[PRICE]',
    usdSymbol: 'USD',
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function isNotionalUsd(market: MarketId): boolean {
    return market.marketType === 'collateral-is-quote'
        ? market.base === PRICE_CONFIG.usdSymbol
        : market.quote === PRICE_CONFIG.usdSymbol;
}

/**
 * USD price of one unit of collateral derivable from the base price alone
 */
export function derivedUsdPrice(market: MarketId, priceBase: BigNumber): BigNumber | undefined {
    if (market.base === PRICE_CONFIG.usdSymbol) {
        return market.marketType === 'collateral-is-quote' ? div(ONE, priceBase) : ONE;
    }
    if (market.quote === PRICE_CONFIG.usdSymbol) {
        return market.marketType === 'collateral-is-quote' ? ONE : priceBase;
    }
    return undefined;
}

export function toPricePoint(market: MarketId, timestamp: Timestamp, stored: StoredPrice): PricePoint {
    return {
        timestamp,
        priceBase: stored.priceBase,
        priceNotional: market.marketType === 'collateral-is-quote' ? stored.priceBase : div(ONE, stored.priceBase),
        priceUsd: stored.priceUsd,
        marketType: market.marketType,
        isNotionalUsd: isNotionalUsd(market),
    };
}

export const collateralToNotional = (price: PricePoint, collateral: BigNumber): BigNumber =>
    div(collateral, price.priceNotional);

export const notionalToCollateral = (price: PricePoint, notional: BigNumber): BigNumber =>
    mul(notional, price.priceNotional);

export const collateralToUsd = (price: PricePoint, collateral: BigNumber): BigNumber => mul(collateral, price.priceUsd);

export const usdToCollateral = (price: PricePoint, usd: BigNumber): BigNumber => div(usd, price.priceUsd);

/** Notional price for a base price in this market */
export function baseToNotionalPrice(market: MarketId, priceBase: BigNumber): BigNumber {
    return market.marketType === 'collateral-is-quote' ? priceBase : div(ONE, priceBase);
}

// ═══════════════════════════════════════════════════════════════════════════════
// APPEND
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Append a price at the message time.
 *
 * Fails PriceAlreadyExists when a point already exists at `now`, and
 * PriceConflict when a supplied USD price disagrees with the derivable one.
 */
export function appendPrice(ctx: MessageContext, priceBase: BigNumber, priceUsd?: BigNumber): PricePoint {
    const { prices } = ctx.repos;
    if (!priceBase.isFinite() || priceBase.lte(0)) {
        throw new PerpError('spot-price', 'Conversion', `price must be positive, got ${priceBase.toFixed()}`);
    }
    if (priceUsd !== undefined && (!priceUsd.isFinite() || priceUsd.lte(0))) {
        throw new PerpError('spot-price', 'Conversion', `USD price must be positive, got ${priceUsd.toFixed()}`);
    }
    if (prices.points.has(ctx.now)) {
        throw new PerpError('spot-price', 'PriceAlreadyExists', `price already exists at ${ctx.now}`, { timestamp: ctx.now });
    }

    const latest = prices.points.last();
    if (latest && latest[0] > ctx.now) {
        throw PerpError.invariant(`price at ${ctx.now} is older than latest price at ${latest[0]}`);
    }

    const derived = derivedUsdPrice(ctx.market, priceBase);
    let usd: BigNumber;
    if (derived === undefined) {
        if (priceUsd === undefined) {
            throw new PerpError('spot-price', 'PriceNotFound', 'market is not USD-denominated, a USD price is required');
        }
        usd = priceUsd;
    } else {
        if (priceUsd !== undefined && !priceUsd.eq(derived)) {
            throw new PerpError(
                'spot-price',
                'PriceConflict',
                `supplied USD price ${priceUsd.toFixed()} conflicts with derived ${derived.toFixed()}`
            );
        }
        usd = derived;
    }

    const stored: StoredPrice = { priceBase, priceUsd: usd };
    prices.points.set(ctx.now, stored);
    ctx.invalidateCache();

    const point = toPricePoint(ctx.market, ctx.now, stored);
    ctx.emit({
        type: 'spot-price',
        timestamp: point.timestamp,
        priceBase: point.priceBase,
        priceNotional: point.priceNotional,
        priceUsd: point.priceUsd,
    });
    logger.debug(`${PRICE_CONFIG.logPrefix} append t=${ctx.now} base=${priceBase.toFixed()} usd=${usd.toFixed()}`);
    return point;
}

/**
 * Compose a spot price from oracle feeds: the product of each feed's value,
 * inverted where the feed is flagged as such
 */
export function composeFeeds(feeds: SpotPriceFeed[], source: PriceFeedSource, now: Timestamp): BigNumber {
    if (feeds.length === 0) {
        throw new PerpError('spot-price', 'PriceNotFound', 'no price feeds configured');
    }
    let price = ONE;
    for (const feed of feeds) {
        const value = source.read(feed.id, now);
        if (value === undefined || value.lte(0)) {
            throw new PerpError('spot-price', 'PriceNotFound', `feed ${feed.id} has no price`, { feed: feed.id });
        }
        price = feed.inverted ? div(price, value) : mul(price, value);
    }
    return price;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOOKUPS
// ═══════════════════════════════════════════════════════════════════════════════

export function tryLatestAsOf(repos: Repositories, market: MarketId, time: Timestamp): PricePoint | undefined {
    const entry = repos.prices.points.last({ max: { key: time, inclusive: true } });
    return entry ? toPricePoint(market, entry[0], entry[1]) : undefined;
}

export function latestAsOf(repos: Repositories, market: MarketId, time: Timestamp): PricePoint {
    const point = tryLatestAsOf(repos, market, time);
    if (!point) {
        throw new PerpError('spot-price', 'PriceNotFound', `no price at or before ${time}`, { time });
    }
    return point;
}

/**
 * Most recent point strictly before `time`
 */
export function latestBefore(repos: Repositories, market: MarketId, time: Timestamp): PricePoint {
    const entry = repos.prices.points.last({ max: { key: time, inclusive: false } });
    if (!entry) {
        throw new PerpError('spot-price', 'PriceNotFound', `no price before ${time}`, { time });
    }
    return toPricePoint(market, entry[0], entry[1]);
}

/**
 * Earliest point strictly after `bound`, or the first point when unbounded
 */
export function nextAfter(repos: Repositories, market: MarketId, bound: Timestamp | null): PricePoint | undefined {
    const entry = bound === null
        ? repos.prices.points.first()
        : repos.prices.points.first({ min: { key: bound, inclusive: false } });
    return entry ? toPricePoint(market, entry[0], entry[1]) : undefined;
}

export function trySpotPrice(ctx: MessageContext): PricePoint | undefined {
    if (ctx.cache.spotPrice === undefined) {
        ctx.cache.spotPrice = tryLatestAsOf(ctx.repos, ctx.market, ctx.now) ?? null;
    }
    return ctx.cache.spotPrice ?? undefined;
}

/**
 * Latest price as of the message time
 */
export function spotPrice(ctx: MessageContext): PricePoint {
    const point = trySpotPrice(ctx);
    if (!point) {
        throw new PerpError('spot-price', 'PriceNotFound', `no price at or before ${ctx.now}`);
    }
    return point;
}

export interface PriceHistoryPage {
    points: PricePoint[];
    nextStartAfter?: Timestamp;
}

export function priceHistory(
    repos: Repositories,
    market: MarketId,
    options: { startAfter?: Timestamp; limit?: number; order?: Order } = {}
): PriceHistoryPage {
    const order = options.order ?? 'desc';
    const limit = Math.min(options.limit ?? QUERY_CONSTANTS.DEFAULT_LIMIT, QUERY_CONSTANTS.MAX_LIMIT);
    const bound = options.startAfter === undefined ? undefined : { key: options.startAfter, inclusive: false };
    const entries = repos.prices.points.range({
        order,
        limit: limit + 1,
        min: order === 'asc' ? bound : undefined,
        max: order === 'desc' ? bound : undefined,
    });
    const page = entries.slice(0, limit).map(([t, stored]) => toPricePoint(market, t, stored));
    const last = page[page.length - 1];
    return {
        points: page,
        nextStartAfter: entries.length > limit && last ? last.timestamp : undefined,
    };
}
