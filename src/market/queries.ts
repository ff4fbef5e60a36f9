/**
 * Read-only views of market state
 */

import type BigNumber from 'bignumber.js';
import { QUERY_CONSTANTS } from '../config/constants';
import type { MarketConfig } from '../config/marketConfig';
import type { MessageContext } from '../engine/context';
import { crankStats, type CrankStats } from '../engine/crankScheduler';
import { fundingRates, type FundingRates } from '../engine/feeEngine';
import { isResettingLps, loadLiquidityStats, loadAddrStats } from '../engine/liquidityPool';
import { positionView, type PositionView } from '../engine/positionLifecycle';
import type {
    Address,
    AllFees,
    ClosedPosition,
    LiquidityStats,
    LiquidityStatsByAddr,
    MarketId,
    OpenInterest,
    Page,
    PositionId,
    Timestamp,
} from '../types';
import { PerpError } from '../utils/errors';

const pageLimit = (limit?: number): number => Math.min(limit ?? QUERY_CONSTANTS.DEFAULT_LIMIT, QUERY_CONSTANTS.MAX_LIMIT);

export interface StatusResponse {
    market: MarketId;
    config: MarketConfig;
    liquidity: LiquidityStats;
    fees: AllFees;
    openInterest: OpenInterest;
    fundingRates: FundingRates;
    borrowFeeLp: BigNumber;
    borrowFeeXlp: BigNumber;
    deltaNeutralityFund: BigNumber;
    crank: CrankStats;
    closeAllRequested: boolean;
    resettingLps: boolean;
}

export function status(ctx: MessageContext): StatusResponse {
    const { fees, positions } = ctx.repos;
    const openInterest = fees.openInterest.get();
    return {
        market: ctx.market,
        config: ctx.config,
        liquidity: loadLiquidityStats(ctx),
        fees: fees.fees.get(),
        openInterest,
        fundingRates: fundingRates(ctx.config, openInterest.long, openInterest.short),
        borrowFeeLp: fees.borrowLp.latestValue(),
        borrowFeeXlp: fees.borrowXlp.latestValue(),
        deltaNeutralityFund: fees.deltaNeutralityFund.get(),
        crank: crankStats(ctx),
        closeAllRequested: positions.closeAllFlag.get(),
        resettingLps: isResettingLps(ctx),
    };
}

export function positionsByOwner(ctx: MessageContext, owner: Address, startAfter?: PositionId, limit?: number): Page<PositionView> {
    const n = pageLimit(limit);
    const entries = ctx.repos.positions.byOwner.range({
        min: { key: [owner, startAfter ?? 0], inclusive: startAfter === undefined },
        max: { key: [owner, Number.MAX_SAFE_INTEGER], inclusive: true },
        limit: n + 1,
    });
    const items = entries.slice(0, n).map(([[, id]]) => positionView(ctx, id));
    const last = items[items.length - 1];
    return { items, nextStartAfter: entries.length > n && last ? last.id : undefined };
}

export function closedPosition(ctx: MessageContext, id: PositionId): ClosedPosition {
    const closed = ctx.repos.positions.closed.get(id);
    if (!closed) {
        throw new PerpError('position', 'MissingPosition', `closed position ${id} not found`, { id });
    }
    return closed;
}

export interface ClosedCursor {
    closeTime: Timestamp;
    id: PositionId;
}

/**
 * Closed positions of an owner, most recent first
 */
export function closedPositionHistory(
    ctx: MessageContext,
    owner: Address,
    startAfter?: ClosedCursor,
    limit?: number
): Page<ClosedPosition, ClosedCursor> {
    const { positions } = ctx.repos;
    const n = pageLimit(limit);
    const entries = positions.closedByOwner.range({
        min: { key: [owner, 0, 0], inclusive: true },
        max: startAfter
            ? { key: [owner, startAfter.closeTime, startAfter.id], inclusive: false }
            : { key: [owner, Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER], inclusive: true },
        order: 'desc',
        limit: n + 1,
    });
    const items = entries.slice(0, n).map(([[, , id]]) => closedPosition(ctx, id));
    const last = items[items.length - 1];
    return {
        items,
        nextStartAfter: entries.length > n && last ? { closeTime: last.closeTime, id: last.id } : undefined,
    };
}

export interface LiquidityProvider {
    addr: Address;
    stats: LiquidityStatsByAddr;
}

export function liquidityProviders(ctx: MessageContext, startAfter?: Address, limit?: number): Page<LiquidityProvider, Address> {
    const n = pageLimit(limit);
    const entries = ctx.repos.liquidity.byAddr.range({
        min: startAfter === undefined ? undefined : { key: startAfter, inclusive: false },
        limit: n + 1,
    });
    const items = entries.slice(0, n).map(([addr]) => ({ addr, stats: loadAddrStats(ctx, addr) }));
    const last = items[items.length - 1];
    return { items, nextStartAfter: entries.length > n && last ? last.addr : undefined };
}
