/**
 * Crank Scheduler
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Advances every time-dependent piece of state one unit of work at a time.
 * `crankWork` only looks at storage and picks the next unit; `applyWork`
 * performs it. Anyone may crank, and is paid from the crank fee pool for
 * work that settles positions or orders.
 *
 * PRIORITY:
 *   1. close-all requested and a position is open
 *   2. LP balance reset in progress
 *   3. for the next unprocessed price point:
 *        liquifunding due → unpend trigger prices → liquidation trigger hit
 *        → limit order trigger hit → mark the point completed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { CRANK_CONSTANTS } from '../config/constants';
import type { Address, CrankWorkInfo, Timestamp } from '../types';
import type { MessageContext } from './context';
import { accumulateBorrowRate, accumulateFundingRate, allocateCrankFees } from './feeEngine';
import { executeLimitOrder, triggeredLimitOrder } from './limitOrderBook';
import { isResettingLps, resetNextLpBalance } from './liquidityPool';
import { latestAsOf } from './priceHistory';
import {
    closeAtLatestPrice,
    closePosition,
    liquifund,
    liquifundAndStore,
    nextCrankPrice,
    priceKeyCeil,
    priceKeyFloor,
    staleness,
    unpendLiquidationPrices,
} from './positionLifecycle';

export const CRANK_CONFIG = {
    logPrefix: '[CRANK]',
};

const MAX_ID = Number.MAX_SAFE_INTEGER;

/**
 * Next unit of work, or null when there is nothing to do
 */
export function crankWork(ctx: MessageContext): CrankWorkInfo | null {
    const { positions } = ctx.repos;

    if (positions.closeAllFlag.get()) {
        const first = positions.open.first();
        if (first) return { kind: 'close-all-positions', position: first[0] };
    }
    if (isResettingLps(ctx)) return { kind: 'reset-lp-balances' };

    const point = nextCrankPrice(ctx);
    if (!point) return null;
    const priceTimestamp = point.timestamp;

    const due = positions.nextLiquifunding.first({ max: { key: [priceTimestamp, MAX_ID], inclusive: true } });
    if (due) {
        const pos = positions.get(due[0][1]);
        return { kind: 'liquifunding', position: pos.id, liquifundedAt: pos.liquifundedAt, priceTimestamp };
    }

    const pending = positions.pendingLiquidation.first({ max: { key: [priceTimestamp, MAX_ID], inclusive: true } });
    if (pending) return { kind: 'unpend-liquidation-prices', position: pending[0][1] };

    const price = point.priceNotional;
    const falling = positions.triggersDesc.range({ min: { key: priceKeyFloor(price), inclusive: true }, order: 'desc', limit: 1 })[0];
    if (falling) return { kind: 'liquidation', position: falling[0][1], reason: falling[1], priceTimestamp };
    const rising = positions.triggersAsc.first({ max: { key: priceKeyCeil(price), inclusive: true } });
    if (rising) return { kind: 'liquidation', position: rising[0][1], reason: rising[1], priceTimestamp };

    const orderId = triggeredLimitOrder(ctx, point);
    if (orderId !== undefined) return { kind: 'limit-order', orderId, priceTimestamp };

    return { kind: 'completed', priceTimestamp };
}

/**
 * Whether a unit of work earns the cranker a reward
 */
export const isPayingWork = (work: CrankWorkInfo): boolean =>
    work.kind === 'liquifunding' || work.kind === 'liquidation' || work.kind === 'limit-order';

export const workWeight = (work: CrankWorkInfo): number =>
    work.kind === 'completed' ? CRANK_CONSTANTS.COMPLETED_WEIGHT : CRANK_CONSTANTS.WORK_WEIGHT;

export function applyWork(ctx: MessageContext, work: CrankWorkInfo): void {
    const { positions, prices } = ctx.repos;
    ctx.emit({ type: 'crank-work', work });

    switch (work.kind) {
        case 'close-all-positions': {
            closeAtLatestPrice(ctx, positions.get(work.position));
            if (positions.open.size === 0) {
                positions.closeAllFlag.set(false);
                logger.warn(`${CRANK_CONFIG.logPrefix} CLOSE-ALL finished, no open positions left`);
            }
            return;
        }
        case 'reset-lp-balances':
            resetNextLpBalance(ctx);
            return;
        case 'liquifunding': {
            const pos = positions.get(work.position);
            liquifundAndStore(ctx, pos, pos.liquifundedAt, pos.nextLiquifunding, true);
            return;
        }
        case 'unpend-liquidation-prices':
            unpendLiquidationPrices(ctx, work.position);
            return;
        case 'liquidation': {
            const pos = positions.get(work.position);
            const outcome = liquifund(ctx, pos, pos.liquifundedAt, work.priceTimestamp, true);
            const point = latestAsOf(ctx.repos, ctx.market, work.priceTimestamp);
            if (outcome.kind === 'open') {
                closePosition(
                    ctx,
                    { ...outcome.pos, liquifundedAt: work.priceTimestamp },
                    { kind: 'liquidated', reason: work.reason },
                    point
                );
            } else {
                closePosition(ctx, outcome.pos, outcome.reason, outcome.settlement);
            }
            return;
        }
        case 'limit-order':
            executeLimitOrder(ctx, work.orderId, latestAsOf(ctx.repos, ctx.market, work.priceTimestamp));
            return;
        case 'completed': {
            const point = latestAsOf(ctx.repos, ctx.market, work.priceTimestamp);
            accumulateBorrowRate(ctx, point);
            accumulateFundingRate(ctx, point);
            prices.lastCrankCompleted.set(work.priceTimestamp);
            ctx.invalidateCache();
            logger.debug(`${CRANK_CONFIG.logPrefix} completed price point t=${work.priceTimestamp}`);
            return;
        }
    }
}

export interface CrankBatchResult {
    requested: number;
    paying: number;
    actual: number;
}

/**
 * Run work until the weight budget of `execs` runs out or nothing is left.
 * Rewards for paying work go to `rewards`, the sender by default.
 */
export function crankExecBatch(ctx: MessageContext, execs?: number, rewards?: Address): CrankBatchResult {
    const requested = execs ?? ctx.config.crankExecs;
    let budget = requested * CRANK_CONSTANTS.WEIGHT_PER_EXEC;
    let paying = 0;
    let actual = 0;

    for (;;) {
        const work = crankWork(ctx);
        if (!work) break;
        const weight = workWeight(work);
        if (weight > budget) break;
        budget -= weight;
        applyWork(ctx, work);
        actual += 1;
        if (isPayingWork(work)) paying += 1;
    }

    ctx.emit({ type: 'crank-exec-batch', requested, paying, actual });
    const reward = allocateCrankFees(ctx, rewards ?? ctx.sender, paying);
    logger.info(
        `${CRANK_CONFIG.logPrefix} batch requested=${requested} actual=${actual} paying=${paying} reward=${reward.toFixed()}`
    );
    return { requested, paying, actual };
}

export interface CrankStats {
    nextWork: CrankWorkInfo | null;
    oldestUnprocessedPrice?: Timestamp;
    staleSince?: Timestamp;
}

export function crankStats(ctx: MessageContext): CrankStats {
    return {
        nextWork: crankWork(ctx),
        oldestUnprocessedPrice: nextCrankPrice(ctx)?.timestamp,
        staleSince: staleness(ctx).staleLiquifunding,
    };
}

/**
 * Ask the crank to close every open position at the latest price
 */
export function requestCloseAll(ctx: MessageContext): void {
    ctx.repos.positions.closeAllFlag.set(true);
    ctx.emit({ type: 'close-all-positions', requestedBy: ctx.sender });
    logger.warn(`${CRANK_CONFIG.logPrefix} CLOSE-ALL requested by ${ctx.sender}`);
}
