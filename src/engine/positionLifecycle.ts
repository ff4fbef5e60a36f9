/**
 * Position Lifecycle
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Open, liquifund, update and close leveraged positions.
 *
 * LIQUIFUNDING settles a position over [start, end]:
 *   1. borrow, funding and crank fees, each capped by its margin
 *   2. price exposure (p_end − p_start) × notional, clamped so the trader never
 *      loses more than active − dnfMargin nor gains more than counter
 *   3. margin recomputed at the end price; a position that no longer covers
 *      it, or whose direction to base flipped, is closed
 *
 * INVARIANTS for every stored position:
 *   - active > 0, counter > 0
 *   - active ≥ liquidation margin total
 *   - liquifundedAt < nextLiquifunding < staleAt
 *   - locked liquidity = Σ counter collateral
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError, invariant } from '../utils/errors';
import { ONE, ZERO, div, maxDec, minDec, mul } from '../utils/math';
import { fuzzOffsetMs } from '../utils/hash';
import { MS_PER_SECOND } from '../config/constants';
import type { PriceKey } from '../storage/keys';
import type {
    Address,
    ClosedPosition,
    CollateralAndUsd,
    DirectionToBase,
    MaxGains,
    Position,
    PositionCloseReason,
    PositionId,
    PricePoint,
    Timestamp,
} from '../types';
import type { MessageContext } from './context';
import type { PositionUpdateKind } from './events';
import { adjustOpenInterest, chargeDeltaNeutralityFee, netOpenInterest, previewDeltaNeutralityFee } from './deltaNeutralityFee';
import {
    collectCrankFee,
    collectTradingFee,
    decreaseTotalFundingMargin,
    increaseTotalFundingMargin,
    previewPendingFees,
    settlePendingFees,
} from './feeEngine';
import { lockLiquidity, unlockLiquidity, updateLockedLiquidity } from './liquidityPool';
import {
    baseToNotionalPrice,
    collateralToUsd,
    latestAsOf,
    nextAfter,
    notionalToCollateral,
    spotPrice,
    trySpotPrice,
    usdToCollateral,
} from './priceHistory';
import {
    activeLeverageToNotional,
    counterCollateralFor,
    directionToBase,
    leverageToBase,
    leverageToNotional,
    liquidationMargin,
    liquidationPrice,
    marginTotal,
    notionalSizeFor,
    takeProfitPrice,
    tradingFeeFor,
    validateLeverage,
    validateMinimumDeposit,
} from './positionMath';

export const POSITION_CONFIG = {
    logPrefix: '[POSITION]',
};

export interface SlippageAssert {
    /** Base price the trader expects */
    price: BigNumber;
    tolerance: BigNumber;
}

export interface OpenPositionParams {
    owner: Address;
    collateral: BigNumber;
    leverage: BigNumber;
    direction: DirectionToBase;
    maxGains: MaxGains;
    slippageAssert?: SlippageAssert;
    stopLossOverride?: BigNumber;
    takeProfitOverride?: BigNumber;
    /** Crank fee already collected, for orders that paid it up front */
    prepaidCrankFee?: CollateralAndUsd;
    /** Open at this price point instead of the latest one, used by the crank */
    atPrice?: PricePoint;
}

export type LiquifundOutcome =
    | { kind: 'open'; pos: Position }
    | { kind: 'close'; pos: Position; reason: PositionCloseReason; settlement: PricePoint };

const ZERO_FEE: CollateralAndUsd = { collateral: ZERO, usd: ZERO };

const addFee = (fee: CollateralAndUsd, collateral: BigNumber, price: PricePoint): CollateralAndUsd => ({
    collateral: fee.collateral.plus(collateral),
    usd: fee.usd.plus(collateralToUsd(price, collateral)),
});

// ═══════════════════════════════════════════════════════════════════════════════
// FRESHNESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Next price point the crank still has to complete
 */
export function nextCrankPrice(ctx: MessageContext): PricePoint | undefined {
    if (ctx.cache.nextCrankPrice === undefined) {
        ctx.cache.nextCrankPrice = nextAfter(ctx.repos, ctx.market, ctx.repos.prices.lastCrankCompleted.get()) ?? null;
    }
    return ctx.cache.nextCrankPrice ?? undefined;
}

export const isCrankUpToDate = (ctx: MessageContext): boolean => nextCrankPrice(ctx) === undefined;

export interface Staleness {
    oldPrice?: Timestamp;
    staleLiquifunding?: Timestamp;
}

export function staleness(ctx: MessageContext): Staleness {
    const out: Staleness = {};
    const latest = trySpotPrice(ctx);
    if (!latest) {
        out.oldPrice = ctx.now;
    } else {
        const tooOldAt = latest.timestamp + ctx.config.priceUpdateTooOldSeconds * MS_PER_SECOND;
        if (tooOldAt < ctx.now) out.oldPrice = tooOldAt;
    }
    const next = ctx.repos.positions.nextLiquifunding.first();
    if (next) {
        const staleAt = next[0][0] + ctx.config.stalenessSeconds * MS_PER_SECOND;
        if (staleAt < ctx.now) out.staleLiquifunding = staleAt;
    }
    return out;
}

export function ensureNotStale(ctx: MessageContext): void {
    const { oldPrice, staleLiquifunding } = staleness(ctx);
    if (oldPrice === undefined && staleLiquifunding === undefined) return;
    const reasons: string[] = [];
    if (oldPrice !== undefined) reasons.push(`price updates are needed (since ${oldPrice})`);
    if (staleLiquifunding !== undefined) reasons.push(`cranking is needed (since ${staleLiquifunding})`);
    throw new PerpError('market', 'Stale', `protocol is currently in stale state, ${reasons.join(', ')}`, {
        oldPrice,
        staleLiquifunding,
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// TRIGGER PRICES
// ═══════════════════════════════════════════════════════════════════════════════

const MAX_ID = Number.MAX_SAFE_INTEGER;

/** Lowest key for `price` in a trigger map */
export const priceKeyFloor = (price: BigNumber): PriceKey => [price, 0];
/** Highest key for `price` in a trigger map */
export const priceKeyCeil = (price: BigNumber): PriceKey => [price, MAX_ID];

function storeTriggersNow(ctx: MessageContext, pos: Position): void {
    const { positions } = ctx.repos;
    const desc: PriceKey[] = [];
    const asc: PriceKey[] = [];
    const long = pos.notionalSize.isPositive();
    // Longs lose as price falls: liquidation and stop loss fire at or below the key
    const falling = long ? desc : asc;
    const rising = long ? asc : desc;
    const put = (list: PriceKey[], price: BigNumber | undefined, reason: 'liquidated' | 'max-gains' | 'stop-loss' | 'take-profit') => {
        if (price === undefined) return;
        const key: PriceKey = [price, pos.id];
        list.push(key);
        (list === desc ? positions.triggersDesc : positions.triggersAsc).set(key, reason);
    };
    put(falling, pos.liquidationPrice, 'liquidated');
    put(rising, pos.takeProfitPrice, 'max-gains');
    put(falling, pos.stopLossOverrideNotional, 'stop-loss');
    put(rising, pos.takeProfitOverrideNotional, 'take-profit');
    positions.triggersByPosition.set(pos.id, { desc, asc });
}

/**
 * Store trigger prices, or queue them while the crank is still processing
 * older price points
 */
function storeTriggers(ctx: MessageContext, pos: Position): void {
    if (isCrankUpToDate(ctx)) {
        storeTriggersNow(ctx, pos);
        return;
    }
    const { positions } = ctx.repos;
    positions.pendingLiquidation.set([ctx.now, pos.id], true);
    positions.pendingByPosition.set(pos.id, ctx.now);
}

function removeTriggers(ctx: MessageContext, id: PositionId): void {
    const { positions } = ctx.repos;
    const pendingAt = positions.pendingByPosition.get(id);
    if (pendingAt !== undefined) {
        positions.pendingByPosition.delete(id);
        positions.pendingLiquidation.delete([pendingAt, id]);
    }
    const triggers = positions.triggersByPosition.get(id);
    if (triggers) {
        for (const key of triggers.desc) positions.triggersDesc.delete(key);
        for (const key of triggers.asc) positions.triggersAsc.delete(key);
        positions.triggersByPosition.delete(id);
    }
}

/**
 * Move a queued position's trigger prices into the trigger maps
 */
export function unpendLiquidationPrices(ctx: MessageContext, id: PositionId): void {
    const { positions } = ctx.repos;
    const pendingAt = positions.pendingByPosition.load(id, `pending liquidation prices for position ${id}`);
    positions.pendingByPosition.delete(id);
    positions.pendingLiquidation.delete([pendingAt, id]);
    storeTriggersNow(ctx, positions.get(id));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SAVE
// ═══════════════════════════════════════════════════════════════════════════════

interface SaveOptions {
    isUpdate: boolean;
    recalcMargin: boolean;
}

/**
 * Persist a position with its schedule, trigger prices and funding margin.
 *
 * @param price - price point the position was last settled at
 */
function savePosition(ctx: MessageContext, draft: Position, price: PricePoint, options: SaveOptions): Position {
    const { positions } = ctx.repos;
    if (options.isUpdate) {
        const stored = positions.get(draft.id);
        removeTriggers(ctx, stored.id);
        decreaseTotalFundingMargin(ctx, stored.liquidationMargin.funding);
    }

    const margin = options.recalcMargin
        ? liquidationMargin(ctx.config, draft, price.priceNotional, spotPrice(ctx))
        : draft.liquidationMargin;
    if (draft.activeCollateral.lt(marginTotal(margin))) {
        throw new PerpError(
            'market',
            'InsufficientMargin',
            `active collateral ${draft.activeCollateral.toFixed()} cannot be less than liquidation margin ${marginTotal(margin).toFixed()}`,
            { positionId: draft.id, active: draft.activeCollateral.toFixed(), margin: marginTotal(margin).toFixed() }
        );
    }
    invariant(draft.counterCollateral.gt(0), `position ${draft.id} has no counter collateral`);
    invariant(
        draft.liquifundedAt < draft.nextLiquifunding && draft.nextLiquifunding < draft.staleAt,
        `position ${draft.id} schedule out of order`,
        { liquifundedAt: draft.liquifundedAt, nextLiquifunding: draft.nextLiquifunding, staleAt: draft.staleAt }
    );

    const pos: Position = {
        ...draft,
        liquidationMargin: margin,
        liquidationPrice: liquidationPrice(price.priceNotional, draft.activeCollateral, draft.notionalSize, margin),
        takeProfitPrice: takeProfitPrice(price.priceNotional, draft.counterCollateral, draft.notionalSize),
    };

    if (options.isUpdate) positions.replace(pos);
    else positions.insert(pos);
    storeTriggers(ctx, pos);
    increaseTotalFundingMargin(ctx, margin.funding);
    return pos;
}

function schedule(ctx: MessageContext, owner: Address, id: PositionId, settledAt: Timestamp) {
    const { config } = ctx;
    const nextLiquifunding =
        settledAt +
        config.liquifundingDelaySeconds * MS_PER_SECOND -
        fuzzOffsetMs(settledAt, owner, id, config.liquifundingDelayFuzzSeconds);
    return {
        liquifundedAt: settledAt,
        nextLiquifunding,
        staleAt: nextLiquifunding + config.stalenessSeconds * MS_PER_SECOND,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPEN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fail SlippageAssert when the price including the delta neutrality fee is
 * worse than the trader accepted
 */
export function assertSlippage(ctx: MessageContext, slippage: SlippageAssert, delta: BigNumber, price: PricePoint, marginCap?: BigNumber): void {
    if (delta.isZero()) return;
    const fee = previewDeltaNeutralityFee(ctx, delta, price, marginCap);
    const feeRate = div(fee, notionalToCollateral(price, delta));
    const effective = mul(price.priceNotional, feeRate.plus(1));
    const expected = baseToNotionalPrice(ctx.market, slippage.price);
    const ok = delta.isPositive()
        ? effective.lte(mul(expected, slippage.tolerance.plus(1)))
        : effective.gte(mul(expected, ONE.minus(slippage.tolerance)));
    if (!ok) {
        const slippagePct = div(effective.minus(expected).abs().times(100), expected);
        throw new PerpError('market', 'SlippageAssert', `slippage is exceeding provided tolerance: ${slippagePct.toFixed(4)}% vs ${slippage.tolerance.times(100).toFixed()}%`, {
            slippage: slippagePct.toFixed(),
            priceNotional: effective.toFixed(),
        });
    }
}

export function openPosition(ctx: MessageContext, params: OpenPositionParams): Position {
    const { config, market } = ctx;
    if (!params.atPrice) ensureNotStale(ctx);
    const price = params.atPrice ?? spotPrice(ctx);
    if (params.collateral.lte(0)) {
        throw new PerpError('market', 'InsufficientMargin', 'position collateral must be positive');
    }

    let crankFee: CollateralAndUsd;
    if (params.prepaidCrankFee) {
        crankFee = params.prepaidCrankFee;
    } else {
        crankFee = { collateral: usdToCollateral(price, config.crankFeeCharged), usd: config.crankFeeCharged };
        collectCrankFee(ctx, crankFee.collateral);
    }
    const collateral = params.prepaidCrankFee ? params.collateral : params.collateral.minus(crankFee.collateral);
    if (collateral.lte(0)) {
        throw new PerpError('market', 'InsufficientMargin', 'insufficient funds to cover fees, failed on crank fee');
    }

    const toNotional = leverageToNotional(market.marketType, params.direction, params.leverage);
    const notional = notionalSizeFor(price, toNotional, collateral);
    if (notional.isZero()) {
        throw new PerpError('market', 'TraderLeverageOutOfRange', 'position would have zero notional size');
    }
    const notionalInCollateral = notionalToCollateral(price, notional);
    if (params.slippageAssert) {
        assertSlippage(ctx, params.slippageAssert, notional, price);
    }
    const counter = counterCollateralFor(market.marketType, params.maxGains, collateral, toNotional, notionalInCollateral);
    validateMinimumDeposit(config, price, params.collateral);

    const id = ctx.repos.positions.lastPositionId.next();
    const tradingFee = tradingFeeFor(config, notionalInCollateral, counter);
    const netBefore = netOpenInterest(ctx);
    const dnf = chargeDeltaNeutralityFee(ctx, id, notional, price);
    collectTradingFee(ctx, tradingFee);

    const active = collateral.minus(tradingFee).minus(dnf);
    if (active.lte(0)) {
        throw new PerpError('market', 'InsufficientMargin', 'collateral does not cover trading and delta neutrality fees', {
            collateral: collateral.toFixed(),
            tradingFee: tradingFee.toFixed(),
            deltaNeutralityFee: dnf.toFixed(),
        });
    }

    const draft: Position = {
        id,
        owner: params.owner,
        depositCollateral: { collateral: params.collateral, usd: collateralToUsd(price, params.collateral) },
        activeCollateral: active,
        counterCollateral: counter,
        notionalSize: notional,
        createdAt: ctx.now,
        pricePointCreatedAt: price.timestamp,
        ...schedule(ctx, params.owner, id, price.timestamp),
        tradingFee: addFee(ZERO_FEE, tradingFee, price),
        fundingFee: ZERO_FEE,
        borrowFee: ZERO_FEE,
        crankFee,
        deltaNeutralityFee: addFee(ZERO_FEE, dnf, price),
        pendingCrankFee: ZERO,
        liquidationMargin: { borrow: ZERO, funding: ZERO, deltaNeutrality: ZERO, crank: ZERO },
        stopLossOverride: params.stopLossOverride,
        stopLossOverrideNotional: params.stopLossOverride && baseToNotionalPrice(market, params.stopLossOverride),
        takeProfitOverride: params.takeProfitOverride,
        takeProfitOverrideNotional: params.takeProfitOverride && baseToNotionalPrice(market, params.takeProfitOverride),
    };
    validateLeverage(config, market.marketType, price, draft);

    lockLiquidity(ctx, counter, netBefore.plus(notional), price);
    adjustOpenInterest(ctx, notional, notional.isPositive(), true);
    const pos = savePosition(ctx, draft, price, { isUpdate: false, recalcMargin: true });

    ctx.send({ kind: 'position-nft-mint', owner: pos.owner, positionId: pos.id });
    ctx.emit({
        type: 'position-open',
        positionId: pos.id,
        owner: pos.owner,
        depositCollateral: params.collateral,
        activeCollateral: pos.activeCollateral,
        counterCollateral: pos.counterCollateral,
        notionalSize: pos.notionalSize,
        tradingFee,
        deltaNeutralityFee: dnf,
    });
    logger.info(
        `${POSITION_CONFIG.logPrefix} OPEN id=${pos.id} owner=${pos.owner} ${params.direction} ` +
        `lev=${params.leverage.toFixed()} active=${pos.activeCollateral.toFixed()} counter=${pos.counterCollateral.toFixed()}`
    );
    return pos;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIQUIFUNDING
// ═══════════════════════════════════════════════════════════════════════════════

function baseDirectionAt(ctx: MessageContext, price: PricePoint, pos: Position): DirectionToBase {
    const toBase = leverageToBase(ctx.market.marketType, activeLeverageToNotional(price, pos));
    return toBase.isNegative() ? 'short' : 'long';
}

/**
 * Settle fees and price exposure over [start, end]. Nothing is stored for
 * the position itself; the caller saves or closes according to the outcome.
 */
export function liquifund(ctx: MessageContext, stored: Position, start: Timestamp, end: Timestamp, chargeCrankFee: boolean): LiquifundOutcome {
    invariant(start <= end, `liquifunding window out of order for position ${stored.id}`, { start, end });
    const startPrice = latestAsOf(ctx.repos, ctx.market, start);
    const endPrice = latestAsOf(ctx.repos, ctx.market, end);
    const originalDirection = baseDirectionAt(ctx, endPrice, stored);

    const settled = settlePendingFees(ctx, stored, start, end, chargeCrankFee);
    let pos = settled.pos;
    if (settled.close) {
        return { kind: 'close', pos, reason: settled.close, settlement: endPrice };
    }

    let exposure = mul(endPrice.priceNotional.minus(startPrice.priceNotional), pos.notionalSize);
    const minExposure = pos.liquidationMargin.deltaNeutrality.minus(pos.activeCollateral);
    const maxExposure = pos.counterCollateral;
    let reason: PositionCloseReason | undefined;
    if (exposure.lte(minExposure)) {
        exposure = minExposure;
        reason = { kind: 'liquidated', reason: 'liquidated' };
    } else if (exposure.gte(maxExposure)) {
        exposure = maxExposure;
        reason = { kind: 'liquidated', reason: 'max-gains' };
    }
    updateLockedLiquidity(ctx, exposure.negated());
    pos = {
        ...pos,
        activeCollateral: pos.activeCollateral.plus(exposure),
        counterCollateral: pos.counterCollateral.minus(exposure),
    };

    ctx.emit({
        type: 'liquifunding',
        positionId: pos.id,
        start,
        end,
        borrowFee: settled.borrow,
        fundingFee: settled.funding,
        crankFee: settled.crank,
        exposure,
    });

    if (reason) {
        return { kind: 'close', pos, reason, settlement: endPrice };
    }

    const margin = liquidationMargin(ctx.config, pos, endPrice.priceNotional, spotPrice(ctx));
    if (pos.activeCollateral.lte(marginTotal(margin))) {
        return { kind: 'close', pos, reason: { kind: 'liquidated', reason: 'liquidated' }, settlement: endPrice };
    }
    if (baseDirectionAt(ctx, endPrice, pos) !== originalDirection) {
        return { kind: 'close', pos, reason: { kind: 'liquidated', reason: 'max-gains' }, settlement: endPrice };
    }

    return {
        kind: 'open',
        pos: { ...pos, ...schedule(ctx, pos.owner, pos.id, end), liquidationMargin: margin },
    };
}

/**
 * Liquifund and then save or close the position
 */
export function liquifundAndStore(ctx: MessageContext, pos: Position, start: Timestamp, end: Timestamp, chargeCrankFee: boolean): LiquifundOutcome {
    const outcome = liquifund(ctx, pos, start, end, chargeCrankFee);
    if (outcome.kind === 'open') {
        const price = latestAsOf(ctx.repos, ctx.market, end);
        return { kind: 'open', pos: savePosition(ctx, outcome.pos, price, { isUpdate: true, recalcMargin: false }) };
    }
    closePosition(ctx, outcome.pos, outcome.reason, outcome.settlement);
    return outcome;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLOSE
// ═══════════════════════════════════════════════════════════════════════════════

const isLiquidation = (reason: PositionCloseReason): boolean => reason.kind === 'liquidated';

/**
 * Close a settled position: charge the DNF for removing its notional, release
 * the counter collateral and pay out active collateral
 */
export function closePosition(ctx: MessageContext, pos: Position, reason: PositionCloseReason, settlement: PricePoint): ClosedPosition {
    const { positions } = ctx.repos;
    const stored = positions.get(pos.id);

    const dnfCap = minDec(pos.liquidationMargin.deltaNeutrality, pos.activeCollateral);
    const dnf = chargeDeltaNeutralityFee(ctx, pos.id, pos.notionalSize.negated(), settlement, dnfCap);
    const active = pos.activeCollateral.minus(dnf);
    invariant(!active.isNegative(), `close of position ${pos.id} leaves negative collateral`, { active: active.toFixed() });

    adjustOpenInterest(ctx, pos.notionalSize.negated(), pos.notionalSize.isPositive(), false);
    unlockLiquidity(ctx, pos.counterCollateral);
    ctx.transfer(pos.owner, active);

    removeTriggers(ctx, stored.id);
    decreaseTotalFundingMargin(ctx, stored.liquidationMargin.funding);
    positions.remove(stored);

    const entry = latestAsOf(ctx.repos, ctx.market, pos.pricePointCreatedAt);
    const activeUsd = collateralToUsd(settlement, active);
    const closed: ClosedPosition = {
        owner: pos.owner,
        id: pos.id,
        directionToBase: directionToBase(ctx.market.marketType, pos.notionalSize),
        createdAt: pos.createdAt,
        pricePointCreatedAt: pos.pricePointCreatedAt,
        liquifundedAt: pos.liquifundedAt,
        tradingFee: pos.tradingFee,
        fundingFee: pos.fundingFee,
        borrowFee: pos.borrowFee,
        crankFee: pos.crankFee,
        deltaNeutralityFee: addFee(pos.deltaNeutralityFee, dnf, settlement),
        depositCollateral: pos.depositCollateral,
        pnl: {
            collateral: active.minus(pos.depositCollateral.collateral),
            usd: activeUsd.minus(pos.depositCollateral.usd),
        },
        notionalSize: pos.notionalSize,
        entryPrice: entry.priceBase,
        closeTime: ctx.now,
        settlementTime: settlement.timestamp,
        reason,
        activeCollateral: active,
    };
    positions.saveClosed(closed);

    ctx.send({ kind: 'position-nft-burn', owner: pos.owner, positionId: pos.id });
    ctx.emit({ type: 'position-close', closed });
    const label = reason.kind === 'direct' ? 'CLOSE' : `LIQUIDATED reason=${reason.reason}`;
    const log = `${POSITION_CONFIG.logPrefix} ${label} id=${pos.id} owner=${pos.owner} active=${active.toFixed()} pnl=${closed.pnl.collateral.toFixed()}`;
    if (isLiquidation(reason)) logger.warn(log);
    else logger.info(log);
    return closed;
}

function loadOwned(ctx: MessageContext, id: PositionId): Position {
    const pos = ctx.repos.positions.get(id);
    if (pos.owner !== ctx.sender) {
        throw new PerpError('position', 'Auth', `position ${id} is not owned by ${ctx.sender}`, { id, owner: pos.owner });
    }
    return pos;
}

/**
 * Close at the latest price on the owner's request
 */
export function closePositionByOwner(ctx: MessageContext, id: PositionId, slippage?: SlippageAssert): ClosedPosition {
    ensureNotStale(ctx);
    const pos = loadOwned(ctx, id);
    return closeAtLatestPrice(ctx, pos, slippage);
}

/**
 * Liquifund up to the latest price point and close, used by the owner and by
 * the close-all crank work
 */
export function closeAtLatestPrice(ctx: MessageContext, pos: Position, slippage?: SlippageAssert): ClosedPosition {
    const price = spotPrice(ctx);
    if (slippage) {
        assertSlippage(ctx, slippage, pos.notionalSize.negated(), price, pos.liquidationMargin.deltaNeutrality);
    }
    const outcome = liquifund(ctx, pos, pos.liquifundedAt, price.timestamp, false);
    if (outcome.kind === 'open') {
        return closePosition(ctx, { ...outcome.pos, liquifundedAt: price.timestamp }, { kind: 'direct' }, price);
    }
    return closePosition(ctx, outcome.pos, outcome.reason, outcome.settlement);
}

// ═══════════════════════════════════════════════════════════════════════════════
// UPDATES
// ═══════════════════════════════════════════════════════════════════════════════

interface UpdateStart {
    pos: Position;
    price: PricePoint;
}

/**
 * Bring a position up to the latest price before changing it. Returns
 * undefined when liquifunding closed it.
 */
function beginUpdate(ctx: MessageContext, id: PositionId): UpdateStart | undefined {
    ensureNotStale(ctx);
    const stored = loadOwned(ctx, id);
    const price = spotPrice(ctx);
    const outcome = liquifund(ctx, stored, stored.liquifundedAt, price.timestamp, false);
    if (outcome.kind === 'close') {
        closePosition(ctx, outcome.pos, outcome.reason, outcome.settlement);
        logger.warn(`${POSITION_CONFIG.logPrefix} update of position ${id} skipped, closed during liquifunding`);
        return undefined;
    }
    return { pos: outcome.pos, price };
}

interface UpdateDeltas {
    activeCollateralDelta: BigNumber;
    counterCollateralDelta: BigNumber;
    notionalSizeDelta: BigNumber;
    tradingFee: BigNumber;
    deltaNeutralityFee: BigNumber;
}

function finishUpdate(
    ctx: MessageContext,
    current: Position,
    next: Position,
    price: PricePoint,
    kind: PositionUpdateKind,
    deltas: UpdateDeltas
): Position {
    validateLeverage(ctx.config, ctx.market.marketType, price, next, current);
    const saved = savePosition(ctx, next, price, { isUpdate: true, recalcMargin: true });
    ctx.emit({ type: 'position-update', positionId: saved.id, kind, ...deltas });
    logger.info(
        `${POSITION_CONFIG.logPrefix} UPDATE ${kind} id=${saved.id} active=${saved.activeCollateral.toFixed()} ` +
        `counter=${saved.counterCollateral.toFixed()} notional=${saved.notionalSize.toFixed()}`
    );
    return saved;
}

const NO_DELTAS: UpdateDeltas = {
    activeCollateralDelta: ZERO,
    counterCollateralDelta: ZERO,
    notionalSizeDelta: ZERO,
    tradingFee: ZERO,
    deltaNeutralityFee: ZERO,
};

function ensurePositiveAmount(amount: BigNumber): void {
    if (amount.lte(0)) {
        throw new PerpError('market', 'PositionUpdate', 'update amount must be positive');
    }
}

/**
 * Lock or unlock liquidity for a change in counter collateral
 */
function moveCounter(ctx: MessageContext, counterDelta: BigNumber, netAfter: BigNumber, price: PricePoint): void {
    if (counterDelta.isPositive()) lockLiquidity(ctx, counterDelta, netAfter, price);
    else if (counterDelta.isNegative()) unlockLiquidity(ctx, counterDelta.negated());
}

export function addCollateralImpactLeverage(ctx: MessageContext, id: PositionId, amount: BigNumber): Position | undefined {
    ensurePositiveAmount(amount);
    const start = beginUpdate(ctx, id);
    if (!start) {
        ctx.transfer(ctx.sender, amount);
        return undefined;
    }
    const { pos, price } = start;
    const next: Position = {
        ...pos,
        activeCollateral: pos.activeCollateral.plus(amount),
        depositCollateral: addFee(pos.depositCollateral, amount, price),
    };
    return finishUpdate(ctx, pos, next, price, 'add-collateral-impact-leverage', { ...NO_DELTAS, activeCollateralDelta: amount });
}

export function removeCollateralImpactLeverage(ctx: MessageContext, id: PositionId, amount: BigNumber): Position | undefined {
    ensurePositiveAmount(amount);
    const start = beginUpdate(ctx, id);
    if (!start) return undefined;
    const { pos, price } = start;
    const active = pos.activeCollateral.minus(amount);
    if (active.lte(0)) {
        throw new PerpError('market', 'PositionUpdate', `cannot remove ${amount.toFixed()}, active collateral is ${pos.activeCollateral.toFixed()}`);
    }
    validateMinimumDeposit(ctx.config, price, active);
    const next: Position = {
        ...pos,
        activeCollateral: active,
        depositCollateral: addFee(pos.depositCollateral, amount.negated(), price),
    };
    const saved = finishUpdate(ctx, pos, next, price, 'remove-collateral-impact-leverage', {
        ...NO_DELTAS,
        activeCollateralDelta: amount.negated(),
    });
    ctx.transfer(pos.owner, amount);
    return saved;
}

export function addCollateralImpactSize(ctx: MessageContext, id: PositionId, amount: BigNumber, slippage?: SlippageAssert): Position | undefined {
    ensurePositiveAmount(amount);
    const start = beginUpdate(ctx, id);
    if (!start) {
        ctx.transfer(ctx.sender, amount);
        return undefined;
    }
    const { pos, price } = start;
    const scale = div(amount, pos.activeCollateral);
    const notionalDelta = mul(pos.notionalSize, scale);
    const counterDelta = mul(pos.counterCollateral, scale);
    if (slippage) assertSlippage(ctx, slippage, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);

    const tradingFee = tradingFeeFor(ctx.config, notionalToCollateral(price, notionalDelta), counterDelta);
    const netBefore = netOpenInterest(ctx);
    const dnf = chargeDeltaNeutralityFee(ctx, pos.id, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);
    collectTradingFee(ctx, tradingFee);
    moveCounter(ctx, counterDelta, netBefore.plus(notionalDelta), price);
    adjustOpenInterest(ctx, notionalDelta, pos.notionalSize.isPositive(), true);

    const activeDelta = amount.minus(tradingFee).minus(dnf);
    const next: Position = {
        ...pos,
        activeCollateral: pos.activeCollateral.plus(activeDelta),
        counterCollateral: pos.counterCollateral.plus(counterDelta),
        notionalSize: pos.notionalSize.plus(notionalDelta),
        depositCollateral: addFee(pos.depositCollateral, amount, price),
        tradingFee: addFee(pos.tradingFee, tradingFee, price),
        deltaNeutralityFee: addFee(pos.deltaNeutralityFee, dnf, price),
    };
    return finishUpdate(ctx, pos, next, price, 'add-collateral-impact-size', {
        activeCollateralDelta: activeDelta,
        counterCollateralDelta: counterDelta,
        notionalSizeDelta: notionalDelta,
        tradingFee,
        deltaNeutralityFee: dnf,
    });
}

export function removeCollateralImpactSize(ctx: MessageContext, id: PositionId, amount: BigNumber, slippage?: SlippageAssert): Position | undefined {
    ensurePositiveAmount(amount);
    const start = beginUpdate(ctx, id);
    if (!start) return undefined;
    const { pos, price } = start;
    if (amount.gte(pos.activeCollateral)) {
        throw new PerpError('market', 'PositionUpdate', `cannot remove ${amount.toFixed()}, active collateral is ${pos.activeCollateral.toFixed()}`);
    }
    const scale = div(amount, pos.activeCollateral);
    const notionalDelta = mul(pos.notionalSize, scale).negated();
    const counterDelta = mul(pos.counterCollateral, scale).negated();
    if (slippage) assertSlippage(ctx, slippage, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);

    const netBefore = netOpenInterest(ctx);
    const dnf = chargeDeltaNeutralityFee(ctx, pos.id, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);
    moveCounter(ctx, counterDelta, netBefore.plus(notionalDelta), price);
    adjustOpenInterest(ctx, notionalDelta, pos.notionalSize.isPositive(), true);

    const active = pos.activeCollateral.minus(amount).minus(dnf);
    validateMinimumDeposit(ctx.config, price, active);
    const next: Position = {
        ...pos,
        activeCollateral: active,
        counterCollateral: pos.counterCollateral.plus(counterDelta),
        notionalSize: pos.notionalSize.plus(notionalDelta),
        depositCollateral: addFee(pos.depositCollateral, amount.negated(), price),
        deltaNeutralityFee: addFee(pos.deltaNeutralityFee, dnf, price),
    };
    const saved = finishUpdate(ctx, pos, next, price, 'remove-collateral-impact-size', {
        activeCollateralDelta: active.minus(pos.activeCollateral),
        counterCollateralDelta: counterDelta,
        notionalSizeDelta: notionalDelta,
        tradingFee: ZERO,
        deltaNeutralityFee: dnf,
    });
    ctx.transfer(pos.owner, amount);
    return saved;
}

export function updateLeverage(ctx: MessageContext, id: PositionId, leverage: BigNumber, slippage?: SlippageAssert): Position | undefined {
    const start = beginUpdate(ctx, id);
    if (!start) return undefined;
    const { pos, price } = start;
    const direction = directionToBase(ctx.market.marketType, pos.notionalSize);
    const toNotional = leverageToNotional(ctx.market.marketType, direction, leverage);
    const notional = notionalSizeFor(price, toNotional, pos.activeCollateral);
    if (notional.isZero() || notional.isPositive() !== pos.notionalSize.isPositive()) {
        throw new PerpError('market', 'DirectionToBaseFlipped', 'leverage update would flip the position direction');
    }
    const notionalDelta = notional.minus(pos.notionalSize);
    const counter = div(pos.counterCollateral.times(notional.abs()), pos.notionalSize.abs());
    const counterDelta = counter.minus(pos.counterCollateral);
    if (slippage) assertSlippage(ctx, slippage, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);

    const sizeIncrease = maxDec(notional.abs().minus(pos.notionalSize.abs()), ZERO);
    const tradingFee = tradingFeeFor(ctx.config, notionalToCollateral(price, sizeIncrease), maxDec(counterDelta, ZERO));
    const netBefore = netOpenInterest(ctx);
    const dnf = chargeDeltaNeutralityFee(ctx, pos.id, notionalDelta, price, pos.liquidationMargin.deltaNeutrality);
    collectTradingFee(ctx, tradingFee);
    moveCounter(ctx, counterDelta, netBefore.plus(notionalDelta), price);
    adjustOpenInterest(ctx, notionalDelta, pos.notionalSize.isPositive(), true);

    const activeDelta = tradingFee.plus(dnf).negated();
    const next: Position = {
        ...pos,
        activeCollateral: pos.activeCollateral.plus(activeDelta),
        counterCollateral: counter,
        notionalSize: notional,
        tradingFee: addFee(pos.tradingFee, tradingFee, price),
        deltaNeutralityFee: addFee(pos.deltaNeutralityFee, dnf, price),
    };
    return finishUpdate(ctx, pos, next, price, 'leverage', {
        activeCollateralDelta: activeDelta,
        counterCollateralDelta: counterDelta,
        notionalSizeDelta: notionalDelta,
        tradingFee,
        deltaNeutralityFee: dnf,
    });
}

export function updateMaxGains(ctx: MessageContext, id: PositionId, maxGains: MaxGains): Position | undefined {
    const start = beginUpdate(ctx, id);
    if (!start) return undefined;
    const { pos, price } = start;
    const toNotional = activeLeverageToNotional(price, pos);
    const counter = counterCollateralFor(
        ctx.market.marketType,
        maxGains,
        pos.activeCollateral,
        toNotional,
        notionalToCollateral(price, pos.notionalSize)
    );
    const counterDelta = counter.minus(pos.counterCollateral);
    const tradingFee = tradingFeeFor(ctx.config, ZERO, maxDec(counterDelta, ZERO));
    collectTradingFee(ctx, tradingFee);
    moveCounter(ctx, counterDelta, netOpenInterest(ctx), price);

    const next: Position = {
        ...pos,
        activeCollateral: pos.activeCollateral.minus(tradingFee),
        counterCollateral: counter,
        tradingFee: addFee(pos.tradingFee, tradingFee, price),
    };
    return finishUpdate(ctx, pos, next, price, 'max-gains', {
        ...NO_DELTAS,
        activeCollateralDelta: tradingFee.negated(),
        counterCollateralDelta: counterDelta,
        tradingFee,
    });
}

/**
 * Replace stop-loss and take-profit overrides. Absent values clear them.
 */
export function setTriggerOrder(ctx: MessageContext, id: PositionId, stopLoss?: BigNumber, takeProfit?: BigNumber): Position {
    const pos = loadOwned(ctx, id);
    const next: Position = {
        ...pos,
        stopLossOverride: stopLoss,
        stopLossOverrideNotional: stopLoss && baseToNotionalPrice(ctx.market, stopLoss),
        takeProfitOverride: takeProfit,
        takeProfitOverrideNotional: takeProfit && baseToNotionalPrice(ctx.market, takeProfit),
    };
    const settledAt = latestAsOf(ctx.repos, ctx.market, pos.liquifundedAt);
    const saved = savePosition(ctx, next, settledAt, { isUpdate: true, recalcMargin: false });
    ctx.emit({ type: 'position-update', positionId: id, kind: 'trigger-order', ...NO_DELTAS });
    return saved;
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export interface PositionView extends Position {
    directionToBase: DirectionToBase;
    pendingBorrowFee: BigNumber;
    pendingFundingFee: BigNumber;
    /** Active collateral net of pending fees and unsettled price exposure */
    estimatedActiveCollateral: BigNumber;
}

/**
 * Position with fees accrued since the last liquifunding extrapolated to
 * the latest price point
 */
export function positionView(ctx: MessageContext, id: PositionId): PositionView {
    const pos = ctx.repos.positions.get(id);
    const price = spotPrice(ctx);
    const pending = previewPendingFees(ctx, pos, price.timestamp);
    const settledAt = latestAsOf(ctx.repos, ctx.market, pos.liquifundedAt);
    const exposure = mul(price.priceNotional.minus(settledAt.priceNotional), pos.notionalSize);
    const estimated = maxDec(pos.activeCollateral.minus(pending.borrow).minus(pending.funding).plus(minDec(exposure, pos.counterCollateral)), ZERO);
    return {
        ...pos,
        directionToBase: directionToBase(ctx.market.marketType, pos.notionalSize),
        pendingBorrowFee: pending.borrow,
        pendingFundingFee: pending.funding,
        estimatedActiveCollateral: estimated,
    };
}
