/**
 * Fee Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Rates, payments and fee bookkeeping.
 *
 * BORROW RATE (per completed price point):
 *   bias  = −1 on an empty pool, else utilization − target
 *   total = clamp(prev + sensitivity × bias × elapsed / day, min, max)
 *   split between LP and xLP, xLP shares weighted by the rewards multiplier
 *
 * FUNDING RATE (per completed price point):
 *   popular side pays min(effectiveSensitivity × |net| / total, cap)
 *   unpopular side receives popular × big / small, so payments balance
 *
 * Series store annualized rates; a payment integrates the series over the
 * liquifunding window and divides by MS_PER_YEAR.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError, invariant } from '../utils/errors';
import { Decimal, ZERO, clamp, div, maxDec, minDec, mul, subUnsigned } from '../utils/math';
import { MS_PER_DAY, MS_PER_YEAR } from '../config/constants';
import type { MarketConfig } from '../config/marketConfig';
import type { Repositories } from '../storage';
import type { Address, LiquidationMargin, Position, PositionCloseReason, PricePoint, Timestamp } from '../types';
import type { MessageContext } from './context';
import type { FeeSource } from './events';
import { addCrankRewards, loadLiquidityStats, processNewYield, totalCollateral } from './liquidityPool';
import { collateralToUsd, nextAfter, spotPrice, usdToCollateral } from './priceHistory';

export const FEE_CONFIG = {
    logPrefix: '[FEES]',
};

// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Collect a trading fee: protocol tax to the protocol, the rest split between
 * LP and xLP in proportion to the current borrow rates
 */
export function collectTradingFee(ctx: MessageContext, amount: BigNumber, source: FeeSource = 'trading'): void {
    if (amount.isZero()) return;
    const { fees } = ctx.repos;
    const protocol = mul(amount, ctx.config.protocolTax);
    const rest = amount.minus(protocol);
    const lpRate = fees.borrowLp.latestValue();
    const xlpRate = fees.borrowXlp.latestValue();
    const rates = lpRate.plus(xlpRate);
    if (rates.isZero()) {
        throw new PerpError('liquidity', 'Liquidity', 'cannot receive a trading fee if there is no liquidity');
    }
    const lp = div(rest.times(lpRate), rates);
    const xlp = rest.minus(lp);

    fees.fees.update((f) => ({ ...f, protocol: f.protocol.plus(protocol) }));
    processNewYield(ctx, lp, xlp);
    ctx.emit({ type: 'fee', source, amount, protocol, lp, xlp });
}

/**
 * Collect borrow fees paid by a position
 */
export function collectBorrowFee(ctx: MessageContext, lpAmount: BigNumber, xlpAmount: BigNumber): void {
    const amount = lpAmount.plus(xlpAmount);
    if (amount.isZero()) return;
    const tax = ctx.config.protocolTax;
    const protocolLp = mul(lpAmount, tax);
    const protocolXlp = mul(xlpAmount, tax);
    const protocol = protocolLp.plus(protocolXlp);
    const lp = lpAmount.minus(protocolLp);
    const xlp = xlpAmount.minus(protocolXlp);

    ctx.repos.fees.fees.update((f) => ({ ...f, protocol: f.protocol.plus(protocol) }));
    processNewYield(ctx, lp, xlp);
    ctx.emit({ type: 'fee', source: 'borrow', amount, protocol, lp, xlp });
}

export function collectCrankFee(ctx: MessageContext, amount: BigNumber): void {
    if (amount.isZero()) return;
    ctx.repos.fees.fees.update((f) => ({ ...f, crank: f.crank.plus(amount) }));
    ctx.emit({ type: 'fee', source: 'crank', amount, protocol: ZERO, lp: ZERO, xlp: ZERO });
}

/**
 * Top up the crank reward pool from an outside source
 */
export function provideCrankFunds(ctx: MessageContext, amount: BigNumber): void {
    if (amount.lte(0)) {
        throw new PerpError('crank', 'Exceeded', 'crank funds must be positive');
    }
    ctx.repos.fees.fees.update((f) => ({ ...f, crank: f.crank.plus(amount) }));
    ctx.emit({ type: 'crank-funds', amount });
    logger.info(`${FEE_CONFIG.logPrefix} crank funds provided amount=${amount.toFixed()}`);
}

/**
 * Send accumulated protocol fees to the DAO
 */
export function transferDaoFees(ctx: MessageContext): BigNumber {
    const { fees } = ctx.repos;
    const amount = fees.fees.get().protocol;
    if (amount.isZero()) return ZERO;
    fees.fees.update((f) => ({ ...f, protocol: ZERO }));
    ctx.transfer(ctx.config.dao, amount);
    ctx.emit({ type: 'dao-fees-transfer', recipient: ctx.config.dao, amount });
    logger.info(`${FEE_CONFIG.logPrefix} dao fees transferred recipient=${ctx.config.dao} amount=${amount.toFixed()}`);
    return amount;
}

/**
 * Pay the cranker for `paying` units of rewarded work, bounded by the crank pool
 */
export function allocateCrankFees(ctx: MessageContext, recipient: Address, paying: number): BigNumber {
    if (paying === 0) return ZERO;
    const price = spotPrice(ctx);
    const maxPayment = usdToCollateral(price, ctx.config.crankFeeReward.times(paying));
    const { fees } = ctx.repos;
    const payment = minDec(maxPayment, fees.fees.get().crank);
    if (payment.isZero()) return ZERO;
    fees.fees.update((f) => ({
        ...f,
        crank: subUnsigned(f.crank, payment, 'crank fees'),
        wallets: f.wallets.plus(payment),
    }));
    addCrankRewards(ctx, recipient, payment);
    ctx.emit({ type: 'crank-rewards', recipient, amount: payment });
    return payment;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RATES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Seed the rate series when the market is created
 */
export function initFeeSeries(repos: Repositories, config: MarketConfig, time: Timestamp): void {
    repos.fees.borrowLp.append(time, config.borrowFeeRateMinAnnualized);
    repos.fees.borrowXlp.append(time, ZERO);
    repos.fees.fundingLong.append(time, ZERO);
    repos.fees.fundingShort.append(time, ZERO);
}

export interface BorrowRates {
    total: BigNumber;
    lp: BigNumber;
    xlp: BigNumber;
}

/**
 * Split a total rate between LP and xLP. Each xLP token counts as
 * `multiplier` LP tokens, where the multiplier slides from max (all LP)
 * to min (all xLP).
 */
export function splitBorrowRate(config: MarketConfig, total: BigNumber, totalLp: BigNumber, totalXlp: BigNumber): BorrowRates {
    if (totalXlp.isZero()) return { total, lp: total, xlp: ZERO };
    if (totalLp.isZero()) return { total, lp: ZERO, xlp: total };
    const tokens = totalLp.plus(totalXlp);
    const multiplier = div(
        config.minXlpRewardsMultiplier.times(totalXlp).plus(config.maxXlpRewardsMultiplier.times(totalLp)),
        tokens
    );
    const xlpShares = mul(totalXlp, multiplier);
    const lp = div(total.times(totalLp), totalLp.plus(xlpShares));
    return { total, lp, xlp: total.minus(lp) };
}

/**
 * Next total borrow rate given pool utilization and the time since the last rate
 */
export function nextBorrowRate(
    config: MarketConfig,
    previous: BigNumber,
    locked: BigNumber,
    unlocked: BigNumber,
    elapsedMs: number
): BigNumber {
    const total = locked.plus(unlocked);
    const bias = total.isZero() ? new Decimal(-1) : div(locked, total).minus(config.targetUtilization);
    const delta = div(config.borrowFeeSensitivity.times(bias).times(elapsedMs), new Decimal(MS_PER_DAY));
    const rate = clamp(previous.plus(delta), config.borrowFeeRateMinAnnualized, config.borrowFeeRateMaxAnnualized);
    return rate.lte(0) ? config.borrowFeeRateMinAnnualized : rate;
}

export function accumulateBorrowRate(ctx: MessageContext, price: PricePoint): BorrowRates {
    const { fees } = ctx.repos;
    const lastLp = fees.borrowLp.latest();
    const previous = fees.borrowLp.latestValue().plus(fees.borrowXlp.latestValue());
    const elapsed = lastLp ? Math.max(price.timestamp - lastLp[0], 0) : 0;
    const stats = loadLiquidityStats(ctx);

    const total = nextBorrowRate(ctx.config, previous, stats.locked, stats.unlocked, elapsed);
    const rates = splitBorrowRate(ctx.config, total, stats.totalLp, stats.totalXlp);
    fees.borrowLp.append(price.timestamp, rates.lp);
    fees.borrowXlp.append(price.timestamp, rates.xlp);

    ctx.emit({ type: 'borrow-fee-change', time: price.timestamp, total, lp: rates.lp, xlp: rates.xlp });
    logger.debug(
        `${FEE_CONFIG.logPrefix} borrow rate t=${price.timestamp} total=${total.toFixed()} ` +
        `utilization=${totalCollateral(stats).isZero() ? 'n/a' : div(stats.locked, totalCollateral(stats)).toFixed(4)}`
    );
    return rates;
}

export interface FundingRates {
    long: BigNumber;
    short: BigNumber;
}

/**
 * Annualized funding rates for the given open interest. Positive pays.
 */
export function fundingRates(config: MarketConfig, long: BigNumber, short: BigNumber): FundingRates {
    if (long.isZero() || short.isZero() || long.eq(short)) {
        return { long: ZERO, short: ZERO };
    }
    const total = long.plus(short);
    const net = long.minus(short);
    const highCap = config.deltaNeutralityFeeSensitivity.times(config.deltaNeutralityFeeCap);
    const effective = maxDec(
        config.fundingRateSensitivity,
        div(config.fundingRateMaxAnnualized.times(total), highCap)
    );
    const popular = minDec(div(effective.times(net.abs()), total), config.fundingRateMaxAnnualized);
    const [big, small] = long.gt(short) ? [long, short] : [short, long];
    const unpopular = div(popular.times(big), small);
    return long.gt(short)
        ? { long: popular, short: unpopular.negated() }
        : { long: unpopular.negated(), short: popular };
}

export function accumulateFundingRate(ctx: MessageContext, price: PricePoint): FundingRates {
    const { fees } = ctx.repos;
    const oi = fees.openInterest.get();
    const rates = fundingRates(ctx.config, oi.long, oi.short);
    fees.fundingLong.append(price.timestamp, mul(rates.long, price.priceNotional));
    fees.fundingShort.append(price.timestamp, mul(rates.short, price.priceNotional));
    ctx.emit({ type: 'funding-rate-change', time: price.timestamp, longRate: rates.long, shortRate: rates.short });
    return rates;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POSITION PAYMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface BorrowPayment {
    lp: BigNumber;
    xlp: BigNumber;
    total: BigNumber;
    capped: boolean;
}

/**
 * Borrow fee for holding `counter` collateral over [start, end), capped by
 * the position's borrow margin
 */
export function borrowPayment(repos: Repositories, counter: BigNumber, margin: BigNumber, start: Timestamp, end: Timestamp): BorrowPayment {
    const year = new Decimal(MS_PER_YEAR);
    let lp = div(repos.fees.borrowLp.sum(start, end).times(counter), year);
    let xlp = div(repos.fees.borrowXlp.sum(start, end).times(counter), year);
    const total = lp.plus(xlp);
    if (total.lte(margin)) {
        return { lp, xlp, total, capped: false };
    }
    lp = div(lp.times(margin), total);
    xlp = margin.minus(lp);
    return { lp, xlp, total: margin, capped: true };
}

/**
 * Time up to which the funding series may be extrapolated: the next price
 * point the crank has not completed, or now
 */
export function fundingValidUntil(ctx: MessageContext): Timestamp {
    const next = nextAfter(ctx.repos, ctx.market, ctx.repos.prices.lastCrankCompleted.get());
    return next ? next.timestamp : ctx.now;
}

/**
 * Signed funding payment over [start, end). Positive means the position pays.
 */
export function fundingPayment(ctx: MessageContext, notional: BigNumber, start: Timestamp, end: Timestamp): BigNumber {
    const series = notional.isPositive() ? ctx.repos.fees.fundingLong : ctx.repos.fees.fundingShort;
    if (!series.covers(start)) return ZERO;
    const until = Math.min(end, fundingValidUntil(ctx));
    return div(series.sum(start, until).times(notional.abs()), new Decimal(MS_PER_YEAR));
}

/**
 * Bound a funding amount so receivers never take more than payers and the
 * other positions' margins can cover
 */
export function aggregateFundingCap(
    totalPaid: BigNumber,
    totalMargin: BigNumber,
    amount: BigNumber,
    posMargin: BigNumber
): { amount: BigNumber; capped: boolean } {
    const withoutPos = subUnsigned(totalMargin, posMargin, 'total funding margin');
    const available = withoutPos.plus(totalPaid).negated();
    let capped = amount;
    if (capped.lt(available)) capped = available;
    if (capped.gt(posMargin)) capped = posMargin;
    return { amount: capped, capped: !capped.eq(amount) };
}

export function increaseTotalFundingMargin(ctx: MessageContext, amount: BigNumber): void {
    if (amount.isZero()) return;
    ctx.repos.fees.totalFundingMargin.update((t) => t.plus(amount));
}

export function decreaseTotalFundingMargin(ctx: MessageContext, amount: BigNumber): void {
    if (amount.isZero()) return;
    ctx.repos.fees.totalFundingMargin.update((t) => subUnsigned(t, amount, 'total funding margin'));
}

export interface SettledFees {
    pos: Position;
    borrow: BigNumber;
    funding: BigNumber;
    crank: BigNumber;
    close?: PositionCloseReason;
}

const addFee = (fee: Position['borrowFee'], collateral: BigNumber, price: PricePoint) => ({
    collateral: fee.collateral.plus(collateral),
    usd: fee.usd.plus(collateralToUsd(price, collateral)),
});

/**
 * Charge borrow, funding and crank fees accrued over [start, end). Each is
 * bounded by the matching part of the liquidation margin.
 */
export function settlePendingFees(
    ctx: MessageContext,
    pos: Position,
    start: Timestamp,
    end: Timestamp,
    chargeCrankFee: boolean
): SettledFees {
    const price = spotPrice(ctx);
    const margin: LiquidationMargin = pos.liquidationMargin;
    const { fees } = ctx.repos;

    const borrow = borrowPayment(ctx.repos, pos.counterCollateral, margin.borrow, start, end);
    collectBorrowFee(ctx, borrow.lp, borrow.xlp);

    let funding = fundingPayment(ctx, pos.notionalSize, start, end);
    if (funding.gt(margin.funding)) funding = margin.funding;
    const aggregate = aggregateFundingCap(
        fees.totalNetFundingPaid.get(),
        fees.totalFundingMargin.get(),
        funding,
        margin.funding
    );
    funding = aggregate.amount;
    fees.totalNetFundingPaid.update((t) => t.plus(funding));

    const crankUsd = chargeCrankFee ? pos.pendingCrankFee.plus(ctx.config.crankFeeCharged) : pos.pendingCrankFee;
    const crankWanted = usdToCollateral(price, crankUsd);
    const crank = minDec(crankWanted, margin.crank);
    const pendingCrankFee = crankWanted.isZero()
        ? ZERO
        : crankUsd.minus(div(crankUsd.times(crank), crankWanted));
    collectCrankFee(ctx, crank);

    if (borrow.capped || aggregate.capped || crank.lt(crankWanted)) {
        logger.warn(
            `${FEE_CONFIG.logPrefix} insufficient margin position=${pos.id} ` +
            `borrowCapped=${borrow.capped} fundingCapped=${aggregate.capped} crankShort=${crankWanted.minus(crank).toFixed()}`
        );
    }

    const active = pos.activeCollateral.minus(borrow.total).minus(funding).minus(crank);
    invariant(!active.isNegative(), `position ${pos.id} fees exceed active collateral`, {
        active: pos.activeCollateral.toFixed(),
        borrow: borrow.total.toFixed(),
        funding: funding.toFixed(),
        crank: crank.toFixed(),
    });

    const next: Position = {
        ...pos,
        activeCollateral: active,
        borrowFee: addFee(pos.borrowFee, borrow.total, price),
        fundingFee: addFee(pos.fundingFee, funding, price),
        crankFee: addFee(pos.crankFee, crank, price),
        pendingCrankFee,
    };
    return {
        pos: next,
        borrow: borrow.total,
        funding,
        crank,
        close: active.isZero() ? { kind: 'liquidated', reason: 'liquidated' } : undefined,
    };
}

/**
 * Borrow and funding owed since the last liquifunding, without capping or
 * saving anything. Used by queries.
 */
export function previewPendingFees(ctx: MessageContext, pos: Position, end: Timestamp): { borrow: BigNumber; funding: BigNumber } {
    if (end <= pos.liquifundedAt) return { borrow: ZERO, funding: ZERO };
    const borrow = borrowPayment(ctx.repos, pos.counterCollateral, pos.liquidationMargin.borrow, pos.liquifundedAt, end);
    const funding = minDec(fundingPayment(ctx, pos.notionalSize, pos.liquifundedAt, end), pos.liquidationMargin.funding);
    return { borrow: borrow.total, funding };
}
