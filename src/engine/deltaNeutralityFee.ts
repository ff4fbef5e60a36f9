/**
 * Delta Neutrality Fee
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Charges trades that push net open interest away from zero and pays trades
 * that bring it back, out of a dedicated fund.
 *
 * For net notional n and a change d, with cap c and sensitivity s, the fee in
 * notional is the integral of the instant rate clamp(x / s, −c, c) over
 * [n, n + d]. A change that crosses zero is charged in two passes, first back
 * to zero and then onwards.
 *
 * Payments out of the fund are scaled by how well funded it is relative to
 * the total needed to bring the market back to neutral.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError, invariant } from '../utils/errors';
import { Decimal, ONE, ZERO, approxEq, div, maxDec, minDec, mul } from '../utils/math';
import type { MarketConfig } from '../config/marketConfig';
import type { DirectionToBase, MarketType, PositionId, PricePoint } from '../types';
import type { MessageContext } from './context';
import { collectTradingFee } from './feeEngine';
import { notionalToCollateral } from './priceHistory';

export const DNF_CONFIG = {
    logPrefix: '[FEES]',
};

const TWO = new Decimal(2);

const clampToBand = (x: BigNumber, low: BigNumber, high: BigNumber): BigNumber => minDec(maxDec(x, low), high);

/**
 * Fee in notional for moving net open interest from `net` to `net + delta`
 */
export function deltaNeutralityFeeAmount(cap: BigNumber, sensitivity: BigNumber, net: BigNumber, delta: BigNumber): BigNumber {
    const low = cap.times(sensitivity).negated();
    const high = cap.times(sensitivity);
    const after = net.plus(delta);

    const atLowCap = minDec(after, low).minus(minDec(net, low));
    const atHighCap = maxDec(after, high).minus(maxDec(net, high));
    const uncapped = delta.minus(atLowCap).minus(atHighCap);
    // The uncapped segment starts where net re-enters the band
    const start = clampToBand(net, low, high);

    const capped = atLowCap.times(cap).negated().plus(atHighCap.times(cap));
    const inner = div(uncapped.times(uncapped).plus(TWO.times(uncapped).times(start)), TWO.times(sensitivity));
    return capped.plus(inner);
}

export interface DeltaNeutralityFeeCalc {
    /** Signed, positive is paid by the trader */
    fee: BigNumber;
    fundBefore: BigNumber;
    capTriggered?: { available: BigNumber; requested: BigNumber };
}

/**
 * Fee for a notional change at `price`. `marginCap` bounds a positive fee,
 * used on update and close where the position reserved a DNF margin.
 */
export function calculateDeltaNeutralityFee(
    config: MarketConfig,
    fundBefore: BigNumber,
    net: BigNumber,
    delta: BigNumber,
    price: PricePoint,
    marginCap?: BigNumber
): DeltaNeutralityFeeCalc {
    const out: DeltaNeutralityFeeCalc = { fee: ZERO, fundBefore };
    const after = net.plus(delta);
    // crossing zero: back to neutral first, then the second pass starts from zero
    const passes: Array<[BigNumber, BigNumber]> = net.times(after).isNegative()
        ? [[net, net.negated()], [ZERO, after]]
        : [[net, delta]];

    for (const [from, change] of passes) {
        const fundSoFar = fundBefore.plus(out.fee);
        const inNotional = deltaNeutralityFeeAmount(config.deltaNeutralityFeeCap, config.deltaNeutralityFeeSensitivity, from, change);
        let inCollateral = notionalToCollateral(price, inNotional);

        if (inCollateral.isNegative()) {
            const toBalance = notionalToCollateral(
                price,
                deltaNeutralityFeeAmount(config.deltaNeutralityFeeCap, config.deltaNeutralityFeeSensitivity, from, from.negated()).abs()
            );
            const fundedness = approxEq(toBalance, ZERO) ? ONE : div(fundSoFar, toBalance);
            const scaled = mul(inCollateral, fundedness);
            inCollateral = scaled.negated().gt(fundSoFar) ? fundSoFar.negated() : scaled;
        }

        if (marginCap !== undefined && inCollateral.gt(marginCap)) {
            out.capTriggered = { available: marginCap, requested: inCollateral };
            inCollateral = marginCap;
        }

        out.fee = out.fee.plus(inCollateral);
        invariant(!fundBefore.plus(out.fee).isNegative(), 'delta neutrality fund would go negative', {
            fund: fundBefore.toFixed(),
            fee: out.fee.toFixed(),
        });
    }
    return out;
}

export function netOpenInterest(ctx: MessageContext): BigNumber {
    const oi = ctx.repos.fees.openInterest.get();
    return oi.long.minus(oi.short);
}

/**
 * Preview a fee without touching the fund
 */
export function previewDeltaNeutralityFee(ctx: MessageContext, delta: BigNumber, price: PricePoint, marginCap?: BigNumber): BigNumber {
    const fund = ctx.repos.fees.deltaNeutralityFund.get();
    return calculateDeltaNeutralityFee(ctx.config, fund, netOpenInterest(ctx), delta, price, marginCap).fee;
}

/**
 * Charge the fee for a notional change and move it into the fund. The tax
 * share of a positive fee is collected as a trading fee.
 */
export function chargeDeltaNeutralityFee(
    ctx: MessageContext,
    positionId: PositionId,
    delta: BigNumber,
    price: PricePoint,
    marginCap?: BigNumber
): BigNumber {
    const { fees } = ctx.repos;
    const fundBefore = fees.deltaNeutralityFund.get();
    const calc = calculateDeltaNeutralityFee(ctx.config, fundBefore, netOpenInterest(ctx), delta, price, marginCap);
    if (calc.capTriggered) {
        logger.warn(
            `${DNF_CONFIG.logPrefix} insufficient margin for delta neutrality fee position=${positionId} ` +
            `available=${calc.capTriggered.available.toFixed()} requested=${calc.capTriggered.requested.toFixed()}`
        );
    }
    const protocol = calc.fee.isPositive() ? mul(calc.fee, ctx.config.deltaNeutralityFeeTax) : ZERO;
    const toFund = calc.fee.minus(protocol);
    const fundTotal = fundBefore.plus(toFund);
    fees.deltaNeutralityFund.set(fundTotal);
    collectTradingFee(ctx, protocol, 'delta-neutrality');
    ctx.emit({ type: 'delta-neutrality-fee', positionId, amount: calc.fee, fundTotal });
    return calc.fee;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPEN INTEREST
// ═══════════════════════════════════════════════════════════════════════════════

const DNF_LIMIT_MESSAGE = 'Cannot perform this action since it would exceed delta neutrality limits';

const toBaseDirection = (marketType: MarketType, notionalLong: boolean): DirectionToBase => {
    const long = marketType === 'collateral-is-quote' ? notionalLong : !notionalLong;
    return long ? 'long' : 'short';
};

function capError(kind: 'already' | 'newly' | 'flipped', dir: DirectionToBase): PerpError {
    if (kind === 'already') {
        return dir === 'long'
            ? new PerpError('market', 'DeltaNeutralityFeeAlreadyLong', `${DNF_LIMIT_MESSAGE} - protocol is already too long`)
            : new PerpError('market', 'DeltaNeutralityFeeAlreadyShort', `${DNF_LIMIT_MESSAGE} - protocol is already too short`);
    }
    if (kind === 'newly') {
        return dir === 'long'
            ? new PerpError('market', 'DeltaNeutralityFeeNewlyLong', `${DNF_LIMIT_MESSAGE} - protocol would become too long`)
            : new PerpError('market', 'DeltaNeutralityFeeNewlyShort', `${DNF_LIMIT_MESSAGE} - protocol would become too short`);
    }
    return dir === 'long'
        ? new PerpError('market', 'DeltaNeutralityFeeShortToLong', `${DNF_LIMIT_MESSAGE} - protocol would go from too short to too long`)
        : new PerpError('market', 'DeltaNeutralityFeeLongToShort', `${DNF_LIMIT_MESSAGE} - protocol would go from too long to too short`);
}

/**
 * Apply a position's notional change to open interest.
 *
 * @param positionIsLong - direction to notional of the position being changed
 * @param assertCap - refuse changes that push the instant rate past the cap
 */
export function adjustOpenInterest(ctx: MessageContext, notionalDiff: BigNumber, positionIsLong: boolean, assertCap: boolean): void {
    if (notionalDiff.isZero()) return;
    const { fees } = ctx.repos;
    const before = fees.openInterest.get();
    const next = positionIsLong
        ? { ...before, long: before.long.plus(notionalDiff) }
        : { ...before, short: before.short.minus(notionalDiff) };
    if (next.long.isNegative() || next.short.isNegative()) {
        throw PerpError.invariant('open interest would be negative', {
            long: next.long.toFixed(),
            short: next.short.toFixed(),
        });
    }
    fees.openInterest.set(next);
    if (!assertCap) return;

    const { deltaNeutralityFeeCap: cap, deltaNeutralityFeeSensitivity: sensitivity } = ctx.config;
    const instantBefore = div(before.long.minus(before.short), sensitivity);
    const instantAfter = div(next.long.minus(next.short), sensitivity);
    const lowBefore = instantBefore.lte(cap.negated());
    const highBefore = instantBefore.gte(cap);
    const lowAfter = instantAfter.lte(cap.negated());
    const highAfter = instantAfter.gte(cap);
    const notionalLong = !notionalDiff.isNegative();
    const dir = toBaseDirection(ctx.market.marketType, notionalLong);

    if (lowBefore) {
        if (!notionalLong) throw capError('already', dir);
        if (highAfter) throw capError('flipped', dir);
    } else if (highBefore) {
        if (notionalLong) throw capError('already', dir);
        if (lowAfter) throw capError('flipped', dir);
    } else if (lowAfter || highAfter) {
        throw capError('newly', dir);
    }
}
