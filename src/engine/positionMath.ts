/**
 * Position Math
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Pure calculations on positions: leverage conversions, counter collateral
 * from max gains, liquidation margin and trigger prices, validation.
 *
 * LEVERAGE:
 *   collateral-is-quote: leverage to notional = signed leverage to base
 *   collateral-is-base:  leverage to notional = 1 − signed leverage to base
 *
 * TRIGGER PRICES (notional):
 *   liquidation = price − (active − margin) / notional     absent if ≤ 0
 *   take profit = price + counter / notional               absent if ≤ 0
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import { PerpError } from '../utils/errors';
import { Decimal, ONE, ZERO, approxEq, div, mul } from '../utils/math';
import { MINIMUM_DEPOSIT_TOLERANCE, MS_PER_YEAR } from '../config/constants';
import { liquidationMarginDurationMs, type MarketConfig } from '../config/marketConfig';
import type { DirectionToBase, LiquidationMargin, MarketType, MaxGains, Position, PricePoint } from '../types';
import { collateralToUsd, notionalToCollateral, usdToCollateral } from './priceHistory';

const LEVERAGE_TOLERANCE = '0.0000001';

export const signedLeverage = (direction: DirectionToBase, leverage: BigNumber): BigNumber =>
    direction === 'long' ? leverage : leverage.negated();

export function leverageToNotional(marketType: MarketType, direction: DirectionToBase, leverage: BigNumber): BigNumber {
    const signed = signedLeverage(direction, leverage);
    return marketType === 'collateral-is-quote' ? signed : ONE.minus(signed);
}

/**
 * Signed leverage to base for a signed leverage to notional
 */
export function leverageToBase(marketType: MarketType, toNotional: BigNumber): BigNumber {
    return marketType === 'collateral-is-quote' ? toNotional : ONE.minus(toNotional);
}

export function directionToBase(marketType: MarketType, notional: BigNumber): DirectionToBase {
    const notionalLong = notional.isPositive();
    const long = marketType === 'collateral-is-quote' ? notionalLong : !notionalLong;
    return long ? 'long' : 'short';
}

/**
 * Signed notional size for a new position
 */
export function notionalSizeFor(price: PricePoint, toNotional: BigNumber, collateral: BigNumber): BigNumber {
    return div(toNotional.times(collateral), price.priceNotional);
}

/**
 * Counter collateral the pool locks so the trader can reach `maxGains`.
 *
 * @param notionalInCollateral - signed notional size valued in collateral
 */
export function counterCollateralFor(
    marketType: MarketType,
    maxGains: MaxGains,
    collateral: BigNumber,
    toNotional: BigNumber,
    notionalInCollateral: BigNumber
): BigNumber {
    if (marketType === 'collateral-is-quote') {
        if (maxGains === 'infinite') {
            throw new PerpError('market', 'InvalidInfiniteMaxGains', 'infinite max gains are only allowed when collateral is base');
        }
        return mul(collateral, maxGains);
    }
    if (maxGains === 'infinite') {
        if (!notionalInCollateral.isNegative()) {
            throw new PerpError('market', 'InvalidInfiniteMaxGains', 'infinite max gains are only allowed on long positions');
        }
        return notionalInCollateral.abs();
    }
    const denominator = ONE.minus(div(maxGains.plus(1), toNotional));
    if (denominator.lte(0)) {
        throw new PerpError('market', 'MaxGainsTooLarge', `max gains of ${maxGains.toFixed()} are too large for this leverage`, {
            maxGains: maxGains.toFixed(),
            leverageToNotional: toNotional.toFixed(),
        });
    }
    return div(collateral.times(maxGains), denominator);
}

/**
 * Max gains a position currently carries, inverse of counterCollateralFor
 */
export function maxGainsFor(marketType: MarketType, counter: BigNumber, active: BigNumber, toNotional: BigNumber): BigNumber {
    if (marketType === 'collateral-is-quote') return div(counter, active);
    // counter = active × mg / (1 − (mg + 1) / L)  →  mg = (counter − counter / L) / (active + counter / L)
    const perLeverage = div(counter, toNotional);
    return div(counter.minus(perLeverage), active.plus(perLeverage));
}

export const tradingFeeFor = (config: MarketConfig, notionalInCollateral: BigNumber, counter: BigNumber): BigNumber =>
    mul(notionalInCollateral.abs(), config.tradingFeeNotionalSize).plus(mul(counter, config.tradingFeeCounterCollateral));

// ═══════════════════════════════════════════════════════════════════════════════
// MARGIN AND TRIGGERS
// ═══════════════════════════════════════════════════════════════════════════════

export const marginTotal = (m: LiquidationMargin): BigNumber => m.borrow.plus(m.funding).plus(m.deltaNeutrality).plus(m.crank);

/**
 * Collateral reserved until the next liquifunding plus the staleness window.
 *
 * @param priceNotional - notional price the position was last settled at
 * @param spot - latest price, used to value the USD crank fee
 */
export function liquidationMargin(
    config: MarketConfig,
    pos: Pick<Position, 'activeCollateral' | 'counterCollateral' | 'notionalSize'>,
    priceNotional: BigNumber,
    spot: PricePoint
): LiquidationMargin {
    const durationRatio = div(new Decimal(liquidationMarginDurationMs(config)), new Decimal(MS_PER_YEAR));
    const size = pos.notionalSize.abs();
    const borrow = mul(mul(pos.activeCollateral.plus(pos.counterCollateral), config.borrowFeeRateMaxAnnualized), durationRatio);
    const headroom = pos.notionalSize.isPositive() ? pos.counterCollateral : pos.activeCollateral;
    const maxPrice = size.isZero() ? priceNotional : priceNotional.plus(div(headroom, size));
    const funding = mul(mul(mul(config.fundingRateMaxAnnualized, durationRatio), size), maxPrice);
    const deltaNeutrality = mul(mul(config.deltaNeutralityFeeCap, size), maxPrice);
    const crank = usdToCollateral(spot, config.crankFeeCharged);
    return { borrow, funding, deltaNeutrality, crank };
}

export function liquidationPrice(priceNotional: BigNumber, active: BigNumber, notional: BigNumber, margin: LiquidationMargin): BigNumber | undefined {
    const price = priceNotional.minus(div(active.minus(marginTotal(margin)), notional));
    return price.gt(0) ? price : undefined;
}

export function takeProfitPrice(priceNotional: BigNumber, counter: BigNumber, notional: BigNumber): BigNumber | undefined {
    const price = priceNotional.plus(div(counter, notional));
    return price.gt(0) ? price : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export const activeLeverageToNotional = (price: PricePoint, pos: Pick<Position, 'notionalSize' | 'activeCollateral'>): BigNumber =>
    div(notionalToCollateral(price, pos.notionalSize), pos.activeCollateral);

export const counterLeverageToNotional = (price: PricePoint, pos: Pick<Position, 'notionalSize' | 'counterCollateral'>): BigNumber =>
    div(notionalToCollateral(price, pos.notionalSize), pos.counterCollateral);

/**
 * Trader leverage must be non-zero and at most maxLeverage. An update that
 * does not raise leverage is always allowed.
 */
export function validateTraderLeverage(config: MarketConfig, marketType: MarketType, next: BigNumber, current?: BigNumber): void {
    const nextBase = leverageToBase(marketType, next).abs();
    const currentBase = current === undefined ? undefined : leverageToBase(marketType, current).abs();
    let outOfRange: boolean;
    if (approxEq(next, ZERO, LEVERAGE_TOLERANCE)) {
        outOfRange = true;
    } else if (currentBase !== undefined && currentBase.gte(nextBase)) {
        outOfRange = false;
    } else {
        outOfRange = nextBase.gt(config.maxLeverage);
    }
    if (outOfRange) {
        throw new PerpError('market', 'TraderLeverageOutOfRange', `trader leverage ${nextBase.toFixed()} is out of range (0, ${config.maxLeverage.toFixed()}]`, {
            newLeverage: nextBase.toFixed(),
            currentLeverage: currentBase?.toFixed(),
        });
    }
}

/**
 * Counter leverage must lie in (1, maxLeverage). Updates that move toward
 * the allowed range are accepted.
 */
export function validateCounterLeverage(config: MarketConfig, next: BigNumber, current?: BigNumber): void {
    const lev = next.abs();
    const cur = current?.abs();
    const aboveOne = lev.gt(1) && !approxEq(lev, ONE, LEVERAGE_TOLERANCE);
    let outOfRange: boolean;
    if (!aboveOne) {
        outOfRange = cur === undefined ? true : lev.lt(cur);
    } else if (cur !== undefined && cur.gt(lev)) {
        outOfRange = false;
    } else {
        outOfRange = !(lev.lt(config.maxLeverage) || approxEq(lev, config.maxLeverage, LEVERAGE_TOLERANCE));
    }
    if (outOfRange) {
        throw new PerpError('market', 'CounterLeverageOutOfRange', `counter leverage ${lev.toFixed()} is out of range (1, ${config.maxLeverage.toFixed()})`, {
            newLeverage: lev.toFixed(),
            currentLeverage: cur?.toFixed(),
        });
    }
}

export function validateLeverage(
    config: MarketConfig,
    marketType: MarketType,
    price: PricePoint,
    next: Pick<Position, 'notionalSize' | 'activeCollateral' | 'counterCollateral'>,
    current?: Pick<Position, 'notionalSize' | 'activeCollateral' | 'counterCollateral'>
): void {
    if (current && directionToBase(marketType, current.notionalSize) !== directionToBase(marketType, next.notionalSize)) {
        throw new PerpError('market', 'DirectionToBaseFlipped', 'position update would flip the direction to base');
    }
    validateTraderLeverage(config, marketType, activeLeverageToNotional(price, next), current && activeLeverageToNotional(price, current));
    validateCounterLeverage(config, counterLeverageToNotional(price, next), current && counterLeverageToNotional(price, current));
}

export function validateMinimumDeposit(config: MarketConfig, price: PricePoint, deposit: BigNumber): void {
    const usd = collateralToUsd(price, deposit);
    const minimum = mul(config.minimumDepositUsd, new Decimal(MINIMUM_DEPOSIT_TOLERANCE));
    if (usd.lt(minimum)) {
        throw new PerpError('market', 'MinimumDeposit', `deposit of ${usd.toFixed()} USD is below the minimum of ${config.minimumDepositUsd.toFixed()} USD`, {
            depositCollateral: deposit.toFixed(),
            depositUsd: usd.toFixed(),
            minimumUsd: config.minimumDepositUsd.toFixed(),
        });
    }
}
