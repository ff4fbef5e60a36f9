/**
 * Position Math Tests
 */

import {
    counterCollateralFor,
    directionToBase,
    leverageToNotional,
    liquidationMargin,
    liquidationPrice,
    maxGainsFor,
    takeProfitPrice,
    tradingFeeFor,
    validateCounterLeverage,
    validateLeverage,
    validateMinimumDeposit,
    validateTraderLeverage,
} from '../src/engine/positionMath';
import { DEFAULT_MARKET_CONFIG } from '../src/config/marketConfig';
import type { LiquidationMargin, PricePoint } from '../src/types';
import { createTestConfig, d, expectPerpError } from './helpers';

const config = DEFAULT_MARKET_CONFIG;

const PRICE_10: PricePoint = {
    timestamp: 0,
    priceNotional: d(10),
    priceBase: d(10),
    priceUsd: d(1),
    marketType: 'collateral-is-quote',
    isNotionalUsd: false,
};

const MARGIN_10: LiquidationMargin = { borrow: d(2), funding: d(3), deltaNeutrality: d(4), crank: d(1) };

describe('leverage conversions', () => {
    test('collateral-is-quote keeps the signed leverage', () => {
        expect(leverageToNotional('collateral-is-quote', 'long', d(10)).toFixed()).toBe('10');
        expect(leverageToNotional('collateral-is-quote', 'short', d(10)).toFixed()).toBe('-10');
    });

    test('collateral-is-base shifts by one', () => {
        expect(leverageToNotional('collateral-is-base', 'long', d(10)).toFixed()).toBe('-9');
        expect(leverageToNotional('collateral-is-base', 'short', d(10)).toFixed()).toBe('11');
    });

    test('direction to base flips for collateral-is-base', () => {
        expect(directionToBase('collateral-is-base', d(-9))).toBe('long');
        expect(directionToBase('collateral-is-quote', d(-9))).toBe('short');
    });
});

describe('counterCollateralFor', () => {
    test('collateral-is-quote scales collateral by max gains', () => {
        expect(counterCollateralFor('collateral-is-quote', d(2), d(100), d(10), d(1000)).toFixed()).toBe('200');
    });

    test('infinite max gains need collateral-is-base', () => {
        expectPerpError(() => counterCollateralFor('collateral-is-quote', 'infinite', d(100), d(10), d(1000)), 'InvalidInfiniteMaxGains');
    });

    test('infinite max gains lock the whole notional of a base long', () => {
        expect(counterCollateralFor('collateral-is-base', 'infinite', d(100), d(-9), d(-900)).toFixed()).toBe('900');
        expectPerpError(() => counterCollateralFor('collateral-is-base', 'infinite', d(100), d(11), d(1100)), 'InvalidInfiniteMaxGains');
    });

    test('max gains too large for the leverage are refused', () => {
        expectPerpError(() => counterCollateralFor('collateral-is-base', d(10), d(100), d(11), d(1100)), 'MaxGainsTooLarge');
    });

    test('collateral-is-base counter collateral', () => {
        // 100 / (1 − 2 / 11)
        const counter = counterCollateralFor('collateral-is-base', d(1), d(100), d(11), d(1100));
        expect(counter.toFixed()).toBe('122.222222222222222195');
        expect(maxGainsFor('collateral-is-base', counter, d(100), d(11)).toFixed()).toBe('0.999999999999999999');
    });

    test('max gains round trip for collateral-is-quote', () => {
        expect(maxGainsFor('collateral-is-quote', d(200), d(100), d(10)).toFixed()).toBe('2');
    });
});

test('trading fee charges both notional and counter collateral', () => {
    // 1000 × 0.0005 + 200 × 0.0005
    expect(tradingFeeFor(config, d(-1000), d(200)).toFixed()).toBe('0.6');
});

describe('trigger prices', () => {
    test('long liquidation and take profit', () => {
        expect(liquidationPrice(d(10), d(100), d(100), MARGIN_10)?.toFixed()).toBe('9.1');
        expect(takeProfitPrice(d(10), d(200), d(100))?.toFixed()).toBe('12');
    });

    test('short liquidation and take profit', () => {
        expect(liquidationPrice(d(10), d(100), d(-100), MARGIN_10)?.toFixed()).toBe('10.9');
        expect(takeProfitPrice(d(10), d(200), d(-100))?.toFixed()).toBe('8');
    });

    test('prices at or below zero are absent', () => {
        const none: LiquidationMargin = { borrow: d(0), funding: d(0), deltaNeutrality: d(0), crank: d(0) };
        expect(liquidationPrice(d(1), d(100), d(10), none)).toBeUndefined();
        expect(takeProfitPrice(d(1), d(100), d(-10))).toBeUndefined();
    });
});

test('liquidation margin covers a year of maximum fees', () => {
    // delay plus staleness is exactly one year
    const yearly = createTestConfig({ liquifundingDelaySeconds: 31_528_800 });
    const margin = liquidationMargin(yearly, { activeCollateral: d(100), counterCollateral: d(100), notionalSize: d(10) }, d(10), PRICE_10);
    expect(margin.borrow.toFixed()).toBe('120');
    // max price 10 + 100 / 10 = 20
    expect(margin.funding.toFixed()).toBe('180');
    expect(margin.deltaNeutrality.toFixed()).toBe('2');
    expect(margin.crank.toFixed()).toBe('0.01');
});

describe('leverage validation', () => {
    test('trader leverage must be in (0, max]', () => {
        expectPerpError(() => validateTraderLeverage(config, 'collateral-is-quote', d(31)), 'TraderLeverageOutOfRange');
        expectPerpError(() => validateTraderLeverage(config, 'collateral-is-quote', d(0)), 'TraderLeverageOutOfRange');
        expect(() => validateTraderLeverage(config, 'collateral-is-quote', d(30))).not.toThrow();
    });

    test('lowering an out of range trader leverage is allowed', () => {
        expect(() => validateTraderLeverage(config, 'collateral-is-quote', d(35), d(40))).not.toThrow();
    });

    test('counter leverage must be in (1, max]', () => {
        expectPerpError(() => validateCounterLeverage(config, d(1)), 'CounterLeverageOutOfRange');
        expectPerpError(() => validateCounterLeverage(config, d(31)), 'CounterLeverageOutOfRange');
        expect(() => validateCounterLeverage(config, d(2))).not.toThrow();
        expect(() => validateCounterLeverage(config, d(30))).not.toThrow();
        expect(() => validateCounterLeverage(config, d(31), d(35))).not.toThrow();
    });

    test('an update may not flip direction', () => {
        const current = { notionalSize: d(10), activeCollateral: d(100), counterCollateral: d(100) };
        const flipped = { notionalSize: d(-10), activeCollateral: d(100), counterCollateral: d(100) };
        expectPerpError(() => validateLeverage(config, 'collateral-is-quote', PRICE_10, flipped, current), 'DirectionToBaseFlipped');
    });
});

test('minimum deposit allows a small tolerance', () => {
    expect(() => validateMinimumDeposit(config, PRICE_10, d('4.5'))).not.toThrow();
    expectPerpError(() => validateMinimumDeposit(config, PRICE_10, d('4.4')), 'MinimumDeposit');
});
