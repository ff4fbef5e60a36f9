/**
 * Market Config Tests
 */

import {
    DEFAULT_MARKET_CONFIG,
    liquidationMarginDurationMs,
    loadMarketConfigFromEnv,
    mergeMarketConfig,
    validateMarketConfig,
} from '../src/config/marketConfig';
import { d, expectPerpError } from './helpers';

describe('validateMarketConfig', () => {
    test('the defaults are valid', () => {
        expect(() => validateMarketConfig(DEFAULT_MARKET_CONFIG)).not.toThrow();
    });

    test('carry leverage must leave room below the maximum', () => {
        expectPerpError(() => validateMarketConfig({ ...DEFAULT_MARKET_CONFIG, carryLeverage: d('29.5') }), 'Config');
    });

    test('the fuzz must be shorter than the liquifunding delay', () => {
        expectPerpError(
            () => validateMarketConfig({ ...DEFAULT_MARKET_CONFIG, liquifundingDelayFuzzSeconds: 86_400 }),
            'Config'
        );
    });
});

test('merging validates the result', () => {
    expect(mergeMarketConfig(DEFAULT_MARKET_CONFIG, { crankExecs: 3 }).crankExecs).toBe(3);
    expectPerpError(() => mergeMarketConfig(DEFAULT_MARKET_CONFIG, { maxLeverage: d(1) }), 'Config');
});

test('margins cover the liquifunding delay plus staleness', () => {
    // one day plus two hours
    expect(liquidationMarginDurationMs(DEFAULT_MARKET_CONFIG)).toBe(93_600_000);
});

describe('loadMarketConfigFromEnv', () => {
    test('an empty environment keeps the defaults', () => {
        const config = loadMarketConfigFromEnv({});
        expect(config.maxLeverage.toFixed()).toBe('30');
        expect(config.crankExecs).toBe(7);
    });

    test('overrides are parsed by type', () => {
        const config = loadMarketConfigFromEnv({
            PERP_MAX_LEVERAGE: '20',
            PERP_CARRY_LEVERAGE: '19',
            PERP_CRANK_EXECS: '4',
            PERP_MAX_LIQUIDITY_USD: '5000',
            PERP_DAO_ADDRESS: 'treasury',
        });
        expect(config.maxLeverage.toFixed()).toBe('20');
        expect(config.carryLeverage.toFixed()).toBe('19');
        expect(config.crankExecs).toBe(4);
        expect(config.maxLiquidity.kind === 'usd' && config.maxLiquidity.amount.toFixed()).toBe('5000');
        expect(config.dao).toBe('treasury');
    });

    test('the merged result is validated', () => {
        // carry leverage stays at 29
        expectPerpError(() => loadMarketConfigFromEnv({ PERP_MAX_LEVERAGE: '20' }), 'Config');
    });

    test('malformed integers are rejected', () => {
        expectPerpError(() => loadMarketConfigFromEnv({ PERP_CRANK_EXECS: 'x' }), 'Config');
    });

    test('collateral can be a token contract', () => {
        const config = loadMarketConfigFromEnv({ PERP_COLLATERAL_CW20: 'token-contract' });
        expect(config.collateral).toEqual({ kind: 'cw20', token: 'token-contract' });
    });

    test('a price admin makes the market manually priced', () => {
        const config = loadMarketConfigFromEnv({ PERP_PRICE_ADMIN: 'oracle-operator' });
        expect(config.spotPrice).toEqual({ kind: 'manual', admin: 'oracle-operator' });
    });
});
