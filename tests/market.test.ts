/**
 * Market Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Message routing through the market: authorization, attached funds,
 * atomic rollback, config updates, oracle prices and the query surface.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Market } from '../src/market/market';
import type { PriceFeedSource } from '../src/types';
import {
    createStandardMarket,
    createTestConfig,
    d,
    ETH_USD,
    expectError,
    expectOk,
    expectPerpError,
    FRICTIONLESS,
    native,
    openStandardLong,
    setPrice,
} from './helpers';

describe('authorization', () => {
    test('only the price admin sets manual prices', () => {
        const market = createStandardMarket();
        const error = expectError(market.execute({ sender: 'mallory', now: 2000 }, { type: 'set-manual-price', priceBase: d(10) }));
        expect(error.id).toBe('Auth');
    });

    test('only the DAO updates the config', () => {
        const market = createStandardMarket();
        const error = expectError(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'update-config', update: { crankExecs: 3 } })
        );
        expect(error.id).toBe('Auth');
    });
});

describe('attached funds', () => {
    test('funded messages need collateral', () => {
        const market = createStandardMarket();
        const error = expectError(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'open-position', leverage: d(10), direction: 'long', maxGains: d(1) })
        );
        expect(error.id).toBe('NativeFunds');
    });

    test('collateral must be the market denom', () => {
        const market = createStandardMarket();
        const error = expectError(
            market.execute(
                { sender: 'trader', now: 1000, funds: { kind: 'native', denom: 'uother', amount: d(100) } },
                { type: 'open-position', leverage: d(10), direction: 'long', maxGains: d(1) }
            )
        );
        expect(error.id).toBe('NativeFunds');
    });

    test('unfunded messages refuse collateral', () => {
        const market = createStandardMarket();
        const error = expectError(market.execute({ sender: 'lp', now: 1000, funds: native(1) }, { type: 'claim-yield' }));
        expect(error.id).toBe('NativeFunds');
    });
});

describe('execute', () => {
    test('a successful open reports events and outgoing messages', () => {
        const market = createStandardMarket();
        const result = expectOk(
            market.execute(
                { sender: 'trader', now: 1000, funds: native(100) },
                { type: 'open-position', leverage: d(10), direction: 'long', maxGains: d(1) }
            )
        );
        expect(result.events.map((event) => event.type)).toContain('position-open');
        expect(result.messages).toEqual([{ kind: 'position-nft-mint', owner: 'trader', positionId: 1 }]);
    });

    test('a rejected message changes nothing', () => {
        const market = createStandardMarket();
        expectError(
            market.execute(
                { sender: 'trader', now: 1000, funds: native(100) },
                { type: 'open-position', leverage: d(40), direction: 'long', maxGains: d(1) }
            )
        );
        expect(market.status(1000).openInterest.long.toFixed()).toBe('0');
        expect(market.positions(1000, 'trader').items).toEqual([]);
    });

    test('config updates are validated and applied', () => {
        const market = createStandardMarket();
        expectOk(market.execute({ sender: 'dao', now: 1000 }, { type: 'update-config', update: { crankExecs: 3 } }));
        expect(market.currentConfig.crankExecs).toBe(3);

        const error = expectError(market.execute({ sender: 'dao', now: 1000 }, { type: 'update-config', update: { crankExecs: 0 } }));
        expect(error.id).toBe('Config');
        expect(market.currentConfig.crankExecs).toBe(3);
    });

    test('a crank without a count uses the configured budget', () => {
        const market = createStandardMarket();
        expectOk(market.execute({ sender: 'dao', now: 1000 }, { type: 'update-config', update: { crankExecs: 3 } }));
        setPrice(market, 2000, 10);
        const { data } = expectOk(market.execute({ sender: 'cranker', now: 2000 }, { type: 'crank' }));
        expect(data).toEqual({ kind: 'crank', batch: { requested: 3, paying: 0, actual: 1 } });
    });
});

describe('oracle prices', () => {
    const feeds: PriceFeedSource = {
        read: (feedId) => (feedId === 'eth-usd' ? d(10) : undefined),
    };

    function createOracleMarket(): Market {
        const config = createTestConfig({
            ...FRICTIONLESS,
            spotPrice: { kind: 'oracle', feeds: [{ id: 'eth-usd', inverted: false }], feedsUsd: [] },
        });
        return new Market(ETH_USD, { config, createdAt: 0, priceFeeds: feeds });
    }

    test('price-sensitive messages append the oracle price first', () => {
        const market = createOracleMarket();
        expectOk(market.execute({ sender: 'lp', now: 1000, funds: native(1000) }, { type: 'deposit-liquidity', stakeToXlp: false }));
        expect(market.spotPrice(1000).priceBase.toFixed()).toBe('10');
    });

    test('manual prices are refused', () => {
        const market = createOracleMarket();
        const error = expectError(market.execute({ sender: 'admin', now: 1000 }, { type: 'set-manual-price', priceBase: d(10) }));
        expect(error.id).toBe('Auth');
    });

    test('an explicit append at an existing time returns the stored point', () => {
        const market = createOracleMarket();
        expectOk(market.execute({ sender: 'anyone', now: 1000 }, { type: 'append-oracle-price' }));
        const { data } = expectOk(market.execute({ sender: 'anyone', now: 1000 }, { type: 'append-oracle-price' }));
        expect(data.kind === 'price' && data.price.timestamp).toBe(1000);
        expect(market.spotPriceHistory().points.map((point) => point.timestamp)).toEqual([1000]);
    });
});

describe('queries', () => {
    test('status summarizes the market', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const status = market.status(1000);
        expect(status.liquidity.locked.toFixed()).toBe('100');
        expect(status.openInterest.long.toFixed()).toBe('100');
        expect(status.closeAllRequested).toBe(false);
        expect(status.resettingLps).toBe(false);
    });

    test('price history is newest first', () => {
        const market = createStandardMarket();
        setPrice(market, 2000, 11);
        const page = market.spotPriceHistory();
        expect(page.points.map((point) => point.priceBase.toFixed())).toEqual(['11', '10']);
        expect(market.spotPrice(2000, 1500).priceBase.toFixed()).toBe('10');
    });

    test('liquidity providers are listed', () => {
        const market = createStandardMarket();
        const page = market.liquidityProviders();
        expect(page.items.map((provider) => provider.addr)).toEqual(['lp']);
        expect(page.items[0]?.stats.lp.toFixed()).toBe('1000');
    });

    test('unknown positions are reported', () => {
        const market = createStandardMarket();
        expectPerpError(() => market.position(1000, 99), 'MissingPosition');
        expectPerpError(() => market.closedPosition(99), 'MissingPosition');
    });
});
