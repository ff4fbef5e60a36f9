/**
 * Shared test fixtures
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Builders for configs, stores, message contexts and whole markets.
 *
 * FRICTIONLESS zeroes trading and crank fees and makes the delta neutrality
 * fee vanish, so settlement amounts in scenarios can be traced by hand.
 * Margins are still computed from the default rates.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import { Decimal } from '../src/utils/math';
import { DEFAULT_MARKET_CONFIG, validateMarketConfig, type MarketConfig, type MarketConfigUpdate } from '../src/config/marketConfig';
import { KvStore, createRepositories, type Repositories } from '../src/storage';
import { MessageContext } from '../src/engine/context';
import { initFeeSeries } from '../src/engine/feeEngine';
import { Market, type ExecuteResult } from '../src/market/market';
import type { Funds } from '../src/market/messages';
import { isPerpError, type ErrorPayload } from '../src/utils/errors';
import type { Address, MarketId, Position, Timestamp } from '../src/types';

export const d = (value: BigNumber.Value): BigNumber => new Decimal(value);

export const ETH_USD: MarketId = { base: 'ETH', quote: 'USD', marketType: 'collateral-is-quote' };

export const ETH_USD_BASE: MarketId = { base: 'ETH', quote: 'USD', marketType: 'collateral-is-base' };

export const FRICTIONLESS: MarketConfigUpdate = {
    tradingFeeNotionalSize: d(0),
    tradingFeeCounterCollateral: d(0),
    crankFeeCharged: d(0),
    crankFeeReward: d(0),
    deltaNeutralityFeeSensitivity: d('1e30'),
};

export function createTestConfig(overrides: MarketConfigUpdate = {}): MarketConfig {
    const config: MarketConfig = { ...DEFAULT_MARKET_CONFIG, ...overrides };
    validateMarketConfig(config);
    return config;
}

export interface TestEnv {
    store: KvStore;
    repos: Repositories;
    config: MarketConfig;
    market: MarketId;
}

export function createTestEnv(overrides: MarketConfigUpdate = {}, market: MarketId = ETH_USD): TestEnv {
    const store = new KvStore();
    const repos = createRepositories(store);
    const config = createTestConfig(overrides);
    initFeeSeries(repos, config, 0);
    return { store, repos, config, market };
}

export function createTestContext(env: TestEnv, now: Timestamp, sender: Address = 'trader'): MessageContext {
    return new MessageContext({
        sender,
        now,
        config: env.config,
        market: env.market,
        repos: env.repos,
        journal: env.store.journal,
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET FACADE
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestMarket(overrides: MarketConfigUpdate = {}, id: MarketId = ETH_USD): Market {
    return new Market(id, { config: createTestConfig(overrides), createdAt: 0 });
}

export const native = (amount: BigNumber.Value): Funds => ({ kind: 'native', denom: 'ucollateral', amount: d(amount) });

export type OkResult = Extract<ExecuteResult, { ok: true }>;

export function expectOk(result: ExecuteResult): OkResult {
    if (!result.ok) {
        throw new Error(`expected success, got ${result.error.id}: ${result.error.description}`);
    }
    return result;
}

export function expectError(result: ExecuteResult): ErrorPayload {
    if (result.ok) {
        throw new Error(`expected failure, got ${result.data.kind}`);
    }
    return result.error;
}

export function openedPosition(result: ExecuteResult): Position {
    const { data } = expectOk(result);
    if (data.kind !== 'position') {
        throw new Error(`expected a position, got ${data.kind}`);
    }
    return data.position;
}

/**
 * Sum of every token transfer the market asked for
 */
export function transferredOut(results: ExecuteResult[]): BigNumber {
    let total = d(0);
    for (const result of results) {
        if (!result.ok) continue;
        for (const msg of result.messages) {
            if (msg.kind === 'token-transfer') total = total.plus(msg.amount);
        }
    }
    return total;
}

function sumOpenPositions(market: Market, now: Timestamp, owners: Address[], field: 'activeCollateral' | 'counterCollateral'): BigNumber {
    return owners
        .flatMap((owner) => market.positions(now, owner).items)
        .reduce((acc, pos) => acc.plus(pos[field]), d(0));
}

/**
 * Locked liquidity must always equal the counter collateral of open positions
 */
export const sumCounterCollateral = (market: Market, now: Timestamp, owners: Address[] = ['trader']): BigNumber =>
    sumOpenPositions(market, now, owners, 'counterCollateral');

export const sumActiveCollateral = (market: Market, now: Timestamp, owners: Address[] = ['trader']): BigNumber =>
    sumOpenPositions(market, now, owners, 'activeCollateral');

export const flushLogs = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 20));

/**
 * Token transfers a context asked for, as [recipient, amount] pairs
 */
export function transfers(ctx: MessageContext): Array<[Address, string]> {
    return ctx.messages.flatMap((msg): Array<[Address, string]> =>
        msg.kind === 'token-transfer' ? [[msg.recipient, msg.amount.toFixed()]] : []
    );
}

export function expectPerpError(fn: () => unknown, id: string): void {
    try {
        fn();
    } catch (err) {
        expect(isPerpError(err) && err.id).toBe(id);
        return;
    }
    throw new Error(`expected ${id}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// STANDARD SCENARIO
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Frictionless ETH/USD market priced at 10 from t=1000, with 1000 of
 * liquidity from 'lp' and the first price point already cranked
 */
export function createStandardMarket(overrides: MarketConfigUpdate = {}): Market {
    const market = createTestMarket({ ...FRICTIONLESS, ...overrides });
    expectOk(market.execute({ sender: 'admin', now: 1000 }, { type: 'set-manual-price', priceBase: d(10) }));
    expectOk(market.execute({ sender: 'lp', now: 1000, funds: native(1000) }, { type: 'deposit-liquidity', stakeToXlp: false }));
    expectOk(market.execute({ sender: 'cranker', now: 1000 }, { type: 'crank' }));
    return market;
}

export function setPrice(market: Market, now: Timestamp, price: BigNumber.Value): void {
    expectOk(market.execute({ sender: 'admin', now }, { type: 'set-manual-price', priceBase: d(price) }));
}

/**
 * 10x long with 100 collateral and max gains of 1 (counter collateral 100)
 */
export function openStandardLong(market: Market, now: Timestamp = 1000): Position {
    return openedPosition(
        market.execute(
            { sender: 'trader', now, funds: native(100) },
            { type: 'open-position', leverage: d(10), direction: 'long', maxGains: d(1) }
        )
    );
}
