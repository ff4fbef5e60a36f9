/**
 * Fee Engine Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Borrow and funding rate curves, payment caps and fee bookkeeping.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    aggregateFundingCap,
    allocateCrankFees,
    borrowPayment,
    collectTradingFee,
    fundingRates,
    nextBorrowRate,
    provideCrankFunds,
    splitBorrowRate,
    transferDaoFees,
} from '../src/engine/feeEngine';
import { depositLiquidity, loadAddrStats } from '../src/engine/liquidityPool';
import { appendPrice } from '../src/engine/priceHistory';
import { MS_PER_DAY, MS_PER_YEAR } from '../src/config/constants';
import { DEFAULT_MARKET_CONFIG } from '../src/config/marketConfig';
import { createTestContext, createTestEnv, d, expectPerpError, transfers } from './helpers';

const config = DEFAULT_MARKET_CONFIG;

describe('borrow rate', () => {
    test('split weights xLP by the rewards multiplier', () => {
        // multiplier (1 × 100 + 2 × 100) / 200 = 1.5, so xLP holds 150 of 250 shares
        const rates = splitBorrowRate(config, d('0.3'), d(100), d(100));
        expect(rates.lp.toFixed()).toBe('0.12');
        expect(rates.xlp.toFixed()).toBe('0.18');
    });

    test('a one-sided pool takes the whole rate', () => {
        expect(splitBorrowRate(config, d('0.3'), d(100), d(0)).lp.toFixed()).toBe('0.3');
        expect(splitBorrowRate(config, d('0.3'), d(0), d(100)).xlp.toFixed()).toBe('0.3');
    });

    test('an empty pool drives the rate to the minimum', () => {
        expect(nextBorrowRate(config, d('0.1'), d(0), d(0), MS_PER_DAY).toFixed()).toBe('0.01');
    });

    test('utilization above target raises the rate over time', () => {
        // 0.1 + (1/3) × 0.05
        expect(nextBorrowRate(config, d('0.1'), d(95), d(5), MS_PER_DAY).toFixed()).toBe('0.116666666666666666');
    });

    test('the rate is clamped to the maximum', () => {
        expect(nextBorrowRate(config, d('0.1'), d(100), d(0), 30 * MS_PER_DAY).toFixed()).toBe('0.6');
    });

    test('no elapsed time keeps the previous rate', () => {
        expect(nextBorrowRate(config, d('0.2'), d(50), d(50), 0).toFixed()).toBe('0.2');
    });
});

describe('funding rate', () => {
    test('balanced or one-sided interest pays nothing', () => {
        expect(fundingRates(config, d(100), d(100)).long.isZero()).toBe(true);
        expect(fundingRates(config, d(100), d(0)).short.isZero()).toBe(true);
    });

    test('the popular side pays and the other side receives the same total', () => {
        const rates = fundingRates(config, d(300), d(100));
        expect(rates.long.toFixed()).toBe('0.5');
        expect(rates.short.toFixed()).toBe('-1.5');
    });

    test('rates mirror when shorts are popular', () => {
        const rates = fundingRates(config, d(100), d(300));
        expect(rates.long.toFixed()).toBe('-1.5');
        expect(rates.short.toFixed()).toBe('0.5');
    });

    test('the paying rate is capped', () => {
        const rates = fundingRates(config, d(1000), d(1));
        expect(rates.long.toFixed()).toBe('0.9');
        expect(rates.short.toFixed()).toBe('-900');
    });
});

describe('payments', () => {
    test('borrow payment is capped by the margin', () => {
        const env = createTestEnv();
        const capped = borrowPayment(env.repos, d(1000), d(1), 0, MS_PER_YEAR);
        expect(capped.total.toFixed()).toBe('1');
        expect(capped.lp.toFixed()).toBe('1');
        expect(capped.capped).toBe(true);

        const full = borrowPayment(env.repos, d(1000), d(100), 0, MS_PER_YEAR);
        expect(full.total.toFixed()).toBe('10');
        expect(full.capped).toBe(false);
    });

    test('receivers cannot take more than the other margins cover', () => {
        const cap = aggregateFundingCap(d(0), d(10), d(-8), d(5));
        expect(cap.amount.toFixed()).toBe('-5');
        expect(cap.capped).toBe(true);
    });

    test('payers are bounded by their own margin', () => {
        const within = aggregateFundingCap(d(0), d(10), d(3), d(5));
        expect(within.amount.toFixed()).toBe('3');
        expect(within.capped).toBe(false);
        expect(aggregateFundingCap(d(0), d(10), d(7), d(5)).amount.toFixed()).toBe('5');
    });
});

describe('fee bookkeeping', () => {
    test('trading fees are taxed and the rest goes to providers', () => {
        const env = createTestEnv();
        const ctx = createTestContext(env, 1000, 'lp1');
        depositLiquidity(ctx, 'lp1', d(100), false);
        collectTradingFee(ctx, d(10));

        const fees = env.repos.fees.fees.get();
        expect(fees.protocol.toFixed()).toBe('3');
        expect(fees.wallets.toFixed()).toBe('7');
    });

    test('protocol fees go to the DAO', () => {
        const env = createTestEnv();
        const ctx = createTestContext(env, 1000, 'lp1');
        depositLiquidity(ctx, 'lp1', d(100), false);
        collectTradingFee(ctx, d(10));

        const dao = createTestContext(env, 2000, 'anyone');
        expect(transferDaoFees(dao).toFixed()).toBe('3');
        expect(transfers(dao)).toEqual([['dao', '3']]);
        expect(env.repos.fees.fees.get().protocol.isZero()).toBe(true);
    });

    test('crank rewards are bounded by the crank pool', () => {
        const env = createTestEnv();
        appendPrice(createTestContext(env, 1000, 'admin'), d(10));
        const ctx = createTestContext(env, 1000, 'cranker');
        provideCrankFunds(ctx, d('0.005'));

        expect(allocateCrankFees(ctx, 'cranker', 3).toFixed()).toBe('0.003');
        expect(loadAddrStats(ctx, 'cranker').crankRewards.toFixed()).toBe('0.003');
        expect(allocateCrankFees(ctx, 'cranker', 10).toFixed()).toBe('0.002');
        expect(env.repos.fees.fees.get().crank.isZero()).toBe(true);
        expect(allocateCrankFees(ctx, 'cranker', 1).isZero()).toBe(true);
    });

    test('crank funds must be positive', () => {
        const env = createTestEnv();
        expectPerpError(() => provideCrankFunds(createTestContext(env, 1000), d(0)), 'Exceeded');
    });
});
