/**
 * Delta Neutrality Fee Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * With sensitivity 1000 and cap 0.01 the uncapped band is net notional in
 * [−10, 10], and moving from 0 to 10 costs 10² / 2000 = 0.05.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    adjustOpenInterest,
    calculateDeltaNeutralityFee,
    chargeDeltaNeutralityFee,
    deltaNeutralityFeeAmount,
} from '../src/engine/deltaNeutralityFee';
import { appendPrice } from '../src/engine/priceHistory';
import type { PricePoint } from '../src/types';
import { createTestContext, createTestEnv, d, expectPerpError, type TestEnv } from './helpers';

const CAP = d('0.01');
const SENSITIVITY = d(1000);

function createBandEnv(): TestEnv {
    return createTestEnv({ deltaNeutralityFeeSensitivity: SENSITIVITY });
}

function priceAt(env: TestEnv, value: number): PricePoint {
    return appendPrice(createTestContext(env, 1000, 'admin'), d(value));
}

describe('deltaNeutralityFeeAmount', () => {
    test('moving away from neutral inside the band', () => {
        expect(deltaNeutralityFeeAmount(CAP, SENSITIVITY, d(0), d(10)).toFixed()).toBe('0.05');
        expect(deltaNeutralityFeeAmount(CAP, SENSITIVITY, d(0), d(-10)).toFixed()).toBe('0.05');
    });

    test('beyond the band the rate is flat at the cap', () => {
        // 0.05 for the band plus 10 × 0.01
        expect(deltaNeutralityFeeAmount(CAP, SENSITIVITY, d(0), d(20)).toFixed()).toBe('0.15');
    });

    test('moving toward neutral is a payment', () => {
        expect(deltaNeutralityFeeAmount(CAP, SENSITIVITY, d(5), d(-5)).toFixed()).toBe('-0.0125');
    });
});

describe('calculateDeltaNeutralityFee', () => {
    test('an empty fund pays nothing', () => {
        const env = createBandEnv();
        const calc = calculateDeltaNeutralityFee(env.config, d(0), d(5), d(-5), priceAt(env, 1));
        expect(calc.fee.toFixed()).toBe('0');
    });

    test('payments scale with how well funded the fund is', () => {
        const env = createBandEnv();
        const price = priceAt(env, 1);
        expect(calculateDeltaNeutralityFee(env.config, d('0.025'), d(5), d(-5), price).fee.toFixed()).toBe('-0.025');
        expect(calculateDeltaNeutralityFee(env.config, d('0.05'), d(5), d(-5), price).fee.toFixed()).toBe('-0.05');
    });

    test('a change crossing neutral is charged in two passes', () => {
        const env = createBandEnv();
        // paid 0.05 back to zero, then charged 0.05 out to −10
        const calc = calculateDeltaNeutralityFee(env.config, d('0.05'), d(10), d(-20), priceAt(env, 1));
        expect(calc.fee.toFixed()).toBe('0');
    });

    test('a margin cap bounds the charge', () => {
        const env = createBandEnv();
        const calc = calculateDeltaNeutralityFee(env.config, d(0), d(0), d(10), priceAt(env, 1), d('0.01'));
        expect(calc.fee.toFixed()).toBe('0.01');
        expect(calc.capTriggered?.available.toFixed()).toBe('0.01');
        expect(calc.capTriggered?.requested.toFixed()).toBe('0.05');
    });

    test('the fee converts from notional at the price', () => {
        const env = createBandEnv();
        expect(calculateDeltaNeutralityFee(env.config, d(0), d(0), d(10), priceAt(env, 2)).fee.toFixed()).toBe('0.1');
    });
});

describe('chargeDeltaNeutralityFee', () => {
    test('the fund keeps the fee minus the tax', () => {
        const env = createBandEnv();
        const price = priceAt(env, 1);
        const ctx = createTestContext(env, 1000);
        expect(chargeDeltaNeutralityFee(ctx, 1, d(10), price).toFixed()).toBe('0.05');
        // 0.05 × 0.25 to the protocol
        expect(env.repos.fees.deltaNeutralityFund.get().toFixed()).toBe('0.0375');
        expect(env.repos.fees.fees.get().protocol.toFixed()).toBe('0.0125');
    });
});

describe('adjustOpenInterest', () => {
    test('tracks long and short interest', () => {
        const env = createBandEnv();
        const ctx = createTestContext(env, 1000);
        adjustOpenInterest(ctx, d(5), true, true);
        adjustOpenInterest(ctx, d(-3), false, true);
        const oi = env.repos.fees.openInterest.get();
        expect(oi.long.toFixed()).toBe('5');
        expect(oi.short.toFixed()).toBe('3');
    });

    test('refuses to push the market past the cap', () => {
        const env = createBandEnv();
        const ctx = createTestContext(env, 1000);
        adjustOpenInterest(ctx, d(5), true, true);
        expectPerpError(
            () => env.store.transaction(() => adjustOpenInterest(ctx, d(10), true, true)),
            'DeltaNeutralityFeeNewlyLong'
        );
        expect(env.repos.fees.openInterest.get().long.toFixed()).toBe('5');
    });

    test('an already long market only accepts trades toward neutral', () => {
        const env = createBandEnv();
        const ctx = createTestContext(env, 1000);
        adjustOpenInterest(ctx, d(20), true, false);
        expectPerpError(() => adjustOpenInterest(ctx, d(1), true, true), 'DeltaNeutralityFeeAlreadyLong');
    });

    test('a trade may not flip the market from one cap to the other', () => {
        const env = createBandEnv();
        const ctx = createTestContext(env, 1000);
        adjustOpenInterest(ctx, d(20), true, false);
        expectPerpError(() => adjustOpenInterest(ctx, d(-40), false, true), 'DeltaNeutralityFeeLongToShort');
    });

    test('unchecked changes skip the cap', () => {
        const env = createBandEnv();
        const ctx = createTestContext(env, 1000);
        adjustOpenInterest(ctx, d(50), true, false);
        expect(env.repos.fees.openInterest.get().long.toFixed()).toBe('50');
    });

    test('open interest never goes negative', () => {
        const env = createBandEnv();
        expectPerpError(() => adjustOpenInterest(createTestContext(env, 1000), d(-1), true, false), 'InvariantViolation');
    });
});
