/**
 * Fixed-Point Decimal Helpers
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every amount in the engine (collateral, notional, USD, LP tokens, prices) is a
 * bignumber.js value with 18 fractional digits, rounded toward zero.
 *
 * Checked helpers fail closed:
 *   - division by zero or a non-finite operand → Conversion
 *   - an unsigned quantity going negative       → Exceeded
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { PerpError } from './errors';

export const DECIMAL_PLACES = 18;

export const Decimal = BigNumber.clone({
    DECIMAL_PLACES,
    ROUNDING_MODE: BigNumber.ROUND_DOWN,
    EXPONENTIAL_AT: [-40, 60],
});

export type Decimal = BigNumber;

/** Collateral asset amount */
export type Collateral = BigNumber;
/** Signed or unsigned notional amount */
export type Notional = BigNumber;
/** USD amount */
export type Usd = BigNumber;
/** LP or xLP share amount */
export type LpToken = BigNumber;

export const ZERO: BigNumber = new Decimal(0);
export const ONE: BigNumber = new Decimal(1);

/**
 * Parse a decimal, rejecting NaN and infinities
 */
export const toDecimal = (value: BigNumber.Value): BigNumber => {
    const d = new Decimal(value);
    if (!d.isFinite()) {
        throw PerpError.conversion(`not a finite decimal: ${String(value)}`);
    }
    return d;
};

/**
 * Product truncated to the fixed-point precision
 */
export const mul = (a: BigNumber, b: BigNumber): BigNumber => {
    return round(a.times(b));
};

export const div = (a: BigNumber, b: BigNumber): BigNumber => {
    if (b.isZero()) {
        throw PerpError.conversion(`division by zero: ${a.toFixed()} / 0`);
    }
    return round(a.div(b));
};

export const round = (a: BigNumber): BigNumber => {
    return a.decimalPlaces(DECIMAL_PLACES, BigNumber.ROUND_DOWN);
};

/**
 * a - b for quantities that may never be negative
 */
export const subUnsigned = (a: BigNumber, b: BigNumber, what: string): BigNumber => {
    const out = a.minus(b);
    if (out.isNegative()) {
        throw PerpError.exceeded(`${what}: ${a.toFixed()} - ${b.toFixed()} is negative`);
    }
    return out;
};

export const minDec = (a: BigNumber, b: BigNumber): BigNumber => (a.lte(b) ? a : b);

export const maxDec = (a: BigNumber, b: BigNumber): BigNumber => (a.gte(b) ? a : b);

export const clamp = (value: BigNumber, low: BigNumber, high: BigNumber): BigNumber => {
    return minDec(maxDec(value, low), high);
};

/**
 * Equality within a tolerance, for values that went through division
 */
export const approxEq = (a: BigNumber, b: BigNumber, tolerance: BigNumber.Value = '0.0000001'): boolean => {
    return a.minus(b).abs().lte(tolerance);
};
