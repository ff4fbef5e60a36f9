// Key comparators for ordered maps

import type BigNumber from 'bignumber.js';
import type { Comparator } from './kvStore';

export const compareNumbers: Comparator<number> = (a, b) => a - b;

export const compareStrings: Comparator<string> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

export const compareDecimals: Comparator<BigNumber> = (a, b) => (a.lt(b) ? -1 : a.gt(b) ? 1 : 0);

/** (time, id) style keys */
export type NumberPair = readonly [number, number];

export const compareNumberPairs: Comparator<NumberPair> = (a, b) => a[0] - b[0] || a[1] - b[1];

/** (price, id) keys for trigger maps */
export type PriceKey = readonly [BigNumber, number];

export const comparePriceKeys: Comparator<PriceKey> = (a, b) => compareDecimals(a[0], b[0]) || a[1] - b[1];

/** (owner, id) keys */
export type OwnerKey = readonly [string, number];

export const compareOwnerKeys: Comparator<OwnerKey> = (a, b) => compareStrings(a[0], b[0]) || a[1] - b[1];

/** (owner, time, id) keys for closed position history */
export type OwnerTimeKey = readonly [string, number, number];

export const compareOwnerTimeKeys: Comparator<OwnerTimeKey> = (a, b) =>
    compareStrings(a[0], b[0]) || a[1] - b[1] || a[2] - b[2];
