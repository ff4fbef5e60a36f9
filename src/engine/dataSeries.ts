/**
 * Time series of a rate with running prefix sums, used to integrate funding
 * and borrow rates over arbitrary windows in O(log n).
 *
 * Each entry holds the rate in force from its timestamp onwards and the
 * integral of the rate up to that timestamp (rate × elapsed ms).
 */

import type BigNumber from 'bignumber.js';
import type { KvStore, OrderedMap } from '../storage/kvStore';
import { compareNumbers } from '../storage/keys';
import { PerpError } from '../utils/errors';
import { ZERO } from '../utils/math';
import type { Timestamp } from '../types';

export interface DataSeriesEntry {
    value: BigNumber;
    prefixSum: BigNumber;
}

export class DataSeries {
    private readonly entries: OrderedMap<Timestamp, DataSeriesEntry>;

    constructor(store: KvStore, readonly name: string) {
        this.entries = store.map<Timestamp, DataSeriesEntry>(compareNumbers);
    }

    get isEmpty(): boolean {
        return this.entries.size === 0;
    }

    latest(): [Timestamp, BigNumber] | undefined {
        const last = this.entries.last();
        return last ? [last[0], last[1].value] : undefined;
    }

    latestValue(): BigNumber {
        return this.latest()?.[1] ?? ZERO;
    }

    /**
     * Whether an entry exists at or before `at`
     */
    covers(at: Timestamp): boolean {
        return this.entries.last({ max: { key: at, inclusive: true } }) !== undefined;
    }

    /**
     * Append a value in force from `at`. Appending at the latest timestamp
     * replaces that entry. Appending in the past is an error.
     */
    append(at: Timestamp, value: BigNumber): void {
        const last = this.entries.last();
        if (!last) {
            this.entries.set(at, { value, prefixSum: ZERO });
            return;
        }
        const [lastAt, lastEntry] = last;
        if (at < lastAt) {
            throw PerpError.invariant(`${this.name}: append at ${at} before latest ${lastAt}`);
        }
        if (at === lastAt) {
            this.entries.set(at, { value, prefixSum: lastEntry.prefixSum });
            return;
        }
        const prefixSum = lastEntry.prefixSum.plus(lastEntry.value.times(at - lastAt));
        this.entries.set(at, { value, prefixSum });
    }

    /**
     * Integral of the rate over [start, end), in value × ms
     */
    sum(start: Timestamp, end: Timestamp): BigNumber {
        if (start >= end) return ZERO;
        return this.prefixAt(end, false).minus(this.prefixAt(start, true));
    }

    private prefixAt(at: Timestamp, inclusive: boolean): BigNumber {
        const entry = this.entries.last({ max: { key: at, inclusive } });
        if (!entry) {
            throw PerpError.invariant(`${this.name}: no entry at or before ${at}`, { series: this.name, at });
        }
        const [entryAt, { value, prefixSum }] = entry;
        return prefixSum.plus(value.times(at - entryAt));
    }
}
