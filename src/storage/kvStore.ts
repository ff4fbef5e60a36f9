/**
 * Ordered Key-Value Store
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * In-memory storage for one market. Every map, item and sequence created from
 * a KvStore shares its Journal; writes made inside `journal.run()` are undone
 * in reverse order when the callback throws, so a message either commits in
 * full or leaves no trace.
 *
 * Nested runs act as savepoints: a failing inner run rolls back only its own
 * writes and rethrows, the outer run may catch and continue.
 *
 * Stored values are treated as immutable. Callers replace a value with a new
 * object instead of editing it in place, otherwise rollback cannot restore it.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { PerpError } from '../utils/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// JOURNAL
// ═══════════════════════════════════════════════════════════════════════════════

export class Journal {
    private undoLog: Array<() => void> | null = null;

    get active(): boolean {
        return this.undoLog !== null;
    }

    record(undo: () => void): void {
        if (this.undoLog !== null) {
            this.undoLog.push(undo);
        }
    }

    run<T>(fn: () => T): T {
        const outermost = this.undoLog === null;
        const log = this.undoLog ?? [];
        this.undoLog = log;
        const mark = log.length;
        try {
            const result = fn();
            if (outermost) this.undoLog = null;
            return result;
        } catch (err) {
            for (let i = log.length - 1; i >= mark; i--) {
                log[i]();
            }
            log.length = mark;
            if (outermost) this.undoLog = null;
            throw err;
        }
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDERED MAP
// ═══════════════════════════════════════════════════════════════════════════════

export type Comparator<K> = (a: K, b: K) => number;

export type Order = 'asc' | 'desc';

export interface Bound<K> {
    key: K;
    inclusive: boolean;
}

export interface RangeOptions<K> {
    min?: Bound<K>;
    max?: Bound<K>;
    order?: Order;
    limit?: number;
}

/**
 * Sorted map with range scans in either direction
 */
export class OrderedMap<K, V> {
    private readonly keys: K[] = [];
    private readonly values: V[] = [];

    constructor(
        private readonly compare: Comparator<K>,
        private readonly journal: Journal
    ) {}

    get size(): number {
        return this.keys.length;
    }

    /** First index whose key is >= key */
    private lowerBound(key: K): number {
        let lo = 0;
        let hi = this.keys.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.compare(this.keys[mid], key) < 0) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }

    /** First index whose key is > key */
    private upperBound(key: K): number {
        let lo = 0;
        let hi = this.keys.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.compare(this.keys[mid], key) <= 0) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }

    private indexOf(key: K): number {
        const i = this.lowerBound(key);
        return i < this.keys.length && this.compare(this.keys[i], key) === 0 ? i : -1;
    }

    has(key: K): boolean {
        return this.indexOf(key) >= 0;
    }

    get(key: K): V | undefined {
        const i = this.indexOf(key);
        return i >= 0 ? this.values[i] : undefined;
    }

    /**
     * Like get, but a missing key is an error
     */
    load(key: K, what: string): V {
        const i = this.indexOf(key);
        if (i < 0) {
            throw new PerpError('storage', 'InvariantViolation', `missing ${what}`);
        }
        return this.values[i];
    }

    set(key: K, value: V): void {
        const i = this.lowerBound(key);
        if (i < this.keys.length && this.compare(this.keys[i], key) === 0) {
            const previous = this.values[i];
            this.values[i] = value;
            this.journal.record(() => this.restore(key, previous));
            return;
        }
        this.keys.splice(i, 0, key);
        this.values.splice(i, 0, value);
        this.journal.record(() => this.remove(key));
    }

    delete(key: K): boolean {
        const i = this.indexOf(key);
        if (i < 0) return false;
        const previous = this.values[i];
        this.keys.splice(i, 1);
        this.values.splice(i, 1);
        this.journal.record(() => this.restore(key, previous));
        return true;
    }

    private restore(key: K, value: V): void {
        const i = this.lowerBound(key);
        if (i < this.keys.length && this.compare(this.keys[i], key) === 0) {
            this.values[i] = value;
        } else {
            this.keys.splice(i, 0, key);
            this.values.splice(i, 0, value);
        }
    }

    private remove(key: K): void {
        const i = this.indexOf(key);
        if (i >= 0) {
            this.keys.splice(i, 1);
            this.values.splice(i, 1);
        }
    }

    range(options: RangeOptions<K> = {}): Array<[K, V]> {
        const { min, max, order = 'asc', limit } = options;
        let start = 0;
        let end = this.keys.length;
        if (min) start = min.inclusive ? this.lowerBound(min.key) : this.upperBound(min.key);
        if (max) end = max.inclusive ? this.upperBound(max.key) : this.lowerBound(max.key);

        const out: Array<[K, V]> = [];
        const cap = limit ?? Number.POSITIVE_INFINITY;
        if (order === 'asc') {
            for (let i = start; i < end && out.length < cap; i++) {
                out.push([this.keys[i], this.values[i]]);
            }
        } else {
            for (let i = end - 1; i >= start && out.length < cap; i--) {
                out.push([this.keys[i], this.values[i]]);
            }
        }
        return out;
    }

    first(options: Omit<RangeOptions<K>, 'limit' | 'order'> = {}): [K, V] | undefined {
        return this.range({ ...options, order: 'asc', limit: 1 })[0];
    }

    last(options: Omit<RangeOptions<K>, 'limit' | 'order'> = {}): [K, V] | undefined {
        return this.range({ ...options, order: 'desc', limit: 1 })[0];
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ITEMS AND SEQUENCES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Single journaled value cell
 */
export class Item<T> {
    constructor(
        private value: T,
        private readonly journal: Journal
    ) {}

    get(): T {
        return this.value;
    }

    set(value: T): void {
        const previous = this.value;
        this.value = value;
        this.journal.record(() => {
            this.value = previous;
        });
    }

    update(fn: (current: T) => T): T {
        const next = fn(this.value);
        this.set(next);
        return next;
    }
}

/**
 * Monotonic id generator. Ids start at 1 and are never reused unless the
 * transaction that allocated them rolls back.
 */
export class Sequence {
    private readonly last: Item<number>;

    constructor(journal: Journal) {
        this.last = new Item(0, journal);
    }

    current(): number {
        return this.last.get();
    }

    next(): number {
        return this.last.update((n) => n + 1);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class KvStore {
    readonly journal = new Journal();

    map<K, V>(compare: Comparator<K>): OrderedMap<K, V> {
        return new OrderedMap<K, V>(compare, this.journal);
    }

    item<T>(initial: T): Item<T> {
        return new Item<T>(initial, this.journal);
    }

    sequence(): Sequence {
        return new Sequence(this.journal);
    }

    transaction<T>(fn: () => T): T {
        return this.journal.run(fn);
    }
}
