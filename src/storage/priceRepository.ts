import type { KvStore, Item, OrderedMap } from './kvStore';
import { compareNumbers } from './keys';
import type { StoredPrice, Timestamp } from '../types';

/**
 * Price points keyed by timestamp, plus the crank watermark: the timestamp
 * of the last price point the crank fully processed.
 */
export class PriceRepository {
    readonly points: OrderedMap<Timestamp, StoredPrice>;
    readonly lastCrankCompleted: Item<Timestamp | null>;

    constructor(store: KvStore) {
        this.points = store.map<Timestamp, StoredPrice>(compareNumbers);
        this.lastCrankCompleted = store.item<Timestamp | null>(null);
    }
}
