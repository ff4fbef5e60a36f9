import type { Item, KvStore, OrderedMap, Sequence } from './kvStore';
import { compareNumbers, compareStrings } from './keys';
import { ZERO } from '../utils/math';
import type { Address, LiquidityStats, LiquidityStatsByAddr, ResetLpStatus, YieldPerToken } from '../types';

export const emptyLiquidityStats = (): LiquidityStats => ({
    locked: ZERO,
    unlocked: ZERO,
    totalLp: ZERO,
    totalXlp: ZERO,
});

export class LiquidityRepository {
    readonly stats: Item<LiquidityStats>;
    readonly byAddr: OrderedMap<Address, LiquidityStatsByAddr>;
    /** Prefix sums of yield per token, index 0 is all zeros */
    readonly yieldPerToken: OrderedMap<number, YieldPerToken>;
    readonly yieldIndex: Sequence;
    readonly resetStatus: Item<ResetLpStatus | null>;

    constructor(store: KvStore) {
        this.stats = store.item(emptyLiquidityStats());
        this.byAddr = store.map<Address, LiquidityStatsByAddr>(compareStrings);
        this.yieldPerToken = store.map<number, YieldPerToken>(compareNumbers);
        this.yieldPerToken.set(0, { lp: ZERO, xlp: ZERO });
        this.yieldIndex = store.sequence();
        this.resetStatus = store.item<ResetLpStatus | null>(null);
    }

    latestYieldIndex(): number {
        return this.yieldIndex.current();
    }
}
