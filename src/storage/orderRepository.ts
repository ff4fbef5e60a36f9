import type { KvStore, OrderedMap, Sequence } from './kvStore';
import { compareNumbers, compareOwnerKeys, comparePriceKeys, type OwnerKey, type PriceKey } from './keys';
import { PerpError } from '../utils/errors';
import type { ExecutedLimitOrder, LimitOrder, OrderId } from '../types';

export class OrderRepository {
    readonly orders: OrderedMap<OrderId, LimitOrder>;
    /** Long orders keyed by notional trigger price */
    readonly longTriggers: OrderedMap<PriceKey, true>;
    readonly shortTriggers: OrderedMap<PriceKey, true>;
    /** Notional trigger key per order, for removal */
    readonly triggerKeys: OrderedMap<OrderId, PriceKey>;
    readonly byOwner: OrderedMap<OwnerKey, true>;
    readonly history: OrderedMap<OwnerKey, ExecutedLimitOrder>;
    readonly lastOrderId: Sequence;

    constructor(store: KvStore) {
        this.orders = store.map<OrderId, LimitOrder>(compareNumbers);
        this.longTriggers = store.map<PriceKey, true>(comparePriceKeys);
        this.shortTriggers = store.map<PriceKey, true>(comparePriceKeys);
        this.triggerKeys = store.map<OrderId, PriceKey>(compareNumbers);
        this.byOwner = store.map<OwnerKey, true>(compareOwnerKeys);
        this.history = store.map<OwnerKey, ExecutedLimitOrder>(compareOwnerKeys);
        this.lastOrderId = store.sequence();
    }

    get(id: OrderId): LimitOrder {
        const order = this.orders.get(id);
        if (!order) {
            throw new PerpError('limit-order', 'MissingLimitOrder', `limit order ${id} not found`, { id });
        }
        return order;
    }
}
