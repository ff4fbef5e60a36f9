import type { Item, KvStore, OrderedMap, Sequence } from './kvStore';
import {
    compareNumberPairs,
    compareNumbers,
    compareOwnerKeys,
    compareOwnerTimeKeys,
    comparePriceKeys,
    type NumberPair,
    type OwnerKey,
    type OwnerTimeKey,
    type PriceKey,
} from './keys';
import { PerpError } from '../utils/errors';
import type { ClosedPosition, LiquidationReason, Position, PositionId, Timestamp } from '../types';

/**
 * Trigger keys a position currently occupies, so they can be removed
 * without recomputing the prices that produced them
 */
export interface PositionTriggers {
    desc: PriceKey[];
    asc: PriceKey[];
}

export class PositionRepository {
    readonly open: OrderedMap<PositionId, Position>;
    readonly byOwner: OrderedMap<OwnerKey, true>;
    /** (nextLiquifunding, id) */
    readonly nextLiquifunding: OrderedMap<NumberPair, true>;
    /** Triggers hit when the price is at or below the key, scanned from the highest */
    readonly triggersDesc: OrderedMap<PriceKey, LiquidationReason>;
    /** Triggers hit when the price is at or above the key, scanned from the lowest */
    readonly triggersAsc: OrderedMap<PriceKey, LiquidationReason>;
    readonly triggersByPosition: OrderedMap<PositionId, PositionTriggers>;
    /** (updatedAt, id) of positions whose trigger prices wait for the crank to catch up */
    readonly pendingLiquidation: OrderedMap<NumberPair, true>;
    readonly pendingByPosition: OrderedMap<PositionId, Timestamp>;
    readonly closed: OrderedMap<PositionId, ClosedPosition>;
    readonly closedByOwner: OrderedMap<OwnerTimeKey, true>;
    readonly lastPositionId: Sequence;
    readonly closeAllFlag: Item<boolean>;

    constructor(store: KvStore) {
        this.open = store.map<PositionId, Position>(compareNumbers);
        this.byOwner = store.map<OwnerKey, true>(compareOwnerKeys);
        this.nextLiquifunding = store.map<NumberPair, true>(compareNumberPairs);
        this.triggersDesc = store.map<PriceKey, LiquidationReason>(comparePriceKeys);
        this.triggersAsc = store.map<PriceKey, LiquidationReason>(comparePriceKeys);
        this.triggersByPosition = store.map<PositionId, PositionTriggers>(compareNumbers);
        this.pendingLiquidation = store.map<NumberPair, true>(compareNumberPairs);
        this.pendingByPosition = store.map<PositionId, Timestamp>(compareNumbers);
        this.closed = store.map<PositionId, ClosedPosition>(compareNumbers);
        this.closedByOwner = store.map<OwnerTimeKey, true>(compareOwnerTimeKeys);
        this.lastPositionId = store.sequence();
        this.closeAllFlag = store.item(false);
    }

    get(id: PositionId): Position {
        const pos = this.open.get(id);
        if (!pos) {
            throw new PerpError('position', 'MissingPosition', `position ${id} not found`, { id });
        }
        return pos;
    }

    /**
     * Write an open position together with its owner and schedule indexes
     */
    insert(pos: Position): void {
        this.open.set(pos.id, pos);
        this.byOwner.set([pos.owner, pos.id], true);
        this.nextLiquifunding.set([pos.nextLiquifunding, pos.id], true);
    }

    /**
     * Replace a stored position, moving its schedule entry when it changed
     */
    replace(pos: Position): void {
        const previous = this.get(pos.id);
        if (previous.nextLiquifunding !== pos.nextLiquifunding) {
            this.nextLiquifunding.delete([previous.nextLiquifunding, pos.id]);
            this.nextLiquifunding.set([pos.nextLiquifunding, pos.id], true);
        }
        this.open.set(pos.id, pos);
    }

    remove(pos: Position): void {
        const stored = this.get(pos.id);
        this.open.delete(pos.id);
        this.byOwner.delete([stored.owner, stored.id]);
        this.nextLiquifunding.delete([stored.nextLiquifunding, stored.id]);
    }

    saveClosed(closed: ClosedPosition): void {
        this.closed.set(closed.id, closed);
        this.closedByOwner.set([closed.owner, closed.closeTime, closed.id], true);
    }
}
