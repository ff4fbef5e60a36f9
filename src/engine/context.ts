/**
 * Message Context
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Everything one message needs: the envelope (sender, time), configuration,
 * repositories, and the request-scoped cache. Events and outgoing messages
 * collected here are journaled like storage writes, so a rolled-back savepoint
 * also drops what it emitted.
 *
 * A context lives for exactly one call to Market#execute and is discarded
 * afterwards, which also discards the cache.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type { MarketConfig } from '../config/marketConfig';
import type { Journal } from '../storage/kvStore';
import type { Repositories } from '../storage';
import type { Address, MarketId, OutgoingMessage, PricePoint, Timestamp } from '../types';
import { stampEvent, type MarketEvent, type MarketEventBody } from './events';
import type BigNumber from 'bignumber.js';

/**
 * Values memoized for the duration of one message
 */
export interface RequestCache {
    /** Latest price point as of `now`; null when none exists yet */
    spotPrice?: PricePoint | null;
    /** Next price point the crank will process; null when up to date */
    nextCrankPrice?: PricePoint | null;
}

export interface ContextInit {
    sender: Address;
    now: Timestamp;
    config: MarketConfig;
    market: MarketId;
    repos: Repositories;
    journal: Journal;
}

export class MessageContext {
    readonly sender: Address;
    readonly now: Timestamp;
    readonly market: MarketId;
    readonly repos: Repositories;
    readonly journal: Journal;
    readonly events: MarketEvent[] = [];
    readonly messages: OutgoingMessage[] = [];
    cache: RequestCache = {};
    private currentConfig: MarketConfig;

    constructor(init: ContextInit) {
        this.sender = init.sender;
        this.now = init.now;
        this.currentConfig = init.config;
        this.market = init.market;
        this.repos = init.repos;
        this.journal = init.journal;
    }

    get config(): MarketConfig {
        return this.currentConfig;
    }

    set config(config: MarketConfig) {
        const previous = this.currentConfig;
        this.currentConfig = config;
        this.journal.record(() => {
            this.currentConfig = previous;
        });
    }

    emit(body: MarketEventBody): void {
        this.events.push(stampEvent(body));
        this.journal.record(() => {
            this.events.pop();
        });
    }

    transfer(recipient: Address, amount: BigNumber): void {
        if (amount.isZero()) return;
        this.send({ kind: 'token-transfer', recipient, amount });
    }

    send(message: OutgoingMessage): void {
        this.messages.push(message);
        this.journal.record(() => {
            this.messages.pop();
        });
    }

    invalidateCache(): void {
        const previous = this.cache;
        this.cache = {};
        this.journal.record(() => {
            this.cache = previous;
        });
    }
}
