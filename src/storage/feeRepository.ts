import type { Item, KvStore } from './kvStore';
import { DataSeries } from '../engine/dataSeries';
import { ZERO } from '../utils/math';
import type BigNumber from 'bignumber.js';
import type { AllFees, OpenInterest } from '../types';

/**
 * Protocol-level balances and the rate series that drive fee accrual
 */
export class FeeRepository {
    readonly fees: Item<AllFees>;
    readonly deltaNeutralityFund: Item<BigNumber>;
    /** Signed: positive when traders paid more funding than they received */
    readonly totalNetFundingPaid: Item<BigNumber>;
    /** Sum of the funding margin of open positions */
    readonly totalFundingMargin: Item<BigNumber>;
    readonly openInterest: Item<OpenInterest>;
    readonly borrowLp: DataSeries;
    readonly borrowXlp: DataSeries;
    readonly fundingLong: DataSeries;
    readonly fundingShort: DataSeries;

    constructor(store: KvStore) {
        this.fees = store.item<AllFees>({ wallets: ZERO, protocol: ZERO, crank: ZERO });
        this.deltaNeutralityFund = store.item(ZERO);
        this.totalNetFundingPaid = store.item(ZERO);
        this.totalFundingMargin = store.item(ZERO);
        this.openInterest = store.item<OpenInterest>({ long: ZERO, short: ZERO });
        this.borrowLp = new DataSeries(store, 'borrow-fee-lp');
        this.borrowXlp = new DataSeries(store, 'borrow-fee-xlp');
        this.fundingLong = new DataSeries(store, 'funding-long');
        this.fundingShort = new DataSeries(store, 'funding-short');
    }
}
