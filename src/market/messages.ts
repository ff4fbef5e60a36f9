/**
 * Market messages.
 *
 * Every state change enters the engine as one ExecuteMsg together with its
 * envelope (sender, time and the funds attached to it).
 */

import type BigNumber from 'bignumber.js';
import { PerpError } from '../utils/errors';
import type { CollateralAsset, MarketConfigUpdate } from '../config/marketConfig';
import type { SlippageAssert } from '../engine/positionLifecycle';
import type { Address, DirectionToBase, MaxGains, OrderId, PositionId, Timestamp } from '../types';

export type Funds =
    | { kind: 'native'; denom: string; amount: BigNumber }
    | { kind: 'cw20'; token: Address; amount: BigNumber };

export interface MessageInfo {
    sender: Address;
    now: Timestamp;
    funds?: Funds;
}

export type ExecuteMsg =
    | {
          type: 'open-position';
          leverage: BigNumber;
          direction: DirectionToBase;
          maxGains: MaxGains;
          slippageAssert?: SlippageAssert;
          stopLossOverride?: BigNumber;
          takeProfitOverride?: BigNumber;
      }
    | { type: 'update-position-add-collateral-impact-leverage'; id: PositionId }
    | { type: 'update-position-add-collateral-impact-size'; id: PositionId; slippageAssert?: SlippageAssert }
    | { type: 'update-position-remove-collateral-impact-leverage'; id: PositionId; amount: BigNumber }
    | { type: 'update-position-remove-collateral-impact-size'; id: PositionId; amount: BigNumber; slippageAssert?: SlippageAssert }
    | { type: 'update-position-leverage'; id: PositionId; leverage: BigNumber; slippageAssert?: SlippageAssert }
    | { type: 'update-position-max-gains'; id: PositionId; maxGains: MaxGains }
    | { type: 'set-trigger-order'; id: PositionId; stopLossOverride?: BigNumber; takeProfitOverride?: BigNumber }
    | { type: 'close-position'; id: PositionId; slippageAssert?: SlippageAssert }
    | { type: 'close-all-positions' }
    | { type: 'deposit-liquidity'; stakeToXlp: boolean }
    | { type: 'reinvest-yield'; stakeToXlp: boolean; amount?: BigNumber }
    | { type: 'withdraw-liquidity'; lpAmount?: BigNumber }
    | { type: 'claim-yield' }
    | { type: 'stake-lp'; amount?: BigNumber }
    | { type: 'unstake-xlp'; amount?: BigNumber }
    | { type: 'stop-unstaking-xlp' }
    | { type: 'collect-unstaked-lp' }
    | {
          type: 'place-limit-order';
          triggerPrice: BigNumber;
          leverage: BigNumber;
          direction: DirectionToBase;
          maxGains: MaxGains;
          stopLossOverride?: BigNumber;
          takeProfitOverride?: BigNumber;
      }
    | { type: 'cancel-limit-order'; orderId: OrderId }
    | { type: 'crank'; execs?: number; rewards?: Address }
    | { type: 'set-manual-price'; priceBase: BigNumber; priceUsd?: BigNumber }
    | { type: 'append-oracle-price' }
    | { type: 'provide-crank-funds' }
    | { type: 'transfer-dao-fees' }
    | { type: 'update-config'; update: MarketConfigUpdate };

export type ExecuteMsgType = ExecuteMsg['type'];

const FUNDED: ReadonlySet<ExecuteMsgType> = new Set<ExecuteMsgType>([
    'open-position',
    'update-position-add-collateral-impact-leverage',
    'update-position-add-collateral-impact-size',
    'deposit-liquidity',
    'place-limit-order',
    'provide-crank-funds',
]);

/** Messages that settle against the latest price, preceded by an oracle append */
const NEEDS_FRESH_PRICE: ReadonlySet<ExecuteMsgType> = new Set<ExecuteMsgType>([
    'open-position',
    'update-position-add-collateral-impact-leverage',
    'update-position-add-collateral-impact-size',
    'update-position-remove-collateral-impact-leverage',
    'update-position-remove-collateral-impact-size',
    'update-position-leverage',
    'update-position-max-gains',
    'close-position',
    'deposit-liquidity',
    'withdraw-liquidity',
    'reinvest-yield',
    'place-limit-order',
    'crank',
]);

export const takesFunds = (type: ExecuteMsgType): boolean => FUNDED.has(type);

export const needsFreshPrice = (type: ExecuteMsgType): boolean => NEEDS_FRESH_PRICE.has(type);

function fundsError(asset: CollateralAsset, description: string): PerpError {
    return new PerpError('market', asset.kind === 'native' ? 'NativeFunds' : 'Cw20Funds', description);
}

/**
 * Amount of collateral attached to a message. Messages that take no funds
 * get zero and must not carry any.
 */
export function receivedCollateral(asset: CollateralAsset, type: ExecuteMsgType, funds?: Funds): BigNumber | undefined {
    if (!takesFunds(type)) {
        if (funds && !funds.amount.isZero()) {
            throw fundsError(asset, `${type} does not accept funds`);
        }
        return undefined;
    }
    if (!funds) {
        throw fundsError(asset, `${type} requires collateral to be attached`);
    }
    const matches = asset.kind === 'native'
        ? funds.kind === 'native' && funds.denom === asset.denom
        : funds.kind === 'cw20' && funds.token === asset.token;
    if (!matches) {
        const expected = asset.kind === 'native' ? asset.denom : asset.token;
        throw fundsError(asset, `expected collateral ${expected}`);
    }
    if (funds.amount.lte(0)) {
        throw fundsError(asset, 'attached collateral must be positive');
    }
    return funds.amount;
}
