/**
 * Typed engine errors.
 *
 * Every failure is a (domain, id) pair with a human description and an
 * optional structured payload. The message is formatted `[DOMAIN] description`
 * so log lines read the same way as the rest of the engine.
 */

export type ErrorDomain =
    | 'market'
    | 'spot-price'
    | 'liquidity'
    | 'position'
    | 'limit-order'
    | 'crank'
    | 'config'
    | 'storage';

export type ErrorId =
    | 'PriceNotFound'
    | 'PriceAlreadyExists'
    | 'PriceConflict'
    | 'MissingPosition'
    | 'MissingLimitOrder'
    | 'InsufficientMargin'
    | 'TraderLeverageOutOfRange'
    | 'CounterLeverageOutOfRange'
    | 'InvalidInfiniteMaxGains'
    | 'MaxGainsTooLarge'
    | 'MinimumDeposit'
    | 'DirectionToBaseFlipped'
    | 'PositionUpdate'
    | 'DeltaNeutralityFeeAlreadyLong'
    | 'DeltaNeutralityFeeAlreadyShort'
    | 'DeltaNeutralityFeeNewlyLong'
    | 'DeltaNeutralityFeeNewlyShort'
    | 'DeltaNeutralityFeeLongToShort'
    | 'DeltaNeutralityFeeShortToLong'
    | 'Cw20Funds'
    | 'NativeFunds'
    | 'Conversion'
    | 'Exceeded'
    | 'SlippageAssert'
    | 'Auth'
    | 'NoYieldToClaim'
    | 'InsufficientForReinvest'
    | 'WithdrawTooMuch'
    | 'InsufficientLiquidityForWithdrawal'
    | 'InsufficientLiquidityForUnlock'
    | 'Liquidity'
    | 'LiquidityCooldown'
    | 'MaxLiquidity'
    | 'PendingLiquidityReset'
    | 'NotUnstaking'
    | 'Stale'
    | 'Config'
    | 'InvariantViolation';

/**
 * Serializable form of an error, returned to callers of the market
 */
export interface ErrorPayload {
    domain: ErrorDomain;
    id: ErrorId;
    description: string;
    data?: Record<string, unknown>;
}

const DOMAIN_LABEL: Record<ErrorDomain, string> = {
    market: 'MARKET',
    'spot-price': 'PRICE',
    liquidity: 'LIQUIDITY',
    position: 'POSITION',
    'limit-order': 'ORDERS',
    crank: 'CRANK',
    config: 'CONFIG',
    storage: 'STORAGE',
};

export class PerpError extends Error {
    readonly domain: ErrorDomain;
    readonly id: ErrorId;
    readonly description: string;
    readonly data?: Record<string, unknown>;

    constructor(domain: ErrorDomain, id: ErrorId, description: string, data?: Record<string, unknown>) {
        super(`[${DOMAIN_LABEL[domain]}] ${description}`);
        this.name = 'PerpError';
        this.domain = domain;
        this.id = id;
        this.description = description;
        this.data = data;
    }

    toPayload(): ErrorPayload {
        const payload: ErrorPayload = {
            domain: this.domain,
            id: this.id,
            description: this.description,
        };
        if (this.data !== undefined) {
            payload.data = this.data;
        }
        return payload;
    }

    static conversion(description: string): PerpError {
        return new PerpError('market', 'Conversion', description);
    }

    static exceeded(description: string): PerpError {
        return new PerpError('market', 'Exceeded', description);
    }

    static invariant(description: string, data?: Record<string, unknown>): PerpError {
        return new PerpError('market', 'InvariantViolation', description, data);
    }
}

export const isPerpError = (err: unknown): err is PerpError => err instanceof PerpError;

/**
 * Runtime invariant check, active in every build
 */
export function invariant(condition: boolean, description: string, data?: Record<string, unknown>): asserts condition {
    if (!condition) {
        throw PerpError.invariant(description, data);
    }
}
