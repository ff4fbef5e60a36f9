// Engine-wide constants

export const MS_PER_SECOND = 1000;
export const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const MS_PER_YEAR = 365 * MS_PER_DAY;

export const CRANK_CONSTANTS = {
    // Weight budget per requested exec
    WEIGHT_PER_EXEC: 5,
    // Regular work units (liquifunding, liquidation, orders...)
    WORK_WEIGHT: 5,
    // Marking a price point completed is cheap
    COMPLETED_WEIGHT: 1,
} as const;

export const QUERY_CONSTANTS = {
    DEFAULT_LIMIT: 10,
    MAX_LIMIT: 20,
} as const;

// Deposits may drop up to 10% below the configured minimum from price movement
export const MINIMUM_DEPOSIT_TOLERANCE = '0.9';

// Trading fees at or above this are rejected as misconfiguration
export const MAX_TRADING_FEE_RATE = '0.0999';

export const EVENT_SCHEMA_VERSION = 1;
