/**
 * Market Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Defaults, validation and environment overrides for one market.
 *
 * Every numeric parameter lives here so that risk settings can be reviewed in
 * one place. Overrides come from PERP_* environment variables (a .env file is
 * loaded through dotenv) or from an admin UpdateConfig message.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import dotenv from 'dotenv';
import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError } from '../utils/errors';
import { Decimal, toDecimal } from '../utils/math';
import type { Address, SpotPriceConfig } from '../types';
import { MAX_TRADING_FEE_RATE, MS_PER_SECOND } from './constants';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type MaxLiquidity = { kind: 'unlimited' } | { kind: 'usd'; amount: BigNumber };

/**
 * Asset the market takes as collateral
 */
export type CollateralAsset = { kind: 'native'; denom: string } | { kind: 'cw20'; token: Address };

export interface MarketConfig {
    /** Fee charged on |notional| (in collateral) when opening or growing a position */
    tradingFeeNotionalSize: BigNumber;
    /** Fee charged on counter collateral when opening or growing a position */
    tradingFeeCounterCollateral: BigNumber;
    /** Default number of crank executions per Crank message */
    crankExecs: number;
    maxLeverage: BigNumber;
    /** Leverage the pool is assumed to carry when sizing the unlocked reserve */
    carryLeverage: BigNumber;
    fundingRateMaxAnnualized: BigNumber;
    fundingRateSensitivity: BigNumber;
    borrowFeeRateMinAnnualized: BigNumber;
    borrowFeeRateMaxAnnualized: BigNumber;
    borrowFeeSensitivity: BigNumber;
    targetUtilization: BigNumber;
    liquifundingDelaySeconds: number;
    liquifundingDelayFuzzSeconds: number;
    /** Grace period after the scheduled liquifunding before a position counts as stale */
    stalenessSeconds: number;
    priceUpdateTooOldSeconds: number;
    protocolTax: BigNumber;
    unstakePeriodSeconds: number;
    maxXlpRewardsMultiplier: BigNumber;
    minXlpRewardsMultiplier: BigNumber;
    deltaNeutralityFeeSensitivity: BigNumber;
    deltaNeutralityFeeCap: BigNumber;
    deltaNeutralityFeeTax: BigNumber;
    limitOrderFee: BigNumber;
    crankFeeCharged: BigNumber;
    crankFeeReward: BigNumber;
    minimumDepositUsd: BigNumber;
    maxLiquidity: MaxLiquidity;
    liquidityCooldownSeconds: number;
    spotPrice: SpotPriceConfig;
    collateral: CollateralAsset;
    /** Receiver of protocol fees and the only sender allowed admin messages */
    dao: Address;
}

export type MarketConfigUpdate = Partial<Omit<MarketConfig, 'collateral'>>;

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const CONFIG_LOG_PREFIX = '[CONFIG]';

export const DEFAULT_MARKET_CONFIG: MarketConfig = {
    tradingFeeNotionalSize: new Decimal('0.0005'),
    tradingFeeCounterCollateral: new Decimal('0.0005'),
    crankExecs: 7,
    maxLeverage: new Decimal(30),
    carryLeverage: new Decimal(29),
    fundingRateMaxAnnualized: new Decimal('0.9'),
    fundingRateSensitivity: new Decimal(1),
    borrowFeeRateMinAnnualized: new Decimal('0.01'),
    borrowFeeRateMaxAnnualized: new Decimal('0.60'),
    borrowFeeSensitivity: new Decimal(1).div(3),
    targetUtilization: new Decimal('0.9'),
    liquifundingDelaySeconds: 60 * 60 * 24,
    liquifundingDelayFuzzSeconds: 60 * 60 * 4,
    stalenessSeconds: 60 * 60 * 2,
    priceUpdateTooOldSeconds: 60 * 30,
    protocolTax: new Decimal('0.3'),
    unstakePeriodSeconds: 60 * 60 * 24 * 21,
    maxXlpRewardsMultiplier: new Decimal(2),
    minXlpRewardsMultiplier: new Decimal(1),
    deltaNeutralityFeeSensitivity: new Decimal(50_000_000),
    deltaNeutralityFeeCap: new Decimal('0.01'),
    deltaNeutralityFeeTax: new Decimal('0.25'),
    limitOrderFee: new Decimal(0),
    crankFeeCharged: new Decimal('0.01'),
    crankFeeReward: new Decimal('0.001'),
    minimumDepositUsd: new Decimal(5),
    maxLiquidity: { kind: 'unlimited' },
    liquidityCooldownSeconds: 60 * 60,
    spotPrice: { kind: 'manual', admin: 'admin' },
    collateral: { kind: 'native', denom: 'ucollateral' },
    dao: 'dao',
};

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

const configError = (description: string): PerpError => new PerpError('config', 'Config', description);

/**
 * Reject parameter combinations the engine cannot operate under.
 * Throws a Config error describing the first violation.
 */
export function validateMarketConfig(config: MarketConfig): void {
    const maxFee = new Decimal(MAX_TRADING_FEE_RATE);
    if (config.tradingFeeNotionalSize.gte(maxFee) || config.tradingFeeNotionalSize.isNegative()) {
        throw configError(`tradingFeeNotionalSize must be in [0, ${MAX_TRADING_FEE_RATE})`);
    }
    if (config.tradingFeeCounterCollateral.gte(maxFee) || config.tradingFeeCounterCollateral.isNegative()) {
        throw configError(`tradingFeeCounterCollateral must be in [0, ${MAX_TRADING_FEE_RATE})`);
    }
    if (!Number.isInteger(config.crankExecs) || config.crankExecs <= 0) {
        throw configError('crankExecs must be a positive integer');
    }
    if (config.maxLeverage.lte(1)) {
        throw configError('maxLeverage must be greater than 1');
    }
    if (config.carryLeverage.lte(1)) {
        throw configError('carryLeverage must be greater than 1');
    }
    if (config.carryLeverage.plus(1).gt(config.maxLeverage)) {
        throw configError('carryLeverage + 1 must not exceed maxLeverage');
    }
    if (config.borrowFeeRateMaxAnnualized.lt(config.borrowFeeRateMinAnnualized)) {
        throw configError('borrowFeeRateMaxAnnualized must be at least borrowFeeRateMinAnnualized');
    }
    if (config.borrowFeeRateMinAnnualized.lte(0)) {
        throw configError('borrowFeeRateMinAnnualized must be positive');
    }
    if (config.protocolTax.gte(1) || config.protocolTax.isNegative()) {
        throw configError('protocolTax must be in [0, 1)');
    }
    if (config.unstakePeriodSeconds <= 0) {
        throw configError('unstakePeriodSeconds must be positive');
    }
    if (config.targetUtilization.gte(1) || config.targetUtilization.lte(0)) {
        throw configError('targetUtilization must be in (0, 1)');
    }
    if (config.minXlpRewardsMultiplier.lt(1)) {
        throw configError('minXlpRewardsMultiplier must be at least 1');
    }
    if (config.maxXlpRewardsMultiplier.lt(config.minXlpRewardsMultiplier)) {
        throw configError('maxXlpRewardsMultiplier must be at least minXlpRewardsMultiplier');
    }
    if (config.crankFeeCharged.lt(config.crankFeeReward)) {
        throw configError('crankFeeCharged must cover crankFeeReward');
    }
    if (config.deltaNeutralityFeeTax.gt(1) || config.deltaNeutralityFeeTax.isNegative()) {
        throw configError('deltaNeutralityFeeTax must be in [0, 1]');
    }
    if (config.deltaNeutralityFeeSensitivity.lte(0) || config.deltaNeutralityFeeCap.lte(0)) {
        throw configError('delta neutrality sensitivity and cap must be positive');
    }
    if (config.liquifundingDelayFuzzSeconds >= config.liquifundingDelaySeconds) {
        throw configError('liquifundingDelayFuzzSeconds must be smaller than liquifundingDelaySeconds');
    }
    if (config.maxLiquidity.kind === 'usd' && config.maxLiquidity.amount.lte(0)) {
        throw configError('maxLiquidity must be positive');
    }
}

export function mergeMarketConfig(base: MarketConfig, update: MarketConfigUpdate): MarketConfig {
    const merged: MarketConfig = { ...base, ...update };
    validateMarketConfig(merged);
    return merged;
}

/**
 * Time reserved by the liquidation margin: until the next liquifunding plus
 * the staleness window
 */
export function liquidationMarginDurationMs(config: MarketConfig): number {
    return (config.liquifundingDelaySeconds + config.stalenessSeconds) * MS_PER_SECOND;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

type KeysOfType<T> = { [K in keyof MarketConfig]: MarketConfig[K] extends T ? K : never }[keyof MarketConfig];
type DecimalKey = KeysOfType<BigNumber>;
type IntegerKey = KeysOfType<number>;

const DECIMAL_ENV: Array<[string, DecimalKey]> = [
    ['PERP_TRADING_FEE_NOTIONAL_SIZE', 'tradingFeeNotionalSize'],
    ['PERP_TRADING_FEE_COUNTER_COLLATERAL', 'tradingFeeCounterCollateral'],
    ['PERP_MAX_LEVERAGE', 'maxLeverage'],
    ['PERP_CARRY_LEVERAGE', 'carryLeverage'],
    ['PERP_FUNDING_RATE_MAX_ANNUALIZED', 'fundingRateMaxAnnualized'],
    ['PERP_FUNDING_RATE_SENSITIVITY', 'fundingRateSensitivity'],
    ['PERP_BORROW_FEE_RATE_MIN_ANNUALIZED', 'borrowFeeRateMinAnnualized'],
    ['PERP_BORROW_FEE_RATE_MAX_ANNUALIZED', 'borrowFeeRateMaxAnnualized'],
    ['PERP_BORROW_FEE_SENSITIVITY', 'borrowFeeSensitivity'],
    ['PERP_TARGET_UTILIZATION', 'targetUtilization'],
    ['PERP_PROTOCOL_TAX', 'protocolTax'],
    ['PERP_DELTA_NEUTRALITY_FEE_SENSITIVITY', 'deltaNeutralityFeeSensitivity'],
    ['PERP_DELTA_NEUTRALITY_FEE_CAP', 'deltaNeutralityFeeCap'],
    ['PERP_DELTA_NEUTRALITY_FEE_TAX', 'deltaNeutralityFeeTax'],
    ['PERP_CRANK_FEE_CHARGED', 'crankFeeCharged'],
    ['PERP_CRANK_FEE_REWARD', 'crankFeeReward'],
    ['PERP_MINIMUM_DEPOSIT_USD', 'minimumDepositUsd'],
];

const INTEGER_ENV: Array<[string, IntegerKey]> = [
    ['PERP_CRANK_EXECS', 'crankExecs'],
    ['PERP_LIQUIFUNDING_DELAY_SECONDS', 'liquifundingDelaySeconds'],
    ['PERP_LIQUIFUNDING_DELAY_FUZZ_SECONDS', 'liquifundingDelayFuzzSeconds'],
    ['PERP_STALENESS_SECONDS', 'stalenessSeconds'],
    ['PERP_PRICE_UPDATE_TOO_OLD_SECONDS', 'priceUpdateTooOldSeconds'],
    ['PERP_UNSTAKE_PERIOD_SECONDS', 'unstakePeriodSeconds'],
    ['PERP_LIQUIDITY_COOLDOWN_SECONDS', 'liquidityCooldownSeconds'],
];

function parseInteger(name: string, raw: string): number {
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw configError(`${name} must be an integer, got "${raw}"`);
    }
    return value;
}

function parseDecimal(name: string, raw: string): BigNumber {
    try {
        return toDecimal(raw);
    } catch (err) {
        throw configError(`${name} must be a decimal, got "${raw}": ${err instanceof Error ? err.message : String(err)}`);
    }
}

/**
 * Build a config from defaults plus PERP_* overrides in `env`.
 *
 * @param env - defaults to process.env after loading .env
 */
export function loadMarketConfigFromEnv(env?: Env, base: MarketConfig = DEFAULT_MARKET_CONFIG): MarketConfig {
    let source: Env;
    if (env === undefined) {
        dotenv.config();
        source = process.env;
    } else {
        source = env;
    }

    const config: MarketConfig = { ...base };
    let overridden = 0;
    for (const [name, key] of DECIMAL_ENV) {
        const raw = source[name];
        if (raw !== undefined && raw !== '') {
            config[key] = parseDecimal(name, raw);
            overridden++;
        }
    }
    for (const [name, key] of INTEGER_ENV) {
        const raw = source[name];
        if (raw !== undefined && raw !== '') {
            config[key] = parseInteger(name, raw);
            overridden++;
        }
    }

    const maxLiquidity = source.PERP_MAX_LIQUIDITY_USD;
    if (maxLiquidity !== undefined && maxLiquidity !== '') {
        config.maxLiquidity = { kind: 'usd', amount: parseDecimal('PERP_MAX_LIQUIDITY_USD', maxLiquidity) };
    }
    if (source.PERP_DAO_ADDRESS) {
        config.dao = source.PERP_DAO_ADDRESS;
    }
    if (source.PERP_PRICE_ADMIN) {
        config.spotPrice = { kind: 'manual', admin: source.PERP_PRICE_ADMIN };
    }
    if (source.PERP_COLLATERAL_DENOM) {
        config.collateral = { kind: 'native', denom: source.PERP_COLLATERAL_DENOM };
    } else if (source.PERP_COLLATERAL_CW20) {
        config.collateral = { kind: 'cw20', token: source.PERP_COLLATERAL_CW20 };
    }

    validateMarketConfig(config);

    logger.info(
        `${CONFIG_LOG_PREFIX} loaded market config overrides=${overridden} ` +
        `maxLeverage=${config.maxLeverage.toFixed()} crankExecs=${config.crankExecs}`
    );

    return config;
}
