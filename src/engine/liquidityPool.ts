/**
 * Liquidity Pool
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Pooled collateral backing the counter side of every position.
 *
 * SHARES:
 *   lpToCollateral(x) = (locked + unlocked) × x / (totalLp + totalXlp)
 *   collateralToLp(c) = c                                  when the pool is empty
 *                     = (totalLp + totalXlp) × c / (locked + unlocked) otherwise
 *
 * YIELD:
 *   New yield is recorded as a per-token prefix sum. A provider's accrued yield
 *   is (latest − lastAccrued) × holdings, where unstaking xLP counts as LP.
 *
 * RESET:
 *   If pool collateral reaches zero while shares remain outstanding, the totals
 *   are zeroed immediately and the crank zeroes every provider one by one.
 *   Liquidity-touching messages are refused until that finishes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import type BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PerpError } from '../utils/errors';
import { Decimal, ZERO, approxEq, div, maxDec, mul, subUnsigned } from '../utils/math';
import { MS_PER_SECOND } from '../config/constants';
import { emptyLiquidityStats } from '../storage/liquidityRepository';
import type { Address, LiquidityStats, LiquidityStatsByAddr, PricePoint, UnstakingXlp } from '../types';
import type { MessageContext } from './context';
import { collateralToUsd, notionalToCollateral, spotPrice } from './priceHistory';

export const LIQUIDITY_CONFIG = {
    logPrefix: '[LIQUIDITY]',
};

// ═══════════════════════════════════════════════════════════════════════════════
// SHARE MATH
// ═══════════════════════════════════════════════════════════════════════════════

export const totalCollateral = (stats: LiquidityStats): BigNumber => stats.locked.plus(stats.unlocked);

export const totalTokens = (stats: LiquidityStats): BigNumber => stats.totalLp.plus(stats.totalXlp);

/**
 * Collateral backing `lp` shares. May round to zero for tiny inputs.
 */
export function lpToCollateral(stats: LiquidityStats, lp: BigNumber): BigNumber {
    if (lp.isZero()) return ZERO;
    const collateral = totalCollateral(stats);
    if (approxEq(collateral, ZERO, 0)) {
        throw new PerpError('liquidity', 'Liquidity', 'no liquidity is in the pool');
    }
    return div(collateral.times(lp), totalTokens(stats));
}

/**
 * Shares minted for a deposit of `amount`, 1:1 into an empty pool
 */
export function collateralToLp(stats: LiquidityStats, amount: BigNumber): BigNumber {
    const collateral = totalCollateral(stats);
    const shares = collateral.isZero() ? amount : div(totalTokens(stats).times(amount), collateral);
    if (shares.lte(0)) {
        throw new PerpError('liquidity', 'Liquidity', `deposit of ${amount.toFixed()} mints no shares`);
    }
    return shares;
}

/**
 * Collateral that must stay unlocked so a carry-leverage trade can still
 * rebalance the current net notional
 */
export function minUnlockedLiquidity(ctx: MessageContext, netNotional: BigNumber, price: PricePoint): BigNumber {
    return div(notionalToCollateral(price, netNotional.abs()), ctx.config.carryLeverage);
}

export function netNotional(ctx: MessageContext): BigNumber {
    const oi = ctx.repos.fees.openInterest.get();
    return oi.long.minus(oi.short);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROTOCOL STATS
// ═══════════════════════════════════════════════════════════════════════════════

export function loadLiquidityStats(ctx: MessageContext): LiquidityStats {
    return ctx.repos.liquidity.stats.get();
}

/**
 * Persist pool totals. A pool with outstanding shares but no collateral
 * is zeroed and put into reset mode.
 */
export function saveLiquidityStats(ctx: MessageContext, stats: LiquidityStats): void {
    const { liquidity } = ctx.repos;
    if (totalCollateral(stats).isZero() && !totalTokens(stats).isZero()) {
        liquidity.stats.set(emptyLiquidityStats());
        liquidity.resetStatus.set({ kind: 'begin' });
        logger.warn(`${LIQUIDITY_CONFIG.logPrefix} RESET pool drained with shares outstanding, provider reset started`);
        ctx.emit({ type: 'liquidity-stats', stats: emptyLiquidityStats() });
        return;
    }
    liquidity.stats.set(stats);
    ctx.emit({ type: 'liquidity-stats', stats });
}

export function isResettingLps(ctx: MessageContext): boolean {
    return ctx.repos.liquidity.resetStatus.get() !== null;
}

export function ensureNotResettingLps(ctx: MessageContext): void {
    if (isResettingLps(ctx)) {
        throw new PerpError(
            'liquidity',
            'PendingLiquidityReset',
            'protocol temporarily halted while LP balances are reset, please try again'
        );
    }
}

/**
 * Move collateral from unlocked to locked as counter collateral.
 *
 * @param netNotionalAfter - net open interest once the position change applies
 */
export function lockLiquidity(ctx: MessageContext, amount: BigNumber, netNotionalAfter: BigNumber, price: PricePoint): void {
    if (amount.isZero()) return;
    const stats = loadLiquidityStats(ctx);
    const minUnlocked = minUnlockedLiquidity(ctx, netNotionalAfter, price);
    if (minUnlocked.plus(amount).gt(stats.unlocked)) {
        throw new PerpError('liquidity', 'Liquidity', `insufficient unlocked liquidity to lock ${amount.toFixed()}`, {
            requested: amount.toFixed(),
            totalUnlocked: stats.unlocked.toFixed(),
            allowed: maxDec(stats.unlocked.minus(minUnlocked), ZERO).toFixed(),
        });
    }
    saveLiquidityStats(ctx, {
        ...stats,
        locked: stats.locked.plus(amount),
        unlocked: stats.unlocked.minus(amount),
    });
}

export function unlockLiquidity(ctx: MessageContext, amount: BigNumber): void {
    if (amount.isZero()) return;
    const stats = loadLiquidityStats(ctx);
    if (amount.gt(stats.locked)) {
        throw new PerpError(
            'liquidity',
            'InsufficientLiquidityForUnlock',
            `cannot unlock ${amount.toFixed()}, only ${stats.locked.toFixed()} locked`,
            { requested: amount.toFixed(), totalLocked: stats.locked.toFixed() }
        );
    }
    saveLiquidityStats(ctx, {
        ...stats,
        locked: stats.locked.minus(amount),
        unlocked: stats.unlocked.plus(amount),
    });
}

/**
 * Change locked collateral without touching unlocked: the pool won or lost
 * against a trader
 */
export function updateLockedLiquidity(ctx: MessageContext, delta: BigNumber): void {
    if (delta.isZero()) return;
    const stats = loadLiquidityStats(ctx);
    const locked = stats.locked.plus(delta);
    if (locked.isNegative()) {
        throw PerpError.exceeded(`locked liquidity ${stats.locked.toFixed()} cannot absorb ${delta.toFixed()}`);
    }
    saveLiquidityStats(ctx, { ...stats, locked });
}

// ═══════════════════════════════════════════════════════════════════════════════
// PER-ADDRESS STATS
// ═══════════════════════════════════════════════════════════════════════════════

export function emptyAddrStats(ctx: MessageContext): LiquidityStatsByAddr {
    return {
        lp: ZERO,
        xlp: ZERO,
        lastAccrueKey: ctx.repos.liquidity.latestYieldIndex(),
        lpAccruedYield: ZERO,
        xlpAccruedYield: ZERO,
        crankRewards: ZERO,
    };
}

const isEmptyAddrStats = (s: LiquidityStatsByAddr): boolean =>
    s.lp.isZero() &&
    s.xlp.isZero() &&
    s.lpAccruedYield.isZero() &&
    s.xlpAccruedYield.isZero() &&
    s.crankRewards.isZero() &&
    s.unstaking === undefined &&
    s.cooldownEnds === undefined;

export function loadAddrStats(ctx: MessageContext, addr: Address): LiquidityStatsByAddr {
    return ctx.repos.liquidity.byAddr.get(addr) ?? emptyAddrStats(ctx);
}

export function saveAddrStats(ctx: MessageContext, addr: Address, stats: LiquidityStatsByAddr): void {
    if (isEmptyAddrStats(stats)) {
        ctx.repos.liquidity.byAddr.delete(addr);
    } else {
        ctx.repos.liquidity.byAddr.set(addr, stats);
    }
}

export const totalYield = (s: LiquidityStatsByAddr): BigNumber =>
    s.lpAccruedYield.plus(s.xlpAccruedYield).plus(s.crankRewards);

const unstakingRemaining = (s: LiquidityStatsByAddr): BigNumber =>
    s.unstaking ? s.unstaking.xlpAmount.minus(s.unstaking.collected) : ZERO;

/**
 * Yield accrued since the provider's last accrual, without saving
 */
export function pendingYield(ctx: MessageContext, s: LiquidityStatsByAddr): { lp: BigNumber; xlp: BigNumber; index: number } {
    const { liquidity } = ctx.repos;
    const index = liquidity.latestYieldIndex();
    if (index === s.lastAccrueKey) {
        return { lp: ZERO, xlp: ZERO, index };
    }
    const start = liquidity.yieldPerToken.load(s.lastAccrueKey, `yield per token at ${s.lastAccrueKey}`);
    const end = liquidity.yieldPerToken.load(index, `yield per token at ${index}`);
    const lpHeld = s.lp.plus(unstakingRemaining(s));
    return {
        lp: mul(end.lp.minus(start.lp), lpHeld),
        xlp: mul(end.xlp.minus(start.xlp), s.xlp),
        index,
    };
}

function accrueYield(ctx: MessageContext, s: LiquidityStatsByAddr): LiquidityStatsByAddr {
    const pending = pendingYield(ctx, s);
    if (pending.index === s.lastAccrueKey) return s;
    return {
        ...s,
        lastAccrueKey: pending.index,
        lpAccruedYield: s.lpAccruedYield.plus(pending.lp),
        xlpAccruedYield: s.xlpAccruedYield.plus(pending.xlp),
    };
}

/**
 * LP released so far by an unstaking process
 */
export function unstakedLp(unstaking: UnstakingXlp, now: number): BigNumber {
    const elapsed = now - unstaking.unstakeStarted;
    const remaining = unstaking.xlpAmount.minus(unstaking.collected);
    if (elapsed >= unstaking.unstakeDurationMs) {
        return remaining;
    }
    const ratio = div(new Decimal(now - unstaking.lastCollected), new Decimal(unstaking.unstakeDurationMs));
    const amount = mul(ratio, unstaking.xlpAmount);
    return amount.gt(remaining) ? remaining : amount;
}

function collectUnstaked(ctx: MessageContext, s: LiquidityStatsByAddr): { stats: LiquidityStatsByAddr; collected: BigNumber } {
    if (!s.unstaking) return { stats: s, collected: ZERO };
    const amount = unstakedLp(s.unstaking, ctx.now);
    if (amount.isZero()) return { stats: s, collected: ZERO };
    const collected = s.unstaking.collected.plus(amount);
    if (collected.gt(s.unstaking.xlpAmount)) {
        throw PerpError.invariant(`collected ${collected.toFixed()} exceeds unstaked ${s.unstaking.xlpAmount.toFixed()}`);
    }
    const unstaking: UnstakingXlp | undefined = collected.eq(s.unstaking.xlpAmount)
        ? undefined
        : { ...s.unstaking, collected, lastCollected: ctx.now };
    return { stats: { ...s, lp: s.lp.plus(amount), unstaking }, collected: amount };
}

/**
 * Accrue yield and collect unstaked LP so the provider has nothing pending
 */
export function lpBookkeeping(ctx: MessageContext, addr: Address): LiquidityStatsByAddr {
    const accrued = accrueYield(ctx, loadAddrStats(ctx, addr));
    const { stats, collected } = collectUnstaked(ctx, accrued);
    saveAddrStats(ctx, addr, stats);
    if (!collected.isZero()) {
        ctx.emit({ type: 'unstaked-lp-collected', addr, amount: collected });
    }
    return stats;
}

// ═══════════════════════════════════════════════════════════════════════════════
// YIELD
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Distribute new yield to LP and xLP holders. Yield with nobody to receive
 * it goes to the protocol.
 */
export function processNewYield(ctx: MessageContext, lpAmount: BigNumber, xlpAmount: BigNumber): void {
    const { liquidity, fees } = ctx.repos;
    const stats = loadLiquidityStats(ctx);
    let lp = lpAmount;
    let xlp = xlpAmount;
    let orphaned = ZERO;
    if (stats.totalLp.isZero() && !lp.isZero()) {
        if (stats.totalXlp.isZero()) orphaned = orphaned.plus(lp);
        else xlp = xlp.plus(lp);
        lp = ZERO;
    }
    if (stats.totalXlp.isZero() && !xlp.isZero()) {
        if (stats.totalLp.isZero()) orphaned = orphaned.plus(xlp);
        else lp = lp.plus(xlp);
        xlp = ZERO;
    }

    const latestIndex = liquidity.latestYieldIndex();
    const latest = liquidity.yieldPerToken.load(latestIndex, 'latest yield per token');
    const next = {
        lp: stats.totalLp.isZero() ? latest.lp : latest.lp.plus(div(lp, stats.totalLp)),
        xlp: stats.totalXlp.isZero() ? latest.xlp : latest.xlp.plus(div(xlp, stats.totalXlp)),
    };
    liquidity.yieldPerToken.set(liquidity.yieldIndex.next(), next);

    fees.fees.update((f) => ({
        ...f,
        wallets: f.wallets.plus(lp).plus(xlp),
        protocol: f.protocol.plus(orphaned),
    }));
}

export function addCrankRewards(ctx: MessageContext, addr: Address, amount: BigNumber): void {
    if (amount.isZero()) return;
    const stats = loadAddrStats(ctx, addr);
    saveAddrStats(ctx, addr, { ...stats, crankRewards: stats.crankRewards.plus(amount) });
}

/**
 * Zero out all yield for `addr` and release it from the wallets balance.
 * Returns the amount claimed.
 */
function takeYield(ctx: MessageContext, addr: Address): BigNumber {
    const stats = lpBookkeeping(ctx, addr);
    const amount = totalYield(stats);
    if (amount.isZero()) {
        throw new PerpError('liquidity', 'NoYieldToClaim', `no yield to claim for ${addr}`);
    }
    saveAddrStats(ctx, addr, { ...stats, lpAccruedYield: ZERO, xlpAccruedYield: ZERO, crankRewards: ZERO });
    ctx.repos.fees.fees.update((f) => ({ ...f, wallets: subUnsigned(f.wallets, amount, 'wallet fees') }));
    return amount;
}

export function claimYield(ctx: MessageContext, addr: Address): BigNumber {
    ensureNotResettingLps(ctx);
    const amount = takeYield(ctx, addr);
    ctx.transfer(addr, amount);
    ctx.emit({ type: 'yield-claim', addr, amount });
    logger.info(`${LIQUIDITY_CONFIG.logPrefix} claim addr=${addr} amount=${amount.toFixed()}`);
    return amount;
}

export function reinvestYield(ctx: MessageContext, addr: Address, amount: BigNumber | undefined, stakeToXlp: boolean): BigNumber {
    ensureNotResettingLps(ctx);
    const available = takeYield(ctx, addr);
    let reinvest = available;
    if (amount !== undefined) {
        if (amount.gt(available)) {
            throw new PerpError(
                'liquidity',
                'InsufficientForReinvest',
                `requested to reinvest ${amount.toFixed()}, but only have ${available.toFixed()}`,
                { requestedToReinvest: amount.toFixed(), availableYield: available.toFixed() }
            );
        }
        ctx.transfer(addr, available.minus(amount));
        reinvest = amount;
    }
    const shares = depositInner(ctx, addr, reinvest, false);
    if (stakeToXlp) stakeLpInner(ctx, addr, shares);
    ctx.emit({ type: 'yield-reinvest', addr, amount: reinvest, stakedToXlp: stakeToXlp });
    return shares;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEPOSIT / WITHDRAW
// ═══════════════════════════════════════════════════════════════════════════════

function ensureMaxLiquidity(ctx: MessageContext, stats: LiquidityStats, amount: BigNumber): void {
    const max = ctx.config.maxLiquidity;
    if (max.kind === 'unlimited') return;
    const price = spotPrice(ctx);
    const current = collateralToUsd(price, totalCollateral(stats));
    const deposit = collateralToUsd(price, amount);
    if (current.plus(deposit).gt(max.amount)) {
        throw new PerpError('liquidity', 'MaxLiquidity', `deposit would exceed max liquidity of ${max.amount.toFixed()} USD`, {
            current: current.toFixed(),
            deposit: deposit.toFixed(),
            max: max.amount.toFixed(),
        });
    }
}

function depositInner(ctx: MessageContext, addr: Address, amount: BigNumber, startCooldown: boolean): BigNumber {
    if (amount.lte(0)) {
        throw new PerpError('liquidity', 'Liquidity', 'deposit amount must be positive');
    }
    const stats = loadLiquidityStats(ctx);
    ensureMaxLiquidity(ctx, stats, amount);
    const addrStats = lpBookkeeping(ctx, addr);

    const shares = collateralToLp(stats, amount);
    saveLiquidityStats(ctx, {
        ...stats,
        totalLp: stats.totalLp.plus(shares),
        unlocked: stats.unlocked.plus(amount),
    });
    saveAddrStats(ctx, addr, {
        ...addrStats,
        lp: addrStats.lp.plus(shares),
        cooldownEnds: startCooldown
            ? ctx.now + ctx.config.liquidityCooldownSeconds * MS_PER_SECOND
            : addrStats.cooldownEnds,
    });
    return shares;
}

/**
 * Add collateral to the pool, minting LP shares (and staking them if asked)
 */
export function depositLiquidity(ctx: MessageContext, addr: Address, amount: BigNumber, stakeToXlp: boolean): BigNumber {
    ensureNotResettingLps(ctx);
    const shares = depositInner(ctx, addr, amount, !stakeToXlp);
    if (stakeToXlp) stakeLpInner(ctx, addr, shares);
    ctx.emit({ type: 'liquidity-deposit', addr, amount, shares, stakedToXlp: stakeToXlp });
    logger.info(
        `${LIQUIDITY_CONFIG.logPrefix} deposit addr=${addr} amount=${amount.toFixed()} shares=${shares.toFixed()} xlp=${stakeToXlp}`
    );
    return shares;
}

/**
 * Burn LP shares (all of them when `lpAmount` is absent) for collateral
 */
export function withdrawLiquidity(ctx: MessageContext, addr: Address, lpAmount?: BigNumber): BigNumber {
    ensureNotResettingLps(ctx);
    const addrStats = lpBookkeeping(ctx, addr);
    if (addrStats.cooldownEnds !== undefined && addrStats.cooldownEnds > ctx.now) {
        throw new PerpError('liquidity', 'LiquidityCooldown', `liquidity cooldown active until ${addrStats.cooldownEnds}`, {
            endsAt: addrStats.cooldownEnds,
            secondsRemaining: Math.ceil((addrStats.cooldownEnds - ctx.now) / MS_PER_SECOND),
        });
    }
    if (addrStats.lp.isZero()) {
        throw new PerpError('liquidity', 'WithdrawTooMuch', `no LP tokens held by ${addr}`);
    }
    const shares = lpAmount ?? addrStats.lp;
    if (shares.lte(0) || shares.gt(addrStats.lp)) {
        throw new PerpError('liquidity', 'WithdrawTooMuch', `requested ${shares.toFixed()}, available ${addrStats.lp.toFixed()}`, {
            requested: shares.toFixed(),
            available: addrStats.lp.toFixed(),
        });
    }

    const stats = loadLiquidityStats(ctx);
    const collateral = lpToCollateral(stats, shares);
    if (collateral.isZero()) {
        throw new PerpError('liquidity', 'Liquidity', 'withdrawn shares are worth zero collateral');
    }
    const price = spotPrice(ctx);
    const minUnlocked = minUnlockedLiquidity(ctx, netNotional(ctx), price);
    if (collateral.plus(minUnlocked).gt(stats.unlocked)) {
        throw new PerpError(
            'liquidity',
            'InsufficientLiquidityForWithdrawal',
            `cannot withdraw ${collateral.toFixed()}, unlocked ${stats.unlocked.toFixed()} must keep ${minUnlocked.toFixed()}`,
            {
                requestedLp: shares.toFixed(),
                requestedCollateral: collateral.toFixed(),
                unlocked: maxDec(stats.unlocked.minus(minUnlocked), ZERO).toFixed(),
            }
        );
    }

    saveAddrStats(ctx, addr, { ...addrStats, lp: addrStats.lp.minus(shares) });

    let next: LiquidityStats = {
        ...stats,
        totalLp: stats.totalLp.minus(shares),
        unlocked: stats.unlocked.minus(collateral),
    };
    if (totalTokens(next).isZero()) {
        const dust = totalCollateral(next);
        if (!approxEq(dust, ZERO)) {
            throw PerpError.invariant(`no LP tokens left but ${dust.toFixed()} collateral remains`);
        }
        ctx.repos.fees.fees.update((f) => ({ ...f, protocol: f.protocol.plus(dust) }));
        next = emptyLiquidityStats();
    }
    saveLiquidityStats(ctx, next);

    ctx.transfer(addr, collateral);
    ctx.emit({ type: 'liquidity-withdraw', addr, shares, collateral });
    logger.info(`${LIQUIDITY_CONFIG.logPrefix} withdraw addr=${addr} shares=${shares.toFixed()} collateral=${collateral.toFixed()}`);
    return collateral;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STAKING
// ═══════════════════════════════════════════════════════════════════════════════

function stakeLpInner(ctx: MessageContext, addr: Address, amount: BigNumber | undefined): BigNumber {
    const addrStats = lpBookkeeping(ctx, addr);
    if (addrStats.lp.isZero()) {
        throw new PerpError('liquidity', 'Liquidity', 'cannot stake LP, no LP tokens found');
    }
    const stake = amount ?? addrStats.lp;
    if (stake.lte(0) || stake.gt(addrStats.lp)) {
        throw new PerpError('liquidity', 'Liquidity', `unable to stake ${stake.toFixed()}, available LP ${addrStats.lp.toFixed()}`);
    }
    saveAddrStats(ctx, addr, { ...addrStats, lp: addrStats.lp.minus(stake), xlp: addrStats.xlp.plus(stake) });
    const stats = loadLiquidityStats(ctx);
    saveLiquidityStats(ctx, { ...stats, totalLp: stats.totalLp.minus(stake), totalXlp: stats.totalXlp.plus(stake) });
    return stake;
}

export function stakeLp(ctx: MessageContext, addr: Address, amount?: BigNumber): BigNumber {
    ensureNotResettingLps(ctx);
    const staked = stakeLpInner(ctx, addr, amount);
    ctx.emit({ type: 'lp-stake', addr, amount: staked });
    return staked;
}

function stopUnstakingInner(ctx: MessageContext, addr: Address, failIfNotUnstaking: boolean): LiquidityStatsByAddr {
    const addrStats = lpBookkeeping(ctx, addr);
    const unstaking = addrStats.unstaking;
    if (!unstaking) {
        if (failIfNotUnstaking) {
            throw new PerpError('liquidity', 'NotUnstaking', 'cannot stop unstaking, not currently unstaking xLP');
        }
        return addrStats;
    }
    const restore = unstaking.xlpAmount.minus(unstaking.collected);
    const next: LiquidityStatsByAddr = { ...addrStats, unstaking: undefined, xlp: addrStats.xlp.plus(restore) };
    if (!restore.isZero()) {
        const stats = loadLiquidityStats(ctx);
        saveLiquidityStats(ctx, {
            ...stats,
            totalLp: subUnsigned(stats.totalLp, restore, 'total LP'),
            totalXlp: stats.totalXlp.plus(restore),
        });
    }
    saveAddrStats(ctx, addr, next);
    ctx.emit({ type: 'xlp-unstake-stopped', addr, restored: restore });
    return next;
}

export function stopUnstakingXlp(ctx: MessageContext, addr: Address): void {
    ensureNotResettingLps(ctx);
    stopUnstakingInner(ctx, addr, true);
}

/**
 * Begin converting xLP back to LP linearly over the unstake period. Any
 * unstaking already in progress is stopped first.
 */
export function unstakeXlp(ctx: MessageContext, addr: Address, amount?: BigNumber): BigNumber {
    ensureNotResettingLps(ctx);
    const addrStats = stopUnstakingInner(ctx, addr, false);
    if (addrStats.xlp.isZero()) {
        throw new PerpError('liquidity', 'Liquidity', `${addr} does not have any xLP tokens to unstake`);
    }
    const xlpAmount = amount ?? addrStats.xlp;
    if (xlpAmount.lte(0) || xlpAmount.gt(addrStats.xlp)) {
        throw new PerpError(
            'liquidity',
            'Liquidity',
            `insufficient xLP for unstaking: wanted ${xlpAmount.toFixed()}, holding ${addrStats.xlp.toFixed()}`
        );
    }
    const durationMs = ctx.config.unstakePeriodSeconds * MS_PER_SECOND;
    saveAddrStats(ctx, addr, {
        ...addrStats,
        xlp: addrStats.xlp.minus(xlpAmount),
        unstaking: {
            xlpAmount,
            collected: ZERO,
            unstakeStarted: ctx.now,
            unstakeDurationMs: durationMs,
            lastCollected: ctx.now,
        },
    });
    const stats = loadLiquidityStats(ctx);
    saveLiquidityStats(ctx, {
        ...stats,
        totalLp: stats.totalLp.plus(xlpAmount),
        totalXlp: subUnsigned(stats.totalXlp, xlpAmount, 'total xLP'),
    });
    ctx.emit({ type: 'xlp-unstake', addr, amount: xlpAmount, endsAt: ctx.now + durationMs });
    return xlpAmount;
}

export function collectUnstakedLp(ctx: MessageContext, addr: Address): void {
    ensureNotResettingLps(ctx);
    lpBookkeeping(ctx, addr);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESET
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Zero the next provider after the reset cursor. Clears the reset status once
 * every provider has been visited.
 */
export function resetNextLpBalance(ctx: MessageContext): void {
    const { liquidity } = ctx.repos;
    const status = liquidity.resetStatus.get();
    if (status === null) {
        throw PerpError.invariant('LP reset requested but no reset is in progress');
    }
    const next = status.kind === 'begin'
        ? liquidity.byAddr.first()
        : liquidity.byAddr.first({ min: { key: status.addr, inclusive: false } });
    if (!next) {
        liquidity.resetStatus.set(null);
        ctx.emit({ type: 'lp-reset', addr: null });
        logger.info(`${LIQUIDITY_CONFIG.logPrefix} RESET complete`);
        return;
    }
    const [addr, stats] = next;
    const accrued = accrueYield(ctx, stats);
    saveAddrStats(ctx, addr, {
        ...accrued,
        lp: ZERO,
        xlp: ZERO,
        lastAccrueKey: liquidity.latestYieldIndex(),
        unstaking: undefined,
        cooldownEnds: undefined,
    });
    liquidity.resetStatus.set({ kind: 'last-saw', addr });
    ctx.emit({ type: 'lp-reset', addr });
    logger.info(`${LIQUIDITY_CONFIG.logPrefix} RESET provider=${addr}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export interface LpInfo {
    lpAmount: BigNumber;
    lpCollateral: BigNumber;
    xlpAmount: BigNumber;
    xlpCollateral: BigNumber;
    availableYield: BigNumber;
    availableYieldLp: BigNumber;
    availableYieldXlp: BigNumber;
    availableCrankRewards: BigNumber;
    unstaking?: {
        start: number;
        end: number;
        xlpUnstaking: BigNumber;
        collected: BigNumber;
        available: BigNumber;
        pending: BigNumber;
    };
    cooldownEnds?: number;
}

export function lpInfo(ctx: MessageContext, addr: Address): LpInfo {
    const stats = loadLiquidityStats(ctx);
    const addrStats = loadAddrStats(ctx, addr);
    const pending = pendingYield(ctx, addrStats);
    const availableYieldLp = addrStats.lpAccruedYield.plus(pending.lp);
    const availableYieldXlp = addrStats.xlpAccruedYield.plus(pending.xlp);

    let lpAmount = addrStats.lp;
    let xlpAmount = addrStats.xlp;
    let unstaking: LpInfo['unstaking'];
    if (addrStats.unstaking) {
        const u = addrStats.unstaking;
        const available = unstakedLp(u, ctx.now);
        lpAmount = lpAmount.plus(available);
        xlpAmount = xlpAmount.plus(u.xlpAmount).minus(u.collected).minus(available);
        unstaking = {
            start: u.unstakeStarted,
            end: u.unstakeStarted + u.unstakeDurationMs,
            xlpUnstaking: u.xlpAmount,
            collected: u.collected,
            available,
            pending: u.xlpAmount.minus(available).minus(u.collected),
        };
    }
    if (totalCollateral(stats).isZero()) {
        lpAmount = ZERO;
        xlpAmount = ZERO;
        unstaking = undefined;
    }

    return {
        lpAmount,
        lpCollateral: lpToCollateral(stats, lpAmount),
        xlpAmount,
        xlpCollateral: lpToCollateral(stats, xlpAmount),
        availableYield: availableYieldLp.plus(availableYieldXlp).plus(addrStats.crankRewards),
        availableYieldLp,
        availableYieldXlp,
        availableCrankRewards: addrStats.crankRewards,
        unstaking,
        cooldownEnds: addrStats.cooldownEnds !== undefined && addrStats.cooldownEnds > ctx.now ? addrStats.cooldownEnds : undefined,
    };
}
