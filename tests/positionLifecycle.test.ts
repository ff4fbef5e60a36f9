/**
 * Position Lifecycle Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Opens, updates and closes positions through the market in the standard
 * scenario: price 10, 1000 of liquidity and a 10x long with 100 collateral.
 *
 * Borrowing 100 of counter collateral at the minimum rate of 1% for one
 * second costs 0.000000031709791983, which shows up in every settlement
 * that spans t=1000 to t=2000.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import {
    createStandardMarket,
    d,
    expectError,
    expectOk,
    native,
    openStandardLong,
    openedPosition,
    setPrice,
    sumCounterCollateral,
} from './helpers';
import type { ExecuteMsg, Funds } from '../src/market/messages';

describe('open', () => {
    test('a 10x long locks its max gains as counter collateral', () => {
        const market = createStandardMarket();
        const pos = openStandardLong(market);

        expect(pos.id).toBe(1);
        expect(pos.notionalSize.toFixed()).toBe('100');
        expect(pos.counterCollateral.toFixed()).toBe('100');
        expect(pos.activeCollateral.toFixed()).toBe('100');
        expect(pos.takeProfitPrice?.toFixed()).toBe('11');

        const liquidity = market.liquidityStats();
        expect(liquidity.locked.toFixed()).toBe('100');
        expect(liquidity.unlocked.toFixed()).toBe('900');
    });

    test('liquidation margin covers fees until the next liquifunding', () => {
        const pos = openStandardLong(createStandardMarket());

        expect(pos.liquidationMargin.borrow.toFixed()).toBe('0.3561643835616438');
        expect(pos.liquidationMargin.funding.toFixed()).toBe('2.9383561643835608');
        expect(pos.liquidationMargin.deltaNeutrality.toFixed()).toBe('11');
        expect(pos.liquidationMargin.crank.toFixed()).toBe('0');
        // 10 − (100 − 14.2945205479452046) / 100
        expect(pos.liquidationPrice?.toFixed()).toBe('9.142945205479452046');
    });

    test('a failed open leaves no trace', () => {
        const market = createStandardMarket();
        const error = expectError(
            market.execute(
                { sender: 'trader', now: 1000, funds: native(100) },
                { type: 'open-position', leverage: d(40), direction: 'long', maxGains: d(1) }
            )
        );
        expect(error.id).toBe('TraderLeverageOutOfRange');
        expect(market.liquidityStats().locked.toFixed()).toBe('0');
        expect(openStandardLong(market).id).toBe(1);
    });

    test('opening against an old price is refused', () => {
        const market = createStandardMarket();
        // 30 minutes after the last price plus one millisecond
        const error = expectError(
            market.execute(
                { sender: 'trader', now: 1_801_001, funds: native(100) },
                { type: 'open-position', leverage: d(10), direction: 'long', maxGains: d(1) }
            )
        );
        expect(error.id).toBe('Stale');
    });
});

describe('close', () => {
    test('the owner closes at the latest price', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        setPrice(market, 2000, '10.5');

        const result = expectOk(market.execute({ sender: 'trader', now: 2000 }, { type: 'close-position', id: 1 }));
        if (result.data.kind !== 'closed') throw new Error(`expected a closed position, got ${result.data.kind}`);
        expect(result.data.closed.reason).toEqual({ kind: 'direct' });
        expect(result.data.closed.pnl.collateral.toFixed()).toBe('49.999999968290208017');
        const transfer = result.messages.find((msg) => msg.kind === 'token-transfer');
        expect(transfer?.kind === 'token-transfer' && transfer.amount.toFixed()).toBe('149.999999968290208017');
    });

    test('only the owner may close', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        expect(expectError(market.execute({ sender: 'mallory', now: 1000 }, { type: 'close-position', id: 1 })).id).toBe('Auth');
    });

    test('closed positions are listed newest first', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        openStandardLong(market);
        expectOk(market.execute({ sender: 'trader', now: 1000 }, { type: 'close-position', id: 1 }));
        expectOk(market.execute({ sender: 'trader', now: 1500 }, { type: 'close-position', id: 2 }));

        const page = market.closedPositionHistory('trader');
        expect(page.items.map((closed) => closed.id)).toEqual([2, 1]);
        expect(page.nextStartAfter).toBeUndefined();
    });
});

describe('updates', () => {
    test('adding collateral lowers leverage', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const pos = openedPosition(
            market.execute({ sender: 'trader', now: 1000, funds: native(50) }, { type: 'update-position-add-collateral-impact-leverage', id: 1 })
        );
        expect(pos.activeCollateral.toFixed()).toBe('150');
        expect(pos.notionalSize.toFixed()).toBe('100');
    });

    test('removing collateral pays it out and keeps leverage in range', () => {
        const market = createStandardMarket();
        openStandardLong(market);

        const result = market.execute(
            { sender: 'trader', now: 1000 },
            { type: 'update-position-remove-collateral-impact-leverage', id: 1, amount: d(60) }
        );
        expect(openedPosition(result).activeCollateral.toFixed()).toBe('40');
        const transfer = expectOk(result).messages.find((msg) => msg.kind === 'token-transfer');
        expect(transfer?.kind === 'token-transfer' && transfer.amount.toFixed()).toBe('60');

        // 1000 / 30 is above the maximum of 30x
        const error = expectError(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'update-position-remove-collateral-impact-leverage', id: 1, amount: d(10) })
        );
        expect(error.id).toBe('TraderLeverageOutOfRange');
    });

    test('adding collateral with size scales notional and counter collateral', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const pos = openedPosition(
            market.execute({ sender: 'trader', now: 1000, funds: native(50) }, { type: 'update-position-add-collateral-impact-size', id: 1 })
        );
        expect(pos.activeCollateral.toFixed()).toBe('150');
        expect(pos.counterCollateral.toFixed()).toBe('150');
        expect(pos.notionalSize.toFixed()).toBe('150');
        expect(market.liquidityStats().locked.toFixed()).toBe('150');
    });

    test('removing collateral with size shrinks the position', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const pos = openedPosition(
            market.execute(
                { sender: 'trader', now: 1000 },
                { type: 'update-position-remove-collateral-impact-size', id: 1, amount: d(50) }
            )
        );
        expect(pos.activeCollateral.toFixed()).toBe('50');
        expect(pos.counterCollateral.toFixed()).toBe('50');
        expect(pos.notionalSize.toFixed()).toBe('50');
        expect(market.liquidityStats().locked.toFixed()).toBe('50');
    });

    test('changing leverage resizes notional and counter collateral together', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const pos = openedPosition(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'update-position-leverage', id: 1, leverage: d(5) })
        );
        expect(pos.notionalSize.toFixed()).toBe('50');
        expect(pos.counterCollateral.toFixed()).toBe('50');
        expect(pos.activeCollateral.toFixed()).toBe('100');
    });

    test('leverage may not drop to zero', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const error = expectError(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'update-position-leverage', id: 1, leverage: d(0) })
        );
        expect(error.id).toBe('DirectionToBaseFlipped');
    });

    test('raising max gains locks more liquidity', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const pos = openedPosition(
            market.execute({ sender: 'trader', now: 1000 }, { type: 'update-position-max-gains', id: 1, maxGains: d(2) })
        );
        expect(pos.counterCollateral.toFixed()).toBe('200');
        expect(market.liquidityStats().locked.toFixed()).toBe('200');
    });

    test('an update reaching a liquidated position refunds the added collateral', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        setPrice(market, 2000, 9);

        const result = expectOk(
            market.execute({ sender: 'trader', now: 2000, funds: native(50) }, { type: 'update-position-add-collateral-impact-leverage', id: 1 })
        );
        expect(result.data).toEqual({ kind: 'none' });
        const amounts = result.messages.flatMap((msg) => (msg.kind === 'token-transfer' ? [msg.amount.toFixed()] : []));
        expect(amounts).toEqual(['11', '50']);
        expect(market.closedPosition(1).reason).toEqual({ kind: 'liquidated', reason: 'liquidated' });
    });
});

describe('locked liquidity', () => {
    test('matches the counter collateral of open positions after opening', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        openStandardLong(market);
        expect(market.liquidityStats().locked.toFixed()).toBe('200');
        expect(sumCounterCollateral(market, 1000).toFixed()).toBe('200');
    });

    const updates: Array<[string, ExecuteMsg, Funds | undefined]> = [
        ['add collateral, leverage', { type: 'update-position-add-collateral-impact-leverage', id: 1 }, native(50)],
        ['add collateral, size', { type: 'update-position-add-collateral-impact-size', id: 1 }, native(50)],
        ['remove collateral, leverage', { type: 'update-position-remove-collateral-impact-leverage', id: 1, amount: d(20) }, undefined],
        ['remove collateral, size', { type: 'update-position-remove-collateral-impact-size', id: 1, amount: d(50) }, undefined],
        ['leverage', { type: 'update-position-leverage', id: 1, leverage: d(5) }, undefined],
        ['max gains', { type: 'update-position-max-gains', id: 1, maxGains: d(2) }, undefined],
    ];

    test.each(updates)('matches after updating %s', (_name, msg, funds) => {
        const market = createStandardMarket();
        openStandardLong(market);
        openStandardLong(market);
        openedPosition(market.execute({ sender: 'trader', now: 1000, funds }, msg));
        expect(market.liquidityStats().locked.toFixed()).toBe(sumCounterCollateral(market, 1000).toFixed());
    });

    test('matches after an update settles a price move', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        setPrice(market, 2000, '10.5');
        // the long gains 50, so 50 of its counter collateral is released
        openedPosition(
            market.execute({ sender: 'trader', now: 2000, funds: native(50) }, { type: 'update-position-add-collateral-impact-leverage', id: 1 })
        );
        expect(market.liquidityStats().locked.toFixed()).toBe('50');
        expect(sumCounterCollateral(market, 2000).toFixed()).toBe('50');
    });

    test('matches after closing', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        openStandardLong(market);
        expectOk(market.execute({ sender: 'trader', now: 1000 }, { type: 'close-position', id: 1 }));
        expect(market.liquidityStats().locked.toFixed()).toBe('100');
        expect(sumCounterCollateral(market, 1000).toFixed()).toBe('100');
    });
});

describe('trigger orders', () => {
    test('a stop loss fires before the liquidation price', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        expectOk(
            market.execute(
                { sender: 'trader', now: 1000 },
                { type: 'set-trigger-order', id: 1, stopLossOverride: d('9.5'), takeProfitOverride: d('10.8') }
            )
        );
        setPrice(market, 2000, '9.4');
        expect(market.crankStats(2000).nextWork).toEqual({ kind: 'liquidation', position: 1, reason: 'stop-loss', priceTimestamp: 2000 });
    });

    test('a take profit fires before max gains', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        expectOk(
            market.execute(
                { sender: 'trader', now: 1000 },
                { type: 'set-trigger-order', id: 1, stopLossOverride: d('9.5'), takeProfitOverride: d('10.8') }
            )
        );
        setPrice(market, 2000, '10.9');
        expect(market.crankStats(2000).nextWork).toEqual({ kind: 'liquidation', position: 1, reason: 'take-profit', priceTimestamp: 2000 });
    });

    test('only the owner sets trigger orders', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        const error = expectError(
            market.execute({ sender: 'mallory', now: 1000 }, { type: 'set-trigger-order', id: 1, stopLossOverride: d('9.5') })
        );
        expect(error.id).toBe('Auth');
    });

    test('prices set ahead of the crank keep new trigger prices pending', () => {
        const market = createStandardMarket();
        setPrice(market, 2000, 10);
        openStandardLong(market, 2000);
        expect(market.crankStats(2000).nextWork).toEqual({ kind: 'unpend-liquidation-prices', position: 1 });
    });
});

describe('position view', () => {
    test('pending fees and price moves are estimated', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        setPrice(market, 2000, '10.5');

        const view = market.position(2000, 1);
        expect(view.directionToBase).toBe('long');
        expect(view.pendingBorrowFee.toFixed()).toBe('0.000000031709791983');
        expect(view.estimatedActiveCollateral.toFixed()).toBe('149.999999968290208017');
    });

    test('positions are listed by owner', () => {
        const market = createStandardMarket();
        openStandardLong(market);
        openStandardLong(market);
        const page = market.positions(1000, 'trader', undefined, 1);
        expect(page.items.map((pos) => pos.id)).toEqual([1]);
        expect(page.nextStartAfter).toBe(1);
        expect(market.positions(1000, 'trader', 1).items.map((pos) => pos.id)).toEqual([2]);
    });
});
