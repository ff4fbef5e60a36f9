/**
 * Logger Tests
 */

import { AuditTrailTransport, clearAuditTrail, getAuditTrail } from '../src/utils/logger';
import { createStandardMarket, flushLogs, openStandardLong, setPrice } from './helpers';

const noop = (): void => undefined;

describe('AuditTrailTransport', () => {
    test('keeps only the most recent critical lines', () => {
        const trail = new AuditTrailTransport({ capacity: 2 });
        trail.log({ level: 'warn', message: 'a' }, noop);
        trail.log({ level: 'warn', message: 'b' }, noop);
        trail.log({ level: 'error', message: 'c' }, noop);
        expect(trail.snapshot().map((entry) => entry.message)).toEqual(['b', 'c']);
    });

    test('routine info lines are skipped', () => {
        const trail = new AuditTrailTransport();
        trail.log({ level: 'info', message: '[CRANK] batch requested=7 actual=1 paying=0 reward=0' }, noop);
        expect(trail.snapshot()).toEqual([]);
    });

    test('info lines about resets are kept', () => {
        const trail = new AuditTrailTransport();
        trail.log({ level: 'info', message: '[LIQUIDITY] RESET finished' }, noop);
        expect(trail.snapshot().map((entry) => entry.level)).toEqual(['info']);
    });
});

describe('audit trail', () => {
    beforeEach(() => {
        clearAuditTrail();
    });

    test('liquidations are recorded', async () => {
        const market = createStandardMarket();
        openStandardLong(market);
        setPrice(market, 2000, 9);
        market.execute({ sender: 'cranker', now: 2000 }, { type: 'crank' });
        await flushLogs();

        const lines = getAuditTrail().map((entry) => entry.message);
        expect(lines).toContain('[POSITION] LIQUIDATED reason=liquidated id=1 owner=trader active=11 pnl=-89');
    });
});
