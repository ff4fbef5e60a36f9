/**
 * Rate Series Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Integrals over windows that start and end between entries.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { KvStore } from '../src/storage/kvStore';
import { DataSeries } from '../src/engine/dataSeries';
import { isPerpError } from '../src/utils/errors';
import { d } from './helpers';

function createSeries(): DataSeries {
    const series = new DataSeries(new KvStore(), 'test-rate');
    series.append(0, d(2));
    series.append(10, d(4));
    return series;
}

describe('DataSeries', () => {
    test('integrates the rate in force over a window', () => {
        const series = createSeries();
        expect(series.sum(0, 10).toFixed()).toBe('20');
        expect(series.sum(5, 15).toFixed()).toBe('30');
        expect(series.sum(12, 20).toFixed()).toBe('32');
    });

    test('empty or reversed windows sum to zero', () => {
        const series = createSeries();
        expect(series.sum(7, 7).isZero()).toBe(true);
        expect(series.sum(9, 3).isZero()).toBe(true);
    });

    test('appending at the latest timestamp replaces its value', () => {
        const series = createSeries();
        series.append(10, d(6));
        expect(series.latest()?.[0]).toBe(10);
        expect(series.latestValue().toFixed()).toBe('6');
        expect(series.sum(10, 12).toFixed()).toBe('12');
        expect(series.sum(0, 12).toFixed()).toBe('32');
    });

    test('appending in the past is rejected', () => {
        const series = createSeries();
        expect(() => series.append(5, d(1))).toThrow('append at 5 before latest 10');
    });

    test('windows starting before the first entry fail', () => {
        const series = new DataSeries(new KvStore(), 'late');
        series.append(100, d(1));
        expect(series.covers(50)).toBe(false);
        expect(series.covers(100)).toBe(true);
        try {
            series.sum(50, 150);
            throw new Error('expected sum to fail');
        } catch (err) {
            expect(isPerpError(err) && err.id).toBe('InvariantViolation');
        }
    });

    test('an empty series reads as zero', () => {
        const series = new DataSeries(new KvStore(), 'empty');
        expect(series.isEmpty).toBe(true);
        expect(series.latestValue().isZero()).toBe(true);
    });
});
