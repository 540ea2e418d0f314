import { describe, expect, it } from 'vitest';
import {
    addDays,
    daysBetween,
    daysInMonth,
    daysInYear,
    formatDisplayTimestamp,
    formatTimestamp,
    isDayKey,
    isoWeekKey,
    mondayOf,
    parseTimestamp,
    toDayKey,
    weekdayIndex,
} from './date.utils';

describe('parseTimestamp', () => {
    it('reads epoch seconds', () => {
        const seconds = Date.parse('2024-01-15T10:00:00Z') / 1000;
        expect(parseTimestamp(seconds)?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    });

    it('reads numeric strings as epoch seconds', () => {
        expect(parseTimestamp('1705312800.5')?.getTime()).toBe(1705312800500);
    });

    it('reads ISO strings', () => {
        expect(parseTimestamp('2024-01-15T10:00:00+02:00')?.toISOString()).toBe('2024-01-15T08:00:00.000Z');
    });

    it.each([null, undefined, '', '   ', 'yesterday', Number.NaN, Number.POSITIVE_INFINITY, 1e20, {}, []])(
        'returns null for %s',
        value => {
            expect(parseTimestamp(value)).toBeNull();
        }
    );
});

describe('wall clock formatting', () => {
    const instant = new Date('2024-01-15T10:00:00Z');

    it('formats with an explicit offset', () => {
        expect(formatTimestamp(instant)).toBe('2024-01-15T10:00:00+00:00');
        expect(formatTimestamp(instant, 120)).toBe('2024-01-15T12:00:00+02:00');
        expect(formatTimestamp(instant, -330)).toBe('2024-01-15T04:30:00-05:30');
    });

    it('formats for display', () => {
        expect(formatDisplayTimestamp(instant, 60)).toBe('2024-01-15 11:00:00');
    });

    it('moves the day key across midnight with the offset', () => {
        const lateEvening = new Date('2024-01-15T23:30:00Z');
        expect(toDayKey(lateEvening)).toBe('2024-01-15');
        expect(toDayKey(lateEvening, 60)).toBe('2024-01-16');
    });

    it('numbers weekdays from Monday', () => {
        expect(weekdayIndex(instant)).toBe(0);
        expect(weekdayIndex(new Date('2024-01-21T10:00:00Z'))).toBe(6);
    });
});

describe('day keys', () => {
    it('validates calendar dates', () => {
        expect(isDayKey('2024-02-29')).toBe(true);
        expect(isDayKey('2023-02-29')).toBe(false);
        expect(isDayKey('2024-13-01')).toBe(false);
        expect(isDayKey('2024-1-01')).toBe(false);
    });

    it('does day arithmetic', () => {
        expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
        expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
        expect(daysBetween('2024-01-01', '2024-03-01')).toBe(60);
        expect(daysBetween('2024-03-01', '2024-01-01')).toBe(-60);
    });

    it('knows month and year lengths', () => {
        expect(daysInMonth(2024, 2)).toBe(29);
        expect(daysInMonth(2023, 2)).toBe(28);
        expect(daysInMonth(2024, 12)).toBe(31);
        expect(daysInYear(2000)).toBe(366);
        expect(daysInYear(1900)).toBe(365);
    });
});

describe('ISO weeks', () => {
    it('finds the Monday of a week', () => {
        expect(mondayOf('2024-01-21')).toBe('2024-01-15');
        expect(mondayOf('2024-01-15')).toBe('2024-01-15');
    });

    it('numbers weeks by ISO rules', () => {
        expect(isoWeekKey('2024-01-15')).toBe('2024-W03');
        expect(isoWeekKey('2021-01-03')).toBe('2020-W53');
        expect(isoWeekKey('2024-12-30')).toBe('2025-W01');
    });
});
