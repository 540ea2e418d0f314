/**
 * Gap & Activity Analysis
 *
 * Works on the flat list of message timestamps, independent of how
 * conversations were bucketed into days.
 */

import type { ActivityYearRecord, GapAnalysis, GapRecord, TimeOptions } from '../types';
import { MS_PER_DAY } from '../utils/constants';
import { daysBetween, formatTimestamp, toDayKey, yearOf } from '../utils/date.utils';
import { safeRatio } from '../utils/number.utils';

// ============================================================================
// GAPS
// ============================================================================

const byTime = (a: Date, b: Date): number => a.getTime() - b.getTime();

/**
 * Distinct active days plus the first and last of them
 */
function activeDaySpan(sorted: readonly Date[], offset: number): { days: Set<string>; first: string; last: string } {
    const days = new Set(sorted.map(ts => toDayKey(ts, offset)));
    return {
        days,
        first: toDayKey(sorted[0], offset),
        last: toDayKey(sorted[sorted.length - 1], offset),
    };
}

/**
 * Every silence between consecutive messages (longest first), plus how many
 * calendar days between the first and last message saw no activity
 */
export function computeGapAnalysis(timestamps: readonly Date[], options: TimeOptions = {}): GapAnalysis {
    if (timestamps.length === 0) {
        return {
            gaps: [],
            total_days: 0,
            days_active: 0,
            days_inactive: 0,
            proportion_inactive: 0,
            longest_gap: null,
        };
    }

    const offset = options.utcOffsetMinutes ?? 0;
    const sorted = [...timestamps].sort(byTime);
    const gaps: GapRecord[] = [];

    for (let i = 1; i < sorted.length; i++) {
        const lengthMs = sorted[i].getTime() - sorted[i - 1].getTime();
        if (lengthMs > 0) {
            gaps.push({
                start_timestamp: formatTimestamp(sorted[i - 1], offset),
                end_timestamp: formatTimestamp(sorted[i], offset),
                length_days: lengthMs / MS_PER_DAY,
            });
        }
    }
    gaps.sort((a, b) => b.length_days - a.length_days);

    const { days, first, last } = activeDaySpan(sorted, offset);
    const totalDays = daysBetween(first, last) + 1;
    const daysInactive = totalDays - days.size;

    return {
        gaps,
        total_days: totalDays,
        days_active: days.size,
        days_inactive: daysInactive,
        proportion_inactive: safeRatio(daysInactive * 100, totalDays),
        longest_gap: gaps[0] ?? null,
    };
}

// ============================================================================
// ACTIVITY BY YEAR
// ============================================================================

function activityRow(year: string, totalDays: number, daysActive: number): ActivityYearRecord {
    const daysInactive = totalDays - daysActive;
    return {
        year,
        total_days: totalDays,
        days_active: daysActive,
        days_inactive: daysInactive,
        pct_active: safeRatio(daysActive * 100, totalDays, 1),
        pct_inactive: safeRatio(daysInactive * 100, totalDays, 1),
    };
}

/**
 * Active vs inactive days per calendar year, "Overall" row first. The first
 * and last years only count from the first / up to the last active day;
 * years in between count in full, including ones with no activity at all.
 */
export function computeActivityByYear(timestamps: readonly Date[], options: TimeOptions = {}): ActivityYearRecord[] {
    if (timestamps.length === 0) {
        return [];
    }

    const offset = options.utcOffsetMinutes ?? 0;
    const { days, first, last } = activeDaySpan([...timestamps].sort(byTime), offset);

    const activeByYear = new Map<number, number>();
    for (const day of days) {
        const year = yearOf(day);
        activeByYear.set(year, (activeByYear.get(year) ?? 0) + 1);
    }

    const firstYear = yearOf(first);
    const lastYear = yearOf(last);
    const rows: ActivityYearRecord[] = [activityRow('Overall', daysBetween(first, last) + 1, days.size)];

    for (let year = firstYear; year <= lastYear; year++) {
        const yearLabel = String(year).padStart(4, '0');
        const start = year === firstYear ? first : `${yearLabel}-01-01`;
        const end = year === lastYear ? last : `${yearLabel}-12-31`;
        rows.push(activityRow(yearLabel, daysBetween(start, end) + 1, activeByYear.get(year) ?? 0));
    }

    return rows;
}

// ============================================================================
// PER-YEAR RANKING
// ============================================================================

/**
 * Top `perYear` items of each year by magnitude, merged into one list sorted
 * by magnitude (descending). Each year is ranked on its own, so a busy year
 * never crowds a quieter one out of the result.
 */
export function topPerYear<T>(
    items: readonly T[],
    yearKey: (item: T) => string,
    magnitude: (item: T) => number,
    perYear: number
): T[] {
    const byYear = new Map<string, T[]>();
    for (const item of items) {
        const year = yearKey(item);
        const group = byYear.get(year);
        if (group) {
            group.push(item);
        } else {
            byYear.set(year, [item]);
        }
    }

    const kept: T[] = [];
    for (const group of byYear.values()) {
        kept.push(...group.sort((a, b) => magnitude(b) - magnitude(a)).slice(0, Math.max(0, perYear)));
    }

    return kept.sort((a, b) => magnitude(b) - magnitude(a));
}

/**
 * Longest gaps of each year, keyed by the year the gap starts in
 */
export function topGapsPerYear(gaps: readonly GapRecord[], perYear: number): GapRecord[] {
    return topPerYear(gaps, gap => gap.start_timestamp.slice(0, 4), gap => gap.length_days, perYear);
}
