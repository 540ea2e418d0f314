/**
 * Distributions & Period Comparisons
 */

import type {
    CodeStats,
    ComparisonOptions,
    ConversationSummary,
    CurrentPeriodStats,
    DailyRecord,
    HourlyData,
    LengthDistribution,
    PeriodComparison,
    PeriodStats,
    TimeOptions,
} from '../types';
import { LENGTH_BUCKETS } from '../utils/constants';
import { daysBetween, daysInMonth, daysInYear, hourOfDay, isDayKey, toDayKey, weekdayIndex } from '../utils/date.utils';
import { InvalidInputFormatError } from '../utils/errors';
import { round, safeRatio } from '../utils/number.utils';

// ============================================================================
// DISTRIBUTIONS
// ============================================================================

/**
 * Histogram of conversation lengths. Every summary lands in exactly one
 * bucket; lengths below the first bucket are counted there.
 */
export function computeLengthDistribution(summaries: readonly ConversationSummary[]): LengthDistribution {
    const counts = LENGTH_BUCKETS.map(() => 0);

    for (const summary of summaries) {
        const index = LENGTH_BUCKETS.findIndex(b => summary.message_count >= b.min && summary.message_count <= b.max);
        counts[index === -1 ? 0 : index] += 1;
    }

    return { buckets: LENGTH_BUCKETS.map(b => b.label), counts };
}

/**
 * Message counts by weekday (0 = Monday) and hour of day
 */
export function computeHourlyData(timestamps: readonly Date[], options: TimeOptions = {}): HourlyData {
    const offset = options.utcOffsetMinutes ?? 0;
    const heatmap = Array.from({ length: 7 }, () => Array<number>(24).fill(0));
    const hourlyTotals = Array<number>(24).fill(0);
    const weekdayTotals = Array<number>(7).fill(0);

    for (const ts of timestamps) {
        const weekday = weekdayIndex(ts, offset);
        const hour = hourOfDay(ts, offset);
        heatmap[weekday][hour] += 1;
        hourlyTotals[hour] += 1;
        weekdayTotals[weekday] += 1;
    }

    return { heatmap, hourly_totals: hourlyTotals, weekday_totals: weekdayTotals };
}

// ============================================================================
// PERIOD COMPARISON
// ============================================================================

/**
 * Sums the daily records whose date starts with `prefix` ("2024-02" or "2024")
 */
function periodStats(records: readonly DailyRecord[], prefix: string): PeriodStats {
    let chats = 0;
    let messages = 0;

    for (const record of records) {
        if (record.date.startsWith(prefix)) {
            chats += record.total_chats;
            messages += record.total_messages;
        }
    }

    return { chats, messages, avg_messages: safeRatio(messages, chats) };
}

/**
 * Scales a partial period up to its full length. Zero elapsed days count as one.
 */
export function withProjection(stats: PeriodStats, elapsedDays: number, totalDays: number): CurrentPeriodStats {
    const factor = totalDays / Math.max(1, elapsedDays);
    return {
        ...stats,
        elapsed_days: elapsedDays,
        total_days: totalDays,
        projected_chats: round(stats.chats * factor),
        projected_messages: round(stats.messages * factor),
    };
}

function resolveReferenceDate(options: ComparisonOptions): string {
    if (options.referenceDate !== undefined) {
        if (!isDayKey(options.referenceDate)) {
            throw new InvalidInputFormatError(`reference date must be YYYY-MM-DD, got "${options.referenceDate}"`);
        }
        return options.referenceDate;
    }
    return toDayKey(options.now ?? new Date(), options.utcOffsetMinutes ?? 0);
}

/**
 * This month / last month / this year / last year, relative to the reference
 * date (today by default). The two current periods carry pro-rata projections.
 */
export function computePeriodComparison(
    records: readonly DailyRecord[],
    options: ComparisonOptions = {}
): PeriodComparison {
    const reference = resolveReferenceDate(options);
    const year = Number(reference.slice(0, 4));
    const month = Number(reference.slice(5, 7));
    const day = Number(reference.slice(8, 10));

    const pad = (value: number, width: number): string => String(value).padStart(width, '0');
    const thisMonth = `${pad(year, 4)}-${pad(month, 2)}`;
    const lastMonth = month === 1 ? `${pad(year - 1, 4)}-12` : `${pad(year, 4)}-${pad(month - 1, 2)}`;
    const yearElapsed = daysBetween(`${pad(year, 4)}-01-01`, reference) + 1;

    return {
        this_month: withProjection(periodStats(records, thisMonth), day, daysInMonth(year, month)),
        last_month: periodStats(records, lastMonth),
        this_year: withProjection(periodStats(records, pad(year, 4)), yearElapsed, daysInYear(year)),
        last_year: periodStats(records, pad(year - 1, 4)),
    };
}

// ============================================================================
// CODE STATS
// ============================================================================

export function computeCodeStats(summaries: readonly ConversationSummary[]): CodeStats {
    const languageCounts = new Map<string, number>();
    let withCode = 0;

    for (const summary of summaries) {
        if (summary.code_languages.length === 0) continue;
        withCode += 1;
        for (const language of summary.code_languages) {
            languageCounts.set(language, (languageCounts.get(language) ?? 0) + 1);
        }
    }

    return {
        total_conversations_with_code: withCode,
        pct_with_code: safeRatio(withCode * 100, summaries.length, 1),
        language_counts: Array.from(languageCounts, ([language, count]) => ({ language, count }))
            .sort((a, b) => b.count - a.count || a.language.localeCompare(b.language)),
    };
}
