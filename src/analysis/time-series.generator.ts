import type {
    BucketGranularity,
    ChartData,
    ChartSeries,
    ContentChartData,
    ContentCounts,
    ContentMetricSeries,
    ContentMonthlyData,
    ContentWeeklyData,
    DailyRecord,
    MonthlyData,
    PeriodRecord,
    RollingSeries,
    WeeklyData,
} from '../types';
import { DAILY_WINDOWS, MONTHLY_WINDOW, WEEKLY_WINDOWS } from '../utils/constants';
import { isoWeekKey, mondayOf } from '../utils/date.utils';
import { round, safeRatio, sum } from '../utils/number.utils';
import { emptyActivityCounts, mergeActivityCounts } from './conversation.reducer';

// ============================================================================
// AVERAGES
// ============================================================================

/**
 * Trailing mean over the last `window` values. The first entries average
 * over whatever is available, so the output has the input's length. Each
 * mean is taken over its own slice, so a window of 1 returns the input.
 */
export function rollingAverage(values: readonly number[], window: number): number[] {
    const size = Math.max(1, Math.floor(window));
    return values.map((_, i) => {
        const slice = values.slice(Math.max(0, i - size + 1), i + 1);
        return sum(slice) / slice.length;
    });
}

/**
 * Lifetime mean up to and including each entry
 */
export function expandingAverage(values: readonly number[]): number[] {
    let runningSum = 0;
    return values.map((value, i) => {
        runningSum += value;
        return runningSum / (i + 1);
    });
}

const roundAll = (values: number[]): number[] => values.map(value => round(value));

function withRolling(values: number[], shortWindow: number, longWindow: number): RollingSeries {
    return {
        values,
        avg_7d: roundAll(rollingAverage(values, shortWindow)),
        avg_28d: roundAll(rollingAverage(values, longWindow)),
    };
}

function chartSeries(values: number[]): ChartSeries {
    return {
        ...withRolling(values, DAILY_WINDOWS.short, DAILY_WINDOWS.long),
        avg_lifetime: roundAll(expandingAverage(values)),
    };
}

// ============================================================================
// BUCKETING
// ============================================================================

const byDate = (a: DailyRecord, b: DailyRecord): number => a.date.localeCompare(b.date);

function periodOf(date: string, granularity: BucketGranularity): { period: string; start_date: string } {
    if (granularity === 'week') {
        return { period: isoWeekKey(date), start_date: mondayOf(date) };
    }
    const month = date.slice(0, 7);
    return { period: month, start_date: `${month}-01` };
}

/**
 * Re-buckets daily records into ISO weeks or calendar months. Counts are
 * summed, averages recomputed, and periods without activity are not emitted.
 */
export function bucketDailyRecords(records: readonly DailyRecord[], granularity: BucketGranularity): PeriodRecord[] {
    const buckets = new Map<string, PeriodRecord>();

    for (const record of [...records].sort(byDate)) {
        const { period, start_date } = periodOf(record.date, granularity);
        let bucket = buckets.get(period);
        if (!bucket) {
            bucket = { period, start_date, ...emptyActivityCounts() };
            buckets.set(period, bucket);
        }
        mergeActivityCounts(bucket, record);
    }

    return Array.from(buckets.values()).sort((a, b) => a.start_date.localeCompare(b.start_date));
}

// ============================================================================
// ACTIVITY CHARTS
// ============================================================================

/**
 * Daily chats, messages and messages-per-chat with 7-day, 28-day and
 * lifetime averages
 */
export function computeChartData(records: readonly DailyRecord[]): ChartData {
    const sorted = [...records].sort(byDate);
    return {
        dates: sorted.map(r => r.date),
        chats: chartSeries(sorted.map(r => r.total_chats)),
        avg_messages: chartSeries(sorted.map(r => r.avg_messages_per_chat)),
        total_messages: chartSeries(sorted.map(r => r.total_messages)),
    };
}

export function computeMonthlyData(records: readonly DailyRecord[]): MonthlyData {
    const months = bucketDailyRecords(records, 'month');
    const chats = months.map(m => m.total_chats);
    const messages = months.map(m => m.total_messages);

    return {
        months: months.map(m => m.period),
        chats,
        messages,
        avg_messages: months.map(m => m.avg_messages_per_chat),
        chats_avg_3m: roundAll(rollingAverage(chats, MONTHLY_WINDOW)),
        messages_avg_3m: roundAll(rollingAverage(messages, MONTHLY_WINDOW)),
    };
}

export function computeWeeklyData(records: readonly DailyRecord[]): WeeklyData {
    const weeks = bucketDailyRecords(records, 'week');
    const chats = weeks.map(w => w.total_chats);
    const messages = weeks.map(w => w.total_messages);
    const avgMessages = weeks.map(w => w.avg_messages_per_chat);
    const { short, long } = WEEKLY_WINDOWS;

    return {
        weeks: weeks.map(w => w.start_date),
        chats,
        messages,
        avg_messages: avgMessages,
        chats_avg_4w: roundAll(rollingAverage(chats, short)),
        chats_avg_12w: roundAll(rollingAverage(chats, long)),
        messages_avg_4w: roundAll(rollingAverage(messages, short)),
        messages_avg_12w: roundAll(rollingAverage(messages, long)),
        avg_messages_avg_4w: roundAll(rollingAverage(avgMessages, short)),
        avg_messages_avg_12w: roundAll(rollingAverage(avgMessages, long)),
    };
}

// ============================================================================
// CONTENT CHARTS
// ============================================================================

/**
 * Per-period content metrics. Every ratio falls back to 0 when its
 * denominator is empty.
 */
function contentMetricSeries(records: readonly ContentCounts[]): ContentMetricSeries {
    const series = (metric: (r: ContentCounts) => number): RollingSeries =>
        withRolling(records.map(metric), DAILY_WINDOWS.short, DAILY_WINDOWS.long);

    return {
        avg_user_words: series(r => safeRatio(r.user_words, r.user_msgs)),
        avg_assistant_words: series(r => safeRatio(r.assistant_words, r.assistant_msgs)),
        response_ratio: series(r => safeRatio(r.assistant_words, r.user_words)),
        code_pct_user: series(r => safeRatio(r.user_code_msgs * 100, r.user_msgs)),
        code_pct_assistant: series(r => safeRatio(r.assistant_code_msgs * 100, r.assistant_msgs)),
    };
}

export function computeContentChartData(records: readonly DailyRecord[]): ContentChartData {
    const sorted = [...records].sort(byDate);
    return { dates: sorted.map(r => r.date), ...contentMetricSeries(sorted) };
}

export function computeContentWeeklyData(records: readonly DailyRecord[]): ContentWeeklyData {
    const weeks = bucketDailyRecords(records, 'week');
    return { weeks: weeks.map(w => w.start_date), ...contentMetricSeries(weeks) };
}

export function computeContentMonthlyData(records: readonly DailyRecord[]): ContentMonthlyData {
    const months = bucketDailyRecords(records, 'month');
    return { months: months.map(m => m.period), ...contentMetricSeries(months) };
}
