/**
 * Analysis Type Definitions
 *
 * Record fields are snake_case: they are serialised as-is into the dashboard
 * payload and read by the presentation layer.
 */

import type { BranchPolicy } from './message.types';

// ============================================================================
// PER-CONVERSATION / PER-DAY RECORDS
// ============================================================================

/**
 * Summary of one conversation's active thread
 */
export type ConversationSummary = {
    id: string;
    title: string;
    date: string | null;            // day the conversation is bucketed into
    created_at: string | null;
    updated_at: string | null;
    start_time: string | null;      // first valid message timestamp
    end_time: string | null;
    duration_minutes: number;
    message_count: number;          // user + assistant messages
    user_messages: number;
    assistant_messages: number;
    user_words: number;
    assistant_words: number;
    response_ratio: number;         // assistant_words / user_words, 0 when no user words
    code_languages: string[];
    first_user_message: string | null;
};

/**
 * Content metrics summed over a period
 */
export type ContentCounts = {
    user_words: number;
    user_chars: number;
    user_msgs: number;
    user_code_msgs: number;
    assistant_words: number;
    assistant_chars: number;
    assistant_msgs: number;
    assistant_code_msgs: number;
};

export type ActivityCounts = ContentCounts & {
    total_chats: number;
    total_messages: number;
    avg_messages_per_chat: number;
    max_messages_in_chat: number;
};

export type DailyRecord = ActivityCounts & {
    date: string;                   // YYYY-MM-DD
};

export type BucketGranularity = 'week' | 'month';

/**
 * A weekly or monthly re-bucketing of daily records
 */
export type PeriodRecord = ActivityCounts & {
    period: string;                 // "2024-W03" or "2024-01"
    start_date: string;             // Monday of the week, or first day of the month
};

export type ProcessedConversations = {
    summaries: ConversationSummary[];
    dailyRecords: DailyRecord[];
    timestamps: Date[];
    skipped: number;                // conversations with no user/assistant message
};

// ============================================================================
// CHART SERIES
// ============================================================================

export type RollingSeries = {
    values: number[];
    avg_7d: number[];
    avg_28d: number[];
};

export type ChartSeries = RollingSeries & {
    avg_lifetime: number[];
};

export type ChartData = {
    dates: string[];
    chats: ChartSeries;
    avg_messages: ChartSeries;
    total_messages: ChartSeries;
};

export type MonthlyData = {
    months: string[];
    chats: number[];
    messages: number[];
    avg_messages: number[];
    chats_avg_3m: number[];
    messages_avg_3m: number[];
};

export type WeeklyData = {
    weeks: string[];                // Monday of each ISO week
    chats: number[];
    messages: number[];
    avg_messages: number[];
    chats_avg_4w: number[];
    chats_avg_12w: number[];
    messages_avg_4w: number[];
    messages_avg_12w: number[];
    avg_messages_avg_4w: number[];
    avg_messages_avg_12w: number[];
};

export type ContentMetricSeries = {
    avg_user_words: RollingSeries;
    avg_assistant_words: RollingSeries;
    response_ratio: RollingSeries;
    code_pct_user: RollingSeries;
    code_pct_assistant: RollingSeries;
};

export type ContentChartData = ContentMetricSeries & { dates: string[] };
export type ContentWeeklyData = ContentMetricSeries & { weeks: string[] };
export type ContentMonthlyData = ContentMetricSeries & { months: string[] };

// ============================================================================
// GAPS & ACTIVITY
// ============================================================================

export type GapRecord = {
    start_timestamp: string;
    end_timestamp: string;
    length_days: number;
};

export type GapStats = {
    total_days: number;
    days_active: number;
    days_inactive: number;
    proportion_inactive: number;    // percentage, 0-100
    longest_gap: GapRecord | null;
};

export type GapAnalysis = GapStats & {
    gaps: GapRecord[];              // longest first
};

export type ActivityYearRecord = {
    year: string;                   // "2024" or "Overall"
    total_days: number;
    days_active: number;
    days_inactive: number;
    pct_active: number;
    pct_inactive: number;
};

// ============================================================================
// DISTRIBUTIONS & COMPARISONS
// ============================================================================

export type HourlyData = {
    heatmap: number[][];            // [weekday 0=Monday][hour]
    hourly_totals: number[];
    weekday_totals: number[];
};

export type LengthDistribution = {
    buckets: string[];
    counts: number[];
};

export type PeriodStats = {
    chats: number;
    messages: number;
    avg_messages: number;
};

/**
 * A period still in progress, with its totals scaled up to the full period
 */
export type CurrentPeriodStats = PeriodStats & {
    elapsed_days: number;
    total_days: number;
    projected_chats: number;
    projected_messages: number;
};

export type PeriodComparison = {
    this_month: CurrentPeriodStats;
    last_month: PeriodStats;
    this_year: CurrentPeriodStats;
    last_year: PeriodStats;
};

export type CodeStats = {
    total_conversations_with_code: number;
    pct_with_code: number;
    language_counts: Array<{ language: string; count: number }>;
};

// ============================================================================
// SUMMARY
// ============================================================================

export type SummaryStats = {
    total_messages: number;
    total_chats: number;
    first_date: string | null;
    last_date: string | null;
    years_span: number;
    top_days_by_chats: DailyRecord[];
    top_days_by_messages: DailyRecord[];
};

export type ContentSummary = {
    avg_user_words: number;
    avg_assistant_words: number;
    avg_response_ratio: number;
    pct_conversations_with_code: number;
};

// ============================================================================
// OPTIONS
// ============================================================================

export type TimeOptions = {
    utcOffsetMinutes?: number;      // fixed offset used for every calendar field
};

export type ProcessOptions = TimeOptions & {
    branchPolicy?: BranchPolicy;
    previewLength?: number;
};

export type ComparisonOptions = TimeOptions & {
    referenceDate?: string;         // YYYY-MM-DD, defaults to today
    now?: Date;
};
