/**
 * Dashboard Payload Type Definitions
 */

import type {
    ActivityYearRecord,
    ChartData,
    CodeStats,
    ComparisonOptions,
    ContentChartData,
    ContentMonthlyData,
    ContentSummary,
    ContentWeeklyData,
    GapRecord,
    GapStats,
    HourlyData,
    LengthDistribution,
    MonthlyData,
    PeriodComparison,
    ProcessOptions,
    SummaryStats,
    WeeklyData,
} from './analysis.types';

/**
 * Everything the dashboard pages read, in one JSON-serialisable object.
 * Keys are a contract: add fields, never rename them.
 */
export type DashboardPayload = {
    generated_at: string;
    summary: SummaryStats;
    charts: ChartData;
    gaps: GapRecord[];              // top N per year, longest first
    gap_stats: GapStats;
    monthly: MonthlyData;
    weekly: WeeklyData;
    hourly: HourlyData;
    length_distribution: LengthDistribution;
    comparison: PeriodComparison;
    activity_by_year: ActivityYearRecord[];
    content_charts: ContentChartData;
    content_weekly: ContentWeeklyData;
    content_monthly: ContentMonthlyData;
    code_stats: CodeStats;
    content_summary: ContentSummary;
};

export type PayloadOptions = ProcessOptions & ComparisonOptions & {
    topGapsPerYear?: number;
    topDaysPerYear?: number;
};
