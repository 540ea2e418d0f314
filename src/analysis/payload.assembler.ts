/**
 * Dashboard Payload Assembly
 */

import type { ConversationRecord, DashboardPayload, PayloadOptions, TimeOptions } from '../types';
import { loadConversations } from '../parsers/conversation.loader';
import { DEFAULT_INPUT_PATH, TOP_DAYS_PER_YEAR, TOP_GAPS_PER_YEAR } from '../utils/constants';
import { formatTimestamp } from '../utils/date.utils';
import { processConversations } from './conversation.reducer';
import {
    computeCodeStats,
    computeHourlyData,
    computeLengthDistribution,
    computePeriodComparison,
} from './distribution.computer';
import { computeActivityByYear, computeGapAnalysis, topGapsPerYear } from './gap.analyser';
import { computeContentSummary, computeSummaryStats } from './summary.computer';
import {
    computeChartData,
    computeContentChartData,
    computeContentMonthlyData,
    computeContentWeeklyData,
    computeMonthlyData,
    computeWeeklyData,
} from './time-series.generator';

/**
 * Runs every analysis over the conversations. Pure: the same input and
 * options (including `now`) always give the same payload.
 */
export function buildPayload(conversations: readonly ConversationRecord[], options: PayloadOptions = {}): DashboardPayload {
    const now = options.now ?? new Date();
    const timeOptions: TimeOptions = { utcOffsetMinutes: options.utcOffsetMinutes };

    const { summaries, dailyRecords, timestamps } = processConversations(conversations, options);
    const { gaps, ...gapStats } = computeGapAnalysis(timestamps, timeOptions);
    const codeStats = computeCodeStats(summaries);

    return {
        generated_at: formatTimestamp(now, options.utcOffsetMinutes ?? 0),
        summary: computeSummaryStats(summaries, dailyRecords, options.topDaysPerYear ?? TOP_DAYS_PER_YEAR),
        charts: computeChartData(dailyRecords),
        gaps: topGapsPerYear(gaps, options.topGapsPerYear ?? TOP_GAPS_PER_YEAR),
        gap_stats: gapStats,
        monthly: computeMonthlyData(dailyRecords),
        weekly: computeWeeklyData(dailyRecords),
        hourly: computeHourlyData(timestamps, timeOptions),
        length_distribution: computeLengthDistribution(summaries),
        comparison: computePeriodComparison(dailyRecords, { ...timeOptions, referenceDate: options.referenceDate, now }),
        activity_by_year: computeActivityByYear(timestamps, timeOptions),
        content_charts: computeContentChartData(dailyRecords),
        content_weekly: computeContentWeeklyData(dailyRecords),
        content_monthly: computeContentMonthlyData(dailyRecords),
        code_stats: codeStats,
        content_summary: computeContentSummary(summaries, codeStats),
    };
}

/**
 * Loads an export file and builds its payload
 *
 * @throws SourceNotFoundError / InvalidInputFormatError from the loader
 */
export function buildPayloadFromFile(filePath: string = DEFAULT_INPUT_PATH, options: PayloadOptions = {}): DashboardPayload {
    return buildPayload(loadConversations(filePath), options);
}
