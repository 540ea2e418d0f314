/**
 * Headline Statistics
 */

import type { CodeStats, ContentSummary, ConversationSummary, DailyRecord, SummaryStats } from '../types';
import { DAYS_PER_YEAR_AVG, TOP_DAYS_PER_YEAR } from '../utils/constants';
import { daysBetween } from '../utils/date.utils';
import { round, safeRatio, sum } from '../utils/number.utils';
import { topPerYear } from './gap.analyser';

/**
 * Totals, date range and each year's busiest days
 */
export function computeSummaryStats(
    summaries: readonly ConversationSummary[],
    records: readonly DailyRecord[],
    topDaysPerYear: number = TOP_DAYS_PER_YEAR
): SummaryStats {
    const dates = summaries
        .map(s => s.date)
        .filter((date): date is string => date !== null)
        .sort();

    const firstDate = dates.length > 0 ? dates[0] : null;
    const lastDate = dates.length > 0 ? dates[dates.length - 1] : null;
    const dayYear = (record: DailyRecord): string => record.date.slice(0, 4);

    return {
        total_messages: sum(records.map(r => r.total_messages)),
        total_chats: summaries.length,
        first_date: firstDate,
        last_date: lastDate,
        years_span: firstDate && lastDate ? round(daysBetween(firstDate, lastDate) / DAYS_PER_YEAR_AVG) : 0,
        top_days_by_chats: topPerYear(records, dayYear, r => r.total_chats, topDaysPerYear),
        top_days_by_messages: topPerYear(records, dayYear, r => r.total_messages, topDaysPerYear),
    };
}

/**
 * Archive-wide content averages (per conversation, not per message)
 */
export function computeContentSummary(summaries: readonly ConversationSummary[], codeStats: CodeStats): ContentSummary {
    const userWords = sum(summaries.map(s => s.user_words));
    const assistantWords = sum(summaries.map(s => s.assistant_words));

    return {
        avg_user_words: safeRatio(userWords, summaries.length, 1),
        avg_assistant_words: safeRatio(assistantWords, summaries.length, 1),
        avg_response_ratio: safeRatio(assistantWords, userWords),
        pct_conversations_with_code: codeStats.pct_with_code,
    };
}
