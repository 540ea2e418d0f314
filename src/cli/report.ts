import type { GapAnalysis, SummaryStats } from '../types';
import type { TranscriptLine } from '../parsers/prompt.extractor';
import { MS_PER_DAY, REPORT_TOP_GAPS } from '../utils/constants';
import { formatDisplayTimestamp } from '../utils/date.utils';
import type { TableColumn } from './cli.utils';
import { colorize, formatDuration, formatNumber, logHeader, renderTable } from './cli.utils';

// ============================================================================
// SUMMARY REPORT
// ============================================================================

export type ReportSection = {
    title: string;
    lines: string[];
};

function usageSection(stats: SummaryStats): ReportSection {
    const lines = [
        `Total Messages: ${formatNumber(stats.total_messages)}`,
        `Total Chats: ${formatNumber(stats.total_chats)}`,
    ];

    if (stats.first_date && stats.last_date) {
        lines.push(
            `First Chat: ${stats.first_date}`,
            `Last Chat: ${stats.last_date}`,
            `Time Span: ${stats.years_span.toFixed(2)} years`
        );
    }

    const topChats = stats.top_days_by_chats[0];
    const topMessages = stats.top_days_by_messages[0];
    if (topChats && topMessages) {
        lines.push(
            `Max Chats in a Day: ${formatNumber(topChats.total_chats)} on ${topChats.date}`,
            `Max Messages in a Day: ${formatNumber(topMessages.total_messages)} on ${topMessages.date}`,
            '',
            'Top Days by Chats:',
            ...stats.top_days_by_chats.map(r => `  ${r.date}: ${formatNumber(r.total_chats)} chats`),
            '',
            'Top Days by Messages:',
            ...stats.top_days_by_messages.map(r => `  ${r.date}: ${formatNumber(r.total_messages)} messages`)
        );
    }

    return { title: 'USAGE SUMMARY', lines };
}

const GAP_COLUMNS: TableColumn[] = [
    { header: '#', width: 3, align: 'right' },
    { header: 'Days', width: 8, align: 'right' },
    { header: 'From', width: 25 },
    { header: 'To', width: 25 },
];

function inactivitySection(gapAnalysis: GapAnalysis, topGaps: number): ReportSection {
    const lines = [
        `Total Days in Range: ${formatNumber(gapAnalysis.total_days)}`,
        `Days with Messages: ${formatNumber(gapAnalysis.days_active)}`,
        `Days without Messages: ${formatNumber(gapAnalysis.days_inactive)}`,
        `Proportion Inactive: ${gapAnalysis.proportion_inactive.toFixed(2)}%`,
    ];

    const longest = gapAnalysis.longest_gap;
    if (longest) {
        lines.push(
            '',
            `Longest Gap: ${longest.length_days.toFixed(2)} days (${formatDuration(longest.length_days * MS_PER_DAY)})`,
            `  From: ${longest.start_timestamp}`,
            `  To:   ${longest.end_timestamp}`,
            '',
            `Top ${Math.min(topGaps, gapAnalysis.gaps.length)} Gaps:`,
            ...renderTable(GAP_COLUMNS, gapAnalysis.gaps.slice(0, topGaps).map((gap, i) => [
                String(i + 1),
                gap.length_days.toFixed(2),
                gap.start_timestamp,
                gap.end_timestamp,
            ]))
        );
    }

    return { title: 'INACTIVITY ANALYSIS', lines };
}

/**
 * Report sections as plain text lines. Inactivity is only reported when at
 * least one message carried a timestamp.
 */
export function buildSummaryReport(
    stats: SummaryStats,
    gapAnalysis: GapAnalysis,
    topGaps: number = REPORT_TOP_GAPS
): ReportSection[] {
    const sections = [usageSection(stats)];
    if (gapAnalysis.total_days > 0) {
        sections.push(inactivitySection(gapAnalysis, topGaps));
    }
    return sections;
}

export function printSummaryReport(stats: SummaryStats, gapAnalysis: GapAnalysis): void {
    for (const section of buildSummaryReport(stats, gapAnalysis)) {
        logHeader(section.title);
        section.lines.forEach(line => console.log(line));
    }
}

// ============================================================================
// TRANSCRIPTS
// ============================================================================

/**
 * "[YYYY-MM-DD HH:MM:SS] ROLE: text", or "Unknown" in place of a missing time
 */
export function formatTranscriptLine(line: TranscriptLine, utcOffsetMinutes: number = 0): string {
    const time = line.timestamp ? formatDisplayTimestamp(line.timestamp, utcOffsetMinutes) : 'Unknown';
    return `[${time}] ${line.role.toUpperCase()}: ${line.text}`;
}

export function printTranscript(title: string, lines: readonly TranscriptLine[], utcOffsetMinutes: number = 0): void {
    logHeader(`FIRST CONVERSATION (EARLIEST): ${title}`);
    lines.forEach(line => console.log(formatTranscriptLine(line, utcOffsetMinutes)));
    console.log(`\n${colorize('-'.repeat(60), 'dim')}\n`);
}
