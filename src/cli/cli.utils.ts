/**
 * CLI Utilities for terminal output
 */

import { DEFAULT_INPUT_PATH, DEFAULT_OUTPUT_DIR, DEFAULT_PAYLOAD_FILENAME } from '../utils/constants';

// ============================================================================
// ASCII ART & BRANDING
// ============================================================================

export const ASCII_LOGO = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║                 C H A T   S T A T S                        ║
║                                                            ║
║         Conversation Archive Analytics & Dashboards        ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

/**
 * Thousands-separated integer, e.g. 12,345 (fixed locale so output is stable)
 */
export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(1024)));
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

export function formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) {
        return `${days}d ${hours % 24}h ${minutes % 60}m`;
    } else if (hours > 0) {
        return `${hours}h ${minutes % 60}m`;
    } else if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    } else {
        return `${seconds}s`;
    }
}

// ============================================================================
// LOADING INDICATORS
// ============================================================================

export class LoadingSpinner {
    private interval: NodeJS.Timeout | null = null;
    private frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
    private currentFrame = 0;
    private readonly message: string;

    constructor(message: string) {
        this.message = message;
    }

    /**
     * Animates only on an interactive terminal; piped output stays clean
     */
    start(): void {
        if (!process.stdout.isTTY || this.interval) return;
        process.stdout.write('\x1b[?25l'); // Hide cursor
        this.interval = setInterval(() => {
            process.stdout.write(`\r${colorize(this.frames[this.currentFrame], 'cyan')} ${this.message}`);
            this.currentFrame = (this.currentFrame + 1) % this.frames.length;
        }, 100);
    }

    stop(): void {
        if (!this.interval) return;
        clearInterval(this.interval);
        this.interval = null;
        process.stdout.write('\r' + ' '.repeat(process.stdout.columns ?? 0) + '\r'); // Clear line
        process.stdout.write('\x1b[?25h'); // Show cursor
    }
}

/**
 * Runs a synchronous step behind a spinner, stopping it whatever happens
 */
export function withSpinner<T>(message: string, step: () => T): T {
    const spinner = new LoadingSpinner(message);
    spinner.start();
    try {
        return step();
    } finally {
        spinner.stop();
    }
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.error(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right';
}

/**
 * Renders a box-drawn table as lines of text
 */
export function renderTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const rule = (junction: string): string => columns.map(col => '─'.repeat(col.width)).join(`─${junction}─`);

    const lines = [
        `┌─${rule('┬')}─┐`,
        `│ ${headerRow} │`,
        `├─${rule('┼')}─┤`,
    ];

    data.forEach(row => {
        const formattedRow = columns.map((col, i) => {
            const cell = row[i] ?? '';
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            return col.align === 'right' ? truncated.padStart(col.width) : truncated.padEnd(col.width);
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    });

    lines.push(`└─${rule('┴')}─┘`);
    return lines;
}

// ============================================================================
// USAGE HELPER
// ============================================================================

export function showUsage(): void {
    console.log(ASCII_LOGO);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('chat-stats', 'cyan')} ${colorize('[command]', 'yellow')} ${colorize('[conversations.json]', 'yellow')} ${colorize('[options]', 'dim')}`);
    console.log();

    console.log(`${colorize('COMMANDS:', 'bright')}`);
    console.log(`  ${colorize('summary', 'cyan')}    Print the usage summary and write CSV/JSON analytics (default)`);
    console.log(`  ${colorize('payload', 'cyan')}    Write the full dashboard payload as JSON`);
    console.log(`  ${colorize('prompts', 'cyan')}    Extract every user prompt in the archive`);
    console.log(`  ${colorize('first', 'cyan')}      Print the earliest conversation`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--out DIR', 'cyan')}                  summary: output directory (default: ${DEFAULT_OUTPUT_DIR})`);
    console.log(`  ${colorize('--reference-date YYYY-MM-DD', 'cyan')} payload: "today" for period comparisons`);
    console.log(`  ${colorize('--utc-offset MINUTES', 'cyan')}       summary/payload/first: fixed time zone offset (default: 0)`);
    console.log(`  ${colorize('--first-only, -f', 'cyan')}           prompts: keep only prompts with a ";" (cut after it)`);
    console.log(`  ${colorize('--output FILE, -o', 'cyan')}          prompts: write prompts to FILE`);
    console.log(`  ${colorize('--quiet, -q', 'cyan')}                prompts: do not print prompts`);
    console.log(`  ${colorize('--help, -h', 'cyan')}                 Show this help message`);
    console.log();

    console.log(`${colorize('ARGUMENTS:', 'bright')}`);
    console.log(`  ${colorize('conversations.json', 'yellow')}   Conversation export (default: ${DEFAULT_INPUT_PATH})`);
    console.log(`  ${colorize('output.json', 'dim')}          payload: output file (default: ${DEFAULT_PAYLOAD_FILENAME} beside the input)`);
    console.log();

    console.log(`${colorize('EXAMPLES:', 'bright')}`);
    console.log(`  ${colorize('chat-stats', 'cyan')}                                     # Summarise ./conversations.json`);
    console.log(`  ${colorize('chat-stats summary ~/export/conversations.json', 'cyan')}  # Summarise another export`);
    console.log(`  ${colorize('chat-stats payload conversations.json out.json', 'cyan')} # Dashboard payload`);
    console.log(`  ${colorize('chat-stats prompts --first-only -o prompts.txt', 'cyan')}  # Save prompts`);
    console.log();
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export function showError(message: string, details?: string): void {
    console.error();
    logError(message);
    if (details) {
        console.error(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.error();
    console.error(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.error();
}
