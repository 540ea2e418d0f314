import path from "node:path";
import { processConversations } from '../analysis/conversation.reducer';
import { computeGapAnalysis } from '../analysis/gap.analyser';
import { buildPayload } from '../analysis/payload.assembler';
import { computeSummaryStats } from '../analysis/summary.computer';
import {
    conversationTranscript,
    extractUserPrompts,
    findEarliestConversation,
    loadConversations,
    loadExportJson,
} from '../parsers';
import { DEFAULT_INPUT_PATH, DEFAULT_OUTPUT_DIR, UNTITLED_CONVERSATION } from '../utils/constants';
import { isChatStatsError } from '../utils/errors';
import { fileSize, writeJsonFile } from '../utils/file.utils';
import {
    ASCII_LOGO,
    colorize,
    formatBytes,
    formatNumber,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    showError,
    showUsage,
    withSpinner,
} from './cli.utils';
import { getDefaultOutputPath, PROMPT_SEPARATOR, writeAnalyticsFiles, writePromptsFile } from './output';
import { printSummaryReport, printTranscript } from './report';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export type Command = 'summary' | 'payload' | 'prompts' | 'first' | 'help';

const COMMANDS: readonly Command[] = ['summary', 'payload', 'prompts', 'first'];

export type CliOptions = {
    command: Command;
    inputPath: string;
    outputPath?: string;            // payload file, or prompts --output
    outDir: string;
    referenceDate?: string;
    utcOffsetMinutes: number;
    firstOnly: boolean;
    quiet: boolean;
};

/**
 * Bad command-line usage (unknown flag, missing or malformed value)
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function isCommand(value: string): value is Command {
    return COMMANDS.some(command => command === value);
}

/**
 * Parses the arguments after the script name
 */
export function parseArgs(args: readonly string[]): CliOptions {
    const positionals: string[] = [];
    const options: CliOptions = {
        command: 'summary',
        inputPath: DEFAULT_INPUT_PATH,
        outDir: DEFAULT_OUTPUT_DIR,
        utcOffsetMinutes: 0,
        firstOnly: false,
        quiet: false,
    };

    const valueOf = (flag: string, index: number): string => {
        const value = args[index + 1];
        if (value === undefined || value.startsWith('--')) {
            throw new UsageError(`Missing value for ${flag}`);
        }
        return value;
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '--help':
            case '-h':
                return { ...options, command: 'help' };
            case '--out':
                options.outDir = valueOf(arg, i++);
                break;
            case '--reference-date':
                options.referenceDate = valueOf(arg, i++);
                break;
            case '--utc-offset': {
                const raw = valueOf(arg, i++);
                const minutes = Number(raw);
                if (!Number.isInteger(minutes) || Math.abs(minutes) > 14 * 60) {
                    throw new UsageError(`--utc-offset must be a whole number of minutes between -840 and 840, got "${raw}"`);
                }
                options.utcOffsetMinutes = minutes;
                break;
            }
            case '--first-only':
            case '-f':
                options.firstOnly = true;
                break;
            case '--output':
            case '-o':
                options.outputPath = valueOf(arg, i++);
                break;
            case '--quiet':
            case '-q':
                options.quiet = true;
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new UsageError(`Unknown option: ${arg}`);
                }
                positionals.push(arg);
        }
    }

    const first = positionals[0];
    if (first !== undefined && isCommand(first)) {
        options.command = first;
        positionals.shift();
    }

    const maxPositionals = options.command === 'payload' ? 2 : 1;
    if (positionals.length > maxPositionals) {
        throw new UsageError(`Unexpected argument: ${positionals[maxPositionals]}`);
    }

    options.inputPath = positionals[0] ?? DEFAULT_INPUT_PATH;
    if (options.command === 'payload' && positionals[1]) {
        options.outputPath = positionals[1];
    }

    return options;
}

// ============================================================================
// COMMANDS
// ============================================================================

function runSummary(options: CliOptions): void {
    const conversations = withSpinner("Loading conversation export...", () => loadConversations(options.inputPath));
    logSuccess(`Loaded ${formatNumber(conversations.length)} conversation(s) from ${path.basename(options.inputPath)}`);

    const processed = withSpinner("Analysing conversations...", () =>
        processConversations(conversations, { utcOffsetMinutes: options.utcOffsetMinutes }));
    if (processed.skipped > 0) {
        logWarning(`Skipped ${formatNumber(processed.skipped)} conversation(s) without user or assistant messages`);
    }

    const gapAnalysis = computeGapAnalysis(processed.timestamps, { utcOffsetMinutes: options.utcOffsetMinutes });
    const stats = computeSummaryStats(processed.summaries, processed.dailyRecords);

    const written = writeAnalyticsFiles(options.outDir, processed.summaries, processed.dailyRecords, gapAnalysis.gaps);

    printSummaryReport(stats, gapAnalysis);

    logHeader("OUTPUT FILES");
    written.forEach(filePath => console.log(`  ${colorize(filePath, 'green')} (${formatBytes(fileSize(filePath))})`));
}

function runPayload(options: CliOptions): void {
    const outputPath = path.resolve(options.outputPath ?? getDefaultOutputPath(options.inputPath));
    const conversations = withSpinner("Loading conversation export...", () => loadConversations(options.inputPath));

    const payload = withSpinner("Building dashboard payload...", () => buildPayload(conversations, {
        utcOffsetMinutes: options.utcOffsetMinutes,
        referenceDate: options.referenceDate,
    }));
    writeJsonFile(outputPath, payload);

    logSuccess(`Dashboard payload written: ${outputPath} (${formatBytes(fileSize(outputPath))})`);
    logInfo(`${formatNumber(payload.summary.total_chats)} chats, ${formatNumber(payload.summary.total_messages)} messages`);
}

function runPrompts(options: CliOptions): void {
    const data = withSpinner("Loading conversation export...", () => loadExportJson(options.inputPath));
    const prompts = extractUserPrompts(data, { firstOnly: options.firstOnly });

    if (!options.quiet) {
        prompts.forEach(prompt => console.log(`${prompt}\n${colorize(PROMPT_SEPARATOR, 'dim')}`));
    }

    if (options.outputPath) {
        writePromptsFile(options.outputPath, prompts);
        logSuccess(`Wrote ${formatNumber(prompts.length)} prompt(s) to ${options.outputPath}`);
    } else {
        logInfo(`Found ${formatNumber(prompts.length)} prompt(s)`);
    }
}

function runFirst(options: CliOptions): void {
    const conversations = loadConversations(options.inputPath);
    const earliest = findEarliestConversation(conversations);

    if (!earliest) {
        logWarning("No conversation found to display.");
        return;
    }

    const title = earliest.conversation.title?.trim() || UNTITLED_CONVERSATION;
    printTranscript(title, conversationTranscript(earliest.conversation), options.utcOffsetMinutes);
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function. Takes the full argv and resolves to the
 * process exit code.
 */
export async function runCLI(argv: string[]): Promise<number> {
    let options: CliOptions;
    try {
        options = parseArgs(argv.slice(2));
    } catch (error) {
        if (error instanceof UsageError) {
            showError(error.message);
            return 1;
        }
        throw error;
    }

    if (options.command === 'help') {
        showUsage();
        return 0;
    }

    if (options.command === 'summary' || options.command === 'payload') {
        console.log(ASCII_LOGO);
    }

    try {
        switch (options.command) {
            case 'summary':
                runSummary(options);
                break;
            case 'payload':
                runPayload(options);
                break;
            case 'prompts':
                runPrompts(options);
                break;
            case 'first':
                runFirst(options);
                break;
        }
        return 0;
    } catch (error) {
        if (isChatStatsError(error)) {
            const details = error.cause instanceof Error ? error.cause.message : undefined;
            showError(error.message, details);
            return 1;
        }
        showError("Unexpected error while processing the conversation export", error instanceof Error ? error.message : String(error));
        return 1;
    }
}
