/**
 * Constants and Configuration Values
 */

// ============================================================================
// PATHS
// ============================================================================

export const DEFAULT_INPUT_PATH = 'conversations.json';
export const DEFAULT_OUTPUT_DIR = 'chat_analytics';
export const DEFAULT_PAYLOAD_FILENAME = 'dashboard.json';

// ============================================================================
// TIME
// ============================================================================

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;
export const DAYS_PER_YEAR_AVG = 365.25;

// Payload cache lifetime (data only changes when a new export is dropped in)
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;     // 1 hour

// ============================================================================
// ANALYSIS LIMITS
// ============================================================================

export const TOP_GAPS_PER_YEAR = 25;
export const TOP_DAYS_PER_YEAR = 10;
export const REPORT_TOP_GAPS = 20;
export const FIRST_MESSAGE_PREVIEW_LENGTH = 200;

// Rolling windows, in periods of the series they apply to
export const DAILY_WINDOWS = { short: 7, long: 28 } as const;
export const WEEKLY_WINDOWS = { short: 4, long: 12 } as const;
export const MONTHLY_WINDOW = 3;

/**
 * Conversation-length histogram buckets (inclusive bounds, first match wins)
 */
export const LENGTH_BUCKETS: ReadonlyArray<{ label: string; min: number; max: number }> = [
    { label: '1-2', min: 1, max: 2 },
    { label: '3-5', min: 3, max: 5 },
    { label: '6-10', min: 6, max: 10 },
    { label: '11-20', min: 11, max: 20 },
    { label: '21-50', min: 21, max: 50 },
    { label: '50+', min: 51, max: Number.POSITIVE_INFINITY },
];

// ============================================================================
// REGEX PATTERNS
// ============================================================================

export const CODE_FENCE = '```';
// Opening/closing fences plus the word token glued to them
export const CODE_FENCE_REGEX = /```(\w*)/g;
export const NUMERIC_STRING_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const UNSPECIFIED_LANGUAGE = 'unspecified';
export const UNTITLED_CONVERSATION = 'Untitled Conversation';
