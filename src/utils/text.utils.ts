/**
 * Text Processing Utilities
 */

import GraphemeSplitter from "grapheme-splitter";
import * as iconv from 'iconv-lite';
import { CODE_FENCE, CODE_FENCE_REGEX, UNSPECIFIED_LANGUAGE } from './constants';

// ============================================================================
// DECODING
// ============================================================================

/**
 * Decodes raw export bytes as UTF-8. iconv drops a leading byte-order mark,
 * which JSON.parse would otherwise reject.
 */
export function decodeUtf8(buffer: Buffer): string {
    return iconv.decode(buffer, 'utf8');
}

// ============================================================================
// TEXT EXTRACTION
// ============================================================================

/**
 * Joins the string parts of a message. Attachments and other structured
 * parts carry no text and are skipped.
 */
export function extractText(parts: readonly unknown[]): string {
    return parts.filter((part): part is string => typeof part === 'string').join(' ');
}

/**
 * Cuts a preview down to `maxLength` characters, marking the cut with "..."
 */
export function truncatePreview(text: string, maxLength: number): string {
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

// ============================================================================
// CONTENT METRICS
// ============================================================================

const GRAPHEME_SPLITTER = new GraphemeSplitter();

/**
 * Whitespace-separated token count
 */
export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * User-perceived character count (an emoji with modifiers counts once)
 */
export function countCharacters(text: string): number {
    return text ? GRAPHEME_SPLITTER.countGraphemes(text) : 0;
}

export function hasCodeFence(text: string): boolean {
    return text.includes(CODE_FENCE);
}

/**
 * Languages declared on opening code fences, lowercased and deduplicated in
 * order of appearance. Fences alternate open/close; a bare opening fence
 * counts as "unspecified".
 */
export function detectCodeLanguages(text: string): string[] {
    if (!hasCodeFence(text)) {
        return [];
    }

    const languages = new Set<string>();
    let fenceIndex = 0;

    for (const match of text.matchAll(CODE_FENCE_REGEX)) {
        if (fenceIndex % 2 === 0) {
            const tag = match[1].toLowerCase();
            languages.add(tag || UNSPECIFIED_LANGUAGE);
        }
        fenceIndex += 1;
    }

    return Array.from(languages);
}
