/**
 * Numeric Helpers
 */

/**
 * Rounds to a fixed number of decimal places (2 by default)
 */
export function round(value: number, digits: number = 2): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

/**
 * Division that yields `fallback` instead of Infinity/NaN for a zero denominator
 */
export function safeDivide(numerator: number, denominator: number, fallback: number = 0): number {
    return denominator ? numerator / denominator : fallback;
}

/**
 * safeDivide, rounded
 */
export function safeRatio(numerator: number, denominator: number, digits: number = 2): number {
    return denominator ? round(numerator / denominator, digits) : 0;
}

export function sum(values: readonly number[]): number {
    let total = 0;
    for (const value of values) total += value;
    return total;
}
