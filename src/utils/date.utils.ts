/**
 * Date Utilities
 *
 * Calendar maths works on day keys ("YYYY-MM-DD") and on "wall clock" dates:
 * instants shifted by a fixed UTC offset and then read with the UTC getters,
 * so nothing depends on the host time zone.
 */

import { MS_PER_DAY, MS_PER_MINUTE, NUMERIC_STRING_REGEX } from './constants';

// Years 0001-9999, so every accepted date has a four-digit day key
const MIN_DATE_MS = -62_135_596_800_000;
const MAX_DATE_MS = 253_402_300_799_999;

// ============================================================================
// TIMESTAMP PARSING
// ============================================================================

/**
 * Parses an export timestamp: epoch seconds as a number or numeric string,
 * or an ISO-8601 string. Returns null for anything unusable.
 */
export function parseTimestamp(value: unknown): Date | null {
    let ms: number;

    if (typeof value === 'number') {
        ms = value * 1000;
    } else if (typeof value === 'string') {
        const trimmed = value.trim();
        if (!trimmed) return null;
        ms = NUMERIC_STRING_REGEX.test(trimmed) ? Number(trimmed) * 1000 : Date.parse(trimmed);
    } else {
        return null;
    }

    if (!Number.isFinite(ms) || ms < MIN_DATE_MS || ms > MAX_DATE_MS) {
        return null;
    }
    return new Date(ms);
}

// ============================================================================
// WALL CLOCK
// ============================================================================

/**
 * Shifts an instant so its UTC fields read as the wall clock at the given offset
 */
export function toWallClock(date: Date, utcOffsetMinutes: number = 0): Date {
    return new Date(date.getTime() + utcOffsetMinutes * MS_PER_MINUTE);
}

/**
 * Day key of an instant at the given offset
 */
export function toDayKey(date: Date, utcOffsetMinutes: number = 0): string {
    return toWallClock(date, utcOffsetMinutes).toISOString().slice(0, 10);
}

/**
 * ISO-8601 timestamp with an explicit offset, e.g. "2024-01-15T10:00:00+02:00"
 */
export function formatTimestamp(date: Date, utcOffsetMinutes: number = 0): string {
    const wall = toWallClock(date, utcOffsetMinutes).toISOString().slice(0, 19);
    const sign = utcOffsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(utcOffsetMinutes);
    const hours = String(Math.floor(abs / 60)).padStart(2, '0');
    const minutes = String(abs % 60).padStart(2, '0');
    return `${wall}${sign}${hours}:${minutes}`;
}

/**
 * "YYYY-MM-DD HH:MM:SS" for terminal output
 */
export function formatDisplayTimestamp(date: Date, utcOffsetMinutes: number = 0): string {
    return toWallClock(date, utcOffsetMinutes).toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Weekday index of an instant, 0 = Monday .. 6 = Sunday
 */
export function weekdayIndex(date: Date, utcOffsetMinutes: number = 0): number {
    return (toWallClock(date, utcOffsetMinutes).getUTCDay() + 6) % 7;
}

export function hourOfDay(date: Date, utcOffsetMinutes: number = 0): number {
    return toWallClock(date, utcOffsetMinutes).getUTCHours();
}

// ============================================================================
// DAY KEYS
// ============================================================================

const DAY_KEY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validates a "YYYY-MM-DD" string, rejecting impossible dates like 2023-02-30
 */
export function isDayKey(value: string): boolean {
    const match = DAY_KEY_REGEX.exec(value);
    if (!match) return false;
    const month = Number(match[2]);
    const day = Number(match[3]);
    return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(Number(match[1]), month);
}

export function dayKeyToMs(key: string): number {
    return Date.parse(`${key}T00:00:00Z`);
}

export function addDays(key: string, days: number): string {
    return new Date(dayKeyToMs(key) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Whole days from one day key to another (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
    return Math.round((dayKeyToMs(to) - dayKeyToMs(from)) / MS_PER_DAY);
}

export function yearOf(key: string): number {
    return Number(key.slice(0, 4));
}

// ============================================================================
// CALENDAR
// ============================================================================

export function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInYear(year: number): number {
    return isLeapYear(year) ? 366 : 365;
}

/**
 * Days in a month, month being 1-12
 */
export function daysInMonth(year: number, month: number): number {
    // Day 0 of the next month is the last day of this one
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Monday of the ISO week containing the day
 */
export function mondayOf(key: string): string {
    const weekday = (new Date(dayKeyToMs(key)).getUTCDay() + 6) % 7;
    return addDays(key, -weekday);
}

/**
 * ISO week key, e.g. "2024-W03". The year is the ISO week-numbering year,
 * which differs from the calendar year around New Year.
 */
export function isoWeekKey(key: string): string {
    const monday = mondayOf(key);
    // The Thursday of a week decides which year it belongs to
    const thursday = addDays(monday, 3);
    const isoYear = yearOf(thursday);
    // Week 1 is the week holding January 4th
    const weekOneMonday = mondayOf(`${isoYear}-01-04`);
    const week = Math.floor(daysBetween(weekOneMonday, monday) / 7) + 1;
    return `${isoYear}-W${String(week).padStart(2, '0')}`;
}
