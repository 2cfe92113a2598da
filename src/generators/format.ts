/**
 * @file Wire Format Helpers
 *
 * Timestamp layouts and value helpers shared by the generators. The
 * layouts are part of the output contract: downstream extraction patterns
 * match on them literally.
 *
 * @module generators
 */

import { format } from 'date-fns';

/** `19/Oct/2026:09:10:00 +0200` (Common Log Format). */
export function clfTime_format(date: Date): string {
    return format(date, 'dd/MMM/yyyy:HH:mm:ss xx');
}

/** `Oct 19 09:10:00` (syslog, local time). */
export function syslogTime_format(date: Date): string {
    return format(date, 'MMM dd HH:mm:ss');
}

/** `2026-10-19 07:10:00.123` in UTC (PostgreSQL `log_line_prefix = '%m'`). */
export function postgresTime_format(date: Date): string {
    return date.toISOString().replace('T', ' ').slice(0, 23);
}

/** `2026-10-19 09:10:00` (CDN edge logs, local time). */
export function cdnTime_format(date: Date): string {
    return format(date, 'yyyy-MM-dd HH:mm:ss');
}

/** `20261019_091000`, used in rotated file names. */
export function fileStamp_format(date: Date): string {
    return format(date, 'yyyyMMdd_HHmmss');
}

/**
 * Clamp a sampled value into [min, max]; NaN collapses to `min`.
 */
export function value_clamp(value: number, min: number, max: number = Number.POSITIVE_INFINITY): number {
    if (Number.isNaN(value)) return min;
    return Math.max(min, Math.min(max, value));
}

/** Round to `digits` decimals (JSON fields). */
export function value_round(value: number, digits: number): number {
    const factor: number = 10 ** digits;
    return Math.round(value * factor) / factor;
}
