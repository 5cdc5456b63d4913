/**
 * Date and time parsing for the compact PA2 formats.
 * All dates are handled in UTC (00:00:00Z).
 */

/**
 * Parse YYYYMMDD to an ISO YYYY-MM-DD string.
 * Returns null unless the text is 8 digits naming a real calendar day.
 */
export function parseCompactDate(value: string): string | null {
    const match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    if (year < 1) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    // Date.UTC maps years 0-99 to 1900-1999
    date.setUTCFullYear(year);

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return formatIsoDate(date);
}

/**
 * Parse HHMM to an HH:MM string.
 * Returns null unless the text is 4 digits with HH < 24 and MM < 60.
 */
export function parseCompactTime(value: string): string | null {
    const match = value.match(/^(\d{2})(\d{2})$/);
    if (!match) return null;

    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    if (hours > 23 || minutes > 59) return null;

    return `${match[1]}:${match[2]}`;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
