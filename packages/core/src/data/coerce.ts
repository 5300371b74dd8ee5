const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Format a Date as a UTC calendar date.
 */
export function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Parse a loosely formatted date into `YYYY-MM-DD`.
 * Upstream APIs send plain dates (`2024-03-01`) or timestamps (`2024-03-01T00:00:00`);
 * anything unparseable becomes null rather than throwing.
 */
export function parseDate(value: unknown): string | null {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : toIsoDate(value);
    }
    if (typeof value !== 'string' || value.trim() === '') {
        return null;
    }

    const match = ISO_DATE_PREFIX.exec(value.trim());
    if (match) {
        const [, year, month, day] = match;
        const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
        // Reject rollovers such as 2024-02-31
        return toIsoDate(date) === `${year}-${month}-${day}` ? toIsoDate(date) : null;
    }

    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : toIsoDate(parsed);
}

/**
 * Coerce an API value to a finite number; invalid input becomes 0.
 */
export function toNumber(value: unknown): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : 0;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

export function roundTo(value: number, decimals: number = 2): number {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
}

export function addDays(isoDate: string, days: number): string {
    return toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * MS_PER_DAY));
}

export function monthKey(isoDate: string): string {
    return isoDate.slice(0, 7);
}

export function yearOf(isoDate: string): number {
    return Number(isoDate.slice(0, 4));
}
