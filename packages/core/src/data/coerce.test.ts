import { describe, it, expect } from 'vitest';
import { addDays, monthKey, parseDate, roundTo, toNumber, yearOf } from './coerce.js';

describe('parseDate', () => {
    it('keeps plain calendar dates', () => {
        expect(parseDate('2024-03-01')).toBe('2024-03-01');
    });

    it('truncates timestamps to the calendar date', () => {
        expect(parseDate('2024-03-14T00:00:00')).toBe('2024-03-14');
    });

    it('rejects impossible dates', () => {
        expect(parseDate('2024-02-31')).toBeNull();
    });

    it('returns null for empty or non-string input', () => {
        expect(parseDate('')).toBeNull();
        expect(parseDate(null)).toBeNull();
        expect(parseDate(20240301)).toBeNull();
        expect(parseDate('not a date')).toBeNull();
    });

    it('accepts Date instances', () => {
        expect(parseDate(new Date(Date.UTC(2023, 11, 31)))).toBe('2023-12-31');
    });
});

describe('toNumber', () => {
    it('coerces numeric strings', () => {
        expect(toNumber('1500')).toBe(1500);
        expect(toNumber(' 12.5 ')).toBe(12.5);
    });

    it('falls back to zero for invalid input', () => {
        expect(toNumber('12,000')).toBe(0);
        expect(toNumber(null)).toBe(0);
        expect(toNumber(undefined)).toBe(0);
        expect(toNumber(Number.NaN)).toBe(0);
        expect(toNumber('')).toBe(0);
    });
});

describe('date helpers', () => {
    it('adds days across month boundaries', () => {
        expect(addDays('2024-01-20', 30)).toBe('2024-02-19');
        expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    });

    it('derives month and year keys', () => {
        expect(monthKey('2024-07-09')).toBe('2024-07');
        expect(yearOf('2024-07-09')).toBe(2024);
    });

    it('rounds to two decimals', () => {
        expect(roundTo(3.14159)).toBe(3.14);
        expect(roundTo(2.5, 0)).toBe(3);
    });
});
