import { describe, it, expect } from 'vitest';
import {
    formatClock,
    formatHours,
    hhmmToDecimal,
    normalizeTimeValue,
    parseClockInput,
    timeToDecimal,
} from './time';

describe('timeToDecimal', () => {
    it('converts 07:30 to 7.5', () => {
        expect(timeToDecimal({ hour: 7, minute: 30 })).toBe(7.5);
    });

    it('rounds to two decimal places', () => {
        expect(timeToDecimal({ hour: 0, minute: 5 })).toBe(0.08);
        expect(timeToDecimal({ hour: 23, minute: 59 })).toBe(23.98);
        expect(timeToDecimal({ hour: 1, minute: 20 })).toBe(1.33);
    });

    it('stays within half a hundredth of the exact value for every clock time', () => {
        for (let hour = 0; hour < 24; hour++) {
            for (let minute = 0; minute < 60; minute++) {
                const result = timeToDecimal({ hour, minute });
                expect(Math.abs(result - (hour + minute / 60))).toBeLessThanOrEqual(0.005);
                expect(Math.round(result * 100)).toBeCloseTo(result * 100, 9);
            }
        }
    });
});

describe('normalizeTimeValue', () => {
    it('normalizes H:MM and HH:MM text', () => {
        expect(normalizeTimeValue('8:15')).toEqual({ kind: 'normalized', hours: 8.25 });
        expect(normalizeTimeValue('07:30')).toEqual({ kind: 'normalized', hours: 7.5 });
        expect(normalizeTimeValue('12:00')).toEqual({ kind: 'normalized', hours: 12 });
    });

    it('converts values without a colon numerically', () => {
        expect(normalizeTimeValue('7.5')).toEqual({ kind: 'normalized', hours: 7.5 });
        expect(normalizeTimeValue(' 6 ')).toEqual({ kind: 'normalized', hours: 6 });
        expect(normalizeTimeValue(9.25)).toEqual({ kind: 'normalized', hours: 9.25 });
    });

    it.each(['abc', '1:2:3', '', 'a:30', '8:', ':30', 'seven'])('leaves %j unchanged', (value) => {
        expect(normalizeTimeValue(value)).toEqual({ kind: 'unchanged', original: value });
    });

    it('leaves non-finite numbers unchanged', () => {
        expect(normalizeTimeValue(Number.NaN)).toEqual({ kind: 'unchanged', original: Number.NaN });
    });
});

describe('hhmmToDecimal', () => {
    it('returns the hours or the original value', () => {
        expect(hhmmToDecimal('8:15')).toBe(8.25);
        expect(hhmmToDecimal('late')).toBe('late');
        expect(hhmmToDecimal('')).toBe('');
    });
});

describe('clock input helpers', () => {
    it('parses time input values', () => {
        expect(parseClockInput('07:30')).toEqual({ hour: 7, minute: 30 });
        expect(parseClockInput('')).toBeNull();
        expect(parseClockInput('24:00')).toBeNull();
        expect(parseClockInput('7:3')).toBeNull();
    });

    it('formats clock times with padding', () => {
        expect(formatClock({ hour: 7, minute: 5 })).toBe('07:05');
        expect(formatClock({ hour: 0, minute: 0 })).toBe('00:00');
    });

    it('formats decimal hours for display', () => {
        expect(formatHours(7.5)).toBe('7h 30m');
        expect(formatHours(0)).toBe('0h 00m');
        expect(formatHours('n/a')).toBe('n/a');
    });
});
