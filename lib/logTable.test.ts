import { describe, it, expect } from 'vitest';
import { EntryInput, LOG_HEADERS } from '@/types/dailyLog';
import { makeEntry } from '@/test-helpers';
import { appendEntry, createEntry, emptyTable, parseTable, serializeTable, TableParseError } from './logTable';

const HEADER = LOG_HEADERS.join(',');

const INPUT: EntryInput = {
    date: '2024-03-04',
    screenTime: { hour: 2, minute: 30 },
    studyTime: { hour: 3, minute: 15 },
    wakeUp: { hour: 7, minute: 30 },
    studyQuality: 7,
    flags: {
        ordinaryDay: 'Yes',
        meditation: 'Yes',
        morningStudy: 'No',
        morningPhone: 'No',
        lunchPhone: 'Yes',
        dinnerPhone: 'No',
        running: 'Yes',
        p: 'No',
    },
    notes: '',
    planStrategies: '',
};

describe('createEntry', () => {
    it('converts clock times and derives the weekday', () => {
        expect(createEntry(INPUT)).toEqual(makeEntry());
    });

    it('stores a 07:30 wake-up as 7.5', () => {
        expect(createEntry(INPUT).morningWakeUpHour).toBe(7.5);
    });
});

describe('appendEntry', () => {
    it('keeps both entries for the same date', () => {
        const first = makeEntry({ notes: 'first' });
        const second = makeEntry({ notes: 'second' });
        const table = appendEntry(appendEntry(emptyTable(), first), second);

        expect(table).toEqual([first, second]);
    });

    it('leaves the input table untouched', () => {
        const table = [makeEntry()];
        appendEntry(table, makeEntry({ date: '2024-03-05', weekday: 'Tuesday' }));
        expect(table).toHaveLength(1);
    });
});

describe('serializeTable', () => {
    it('writes the fixed header and one line per entry', () => {
        const csv = serializeTable([makeEntry({ notes: 'Felt good, slept early' })]);

        expect(csv).toBe(
            `${HEADER}\n` +
            '2024-03-04,Monday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,7.5,"Felt good, slept early",\n'
        );
    });

    it('writes only the header for an empty table', () => {
        expect(serializeTable([])).toBe(`${HEADER}\n`);
    });
});

describe('parseTable', () => {
    it('reads back what was written', () => {
        const entries = [
            makeEntry({ notes: 'Line one\nline "two"' }),
            makeEntry({ date: '2024-03-05', weekday: 'Tuesday', screenTime: 0, planStrategies: 'Phone in drawer' }),
        ];

        expect(parseTable(serializeTable(entries))).toEqual(entries);
    });

    it('returns an empty table for empty text or a header alone', () => {
        expect(parseTable('')).toEqual([]);
        expect(parseTable(`${HEADER}\n`)).toEqual([]);
    });

    it('normalizes legacy wake-up times and recomputes the weekday', () => {
        const text = `${HEADER}\n2024-03-04 00:00:00,Tuesday,Yes,1:30,2,6,Yes,No,No,Yes,No,Yes,No,8:15,,\n`;

        expect(parseTable(text)).toEqual([
            makeEntry({
                screenTime: '1:30',
                studyTime: 2,
                studyQuality: 6,
                morningWakeUpHour: 8.25,
            }),
        ]);
    });

    it('keeps an unreadable wake-up value as text', () => {
        const text = `${HEADER}\n2024-03-04,Monday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,early,,\n`;
        expect(parseTable(text)[0].morningWakeUpHour).toBe('early');
    });

    it('tolerates a file without the wake-up column', () => {
        const header = LOG_HEADERS.filter(h => h !== 'Morning Wake Up Hour').join(',');
        const text = `${header}\n2024-03-04,Monday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,,\n`;

        expect(parseTable(text)).toEqual([makeEntry({ morningWakeUpHour: '' })]);
    });

    it('rejects a file missing any other column', () => {
        const header = LOG_HEADERS.filter(h => h !== 'Notes').join(',');
        expect(() => parseTable(`${header}\n`)).toThrow('Missing columns: Notes');
    });

    it('keeps flags outside Yes/No as read', () => {
        const text = `${HEADER}\n2024-03-04,Monday,Maybe,2.5,3.25,7,yes,No,No,Yes,No,Yes,,7.5,,\n`;

        expect(parseTable(text)).toEqual([makeEntry({ ordinaryDay: 'Maybe', meditation: 'yes', p: '' })]);
    });

    it('keeps a blank or out-of-range study quality', () => {
        const text =
            `${HEADER}\n` +
            '2024-03-04,Monday,Yes,2.5,3.25,,Yes,No,No,Yes,No,Yes,No,7.5,,\n' +
            '2024-03-04,Monday,Yes,2.5,3.25,11,Yes,No,No,Yes,No,Yes,No,7.5,,\n' +
            '2024-03-04,Monday,Yes,2.5,3.25,good,Yes,No,No,Yes,No,Yes,No,7.5,,\n';

        expect(parseTable(text).map(e => e.studyQuality)).toEqual(['', 11, 'good']);
    });

    it('writes legacy cells back unchanged', () => {
        const text = `${HEADER}\n2024-03-04,Monday,Maybe,2.5,3.25,,yes,No,No,Yes,No,Yes,No,7.5,,\n`;
        expect(serializeTable(parseTable(text))).toBe(text);
    });

    it('reads month-first and slash-separated dates', () => {
        const text =
            `${HEADER}\n` +
            '3/4/2024,Monday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,7.5,,\n' +
            '2024/3/5,Tuesday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,7.5,,\n';

        expect(parseTable(text)).toEqual([
            makeEntry(),
            makeEntry({ date: '2024-03-05', weekday: 'Tuesday' }),
        ]);
    });

    it('rejects an invalid date', () => {
        const text = `${HEADER}\nyesterday,Monday,Yes,2.5,3.25,7,Yes,No,No,Yes,No,Yes,No,7.5,,\n`;
        expect(() => parseTable(text)).toThrow(TableParseError);
        expect(() => parseTable(text)).toThrow('Row 2: invalid date "yesterday"');
    });
});
