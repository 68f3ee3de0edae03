import { describe, it, expect } from 'vitest';
import { buildCsv, CsvParseError, parseCsv } from './csv';

describe('buildCsv', () => {
    it('quotes only fields that need it', () => {
        const csv = buildCsv(['a', 'b'], [['1', 'x,y'], ['2', 'say "hi"']]);
        expect(csv).toBe('a,b\n1,"x,y"\n2,"say ""hi"""\n');
    });

    it('quotes fields with line breaks', () => {
        expect(buildCsv(['note'], [['line1\nline2']])).toBe('note\n"line1\nline2"\n');
    });
});

describe('parseCsv', () => {
    it('reads quoted fields back', () => {
        expect(parseCsv('a,b\n1,"x,y"\n2,"say ""hi"""\n')).toEqual([
            ['a', 'b'],
            ['1', 'x,y'],
            ['2', 'say "hi"'],
        ]);
    });

    it('keeps line breaks inside quotes', () => {
        expect(parseCsv('a\n"line1\nline2"\n')).toEqual([['a'], ['line1\nline2']]);
    });

    it('handles CRLF and skips blank lines', () => {
        expect(parseCsv('a,b\r\n\r\n1,2\r\n')).toEqual([['a', 'b'], ['1', '2']]);
    });

    it('keeps trailing empty fields', () => {
        expect(parseCsv('a,,\n')).toEqual([['a', '', '']]);
    });

    it('reads a final record without a newline', () => {
        expect(parseCsv('a,b\n1,2')).toEqual([['a', 'b'], ['1', '2']]);
    });

    it('returns nothing for empty text', () => {
        expect(parseCsv('')).toEqual([]);
    });

    it('rejects an unterminated quote', () => {
        expect(() => parseCsv('a\n"abc')).toThrow(CsvParseError);
    });

    it('rejects a quote in the middle of a field', () => {
        expect(() => parseCsv('ab"c\n')).toThrow('Unexpected quote in record 1');
    });
});
