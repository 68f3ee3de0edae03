export class CsvParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CsvParseError';
    }
}

const NEEDS_QUOTES = /[",\r\n]/;

const escapeField = (field: string): string => {
    if (!NEEDS_QUOTES.test(field)) return field;
    return `"${field.replace(/"/g, '""')}"`;
};

// One line per record, "\n" terminated, quoting only the fields that need it.
export function buildCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
    const lines = [header, ...rows].map(row => row.map(escapeField).join(','));
    return lines.join('\n') + '\n';
}

/**
 * Splits CSV text into records of raw field strings.
 * Blank lines are skipped; a quoted field may span lines.
 */
export function parseCsv(text: string): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;
    let fieldStarted = false;

    const endRecord = () => {
        if (fieldStarted || record.length > 0) {
            record.push(field);
            records.push(record);
        }
        record = [];
        field = '';
        fieldStarted = false;
    };

    for (let i = 0; i < text.length; i++) {
        const char = text[i];

        if (inQuotes) {
            if (char !== '"') {
                field += char;
            } else if (text[i + 1] === '"') {
                field += '"';
                i++;
            } else {
                inQuotes = false;
            }
            continue;
        }

        if (char === '"') {
            if (field.length > 0) throw new CsvParseError(`Unexpected quote in record ${records.length + 1}`);
            inQuotes = true;
            fieldStarted = true;
        } else if (char === ',') {
            record.push(field);
            field = '';
            fieldStarted = true;
        } else if (char === '\n' || char === '\r') {
            if (char === '\r' && text[i + 1] === '\n') i++;
            endRecord();
        } else {
            field += char;
            fieldStarted = true;
        }
    }

    if (inQuotes) throw new CsvParseError('Unterminated quoted field');
    endRecord();

    return records;
}
