import { describe, it, expect, vi, beforeEach } from 'vitest';
import { makeEntry } from '@/test-helpers';
import { LogEntry } from '@/types/dailyLog';
import { saveTable, TableWriter } from './saveTable';

function fakeWriter(revision: string | null, written: boolean) {
    const fetchRevision = vi.fn(async (): Promise<string | null> => revision);
    const writeTable = vi.fn(async (_entries: readonly LogEntry[], _revisionId: string, _message?: string) => written);
    const writer: TableWriter = { fetchRevision, writeTable };
    return { writer, fetchRevision, writeTable };
}

beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('saveTable', () => {
    it('writes with the revision it just fetched', async () => {
        const { writer, writeTable } = fakeWriter('rev-1', true);
        const entries = [makeEntry()];

        await expect(saveTable(writer, entries, 'Add entry')).resolves.toEqual({ status: 'saved', revisionId: 'rev-1' });
        expect(writeTable).toHaveBeenCalledWith(entries, 'rev-1', 'Add entry');
    });

    it('never writes when no revision is available', async () => {
        const { writer, writeTable } = fakeWriter(null, true);

        await expect(saveTable(writer, [makeEntry()])).resolves.toEqual({ status: 'no-revision' });
        expect(writeTable).not.toHaveBeenCalled();
    });

    it('reports a rejected write without retrying', async () => {
        const { writer, fetchRevision, writeTable } = fakeWriter('rev-1', false);

        await expect(saveTable(writer, [makeEntry()])).resolves.toEqual({ status: 'rejected', revisionId: 'rev-1' });
        expect(fetchRevision).toHaveBeenCalledTimes(1);
        expect(writeTable).toHaveBeenCalledTimes(1);
    });

    it('fetches a fresh revision for every save', async () => {
        const { writer, fetchRevision } = fakeWriter('rev-1', true);

        await saveTable(writer, [makeEntry()]);
        await saveTable(writer, [makeEntry(), makeEntry()]);
        expect(fetchRevision).toHaveBeenCalledTimes(2);
    });
});
