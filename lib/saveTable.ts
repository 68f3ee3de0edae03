import { LogEntry } from '@/types/dailyLog';
import { RemoteTableStore } from './remoteTableStore';

export type TableWriter = Pick<RemoteTableStore, 'fetchRevision' | 'writeTable'>;

export type SaveOutcome =
    | { status: 'saved'; revisionId: string }
    | { status: 'no-revision' }
    | { status: 'rejected'; revisionId: string };

// Fresh revision lookup, then the write. No write without a revision, no retry.
export async function saveTable(
    store: TableWriter,
    entries: readonly LogEntry[],
    commitMessage?: string
): Promise<SaveOutcome> {
    const revisionId = await store.fetchRevision();
    if (!revisionId) {
        console.error('[Daily Log] No file revision available, save aborted');
        return { status: 'no-revision' };
    }

    const written = await store.writeTable(entries, revisionId, commitMessage);
    return written ? { status: 'saved', revisionId } : { status: 'rejected', revisionId };
}
