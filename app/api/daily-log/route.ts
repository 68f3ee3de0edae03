import { NextRequest, NextResponse } from 'next/server';
import { getConfig } from '@/lib/config';
import { saveTableBodySchema } from '@/lib/logEntrySchema';
import { RemoteTableStore } from '@/lib/remoteTableStore';
import { saveTable } from '@/lib/saveTable';

export const dynamic = 'force-dynamic';

const createStore = () => new RemoteTableStore(getConfig());

export async function GET() {
    try {
        const result = await createStore().readTable();
        return NextResponse.json(result);
    } catch (err) {
        console.error('[Daily Log API] Load failed:', err);
        return NextResponse.json({ error: err instanceof Error ? err.message : String(err) }, { status: 500 });
    }
}

export async function PUT(req: NextRequest) {
    try {
        const body: unknown = await req.json().catch(() => null);
        const parsed = saveTableBodySchema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? `${issue.path.join('.')} ` : '';
            return NextResponse.json(
                { error: `Invalid table: ${where}${issue?.message ?? 'malformed body'}` },
                { status: 400 }
            );
        }

        const { entries, message } = parsed.data;
        const outcome = await saveTable(createStore(), entries, message);

        switch (outcome.status) {
            case 'saved':
                return NextResponse.json({ saved: true });
            case 'no-revision':
                return NextResponse.json({ error: 'Failed to fetch the file revision from GitHub.' }, { status: 502 });
            case 'rejected':
                return NextResponse.json(
                    { error: 'GitHub rejected the update. The file may have changed since it was loaded.' },
                    { status: 502 }
                );
        }
    } catch (err) {
        console.error('[Daily Log API] Save failed:', err);
        return NextResponse.json({ error: err instanceof Error ? err.message : String(err) }, { status: 500 });
    }
}
