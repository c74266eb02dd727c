import { NextResponse } from 'next/server';
import { loadTraceConfig } from '@/lib/trace/config';
import { createTracerouteSource } from '@/lib/trace/source';
import { runTraceRequest } from '@/lib/trace/service';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const noStore = { 'Cache-Control': 'no-store, max-age=0' };

export async function GET() {
    try {
        const config = loadTraceConfig();
        return NextResponse.json(
            {
                ok: true,
                defaults: {
                    numTraces: config.defaultTraces,
                    intervalSeconds: config.defaultIntervalSeconds,
                    maxTraces: config.maxTraces,
                },
            },
            { headers: noStore }
        );
    } catch (e) {
        console.error('[api/trace]', e);
        return NextResponse.json(
            { ok: false, error: 'Failed to load trace configuration', details: e instanceof Error ? e.message : String(e) },
            { status: 500, headers: noStore }
        );
    }
}

export async function POST(req: Request) {
    let body: unknown;
    try {
        body = await req.json();
    } catch {
        return NextResponse.json({ ok: false, error: 'Invalid JSON body' }, { status: 400, headers: noStore });
    }

    try {
        const config = loadTraceConfig();
        const source = createTracerouteSource(config);
        const { status, body: payload } = await runTraceRequest(body, { config, source });
        return NextResponse.json(payload, { status, headers: noStore });
    } catch (e) {
        console.error('[api/trace]', e);
        return NextResponse.json(
            { ok: false, error: 'Trace failed', details: e instanceof Error ? e.message : String(e) },
            { status: 500, headers: noStore }
        );
    }
}
