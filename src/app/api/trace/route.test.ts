import { GET, POST } from './route';

const url = 'http://localhost/api/trace';

function post(body: string) {
    return POST(new Request(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body }));
}

describe('Trace API route', () => {
    beforeEach(() => {
        vi.stubEnv('TRACE_MAX_TRACES', '10');
        vi.stubEnv('TRACE_DEFAULT_TRACES', '3');
        vi.stubEnv('TRACE_DEFAULT_INTERVAL_SECONDS', '5');
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    test('GET returns the configured defaults', async () => {
        const res = await GET();
        expect(res.status).toBe(200);
        expect(res.headers.get('Cache-Control')).toBe('no-store, max-age=0');
        expect(await res.json()).toEqual({
            ok: true,
            defaults: { numTraces: 3, intervalSeconds: 5, maxTraces: 10 },
        });
    });

    test('POST with a broken body is a 400', async () => {
        const res = await post('{');
        expect(res.status).toBe(400);
        expect(res.headers.get('Cache-Control')).toBe('no-store, max-age=0');
        expect(await res.json()).toEqual({ ok: false, error: 'Invalid JSON body' });
    });

    test('POST with an invalid request is a 400 and runs nothing', async () => {
        const res = await post(JSON.stringify({ destination: '-x' }));
        expect(res.status).toBe(400);
        expect(res.headers.get('Cache-Control')).toBe('no-store, max-age=0');
        expect(await res.json()).toEqual({
            ok: false,
            error: 'Invalid trace request',
            issues: ['destination: Destination must not start with "-"'],
        });
    });

    test('Bad configuration turns into 500 envelopes', async () => {
        vi.stubEnv('TRACE_MAX_TRACES', '0');

        const getRes = await GET();
        expect(getRes.status).toBe(500);
        expect(getRes.headers.get('Cache-Control')).toBe('no-store, max-age=0');
        const getBody = await getRes.json();
        expect(getBody.ok).toBe(false);
        expect(getBody.error).toBe('Failed to load trace configuration');
        expect(getBody.details).toContain('TRACE_MAX_TRACES');

        const postRes = await post(JSON.stringify({ destination: 'example.com' }));
        expect(postRes.status).toBe(500);
        expect(postRes.headers.get('Cache-Control')).toBe('no-store, max-age=0');
        const postBody = await postRes.json();
        expect(postBody.ok).toBe(false);
        expect(postBody.error).toBe('Trace failed');
        expect(postBody.details).toContain('TRACE_MAX_TRACES');

        expect(console.error).toHaveBeenCalledTimes(2);
    });
});
