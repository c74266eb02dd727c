import { z } from 'zod';
import type { TraceResponse } from './types';

// JSON has no undefined: timed-out probes arrive as null inside the RTT tuple.
const rtt = z.number().nullable().transform(v => v ?? undefined);
const optionalNumber = z.number().nullish().transform(v => v ?? undefined);

const sampledHopSchema = z.object({
    hop: z.number().int(),
    address: z.string().optional(),
    hostname: z.string().optional(),
    roundTripTimes: z.tuple([rtt, rtt, rtt]),
    sample: z.number().int(),
    timestamp: z.string(),
    averageRtt: optionalNumber,
});

const hopTrendSchema = z.object({
    hop: z.number().int(),
    averageRtt: optionalNumber,
    minRtt: optionalNumber,
    maxRtt: optionalNumber,
    samples: z.number().int(),
    timeouts: z.number().int(),
});

const traceResponseSchema = z.discriminatedUnion('ok', [
    z.object({
        ok: z.literal(true),
        destination: z.string(),
        numTraces: z.number().int(),
        intervalSeconds: z.number(),
        samples: z.array(sampledHopSchema),
        trends: z.array(hopTrendSchema),
    }),
    z.object({
        ok: z.literal(false),
        error: z.string(),
        issues: z.array(z.string()).optional(),
        details: z.string().optional(),
    }),
]);

export const traceDefaultsSchema = z.object({
    ok: z.literal(true),
    defaults: z.object({
        numTraces: z.number().int(),
        intervalSeconds: z.number(),
        maxTraces: z.number().int(),
    }),
});

export function decodeTraceResponse(json: unknown): TraceResponse {
    const parsed = traceResponseSchema.safeParse(json);
    if (!parsed.success) {
        return { ok: false, error: 'Malformed response from server', issues: parsed.error.issues.map(i => i.message) };
    }
    return parsed.data;
}
