import { z } from 'zod';
import type { TraceConfig } from './config';
import { sampleTraces, type SamplerOptions } from './sampler';
import { hopTrends } from './aggregate';
import type { RawTraceSource, TraceResponse } from './types';

export function traceRequestSchema(config: Pick<TraceConfig, 'maxTraces' | 'defaultTraces' | 'defaultIntervalSeconds'>) {
    return z.object({
        destination: z
            .string()
            .trim()
            .min(1, 'Destination is required')
            .max(253)
            .regex(/^[A-Za-z0-9.:-]+$/, 'Destination must be a hostname or IP address')
            .refine(d => !d.startsWith('-'), 'Destination must not start with "-"'),
        numTraces: z.number().int().min(1).max(config.maxTraces).default(config.defaultTraces),
        intervalSeconds: z.number().min(0).max(60).default(config.defaultIntervalSeconds),
    });
}

export type TraceRequest = z.infer<ReturnType<typeof traceRequestSchema>>;

export interface TraceDeps {
    config: TraceConfig;
    source: RawTraceSource;
    sleep?: SamplerOptions['sleep'];
    now?: SamplerOptions['now'];
}

export interface TraceOutcome {
    status: number;
    body: TraceResponse;
}

export async function runTraceRequest(body: unknown, deps: TraceDeps): Promise<TraceOutcome> {
    const parsed = traceRequestSchema(deps.config).safeParse(body);
    if (!parsed.success) {
        return {
            status: 400,
            body: {
                ok: false,
                error: 'Invalid trace request',
                issues: parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`),
            },
        };
    }

    const { destination, numTraces, intervalSeconds } = parsed.data;
    const samples = await sampleTraces(destination, deps.source, {
        numTraces,
        intervalMs: intervalSeconds * 1000,
        sleep: deps.sleep,
        now: deps.now,
    });

    return {
        status: 200,
        body: {
            ok: true,
            destination,
            numTraces,
            intervalSeconds,
            samples,
            trends: hopTrends(samples),
        },
    };
}
