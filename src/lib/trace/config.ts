import { z } from 'zod';

export class TraceConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid trace configuration: ${issues.join('; ')}`);
        this.name = 'TraceConfigError';
    }
}

const envSchema = z.object({
    TRACEROUTE_BIN: z.string().min(1).default('traceroute'),
    TRACEROUTE_ARGS: z.string().default('-I'),
    TRACEROUTE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    TRACE_MAX_TRACES: z.coerce.number().int().min(1).max(100).default(10),
    TRACE_DEFAULT_TRACES: z.coerce.number().int().min(1).default(3),
    TRACE_DEFAULT_INTERVAL_SECONDS: z.coerce.number().min(0).max(60).default(5),
});

export interface TraceConfig {
    command: string;
    args: string[];
    timeoutMs: number;
    maxTraces: number;
    defaultTraces: number;
    defaultIntervalSeconds: number;
}

export function loadTraceConfig(env: Record<string, string | undefined> = process.env): TraceConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new TraceConfigError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const e = parsed.data;
    if (e.TRACE_DEFAULT_TRACES > e.TRACE_MAX_TRACES) {
        throw new TraceConfigError([
            `TRACE_DEFAULT_TRACES: ${e.TRACE_DEFAULT_TRACES} exceeds TRACE_MAX_TRACES (${e.TRACE_MAX_TRACES})`,
        ]);
    }

    return {
        command: e.TRACEROUTE_BIN,
        args: e.TRACEROUTE_ARGS.split(/\s+/).filter(Boolean),
        timeoutMs: e.TRACEROUTE_TIMEOUT_MS,
        maxTraces: e.TRACE_MAX_TRACES,
        defaultTraces: e.TRACE_DEFAULT_TRACES,
        defaultIntervalSeconds: e.TRACE_DEFAULT_INTERVAL_SECONDS,
    };
}
