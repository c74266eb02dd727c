export type Rtt = number | undefined; // milliseconds, undefined = probe timed out

export type RttTriple = readonly [Rtt, Rtt, Rtt];

export interface HopRecord {
    readonly hop: number; // 1-based distance from the origin
    readonly address?: string; // absent when every probe timed out
    readonly hostname?: string; // only when distinct from address
    readonly roundTripTimes: RttTriple;
}

export interface RawTraceSource {
    // Resolves '' when the tracer could not be run; never rejects.
    execute(destination: string): Promise<string>;
}

export interface SampledHop extends HopRecord {
    readonly sample: number; // 1-based trace run
    readonly timestamp: string; // HH:mm:ss of the run
    readonly averageRtt?: number;
}

export interface HopTrend {
    hop: number;
    averageRtt?: number;
    minRtt?: number;
    maxRtt?: number;
    samples: number;
    timeouts: number;
}

export interface SeriesPoint {
    hop: number;
    averageRtt?: number;
}

export interface SampleSeries {
    sample: number;
    timestamp: string;
    points: SeriesPoint[];
}

// hop plus one `traceN` column per sample
export type ChartRow = { hop: number } & Record<string, number | null>;

export interface TraceReport {
    ok: true;
    destination: string;
    numTraces: number;
    intervalSeconds: number;
    samples: SampledHop[];
    trends: HopTrend[];
}

export interface TraceFailure {
    ok: false;
    error: string;
    issues?: string[];
    details?: string;
}

export type TraceResponse = TraceReport | TraceFailure;
