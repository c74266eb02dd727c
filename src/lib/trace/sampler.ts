import { format } from 'date-fns';
import { parse } from './parsers';
import { averageRtt } from './aggregate';
import type { RawTraceSource, SampledHop } from './types';

export interface SamplerOptions {
    numTraces: number;
    intervalMs: number;
    onProgress?: (sample: number, total: number) => void;
    // Injected by tests
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Runs the tracer `numTraces` times, one after another, waiting `intervalMs`
 * between runs. Each parsed hop is tagged with its 1-based sample index and
 * the wall-clock time the run finished. A run that produced no output adds
 * nothing.
 */
export async function sampleTraces(
    destination: string,
    source: RawTraceSource,
    options: SamplerOptions
): Promise<SampledHop[]> {
    const sleep = options.sleep ?? defaultSleep;
    const now = options.now ?? (() => new Date());
    const all: SampledHop[] = [];

    console.info(`[sampler] Running ${options.numTraces} traceroutes to ${destination}...`);

    for (let i = 0; i < options.numTraces; i++) {
        if (i > 0) {
            console.info(`[sampler] Waiting ${options.intervalMs / 1000} seconds before next trace...`);
            await sleep(options.intervalMs);
        }

        const sample = i + 1;
        console.info(`[sampler] Trace ${sample}/${options.numTraces}...`);
        options.onProgress?.(sample, options.numTraces);

        const output = await source.execute(destination);
        const hops = parse(output);
        // Stamped once the tracer is done; a run can take tens of seconds.
        const timestamp = format(now(), 'HH:mm:ss');
        if (hops.length === 0) {
            console.warn(`[sampler] Trace ${sample} to ${destination} produced no hops`);
        }

        for (const hop of hops) {
            all.push({ ...hop, sample, timestamp, averageRtt: averageRtt(hop.roundTripTimes) });
        }
    }

    return all;
}
