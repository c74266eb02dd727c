import type { ChartRow, HopTrend, Rtt, SampledHop, SampleSeries } from './types';

function mean(values: number[]): number | undefined {
    if (values.length === 0) return undefined;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function defined(values: readonly Rtt[]): number[] {
    return values.filter((v): v is number => v !== undefined);
}

// Timeouts are left out; a hop with no answers at all has no average.
export function averageRtt(roundTripTimes: readonly Rtt[]): number | undefined {
    return mean(defined(roundTripTimes));
}

export function hopTrends(samples: SampledHop[]): HopTrend[] {
    const byHop = new Map<number, SampledHop[]>();
    for (const s of samples) {
        const bucket = byHop.get(s.hop);
        if (bucket) bucket.push(s);
        else byHop.set(s.hop, [s]);
    }

    return [...byHop.entries()]
        .sort(([a], [b]) => a - b)
        .map(([hop, records]) => {
            const averages = defined(records.map(r => r.averageRtt));
            return {
                hop,
                averageRtt: mean(averages),
                minRtt: averages.length ? Math.min(...averages) : undefined,
                maxRtt: averages.length ? Math.max(...averages) : undefined,
                samples: records.length,
                timeouts: records.length - averages.length,
            };
        });
}

export function sampleSeries(samples: SampledHop[]): SampleSeries[] {
    const bySample = new Map<number, SampleSeries>();
    for (const s of samples) {
        let series = bySample.get(s.sample);
        if (!series) {
            series = { sample: s.sample, timestamp: s.timestamp, points: [] };
            bySample.set(s.sample, series);
        }
        series.points.push({ hop: s.hop, averageRtt: s.averageRtt });
    }
    return [...bySample.values()].sort((a, b) => a.sample - b.sample);
}

export const seriesKey = (sample: number) => `trace${sample}`;

/**
 * One row per hop for a line chart, one column per trace run. Timeouts and
 * hops a run never reached are null so the chart breaks the line there.
 */
export function chartRows(series: SampleSeries[]): ChartRow[] {
    const hops = [...new Set(series.flatMap(s => s.points.map(p => p.hop)))].sort((a, b) => a - b);
    return hops.map(hop => {
        const row: ChartRow = { hop };
        for (const s of series) {
            const point = s.points.find(p => p.hop === hop);
            row[seriesKey(s.sample)] = point?.averageRtt ?? null;
        }
        return row;
    });
}

const CSV_HEADER = ['sample', 'timestamp', 'hop', 'address', 'hostname', 'rtt1', 'rtt2', 'rtt3', 'avg_rtt'];

function csvCell(value: string | number | undefined): string {
    if (value === undefined) return '';
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(samples: SampledHop[]): string {
    const rows = samples.map(s => [
        s.sample,
        s.timestamp,
        s.hop,
        s.address,
        s.hostname,
        ...s.roundTripTimes,
        s.averageRtt,
    ].map(csvCell).join(','));
    return [CSV_HEADER.join(','), ...rows].join('\n') + '\n';
}
