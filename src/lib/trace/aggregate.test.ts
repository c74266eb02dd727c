import { averageRtt, chartRows, hopTrends, sampleSeries, seriesKey, toCsv } from './aggregate';
import type { Rtt, SampledHop } from './types';

function sampled(sample: number, hop: number, rtts: [Rtt, Rtt, Rtt], extra: Partial<SampledHop> = {}): SampledHop {
    return {
        hop,
        sample,
        timestamp: `12:00:0${sample}`,
        roundTripTimes: rtts,
        averageRtt: averageRtt(rtts),
        ...extra,
    };
}

describe('RTT aggregation', () => {
    test('averageRtt ignores timeouts', () => {
        expect(averageRtt([1, 2, undefined])).toBe(1.5);
        expect(averageRtt([0.334, 0.311, 0.302])).toBeCloseTo(0.315667, 5);
        expect(averageRtt([undefined, undefined, undefined])).toBeUndefined();
    });

    test('hopTrends groups by hop and counts timeouts', () => {
        const samples = [
            sampled(1, 2, [undefined, undefined, undefined]),
            sampled(1, 1, [1, 2, 3]),
            sampled(2, 1, [3, 4, 5]),
            sampled(2, 2, [10, undefined, 20]),
        ];

        expect(hopTrends(samples)).toEqual([
            { hop: 1, averageRtt: 3, minRtt: 2, maxRtt: 4, samples: 2, timeouts: 0 },
            { hop: 2, averageRtt: 15, minRtt: 15, maxRtt: 15, samples: 2, timeouts: 1 },
        ]);
    });

    test('hopTrends for a hop that never answered', () => {
        const [trend] = hopTrends([sampled(1, 3, [undefined, undefined, undefined])]);
        expect(trend.hop).toBe(3);
        expect(trend.averageRtt).toBeUndefined();
        expect(trend.minRtt).toBeUndefined();
        expect(trend.timeouts).toBe(1);
    });

    test('sampleSeries keeps one line per trace run', () => {
        const series = sampleSeries([
            sampled(2, 1, [4, 4, 4]),
            sampled(1, 1, [1, 1, 1]),
            sampled(1, 2, [undefined, undefined, undefined]),
            sampled(2, 2, [6, 6, 6]),
        ]);

        expect(series).toEqual([
            { sample: 1, timestamp: '12:00:01', points: [{ hop: 1, averageRtt: 1 }, { hop: 2, averageRtt: undefined }] },
            { sample: 2, timestamp: '12:00:02', points: [{ hop: 1, averageRtt: 4 }, { hop: 2, averageRtt: 6 }] },
        ]);
    });
});

describe('Chart rows', () => {
    test('One row per hop with a column per trace and null for timeouts', () => {
        const series = sampleSeries([
            sampled(1, 1, [1, 1, 1]),
            sampled(1, 2, [undefined, undefined, undefined]),
            sampled(1, 3, [9, 9, 9]),
            sampled(2, 3, [6, 6, 6]),
            sampled(2, 1, [4, 4, 4]),
        ]);

        expect(chartRows(series)).toEqual([
            { hop: 1, trace1: 1, trace2: 4 },
            { hop: 2, trace1: null, trace2: null },
            { hop: 3, trace1: 9, trace2: 6 },
        ]);
    });

    test('Column names follow the sample index', () => {
        expect(seriesKey(3)).toBe('trace3');
    });

    test('No samples means no rows', () => {
        expect(chartRows([])).toEqual([]);
    });
});

describe('CSV export', () => {
    test('Writes one row per record with empty cells for absent values', () => {
        const csv = toCsv([
            sampled(1, 1, [1, undefined, 3], { address: '10.0.0.1', hostname: 'a,b' }),
            sampled(1, 2, [undefined, undefined, undefined]),
        ]);

        expect(csv.split('\n')).toEqual([
            'sample,timestamp,hop,address,hostname,rtt1,rtt2,rtt3,avg_rtt',
            '1,12:00:01,1,10.0.0.1,"a,b",1,,3,2',
            '1,12:00:01,2,,,,,,',
            '',
        ]);
    });

    test('Doubles embedded quotes', () => {
        const csv = toCsv([sampled(1, 1, [2, 2, 2], { address: '10.0.0.1', hostname: 'say "hi"' })]);
        expect(csv.split('\n')[1]).toBe('1,12:00:01,1,10.0.0.1,"say ""hi""",2,2,2,2');
    });

    test('Empty input is just the header', () => {
        expect(toCsv([])).toBe('sample,timestamp,hop,address,hostname,rtt1,rtt2,rtt3,avg_rtt\n');
    });
});
