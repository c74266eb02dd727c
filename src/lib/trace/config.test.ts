import { loadTraceConfig, TraceConfigError } from './config';

describe('Trace configuration', () => {
    test('Defaults', () => {
        expect(loadTraceConfig({})).toEqual({
            command: 'traceroute',
            args: ['-I'],
            timeoutMs: 60000,
            maxTraces: 10,
            defaultTraces: 3,
            defaultIntervalSeconds: 5,
        });
    });

    test('Reads overrides from the environment', () => {
        const config = loadTraceConfig({
            TRACEROUTE_BIN: '/usr/sbin/traceroute',
            TRACEROUTE_ARGS: '-n  -q 3',
            TRACE_MAX_TRACES: '20',
            TRACE_DEFAULT_INTERVAL_SECONDS: '0.5',
        });
        expect(config.command).toBe('/usr/sbin/traceroute');
        expect(config.args).toEqual(['-n', '-q', '3']);
        expect(config.maxTraces).toBe(20);
        expect(config.defaultIntervalSeconds).toBe(0.5);
    });

    test('Empty argument list is allowed', () => {
        expect(loadTraceConfig({ TRACEROUTE_ARGS: '' }).args).toEqual([]);
    });

    test('Rejects invalid numbers', () => {
        expect(() => loadTraceConfig({ TRACE_MAX_TRACES: 'abc' })).toThrow(TraceConfigError);
        expect(() => loadTraceConfig({ TRACEROUTE_TIMEOUT_MS: '-5' })).toThrow(/TRACEROUTE_TIMEOUT_MS/);
    });

    test('Rejects a default above the maximum', () => {
        expect(() => loadTraceConfig({ TRACE_DEFAULT_TRACES: '5', TRACE_MAX_TRACES: '2' }))
            .toThrow('Invalid trace configuration: TRACE_DEFAULT_TRACES: 5 exceeds TRACE_MAX_TRACES (2)');
    });
});
