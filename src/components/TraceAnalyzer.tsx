'use client';
import React, { useState, useEffect, useMemo } from 'react';
import { parse } from '@/lib/trace/parsers';
import { sampleSeries } from '@/lib/trace/aggregate';
import { downloadCsv } from '@/lib/trace/download';
import { decodeTraceResponse, traceDefaultsSchema } from '@/lib/trace/wire';
import type { HopRecord, Rtt, TraceReport } from '@/lib/trace/types';
import { Activity, Download, Info, Loader2, Play, XCircle, Clock } from 'lucide-react';
import clsx from 'clsx';
import RttChart from './RttChart';

const formatRtt = (rtt: Rtt) => (rtt === undefined ? '*' : `${rtt.toFixed(3)} ms`);

function HopTable({ hops }: { hops: HopRecord[] }) {
    return (
        <div className="overflow-x-auto border border-slate-200 rounded-lg shadow-sm">
            <table className="w-full text-sm text-left">
                <thead className="bg-slate-50 text-slate-700 font-semibold border-b border-slate-200">
                    <tr>
                        <th className="px-4 py-3 w-12">Hop</th>
                        <th className="px-4 py-3">Host</th>
                        <th className="px-4 py-3 text-right">RTT 1</th>
                        <th className="px-4 py-3 text-right">RTT 2</th>
                        <th className="px-4 py-3 text-right">RTT 3</th>
                    </tr>
                </thead>
                <tbody className="divide-y divide-slate-100 bg-white">
                    {hops.map((h, idx) => (
                        <tr key={`${h.hop}-${idx}`} className="hover:bg-slate-50 transition-colors">
                            <td className="px-4 py-2 font-mono text-slate-500">{h.hop}</td>
                            <td className="px-4 py-2">
                                {h.address === undefined ? (
                                    <span className="font-mono text-slate-400">*</span>
                                ) : (
                                    <div className="flex flex-col">
                                        {h.hostname && <span className="font-medium text-slate-800">{h.hostname}</span>}
                                        <span className={clsx('font-mono', h.hostname ? 'text-xs text-slate-500' : 'text-slate-800')}>
                                            {h.address}
                                        </span>
                                    </div>
                                )}
                            </td>
                            {h.roundTripTimes.map((rtt, i) => (
                                <td key={i} className={clsx(
                                    'px-4 py-2 text-right font-mono text-xs',
                                    rtt === undefined ? 'text-slate-400' : 'text-slate-700'
                                )}>
                                    {formatRtt(rtt)}
                                </td>
                            ))}
                        </tr>
                    ))}
                </tbody>
            </table>
        </div>
    );
}

function TrendTable({ report }: { report: TraceReport }) {
    return (
        <div className="overflow-x-auto border border-slate-200 rounded-lg shadow-sm">
            <table className="w-full text-sm text-left">
                <thead className="bg-slate-50 text-slate-700 font-semibold border-b border-slate-200">
                    <tr>
                        <th className="px-4 py-3 w-12">Hop</th>
                        <th className="px-4 py-3 text-right">Average</th>
                        <th className="px-4 py-3 text-right">Min</th>
                        <th className="px-4 py-3 text-right">Max</th>
                        <th className="px-4 py-3 text-right">Timeouts</th>
                    </tr>
                </thead>
                <tbody className="divide-y divide-slate-100 bg-white">
                    {report.trends.map((t) => (
                        <tr key={t.hop} className="hover:bg-slate-50 transition-colors">
                            <td className="px-4 py-2 font-mono text-slate-500">{t.hop}</td>
                            <td className="px-4 py-2 text-right font-mono text-xs">{formatRtt(t.averageRtt)}</td>
                            <td className="px-4 py-2 text-right font-mono text-xs">{formatRtt(t.minRtt)}</td>
                            <td className="px-4 py-2 text-right font-mono text-xs">{formatRtt(t.maxRtt)}</td>
                            <td className={clsx(
                                'px-4 py-2 text-right font-mono text-xs',
                                t.timeouts > 0 ? 'text-amber-600' : 'text-slate-400'
                            )}>
                                {t.timeouts}/{t.samples}
                            </td>
                        </tr>
                    ))}
                </tbody>
            </table>
        </div>
    );
}

export default function TraceAnalyzer() {
    const [destination, setDestination] = useState('');
    const [numTraces, setNumTraces] = useState(3);
    const [intervalSeconds, setIntervalSeconds] = useState(5);
    const [maxTraces, setMaxTraces] = useState(10);

    const [running, setRunning] = useState(false);
    const [error, setError] = useState<string | null>(null);
    const [report, setReport] = useState<TraceReport | null>(null);

    // Paste pane: parse locally, no tracer involved
    const [pasted, setPasted] = useState('');
    const pastedHops = useMemo(() => parse(pasted), [pasted]);

    const series = useMemo(() => (report ? sampleSeries(report.samples) : []), [report]);

    useEffect(() => {
        fetch('/api/trace')
            .then(res => res.json())
            .then((json: unknown) => {
                const parsed = traceDefaultsSchema.safeParse(json);
                if (!parsed.success) return;
                const { defaults } = parsed.data;
                setNumTraces(defaults.numTraces);
                setIntervalSeconds(defaults.intervalSeconds);
                setMaxTraces(defaults.maxTraces);
            })
            .catch(e => console.error(e));
    }, []);

    const handleRun = async (e: React.FormEvent) => {
        e.preventDefault();
        setRunning(true);
        setError(null);
        try {
            const res = await fetch('/api/trace', {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({ destination, numTraces, intervalSeconds }),
            });
            const data = decodeTraceResponse(await res.json());
            if (data.ok) {
                setReport(data);
            } else {
                setError([data.error, ...(data.issues ?? [])].join(' - '));
            }
        } catch (err) {
            console.error(err);
            setError(err instanceof Error ? err.message : String(err));
        } finally {
            setRunning(false);
        }
    };

    return (
        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6 pb-20">
            {/* Input Pane */}
            <div className="flex flex-col gap-4">
                <form onSubmit={handleRun} className="bg-white p-4 rounded-xl shadow-sm border border-slate-200 flex flex-col gap-3">
                    <label className="block text-sm font-medium text-slate-700">Destination</label>
                    <input
                        type="text"
                        value={destination}
                        onChange={(e) => setDestination(e.target.value)}
                        placeholder="example.com"
                        className="w-full px-3 py-2 font-mono text-sm border border-slate-200 rounded-lg focus:ring-2 focus:ring-blue-500 outline-none"
                    />
                    <div className="grid grid-cols-2 gap-3">
                        <label className="text-xs text-slate-600 flex flex-col gap-1">
                            Traces
                            <input
                                type="number"
                                min={1}
                                max={maxTraces}
                                value={numTraces}
                                onChange={(e) => setNumTraces(parseInt(e.target.value, 10) || 1)}
                                className="px-3 py-2 font-mono text-sm border border-slate-200 rounded-lg"
                            />
                        </label>
                        <label className="text-xs text-slate-600 flex flex-col gap-1">
                            Interval (seconds)
                            <input
                                type="number"
                                min={0}
                                max={60}
                                value={intervalSeconds}
                                onChange={(e) => setIntervalSeconds(Number(e.target.value) || 0)}
                                className="px-3 py-2 font-mono text-sm border border-slate-200 rounded-lg"
                            />
                        </label>
                    </div>
                    <button
                        type="submit"
                        disabled={running || !destination.trim()}
                        className={clsx(
                            'inline-flex items-center justify-center gap-2 px-4 py-2 rounded-lg text-sm font-semibold transition-colors',
                            running || !destination.trim()
                                ? 'bg-slate-200 text-slate-500 cursor-not-allowed'
                                : 'bg-blue-600 text-white hover:bg-blue-700'
                        )}
                    >
                        {running ? <Loader2 className="w-4 h-4 animate-spin" /> : <Play className="w-4 h-4" />}
                        {running ? 'Tracing...' : 'Run traces'}
                    </button>
                    {running && (
                        <p className="text-xs text-slate-500 flex items-center gap-1">
                            <Clock className="w-3 h-3" />
                            {numTraces} traces, {intervalSeconds}s apart. This can take a while.
                        </p>
                    )}
                </form>

                <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200">
                    <label className="block text-sm font-medium text-slate-700 mb-2">
                        Or paste traceroute output
                    </label>
                    <textarea
                        className="w-full h-64 p-4 font-mono text-xs bg-slate-900 text-slate-50 rounded-lg resize-none focus:ring-2 focus:ring-blue-500 outline-none"
                        value={pasted}
                        onChange={(e) => setPasted(e.target.value)}
                        placeholder="traceroute to example.com (93.184.216.34), 30 hops max ..."
                    />
                    {pastedHops.length > 0 && (
                        <div className="mt-4">
                            <HopTable hops={pastedHops} />
                        </div>
                    )}
                </div>
            </div>

            {/* Results Pane */}
            <div className="flex flex-col gap-4">
                <div className="bg-white p-6 rounded-xl shadow-sm border border-slate-200 min-h-[500px]">
                    <div className="flex items-center justify-between mb-6">
                        <h2 className="text-xl font-bold text-slate-800 flex items-center gap-2">
                            <Activity className="text-blue-600" />
                            RTT Trends
                        </h2>
                        {report && report.samples.length > 0 && (
                            <button
                                type="button"
                                onClick={() => downloadCsv(report)}
                                className="inline-flex items-center gap-1 text-xs text-slate-600 bg-slate-100 hover:bg-slate-200 px-2 py-1 rounded"
                            >
                                <Download className="w-3 h-3" /> CSV
                            </button>
                        )}
                    </div>

                    {error && (
                        <div className="flex items-start gap-2 bg-red-50 border border-red-200 text-red-700 text-sm rounded-lg p-3 mb-4">
                            <XCircle className="w-4 h-4 mt-0.5 shrink-0" />
                            <span>{error}</span>
                        </div>
                    )}

                    {!report ? (
                        <div className="text-center text-slate-400 mt-20">
                            <Info className="w-12 h-12 mx-auto mb-2 opacity-20" />
                            <p>Run traces to a destination to begin analysis</p>
                        </div>
                    ) : report.samples.length === 0 ? (
                        <div className="text-center text-slate-400 mt-20">
                            <Info className="w-12 h-12 mx-auto mb-2 opacity-20" />
                            <p>No hops were recorded for {report.destination}</p>
                        </div>
                    ) : (
                        <div className="flex flex-col gap-8">
                            <div>
                                <h3 className="text-sm font-semibold text-slate-500 uppercase tracking-wider mb-4">
                                    Traceroute Analysis for {report.destination}
                                </h3>
                                <RttChart series={series} />
                            </div>
                            <div>
                                <h3 className="text-sm font-semibold text-slate-500 uppercase tracking-wider mb-4">
                                    Average RTT by hop
                                </h3>
                                <TrendTable report={report} />
                            </div>
                        </div>
                    )}
                </div>
            </div>
        </div>
    );
}
