import { toCsv } from './aggregate';
import type { TraceReport } from './types';

export interface DownloadDeps {
    createLink: () => { href: string; download: string; click(): void };
    createObjectURL: (blob: Blob) => string;
    revokeObjectURL: (url: string) => void;
    defer: (fn: () => void) => void;
}

const browserDeps = (): DownloadDeps => ({
    createLink: () => document.createElement('a'),
    createObjectURL: (blob) => URL.createObjectURL(blob),
    revokeObjectURL: (url) => URL.revokeObjectURL(url),
    defer: (fn) => {
        setTimeout(fn, 0);
    },
});

export function csvFileName(destination: string): string {
    return `trace_${destination.replace(/\./g, '-')}.csv`;
}

export function downloadCsv(report: TraceReport, deps: DownloadDeps = browserDeps()): void {
    const url = deps.createObjectURL(new Blob([toCsv(report.samples)], { type: 'text/csv' }));
    const link = deps.createLink();
    link.href = url;
    link.download = csvFileName(report.destination);
    link.click();
    // Revoking in the same tick can cancel the download in some browsers
    deps.defer(() => deps.revokeObjectURL(url));
}
