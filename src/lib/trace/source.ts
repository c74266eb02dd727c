import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { RawTraceSource } from './types';
import type { TraceConfig } from './config';

// The subset of ChildProcess the source relies on.
export interface TraceProcess {
    stdout: Readable | null;
    kill(): boolean;
    on(event: 'error', listener: (err: Error) => void): this;
    on(event: 'close', listener: (code: number | null) => void): this;
}

export type SpawnFn = (command: string, args: string[]) => TraceProcess;

const defaultSpawn: SpawnFn = (command, args) =>
    spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });

export type SourceConfig = Pick<TraceConfig, 'command' | 'args' | 'timeoutMs'>;

// Anything starting with '-' would be read by the tracer as an option.
export function isSafeDestination(destination: string): boolean {
    return /^[^-\s]\S*$/.test(destination);
}

export function createTracerouteSource(config: SourceConfig, spawnFn: SpawnFn = defaultSpawn): RawTraceSource {
    return {
        execute(destination: string): Promise<string> {
            if (!isSafeDestination(destination)) {
                console.warn(`[trace-source] Refusing destination ${JSON.stringify(destination)}`);
                return Promise.resolve('');
            }

            return new Promise<string>((resolve) => {
                let out = '';
                let settled = false;
                let timer: NodeJS.Timeout | undefined;
                const finish = (value: string) => {
                    if (settled) return;
                    settled = true;
                    clearTimeout(timer);
                    resolve(value);
                };

                let child: TraceProcess;
                try {
                    child = spawnFn(config.command, [...config.args, destination]);
                } catch (e) {
                    console.warn(`[trace-source] Error running ${config.command}: ${String(e)}`);
                    resolve('');
                    return;
                }

                timer = setTimeout(() => {
                    console.warn(`[trace-source] ${config.command} ${destination} timed out after ${config.timeoutMs}ms`);
                    child.kill();
                    finish('');
                }, config.timeoutMs);

                child.stdout?.setEncoding('utf8');
                child.stdout?.on('data', (d: string) => (out += d));
                child.on('error', (err) => {
                    console.warn(`[trace-source] Error running ${config.command}: ${err.message}`);
                    finish('');
                });
                // Non-zero exits still carry the hops that were reached.
                child.on('close', () => finish(out));
            });
        },
    };
}
