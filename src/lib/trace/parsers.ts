import type { HopRecord, Rtt, RttTriple } from './types';

const TIMEOUT_MARKER = '*';
const UNIT_MARKER = 'ms';
const PROBES_PER_HOP = 3;

// Prefix match: "10.0.0.1" and "(10.0.0.1)" once stripped.
const IPV4_SHAPE = /^\d{1,3}(?:\.\d{1,3}){3}/;

export function stripParens(token: string): string {
    return token.replace(/^[()]+|[()]+$/g, '');
}

export function isIpv4Shaped(token: string): boolean {
    return IPV4_SHAPE.test(stripParens(token));
}

// "0.334" -> 0.334, "<1" -> 1, "*" -> undefined, "abc" -> undefined
export function parseRtt(token: string): Rtt {
    if (token === TIMEOUT_MARKER) return undefined;
    const cleaned = token.replace(/[^0-9.]/g, '');
    if (cleaned === '') return undefined;
    const value = Number(cleaned);
    return Number.isNaN(value) ? undefined : value;
}

function parseHopNumber(token: string): number | undefined {
    if (!/^\d+$/.test(token)) return undefined;
    return parseInt(token, 10);
}

function toTriple(values: Rtt[]): RttTriple {
    const padded = [...values];
    while (padded.length < PROBES_PER_HOP) padded.push(undefined);
    return [padded[0], padded[1], padded[2]];
}

// Every "ms" marks the token before it as a probe time. A bare "*" with no
// "ms" after it is not counted, so later values shift left.
function extractTimings(tokens: string[]): RttTriple {
    const rtts: Rtt[] = [];
    let previous: string | undefined;
    for (const token of tokens) {
        if (token === UNIT_MARKER && previous !== undefined) {
            rtts.push(parseRtt(previous));
        }
        previous = token;
    }
    return toTriple(rtts);
}

// Tokens between the hop number and the timing value in front of the first "ms".
// In " 1  rtr.local (10.0.0.1)  0.334 ms ..." that is [rtr.local, (10.0.0.1)]:
// the token right before "ms" is the first RTT, not part of the identity.
function identitySpan(tokens: string[]): string[] {
    const firstUnit = tokens.indexOf(UNIT_MARKER);
    const end = firstUnit === -1 ? tokens.length : firstUnit - 1;
    // " 4  5.5 ms ..." leaves nothing before the RTT; scan the whole rest instead
    return end > 1 ? tokens.slice(1, end) : tokens.slice(1);
}

function extractIdentity(span: string[]): { address?: string; hostname?: string } {
    for (let i = 0; i < span.length; i++) {
        // Addresses usually come wrapped as "(10.0.0.1)" after the name
        const candidate = stripParens(span[i]);
        if (!IPV4_SHAPE.test(candidate)) continue;

        // Only the first address counts, and only its direct left neighbour can name it.
        const previous = i > 0 ? span[i - 1] : undefined;
        const hostname = previous !== undefined && !isIpv4Shaped(previous) ? previous : undefined;
        return { address: candidate, hostname };
    }
    return {};
}

function parseHopLine(line: string): HopRecord | undefined {
    const tokens = line.trim().split(/\s+/);
    // Continuation lines ("    10.0.0.9  2.0 ms") and notes have no hop number
    const hop = parseHopNumber(tokens[0]);
    if (hop === undefined) return undefined;

    const roundTripTimes = extractTimings(tokens);
    const identity = extractIdentity(identitySpan(tokens));

    // No address means no hostname either: "3  * * *" comes out with neither.
    const { address } = identity;
    let { hostname } = identity;

    // Some tracers print the address twice, once in place of the name.
    if (hostname !== undefined && address !== undefined && stripParens(hostname) === address) {
        hostname = undefined;
    }

    return { hop, address, hostname, roundTripTimes };
}

// Parses raw `traceroute` output. Lines that are not hop lines are skipped, never fatal.
export function parse(input: string): HopRecord[] {
    const hops: HopRecord[] = [];
    const trimmed = input.trim();
    if (!trimmed) return hops;

    // First line is the "traceroute to x (y), 30 hops max" header.
    const lines = trimmed.split(/\r?\n|\r/).slice(1);

    for (const line of lines) {
        if (!line.trim()) continue;
        const record = parseHopLine(line);
        if (record) hops.push(record);
    }

    return hops;
}
