// singbox-relay/src/lib/helpers.ts
// Script argument parsing — no graph knowledge.

import type { ChainEdge } from '../types/singbox.js';
import type { SubStoreArguments } from '../types/substore.js';
import { DEFAULT_DECORATIVE_CHARS } from './sanitize.js';

// ─── Argument Parsing ───────────────────────────────────────────────

/** Missing, null and empty-string arguments all mean "use the default". */
export function isUnset(value: unknown): value is null | undefined | '' {
    return value === null || typeof value === 'undefined' || value === '';
}

export function parseBool(value: unknown, defaultValue = false): boolean {
    if (isUnset(value)) return defaultValue;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
        if (value.toLowerCase() === 'true' || value === '1') return true;
        if (value.toLowerCase() === 'false' || value === '0') return false;
    }
    throw new Error(`Invalid boolean value: ${String(value)}`);
}

export function parseString(defaultValue: string): (value: unknown) => string {
    return (value: unknown): string => {
        if (value === null || typeof value === 'undefined') return defaultValue;
        return String(value);
    };
}

/** First argument present under any of `keys`. */
export function pickArg(rawArgs: SubStoreArguments, keys: string[]): unknown {
    for (const key of keys) {
        if (typeof rawArgs[key] !== 'undefined') return rawArgs[key];
    }
    return undefined;
}

// ─── Relay Arguments ────────────────────────────────────────────────

export const CHAIN_SEPARATOR = '🔗';
export const CHAIN_ARROW = '➜';

/**
 * Built-in three-hop chain: entry → relay → landing.
 * Tags must match the group tags of the template config.
 */
export const DEFAULT_CHAIN_EDGES: readonly ChainEdge[] = [
    { source: '♻️ 自动入口 🧠', target: '🚶 中续路径 🔐' },
    { source: '🚶 中续路径 🔐', target: '🕳️ 落地节点 🔐 +' },
];

export const HOP_LABELS = ['hop1 (entry)', 'hop2 (relay)', 'hop3 (landing)'] as const;

export interface HopArgs {
    label: string;
    /** subscription or collection name */
    name: string;
    /** `1`, `col…` or `组合` selects a collection; anything else a subscription */
    type: string;
    /** remote subscription URL; empty reads the stored subscription */
    url: string;
    /** insertion rule spec, see insert-nodes.ts */
    rules: string;
    includeUnsupportedProxy: boolean;
}

export interface RelayArgs {
    /**
     * Up to three hops, in order.
     *
     * Source: `$arguments.name1`, `outbound1`, `type1`, `url1`,
     * `includeUnsupportedProxy1` (and the same with 2 and 3).
     *
     * URL example:
     * `...#name1=Airport&outbound1=.*自动入口.*🏷ℹ️hk|sg`
     */
    hops: HopArgs[];
    /**
     * Declared chain edges.
     *
     * Source: `$arguments.chains`, pairs `source➜target` joined with `🔗`.
     * Defaults to DEFAULT_CHAIN_EDGES.
     */
    chains: ChainEdge[];
    /** Source: `$arguments.clearDetours`. Default `true`. */
    clearDetours: boolean;
    /** Source: `$arguments.fallbackTag`. Default `COMPATIBLE`. */
    fallbackTag: string;
    /** Source: `$arguments.decorativeChars`. */
    decorativeChars: string;
}

/**
 * Parse user-provided script arguments into relay settings.
 *
 * Unknown fields are ignored.
 */
export function parseRelayArgs(args: SubStoreArguments): RelayArgs {
    const asString = parseString('');
    const hops = HOP_LABELS.map((label, i): HopArgs => {
        const n = i + 1;
        return {
            label,
            name: asString(args[`name${n}`]),
            type: asString(args[`type${n}`]),
            url: asString(args[`url${n}`]),
            rules: asString(pickArg(args, [`outbound${n}`, `rules${n}`])),
            includeUnsupportedProxy: parseBool(args[`includeUnsupportedProxy${n}`]),
        };
    });

    const chainSpec = args.chains;
    return {
        hops,
        chains: isUnset(chainSpec)
            ? DEFAULT_CHAIN_EDGES.map(edge => ({ ...edge }))
            : parseChainSpec(String(chainSpec)),
        clearDetours: parseBool(args.clearDetours, true),
        fallbackTag: isUnset(args.fallbackTag) ? 'COMPATIBLE' : String(args.fallbackTag),
        decorativeChars: parseString(DEFAULT_DECORATIVE_CHARS)(args.decorativeChars),
    };
}

/**
 * parseChainSpec('A➜B🔗B➜C') => [{ source: 'A', target: 'B' }, { source: 'B', target: 'C' }]
 *
 * Pairs without both sides are ignored.
 */
export function parseChainSpec(spec: string): ChainEdge[] {
    const edges: ChainEdge[] = [];
    for (const pair of spec.split(CHAIN_SEPARATOR)) {
        const [source = '', target = ''] = pair.split(CHAIN_ARROW).map(part => part.trim());
        if (source && target) edges.push({ source, target });
    }
    return edges;
}

/** A hop is run only when it names a source and carries rules. */
export function isHopConfigured(hop: HopArgs): boolean {
    return Boolean(hop.name && hop.rules);
}
