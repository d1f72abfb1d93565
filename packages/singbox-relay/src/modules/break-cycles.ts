// singbox-relay/src/modules/break-cycles.ts — 宏观循环检测

import type { ChainEdge } from '../types/singbox.js';
import type { OutboundIndex } from '../lib/outbound-index.js';
import type { CycleCut, RejectedEdge } from '../lib/report.js';

export type ChainMap = Map<string, string>;

export interface ChainMapResult {
    chains: ChainMap;
    rejected: RejectedEdge[];
}

export interface BreakCyclesResult {
    chains: ChainMap;
    cycles: CycleCut[];
}

/**
 * Keep declared edges whose endpoints are both existing groups, one edge per
 * source. Endpoints go through `resolveTag` first so renamed groups still match.
 */
export function buildChainMap(
    edges: readonly ChainEdge[],
    index: OutboundIndex,
    resolveTag: (tag: string) => string | undefined,
): ChainMapResult {
    const chains: ChainMap = new Map();
    const rejected: RejectedEdge[] = [];

    for (const edge of edges) {
        const source = resolveTag(edge.source);
        const target = resolveTag(edge.target);
        if (!source || !target || !index.isGroup(source) || !index.isGroup(target)) {
            rejected.push({ ...edge, reason: 'missing-endpoint' });
            continue;
        }
        if (chains.has(source)) {
            rejected.push({ source, target, reason: 'duplicate-source' });
            continue;
        }
        chains.set(source, target);
    }
    return { chains, rejected };
}

/**
 * Remove every edge that closes a cycle in the (functional) chain map.
 *
 * Walks each chain from its source marking groups `visiting`; an edge into a
 * `visiting` group is a back-edge and is cut. Remaining edges keep their order.
 */
export function breakChainCycles(initial: ChainMap): BreakCyclesResult {
    const chains: ChainMap = new Map(initial);
    const cycles: CycleCut[] = [];
    const visited = new Set<string>();

    for (const start of initial.keys()) {
        if (visited.has(start)) continue;

        const path: string[] = [];
        const visiting = new Set<string>();
        let current: string | undefined = start;

        while (current !== undefined && !visited.has(current)) {
            visiting.add(current);
            path.push(current);

            const target = initial.get(current);
            if (target === undefined) break;
            if (visiting.has(target)) {
                chains.delete(current);
                cycles.push({
                    source: current,
                    target,
                    path: [...path.slice(path.indexOf(target)), target],
                });
                break;
            }
            current = target;
        }

        for (const group of path) visited.add(group);
    }

    return { chains, cycles };
}
