// singbox-relay/src/modules/assign-chains.ts — 设置链式代理（detour）

import { isTerminal } from '../types/singbox.js';
import type { OutboundIndex } from '../lib/outbound-index.js';
import type { ChainReport } from '../lib/report.js';
import type { ChainMap } from './break-cycles.js';
import type { GroupClosures } from './resolve-groups.js';

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Point every leaf of each source group at its target group via `detour`.
 *
 * Terminal leaves are left alone, and so is any leaf the target group already
 * contains (it would detour through itself).
 */
export function assignChainDetours(
    chains: ChainMap,
    closures: GroupClosures,
    index: OutboundIndex,
): ChainReport[] {
    const reports: ChainReport[] = [];

    for (const [source, target] of chains) {
        const sourceLeaves = closures.get(source) ?? EMPTY;
        const targetLeaves = closures.get(target) ?? EMPTY;
        const report: ChainReport = {
            source,
            target,
            assigned: [],
            skippedTerminal: 0,
            skippedSelfLoop: 0,
            emptySource: sourceLeaves.size === 0,
        };
        reports.push(report);
        if (report.emptySource) continue;

        for (const leafTag of sourceLeaves) {
            const leaf = index.get(leafTag);
            if (!leaf) continue;
            if (isTerminal(leaf)) {
                report.skippedTerminal += 1;
                continue;
            }
            if (targetLeaves.has(leafTag)) {
                report.skippedSelfLoop += 1;
                continue;
            }
            leaf.detour = target;
            report.assigned.push(leafTag);
        }
    }
    return reports;
}
