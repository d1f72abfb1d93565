// singbox-relay/src/modules/resolve-groups.ts — 节点所有权预计算

import type { OutboundIndex } from '../lib/outbound-index.js';

export type GroupClosures = Map<string, Set<string>>;

/**
 * Leaf tags reachable from each group, nested groups inlined.
 *
 * A group met again on its own path contributes nothing to that branch.
 * Finished groups are memoised, so shared sub-groups are walked once.
 */
export function resolveGroupClosures(index: OutboundIndex): GroupClosures {
    const closures: GroupClosures = new Map();

    function resolve(groupTag: string, path: ReadonlySet<string>): Set<string> {
        const memo = closures.get(groupTag);
        if (memo) return memo;
        if (path.has(groupTag)) return new Set();

        const nextPath = new Set(path);
        nextPath.add(groupTag);

        const leaves = new Set<string>();
        for (const member of index.get(groupTag)?.outbounds ?? []) {
            if (index.isGroup(member)) {
                for (const leaf of resolve(member, nextPath)) leaves.add(leaf);
            } else {
                leaves.add(member);
            }
        }
        closures.set(groupTag, leaves);
        return leaves;
    }

    for (const groupTag of index.groupTags()) {
        resolve(groupTag, new Set());
    }
    return closures;
}
