// singbox-relay/src/modules/empty-group-guard.ts — 空策略组兜底

import type { Outbound } from '../types/singbox.js';
import { isGroup } from '../types/singbox.js';
import type { FallbackReport } from '../lib/report.js';

export const FALLBACK_TAG = 'COMPATIBLE';

/**
 * Give every group with no direct members a single shared `direct` fallback.
 *
 * Returns null when no group needed it.
 */
export function fillEmptyGroups(
    outbounds: Outbound[],
    fallbackTag: string = FALLBACK_TAG,
): FallbackReport | null {
    let fallback: Outbound | undefined;
    const filled: string[] = [];

    for (const outbound of [...outbounds]) {
        if (!isGroup(outbound)) continue;
        if (outbound.outbounds && outbound.outbounds.length > 0) continue;

        if (!fallback) fallback = findOrCreateFallback(outbounds, fallbackTag);
        outbound.outbounds = [fallback.tag];
        filled.push(outbound.tag);
    }

    return fallback ? { tag: fallback.tag, groups: filled } : null;
}

function findOrCreateFallback(outbounds: Outbound[], baseTag: string): Outbound {
    const taken = new Set<string>();
    for (const outbound of outbounds) {
        if (outbound.tag === baseTag && outbound.type === 'direct') return outbound;
        taken.add(outbound.tag);
    }

    let tag = baseTag;
    for (let n = 1; taken.has(tag); n++) tag = `${baseTag} #${n}`;

    const created: Outbound = { tag, type: 'direct' };
    outbounds.push(created);
    return created;
}
