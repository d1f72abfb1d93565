// singbox-relay/src/modules/deduplicate.ts — 去重（防碰撞）

import type { Outbound } from '../types/singbox.js';
import type { TagSanitizer } from '../lib/sanitize.js';
import { sanitizeTag } from '../lib/sanitize.js';
import type { DuplicateTag } from '../lib/report.js';

export type SanitizedToFinals = Map<string, string[]>;

export interface DeduplicateResult {
    sanitizedToFinals: SanitizedToFinals;
    /** outbounds whose tag changed */
    renamed: number;
}

/**
 * Give every outbound a unique tag in one pass.
 *
 * The first outbound of each sanitized name keeps it verbatim; later ones get
 * `"<name> #N"`. A variant never equals the sanitized name of another outbound
 * in the list, so variants cannot be mistaken for a logical name later on.
 */
export function deduplicateOutbounds(
    outbounds: Outbound[],
    sanitize: TagSanitizer = sanitizeTag,
): DeduplicateResult {
    const sanitizedTags = outbounds.map(outbound => sanitize(outbound.tag));
    const reserved = new Set(sanitizedTags);
    const claimed = new Set<string>();
    const counters = new Map<string, number>();
    const sanitizedToFinals: SanitizedToFinals = new Map();
    let renamed = 0;

    outbounds.forEach((outbound, index) => {
        const sanitized = sanitizedTags[index];
        let finalTag = sanitized;

        if (claimed.has(finalTag)) {
            let counter = counters.get(sanitized) ?? 1;
            do {
                finalTag = `${sanitized} #${counter}`;
                counter += 1;
            } while (claimed.has(finalTag) || reserved.has(finalTag));
            counters.set(sanitized, counter);
        }

        claimed.add(finalTag);
        if (outbound.tag !== finalTag) renamed += 1;
        outbound.tag = finalTag;

        const finals = sanitizedToFinals.get(sanitized);
        if (finals) finals.push(finalTag);
        else sanitizedToFinals.set(sanitized, [finalTag]);
    });

    return { sanitizedToFinals, renamed };
}

/**
 * Verbatim tag collisions, in first-seen order.
 */
export function findDuplicateTags(outbounds: readonly Outbound[]): DuplicateTag[] {
    const counts = new Map<string, number>();
    for (const outbound of outbounds) {
        counts.set(outbound.tag, (counts.get(outbound.tag) ?? 0) + 1);
    }
    const duplicates: DuplicateTag[] = [];
    for (const [tag, count] of counts) {
        if (count > 1) duplicates.push({ tag, count });
    }
    return duplicates;
}
