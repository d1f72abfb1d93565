// singbox-relay/src/modules/rewrite-references.ts — 更新引用

import type { Outbound } from '../types/singbox.js';
import { isGroup } from '../types/singbox.js';
import type { TagSanitizer } from '../lib/sanitize.js';
import { sanitizeTag } from '../lib/sanitize.js';
import type { SanitizedToFinals } from './deduplicate.js';

export interface ReferenceResolver {
    /** every live tag an old reference stands for, in variant order */
    resolveAll(oldTag: string): string[];
    /** the first live tag an old reference stands for */
    resolveOne(oldTag: string): string | undefined;
}

export interface RewriteResult {
    /** references removed because nothing live matched them */
    dropped: number;
}

/**
 * Three-tier lookup of a pre-rename tag:
 *   1. all live variants registered for its sanitized form
 *   2. the sanitized form itself, if live
 *   3. the raw tag, if live
 */
export function createReferenceResolver(
    outbounds: readonly Outbound[],
    sanitizedToFinals: SanitizedToFinals,
    sanitize: TagSanitizer = sanitizeTag,
): ReferenceResolver {
    const live = new Set(outbounds.map(outbound => outbound.tag));

    function resolveAll(oldTag: string): string[] {
        const sanitized = sanitize(oldTag);
        const variants = sanitizedToFinals.get(sanitized);
        if (variants) return variants.filter(tag => live.has(tag));
        if (live.has(sanitized)) return [sanitized];
        if (live.has(oldTag)) return [oldTag];
        return [];
    }

    return {
        resolveAll,
        resolveOne: (oldTag: string): string | undefined => resolveAll(oldTag)[0],
    };
}

/**
 * Point every group member, selector default and kept detour at a live tag.
 *
 * Running it again over its own output changes nothing.
 */
export function rewriteReferences(
    outbounds: Outbound[],
    sanitizedToFinals: SanitizedToFinals,
    sanitize: TagSanitizer = sanitizeTag,
): RewriteResult {
    const resolver = createReferenceResolver(outbounds, sanitizedToFinals, sanitize);
    let dropped = 0;

    for (const outbound of outbounds) {
        if (isGroup(outbound) && Array.isArray(outbound.outbounds)) {
            const members: string[] = [];
            const seen = new Set<string>();
            for (const oldTag of outbound.outbounds) {
                const resolved = resolver.resolveAll(oldTag);
                if (resolved.length === 0) dropped += 1;
                for (const tag of resolved) {
                    if (seen.has(tag)) continue;
                    seen.add(tag);
                    members.push(tag);
                }
            }
            outbound.outbounds = members;
        }

        if (typeof outbound.default === 'string') {
            const resolved = resolver.resolveOne(outbound.default);
            if (resolved) {
                outbound.default = resolved;
            } else {
                delete outbound.default;
                dropped += 1;
            }
        }

        if (typeof outbound.detour === 'string') {
            const resolved = resolver.resolveOne(outbound.detour);
            if (resolved) {
                outbound.detour = resolved;
            } else {
                delete outbound.detour;
                dropped += 1;
            }
        }
    }

    return { dropped };
}
