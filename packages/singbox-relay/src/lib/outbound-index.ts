// singbox-relay/src/lib/outbound-index.ts — 出站索引

import type { Outbound } from '../types/singbox.js';
import { isGroup } from '../types/singbox.js';

/**
 * Tag → outbound lookup over an ordered outbound list.
 *
 * The index is a snapshot: rebuild it after any pass that renames tags or
 * appends outbounds.
 */
export class OutboundIndex {
    private readonly byTag = new Map<string, Outbound>();

    constructor(outbounds: readonly Outbound[]) {
        for (const outbound of outbounds) {
            // first occurrence wins, matching sing-box's own tag lookup
            if (!this.byTag.has(outbound.tag)) this.byTag.set(outbound.tag, outbound);
        }
    }

    get(tag: string): Outbound | undefined {
        return this.byTag.get(tag);
    }

    isGroup(tag: string): boolean {
        const outbound = this.byTag.get(tag);
        return outbound ? isGroup(outbound) : false;
    }

    groupTags(): string[] {
        const tags: string[] = [];
        for (const [tag, outbound] of this.byTag) {
            if (isGroup(outbound)) tags.push(tag);
        }
        return tags;
    }
}
