// singbox-relay/src/modules/insert-nodes.ts — 节点插入
//
// Rule spec grammar (one string per hop):
//   <groupPattern>🏷<namePattern>🕳<groupPattern>🏷<namePattern>...
// namePattern defaults to `.*`. A pattern containing `ℹ️` matches
// case-insensitively.

import type { Outbound } from '../types/singbox.js';
import { INSERTABLE_GROUP_TYPES } from '../types/singbox.js';
import type { GroupInsertion } from '../lib/report.js';

export const RULE_SEPARATOR = '🕳';
export const NAME_SEPARATOR = '🏷';
export const IGNORE_CASE_MARKER = 'ℹ️';

export interface InsertionRule {
    groupPattern: RegExp;
    namePattern: RegExp;
}

export interface ParsedRules {
    rules: InsertionRule[];
    /** raw rule strings that failed to compile */
    invalid: string[];
}

export interface InsertionResult {
    inserted: number;
    groups: GroupInsertion[];
}

export function parseInsertionRules(spec: string | undefined): ParsedRules {
    const parsed: ParsedRules = { rules: [], invalid: [] };
    if (!spec) return parsed;

    for (const raw of spec.split(RULE_SEPARATOR)) {
        if (!raw) continue;
        const [groupSource, nameSource = '.*'] = raw.split(NAME_SEPARATOR);
        const groupPattern = compilePattern(groupSource);
        const namePattern = compilePattern(nameSource);
        if (!groupPattern || !namePattern) {
            parsed.invalid.push(raw);
            continue;
        }
        parsed.rules.push({ groupPattern, namePattern });
    }
    return parsed;
}

export function compilePattern(source: string): RegExp | null {
    const flags = source.includes(IGNORE_CASE_MARKER) ? 'i' : undefined;
    try {
        return new RegExp(source.split(IGNORE_CASE_MARKER).join('').trim(), flags);
    } catch {
        return null;
    }
}

/**
 * Append the tags of matching nodes to every matching selector/urltest group.
 *
 * Existing members are never removed. Groups are matched against the list as
 * it stands, so groups populated by an earlier hop are visible to later hops.
 */
export function insertNodesIntoGroups(
    outbounds: readonly Outbound[],
    nodes: readonly Outbound[],
    rules: readonly InsertionRule[],
    hop: string,
): InsertionResult {
    const result: InsertionResult = { inserted: 0, groups: [] };
    if (rules.length === 0 || nodes.length === 0) return result;

    const byGroup = new Map<string, GroupInsertion>();
    // matched tags per rule, computed once per hop
    const matchedByRule = rules.map(rule => nodes
        .filter(node => rule.namePattern.test(node.tag))
        .map(node => node.tag));

    for (const outbound of outbounds) {
        if (!INSERTABLE_GROUP_TYPES.has(outbound.type)) continue;

        rules.forEach((rule, index) => {
            if (!rule.groupPattern.test(outbound.tag)) return;

            const members = outbound.outbounds ?? [];
            outbound.outbounds = members;

            let stats = byGroup.get(outbound.tag);
            if (!stats) {
                stats = { group: outbound.tag, hop, before: members.length, inserted: 0 };
                byGroup.set(outbound.tag, stats);
                result.groups.push(stats);
            }

            const matched = matchedByRule[index];
            members.push(...matched);
            stats.inserted += matched.length;
            result.inserted += matched.length;
        });
    }
    return result;
}
