// singbox-relay/src/modules/merge-hops.ts — 多跳节点获取与插入

import type { Outbound, SingBoxConfig } from '../types/singbox.js';
import type { HopArgs } from '../lib/helpers.js';
import { isHopConfigured } from '../lib/helpers.js';
import type { NodeFetcher } from '../lib/fetch-nodes.js';
import type { Logger } from '../lib/logger.js';
import { logPreview } from '../lib/logger.js';
import type { HopReport } from '../lib/report.js';
import { insertNodesIntoGroups, parseInsertionRules } from './insert-nodes.js';

/**
 * Insert one hop's nodes into the groups its rules select, then append the
 * nodes to the outbound list.
 */
export function mergeHop(
    config: SingBoxConfig,
    label: string,
    nodes: Outbound[],
    ruleSpec: string,
): HopReport {
    const { rules, invalid } = parseInsertionRules(ruleSpec);
    const { inserted, groups } = insertNodesIntoGroups(config.outbounds, nodes, rules, label);
    config.outbounds.push(...nodes);
    return {
        label,
        configured: true,
        fetched: nodes.length,
        inserted,
        groups,
        invalidRules: invalid,
    };
}

/**
 * Fetch and merge hops in declared order.
 *
 * A hop that fails to fetch is recorded and skipped; hops merged before it
 * stay merged.
 */
export async function mergeHops(
    config: SingBoxConfig,
    hops: readonly HopArgs[],
    fetcher: NodeFetcher,
    logger: Logger,
): Promise<HopReport[]> {
    const reports: HopReport[] = [];

    for (const hop of hops) {
        if (!isHopConfigured(hop)) {
            reports.push(skippedHop(hop.label, false));
            continue;
        }

        let nodes: Outbound[];
        try {
            nodes = await fetcher.fetch(hop);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`${hop.label}: fetch failed, hop skipped: ${message}`);
            reports.push({ ...skippedHop(hop.label, true), error: message });
            continue;
        }

        logger.info(`${hop.label}: ${nodes.length} node(s) from ${hop.name}`);
        logPreview(logger, nodes.map(node => `${node.tag} (${node.type})`));

        const report = mergeHop(config, hop.label, nodes, hop.rules);
        for (const raw of report.invalidRules) {
            logger.warn(`${hop.label}: invalid rule ignored: ${raw}`);
        }
        logger.info(`${hop.label}: inserted ${report.inserted} member(s) into ${report.groups.length} group(s)`);
        reports.push(report);
    }
    return reports;
}

function skippedHop(label: string, configured: boolean): HopReport {
    return { label, configured, fetched: 0, inserted: 0, groups: [], invalidRules: [] };
}
