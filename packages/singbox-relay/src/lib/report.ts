// singbox-relay/src/lib/report.ts
// Structured operator summary collected across all pipeline stages.

import type { Logger } from './logger.js';
import { logPreview } from './logger.js';

export interface GroupInsertion {
    group: string;
    hop: string;
    before: number;
    inserted: number;
}

export interface HopReport {
    label: string;
    /** false when the hop had no source name or no rule spec */
    configured: boolean;
    fetched: number;
    inserted: number;
    groups: GroupInsertion[];
    invalidRules: string[];
    error?: string;
}

export interface DuplicateTag {
    tag: string;
    count: number;
}

export interface CycleCut {
    source: string;
    target: string;
    /** group tags along the detected cycle, closing tag repeated at the end */
    path: string[];
}

export type RejectedEdgeReason = 'missing-endpoint' | 'duplicate-source';

export interface RejectedEdge {
    source: string;
    target: string;
    reason: RejectedEdgeReason;
}

export interface ChainReport {
    source: string;
    target: string;
    assigned: string[];
    skippedTerminal: number;
    skippedSelfLoop: number;
    emptySource: boolean;
}

export interface FallbackReport {
    tag: string;
    groups: string[];
}

export interface RelayReport {
    hops: HopReport[];
    duplicates: DuplicateTag[];
    renamed: number;
    droppedReferences: number;
    cycles: CycleCut[];
    rejectedEdges: RejectedEdge[];
    chains: ChainReport[];
    fallback: FallbackReport | null;
}

export function createReport(): RelayReport {
    return {
        hops: [],
        duplicates: [],
        renamed: 0,
        droppedReferences: 0,
        cycles: [],
        rejectedEdges: [],
        chains: [],
        fallback: null,
    };
}

export function totalChained(report: RelayReport): number {
    return report.chains.reduce((sum, chain) => sum + chain.assigned.length, 0);
}

/**
 * Write the end-of-run summary.
 */
export function logReport(report: RelayReport, logger: Logger): void {
    logger.info('Summary:');
    for (const hop of report.hops) {
        if (!hop.configured) {
            logger.info(`  ${hop.label}: not configured`);
            continue;
        }
        const status = hop.error ? ` (failed: ${hop.error})` : '';
        logger.info(`  ${hop.label}: fetched ${hop.fetched}, inserted ${hop.inserted}${status}`);
        for (const group of hop.groups) {
            if (group.inserted === 0) continue;
            logger.info(`    ${group.group}: ${group.before} + ${group.inserted} = ${group.before + group.inserted}`);
        }
    }

    if (report.duplicates.length > 0) {
        logger.info(`  duplicate tags: ${report.duplicates.length}, renamed outbounds: ${report.renamed}`);
        logPreview(logger, report.duplicates.map(d => `${d.tag} (x${d.count})`));
    }
    if (report.droppedReferences > 0) {
        logger.info(`  dropped stale references: ${report.droppedReferences}`);
    }
    for (const cycle of report.cycles) {
        logger.warn(`  cycle cut: ${cycle.source} -> ${cycle.target} (${cycle.path.join(' ➜ ')})`);
    }
    for (const edge of report.rejectedEdges) {
        logger.info(`  chain ignored (${edge.reason}): ${edge.source} -> ${edge.target}`);
    }
    if (report.fallback) {
        logger.info(`  fallback ${report.fallback.tag} added to ${report.fallback.groups.length} empty group(s)`);
    }

    const chained = totalChained(report);
    if (chained === 0) {
        logger.warn('  no detour assigned; check the chain table');
    } else {
        logger.info(`  detours assigned: ${chained}`);
    }
    for (const chain of report.chains) {
        if (chain.emptySource) {
            logger.warn(`  ${chain.source}: no nodes resolved, skipped`);
            continue;
        }
        if (chained === 0) continue;
        logger.info(`  ${chain.source} (${chain.assigned.length} node(s)) ➜ ${chain.target}`);
        logPreview(logger, chain.assigned, 5, '    ├─ ');
    }
}
