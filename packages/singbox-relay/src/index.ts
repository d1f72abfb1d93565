// singbox-relay/src/index.ts — sing-box 多跳链式代理脚本入口
//
// Merges up to three hops of subscription nodes into the groups of a sing-box
// config, makes every tag unique, repoints references, and chains the groups
// entry → relay → landing through per-node `detour`.

import { assertSingBoxConfig } from './lib/config.js';
import type { NodeFetcher } from './lib/fetch-nodes.js';
import { parseRelayArgs } from './lib/helpers.js';
import type { Logger } from './lib/logger.js';
import { createConsoleLogger } from './lib/logger.js';
import { OutboundIndex } from './lib/outbound-index.js';
import type { RelayReport } from './lib/report.js';
import { createReport, logReport } from './lib/report.js';
import { createTagSanitizer } from './lib/sanitize.js';
import { runStages } from './lib/stage.js';
import type { RelayContext, RelayStage } from './lib/stage.js';
import type { SingBoxConfig } from './types/singbox.js';
import type { SubStoreArguments } from './types/substore.js';

import { mergeHops } from './modules/merge-hops.js';
import { deduplicateOutbounds, findDuplicateTags } from './modules/deduplicate.js';
import { createReferenceResolver, rewriteReferences } from './modules/rewrite-references.js';
import { cleanOutboundFields } from './modules/clean-fields.js';
import { resolveGroupClosures } from './modules/resolve-groups.js';
import { breakChainCycles, buildChainMap } from './modules/break-cycles.js';
import { assignChainDetours } from './modules/assign-chains.js';
import { fillEmptyGroups } from './modules/empty-group-guard.js';

// ── 处理步骤（顺序即执行顺序）──

const mergeHopsStage: RelayStage = {
    name: 'fetch and insert hop nodes',
    async run(ctx) {
        ctx.report.hops = await mergeHops(ctx.config, ctx.args.hops, ctx.fetcher, ctx.logger);
    },
};

const deduplicateStage: RelayStage = {
    name: 'deduplicate tags',
    run(ctx) {
        ctx.report.duplicates = findDuplicateTags(ctx.config.outbounds);
        const { sanitizedToFinals, renamed } = deduplicateOutbounds(ctx.config.outbounds, ctx.sanitize);
        ctx.sanitizedToFinals = sanitizedToFinals;
        ctx.report.renamed = renamed;
    },
};

const rewriteStage: RelayStage = {
    name: 'rewrite references',
    run(ctx) {
        const { dropped } = rewriteReferences(ctx.config.outbounds, ctx.sanitizedToFinals, ctx.sanitize);
        ctx.report.droppedReferences = dropped;
    },
};

const cleanStage: RelayStage = {
    name: 'clean outbound fields',
    run(ctx) {
        cleanOutboundFields(ctx.config.outbounds, { clearDetours: ctx.args.clearDetours });
    },
};

const chainStage: RelayStage = {
    name: 'chain groups',
    run(ctx) {
        const index = new OutboundIndex(ctx.config.outbounds);
        const resolver = createReferenceResolver(ctx.config.outbounds, ctx.sanitizedToFinals, ctx.sanitize);

        const declared = buildChainMap(ctx.args.chains, index, resolver.resolveOne);
        const { chains, cycles } = breakChainCycles(declared.chains);
        const closures = resolveGroupClosures(index);

        ctx.report.rejectedEdges = declared.rejected;
        ctx.report.cycles = cycles;
        ctx.report.chains = assignChainDetours(chains, closures, index);
    },
};

const emptyGroupStage: RelayStage = {
    name: 'fill empty groups',
    run(ctx) {
        ctx.report.fallback = fillEmptyGroups(ctx.config.outbounds, ctx.args.fallbackTag);
    },
};

export const relayStages: readonly RelayStage[] = [
    mergeHopsStage,
    deduplicateStage,
    rewriteStage,
    cleanStage,
    chainStage,
    emptyGroupStage,
];

// ── 入口函数 ──

export interface RelayOptions {
    fetcher: NodeFetcher;
    logger?: Logger;
}

export interface RelayResult {
    config: SingBoxConfig;
    report: RelayReport;
}

/**
 * Run the relay pipeline over a parsed sing-box document.
 *
 * The document is validated, then mutated in place and returned with the
 * run report. Only an invalid document or invalid arguments throw.
 */
async function main(
    config: unknown,
    rawArgs: SubStoreArguments,
    options: RelayOptions,
): Promise<RelayResult> {
    assertSingBoxConfig(config);
    const args = parseRelayArgs(rawArgs);
    const logger = options.logger ?? createConsoleLogger();

    const ctx: RelayContext = {
        config,
        args,
        fetcher: options.fetcher,
        logger,
        sanitize: createTagSanitizer(args.decorativeChars),
        report: createReport(),
        sanitizedToFinals: new Map(),
    };

    await runStages(relayStages, ctx);
    logReport(ctx.report, logger);

    return { config, report: ctx.report };
}

export default main;

export { main as runRelay };
export { ArtifactNodeFetcher } from './lib/fetch-nodes.js';
export type { HopSource, NodeFetcher } from './lib/fetch-nodes.js';
export { RelayConfigError } from './lib/config.js';
export { createConsoleLogger, silentLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export type { RelayReport } from './lib/report.js';
export type { ChainEdge, Outbound, SingBoxConfig } from './types/singbox.js';
