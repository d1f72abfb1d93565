// singbox-relay/src/lib/stage.ts — 处理步骤

import type { SingBoxConfig } from '../types/singbox.js';
import type { SanitizedToFinals } from '../modules/deduplicate.js';
import type { RelayArgs } from './helpers.js';
import type { Logger } from './logger.js';
import type { RelayReport } from './report.js';
import type { TagSanitizer } from './sanitize.js';
import type { NodeFetcher } from './fetch-nodes.js';

export interface RelayContext {
    config: SingBoxConfig;
    args: RelayArgs;
    fetcher: NodeFetcher;
    logger: Logger;
    sanitize: TagSanitizer;
    report: RelayReport;
    /** filled by the dedup stage, read by every later one */
    sanitizedToFinals: SanitizedToFinals;
}

export interface RelayStage {
    name: string;
    run(ctx: RelayContext): void | Promise<void>;
}

/**
 * Run stages strictly one after another.
 */
export async function runStages(stages: readonly RelayStage[], ctx: RelayContext): Promise<void> {
    for (const [i, stage] of stages.entries()) {
        ctx.logger.info(`step ${i + 1}/${stages.length}: ${stage.name}`);
        await stage.run(ctx);
    }
}
