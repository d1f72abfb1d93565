// singbox-relay/src/lib/fetch-nodes.ts — 节点获取（Sub-Store produceArtifact）

import { z } from 'zod';
import type { Outbound } from '../types/singbox.js';
import { outboundSchema } from '../types/singbox.js';
import type { ProduceArtifact, ProduceArtifactOptions } from '../types/substore.js';
import type { HopArgs } from './helpers.js';
import { formatIssues } from './config.js';

export type HopSource = Pick<HopArgs, 'label' | 'name' | 'type' | 'url' | 'includeUnsupportedProxy'>;

export interface NodeFetcher {
    fetch(source: HopSource): Promise<Outbound[]>;
}

const fetchedNodesSchema = z.array(outboundSchema);

/**
 * Fetches one hop's nodes as sing-box outbounds through `produceArtifact`.
 */
export class ArtifactNodeFetcher implements NodeFetcher {
    private produce: ProduceArtifact;

    constructor(produce: ProduceArtifact) {
        this.produce = produce;
    }

    async fetch(source: HopSource): Promise<Outbound[]> {
        const result = await this.produce(buildArtifactRequest(source));
        const parsed = fetchedNodesSchema.safeParse(result);
        if (!parsed.success) {
            throw new Error(`${source.name} did not produce sing-box outbounds: ${formatIssues(parsed.error)}`);
        }
        return parsed.data;
    }
}

export function buildArtifactRequest(source: HopSource): ProduceArtifactOptions {
    const request: ProduceArtifactOptions = {
        name: source.name,
        type: artifactType(source.type),
        platform: 'sing-box',
        produceType: 'internal',
        produceOpts: {
            'include-unsupported-proxy': source.includeUnsupportedProxy,
        },
    };
    if (source.url) {
        request.subscription = {
            name: source.name,
            url: source.url,
            source: 'remote',
        };
    }
    return request;
}

export function artifactType(type: string): 'collection' | 'subscription' {
    return /^1$|col|组合/i.test(type) ? 'collection' : 'subscription';
}
