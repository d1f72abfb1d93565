// singbox-relay/src/types/substore.ts
//
// The slice of the Sub-Store script runtime the relay talks to.

/**
 * Output targets understood by Sub-Store producers.
 *
 * Example values:
 * - `ClashMeta`
 * - `sing-box`
 */
export type TargetPlatform =
    | 'Surge'
    | 'QX'
    | 'Loon'
    | 'Stash'
    | 'ClashMeta'
    | 'mihomo'
    | 'sing-box'
    | 'JSON'
    | string;

/**
 * Raw script arguments passed through `$arguments`.
 *
 * URL example:
 * `https://example.com/relay.js#name1=Airport&outbound1=自动入口`
 *
 * Runtime value example:
 * `{ name1: 'Airport', outbound1: '自动入口' }`
 */
export type SubStoreArguments = Record<string, unknown>;

/**
 * Options for `produceArtifact`.
 *
 * Example:
 * ```ts
 * await produceArtifact({
 *     type: 'subscription',
 *     name: 'Airport',
 *     platform: 'sing-box',
 *     produceType: 'internal',
 * });
 * ```
 */
export interface ProduceArtifactOptions {
    type: 'subscription' | 'collection' | 'file' | 'rule';
    name?: string;
    platform?: TargetPlatform;
    produceType?: 'internal' | 'raw' | string;
    produceOpts?: Record<string, unknown>;
    subscription?: Record<string, unknown>;
    url?: string;
    noCache?: boolean;
    [key: string]: unknown;
}

export type ProduceArtifact = (options: ProduceArtifactOptions) => Promise<unknown>;
