// singbox-relay/src/types/singbox.ts
//
// sing-box document shapes touched by the relay pipeline. Only the fields the
// pipeline reads or writes are modelled; everything else passes through.

import { z } from 'zod';

/**
 * Policy-group outbound types. Members of these are other outbound tags.
 */
export const GROUP_TYPES: ReadonlySet<string> = new Set(['selector', 'urltest', 'load-balance']);

/**
 * Group types that accept inserted subscription nodes.
 */
export const INSERTABLE_GROUP_TYPES: ReadonlySet<string> = new Set(['selector', 'urltest']);

/**
 * Terminal outbound types. These never receive a detour.
 */
export const TERMINAL_TYPES: ReadonlySet<string> = new Set(['direct', 'block', 'dns']);

export const outboundSchema = z.object({
    tag: z.string(),
    type: z.string().min(1, 'type is required'),
    outbounds: z.array(z.string()).optional(),
    default: z.string().optional(),
    detour: z.string().optional(),
}).passthrough();

export const singBoxConfigSchema = z.object({
    outbounds: z.array(outboundSchema),
}).passthrough();

/**
 * A single sing-box outbound: protocol leaf, policy group, or terminal.
 *
 * Example:
 * ```ts
 * { tag: 'Auto', type: 'urltest', outbounds: ['HK 01', 'JP 01'] }
 * ```
 */
export type Outbound = z.infer<typeof outboundSchema>;

export type SingBoxConfig = z.infer<typeof singBoxConfigSchema>;

/**
 * Declares that nodes resolving into `source` must detour through `target`.
 */
export interface ChainEdge {
    source: string;
    target: string;
}

export function isGroup(outbound: Outbound): boolean {
    return GROUP_TYPES.has(outbound.type);
}

export function isTerminal(outbound: Outbound): boolean {
    return TERMINAL_TYPES.has(outbound.type);
}
