// singbox-relay/src/lib/config.ts
// Input document validation. Runs before any stage touches the graph.

import type { ZodError } from 'zod';
import type { SingBoxConfig } from '../types/singbox.js';
import { singBoxConfigSchema } from '../types/singbox.js';

export class RelayConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RelayConfigError';
    }
}

/**
 * "outbounds.3.tag: Required; outbounds.5.type: type is required"
 */
export function formatIssues(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
        .join('; ');
}

/**
 * Check the document in place; the caller's object is the one mutated later.
 */
export function assertSingBoxConfig(value: unknown): asserts value is SingBoxConfig {
    const result = singBoxConfigSchema.safeParse(value);
    if (!result.success) {
        throw new RelayConfigError(`Invalid sing-box config: ${formatIssues(result.error)}`);
    }
}
