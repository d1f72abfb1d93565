// singbox-relay/src/modules/clean-fields.ts — 清理字段

import type { Outbound } from '../types/singbox.js';
import { isGroup } from '../types/singbox.js';

export interface CleanFieldsOptions {
    /** drop detours already present so chains are the only source of them */
    clearDetours: boolean;
}

export function cleanOutboundFields(outbounds: Outbound[], options: CleanFieldsOptions): void {
    for (const outbound of outbounds) {
        if (!isGroup(outbound) && 'outbounds' in outbound) delete outbound.outbounds;
        if (options.clearDetours && 'detour' in outbound) delete outbound.detour;
    }
}
