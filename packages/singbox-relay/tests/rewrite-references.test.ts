// tests/rewrite-references.test.ts — Tests for reference rewriting after rename
import { describe, it, expect } from 'vitest';
import { deduplicateOutbounds } from '../src/modules/deduplicate.js';
import {
    createReferenceResolver,
    rewriteReferences,
} from '../src/modules/rewrite-references.js';
import type { Outbound } from '../src/types/singbox.js';

function byTag(outbounds: Outbound[], tag: string): Outbound | undefined {
    return outbounds.find(o => o.tag === tag);
}

function renameAndRewrite(outbounds: Outbound[]): { dropped: number; map: Map<string, string[]> } {
    const { sanitizedToFinals } = deduplicateOutbounds(outbounds);
    const { dropped } = rewriteReferences(outbounds, sanitizedToFinals);
    return { dropped, map: sanitizedToFinals };
}

describe('rewriteReferences', () => {
    it('points a group at every physical node of a renamed logical name', () => {
        const outbounds: Outbound[] = [
            { tag: 'Auto', type: 'urltest', outbounds: ['HK 01', '【HK 01】'] },
            { tag: 'HK 01', type: 'vless' },
            { tag: '【HK 01】', type: 'vmess' },
        ];

        const { dropped } = renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'Auto')?.outbounds).toEqual(['HK 01', 'HK 01 #1']);
        expect(dropped).toBe(0);
    });

    it('expands a single reference to all variants', () => {
        const outbounds: Outbound[] = [
            { tag: 'Manual', type: 'selector', outbounds: ['[SG]'] },
            { tag: 'SG', type: 'vless' },
            { tag: 'SG', type: 'trojan' },
        ];

        renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'Manual')?.outbounds).toEqual(['SG', 'SG #1']);
    });

    it('keeps a direct reference to an already numbered variant', () => {
        const outbounds: Outbound[] = [
            { tag: 'Pick', type: 'selector', outbounds: ['SG #1', 'SG'] },
            { tag: 'SG', type: 'vless' },
            { tag: 'SG', type: 'trojan' },
        ];

        renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'Pick')?.outbounds).toEqual(['SG #1', 'SG']);
    });

    it('drops stale references', () => {
        const outbounds: Outbound[] = [
            { tag: 'Auto', type: 'urltest', outbounds: ['gone', 'JP'] },
            { tag: 'JP', type: 'vless' },
        ];

        const { dropped } = renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'Auto')?.outbounds).toEqual(['JP']);
        expect(dropped).toBe(1);
    });

    it('resolves default to the first variant and removes a stale one', () => {
        const outbounds: Outbound[] = [
            { tag: 'Proxy', type: 'selector', outbounds: ['【HK】'], default: '【HK】' },
            { tag: 'Other', type: 'selector', outbounds: ['HK'], default: 'gone' },
            { tag: 'HK', type: 'vless' },
            { tag: '[HK]', type: 'vmess' },
        ];

        const { dropped } = renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'Proxy')?.default).toBe('HK');
        expect(byTag(outbounds, 'Other')).not.toHaveProperty('default');
        expect(dropped).toBe(1);
    });

    it('resolves a kept detour', () => {
        const outbounds: Outbound[] = [
            { tag: 'Relay', type: 'selector', outbounds: ['n1'] },
            { tag: 'n1', type: 'vless', detour: '[Relay]' },
        ];

        renameAndRewrite(outbounds);

        expect(byTag(outbounds, 'n1')?.detour).toBe('Relay');
    });

    it('falls back to the raw tag when nothing was registered for it', () => {
        const outbounds: Outbound[] = [
            { tag: 'G', type: 'selector', outbounds: ['[Keep]', 'Clean'] },
            { tag: '[Keep]', type: 'vless' },
            { tag: 'Clean', type: 'vless' },
        ];

        const { dropped } = rewriteReferences(outbounds, new Map());

        expect(outbounds[0].outbounds).toEqual(['[Keep]', 'Clean']);
        expect(dropped).toBe(0);
    });

    it('leaves every reference pointing at a live outbound', () => {
        const outbounds: Outbound[] = [
            { tag: 'Auto', type: 'urltest', outbounds: ['[A]', 'B', 'missing', 'Sub'] },
            { tag: 'Sub', type: 'selector', outbounds: ['A', '"B"'], default: 'B' },
            { tag: 'A', type: 'vless' },
            { tag: '[A]', type: 'vless' },
            { tag: 'B', type: 'trojan' },
        ];

        renameAndRewrite(outbounds);

        const live = new Set(outbounds.map(o => o.tag));
        for (const outbound of outbounds) {
            for (const member of outbound.outbounds ?? []) expect(live.has(member)).toBe(true);
            if (outbound.default) expect(live.has(outbound.default)).toBe(true);
        }
    });

    it('changes nothing when run a second time', () => {
        const outbounds: Outbound[] = [
            { tag: 'Auto', type: 'urltest', outbounds: ['HK 01', 'stale', '【HK 01】', 'Sub'] },
            { tag: 'Sub', type: 'selector', outbounds: ['A #1', '[A]'], default: '[A]' },
            { tag: 'HK 01', type: 'vless' },
            { tag: '【HK 01】', type: 'vmess' },
            { tag: 'A', type: 'vless' },
            { tag: 'A', type: 'vless' },
            { tag: 'A #1', type: 'vless' },
        ];

        const { map } = renameAndRewrite(outbounds);
        const once = structuredClone(outbounds);
        const { dropped } = rewriteReferences(outbounds, map);

        expect(outbounds).toEqual(once);
        expect(dropped).toBe(0);
    });
});

describe('createReferenceResolver', () => {
    it('returns the first live variant', () => {
        const outbounds: Outbound[] = [
            { tag: 'Relay', type: 'selector' },
            { tag: 'Relay #1', type: 'selector' },
        ];
        const resolver = createReferenceResolver(outbounds, new Map([['Relay', ['Relay', 'Relay #1']]]));

        expect(resolver.resolveAll('[Relay]')).toEqual(['Relay', 'Relay #1']);
        expect(resolver.resolveOne('[Relay]')).toBe('Relay');
        expect(resolver.resolveOne('Nope')).toBeUndefined();
    });
});
