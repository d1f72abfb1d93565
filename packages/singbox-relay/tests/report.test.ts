// tests/report.test.ts — Tests for the run summary
import { describe, it, expect } from 'vitest';
import { createReport, logReport, totalChained } from '../src/lib/report.js';
import { logPreview } from '../src/lib/logger.js';
import type { Logger } from '../src/lib/logger.js';

type Line = [level: 'info' | 'warn', message: string];

function recordingLogger(): { logger: Logger; lines: Line[] } {
    const lines: Line[] = [];
    return {
        lines,
        logger: {
            info: (message: string) => { lines.push(['info', message]); },
            warn: (message: string) => { lines.push(['warn', message]); },
        },
    };
}

describe('logPreview', () => {
    it('logs every item under the limit', () => {
        const { logger, lines } = recordingLogger();
        logPreview(logger, ['a', 'b']);
        expect(lines).toEqual([['info', '    a'], ['info', '    b']]);
    });

    it('summarises the rest past the limit', () => {
        const { logger, lines } = recordingLogger();
        logPreview(logger, ['a', 'b', 'c', 'd'], 2);
        expect(lines).toEqual([
            ['info', '    a'],
            ['info', '    b'],
            ['info', '    ... 2 more'],
        ]);
    });
});

describe('logReport', () => {
    it('warns when nothing was chained', () => {
        const { logger, lines } = recordingLogger();
        logReport(createReport(), logger);
        expect(lines).toEqual([
            ['info', 'Summary:'],
            ['warn', '  no detour assigned; check the chain table'],
        ]);
    });

    it('lists hops, groups and chains', () => {
        const report = createReport();
        report.hops = [
            {
                label: 'hop1 (entry)',
                configured: true,
                fetched: 2,
                inserted: 2,
                groups: [
                    { group: 'Entry', hop: 'hop1 (entry)', before: 1, inserted: 2 },
                    { group: 'Other', hop: 'hop1 (entry)', before: 0, inserted: 0 },
                ],
                invalidRules: [],
            },
            { label: 'hop2 (relay)', configured: false, fetched: 0, inserted: 0, groups: [], invalidRules: [] },
            {
                label: 'hop3 (landing)',
                configured: true,
                fetched: 0,
                inserted: 0,
                groups: [],
                invalidRules: [],
                error: 'timeout',
            },
        ];
        report.chains = [
            {
                source: 'Entry',
                target: 'Relay',
                assigned: ['a', 'b'],
                skippedTerminal: 0,
                skippedSelfLoop: 0,
                emptySource: false,
            },
            {
                source: 'Relay',
                target: 'Landing',
                assigned: [],
                skippedTerminal: 0,
                skippedSelfLoop: 0,
                emptySource: true,
            },
        ];

        const { logger, lines } = recordingLogger();
        logReport(report, logger);

        expect(totalChained(report)).toBe(2);
        expect(lines).toEqual([
            ['info', 'Summary:'],
            ['info', '  hop1 (entry): fetched 2, inserted 2'],
            ['info', '    Entry: 1 + 2 = 3'],
            ['info', '  hop2 (relay): not configured'],
            ['info', '  hop3 (landing): fetched 0, inserted 0 (failed: timeout)'],
            ['info', '  detours assigned: 2'],
            ['info', '  Entry (2 node(s)) ➜ Relay'],
            ['info', '    ├─ a'],
            ['info', '    ├─ b'],
            ['warn', '  Relay: no nodes resolved, skipped'],
        ]);
    });

    it('still names empty sources when nothing was chained', () => {
        const report = createReport();
        report.chains = [{
            source: 'Entry',
            target: 'Relay',
            assigned: [],
            skippedTerminal: 0,
            skippedSelfLoop: 0,
            emptySource: true,
        }];

        const { logger, lines } = recordingLogger();
        logReport(report, logger);

        expect(lines).toEqual([
            ['info', 'Summary:'],
            ['warn', '  no detour assigned; check the chain table'],
            ['warn', '  Entry: no nodes resolved, skipped'],
        ]);
    });

    it('reports cycles and rejected edges', () => {
        const report = createReport();
        report.cycles = [{ source: 'C', target: 'A', path: ['A', 'B', 'C', 'A'] }];
        report.rejectedEdges = [{ source: 'X', target: 'A', reason: 'missing-endpoint' }];
        report.fallback = { tag: 'COMPATIBLE', groups: ['Empty'] };

        const { logger, lines } = recordingLogger();
        logReport(report, logger);

        expect(lines).toEqual([
            ['info', 'Summary:'],
            ['warn', '  cycle cut: C -> A (A ➜ B ➜ C ➜ A)'],
            ['info', '  chain ignored (missing-endpoint): X -> A'],
            ['info', '  fallback COMPATIBLE added to 1 empty group(s)'],
            ['warn', '  no detour assigned; check the chain table'],
        ]);
    });
});
