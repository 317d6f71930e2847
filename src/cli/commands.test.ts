import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigManager } from '../config-manager.js';
import { buildDocx, makeTempDir, p, removeTempDir, table } from '../tools/docx/test-utils/docx-fixtures.js';
import {
    renderImagesOutline,
    renderOutline,
    renderParagraphs,
    renderTable,
    runCli,
    USAGE,
    type CliIO,
} from './commands.js';

const RULE = '='.repeat(50);

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
    const stdout: string[] = [];
    const stderr: string[] = [];
    return {
        stdout,
        stderr,
        out: (line) => stdout.push(line),
        err: (line) => stderr.push(line),
    };
}

describe('renderers', () => {
    it('indents outline headings by level', () => {
        expect(
            renderOutline({
                total: 12,
                headings: [
                    { index: 0, level: 1, text: 'Introduction' },
                    { index: 11, level: 3, text: 'Deep' },
                ],
            }),
        ).toEqual(['Document outline (12 paragraphs)', RULE, '[  0] H1: Introduction', '    [ 11] H3: Deep']);
    });

    it('truncates long paragraph text', () => {
        const [header, body] = renderParagraphs([
            {
                index: 4,
                text: 'y'.repeat(90),
                style: 'Normal',
                is_heading: false,
                heading_level: null,
                is_empty: false,
                is_truly_empty: false,
                has_embedded: false,
                runs: [],
                format: { alignment: null, line_spacing: null },
                xml: { has_numPr: true, style_name: 'Normal' },
            },
        ]);
        expect(header).toBe('[4] Normal | empty=false | numPr=true');
        expect(body).toBe(`  ${'y'.repeat(80)}...`);
    });

    it('shortens table cells and marks unknown image sizes', () => {
        expect(renderTable({ table_index: 2, rows: 1, cols: 2, data: [['a'.repeat(25), 'b']] })).toEqual([
            'Table 2 (1 rows x 2 cols)',
            RULE,
            `[0] ${'a'.repeat(20)} | b`,
        ]);
        expect(
            renderImagesOutline([{ image_index: 0, type: 'chart', width_cm: null, height_cm: 3.5, description: '' }]),
        ).toEqual(['Images (1)', RULE, '[0] chart | ? x 3.5cm']);
    });
});

describe('runCli', () => {
    let tmpDir: string;
    let docPath: string;
    let config: ConfigManager;

    beforeEach(() => {
        tmpDir = makeTempDir();
        docPath = path.join(tmpDir, 'doc.docx');
        const body =
            p('Introduction', 'Heading1') + p('Body') + p('Background', 'Heading2') + p('Details') + table([['k', 'v']]);
        fs.writeFileSync(docPath, buildDocx({ body }));
        config = new ConfigManager(path.join(tmpDir, 'config.json'), {});
    });

    afterEach(() => {
        removeTempDir(tmpDir);
    });

    it('prints usage without a file', async () => {
        const io = captureIO();
        expect(await runCli([], io, config)).toBe(1);
        expect(io.stderr).toEqual([USAGE]);
    });

    it('prints the outline by default', async () => {
        const io = captureIO();
        expect(await runCli([docPath], io, config)).toBe(0);
        expect(io.stdout).toEqual([
            'Document outline (4 paragraphs)',
            RULE,
            '[  0] H1: Introduction',
            '  [  2] H2: Background',
        ]);
    });

    it('reads selected paragraphs', async () => {
        const io = captureIO();
        await runCli([docPath, 'read', '1,3'], io, config);
        expect(io.stdout).toEqual([
            '[1] Normal | empty=false | numPr=false',
            '  Body',
            '[3] Normal | empty=false | numPr=false',
            '  Details',
        ]);
    });

    it('lists and reads tables', async () => {
        const io = captureIO();
        await runCli([docPath, 'tables'], io, config);
        await runCli([docPath, 'table', '0'], io, config);
        expect(io.stdout).toEqual([
            'Tables (1)',
            RULE,
            '[0] 1 rows x 2 cols | k',
            'Table 0 (1 rows x 2 cols)',
            RULE,
            '[0] k | v',
        ]);
    });

    it('applies an operations file and saves to the output path', async () => {
        const opsPath = path.join(tmpDir, 'ops.json');
        const outPath = path.join(tmpDir, 'out.docx');
        fs.writeFileSync(opsPath, JSON.stringify([{ op: 'set_text', index: 1, text: 'Edited' }]));

        const io = captureIO();
        expect(await runCli([docPath, 'apply', opsPath, outPath], io, config)).toBe(0);
        expect(JSON.parse(io.stdout.join('\n'))).toEqual({
            success: 1,
            failed: 0,
            details: [{ op: 'set_text', index: 1, status: 'ok' }],
            saved_to: outPath,
        });

        const check = captureIO();
        await runCli([outPath, 'read', '1'], check, config);
        expect(check.stdout[1]).toBe('  Edited');
    });

    it('reports errors on stderr with exit code 1', async () => {
        const missing = path.join(tmpDir, 'missing.docx');
        const cases: Array<[string[], string]> = [
            [[missing], `Error: File not found: ${missing}`],
            [[docPath, 'frob'], 'Error: Unknown command: frob'],
            [[docPath, 'read', '1,a'], 'Error: Not a paragraph index: "a"'],
            [[docPath, 'table', '3'], 'Error: table index out of range: 3 (valid range 0..0)'],
        ];
        for (const [argv, message] of cases) {
            const io = captureIO();
            expect(await runCli(argv, io, config)).toBe(1);
            expect(io.stderr).toEqual([message]);
        }
    });
});
