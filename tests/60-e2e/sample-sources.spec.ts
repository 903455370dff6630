import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import path from 'node:path';

import { analyzeDirectory, analyzeSingleFile, CodeStats, SupportedLanguage } from '@src/index.js';
import { runAnalysis } from '@src/command.js';
import { cleanupTempDirs, createControlledProject, createMixedProject, SOURCES_DIR } from '../shared/helpers.js';

const expectedByFile: Record<string, { language: SupportedLanguage; stats: CodeStats }> = {
    'test.py': { language: 'Python', stats: { functionCount: 4, classStructCount: 1 } },
    'sample.rs': { language: 'Rust', stats: { functionCount: 4, classStructCount: 2 } },
    'sample.go': { language: 'Go', stats: { functionCount: 3, classStructCount: 1 } },
    'sample.js': { language: 'JavaScript', stats: { functionCount: 6, classStructCount: 1 } },
    'module.mjs': { language: 'JavaScript', stats: { functionCount: 4, classStructCount: 1 } },
    'sample.ts': { language: 'TypeScript', stats: { functionCount: 6, classStructCount: 1 } },
    'sample.tsx': { language: 'TSX', stats: { functionCount: 4, classStructCount: 1 } },
    'Sample.java': { language: 'Java', stats: { functionCount: 7, classStructCount: 4 } },
};

const sourcesSummary = [
    'Language Summary:',
    '  Go:             3 functions,    1 structs/classes in 1 files',
    '  Java:           7 functions,    4 structs/classes in 1 files',
    '  JavaScript:    10 functions,    2 structs/classes in 2 files',
    '  Python:         4 functions,    1 structs/classes in 1 files',
    '  Rust:           4 functions,    2 structs/classes in 1 files',
    '  TSX:            4 functions,    1 structs/classes in 1 files',
    '  TypeScript:     6 functions,    1 structs/classes in 1 files',
    '',
    'Total: 38 functions, 12 structs/classes in 8 files',
].join('\n');

describe('E2E: analyzing sample sources', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
        cleanupTempDirs();
    });

    describe('single files', () => {
        for (const [name, expected] of Object.entries(expectedByFile)) {
            it(`should count definitions in ${name}`, async () => {
                const file = path.join(SOURCES_DIR, name);
                await expect(analyzeSingleFile(file)).resolves.toEqual({ path: file, ...expected });
            });
        }

        it('should report the Python sample the way the CLI prints it', async () => {
            const file = path.join(SOURCES_DIR, 'test.py');
            const output = await runAnalysis(file, { ignore: [] });

            expect(output.split('\n')).toEqual([
                `Analyzing file: ${file} (Language: Python)`,
                'Code Statistics:',
                'Functions: 4',
                'Classes/Structs: 1',
            ]);
        });
    });

    describe('directories', () => {
        it('should summarize every sample source', async () => {
            expect(await runAnalysis(SOURCES_DIR, { ignore: [] })).toBe(sourcesSummary);
            expect(console.warn).not.toHaveBeenCalled();
        });

        it('should exclude a language through an ignore pattern on its extension', async () => {
            const stats = await analyzeDirectory(SOURCES_DIR, { ignore: ['.java'] });

            expect(stats.totalFiles()).toBe(7);
            expect(stats.totalStats).toEqual({ functionCount: 31, classStructCount: 8 });
            expect(stats.totalByLanguage.has('Java')).toBe(false);
        });

        it('should total the controlled project exactly', async () => {
            const stats = await analyzeDirectory(createControlledProject());

            expect(stats.totalFiles()).toBe(3);
            expect(stats.totalStats).toEqual({ functionCount: 5, classStructCount: 4 });
            expect(stats.totalByLanguage.get('Rust')).toEqual({ fileCount: 2, functionCount: 3, classStructCount: 3 });
            expect(stats.totalByLanguage.get('Python')).toEqual({ fileCount: 1, functionCount: 2, classStructCount: 1 });
        });

        it('should break the mixed project down by language', async () => {
            const stats = await analyzeDirectory(createMixedProject());

            expect(stats.totalFiles()).toBe(8);
            expect(stats.totalStats).toEqual({ functionCount: 13, classStructCount: 7 });
            expect(Object.fromEntries(stats.languagesByName())).toEqual({
                Go: { fileCount: 1, functionCount: 1, classStructCount: 1 },
                Java: { fileCount: 1, functionCount: 1, classStructCount: 1 },
                JavaScript: { fileCount: 1, functionCount: 3, classStructCount: 1 },
                Python: { fileCount: 1, functionCount: 2, classStructCount: 1 },
                Rust: { fileCount: 3, functionCount: 4, classStructCount: 2 },
                TypeScript: { fileCount: 1, functionCount: 2, classStructCount: 1 },
            });
        });

        it('should leave version control directories out when asked', async () => {
            const stats = await analyzeDirectory(createMixedProject(), { ignore: ['.git'] });

            expect(stats.totalFiles()).toBe(7);
            expect(stats.totalStats).toEqual({ functionCount: 12, classStructCount: 7 });
            expect(stats.files.some(file => file.path.includes('.git'))).toBe(false);
        });

        it('should stay at the top level with a maximum depth of one', async () => {
            const root = createMixedProject();
            const stats = await analyzeDirectory(root, { maxDepth: 1 });

            expect(stats.files.map(file => path.relative(root, file.path)).sort()).toEqual(['Main.java', 'main.go']);
            expect(stats.totalStats).toEqual({ functionCount: 2, classStructCount: 2 });
        });
    });
});
