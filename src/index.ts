// src/index.ts

import { CodeAnalyzer } from './analysis/code-analyzer.js';
import { DirectoryStats } from './analysis/directory-stats.js';
import { DEFAULT_ANALYSIS_CONFIG, FileStats, WalkOptions } from './core/types/index.js';

export * from './core/types/index.js';
export * from './core/errors.js';
export { languageFromPath, isSupportedFile } from './core/language.js';
export { analyzeCode, createParser } from './core/parser.js';
export { loadConfigFile, resolveConfig, validateConfigFile } from './core/config-loader.js';
export { CodeAnalyzer } from './analysis/code-analyzer.js';
export { DirectoryStats } from './analysis/directory-stats.js';
export { walkDirectory } from './analysis/directory-walker.js';
export { formatOutput, formatSingleFile } from './output/formatter.js';

/**
 * Recursively analyzes every supported file under a directory.
 * Options not given fall back to the CLI defaults (depth 100, links not followed, nothing ignored).
 */
export async function analyzeDirectory(root: string, options: Partial<WalkOptions> = {}): Promise<DirectoryStats> {
    const analyzer = new CodeAnalyzer();
    try {
        return await analyzer.analyzeDirectory(root, {
            maxDepth: options.maxDepth ?? DEFAULT_ANALYSIS_CONFIG.maxDepth,
            followLinks: options.followLinks ?? DEFAULT_ANALYSIS_CONFIG.followLinks,
            ignore: options.ignore ?? [],
        });
    } finally {
        await analyzer.dispose();
    }
}

/** Analyzes a single source file. */
export async function analyzeSingleFile(filePath: string): Promise<FileStats> {
    const analyzer = new CodeAnalyzer();
    try {
        return await analyzer.analyzeFile(filePath);
    } finally {
        await analyzer.dispose();
    }
}
