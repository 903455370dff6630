import yaml from 'js-yaml';
import * as path from 'node:path';

import { DirectoryStats } from '../analysis/directory-stats.js';
import { FileStats, OutputFormat } from '../core/types/index.js';

/** Per-file entry of the machine-readable report. Keys are snake_case on the wire. */
export interface FileStatsDocument {
    path: string;
    language: string;
    stats: { function_count: number; class_struct_count: number };
}

/** Machine-readable report written by the `json` and `yaml` formats. */
export interface DirectoryStatsDocument {
    files: FileStatsDocument[];
    total_by_language: Record<string, { file_count: number; function_count: number; class_struct_count: number }>;
    total_stats: { function_count: number; class_struct_count: number };
}

/**
 * Renders directory statistics in the requested format.
 */
export function formatOutput(stats: DirectoryStats, format: OutputFormat): string {
    switch (format) {
        case 'summary':
            return formatSummary(stats);
        case 'detail':
            return formatDetail(stats);
        case 'json':
            return JSON.stringify(toDirectoryDocument(stats), null, 2);
        case 'yaml':
            return dumpYaml(toDirectoryDocument(stats));
    }
}

/** Renders the statistics of a single analyzed file. */
export function formatSingleFile(fileStats: FileStats, format: OutputFormat = 'summary'): string {
    switch (format) {
        case 'json':
            return JSON.stringify(toFileDocument(fileStats), null, 2);
        case 'yaml':
            return dumpYaml(toFileDocument(fileStats));
        default:
            return [
                `Analyzing file: ${fileStats.path} (Language: ${fileStats.language})`,
                'Code Statistics:',
                `Functions: ${fileStats.stats.functionCount}`,
                `Classes/Structs: ${fileStats.stats.classStructCount}`,
            ].join('\n');
    }
}

/**
 * Per-language totals in aligned columns, languages sorted by name, then the grand total:
 *
 * ```text
 * Language Summary:
 *   Python:         2 functions,    1 structs/classes in 1 files
 *   Rust:           8 functions,    3 structs/classes in 2 files
 *
 * Total: 10 functions, 4 structs/classes in 3 files
 * ```
 */
export function formatSummary(stats: DirectoryStats): string {
    let output = 'Language Summary:\n';

    for (const [language, languageStats] of stats.languagesByName()) {
        output += `  ${`${language}:`.padEnd(12)} ${String(languageStats.functionCount).padStart(4)} functions, `
            + `${String(languageStats.classStructCount).padStart(4)} structs/classes in ${languageStats.fileCount} files\n`;
    }

    output += `\nTotal: ${stats.totalStats.functionCount} functions, `
        + `${stats.totalStats.classStructCount} structs/classes in ${stats.totalFiles()} files`;
    return output;
}

/**
 * Orders paths component by component, so `src/a/x.rs` comes before `src/a-b.rs`
 * as it does during traversal.
 */
export function comparePaths(left: string, right: string): number {
    const leftParts = left.split(path.sep);
    const rightParts = right.split(path.sep);
    const length = Math.min(leftParts.length, rightParts.length);

    for (let index = 0; index < length; index++) {
        const a = leftParts[index];
        const b = rightParts[index];
        if (a !== b) return a < b ? -1 : 1;
    }
    return leftParts.length - rightParts.length;
}

/** One block per file, sorted by path, followed by the summary. */
export function formatDetail(stats: DirectoryStats): string {
    const files = [...stats.files].sort((a, b) => comparePaths(a.path, b.path));

    let output = '';
    for (const file of files) {
        output += `${file.path} (${file.language}):\n`
            + `  Functions: ${file.stats.functionCount}\n`
            + `  Structs/Classes: ${file.stats.classStructCount}\n\n`;
    }
    return output + formatSummary(stats);
}

export function toFileDocument(fileStats: FileStats): FileStatsDocument {
    return {
        path: fileStats.path,
        language: fileStats.language,
        stats: {
            function_count: fileStats.stats.functionCount,
            class_struct_count: fileStats.stats.classStructCount,
        },
    };
}

export function toDirectoryDocument(stats: DirectoryStats): DirectoryStatsDocument {
    const totalByLanguage: DirectoryStatsDocument['total_by_language'] = {};
    for (const [language, languageStats] of stats.languagesByName()) {
        totalByLanguage[language] = {
            file_count: languageStats.fileCount,
            function_count: languageStats.functionCount,
            class_struct_count: languageStats.classStructCount,
        };
    }

    return {
        files: stats.files.map(toFileDocument),
        total_by_language: totalByLanguage,
        total_stats: {
            function_count: stats.totalStats.functionCount,
            class_struct_count: stats.totalStats.classStructCount,
        },
    };
}

function dumpYaml(document: object): string {
    // dump() always ends with a newline; the other formats do not.
    return yaml.dump(document, { indent: 2, lineWidth: -1 }).trimEnd();
}
