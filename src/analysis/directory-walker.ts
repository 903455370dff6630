import fs from 'node:fs';
import path from 'node:path';

import { errorMessage, IoError } from '../core/errors.js';
import { WalkOptions } from '../core/types/index.js';

type WalkStats = { isFile: () => boolean; isDirectory: () => boolean; isSymbolicLink: () => boolean };

/** File system requirements for directory traversal. */
export type WalkFileSystem = {
    statSync: (filePath: string) => WalkStats;
    lstatSync: (filePath: string) => WalkStats;
    readdirSync: (dirPath: string) => string[];
    realpathSync: (filePath: string) => string;
};

/** A file found during traversal, or a problem met on the way. */
export type WalkEntry =
    | { kind: 'file'; path: string; depth: number }
    | { kind: 'error'; path: string; error: IoError };

export const nodeFileSystem: WalkFileSystem = {
    statSync: filePath => fs.statSync(filePath),
    lstatSync: filePath => fs.lstatSync(filePath),
    readdirSync: dirPath => fs.readdirSync(dirPath),
    realpathSync: filePath => fs.realpathSync(filePath),
};

export function matchesIgnorePattern(filePath: string, patterns: readonly string[]): boolean {
    return patterns.some(pattern => pattern.length > 0 && filePath.includes(pattern));
}

/**
 * Lazily walks a directory tree and yields every regular file within `maxDepth`.
 *
 * - The root is depth 0; its direct children are depth 1.
 * - A root that is a file is yielded as-is.
 * - Links to files are always yielded. Links to directories are entered only with `followLinks`,
 *   and entering an ancestor again yields a loop error instead of recursing forever.
 * - Paths containing an ignore pattern are pruned, directories included.
 * - Entries are visited in name order.
 */
export function* walkDirectory(
    root: string,
    options: WalkOptions,
    fileSystem: WalkFileSystem = nodeFileSystem,
): Generator<WalkEntry> {
    if (matchesIgnorePattern(root, options.ignore)) return;

    let rootStat: WalkStats;
    try {
        rootStat = fileSystem.statSync(root);
    } catch (error) {
        yield walkError(root, error);
        return;
    }

    if (rootStat.isFile()) {
        yield { kind: 'file', path: root, depth: 0 };
    } else if (rootStat.isDirectory()) {
        yield* visitDirectory(root, 0, options, fileSystem, new Set<string>());
    }
}

function* visitDirectory(
    dirPath: string,
    depth: number,
    options: WalkOptions,
    fileSystem: WalkFileSystem,
    ancestors: Set<string>,
): Generator<WalkEntry> {
    if (depth >= options.maxDepth) return;

    let realPath: string | undefined;
    if (options.followLinks) {
        try {
            realPath = fileSystem.realpathSync(dirPath);
        } catch (error) {
            yield walkError(dirPath, error);
            return;
        }
        if (ancestors.has(realPath)) {
            yield {
                kind: 'error',
                path: dirPath,
                error: new IoError(`File system loop found: ${dirPath} points to an ancestor ${realPath}`),
            };
            return;
        }
        ancestors.add(realPath);
    }

    try {
        let names: string[];
        try {
            names = fileSystem.readdirSync(dirPath).sort();
        } catch (error) {
            yield walkError(dirPath, error);
            return;
        }

        const childDepth = depth + 1;
        for (const name of names) {
            const fullPath = path.join(dirPath, name);
            if (matchesIgnorePattern(fullPath, options.ignore)) continue;

            let stat: WalkStats;
            try {
                stat = fileSystem.lstatSync(fullPath);
            } catch (error) {
                yield walkError(fullPath, error);
                continue;
            }

            if (stat.isSymbolicLink()) {
                try {
                    stat = fileSystem.statSync(fullPath);
                } catch (error) {
                    // Dangling links only matter when we were asked to follow them.
                    if (options.followLinks) yield walkError(fullPath, error);
                    continue;
                }
                if (stat.isDirectory() && !options.followLinks) continue;
            }

            if (stat.isDirectory()) {
                yield* visitDirectory(fullPath, childDepth, options, fileSystem, ancestors);
            } else if (stat.isFile()) {
                yield { kind: 'file', path: fullPath, depth: childDepth };
            }
        }
    } finally {
        if (realPath !== undefined) ancestors.delete(realPath);
    }
}

function walkError(entryPath: string, error: unknown): WalkEntry {
    return { kind: 'error', path: entryPath, error: new IoError(errorMessage(error), { cause: error }) };
}
