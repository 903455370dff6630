import fs from 'node:fs';

import type Parser from 'web-tree-sitter';

import { CodeStatsError, errorMessage, IoError, UnsupportedFileTypeError } from '../core/errors.js';
import { languageFromPath } from '../core/language.js';
import { analyzeCode, createParser } from '../core/parser.js';
import { FileStats, SupportedLanguage, WalkOptions } from '../core/types/index.js';
import { DirectoryStats } from './directory-stats.js';
import { nodeFileSystem, walkDirectory, WalkFileSystem } from './directory-walker.js';

/** File system requirements for the analyzer: traversal plus reading file contents. */
export type AnalyzerFileSystem = WalkFileSystem & {
    readFileSync: (filePath: string) => Uint8Array;
};

const defaultFileSystem: AnalyzerFileSystem = {
    ...nodeFileSystem,
    readFileSync: filePath => fs.readFileSync(filePath),
};

/**
 * Analyzes files and directory trees, keeping one parser per language
 * so that repeated files of the same language reuse it.
 */
export class CodeAnalyzer {
    private readonly parsers = new Map<SupportedLanguage, Promise<Parser>>();
    private readonly decoder = new TextDecoder('utf-8', { fatal: true });

    constructor(private readonly fileSystem: AnalyzerFileSystem = defaultFileSystem) {}

    /** Number of languages a parser has been created for. */
    public get parserCount(): number {
        return this.parsers.size;
    }

    public hasParserFor(language: SupportedLanguage): boolean {
        return this.parsers.has(language);
    }

    /**
     * Analyzes one source file.
     * @throws {IoError} When the path is not a regular file or cannot be read as UTF-8.
     * @throws {UnsupportedFileTypeError} When the extension maps to no supported language.
     */
    public async analyzeFile(filePath: string): Promise<FileStats> {
        if (!this.isFile(filePath)) {
            throw new IoError(`${filePath} is not a file`);
        }

        const language = languageFromPath(filePath);
        if (!language) {
            throw new UnsupportedFileTypeError(filePath);
        }

        return this.analyzeSource(filePath, language);
    }

    /**
     * Recursively analyzes every supported file under `root`.
     *
     * Unsupported files are skipped silently. Failures on individual files or directories are
     * reported as warnings and do not stop the walk; the first of them is thrown only when no
     * file at all could be analyzed.
     */
    public async analyzeDirectory(root: string, options: WalkOptions): Promise<DirectoryStats> {
        const stats = new DirectoryStats();
        const errors: CodeStatsError[] = [];

        for (const entry of walkDirectory(root, options, this.fileSystem)) {
            if (entry.kind === 'error') {
                this.reportSkipped(entry.path, entry.error);
                errors.push(entry.error);
                continue;
            }

            const language = languageFromPath(entry.path);
            if (!language) continue;

            try {
                stats.addFile(await this.analyzeSource(entry.path, language));
            } catch (error) {
                if (!(error instanceof CodeStatsError)) throw error;
                this.reportSkipped(entry.path, error);
                errors.push(error);
            }
        }

        const [firstError] = errors;
        if (firstError && stats.totalFiles() === 0) {
            throw firstError;
        }
        return stats;
    }

    /** Releases the WebAssembly memory held by cached parsers. */
    public async dispose(): Promise<void> {
        const results = await Promise.allSettled(this.parsers.values());
        this.parsers.clear();
        for (const result of results) {
            if (result.status === 'fulfilled') result.value.delete();
        }
    }

    private async analyzeSource(filePath: string, language: SupportedLanguage): Promise<FileStats> {
        const sourceCode = this.readSource(filePath);
        const parser = await this.getOrCreateParser(language);
        return {
            path: filePath,
            language,
            stats: analyzeCode(parser, sourceCode, filePath, language),
        };
    }

    private readSource(filePath: string): string {
        try {
            return this.decoder.decode(this.fileSystem.readFileSync(filePath));
        } catch (error) {
            throw new IoError(`Failed to read ${filePath}: ${errorMessage(error)}`, { cause: error });
        }
    }

    private getOrCreateParser(language: SupportedLanguage): Promise<Parser> {
        let parser = this.parsers.get(language);
        if (!parser) {
            parser = createParser(language);
            this.parsers.set(language, parser);
            void parser.catch(() => this.parsers.delete(language));
        }
        return parser;
    }

    private isFile(filePath: string): boolean {
        try {
            return this.fileSystem.statSync(filePath).isFile();
        } catch {
            return false;
        }
    }

    private reportSkipped(entryPath: string, error: Error): void {
        console.warn(`⚠️ Skipped ${entryPath}: ${error.message}`);
    }
}
