/** Discriminates the failures that can occur while analyzing sources. */
export type CodeStatsErrorKind = 'parse' | 'language-setup' | 'unsupported-file-type' | 'io';

/**
 * Base class for every analysis failure.
 * Use `kind` to branch on the failure without `instanceof` chains.
 */
export class CodeStatsError extends Error {
    constructor(public readonly kind: CodeStatsErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CodeStatsError';
    }
}

/** tree-sitter produced no tree for a file. */
export class ParseError extends CodeStatsError {
    constructor(public readonly filePath: string, options?: { cause?: unknown }) {
        super('parse', `Failed to parse file: ${filePath}`, options);
        this.name = 'ParseError';
    }
}

/** A grammar could not be loaded or attached to a parser. */
export class LanguageSetupError extends CodeStatsError {
    constructor(options?: { cause?: unknown }) {
        super('language-setup', 'Failed to set language grammar', options);
        this.name = 'LanguageSetupError';
    }
}

export class UnsupportedFileTypeError extends CodeStatsError {
    constructor(public readonly filePath: string) {
        super('unsupported-file-type', `Unsupported file type: ${filePath}`);
        this.name = 'UnsupportedFileTypeError';
    }
}

/** File system failure: missing paths, unreadable files, traversal problems. */
export class IoError extends CodeStatsError {
    constructor(public readonly detail: string, options?: { cause?: unknown }) {
        super('io', `IO error: ${detail}`, options);
        this.name = 'IoError';
    }
}

/**
 * Error thrown when a configuration file has unknown keys or wrongly typed values.
 */
export class ConfigValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigValidationError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
