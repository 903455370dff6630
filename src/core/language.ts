import path from 'node:path';

import { SupportedLanguage } from './types/index.js';

const LANGUAGE_BY_EXTENSION: Record<string, SupportedLanguage> = {
    rs: 'Rust',
    go: 'Go',
    py: 'Python',
    js: 'JavaScript',
    mjs: 'JavaScript',
    cjs: 'JavaScript',
    jsx: 'JavaScript',
    ts: 'TypeScript',
    mts: 'TypeScript',
    cts: 'TypeScript',
    tsx: 'TSX',
    java: 'Java',
};

const GRAMMAR_BY_LANGUAGE: Record<SupportedLanguage, string> = {
    Rust: 'tree-sitter-rust.wasm',
    Go: 'tree-sitter-go.wasm',
    Python: 'tree-sitter-python.wasm',
    JavaScript: 'tree-sitter-javascript.wasm',
    // Separate grammars: `<T>expr` in a `.ts` file is a cast, not a JSX element.
    TypeScript: 'tree-sitter-typescript.wasm',
    TSX: 'tree-sitter-tsx.wasm',
    Java: 'tree-sitter-java.wasm',
};

/**
 * Detects the language of a file from its last extension, ignoring case.
 * @returns `undefined` when the path has no extension or the extension is not supported.
 */
export function languageFromPath(filePath: string): SupportedLanguage | undefined {
    const extension = path.extname(filePath).slice(1).toLowerCase();
    if (!extension) return undefined;
    return Object.hasOwn(LANGUAGE_BY_EXTENSION, extension) ? LANGUAGE_BY_EXTENSION[extension] : undefined;
}

export function isSupportedFile(filePath: string): boolean {
    return languageFromPath(filePath) !== undefined;
}

/** File name of the WebAssembly grammar inside the `tree-sitter-wasms` package. */
export function grammarFile(language: SupportedLanguage): string {
    return GRAMMAR_BY_LANGUAGE[language];
}
