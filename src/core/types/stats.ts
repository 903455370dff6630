import { SupportedLanguage } from './language.js';

/** Counts of definitions found in one piece of source code. */
export interface CodeStats {
    /** Functions, methods, constructors, function expressions and arrow functions. */
    functionCount: number;
    /** Classes, structs, enums or interfaces, depending on the language. */
    classStructCount: number;
}

/** Analysis result for a single source file. */
export interface FileStats {
    path: string;
    language: SupportedLanguage;
    stats: CodeStats;
}

/** Totals accumulated for every file of one language. */
export interface LanguageStats {
    fileCount: number;
    functionCount: number;
    classStructCount: number;
}

export function emptyCodeStats(): CodeStats {
    return { functionCount: 0, classStructCount: 0 };
}

export function emptyLanguageStats(): LanguageStats {
    return { fileCount: 0, functionCount: 0, classStructCount: 0 };
}
