import { CodeStats, emptyCodeStats, emptyLanguageStats, FileStats, LanguageStats, SupportedLanguage } from '../core/types/index.js';

/**
 * Aggregated statistics for every file analyzed under a directory,
 * kept per file, per language and overall.
 */
export class DirectoryStats {
    public readonly files: FileStats[] = [];
    public readonly totalByLanguage = new Map<SupportedLanguage, LanguageStats>();
    public readonly totalStats: CodeStats = emptyCodeStats();

    public addFile(fileStats: FileStats): void {
        const { functionCount, classStructCount } = fileStats.stats;

        this.totalStats.functionCount += functionCount;
        this.totalStats.classStructCount += classStructCount;

        let languageStats = this.totalByLanguage.get(fileStats.language);
        if (!languageStats) {
            languageStats = emptyLanguageStats();
            this.totalByLanguage.set(fileStats.language, languageStats);
        }
        languageStats.fileCount++;
        languageStats.functionCount += functionCount;
        languageStats.classStructCount += classStructCount;

        this.files.push(fileStats);
    }

    public totalFiles(): number {
        return this.files.length;
    }

    /** Language totals ordered by language name. */
    public languagesByName(): Array<[SupportedLanguage, LanguageStats]> {
        return [...this.totalByLanguage.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    }
}
