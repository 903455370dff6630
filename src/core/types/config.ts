/** Report layouts the formatter can produce. */
export const OUTPUT_FORMATS = ['summary', 'detail', 'json', 'yaml'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

/** Options that control how a directory tree is traversed. */
export interface WalkOptions {
    /** Deepest level visited; the root itself is depth 0. */
    maxDepth: number;
    /** Enter symbolically linked directories. */
    followLinks: boolean;
    /** Substring patterns; any path containing one of them is skipped. */
    ignore: string[];
}

/** Fully resolved settings for one analysis run. */
export interface AnalysisConfig extends WalkOptions {
    format: OutputFormat;
    /** Upgrades the `summary` format to `detail`. */
    detail: boolean;
}

/** Shape accepted from a configuration file. Every key is optional. */
export type AnalysisConfigFile = Partial<AnalysisConfig>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
    format: 'summary',
    detail: false,
    ignore: [],
    followLinks: false,
    maxDepth: 100,
};
