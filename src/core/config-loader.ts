import * as fs from 'node:fs';
import * as path from 'node:path';

import yaml from 'js-yaml';

import { ConfigValidationError, errorMessage } from './errors.js';
import {
    AnalysisConfig,
    AnalysisConfigFile,
    DEFAULT_ANALYSIS_CONFIG,
    OUTPUT_FORMATS,
    OutputFormat,
} from './types/index.js';

const CONFIG_KEYS = ['format', 'detail', 'ignore', 'followLinks', 'maxDepth'] as const;

function isOutputFormat(value: unknown): value is OutputFormat {
    return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks a parsed configuration document and narrows it to {@link AnalysisConfigFile}.
 * @throws {ConfigValidationError} On unknown keys or wrongly typed values.
 */
export function validateConfigFile(raw: unknown, source = 'configuration'): AnalysisConfigFile {
    // An empty YAML document parses to undefined.
    if (raw === undefined || raw === null) return {};
    if (!isRecord(raw)) {
        throw new ConfigValidationError(`${source} must contain a mapping of options.`);
    }

    const unknownKeys = Object.keys(raw).filter(key => !(CONFIG_KEYS as readonly string[]).includes(key));
    if (unknownKeys.length > 0) {
        throw new ConfigValidationError(`Unknown option(s) in ${source}: ${unknownKeys.join(', ')}`);
    }

    const config: AnalysisConfigFile = {};
    const { format, detail, ignore, followLinks, maxDepth } = raw;

    if (format !== undefined) {
        if (!isOutputFormat(format)) {
            throw new ConfigValidationError(`"format" in ${source} must be one of: ${OUTPUT_FORMATS.join(', ')}.`);
        }
        config.format = format;
    }
    if (detail !== undefined) {
        if (typeof detail !== 'boolean') throw new ConfigValidationError(`"detail" in ${source} must be a boolean.`);
        config.detail = detail;
    }
    if (followLinks !== undefined) {
        if (typeof followLinks !== 'boolean') throw new ConfigValidationError(`"followLinks" in ${source} must be a boolean.`);
        config.followLinks = followLinks;
    }
    if (ignore !== undefined) {
        if (!Array.isArray(ignore) || !ignore.every((pattern): pattern is string => typeof pattern === 'string')) {
            throw new ConfigValidationError(`"ignore" in ${source} must be a list of strings.`);
        }
        config.ignore = ignore;
    }
    if (maxDepth !== undefined) {
        if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 0) {
            throw new ConfigValidationError(`"maxDepth" in ${source} must be a non-negative integer.`);
        }
        config.maxDepth = maxDepth;
    }

    return config;
}

/**
 * Reads a YAML (`.yaml`, `.yml`) or JSON configuration file.
 * Relative paths resolve against the current working directory.
 */
export function loadConfigFile(configPath: string): AnalysisConfigFile {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
    }

    let raw: unknown;
    try {
        const content = fs.readFileSync(resolvedPath, 'utf8');
        const extension = path.extname(resolvedPath).toLowerCase();
        raw = extension === '.json' ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
        throw new Error(`Failed to load configuration file ${resolvedPath}: ${errorMessage(error)}`);
    }

    return validateConfigFile(raw, resolvedPath);
}

/**
 * Merges settings with precedence command line > configuration file > defaults.
 * Ignore patterns from both sources are combined.
 */
export function resolveConfig(cliOptions: AnalysisConfigFile, fileConfig: AnalysisConfigFile = {}): AnalysisConfig {
    return {
        format: cliOptions.format ?? fileConfig.format ?? DEFAULT_ANALYSIS_CONFIG.format,
        detail: cliOptions.detail ?? fileConfig.detail ?? DEFAULT_ANALYSIS_CONFIG.detail,
        followLinks: cliOptions.followLinks ?? fileConfig.followLinks ?? DEFAULT_ANALYSIS_CONFIG.followLinks,
        maxDepth: cliOptions.maxDepth ?? fileConfig.maxDepth ?? DEFAULT_ANALYSIS_CONFIG.maxDepth,
        ignore: [...(fileConfig.ignore ?? []), ...(cliOptions.ignore ?? [])],
    };
}

/** The format actually rendered: `detail` upgrades `summary`, other formats are left alone. */
export function effectiveFormat(config: Pick<AnalysisConfig, 'format' | 'detail'>): OutputFormat {
    return config.detail && config.format === 'summary' ? 'detail' : config.format;
}
