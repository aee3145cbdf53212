import * as fs from 'fs/promises';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
    APP_DEFAULTS,
    DEFAULT_CHARACTER_ENCODING,
    DEFAULT_CONFIG_DIR,
    DEFAULT_CONFIG_FILE_NAME,
} from '@/constants';
import { BUILTIN_TAXONOMY_NAMES, TaxonomySchema, getBuiltinTaxonomy } from '@/insights';
import type { Taxonomy } from '@/insights';
import { getLogger, setLogLevel } from '@/logging';

export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/**
 * Options as commander hands them over. Numbers arrive as strings and are
 * coerced when the merged config is validated.
 */
export type Args = {
    verbose?: boolean;
    debug?: boolean;
    configDirectory?: string;
    model?: string;
    researchModel?: string;
    baseUrl?: string;
    researchBaseUrl?: string;
    researchMaxTokens?: string | number;
    inputDirectory?: string;
    outputDirectory?: string;
    auto?: boolean;
    first?: boolean;
    failureMode?: string;
    taxonomy?: string;
    maxReviewRounds?: string | number;
    normalize?: boolean;
    save?: boolean;
    researchDirectory?: string;
    maxResults?: string | number;
    maxAgentSteps?: string | number;
};

// The config directory only locates config.yaml, so it is not a key of the file itself
export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    researchModel: z.string().min(1),
    // Unset means the OpenAI API itself
    researchBaseUrl: z.string().url().optional(),
    temperature: z.coerce.number().min(0).max(2),
    maxTokens: z.coerce.number().int().positive(),
    // Unset means no max_tokens on research requests
    researchMaxTokens: z.coerce.number().int().positive().optional(),
    inputDirectory: z.string().min(1),
    outputDirectory: z.string().min(1),
    failureMode: z.enum(['strict', 'lenient']),
    taxonomy: z.union([z.enum(BUILTIN_TAXONOMY_NAMES), TaxonomySchema]),
    maxReviewRounds: z.coerce.number().int().min(1),
    auto: z.boolean(),
    normalizeTranscript: z.boolean(),
    researchDirectory: z.string().min(1),
    searchMaxResults: z.coerce.number().int().min(1).max(20),
    maxAgentSteps: z.coerce.number().int().min(1),
    maxContextChars: z.coerce.number().int().positive(),
}).strict();

export type Config = z.infer<typeof ConfigSchema>;

export interface SecureConfig {
    // Absent when OPENAI_API_KEY is unset; local endpoints take a placeholder key
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    tavilyApiKey?: string;
}

/**
 * Read <configDirectory>/config.yaml. A missing file yields no values.
 */
export const readConfigFile = async (configDirectory: string): Promise<Record<string, unknown>> => {
    const logger = getLogger();
    const configPath = path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

    let content: string;
    try {
        content = await fs.readFile(configPath, DEFAULT_CHARACTER_ENCODING);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            logger.debug('No config file at %s', configPath);
            return {};
        }
        throw new ConfigurationError(`Unable to read config file ${configPath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid YAML in ${configPath}: ${message}`, { cause: error });
    }

    if (parsed === undefined || parsed === null) {
        return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ConfigurationError(`Config file ${configPath} must contain a mapping`);
    }
    logger.debug('Loaded config file %s', configPath);
    return Object.fromEntries(Object.entries(parsed));
};

// Only keys that were actually given on the command line take part in the merge
const cliValues = (args: Args): Record<string, unknown> => {
    const values: Record<string, unknown> = {
        verbose: args.verbose,
        debug: args.debug,
        model: args.model,
        researchModel: args.researchModel,
        baseUrl: args.baseUrl,
        researchBaseUrl: args.researchBaseUrl,
        researchMaxTokens: args.researchMaxTokens,
        inputDirectory: args.inputDirectory,
        outputDirectory: args.outputDirectory,
        auto: args.auto,
        failureMode: args.failureMode,
        taxonomy: args.taxonomy,
        maxReviewRounds: args.maxReviewRounds,
        normalizeTranscript: args.normalize,
        researchDirectory: args.researchDirectory,
        searchMaxResults: args.maxResults,
        maxAgentSteps: args.maxAgentSteps,
    };
    return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
};

/**
 * Merge defaults, file values and CLI values (later wins) and validate.
 */
export const createConfig = (args: Args, fileValues: Record<string, unknown> = {}): Config => {
    const merged = { ...APP_DEFAULTS, ...fileValues, ...cliValues(args) };
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    return result.data;
};

export const resolveTaxonomy = (config: Config): Taxonomy =>
    typeof config.taxonomy === 'string' ? getBuiltinTaxonomy(config.taxonomy) : config.taxonomy;

export const createSecureConfig = (env: NodeJS.ProcessEnv = process.env): SecureConfig => ({
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
    tavilyApiKey: env.TAVILY_API_KEY || undefined,
});

/**
 * Apply the merged verbose/debug settings, so config.yaml can turn them on as well as the flags.
 */
export const applyLogLevel = (config: Pick<Config, 'verbose' | 'debug'>): void => {
    if (config.debug) {
        setLogLevel('debug');
    } else if (config.verbose) {
        setLogLevel('verbose');
    }
};

export const configure = async (args: Args, env: NodeJS.ProcessEnv = process.env): Promise<[Config, SecureConfig]> => {
    const configDirectory = args.configDirectory ?? DEFAULT_CONFIG_DIR;
    const secureConfig = createSecureConfig(env);
    const fileValues = await readConfigFile(configDirectory);
    // OPENAI_BASE_URL sits between the config file and --base-url
    const config = createConfig(args, secureConfig.openaiBaseUrl
        ? { ...fileValues, baseUrl: secureConfig.openaiBaseUrl }
        : fileValues);

    applyLogLevel(config);
    getLogger().debug('Resolved configuration: %s', JSON.stringify({ ...config, taxonomy: typeof config.taxonomy === 'string' ? config.taxonomy : 'custom' }));
    return [config, secureConfig];
};
