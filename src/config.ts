/**
 * Run Configuration
 *
 * Defaults, then the YAML config file, then command-line options; the
 * merged result is validated once with zod.
 */

import yaml from 'js-yaml';
import { z } from 'zod';
import * as Storage from '@/util/storage';
import * as Logging from '@/logging';
import { ConfigurationError } from '@/errors';
import { isStyleId, styleIds } from '@/prompt/styles';
import {
    DEFAULT_ASR_MODEL,
    DEFAULT_CHUNK_SIZE,
    DEFAULT_DEBUG,
    DEFAULT_DRY_RUN,
    DEFAULT_INTERMEDIATE_DIRECTORY,
    DEFAULT_LANGUAGE,
    DEFAULT_MAX_ASYNC_WORKERS,
    DEFAULT_MAX_PROCESS_WORKERS,
    DEFAULT_MEDIA_DIRECTORY,
    DEFAULT_OUTPUT_DIRECTORY,
    DEFAULT_REFINE_MODEL,
    DEFAULT_STYLES,
    DEFAULT_TEMP_DIRECTORY,
    DEFAULT_VERBOSE,
} from '@/constants';

export const PHASES = ['all', 'acquire', 'refine'] as const;
export type Phase = typeof PHASES[number];

export const FeedRangeSchema = z.object({
    start: z.number().int().min(1),
    end: z.number().int().min(0),
}).refine((range) => range.end === 0 || range.end >= range.start, {
    message: 'end must be 0 or not before start',
});

export const ConfigSchema = z.object({
    outputDir: z.string().min(1),
    intermediateDir: z.string().min(1),
    mediaDir: z.string().min(1),
    tempDir: z.string().min(1),
    styles: z.array(z.string()).min(1).refine((ids) => ids.every(isStyleId), {
        message: `styles must be drawn from: ${styleIds().join(', ')}`,
    }),
    language: z.string().min(1),
    asrModel: z.string().min(1),
    refineModel: z.string().min(1),
    modelsFile: z.string().optional(),
    maxAsyncWorkers: z.number().int().positive(),
    maxProcessWorkers: z.number().int().positive(),
    chunkSize: z.number().int().positive(),
    preferCaptions: z.boolean(),
    transcribe: z.boolean(),
    saveMedia: z.boolean(),
    resume: z.boolean(),
    skipExisting: z.boolean(),
    enhance: z.boolean(),
    phase: z.enum(PHASES),
    feedRange: FeedRangeSchema.optional(),
    dryRun: z.boolean(),
    verbose: z.boolean(),
    debug: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = {
    outputDir: DEFAULT_OUTPUT_DIRECTORY,
    intermediateDir: DEFAULT_INTERMEDIATE_DIRECTORY,
    mediaDir: DEFAULT_MEDIA_DIRECTORY,
    tempDir: DEFAULT_TEMP_DIRECTORY,
    styles: DEFAULT_STYLES,
    language: DEFAULT_LANGUAGE,
    asrModel: DEFAULT_ASR_MODEL,
    refineModel: DEFAULT_REFINE_MODEL,
    maxAsyncWorkers: DEFAULT_MAX_ASYNC_WORKERS,
    maxProcessWorkers: DEFAULT_MAX_PROCESS_WORKERS,
    chunkSize: DEFAULT_CHUNK_SIZE,
    preferCaptions: true,
    transcribe: true,
    saveMedia: false,
    resume: false,
    skipExisting: false,
    enhance: false,
    phase: 'all',
    dryRun: DEFAULT_DRY_RUN,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
};

const FileConfigSchema = ConfigSchema.partial().strict();

const describeIssues = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const parseConfigFile = (content: string, source: string): Partial<Config> => {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (error) {
        throw new ConfigurationError(`Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }
    if (raw === undefined || raw === null) return {};
    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration in ${source}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
};

export const readConfigFile = async (configFile: string): Promise<Partial<Config>> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    if (!(await storage.isFile(configFile))) {
        logger.debug('No configuration file at %s', configFile);
        return {};
    }
    logger.debug('Reading configuration from %s', configFile);
    return parseConfigFile(await storage.readFile(configFile), configFile);
};

/**
 * Later sources win; undefined values never overwrite.
 */
export const mergeConfig = (...sources: Array<Partial<Config>>): Config => {
    const merged: Record<string, unknown> = {};
    for (const source of sources) {
        for (const [key, value] of Object.entries(source)) {
            if (value !== undefined) merged[key] = value;
        }
    }
    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
};

export const phasesOf = (phase: Phase): { acquire: boolean; refine: boolean } => ({
    acquire: phase === 'all' || phase === 'acquire',
    refine: phase === 'all' || phase === 'refine',
});
