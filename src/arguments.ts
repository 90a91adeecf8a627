import { Command, InvalidArgumentError, Option } from 'commander';
import { ConfigSchema, PHASES, type Config } from '@/config';
import { ConfigurationError } from '@/errors';
import { getLogger } from '@/logging';
import { styleIds } from '@/prompt/styles';
import { DEFAULT_CONFIG_FILE, PROGRAM_NAME, VERSION } from '@/constants';
import type { FeedRange } from '@/input';

export interface Args {
    inputs: string[];
    csv?: string;
    configFile: string;
    /** Only the options given on the command line. */
    overrides: Partial<Config>;
}

// Commander option name -> configuration key.
const OPTION_KEYS = {
    outputDir: 'outputDir',
    intermediateDir: 'intermediateDir',
    mediaDir: 'mediaDir',
    tempDir: 'tempDir',
    styles: 'styles',
    language: 'language',
    asrModel: 'asrModel',
    refineModel: 'refineModel',
    models: 'modelsFile',
    maxAsyncWorkers: 'maxAsyncWorkers',
    maxProcessWorkers: 'maxProcessWorkers',
    chunkSize: 'chunkSize',
    captions: 'preferCaptions',
    transcribe: 'transcribe',
    saveMedia: 'saveMedia',
    resume: 'resume',
    skipExisting: 'skipExisting',
    enhance: 'enhance',
    phase: 'phase',
    feedRange: 'feedRange',
    dryRun: 'dryRun',
    verbose: 'verbose',
    debug: 'debug',
} as const satisfies Record<string, keyof Config>;

export const parsePositiveInt = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
};

export const parseStyles = (value: string): string[] =>
    value.split(',').map((style) => style.trim()).filter(Boolean);

/**
 * `3` is episode 3 onwards, `3:5` episodes 3 to 5, `:5` the first five.
 */
export const parseFeedRange = (value: string): FeedRange => {
    const match = /^(\d*)(?::(\d*))?$/.exec(value.trim());
    if (!match || (!match[1] && !match[2])) {
        throw new InvalidArgumentError('Expected START, START:END or :END.');
    }
    const start = match[1] ? Number(match[1]) : 1;
    const end = match[2] ? Number(match[2]) : 0;
    if (start < 1 || (end !== 0 && end < start)) {
        throw new InvalidArgumentError('START must be at least 1 and END not before START.');
    }
    return { start, end };
};

export const createProgram = (): Command => {
    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Turn media, feeds and documents into refined Markdown')
        .description('Acquires text from videos, podcasts, audio files and documents, then rewrites it in one or more styles with an LLM')
        .argument('[inputs...]', 'URLs, files or directories to process')
        .option('--csv <file>', 'batch file with one job per row (input, styles, language, output_subdir)')
        .option('-c, --config <file>', 'configuration file', DEFAULT_CONFIG_FILE)
        .option('--models <file>', 'YAML file replacing the built-in model lists')
        .option('-o, --output-dir <dir>', 'directory for refined documents')
        .option('--intermediate-dir <dir>', 'directory for raw transcripts and metadata')
        .option('--media-dir <dir>', 'directory for saved source media')
        .option('--temp-dir <dir>', 'directory for scratch files')
        .option('--styles <ids>', `comma-separated styles (${styleIds().join(', ')})`, parseStyles)
        .option('--language <language>', 'output language')
        .option('--asr-model <id>', 'speech recognition model')
        .option('--refine-model <id>', 'refinement model')
        .option('--max-async-workers <n>', 'network and refinement concurrency', parsePositiveInt)
        .option('--max-process-workers <n>', 'concurrent ffmpeg jobs', parsePositiveInt)
        .option('--chunk-size <words>', 'word count above which text is refined in pieces', parsePositiveInt)
        .option('--no-captions', 'do not use platform captions, always transcribe')
        .option('--no-transcribe', 'never transcribe streaming videos; those without captions fail')
        .option('--save-media', 'keep downloaded media in the media directory')
        .option('--resume', 'reuse raw transcripts already in the intermediate directory')
        .option('--skip-existing', 'do not overwrite refined documents that already exist')
        .option('--enhance', 'ask the refinement model for a description and tags when missing')
        .addOption(new Option('--phase <phase>', 'which phases to run').choices(PHASES))
        .option('--feed-range <range>', 'episodes to take from each feed, e.g. 1:5', parseFeedRange)
        .option('--dry-run', 'list what would be processed and stop')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .version(VERSION);
    return program;
};

/**
 * Parse the command line. Options that only carry commander's defaults are
 * left out of `overrides` so a configuration file can still set them.
 */
export const parse = (argv: readonly string[], from: 'node' | 'user' = 'node'): Args => {
    const program = createProgram();
    program.parse([...argv], { from });
    const opts: Record<string, unknown> = program.opts();

    const raw: Record<string, unknown> = {};
    for (const [option, key] of Object.entries(OPTION_KEYS)) {
        if (program.getOptionValueSource(option) === 'cli') {
            raw[key] = opts[option];
        }
    }
    const parsed = ConfigSchema.partial().safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ConfigurationError(`Invalid command line options: ${issues}`);
    }

    const csv = opts.csv;
    const configFile = opts.config;
    const args: Args = {
        inputs: program.args,
        csv: typeof csv === 'string' ? csv : undefined,
        configFile: typeof configFile === 'string' ? configFile : DEFAULT_CONFIG_FILE,
        overrides: parsed.data,
    };
    getLogger().debug('Command line: %s', JSON.stringify(args));
    return args;
};
