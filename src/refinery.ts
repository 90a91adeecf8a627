import Table from 'cli-table3';
import * as Arguments from '@/arguments';
import * as Input from '@/input';
import * as Pipeline from '@/pipeline';
import * as Policy from '@/policy';
import * as Providers from '@/providers';
import * as Storage from '@/util/storage';
import { assignIdentities, type AcquisitionTask } from '@/acquisition';
import { DEFAULT_CONFIG, mergeConfig, phasesOf, readConfigFile, type Config } from '@/config';
import { ConfigurationError, describeError } from '@/errors';
import { getLogger, setLogLevel } from '@/logging';
import { outputFileName, type JobOverrides } from '@/refinement';
import { fromLogger } from '@/reporter';
import { PROGRAM_NAME, VERSION } from '@/constants';

interface RunInputs {
    inputs: Input.InputSpec[];
    jobs: Map<number, JobOverrides>;
}

const print = (text: string): void => {
    // eslint-disable-next-line no-console
    console.log(text);
};

const readInputs = async (args: Arguments.Args): Promise<RunInputs> => {
    const inputs: Input.InputSpec[] = [];
    const jobs: RunInputs['jobs'] = new Map();
    if (args.csv) {
        const logger = getLogger();
        const storage = Storage.create({ log: (message, ...rest) => logger.debug(message, ...rest) });
        if (!(await storage.isFile(args.csv))) {
            throw new ConfigurationError(`CSV file not found: ${args.csv}`);
        }
        const batch = Input.parseBatch(await storage.readFile(args.csv));
        inputs.push(...batch.inputs);
        for (const [jobId, overrides] of batch.overrides) jobs.set(jobId, overrides);
    }
    inputs.push(...args.inputs.map((input) => ({ input })));
    return { inputs, jobs };
};

const printReport = (report: Pipeline.CompletionReport): void => {
    if (report.lines.length > 0) {
        const table = new Table({
            head: ['Phase', 'ID', 'Status', 'Detail'],
            colWidths: [9, 40, 11, 60],
            style: {
                head: ['cyan', 'bold'],
            },
            wordWrap: true,
        });
        for (const line of report.lines) {
            table.push([line.phase, line.id, line.category ? `${line.status} (${line.category})` : line.status, line.detail]);
        }
        print(table.toString());
    }
    print(Pipeline.summarize(report));
};

const dryRun = async (config: Config, run: RunInputs, services: Providers.Services): Promise<void> => {
    const tasks: AcquisitionTask[] = phasesOf(config.phase).acquire
        ? assignIdentities(await Input.create({
            services: services.expansion,
            reporter: fromLogger(getLogger()),
            feedRange: config.feedRange,
        }).expand(run.inputs))
        : [];

    const table = new Table({
        head: ['ID', 'Kind', 'Source', 'Outputs'],
        colWidths: [32, 22, 50, 40],
        style: {
            head: ['cyan', 'bold'],
        },
        wordWrap: true,
    });
    for (const task of tasks) {
        const styles = (task.jobId !== undefined ? run.jobs.get(task.jobId)?.styles : undefined) ?? config.styles;
        table.push([task.id, task.sourceKind, task.sourcePath, styles.map((style) => outputFileName(task.id, style)).join('\n')]);
    }
    print(table.toString());
    print(`${tasks.length} source(s); styles: ${config.styles.join(', ')}; phase: ${config.phase}`);
};

/**
 * Runs the command line and resolves to the process exit code.
 */
export async function main(argv: readonly string[] = process.argv): Promise<number> {
    // eslint-disable-next-line no-console
    console.info(`Starting ${PROGRAM_NAME}: ${VERSION}`);

    let cancelled = false;
    const onInterrupt = () => {
        if (cancelled) {
            getLogger().error('Interrupted twice, exiting');
            process.exit(1);
        }
        cancelled = true;
        getLogger().warn('Cancelling: running units finish, nothing new starts. Press Ctrl-C again to exit now.');
    };

    try {
        const args = Arguments.parse(argv);
        const config = mergeConfig(DEFAULT_CONFIG, await readConfigFile(args.configFile), args.overrides);
        if (config.verbose) setLogLevel('verbose');
        if (config.debug) setLogLevel('debug');
        getLogger().debug('Final configuration: %s', JSON.stringify(config, null, 2));

        const run = await readInputs(args);
        if (phasesOf(config.phase).acquire && run.inputs.length === 0) {
            throw new ConfigurationError('No inputs given. Pass URLs, files or directories, or --csv <file>.');
        }

        const policy = await Policy.load(config.modelsFile);
        const credentials = Providers.credentialsFromEnv();
        const services = Providers.create(credentials, config.tempDir);

        if (config.dryRun) {
            await dryRun(config, run, services);
            return 0;
        }

        process.on('SIGINT', onInterrupt);
        const report = await Pipeline.run({
            config,
            policy,
            services,
            credentials,
            inputs: run.inputs,
            jobs: run.jobs,
            reporter: fromLogger(getLogger()),
            isCancelled: () => cancelled,
        });
        printReport(report);
        return 0;
    } catch (error) {
        const logger = getLogger();
        logger.error('Exiting due to error: %s', describeError(error));
        if (error instanceof Error && error.stack) logger.debug(error.stack);
        return 1;
    } finally {
        process.off('SIGINT', onInterrupt);
    }
}
