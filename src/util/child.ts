import { execFile } from 'node:child_process';
import util from 'node:util';

const execFileAsync = util.promisify(execFile);

export interface RunOptions {
    cwd?: string;
    timeoutMs?: number;
    maxBuffer?: number;
}

/**
 * Run an executable without a shell. Arguments are passed through verbatim,
 * so URLs and titles never need quoting.
 */
export async function run(file: string, args: string[], options: RunOptions = {}): Promise<{ stdout: string; stderr: string }> {
    const result = await execFileAsync(file, args, {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: options.maxBuffer ?? 64 * 1024 * 1024,
        encoding: 'utf8',
    });
    return {
        stdout: result.stdout.toString(),
        stderr: result.stderr.toString(),
    };
}
