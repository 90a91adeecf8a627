import * as fs from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';

export interface Utility {
    exists(filePath: string): Promise<boolean>;
    isDirectory(filePath: string): Promise<boolean>;
    isFile(filePath: string): Promise<boolean>;
    createDirectory(dirPath: string): Promise<void>;
    readFile(filePath: string): Promise<string>;
    writeFile(filePath: string, data: string): Promise<void>;
    deleteFile(filePath: string): Promise<void>;
    deleteDirectory(dirPath: string): Promise<void>;
    moveFile(from: string, to: string): Promise<void>;
    getFileSize(filePath: string): Promise<number>;
    listFiles(directory: string, pattern: string): Promise<string[]>;
}

export interface Options {
    log?: (message: string, ...args: unknown[]) => void;
}

const errorCode = (error: unknown): string | undefined => {
    if (typeof error !== 'object' || error === null) return undefined;
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
};

export const create = (options: Options = {}): Utility => {
    const log = options.log ?? (() => {});

    const stat = async (filePath: string) => {
        try {
            return await fs.stat(filePath);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') return undefined;
            throw error;
        }
    };

    const exists = async (filePath: string): Promise<boolean> => (await stat(filePath)) !== undefined;

    const isDirectory = async (filePath: string): Promise<boolean> => (await stat(filePath))?.isDirectory() ?? false;

    const isFile = async (filePath: string): Promise<boolean> => (await stat(filePath))?.isFile() ?? false;

    const createDirectory = async (dirPath: string): Promise<void> => {
        await fs.mkdir(dirPath, { recursive: true });
    };

    const readFile = async (filePath: string): Promise<string> => fs.readFile(filePath, { encoding: 'utf-8' });

    const writeFile = async (filePath: string, data: string): Promise<void> => {
        await createDirectory(path.dirname(filePath));
        await fs.writeFile(filePath, data, { encoding: 'utf-8' });
        log('Wrote %s', filePath);
    };

    const deleteFile = async (filePath: string): Promise<void> => {
        await fs.rm(filePath, { force: true });
    };

    const deleteDirectory = async (dirPath: string): Promise<void> => {
        await fs.rm(dirPath, { recursive: true, force: true });
    };

    const moveFile = async (from: string, to: string): Promise<void> => {
        await createDirectory(path.dirname(to));
        try {
            await fs.rename(from, to);
        } catch (error) {
            if (errorCode(error) !== 'EXDEV') throw error;
            // Different device: copy then unlink.
            await fs.copyFile(from, to);
            await fs.unlink(from);
        }
        log('Moved %s -> %s', from, to);
    };

    const getFileSize = async (filePath: string): Promise<number> => (await fs.stat(filePath)).size;

    const listFiles = async (directory: string, pattern: string): Promise<string[]> => {
        const matches = await glob(pattern, { cwd: directory, nodir: true, absolute: true });
        return matches.sort();
    };

    return {
        exists,
        isDirectory,
        isFile,
        createDirectory,
        readFile,
        writeFile,
        deleteFile,
        deleteDirectory,
        moveFile,
        getFileSize,
        listFiles,
    };
};
