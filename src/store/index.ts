/**
 * Artifact Store
 *
 * Raw-text artifacts and their metadata sidecars live side by side in the
 * intermediate directory, named after the source identity:
 *
 *   {identity}_raw_transcript.txt
 *   {identity}.meta.json
 *
 * The sidecar also records how the text was acquired, under `acquisition`,
 * so a resumed run can report it.
 *
 * Identities are unique within a run, so concurrent units never write the
 * same path.
 */

import path from 'node:path';
import * as Storage from '@/util/storage';
import * as Logging from '@/logging';
import { uniqueName } from '@/util/filename';
import { type SourceMetadata, normalize } from '@/util/metadata';
import { ACQUISITION_METHODS, type AcquisitionMethod } from '@/acquisition/types';
import { METADATA_SUFFIX, RAW_TRANSCRIPT_SUFFIX, SOURCE_MEDIA_SUFFIX } from '@/constants';

export interface ArtifactRef {
    identity: string;
    path: string;
}

export interface Provenance {
    method: AcquisitionMethod;
    mediaPath?: string;
}

export interface Artifact extends ArtifactRef {
    text: string;
    metadata: SourceMetadata;
    provenance?: Provenance;
}

export interface ArtifactStore {
    readonly directory: string;
    rawTextPath(identity: string): string;
    metadataPath(identity: string): string;
    hasArtifact(identity: string): Promise<boolean>;
    saveArtifact(identity: string, text: string, metadata: SourceMetadata, provenance?: Provenance): Promise<string>;
    loadArtifact(identity: string): Promise<Artifact>;
    loadText(artifactPath: string): Promise<string>;
    loadMetadata(identity: string): Promise<SourceMetadata>;
    discover(): Promise<ArtifactRef[]>;
    moveMedia(identity: string, mediaPath: string, mediaDir: string): Promise<string>;
    documentExists(outputPath: string): Promise<boolean>;
    saveDocument(outputPath: string, content: string): Promise<void>;
}

export const identityFromPath = (artifactPath: string): string =>
    path.basename(artifactPath).slice(0, -RAW_TRANSCRIPT_SUFFIX.length);

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const readMetadata = (raw: unknown): SourceMetadata => {
    if (!isRecord(raw)) return {};
    const str = (key: string): string | undefined => {
        const value = raw[key];
        return typeof value === 'string' ? value : undefined;
    };
    const duration = raw.durationSeconds;
    const tags = raw.tags;
    return normalize({
        title: str('title'),
        sourceType: str('sourceType'),
        sourceUrl: str('sourceUrl'),
        author: str('author'),
        publishedAt: str('publishedAt'),
        fetchedAt: str('fetchedAt'),
        durationSeconds: typeof duration === 'number' ? duration : undefined,
        language: str('language'),
        description: str('description'),
        tags: Array.isArray(tags) ? tags.filter((t): t is string => typeof t === 'string') : undefined,
        modelUsed: str('modelUsed'),
    });
};

const isMethod = (value: unknown): value is AcquisitionMethod =>
    ACQUISITION_METHODS.some((method) => method === value);

const readProvenance = (raw: unknown): Provenance | undefined => {
    if (!isRecord(raw) || !isRecord(raw.acquisition)) return undefined;
    const { method, mediaPath } = raw.acquisition;
    if (!isMethod(method)) return undefined;
    return { method, mediaPath: typeof mediaPath === 'string' ? mediaPath : undefined };
};

export const create = (directory: string): ArtifactStore => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const rawTextPath = (identity: string): string => path.join(directory, `${identity}${RAW_TRANSCRIPT_SUFFIX}`);
    const metadataPath = (identity: string): string => path.join(directory, `${identity}${METADATA_SUFFIX}`);

    const hasArtifact = (identity: string): Promise<boolean> => storage.isFile(rawTextPath(identity));

    const saveArtifact = async (identity: string, text: string, metadata: SourceMetadata, provenance?: Provenance): Promise<string> => {
        const target = rawTextPath(identity);
        await storage.writeFile(target, text);
        const sidecar = { ...normalize(metadata), acquisition: provenance };
        await storage.writeFile(metadataPath(identity), JSON.stringify(sidecar, null, 2) + '\n');
        return target;
    };

    const loadText = (artifactPath: string): Promise<string> => storage.readFile(artifactPath);

    const readSidecar = async (identity: string): Promise<unknown> => {
        const sidecar = metadataPath(identity);
        if (!(await storage.exists(sidecar))) return undefined;
        try {
            const raw: unknown = JSON.parse(await storage.readFile(sidecar));
            return raw;
        } catch (error) {
            logger.warn('Ignoring unreadable metadata sidecar %s: %s', sidecar, error instanceof Error ? error.message : String(error));
            return undefined;
        }
    };

    const loadMetadata = async (identity: string): Promise<SourceMetadata> => readMetadata(await readSidecar(identity));

    const loadArtifact = async (identity: string): Promise<Artifact> => {
        const artifactPath = rawTextPath(identity);
        const text = await loadText(artifactPath);
        const raw = await readSidecar(identity);
        return {
            identity,
            path: artifactPath,
            text,
            metadata: readMetadata(raw),
            provenance: readProvenance(raw),
        };
    };

    const discover = async (): Promise<ArtifactRef[]> => {
        if (!(await storage.isDirectory(directory))) return [];
        const files = await storage.listFiles(directory, `*${RAW_TRANSCRIPT_SUFFIX}`);
        return files.map((file) => ({ identity: identityFromPath(file), path: file }));
    };

    const moveMedia = async (identity: string, mediaPath: string, mediaDir: string): Promise<string> => {
        const ext = path.extname(mediaPath);
        const existing = new Set(
            (await storage.isDirectory(mediaDir)) ? (await storage.listFiles(mediaDir, `*${ext || ''}`)).map((f) => path.basename(f)) : [],
        );
        const stem = uniqueName(`${identity}${SOURCE_MEDIA_SUFFIX}`, (candidate) => existing.has(`${candidate}${ext}`));
        const target = path.join(mediaDir, `${stem}${ext}`);
        await storage.moveFile(mediaPath, target);
        return target;
    };

    const documentExists = (outputPath: string): Promise<boolean> => storage.isFile(outputPath);

    const saveDocument = (outputPath: string, content: string): Promise<void> => storage.writeFile(outputPath, content);

    return {
        directory,
        rawTextPath,
        metadataPath,
        hasArtifact,
        saveArtifact,
        loadArtifact,
        loadText,
        loadMetadata,
        discover,
        moveMedia,
        documentExists,
        saveDocument,
    };
};
