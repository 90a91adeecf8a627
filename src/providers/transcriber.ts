import * as fs from 'node:fs';
import * as Logging from '@/logging';
import { FALLBACK_ASR_MODEL } from '@/constants';
import { errorMessage, getStatusCode } from '@/errors';
import type { ModelEntry } from '@/policy';
import type { Transcriber } from '@/acquisition';
import type { ClientFactory } from './clients';

const isUnsupportedModel = (error: unknown): boolean => {
    const status = getStatusCode(error);
    const message = errorMessage(error).toLowerCase();
    return (status === 400 || status === 404) && message.includes('model');
};

export const create = (clients: ClientFactory): Transcriber => {
    const logger = Logging.getLogger();
    const fallbackName = FALLBACK_ASR_MODEL.split('/').pop() ?? 'whisper-1';

    const request = async (chunkPath: string, model: ModelEntry, modelName: string): Promise<string> => {
        const openai = clients.get(model.provider);
        const startTime = Date.now();
        const transcription = await openai.audio.transcriptions.create({
            model: modelName,
            file: fs.createReadStream(chunkPath),
        });
        logger.debug('Transcribed %s with %s in %ss', chunkPath, modelName, ((Date.now() - startTime) / 1000).toFixed(1));
        return transcription.text.trim();
    };

    const transcribe = async (chunkPath: string, model: ModelEntry): Promise<string> => {
        try {
            return await request(chunkPath, model, model.modelName);
        } catch (error) {
            if (model.provider === 'openai' && model.modelName !== fallbackName && isUnsupportedModel(error)) {
                logger.warn('Model %s rejected (%s), falling back to %s', model.modelName, errorMessage(error), fallbackName);
                return request(chunkPath, model, fallbackName);
            }
            throw error;
        }
    };

    return { transcribe };
};
