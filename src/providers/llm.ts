import * as Logging from '@/logging';
import { ProviderRejectedError } from '@/errors';
import type { ModelEntry } from '@/policy';
import type { LlmClient } from '@/refinement';
import type { ClientFactory } from './clients';

export const create = (clients: ClientFactory): LlmClient => {
    const logger = Logging.getLogger();

    const complete = async (prompt: string, model: ModelEntry): Promise<string> => {
        const openai = clients.get(model.provider);
        logger.debug('Sending %d characters to %s', prompt.length, model.id);
        const startTime = Date.now();

        const completion = await openai.chat.completions.create({
            model: model.modelName,
            messages: [{ role: 'user', content: prompt }],
        });

        const response = completion.choices[0]?.message?.content?.trim();
        if (!response) {
            throw new ProviderRejectedError(`Empty response from ${model.id}`);
        }
        logger.debug('%s responded in %ss', model.id, ((Date.now() - startTime) / 1000).toFixed(1));
        return response;
    };

    return { complete };
};
