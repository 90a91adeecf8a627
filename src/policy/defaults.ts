import type { ModelCatalog } from './types';

export const DEFAULT_CATALOG: ModelCatalog = {
    asr: [
        { id: 'openai/gpt-4o-transcribe', label: 'OpenAI gpt-4o-transcribe', provider: 'openai', modelName: 'gpt-4o-transcribe', default: true },
        { id: 'openai/whisper-1', label: 'OpenAI whisper-1', provider: 'openai', modelName: 'whisper-1' },
        { id: 'zai/glm-asr-2512', label: 'ZAI GLM-ASR-2512', provider: 'zai', modelName: 'glm-asr-2512', maxChunkDurationSeconds: 30 },
    ],
    refinement: [
        // Higher concurrency on this model gets rate limited and stalls.
        { id: 'zai/glm-4.7-flash', label: 'ZAI GLM-4.7 Flash', provider: 'zai', modelName: 'glm-4.7-flash', default: true, maxConcurrency: 1 },
        { id: 'gemini/gemini-2.5-flash', label: 'Gemini 2.5 Flash', provider: 'gemini', modelName: 'gemini-2.5-flash' },
        { id: 'deepseek/deepseek-v3.2', label: 'DeepSeek V3.2', provider: 'deepseek', modelName: 'deepseek-chat' },
        { id: 'openai/gpt-5-mini', label: 'OpenAI gpt-5-mini', provider: 'openai', modelName: 'gpt-5-mini' },
    ],
};
