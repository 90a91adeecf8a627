import { phasesOf, type Config } from '@/config';
import { ConfigurationError } from '@/errors';
import { PROVIDER_ENV_KEYS } from '@/constants';
import type { ModelEntry, Policy, Provider } from '@/policy';
import type { SourceKind } from '@/acquisition';

export type Credentials = Partial<Record<Provider, string>>;

// Local media and feed episodes have no text of their own.
const ALWAYS_TRANSCRIBED: readonly SourceKind[] = ['local-media-file', 'feed-episode'];

/**
 * Every model the run may call must be known and have a key. Before
 * expansion the source kinds are unknown, so the ASR model is only checked
 * when transcription is on; once expansion has listed the kinds, any local
 * media or feed episode needs it as well.
 */
export const validateRun = (config: Config, policy: Policy, credentials: Credentials, kinds: readonly SourceKind[] = []): void => {
    const phases = phasesOf(config.phase);
    const needed: ModelEntry[] = [];
    const transcribes = config.transcribe || kinds.some((kind) => ALWAYS_TRANSCRIBED.includes(kind));
    if (phases.acquire && transcribes) needed.push(policy.requireModel('asr', config.asrModel));
    if (phases.refine) needed.push(policy.requireModel('refinement', config.refineModel));

    const missing = new Set<string>();
    for (const model of needed) {
        if (!credentials[model.provider]) missing.add(`${PROVIDER_ENV_KEYS[model.provider]} (for ${model.id})`);
    }
    if (missing.size > 0) {
        throw new ConfigurationError(`Missing API key(s): ${[...missing].join(', ')}`);
    }
};
