import OpenAI from 'openai';
import { PROVIDER_BASE_URLS, PROVIDER_ENV_KEYS } from '@/constants';
import { ConfigurationError } from '@/errors';
import type { Provider } from '@/policy';

export type Credentials = Partial<Record<Provider, string>>;

const isProvider = (value: string): value is Provider => Object.prototype.hasOwnProperty.call(PROVIDER_ENV_KEYS, value);

export const credentialsFromEnv = (env: NodeJS.ProcessEnv = process.env): Credentials => {
    const credentials: Credentials = {};
    for (const [provider, key] of Object.entries(PROVIDER_ENV_KEYS)) {
        const value = env[key];
        if (value && isProvider(provider)) credentials[provider] = value;
    }
    return credentials;
};

export interface ClientFactory {
    get(provider: Provider): OpenAI;
}

/**
 * Every provider we use speaks the OpenAI wire format, so one SDK with a
 * per-provider base URL covers them all. Clients are created on first use.
 */
export const create = (credentials: Credentials): ClientFactory => {
    const clients = new Map<Provider, OpenAI>();

    const get = (provider: Provider): OpenAI => {
        const existing = clients.get(provider);
        if (existing) return existing;
        const apiKey = credentials[provider];
        if (!apiKey) {
            throw new ConfigurationError(`${PROVIDER_ENV_KEYS[provider]} is not set`);
        }
        // Retries are ours; the SDK would otherwise retry underneath withRetry.
        const client = new OpenAI({ apiKey, baseURL: PROVIDER_BASE_URLS[provider], maxRetries: 0 });
        clients.set(provider, client);
        return client;
    };

    return { get };
};
