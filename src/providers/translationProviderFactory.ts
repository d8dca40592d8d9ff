import { ITranslationProvider, ProviderCredentials } from './base/translationProvider';
import { DeepLProvider, DeepLProviderOptions } from './deeplProvider';
import { GeminiProvider, GeminiProviderOptions } from './geminiProvider';
import { OpenAIProvider, OpenAIProviderOptions } from './openaiProvider';
import { logger } from '../utils/logger';
import { PROVIDER_PRIORITY, ProviderId, ProviderSelection } from '../utils/constants';

/**
 * Per-provider settings applied when building the chain
 */
export interface ProviderOverrides {
    deepl?: DeepLProviderOptions;
    gemini?: GeminiProviderOptions;
    openai?: OpenAIProviderOptions;
}

function hasKey(key: string | undefined): key is string {
    return typeof key === 'string' && key.trim() !== '';
}

/**
 * Provider ids whose credential is present, in priority order
 */
export function configuredProviders(credentials: ProviderCredentials): ProviderId[] {
    return PROVIDER_PRIORITY.filter((id) => hasKey(credentials[id]));
}

/**
 * Create a single provider
 */
export function createProvider(
    id: ProviderId,
    apiKey: string,
    overrides: ProviderOverrides = {}
): ITranslationProvider {
    switch (id) {
        case 'deepl':
            return new DeepLProvider(apiKey, overrides.deepl);
        case 'gemini':
            return new GeminiProvider(apiKey, overrides.gemini);
        case 'openai':
            return new OpenAIProvider(apiKey, overrides.openai);
    }
}

/**
 * Build the fallback chain from whichever credentials are supplied.
 * Order is fixed: DeepL, then Gemini, then OpenAI.
 */
export function createProviders(
    credentials: ProviderCredentials,
    overrides: ProviderOverrides = {}
): ITranslationProvider[] {
    const providers: ITranslationProvider[] = [];

    for (const id of PROVIDER_PRIORITY) {
        const apiKey = credentials[id];
        if (!hasKey(apiKey)) {
            continue;
        }
        const provider = createProvider(id, apiKey, overrides);
        if (!provider.isAvailable()) {
            logger.warn(`Skipping ${id}: client could not be initialized`);
            continue;
        }
        providers.push(provider);
    }

    logger.debug(`Translation providers configured: ${providers.map((p) => p.name).join(', ') || 'none'}`);
    return providers;
}

/**
 * Narrow credentials to the provider the user picked; 'auto' keeps them all
 */
export function selectCredentials(
    selection: ProviderSelection,
    credentials: ProviderCredentials
): ProviderCredentials {
    if (selection === 'auto') {
        return { ...credentials };
    }
    const selected: ProviderCredentials = {};
    const key = credentials[selection];
    if (hasKey(key)) {
        selected[selection] = key;
    }
    return selected;
}
