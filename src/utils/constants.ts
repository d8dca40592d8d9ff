/**
 * Language code mappings from ISO 639-1 to full language names
 */
export const LANGUAGE_NAMES: { [key: string]: string } = {
    'en': 'English',
    'es': 'Spanish',
    'fr': 'French',
    'de': 'German',
    'it': 'Italian',
    'pt': 'Portuguese',
    'ru': 'Russian',
    'zh': 'Chinese',
    'ja': 'Japanese',
    'ko': 'Korean',
    'ar': 'Arabic',
    'hi': 'Hindi',
    'nl': 'Dutch',
    'pl': 'Polish',
    'sv': 'Swedish',
    'tr': 'Turkish',
    'uk': 'Ukrainian'
};

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
    TIMEOUT: 30000,
    RETRY_COUNT: 1,
    RETRY_DELAY: 1000,
    CACHE_TTL: 60 * 60 * 1000,
    CACHE_MAX_SIZE: 100,
    GEMINI_MODEL: 'gemini-2.0-flash',
    OPENAI_MODEL: 'gpt-4o-mini',
    LOG_LEVEL: 'info' as const
};

/**
 * Supported translation providers, in fallback priority order
 */
export const PROVIDER_PRIORITY = ['deepl', 'gemini', 'openai'] as const;

export type ProviderId = (typeof PROVIDER_PRIORITY)[number];

/**
 * Provider choice offered to the user; 'auto' runs the whole fallback chain
 */
export type ProviderSelection = 'auto' | ProviderId;

export const PROVIDER_LABELS: Record<ProviderSelection, string> = {
    auto: 'Auto (Fallback Chain)',
    deepl: 'DeepL',
    gemini: 'Google Gemini',
    openai: 'OpenAI'
};

/**
 * Cache key sentinel for an omitted source language
 */
export const AUTO_DETECT = 'auto';
