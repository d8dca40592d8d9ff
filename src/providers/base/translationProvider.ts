import type { ProviderId } from '../../utils/constants';

/**
 * Coarse formality hint passed through to a provider
 */
export type Tone = 'default' | 'formal' | 'informal';

export const TONES: readonly Tone[] = ['default', 'formal', 'informal'];

/**
 * Translation provider interface
 */
export interface ITranslationProvider {
    /**
     * Provider identifier reported in results and diagnostics
     */
    readonly name: string;

    /**
     * True when a key was supplied and the client was constructed.
     * Never performs network I/O.
     */
    isAvailable(): boolean;

    /**
     * Translate text to target language
     * @param text Text to translate
     * @param targetLang Target language code (e.g., "es", "en-us")
     * @param sourceLang Source language code; omitted means auto-detect
     * @returns Non-empty translated text; rejects with TranslationError
     */
    translate(
        text: string,
        targetLang: string,
        sourceLang?: string,
        tone?: Tone
    ): Promise<string>;
}

export interface TranslationRequest {
    readonly text: string;
    readonly targetLang: string;
    readonly sourceLang?: string;
    readonly tone: Tone;
}

/**
 * Outcome of a translate call. On success `translation` is non-empty and
 * `error` is absent; on failure `translation` is empty and `error` is set.
 */
export interface TranslationResult {
    translation: string;
    provider?: string;
    error?: string;
}

/**
 * API keys per provider; blank values count as absent
 */
export type ProviderCredentials = Partial<Record<ProviderId, string>>;

/**
 * Settings shared by every provider
 */
export interface ProviderOptions {
    timeoutMs?: number;
}
