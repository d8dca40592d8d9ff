import { logger } from '../../utils/logger';
import { ConfigManager } from '../../utils/config';
import { LANGUAGE_NAMES, ProviderId } from '../../utils/constants';
import {
  toTranslationError,
  TranslationError,
  TranslationFailureReason
} from '../../utils/errors';
import { ITranslationProvider, ProviderOptions, Tone } from './translationProvider';

const TONE_INSTRUCTIONS: Record<Tone, string | null> = {
  default: null,
  formal: 'Use a formal, polite register.',
  informal: 'Use an informal, casual register.'
};

/**
 * Resolve a language code to its English name, looked up by the base code
 * ("es-MX" -> "Spanish"). Unknown codes are returned as given.
 */
export function getLanguageName(code: string): string {
  const base = code.trim().toLowerCase().split(/[-_]/)[0];
  return LANGUAGE_NAMES[base] || code;
}

/**
 * Base class for translation providers
 */
export abstract class BaseProvider implements ITranslationProvider {
  abstract readonly name: ProviderId;

  /**
   * Human-readable provider name used as the error message prefix
   */
  protected abstract readonly label: string;

  protected readonly apiKey: string | undefined;
  protected readonly timeoutMs: number;

  constructor(apiKey: string | undefined, options: ProviderOptions = {}) {
    this.apiKey = apiKey && apiKey.trim() !== '' ? apiKey.trim() : undefined;
    this.timeoutMs = options.timeoutMs ?? ConfigManager.getTimeout();
  }

  abstract isAvailable(): boolean;

  /**
   * Issue the backend request and return the raw translated text
   */
  protected abstract request(
    text: string,
    targetLang: string,
    sourceLang: string | undefined,
    tone: Tone
  ): Promise<string>;

  async translate(
    text: string,
    targetLang: string,
    sourceLang?: string,
    tone: Tone = 'default'
  ): Promise<string> {
    logger.info(
      `${this.label} translation request received (text length: ${text.length} chars, target: ${targetLang})`
    );

    if (!this.isAvailable()) {
      throw this.failure('unavailable', 'client not initialized (API key missing)');
    }

    const startTime = Date.now();
    let translated: string;
    try {
      translated = (await this.request(text, targetLang, sourceLang, tone)).trim();
    } catch (error) {
      const failure = toTranslationError(this.name, this.label, error);
      logger.error(failure.message);
      throw failure;
    }

    if (!translated) {
      const failure = this.failure('empty_response', 'empty translation returned');
      logger.error(failure.message);
      throw failure;
    }

    logger.info(`${this.label} translation successful (${Date.now() - startTime}ms)`);
    return translated;
  }

  protected failure(reason: TranslationFailureReason, detail: string): TranslationError {
    return new TranslationError(
      `${this.label} translation failed: ${detail}`,
      this.name,
      reason
    );
  }

  /**
   * Build translation prompt for generative backends. Tone is expressed as
   * an instruction since these backends have no formality parameter.
   */
  protected buildPrompt(
    text: string,
    targetLang: string,
    sourceLang: string | undefined,
    tone: Tone
  ): string {
    const targetLanguage = getLanguageName(targetLang);
    const task = sourceLang
      ? `Translate the following text from ${getLanguageName(sourceLang)} into ${targetLanguage}.`
      : `Detect the language of the following text and translate it into ${targetLanguage}.`;

    const rules = [
      'Preserve the meaning, formatting and line breaks of the original.',
      `Output ONLY the translated ${targetLanguage} text. No explanations, notes, preambles or quotation marks.`
    ];
    const toneInstruction = TONE_INSTRUCTIONS[tone];
    if (toneInstruction) {
      rules.unshift(toneInstruction);
    }

    return `${task}

Rules:
${rules.map((rule) => `- ${rule}`).join('\n')}

Text:
${text}`;
  }
}
