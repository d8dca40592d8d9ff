import 'dotenv/config';
import { DEFAULT_CONFIG } from './constants';
import { DEFAULT_RETRY_CONFIG, RetryConfig } from './retryHelper';
import type { ProviderCredentials } from '../providers/base/translationProvider';

/**
 * Centralized configuration manager, backed by environment variables
 * (a local `.env` file is loaded on import)
 */
export class ConfigManager {
  private static getString(name: string): string | undefined {
    const value = process.env[name];
    return value && value.trim() !== '' ? value.trim() : undefined;
  }

  private static getNumber(name: string, fallback: number): number {
    const raw = this.getString(name);
    if (raw === undefined) {
      return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
  }

  /**
   * Get DeepL API key
   */
  static getDeepLApiKey(): string | undefined {
    return this.getString('DEEPL_API_KEY');
  }

  /**
   * Get Gemini API key
   */
  static getGeminiApiKey(): string | undefined {
    return this.getString('GEMINI_API_KEY');
  }

  /**
   * Get Gemini model
   */
  static getGeminiModel(): string {
    return this.getString('GEMINI_MODEL') || DEFAULT_CONFIG.GEMINI_MODEL;
  }

  /**
   * Get OpenAI API key
   */
  static getOpenAIApiKey(): string | undefined {
    return this.getString('OPENAI_API_KEY');
  }

  /**
   * Get OpenAI model
   */
  static getOpenAIModel(): string {
    return this.getString('OPENAI_MODEL') || DEFAULT_CONFIG.OPENAI_MODEL;
  }

  /**
   * Get OpenAI Base URL
   */
  static getOpenAIBaseUrl(): string | undefined {
    return this.getString('OPENAI_BASE_URL');
  }

  /**
   * All provider credentials found in the environment
   */
  static getCredentials(): ProviderCredentials {
    return {
      deepl: this.getDeepLApiKey(),
      gemini: this.getGeminiApiKey(),
      openai: this.getOpenAIApiKey()
    };
  }

  /**
   * Get per-request timeout in milliseconds
   */
  static getTimeout(): number {
    return this.getNumber('TRANSLATION_TIMEOUT_MS', DEFAULT_CONFIG.TIMEOUT);
  }

  /**
   * Get retry configuration
   */
  static getRetryConfig(): RetryConfig {
    return {
      maxRetries: Math.floor(
        this.getNumber('TRANSLATION_RETRY_COUNT', DEFAULT_CONFIG.RETRY_COUNT)
      ),
      initialDelayMs: this.getNumber(
        'TRANSLATION_RETRY_DELAY_MS',
        DEFAULT_CONFIG.RETRY_DELAY
      ),
      maxDelayMs: DEFAULT_RETRY_CONFIG.maxDelayMs,
      backoffMultiplier: DEFAULT_RETRY_CONFIG.backoffMultiplier
    };
  }

  /**
   * Get cache time-to-live in milliseconds
   */
  static getCacheTtl(): number {
    return this.getNumber('CACHE_TTL_MS', DEFAULT_CONFIG.CACHE_TTL);
  }

  /**
   * Get maximum number of cached translations
   */
  static getCacheMaxSize(): number {
    return Math.floor(
      this.getNumber('CACHE_MAX_SIZE', DEFAULT_CONFIG.CACHE_MAX_SIZE)
    );
  }
}
