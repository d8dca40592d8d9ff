import axios, { AxiosRequestConfig } from 'axios';
import { logger } from '../utils/logger';
import { BaseProvider } from './base/baseProvider';
import { ProviderOptions, Tone } from './base/translationProvider';

const DEEPL_FREE_URL = 'https://api-free.deepl.com';
const DEEPL_PRO_URL = 'https://api.deepl.com';

/**
 * The slice of an axios instance the provider needs
 */
export interface DeepLHttpClient {
  post(url: string, data: unknown, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface DeepLProviderOptions extends ProviderOptions {
  baseUrl?: string;
  http?: DeepLHttpClient;
}

interface DeepLRequestBody {
  text: string[];
  target_lang: string;
  source_lang?: string;
  formality?: 'prefer_more' | 'prefer_less';
}

const FORMALITY: Record<Tone, DeepLRequestBody['formality']> = {
  default: undefined,
  formal: 'prefer_more',
  informal: 'prefer_less'
};

/**
 * DeepL expects upper-case codes with the region kept: "en-us" -> "EN-US"
 */
export function normalizeDeepLLanguage(code: string): string {
  return code.trim().replace(/_/g, '-').toUpperCase();
}

/**
 * Free-tier keys end in ":fx" and are served from a separate host
 */
export function getDeepLBaseUrl(apiKey: string): string {
  return apiKey.endsWith(':fx') ? DEEPL_FREE_URL : DEEPL_PRO_URL;
}

export class DeepLProvider extends BaseProvider {
  readonly name = 'deepl' as const;
  protected readonly label = 'DeepL';

  private client: DeepLHttpClient | null = null;
  private readonly baseUrl: string;

  constructor(apiKey: string | undefined, options: DeepLProviderOptions = {}) {
    super(apiKey, options);
    this.baseUrl = options.baseUrl || (this.apiKey ? getDeepLBaseUrl(this.apiKey) : DEEPL_PRO_URL);

    if (this.apiKey) {
      this.client = options.http ?? axios.create();
      logger.debug(`DeepL client initialized (${this.baseUrl})`);
    } else {
      logger.warn('No DeepL API key found. Client not initialized.');
    }
  }

  isAvailable(): boolean {
    return this.apiKey !== undefined && this.client !== null;
  }

  protected async request(
    text: string,
    targetLang: string,
    sourceLang: string | undefined,
    tone: Tone
  ): Promise<string> {
    if (!this.client || !this.apiKey) {
      throw this.failure('unavailable', 'client not initialized (API key missing)');
    }

    const body: DeepLRequestBody = {
      text: [text],
      target_lang: normalizeDeepLLanguage(targetLang)
    };
    if (sourceLang) {
      body.source_lang = normalizeDeepLLanguage(sourceLang);
    }
    const formality = FORMALITY[tone];
    if (formality) {
      body.formality = formality;
    }

    logger.debug('DeepL request', { target_lang: body.target_lang, source_lang: body.source_lang, formality });

    const response = await this.client.post(`${this.baseUrl}/v2/translate`, body, {
      headers: {
        Authorization: `DeepL-Auth-Key ${this.apiKey}`,
        'Content-Type': 'application/json'
      },
      timeout: this.timeoutMs
    });

    return this.extractText(response.data);
  }

  private extractText(data: unknown): string {
    if (typeof data !== 'object' || data === null || !('translations' in data)) {
      throw this.failure('malformed_response', 'response has no translations');
    }
    const translations: unknown = data.translations;
    if (!Array.isArray(translations) || translations.length === 0) {
      throw this.failure('malformed_response', 'response has no translations');
    }
    const first: unknown = translations[0];
    if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
      throw this.failure('malformed_response', 'translation entry has no text');
    }
    return first.text;
  }
}
