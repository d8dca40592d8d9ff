import { GoogleGenerativeAI } from '@google/generative-ai';
import { logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import { BaseProvider } from './base/baseProvider';
import { ProviderOptions, Tone } from './base/translationProvider';

/**
 * The slice of the SDK's GenerativeModel the provider calls
 */
export interface GeminiContentModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export interface GeminiProviderOptions extends ProviderOptions {
  model?: string;
  client?: GeminiContentModel;
}

export class GeminiProvider extends BaseProvider {
  readonly name = 'gemini' as const;
  protected readonly label = 'Gemini';

  private model: GeminiContentModel | null = null;
  readonly modelName: string;

  constructor(apiKey: string | undefined, options: GeminiProviderOptions = {}) {
    super(apiKey, options);
    this.modelName = options.model || ConfigManager.getGeminiModel();
    this.initializeClient(options.client);
  }

  private initializeClient(client: GeminiContentModel | undefined): void {
    if (!this.apiKey) {
      logger.warn('No Gemini API key found. Client not initialized.');
      return;
    }
    try {
      this.model =
        client ??
        new GoogleGenerativeAI(this.apiKey).getGenerativeModel(
          { model: this.modelName },
          { timeout: this.timeoutMs }
        );
      logger.debug(`Gemini client initialized (model: ${this.modelName})`);
    } catch (error) {
      logger.error('Failed to initialize Gemini client', error);
      this.model = null;
    }
  }

  isAvailable(): boolean {
    return this.apiKey !== undefined && this.model !== null;
  }

  protected async request(
    text: string,
    targetLang: string,
    sourceLang: string | undefined,
    tone: Tone
  ): Promise<string> {
    if (!this.model) {
      throw this.failure('unavailable', 'client not initialized (API key missing)');
    }

    const prompt = this.buildPrompt(text, targetLang, sourceLang, tone);
    logger.debug(`Using model: ${this.modelName}, timeout: ${this.timeoutMs}ms`);
    logger.debug('Gemini request prompt', { prompt });

    const result = await this.model.generateContent(prompt);
    if (!result || !result.response) {
      throw this.failure('malformed_response', 'empty response from Gemini API');
    }
    return result.response.text();
  }
}
