import OpenAI from 'openai';
import { logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import { BaseProvider } from './base/baseProvider';
import { ProviderOptions, Tone } from './base/translationProvider';

export const OPENAI_SYSTEM_PROMPT =
  'You are a professional translator. Reply with the translation only, without any explanation, commentary or preamble.';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
}

/**
 * The slice of the OpenAI client the provider calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        params: ChatCompletionRequest
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIProviderOptions extends ProviderOptions {
  model?: string;
  baseUrl?: string;
  client?: ChatCompletionsClient;
}

export class OpenAIProvider extends BaseProvider {
  readonly name = 'openai' as const;
  protected readonly label = 'OpenAI';

  private client: ChatCompletionsClient | null = null;
  readonly modelName: string;

  constructor(apiKey: string | undefined, options: OpenAIProviderOptions = {}) {
    super(apiKey, options);
    this.modelName = options.model || ConfigManager.getOpenAIModel();
    this.initializeClient(options);
  }

  private initializeClient(options: OpenAIProviderOptions): void {
    if (!this.apiKey) {
      logger.warn('No OpenAI API key found. Client not initialized.');
      return;
    }
    try {
      // Retries are owned by the fallback chain, not the SDK
      this.client =
        options.client ??
        new OpenAI({
          apiKey: this.apiKey,
          baseURL: options.baseUrl ?? ConfigManager.getOpenAIBaseUrl(),
          timeout: this.timeoutMs,
          maxRetries: 0
        });
      logger.debug(`OpenAI client initialized (model: ${this.modelName})`);
    } catch (error) {
      logger.error('Failed to initialize OpenAI client', error);
      this.client = null;
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
    if (!this.client) {
      throw this.failure('unavailable', 'client not initialized (API key missing)');
    }

    const prompt = this.buildPrompt(text, targetLang, sourceLang, tone);
    logger.debug(`Using model: ${this.modelName}, timeout: ${this.timeoutMs}ms`);
    logger.debug('OpenAI request prompt', { prompt });

    const response = await this.client.chat.completions.create({
      model: this.modelName,
      temperature: 0.3,
      messages: [
        { role: 'system', content: OPENAI_SYSTEM_PROMPT },
        { role: 'user', content: prompt }
      ]
    });

    if (!response.choices || response.choices.length === 0) {
      throw this.failure('malformed_response', 'no choices in OpenAI response');
    }
    return response.choices[0].message.content ?? '';
  }
}
