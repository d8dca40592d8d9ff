import { logger } from '../utils/logger';
import { describeError, TranslationError } from '../utils/errors';
import { calculateDelay, DEFAULT_RETRY_CONFIG, RetryConfig, sleep } from '../utils/retryHelper';
import {
  ITranslationProvider,
  TranslationRequest,
  TranslationResult
} from '../providers/base/translationProvider';

export const NO_PROVIDERS_ERROR =
  'No translation providers available. Please configure at least one API key.';

export const ALL_FAILED_PREFIX = 'All translation providers failed: ';

export interface AttemptFailure {
  provider: string;
  /** 1-based attempt number for this provider */
  attempt: number;
  error: unknown;
}

export interface FallbackTranslatorOptions {
  retry?: Partial<Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>>;
  onAttemptFailed?: (failure: AttemptFailure) => void;
}

/**
 * Tries providers strictly in order, retrying each up to `retryCount`
 * times, and returns the first success or an aggregated failure.
 * Never rejects.
 */
export class FallbackTranslator {
  private readonly chain: ITranslationProvider[];
  private readonly retryConfig: RetryConfig;
  private readonly onAttemptFailed?: (failure: AttemptFailure) => void;

  constructor(providers: ITranslationProvider[] = [], options: FallbackTranslatorOptions = {}) {
    this.chain = [...providers];
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.onAttemptFailed = options.onAttemptFailed;
  }

  get providers(): readonly ITranslationProvider[] {
    return this.chain;
  }

  addProvider(provider: ITranslationProvider): void {
    this.chain.push(provider);
  }

  async translate(request: TranslationRequest, retryCount: number = 0): Promise<TranslationResult> {
    if (this.chain.length === 0) {
      logger.warn('Translation requested with no providers configured');
      return { translation: '', error: NO_PROVIDERS_ERROR };
    }

    const attempts = Math.max(0, Math.floor(retryCount)) + 1;
    const diagnostics: string[] = [];

    for (const provider of this.chain) {
      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          const translation = await provider.translate(
            request.text,
            request.targetLang,
            request.sourceLang,
            request.tone
          );
          if (typeof translation !== 'string' || translation.trim() === '') {
            throw new TranslationError(
              `${provider.name} returned an empty translation`,
              provider.name,
              'empty_response'
            );
          }
          if (attempt > 1) {
            logger.info(`${provider.name} succeeded after ${attempt - 1} retries`);
          }
          return { translation, provider: provider.name };
        } catch (error) {
          const message = describeError(error);
          diagnostics.push(`${provider.name} (attempt ${attempt}): ${message}`);
          logger.warn(`${provider.name} failed (attempt ${attempt}/${attempts}): ${message}`);
          this.reportFailure({ provider: provider.name, attempt, error });

          if (attempt < attempts) {
            await sleep(calculateDelay(attempt - 1, this.retryConfig));
          }
        }
      }
    }

    logger.error(`All ${this.chain.length} translation providers failed`);
    return {
      translation: '',
      error: ALL_FAILED_PREFIX + diagnostics.join('; ')
    };
  }

  private reportFailure(failure: AttemptFailure): void {
    if (!this.onAttemptFailed) {
      return;
    }
    try {
      this.onAttemptFailed(failure);
    } catch (hookError) {
      logger.error('onAttemptFailed hook threw', hookError);
    }
  }
}
