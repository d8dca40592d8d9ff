import { logger } from '../utils/logger';
import { ConfigManager } from '../utils/config';
import {
  ITranslationProvider,
  ProviderCredentials,
  Tone,
  TONES,
  TranslationRequest,
  TranslationResult
} from '../providers/base/translationProvider';
import {
  configuredProviders,
  createProviders,
  ProviderOverrides
} from '../providers/translationProviderFactory';
import { TranslationCache } from './translationCache';
import { FallbackTranslator, FallbackTranslatorOptions } from './fallbackTranslator';

export const EMPTY_TEXT_ERROR = 'No text to translate.';

export interface SmartTranslateOptions {
  text: string;
  targetLang: string;
  /** Omit (or pass 'auto') to let the provider detect the source language */
  sourceLang?: string;
  tone?: Tone;
  credentials: ProviderCredentials;
  /** Requires `cache` when true (the default) */
  useCache?: boolean;
  /** Retries per provider unless exactly one credential is set */
  retryCount?: number;
  cache?: TranslationCache;
  /** Replaces the chain built from credentials; retries still follow the credentials */
  providers?: ITranslationProvider[];
  providerOptions?: ProviderOverrides;
  fallback?: FallbackTranslatorOptions;
}

function validate(options: SmartTranslateOptions): void {
  if (typeof options.text !== 'string') {
    throw new TypeError('text must be a string');
  }
  if (typeof options.targetLang !== 'string' || options.targetLang.trim() === '') {
    throw new TypeError('targetLang must be a non-empty string');
  }
  if (options.sourceLang !== undefined && typeof options.sourceLang !== 'string') {
    throw new TypeError('sourceLang must be a string when given');
  }
  if (options.tone !== undefined && !TONES.includes(options.tone)) {
    throw new TypeError(`tone must be one of: ${TONES.join(', ')}`);
  }
  if (
    options.retryCount !== undefined &&
    (!Number.isInteger(options.retryCount) || options.retryCount < 0)
  ) {
    throw new RangeError('retryCount must be a non-negative integer');
  }
  if ((options.useCache ?? true) && !(options.cache instanceof TranslationCache)) {
    throw new TypeError('cache must be a TranslationCache when useCache is true');
  }
}

function toRequest(options: SmartTranslateOptions): TranslationRequest {
  const sourceLang = options.sourceLang?.trim();
  return {
    text: options.text,
    targetLang: options.targetLang.trim(),
    sourceLang: sourceLang && sourceLang !== 'auto' ? sourceLang : undefined,
    tone: options.tone ?? 'default'
  };
}

async function run(
  request: TranslationRequest,
  options: SmartTranslateOptions
): Promise<TranslationResult> {
  const cache = (options.useCache ?? true) ? options.cache : undefined;

  if (cache) {
    const cached = cache.lookup(request.text, request.sourceLang, request.targetLang, request.tone);
    if (cached) {
      logger.info(`Serving cached translation (provider: ${cached.provider})`);
      return cached;
    }
  }

  const providers = options.providers ?? createProviders(options.credentials, options.providerOptions);
  const retryConfig = ConfigManager.getRetryConfig();
  const translator = new FallbackTranslator(providers, {
    ...options.fallback,
    retry: { initialDelayMs: retryConfig.initialDelayMs, ...options.fallback?.retry }
  });

  // A lone credential runs once; retries only pay off across a chain
  const retryCount =
    configuredProviders(options.credentials).length === 1
      ? 0
      : options.retryCount ?? retryConfig.maxRetries;
  const result = await translator.translate(request, retryCount);

  if (cache && result.error === undefined && result.translation) {
    cache.store(request.text, request.sourceLang, request.targetLang, request.tone, result);
  }
  return result;
}

/**
 * Translate text through the configured provider chain.
 *
 * Resolves with a structured result for every translation failure; throws
 * synchronously only for arguments of the wrong type.
 */
export function smartTranslate(options: SmartTranslateOptions): Promise<TranslationResult> {
  validate(options);
  const request = toRequest(options);

  if (request.text.trim() === '') {
    return Promise.resolve({ translation: '', error: EMPTY_TEXT_ERROR });
  }

  return run(request, options);
}
