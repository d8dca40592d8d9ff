export { smartTranslate, EMPTY_TEXT_ERROR } from './services/smartTranslate';
export type { SmartTranslateOptions } from './services/smartTranslate';
export { TranslationCache } from './services/translationCache';
export type { TranslationCacheOptions } from './services/translationCache';
export {
  FallbackTranslator,
  NO_PROVIDERS_ERROR,
  ALL_FAILED_PREFIX
} from './services/fallbackTranslator';
export type { AttemptFailure, FallbackTranslatorOptions } from './services/fallbackTranslator';
export {
  createProvider,
  createProviders,
  configuredProviders,
  selectCredentials
} from './providers/translationProviderFactory';
export type { ProviderOverrides } from './providers/translationProviderFactory';
export { BaseProvider, getLanguageName } from './providers/base/baseProvider';
export { DeepLProvider } from './providers/deeplProvider';
export { GeminiProvider } from './providers/geminiProvider';
export { OpenAIProvider } from './providers/openaiProvider';
export { TONES } from './providers/base/translationProvider';
export type {
  ITranslationProvider,
  ProviderCredentials,
  Tone,
  TranslationRequest,
  TranslationResult
} from './providers/base/translationProvider';
export { TranslationError, describeError } from './utils/errors';
export type { TranslationFailureReason } from './utils/errors';
export { ConfigManager } from './utils/config';
export { logger } from './utils/logger';
export { LANGUAGE_NAMES, PROVIDER_LABELS, PROVIDER_PRIORITY } from './utils/constants';
export type { ProviderId, ProviderSelection } from './utils/constants';
