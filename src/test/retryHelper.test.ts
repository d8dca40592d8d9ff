import * as assert from 'assert';
import {
  calculateDelay,
  DEFAULT_RETRY_CONFIG,
  getErrorStatus,
  isAuthError,
  isRateLimitError,
  isTimeoutError
} from '../utils/retryHelper';
import { describeError, toTranslationError, TranslationError } from '../utils/errors';

suite('Retry Helper Test Suite', () => {
  suite('calculateDelay', () => {
    test('should pause a flat second by default', () => {
      assert.strictEqual(calculateDelay(0, DEFAULT_RETRY_CONFIG), 1000);
      assert.strictEqual(calculateDelay(3, DEFAULT_RETRY_CONFIG), 1000);
    });

    test('should grow exponentially up to the cap', () => {
      const config = { maxRetries: 5, initialDelayMs: 1000, maxDelayMs: 5000, backoffMultiplier: 2 };

      assert.strictEqual(calculateDelay(0, config), 1000);
      assert.strictEqual(calculateDelay(2, config), 4000);
      assert.strictEqual(calculateDelay(3, config), 5000);
    });
  });

  suite('Error classification', () => {
    test('should read the status from SDK and axios errors', () => {
      assert.strictEqual(getErrorStatus({ status: 429 }), 429);
      assert.strictEqual(getErrorStatus({ response: { status: 503 } }), 503);
      assert.strictEqual(getErrorStatus({ statusCode: '502' }), 502);
      assert.strictEqual(getErrorStatus(new Error('no status')), undefined);
      assert.strictEqual(getErrorStatus('500'), undefined);
    });

    test('should detect rate limits by status or message', () => {
      assert.strictEqual(isRateLimitError({ status: 429 }), true);
      assert.strictEqual(isRateLimitError(new Error('Resource exhausted')), true);
      assert.strictEqual(isRateLimitError(new Error('Bad request')), false);
      assert.strictEqual(isRateLimitError(null), false);
    });

    test('should detect authentication failures', () => {
      assert.strictEqual(isAuthError({ status: 401 }), true);
      assert.strictEqual(isAuthError({ response: { status: 403 } }), true);
      assert.strictEqual(isAuthError(new Error('Invalid API key')), true);
      assert.strictEqual(isAuthError({ status: 404 }), false);
    });

    test('should detect timeouts', () => {
      assert.strictEqual(isTimeoutError({ code: 'ECONNABORTED' }), true);
      assert.strictEqual(isTimeoutError(Object.assign(new Error('aborted'), { name: 'AbortError' })), true);
      assert.strictEqual(isTimeoutError(new Error('socket hang up')), false);
    });
  });

  suite('Errors', () => {
    test('should describe any thrown value', () => {
      assert.strictEqual(describeError(new Error('boom')), 'boom');
      assert.strictEqual(describeError('plain'), 'plain');
      assert.strictEqual(describeError({ code: 7 }), '{"code":7}');
      assert.strictEqual(describeError(undefined), 'undefined');
    });

    test('should pass a TranslationError through unchanged', () => {
      const original = new TranslationError('DeepL translation failed: x', 'deepl', 'auth', 403);

      assert.strictEqual(toTranslationError('openai', 'OpenAI', original), original);
    });

    test('should wrap a transport error with the provider prefix', () => {
      const cause = Object.assign(new Error('Bad gateway'), { status: 502 });

      const error = toTranslationError('openai', 'OpenAI', cause);

      assert.strictEqual(error.message, 'OpenAI translation failed: Bad gateway');
      assert.strictEqual(error.name, 'TranslationError');
      assert.strictEqual(error.provider, 'openai');
      assert.strictEqual(error.reason, 'transport');
      assert.strictEqual(error.status, 502);
      assert.strictEqual(error.cause, cause);
      assert.strictEqual('retryable' in error, false);
    });

    test('should leave an unclassified error as unknown', () => {
      const error = toTranslationError('gemini', 'Gemini', 'weird failure');

      assert.strictEqual(error.message, 'Gemini translation failed: weird failure');
      assert.strictEqual(error.reason, 'unknown');
      assert.strictEqual(error.status, undefined);
    });
  });
});
