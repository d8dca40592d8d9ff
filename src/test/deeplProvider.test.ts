import * as assert from 'assert';
import { AxiosRequestConfig } from 'axios';
import {
  DeepLHttpClient,
  DeepLProvider,
  getDeepLBaseUrl,
  normalizeDeepLLanguage
} from '../providers/deeplProvider';
import { logger } from '../utils/logger';
import { TranslationError } from '../utils/errors';
import { assertTranslationError, httpError } from './helpers/fakes';

interface PostCall {
  url: string;
  data: unknown;
  config: AxiosRequestConfig;
}

function fakeHttp(respond: () => Promise<unknown>): { http: DeepLHttpClient; calls: PostCall[] } {
  const calls: PostCall[] = [];
  const http: DeepLHttpClient = {
    post: async (url, data, config) => {
      calls.push({ url, data, config });
      return { data: await respond() };
    }
  };
  return { http, calls };
}

const ok = (text: string) => async () => ({
  translations: [{ detected_source_language: 'EN', text }]
});

suite('DeepL Provider Test Suite', () => {
  suiteSetup(() => {
    logger.setLevel('silent');
  });

  suite('Language Codes', () => {
    test('should upper-case codes and keep the region', () => {
      assert.strictEqual(normalizeDeepLLanguage('en'), 'EN');
      assert.strictEqual(normalizeDeepLLanguage('en-us'), 'EN-US');
      assert.strictEqual(normalizeDeepLLanguage('EN-gb'), 'EN-GB');
      assert.strictEqual(normalizeDeepLLanguage(' pt_br '), 'PT-BR');
    });

    test('should route free-tier keys to the free endpoint', () => {
      assert.strictEqual(getDeepLBaseUrl('test-key:fx'), 'https://api-free.deepl.com');
      assert.strictEqual(getDeepLBaseUrl('test-key'), 'https://api.deepl.com');
    });
  });

  suite('Availability', () => {
    test('should be unavailable without a key', () => {
      assert.strictEqual(new DeepLProvider(undefined).isAvailable(), false);
      assert.strictEqual(new DeepLProvider('   ').isAvailable(), false);
    });

    test('should be available with a key', () => {
      assert.strictEqual(new DeepLProvider('test-key').isAvailable(), true);
    });

    test('should refuse to translate without a key', async () => {
      const { http, calls } = fakeHttp(ok('Hola'));
      const provider = new DeepLProvider(undefined, { http });

      await assertTranslationError(provider.translate('Hello', 'es'), {
        message: 'DeepL translation failed: client not initialized (API key missing)',
        provider: 'deepl',
        reason: 'unavailable'
      });
      assert.strictEqual(calls.length, 0);
    });
  });

  suite('Requests', () => {
    test('should translate with the minimal request body', async () => {
      const { http, calls } = fakeHttp(ok('Hola mundo'));
      const provider = new DeepLProvider('test-key', { http, timeoutMs: 5000 });

      const result = await provider.translate('Hello world', 'es');

      assert.strictEqual(result, 'Hola mundo');
      assert.strictEqual(calls.length, 1);
      assert.strictEqual(calls[0].url, 'https://api.deepl.com/v2/translate');
      assert.deepStrictEqual(calls[0].data, { text: ['Hello world'], target_lang: 'ES' });
      assert.deepStrictEqual(calls[0].config, {
        headers: {
          Authorization: 'DeepL-Auth-Key test-key',
          'Content-Type': 'application/json'
        },
        timeout: 5000
      });
    });

    test('should pass source language and formality', async () => {
      const { http, calls } = fakeHttp(ok('Bonjour le monde'));
      const provider = new DeepLProvider('test-key:fx', { http });

      const result = await provider.translate('Hello world', 'fr', 'en', 'formal');

      assert.strictEqual(result, 'Bonjour le monde');
      assert.strictEqual(calls[0].url, 'https://api-free.deepl.com/v2/translate');
      assert.deepStrictEqual(calls[0].data, {
        text: ['Hello world'],
        target_lang: 'FR',
        source_lang: 'EN',
        formality: 'prefer_more'
      });
    });

    test('should ask for less formality for an informal tone', async () => {
      const { http, calls } = fakeHttp(ok('Hallo Welt'));
      const provider = new DeepLProvider('test-key', { http });

      await provider.translate('Hello world', 'de', undefined, 'informal');

      assert.deepStrictEqual(calls[0].data, {
        text: ['Hello world'],
        target_lang: 'DE',
        formality: 'prefer_less'
      });
    });

    test('should honour a custom base URL', async () => {
      const { http, calls } = fakeHttp(ok('Hola'));
      const provider = new DeepLProvider('test-key', { http, baseUrl: 'http://localhost:9999' });

      await provider.translate('Hello', 'es');

      assert.strictEqual(calls[0].url, 'http://localhost:9999/v2/translate');
    });
  });

  suite('Failures', () => {
    test('should map an authentication failure', async () => {
      const { http } = fakeHttp(async () => {
        throw httpError('Request failed with status code 403', 403);
      });
      const provider = new DeepLProvider('test-key', { http });

      await assertTranslationError(provider.translate('Hello world', 'es'), {
        message: 'DeepL translation failed: Request failed with status code 403',
        provider: 'deepl',
        reason: 'auth',
        status: 403
      });
    });

    test('should map a rate limit', async () => {
      const { http } = fakeHttp(async () => {
        throw httpError('Request failed with status code 429', 429);
      });
      const provider = new DeepLProvider('test-key', { http });

      await assert.rejects(provider.translate('Hello world', 'es'), (error: unknown) => {
        assert.ok(error instanceof TranslationError);
        assert.strictEqual(error.reason, 'rate_limit');
        assert.strictEqual(error.status, 429);
        assert.strictEqual(error.cause instanceof Error, true);
        return true;
      });
    });

    test('should reject a response without translations', async () => {
      const { http } = fakeHttp(async () => ({ message: 'unexpected' }));
      const provider = new DeepLProvider('test-key', { http });

      await assertTranslationError(provider.translate('Hello world', 'es'), {
        message: 'DeepL translation failed: response has no translations',
        provider: 'deepl',
        reason: 'malformed_response'
      });
    });

    test('should reject a translation entry without text', async () => {
      const { http } = fakeHttp(async () => ({ translations: [{ detected_source_language: 'EN' }] }));
      const provider = new DeepLProvider('test-key', { http });

      await assertTranslationError(provider.translate('Hello world', 'es'), {
        message: 'DeepL translation failed: translation entry has no text',
        provider: 'deepl',
        reason: 'malformed_response'
      });
    });

    test('should reject an empty translation', async () => {
      const { http } = fakeHttp(ok('   '));
      const provider = new DeepLProvider('test-key', { http });

      await assertTranslationError(provider.translate('Hello world', 'es'), {
        message: 'DeepL translation failed: empty translation returned',
        provider: 'deepl',
        reason: 'empty_response'
      });
    });
  });
});
