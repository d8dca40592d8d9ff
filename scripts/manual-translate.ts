/**
 * Manual check against the real providers, using keys from the
 * environment or a local .env file:
 *
 *   npx tsx scripts/manual-translate.ts "Hello world!" es
 */
import { ConfigManager, logger, smartTranslate, TranslationResult } from '../src';

function printResult(title: string, result: TranslationResult): void {
  console.log(`\n${title}`);
  console.log(`Provider used: ${result.provider ?? '-'}`);
  console.log(`Translation: ${result.translation}`);
  if (result.error) {
    console.log(`Error: ${result.error}`);
  }
}

async function main(): Promise<void> {
  const [text = 'Hello world! This is a test of the translation service.', targetLang = 'es'] =
    process.argv.slice(2);
  const credentials = ConfigManager.getCredentials();

  console.log(`DeepL API key available: ${Boolean(credentials.deepl)}`);
  console.log(`Gemini API key available: ${Boolean(credentials.gemini)}`);
  console.log(`OpenAI API key available: ${Boolean(credentials.openai)}`);

  const result = await smartTranslate({
    text,
    targetLang,
    sourceLang: 'en',
    tone: 'formal',
    credentials,
    useCache: false
  });
  printResult('Translation result:', result);

  // An invalid DeepL key forces the chain onto the next provider
  const fallback = await smartTranslate({
    text,
    targetLang,
    sourceLang: 'en',
    tone: 'formal',
    credentials: { ...credentials, deepl: 'invalid-key' },
    useCache: false
  });
  printResult('Fallback result:', fallback);
}

main().catch((error: unknown) => {
  logger.error('Manual translation run failed', error);
  process.exitCode = 1;
});
