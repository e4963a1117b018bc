/**
 * Tests for createTranslator
 */

import { DEFAULT_SETTINGS } from '../config/settings';
import { InvalidInputError } from '../core/errors';
import { GoogleTranslator } from '../translators/google';
import { FetchResponseLike, createTranslator } from '../translators';
import { MockTranslator } from '../translators/mock';

describe('createTranslator', () => {
  it('should build the mock backend', () => {
    const translator = createTranslator('mock', DEFAULT_SETTINGS);

    expect(translator).toBeInstanceOf(MockTranslator);
    expect(translator.name).toBe('Mock');
  });

  it('should build the web backend case-insensitively', () => {
    expect(createTranslator(' Google ', DEFAULT_SETTINGS)).toBeInstanceOf(GoogleTranslator);
  });

  it('should reject unknown backends', () => {
    expect(() => createTranslator('deepl', DEFAULT_SETTINGS)).toThrow(InvalidInputError);
    expect(() => createTranslator('deepl', DEFAULT_SETTINGS)).toThrow("Unknown translator 'deepl'");
  });

  it('should pass settings and overrides to the web backend', async () => {
    const fetch = jest.fn(async (_url: string, _init?: { timeout?: number }): Promise<FetchResponseLike> => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: async () => [[['Hallo', 'Hello']]],
    }));
    const sleep = jest.fn(async (_ms: number) => {});
    const delayRangeMs: [number, number] = [10, 10];
    const settings = {
      ...DEFAULT_SETTINGS,
      web: { ...DEFAULT_SETTINGS.web, timeoutMs: 1234, delayRangeMs },
    };

    const translator = createTranslator('google', settings, { fetch, sleep, random: () => 0 });
    const result = await translator.translate('Hello', 'en', 'de');

    expect(result.translatedText).toBe('Hallo');
    expect(fetch.mock.calls[0][1]).toEqual({ timeout: 1234 });
    expect(sleep.mock.calls).toEqual([[10]]);
  });

  it('should pass mock settings through', async () => {
    const settings = {
      ...DEFAULT_SETTINGS,
      mock: { ...DEFAULT_SETTINGS.mock, errorRate: 1 },
    };

    const translator = createTranslator('mock', settings, { sleep: async () => {} });

    await expect(translator.translate('hello', 'en', 'fr')).rejects.toMatchObject({ errorCode: 'MOCK_ERROR' });
  });
});
