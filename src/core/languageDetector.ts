import { detectAll } from 'tinyld';

/** Minimum classifier accuracy before a tag is trusted */
const MIN_CONFIDENCE = 0.7;

/** Shortest trimmed text worth classifying */
const MIN_LENGTH = 3;

/**
 * Classifier output (ISO 639-1) mapped onto the codes langshift tags units with.
 * Anything missing here yields no tag.
 */
const LANGUAGE_TAGS: Record<string, string> = {
  en: 'en',
  zh: 'zh-CN',
  ja: 'ja',
  ko: 'ko',
  fr: 'fr',
  de: 'de',
  es: 'es',
  pt: 'pt',
  ru: 'ru',
  it: 'it',
  nl: 'nl',
  pl: 'pl',
  sv: 'sv',
  th: 'th',
  vi: 'vi',
  hi: 'hi',
  id: 'id',
  ar: 'ar',
  he: 'he',
  tr: 'tr',
  el: 'el',
  fa: 'fa',
};

/**
 * Guess the natural language of a fragment.
 * Returns undefined for short text, unknown languages and low-confidence guesses.
 */
export function detectLanguage(text: string): string | undefined {
  const trimmed = text.trim();
  if ([...trimmed].length < MIN_LENGTH) {
    return undefined;
  }

  const [best] = detectAll(trimmed);
  if (!best) {
    return undefined;
  }

  const tag = LANGUAGE_TAGS[best.lang];
  if (!tag || best.accuracy <= MIN_CONFIDENCE) {
    return undefined;
  }

  return tag;
}
