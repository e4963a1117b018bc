/**
 * Configuration Settings
 *
 * Reads settings from ~/.langshift/config.json (JSON format), or from the
 * file named by LANGSHIFT_CONFIG. Every field falls back to its default
 * when missing or invalid.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { log } from '../logging/log';
import { Priority, isPriority } from '../core/types';

export interface WebTranslatorSettings {
  timeoutMs: number;
  retryCount: number;
  delayRangeMs: [number, number];
  concurrency: number;
  serviceUrl: string;
}

export interface MockTranslatorSettings {
  delayRangeMs: [number, number];
  errorRate: number;
  confidenceRange: [number, number];
  concurrency: number;
}

export interface Settings {
  /** Source language, or `auto` */
  sourceLanguage: string;
  targetLanguage: string;
  /** Backend name: `google` or `mock` */
  translator: string;
  minPriority: Priority;
  /** Leave units alone that are already in the target language */
  skipTargetLanguage: boolean;
  web: WebTranslatorSettings;
  mock: MockTranslatorSettings;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: Settings = {
  sourceLanguage: 'auto',
  targetLanguage: 'en',
  translator: 'google',
  minPriority: 'low',
  skipTargetLanguage: true,
  web: {
    timeoutMs: 30000,
    retryCount: 3,
    delayRangeMs: [300, 600],
    concurrency: 3,
    serviceUrl: 'https://translate.googleapis.com/translate_a/single',
  },
  mock: {
    delayRangeMs: [100, 500],
    errorRate: 0,
    confidenceRange: [0.8, 1.0],
    concurrency: 3,
  },
};

/**
 * Config file path
 */
export function getConfigPath(): string {
  return process.env.LANGSHIFT_CONFIG || path.join(os.homedir(), '.langshift', 'config.json');
}

/**
 * Cached settings and last load time
 */
let cachedSettings: Settings | null = null;
let lastLoadTime = 0;
const CACHE_TTL_MS = 30000; // Reload config every 30 seconds

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readNumber(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  accept: (value: number) => boolean
): number {
  const value = raw[key];
  return typeof value === 'number' && Number.isFinite(value) && accept(value) ? value : fallback;
}

function readRange(
  raw: Record<string, unknown>,
  key: string,
  fallback: [number, number],
  accept: (value: number) => boolean
): [number, number] {
  const value = raw[key];
  if (!Array.isArray(value) || value.length !== 2) {
    return [...fallback];
  }
  const [min, max] = value;
  if (
    typeof min !== 'number' || typeof max !== 'number' ||
    !Number.isFinite(min) || !Number.isFinite(max) ||
    !accept(min) || !accept(max) || min > max
  ) {
    return [...fallback];
  }
  return [min, max];
}

const isNonNegative = (value: number): boolean => value >= 0;
const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value >= 1;
const isProbability = (value: number): boolean => value >= 0 && value <= 1;

function parseWebSettings(raw: unknown): WebTranslatorSettings {
  const defaults = DEFAULT_SETTINGS.web;
  const web = isRecord(raw) ? raw : {};
  return {
    timeoutMs: readNumber(web, 'timeoutMs', defaults.timeoutMs, value => value > 0),
    retryCount: readNumber(web, 'retryCount', defaults.retryCount, isPositiveInteger),
    delayRangeMs: readRange(web, 'delayRangeMs', defaults.delayRangeMs, isNonNegative),
    concurrency: readNumber(web, 'concurrency', defaults.concurrency, isPositiveInteger),
    serviceUrl: readString(web, 'serviceUrl', defaults.serviceUrl),
  };
}

function parseMockSettings(raw: unknown): MockTranslatorSettings {
  const defaults = DEFAULT_SETTINGS.mock;
  const mock = isRecord(raw) ? raw : {};
  return {
    delayRangeMs: readRange(mock, 'delayRangeMs', defaults.delayRangeMs, isNonNegative),
    errorRate: readNumber(mock, 'errorRate', defaults.errorRate, isProbability),
    confidenceRange: readRange(mock, 'confidenceRange', defaults.confidenceRange, isProbability),
    concurrency: readNumber(mock, 'concurrency', defaults.concurrency, isPositiveInteger),
  };
}

/**
 * Merge raw config over defaults, field by field
 */
export function parseSettings(raw: unknown): Settings {
  const config = isRecord(raw) ? raw : {};
  const minPriority = config.minPriority;

  return {
    sourceLanguage: readString(config, 'sourceLanguage', DEFAULT_SETTINGS.sourceLanguage),
    targetLanguage: readString(config, 'targetLanguage', DEFAULT_SETTINGS.targetLanguage),
    translator: readString(config, 'translator', DEFAULT_SETTINGS.translator).toLowerCase(),
    minPriority: typeof minPriority === 'string' && isPriority(minPriority)
      ? minPriority
      : DEFAULT_SETTINGS.minPriority,
    skipTargetLanguage: readBoolean(config, 'skipTargetLanguage', DEFAULT_SETTINGS.skipTargetLanguage),
    web: parseWebSettings(config.web),
    mock: parseMockSettings(config.mock),
  };
}

/**
 * Load settings from disk, bypassing the cache
 */
export function loadSettings(configPath: string = getConfigPath()): Settings {
  try {
    if (!fs.existsSync(configPath)) {
      return parseSettings({});
    }

    const content = fs.readFileSync(configPath, 'utf-8');
    const raw: unknown = JSON.parse(content);
    if (!isRecord(raw)) {
      log(`[Config] Ignoring ${configPath}: expected a JSON object`);
    }
    return parseSettings(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    log(`[Config] Failed to load config: ${reason}`);
    return parseSettings({});
  }
}

/**
 * Get settings with caching
 */
export function getSettings(): Settings {
  const now = Date.now();

  if (cachedSettings && (now - lastLoadTime) < CACHE_TTL_MS) {
    return cachedSettings;
  }

  cachedSettings = loadSettings();
  lastLoadTime = now;

  return cachedSettings;
}

/**
 * Force reload settings (useful for testing or after config changes)
 */
export function reloadSettings(): void {
  cachedSettings = null;
  lastLoadTime = 0;
}
