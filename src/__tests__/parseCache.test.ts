/**
 * Tests for ParseCache
 *
 * In-memory cache of extraction results keyed by path and content hash.
 */

import { ParseCache } from '../cache/parseCache';
import { ParseResult } from '../core/types';

describe('ParseCache', () => {
  let cache: ParseCache;

  const createResult = (content = 'hello there'): ParseResult => ({
    units: [
      {
        content,
        unitType: 'comment',
        position: { line: 1, column: 1 },
        priority: 'medium',
        metadata: { commentKind: 'line', marker: '//' },
      },
    ],
    fileType: 'generic_code',
    encoding: 'utf-8',
    lineCount: 1,
    metadata: { extractor: 'GenericCodeExtractor' },
  });

  beforeEach(() => {
    cache = new ParseCache();
  });

  describe('generateKey', () => {
    it('should prefix the key with the path and a 16-digit hash', () => {
      expect(ParseCache.generateKey('src/a.ts', '// hi')).toMatch(/^src\/a\.ts:[0-9a-f]{16}$/);
    });

    it('should be stable for the same input', () => {
      expect(ParseCache.generateKey('a.py', 'x = 1')).toBe(ParseCache.generateKey('a.py', 'x = 1'));
    });

    it('should change with either the path or the content', () => {
      const base = ParseCache.generateKey('a.py', 'x = 1');

      expect(ParseCache.generateKey('b.py', 'x = 1')).not.toBe(base);
      expect(ParseCache.generateKey('a.py', 'x = 2')).not.toBe(base);
    });

    it('should not confuse path and content boundaries', () => {
      const first = ParseCache.generateKey('ab', 'c').split(':')[1];
      const second = ParseCache.generateKey('a', 'bc').split(':')[1];

      expect(first).not.toBe(second);
    });
  });

  describe('Basic operations', () => {
    it('should start empty', () => {
      expect(cache.isEmpty()).toBe(true);
      expect(cache.size).toBe(0);
    });

    it('should store and return a result', () => {
      cache.set('k1', createResult());

      expect(cache.contains('k1')).toBe(true);
      expect(cache.get('k1')).toEqual(createResult());
      expect(cache.size).toBe(1);
      expect(cache.isEmpty()).toBe(false);
    });

    it('should return undefined for missing keys', () => {
      expect(cache.get('missing')).toBeUndefined();
      expect(cache.contains('missing')).toBe(false);
    });

    it('should overwrite an existing key', () => {
      cache.set('k1', createResult('first value'));
      cache.set('k1', createResult('second value'));

      expect(cache.get('k1')?.units[0].content).toBe('second value');
      expect(cache.size).toBe(1);
    });

    it('should remove one entry and return it', () => {
      cache.set('k1', createResult());
      cache.set('k2', createResult('other'));

      expect(cache.remove('k1')).toEqual(createResult());
      expect(cache.remove('k1')).toBeUndefined();
      expect(cache.contains('k2')).toBe(true);
      expect(cache.size).toBe(1);
    });

    it('should clear all entries', () => {
      cache.set('k1', createResult());
      cache.set('k2', createResult());

      cache.clear();

      expect(cache.isEmpty()).toBe(true);
    });
  });

  describe('Isolation', () => {
    it('should not be affected by mutating the stored value', () => {
      const result = createResult();
      cache.set('k1', result);

      result.units[0].content = 'changed';
      result.units.push({ ...result.units[0] });

      expect(cache.get('k1')).toEqual(createResult());
    });

    it('should not be affected by mutating a returned value', () => {
      cache.set('k1', createResult());

      const loaded = cache.get('k1');
      if (loaded) {
        loaded.units[0].position.line = 99;
      }

      expect(cache.get('k1')?.units[0].position.line).toBe(1);
    });
  });
});
