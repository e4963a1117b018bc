import { createHash } from 'crypto';
import { ParseResult } from '../core/types';

/**
 * In-memory cache of extraction results, keyed by file path and content hash
 *
 * Unbounded: entries live until removed or cleared. Values are copied on the
 * way in and out so callers can mutate what they get back.
 */
export class ParseCache {
  private memoryCache: Map<string, ParseResult> = new Map();

  /**
   * Build a key that changes with either the path or the content
   */
  static generateKey(filePath: string, content: string): string {
    const digest = createHash('sha256')
      .update(filePath)
      .update('\0')
      .update(content)
      .digest('hex');
    return `${filePath}:${digest.slice(0, 16)}`;
  }

  get(key: string): ParseResult | undefined {
    const cached = this.memoryCache.get(key);
    return cached ? structuredClone(cached) : undefined;
  }

  set(key: string, value: ParseResult): void {
    this.memoryCache.set(key, structuredClone(value));
  }

  contains(key: string): boolean {
    return this.memoryCache.has(key);
  }

  /**
   * Remove one entry, returning it when present
   */
  remove(key: string): ParseResult | undefined {
    const removed = this.memoryCache.get(key);
    this.memoryCache.delete(key);
    return removed;
  }

  clear(): void {
    this.memoryCache.clear();
  }

  get size(): number {
    return this.memoryCache.size;
  }

  isEmpty(): boolean {
    return this.memoryCache.size === 0;
  }
}
