/**
 * WordlistRegistry - named sets of known-weak passwords.
 *
 * Storage is an immutable map replaced wholesale on every mutation, so a
 * query always runs against one complete snapshot. The default entry is
 * created on first use and can never be removed.
 */

import pino from 'pino';
import { DEFAULT_WORDLIST_KEY, loadBundledWordlist, normalizeWords } from './wordlist-loader.js';
import type {
  RegistryHealth,
  RegistrySnapshot,
  WordlistInfo,
  WordlistRegistryOptions,
  WordSet,
  WordSource,
} from './types.js';

const logger = pino({ name: 'gate:registry', level: process.env['LOG_LEVEL'] ?? 'info' });

const EMPTY_SNAPSHOT: RegistrySnapshot = new Map();

export class WordlistRegistry {
  private readonly defaultKey: string;
  private readonly defaultSource: WordSource;
  private snapshot: RegistrySnapshot = EMPTY_SNAPSHOT;
  private initialized = false;

  constructor(options: WordlistRegistryOptions = {}) {
    this.defaultKey = options.defaultKey ?? DEFAULT_WORDLIST_KEY;
    this.defaultSource = options.defaultSource ?? loadBundledWordlist;
  }

  /**
   * Loads the default list as the first entry. Runs once; later calls
   * are no-ops.
   */
  initialize(): void {
    if (this.initialized) return;

    const words: WordSet = new Set(normalizeWords(this.defaultSource()));
    this.snapshot = new Map([[this.defaultKey, words]]);
    this.initialized = true;
    logger.info({ key: this.defaultKey, wordCount: words.size }, 'Default wordlist loaded');
  }

  /**
   * Registers `words` under `key`, replacing any existing entry.
   * The default entry cannot be replaced.
   */
  add(key: string, words: Iterable<string>): void {
    this.initialize();

    if (key.length === 0) {
      logger.warn('Ignoring wordlist with empty key');
      return;
    }
    if (key === this.defaultKey) {
      logger.warn({ key }, 'Default wordlist is protected, add ignored');
      return;
    }

    const wordSet: WordSet = new Set(normalizeWords(words));
    const next = new Map(this.snapshot);
    next.set(key, wordSet);
    this.snapshot = next;
    logger.info({ key, wordCount: wordSet.size }, 'Wordlist added');
  }

  /** Removes the entry at `key`. No-op for the default key or an unknown key. */
  remove(key: string): void {
    this.initialize();

    if (key === this.defaultKey || !this.snapshot.has(key)) {
      logger.debug({ key }, 'Wordlist remove ignored');
      return;
    }

    const next = new Map(this.snapshot);
    next.delete(key);
    this.snapshot = next;
    logger.info({ key }, 'Wordlist removed');
  }

  /** True if the lowercased word appears in any registered list. */
  query(word: string): boolean {
    this.initialize();

    const key = word.toLowerCase();
    for (const words of this.snapshot.values()) {
      if (words.has(key)) return true;
    }
    return false;
  }

  /** Registered keys in insertion order, default first. */
  listKeys(): string[] {
    this.initialize();
    return [...this.snapshot.keys()];
  }

  has(key: string): boolean {
    this.initialize();
    return this.snapshot.has(key);
  }

  /** Number of words under `key`, or null when not registered. */
  getWordCount(key: string): number | null {
    this.initialize();
    return this.snapshot.get(key)?.size ?? null;
  }

  listWordlists(): WordlistInfo[] {
    this.initialize();
    return [...this.snapshot].map(([key, words]) => ({
      key,
      wordCount: words.size,
      isDefault: key === this.defaultKey,
    }));
  }

  getDefaultKey(): string {
    return this.defaultKey;
  }

  /** Current snapshot; never mutated after publication. */
  getSnapshot(): RegistrySnapshot {
    this.initialize();
    return this.snapshot;
  }

  /** Reports counts without forcing initialization. */
  getHealth(): RegistryHealth {
    let wordCount = 0;
    for (const words of this.snapshot.values()) {
      wordCount += words.size;
    }
    return {
      initialized: this.initialized,
      listCount: this.snapshot.size,
      wordCount,
      keys: [...this.snapshot.keys()],
    };
  }
}

export default WordlistRegistry;
