/**
 * Registry Module Types
 */

/** An immutable set of lowercase known-weak words. */
export type WordSet = ReadonlySet<string>;

/** Immutable key → WordSet mapping, in insertion order. */
export type RegistrySnapshot = ReadonlyMap<string, WordSet>;

/** Produces the raw lines of the default word list. */
export type WordSource = () => Iterable<string>;

export interface WordlistRegistryOptions {
  /** Key of the protected default entry. Default: 'common_passwords.txt' */
  defaultKey?: string;
  /** Raw lines of the default list. Default: the bundled list. */
  defaultSource?: WordSource;
}

export interface WordlistInfo {
  key: string;
  wordCount: number;
  isDefault: boolean;
}

export interface RegistryHealth {
  initialized: boolean;
  listCount: number;
  wordCount: number;
  keys: string[];
}
