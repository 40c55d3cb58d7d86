/**
 * Registry Module - Public API
 *
 * Named word lists of known-weak passwords, plus the loader that turns
 * files into word sequences.
 */

export { WordlistRegistry, default } from './wordlist-registry.js';
export { getDefaultRegistry, resetDefaultRegistry } from './default-registry.js';
export {
  BUNDLED_WORDLIST_PATH,
  DEFAULT_WORDLIST_KEY,
  loadBundledWordlist,
  normalizeWords,
  pushWordlistFile,
  readWordlistLines,
} from './wordlist-loader.js';

export type {
  RegistryHealth,
  RegistrySnapshot,
  WordlistInfo,
  WordlistRegistryOptions,
  WordSet,
  WordSource,
} from './types.js';
