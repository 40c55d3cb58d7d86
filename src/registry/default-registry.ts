/**
 * Process-wide registry instance for callers that do not manage their own.
 */

import { WordlistRegistry } from './wordlist-registry.js';

let registryInstance: WordlistRegistry | null = null;

/** Get or create the shared registry, backed by the bundled list. */
export function getDefaultRegistry(): WordlistRegistry {
  if (registryInstance === null) {
    registryInstance = new WordlistRegistry();
  }
  return registryInstance;
}

/** Drop the shared registry; the next call to getDefaultRegistry starts fresh. */
export function resetDefaultRegistry(): void {
  registryInstance = null;
}
