/**
 * Wordlist Loader - reads word-list files into lines.
 *
 * The registry only ever sees resolved sequences of strings; everything
 * that touches the filesystem lives here.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import pino from 'pino';
import { GateError, GateErrorCode } from '../shared/errors.js';
import type { WordlistRegistry } from './wordlist-registry.js';

const logger = pino({ name: 'gate:loader', level: process.env['LOG_LEVEL'] ?? 'info' });

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_WORDLIST_KEY = 'common_passwords.txt';

/** Location of the bundled default list (`data/` at the package root). */
export const BUNDLED_WORDLIST_PATH = path.join(__dirname, '..', '..', 'data', DEFAULT_WORDLIST_KEY);

/**
 * Reads a UTF-8 word-list file and returns its raw lines.
 * @throws GateError WORDLIST_NOT_FOUND or WORDLIST_READ_ERROR
 */
export function readWordlistLines(filePath: string): string[] {
  if (!existsSync(filePath)) {
    throw new GateError(GateErrorCode.WORDLIST_NOT_FOUND, `Wordlist not found: ${filePath}`, { filePath });
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new GateError(GateErrorCode.WORDLIST_READ_ERROR, `Failed to read wordlist ${filePath}: ${message}`, {
      filePath,
      originalError: message,
    });
  }

  return content.split(/\r?\n/);
}

/** Trims and lowercases each line, dropping lines left empty. */
export function normalizeWords(lines: Iterable<string>): string[] {
  const words: string[] = [];
  for (const line of lines) {
    const word = line.trim().toLowerCase();
    if (word.length > 0) words.push(word);
  }
  return words;
}

/** Lines of the bundled default list. */
export function loadBundledWordlist(): string[] {
  const lines = readWordlistLines(BUNDLED_WORDLIST_PATH);
  logger.debug({ path: BUNDLED_WORDLIST_PATH, lines: lines.length }, 'Loaded bundled wordlist');
  return lines;
}

/**
 * Reads a file and registers it under its base name.
 * @returns the registration key
 */
export function pushWordlistFile(registry: WordlistRegistry, filePath: string): string {
  const key = path.basename(filePath);
  registry.add(key, readWordlistLines(filePath));
  logger.info({ key, filePath }, 'Wordlist file pushed');
  return key;
}
