/**
 * Environment-driven configuration.
 *
 * Environment variables:
 *   PASSWORD_GATE_PORT        - Admin server port (default: 3848)
 *   PASSWORD_GATE_HOST        - Admin server bind address (default: 127.0.0.1)
 *   PASSWORD_GATE_MIN_LENGTH  - Minimum password length (default: 8)
 *   PASSWORD_GATE_WORDLISTS   - Comma-separated word-list files to push at startup
 *
 * LOG_LEVEL (debug, info, warn, error) is read by each module's logger.
 */

import { GateError, GateErrorCode } from './errors.js';

export interface GateConfig {
  port: number;
  host: string;
  minLength: number;
  wordlists: string[];
}

export const DEFAULT_MIN_LENGTH = 8;

export const DEFAULT_GATE_CONFIG: GateConfig = {
  port: 3848,
  host: '127.0.0.1',
  minLength: DEFAULT_MIN_LENGTH,
  wordlists: [],
};

type Env = Record<string, string | undefined>;

/** Builds the configuration from environment variables. */
export function loadConfig(env: Env = process.env): GateConfig {
  const config: GateConfig = { ...DEFAULT_GATE_CONFIG, wordlists: [] };

  const port = env['PASSWORD_GATE_PORT'];
  if (port !== undefined && port !== '') {
    config.port = parsePort(port);
  }

  const host = env['PASSWORD_GATE_HOST'];
  if (host) config.host = host;

  const minLength = env['PASSWORD_GATE_MIN_LENGTH'];
  if (minLength !== undefined && minLength !== '') {
    config.minLength = parseMinLength(minLength);
  }

  const wordlists = env['PASSWORD_GATE_WORDLISTS'];
  if (wordlists) {
    config.wordlists = wordlists
      .split(',')
      .map(p => p.trim())
      .filter(p => p.length > 0);
  }

  return config;
}

export function parsePort(value: string): number {
  const port = parseInteger(value, 'port');
  if (port < 0 || port > 65535) {
    throw new GateError(GateErrorCode.INVALID_CONFIG, `Port out of range: ${value}`, { port: value });
  }
  return port;
}

export function parseMinLength(value: string): number {
  const minLength = parseInteger(value, 'minLength');
  if (minLength < 1) {
    throw new GateError(GateErrorCode.INVALID_CONFIG, `Minimum length must be at least 1: ${value}`, {
      minLength: value,
    });
  }
  return minLength;
}

function parseInteger(value: string, field: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new GateError(GateErrorCode.INVALID_CONFIG, `Invalid ${field}: ${value}`, { [field]: value });
  }
  return parseInt(value.trim(), 10);
}
