#!/usr/bin/env node
/**
 * Admin CLI - Start the password gate admin server
 *
 * Usage:
 *   npx tsx src/admin/cli.ts
 *   npx tsx src/admin/cli.ts --port 3000 --wordlist ./extra_wordlist.txt
 *
 * Environment variables: see src/shared/config.ts
 */

import { AdminServer } from './server.js';
import { getDefaultRegistry } from '../registry/default-registry.js';
import { pushWordlistFile } from '../registry/wordlist-loader.js';
import { loadConfig, parseMinLength, parsePort, type GateConfig } from '../shared/config.js';
import { wrapError } from '../shared/errors.js';

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

function getAllArgs(name: string): string[] {
  const values: string[] = [];
  args.forEach((arg, idx) => {
    const value = args[idx + 1];
    if (arg === `--${name}` && value !== undefined) values.push(value);
  });
  return values;
}

function showHelp(): void {
  console.log(`
Password Gate Admin Server

Usage:
  npx tsx src/admin/cli.ts [options]
  npm run admin -- [options]

Options:
  --port <number>        Server port (default: 3848)
  --host <address>       Bind address (default: 127.0.0.1)
  --min-length <number>  Minimum password length (default: 8)
  --wordlist <path>      Extra word-list file, repeatable
  --help                 Show this help message

Environment variables:
  PASSWORD_GATE_PORT, PASSWORD_GATE_HOST, PASSWORD_GATE_MIN_LENGTH,
  PASSWORD_GATE_WORDLISTS (comma-separated), LOG_LEVEL
`);
  process.exit(0);
}

function resolveConfig(): GateConfig {
  const config = loadConfig();
  const port = getArg('port');
  const host = getArg('host');
  const minLength = getArg('min-length');

  if (port !== undefined) config.port = parsePort(port);
  if (host !== undefined) config.host = host;
  if (minLength !== undefined) config.minLength = parseMinLength(minLength);
  config.wordlists = [...config.wordlists, ...getAllArgs('wordlist')];
  return config;
}

if (args.includes('--help') || args.includes('-h')) {
  showHelp();
}

let config: GateConfig;
try {
  config = resolveConfig();
} catch (err) {
  console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const registry = getDefaultRegistry();
for (const file of config.wordlists) {
  try {
    pushWordlistFile(registry, file);
  } catch (err) {
    const error = wrapError(err, 'Failed to load wordlist');
    console.error(`❌ ${error.code}: ${error.message}`);
    process.exit(1);
  }
}

console.log(`
Password Gate Admin
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━
Listen:     ${config.host}:${config.port}
Min length: ${config.minLength}
Wordlists:  ${registry.listKeys().join(', ')}
`);

const server = new AdminServer({
  port: config.port,
  host: config.host,
  registry,
  minLength: config.minLength,
});

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`\n${signal} received, shutting down gracefully...`);

  try {
    await server.stop();
    console.log('✅ Server stopped');
    process.exit(0);
  } catch (err) {
    console.error('Error during shutdown:', err);
    process.exit(1);
  }
}

server.start().then(() => {
  console.log(`✅ Admin server running at http://${config.host}:${server.getPort()}`);
  console.log(`   Health check:  http://${config.host}:${server.getPort()}/health`);
  console.log(`   Press Ctrl+C to stop\n`);
}).catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
