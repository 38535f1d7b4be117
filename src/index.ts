#!/usr/bin/env node
import { PhishScopeServer, VERSION } from './server.js';
import { loadConfig } from './config/loader.js';
import { setLogLevel } from './logging/logger.js';

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    const server = new PhishScopeServer(config);
    await server.start();
  } catch (error: unknown) {
    process.stderr.write(
      `[PhishScope] Failed to start: ${error instanceof Error ? error.message : error}\n`,
    );
    process.exit(1);
  }
}

// CLI
const cliArgs = process.argv.slice(2).filter(a => !a.startsWith('--'));
const command = cliArgs[0];

switch (command) {
  case 'start':
  case undefined:
    await main();
    break;
  case 'version':
    process.stdout.write(`PhishScope v${VERSION}\n`);
    break;
  case 'help':
    process.stdout.write(`PhishScope v${VERSION} - Escalating email phishing detection service

Usage:
  phishscope [command]

Commands:
  start              Start the HTTP API server (default)
  version            Show version
  help               Show this help

Configuration is read from PHISHSCOPE_* environment variables and
~/.phishscope/config.json (or the file named by PHISHSCOPE_CONFIG).
`);
    break;
  default:
    process.stderr.write(`Unknown command: ${command}\n`);
    process.exit(1);
}
