#!/usr/bin/env node
/**
 * CLI entry point for quota-relay.
 * Handles argument parsing, --init command, environment variable setup,
 * and delegates to the main application bootstrap.
 */

import { parseArgs } from 'node:util';
import { existsSync, mkdirSync, copyFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';

const HELP = `
quota-relay - caching, key-rotating relay for quota-limited JSON APIs

Usage:
  quota-relay [options]

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -p, --port <port>     Port to listen on (overrides config)
  --init                Initialize config file in current directory
  -h, --help            Show this help message

Examples:
  quota-relay                                   # Run with default config
  quota-relay --config /etc/quota-relay.yaml    # Run with custom config path
  quota-relay --init                            # Create config/config.yaml from example
`;

// Parse CLI arguments
const { values } = parseArgs({
  options: {
    config: {
      type: 'string',
      short: 'c',
    },
    port: {
      type: 'string',
      short: 'p',
    },
    init: {
      type: 'boolean',
    },
    help: {
      type: 'boolean',
      short: 'h',
    },
  },
  strict: false, // Allow unknown args to pass through
});

// Handle --help
if (values.help) {
  console.log(HELP);
  process.exit(0);
}

// Handle --init
if (values.init) {
  const targetPath = resolve(process.cwd(), 'config', 'config.yaml');
  const sourcePath = join(
    dirname(fileURLToPath(import.meta.url)),
    '..',
    'config',
    'config.example.yaml',
  );

  if (existsSync(targetPath)) {
    console.error(`Error: Config file already exists at ${targetPath}`);
    process.exit(1);
  }

  if (!existsSync(sourcePath)) {
    console.error('Error: Example config not found (package may be corrupted)');
    process.exit(1);
  }

  mkdirSync(dirname(targetPath), { recursive: true });
  copyFileSync(sourcePath, targetPath);

  console.log(`Created config file: ${targetPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Add your upstream credentials and operations');
  console.log('  2. Run: quota-relay');
  console.log('');

  process.exit(0);
}

// Set environment variables for the application
if (typeof values.config === 'string') {
  process.env['CONFIG_PATH'] = values.config;
}
if (typeof values.port === 'string') {
  process.env['PORT'] = values.port;
}

// Bootstrap the application
await import('./index.js');
