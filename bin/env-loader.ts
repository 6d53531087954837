#!/usr/bin/env node

/**
 * CLI entry point for env-loader
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { checkCommand } from '../src/cli/commands/check.js';
import { OUTPUT_FORMATS } from '../src/config/index.js';

function resolveCliVersion(): string {
  const candidates = [
    fileURLToPath(new URL('../package.json', import.meta.url)),
    fileURLToPath(new URL('../../package.json', import.meta.url)),
  ];

  for (const candidate of candidates) {
    try {
      const parsed: { version?: unknown } = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed.version === 'string') return parsed.version;
    } catch {
      // Try next candidate.
    }
  }

  return process.env.npm_package_version || '0.0.0';
}

await yargs(hideBin(process.argv))
  .scriptName('env-loader')
  .usage('$0 <command>')
  .version(resolveCliVersion())
  .help()
  .strict()
  .demandCommand(1)
  .command(
    'check [vars..]',
    'Resolve environment variables (NAME or NAME=default) and report every failure',
    (y) => y
      .positional('vars', { type: 'string', array: true, describe: 'NAME (required) or NAME=default' })
      .option('request', { alias: 'r', type: 'string', describe: 'JSON file of name -> default (or null)' })
      .option('format', { alias: 'f', choices: OUTPUT_FORMATS, describe: 'Output format (default: ENV_LOADER_FORMAT or text)' })
      .option('quiet', { alias: 'q', type: 'boolean', describe: 'Print nothing on success' }),
    (argv) => {
      process.exitCode = checkCommand({
        vars: argv.vars,
        request: argv.request,
        format: argv.format,
        quiet: argv.quiet,
      });
    }
  )
  .parseAsync();
