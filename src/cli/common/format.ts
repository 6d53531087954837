import chalk from 'chalk';
import { escapeShellArg } from '../../infra/shell-escape.js';
import type { LoadError } from '../../loader/index.js';
import type { EnvMap, EnvVarError } from '../../types/index.js';

const CAUSE_LABELS: Record<EnvVarError, string> = {
  'not-present': 'not present',
  'not-valid-text': 'not valid text',
};

function sortedNames(values: Record<string, unknown>): string[] {
  return Object.keys(values).sort();
}

export function describeCause(cause: EnvVarError): string {
  return CAUSE_LABELS[cause];
}

export function formatTextValues(values: EnvMap, defaulted: ReadonlySet<string>): string[] {
  return sortedNames(values).map((name) => {
    const line = `${chalk.bold(name)}=${values[name]}`;
    return defaulted.has(name) ? `${line} ${chalk.gray('(default)')}` : line;
  });
}

export function formatShellExports(values: EnvMap): string[] {
  return sortedNames(values).map((name) => `export ${name}=${escapeShellArg(values[name])}`);
}

export function formatJsonValues(values: EnvMap): string {
  return JSON.stringify({ ok: true, values }, null, 2);
}

export function formatJsonErrors(error: LoadError): string {
  return JSON.stringify({ ok: false, message: error.message, errors: error.errors }, null, 2);
}

export function formatLoadError(error: LoadError): string[] {
  return [
    chalk.red(`❌ ${error.message}`),
    ...error.variables().map((name) => chalk.red(`   ${name}: ${describeCause(error.errors[name])}`)),
  ];
}
