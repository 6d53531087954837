import chalk from 'chalk';
import { resolveCliSettings, type OutputFormat } from '../../config/index.js';
import { load } from '../../loader/index.js';
import type { IEnvironment, IStorage } from '../../types/interfaces.js';
import { buildRequest, RequestSpecError, type RequestEntries } from '../common/request.js';
import {
  formatJsonErrors,
  formatJsonValues,
  formatLoadError,
  formatShellExports,
  formatTextValues,
} from '../common/format.js';

export const EXIT_OK = 0;
export const EXIT_LOAD_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CheckCommandDeps {
  env?: IEnvironment;
  storage?: IStorage;
}

/**
 * Resolves the requested variables and prints them. Returns the exit code.
 */
export function checkCommand(
  options: { vars?: string[]; request?: string; format?: OutputFormat; quiet?: boolean },
  deps: CheckCommandDeps = {}
): number {
  const settings = resolveCliSettings(deps.env);
  const format = options.format ?? settings.format;
  const quiet = options.quiet ?? settings.quiet;

  let request: RequestEntries;
  try {
    request = buildRequest(options, deps.storage);
  } catch (error) {
    if (error instanceof RequestSpecError) {
      console.error(chalk.red(error.message));
      return EXIT_USAGE;
    }
    throw error;
  }

  const defaulted = new Set<string>();
  const result = load(request, {
    env: deps.env,
    onDefault: (name) => defaulted.add(name),
  });

  if (!result.ok) {
    if (format === 'json') {
      console.log(formatJsonErrors(result.error));
    } else {
      for (const line of formatLoadError(result.error)) console.error(line);
    }
    return EXIT_LOAD_FAILED;
  }

  if (quiet) return EXIT_OK;

  switch (format) {
    case 'json':
      console.log(formatJsonValues(result.value));
      break;
    case 'shell':
      for (const line of formatShellExports(result.value)) console.log(line);
      break;
    default:
      for (const line of formatTextValues(result.value, defaulted)) console.log(line);
  }
  return EXIT_OK;
}
