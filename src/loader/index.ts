/**
 * Resolves a requested set of environment variables, writing defaults back
 * for the ones that are missing and collecting every failure into one error.
 */

import { systemEnvironment } from '../infra/environment.js';
import { err, ok, type Result } from '../types/result.js';
import type { EnvErrors, EnvMap, EnvRequest, EnvVarError, IEnvironment } from '../types/index.js';

export const LOAD_ERROR_MESSAGE = 'error(s) occurred loading environment variables';

export class LoadError extends Error {
  readonly errors: Readonly<EnvErrors>;

  constructor(errors: EnvErrors) {
    super(LOAD_ERROR_MESSAGE);
    this.name = 'LoadError';
    this.errors = errors;
  }

  /** Failing variable names, sorted, optionally only those with the given cause. */
  variables(cause?: EnvVarError): string[] {
    return Object.keys(this.errors)
      .filter((name) => cause === undefined || this.errors[name] === cause)
      .sort();
  }
}

export function isLoadError(value: unknown): value is LoadError {
  return value instanceof LoadError;
}

export interface LoadOptions {
  /** Store to read from and write defaults into. Defaults to process.env. */
  env?: IEnvironment;
  /** Called after a default has been written back for a missing variable. */
  onDefault?: (name: string, value: string) => void;
}

type RequestMap = ReadonlyMap<string, string | null | undefined>;

// Records cannot hold function values, so any request with an entries() method is a map.
function isRequestMap(request: EnvRequest): request is RequestMap {
  return typeof request.entries === 'function';
}

function requestEntries(request: EnvRequest): Array<[string, string | null | undefined]> {
  return isRequestMap(request) ? [...request.entries()] : Object.entries(request);
}

/**
 * Loads the requested variables.
 *
 * A missing variable with a default has the default written into the store,
 * even when the call fails because of other variables. The check and the write
 * are not atomic: another writer can set the variable in between.
 */
export function load(request: EnvRequest, options: LoadOptions = {}): Result<EnvMap, LoadError> {
  const env = options.env ?? systemEnvironment;
  // Maps, not records: a variable may be named __proto__.
  const values = new Map<string, string>();
  const errors = new Map<string, EnvVarError>();

  for (const [name, fallback] of requestEntries(request)) {
    const lookup = env.get(name);

    if (lookup.ok) {
      values.set(name, lookup.value);
      continue;
    }

    if (lookup.error === 'not-present' && typeof fallback === 'string') {
      env.set(name, fallback);
      values.set(name, fallback);
      options.onDefault?.(name, fallback);
      continue;
    }

    errors.set(name, lookup.error);
  }

  return errors.size > 0
    ? err(new LoadError(Object.fromEntries(errors)))
    : ok(Object.fromEntries(values));
}

export function loadOrThrow(request: EnvRequest, options?: LoadOptions): EnvMap {
  const result = load(request, options);
  if (!result.ok) throw result.error;
  return result.value;
}
