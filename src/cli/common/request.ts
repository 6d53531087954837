/**
 * Builds a load request from CLI arguments and request files.
 */

import { FileStorage } from '../../infra/storage.js';
import type { IStorage } from '../../types/interfaces.js';

// A Map so that a variable named __proto__ stays an ordinary entry.
export type RequestEntries = Map<string, string | null>;

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class RequestSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestSpecError';
  }
}

export function isValidVariableName(name: string): boolean {
  return VARIABLE_NAME.test(name);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertVariableName(name: string, source: string): void {
  if (!isValidVariableName(name)) {
    throw new RequestSpecError(`Invalid variable name '${name}' in ${source}`);
  }
}

/**
 * Parses `NAME` (required) or `NAME=default` specs. Only the first `=` splits,
 * so defaults may contain `=`. Later duplicates win.
 */
export function parseVariableSpecs(specs: string[]): RequestEntries {
  const entries: RequestEntries = new Map();
  for (const spec of specs) {
    const separator = spec.indexOf('=');
    const name = separator === -1 ? spec : spec.slice(0, separator);
    assertVariableName(name, `argument '${spec}'`);
    entries.set(name, separator === -1 ? null : spec.slice(separator + 1));
  }
  return entries;
}

/**
 * Reads a JSON object of name -> default (string) or null (required).
 */
export function readRequestFile(path: string, storage: IStorage = new FileStorage()): RequestEntries {
  if (!storage.exists(path)) {
    throw new RequestSpecError(`Request file not found: ${path}`);
  }

  let content: string;
  try {
    content = storage.readFile(path);
  } catch (error) {
    throw new RequestSpecError(`Request file could not be read: ${path} (${describeError(error)})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new RequestSpecError(`Request file is not valid JSON: ${path} (${describeError(error)})`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RequestSpecError(`Request file must contain a JSON object: ${path}`);
  }

  const entries: RequestEntries = new Map();
  for (const [name, value] of Object.entries(parsed)) {
    assertVariableName(name, path);
    if (value !== null && typeof value !== 'string') {
      throw new RequestSpecError(`Default for '${name}' in ${path} must be a string or null`);
    }
    entries.set(name, value);
  }
  return entries;
}

export function buildRequest(
  options: { vars?: string[]; request?: string },
  storage?: IStorage
): RequestEntries {
  const fromFile = options.request ? readRequestFile(options.request, storage) : new Map<string, string | null>();
  return new Map([...fromFile, ...parseVariableSpecs(options.vars ?? [])]);
}
