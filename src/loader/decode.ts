import { err, ok } from '../types/result.js';
import type { EnvLookup, EnvVarError } from '../types/index.js';

// Node decodes the OS environment as UTF-8 and substitutes U+FFFD for invalid bytes,
// so the replacement character is all that survives of an undecodable value.
const REPLACEMENT_CHAR = '\uFFFD';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function isValidText(value: string): boolean {
  return !value.includes(REPLACEMENT_CHAR) && !LONE_SURROGATE.test(value);
}

export function decodeEnvValue(raw: string | undefined): EnvLookup {
  if (raw === undefined) return err<EnvVarError>('not-present');
  if (!isValidText(raw)) return err<EnvVarError>('not-valid-text');
  return ok(raw);
}
