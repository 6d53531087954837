/**
 * TypeScript type definitions
 */

import type { Result } from './result.js';

export * from './interfaces.js';
export * from './result.js';

/**
 * Why a single variable could not be resolved.
 * - 'not-present': unset and no default was given.
 * - 'not-valid-text': set, but the value did not decode as text. A default never rescues this.
 */
export type EnvVarError = 'not-present' | 'not-valid-text';

/** Variable name to default. `null` and `undefined` both mean "required". */
export type EnvRequest =
  | Readonly<Record<string, string | null | undefined>>
  | ReadonlyMap<string, string | null | undefined>;

export type EnvMap = Record<string, string>;

export type EnvErrors = Record<string, EnvVarError>;

export type EnvLookup = Result<string, EnvVarError>;
