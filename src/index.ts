/**
 * Main entry point for env-loader
 */

export { load, loadOrThrow, isLoadError, LoadError, LOAD_ERROR_MESSAGE, type LoadOptions } from './loader/index.js';
export { decodeEnvValue, isValidText } from './loader/decode.js';
export { SystemEnvironment, MemoryEnvironment, systemEnvironment } from './infra/environment.js';
export { ok, err } from './types/result.js';
export type { EnvErrors, EnvLookup, EnvMap, EnvRequest, EnvVarError, IEnvironment, Result } from './types/index.js';
