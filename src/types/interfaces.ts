/**
 * Dependency injection interfaces
 * Enables testability by abstracting external dependencies
 */

import type { EnvLookup } from './index.js';

/**
 * Abstracts the process environment variable store
 */
export interface IEnvironment {
  get(key: string): EnvLookup;
  /** Overwrites the variable for the rest of the store's lifetime. */
  set(key: string, value: string): void;
}

/**
 * Abstracts filesystem reads
 */
export interface IStorage {
  readFile(path: string): string;
  exists(path: string): boolean;
}
