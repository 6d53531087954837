/**
 * IEnvironment implementations: the real process.env and an in-memory store
 */

import { decodeEnvValue } from '../loader/decode.js';
import type { EnvLookup, IEnvironment } from '../types/index.js';

export class SystemEnvironment implements IEnvironment {
  get(key: string): EnvLookup {
    return decodeEnvValue(process.env[key]);
  }

  set(key: string, value: string): void {
    process.env[key] = value;
  }
}

export class MemoryEnvironment implements IEnvironment {
  private vars: Map<string, string>;

  constructor(initial: Record<string, string | undefined> = {}) {
    this.vars = new Map();
    for (const [key, value] of Object.entries(initial)) {
      if (value !== undefined) this.vars.set(key, value);
    }
  }

  get(key: string): EnvLookup {
    return decodeEnvValue(this.vars.get(key));
  }

  set(key: string, value: string): void {
    this.vars.set(key, value);
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.vars);
  }
}

export const systemEnvironment = new SystemEnvironment();
