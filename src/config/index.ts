/**
 * CLI settings, read from the environment
 */

import type { IEnvironment } from '../types/interfaces.js';
import { systemEnvironment } from '../infra/environment.js';

export const OUTPUT_FORMATS = ['text', 'json', 'shell'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliSettings {
  format: OutputFormat;
  quiet: boolean;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') return false;
  return undefined;
}

function readOptional(env: IEnvironment, key: string): string | undefined {
  const lookup = env.get(key);
  return lookup.ok ? lookup.value : undefined;
}

export class SettingsManager {
  private env: IEnvironment;
  private _settings?: CliSettings;

  constructor(env?: IEnvironment) {
    this.env = env || systemEnvironment;
  }

  // Read-only: settings are never written back into the environment.
  get settings(): CliSettings {
    if (!this._settings) {
      const formatRaw = readOptional(this.env, 'ENV_LOADER_FORMAT')?.trim().toLowerCase();
      this._settings = {
        format: formatRaw && isOutputFormat(formatRaw) ? formatRaw : 'text',
        quiet: parseBooleanEnv(readOptional(this.env, 'ENV_LOADER_QUIET')) ?? false,
      };
    }
    return this._settings;
  }
}

const defaultSettingsManager = new SettingsManager();

export function resolveCliSettings(env?: IEnvironment): CliSettings {
  return env ? new SettingsManager(env).settings : defaultSettingsManager.settings;
}
