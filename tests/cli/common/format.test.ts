import chalk from 'chalk';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  describeCause,
  formatJsonErrors,
  formatJsonValues,
  formatLoadError,
  formatShellExports,
  formatTextValues,
} from '../../../src/cli/common/format.js';
import { LoadError } from '../../../src/loader/index.js';

describe('format', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('prints sorted NAME=value lines and marks defaults', () => {
    expect(formatTextValues({ PORT: '3000', HOST: 'db' }, new Set(['PORT']))).toEqual([
      'HOST=db',
      'PORT=3000 (default)',
    ]);
  });

  it('prints shell exports with quoted values', () => {
    expect(formatShellExports({ MSG: "it's here", A: '$HOME' })).toEqual([
      "export A='$HOME'",
      "export MSG='it'\\''s here'",
    ]);
  });

  it('prints JSON for values and errors', () => {
    expect(JSON.parse(formatJsonValues({ A: '1' }))).toEqual({ ok: true, values: { A: '1' } });
    expect(JSON.parse(formatJsonErrors(new LoadError({ B: 'not-present' })))).toEqual({
      ok: false,
      message: 'error(s) occurred loading environment variables',
      errors: { B: 'not-present' },
    });
  });

  it('lists each failing variable with its cause', () => {
    const error = new LoadError({ TOKEN: 'not-present', NAME: 'not-valid-text' });

    expect(formatLoadError(error)).toEqual([
      '❌ error(s) occurred loading environment variables',
      '   NAME: not valid text',
      '   TOKEN: not present',
    ]);
  });

  it('describes causes', () => {
    expect(describeCause('not-present')).toBe('not present');
    expect(describeCause('not-valid-text')).toBe('not valid text');
  });
});
