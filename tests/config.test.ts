import { describe, expect, it } from 'vitest';
import { DEFAULT_STORE_DIR, loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({}, {})).toEqual({ storeDir: DEFAULT_STORE_DIR, logLevel: 'info' });
  });

  it('reads the environment', () => {
    expect(loadConfig({}, { VARKEEP_HOME: '/srv/vars', VARKEEP_LOG_LEVEL: 'debug' })).toEqual({
      storeDir: '/srv/vars',
      logLevel: 'debug',
    });
  });

  it('prefers explicit overrides over the environment', () => {
    const config = loadConfig(
      { storeDir: './local', logLevel: 'error' },
      { VARKEEP_HOME: '/srv/vars', VARKEEP_LOG_LEVEL: 'debug' },
    );
    expect(config).toEqual({ storeDir: './local', logLevel: 'error' });
  });

  it('treats empty environment values as unset', () => {
    expect(loadConfig({}, { VARKEEP_HOME: '', VARKEEP_LOG_LEVEL: '' }).storeDir).toBe(
      DEFAULT_STORE_DIR,
    );
  });

  it('raises ConfigError listing each invalid field', () => {
    let caught: unknown;
    try {
      loadConfig({ logLevel: 'loud', storeDir: '' }, {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        'storeDir: storeDir must not be empty',
        expect.stringMatching(/^logLevel: Invalid enum value/),
      ],
    });
  });
});
