import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dataDir: './data',
      inputDir: './data/imports',
      cleanupFiles: false,
    });
  });

  it('reads settings from the environment', () => {
    expect(loadConfig({ DATA_DIR: '/srv/counts', INPUT_DIR: '/srv/incoming', CLEANUP_FILES: 'true' })).toEqual({
      dataDir: '/srv/counts',
      inputDir: '/srv/incoming',
      cleanupFiles: true,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ CLEANUP_FILES: 'yes' })).toThrow(
      "Invalid configuration: CLEANUP_FILES: Expected 'true' or 'false'",
    );
  });
});
