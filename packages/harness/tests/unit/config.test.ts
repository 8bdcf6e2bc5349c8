import { resolve } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { binaryPaths, loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read overrides from the environment', () => {
    vi.stubEnv('CLUSTER_BIN_DIR', '/srv/bin');
    vi.stubEnv('CLUSTER_HOST', '127.0.0.1');
    vi.stubEnv('CLUSTER_STARTUP_TIMEOUT', '2500');
    vi.stubEnv('CLUSTER_MAX_REDIRECTS', '3');

    const config = loadConfig();

    expect(config.binaries.dir).toBe('/srv/bin');
    expect(config.network.host).toBe('127.0.0.1');
    expect(config.process.startupTimeout).toBe(2500);
    expect(config.transfer.maxRedirects).toBe(3);
  });

  it('should fall back to the default for a non-numeric value', () => {
    vi.stubEnv('CLUSTER_STOP_COOLDOWN', 'soon');

    expect(loadConfig().process.stopCooldown).toBe(2000);
  });

  it('should resolve binary paths inside the binary directory', () => {
    vi.stubEnv('CLUSTER_BIN_DIR', '/srv/bin');
    vi.stubEnv('CLUSTER_DIRECTORY_BINARY', 'directoryd');
    vi.stubEnv('CLUSTER_STORAGE_BINARY', 'storaged');

    expect(binaryPaths(loadConfig())).toEqual({
      directory: resolve('/srv/bin', 'directoryd'),
      storage: resolve('/srv/bin', 'storaged'),
    });
  });
});
