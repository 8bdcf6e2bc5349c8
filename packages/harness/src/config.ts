/**
 * Configuration management for the cluster test kit.
 *
 * Values come from the environment (a local .env file is honoured) and fall
 * back to the defaults in constants.ts. Node secrets are not read here; callers
 * pass them to every node.
 */

import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { CLUSTER, PROCESS, TRANSFER } from './constants.js';

loadEnv();

export interface HarnessConfig {
  binaries: {
    /** Directory holding the server binaries */
    dir: string;
    /** File name of the directory (coordinator) binary */
    directory: string;
    /** File name of the storage node binary */
    storage: string;
  };
  network: {
    /** Host name the nodes are reached at */
    host: string;
  };
  process: {
    startupTimeout: number;
    pollInterval: number;
    stopCooldown: number;
    shutdownTimeout: number;
  };
  transfer: {
    maxRedirects: number;
  };
  cluster: {
    registrationTimeout: number;
  };
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): HarnessConfig {
  return {
    binaries: {
      dir: resolve(envString('CLUSTER_BIN_DIR', '../target/debug')),
      directory: envString('CLUSTER_DIRECTORY_BINARY', 'menmosd'),
      storage: envString('CLUSTER_STORAGE_BINARY', 'amphora'),
    },

    network: {
      host: envString('CLUSTER_HOST', 'localhost'),
    },

    process: {
      startupTimeout: envNumber('CLUSTER_STARTUP_TIMEOUT', PROCESS.STARTUP_TIMEOUT),
      pollInterval: envNumber('CLUSTER_POLL_INTERVAL', PROCESS.HEALTH_POLL_INTERVAL),
      stopCooldown: envNumber('CLUSTER_STOP_COOLDOWN', PROCESS.STOP_COOLDOWN),
      shutdownTimeout: envNumber('CLUSTER_SHUTDOWN_TIMEOUT', PROCESS.SHUTDOWN_TIMEOUT),
    },

    transfer: {
      maxRedirects: envNumber('CLUSTER_MAX_REDIRECTS', TRANSFER.MAX_REDIRECTS),
    },

    cluster: {
      registrationTimeout: envNumber('CLUSTER_REGISTRATION_TIMEOUT', CLUSTER.REGISTRATION_TIMEOUT),
    },
  };
}

/**
 * Full paths of the two server binaries for a configuration
 */
export function binaryPaths(config: HarnessConfig): { directory: string; storage: string } {
  return {
    directory: resolve(config.binaries.dir, config.binaries.directory),
    storage: resolve(config.binaries.dir, config.binaries.storage),
  };
}

export const config = loadConfig();
