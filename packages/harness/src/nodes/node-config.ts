/**
 * Node configuration files
 *
 * The server binaries read their settings from a JSON file passed with
 * `--cfg`. The shapes below follow the servers' configuration schema and
 * must not drift from it.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CLUSTER } from '../constants.js';

/**
 * Secrets shared by every node of a cluster. Always supplied by the caller;
 * the harness has no built-in values.
 */
export interface NodeSecrets {
  registrationSecret: string;
  adminPassword: string;
  /** 32-character symmetric key used by the servers to sign tokens and URLs */
  encryptionKey: string;
}

interface NodeSection {
  db_path: string;
  registration_secret: string;
  admin_password: string;
  encryption_key: string;
}

export interface DirectoryNodeConfig {
  node: NodeSection;
  server: {
    type: 'HTTP';
    port: number;
  };
}

export interface BlobStorageConfig {
  type: 'Directory';
  path: string;
}

export interface StorageNodeConfig {
  directory: {
    url: string;
    port: number;
  };
  node: NodeSection & {
    name: string;
    blob_storage: BlobStorageConfig;
  };
  server: {
    certificate_storage_path: string;
    subnet_mask: string;
    port: number;
  };
}

export type NodeConfig = DirectoryNodeConfig | StorageNodeConfig;

export function isStorageNodeConfig(config: NodeConfig): config is StorageNodeConfig {
  return 'directory' in config;
}

/**
 * Create a fresh, uniquely named data directory for one node
 */
export function createDataDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `${prefix}-`));
}

function nodeSection(dataDir: string, secrets: NodeSecrets): NodeSection {
  return {
    db_path: join(dataDir, 'db') + '/',
    registration_secret: secrets.registrationSecret,
    admin_password: secrets.adminPassword,
    encryption_key: secrets.encryptionKey,
  };
}

export function buildDirectoryConfig(dataDir: string, port: number, secrets: NodeSecrets): DirectoryNodeConfig {
  return {
    node: nodeSection(dataDir, secrets),
    server: { type: 'HTTP', port },
  };
}

export interface StorageConfigParams {
  name: string;
  port: number;
  /** Scheme and host of the directory, without port (e.g. http://localhost) */
  directoryUrl: string;
  directoryPort: number;
  secrets: NodeSecrets;
}

/**
 * Build a storage node config. Creates the (empty) certificate directory the
 * server's TLS layer expects to find.
 */
export function buildStorageConfig(dataDir: string, params: StorageConfigParams): StorageNodeConfig {
  const certPath = join(dataDir, 'certs');
  mkdirSync(certPath);

  return {
    directory: { url: params.directoryUrl, port: params.directoryPort },
    node: {
      name: params.name,
      ...nodeSection(dataDir, params.secrets),
      blob_storage: {
        type: 'Directory',
        path: join(dataDir, 'blobs'),
      },
    },
    server: {
      certificate_storage_path: certPath,
      subnet_mask: CLUSTER.SUBNET_MASK,
      port: params.port,
    },
  };
}

/**
 * Write a config into a data directory and return its path
 */
export function writeNodeConfig(dataDir: string, config: Readonly<NodeConfig>): string {
  const configPath = join(dataDir, CLUSTER.CONFIG_FILE);
  writeFileSync(configPath, JSON.stringify(config), { flag: 'wx' });
  return configPath;
}
