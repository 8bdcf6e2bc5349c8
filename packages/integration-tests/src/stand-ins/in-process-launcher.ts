/**
 * In-Process Launcher
 *
 * A ProcessLauncher that runs the mock directory and storage servers inside
 * the test process instead of spawning binaries. It reads the config.json
 * the node facade generated, so the harness drives the stand-ins exactly as
 * it drives the real servers: through --cfg, /health and signals.
 */

import type { SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { readFileSync } from 'node:fs';
import {
  isRecord,
  isStorageNodeConfig,
  logger,
  type ChildHandle,
  type DirectoryNodeConfig,
  type NodeConfig,
  type ProcessLauncher,
  type StorageNodeConfig,
} from '@clusterkit/harness';
import { MockDirectoryServer } from './mock-directory.js';
import { MockStorageServer } from './mock-storage.js';

interface StandInServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

const NODE_SECTION_KEYS = ['db_path', 'registration_secret', 'admin_password', 'encryption_key'] as const;

function isNodeSection(value: unknown): value is DirectoryNodeConfig['node'] {
  if (!isRecord(value)) return false;
  const section = value;
  return NODE_SECTION_KEYS.every((key) => typeof section[key] === 'string');
}

function isDirectoryConfig(value: unknown): value is DirectoryNodeConfig {
  if (!isRecord(value)) return false;
  const server = value['server'];
  return isNodeSection(value['node']) && isRecord(server) && server['type'] === 'HTTP' && typeof server['port'] === 'number';
}

function isStorageConfig(value: unknown): value is StorageNodeConfig {
  if (!isRecord(value)) return false;
  const { directory, node, server } = value;
  if (!isRecord(directory) || !isRecord(node) || !isRecord(server)) return false;
  const blobStorage = node['blob_storage'];
  return (
    typeof directory['url'] === 'string' &&
    typeof directory['port'] === 'number' &&
    isNodeSection(node) &&
    typeof node['name'] === 'string' &&
    isRecord(blobStorage) &&
    typeof blobStorage['path'] === 'string' &&
    typeof server['port'] === 'number'
  );
}

/**
 * Load the config file named by the --cfg argument
 */
export function readNodeConfig(args: readonly string[]): NodeConfig {
  const cfgIndex = args.indexOf('--cfg');
  const configPath = cfgIndex < 0 ? undefined : args[cfgIndex + 1];
  if (configPath === undefined) {
    throw new Error(`no --cfg argument in: ${args.join(' ')}`);
  }

  const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
  if (isStorageConfig(parsed) || isDirectoryConfig(parsed)) {
    return parsed;
  }
  throw new Error(`unrecognised node config at ${configPath}`);
}

let nextPid = 50_000;

/**
 * Child handle backed by an in-process server. SIGINT, SIGTERM and SIGKILL
 * all stop the server; the 'exit' event follows once it has closed.
 */
export class StandInProcess extends EventEmitter implements ChildHandle {
  readonly pid = nextPid++;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  constructor(
    readonly label: string,
    private readonly server: StandInServer
  ) {
    super();
  }

  /**
   * Start the server. A server that cannot start exits with code 1.
   */
  boot(): void {
    void this.server.start().then(
      () => logger.debug(`[StandIn] ${this.label} listening`),
      (error: unknown) => {
        logger.warn(`[StandIn] ${this.label} failed to start`, { error: String(error) });
        const exitFailed = (): void => this.exit(1, null);
        return this.server.stop().then(exitFailed, exitFailed);
      }
    );
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    if (this.hasExited) {
      return false;
    }

    const name: NodeJS.Signals = typeof signal === 'string' ? signal : 'SIGTERM';
    void this.server.stop().then(
      () => this.exit(null, name),
      (error: unknown) => {
        logger.warn(`[StandIn] ${this.label} did not stop cleanly`, { error: String(error) });
        this.exit(1, name);
      }
    );
    return true;
  }

  get hasExited(): boolean {
    return this.exitCode !== null || this.signalCode !== null;
  }

  private exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.hasExited) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }
}

export interface InProcessLauncherOptions {
  /** Address the stand-ins bind to (default: 127.0.0.1) */
  host?: string;
}

export interface InProcessCluster {
  launcher: ProcessLauncher;
  /** Directory stand-ins in launch order */
  directories: MockDirectoryServer[];
  /** Storage stand-ins in launch order */
  storageNodes: MockStorageServer[];
  /** Every process launched, in order */
  processes: StandInProcess[];
}

export function createInProcessLauncher(options: InProcessLauncherOptions = {}): InProcessCluster {
  const host = options.host ?? '127.0.0.1';

  const cluster: InProcessCluster = {
    directories: [],
    storageNodes: [],
    processes: [],

    launcher: (_command: string, args: readonly string[], _spawnOptions: SpawnOptions) => {
      const config = readNodeConfig(args);
      let child: StandInProcess;

      if (isStorageNodeConfig(config)) {
        const storage = new MockStorageServer({
          port: config.server.port,
          host,
          name: config.node.name,
          directoryUrl: `${config.directory.url}:${config.directory.port}`,
          authToken: config.node.admin_password,
          registrationSecret: config.node.registration_secret,
          encryptionKey: config.node.encryption_key,
          blobDir: config.node.blob_storage.path,
        });
        cluster.storageNodes.push(storage);
        child = new StandInProcess(`storage-${config.node.name}`, storage);
      } else {
        const directory = new MockDirectoryServer({
          port: config.server.port,
          host,
          authToken: config.node.admin_password,
          registrationSecret: config.node.registration_secret,
          encryptionKey: config.node.encryption_key,
        });
        cluster.directories.push(directory);
        child = new StandInProcess('directory', directory);
      }

      cluster.processes.push(child);
      child.boot();
      return child;
    },
  };

  return cluster;
}
