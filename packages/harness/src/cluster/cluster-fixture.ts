/**
 * Cluster Fixture
 *
 * Brings up one directory node and any number of storage nodes for a test
 * scenario, and tears them down again in reverse order.
 *
 * Failure policy:
 * - setup failures are fatal: nodes already running are stopped and the
 *   original error is rethrown
 * - teardown failures are not: every node is attempted, and failures are
 *   logged and returned to the caller
 */

import { binaryPaths, config as harnessConfig, type HarnessConfig } from '../config.js';
import { CLUSTER } from '../constants.js';
import { RegistrationTimeoutError } from '../errors.js';
import { DirectoryNode } from '../nodes/directory-node.js';
import type { NodeSecrets } from '../nodes/node-config.js';
import { StorageNode } from '../nodes/storage-node.js';
import type { ProcessLauncher } from '../process/managed-process.js';
import { logger } from '../utils/logger.js';
import { pollUntil } from '../utils/wait.js';

export interface ClusterOptions {
  secrets: NodeSecrets;
  /** Names of the storage nodes to start, in order (default: none) */
  storageNodes?: string[];
  /** Harness configuration (default: loaded from the environment) */
  config?: HarnessConfig;
  /** Port of the directory node (allocated when omitted) */
  directoryPort?: number;
  launcher?: ProcessLauncher;
  /** Wait for each storage node to show up in the directory (default: true) */
  waitForRegistration?: boolean;
  registrationTimeout?: number;
  /** Leave node data directories on disk after teardown */
  keepDataDirs?: boolean;
}

export interface TeardownFailure {
  node: string;
  error: unknown;
}

export class ClusterFixture {
  private readonly storage: StorageNode[] = [];

  private constructor(
    readonly directory: DirectoryNode,
    private readonly options: ClusterOptions,
    private readonly config: HarnessConfig
  ) {}

  /**
   * Start the directory, then every requested storage node
   */
  static async start(options: ClusterOptions): Promise<ClusterFixture> {
    const config = options.config ?? harnessConfig;
    const paths = binaryPaths(config);

    logger.info('[Cluster] Starting directory node...');
    const directory = await DirectoryNode.launch({
      binaryPath: paths.directory,
      secrets: options.secrets,
      port: options.directoryPort,
      hostname: config.network.host,
      launcher: options.launcher,
      startupTimeout: config.process.startupTimeout,
      pollInterval: config.process.pollInterval,
      stopCooldown: config.process.stopCooldown,
      shutdownTimeout: config.process.shutdownTimeout,
      maxRedirects: config.transfer.maxRedirects,
      keepDataDir: options.keepDataDirs,
    });

    const cluster = new ClusterFixture(directory, options, config);

    try {
      for (const name of options.storageNodes ?? []) {
        await cluster.addStorageNode(name);
      }
    } catch (error) {
      logger.error('[Cluster] Setup failed, tearing down', error);
      await cluster.stop();
      throw error;
    }

    logger.info('[Cluster] Ready', {
      directory: directory.url,
      storageNodes: cluster.storage.map((node) => node.url),
    });
    return cluster;
  }

  get storageNodes(): readonly StorageNode[] {
    return this.storage;
  }

  /**
   * Start a storage node against the directory and wait for it to register
   */
  async addStorageNode(name: string): Promise<StorageNode> {
    const paths = binaryPaths(this.config);
    const waitForRegistration = this.options.waitForRegistration ?? true;
    const initialCount = waitForRegistration
      ? (await this.directory.listStorageNodes()).storage_nodes.length
      : 0;

    logger.info(`[Cluster] Starting storage node ${name}...`);
    const node = await StorageNode.launch({
      binaryPath: paths.storage,
      name,
      directoryUrl: `http://${this.directory.hostname}`,
      directoryPort: this.directory.port,
      secrets: this.options.secrets,
      hostname: this.config.network.host,
      launcher: this.options.launcher,
      startupTimeout: this.config.process.startupTimeout,
      pollInterval: this.config.process.pollInterval,
      stopCooldown: this.config.process.stopCooldown,
      shutdownTimeout: this.config.process.shutdownTimeout,
      keepDataDir: this.options.keepDataDirs,
    });
    this.storage.push(node);

    if (waitForRegistration) {
      const timeout = this.options.registrationTimeout ?? this.config.cluster.registrationTimeout;
      const registered = await pollUntil(
        async () => (await this.directory.listStorageNodes()).storage_nodes.length > initialCount,
        timeout,
        CLUSTER.REGISTRATION_POLL_INTERVAL
      );
      if (!registered) {
        throw new RegistrationTimeoutError(name, timeout);
      }
    }

    return node;
  }

  /**
   * Stop storage nodes (newest first), then the directory. Never throws.
   */
  async stop(): Promise<TeardownFailure[]> {
    const failures: TeardownFailure[] = [];
    const nodes: Array<{ name: string; stop: () => Promise<void> }> = [
      ...[...this.storage].reverse().map((node) => ({ name: `storage-${node.name}`, stop: () => node.stop() })),
      { name: 'directory', stop: () => this.directory.stop() },
    ];

    for (const { name, stop } of nodes) {
      try {
        await stop();
      } catch (error) {
        failures.push({ node: name, error });
      }
    }

    this.storage.length = 0;

    if (failures.length > 0) {
      logger.warn('[Cluster] Teardown errors', {
        failures: failures.map((f) => `${f.node}: ${String(f.error)}`),
      });
    }

    return failures;
  }
}

/**
 * Run `fn` against a freshly started cluster, always tearing it down after
 */
export async function withCluster<T>(
  options: ClusterOptions,
  fn: (cluster: ClusterFixture) => Promise<T>
): Promise<T> {
  const cluster = await ClusterFixture.start(options);
  try {
    return await fn(cluster);
  } finally {
    await cluster.stop();
  }
}
