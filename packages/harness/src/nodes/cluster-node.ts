/**
 * Cluster Node
 *
 * Common base of the directory and storage facades. Each node owns:
 * - a private temporary data directory holding its generated config.json
 * - a ManagedProcess running the server binary with `--cfg <config.json>`
 * - an HttpSession authenticating with the cluster's admin password
 */

import { rmSync } from 'node:fs';
import { config as harnessConfig } from '../config.js';
import { ProcessStateError } from '../errors.js';
import { ManagedProcess, type ProcessLauncher, type ProcessState } from '../process/managed-process.js';
import { HttpSession } from '../transport/http-session.js';
import { logger } from '../utils/logger.js';
import { allocatePort, releasePort } from '../utils/ports.js';
import { createDataDir, writeNodeConfig, type NodeConfig, type NodeSecrets } from './node-config.js';

export interface ClusterNodeOptions {
  /** Path of the server binary */
  binaryPath: string;
  /** The admin password doubles as the authorization header value */
  secrets: NodeSecrets;
  /** Listening port (allocated when omitted) */
  port?: number;
  /** Host name the node is reached at (default: CLUSTER_HOST) */
  hostname?: string;
  launcher?: ProcessLauncher;
  startupTimeout?: number;
  pollInterval?: number;
  stopCooldown?: number;
  shutdownTimeout?: number;
  /** Leave the data directory on disk after stop() */
  keepDataDir?: boolean;
}

export abstract class ClusterNode<C extends NodeConfig = NodeConfig> {
  readonly port: number;
  readonly hostname: string;
  readonly dataDir: string;
  readonly configPath: string;
  readonly nodeConfig: Readonly<C>;

  protected readonly session: HttpSession;
  protected readonly supervisor: ManagedProcess;

  private readonly ownsPort: boolean;
  private readonly keepDataDir: boolean;

  protected constructor(
    kind: string,
    options: ClusterNodeOptions,
    buildConfig: (dataDir: string, port: number) => C
  ) {
    this.ownsPort = options.port === undefined;
    this.port = options.port ?? allocatePort();
    this.hostname = options.hostname ?? harnessConfig.network.host;
    this.keepDataDir = options.keepDataDir ?? false;

    this.dataDir = createDataDir(`clusterkit-${kind}`);
    this.nodeConfig = buildConfig(this.dataDir, this.port);
    this.configPath = writeNodeConfig(this.dataDir, this.nodeConfig);

    this.session = new HttpSession({ authToken: options.secrets.adminPassword });
    this.supervisor = new ManagedProcess({
      binaryPath: options.binaryPath,
      args: ['--cfg', this.configPath],
      host: this.url,
      session: this.session,
      launcher: options.launcher,
      startupTimeout: options.startupTimeout ?? harnessConfig.process.startupTimeout,
      pollInterval: options.pollInterval ?? harnessConfig.process.pollInterval,
      stopCooldown: options.stopCooldown ?? harnessConfig.process.stopCooldown,
      shutdownTimeout: options.shutdownTimeout ?? harnessConfig.process.shutdownTimeout,
    });

    logger.debug(`[Node] ${kind} configured`, {
      url: this.url,
      dataDir: this.dataDir,
      adminPassword: logger.secret(options.secrets.adminPassword),
    });
  }

  /**
   * Base URL of the node
   */
  get url(): string {
    return `http://${this.hostname}:${this.port}`;
  }

  get state(): ProcessState {
    return this.supervisor.state;
  }

  /**
   * Start the server and block until it is healthy
   */
  async start(): Promise<this> {
    await this.supervisor.start();
    return this;
  }

  isHealthy(): Promise<boolean> {
    return this.supervisor.isHealthy();
  }

  /**
   * Stop the server, release the session and port, and remove the data
   * directory unless asked to keep it
   */
  async stop(): Promise<void> {
    try {
      await this.supervisor.stop();
    } finally {
      this.session.close();
      if (this.ownsPort) {
        releasePort(this.port);
      }
      if (!this.keepDataDir) {
        rmSync(this.dataDir, { recursive: true, force: true });
      }
    }
  }

  /**
   * Refuse domain operations on a node that never became healthy
   */
  protected assertHealthy(operation: string): void {
    if (this.supervisor.state !== 'healthy') {
      throw new ProcessStateError(`cannot ${operation}: ${this.url} is ${this.supervisor.state}`, {
        operation,
        state: this.supervisor.state,
      });
    }
  }
}
