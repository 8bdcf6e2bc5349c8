/**
 * Storage Node
 *
 * Facade over a running storage server. The node registers itself with the
 * directory named in its config; it exposes no domain operations, since
 * clients only ever address the directory.
 */

import { ClusterNode, type ClusterNodeOptions } from './cluster-node.js';
import { buildStorageConfig, type StorageNodeConfig } from './node-config.js';

export type StorageNodeOptions = ClusterNodeOptions & {
  /** Node name, used as its identity in the directory (default: alpha) */
  name?: string;
  /** Scheme and host of the directory, without port */
  directoryUrl: string;
  directoryPort: number;
};

export class StorageNode extends ClusterNode<StorageNodeConfig> {
  readonly name: string;

  constructor(options: StorageNodeOptions) {
    const name = options.name ?? 'alpha';
    super('storage', options, (dataDir, port) =>
      buildStorageConfig(dataDir, {
        name,
        port,
        directoryUrl: options.directoryUrl,
        directoryPort: options.directoryPort,
        secrets: options.secrets,
      })
    );
    this.name = name;
  }

  /**
   * Construct a storage node and wait until it is healthy
   */
  static async launch(options: StorageNodeOptions): Promise<StorageNode> {
    const node = new StorageNode(options);
    try {
      await node.start();
    } catch (error) {
      await node.stop();
      throw error;
    }
    return node;
  }
}
