/**
 * Cluster Test Kit
 *
 * Boots and drives a directory node plus storage nodes as external processes
 * for integration tests of the blob store.
 */

export { ClusterFixture, withCluster, type ClusterOptions, type TeardownFailure } from './cluster/cluster-fixture.js';
export { DirectoryNode, type DirectoryNodeOptions, type ListMetadataOptions, type PushOptions, type QueryOptions } from './nodes/directory-node.js';
export { StorageNode, type StorageNodeOptions } from './nodes/storage-node.js';
export { ClusterNode, type ClusterNodeOptions } from './nodes/cluster-node.js';
export {
  buildDirectoryConfig,
  buildStorageConfig,
  isStorageNodeConfig,
  writeNodeConfig,
  type DirectoryNodeConfig,
  type NodeConfig,
  type NodeSecrets,
  type StorageNodeConfig,
} from './nodes/node-config.js';
export {
  ManagedProcess,
  spawnProcess,
  type ChildHandle,
  type ManagedProcessOptions,
  type ProcessLauncher,
  type ProcessState,
} from './process/managed-process.js';
export { HttpSession, headerValue, type HttpMethod, type HttpResponse, type HttpSessionOptions } from './transport/http-session.js';
export { deleteBlob, encodeBlobMeta, encodeMultipart, pushBlob, type TransferOptions } from './transport/transfer.js';
export { binaryPaths, config, loadConfig, type HarnessConfig } from './config.js';
export { CLUSTER, ENDPOINTS, HEADERS, HTTP_STATUS, PROCESS, TRANSFER } from './constants.js';
export * from './errors.js';
export * from './types.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';
export { allocatePort, releasePort } from './utils/ports.js';
export { delay, pollUntil } from './utils/wait.js';
