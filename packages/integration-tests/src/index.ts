/**
 * Cluster Integration Tests
 *
 * Stand-in servers and scenario helpers for exercising the cluster test kit.
 */

export {
  createInProcessLauncher,
  readNodeConfig,
  StandInProcess,
  type InProcessCluster,
  type InProcessLauncherOptions,
} from './stand-ins/in-process-launcher.js';
export { createMockDirectory, MockDirectoryServer, type MockDirectoryOptions } from './stand-ins/mock-directory.js';
export { MockStorageServer, type MockStorageOptions } from './stand-ins/mock-storage.js';
export { BlobIndex, type IndexedBlob } from './stand-ins/blob-index.js';
export {
  inCluster,
  liveBinariesPresent,
  liveStarter,
  pushDocuments,
  standInStarter,
  withDocuments,
  type ClusterStarter,
  type Document,
} from './helpers.js';
export * from './test-constants.js';
