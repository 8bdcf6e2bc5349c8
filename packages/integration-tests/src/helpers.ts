/**
 * Scenario helpers: cluster starters and document fixtures
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  binaryPaths,
  ClusterFixture,
  config as harnessConfig,
  type DirectoryNode,
  type HarnessConfig,
} from '@clusterkit/harness';
import { createInProcessLauncher, type InProcessCluster } from './stand-ins/in-process-launcher.js';
import { standInConfig, TEST_SECRETS } from './test-constants.js';

/**
 * Starts a cluster with the given storage node names
 */
export type ClusterStarter = (storageNodes: string[]) => Promise<ClusterFixture>;

/**
 * A file to upload, with the tags and metadata to push it with
 */
export interface Document {
  body: string;
  name?: string;
  tags?: string[];
  meta?: Record<string, string>;
}

/**
 * Cluster of in-process stand-ins. `standIns` exposes the mock servers for
 * assertions on their internal state.
 */
export function standInStarter(onLaunch?: (standIns: InProcessCluster) => void): ClusterStarter {
  return (storageNodes) => {
    const standIns = createInProcessLauncher();
    onLaunch?.(standIns);
    return ClusterFixture.start({
      secrets: TEST_SECRETS,
      storageNodes,
      config: standInConfig(harnessConfig),
      launcher: standIns.launcher,
    });
  };
}

/**
 * Cluster of the real server binaries
 */
export function liveStarter(config: HarnessConfig = harnessConfig): ClusterStarter {
  return (storageNodes) =>
    ClusterFixture.start({
      secrets: TEST_SECRETS,
      storageNodes,
      config,
    });
}

/**
 * Whether both server binaries exist under CLUSTER_BIN_DIR
 */
export function liveBinariesPresent(config: HarnessConfig = harnessConfig): boolean {
  const paths = binaryPaths(config);
  return existsSync(paths.directory) && existsSync(paths.storage);
}

/**
 * Start a cluster, run `fn` against it and always tear it down
 */
export async function inCluster(
  start: ClusterStarter,
  storageNodes: string[],
  fn: (cluster: ClusterFixture) => Promise<void>
): Promise<void> {
  const cluster = await start(storageNodes);
  try {
    await fn(cluster);
  } finally {
    await cluster.stop();
  }
}

/**
 * Write documents to a temporary directory for the duration of `fn`
 */
export async function withDocuments<T>(documents: Document[], fn: (paths: string[]) => Promise<T>): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), 'clusterkit-docs-'));
  try {
    const paths = documents.map((doc, i) => {
      const path = join(dir, doc.name ?? `document-${i}`);
      writeFileSync(path, doc.body);
      return path;
    });
    return await fn(paths);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Push every document through the directory, in order. Resolves with the
 * blob ids.
 */
export function pushDocuments(directory: DirectoryNode, documents: Document[]): Promise<string[]> {
  return withDocuments(documents, async (paths) => {
    const ids: string[] = [];
    for (const [i, path] of paths.entries()) {
      const doc = documents[i];
      const { id } = await directory.push(path, { tags: doc?.tags, meta: doc?.meta });
      ids.push(id);
    }
    return ids;
  });
}
