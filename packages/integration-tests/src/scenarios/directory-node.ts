import { expect, it } from 'vitest';
import { ProcessStateError } from '@clusterkit/harness';
import { inCluster, type ClusterStarter } from '../helpers.js';

export function directoryNodeScenarios(start: ClusterStarter): void {
  it('should start a healthy directory with an empty index', async () => {
    await inCluster(start, [], async ({ directory }) => {
      expect(directory.state).toBe('healthy');
      await expect(directory.isHealthy()).resolves.toBe(true);

      const results = await directory.query();
      expect(results.total).toBe(0);
      expect(results.hits).toEqual([]);
    });
  });

  it('should list a registered storage node', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      const listing = await directory.listStorageNodes();
      expect(listing.storage_nodes).toHaveLength(1);
      expect(listing.storage_nodes[0]?.id).toBe('alpha');
    });
  });

  it('should list every storage node of a larger cluster', async () => {
    await inCluster(start, ['alpha', 'beta', 'gamma'], async ({ directory }) => {
      const listing = await directory.listStorageNodes();
      expect(listing.storage_nodes.map((node) => node.id).sort()).toEqual(['alpha', 'beta', 'gamma']);
    });
  });

  it('should refuse domain operations once stopped', async () => {
    const cluster = await start([]);
    await cluster.stop();

    expect(cluster.directory.state).toBe('stopped');
    await expect(cluster.directory.query()).rejects.toBeInstanceOf(ProcessStateError);
  });
}
