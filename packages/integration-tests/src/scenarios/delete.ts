import { expect, it } from 'vitest';
import { UnexpectedStatusError } from '@clusterkit/harness';
import { inCluster, pushDocuments, type ClusterStarter } from '../helpers.js';

export function deleteScenarios(start: ClusterStarter): void {
  it('should remove a deleted blob from the index', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      const [id] = await pushDocuments(directory, [{ body: 'THIS IS A TEST' }]);
      expect((await directory.query()).total).toBe(1);

      await directory.delete(id ?? '');

      const results = await directory.query();
      expect(results.total).toBe(0);
      expect(results.hits).toEqual([]);
    });
  });

  it('should leave other blobs in place', async () => {
    await inCluster(start, ['alpha', 'beta'], async ({ directory }) => {
      const [first, second] = await pushDocuments(directory, [{ body: 'first' }, { body: 'second' }]);

      await directory.delete(first ?? '');

      const results = await directory.query();
      expect(results.hits.map((hit) => hit.id)).toEqual([second]);
    });
  });

  it('should reject deleting a blob that does not exist', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await expect(directory.delete('no-such-blob')).rejects.toBeInstanceOf(UnexpectedStatusError);
    });
  });
}
