import { expect, it } from 'vitest';
import { isUnexpectedStatus } from '@clusterkit/harness';
import { inCluster, pushDocuments, withDocuments, type ClusterStarter } from '../helpers.js';

export function putScenarios(start: ClusterStarter): void {
  it('should index a pushed file and serve it from its signed URL', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      const [id] = await pushDocuments(directory, [{ body: 'THIS IS A TEST' }]);

      const results = await directory.query();
      expect(results.total).toBe(1);
      expect(results.count).toBe(1);

      const [hit] = results.hits;
      expect(hit?.id).toBe(id);
      expect(hit?.meta.size).toBe(14);

      const response = await fetch(hit?.url ?? '');
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('THIS IS A TEST');
    });
  });

  it('should record the descriptor the file was pushed with', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await withDocuments([{ body: 'hello', name: 'hello.txt' }], async ([path]) => {
        await directory.push(path ?? '', { tags: ['greeting'], meta: { extension: 'txt' } });
      });

      const [hit] = (await directory.query()).hits;
      expect(hit?.meta).toMatchObject({
        name: 'hello.txt',
        size: 5,
        tags: ['greeting'],
        metadata: { extension: 'txt' },
        blob_type: 'File',
      });
    });
  });

  it('should fail and index nothing when redirects are disabled', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      const error = await withDocuments([{ body: 'THIS IS A TEST' }], ([path]) =>
        directory.push(path ?? '', { allowRedirects: false })
      ).catch((e: unknown) => e);

      expect(isUnexpectedStatus(error, 307)).toBe(true);
      expect((await directory.query()).total).toBe(0);
    });
  });

  it('should spread uploads across storage nodes and index them all', async () => {
    await inCluster(start, ['alpha', 'beta'], async ({ directory }) => {
      const ids = await pushDocuments(directory, [{ body: 'first' }, { body: 'second' }]);

      const results = await directory.query();
      expect(results.total).toBe(2);
      expect(results.hits.map((hit) => hit.id).sort()).toEqual([...ids].sort());
    });
  });

  it('should filter by tag and by metadata', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      const [report] = await pushDocuments(directory, [
        { body: 'quarterly numbers', tags: ['report'], meta: { extension: 'txt' } },
        { body: 'holiday photo', tags: ['photo'], meta: { extension: 'jpg' } },
      ]);

      const byTag = await directory.query({ expression: 'report' });
      expect(byTag.hits.map((hit) => hit.id)).toEqual([report]);

      const byMeta = await directory.query({ expression: 'extension=jpg' });
      expect(byMeta.total).toBe(1);
      expect(byMeta.hits[0]?.meta.tags).toEqual(['photo']);
    });
  });

  it('should page through results', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await pushDocuments(directory, [{ body: 'a' }, { body: 'b' }, { body: 'c' }]);

      const page = await directory.query({ from: 1, size: 1 });
      expect(page.total).toBe(3);
      expect(page.count).toBe(1);
      expect(page.hits).toHaveLength(1);
    });
  });
}
