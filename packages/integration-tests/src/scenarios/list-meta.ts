import { expect, it } from 'vitest';
import { inCluster, pushDocuments, type ClusterStarter, type Document } from '../helpers.js';

const EXTENSIONS = ['txt', 'txt', 'txt', 'jpg', 'jpg', 'png'];

const DOCUMENTS: Document[] = EXTENSIONS.map((extension, i) => ({
  body: `document ${i}`,
  tags: i % 2 === 0 ? ['even'] : ['odd'],
  meta: { extension, key: 'yeet' },
}));

export function listMetaScenarios(start: ClusterStarter): void {
  it('should count every metadata value across the index', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await pushDocuments(directory, DOCUMENTS);

      const listing = await directory.listMetadata();

      expect(listing.meta['extension']).toEqual({ txt: 3, jpg: 2, png: 1 });
      expect(listing.meta['key']).toEqual({ yeet: 6 });
      expect(listing.tags).toEqual({ even: 3, odd: 3 });
    });
  });

  it('should restrict the listing to the requested keys and tags', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await pushDocuments(directory, DOCUMENTS);

      const listing = await directory.listMetadata({ tags: ['odd'], metaKeys: ['extension'] });

      expect(listing.tags).toEqual({ odd: 3 });
      expect(Object.keys(listing.meta)).toEqual(['extension']);
    });
  });

  it('should return facets for a query when asked', async () => {
    await inCluster(start, ['alpha'], async ({ directory }) => {
      await pushDocuments(directory, DOCUMENTS);

      const results = await directory.query({ expression: 'even', facets: true });

      expect(results.total).toBe(3);
      expect(results.facets?.tags).toEqual({ even: 3 });
      expect(results.facets?.meta['extension']).toEqual({ txt: 2, jpg: 1 });
    });
  });
}
