/**
 * Scenarios against the in-process stand-in cluster
 */

import { describe, expect, it } from 'vitest';
import { HttpSession, isStorageNodeListing, UnexpectedStatusError } from '@clusterkit/harness';
import { inCluster, pushDocuments, standInStarter } from '../helpers.js';
import type { InProcessCluster } from '../stand-ins/in-process-launcher.js';
import { TEST_SECRETS } from '../test-constants.js';
import { deleteScenarios } from './delete.js';
import { directoryNodeScenarios } from './directory-node.js';
import { listMetaScenarios } from './list-meta.js';
import { putScenarios } from './put.js';

describe('stand-in cluster', () => {
  const start = standInStarter();

  describe('directory node', () => directoryNodeScenarios(start));
  describe('put', () => putScenarios(start));
  describe('delete', () => deleteScenarios(start));
  describe('list metadata', () => listMetaScenarios(start));

  describe('lifecycle', () => {
    let standIns: InProcessCluster | undefined;
    const observed = standInStarter((cluster) => {
      standIns = cluster;
    });

    it('should stop every stand-in on teardown', async () => {
      await inCluster(observed, ['alpha', 'beta'], async () => {
        expect(standIns?.processes.map((p) => p.label)).toEqual(['directory', 'storage-alpha', 'storage-beta']);
      });

      expect(standIns?.processes.map((p) => p.signalCode)).toEqual(['SIGINT', 'SIGINT', 'SIGINT']);
      expect(standIns?.directories.every((d) => !d.isRunning)).toBe(true);
      expect(standIns?.storageNodes.every((s) => !s.isRunning)).toBe(true);
    });

    it('should only accept the admin password as authorization', async () => {
      await inCluster(observed, ['alpha'], async ({ directory }) => {
        const url = `${directory.url}/node/storage`;
        const admin = new HttpSession({ authToken: TEST_SECRETS.adminPassword });
        const intruder = new HttpSession({ authToken: 'test-token' });
        try {
          const listing = await admin.request('GET', url, isStorageNodeListing);
          expect(listing.storage_nodes).toHaveLength(1);

          const error = await intruder.request('GET', url, isStorageNodeListing).catch((e: unknown) => e);
          expect(error).toBeInstanceOf(UnexpectedStatusError);
          expect(error).toMatchObject({ status: 401 });
        } finally {
          admin.close();
          intruder.close();
        }
      });
    });

    it('should keep blob bytes on the storage node the directory chose', async () => {
      await inCluster(observed, ['alpha', 'beta'], async ({ directory }) => {
        const [first, second] = await pushDocuments(directory, [{ body: 'first' }, { body: 'second' }]);

        const [alpha, beta] = standIns?.storageNodes ?? [];
        expect(alpha?.hasBlob(first ?? '')).toBe(true);
        expect(beta?.hasBlob(second ?? '')).toBe(true);
        expect(standIns?.directories[0]?.blobCount).toBe(2);
      });
    });
  });
});
