import { resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ClusterFixture, withCluster, type ClusterOptions } from '../../src/cluster/cluster-fixture.js';
import { ProcessExitedError, RegistrationTimeoutError } from '../../src/errors.js';
import { createStubCluster, type StubCluster } from '../harness/stub-launcher.js';
import { TEST_SECRETS, testConfig } from '../harness/test-config.js';

describe('ClusterFixture', () => {
  let stub: StubCluster;

  function options(overrides: Partial<ClusterOptions> = {}): ClusterOptions {
    return {
      secrets: TEST_SECRETS,
      config: testConfig(),
      launcher: stub.launcher,
      ...overrides,
    };
  }

  beforeEach(() => {
    stub = createStubCluster();
  });

  afterEach(async () => {
    await stub.closeAll();
  });

  it('should start the directory and then each storage node', async () => {
    const cluster = await ClusterFixture.start(options({ storageNodes: ['alpha', 'beta'] }));

    expect(stub.binaries).toEqual([
      resolve('/opt/clusterkit/bin', 'directoryd'),
      resolve('/opt/clusterkit/bin', 'storaged'),
      resolve('/opt/clusterkit/bin', 'storaged'),
    ]);
    expect(cluster.storageNodes.map((node) => node.name)).toEqual(['alpha', 'beta']);
    expect(cluster.directory.state).toBe('healthy');

    const listing = await cluster.directory.listStorageNodes();
    expect(listing.storage_nodes.map((node) => node.id)).toEqual(['alpha', 'beta']);

    await cluster.stop();
  });

  it('should authenticate with the admin password', async () => {
    const cluster = await ClusterFixture.start(options({ storageNodes: ['alpha'] }));
    await cluster.directory.query().catch(() => undefined);

    expect(stub.authorizations.length).toBeGreaterThan(0);
    expect(new Set(stub.authorizations)).toEqual(new Set(['test-password']));

    await cluster.stop();
  });

  it('should point storage nodes at the directory', async () => {
    const cluster = await ClusterFixture.start(options({ storageNodes: ['alpha'] }));
    const [alpha] = cluster.storageNodes;

    expect(alpha?.nodeConfig.directory).toEqual({ url: 'http://127.0.0.1', port: cluster.directory.port });

    await cluster.stop();
  });

  it('should stop storage nodes newest first, then the directory', async () => {
    const cluster = await ClusterFixture.start(options({ storageNodes: ['alpha', 'beta'] }));

    const failures = await cluster.stop();

    expect(failures).toEqual([]);
    expect(stub.stopOrder).toEqual(['storage-beta', 'storage-alpha', 'directory']);
    expect(cluster.storageNodes).toHaveLength(0);
    expect(cluster.directory.state).toBe('stopped');
  });

  it('should keep tearing down after a node fails to stop', async () => {
    stub.behaviour.failKill.add('storage-alpha');
    const cluster = await ClusterFixture.start(options({ storageNodes: ['alpha', 'beta'] }));

    const failures = await cluster.stop();

    expect(failures.map((failure) => failure.node)).toEqual(['storage-alpha']);
    expect(failures[0]?.error).toBeInstanceOf(Error);
    expect(stub.stopOrder).toEqual(['storage-beta', 'directory']);
  });

  it('should tear everything down when a storage node never registers', async () => {
    stub.behaviour.registerStorage = false;

    const error = await ClusterFixture.start(options({ storageNodes: ['alpha'] })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistrationTimeoutError);
    expect(error).toMatchObject({ nodeName: 'alpha', timeoutMs: 500 });
    expect(stub.stopOrder).toEqual(['storage-alpha', 'directory']);
  });

  it('should honour an explicit registration timeout', async () => {
    stub.behaviour.registerStorage = false;

    await expect(
      ClusterFixture.start(options({ storageNodes: ['alpha'], registrationTimeout: 150 }))
    ).rejects.toMatchObject({ code: 'CLUSTER_001', timeoutMs: 150 });
  });

  it('should skip the registration wait when disabled', async () => {
    stub.behaviour.registerStorage = false;

    const cluster = await ClusterFixture.start(
      options({ storageNodes: ['alpha'], waitForRegistration: false })
    );

    expect(cluster.storageNodes).toHaveLength(1);
    await cluster.stop();
  });

  it('should stop the directory when a storage node dies during startup', async () => {
    stub.behaviour.exitOnSpawn.add('storage-alpha');

    const error = await ClusterFixture.start(options({ storageNodes: ['alpha'] })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessExitedError);
    expect(stub.stopOrder).toEqual(['directory']);
    expect(stub.children.get('storage-alpha')?.signals).toEqual([]);
  });

  it('should not launch storage nodes when the directory fails', async () => {
    stub.behaviour.exitOnSpawn.add('directory');

    await expect(ClusterFixture.start(options({ storageNodes: ['alpha'] }))).rejects.toBeInstanceOf(
      ProcessExitedError
    );
    expect(stub.binaries).toHaveLength(1);
  });

  it('should add a storage node to a running cluster', async () => {
    const cluster = await ClusterFixture.start(options());

    const gamma = await cluster.addStorageNode('gamma');

    expect(gamma.state).toBe('healthy');
    expect(stub.registered).toEqual(['gamma']);
    await cluster.stop();
  });

  describe('withCluster', () => {
    it('should return the callback result and tear down', async () => {
      const url = await withCluster(options({ storageNodes: ['alpha'] }), async (cluster) => cluster.directory.url);

      expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
      expect(stub.stopOrder).toEqual(['storage-alpha', 'directory']);
    });

    it('should tear down when the callback throws', async () => {
      await expect(
        withCluster(options(), async () => {
          throw new Error('scenario failed');
        })
      ).rejects.toThrow('scenario failed');

      expect(stub.stopOrder).toEqual(['directory']);
    });
  });
});
