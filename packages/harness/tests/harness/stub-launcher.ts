/**
 * Stub Launcher
 *
 * A ProcessLauncher that, instead of spawning a binary, reads the node's
 * generated config and serves a minimal stand-in on the configured port:
 * /health on every node, /node/storage on the directory. Storage stand-ins
 * register their name with the directory stand-in when they come up.
 */

import { readFileSync } from 'node:fs';
import type { ProcessLauncher } from '../../src/process/managed-process.js';
import { isRecord } from '../../src/types.js';
import { FakeChild } from './fake-child.js';
import { HEALTHY, StubHttpServer } from './stub-server.js';

interface LaunchedNode {
  label: string;
  port: number;
  storageName?: string;
}

export interface StubClusterBehaviour {
  /** Storage stand-ins register with the directory (default: true) */
  registerStorage: boolean;
  /** Labels whose kill() throws */
  failKill: Set<string>;
  /** Labels that exit with code 1 right after spawning */
  exitOnSpawn: Set<string>;
}

export interface StubCluster {
  launcher: ProcessLauncher;
  /** Storage names known to the directory stand-in */
  registered: string[];
  /** Node labels in the order they received a stop signal */
  stopOrder: string[];
  /** Every spawned child by label (directory, storage-<name>) */
  children: Map<string, FakeChild>;
  /** Binary paths the launcher was asked to run */
  binaries: string[];
  /** Authorization header of every request other than /health */
  authorizations: Array<string | undefined>;
  behaviour: StubClusterBehaviour;
  /** Stop every stand-in server that is still listening */
  closeAll(): Promise<void>;
}

function readLaunchedNode(args: readonly string[]): LaunchedNode {
  const cfgIndex = args.indexOf('--cfg');
  const configPath = args[cfgIndex + 1];
  if (cfgIndex < 0 || configPath === undefined) {
    throw new Error(`no --cfg argument in ${args.join(' ')}`);
  }

  const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
  const server = isRecord(parsed) ? parsed.server : undefined;
  if (!isRecord(parsed) || !isRecord(server) || typeof server.port !== 'number') {
    throw new Error(`unreadable config at ${configPath}`);
  }
  const port = server.port;

  const nodeSection = parsed.node;
  if (isRecord(parsed.directory) && isRecord(nodeSection) && typeof nodeSection.name === 'string') {
    const storageName = nodeSection.name;
    return { label: `storage-${storageName}`, port, storageName };
  }
  return { label: 'directory', port };
}

export function createStubCluster(): StubCluster {
  const servers: StubHttpServer[] = [];

  const cluster: StubCluster = {
    registered: [],
    stopOrder: [],
    children: new Map(),
    binaries: [],
    authorizations: [],
    behaviour: {
      registerStorage: true,
      failKill: new Set(),
      exitOnSpawn: new Set(),
    },

    launcher: (command, args) => {
      const node = readLaunchedNode(args);
      cluster.binaries.push(command);

      const server = new StubHttpServer((req) => {
        if (req.path === '/health') {
          return HEALTHY;
        }
        cluster.authorizations.push(req.headers['authorization']);
        if (node.label === 'directory' && req.method === 'GET' && req.path === '/node/storage') {
          return {
            status: 200,
            body: { storage_nodes: cluster.registered.map((id) => ({ id, port: 0 })) },
          };
        }
        return { status: 404, body: { error: 'Not Found' } };
      }, { port: node.port });
      servers.push(server);

      const child = new FakeChild({
        throwOnKill: cluster.behaviour.failKill.has(node.label),
        onSignal: async () => {
          cluster.stopOrder.push(node.label);
          await server.stop();
        },
      });
      cluster.children.set(node.label, child);

      if (cluster.behaviour.exitOnSpawn.has(node.label)) {
        setImmediate(() => child.exit(1));
        return child;
      }

      void server.start().then(
        () => {
          if (node.storageName && cluster.behaviour.registerStorage) {
            cluster.registered.push(node.storageName);
          }
        },
        () => child.exit(1)
      );

      return child;
    },

    async closeAll() {
      await Promise.all(servers.map((server) => server.stop()));
    },
  };

  return cluster;
}
