/**
 * Mock Directory Server
 *
 * In-process stand-in for the directory node. Keeps the storage node
 * registry and the blob index in memory and hands uploads and deletions off
 * to storage nodes with 307 redirects.
 *
 * Storage stand-ins talk to it on internal routes authenticated with the
 * cluster's registration secret:
 * - PUT /node/storage               register a storage node
 * - PUT /blob/{id}/metadata         commit an uploaded blob to the index
 * - DELETE /blob/{id}/metadata      drop a deleted blob from the index
 */

import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { isRecord, type Hit, type QueryResponse } from '@clusterkit/harness';
import { BlobIndex } from './blob-index.js';
import { decodeBlobMeta, isWireBlobMeta, parseJson, readBody, sendJson, signBlobId } from './http-utils.js';

export const REGISTRATION_HEADER = 'x-registration-token';

export interface RegisteredStorageNode {
  id: string;
  /** Base URL blobs are redirected to */
  url: string;
  port: number;
  registeredAt: number;
}

export interface MockDirectoryOptions {
  /** Port to listen on (0 for dynamic allocation) */
  port?: number;
  host?: string;
  /** Value clients must send in the authorization header (the admin password) */
  authToken: string;
  registrationSecret: string;
  /** Key used to sign blob URLs in query results */
  encryptionKey: string;
}

const BLOB_ROUTE = /^\/blob\/([^/]+)(\/metadata)?$/;

export class MockDirectoryServer extends EventEmitter {
  private httpServer: HttpServer | null = null;
  private readonly storageNodes = new Map<string, RegisteredStorageNode>();
  private readonly index = new BlobIndex();
  private nextNode = 0;
  private _port = 0;
  private readonly host: string;

  constructor(private readonly options: MockDirectoryOptions) {
    super();
    this.host = options.host ?? '127.0.0.1';
  }

  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error('Mock directory server is already running');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        sendJson(res, 500, { error: String(error) });
      });
    });
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      server.on('error', reject);
      server.listen(this.options.port ?? 0, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === 'object') {
          this._port = addr.port;
        }
        resolve();
      });
    });

    this.emit('started', { port: this._port });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.emit('stopped');
  }

  getUrl(): string {
    return `http://${this.host}:${this._port}`;
  }

  get port(): number {
    return this._port;
  }

  get isRunning(): boolean {
    return this.httpServer !== null;
  }

  getStorageNodes(): RegisteredStorageNode[] {
    return Array.from(this.storageNodes.values());
  }

  get blobCount(): number {
    return this.index.size;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', this.getUrl());
    const method = req.method?.toUpperCase();
    const body = await readBody(req);

    if (method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, { message: 'healthy' });
      return;
    }

    const blobRoute = BLOB_ROUTE.exec(url.pathname);
    const blobId = blobRoute?.[1] === undefined ? undefined : decodeURIComponent(blobRoute[1]);
    const isMetadataRoute = blobRoute?.[2] !== undefined;

    // Internal routes used by storage nodes
    if ((method === 'PUT' && url.pathname === '/node/storage') || isMetadataRoute) {
      if (req.headers[REGISTRATION_HEADER] !== this.options.registrationSecret) {
        sendJson(res, 401, { error: 'invalid registration secret' });
        return;
      }
      if (method === 'PUT' && url.pathname === '/node/storage') {
        this.handleRegister(body, res);
      } else if (method === 'PUT' && blobId !== undefined) {
        this.handleCommit(blobId, body, res);
      } else if (method === 'DELETE' && blobId !== undefined) {
        this.handleUncommit(blobId, res);
      } else {
        sendJson(res, 404, { error: 'Not Found' });
      }
      return;
    }

    if (req.headers['authorization'] !== this.options.authToken) {
      sendJson(res, 401, { error: 'unauthorized' });
      return;
    }

    if (method === 'GET' && url.pathname === '/node/storage') {
      this.handleListStorage(res);
    } else if (method === 'POST' && url.pathname === '/blob') {
      this.handlePush(req, res);
    } else if (method === 'DELETE' && blobId !== undefined) {
      this.handleDelete(blobId, res);
    } else if (method === 'POST' && url.pathname === '/query') {
      this.handleQuery(body, res);
    } else if (method === 'GET' && url.pathname === '/metadata') {
      this.handleListMetadata(body, res);
    } else {
      sendJson(res, 404, { error: 'Not Found' });
    }
  }

  private handleRegister(body: Buffer, res: ServerResponse): void {
    const data = parseJson(body);
    if (!isRecord(data) || typeof data['id'] !== 'string' || typeof data['url'] !== 'string' || typeof data['port'] !== 'number') {
      sendJson(res, 400, { error: 'Missing required fields' });
      return;
    }

    const node: RegisteredStorageNode = {
      id: data['id'],
      url: data['url'],
      port: data['port'],
      registeredAt: Date.now(),
    };
    this.storageNodes.set(node.id, node);

    sendJson(res, 200, { message: 'registered' });
    this.emit('storage-registered', node);
  }

  private handleListStorage(res: ServerResponse): void {
    sendJson(res, 200, {
      storage_nodes: this.getStorageNodes().map((node) => ({ id: node.id, port: node.port, url: node.url })),
    });
  }

  private handlePush(req: IncomingMessage, res: ServerResponse): void {
    if (decodeBlobMeta(req.headers['x-blob-meta']) === undefined) {
      sendJson(res, 400, { error: 'missing or malformed x-blob-meta header' });
      return;
    }

    const nodes = this.getStorageNodes();
    const target = nodes[this.nextNode++ % Math.max(nodes.length, 1)];
    if (!target) {
      sendJson(res, 500, { error: 'no storage node available' });
      return;
    }

    const blobId = randomUUID();
    res.writeHead(307, { Location: `${target.url}/blob/${encodeURIComponent(blobId)}` });
    res.end();
  }

  private handleCommit(blobId: string, body: Buffer, res: ServerResponse): void {
    const data = parseJson(body);
    if (!isRecord(data) || !isWireBlobMeta(data['meta']) || typeof data['storage_id'] !== 'string') {
      sendJson(res, 400, { error: 'Invalid request body' });
      return;
    }

    this.index.put({ id: blobId, meta: data['meta'], storageId: data['storage_id'] });
    sendJson(res, 200, { id: blobId });
    this.emit('blob-committed', blobId);
  }

  private handleUncommit(blobId: string, res: ServerResponse): void {
    const existed = this.index.remove(blobId);
    sendJson(res, 200, { id: blobId, removed: existed });
  }

  private handleDelete(blobId: string, res: ServerResponse): void {
    const blob = this.index.get(blobId);
    const node = blob ? this.storageNodes.get(blob.storageId) : undefined;
    if (!node) {
      sendJson(res, 404, { error: `blob ${blobId} not found` });
      return;
    }

    res.writeHead(307, { Location: `${node.url}/blob/${encodeURIComponent(blobId)}` });
    res.end();
  }

  private handleQuery(body: Buffer, res: ServerResponse): void {
    const data = parseJson(body);
    if (!isRecord(data)) {
      sendJson(res, 400, { error: 'Invalid request body' });
      return;
    }

    const expression = typeof data['expression'] === 'string' ? data['expression'] : null;
    const from = typeof data['from'] === 'number' ? data['from'] : 0;
    const size = typeof data['size'] === 'number' ? data['size'] : 30;
    const signUrls = data['sign_urls'] !== false;

    const matched = this.index.match(expression);
    const hits: Hit[] = matched.slice(from, from + size).map((blob) => ({
      id: blob.id,
      meta: blob.meta,
      url: this.blobUrl(blob.id, blob.storageId, signUrls),
    }));

    const response: QueryResponse = {
      count: hits.length,
      total: matched.length,
      hits,
      facets: data['facets'] === true ? BlobIndex.facets(matched) : null,
    };
    sendJson(res, 200, response);
  }

  private handleListMetadata(body: Buffer, res: ServerResponse): void {
    const data = parseJson(body);
    const filter = isRecord(data) ? data : {};
    const tags = Array.isArray(filter['tags']) ? filter['tags'].filter((t): t is string => typeof t === 'string') : null;
    const metaKeys = Array.isArray(filter['meta_keys'])
      ? filter['meta_keys'].filter((k): k is string => typeof k === 'string')
      : null;

    sendJson(res, 200, BlobIndex.facets(this.index.match(null), tags, metaKeys));
  }

  private blobUrl(blobId: string, storageId: string, sign: boolean): string {
    const node = this.storageNodes.get(storageId);
    const base = `${node?.url ?? ''}/blob/${encodeURIComponent(blobId)}`;
    return sign ? `${base}?signature=${signBlobId(blobId, this.options.encryptionKey)}` : base;
  }
}

/**
 * Create and start a mock directory server
 */
export async function createMockDirectory(options: MockDirectoryOptions): Promise<MockDirectoryServer> {
  const server = new MockDirectoryServer(options);
  await server.start();
  return server;
}
