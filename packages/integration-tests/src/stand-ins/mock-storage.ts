/**
 * Mock Storage Server
 *
 * In-process stand-in for a storage node. Blob bytes live in files under the
 * node's blob directory. On start it registers with the directory; every
 * upload and deletion is reported back to the directory so its index stays
 * in step.
 */

import { EventEmitter } from 'node:events';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { join } from 'node:path';
import { logger, type WireBlobMeta } from '@clusterkit/harness';
import { decodeBlobMeta, readBody, sendJson, verifyBlobSignature } from './http-utils.js';
import { REGISTRATION_HEADER } from './mock-directory.js';

export interface MockStorageOptions {
  /** Port to listen on (0 for dynamic allocation) */
  port?: number;
  host?: string;
  /** Node name, its identity in the directory */
  name: string;
  /** Base URL of the directory, including port */
  directoryUrl: string;
  /** Value clients must send in the authorization header (the admin password) */
  authToken: string;
  registrationSecret: string;
  /** Key the directory signs blob URLs with */
  encryptionKey: string;
  blobDir: string;
}

const BLOB_ROUTE = /^\/blob\/([^/]+)$/;

export class MockStorageServer extends EventEmitter {
  private httpServer: HttpServer | null = null;
  private readonly blobs = new Map<string, WireBlobMeta>();
  private _port = 0;
  private readonly host: string;

  constructor(private readonly options: MockStorageOptions) {
    super();
    this.host = options.host ?? '127.0.0.1';
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Listen, then register with the directory
   */
  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error('Mock storage server is already running');
    }

    await mkdir(this.options.blobDir, { recursive: true });

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

    await this.register();
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

  hasBlob(blobId: string): boolean {
    return this.blobs.has(blobId);
  }

  private async register(): Promise<void> {
    logger.debug(`[Storage] ${this.name} registering with ${this.options.directoryUrl}`);
    await this.callDirectory('PUT', '/node/storage', {
      id: this.name,
      url: this.getUrl(),
      port: this._port,
    });
  }

  private async callDirectory(method: 'PUT' | 'DELETE', path: string, body?: unknown): Promise<void> {
    const response = await fetch(`${this.options.directoryUrl}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        [REGISTRATION_HEADER]: this.options.registrationSecret,
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${method} ${path} failed: ${response.status} - ${error}`);
    }
  }

  private blobPath(blobId: string): string {
    return join(this.options.blobDir, encodeURIComponent(blobId));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', this.getUrl());
    const method = req.method?.toUpperCase();
    const body = await readBody(req);

    if (method === 'GET' && url.pathname === '/health') {
      sendJson(res, 200, { message: 'healthy' });
      return;
    }

    const match = BLOB_ROUTE.exec(url.pathname);
    if (!match?.[1]) {
      sendJson(res, 404, { error: 'Not Found' });
      return;
    }
    const blobId = decodeURIComponent(match[1]);

    const signature = url.searchParams.get('signature');
    const authorized =
      req.headers['authorization'] === this.options.authToken ||
      (method === 'GET' && signature !== null && verifyBlobSignature(blobId, signature, this.options.encryptionKey));
    if (!authorized) {
      sendJson(res, 401, { error: 'unauthorized' });
      return;
    }

    if (method === 'POST') {
      await this.handleUpload(blobId, req, body, res);
    } else if (method === 'GET') {
      await this.handleDownload(blobId, res);
    } else if (method === 'DELETE') {
      await this.handleDelete(blobId, res);
    } else {
      sendJson(res, 404, { error: 'Not Found' });
    }
  }

  private async handleUpload(blobId: string, req: IncomingMessage, body: Buffer, res: ServerResponse): Promise<void> {
    const meta = decodeBlobMeta(req.headers['x-blob-meta']);
    const contentType = req.headers['content-type'];
    if (!meta || contentType === undefined) {
      sendJson(res, 400, { error: 'missing blob metadata or content type' });
      return;
    }

    const form = await new Response(body, { headers: { 'content-type': contentType } }).formData();
    const file = form.get('src');
    if (file === null || typeof file === 'string') {
      sendJson(res, 400, { error: 'missing src field' });
      return;
    }

    await writeFile(this.blobPath(blobId), Buffer.from(await file.arrayBuffer()));
    try {
      await this.callDirectory('PUT', `/blob/${encodeURIComponent(blobId)}/metadata`, {
        meta,
        storage_id: this.name,
      });
    } catch (error) {
      // An uncommitted blob is not stored
      await rm(this.blobPath(blobId), { force: true });
      throw error;
    }
    this.blobs.set(blobId, meta);

    sendJson(res, 200, { id: blobId });
    this.emit('blob-stored', blobId);
  }

  private async handleDownload(blobId: string, res: ServerResponse): Promise<void> {
    if (!this.blobs.has(blobId)) {
      sendJson(res, 404, { error: `blob ${blobId} not found` });
      return;
    }

    const bytes = await readFile(this.blobPath(blobId));
    res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
    res.end(bytes);
  }

  private async handleDelete(blobId: string, res: ServerResponse): Promise<void> {
    if (!this.blobs.delete(blobId)) {
      sendJson(res, 404, { error: `blob ${blobId} not found` });
      return;
    }

    await rm(this.blobPath(blobId), { force: true });
    await this.callDirectory('DELETE', `/blob/${encodeURIComponent(blobId)}/metadata`);

    sendJson(res, 200, { id: blobId });
    this.emit('blob-deleted', blobId);
  }
}
