import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TooManyRedirectsError, UnexpectedStatusError } from '../../src/errors.js';
import { HttpSession } from '../../src/transport/http-session.js';
import { deleteBlob, encodeBlobMeta, encodeMultipart, pushBlob } from '../../src/transport/transfer.js';
import type { BlobDescriptor } from '../../src/types.js';
import { createStubServer, type RecordedRequest, type StubHttpServer } from '../harness/stub-server.js';

const DESCRIPTOR: BlobDescriptor = {
  tags: ['report'],
  metadata: { extension: 'txt' },
  parents: [],
  size: 11,
  name: 'hello.txt',
  blobType: 'File',
};

function decodeMeta(req: RecordedRequest | undefined): unknown {
  const header = req?.headers['x-blob-meta'];
  return typeof header === 'string' ? JSON.parse(Buffer.from(header, 'base64').toString('utf8')) : undefined;
}

async function readUpload(req: RecordedRequest | undefined): Promise<{ name: string; text: string } | null> {
  const contentType = req?.headers['content-type'];
  if (!req || typeof contentType !== 'string') {
    return null;
  }
  const form = await new Response(req.body, { headers: { 'content-type': contentType } }).formData();
  const file = form.get('src');
  if (file === null || typeof file === 'string') {
    return null;
  }
  return { name: file.name, text: await file.text() };
}

describe('encodeBlobMeta', () => {
  it('should encode the wire form of the descriptor as base64 JSON', () => {
    const decoded: unknown = JSON.parse(Buffer.from(encodeBlobMeta(DESCRIPTOR), 'base64').toString('utf8'));

    expect(decoded).toEqual({
      tags: ['report'],
      metadata: { extension: 'txt' },
      parents: [],
      size: 11,
      name: 'hello.txt',
      blob_type: 'File',
    });
  });
});

describe('transfer', () => {
  let workDir: string;
  let filePath: string;
  let directory: StubHttpServer;
  let storage: StubHttpServer;
  let session: HttpSession;

  beforeEach(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'transfer-test-'));
    filePath = join(workDir, 'hello.txt');
    writeFileSync(filePath, 'hello world');

    storage = await createStubServer(() => ({ status: 200, body: { id: 'blob-1' } }));
    directory = await createStubServer(() => ({
      status: 307,
      headers: { location: `${storage.getUrl()}/blob/blob-1` },
    }));
    session = new HttpSession({ authToken: 'test-token' });
  });

  afterEach(async () => {
    session.close();
    await directory.stop();
    await storage.stop();
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('encodeMultipart', () => {
    it('should produce a single src field holding the file bytes', async () => {
      const { contentType, body } = await encodeMultipart(filePath);

      expect(contentType).toMatch(/^multipart\/form-data; boundary=/);
      const upload = await readUpload({ method: 'POST', path: '/', headers: { 'content-type': contentType }, body });
      expect(upload?.text).toBe('hello world');
      expect(upload?.name.endsWith('hello.txt')).toBe(true);
    });
  });

  describe('pushBlob', () => {
    it('should replay the upload at the redirect target', async () => {
      const result = await pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR);

      expect(result).toEqual({ id: 'blob-1' });
      expect(directory.requests.map((r) => `${r.method} ${r.path}`)).toEqual(['POST /blob']);
      expect(storage.requests.map((r) => `${r.method} ${r.path}`)).toEqual(['POST /blob/blob-1']);
    });

    it('should carry the same metadata header and file on every hop', async () => {
      await pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR);

      expect(decodeMeta(storage.requests[0])).toEqual(decodeMeta(directory.requests[0]));
      expect(decodeMeta(storage.requests[0])).toMatchObject({ name: 'hello.txt', blob_type: 'File' });
      expect((await readUpload(directory.requests[0]))?.text).toBe('hello world');
      expect((await readUpload(storage.requests[0]))?.text).toBe('hello world');
    });

    it('should resolve a relative location against the current URL', async () => {
      directory.setHandler((req) =>
        req.path === '/blob'
          ? { status: 307, headers: { location: '/stored/blob-2' } }
          : { status: 200, body: { id: 'blob-2' } }
      );

      const result = await pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR);

      expect(result).toEqual({ id: 'blob-2' });
      expect(directory.requests.map((r) => r.path)).toEqual(['/blob', '/stored/blob-2']);
    });

    it('should report the redirect when following is disabled', async () => {
      const error = await pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR, {
        followRedirects: false,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnexpectedStatusError);
      expect(error).toMatchObject({ status: 307 });
      expect(storage.requests).toHaveLength(0);
    });

    it('should fail on a redirect without a location', async () => {
      directory.setHandler(() => ({ status: 307 }));

      await expect(pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR)).rejects.toMatchObject({
        code: 'HTTP_001',
        status: 307,
      });
    });

    it('should give up after the configured number of hops', async () => {
      directory.setHandler(() => ({ status: 307, headers: { location: '/blob' } }));

      const error = await pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR, {
        maxRedirects: 2,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TooManyRedirectsError);
      expect(error).toMatchObject({ hops: 2 });
      expect(directory.requests).toHaveLength(3);
    });

    it('should surface a failing final status with its body', async () => {
      storage.setHandler(() => ({ status: 500, body: 'disk full' }));

      await expect(pushBlob(session, directory.getUrl(), filePath, DESCRIPTOR)).rejects.toMatchObject({
        status: 500,
        body: 'disk full',
        url: `${storage.getUrl()}/blob/blob-1`,
      });
    });
  });

  describe('deleteBlob', () => {
    it('should follow the redirect with a DELETE and an escaped id', async () => {
      directory.setHandler(() => ({ status: 307, headers: { location: `${storage.getUrl()}/blob/a%2Fb` } }));
      storage.setHandler(() => ({ status: 200, body: { id: 'a/b' } }));

      const result = await deleteBlob(session, directory.getUrl(), 'a/b');

      expect(result).toEqual({ id: 'a/b' });
      expect(directory.requests.map((r) => `${r.method} ${r.path}`)).toEqual(['DELETE /blob/a%2Fb']);
      expect(storage.requests.map((r) => `${r.method} ${r.path}`)).toEqual(['DELETE /blob/a%2Fb']);
    });

    it('should reject a non-200 answer from the storage node', async () => {
      storage.setHandler(() => ({ status: 404, body: 'blob not found' }));

      await expect(deleteBlob(session, directory.getUrl(), 'missing')).rejects.toBeInstanceOf(
        UnexpectedStatusError
      );
    });
  });
});
