/**
 * Small helpers shared by the stand-in servers
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { createHmac, timingSafeEqual } from 'node:crypto';
import { isRecord, type WireBlobMeta } from '@clusterkit/harness';

export function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function parseJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    return undefined;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

export function isWireBlobMeta(value: unknown): value is WireBlobMeta {
  return (
    isRecord(value) &&
    isStringArray(value['tags']) &&
    isStringMap(value['metadata']) &&
    isStringArray(value['parents']) &&
    typeof value['size'] === 'number' &&
    typeof value['name'] === 'string' &&
    typeof value['blob_type'] === 'string'
  );
}

/**
 * Decode an x-blob-meta header. Returns undefined when it is missing or
 * malformed.
 */
export function decodeBlobMeta(header: string | string[] | undefined): WireBlobMeta | undefined {
  if (typeof header !== 'string') {
    return undefined;
  }
  const parsed = parseJson(Buffer.from(header, 'base64'));
  return isWireBlobMeta(parsed) ? parsed : undefined;
}

export function signBlobId(blobId: string, key: string): string {
  return createHmac('sha256', key).update(blobId).digest('hex');
}

export function verifyBlobSignature(blobId: string, signature: string, key: string): boolean {
  const expected = Buffer.from(signBlobId(blobId, key), 'utf8');
  const actual = Buffer.from(signature, 'utf8');
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
