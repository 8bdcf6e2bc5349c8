/**
 * Redirect-Following Transfer
 *
 * The directory does not hold blob bytes. An upload or deletion sent to it is
 * answered with a 307 pointing at the storage node that owns the blob, and
 * the client has to replay the request there. Redirects are followed here,
 * one hop per loop iteration, rather than by the HTTP client:
 * - the multipart body is rebuilt from disk for every hop
 * - the x-blob-meta header and the method are carried over unchanged
 * - the number of hops is capped
 */

import { readFile } from 'node:fs/promises';
import type { OutgoingHttpHeaders } from 'node:http';
import { ENDPOINTS, HEADERS, HTTP_STATUS, TRANSFER } from '../constants.js';
import { TooManyRedirectsError, UnexpectedStatusError } from '../errors.js';
import {
  isDeleteResponse,
  isPushResponse,
  toWireMeta,
  type BlobDescriptor,
  type DeleteResponse,
  type PushResponse,
} from '../types.js';
import { logger } from '../utils/logger.js';
import { headerValue, parseJsonBody, type HttpMethod, type HttpResponse, type HttpSession } from './http-session.js';

export interface TransferOptions {
  /**
   * Follow 307 redirects to the storage node (default: true). When false a
   * redirect is reported as UnexpectedStatusError(307).
   */
  followRedirects?: boolean;
  /** Maximum number of redirect hops (default: TRANSFER.MAX_REDIRECTS) */
  maxRedirects?: number;
}

/**
 * State of one push/delete call. Lives only for the duration of the call.
 */
interface TransferSession {
  url: string;
  status: number;
  hops: number;
}

interface EncodedBody {
  headers: OutgoingHttpHeaders;
  body?: Buffer;
}

/**
 * Encode a descriptor for the x-blob-meta header: base64 of its JSON form
 */
export function encodeBlobMeta(descriptor: BlobDescriptor): string {
  return Buffer.from(JSON.stringify(toWireMeta(descriptor)), 'utf8').toString('base64');
}

/**
 * Build a single-field multipart body carrying the file at `filePath`.
 * Encoded bodies are single-use, so this runs once per hop.
 */
export async function encodeMultipart(filePath: string): Promise<{ contentType: string; body: Buffer }> {
  const bytes = await readFile(filePath);
  const form = new FormData();
  form.append(TRANSFER.FILE_FIELD, new Blob([bytes], { type: TRANSFER.FILE_CONTENT_TYPE }), filePath);

  const encoded = new Response(form);
  const contentType = encoded.headers.get(HEADERS.CONTENT_TYPE);
  if (!contentType) {
    throw new Error('multipart encoder produced no content type');
  }

  return { contentType, body: Buffer.from(await encoded.arrayBuffer()) };
}

/**
 * Send `method` to `initialUrl`, re-issuing it against each redirect target
 * until a non-307 status arrives. `encode` is called before every hop.
 */
async function sendFollowingRedirects(
  session: HttpSession,
  method: HttpMethod,
  initialUrl: string,
  encode: () => Promise<EncodedBody>,
  options: TransferOptions
): Promise<{ response: HttpResponse; url: string }> {
  const followRedirects = options.followRedirects ?? true;
  const maxRedirects = options.maxRedirects ?? TRANSFER.MAX_REDIRECTS;
  const state: TransferSession = {
    url: initialUrl,
    status: HTTP_STATUS.TEMPORARY_REDIRECT,
    hops: 0,
  };

  for (;;) {
    const { headers, body } = await encode();
    const response = await session.send(method, state.url, { headers, body });
    state.status = response.status;
    logger.transferHop(method, state.url, state.status, state.hops);

    if (state.status !== HTTP_STATUS.TEMPORARY_REDIRECT) {
      return { response, url: state.url };
    }

    const location = headerValue(response.headers, HEADERS.LOCATION);
    if (!followRedirects || !location) {
      throw new UnexpectedStatusError(state.status, response.body.toString('utf8'), state.url);
    }

    if (state.hops >= maxRedirects) {
      throw new TooManyRedirectsError(state.hops, state.url);
    }

    state.url = new URL(location, state.url).toString();
    state.hops++;
  }
}

function expectOk(response: HttpResponse, url: string): void {
  if (response.status !== HTTP_STATUS.OK) {
    const text = response.body.toString('utf8');
    logger.warn(`[Transfer] ${url} answered ${response.status}`, { body: text });
    throw new UnexpectedStatusError(response.status, text, url);
  }
}

/**
 * Upload a file through the directory at `directoryUrl`
 */
export async function pushBlob(
  session: HttpSession,
  directoryUrl: string,
  filePath: string,
  descriptor: BlobDescriptor,
  options: TransferOptions = {}
): Promise<PushResponse> {
  const blobMeta = encodeBlobMeta(descriptor);

  const { response, url } = await sendFollowingRedirects(
    session,
    'POST',
    `${directoryUrl}${ENDPOINTS.BLOB}`,
    async () => {
      const { contentType, body } = await encodeMultipart(filePath);
      return {
        headers: {
          [HEADERS.BLOB_META]: blobMeta,
          [HEADERS.CONTENT_TYPE]: contentType,
        },
        body,
      };
    },
    options
  );

  expectOk(response, url);
  return parseJsonBody(response, url, isPushResponse);
}

/**
 * Delete a blob through the directory at `directoryUrl`
 */
export async function deleteBlob(
  session: HttpSession,
  directoryUrl: string,
  blobId: string,
  options: TransferOptions = {}
): Promise<DeleteResponse> {
  const { response, url } = await sendFollowingRedirects(
    session,
    'DELETE',
    `${directoryUrl}${ENDPOINTS.BLOB}/${encodeURIComponent(blobId)}`,
    async () => ({ headers: {} }),
    options
  );

  expectOk(response, url);
  return parseJsonBody(response, url, isDeleteResponse);
}
