/**
 * HTTP Session
 *
 * A persistent (keep-alive) HTTP session bound to one node, carrying a fixed
 * authorization header on every request.
 *
 * Built on node:http rather than fetch for two reasons: the directory's
 * metadata listing is a GET with a JSON body, which fetch refuses to send,
 * and the transfer protocol needs to see 307 responses as-is.
 */

import http, { type IncomingHttpHeaders, type OutgoingHttpHeaders } from 'node:http';
import https from 'node:https';
import { HEADERS, HTTP_STATUS } from '../constants.js';
import { InvalidResponseError, UnexpectedStatusError } from '../errors.js';
import type { Guard } from '../types.js';
import { logger } from '../utils/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpSessionOptions {
  /** Value of the authorization header sent with every request */
  authToken: string;
  /** Extra headers sent with every request */
  headers?: OutgoingHttpHeaders;
}

export interface SendOptions {
  headers?: OutgoingHttpHeaders;
  body?: Buffer | string;
}

export interface RequestOptions {
  headers?: OutgoingHttpHeaders;
  /** Serialized as the JSON request body */
  json?: unknown;
}

/**
 * A fully buffered HTTP response
 */
export interface HttpResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

/**
 * Read a single-valued response header
 */
export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export class HttpSession {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly defaultHeaders: OutgoingHttpHeaders;
  private closed = false;

  constructor(options: HttpSessionOptions) {
    this.defaultHeaders = {
      ...options.headers,
      [HEADERS.AUTHORIZATION]: options.authToken,
    };
  }

  /**
   * Send a request and buffer the response. Redirects are never followed.
   */
  send(method: HttpMethod, url: string, options: SendOptions = {}): Promise<HttpResponse> {
    if (this.closed) {
      return Promise.reject(new Error('HTTP session is closed'));
    }

    const target = new URL(url);
    const isHttps = target.protocol === 'https:';
    const headers: OutgoingHttpHeaders = { ...this.defaultHeaders, ...options.headers };

    if (options.body !== undefined) {
      headers['content-length'] = Buffer.byteLength(options.body);
    }

    const requestOptions: http.RequestOptions = {
      method,
      headers,
      agent: isHttps ? this.httpsAgent : this.httpAgent,
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks),
          });
        });
      };

      const req = isHttps
        ? https.request(target, requestOptions, onResponse)
        : http.request(target, requestOptions, onResponse);

      req.on('error', reject);

      if (options.body !== undefined) {
        req.write(options.body);
      }
      req.end();
    });
  }

  /**
   * Send a JSON request and validate the JSON response.
   *
   * 200 and 307 are accepted; anything else raises UnexpectedStatusError
   * with the response body attached.
   */
  async request<T>(
    method: HttpMethod,
    url: string,
    guard: Guard<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const headers: OutgoingHttpHeaders = { ...options.headers };
    let body: string | undefined;

    if (options.json !== undefined) {
      headers[HEADERS.CONTENT_TYPE] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const response = await this.send(method, url, { headers, body });

    if (response.status !== HTTP_STATUS.OK && response.status !== HTTP_STATUS.TEMPORARY_REDIRECT) {
      const text = response.body.toString('utf8');
      logger.debug(`[HTTP] ${method} ${url} failed`, { status: response.status, body: text });
      throw new UnexpectedStatusError(response.status, text, url);
    }

    return parseJsonBody(response, url, guard);
  }

  /**
   * Release pooled sockets. The session cannot be used afterwards.
   */
  close(): void {
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Parse and validate a buffered JSON response body
 */
export function parseJsonBody<T>(response: HttpResponse, url: string, guard: Guard<T>): T {
  const text = response.body.toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new InvalidResponseError(`response from ${url} is not JSON`, text, url);
  }

  if (!guard(parsed)) {
    throw new InvalidResponseError(`response from ${url} has an unexpected shape`, text, url);
  }

  return parsed;
}
