import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidResponseError, UnexpectedStatusError } from '../../src/errors.js';
import { HttpSession, headerValue } from '../../src/transport/http-session.js';
import { isPushResponse, isRecord } from '../../src/types.js';
import { createStubServer, type StubHandler, type StubHttpServer } from '../harness/stub-server.js';

describe('HttpSession', () => {
  let server: StubHttpServer;
  let session: HttpSession;
  let reply: StubHandler;

  beforeEach(async () => {
    reply = () => ({ status: 200, body: { id: 'blob-1' } });
    server = await createStubServer((req) => reply(req));
    session = new HttpSession({ authToken: 'test-token' });
  });

  afterEach(async () => {
    session.close();
    await server.stop();
  });

  it('should send the authorization header with every request', async () => {
    await session.send('GET', `${server.getUrl()}/health`);
    await session.send('DELETE', `${server.getUrl()}/blob/x`);

    expect(server.requests.map((r) => r.headers['authorization'])).toEqual(['test-token', 'test-token']);
  });

  it('should send a JSON body on a GET request', async () => {
    await session.request('GET', `${server.getUrl()}/metadata`, isRecord, {
      json: { tags: null, meta_keys: ['extension'] },
    });

    const [req] = server.requests;
    expect(req?.method).toBe('GET');
    expect(req?.headers['content-type']).toBe('application/json');
    expect(req?.body.toString('utf8')).toBe('{"tags":null,"meta_keys":["extension"]}');
  });

  it('should parse and validate a 200 response', async () => {
    const result = await session.request('POST', `${server.getUrl()}/query`, isPushResponse);
    expect(result).toEqual({ id: 'blob-1' });
  });

  it('should pass a 307 response through to the caller', async () => {
    reply = () => ({ status: 307, headers: { location: 'http://127.0.0.1:1/blob' }, body: { id: 'moved' } });

    const result = await session.request('POST', `${server.getUrl()}/blob`, isPushResponse);
    expect(result).toEqual({ id: 'moved' });
  });

  it('should raise UnexpectedStatusError with the body for other statuses', async () => {
    reply = () => ({ status: 404, body: 'no such blob' });

    const error = await session
      .request('GET', `${server.getUrl()}/node/storage`, isRecord)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 404, body: 'no such blob', code: 'HTTP_001' });
  });

  it('should raise InvalidResponseError for a non-JSON body', async () => {
    reply = () => ({ status: 200, body: 'not json' });

    await expect(session.request('GET', `${server.getUrl()}/x`, isRecord)).rejects.toBeInstanceOf(
      InvalidResponseError
    );
  });

  it('should raise InvalidResponseError when the body fails the guard', async () => {
    reply = () => ({ status: 200, body: { identifier: 'blob-1' } });

    await expect(session.request('POST', `${server.getUrl()}/blob`, isPushResponse)).rejects.toMatchObject({
      code: 'HTTP_002',
      body: '{"identifier":"blob-1"}',
    });
  });

  it('should not follow redirects in send()', async () => {
    reply = () => ({ status: 307, headers: { location: '/elsewhere' } });

    const response = await session.send('POST', `${server.getUrl()}/blob`, { body: 'payload' });

    expect(response.status).toBe(307);
    expect(headerValue(response.headers, 'Location')).toBe('/elsewhere');
    expect(server.requests).toHaveLength(1);
  });

  it('should refuse requests once closed', async () => {
    session.close();

    expect(session.isClosed).toBe(true);
    await expect(session.send('GET', `${server.getUrl()}/health`)).rejects.toThrow('HTTP session is closed');
  });
});
