/**
 * DetaHttpClient tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { SecretString } from '../../config/index.js';
import {
  DetaErrorCode,
  NotFoundError,
  SerializationError,
  TransportError,
} from '../../errors/index.js';
import { LogLevel, MetricNames, createInMemoryObservability } from '../../observability/index.js';
import {
  MockTransport,
  TEST_PROJECT_KEY,
  bytesResponse,
  errorResponse,
  jsonResponse,
  requestJsonBody,
} from '../../testing/index.js';
import { DetaHttpClient, buildQueryString } from '../index.js';

const ROOT = 'https://database.deta.sh/v1/testproj/users';
const KeySchema = z.object({ key: z.string() });

describe('buildQueryString', () => {
  it('should encode keys and values once, in order', () => {
    expect(buildQueryString({ name: 'a b/c', part: 2, skip: undefined })).toBe(
      '?name=a%20b%2Fc&part=2'
    );
  });

  it('should return an empty string without parameters', () => {
    expect(buildQueryString(undefined)).toBe('');
    expect(buildQueryString({ last: undefined })).toBe('');
  });
});

describe('DetaHttpClient', () => {
  let transport: MockTransport;
  let observability: ReturnType<typeof createInMemoryObservability>;
  let client: DetaHttpClient;

  beforeEach(() => {
    transport = new MockTransport();
    observability = createInMemoryObservability();
    client = new DetaHttpClient(
      {
        rootUrl: ROOT,
        projectKey: SecretString.from(TEST_PROJECT_KEY),
        userAgent: 'deta-client/test',
        requestTimeoutMs: 5000,
      },
      transport,
      observability
    );
  });

  it('should send JSON with the API key', async () => {
    transport.enqueue(jsonResponse({ key: 'a' }));

    const result = await client.requestJson(
      { method: 'POST', path: '/items', json: { item: { key: 'a' } } },
      KeySchema
    );

    expect(result).toEqual({ key: 'a' });
    const request = transport.getRequests()[0];
    expect(request?.url).toBe(`${ROOT}/items`);
    expect(request?.method).toBe('POST');
    expect(request?.timeoutMs).toBe(5000);
    expect(request?.headers).toEqual({
      'X-API-Key': TEST_PROJECT_KEY,
      'User-Agent': 'deta-client/test',
      'Content-Type': 'application/json',
    });
    expect(requestJsonBody(request)).toEqual({ item: { key: 'a' } });
  });

  it('should send bytes as octet-stream', async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    transport.enqueue(bytesResponse(new Uint8Array([9])));

    const body = await client.requestBytes({
      method: 'POST',
      path: '/files',
      query: { name: 'a.bin' },
      bytes,
    });

    expect(body).toEqual(new Uint8Array([9]));
    const request = transport.getRequests()[0];
    expect(request?.url).toBe(`${ROOT}/files?name=a.bin`);
    expect(request?.headers['Content-Type']).toBe('application/octet-stream');
    expect(request?.body).toBe(bytes);
  });

  it('should leave the body out when there is nothing to send', async () => {
    transport.enqueue(jsonResponse({ key: 'a' }));
    await client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema);
    expect(transport.getRequests()[0]?.body).toBeUndefined();
  });

  it('should map error statuses using the server message', async () => {
    transport.enqueue(errorResponse(404, ['Key not found']));

    const promise = client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema);

    await expect(promise).rejects.toBeInstanceOf(NotFoundError);
    await expect(promise).rejects.toThrow('Key not found');
  });

  it('should use the status text when the error body is not JSON', async () => {
    transport.enqueue(bytesResponse('<html>oops</html>', 404));

    await expect(
      client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema)
    ).rejects.toThrow('Not Found');
  });

  it('should reject a body that is not JSON', async () => {
    transport.enqueue(bytesResponse('not json'));

    await expect(
      client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema)
    ).rejects.toThrow('Serialization error: response body is not valid JSON');
  });

  it('should reject a body of the wrong shape', async () => {
    transport.enqueue(jsonResponse({ id: 1 }));

    const promise = client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema);

    await expect(promise).rejects.toBeInstanceOf(SerializationError);
    await expect(promise).rejects.toThrow(
      'Serialization error: unexpected response body for GET /items/a'
    );
  });

  it('should pass transport errors through unchanged', async () => {
    const error = new TransportError('connection reset');
    transport.enqueue({ status: 0, error });

    await expect(
      client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema)
    ).rejects.toBe(error);
  });

  it('should record metrics and log failures', async () => {
    transport.enqueue(jsonResponse({ key: 'a' }), errorResponse(404, ['Key not found']));

    await client.requestJson({ method: 'GET', path: '/items/a' }, KeySchema);
    await expect(
      client.requestJson({ method: 'GET', path: '/items/b' }, KeySchema)
    ).rejects.toBeInstanceOf(NotFoundError);

    const { metrics, logger } = observability;
    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL, { method: 'GET', status: '200' })).toBe(1);
    expect(metrics.getCounter(MetricNames.REQUESTS_TOTAL, { method: 'GET', status: '404' })).toBe(1);
    expect(
      metrics.getCounter(MetricNames.ERRORS_TOTAL, { method: 'GET', code: DetaErrorCode.NOT_FOUND })
    ).toBe(1);
    expect(metrics.getTimings(MetricNames.REQUEST_LATENCY, { method: 'GET' })).toHaveLength(2);

    const failures = logger.getEntries(LogLevel.ERROR);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.context).toEqual({
      method: 'GET',
      path: '/items/b',
      error: 'Key not found',
    });
  });
});
