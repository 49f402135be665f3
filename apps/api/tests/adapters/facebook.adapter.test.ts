import { beforeEach, describe, expect, it, vi } from 'vitest';

const fetchMock = vi.hoisted(() => vi.fn());
vi.mock('node-fetch', () => ({ default: fetchMock }));

import { PublishFailure } from '@domain/publishing/application/ports/NetworkPublisher';

import { FacebookAdapter } from '../../src/adapters/facebook/FacebookAdapter';
import { hangingFetch, jsonResponse } from '../../../../test/fakes/fetchResponses';

describe('FacebookAdapter', () => {
  const credentials = { pageId: '12345', accessToken: 'test-token' };
  let adapter: FacebookAdapter;

  beforeEach(() => {
    fetchMock.mockReset();
    adapter = new FacebookAdapter(credentials, 1000);
  });

  it('rejects a non-numeric page id', () => {
    expect(() => new FacebookAdapter({ pageId: 'my-page', accessToken: 'test-token' }, 1000))
      .toThrow('Facebook pageId must be numeric');
  });

  it('posts text to the page feed', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { id: '12345_678' }));

    const result = await adapter.publish({ content: 'Hello' });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://graph.facebook.com/v19.0/12345/feed');
    expect(init.headers.Authorization).toBe('Bearer test-token');
    expect(init.body.get('message')).toBe('Hello');
    expect(result.metadata).toEqual({
      platform: 'facebook',
      post_id: '12345_678',
      response: { id: '12345_678' },
    });
  });

  it('posts to photos when an image is given and prefers post_id', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { id: '999', post_id: '12345_999' }));

    const result = await adapter.publish({ content: 'Caption', imageUrl: 'https://cdn.example.com/a.jpg' });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://graph.facebook.com/v19.0/12345/photos');
    expect(init.body.get('url')).toBe('https://cdn.example.com/a.jpg');
    expect(init.body.get('caption')).toBe('Caption');
    expect(result.metadata['post_id']).toBe('12345_999');
  });

  it('classifies 5xx as transient', async () => {
    fetchMock.mockResolvedValue(jsonResponse(503, { error: { message: 'Service down' } }));

    const error = await adapter.publish({ content: 'Hello' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PublishFailure);
    expect(error).toMatchObject({
      kind: 'transient',
      status: 503,
      message: 'Facebook API error 503: Service down',
    });
  });

  it('classifies 4xx as permanent and redacts tokens', async () => {
    fetchMock.mockResolvedValue(jsonResponse(400, {
      error: { message: 'Invalid parameter access_token=abc123' },
    }));

    await expect(adapter.publish({ content: 'Hello' })).rejects.toMatchObject({
      kind: 'permanent',
      status: 400,
      message: 'Facebook API error 400: Invalid parameter access_token=[REDACTED]',
    });
  });

  it('classifies 429 as transient', async () => {
    fetchMock.mockResolvedValue(jsonResponse(429, { error: { message: 'Rate limited' } }));

    await expect(adapter.publish({ content: 'Hello' })).rejects.toMatchObject({ kind: 'transient', status: 429 });
  });

  it('classifies connection errors as transient', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));

    await expect(adapter.publish({ content: 'Hello' })).rejects.toMatchObject({
      kind: 'transient',
      message: 'Facebook request failed: ECONNRESET',
    });
  });

  it('aborts slow requests as transient timeouts', async () => {
    fetchMock.mockImplementation(hangingFetch);
    const fast = new FacebookAdapter(credentials, 10);

    await expect(fast.publish({ content: 'Hello' })).rejects.toMatchObject({
      kind: 'transient',
      message: 'Facebook request timed out after 10ms',
    });
  });
});
