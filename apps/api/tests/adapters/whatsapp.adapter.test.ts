import { beforeEach, describe, expect, it, vi } from 'vitest';

const fetchMock = vi.hoisted(() => vi.fn());
vi.mock('node-fetch', () => ({ default: fetchMock }));

import { WhatsAppAdapter } from '../../src/adapters/whatsapp/WhatsAppAdapter';
import { jsonResponse } from '../../../../test/fakes/fetchResponses';

describe('WhatsAppAdapter', () => {
  let adapter: WhatsAppAdapter;

  beforeEach(() => {
    fetchMock.mockReset();
    adapter = new WhatsAppAdapter(
      { phoneNumberId: '1055', recipient: '15550001111', accessToken: 'test-token' },
      1000
    );
  });

  it('fails permanently without media', async () => {
    await expect(adapter.publish({ content: 'Hi' })).rejects.toMatchObject({
      kind: 'permanent',
      message: 'WhatsApp requires an image or video',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends an image message with the text as caption', async () => {
    const response = { messaging_product: 'whatsapp', messages: [{ id: 'wamid.1' }] };
    fetchMock.mockResolvedValue(jsonResponse(200, response));

    const result = await adapter.publish({ content: 'Hi', imageUrl: 'https://cdn.example.com/a.jpg' });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://graph.facebook.com/v19.0/1055/messages');
    const body = JSON.parse(init.body);
    expect(body.to).toBe('15550001111');
    expect(body.type).toBe('image');
    expect(body.image).toEqual({ link: 'https://cdn.example.com/a.jpg', caption: 'Hi' });
    expect(result.metadata).toEqual({ platform: 'whatsapp', message_id: 'wamid.1', response });
  });

  it('sends a video message for video URLs', async () => {
    fetchMock.mockResolvedValue(jsonResponse(200, { messages: [{ id: 'wamid.2' }] }));

    await adapter.publish({ content: 'Watch', imageUrl: 'https://cdn.example.com/v.mp4?x=1' });

    const body = JSON.parse(fetchMock.mock.calls[0]?.[1]?.body);
    expect(body.type).toBe('video');
    expect(body.video).toEqual({ link: 'https://cdn.example.com/v.mp4?x=1', caption: 'Watch' });
  });
});
