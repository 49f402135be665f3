import { beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, ValidationError } from '@errors';

import { InvalidNetworkError } from '../../domain/errors';
import { MAX_IMAGE_SOURCE_LENGTH } from '../ImageService';
import { createTestServices, StubImageGenerator, type TestServices } from '../../../../test/fakes';

describe('ImageService', () => {
  let images: StubImageGenerator;
  let services: TestServices;
  let itemId: string;

  beforeEach(async () => {
    images = new StubImageGenerator();
    services = createTestServices({ imageGenerator: images });
    itemId = (await services.contents.create({ title: 'Harvest market', body: 'Saturday from 9am' })).id;
  });

  it('returns the generated URL without touching the publications', async () => {
    const outcome = await services.images.generate(itemId, { network: 'facebook', adaptedText: 'Market day!' });

    expect(outcome).toEqual({
      contentItemId: itemId,
      network: 'facebook',
      imageUrl: 'https://images.test/facebook.png',
      revisedPrompt: null,
    });
    expect(await services.attempts.listByContentItem(itemId)).toEqual([]);
  });

  it('cuts long text before it reaches the prompt', async () => {
    await services.images.generate(itemId, { network: 'instagram', adaptedText: 'a'.repeat(800) });

    expect(images.requests[0]?.text).toHaveLength(MAX_IMAGE_SOURCE_LENGTH);
  });

  it('uses the latest publication text for the network', async () => {
    await services.adapter.adapt(itemId, { networks: ['facebook', 'tiktok'] });

    await services.images.generate(itemId, { network: 'tiktok' });

    expect(images.requests).toEqual([{ text: '[tiktok] Harvest market', network: 'tiktok' }]);
  });

  it('asks for an adaptation when the network has no publication', async () => {
    const error = await services.images.generate(itemId, { network: 'whatsapp' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty('message', 'No adapted text for whatsapp; adapt the content item first');
    expect(images.requests).toEqual([]);
  });

  it('rejects an unsupported network', async () => {
    await expect(services.images.generate(itemId, { network: 'myspace', adaptedText: 'x' }))
      .rejects.toBeInstanceOf(InvalidNetworkError);
  });

  it('throws NotFoundError for an unknown item', async () => {
    await expect(services.images.generate('missing', { network: 'facebook', adaptedText: 'x' }))
      .rejects.toBeInstanceOf(NotFoundError);
  });

  it('propagates generator failures', async () => {
    images.failWith = new Error('content policy violation');

    await expect(services.images.generate(itemId, { network: 'linkedin', adaptedText: 'x' }))
      .rejects.toThrow('content policy violation');
  });
});
