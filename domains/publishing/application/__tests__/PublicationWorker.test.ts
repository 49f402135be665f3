import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PublishFailure } from '../ports/NetworkPublisher';
import { createTestServices, StubPublisher, type TestServices } from '../../../../test/fakes';
import type { PublicationJob } from '../ports/PublicationQueue';

async function setUp(publisher: StubPublisher, maxRetries = 3) {
  const services = createTestServices({ publishers: [publisher], maxRetries });
  const item = await services.contents.create({ title: 'T', body: 'C' });
  await services.adapter.adapt(item.id, { networks: [publisher.network] });
  await services.dispatcher.publish(item.id, 'https://cdn.test/v.mp4');
  const [job] = services.queue.drain();
  if (!job) throw new Error('nothing enqueued');
  return { services, itemId: item.id, job };
}

describe('PublicationWorker', () => {
  describe('success', () => {
    it('publishes and stores the response metadata', async () => {
      const publisher = new StubPublisher('linkedin', [{ metadata: { platform: 'linkedin', post_id: 'urn:li:share:1' } }]);
      const { services, itemId, job } = await setUp(publisher);

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'published', calls: 1 });
      expect(publisher.requests).toEqual([{ content: '[linkedin] T', imageUrl: 'https://cdn.test/v.mp4' }]);
      const attempt = await services.attempts.getById(job.attemptId);
      expect(attempt?.status).toBe('published');
      expect(attempt?.publishedAt).toBeInstanceOf(Date);
      expect(attempt?.metadata).toEqual({
        image_url: 'https://cdn.test/v.mp4',
        platform: 'linkedin',
        post_id: 'urn:li:share:1',
      });
      expect((await services.items.getById(itemId))?.status).toBe('published');
    });
  });

  describe('transient failures', () => {
    it('retries with a fixed backoff and publishes on the third call', async () => {
      const publisher = new StubPublisher('facebook', [
        PublishFailure.transient('Facebook API error 503', 503),
        PublishFailure.transient('Facebook API error 503', 503),
        { metadata: { post_id: 'fb-3' } },
      ]);
      const { services, job } = await setUp(publisher);

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'published', calls: 3 });
      expect(services.sleeps).toEqual([60000, 60000]);
      const attempt = await services.attempts.getById(job.attemptId);
      expect(attempt?.status).toBe('published');
      expect(attempt?.retryCount).toBe(2);
      expect(attempt?.metadata['post_id']).toBe('fb-3');
      expect(attempt?.errorMessage).toBeNull();
    });

    it('stays in processing between retries', async () => {
      const publisher = new StubPublisher('facebook');
      const { services, job } = await setUp(publisher);
      const seen: Array<string | undefined> = [];

      publisher.publish = async request => {
        publisher.requests.push(request);
        const stored = await services.attempts.getById(job.attemptId);
        seen.push(`${stored?.status}:${stored?.retryCount}`);
        if (publisher.requests.length === 1) {
          throw PublishFailure.transient('timeout');
        }
        return { metadata: {} };
      };

      await services.worker.process(job);

      expect(seen).toEqual(['processing:0', 'processing:1']);
      expect((await services.attempts.getById(job.attemptId))?.status).toBe('published');
    });

    it('fails after exhausting the retry budget', async () => {
      const publisher = new StubPublisher('facebook', [], PublishFailure.transient('Facebook API error 502', 502));
      const { services, itemId, job } = await setUp(publisher);

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'failed', calls: 4, error: 'Facebook API error 502' });
      expect(services.sleeps).toHaveLength(3);
      const attempt = await services.attempts.getById(job.attemptId);
      expect(attempt?.status).toBe('failed');
      expect(attempt?.retryCount).toBe(3);
      expect(attempt?.errorMessage).toBe('Facebook API error 502');
      expect(attempt?.publishedAt).toBeNull();
      expect((await services.items.getById(itemId))?.status).toBe('failed');
    });

    it('treats unclassified errors as transient', async () => {
      const publisher = new StubPublisher('facebook', [new Error('socket hang up')]);
      const { services, job } = await setUp(publisher);

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'published', calls: 2 });
    });
  });

  describe('permanent failures', () => {
    it('fails on the first call without retrying', async () => {
      const publisher = new StubPublisher('instagram', [PublishFailure.permanent('Instagram requires an image')]);
      const { services, itemId, job } = await setUp(publisher);

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'failed', calls: 1, error: 'Instagram requires an image' });
      expect(services.sleeps).toEqual([]);
      const attempt = await services.attempts.getById(job.attemptId);
      expect(attempt?.status).toBe('failed');
      expect(attempt?.retryCount).toBe(0);
      expect((await services.items.getById(itemId))?.status).toBe('failed');
    });

    it('fails when no publisher is registered for the network', async () => {
      const services = createTestServices();
      const item = await services.contents.create({ title: 'T', body: 'C' });
      await services.adapter.adapt(item.id, { networks: ['tiktok'] });
      await services.dispatcher.publish(item.id);
      const [job] = services.queue.drain();
      if (!job) throw new Error('nothing enqueued');

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'failed', calls: 0, error: 'No publisher configured for tiktok' });
    });
  });

  describe('status refresh failure', () => {
    it('keeps the published outcome when the content status write fails', async () => {
      const publisher = new StubPublisher('whatsapp');
      const { services, itemId, job } = await setUp(publisher);
      vi.spyOn(services.items, 'reconcileStatus').mockRejectedValueOnce(new Error('deadlock detected'));

      const result = await services.worker.process(job);

      expect(result).toEqual({ outcome: 'published', calls: 1 });
      expect((await services.attempts.getById(job.attemptId))?.status).toBe('published');
      expect((await services.aggregator.status(itemId)).postStatus).toBe('published');
      expect((await services.contents.get(itemId)).item.status).toBe('published');
    });
  });

  describe('duplicate delivery', () => {
    it('ignores a job whose attempt is already terminal', async () => {
      const publisher = new StubPublisher('linkedin');
      const { services, job } = await setUp(publisher);
      await services.worker.process(job);

      const again = await services.worker.process(job);

      expect(again).toEqual({ outcome: 'skipped', calls: 0 });
      expect(publisher.requests).toHaveLength(1);
    });

    it('repairs the content status when redelivered after a lost refresh', async () => {
      const publisher = new StubPublisher('whatsapp');
      const { services, itemId, job } = await setUp(publisher);
      vi.spyOn(services.items, 'reconcileStatus').mockRejectedValueOnce(new Error('deadlock detected'));
      await services.worker.process(job);
      expect((await services.items.getById(itemId))?.status).toBe('processing');

      const again = await services.worker.process(job);

      expect(again).toEqual({ outcome: 'skipped', calls: 0 });
      expect((await services.items.getById(itemId))?.status).toBe('published');
    });

    it('ignores a job for an unknown attempt', async () => {
      const services = createTestServices();
      const job: PublicationJob = { attemptId: 'missing', network: 'facebook', content: 'x' };

      expect(await services.worker.process(job)).toEqual({ outcome: 'skipped', calls: 0 });
    });
  });

  it('keeps one network failing from affecting another', async () => {
    const services = createTestServices({
      publishers: [
        new StubPublisher('facebook'),
        new StubPublisher('instagram', [PublishFailure.permanent('Instagram requires an image')]),
      ],
    });
    const item = await services.contents.create({ title: 'T', body: 'C' });
    await services.adapter.adapt(item.id, { networks: ['facebook', 'instagram'] });
    await services.dispatcher.publish(item.id);

    await services.runQueuedJobs();

    const summary = await services.aggregator.status(item.id);
    expect(summary.byStatus).toEqual({ pending: 0, processing: 0, published: 1, failed: 1 });
    expect(summary.postStatus).toBe('published');
  });
});
