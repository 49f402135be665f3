import { beforeEach, describe, expect, it, vi } from 'vitest';

const { addMock, closeMock, queueOptions } = vi.hoisted(() => ({
  addMock: vi.fn(),
  closeMock: vi.fn(),
  queueOptions: new Array<unknown>(),
}));

vi.mock('bullmq', () => ({
  Queue: class {
    add = addMock;
    close = closeMock;
    on = vi.fn();
    constructor(_name: string, options: unknown) {
      queueOptions.push(options);
    }
  },
}));

import { BullMqPublicationQueue, PUBLISH_JOB_NAME, PublicationJobSchema } from '../BullMqPublicationQueue';

const ATTEMPT_ID = '9d2b6c14-1a3e-4f70-b8d5-2e6f0a7c9b31';
const CONNECTION = { host: 'localhost', port: 6379, maxRetriesPerRequest: null };

describe('BullMqPublicationQueue', () => {
  beforeEach(() => {
    addMock.mockReset();
    closeMock.mockReset();
    queueOptions.length = 0;
  });

  it('creates the queue with a single BullMQ attempt per job', () => {
    new BullMqPublicationQueue('publications', CONNECTION);

    expect(queueOptions[0]).toMatchObject({
      connection: CONNECTION,
      defaultJobOptions: { attempts: 1, removeOnFail: { count: 5_000 } },
    });
  });

  it('returns the BullMQ job id', async () => {
    addMock.mockResolvedValueOnce({ id: '17' });
    const queue = new BullMqPublicationQueue('publications', CONNECTION);
    const job = { attemptId: ATTEMPT_ID, network: 'linkedin' as const, content: 'Launch post' };

    expect(await queue.enqueue(job)).toBe('17');
    expect(addMock).toHaveBeenCalledWith(PUBLISH_JOB_NAME, job);
  });

  it('fails when BullMQ assigns no id', async () => {
    addMock.mockResolvedValueOnce({ id: undefined });
    const queue = new BullMqPublicationQueue('publications', CONNECTION);

    await expect(queue.enqueue({ attemptId: ATTEMPT_ID, network: 'tiktok', content: 'x' }))
      .rejects.toThrow(`BullMQ returned no job id for publication ${ATTEMPT_ID}`);
  });

  it('closes the underlying queue', async () => {
    closeMock.mockResolvedValueOnce(undefined);

    await new BullMqPublicationQueue('publications', CONNECTION).close();

    expect(closeMock).toHaveBeenCalledTimes(1);
  });
});

describe('PublicationJobSchema', () => {
  it('accepts a well-formed job', () => {
    const parsed = PublicationJobSchema.safeParse({
      attemptId: ATTEMPT_ID,
      network: 'instagram',
      content: 'Caption',
      imageUrl: 'https://cdn.test/a.png',
    });

    expect(parsed.success).toBe(true);
  });

  it('rejects an unknown network and a malformed id', () => {
    const parsed = PublicationJobSchema.safeParse({ attemptId: 'abc', network: 'myspace', content: 'x' });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues.map(i => i.path[0])).toEqual(['attemptId', 'network']);
    }
  });
});
