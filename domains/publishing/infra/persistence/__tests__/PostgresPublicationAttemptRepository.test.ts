import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PublicationAttempt } from '../../../domain/entities/PublicationAttempt';
import { ActiveAttemptExistsError } from '../../../application/ports/PublicationAttemptRepository';
import {
  ACTIVE_ATTEMPT_INDEX,
  PostgresPublicationAttemptRepository,
  type PublicationAttemptRow,
} from '../PostgresPublicationAttemptRepository';

const ITEM_ID = '3f0c7a3e-8f57-4b8e-9a55-0d7f9a1e2b10';
const ATTEMPT_ID = '9d2b6c14-1a3e-4f70-b8d5-2e6f0a7c9b31';
const CREATED = new Date('2026-01-05T10:00:00.000Z');

function row(overrides: Partial<PublicationAttemptRow> = {}): PublicationAttemptRow {
  return {
    id: ATTEMPT_ID,
    content_item_id: ITEM_ID,
    network: 'linkedin',
    adapted_content: 'Launch post',
    status: 'pending',
    published_at: null,
    error_message: null,
    metadata: {},
    retry_count: 0,
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides,
  };
}

function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), {
    code: '23505',
    constraint,
  });
}

describe('PostgresPublicationAttemptRepository', () => {
  const client = { query: vi.fn(), release: vi.fn() };
  const pool = { query: vi.fn(), connect: vi.fn() };
  let repository: PostgresPublicationAttemptRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    client.query.mockReset();
    pool.query.mockReset();
    pool.connect.mockResolvedValue(client);
    repository = new PostgresPublicationAttemptRepository(pool);
  });

  describe('getById', () => {
    it('maps metadata stored as text', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [row({ status: 'published', metadata: '{"post_id":"urn:li:share:1"}', published_at: CREATED })],
      });

      const attempt = await repository.getById(ATTEMPT_ID);

      expect(attempt?.status).toBe('published');
      expect(attempt?.network).toBe('linkedin');
      expect(attempt?.metadata).toEqual({ post_id: 'urn:li:share:1' });
      expect(attempt?.publishedAt?.toISOString()).toBe('2026-01-05T10:00:00.000Z');
    });

    it('treats null metadata as an empty object', async () => {
      pool.query.mockResolvedValueOnce({ rows: [row({ metadata: null })] });

      expect((await repository.getById(ATTEMPT_ID))?.metadata).toEqual({});
    });

    it('rejects an unknown network', async () => {
      pool.query.mockResolvedValueOnce({ rows: [row({ network: 'myspace' })] });

      await expect(repository.getById(ATTEMPT_ID)).rejects.toThrow(
        "Invalid network in database: 'myspace'. Expected one of: facebook, instagram, linkedin, tiktok, whatsapp"
      );
    });
  });

  describe('createMany', () => {
    it('does nothing for an empty batch', async () => {
      await repository.createMany([]);

      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('inserts every attempt in one transaction', async () => {
      client.query.mockResolvedValue({});
      const attempts = [
        PublicationAttempt.create(ATTEMPT_ID, ITEM_ID, 'linkedin', 'Post A', CREATED),
        PublicationAttempt.create('c1e5a7b9-0d3f-4a62-9e84-7b1c2d3e4f50', ITEM_ID, 'facebook', 'Post B', CREATED),
      ];

      await repository.createMany(attempts);

      const statements = client.query.mock.calls.map(call => String(call[0]));
      expect(statements[0]).toBe('BEGIN ISOLATION LEVEL READ COMMITTED');
      expect(statements.filter(s => s.includes('INSERT INTO publication_attempts'))).toHaveLength(2);
      expect(statements[statements.length - 1]).toBe('COMMIT');
      expect(client.query.mock.calls[2]?.[1]).toEqual([
        ATTEMPT_ID, ITEM_ID, 'linkedin', 'Post A', 'pending', null, null, '{}', 0, CREATED, CREATED,
      ]);
    });

    it('maps the active-attempt index violation to ActiveAttemptExistsError', async () => {
      client.query
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(uniqueViolation(ACTIVE_ATTEMPT_INDEX))
        .mockResolvedValueOnce({});

      const error = await repository
        .createMany([PublicationAttempt.create(ATTEMPT_ID, ITEM_ID, 'linkedin', 'Post A', CREATED)])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ActiveAttemptExistsError);
      expect(client.query).toHaveBeenLastCalledWith('ROLLBACK');
    });

    it('rethrows other unique violations unchanged', async () => {
      const violation = uniqueViolation('publication_attempts_pkey');
      client.query
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({})
        .mockRejectedValueOnce(violation)
        .mockResolvedValueOnce({});

      await expect(
        repository.createMany([PublicationAttempt.create(ATTEMPT_ID, ITEM_ID, 'linkedin', 'Post A', CREATED)])
      ).rejects.toBe(violation);
    });
  });

  describe('transitionStatus', () => {
    const pending = PublicationAttempt.create(ATTEMPT_ID, ITEM_ID, 'linkedin', 'Post A', CREATED);
    const dispatched = pending.dispatch('https://cdn.test/a.png', new Date('2026-01-05T10:05:00.000Z'));

    it('guards the update on the expected status', async () => {
      pool.query.mockResolvedValueOnce({ rowCount: 1 });

      expect(await repository.transitionStatus(dispatched, 'pending')).toBe(true);
      expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1 AND status = $2'), [
        ATTEMPT_ID,
        'pending',
        'processing',
        null,
        null,
        '{"image_url":"https://cdn.test/a.png"}',
        0,
        new Date('2026-01-05T10:05:00.000Z'),
      ]);
    });

    it('returns false when another writer moved the row first', async () => {
      pool.query.mockResolvedValueOnce({ rowCount: 0 });

      expect(await repository.transitionStatus(dispatched, 'pending')).toBe(false);
    });

    it('maps the active-attempt index violation on retry', async () => {
      pool.query.mockRejectedValueOnce(uniqueViolation(ACTIVE_ATTEMPT_INDEX));

      await expect(repository.transitionStatus(dispatched, 'failed')).rejects.toBeInstanceOf(ActiveAttemptExistsError);
    });
  });

  it('lists attempts of an item oldest first', async () => {
    pool.query.mockResolvedValueOnce({ rows: [row(), row({ id: 'c1e5a7b9-0d3f-4a62-9e84-7b1c2d3e4f50', network: 'tiktok' })] });

    const attempts = await repository.listByContentItem(ITEM_ID);

    expect(attempts.map(a => a.network)).toEqual(['linkedin', 'tiktok']);
    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY created_at ASC, id ASC'), [ITEM_ID]);
  });
});
