import { beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, ValidationError } from '@errors';

import { createTestServices, type TestServices } from '../../../../test/fakes';

describe('ContentService', () => {
  let services: TestServices;

  beforeEach(() => {
    services = createTestServices();
  });

  it('creates a trimmed draft', async () => {
    const item = await services.contents.create({ title: '  Launch  ', body: ' We shipped. ' });

    expect(item.title).toBe('Launch');
    expect(item.body).toBe('We shipped.');
    expect(item.status).toBe('draft');
    expect(await services.items.getById(item.id)).not.toBeNull();
  });

  it('rejects an empty title with the first issue in the message', async () => {
    await expect(services.contents.create({ title: '   ', body: 'text' }))
      .rejects.toThrow('Validation failed: title: Title is required');
  });

  it('reports every issue in the error details', async () => {
    const error = await services.contents.create({ title: '', body: '' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual([
        { path: ['title'], message: 'Title is required', code: 'too_small' },
        { path: ['body'], message: 'Content is required', code: 'too_small' },
      ]);
    }
  });

  it('lists by status with offset and limit', async () => {
    const first = await services.contents.create({ title: 'One', body: 'b' });
    await services.contents.create({ title: 'Two', body: 'b' });
    await services.adapter.adapt(first.id, { networks: ['facebook'] });

    const processing = await services.contents.list({ status: 'processing' });
    expect(processing.map(i => i.title)).toEqual(['One']);

    const page = await services.contents.list({ offset: 1, limit: 1 });
    expect(page).toHaveLength(1);
  });

  it('rejects a limit above 1000', async () => {
    await expect(services.contents.list({ limit: 5000 })).rejects.toBeInstanceOf(ValidationError);
  });

  it('returns the item with its attempts', async () => {
    const item = await services.contents.create({ title: 'T', body: 'C' });
    await services.adapter.adapt(item.id, { networks: ['facebook', 'linkedin'] });

    const found = await services.contents.get(item.id);
    expect(found.item.status).toBe('processing');
    expect(found.attempts.map(a => a.network)).toEqual(['facebook', 'linkedin']);
  });

  it('deletes the item and its attempts', async () => {
    const item = await services.contents.create({ title: 'T', body: 'C' });
    await services.adapter.adapt(item.id, { networks: ['facebook'] });

    await services.contents.delete(item.id);

    expect(await services.items.getById(item.id)).toBeNull();
    expect(await services.attempts.listByContentItem(item.id)).toEqual([]);
    await expect(services.contents.delete(item.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('throws NotFoundError for an unknown id', async () => {
    await expect(services.contents.get('missing')).rejects.toThrow('Content item not found');
  });
});
