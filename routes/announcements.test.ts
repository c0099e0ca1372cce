import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { bearer, createTestApp } from '../test-utils/fixtures';

const HOUR = 60 * 60 * 1000;

describe('announcements', () => {
  let current: Date;
  const clock = () => current;

  beforeEach(() => {
    current = new Date('2026-03-01T12:00:00.000Z');
  });

  const create = (app: ReturnType<typeof createTestApp>['app'], query: Record<string, string>) =>
    request(app).post('/announcements').query(query).set('Authorization', bearer());

  it('shows an announcement until it expires, and keeps it in the manager afterwards', async () => {
    const { app } = createTestApp({}, clock);

    const created = await create(app, {
      message: 'Picture Day',
      expires_at: new Date(current.getTime() + HOUR).toISOString(),
    });
    expect(created.status).toBe(201);
    expect(created.body).toEqual({
      id: 1,
      message: 'Picture Day',
      startsAt: null,
      expiresAt: '2026-03-01T13:00:00.000Z',
      createdAt: '2026-03-01T12:00:00.000Z',
      updatedAt: '2026-03-01T12:00:00.000Z',
      createdBy: 'mrodriguez',
    });

    const before = await request(app).get('/announcements');
    expect(before.body.map((a: { message: string }) => a.message)).toEqual(['Picture Day']);

    current = new Date(current.getTime() + 2 * HOUR);

    const after = await request(app).get('/announcements');
    expect(after.body).toEqual([]);

    const managed = await request(app).get('/announcements/manage').set('Authorization', bearer());
    expect(managed.status).toBe(200);
    expect(managed.body.map((a: { message: string }) => a.message)).toEqual(['Picture Day']);
  });

  it('hides announcements that have not started yet', async () => {
    const { app } = createTestApp({}, clock);
    await create(app, {
      message: 'Spring Fair',
      starts_at: '2026-03-02T09:00:00Z',
      expires_at: '2026-03-05T09:00:00Z',
    });
    expect((await request(app).get('/announcements')).body).toEqual([]);

    current = new Date('2026-03-03T00:00:00Z');
    expect((await request(app).get('/announcements')).body).toHaveLength(1);
  });

  it('orders the public banner by expiration and the manager by creation', async () => {
    const { app } = createTestApp({}, clock);
    await create(app, { message: 'Later', expires_at: '2026-03-09T00:00:00Z' });
    current = new Date('2026-03-01T12:05:00Z');
    await create(app, { message: 'Sooner', expires_at: '2026-03-02T00:00:00Z' });

    const banner = await request(app).get('/announcements');
    expect(banner.body.map((a: { message: string }) => a.message)).toEqual(['Sooner', 'Later']);

    const managed = await request(app).get('/announcements/manage').set('Authorization', bearer());
    expect(managed.body.map((a: { message: string }) => a.message)).toEqual(['Sooner', 'Later']);
  });

  it('reads date-times without a zone as UTC', async () => {
    const { app } = createTestApp({}, clock);
    const res = await create(app, { message: 'Assembly', expires_at: '2026-03-01T15:00' });
    expect(res.body.expiresAt).toBe('2026-03-01T15:00:00.000Z');
  });

  it('rejects a start that is not before the expiration', async () => {
    const { app } = createTestApp({}, clock);
    const res = await create(app, {
      message: 'Backwards',
      starts_at: '2026-03-02T00:00:00Z',
      expires_at: '2026-03-02T00:00:00Z',
    });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ detail: 'Expiration must be after start date' });
  });

  it('validates the message and expiration', async () => {
    const { app } = createTestApp({}, clock);

    const blank = await create(app, { message: '   ', expires_at: '2026-03-02T00:00:00Z' });
    expect(blank.body).toEqual({ detail: 'Message is required' });

    const long = await create(app, { message: 'x'.repeat(501), expires_at: '2026-03-02T00:00:00Z' });
    expect(long.body).toEqual({ detail: 'Message is too long' });

    const missing = await create(app, { message: 'No expiry' });
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({ detail: 'expires_at is required' });

    const garbled = await create(app, { message: 'Bad date', expires_at: 'soon' });
    expect(garbled.body).toEqual({ detail: 'Invalid expires_at format' });

    const numeric = await create(app, { message: 'Bad date', expires_at: '1' });
    expect(numeric.status).toBe(400);
    expect(numeric.body).toEqual({ detail: 'Invalid expires_at format' });
  });

  it('requires sign-in for management routes', async () => {
    const { app } = createTestApp({}, clock);
    expect((await request(app).get('/announcements/manage')).status).toBe(401);
    expect((await request(app).post('/announcements').query({ message: 'Hi', expires_at: '2026-03-02T00:00:00Z' })).status).toBe(401);
    expect((await request(app).delete('/announcements/1')).status).toBe(401);
  });

  describe('PUT /announcements/:id', () => {
    it('replaces message and dates', async () => {
      const { app } = createTestApp({}, clock);
      await create(app, { message: 'Picture Day', expires_at: '2026-03-02T00:00:00Z' });
      current = new Date('2026-03-01T13:00:00Z');

      const res = await request(app)
        .put('/announcements/1')
        .query({ message: 'Picture Day moved', starts_at: '2026-03-01T14:00:00Z', expires_at: '2026-03-03T00:00:00Z' })
        .set('Authorization', bearer());

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        id: 1,
        message: 'Picture Day moved',
        startsAt: '2026-03-01T14:00:00.000Z',
        expiresAt: '2026-03-03T00:00:00.000Z',
        createdAt: '2026-03-01T12:00:00.000Z',
        updatedAt: '2026-03-01T13:00:00.000Z',
      });
    });

    it('applies the start/expiration rule', async () => {
      const { app } = createTestApp({}, clock);
      await create(app, { message: 'Picture Day', expires_at: '2026-03-02T00:00:00Z' });
      const res = await request(app)
        .put('/announcements/1')
        .query({ message: 'Picture Day', starts_at: '2026-03-04T00:00:00Z', expires_at: '2026-03-03T00:00:00Z' })
        .set('Authorization', bearer());
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Expiration must be after start date' });
    });

    it('validates the message on update', async () => {
      const { app } = createTestApp({}, clock);
      await create(app, { message: 'Picture Day', expires_at: '2026-03-02T00:00:00Z' });
      const res = await request(app)
        .put('/announcements/1')
        .query({ message: '  ', expires_at: '2026-03-02T00:00:00Z' })
        .set('Authorization', bearer());
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Message is required' });
    });

    it('returns 404 for an unknown id and 400 for a malformed one', async () => {
      const { app } = createTestApp({}, clock);
      const query = { message: 'Hello', expires_at: '2026-03-02T00:00:00Z' };

      const unknown = await request(app).put('/announcements/99').query(query).set('Authorization', bearer());
      expect(unknown.status).toBe(404);
      expect(unknown.body).toEqual({ detail: 'Announcement not found' });

      const malformed = await request(app).put('/announcements/abc').query(query).set('Authorization', bearer());
      expect(malformed.status).toBe(400);
      expect(malformed.body).toEqual({ detail: 'Invalid announcement id' });
    });
  });

  describe('DELETE /announcements/:id', () => {
    it('deletes once', async () => {
      const { app } = createTestApp({}, clock);
      await create(app, { message: 'Picture Day', expires_at: '2026-03-02T00:00:00Z' });

      const first = await request(app).delete('/announcements/1').set('Authorization', bearer());
      expect(first.status).toBe(200);
      expect(first.body).toEqual({ message: 'Announcement deleted' });

      const second = await request(app).delete('/announcements/1').set('Authorization', bearer());
      expect(second.status).toBe(404);
    });

    it('rejects a malformed id', async () => {
      const { app } = createTestApp({}, clock);
      const res = await request(app).delete('/announcements/abc').set('Authorization', bearer());
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ detail: 'Invalid announcement id' });
    });
  });
});
