import { JwtService } from '@nestjs/jwt';
import request from 'supertest';
import { TEST_SECRET_KEY } from '../src/test-utils/test-config';
import { addUser, closeTestApp, createTestApp, login, sessionCookie, TestApp, TEST_PASSWORD } from './test-app';

describe('Admin dashboard (e2e)', () => {
  let testApp: TestApp;
  let adminCookie: string;
  let founderCookie: string;

  const http = () => request(testApp.app.getHttpServer());
  const jwt = new JwtService({});

  beforeEach(async () => {
    testApp = await createTestApp();
    await addUser(testApp.store, 'admin');
    await addUser(testApp.store, 'founder');
    await addUser(testApp.store, 'ceo', { isActive: false });

    testApp.store.seedSubmission({ id: 1, status: 'new', message: 'Broken fridge', createdAt: new Date('2025-01-01T10:00:00Z') });
    testApp.store.seedSubmission({ id: 2, status: 'new', message: 'More shifts', createdAt: new Date('2025-01-02T10:00:00Z') });
    testApp.store.seedSubmission({ id: 3, status: 'read', message: 'Late pay', createdAt: new Date('2025-01-03T10:00:00Z') });

    adminCookie = await login(testApp.app, 'admin@example.com');
    founderCookie = await login(testApp.app, 'founder@example.com');
  });

  afterEach(async () => {
    await closeTestApp(testApp);
  });

  describe('sessions', () => {
    it('redirects to login without a cookie', async () => {
      const response = await http().get('/admin/inbox').expect(302);

      expect(response.headers.location).toBe('/admin/login?error=no_token');
    });

    it('redirects and clears a malformed cookie', async () => {
      const response = await http().get('/admin/inbox').set('Cookie', 'access_token=garbage').expect(302);

      expect(response.headers.location).toBe('/admin/login?error=invalid_token');
      expect(response.get('Set-Cookie')?.[0]).toMatch(/^access_token=; Path=\/; Expires=Thu, 01 Jan 1970/);
    });

    it('redirects an expired session', async () => {
      const token = jwt.sign({ sub: '1', role: 'admin' }, { secret: TEST_SECRET_KEY, expiresIn: -10 });

      const response = await http().get('/admin/inbox').set('Cookie', `access_token=${token}`).expect(302);

      expect(response.headers.location).toBe('/admin/login?error=token_expired');
    });

    it('rejects a token signed with another key', async () => {
      const token = jwt.sign({ sub: '1', role: 'admin' }, { secret: 'another-secret-another-secret-12345', expiresIn: 60 });

      const response = await http().get('/admin/inbox').set('Cookie', `access_token=${token}`).expect(302);

      expect(response.headers.location).toBe('/admin/login?error=invalid_token');
    });

    it('redirects a deactivated user', async () => {
      const token = jwt.sign({ sub: '3', role: 'ceo' }, { secret: TEST_SECRET_KEY, expiresIn: 60 });

      const response = await http().get('/admin/inbox').set('Cookie', `access_token=${token}`).expect(302);

      expect(response.headers.location).toBe('/admin/login?error=user_inactive');
    });

    it('logs in and reports the current user', async () => {
      const loginResponse = await http()
        .post('/admin/login')
        .send({ email: ' Founder@Example.com ', password: TEST_PASSWORD })
        .expect(200);

      expect(loginResponse.body).toMatchObject({ ok: true, user: { id: 2, email: 'founder@example.com', role: 'founder' } });
      expect(loginResponse.body.user).not.toHaveProperty('passwordHash');
      expect(loginResponse.get('Set-Cookie')?.[0]).toContain('HttpOnly');

      const me = await http().get('/admin/me').set('Cookie', sessionCookie(loginResponse)).expect(200);
      expect(me.body).toEqual({ user: { userId: 2, email: 'founder@example.com', name: 'founder', role: 'founder' } });
    });

    it('rejects bad credentials and inactive accounts alike', async () => {
      const wrong = await http().post('/admin/login').send({ email: 'admin@example.com', password: 'wrong-password' }).expect(401);
      expect(wrong.body.message).toBe('Invalid email or password');

      const inactive = await http().post('/admin/login').send({ email: 'ceo@example.com', password: TEST_PASSWORD }).expect(401);
      expect(inactive.body.message).toBe('Invalid email or password');
    });

    it('logs out', async () => {
      const response = await http().get('/admin/logout').set('Cookie', adminCookie).expect(302);

      expect(response.headers.location).toBe('/admin/login');
      expect(response.get('Set-Cookie')?.[0]).toMatch(/^access_token=;/);
    });

    it('explains login errors', async () => {
      const response = await http().get('/admin/login?error=token_expired').expect(200);

      expect(response.body).toEqual({
        error: 'token_expired',
        message: 'Your session has expired. Please log in again',
      });
    });
  });

  describe('inbox', () => {
    it('filters and pages', async () => {
      const response = await http().get('/admin/inbox?status=new&perPage=1').set('Cookie', founderCookie).expect(200);

      expect(response.body.data.map((row: { id: number }) => row.id)).toEqual([2]);
      expect(response.body.pagination).toEqual({ page: 1, perPage: 1, total: 2, totalPages: 2 });
      expect(response.body.stats).toEqual({ total: 3, new: 2, read: 1, in_progress: 0, resolved: 0, rejected: 0 });
    });

    it('treats empty filters as absent', async () => {
      const response = await http().get('/admin/inbox?status=&category=&search=').set('Cookie', founderCookie).expect(200);

      expect(response.body.pagination.total).toBe(3);
    });

    it('rejects an unknown status filter', async () => {
      const response = await http().get('/admin/inbox?status=archived').set('Cookie', founderCookie).expect(400);

      expect(response.body.message).toEqual(['Invalid status']);
    });

    it('marks a submission read when opened', async () => {
      const response = await http().get('/admin/feedback/1').set('Cookie', founderCookie).expect(200);

      expect(response.body).toMatchObject({ id: 1, status: 'read', enrichment: { status: 'pending' } });
      expect(testApp.store.findSubmission(1)?.status).toBe('read');
    });

    it('returns 404 for unknown submissions', async () => {
      const response = await http().get('/admin/feedback/99').set('Cookie', founderCookie).expect(404);

      expect(response.body.message).toBe('Feedback not found');
    });
  });

  describe('triage', () => {
    it('rejects the whole bulk update on a malformed id', async () => {
      const response = await http()
        .post('/api/feedback/bulk-status')
        .set('Cookie', founderCookie)
        .send({ ids: ['1', 'abc'], status: 'resolved' })
        .expect(400);

      expect(response.body.message).toBe('Invalid ID format');
      expect(testApp.store.submissions.map((row) => row.status)).toEqual(['new', 'new', 'read']);
    });

    it('rejects a bulk update with an unknown status', async () => {
      const response = await http()
        .post('/api/feedback/bulk-status')
        .set('Cookie', founderCookie)
        .send({ ids: [1], status: 'archived' })
        .expect(400);

      expect(response.body.message).toBe('Invalid status');
    });

    it('applies a bulk update', async () => {
      const response = await http()
        .post('/api/feedback/bulk-status')
        .set('Cookie', founderCookie)
        .send({ ids: [1, '2'], status: 'resolved' })
        .expect(200);

      expect(response.body).toEqual({ ok: true, count: 2 });
      expect(testApp.store.submissions.map((row) => row.status)).toEqual(['resolved', 'resolved', 'read']);
    });

    it('updates status and note', async () => {
      await http().post('/api/feedback/1/status').set('Cookie', founderCookie).send({ status: 'in_progress' }).expect(200);
      await http().post('/api/feedback/1/note').set('Cookie', founderCookie).send({ note: 'Ask facilities' }).expect(200);

      expect(testApp.store.findSubmission(1)).toMatchObject({ status: 'in_progress', privateNote: 'Ask facilities' });
    });

    it('restricts deletion to admins', async () => {
      const denied = await http().post('/api/feedback/1/delete').set('Cookie', founderCookie).expect(403);
      expect(denied.body.message).toBe('Access denied. Required role: admin');
      expect(testApp.store.findSubmission(1)?.isDeleted).toBe(false);

      await http().post('/api/feedback/1/delete').set('Cookie', adminCookie).expect(200, { ok: true });
      expect(testApp.store.findSubmission(1)?.isDeleted).toBe(true);
    });

    it('reprocesses only failed enrichments', async () => {
      const response = await http().post('/api/feedback/1/reprocess').set('Cookie', adminCookie).expect(409);

      expect(response.body.message).toBe('Only failed enrichments can be reprocessed (current: pending)');
    });
  });

  describe('reports', () => {
    it('exports CSV as an attachment', async () => {
      const response = await http().get('/admin/export').set('Cookie', founderCookie).expect(200);

      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toMatch(/^attachment; filename="feedback_export_\d{8}_\d{6}\.csv"$/);
    });

    it('returns analytics', async () => {
      const response = await http().get('/admin/analytics').set('Cookie', founderCookie).expect(200);

      expect(response.body.byStatus).toEqual([
        { status: 'new', count: 2 },
        { status: 'read', count: 1 },
      ]);
    });

    it('shows rate-limit stats to admins only', async () => {
      await http().get('/admin/rate-limits/stats').set('Cookie', founderCookie).expect(403);

      const response = await http().get('/admin/rate-limits/stats').set('Cookie', adminCookie).expect(200);
      expect(response.body).toMatchObject({ totalEvents: 0, maxSubmissions: 10, windowHours: 24 });
    });
  });

  describe('users', () => {
    it('is limited to admins', async () => {
      await http().get('/admin/users').set('Cookie', founderCookie).expect(403);

      const response = await http().get('/admin/users').set('Cookie', adminCookie).expect(200);
      expect(response.body.data).toHaveLength(3);
    });

    it('creates a user', async () => {
      const response = await http()
        .post('/api/users')
        .set('Cookie', adminCookie)
        .send({ email: 'New.CEO@example.com', name: 'New CEO', password: TEST_PASSWORD, role: 'ceo' })
        .expect(201);

      expect(response.body).toMatchObject({ ok: true, user: { id: 4, email: 'new.ceo@example.com', role: 'ceo' } });
    });

    it('validates new users', async () => {
      const response = await http()
        .post('/api/users')
        .set('Cookie', adminCookie)
        .send({ email: 'x@example.com', name: 'X', password: 'short', role: 'ceo' })
        .expect(400);

      expect(response.body.message).toEqual(['Password must be at least 10 characters']);
    });

    it('rejects a duplicate email', async () => {
      await http()
        .post('/api/users')
        .set('Cookie', adminCookie)
        .send({ email: 'founder@example.com', name: 'Again', password: TEST_PASSWORD, role: 'ceo' })
        .expect(409);
    });

    it('does not let admins deactivate themselves', async () => {
      const response = await http().post('/api/users/1/toggle').set('Cookie', adminCookie).expect(400);

      expect(response.body.message).toBe('You cannot deactivate your own account');
    });

    it('deactivates another user and ends their session', async () => {
      await http().post('/api/users/2/toggle').set('Cookie', adminCookie).expect(200, { ok: true, isActive: false });

      const response = await http().get('/admin/inbox').set('Cookie', founderCookie).expect(302);
      expect(response.headers.location).toBe('/admin/login?error=user_inactive');
    });
  });
});
