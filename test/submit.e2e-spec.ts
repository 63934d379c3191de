import * as fs from 'fs';
import request from 'supertest';
import { EnrichmentExecutor } from '../src/enrichment/enrichment.executor';
import { addUser, closeTestApp, createTestApp, login, TestApp } from './test-app';

const PNG = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.alloc(56, 1),
]);

describe('Public submission (e2e)', () => {
  let testApp: TestApp;

  const http = () => request(testApp.app.getHttpServer());

  const submit = () =>
    http()
      .post('/submit')
      .field('category', 'idea')
      .field('message', '  Please add more shade at the store  ')
      .field('anonymityConsent', 'on');

  beforeEach(async () => {
    testApp = await createTestApp({ RATE_LIMIT_MAX: '2', MAX_FILE_SIZE: String(1024 * 1024) });
  });

  afterEach(async () => {
    await closeTestApp(testApp);
  });

  it('accepts a submission and enriches it in the background', async () => {
    const response = await submit().expect(201);

    expect(response.body).toEqual({ submissionCode: expect.stringMatching(/^FB-\d{3}-\d{2}$/) });

    await testApp.app.get(EnrichmentExecutor).onIdle();

    expect(testApp.store.submissions).toHaveLength(1);
    expect(testApp.store.submissions[0]).toMatchObject({
      code: response.body.submissionCode,
      category: 'idea',
      message: 'Please add more shade at the store',
      status: 'new',
      enrichmentStatus: 'done',
      detectedLanguage: 'en',
      tags: 'Store',
    });
    expect(testApp.store.rateLimitEvents).toHaveLength(1);
  });

  it('requires consent', async () => {
    const response = await http()
      .post('/submit')
      .field('category', 'idea')
      .field('message', 'Hello')
      .expect(400);

    expect(response.body.message).toBe('Consent required');
    expect(testApp.store.rateLimitEvents).toHaveLength(0);
  });

  it('rejects an empty message', async () => {
    const response = await http()
      .post('/submit')
      .field('category', 'idea')
      .field('message', '   ')
      .field('anonymityConsent', 'on')
      .expect(400);

    expect(response.body.message).toBe('Message cannot be empty');
  });

  it('rate limits repeated submissions from one address', async () => {
    await submit().expect(201);
    await submit().expect(201);

    const response = await submit().expect(429);

    expect(response.body).toMatchObject({
      statusCode: 429,
      code: 'RATE_LIMITED',
      message: 'Too many submissions. Please try again later.',
    });
    expect(response.body.retryAfterSeconds).toBeGreaterThan(24 * 60 * 60 - 60);
    expect(response.body.retryAfterSeconds).toBeLessThanOrEqual(24 * 60 * 60);
    expect(testApp.store.submissions).toHaveLength(2);
  });

  it('stores a photo that admins can view', async () => {
    await submit().attach('photo', PNG, 'shade.png').expect(201);

    const { id, photoPath } = testApp.store.submissions[0];
    expect(photoPath).toMatch(/^\d{8}_\d{6}_[0-9a-f]{16}\.png$/);
    expect(fs.readdirSync(testApp.uploadDir)).toEqual([photoPath]);

    await addUser(testApp.store, 'ceo');
    const cookie = await login(testApp.app, 'ceo@example.com');

    const photo = await http().get(`/admin/feedback/${id}/photo`).set('Cookie', cookie).expect(200);
    expect(photo.headers['content-type']).toBe('image/png');
    expect(Buffer.compare(photo.body, PNG)).toBe(0);
  });

  it('rejects a file that is not an image', async () => {
    const response = await submit()
      .attach('photo', Buffer.from('this is plain text, not a picture'), 'fake.jpg')
      .expect(400);

    expect(response.body.message).toBe('Invalid image file. File signature check failed');
    expect(testApp.store.submissions).toHaveLength(0);
    expect(fs.readdirSync(testApp.uploadDir)).toEqual([]);
  });

  it('reports an oversized file as a bad request', async () => {
    const response = await submit()
      .attach('photo', Buffer.concat([PNG, Buffer.alloc(1024 * 1024)]), 'big.png')
      .expect(400);

    expect(response.body).toEqual({
      statusCode: 400,
      message: 'File too large (max 1MB)',
      error: 'Bad Request',
    });
    expect(testApp.store.submissions).toHaveLength(0);
  });
});
