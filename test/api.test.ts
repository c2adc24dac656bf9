/**
 * API Endpoint Tests
 *
 * Drives the Express app in-process against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { ApiServer } from '../src/server/express.js';
import { DatabaseManager } from '../src/storage/sqlite.js';
import { SqliteDocumentStore, type DocumentStore } from '../src/storage/document-store.js';
import type { StoredDocument } from '../src/types/index.js';

const EXPECTED_HASH = 'c638833f69bbfb3c267afa0a74434812436b8f08a81fd263c6be6871de4f1265'; // sha256("test-password")
const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

class FailingStore implements DocumentStore {
  createDocument(): string {
    throw new Error('disk I/O error');
  }

  getDocuments(): StoredDocument[] {
    throw new Error('disk I/O error');
  }

  listCollectionNames(): string[] {
    throw new Error('no such table: documents, while listing collections for the diagnostic report');
  }
}

function blogPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    title: 'Shipping faster',
    slug: 'shipping-faster',
    content: 'How we cut our release cycle in half.',
    author: 'Sam Writer',
    ...overrides,
  };
}

describe('API Endpoints', () => {
  let db: DatabaseManager;
  let store: SqliteDocumentStore;
  let app: Express;

  beforeEach(() => {
    db = new DatabaseManager({ path: ':memory:', verbose: false });
    db.initialize();
    store = new SqliteDocumentStore(db);
    app = new ApiServer({ store }, { databaseUrl: ':memory:' }).getApp();
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  describe('GET /', () => {
    it('returns the running message', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'SaaS Backend Running' });
    });
  });

  describe('GET /api/plans', () => {
    it('returns free, pro and team in order', async () => {
      const res = await request(app).get('/api/plans');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(3);
      expect(res.body.map((p: { id: string }) => p.id)).toEqual(['free', 'pro', 'team']);
    });

    it('highlights only the pro plan', async () => {
      const res = await request(app).get('/api/plans');

      const highlighted = res.body.map((p: { highlighted: boolean }) => p.highlighted);
      expect(highlighted).toEqual([false, true, false]);
      expect(res.body[1]).toEqual({
        id: 'pro',
        name: 'Pro',
        price: '$19',
        features: ['Unlimited projects', 'Advanced analytics', 'Priority support'],
        highlighted: true,
      });
    });
  });

  describe('POST /api/auth/signup', () => {
    it('stores the user with a password digest', async () => {
      const res = await request(app)
        .post('/api/auth/signup')
        .send({ name: 'Alex Example', email: 'alex@example.test', password: 'test-password' });

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
      expect(res.body.id).toMatch(UUID);

      const [user] = store.getDocuments('user', { email: 'alex@example.test' });
      expect(user._id).toBe(res.body.id);
      expect(user.name).toBe('Alex Example');
      expect(user.password_hash).toBe(EXPECTED_HASH);
      expect(user.password).toBeUndefined();
    });

    it('rejects a payload without a password', async () => {
      const res = await request(app)
        .post('/api/auth/signup')
        .send({ name: 'Alex Example', email: 'alex@example.test' });

      expect(res.status).toBe(422);
      expect(res.body.error).toBe('Validation failed');
      expect(res.body.details).toEqual([{ path: 'password', message: 'Required' }]);
      expect(store.getDocuments('user')).toHaveLength(0);
    });

    it('does not reject a duplicate email', async () => {
      const user = { name: 'Alex Example', email: 'alex@example.test', password: 'test-password' };
      await request(app).post('/api/auth/signup').send(user);
      const res = await request(app).post('/api/auth/signup').send(user);

      expect(res.status).toBe(200);
      expect(store.getDocuments('user')).toHaveLength(2);
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await request(app)
        .post('/api/auth/signup')
        .send({ name: 'Alex Example', email: 'alex@example.test', password: 'test-password' });
    });

    it('logs in with the right password', async () => {
      const res = await request(app)
        .post('/api/auth/login')
        .send({ email: 'alex@example.test', password: 'test-password' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true, message: 'Logged in' });
    });

    it('returns 401 for an unknown email', async () => {
      const res = await request(app)
        .post('/api/auth/login')
        .send({ email: 'nobody@example.test', password: 'test-password' });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid credentials' });
    });

    it('answers a wrong password exactly like an unknown email', async () => {
      const wrongPassword = await request(app)
        .post('/api/auth/login')
        .send({ email: 'alex@example.test', password: 'not-the-password' });
      const unknownEmail = await request(app)
        .post('/api/auth/login')
        .send({ email: 'nobody@example.test', password: 'not-the-password' });

      expect(wrongPassword.status).toBe(401);
      expect(wrongPassword.body).toEqual(unknownEmail.body);
    });

    it('rejects a non-string email', async () => {
      const res = await request(app)
        .post('/api/auth/login')
        .send({ email: 42, password: 'test-password' });

      expect(res.status).toBe(422);
      expect(res.body.details[0].path).toBe('email');
    });
  });

  describe('POST /api/blog and GET /api/blog', () => {
    it('lists a created post with its key exposed as id', async () => {
      const created = await request(app).post('/api/blog').send(blogPayload());
      expect(created.status).toBe(200);
      expect(created.body.ok).toBe(true);

      const res = await request(app).get('/api/blog');

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(1);
      const [post] = res.body;
      expect(post.id).toBe(created.body.id);
      expect(post._id).toBeUndefined();
      expect(post.title).toBe('Shipping faster');
      expect(post.excerpt).toBeNull();
      expect(post.tags).toEqual([]);
      expect(post.published).toBe(true);
      expect(post.created_at).toBe(post.updated_at);
    });

    it('keeps tags in order', async () => {
      await request(app).post('/api/blog').send(blogPayload({ tags: ['release', 'ci', 'devops'] }));

      const res = await request(app).get('/api/blog');

      expect(res.body[0].tags).toEqual(['release', 'ci', 'devops']);
    });

    it('omits unpublished posts', async () => {
      await request(app).post('/api/blog').send(blogPayload({ slug: 'draft', published: false }));
      await request(app).post('/api/blog').send(blogPayload({ slug: 'live' }));

      const res = await request(app).get('/api/blog');

      expect(res.body.map((p: { slug: string }) => p.slug)).toEqual(['live']);
    });

    it('returns at most limit posts, oldest first', async () => {
      for (const slug of ['first', 'second', 'third']) {
        await request(app).post('/api/blog').send(blogPayload({ slug }));
      }

      const res = await request(app).get('/api/blog?limit=2');

      expect(res.status).toBe(200);
      expect(res.body.map((p: { slug: string }) => p.slug)).toEqual(['first', 'second']);
    });

    it('defaults to 10 posts', async () => {
      for (let i = 0; i < 12; i++) {
        await request(app).post('/api/blog').send(blogPayload({ slug: `post-${i}` }));
      }

      const res = await request(app).get('/api/blog');

      expect(res.body).toHaveLength(10);
    });

    it('rejects a non-numeric limit', async () => {
      const res = await request(app).get('/api/blog?limit=abc');

      expect(res.status).toBe(422);
      expect(res.body.details[0].path).toBe('limit');
    });

    it('rejects a limit beyond the safe integer range', async () => {
      const res = await request(app).get('/api/blog?limit=100000000000000000000');

      expect(res.status).toBe(422);
      expect(res.body.details[0].path).toBe('limit');
    });

    it('accepts and lists a 150KB post', async () => {
      const content = 'x'.repeat(150_000);

      const created = await request(app).post('/api/blog').send(blogPayload({ content }));
      expect(created.status).toBe(200);

      const res = await request(app).get('/api/blog');
      expect(res.body[0].content).toHaveLength(150_000);
    });

    it('rejects a post without a slug', async () => {
      const res = await request(app).post('/api/blog').send(blogPayload({ slug: undefined }));

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ path: 'slug', message: 'Required' }]);
    });
  });

  describe('POST /api/contact', () => {
    it('stores the message and returns its id', async () => {
      const res = await request(app)
        .post('/api/contact')
        .send({ name: 'Robin Sender', email: 'robin@example.test', message: 'Do you offer annual billing?' });

      expect(res.status).toBe(200);
      expect(res.body.ok).toBe(true);
      expect(res.body.id).toMatch(UUID);

      const [stored] = store.getDocuments('contactmessage');
      expect(stored.message).toBe('Do you offer annual billing?');
    });

    it('rejects a submission without a message before storing anything', async () => {
      const res = await request(app)
        .post('/api/contact')
        .send({ name: 'Robin Sender', email: 'robin@example.test' });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ path: 'message', message: 'Required' }]);
      expect(store.getDocuments('contactmessage')).toHaveLength(0);
    });
  });

  describe('GET /test', () => {
    it('reports a working connection and the stored collections', async () => {
      await request(app).post('/api/contact').send({ name: 'a', email: 'b', message: 'c' });
      await request(app).post('/api/blog').send(blogPayload());

      const res = await request(app).get('/test');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        backend: '✅ Running',
        database: '✅ Connected & Working',
        database_url: '✅ Set',
        database_name: '❌ Not Set',
        connection_status: 'Connected',
        collections: ['blogpost', 'contactmessage'],
      });
    });

    it('reports a missing database', async () => {
      const bare = new ApiServer({ store: null }).getApp();

      const res = await request(bare).get('/test');

      expect(res.body).toEqual({
        backend: '✅ Running',
        database: '⚠️  Available but not initialized',
        database_url: '❌ Not Set',
        database_name: '❌ Not Set',
        connection_status: 'Not Connected',
        collections: [],
      });
    });

    it('truncates a listing error to 50 characters', async () => {
      const failing = new ApiServer({ store: new FailingStore() }, { databaseName: 'prod' }).getApp();

      const res = await request(failing).get('/test');

      expect(res.status).toBe(200);
      expect(res.body.database).toBe('⚠️  Connected but Error: no such table: documents, while listing collection');
      expect(res.body.connection_status).toBe('Connected');
      expect(res.body.database_name).toBe('✅ Set');
      expect(res.body.collections).toEqual([]);
    });
  });

  describe('persistence failures', () => {
    let failing: Express;

    beforeEach(() => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      failing = new ApiServer({ store: new FailingStore() }).getApp();
    });

    it('maps a signup write error to 500 with its message', async () => {
      const res = await request(failing)
        .post('/api/auth/signup')
        .send({ name: 'Alex Example', email: 'alex@example.test', password: 'test-password' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'disk I/O error' });
      expect(console.error).toHaveBeenCalledWith('Backend error:', 'disk I/O error');
    });

    it('maps a login read error to 500, not 401', async () => {
      const res = await request(failing)
        .post('/api/auth/login')
        .send({ email: 'alex@example.test', password: 'test-password' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'disk I/O error' });
    });

    it('maps a blog list error to 500', async () => {
      const res = await request(failing).get('/api/blog');

      expect(res.status).toBe(500);
    });

    it('reports 500 when no database is configured', async () => {
      const bare = new ApiServer({ store: null }).getApp();

      const res = await request(bare)
        .post('/api/contact')
        .send({ name: 'Robin Sender', email: 'robin@example.test', message: 'Hello' });

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Database not available' });
    });
  });

  describe('HTTP plumbing', () => {
    it('returns 404 for unknown routes', async () => {
      const res = await request(app).get('/api/nothing-here');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found' });
    });

    it('returns 400 for a malformed JSON body', async () => {
      const res = await request(app)
        .post('/api/contact')
        .set('Content-Type', 'application/json')
        .send('{"name": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Malformed JSON body' });
    });

    it('returns 413 for a body over the size limit', async () => {
      const res = await request(app)
        .post('/api/contact')
        .send({ name: 'Big', email: 'big@example.test', message: 'x'.repeat(1_100_000) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'request entity too large' });
      expect(store.getDocuments('contactmessage')).toEqual([]);
    });

    it('returns 415 for an unsupported charset', async () => {
      const res = await request(app)
        .post('/api/contact')
        .set('Content-Type', 'application/json; charset=utf-7')
        .send('{"name": "a"}');

      expect(res.status).toBe(415);
      expect(res.body).toEqual({ error: 'unsupported charset "UTF-7"' });
    });

    it('reflects any origin and allows credentials', async () => {
      const res = await request(app).get('/api/plans').set('Origin', 'https://landing.example.test');

      expect(res.headers['access-control-allow-origin']).toBe('https://landing.example.test');
      expect(res.headers['access-control-allow-credentials']).toBe('true');
    });
  });
});
