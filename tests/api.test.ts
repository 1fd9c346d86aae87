import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import { Application } from 'express';
import { createApp } from '../src/app';
import { User } from '../src/types/user.types';
import { TestDatabase, createTestDatabase } from './utils/test-db';
import { TEST_PASSWORD, bearer, createTestUser } from './utils/fixtures';

describe('Advertisement API', () => {
  let testDb: TestDatabase;
  let app: Application;
  let alice: User;
  let bob: User;
  let admin: User;

  beforeEach(async () => {
    testDb = createTestDatabase();
    app = createApp(testDb.pool);
    alice = await createTestUser(testDb.pool, 'alice');
    bob = await createTestUser(testDb.pool, 'bob');
    admin = await createTestUser(testDb.pool, 'admin', 'admin');
  });

  afterEach(async () => {
    await testDb.close();
  });

  async function postAd(
    owner: User,
    body: { title: string; description: string; price: number }
  ): Promise<number> {
    const response = await request(app)
      .post('/advertisement')
      .set('Authorization', bearer(owner))
      .send(body);

    expect(response.status).toBe(201);
    return response.body.id;
  }

  describe('service endpoints', () => {
    it('GET / describes the service', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body.service).toBe('Advertisement Service');
      expect(response.body.status).toBe('running');
    });

    it('GET /health reports a connected database', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.database).toBe('connected');
    });

    it('unknown routes return 404', async () => {
      const response = await request(app).get('/nowhere');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'NotFoundError',
        message: 'Route not found: GET /nowhere',
        statusCode: 404,
      });
    });

    it('malformed JSON returns 400', async () => {
      const response = await request(app)
        .post('/login')
        .set('Content-Type', 'application/json')
        .send('{"username": ');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('SyntaxError');
    });

    it('oversized bodies return 413', async () => {
      const response = await request(app)
        .post('/user')
        .send({ username: 'big', email: 'big@example.com', password: 'x'.repeat(1100000) });

      expect(response.status).toBe(413);
      expect(response.body.error).toBe('PayloadTooLargeError');
    });
  });

  describe('POST /login', () => {
    it('issues a token for valid credentials', async () => {
      const response = await request(app)
        .post('/login')
        .send({ username: 'alice', password: TEST_PASSWORD });

      expect(response.status).toBe(200);
      expect(response.body.token_type).toBe('bearer');
      expect(response.body.expires_in).toBe(172800);

      const me = await request(app)
        .patch(`/user/${alice.id}`)
        .set('Authorization', `Bearer ${response.body.access_token}`)
        .send({ email: 'alice2@example.com' });
      expect(me.status).toBe(200);
    });

    it('rejects a wrong password with 401', async () => {
      const response = await request(app)
        .post('/login')
        .send({ username: 'alice', password: 'wrong-password' });

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Incorrect username or password');
    });

    it('rejects a missing password with 400', async () => {
      const response = await request(app).post('/login').send({ username: 'alice' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('"password" is required');
    });
  });

  describe('users', () => {
    it('registers a user without exposing the password hash', async () => {
      const response = await request(app)
        .post('/user')
        .send({ username: 'carol', email: 'carol@example.com', password: 'carol-pass' });

      expect(response.status).toBe(201);
      expect(response.body.username).toBe('carol');
      expect(response.body.role).toBe('user');
      expect(Object.keys(response.body).sort()).toEqual([
        'created_at',
        'email',
        'id',
        'role',
        'username',
      ]);
    });

    it('rejects duplicate usernames and emails', async () => {
      const byName = await request(app)
        .post('/user')
        .send({ username: 'alice', email: 'other@example.com', password: 'secret-pass' });
      expect(byName.status).toBe(400);
      expect(byName.body.message).toBe('Username already registered');

      const byEmail = await request(app)
        .post('/user')
        .send({ username: 'alice2', email: 'alice@example.com', password: 'secret-pass' });
      expect(byEmail.status).toBe(400);
      expect(byEmail.body.message).toBe('Email already registered');
    });

    it('rejects invalid registration bodies', async () => {
      const response = await request(app)
        .post('/user')
        .send({ username: 'al', email: 'not-an-email', password: 'secret-pass' });

      expect(response.status).toBe(400);
    });

    it('only lets administrators create administrators', async () => {
      const body = { username: 'boss', email: 'boss@example.com', password: 'boss-pass', role: 'admin' };

      const anonymous = await request(app).post('/user').send(body);
      expect(anonymous.status).toBe(403);
      expect(anonymous.body.message).toBe('Only administrators can assign the admin role');

      const byUser = await request(app).post('/user').set('Authorization', bearer(alice)).send(body);
      expect(byUser.status).toBe(403);

      const byAdmin = await request(app).post('/user').set('Authorization', bearer(admin)).send(body);
      expect(byAdmin.status).toBe(201);
      expect(byAdmin.body.role).toBe('admin');
    });

    it('reads users publicly', async () => {
      const found = await request(app).get(`/user/${bob.id}`);
      expect(found.status).toBe(200);
      expect(found.body.username).toBe('bob');

      const missing = await request(app).get('/user/999');
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('User not found');

      const invalid = await request(app).get('/user/abc');
      expect(invalid.status).toBe(400);
      expect(invalid.body.message).toBe('id must be a positive integer');
    });

    it('rejects ids beyond the integer column range with 400', async () => {
      const user = await request(app).get('/user/3000000000');
      expect(user.status).toBe(400);
      expect(user.body.message).toBe('id must be a positive integer');

      const ad = await request(app).get('/advertisement/2147483648');
      expect(ad.status).toBe(400);
      expect(ad.body.message).toBe('id must be a positive integer');

      const largest = await request(app).get('/user/2147483647');
      expect(largest.status).toBe(404);
    });

    it('lets users update themselves only', async () => {
      const self = await request(app)
        .patch(`/user/${alice.id}`)
        .set('Authorization', bearer(alice))
        .send({ username: 'alice_new' });
      expect(self.status).toBe(200);
      expect(self.body.username).toBe('alice_new');

      const other = await request(app)
        .patch(`/user/${bob.id}`)
        .set('Authorization', bearer(alice))
        .send({ username: 'hijacked' });
      expect(other.status).toBe(403);
      expect(other.body.message).toBe('Not enough permissions to update this user');

      const anonymous = await request(app).patch(`/user/${bob.id}`).send({ username: 'x_anon' });
      expect(anonymous.status).toBe(401);
    });

    it('rejects taking over another username', async () => {
      const response = await request(app)
        .patch(`/user/${alice.id}`)
        .set('Authorization', bearer(alice))
        .send({ username: 'bob' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Username already registered');
    });

    it('lets administrators update and delete anyone', async () => {
      const updated = await request(app)
        .patch(`/user/${bob.id}`)
        .set('Authorization', bearer(admin))
        .send({ email: 'bob2@example.com' });
      expect(updated.status).toBe(200);
      expect(updated.body.email).toBe('bob2@example.com');

      const deleted = await request(app)
        .delete(`/user/${bob.id}`)
        .set('Authorization', bearer(admin));
      expect(deleted.status).toBe(200);
      expect(deleted.body).toEqual({ message: 'User deleted successfully' });
    });

    it('returns 404 when an administrator deletes a missing user', async () => {
      const response = await request(app).delete('/user/999').set('Authorization', bearer(admin));

      expect(response.status).toBe(404);
    });

    it('removes the advertisements of a deleted user', async () => {
      const adId = await postAd(bob, { title: 'Kayak', description: 'Two seats', price: 300 });

      const forbidden = await request(app)
        .delete(`/user/${bob.id}`)
        .set('Authorization', bearer(alice));
      expect(forbidden.status).toBe(403);

      const deleted = await request(app)
        .delete(`/user/${bob.id}`)
        .set('Authorization', bearer(bob));
      expect(deleted.status).toBe(200);

      expect((await request(app).get(`/advertisement/${adId}`)).status).toBe(404);
      expect((await request(app).get(`/user/${bob.id}`)).status).toBe(404);
    });
  });

  describe('advertisements', () => {
    it('requires authentication to create', async () => {
      const response = await request(app)
        .post('/advertisement')
        .send({ title: 'Lamp', description: 'Desk lamp', price: 15 });

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Authentication required');
    });

    it('creates an advertisement owned by the caller', async () => {
      const response = await request(app)
        .post('/advertisement')
        .set('Authorization', bearer(alice))
        .send({ title: 'Lamp', description: 'Desk lamp', price: 15 });

      expect(response.status).toBe(201);
      expect(response.body.owner_id).toBe(alice.id);
      expect(response.body.price).toBe(15);
    });

    it('validates the body', async () => {
      const response = await request(app)
        .post('/advertisement')
        .set('Authorization', bearer(alice))
        .send({ title: 'Lamp', description: 'Desk lamp', price: -1 });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('"price" must be a positive number');
    });

    it('reads advertisements publicly', async () => {
      const id = await postAd(alice, { title: 'Lamp', description: 'Desk lamp', price: 15 });

      const found = await request(app).get(`/advertisement/${id}`);
      expect(found.status).toBe(200);
      expect(found.body.title).toBe('Lamp');

      const missing = await request(app).get('/advertisement/999');
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Advertisement not found');
    });

    it('lets only the owner or an administrator change an advertisement', async () => {
      const id = await postAd(alice, { title: 'Lamp', description: 'Desk lamp', price: 15 });

      const byOwner = await request(app)
        .patch(`/advertisement/${id}`)
        .set('Authorization', bearer(alice))
        .send({ price: 12 });
      expect(byOwner.status).toBe(200);
      expect(byOwner.body.price).toBe(12);

      const byOther = await request(app)
        .patch(`/advertisement/${id}`)
        .set('Authorization', bearer(bob))
        .send({ price: 1 });
      expect(byOther.status).toBe(403);
      expect(byOther.body.message).toBe('Not enough permissions to update this advertisement');

      const anonymous = await request(app).patch(`/advertisement/${id}`).send({ price: 1 });
      expect(anonymous.status).toBe(401);

      const deleteByOther = await request(app)
        .delete(`/advertisement/${id}`)
        .set('Authorization', bearer(bob));
      expect(deleteByOther.status).toBe(403);
      expect(deleteByOther.body.message).toBe(
        'Not enough permissions to delete this advertisement'
      );

      const byAdmin = await request(app)
        .delete(`/advertisement/${id}`)
        .set('Authorization', bearer(admin));
      expect(byAdmin.status).toBe(200);
      expect(byAdmin.body).toEqual({ message: 'Advertisement deleted successfully' });

      const gone = await request(app)
        .delete(`/advertisement/${id}`)
        .set('Authorization', bearer(admin));
      expect(gone.status).toBe(404);
    });

    describe('search', () => {
      beforeEach(async () => {
        await postAd(alice, { title: 'Mountain bike', description: 'Full suspension', price: 250 });
        await postAd(bob, { title: 'Bike helmet', description: 'Size M', price: 30 });
        await postAd(alice, { title: 'Sofa', description: 'Green velvet', price: 120 });
      });

      it('filters by title and price', async () => {
        const response = await request(app)
          .get('/advertisement')
          .query({ title: 'bike', min_price: 100 });

        expect(response.status).toBe(200);
        expect(response.body.map((ad: { title: string }) => ad.title)).toEqual(['Mountain bike']);
      });

      it('sets the offset header while more pages remain', async () => {
        const first = await request(app).get('/advertisement').query({ limit: 2 });

        expect(first.status).toBe(200);
        expect(first.body).toHaveLength(2);
        expect(first.headers.offset).toBe('2');

        const second = await request(app).get('/advertisement').query({ limit: 2, offset: 2 });

        expect(second.body.map((ad: { title: string }) => ad.title)).toEqual(['Sofa']);
        expect(second.headers.offset).toBeUndefined();
      });

      it('rejects min_price above max_price', async () => {
        const response = await request(app)
          .get('/advertisement')
          .query({ min_price: 200, max_price: 100 });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe('min_price must not be greater than max_price');
      });

      it('rejects non-numeric prices', async () => {
        const response = await request(app).get('/advertisement').query({ min_price: 'cheap' });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe('"min_price" must be a number');
      });
    });
  });

  describe('token handling', () => {
    it('keeps identifying a user after they change their username', async () => {
      const token = bearer(alice);

      const renamed = await request(app)
        .patch(`/user/${alice.id}`)
        .set('Authorization', token)
        .send({ username: 'alice_new' });
      expect(renamed.status).toBe(200);

      const adId = await postAd(alice, { title: 'Lamp', description: 'Desk lamp', price: 15 });
      const response = await request(app)
        .patch(`/advertisement/${adId}`)
        .set('Authorization', token)
        .send({ price: 12 });

      expect(response.status).toBe(200);
      expect(response.body.owner_id).toBe(alice.id);
    });

    it('does not hand an old token to whoever takes over the username', async () => {
      const token = bearer(alice);

      await request(app)
        .patch(`/user/${alice.id}`)
        .set('Authorization', token)
        .send({ username: 'alice_new' });

      const mallory = await request(app)
        .post('/user')
        .send({ username: 'alice', email: 'mallory@example.com', password: 'mallory-pass' });
      expect(mallory.status).toBe(201);

      const hijack = await request(app)
        .patch(`/user/${mallory.body.id}`)
        .set('Authorization', token)
        .send({ email: 'owned@example.com' });
      expect(hijack.status).toBe(403);

      const unchanged = await request(app).get(`/user/${mallory.body.id}`);
      expect(unchanged.body.email).toBe('mallory@example.com');
    });

    it('treats an invalid token as anonymous', async () => {
      const read = await request(app)
        .get(`/user/${alice.id}`)
        .set('Authorization', 'Bearer not-a-token');
      expect(read.status).toBe(200);

      const write = await request(app)
        .post('/advertisement')
        .set('Authorization', 'Bearer not-a-token')
        .send({ title: 'Lamp', description: 'Desk lamp', price: 15 });
      expect(write.status).toBe(401);
    });

    it('treats an expired token as anonymous', async () => {
      const expired = jwt.sign(
        {
          sub: 'alice',
          user_id: alice.id,
          role: 'user',
          exp: Math.floor(Date.now() / 1000) - 60,
        },
        'test-secret'
      );

      const response = await request(app)
        .post('/advertisement')
        .set('Authorization', `Bearer ${expired}`)
        .send({ title: 'Lamp', description: 'Desk lamp', price: 15 });

      expect(response.status).toBe(401);
    });

    it("ignores a deleted user's token", async () => {
      const token = bearer(bob);
      await request(app).delete(`/user/${bob.id}`).set('Authorization', bearer(admin));

      const response = await request(app)
        .post('/advertisement')
        .set('Authorization', token)
        .send({ title: 'Lamp', description: 'Desk lamp', price: 15 });

      expect(response.status).toBe(401);
    });
  });
});
