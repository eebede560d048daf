import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import * as bcrypt from 'bcrypt';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';
import { IDENTITY_STORE } from './../src/auth/interfaces/identity.interface';
import { InMemoryIdentityStore } from './../src/auth/stores/in-memory-identity.store';
import { CLOCK, Clock } from './../src/common/clock';

describe('Access pipeline (e2e)', () => {
  const CLIENT_ID = 'e2e-client';
  let passwordHash: string;
  let app: INestApplication<App>;
  let identities: InMemoryIdentityStore;
  let now: number;
  let windowStart: number;

  beforeAll(() => {
    passwordHash = bcrypt.hashSync('test-password', 4);
  });

  beforeEach(async () => {
    // fixed windows are epoch aligned; start one second into the current minute
    windowStart = Math.floor(Date.now() / 60_000) * 60_000;
    now = windowStart + 1000;
    const clock: Clock = { now: () => now };

    identities = new InMemoryIdentityStore(clock);
    identities.add({
      id: 1,
      email: 'admin@example.com',
      userName: 'admin',
      displayName: 'Admin',
      passwordHash,
      roles: ['Admin'],
    });
    identities.add({
      id: 2,
      email: 'member@example.com',
      userName: 'member',
      passwordHash,
      roles: ['User'],
    });

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(IDENTITY_STORE)
      .useValue(identities)
      .compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function login(email: string): Promise<{ token: string; refreshToken: string }> {
    const res = await request(app.getHttpServer())
      .post('/api/auth/login')
      .send({ email, password: 'test-password' })
      .expect(200);
    return res.body.data;
  }

  function profile(token: string, forwardedFor = '203.0.113.5') {
    return request(app.getHttpServer())
      .get('/api/account/profile')
      .set('Authorization', `Bearer ${token}`)
      .set('X-ClientId', CLIENT_ID)
      .set('X-Forwarded-For', forwardedFor);
  }

  describe('exempt paths', () => {
    it('serves health checks without client headers', async () => {
      const res = await request(app.getHttpServer()).get('/health').expect(200);

      expect(res.body.status).toBe('healthy');
      expect(res.headers['x-correlation-id']).toBeDefined();
      expect(res.headers['x-ratelimit-limit']).toBeUndefined();
    });

    it('echoes a supplied correlation id', async () => {
      const res = await request(app.getHttpServer())
        .get('/health')
        .set('X-Correlation-Id', 'trace-123')
        .expect(200);

      expect(res.headers['x-correlation-id']).toBe('trace-123');
    });
  });

  describe('client fingerprint', () => {
    it('rejects a request without X-ClientId before rate limiting', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/account/profile')
        .expect(400);

      expect(res.body).toEqual({
        status: false,
        message: 'Unable to verify request sender.',
      });
      expect(res.headers['x-ratelimit-limit']).toBeUndefined();
    });

    it('rejects a forwarded header whose first entry is blank', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/account/profile')
        .set('X-ClientId', CLIENT_ID)
        .set('X-Forwarded-For', ' , 10.0.0.1')
        .expect(400);

      expect(res.body).toEqual({
        status: false,
        message: 'Unable to verify request origin.',
      });
      expect(res.headers['x-ratelimit-limit']).toBeUndefined();
    });

    it('counts rejections in the metrics', async () => {
      await request(app.getHttpServer()).get('/api/account/profile').expect(400);

      const res = await request(app.getHttpServer()).get('/metrics').expect(200);
      expect(res.text).toContain(
        'gateway_rejections_total{reason="missing_client_id"} 1',
      );
    });
  });

  describe('authentication', () => {
    it('logs in with valid credentials', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: ' Member@Example.com ', password: 'test-password' })
        .expect(200);

      expect(res.body.status).toBe(true);
      expect(res.body.message).toBe('Login successful');
      expect(res.body.data.user).toEqual({
        id: '2',
        userName: 'member',
        email: 'member@example.com',
        roles: ['User'],
      });
      expect(res.body.data.expires).toBe(Math.floor(now / 1000) + 15 * 60);
    });

    it('rejects bad credentials', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'member@example.com', password: 'wrong-password' })
        .expect(400);

      expect(res.body).toEqual({
        status: false,
        message: 'Invalid email or password',
      });
    });

    it('validates the login payload', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/auth/login')
        .send({ email: 'not-an-email', password: 'short' })
        .expect(400);

      expect(res.body.status).toBe(false);
      expect(res.body.message).toBe('Validation failed');
      expect(res.body.errors).toEqual(
        expect.arrayContaining([
          'Invalid email format',
          'Password must be at least 8 characters',
        ]),
      );
    });

    it('rotates refresh tokens behind the client headers', async () => {
      const session = await login('member@example.com');

      await request(app.getHttpServer())
        .post('/api/auth/refresh-token')
        .send({ refreshToken: session.refreshToken })
        .expect(400);

      const res = await request(app.getHttpServer())
        .post('/api/auth/refresh-token')
        .set('X-ClientId', CLIENT_ID)
        .send({ refreshToken: session.refreshToken })
        .expect(200);

      expect(res.body.message).toBe('Token refreshed successfully');
      expect(res.body.data.refreshToken).not.toBe(session.refreshToken);
    });
  });

  describe('role authorization', () => {
    it('admits a live role match and returns the live profile', async () => {
      const { token } = await login('member@example.com');

      const res = await profile(token).expect(200);

      expect(res.body).toEqual({
        status: true,
        message: 'Profile retrieved',
        data: {
          id: '2',
          userName: 'member',
          email: 'member@example.com',
          roles: ['User'],
        },
      });
    });

    it('rejects a request without a bearer token', async () => {
      const res = await request(app.getHttpServer())
        .get('/api/account/profile')
        .set('X-ClientId', CLIENT_ID)
        .expect(401);

      expect(res.body).toEqual({
        status: false,
        message: 'Invalid or missing authentication token',
      });
    });

    it('rejects a token signed with another secret', async () => {
      const { token } = await login('member@example.com');
      const [header, payload] = token.split('.');

      const res = await profile(`${header}.${payload}.forged-signature`).expect(401);
      expect(res.body.message).toBe('Invalid or missing authentication token');
    });

    it('answers 403 with an empty body when the role is missing', async () => {
      const { token } = await login('member@example.com');

      const res = await request(app.getHttpServer())
        .get('/api/admin/rate-limits')
        .set('Authorization', `Bearer ${token}`)
        .set('X-ClientId', CLIENT_ID)
        .expect(403);

      expect(res.text).toBe('');
    });

    it('lets an admin read the rate limit policies', async () => {
      const { token } = await login('admin@example.com');

      const res = await request(app.getHttpServer())
        .get('/api/admin/rate-limits')
        .set('Authorization', `Bearer ${token}`)
        .set('X-ClientId', CLIENT_ID)
        .set('X-Forwarded-For', '198.51.100.20')
        .expect(200);

      expect(res.body.data).toEqual([
        expect.objectContaining({ name: 'ip', rules: ['100/1m'], trackedKeys: 1 }),
        expect.objectContaining({ name: 'client', rules: ['5/1m'], trackedKeys: 1 }),
      ]);
    });

    it('lets an admin clear the counters', async () => {
      const member = await login('member@example.com');
      for (let i = 0; i < 5; i++) {
        await profile(member.token).expect(200);
      }
      await profile(member.token).expect(429);

      const { token } = await login('admin@example.com');
      const res = await request(app.getHttpServer())
        .delete('/api/admin/rate-limits')
        .set('Authorization', `Bearer ${token}`)
        .set('X-ClientId', 'admin-console')
        .set('X-Forwarded-For', '198.51.100.20')
        .expect(200);

      expect(res.body.message).toBe('Rate limit counters cleared');
      await profile(member.token).expect(200);
    });

    it('rejects a locked account even though its token carries a matching role', async () => {
      const { token } = await login('member@example.com');
      identities.lockUntil('2', new Date(now + 60 * 60 * 1000));

      const res = await profile(token).expect(401);
      expect(res.body.message).toBe('User account is locked. Please contact support.');
    });

    it('rejects a token whose subject no longer exists', async () => {
      const { token } = await login('member@example.com');
      identities.remove('2');

      const res = await profile(token).expect(401);
      expect(res.body.message).toBe('User account not found. Please login again.');
    });

    it('follows role changes without a new token', async () => {
      const { token } = await login('member@example.com');
      identities.setRoles('2', ['Guest']);

      await profile(token).expect(403);
    });
  });

  describe('rate limiting', () => {
    it('sets quota headers for the tightest rule', async () => {
      const { token } = await login('member@example.com');

      const res = await profile(token).expect(200);

      expect(res.headers['x-ratelimit-limit']).toBe('5');
      expect(res.headers['x-ratelimit-remaining']).toBe('4');
      expect(res.headers['x-ratelimit-reset']).toBe(
        String((windowStart + 60_000) / 1000),
      );
    });

    it('throttles the sixth request in a window and admits the next window', async () => {
      const { token } = await login('member@example.com');
      for (let i = 0; i < 5; i++) {
        await profile(token).expect(200);
      }

      const throttled = await profile(token).expect(429);
      expect(throttled.body).toEqual({
        status: false,
        message: 'API calls quota exceeded! maximum admitted 5 per 1m.',
      });
      expect(throttled.headers['retry-after']).toBe('59');

      now = windowStart + 60_000;
      await profile(token).expect(200);
    });

    it('keys clients by the first forwarded address', async () => {
      const { token } = await login('member@example.com');
      for (let i = 0; i < 5; i++) {
        await profile(token, '203.0.113.5, 10.0.0.1').expect(200);
      }

      await profile(token, '203.0.113.5').expect(429);
      await profile(token, '203.0.113.6').expect(200);
    });

    it('throttles before authorization runs', async () => {
      const { token } = await login('member@example.com');
      for (let i = 0; i < 5; i++) {
        await profile(token).expect(200);
      }
      identities.remove('2');

      await profile(token).expect(429);
    });
  });
});
