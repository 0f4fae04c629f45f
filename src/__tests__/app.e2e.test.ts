import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { createApp } from '../app';
import type { AppDependencies } from '../app';
import { PasswordHasher } from '../modules/auth/password';
import { TokenService } from '../modules/auth/token.service';
import type { AvatarStorage } from '../modules/upload/storage.service';
import { InMemoryContactStore, InMemoryUserStore } from './helpers/memory-stores';
import { MemoryCacheStore, RecordingMailer, StubPool, testConfig } from './helpers/fakes';
import { createPgStores } from '../middlewares/scope.middleware';

interface Envelope {
  success: boolean;
  message: string;
  data?: unknown;
  error?: { code?: string; details?: unknown };
  meta?: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const field = (value: unknown, key: string): unknown => (isRecord(value) ? value[key] : undefined);

const listOf = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const listen = (deps: AppDependencies): Promise<{ server: Server; baseUrl: string }> =>
  new Promise((resolve) => {
    const server = createApp(deps).listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });

const close = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));

const buildDeps = () => {
  const config = testConfig();
  const users = new InMemoryUserStore();
  const contacts = new InMemoryContactStore();
  const pool = new StubPool();
  const mailer = new RecordingMailer();
  const tokens = new TokenService(config.jwt);
  const storage: AvatarStorage = {
    uploadAvatar: async ({ username }) => `https://cdn.test/avatars/${username}.png`,
  };

  const deps: AppDependencies = {
    config,
    pool,
    cache: new MemoryCacheStore(),
    cacheTtlSeconds: 60,
    hasher: new PasswordHasher(4),
    tokens,
    mailer,
    storage,
    createStores: () => ({ users, contacts }),
    clock: () => new Date('2025-12-28T10:00:00Z'),
  };

  return { deps, users, contacts, pool, mailer, tokens };
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let ctx: ReturnType<typeof buildDeps>;

  const call = async (
    method: string,
    path: string,
    options: { token?: string; json?: unknown; body?: RequestInit['body'] } = {}
  ): Promise<{ status: number; headers: Headers; body: Envelope }> => {
    const headers: Record<string, string> = {};
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`;
    }
    let body = options.body;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const response = await fetch(`${baseUrl}${path}`, { method, headers, body });
    const parsed: unknown = await response.json();
    const envelope: Envelope = {
      success: field(parsed, 'success') === true,
      message: String(field(parsed, 'message') ?? ''),
      data: field(parsed, 'data'),
      error: isRecord(field(parsed, 'error'))
        ? { code: String(field(field(parsed, 'error'), 'code')), details: field(field(parsed, 'error'), 'details') }
        : undefined,
    };
    return { status: response.status, headers: response.headers, body: envelope };
  };

  const registerAndLogin = async (username: string, email: string): Promise<string> => {
    const registered = await call('POST', '/api/auth/register', {
      json: { username, email, password: 'secret123' },
    });
    expect(registered.status).toBe(201);

    const confirmation = ctx.mailer.sent.filter((mail) => mail.email === email).pop();
    await call('GET', `/api/auth/confirmed_email/${confirmation?.token ?? ''}`);

    const login = await call('POST', '/api/auth/login', { json: { username, password: 'secret123' } });
    return String(field(login.body.data, 'access_token'));
  };

  beforeAll(async () => {
    ctx = buildDeps();
    ({ server, baseUrl } = await listen(ctx.deps));
  });

  afterAll(async () => {
    await close(server);
  });

  describe('auth flow', () => {
    it('registers an unconfirmed user without exposing the hash', async () => {
      const { status, body } = await call('POST', '/api/auth/register', {
        json: { username: 'alice', email: 'alice@example.com', password: 'secret123' },
      });

      expect(status).toBe(201);
      expect(body.success).toBe(true);
      expect(field(body.data, 'username')).toBe('alice');
      expect(field(body.data, 'confirmed')).toBe(false);
      expect(isRecord(body.data) && 'password_hash' in body.data).toBe(false);
      expect(ctx.mailer.sent[0].baseUrl).toBe(baseUrl);
    });

    it('reports a duplicate email as a conflict', async () => {
      const { status, body } = await call('POST', '/api/auth/register', {
        json: { username: 'alice2', email: 'alice@example.com', password: 'secret123' },
      });

      expect(status).toBe(409);
      expect(body.message).toBe('User with this email already exists');
      expect(body.error?.code).toBe('CONFLICT');
    });

    it('rejects an invalid registration payload', async () => {
      const { status, body } = await call('POST', '/api/auth/register', {
        json: { username: 'al', email: 'not-an-email', password: 'secret123' },
      });

      expect(status).toBe(400);
      expect(body.error?.code).toBe('VALIDATION_ERROR');
      expect(listOf(body.error?.details)).toHaveLength(2);
    });

    it('refuses to log in before the email is confirmed', async () => {
      const { status, headers, body } = await call('POST', '/api/auth/login', {
        json: { username: 'alice', password: 'secret123' },
      });

      expect(status).toBe(401);
      expect(body.message).toBe('Email is not confirmed');
      expect(headers.get('www-authenticate')).toBe('Bearer');
    });

    it('confirms the email once, then reports it as already confirmed', async () => {
      const token = ctx.mailer.sent[0].token;

      const first = await call('GET', `/api/auth/confirmed_email/${token}`);
      const second = await call('GET', `/api/auth/confirmed_email/${token}`);

      expect(first.status).toBe(200);
      expect(first.body.message).toBe('Email confirmed successfully');
      expect(second.body.message).toBe('Your email has been already confirmed');
    });

    it('rejects a malformed confirmation token', async () => {
      const { status, body } = await call('GET', '/api/auth/confirmed_email/not-a-token');

      expect(status).toBe(400);
      expect(body.message).toBe('The token is invalid or expired');
      expect(body.error?.code).toBe('BAD_REQUEST');
    });

    it('logs in with a form body', async () => {
      const { status, body } = await call('POST', '/api/auth/login', {
        body: new URLSearchParams({ username: 'alice', password: 'secret123' }),
      });

      expect(status).toBe(200);
      expect(field(body.data, 'token_type')).toBe('bearer');
      expect(ctx.tokens.verifySessionToken(String(field(body.data, 'access_token'))).sub).toBe('alice');
    });

    it('shares one message between an unknown user and a wrong password', async () => {
      const unknown = await call('POST', '/api/auth/login', { json: { username: 'nobody', password: 'secret123' } });
      const wrong = await call('POST', '/api/auth/login', { json: { username: 'alice', password: 'wrong-pass' } });

      expect(unknown.status).toBe(401);
      expect(unknown.body.message).toBe('The username or password is incorrect');
      expect(wrong.body.message).toBe('The username or password is incorrect');
    });

    it('answers request_email generically for an unknown address', async () => {
      const { status, body } = await call('POST', '/api/auth/request_email', { json: { email: 'ghost@example.com' } });

      expect(status).toBe(200);
      expect(body.message).toBe('Check your email for confirmation link');
    });

    it('answers request_email for a confirmed address', async () => {
      const { body } = await call('POST', '/api/auth/request_email', { json: { email: 'alice@example.com' } });

      expect(body.message).toBe('Your email has been already confirmed');
    });
  });

  describe('users', () => {
    let token: string;

    beforeAll(async () => {
      const login = await call('POST', '/api/auth/login', { json: { username: 'alice', password: 'secret123' } });
      token = String(field(login.body.data, 'access_token'));
    });

    it('returns the current user', async () => {
      const { status, body } = await call('GET', '/api/users/me', { token });

      expect(status).toBe(200);
      expect(field(body.data, 'email')).toBe('alice@example.com');
      expect(field(body.data, 'confirmed')).toBe(true);
    });

    it('requires a bearer token', async () => {
      const missing = await call('GET', '/api/users/me');
      const invalid = await call('GET', '/api/users/me', { token: 'garbage' });

      expect(missing.status).toBe(401);
      expect(missing.body.message).toBe('Not authenticated');
      expect(invalid.status).toBe(401);
      expect(invalid.body.message).toBe('Could not validate credentials');
    });

    it('updates the avatar from an uploaded image', async () => {
      const form = new FormData();
      form.append('file', new Blob([new Uint8Array([137, 80, 78, 71])], { type: 'image/png' }), 'me.png');

      const { status, body } = await call('PATCH', '/api/users/avatar', { token, body: form });

      expect(status).toBe(200);
      expect(field(body.data, 'avatar')).toBe('https://cdn.test/avatars/alice.png');
    });

    it('rejects a file that is not an image', async () => {
      const form = new FormData();
      form.append('file', new Blob(['plain text'], { type: 'text/plain' }), 'notes.txt');

      const { status, body } = await call('PATCH', '/api/users/avatar', { token, body: form });

      expect(status).toBe(400);
      expect(body.message).toBe('File type text/plain is not supported');
    });

    it('rejects an avatar request without a file', async () => {
      const { status, body } = await call('PATCH', '/api/users/avatar', { token, json: {} });

      expect(status).toBe(400);
      expect(body.message).toBe('No file provided');
    });
  });

  describe('contacts', () => {
    let alice: string;
    let bob: string;
    let contactId: number;

    const ada = {
      first_name: 'Ada',
      last_name: 'Lovelace',
      email: 'ada@example.com',
      phone_number: '0123456789',
      birthday: '1990-01-02',
    };

    beforeAll(async () => {
      const login = await call('POST', '/api/auth/login', { json: { username: 'alice', password: 'secret123' } });
      alice = String(field(login.body.data, 'access_token'));
      bob = await registerAndLogin('bob', 'bob@example.com');
    });

    it('creates a contact', async () => {
      const { status, body } = await call('POST', '/api/contacts', { token: alice, json: ada });

      expect(status).toBe(201);
      expect(field(body.data, 'birthday')).toBe('1990-01-02');
      contactId = Number(field(body.data, 'id'));
    });

    it('rejects a second contact with the same email', async () => {
      const { status, body } = await call('POST', '/api/contacts', { token: alice, json: ada });

      expect(status).toBe(409);
      expect(body.message).toBe('The contact with this email already exists.');
    });

    it('lets another user keep a contact with the same email', async () => {
      const { status } = await call('POST', '/api/contacts', { token: bob, json: ada });

      expect(status).toBe(201);
    });

    it('validates the contact payload', async () => {
      const { status, body } = await call('POST', '/api/contacts', {
        token: alice,
        json: { ...ada, email: 'grace@example.com', birthday: '1990-02-30' },
      });

      expect(status).toBe(400);
      expect(body.error?.code).toBe('VALIDATION_ERROR');
    });

    it('lists and filters contacts', async () => {
      const all = await call('GET', '/api/contacts', { token: alice });
      const filtered = await call('GET', '/api/contacts?last_name=LOVE', { token: alice });
      const none = await call('GET', '/api/contacts?first_name=zzz', { token: alice });

      expect(listOf(all.body.data)).toHaveLength(1);
      expect(listOf(filtered.body.data)).toHaveLength(1);
      expect(listOf(none.body.data)).toHaveLength(0);
    });

    it('lists upcoming birthdays across the year end', async () => {
      const { status, body } = await call('GET', '/api/contacts/upcoming-birthdays', { token: alice });

      expect(status).toBe(200);
      expect(listOf(body.data).map((contact) => field(contact, 'email'))).toEqual(['ada@example.com']);
    });

    it('hides contacts from other users', async () => {
      const { status, body } = await call('GET', `/api/contacts/${contactId}`, { token: bob });

      expect(status).toBe(404);
      expect(body.message).toBe('Contact is not found');
    });

    it('updates only the given fields', async () => {
      const { status, body } = await call('PUT', `/api/contacts/${contactId}`, {
        token: alice,
        json: { phone_number: '0987654321' },
      });

      expect(status).toBe(200);
      expect(field(body.data, 'phone_number')).toBe('0987654321');
      expect(field(body.data, 'first_name')).toBe('Ada');
    });

    it('rejects a non-numeric id', async () => {
      const { status, body } = await call('GET', '/api/contacts/abc', { token: alice });

      expect(status).toBe(400);
      expect(body.error?.code).toBe('VALIDATION_ERROR');
    });

    it('deletes a contact and returns it', async () => {
      const removed = await call('DELETE', `/api/contacts/${contactId}`, { token: alice });
      const after = await call('GET', `/api/contacts/${contactId}`, { token: alice });

      expect(removed.status).toBe(200);
      expect(field(removed.body.data, 'email')).toBe('ada@example.com');
      expect(after.status).toBe(404);
    });
  });

  describe('plumbing', () => {
    it('reports health through a pooled session', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', database: 'connected' });
    });

    it('answers unknown routes with a 404 envelope', async () => {
      const { status, body } = await call('GET', '/api/nothing-here');

      expect(status).toBe(404);
      expect(body.error?.code).toBe('NOT_FOUND');
    });

    it('rejects a malformed JSON body', async () => {
      const response = await fetch(`${baseUrl}/api/auth/login`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"username":',
      });

      expect(response.status).toBe(400);
      expect(field(await response.json(), 'message')).toBe('Malformed request body');
    });

    it('returns every borrowed session to the pool', async () => {
      await vi.waitFor(() => {
        expect(ctx.pool.releasedCount).toBe(ctx.pool.clients.length);
      });
      expect(ctx.pool.clients.length).toBeGreaterThan(0);
    });
  });
});

describe('HTTP API without a database', () => {
  it('reports an unhealthy database', async () => {
    const { deps, pool } = buildDeps();
    pool.failConnect = true;
    const { server, baseUrl } = await listen(deps);

    try {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ status: 'error', database: 'disconnected' });
    } finally {
      await close(server);
    }
  });
});

describe('profile rate limit', () => {
  it('allows ten profile reads a minute', async () => {
    const { deps, users, tokens } = buildDeps();
    await users.create({ username: 'carol', email: 'carol@example.com', password_hash: 'unused' });
    const token = tokens.issueSessionToken('carol');
    const { server, baseUrl } = await listen(deps);

    try {
      const statuses: number[] = [];
      for (let i = 0; i < 11; i++) {
        const response = await fetch(`${baseUrl}/api/users/me`, { headers: { Authorization: `Bearer ${token}` } });
        statuses.push(response.status);
        await response.arrayBuffer();
      }

      expect(statuses.slice(0, 10).every((status) => status === 200)).toBe(true);
      expect(statuses[10]).toBe(429);
    } finally {
      await close(server);
    }
  });

  it('counts requests with bad tokens against the same address', async () => {
    const { deps } = buildDeps();
    const { server, baseUrl } = await listen(deps);

    try {
      const statuses: number[] = [];
      for (let i = 0; i < 11; i++) {
        const response = await fetch(`${baseUrl}/api/users/me`, { headers: { Authorization: `Bearer forged-${i}` } });
        statuses.push(response.status);
        await response.arrayBuffer();
      }

      expect(statuses.slice(0, 10)).toEqual(new Array<number>(10).fill(401));
      expect(statuses[10]).toBe(429);
    } finally {
      await close(server);
    }
  });
});

describe('aborted requests', () => {
  it('keeps the session until the handler query settles', async () => {
    const { deps } = buildDeps();
    const pool = new StubPool(() => [], 300);
    const { server, baseUrl } = await listen({ ...deps, pool, createStores: createPgStores });

    try {
      const controller = new AbortController();
      const pending = fetch(`${baseUrl}/api/auth/request_email`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ email: 'nobody@example.com' }),
        signal: controller.signal,
      });
      setTimeout(() => controller.abort(), 100);
      await expect(pending).rejects.toThrow();

      await vi.waitFor(() => {
        expect(pool.releasedCount).toBe(1);
      }, { timeout: 2000 });

      const [client] = pool.clients;
      expect(client.statements).toHaveLength(1);
      expect(client.statements[0]).toMatch(/^SELECT .* FROM users WHERE email = \$1/s);
      expect(client.pendingAtRelease).toEqual([0]);
    } finally {
      await close(server);
    }
  });
});
