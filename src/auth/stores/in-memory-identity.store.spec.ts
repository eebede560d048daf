import * as bcrypt from 'bcrypt';
import { writeFileSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Clock } from '../../common/clock';
import {
  InMemoryIdentityStore,
  LOCKOUT_DURATION_MS,
  MAX_FAILED_ACCESS_ATTEMPTS,
} from './in-memory-identity.store';
import { InMemoryRefreshTokenStore } from './refresh-token.store';

describe('InMemoryIdentityStore', () => {
  let now: number;
  const clock: Clock = { now: () => now };
  let store: InMemoryIdentityStore;

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new InMemoryIdentityStore(clock);
    store.add({
      id: 1,
      email: ' Jane@Example.com ',
      userName: 'jane',
      passwordHash: bcrypt.hashSync('test-password', 4),
      roles: ['User'],
    });
  });

  it('finds identities by id and by normalised email', async () => {
    expect((await store.findById('1'))?.email).toBe('jane@example.com');
    expect((await store.findByEmail('JANE@example.com'))?.id).toBe('1');
    expect(await store.findById('2')).toBeUndefined();
  });

  it('checks passwords against the stored hash', async () => {
    const identity = await store.findById('1');
    if (!identity) {
      throw new Error('seeded identity missing');
    }

    await expect(store.checkPassword(identity, 'test-password')).resolves.toBe(true);
    await expect(store.checkPassword(identity, 'wrong-password')).resolves.toBe(false);
  });

  it('locks the account after repeated failures and unlocks after the lockout', async () => {
    const identity = await store.findById('1');
    if (!identity) {
      throw new Error('seeded identity missing');
    }

    for (let attempt = 1; attempt < MAX_FAILED_ACCESS_ATTEMPTS; attempt++) {
      await expect(store.recordFailedAccess(identity)).resolves.toBe(false);
    }
    await expect(store.recordFailedAccess(identity)).resolves.toBe(true);
    await expect(store.isLockedOut(identity)).resolves.toBe(true);

    now += LOCKOUT_DURATION_MS;
    await expect(store.isLockedOut(identity)).resolves.toBe(false);
  });

  it('returns copies of its records', async () => {
    const identity = await store.findById('1');
    const roles = identity ? await store.getRoles(identity) : [];
    roles.push('Admin');

    const again = await store.findById('1');
    expect(again ? await store.getRoles(again) : []).toEqual(['User']);
  });

  it('stops when the caller has gone away', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client disconnected'));

    await expect(store.findById('1', controller.signal)).rejects.toThrow(
      'client disconnected',
    );
  });

  it('loads identities from a seed file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'identities-'));
    const file = join(dir, 'seed.json');
    writeFileSync(
      file,
      JSON.stringify([
        {
          id: 5,
          email: 'ops@example.com',
          userName: 'ops',
          passwordHash: 'placeholder-hash',
          roles: ['Admin'],
        },
      ]),
    );

    try {
      expect(store.loadFile(file)).toBe(1);
      expect((await store.findById('5'))?.userName).toBe('ops');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('refuses malformed seed entries', () => {
    const dir = mkdtempSync(join(tmpdir(), 'identities-'));
    const file = join(dir, 'seed.json');
    writeFileSync(file, JSON.stringify([{ id: 5, email: 'ops@example.com' }]));

    try {
      expect(() => store.loadFile(file)).toThrow('Identity seed #0');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('requires a password or a hash', () => {
    expect(() =>
      store.add({ id: 9, email: 'x@example.com', userName: 'x', roles: [] }),
    ).toThrow('needs a password or passwordHash');
  });
});

describe('InMemoryRefreshTokenStore', () => {
  const clock: Clock = { now: () => 1_700_000_000_000 };

  it('finds, then revokes, a saved refresh token', async () => {
    const store = new InMemoryRefreshTokenStore(clock);
    await store.save('refresh-one', '1', new Date(1_700_000_600_000));

    expect(await store.findByToken('refresh-one')).toMatchObject({
      userId: '1',
      revoked: false,
    });
    expect(await store.findByToken('refresh-two')).toBeUndefined();

    await store.revoke('refresh-one');
    expect((await store.findByToken('refresh-one'))?.revoked).toBe(true);
  });

  it('updates a known device and hands it over to a new owner', async () => {
    let now = 1_700_000_000_000;
    const store = new InMemoryRefreshTokenStore({ now: () => now });

    await store.registerDevice('1', 'device-token-1', 'Test phone');
    now += 60_000;
    await store.registerDevice('1', 'device-token-1');

    expect(await store.findDevices('1')).toEqual([
      {
        userId: '1',
        deviceToken: 'device-token-1',
        deviceName: 'Test phone',
        registeredAt: new Date(1_700_000_000_000),
        lastSeenAt: new Date(1_700_000_060_000),
      },
    ]);

    await store.registerDevice('2', 'device-token-1');
    expect(await store.findDevices('1')).toEqual([]);
    expect(await store.findDevices('2')).toEqual([
      {
        userId: '2',
        deviceToken: 'device-token-1',
        deviceName: undefined,
        registeredAt: new Date(1_700_000_060_000),
        lastSeenAt: new Date(1_700_000_060_000),
      },
    ]);
  });
});
