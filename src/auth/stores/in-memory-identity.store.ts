import { readFileSync } from 'fs';
import * as bcrypt from 'bcrypt';
import { Clock } from '../../common/clock';
import { Identity, IdentityStore } from '../interfaces/identity.interface';

export const MAX_FAILED_ACCESS_ATTEMPTS = 5;
export const LOCKOUT_DURATION_MS = 15 * 60 * 1000;

/**
 * Shape of an entry in the identity seed file. Either a plain `password`
 * (hashed on load) or a bcrypt `passwordHash` must be given.
 */
export interface IdentitySeed {
  id: string | number;
  email: string;
  userName: string;
  displayName?: string;
  password?: string;
  passwordHash?: string;
  roles: string[];
  lockoutEnabled?: boolean;
  lockoutEnd?: string | null;
}

interface StoredIdentity extends Identity {
  passwordHash: string;
  roles: string[];
}

/**
 * Process-local identity store used when no persistent store is wired in.
 * Returns copies, so callers cannot mutate the stored records.
 */
export class InMemoryIdentityStore implements IdentityStore {
  private readonly byId = new Map<string, StoredIdentity>();

  constructor(private readonly clock: Clock) {}

  add(seed: IdentitySeed): Identity {
    const passwordHash =
      seed.passwordHash ??
      (seed.password !== undefined ? bcrypt.hashSync(seed.password, 10) : undefined);
    if (!passwordHash) {
      throw new Error(`Identity ${seed.email} needs a password or passwordHash`);
    }

    const record: StoredIdentity = {
      id: String(seed.id),
      email: seed.email.trim().toLowerCase(),
      userName: seed.userName,
      displayName: seed.displayName,
      lockoutEnabled: seed.lockoutEnabled ?? true,
      lockoutEnd: seed.lockoutEnd ? new Date(seed.lockoutEnd) : null,
      accessFailedCount: 0,
      passwordHash,
      roles: [...seed.roles],
    };

    this.byId.set(record.id, record);
    return toIdentity(record);
  }

  /**
   * Load identities from a JSON array file
   */
  loadFile(path: string): number {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
    if (!Array.isArray(parsed)) {
      throw new Error(`Identity seed file ${path} must contain a JSON array`);
    }

    const entries: unknown[] = parsed;
    entries.forEach((entry, index) => {
      if (!isIdentitySeed(entry)) {
        throw new Error(`Identity seed #${index} in ${path} is malformed`);
      }
      this.add(entry);
    });
    return entries.length;
  }

  remove(id: string): boolean {
    return this.byId.delete(id);
  }

  setRoles(id: string, roles: string[]): void {
    this.require(id).roles = [...roles];
  }

  lockUntil(id: string, until: Date | null): void {
    this.require(id).lockoutEnd = until;
  }

  async findById(id: string, signal?: AbortSignal): Promise<Identity | undefined> {
    signal?.throwIfAborted();
    const record = this.byId.get(id);
    return record ? toIdentity(record) : undefined;
  }

  async findByEmail(
    email: string,
    signal?: AbortSignal,
  ): Promise<Identity | undefined> {
    signal?.throwIfAborted();
    const normalized = email.trim().toLowerCase();
    for (const record of this.byId.values()) {
      if (record.email === normalized) {
        return toIdentity(record);
      }
    }
    return undefined;
  }

  async isLockedOut(identity: Identity, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const record = this.byId.get(identity.id);
    if (!record || !record.lockoutEnabled || !record.lockoutEnd) {
      return false;
    }
    return record.lockoutEnd.getTime() > this.clock.now();
  }

  async getRoles(identity: Identity, signal?: AbortSignal): Promise<string[]> {
    signal?.throwIfAborted();
    return [...(this.byId.get(identity.id)?.roles ?? [])];
  }

  async checkPassword(identity: Identity, password: string): Promise<boolean> {
    const record = this.byId.get(identity.id);
    if (!record) {
      return false;
    }
    return bcrypt.compare(password, record.passwordHash);
  }

  async recordFailedAccess(identity: Identity): Promise<boolean> {
    const record = this.require(identity.id);
    if (!record.lockoutEnabled) {
      return false;
    }

    record.accessFailedCount += 1;
    if (record.accessFailedCount < MAX_FAILED_ACCESS_ATTEMPTS) {
      return false;
    }

    record.accessFailedCount = 0;
    record.lockoutEnd = new Date(this.clock.now() + LOCKOUT_DURATION_MS);
    return true;
  }

  async resetFailedAccess(identity: Identity): Promise<void> {
    const record = this.require(identity.id);
    record.accessFailedCount = 0;
  }

  private require(id: string): StoredIdentity {
    const record = this.byId.get(id);
    if (!record) {
      throw new Error(`Identity ${id} does not exist`);
    }
    return record;
  }
}

function isIdentitySeed(value: unknown): value is IdentitySeed {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('id' in value && 'email' in value && 'userName' in value && 'roles' in value)
  ) {
    return false;
  }
  return (
    (typeof value.id === 'string' || typeof value.id === 'number') &&
    typeof value.email === 'string' &&
    typeof value.userName === 'string' &&
    Array.isArray(value.roles) &&
    value.roles.every((role: unknown) => typeof role === 'string')
  );
}

function toIdentity(record: StoredIdentity): Identity {
  return {
    id: record.id,
    email: record.email,
    userName: record.userName,
    displayName: record.displayName,
    lockoutEnabled: record.lockoutEnabled,
    lockoutEnd: record.lockoutEnd ? new Date(record.lockoutEnd) : null,
    accessFailedCount: record.accessFailedCount,
  };
}
