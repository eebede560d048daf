import { createHash } from 'crypto';
import { Clock } from '../../common/clock';

export const REFRESH_TOKEN_STORE = Symbol('REFRESH_TOKEN_STORE');

export interface RefreshTokenRecord {
  userId: string;
  expiresAt: Date;
  deviceToken?: string;
  revoked: boolean;
  revokedAt?: Date;
  createdAt: Date;
}

/**
 * A device a user signed in from, keyed by its push/device token
 */
export interface DeviceRecord {
  userId: string;
  deviceToken: string;
  deviceName?: string;
  registeredAt: Date;
  lastSeenAt: Date;
}

/**
 * Persistence of refresh secrets and the devices they were issued to.
 * Implementations keep a digest of the secret, never the secret itself.
 */
export interface RefreshTokenStore {
  save(
    secret: string,
    userId: string,
    expiresAt: Date,
    deviceToken?: string,
  ): Promise<void>;
  findByToken(secret: string): Promise<RefreshTokenRecord | undefined>;
  revoke(secret: string): Promise<void>;
  /** Registers the device, or refreshes its name and last-seen time */
  registerDevice(
    userId: string,
    deviceToken: string,
    deviceName?: string,
  ): Promise<DeviceRecord>;
  findDevices(userId: string): Promise<DeviceRecord[]>;
}

export function digestRefreshToken(secret: string): string {
  return createHash('sha256').update(secret).digest('hex');
}

export class InMemoryRefreshTokenStore implements RefreshTokenStore {
  private readonly records = new Map<string, RefreshTokenRecord>();
  private readonly devices = new Map<string, DeviceRecord>();

  constructor(private readonly clock: Clock) {}

  async save(
    secret: string,
    userId: string,
    expiresAt: Date,
    deviceToken?: string,
  ): Promise<void> {
    this.records.set(digestRefreshToken(secret), {
      userId,
      expiresAt,
      deviceToken,
      revoked: false,
      createdAt: new Date(this.clock.now()),
    });
  }

  async findByToken(secret: string): Promise<RefreshTokenRecord | undefined> {
    const record = this.records.get(digestRefreshToken(secret));
    return record ? { ...record } : undefined;
  }

  async revoke(secret: string): Promise<void> {
    const record = this.records.get(digestRefreshToken(secret));
    if (record && !record.revoked) {
      record.revoked = true;
      record.revokedAt = new Date(this.clock.now());
    }
  }

  async registerDevice(
    userId: string,
    deviceToken: string,
    deviceName?: string,
  ): Promise<DeviceRecord> {
    const now = new Date(this.clock.now());
    // a device token belongs to whoever signed in on it last
    const existing = this.devices.get(deviceToken);
    const sameOwner = existing?.userId === userId;
    const device: DeviceRecord = {
      userId,
      deviceToken,
      deviceName: deviceName ?? (sameOwner ? existing?.deviceName : undefined),
      registeredAt: sameOwner && existing ? existing.registeredAt : now,
      lastSeenAt: now,
    };
    this.devices.set(deviceToken, device);
    return { ...device };
  }

  async findDevices(userId: string): Promise<DeviceRecord[]> {
    return [...this.devices.values()]
      .filter((device) => device.userId === userId)
      .map((device) => ({ ...device }));
  }
}
