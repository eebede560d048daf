/**
 * Identity record as the access pipeline sees it. Owned by the identity
 * store; handlers and guards only read it.
 */
export interface Identity {
  id: string;
  email: string;
  userName: string;
  displayName?: string;
  lockoutEnabled: boolean;
  lockoutEnd: Date | null;
  accessFailedCount: number;
}

export const IDENTITY_STORE = Symbol('IDENTITY_STORE');

/**
 * Boundary to the persistent identity and role store. Lookups accept an
 * AbortSignal that fires when the caller disconnects.
 */
export interface IdentityStore {
  findById(id: string, signal?: AbortSignal): Promise<Identity | undefined>;
  findByEmail(email: string, signal?: AbortSignal): Promise<Identity | undefined>;
  isLockedOut(identity: Identity, signal?: AbortSignal): Promise<boolean>;
  getRoles(identity: Identity, signal?: AbortSignal): Promise<string[]>;
  checkPassword(identity: Identity, password: string): Promise<boolean>;

  /** Count a failed sign-in. Resolves true when this attempt locked the account. */
  recordFailedAccess(identity: Identity): Promise<boolean>;
  resetFailedAccess(identity: Identity): Promise<void>;
}

/**
 * Identity and live roles attached to the request once role authorization
 * succeeds
 */
export interface AuthorizedIdentity {
  identity: Identity;
  roles: string[];
}

declare global {
  namespace Express {
    interface Request {
      /** Set by RoleAuthorizationGuard */
      authorizedIdentity?: AuthorizedIdentity;
    }
  }
}
