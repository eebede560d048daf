import { IncomingHttpHeaders } from 'http';

export const FORWARDED_FOR_HEADER = 'X-Forwarded-For';

export const MISSING_CLIENT_ID_MESSAGE = 'Unable to verify request sender.';
export const MISSING_ADDRESS_MESSAGE = 'Unable to verify request origin.';

/**
 * Caller identity derived from transport metadata, valid for one request
 */
export interface ClientFingerprint {
  clientId: string;
  ipAddress: string;
  /** `ipAddress:clientId`, the rate limiter's per-client bucket key */
  key: string;
}

/**
 * The parts of an inbound request the resolver looks at
 */
export interface FingerprintSource {
  headers: IncomingHttpHeaders;
  remoteAddress?: string;
}

export type FingerprintRejection = 'missing-client-id' | 'missing-address';

export type FingerprintResolution =
  | { ok: true; fingerprint: ClientFingerprint }
  | { ok: false; reason: FingerprintRejection; message: string };

export function compositeKey(ipAddress: string, clientId: string): string {
  return `${ipAddress}:${clientId}`;
}

/**
 * First value of a header, trimmed. Blank values count as absent.
 */
export function readHeader(
  headers: IncomingHttpHeaders,
  name: string,
): string | undefined {
  const raw = headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Caller address: the first entry of X-Forwarded-For whenever the header is
 * sent, else the socket peer. A blank first entry yields no address.
 */
export function resolveAddress(source: FingerprintSource): string | undefined {
  const raw = source.headers[FORWARDED_FOR_HEADER.toLowerCase()];
  if (raw !== undefined) {
    const forwarded = Array.isArray(raw) ? raw[0] : raw;
    const first = forwarded?.split(',')[0].trim();
    return first ? first : undefined;
  }

  const peer = source.remoteAddress?.trim();
  return peer ? peer : undefined;
}

/**
 * Resolve the fingerprint of a request. The client id is checked first, so
 * a request without it is rejected whatever its address.
 */
export function resolveClientFingerprint(
  source: FingerprintSource,
  clientIdHeader: string,
): FingerprintResolution {
  const clientId = readHeader(source.headers, clientIdHeader);
  if (!clientId) {
    return {
      ok: false,
      reason: 'missing-client-id',
      message: MISSING_CLIENT_ID_MESSAGE,
    };
  }

  const ipAddress = resolveAddress(source);
  if (!ipAddress) {
    return {
      ok: false,
      reason: 'missing-address',
      message: MISSING_ADDRESS_MESSAGE,
    };
  }

  return {
    ok: true,
    fingerprint: { clientId, ipAddress, key: compositeKey(ipAddress, clientId) },
  };
}

declare global {
  namespace Express {
    interface Request {
      /** Set by ClientFingerprintMiddleware on non-exempt paths */
      clientFingerprint?: ClientFingerprint;
    }
  }
}
