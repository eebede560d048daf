import { registerAs } from '@nestjs/config';
import { ConfigurationError } from '../common/errors/configuration.error';
import {
  DEFAULT_CLIENT_RATE_LIMIT_RULES,
  DEFAULT_IP_RATE_LIMIT_RULES,
  DEFAULT_SWEEP_INTERVAL_SECONDS,
  parseRateLimitRules,
  RateLimitRule,
  splitList,
} from '../throttle/rate-limit.config';
import { GatewayConfig } from './config.schemas';
import { validateEnvironment } from './configuration.validator';

export const DEFAULT_EXEMPT_PATH_PREFIXES = [
  '/api/docs',
  '/health',
  '/metrics',
  '/hubs/',
  '/api/auth/login',
  '/api/auth/register',
];

/**
 * Build the gateway settings from raw environment variables.
 *
 * Throws ConfigurationError listing every violation, so a missing signing
 * secret aborts bootstrap instead of surfacing on the first request.
 */
export function loadGatewayConfig(
  env: Record<string, string | undefined>,
): GatewayConfig {
  const { value, violations } = validateEnvironment(env);

  const ipRules = parseRules(
    'IP_RATE_LIMIT_RULES',
    value.IP_RATE_LIMIT_RULES ?? DEFAULT_IP_RATE_LIMIT_RULES,
    violations,
  );
  const clientRules = parseRules(
    'CLIENT_RATE_LIMIT_RULES',
    value.CLIENT_RATE_LIMIT_RULES ?? DEFAULT_CLIENT_RATE_LIMIT_RULES,
    violations,
  );

  if (violations.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration: ${violations.join('; ')}`,
      violations,
    );
  }

  const exemptPathPrefixes = value.EXEMPT_PATH_PREFIXES
    ? splitList(value.EXEMPT_PATH_PREFIXES)
    : DEFAULT_EXEMPT_PATH_PREFIXES;

  return {
    port: value.PORT ?? 3000,
    jwt: {
      secret: value.JWT_SECRET,
      issuer: value.JWT_ISSUER ?? 'access-gateway',
      audience: value.JWT_AUDIENCE ?? 'access-gateway-clients',
      expiryMinutes: value.JWT_EXPIRY_MINUTES ?? 15,
      refreshTokenExpiryDays: value.JWT_REFRESH_EXPIRY_DAYS ?? 7,
    },
    clientContext: {
      clientIdHeader: value.CLIENT_ID_HEADER ?? 'X-ClientId',
      exemptPathPrefixes,
    },
    rateLimiting: {
      ip: {
        enabled: parseFlag(value.IP_RATE_LIMIT_ENABLED),
        rules: ipRules,
        whitelist: splitList(value.IP_RATE_LIMIT_WHITELIST),
      },
      client: {
        enabled: parseFlag(value.CLIENT_RATE_LIMIT_ENABLED),
        rules: clientRules,
        whitelist: splitList(value.CLIENT_RATE_LIMIT_WHITELIST),
      },
      sweepIntervalSeconds:
        value.RATE_LIMIT_SWEEP_INTERVAL_SECONDS ??
        DEFAULT_SWEEP_INTERVAL_SECONDS,
    },
    identitySeedFile: value.IDENTITY_SEED_FILE,
  };
}

function parseRules(
  name: string,
  raw: string,
  violations: string[],
): RateLimitRule[] {
  try {
    return parseRateLimitRules(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    violations.push(`${name}: ${reason}`);
    return [];
  }
}

function parseFlag(raw: string | undefined): boolean {
  if (raw === undefined) {
    return true;
  }
  return raw === 'true' || raw === '1';
}

export const gatewayConfig = registerAs('gateway', () =>
  loadGatewayConfig(process.env),
);
