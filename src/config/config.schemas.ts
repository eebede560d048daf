import { RateLimitRule } from '../throttle/rate-limit.config';

/**
 * Access token signing settings
 */
export interface JwtConfig {
  secret: string;
  issuer: string;
  audience: string;
  expiryMinutes: number;
  refreshTokenExpiryDays: number;
}

/**
 * One counter table and the quotas it enforces
 */
export interface RateLimitPolicyConfig {
  enabled: boolean;
  rules: RateLimitRule[];
  whitelist: string[];
}

export interface RateLimitingConfig {
  ip: RateLimitPolicyConfig;
  client: RateLimitPolicyConfig;
  sweepIntervalSeconds: number;
}

export interface ClientContextConfig {
  clientIdHeader: string;
  exemptPathPrefixes: string[];
}

export interface GatewayConfig {
  port: number;
  jwt: JwtConfig;
  clientContext: ClientContextConfig;
  rateLimiting: RateLimitingConfig;
  identitySeedFile?: string;
}
