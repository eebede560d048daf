import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Request } from 'express';
import { gatewayConfig } from '../config/gateway.config';

/**
 * Paths that skip fingerprinting and rate limiting: docs, health, metrics,
 * realtime signaling upgrades and the login/registration endpoints.
 * Prefix match, case-insensitive.
 */
@Injectable()
export class ExemptPathPolicy {
  private readonly prefixes: string[];

  constructor(
    @Inject(gatewayConfig.KEY)
    config: ConfigType<typeof gatewayConfig>,
  ) {
    this.prefixes = config.clientContext.exemptPathPrefixes.map((prefix) =>
      prefix.toLowerCase(),
    );
  }

  isExempt(path: string): boolean {
    const normalized = path.toLowerCase();
    return this.prefixes.some((prefix) => normalized.startsWith(prefix));
  }

  isExemptRequest(req: Request): boolean {
    return this.isExempt(requestPath(req));
  }
}

/**
 * Path of the request as the client sent it. `req.path` is relative to the
 * middleware mount point, so it is derived from `originalUrl` instead.
 */
export function requestPath(req: Request): string {
  const url = req.originalUrl || req.url || '/';
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}
