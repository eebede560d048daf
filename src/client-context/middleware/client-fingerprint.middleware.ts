import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NextFunction, Request, Response } from 'express';
import { gatewayConfig } from '../../config/gateway.config';
import { MissingClientContextException } from '../../common/errors/gateway.exceptions';
import { MetricsService } from '../../logging/metrics.service';
import { RequestContext } from '../../logging/request-context';
import { StructuredLogger } from '../../logging/structured-logger.service';
import { resolveClientFingerprint } from '../client-fingerprint';
import { ExemptPathPolicy, requestPath } from '../exempt-path.policy';

/**
 * Tags every non-exempt request with the caller's fingerprint and rejects
 * requests that cannot be fingerprinted before they reach rate limiting.
 */
@Injectable()
export class ClientFingerprintMiddleware implements NestMiddleware {
  private readonly logger = new StructuredLogger(
    ClientFingerprintMiddleware.name,
  );
  private readonly clientIdHeader: string;

  constructor(
    @Inject(gatewayConfig.KEY)
    config: ConfigType<typeof gatewayConfig>,
    private readonly exemptPaths: ExemptPathPolicy,
    private readonly metrics: MetricsService,
  ) {
    this.clientIdHeader = config.clientContext.clientIdHeader;
  }

  use(req: Request, _res: Response, next: NextFunction): void {
    const path = requestPath(req);
    if (this.exemptPaths.isExempt(path)) {
      next();
      return;
    }

    const resolution = resolveClientFingerprint(
      { headers: req.headers, remoteAddress: req.socket.remoteAddress },
      this.clientIdHeader,
    );

    if (!resolution.ok) {
      this.logger.warn(`Request blocked: ${resolution.reason}`, undefined, {
        path,
        method: req.method,
      });
      this.metrics.recordRejection(
        resolution.reason === 'missing-client-id'
          ? 'missing_client_id'
          : 'missing_address',
      );
      throw new MissingClientContextException(resolution.message);
    }

    const { fingerprint } = resolution;
    req.clientFingerprint = fingerprint;
    RequestContext.set('clientId', fingerprint.clientId);
    RequestContext.set('ipAddress', fingerprint.ipAddress);

    this.logger.debug('Request validated', undefined, {
      path,
      method: req.method,
    });

    next();
  }
}
