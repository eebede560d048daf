import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { randomBytes } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { CLOCK, Clock } from '../../common/clock';
import { ConfigurationError } from '../../common/errors/configuration.error';
import { gatewayConfig } from '../../config/gateway.config';
import {
  AccessTokenClaims,
  IssuedTokens,
  UserType,
} from '../interfaces/access-token-claims.interface';
import { Identity } from '../interfaces/identity.interface';

const REFRESH_TOKEN_BYTES = 64;

/**
 * Mints signed access tokens and opaque refresh secrets. Stateless: storing
 * the refresh secret is the caller's job.
 */
@Injectable()
export class TokenIssuerService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(gatewayConfig.KEY)
    private readonly config: ConfigType<typeof gatewayConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    if (!config.jwt.secret) {
      throw new ConfigurationError('JWT_SECRET must be configured', [
        'JWT_SECRET must be configured',
      ]);
    }
  }

  issue(identity: Identity, roles: string[]): IssuedTokens {
    const { jwt } = this.config;
    const issuedAt = Math.floor(this.clock.now() / 1000);
    const lifetimeSeconds = jwt.expiryMinutes * 60;

    const claims: AccessTokenClaims = {
      sub: identity.id,
      iat: issuedAt,
      unique_name: identity.email,
      username: identity.userName,
      user_type: userTypeOf(roles),
      role: [...roles],
      jti: uuidv4(),
    };

    // iss/aud/exp go through the sign options; jsonwebtoken rejects them
    // when they are also present in the payload
    const token = this.jwtService.sign(claims, {
      secret: jwt.secret,
      algorithm: 'HS256',
      issuer: jwt.issuer,
      audience: jwt.audience,
      expiresIn: lifetimeSeconds,
    });

    return {
      token,
      refreshToken: randomBytes(REFRESH_TOKEN_BYTES).toString('base64'),
      expires: issuedAt + lifetimeSeconds,
    };
  }

  refreshTokenExpiry(): Date {
    const days = this.config.jwt.refreshTokenExpiryDays;
    return new Date(this.clock.now() + days * 24 * 60 * 60 * 1000);
  }
}

export function userTypeOf(roles: string[]): UserType {
  return roles.some((role) => role.toLowerCase() === 'admin')
    ? UserType.Admin
    : UserType.User;
}
