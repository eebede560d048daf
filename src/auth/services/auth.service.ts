import {
  BadRequestException,
  HttpException,
  Inject,
  Injectable,
} from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { AuthenticationFailureException } from '../../common/errors/gateway.exceptions';
import { MetricsService } from '../../logging/metrics.service';
import { StructuredLogger } from '../../logging/structured-logger.service';
import { AuthSessionDto } from '../dto/auth-session.dto';
import { LoginDto, RefreshTokenDto } from '../dto/login.dto';
import { ACCOUNT_LOCKED_MESSAGE } from '../guards/role-authorization.guard';
import {
  Identity,
  IDENTITY_STORE,
  IdentityStore,
} from '../interfaces/identity.interface';
import {
  REFRESH_TOKEN_STORE,
  RefreshTokenStore,
} from '../stores/refresh-token.store';
import { TokenIssuerService } from './token-issuer.service';

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password';
export const LOCKED_BY_FAILURES_MESSAGE =
  'Account locked due to multiple failed login attempts';
export const INVALID_REFRESH_TOKEN_MESSAGE = 'Invalid refresh token';
export const EXPIRED_REFRESH_TOKEN_MESSAGE = 'Refresh token expired';

/**
 * Password sign-in and refresh token rotation
 */
@Injectable()
export class AuthService {
  private readonly logger = new StructuredLogger(AuthService.name);

  constructor(
    @Inject(IDENTITY_STORE)
    private readonly identityStore: IdentityStore,
    @Inject(REFRESH_TOKEN_STORE)
    private readonly refreshTokens: RefreshTokenStore,
    private readonly tokenIssuer: TokenIssuerService,
    private readonly metrics: MetricsService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async login(dto: LoginDto): Promise<AuthSessionDto> {
    try {
      const identity = await this.identityStore.findByEmail(dto.email);
      if (!identity) {
        throw new BadRequestException(INVALID_CREDENTIALS_MESSAGE);
      }

      if (await this.identityStore.isLockedOut(identity)) {
        throw new BadRequestException(
          `Account is locked. Try again in ${this.minutesUntilUnlock(identity)} minutes`,
        );
      }

      if (!(await this.identityStore.checkPassword(identity, dto.password))) {
        const locked = await this.identityStore.recordFailedAccess(identity);
        this.logger.warn('Failed login attempt', undefined, {
          userId: identity.id,
          locked,
        });
        throw new BadRequestException(
          locked ? LOCKED_BY_FAILURES_MESSAGE : INVALID_CREDENTIALS_MESSAGE,
        );
      }

      await this.identityStore.resetFailedAccess(identity);
      const session = await this.startSession(identity, dto.deviceToken);
      if (dto.deviceToken) {
        await this.refreshTokens.registerDevice(
          identity.id,
          dto.deviceToken,
          dto.deviceName,
        );
      }

      this.metrics.recordTokenIssued('login');
      this.logger.log('User logged in', undefined, {
        userId: identity.id,
        deviceName: dto.deviceName,
      });
      return session;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(
        'Error during login',
        error instanceof Error ? error.stack : String(error),
        AuthService.name,
      );
      throw new BadRequestException('An error occurred during login');
    }
  }

  /**
   * Exchange a refresh secret for a new session. The presented secret is
   * revoked, so each one can be used once.
   */
  async refresh(dto: RefreshTokenDto): Promise<AuthSessionDto> {
    try {
      const record = await this.refreshTokens.findByToken(dto.refreshToken);
      if (!record || record.revoked) {
        throw new AuthenticationFailureException(INVALID_REFRESH_TOKEN_MESSAGE);
      }

      if (record.expiresAt.getTime() <= this.clock.now()) {
        await this.refreshTokens.revoke(dto.refreshToken);
        throw new AuthenticationFailureException(EXPIRED_REFRESH_TOKEN_MESSAGE);
      }

      const identity = await this.identityStore.findById(record.userId);
      if (!identity) {
        throw new AuthenticationFailureException('User not found');
      }

      if (await this.identityStore.isLockedOut(identity)) {
        throw new AuthenticationFailureException(ACCOUNT_LOCKED_MESSAGE);
      }

      await this.refreshTokens.revoke(dto.refreshToken);
      const session = await this.startSession(identity, record.deviceToken);

      this.metrics.recordTokenIssued('refresh');
      this.logger.log('Token refreshed', undefined, { userId: identity.id });
      return session;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }
      this.logger.error(
        'Error refreshing token',
        error instanceof Error ? error.stack : String(error),
        AuthService.name,
      );
      throw new AuthenticationFailureException(
        'An error occurred while refreshing token',
      );
    }
  }

  private async startSession(
    identity: Identity,
    deviceToken?: string,
  ): Promise<AuthSessionDto> {
    const roles = await this.identityStore.getRoles(identity);
    const issued = this.tokenIssuer.issue(identity, roles);

    await this.refreshTokens.save(
      issued.refreshToken,
      identity.id,
      this.tokenIssuer.refreshTokenExpiry(),
      deviceToken,
    );

    return {
      ...issued,
      user: {
        id: identity.id,
        userName: identity.userName,
        email: identity.email,
        displayName: identity.displayName,
        roles,
      },
    };
  }

  private minutesUntilUnlock(identity: Identity): number {
    const lockoutEnd = identity.lockoutEnd?.getTime() ?? this.clock.now();
    return Math.max(1, Math.ceil((lockoutEnd - this.clock.now()) / 60000));
  }
}
