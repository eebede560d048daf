import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { AuthenticationFailureException } from '../../common/errors/gateway.exceptions';
import { MetricsService } from '../../logging/metrics.service';

export const INVALID_TOKEN_MESSAGE = 'Invalid or missing authentication token';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly metrics: MetricsService) {
    super();
  }

  handleRequest<TUser>(err: unknown, user: TUser | false | null): TUser {
    if (err || !user) {
      this.metrics.recordRejection('unauthenticated');
      throw new AuthenticationFailureException(INVALID_TOKEN_MESSAGE);
    }
    return user;
  }
}
