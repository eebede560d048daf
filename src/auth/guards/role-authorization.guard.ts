import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request, Response } from 'express';
import {
  AuthenticationFailureException,
  AuthorizationDeniedException,
} from '../../common/errors/gateway.exceptions';
import { requestAbortSignal } from '../../common/http/request-abort-signal';
import { MetricsService } from '../../logging/metrics.service';
import { StructuredLogger } from '../../logging/structured-logger.service';
import { subjectOf } from '../interfaces/access-token-claims.interface';
import {
  AuthorizedIdentity,
  IDENTITY_STORE,
  IdentityStore,
} from '../interfaces/identity.interface';
import { INVALID_TOKEN_MESSAGE } from './jwt-auth.guard';

export const REQUIRED_ROLES_KEY = 'requiredRoles';

export const ACCOUNT_NOT_FOUND_MESSAGE =
  'User account not found. Please login again.';
export const ACCOUNT_LOCKED_MESSAGE =
  'User account is locked. Please contact support.';
export const AUTHORIZATION_ERROR_MESSAGE =
  'An error occurred during authorization';

type AuthorizationOutcome =
  | { kind: 'not-found' }
  | { kind: 'locked' }
  | { kind: 'forbidden'; roles: string[] }
  | { kind: 'admitted'; authorized: AuthorizedIdentity };

/**
 * Re-checks a verified token against the live identity store: the subject
 * must still exist, must not be locked out and must currently hold one of
 * the required roles. Roles inside the token are never trusted.
 */
@Injectable()
export class RoleAuthorizationGuard implements CanActivate {
  private readonly logger = new StructuredLogger(RoleAuthorizationGuard.name);

  constructor(
    private readonly reflector: Reflector,
    @Inject(IDENTITY_STORE)
    private readonly identityStore: IdentityStore,
    private readonly metrics: MetricsService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const requiredRoles =
      this.reflector.getAllAndOverride<string[]>(REQUIRED_ROLES_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? [];

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const subject = subjectOf(request.user);
    if (!subject || subject === '0') {
      this.metrics.recordRejection('unauthenticated');
      throw new AuthenticationFailureException(INVALID_TOKEN_MESSAGE);
    }

    let outcome: AuthorizationOutcome;
    try {
      outcome = await this.evaluate(
        subject,
        requiredRoles,
        requestAbortSignal(request, response),
      );
    } catch (error) {
      this.logger.error(
        `Authorization failed for user ${subject}`,
        error instanceof Error ? error.stack : String(error),
        RoleAuthorizationGuard.name,
        { userId: subject, requiredRoles },
      );
      this.metrics.recordRejection('authorization_error');
      throw new AuthenticationFailureException(AUTHORIZATION_ERROR_MESSAGE);
    }

    switch (outcome.kind) {
      case 'not-found':
        this.metrics.recordRejection('unauthenticated');
        throw new AuthenticationFailureException(ACCOUNT_NOT_FOUND_MESSAGE);
      case 'locked':
        this.metrics.recordRejection('unauthenticated');
        throw new AuthenticationFailureException(ACCOUNT_LOCKED_MESSAGE);
      case 'forbidden':
        this.logger.warn('Role authorization denied', undefined, {
          userId: subject,
          requiredRoles,
          actualRoles: outcome.roles,
        });
        this.metrics.recordRejection('forbidden');
        throw new AuthorizationDeniedException();
      case 'admitted':
        request.authorizedIdentity = outcome.authorized;
        return true;
    }
  }

  private async evaluate(
    subject: string,
    requiredRoles: string[],
    signal: AbortSignal,
  ): Promise<AuthorizationOutcome> {
    const identity = await this.identityStore.findById(subject, signal);
    if (!identity) {
      return { kind: 'not-found' };
    }

    if (await this.identityStore.isLockedOut(identity, signal)) {
      return { kind: 'locked' };
    }

    const roles = await this.identityStore.getRoles(identity, signal);
    if (!hasAnyRole(roles, requiredRoles)) {
      return { kind: 'forbidden', roles };
    }

    return { kind: 'admitted', authorized: { identity, roles } };
  }
}

/**
 * Split a `;`-separated role list, trimming and dropping empty entries
 */
export function parseRequiredRoles(roles: string): string[] {
  return roles
    .split(';')
    .map((role) => role.trim())
    .filter((role) => role.length > 0);
}

export function hasAnyRole(actual: string[], required: string[]): boolean {
  const held = new Set(actual.map((role) => role.toLowerCase()));
  return required.some((role) => held.has(role.toLowerCase()));
}
