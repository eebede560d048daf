import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { AuthorizedIdentity } from '../interfaces/identity.interface';

/**
 * The live identity and roles loaded by RoleAuthorizationGuard
 */
export const CurrentIdentity = createParamDecorator(
  (_data: unknown, context: ExecutionContext): AuthorizedIdentity | undefined =>
    context.switchToHttp().getRequest<Request>().authorizedIdentity,
);
