import { applyDecorators, SetMetadata, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { StatusResponseDto } from '../../common/dtos/api-response.dto';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import {
  parseRequiredRoles,
  REQUIRED_ROLES_KEY,
  RoleAuthorizationGuard,
} from '../guards/role-authorization.guard';

/**
 * Protect a route with a bearer token whose subject currently holds one of
 * the given roles, e.g. `@AuthorizeRole('Admin;Moderator')`.
 */
export function AuthorizeRole(roles: string) {
  const required = parseRequiredRoles(roles);
  if (required.length === 0) {
    throw new Error('@AuthorizeRole() needs at least one role');
  }

  return applyDecorators(
    SetMetadata(REQUIRED_ROLES_KEY, required),
    UseGuards(JwtAuthGuard, RoleAuthorizationGuard),
    ApiBearerAuth(),
    ApiUnauthorizedResponse({
      description: 'Missing, invalid or expired token, or account unavailable',
      type: StatusResponseDto,
    }),
    ApiForbiddenResponse({ description: 'Required role not held' }),
  );
}
