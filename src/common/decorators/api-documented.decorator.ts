import { applyDecorators } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOperation,
  ApiTooManyRequestsResponse,
} from '@nestjs/swagger';
import { StatusResponseDto } from '../dtos/api-response.dto';

/**
 * Composite decorator for controller methods behind the
 * client fingerprint and rate limit middleware.
 *
 * Adds the operation summary plus the 400 (missing client context) and 429
 * (quota exceeded) responses every non-exempt route can return. Protected
 * routes get their 401/403 responses from @AuthorizeRole().
 */
export function ApiDocumented(options: {
  summary: string;
  description?: string;
  exempt?: boolean; // route is on the exempt path list
}) {
  const decorators: MethodDecorator[] = [
    ApiOperation({
      summary: options.summary,
      description: options.description,
    }),
  ];

  if (!options.exempt) {
    decorators.push(
      ApiBadRequestResponse({
        description: 'Missing X-ClientId header or unresolvable origin',
        type: StatusResponseDto,
      }),
      ApiTooManyRequestsResponse({
        description: 'Address or client quota exceeded',
        type: StatusResponseDto,
      }),
    );
  }

  return applyDecorators(...decorators);
}
