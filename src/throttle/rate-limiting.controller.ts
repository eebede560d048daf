/**
 * Rate Limiting Management Controller
 * Admin view of the configured policies and their live counters
 */

import { Controller, Delete, Get } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { AuthorizeRole } from '../auth/decorators/authorize-role.decorator';
import { ApiDocumented } from '../common/decorators/api-documented.decorator';
import { ApiResponseDto } from '../common/dtos/api-response.dto';
import { RateLimitPolicyStats } from './rate-limit.policy';
import { ThrottleService } from './throttle.service';

@ApiTags('Rate Limiting Management')
@Controller('api/admin/rate-limits')
export class RateLimitingController {
  constructor(private readonly throttle: ThrottleService) {}

  @Get()
  @AuthorizeRole('Admin')
  @ApiDocumented({ summary: 'Get rate limit policies and tracked keys' })
  @ApiOkResponse({ description: 'Policy configuration and counter totals' })
  getPolicies(): ApiResponseDto<RateLimitPolicyStats[]> {
    return new ApiResponseDto('Rate limit policies', this.throttle.stats());
  }

  @Delete()
  @AuthorizeRole('Admin')
  @ApiDocumented({ summary: 'Clear every rate limit counter' })
  @ApiOkResponse({ description: 'Counters cleared' })
  resetCounters(): ApiResponseDto<RateLimitPolicyStats[]> {
    this.throttle.reset();
    return new ApiResponseDto('Rate limit counters cleared', this.throttle.stats());
  }
}
