import { Controller, Get } from '@nestjs/common';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { ApiDocumented } from '../common/decorators/api-documented.decorator';
import { HealthDto } from './dto/health.dto';
import { HealthCheckResult } from './health.types';
import { HealthService } from './health.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiDocumented({ summary: 'Liveness probe', exempt: true })
  @ApiOkResponse({ type: HealthDto })
  check(): HealthCheckResult {
    return this.healthService.checkLiveness();
  }
}
