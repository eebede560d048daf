import { ApiProperty } from '@nestjs/swagger';

export class HealthIndicatorDto {
  @ApiProperty({ example: 'rate-limiter' })
  name!: string;

  @ApiProperty({ example: 'up', enum: ['up', 'down'] })
  status!: string;

  @ApiProperty({ example: 'Counters tracking 12 keys', required: false })
  message?: string;

  @ApiProperty({ required: false })
  details?: Record<string, unknown>;
}

export class HealthDto {
  @ApiProperty({ example: 'healthy', enum: ['healthy', 'unhealthy'] })
  status!: string;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  timestamp!: string;

  @ApiProperty({ example: '0.1.0' })
  version!: string;

  @ApiProperty({ example: 'production' })
  environment!: string;

  @ApiProperty({ example: 3600 })
  uptime!: number;

  @ApiProperty({ type: [HealthIndicatorDto] })
  checks!: HealthIndicatorDto[];
}
