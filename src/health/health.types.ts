export type HealthStatus = 'up' | 'down';
export type HealthCheckStatus = 'healthy' | 'unhealthy';

export interface HealthIndicatorResult {
  name: string;
  status: HealthStatus;
  message?: string;
  details?: Record<string, unknown>;
}

export interface HealthCheckResult {
  status: HealthCheckStatus;
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  checks: HealthIndicatorResult[];
}
