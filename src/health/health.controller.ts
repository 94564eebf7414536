import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { LifecycleHealthIndicator } from '../lifecycle/lifecycle.health';
import { CertificateHealthIndicator } from '../certificate/certificate.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly lifecycle: LifecycleHealthIndicator,
    private readonly certificate: CertificateHealthIndicator,
  ) {}

  /**
   * Performs a health check.
   * @returns A promise that resolves to the health check result.
   */
  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description: 'Reports the lifecycle status and the validity of the issued certificates.',
  })
  @ApiResponse({
    status: 200,
    description: 'The application is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The application is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' } }),
      () => this.lifecycle.isHealthy('lifecycle'),
      () => this.certificate.isHealthy('certificate'),
    ]);
  }
}
