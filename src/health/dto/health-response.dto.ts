import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 * Contains health status of the application and its dependencies
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      lifecycle: { status: 'up', state: 'active', message: 'registered www.example.com' },
      certificate: { status: 'up', count: 1, expiring: [] },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    example: {
      lifecycle: { status: 'down', state: 'waiting', message: 'Waiting for ports to open (will happen in next cycle)' },
    },
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      lifecycle: { status: 'up', state: 'active', message: 'registered www.example.com' },
      certificate: { status: 'up', count: 1, expiring: [] },
    },
  })
  details!: Record<string, unknown>;
}
