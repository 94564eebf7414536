import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { StatusService } from '../state/status.service';

/**
 * Reports the lifecycle status: up while it is active.
 */
@Injectable()
export class LifecycleHealthIndicator {
  constructor(
    private readonly statusService: StatusService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  isHealthy(key: string) {
    const status = this.statusService.current();
    const indicator = this.healthIndicatorService.check(key);

    const details = {
      state: status?.state ?? 'unknown',
      message: status?.message ?? '',
    };

    if (status?.state === 'active') {
      return indicator.up(details);
    }

    return indicator.down(details);
  }
}
