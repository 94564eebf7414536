import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { CertificateInventoryService } from './storage/certificate-inventory.service';

const MIN_DAYS_UNTIL_EXPIRY = 7;

/**
 * A health indicator for the issued certificates.
 */
@Injectable()
export class CertificateHealthIndicator {
  constructor(
    private readonly inventory: CertificateInventoryService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * Healthy when every issued certificate stays valid for more than 7 days.
   * Having no certificate yet is not a failure; the lifecycle status covers that.
   * @param key - A key to represent this health indicator in the results.
   */
  async isHealthy(key: string) {
    const certificates = await this.inventory.list();
    const expiring = certificates.filter((certificate) => certificate.daysUntilExpiry <= MIN_DAYS_UNTIL_EXPIRY);

    const indicator = this.healthIndicatorService.check(key);

    const details = {
      count: certificates.length,
      expiring: expiring.map((certificate) => certificate.name),
      nextExpiry: certificates.reduce<Date | undefined>(
        (earliest, certificate) =>
          !earliest || certificate.expiresAt < earliest ? certificate.expiresAt : earliest,
        undefined,
      ),
    };

    if (expiring.length === 0) {
      return indicator.up(details);
    }

    return indicator.down(details);
  }
}
