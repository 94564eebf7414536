import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { randomInt } from 'crypto';
import { CertbotClientService } from '../certificate/client/certbot-client.service';
import { PortCoordinatorService } from '../host/port-coordinator.service';
import { StateStoreService } from '../state/state-store.service';
import { StatusService } from '../state/status.service';
import { DomainSettingsService } from '../state/domain-settings.service';
import { LIFECYCLE_EVENT } from '../lifecycle/lifecycle.events';
import { RENEWAL_CONFIG } from './renewal.tokens';
import type { RenewalConfig } from './interfaces';

export const RENEWAL_JOB_NAME = 'cert-steward:renew';

/**
 * Owns the periodic renewal trigger and runs renewals.
 *
 * The cron job only raises the renewal flag and wakes the lifecycle; the
 * renewal itself runs inside the lifecycle's serialized handler.
 */
@Injectable()
export class RenewalSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(RenewalSchedulerService.name);
  private job?: CronJob;
  private expression: string | null = null;

  constructor(
    @Inject(RENEWAL_CONFIG) private readonly config: RenewalConfig,
    private readonly certbot: CertbotClientService,
    private readonly portCoordinator: PortCoordinatorService,
    private readonly stateStore: StateStoreService,
    private readonly statusService: StatusService,
    private readonly domainSettings: DomainSettingsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onModuleDestroy(): void {
    this.disarm();
  }

  /**
   * Replaces the periodic trigger with a fresh one at a random minute.
   * @returns The cron expression of the new job.
   */
  arm(): string {
    this.disarm();

    const minute = randomInt(1, 60);
    const expression = `${minute} ${this.config.hours.join(',')} * * *`;

    this.job = new CronJob(expression, () => this.requestRenewal(), null, true);
    this.expression = expression;

    this.logger.log(`Periodic renewal armed`, { job: RENEWAL_JOB_NAME, expression });
    return expression;
  }

  disarm(): void {
    if (!this.job) {
      return;
    }

    void this.job.stop();
    this.job = undefined;
    this.expression = null;
    this.logger.log('Periodic renewal disarmed', { job: RENEWAL_JOB_NAME });
  }

  isArmed(): boolean {
    return this.job !== undefined;
  }

  cronExpression(): string | null {
    return this.expression;
  }

  /**
   * Raises the renewal flag and wakes the lifecycle.
   */
  requestRenewal(): void {
    this.stateStore.update((state) => {
      state.renewRequested = true;
    });

    this.logger.log('Renewal requested');
    this.eventEmitter.emit(LIFECYCLE_EVENT, 'renew-requested');
  }

  /**
   * Runs a renewal if the client reports one is due.
   *
   * The flag is cleared before anything else, so a failed renewal is not
   * retried until the next trigger.
   */
  async renew(): Promise<void> {
    this.stateStore.update((state) => {
      state.renewRequested = false;
    });

    // A failing check still counts; only its output matters
    const check = await this.certbot.renew();
    if (this.certbot.isNothingDue(check.output)) {
      this.logger.log('No certificate is due for renewal');
      return;
    }

    this.logger.log('Renewing certificates...');
    const result = await this.portCoordinator.withServiceYielded(async () => {
      await this.portCoordinator.openStandingPorts();
      return this.certbot.renew();
    });

    if (result.exitCode !== 0) {
      this.statusService.blocked(`letsencrypt renewal failed: \n${result.output}`);
      return;
    }

    const renewedAt = new Date().toISOString();
    this.stateStore.update((state) => {
      state.renewed = true;
      state.lastRenewedAt = renewedAt;
    });

    const fqdn = this.domainSettings.get('fqdn');
    this.statusService.active(fqdn ? `registered ${fqdn}` : 'certificates renewed');
  }
}
