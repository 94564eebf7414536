import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';
import { getErrorMessage, getErrorStack } from '../shared/error.utils';
import { StateStoreService } from '../state/state-store.service';
import { RequestStoreService } from '../state/request-store.service';
import { StatusService } from '../state/status.service';
import { DomainSettingsService } from '../state/domain-settings.service';
import type { DomainSettingsUpdate } from '../state/domain-settings.service';
import { PlatformService } from '../host/platform.service';
import { PortCoordinatorService } from '../host/port-coordinator.service';
import { CertificateSetupService } from '../certificate/setup/certificate-setup.service';
import { IssuanceService } from '../certificate/issuance/issuance.service';
import { RenewalSchedulerService } from '../renewal/renewal-scheduler.service';
import { LIFECYCLE_EVENT, isLifecycleEvent } from './lifecycle.events';
import type { LifecycleEvent } from './lifecycle.events';
import { TRANSITIONS, handlesEvent } from './lifecycle.transitions';
import type { LifecycleFlags, TransitionName } from './lifecycle.transitions';
import { LIFECYCLE_CONFIG } from './lifecycle.tokens';
import type { LifecycleConfig, LifecycleSnapshot } from './interfaces';

export const STATUS_TICK_NAME = 'cert-steward:update-status';
export const PORTS_WAITING_MESSAGE = 'Waiting for ports to open (will happen in next cycle)';

/**
 * Drives the certificate state machine.
 *
 * Events are queued on a single promise chain, so each one is handled to
 * completion before the next starts. For every event the dispatch table is
 * walked in order and each transition whose guard holds runs, with the flags
 * re-read before every guard. A transition that throws ends the handling of
 * its event and leaves the status blocked.
 */
@Injectable()
export class LifecycleService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(LifecycleService.name);
  private queue: Promise<void> = Promise.resolve();

  constructor(
    @Inject(LIFECYCLE_CONFIG) private readonly config: LifecycleConfig,
    private readonly stateStore: StateStoreService,
    private readonly requestStore: RequestStoreService,
    private readonly statusService: StatusService,
    private readonly domainSettings: DomainSettingsService,
    private readonly platform: PlatformService,
    private readonly portCoordinator: PortCoordinatorService,
    private readonly certificateSetup: CertificateSetupService,
    private readonly issuance: IssuanceService,
    private readonly renewalScheduler: RenewalSchedulerService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.dispatch('install');

    if (this.domainSettings.changed('fqdn')) {
      await this.dispatch('config-changed');
    }

    if (this.config.updateStatusInterval > 0) {
      const interval = setInterval(() => {
        void this.dispatch('update-status');
      }, this.config.updateStatusInterval);
      this.schedulerRegistry.addInterval(STATUS_TICK_NAME, interval);
      this.logger.log(`Status tick scheduled every ${this.config.updateStatusInterval / 1000}s`);
    }
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', STATUS_TICK_NAME)) {
      this.schedulerRegistry.deleteInterval(STATUS_TICK_NAME);
      this.logger.log('Status tick stopped');
    }
  }

  @OnEvent(LIFECYCLE_EVENT)
  handleLifecycleEvent(event: unknown): Promise<void> {
    if (!isLifecycleEvent(event)) {
      this.logger.warn(`Ignoring unknown lifecycle event: ${String(event)}`);
      return Promise.resolve();
    }

    return this.dispatch(event);
  }

  /**
   * Queues an event behind those already pending.
   * @returns A promise settled once this event has been handled. It never rejects.
   */
  dispatch(event: LifecycleEvent): Promise<void> {
    return this.enqueue(() => this.handle(event));
  }

  /**
   * Applies new domain settings and re-evaluates the configuration.
   * A settings update also allows a failed fqdn to be attempted again.
   * @throws {Error} If a value is malformed
   */
  async updateSettings(settings: DomainSettingsUpdate): Promise<void> {
    this.domainSettings.update(settings);
    await this.enqueue(() => this.handle('config-changed', true));
  }

  flags(): LifecycleFlags {
    const state = this.stateStore.snapshot();

    return {
      installed: state.installed,
      registered: state.registered,
      certificateRequested: state.pendingRequests.length > 0,
      fqdnConfigured: this.domainSettings.get('fqdn') !== '',
      fqdnChanged: this.domainSettings.changed('fqdn'),
      fqdnFailed: this.domainSettings.failed('fqdn'),
      renewRequested: state.renewRequested,
      renewalArmed: this.renewalScheduler.isArmed(),
      disabled: this.config.disabled,
      renewDisabled: this.config.renewDisabled,
    };
  }

  snapshot(): LifecycleSnapshot {
    const state = this.stateStore.snapshot();

    return {
      status: state.status,
      flags: this.flags(),
      fqdn: this.domainSettings.get('fqdn'),
      contactEmail: this.domainSettings.get('contact-email'),
      pendingRequests: state.pendingRequests.length,
      renewalSchedule: this.renewalScheduler.cronExpression(),
      lastRenewedAt: state.lastRenewedAt,
    };
  }

  private enqueue(work: () => Promise<void>): Promise<void> {
    const handled = this.queue.then(work);
    this.queue = handled;
    return handled;
  }

  /**
   * @param explicit Whether the event is an explicit trigger, which allows a failed fqdn to be retried.
   */
  private async handle(event: LifecycleEvent, explicit = event === 'certificate-requested'): Promise<void> {
    this.logger.debug(`Handling lifecycle event ${event}`);

    if (explicit) {
      try {
        this.domainSettings.clearFailure();
      } catch (error) {
        this.reportFailure('retry', event, error);
        return;
      }
    }

    for (const rule of TRANSITIONS) {
      if (!handlesEvent(rule, event)) {
        continue;
      }

      try {
        if (!rule.guard(this.flags())) {
          continue;
        }

        this.logger.log(`Running transition ${rule.name} on ${event}`);
        await this.run(rule.name);
      } catch (error) {
        this.reportFailure(rule.name, event, error);
        return;
      }
    }
  }

  private reportFailure(step: string, event: LifecycleEvent, error: unknown): void {
    const message = getErrorMessage(error);
    this.logger.error(`Transition ${step} failed on ${event}: ${message}`, getErrorStack(error));
    this.statusService.blocked(`${step} failed: ${message}`);
  }

  private run(transition: TransitionName): Promise<void> {
    switch (transition) {
      case 'install':
        return this.install();
      case 'reset-registration':
        return this.resetRegistration();
      case 'register':
        return this.register();
      case 'restore-renewal-trigger':
        return this.restoreRenewalTrigger();
      case 'renew':
        return this.renewalScheduler.renew();
    }
  }

  private async install(): Promise<void> {
    const platform = await this.platform.check();

    if (!platform.supported) {
      this.statusService.blocked(`Unsupported platform ${platform.description}`);
      return;
    }

    await this.certificateSetup.installClient();
    // Open the ports now so the first registration does not wait a cycle
    await this.portCoordinator.openStandingPorts();

    this.stateStore.update((state) => {
      state.installed = true;
    });
    this.statusService.active('ready');
  }

  private async resetRegistration(): Promise<void> {
    this.logger.log(
      `fqdn changed from "${this.domainSettings.previous('fqdn')}" to "${this.domainSettings.get('fqdn')}"`,
    );
    this.requestStore.setRegistered(false);
    // A failure of the current fqdn stands; only a stale one is dropped
    if (!this.domainSettings.failed('fqdn')) {
      this.domainSettings.clearFailure();
    }
    this.domainSettings.acknowledge();
  }

  private async register(): Promise<void> {
    const fqdn = this.domainSettings.get('fqdn');
    const configDue = fqdn !== '' && !this.requestStore.isRegistered() && !this.domainSettings.failed('fqdn');

    if (!configDue && this.requestStore.pendingRequests().length === 0) {
      return;
    }

    if (!(await this.portCoordinator.ensurePortsAvailable())) {
      this.statusService.waiting(PORTS_WAITING_MESSAGE);
      return;
    }

    if (configDue) {
      this.requestStore.appendFromConfig(fqdn, this.domainSettings.get('contact-email'));
    }

    const issued = await this.issuance.createCertificates(this.requestStore.pendingRequests());
    if (!issued) {
      if (configDue) {
        this.domainSettings.markFailed('fqdn');
      }
      return;
    }

    this.domainSettings.clearFailure();
    this.renewalScheduler.disarm();
    this.renewalScheduler.arm();
    await this.certificateSetup.installDhParams();
    this.requestStore.setRegistered(true);
  }

  private async restoreRenewalTrigger(): Promise<void> {
    this.renewalScheduler.arm();
  }
}
