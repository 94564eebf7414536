import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StateStoreService } from './state-store.service';
import { isValidDomain, isValidEmail } from '../config/config.validators';
import type { StewardConfiguration } from '../config/config.types';

export type DomainSettingKey = 'fqdn' | 'contact-email';

export interface DomainSettingsUpdate {
  fqdn?: string;
  contactEmail?: string;
}

/**
 * The configuration surface for the single-FQDN setting.
 *
 * Values are seeded from the environment and may be replaced at runtime.
 * Change detection compares the current fqdn with the value recorded in the
 * state record at the last configuration evaluation, so a change made while
 * the daemon was stopped is still detected on the next start.
 */
@Injectable()
export class DomainSettingsService {
  private readonly logger = new Logger(DomainSettingsService.name);
  private readonly values: Record<DomainSettingKey, string>;

  constructor(
    configService: ConfigService,
    private readonly stateStore: StateStoreService,
  ) {
    const domain = configService.get<StewardConfiguration['domain']>('steward.domain');
    this.values = {
      fqdn: domain?.fqdn ?? '',
      'contact-email': domain?.contactEmail ?? '',
    };
  }

  get(key: DomainSettingKey): string {
    return this.values[key];
  }

  /**
   * The fqdn recorded at the last configuration evaluation ('' if none).
   */
  previous(key: 'fqdn'): string {
    return this.stateStore.snapshot().previousFqdn ?? '';
  }

  changed(key: 'fqdn'): boolean {
    return this.previous(key) !== this.get(key);
  }

  /**
   * Replaces settings at runtime. Values are not persisted; the environment
   * applies again after a restart.
   * @throws {Error} If a value is malformed
   */
  update(settings: DomainSettingsUpdate): void {
    if (settings.fqdn !== undefined) {
      const fqdn = settings.fqdn.trim().toLowerCase();
      if (fqdn && !isValidDomain(fqdn)) {
        throw new Error(`Invalid domain format: ${fqdn}`);
      }
      this.values.fqdn = fqdn;
    }

    if (settings.contactEmail !== undefined) {
      const contactEmail = settings.contactEmail.trim();
      if (contactEmail && !isValidEmail(contactEmail)) {
        throw new Error(`Invalid email address: ${contactEmail}`);
      }
      this.values['contact-email'] = contactEmail;
    }

    this.logger.log('Domain settings updated', {
      fqdn: this.values.fqdn,
      contactEmail: this.values['contact-email'],
    });
  }

  /**
   * Whether the request for the current fqdn failed and awaits an explicit retry.
   */
  failed(key: 'fqdn'): boolean {
    const fqdn = this.get(key);
    return fqdn !== '' && this.stateStore.snapshot().failedFqdn === fqdn;
  }

  markFailed(key: 'fqdn'): void {
    const fqdn = this.get(key);
    this.logger.warn(`Issuance for ${fqdn} failed; not retrying until a new request or settings update`);
    this.stateStore.update((state) => {
      state.failedFqdn = fqdn;
    });
  }

  clearFailure(): void {
    this.stateStore.update((state) => {
      state.failedFqdn = null;
    });
  }

  /**
   * Records the current fqdn as the previous one, ending a change.
   */
  acknowledge(): void {
    const fqdn = this.get('fqdn');
    this.stateStore.update((state) => {
      state.previousFqdn = fqdn;
    });
  }
}
