import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { StateModule } from '../state/state.module';
import { HostModule } from '../host/host.module';
import { CertificateModule } from '../certificate/certificate.module';
import { RenewalModule } from '../renewal/renewal.module';
import { LifecycleService } from './lifecycle.service';
import { LifecycleController } from './lifecycle.controller';
import { LifecycleHealthIndicator } from './lifecycle.health';
import { LIFECYCLE_CONFIG } from './lifecycle.tokens';
import type { LifecycleConfig } from './interfaces';
import type { StewardConfiguration } from '../config/config.types';
import { DEFAULT_UPDATE_STATUS_INTERVAL } from '../config/config.constants';

/**
 * Factory provider for LifecycleConfig.
 */
const lifecycleConfigProvider = {
  provide: LIFECYCLE_CONFIG,
  useFactory: (configService: ConfigService): LifecycleConfig => {
    const lifecycle = configService.get<StewardConfiguration['lifecycle']>('steward.lifecycle');
    const renewal = configService.get<StewardConfiguration['renewal']>('steward.renewal');

    return {
      disabled: lifecycle?.disabled ?? false,
      renewDisabled: renewal?.disabled ?? false,
      updateStatusInterval: lifecycle?.updateStatusInterval ?? DEFAULT_UPDATE_STATUS_INTERVAL,
    };
  },
  inject: [ConfigService],
};

@Module({
  imports: [StateModule, HostModule, CertificateModule, RenewalModule, TerminusModule],
  controllers: [LifecycleController],
  providers: [lifecycleConfigProvider, LifecycleService, LifecycleHealthIndicator],
  exports: [LifecycleService, LifecycleHealthIndicator],
})
export class LifecycleModule {}
