import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CertificateModule } from '../certificate/certificate.module';
import { HostModule } from '../host/host.module';
import { StateModule } from '../state/state.module';
import { RenewalSchedulerService } from './renewal-scheduler.service';
import { RenewalController } from './renewal.controller';
import { RENEWAL_CONFIG } from './renewal.tokens';
import type { RenewalConfig } from './interfaces';
import { DEFAULT_RENEW_HOURS } from '../config/config.constants';

const renewalConfigProvider = {
  provide: RENEWAL_CONFIG,
  useFactory: (configService: ConfigService): RenewalConfig =>
    configService.get<RenewalConfig>('steward.renewal') ?? { hours: DEFAULT_RENEW_HOURS },
  inject: [ConfigService],
};

@Module({
  imports: [CertificateModule, HostModule, StateModule],
  controllers: [RenewalController],
  providers: [renewalConfigProvider, RenewalSchedulerService],
  exports: [RenewalSchedulerService],
})
export class RenewalModule {}
