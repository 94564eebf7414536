import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { join } from 'path';
import { CertificateController } from './certificate.controller';
import { CertificateHealthIndicator } from './certificate.health';
import { CertbotClientService } from './client/certbot-client.service';
import { CertificateInventoryService } from './storage/certificate-inventory.service';
import { CertificateSetupService } from './setup/certificate-setup.service';
import { IssuanceService } from './issuance/issuance.service';
import { HostModule } from '../host/host.module';
import { StateModule } from '../state/state.module';
import { CERTIFICATE_CONFIG } from './certificate.tokens';
import type { CertificateConfig } from './interfaces';
import { DEFAULT_CLIENT_BINARY, DEFAULT_CONFIG_DIR } from '../config/config.constants';

/**
 * Factory provider for CertificateConfig.
 */
const certificateConfigProvider = {
  provide: CERTIFICATE_CONFIG,
  useFactory: (configService: ConfigService): CertificateConfig => {
    const config = configService.get<CertificateConfig>('steward.client');
    return (
      config ??
      ({
        binary: DEFAULT_CLIENT_BINARY,
        installCommand: [],
        staging: false,
        configDir: DEFAULT_CONFIG_DIR,
        dhparamSource: join(__dirname, '..', '..', 'assets', 'dhparam.pem'),
      } satisfies CertificateConfig)
    );
  },
  inject: [ConfigService],
};

/**
 * Certificate issuance through the ACME client, and the certificate inventory.
 */
@Module({
  imports: [HostModule, StateModule, TerminusModule],
  controllers: [CertificateController],
  providers: [
    certificateConfigProvider,
    CertbotClientService,
    CertificateInventoryService,
    CertificateSetupService,
    IssuanceService,
    CertificateHealthIndicator,
  ],
  exports: [CertbotClientService, CertificateSetupService, IssuanceService, CertificateHealthIndicator],
})
export class CertificateModule {}
