import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StateModule } from '../state/state.module';
import { CommandRunnerService } from '../shared/command-runner.service';
import { ServiceControlService } from './service-control.service';
import { HostPortsService } from './host-ports.service';
import { PlatformService } from './platform.service';
import { PortCoordinatorService } from './port-coordinator.service';
import { HOST_CONFIG } from './host.tokens';
import type { HostConfig } from './interfaces';
import {
  DEFAULT_MIN_PLATFORM_VERSION,
  DEFAULT_OS_RELEASE_PATH,
  DEFAULT_PLATFORM_ID,
} from '../config/config.constants';

/**
 * Factory provider for HostConfig.
 */
const hostConfigProvider = {
  provide: HOST_CONFIG,
  useFactory: (configService: ConfigService): HostConfig => {
    const config = configService.get<HostConfig>('steward.host');
    return (
      config ??
      ({
        portsListCommand: [],
        portOpenCommand: [],
        platformId: DEFAULT_PLATFORM_ID,
        minPlatformVersion: DEFAULT_MIN_PLATFORM_VERSION,
        osReleasePath: DEFAULT_OS_RELEASE_PATH,
      } satisfies HostConfig)
    );
  },
  inject: [ConfigService],
};

/**
 * Host integration: service control, opened ports and the platform check.
 */
@Module({
  imports: [StateModule],
  providers: [
    hostConfigProvider,
    CommandRunnerService,
    ServiceControlService,
    HostPortsService,
    PlatformService,
    PortCoordinatorService,
  ],
  exports: [CommandRunnerService, PlatformService, PortCoordinatorService],
})
export class HostModule {}
