import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StateStoreService } from './state-store.service';
import { RequestStoreService } from './request-store.service';
import { StatusService } from './status.service';
import { DomainSettingsService } from './domain-settings.service';
import { STATE_CONFIG } from './state.tokens';
import type { StateConfig } from './interfaces';
import { DEFAULT_DATA_PATH } from '../config/config.constants';

const stateConfigProvider = {
  provide: STATE_CONFIG,
  useFactory: (configService: ConfigService): StateConfig => ({
    dataPath: configService.get<string>('steward.dataPath') ?? DEFAULT_DATA_PATH,
  }),
  inject: [ConfigService],
};

/**
 * Persisted state: the state record, the request queue, the status channel
 * and the domain settings.
 */
@Module({
  providers: [stateConfigProvider, StateStoreService, RequestStoreService, StatusService, DomainSettingsService],
  exports: [StateStoreService, RequestStoreService, StatusService, DomainSettingsService],
})
export class StateModule {}
