import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import appConfig from './app.config';
import { HealthModule } from './health/health.module';
import { StateModule } from './state/state.module';
import { HostModule } from './host/host.module';
import { CertificateModule } from './certificate/certificate.module';
import { RenewalModule } from './renewal/renewal.module';
import { LifecycleModule } from './lifecycle/lifecycle.module';
import { DEFAULT_THROTTLE_LIMIT, DEFAULT_THROTTLE_TTL } from './config/config.constants';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        throttlers: [
          {
            ttl: config.get<number>('steward.throttle.ttl') ?? DEFAULT_THROTTLE_TTL,
            limit: config.get<number>('steward.throttle.limit') ?? DEFAULT_THROTTLE_LIMIT,
          },
        ],
      }),
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    StateModule,
    HostModule,
    CertificateModule,
    RenewalModule,
    LifecycleModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
