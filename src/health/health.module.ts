import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { CertificateModule } from '../certificate/certificate.module';
import { LifecycleModule } from '../lifecycle/lifecycle.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, CertificateModule, LifecycleModule],
  controllers: [HealthController],
})
export class HealthModule {}
