import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { CertificateModule } from '../certificate/certificate.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, CertificateModule],
  controllers: [HealthController],
})
export class HealthModule {}
