import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import appConfig from './app.config';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { CertificateModule } from './certificate/certificate.module';
import { ServicesModule } from './services/services.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    // Topics are certificates/<domain>/<type>; domains contain dots, so the delimiter is '/'.
    EventEmitterModule.forRoot({ wildcard: true, delimiter: '/' }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    ServicesModule,
    CertificateModule,
    HealthModule,
  ],
})
export class AppModule {}
