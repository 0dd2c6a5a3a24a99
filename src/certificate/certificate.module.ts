import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { CertificateController } from './certificate.controller';
import { CertificateService } from './certificate.service';
import { CertificateHealthIndicator } from './certificate.health';
import { CERTIFICATE_CONFIG, CLOCK, INTEGRITY_CONFIG, PUBSUB, WATCHER_CONFIG, systemClock } from './certificate.tokens';
import type { CertificateConfig, IntegrityConfig, WatcherConfig } from './interfaces';
import { AcmeToolService } from './generator/acme-tool.service';
import { ArtifactInspectorService } from './generator/artifact-inspector.service';
import { CertificateGeneratorService } from './generator/certificate-generator.service';
import { SelfSignedIssuerService } from './generator/self-signed-issuer.service';
import { ApiKeyGuard } from './guards/api-key.guard';
import { CertificateIntegrityService } from './integrity/certificate-integrity.service';
import { ChangeNotifierService } from './notifier/change-notifier.service';
import { EventEmitterPubSub } from './notifier/event-emitter.pubsub';
import { ServiceReloaderService } from './reloader/service-reloader.service';
import { CertificateSelectorService } from './selector/certificate-selector.service';
import { CertificateStorageService } from './storage/certificate-storage.service';
import { CertificateStoreService } from './store/certificate-store.service';
import { CertificateWatcherService } from './watcher/certificate-watcher.service';
import { ServicesModule } from '../services/services.module';

/**
 * Factory provider for one `certd.*` configuration slice.
 */
function configSliceProvider<T>(token: symbol, key: string) {
  return {
    provide: token,
    useFactory: (configService: ConfigService): T => {
      const config = configService.get<T>(`certd.${key}`);
      if (config === undefined) {
        throw new Error(`Configuration "certd.${key}" is missing`);
      }
      return config;
    },
    inject: [ConfigService],
  };
}

/**
 * Certificate lifecycle: store, selection, generation, change notification,
 * service watchers and reloads, integrity checks and the operator API.
 */
@Module({
  imports: [TerminusModule, ServicesModule],
  controllers: [CertificateController],
  providers: [
    configSliceProvider<CertificateConfig>(CERTIFICATE_CONFIG, 'certificate'),
    configSliceProvider<WatcherConfig>(WATCHER_CONFIG, 'watcher'),
    configSliceProvider<IntegrityConfig>(INTEGRITY_CONFIG, 'integrity'),
    { provide: CLOCK, useValue: systemClock },
    { provide: PUBSUB, useClass: EventEmitterPubSub },
    ChangeNotifierService,
    CertificateStoreService,
    CertificateSelectorService,
    CertificateStorageService,
    ArtifactInspectorService,
    SelfSignedIssuerService,
    AcmeToolService,
    CertificateGeneratorService,
    ServiceReloaderService,
    CertificateWatcherService,
    CertificateIntegrityService,
    CertificateService,
    CertificateHealthIndicator,
    ApiKeyGuard,
  ],
  exports: [CertificateService, CertificateHealthIndicator, CertificateStoreService, CertificateWatcherService],
})
export class CertificateModule {}
