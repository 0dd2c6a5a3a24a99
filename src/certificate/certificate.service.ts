import { Inject, Injectable, Logger } from '@nestjs/common';
import type { OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { STARTUP_CHECK_DELAY_MS } from './certificate.constants';
import type { CertificateType } from './certificate.constants';
import { CERTIFICATE_CONFIG, CLOCK } from './certificate.tokens';
import type { Clock } from './certificate.tokens';
import type {
  BindingStatus,
  Certificate,
  CertificateConfig,
  DomainStatus,
  GenerateOptions,
  GenerationResult,
  ManualCertificatePaths,
  RenewalTrigger,
} from './interfaces';
import { CertificateGeneratorService } from './generator/certificate-generator.service';
import { CertificateSelectorService } from './selector/certificate-selector.service';
import { CertificateStoreService } from './store/certificate-store.service';
import { CertificateWatcherService } from './watcher/certificate-watcher.service';
import { ManagedServiceRegistry } from '../services/managed-service.registry';
import { getErrorMessage } from '../shared/error.utils';

const DAY_MS = 1000 * 60 * 60 * 24;

export interface RenewalCheckSummary {
  ensured: number;
  renewed: number;
  expired: number;
  failed: number;
}

/**
 * Lifecycle orchestration over the store, selector and generator: keeps every
 * configured domain covered, renews ahead of expiry, sweeps expired material
 * and answers operator status queries.
 */
@Injectable()
export class CertificateService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(CertificateService.name);
  private readonly inFlight = new Map<string, Promise<GenerationResult>>();
  private initializationTimer?: NodeJS.Timeout;

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly store: CertificateStoreService,
    private readonly selector: CertificateSelectorService,
    private readonly generator: CertificateGeneratorService,
    private readonly watchers: CertificateWatcherService,
    private readonly services: ManagedServiceRegistry,
  ) {}

  onApplicationBootstrap(): void {
    this.logger.log(`Scheduling certificate check for ${this.config.domains.join(', ')} in ${STARTUP_CHECK_DELAY_MS / 1000} seconds...`);
    this.initializationTimer = setTimeout(() => {
      this.initializationTimer = undefined;
      this.checkAndRenewIfNeeded().catch((error: unknown) => {
        this.logger.error(`Background certificate check failed: ${getErrorMessage(error)}`);
      });
    }, STARTUP_CHECK_DELAY_MS);
    this.initializationTimer.unref();
  }

  onApplicationShutdown(): void {
    if (this.initializationTimer) {
      clearTimeout(this.initializationTimer);
      this.initializationTimer = undefined;
      this.logger.debug('Cleared initialization timer');
    }
  }

  /**
   * Returns the selected certificate for a domain, generating one when
   * nothing is selectable. Without an explicit type the configured default
   * type is generated.
   */
  async ensureCertificate(
    domain: string,
    options: { type?: CertificateType; trigger?: RenewalTrigger; signal?: AbortSignal } = {},
  ): Promise<GenerationResult> {
    const selection = this.selector.select(domain, options.type);
    if (selection.found) {
      return { certificate: selection.certificate, outcome: 'existing' };
    }

    const certificateType = options.type ?? this.config.defaultType;
    this.logger.log(`No usable certificate for ${domain} (${selection.reason}); generating ${certificateType}`);
    return this.generate(domain, certificateType, { trigger: options.trigger, signal: options.signal });
  }

  /** Forced generation, regardless of the current certificate's validity. */
  async renew(domain: string, certificateType: CertificateType, trigger: RenewalTrigger = 'manual'): Promise<GenerationResult> {
    return this.generate(domain, certificateType, { force: true, trigger });
  }

  /**
   * Runs the generator, sharing one in-flight request per domain and type.
   */
  generate(domain: string, certificateType: CertificateType, options: GenerateOptions = {}): Promise<GenerationResult> {
    const key = `${domain}/${certificateType}`;
    const running = this.inFlight.get(key);
    if (running) {
      this.logger.debug(`Joining in-flight ${certificateType} request for ${domain}`);
      return running;
    }

    const request = this.generator.generate(domain, certificateType, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  importManual(domain: string, paths: ManualCertificatePaths): Promise<Certificate> {
    return this.generator.importManual(domain, paths, 'api');
  }

  deactivate(id: number, reason: string): Certificate {
    return this.store.deactivate(id, reason);
  }

  listCertificates(domain?: string): Certificate[] {
    return domain === undefined ? this.store.listAll() : this.store.listByDomain(domain);
  }

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  async scheduledRenewalCheck(): Promise<void> {
    this.logger.log('Running scheduled certificate check');
    try {
      await this.checkAndRenewIfNeeded();
    } catch (error) {
      this.logger.error(`Scheduled certificate check failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * For every configured domain: sweep expired certificates, renew the
   * auto-renewing ones inside the renewal window, then make sure something
   * is selectable. A failing domain never stops the others.
   */
  async checkAndRenewIfNeeded(): Promise<RenewalCheckSummary> {
    const summary: RenewalCheckSummary = { ensured: 0, renewed: 0, expired: 0, failed: 0 };

    for (const domain of this.config.domains) {
      summary.expired += this.sweepExpired(domain);

      for (const certificate of this.renewalCandidates(domain)) {
        const daysUntilExpiry = this.getDaysUntilExpiry(certificate);
        this.logger.log(`Certificate expires in ${daysUntilExpiry} days; renewing now`, {
          domain,
          certificateType: certificate.certificateType,
          expiresAt: certificate.notAfter.toISOString(),
        });
        try {
          await this.renew(domain, certificate.certificateType, 'scheduled');
          summary.renewed += 1;
        } catch (error) {
          summary.failed += 1;
          this.logger.error(`Scheduled renewal of ${certificate.certificateType} for ${domain} failed: ${getErrorMessage(error)}`);
        }
      }

      try {
        const result = await this.ensureCertificate(domain, { trigger: 'scheduled' });
        if (result.outcome !== 'existing') {
          summary.ensured += 1;
        }
      } catch (error) {
        summary.failed += 1;
        this.logger.error(`Could not cover ${domain} with a certificate: ${getErrorMessage(error)}`);
      }
    }

    this.logger.log('Certificate check complete', { ...summary });
    return summary;
  }

  /**
   * Emits one `expired` event for each active certificate past its not_after.
   * Certificates whose latest event is already `expired` are skipped.
   */
  sweepExpired(domain: string): number {
    const now = this.clock.now();
    let swept = 0;

    for (const certificate of this.store.listByDomain(domain)) {
      if (!certificate.isActive || certificate.notAfter.getTime() > now.getTime()) {
        continue;
      }
      if (this.store.latestEvent(certificate.id)?.operation === 'expired') {
        continue;
      }
      this.store.markExpired(certificate.id);
      this.logger.warn(`Certificate ${certificate.id} (${certificate.certificateType}) for ${domain} has expired`);
      swept += 1;
    }

    return swept;
  }

  getDomainStatus(domain: string): DomainStatus {
    const selection = this.selector.select(domain, this.config.typePreference);
    const selected = selection.found ? selection.certificate : undefined;

    const stored = new Map(this.store.listBindings(domain).map((binding) => [binding.serviceName, binding]));
    const serviceNames = new Set([...this.services.list().map((service) => service.name), ...stored.keys()]);
    const bindings: BindingStatus[] = [...serviceNames].map((serviceName) => {
      const binding = stored.get(serviceName);
      if (!binding) {
        return { serviceName, inSync: false };
      }
      return {
        serviceName,
        certificateId: binding.certificateId,
        certificateType: binding.certificateType,
        certificateRevision: binding.certificateRevision,
        updatedAt: binding.updatedAt,
        inSync: selected !== undefined && binding.certificateId === selected.id && binding.certificateRevision === selected.revision,
      };
    });

    return {
      domain,
      selected: selected && {
        certificateId: selected.id,
        certificateType: selected.certificateType,
        notAfter: selected.notAfter,
        daysUntilExpiry: this.getDaysUntilExpiry(selected),
      },
      selectionMiss: selection.found ? undefined : selection.reason,
      candidates: this.selector.candidates(domain, this.config.typePreference),
      lastRenewal: this.store.lastRenewal(domain),
      bindings,
      watchers: this.watchers.snapshot(domain),
      alarms: this.store.activeAlarms(domain),
      filesNeedingVerification: this.store.listFilesNeedingVerification(domain),
    };
  }

  private renewalCandidates(domain: string): Certificate[] {
    const threshold = this.config.renewDaysBeforeExpiry;
    return this.store
      .listByDomain(domain)
      .filter(
        (certificate) =>
          certificate.isActive &&
          certificate.autoRenew &&
          certificate.certificateType !== 'manual' &&
          this.getDaysUntilExpiry(certificate) <= threshold,
      );
  }

  private getDaysUntilExpiry(certificate: Certificate): number {
    const diffMs = certificate.notAfter.getTime() - this.clock.now().getTime();
    return Math.floor(diffMs / DAY_MS);
  }
}
