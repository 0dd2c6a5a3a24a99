import { Inject, Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { CERTIFICATE_CONFIG } from './certificate.tokens';
import type { CertificateConfig } from './interfaces';
import { CertificateSelectorService } from './selector/certificate-selector.service';
import { CertificateStoreService } from './store/certificate-store.service';

/**
 * Health of certificate coverage. Down when any configured domain has
 * nothing selectable or any managed service carries an active alarm.
 */
@Injectable()
export class CertificateHealthIndicator {
  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly selector: CertificateSelectorService,
    private readonly store: CertificateStoreService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  isHealthy(key: string) {
    const uncovered: string[] = [];
    for (const domain of this.config.domains) {
      if (!this.selector.select(domain, this.config.typePreference).found) {
        uncovered.push(domain);
      }
    }
    const alarms = this.store.activeAlarms().map((alarm) => `${alarm.serviceName}/${alarm.domain}`);

    const indicator = this.healthIndicatorService.check(key);
    const details = {
      domains: this.config.domains.length,
      uncovered,
      alarms,
    };

    if (uncovered.length === 0 && alarms.length === 0) {
      return indicator.up(details);
    }

    return indicator.down(details);
  }
}
