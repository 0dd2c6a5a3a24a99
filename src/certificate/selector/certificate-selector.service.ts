import { Inject, Injectable } from '@nestjs/common';
import { AUTOMATIC_SELECTION_ORDER } from '../certificate.constants';
import type { CertificateType } from '../certificate.constants';
import { CERTIFICATE_CONFIG, CLOCK } from '../certificate.tokens';
import type { Clock } from '../certificate.tokens';
import type { Certificate, CertificateConfig, SelectionCandidate, SelectionResult } from '../interfaces';
import { CertificateStoreService } from '../store/certificate-store.service';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Picks the certificate a domain should be served with. Pure read.
 *
 * An explicit type preference is honoured strictly: a miss is reported rather
 * than substituted, and the caller decides whether to fall back. Without one,
 * production beats staging beats self-signed; manual certificates are only
 * served as an explicit preference.
 */
@Injectable()
export class CertificateSelectorService {
  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly store: CertificateStoreService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  select(domain: string, preferredType?: CertificateType): SelectionResult {
    const now = this.clock.now();

    if (preferredType) {
      const certificate = this.store.findByDomainAndType(domain, preferredType);
      const reason = this.rejectionReason(certificate, now);
      if (certificate && reason === undefined) {
        return { found: true, certificate };
      }
      return { found: false, reason: `${preferredType} certificate for ${domain} ${reason ?? 'is absent'}` };
    }

    const byType = new Map(this.store.listByDomain(domain).map((certificate) => [certificate.certificateType, certificate]));
    for (const type of AUTOMATIC_SELECTION_ORDER) {
      const certificate = byType.get(type);
      if (certificate && this.rejectionReason(certificate, now) === undefined) {
        return { found: true, certificate };
      }
    }

    if (byType.size === 0) {
      return { found: false, reason: `no certificate stored for ${domain}` };
    }
    if (!AUTOMATIC_SELECTION_ORDER.some((type) => byType.has(type))) {
      return { found: false, reason: `only a manual certificate is stored for ${domain}; it is served only when preferred` };
    }
    return {
      found: false,
      reason: `no active certificate for ${domain} is valid beyond the ${this.config.renewalMarginHours}h margin`,
    };
  }

  /**
   * Every stored certificate for a domain in priority order (manual last),
   * with the reason it would or would not be selected under `preferredType`.
   */
  candidates(domain: string, preferredType?: CertificateType): SelectionCandidate[] {
    const now = this.clock.now();
    const priority = (type: CertificateType): number => {
      const index = AUTOMATIC_SELECTION_ORDER.indexOf(type);
      return index === -1 ? AUTOMATIC_SELECTION_ORDER.length : index;
    };

    return this.store
      .listByDomain(domain)
      .sort((a, b) => priority(a.certificateType) - priority(b.certificateType))
      .map((certificate) => {
        const reason = this.rejectionReason(certificate, now) ?? this.preferenceReason(certificate.certificateType, preferredType);
        return {
          certificateId: certificate.id,
          certificateType: certificate.certificateType,
          notAfter: certificate.notAfter,
          isActive: certificate.isActive,
          usable: reason === undefined,
          reason,
        };
      });
  }

  /** Margin-adjusted cutoff: certificates must stay valid past this instant. */
  cutoff(now: Date = this.clock.now()): Date {
    return new Date(now.getTime() + this.config.renewalMarginHours * HOUR_MS);
  }

  private preferenceReason(certificateType: CertificateType, preferredType?: CertificateType): string | undefined {
    if (preferredType !== undefined && certificateType !== preferredType) {
      return `is not the preferred ${preferredType} type`;
    }
    if (preferredType === undefined && certificateType === 'manual') {
      return 'is served only when manual is the preferred type';
    }
    return undefined;
  }

  private rejectionReason(certificate: Certificate | undefined, now: Date): string | undefined {
    if (!certificate) {
      return 'is absent';
    }
    if (!certificate.isActive) {
      return 'is inactive';
    }
    if (certificate.notAfter.getTime() <= this.cutoff(now).getTime()) {
      return certificate.notAfter.getTime() <= now.getTime() ? 'has expired' : 'expires within the safety margin';
    }
    return undefined;
  }
}
