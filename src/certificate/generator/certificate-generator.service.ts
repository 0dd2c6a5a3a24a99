import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CertificateType } from '../certificate.constants';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import type {
  Certificate,
  CertificateConfig,
  GenerateOptions,
  GenerationResult,
  ManualCertificatePaths,
  RenewalTrigger,
} from '../interfaces';
import { CertificateError, GenerationError } from '../errors/certificate.errors';
import { CertificateSelectorService } from '../selector/certificate-selector.service';
import { CertificateStoreService } from '../store/certificate-store.service';
import { CertificateStorageService } from '../storage/certificate-storage.service';
import type { Promotion, StagedArtifacts } from '../storage/certificate-storage.service';
import { getErrorMessage } from '../../shared/error.utils';
import { AcmeToolService, isCompatibilityFailure } from './acme-tool.service';
import { ArtifactInspectorService } from './artifact-inspector.service';
import { SelfSignedIssuerService } from './self-signed-issuer.service';

interface CommitOptions {
  autoRenew: boolean;
  acmeStaging?: boolean;
  challengeMethod?: string;
  signal?: AbortSignal;
}

/**
 * Produces certificate material and commits it to the store.
 *
 * Each request moves through requested → in_progress → issued | failed.
 * Material is staged, inspected and only then installed and recorded, so a
 * failed or cancelled request leaves the store untouched.
 */
@Injectable()
export class CertificateGeneratorService {
  private readonly logger = new Logger(CertificateGeneratorService.name);

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly store: CertificateStoreService,
    private readonly selector: CertificateSelectorService,
    private readonly storage: CertificateStorageService,
    private readonly inspector: ArtifactInspectorService,
    private readonly selfSignedIssuer: SelfSignedIssuerService,
    private readonly acmeTool: AcmeToolService,
  ) {}

  async generate(domain: string, certificateType: CertificateType, options: GenerateOptions = {}): Promise<GenerationResult> {
    if (certificateType === 'manual') {
      throw new GenerationError(`Manual certificates for ${domain} are imported, not generated`, {
        domain,
        certificateType,
        reason: 'unsupported',
      });
    }

    if (!options.force) {
      const existing = this.selector.select(domain, certificateType);
      if (existing.found) {
        this.logger.debug(`Reusing ${certificateType} certificate ${existing.certificate.id} for ${domain}`);
        return { certificate: existing.certificate, outcome: 'existing' };
      }
    }

    const trigger = options.trigger ?? 'manual';
    this.logger.log(`Certificate requested for ${domain}`, { certificateType, trigger, force: options.force === true });

    const previous = this.store.findByDomainAndType(domain, certificateType);
    const renewalId = this.store.startRenewal({
      domain,
      certificateType,
      trigger,
      oldNotAfter: previous?.notAfter,
    });

    try {
      this.logger.log(`Certificate generation in progress for ${domain}`, { certificateType });
      const certificate =
        certificateType === 'self-signed'
          ? await this.issueSelfSigned(domain, options)
          : await this.issueWithAcme(domain, certificateType, options);

      this.store.completeRenewal(renewalId, {
        success: true,
        certificateId: certificate.id,
        newNotAfter: certificate.notAfter,
      });
      this.logger.log(`Certificate issued for ${domain}`, {
        certificateType,
        certificateId: certificate.id,
        revision: certificate.revision,
        notAfter: certificate.notAfter.toISOString(),
      });
      return { certificate, outcome: 'issued' };
    } catch (error) {
      const failure = this.toGenerationError(error, domain, certificateType);
      this.store.completeRenewal(renewalId, { success: false, errorMessage: failure.message });
      this.store.recordRenewalFailure(domain, certificateType, failure.message);

      if (failure.reason !== 'cancelled' && isCompatibilityFailure(failure.output)) {
        return this.fallBackToSelfSigned(domain, certificateType, failure, options);
      }

      this.logger.error(`Certificate generation failed for ${domain} (${certificateType}, ${failure.reason}): ${failure.message}`, failure.stack);
      throw failure;
    }
  }

  /**
   * Copies operator-supplied files into the manual tree and records them.
   * Manual certificates are never renewed automatically.
   */
  async importManual(domain: string, paths: ManualCertificatePaths, trigger: RenewalTrigger = 'manual'): Promise<Certificate> {
    const previous = this.store.findByDomainAndType(domain, 'manual');
    const renewalId = this.store.startRenewal({
      domain,
      certificateType: 'manual',
      trigger,
      oldNotAfter: previous?.notAfter,
    });

    try {
      let staged: StagedArtifacts;
      try {
        staged = this.storage.stageCopy('manual', domain, paths);
      } catch (error) {
        throw new GenerationError(`Manual certificate files for ${domain} could not be read`, {
          domain,
          certificateType: 'manual',
          reason: 'artifact-invalid',
          cause: error,
        });
      }

      const certificate = await this.commit(domain, 'manual', staged, { autoRenew: false });
      this.store.completeRenewal(renewalId, {
        success: true,
        certificateId: certificate.id,
        newNotAfter: certificate.notAfter,
      });
      this.logger.log(`Imported manual certificate for ${domain}`, { certificateId: certificate.id });
      return certificate;
    } catch (error) {
      const failure = this.toGenerationError(error, domain, 'manual');
      this.store.completeRenewal(renewalId, { success: false, errorMessage: failure.message });
      this.store.recordRenewalFailure(domain, 'manual', failure.message);
      this.logger.error(`Manual certificate import failed for ${domain}: ${failure.message}`, failure.stack);
      throw failure;
    }
  }

  private async issueSelfSigned(domain: string, options: GenerateOptions): Promise<Certificate> {
    const material = await this.selfSignedIssuer.issue(domain, options.subjectAltNames);
    this.throwIfCancelled(domain, 'self-signed', options.signal);
    const staged = this.storage.stage('self-signed', domain, material);
    return this.commit(domain, 'self-signed', staged, { autoRenew: true, signal: options.signal });
  }

  private async issueWithAcme(domain: string, certificateType: CertificateType, options: GenerateOptions): Promise<Certificate> {
    const { sources } = await this.acmeTool.obtain({
      domain,
      certificateType,
      subjectAltNames: options.subjectAltNames,
      force: options.force,
      signal: options.signal,
    });
    this.throwIfCancelled(domain, certificateType, options.signal);

    let staged: StagedArtifacts;
    try {
      staged = this.storage.stageCopy(certificateType, domain, sources);
    } catch (error) {
      throw new GenerationError(`Could not copy ACME output for ${domain}`, {
        domain,
        certificateType,
        reason: 'io',
        cause: error,
      });
    }

    return this.commit(domain, certificateType, staged, {
      autoRenew: true,
      acmeStaging: certificateType === 'letsencrypt-staging',
      challengeMethod: this.config.challengeMethod,
      signal: options.signal,
    });
  }

  /**
   * Degraded path: the ACME environment is known to be incompatible, so the
   * domain is covered with a self-signed certificate instead.
   */
  private async fallBackToSelfSigned(
    domain: string,
    requestedType: CertificateType,
    failure: GenerationError,
    options: GenerateOptions,
  ): Promise<GenerationResult> {
    this.logger.warn(`DEGRADED: ${requestedType} issuance for ${domain} is incompatible with this environment, using self-signed`, {
      reason: failure.message,
    });

    const fallback = { requestedType, reason: failure.message };
    const existing = this.selector.select(domain, 'self-signed');
    if (existing.found) {
      return { certificate: existing.certificate, outcome: 'fallback', fallback };
    }

    const renewalId = this.store.startRenewal({
      domain,
      certificateType: 'self-signed',
      trigger: 'fallback',
      fallbackFrom: requestedType,
    });

    try {
      const certificate = await this.issueSelfSigned(domain, options);
      this.store.completeRenewal(renewalId, {
        success: true,
        certificateId: certificate.id,
        newNotAfter: certificate.notAfter,
      });
      return { certificate, outcome: 'fallback', fallback };
    } catch (error) {
      const fallbackFailure = this.toGenerationError(error, domain, 'self-signed');
      this.store.completeRenewal(renewalId, { success: false, errorMessage: fallbackFailure.message });
      this.store.recordRenewalFailure(domain, 'self-signed', fallbackFailure.message);
      this.logger.error(`Self-signed fallback failed for ${domain}: ${fallbackFailure.message}`, fallbackFailure.stack);
      throw fallbackFailure;
    }
  }

  private async commit(
    domain: string,
    certificateType: CertificateType,
    staged: StagedArtifacts,
    options: CommitOptions,
  ): Promise<Certificate> {
    try {
      const inspected = await this.inspector.inspect(domain, certificateType, staged.paths);
      this.throwIfCancelled(domain, certificateType, options.signal);

      const promotion = this.storage.promote(staged);
      const paths = promotion.paths;
      try {
        return this.store.upsertIssued({
          domain,
          certificateType,
          subjectAltNames: inspected.subjectAltNames,
          issuer: inspected.issuer,
          notBefore: inspected.notBefore,
          notAfter: inspected.notAfter,
          certificatePath: paths.certificate,
          privateKeyPath: paths.private_key,
          chainPath: paths.chain,
          fullchainPath: paths.fullchain,
          autoRenew: options.autoRenew,
          acmeStaging: options.acmeStaging,
          challengeMethod: options.challengeMethod,
          files: inspected.files.map((file) => ({ ...file, filePath: paths[file.fileType] })),
        });
      } catch (error) {
        this.restorePromotion(promotion, domain, certificateType);
        throw error;
      }
    } finally {
      this.storage.discard(staged);
    }
  }

  private restorePromotion(promotion: Promotion, domain: string, certificateType: CertificateType): void {
    try {
      promotion.restore();
    } catch (error) {
      this.logger.error(`Could not restore previous ${certificateType} files for ${domain}: ${getErrorMessage(error)}`);
    }
  }

  private throwIfCancelled(domain: string, certificateType: CertificateType, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new GenerationError(`Generation for ${domain} was cancelled`, {
        domain,
        certificateType,
        reason: 'cancelled',
      });
    }
  }

  private toGenerationError(error: unknown, domain: string, certificateType: CertificateType): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }
    const reason = error instanceof CertificateError ? 'artifact-invalid' : 'io';
    return new GenerationError(getErrorMessage(error), { domain, certificateType, reason, cause: error });
  }
}
