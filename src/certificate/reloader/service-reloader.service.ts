import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import type { ArtifactFile, Certificate, ReloadResult } from '../interfaces';
import { ReloadError } from '../errors/certificate.errors';
import type { ReloadStage } from '../errors/certificate.errors';
import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import { CertificateStoreService } from '../store/certificate-store.service';
import type { ManagedService, RenderHandle } from '../../services/interfaces';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Moves one managed service onto a certificate:
 * verify → render → validate → reload → liveness → record.
 *
 * Nothing before `reload` touches the running service, and a rejected config
 * is rolled back. From `reload` on, failures are high severity: the service
 * may be serving the old certificate or be partially reloaded.
 */
@Injectable()
export class ServiceReloaderService {
  private readonly logger = new Logger(ServiceReloaderService.name);

  constructor(
    private readonly store: CertificateStoreService,
    private readonly inspector: ArtifactInspectorService,
  ) {}

  async reload(service: ManagedService, domain: string, certificate: Certificate): Promise<ReloadResult> {
    const bound = this.store.getBinding(service.name, domain);
    if (bound && bound.certificateId === certificate.id && bound.certificateRevision === certificate.revision) {
      this.record(service, domain, certificate, 'noop');
      this.logger.debug(`${service.name} already serves certificate ${certificate.id} r${certificate.revision} for ${domain}`);
      return { outcome: 'noop', binding: bound };
    }

    this.logger.log(`Reloading ${service.name} for ${domain}`, {
      certificateId: certificate.id,
      certificateType: certificate.certificateType,
      revision: certificate.revision,
    });

    await this.step(service, domain, certificate, 'verify', () => this.verifyArtifacts(certificate));

    const handle = await this.step(service, domain, certificate, 'render', () =>
      service.renderConfig({
        domain,
        certificateId: certificate.id,
        certificatePath: certificate.certificatePath,
        privateKeyPath: certificate.privateKeyPath,
        chainPath: certificate.chainPath,
        fullchainPath: certificate.fullchainPath,
      }),
    );

    await this.step(service, domain, certificate, 'validate', () => service.validateConfig(), handle);
    await this.step(service, domain, certificate, 'reload', () => service.reload());
    await this.step(service, domain, certificate, 'liveness', () => service.probe());

    const binding = await this.step(service, domain, certificate, 'record', async () =>
      this.store.saveBinding({
        serviceName: service.name,
        domain,
        certificateId: certificate.id,
        certificateType: certificate.certificateType,
        certificateRevision: certificate.revision,
        tlsEnabled: true,
        certificatePath: certificate.certificatePath,
        privateKeyPath: certificate.privateKeyPath,
      }),
    );

    this.record(service, domain, certificate, 'success');
    this.logger.log(`${service.name} now serves ${certificate.certificateType} certificate ${certificate.id} for ${domain}`);
    return { outcome: 'reloaded', binding };
  }

  /**
   * Artifacts still exist, still match the checksums recorded at issue time,
   * and the key still belongs to the certificate.
   */
  private async verifyArtifacts(certificate: Certificate): Promise<void> {
    if (!certificate.isActive) {
      throw new Error(`Certificate ${certificate.id} is not active`);
    }

    const files = this.store.listFiles(certificate.id);
    if (files.length === 0) {
      throw new Error(`Certificate ${certificate.id} has no recorded files`);
    }

    for (const file of files) {
      if (file.status === 'needs_verification') {
        throw new Error(`${file.filePath} is flagged as needing verification`);
      }

      let current: ArtifactFile;
      try {
        current = await this.inspector.describeFile(file.fileType, file.filePath);
      } catch (error) {
        this.store.markFileNeedsVerification(file.id);
        throw new Error(`${file.filePath} is missing or unreadable`, { cause: error });
      }

      if (current.checksum !== file.checksum || current.fileSize !== file.fileSize) {
        this.store.markFileNeedsVerification(file.id);
        throw new Error(`${file.filePath} changed on disk since it was recorded`);
      }
    }

    const certificatePem = await fs.readFile(certificate.certificatePath, 'utf-8');
    const privateKeyPem = await fs.readFile(certificate.privateKeyPath, 'utf-8');
    if (!this.inspector.keyMatchesCertificate(certificatePem, privateKeyPem)) {
      throw new Error(`Private key ${certificate.privateKeyPath} does not match ${certificate.certificatePath}`);
    }
  }

  private async step<T>(
    service: ManagedService,
    domain: string,
    certificate: Certificate,
    stage: ReloadStage,
    action: () => Promise<T>,
    rollbackOnFailure?: RenderHandle,
  ): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (rollbackOnFailure) {
        await this.rollback(service, domain, rollbackOnFailure);
      }

      const failure = new ReloadError(`${service.name} ${stage} failed for ${domain}: ${getErrorMessage(error)}`, {
        serviceName: service.name,
        domain,
        stage,
        cause: error,
      });

      this.record(service, domain, certificate, 'failed', failure);
      if (failure.severity === 'high') {
        this.logger.error(`HIGH SEVERITY: ${failure.message}; service may be degraded`, failure.stack);
      } else {
        this.logger.warn(failure.message, { stage });
      }
      throw failure;
    }
  }

  private async rollback(service: ManagedService, domain: string, handle: RenderHandle): Promise<void> {
    try {
      await handle.rollback();
    } catch (error) {
      this.logger.error(
        `Rolling back ${service.name} config for ${domain} failed (${handle.paths.join(', ')}): ${getErrorMessage(error)}`,
      );
    }
  }

  private record(
    service: ManagedService,
    domain: string,
    certificate: Certificate,
    outcome: 'success' | 'noop' | 'failed',
    failure?: ReloadError,
  ): void {
    try {
      this.store.recordReload({
        serviceName: service.name,
        domain,
        certificateId: certificate.id,
        revision: certificate.revision,
        outcome,
        stage: failure?.stage,
        severity: failure?.severity,
        message: failure?.message,
      });
    } catch (error) {
      this.logger.error(`Could not record ${outcome} reload of ${service.name} for ${domain}: ${getErrorMessage(error)}`);
    }
  }
}
