import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BeforeApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import * as chokidar from 'chokidar';
import { existsSync } from 'fs';
import * as path from 'path';
import { CERTIFICATE_CONFIG, CLOCK, INTEGRITY_CONFIG } from '../certificate.tokens';
import type { Clock } from '../certificate.tokens';
import type { ArtifactFile, CertificateConfig, CertificateFile, IntegrityConfig, IntegrityFinding, IntegrityReport } from '../interfaces';
import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import { CertificateStoreService } from '../store/certificate-store.service';
import { getErrorMessage } from '../../shared/error.utils';

/**
 * Compares recorded artifacts with what is on disk. Drift is flagged as
 * `needs_verification` and reported; recorded checksums are never rewritten
 * to match the disk.
 */
@Injectable()
export class CertificateIntegrityService implements OnModuleInit, BeforeApplicationShutdown {
  private readonly logger = new Logger(CertificateIntegrityService.name);
  private watcher?: chokidar.FSWatcher;

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly certificateConfig: CertificateConfig,
    @Inject(INTEGRITY_CONFIG) private readonly integrityConfig: IntegrityConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly store: CertificateStoreService,
    private readonly inspector: ArtifactInspectorService,
  ) {}

  onModuleInit(): void {
    if (this.integrityConfig.watchFiles) {
      this.startWatching();
    }
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.stopWatching();
  }

  async verify(certificateId?: number): Promise<IntegrityReport> {
    return this.verifyFiles(this.store.listFiles(certificateId));
  }

  @Cron(CronExpression.EVERY_HOUR)
  async scheduledVerification(): Promise<void> {
    try {
      const report = await this.verify();
      this.logger.debug(`Scheduled integrity check: ${report.verified}/${report.checked} verified`);
    } catch (error) {
      this.logger.error(`Scheduled integrity check failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Watches the certificate tree for out-of-band modifications. Staging
   * directories and temporary files are ignored.
   */
  startWatching(): void {
    const root = this.certificateConfig.certificateRootPath;
    if (this.watcher) {
      return;
    }
    if (!existsSync(root)) {
      this.logger.warn(`Certificate root ${root} does not exist yet; file watching disabled`);
      return;
    }

    this.watcher = chokidar.watch(root, {
      persistent: true,
      ignoreInitial: true,
      ignored: (candidate: string) => /(^|[/\\])\./.test(path.relative(root, candidate)) || candidate.includes('.tmp-'),
      awaitWriteFinish: {
        stabilityThreshold: 2000,
        pollInterval: 100,
      },
    });

    const onChange = (filePath: string): void => {
      void this.verifyPath(filePath);
    };
    this.watcher.on('change', onChange);
    this.watcher.on('unlink', onChange);
    this.watcher.on('error', (error: unknown) => {
      this.logger.error(`Certificate tree watcher error: ${getErrorMessage(error)}`);
    });

    this.logger.log(`Watching ${root} for certificate file changes`);
  }

  async stopWatching(): Promise<void> {
    if (!this.watcher) {
      return;
    }
    await this.watcher.close();
    this.watcher = undefined;
    this.logger.log('Certificate file watcher stopped');
  }

  /**
   * Re-verifies the recorded artifacts at one path. Never rejects.
   */
  async verifyPath(filePath: string): Promise<IntegrityReport> {
    const resolved = path.resolve(filePath);
    const files = this.store.listFiles().filter((file) => path.resolve(file.filePath) === resolved);
    try {
      return await this.verifyFiles(files);
    } catch (error) {
      this.logger.error(`Verifying ${filePath} failed: ${getErrorMessage(error)}`);
      return { checked: files.length, verified: 0, drifted: [] };
    }
  }

  private async verifyFiles(files: CertificateFile[]): Promise<IntegrityReport> {
    const drifted: IntegrityFinding[] = [];

    for (const file of files) {
      const problem = await this.checkFile(file);
      if (problem === undefined) {
        this.store.markFileVerified(file.id, this.clock.now());
        continue;
      }

      drifted.push({ certificateId: file.certificateId, fileId: file.id, filePath: file.filePath, problem });
      if (file.status !== 'needs_verification') {
        this.logger.warn(`Certificate file drift detected: ${file.filePath} (${problem})`, {
          certificateId: file.certificateId,
          fileType: file.fileType,
        });
      }
      this.store.markFileNeedsVerification(file.id);
    }

    return { checked: files.length, verified: files.length - drifted.length, drifted };
  }

  private async checkFile(file: CertificateFile): Promise<IntegrityFinding['problem'] | undefined> {
    let current: ArtifactFile;
    try {
      current = await this.inspector.describeFile(file.fileType, file.filePath);
    } catch {
      return 'missing';
    }
    if (current.fileSize !== file.fileSize) {
      return 'size';
    }
    if (current.checksum !== file.checksum) {
      return 'checksum';
    }
    return undefined;
  }
}
