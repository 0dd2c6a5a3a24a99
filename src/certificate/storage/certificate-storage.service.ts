import { Injectable, Logger, Inject } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import { CERTIFICATE_DIRECTORIES, CERTIFICATE_FILE_NAMES, CERTIFICATE_TYPES } from '../certificate.constants';
import type { CertificateFileType, CertificateType } from '../certificate.constants';
import type { CertificateConfig, ManualCertificatePaths } from '../interfaces';
import { isValidDomain } from '../../config/config.validators';
import { atomicWriteFileSync } from '../../shared/fs.utils';

export type ArtifactPaths = Record<CertificateFileType, string>;

export interface CertificateMaterial {
  certificate: string;
  privateKey: string;
  chain: string;
  fullchain: string;
}

/**
 * Material written to a private staging directory beside its final location.
 * Nothing under the live tree changes until it is promoted.
 */
export interface StagedArtifacts {
  certificateType: CertificateType;
  domain: string;
  directory: string;
  paths: ArtifactPaths;
}

/**
 * Result of a promotion. `restore` puts back the files it replaced and removes
 * the ones it added; it must run before the staging directory is discarded.
 */
export interface Promotion {
  paths: ArtifactPaths;
  restore(): void;
}

const PRIVATE_KEY_MODE = 0o600;
const PUBLIC_FILE_MODE = 0o644;

/**
 * Owns the certificate tree on disk. Provenance is encoded by placement:
 * `<root>/<type directory>/<domain>/{cert,privkey,chain,fullchain}.pem`.
 */
@Injectable()
export class CertificateStorageService {
  private readonly logger = new Logger(CertificateStorageService.name);

  constructor(@Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig) {}

  get rootPath(): string {
    return this.config.certificateRootPath;
  }

  /** ACME tool state (config, work and logs directories). */
  get accountsPath(): string {
    return path.join(this.rootPath, 'accounts');
  }

  directoryFor(certificateType: CertificateType, domain: string): string {
    if (!isValidDomain(domain)) {
      throw new Error(`Refusing to build certificate path for invalid domain "${domain}"`);
    }
    return path.join(this.rootPath, CERTIFICATE_DIRECTORIES[certificateType], domain);
  }

  pathsFor(certificateType: CertificateType, domain: string): ArtifactPaths {
    return this.pathsIn(this.directoryFor(certificateType, domain));
  }

  /**
   * Derives the certificate type from where a file sits under the root.
   */
  typeForPath(filePath: string): CertificateType | undefined {
    const relative = path.relative(this.rootPath, path.resolve(filePath));
    const [directory] = relative.split(path.sep);
    return CERTIFICATE_TYPES.find((type) => CERTIFICATE_DIRECTORIES[type] === directory);
  }

  stage(certificateType: CertificateType, domain: string, material: CertificateMaterial): StagedArtifacts {
    const staged = this.createStaging(certificateType, domain);

    try {
      atomicWriteFileSync(staged.paths.certificate, material.certificate, PUBLIC_FILE_MODE);
      atomicWriteFileSync(staged.paths.private_key, material.privateKey, PRIVATE_KEY_MODE);
      atomicWriteFileSync(staged.paths.chain, material.chain, PUBLIC_FILE_MODE);
      atomicWriteFileSync(staged.paths.fullchain, material.fullchain, PUBLIC_FILE_MODE);
    } catch (error) {
      this.discard(staged);
      throw error;
    }

    return staged;
  }

  /**
   * Stages copies of externally produced files. A missing chain falls back to
   * the fullchain; a missing fullchain is assembled from certificate + chain.
   */
  stageCopy(certificateType: CertificateType, domain: string, source: ManualCertificatePaths & { fullchainPath?: string }): StagedArtifacts {
    const certificate = fs.readFileSync(source.certificatePath, 'utf-8');
    const privateKey = fs.readFileSync(source.privateKeyPath, 'utf-8');
    const chain = source.chainPath ? fs.readFileSync(source.chainPath, 'utf-8') : undefined;
    const fullchain = source.fullchainPath ? fs.readFileSync(source.fullchainPath, 'utf-8') : undefined;

    return this.stage(certificateType, domain, {
      certificate,
      privateKey,
      chain: chain ?? fullchain ?? certificate,
      fullchain: fullchain ?? joinPem(certificate, chain),
    });
  }

  /**
   * Moves staged files into the live tree, one atomic rename per file.
   * Readers never observe a half-written artifact. Replaced files are kept
   * as hard links inside the staging directory until it is discarded, and a
   * failed rename puts every file back before the error is rethrown.
   */
  promote(staged: StagedArtifacts): Promotion {
    const target = this.directoryFor(staged.certificateType, staged.domain);
    fs.mkdirSync(target, { recursive: true, mode: 0o755 });
    const finalPaths = this.pathsIn(target);
    const previousPaths = this.pathsIn(path.join(staged.directory, 'previous'));
    fs.mkdirSync(path.dirname(previousPaths.certificate), { mode: 0o700 });

    const moved: CertificateFileType[] = [];
    const replaced = new Set<CertificateFileType>();
    const restore = (): void => {
      for (const fileType of moved.reverse()) {
        if (replaced.has(fileType)) {
          fs.renameSync(previousPaths[fileType], finalPaths[fileType]);
        } else {
          fs.rmSync(finalPaths[fileType], { force: true });
        }
      }
      moved.length = 0;
      this.logger.warn(`Restored previous ${staged.certificateType} material for ${staged.domain}`);
    };

    // Private key last: until it lands the previous key still matches the previous certificate.
    const order: CertificateFileType[] = ['chain', 'fullchain', 'certificate', 'private_key'];
    try {
      for (const fileType of order) {
        if (fs.existsSync(finalPaths[fileType])) {
          fs.linkSync(finalPaths[fileType], previousPaths[fileType]);
          replaced.add(fileType);
        }
        moved.push(fileType);
        fs.renameSync(staged.paths[fileType], finalPaths[fileType]);
      }
    } catch (error) {
      restore();
      throw error;
    }

    this.logger.log(`Installed ${staged.certificateType} material for ${staged.domain}`, { directory: target });
    return { paths: finalPaths, restore };
  }

  discard(staged: StagedArtifacts): void {
    fs.rmSync(staged.directory, { recursive: true, force: true });
  }

  private createStaging(certificateType: CertificateType, domain: string): StagedArtifacts {
    const parent = path.dirname(this.directoryFor(certificateType, domain));
    fs.mkdirSync(parent, { recursive: true, mode: 0o755 });
    const directory = fs.mkdtempSync(path.join(parent, `.${domain}.staging-`));
    return { certificateType, domain, directory, paths: this.pathsIn(directory) };
  }

  private pathsIn(directory: string): ArtifactPaths {
    return {
      certificate: path.join(directory, CERTIFICATE_FILE_NAMES.certificate),
      private_key: path.join(directory, CERTIFICATE_FILE_NAMES.private_key),
      chain: path.join(directory, CERTIFICATE_FILE_NAMES.chain),
      fullchain: path.join(directory, CERTIFICATE_FILE_NAMES.fullchain),
    };
  }
}

function joinPem(...blocks: (string | undefined)[]): string {
  return blocks
    .filter((block): block is string => block !== undefined && block.trim().length > 0)
    .map((block) => (block.endsWith('\n') ? block : `${block}\n`))
    .join('');
}
