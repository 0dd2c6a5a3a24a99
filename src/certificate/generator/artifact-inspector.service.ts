import { Injectable, Logger } from '@nestjs/common';
import * as acme from 'acme-client';
import { createHash, createPrivateKey, createPublicKey } from 'crypto';
import { promises as fs } from 'fs';
import { CERTIFICATE_FILE_TYPES } from '../certificate.constants';
import type { CertificateFileType, CertificateType } from '../certificate.constants';
import type { ArtifactFile } from '../interfaces';
import { GenerationError } from '../errors/certificate.errors';
import { nameCoversDomain } from '../../config/config.validators';
import { getErrorMessage } from '../../shared/error.utils';
import type { ArtifactPaths } from '../storage/certificate-storage.service';

/**
 * Facts read from a certificate set that passed inspection.
 */
export interface InspectedArtifacts {
  subjectAltNames: string[];
  issuer: string;
  notBefore: Date;
  notAfter: Date;
  files: ArtifactFile[];
}

/**
 * Checks produced material before anything is committed: files present and
 * readable, certificate parseable and naming the domain, key matching the
 * certificate's public key.
 */
@Injectable()
export class ArtifactInspectorService {
  private readonly logger = new Logger(ArtifactInspectorService.name);

  async inspect(domain: string, certificateType: CertificateType, paths: ArtifactPaths): Promise<InspectedArtifacts> {
    const invalid = (message: string, cause?: unknown): GenerationError =>
      new GenerationError(message, { domain, certificateType, reason: 'artifact-invalid', cause });

    const files: ArtifactFile[] = [];
    for (const fileType of CERTIFICATE_FILE_TYPES) {
      try {
        files.push(await this.describeFile(fileType, paths[fileType]));
      } catch (error) {
        throw invalid(`${fileType} file ${paths[fileType]} is missing or unreadable`, error);
      }
    }

    const certificatePem = await fs.readFile(paths.certificate, 'utf-8');
    const privateKeyPem = await fs.readFile(paths.private_key, 'utf-8');

    const info = await Promise.resolve()
      .then(() => acme.crypto.readCertificateInfo(certificatePem))
      .catch((error: unknown) => {
        throw invalid(`Certificate for ${domain} could not be parsed: ${getErrorMessage(error)}`, error);
      });

    const altNames = info.domains.altNames;
    const names = [info.domains.commonName, ...altNames].filter((name): name is string => typeof name === 'string');
    if (!names.some((name) => nameCoversDomain(name, domain))) {
      throw invalid(`Certificate names [${names.join(', ')}] do not cover ${domain}`);
    }

    if (info.notAfter.getTime() <= info.notBefore.getTime()) {
      throw invalid(`Certificate for ${domain} has an empty validity window`);
    }

    if (!this.keyMatchesCertificate(certificatePem, privateKeyPem)) {
      throw invalid(`Private key does not match certificate for ${domain}`);
    }

    this.logger.debug(`Artifacts for ${domain} (${certificateType}) passed inspection`);

    return {
      subjectAltNames: altNames.length > 0 ? altNames : names,
      issuer: info.issuer.commonName ?? 'unknown',
      notBefore: info.notBefore,
      notAfter: info.notAfter,
      files,
    };
  }

  /**
   * Size, sha256 and permission bits of one artifact as it sits on disk.
   */
  async describeFile(fileType: CertificateFileType, filePath: string): Promise<ArtifactFile> {
    const content = await fs.readFile(filePath);
    const stats = await fs.stat(filePath);
    return {
      fileType,
      filePath,
      fileSize: stats.size,
      checksum: createHash('sha256').update(content).digest('hex'),
      permissions: formatPermissions(stats.mode),
    };
  }

  /**
   * Compares the certificate's public key with the one derived from the
   * private key (SPKI DER, so RSA and EC keys are both covered).
   */
  keyMatchesCertificate(certificatePem: string, privateKeyPem: string): boolean {
    try {
      const fromCertificate = createPublicKey(certificatePem).export({ type: 'spki', format: 'der' });
      const fromPrivateKey = createPublicKey(createPrivateKey(privateKeyPem)).export({ type: 'spki', format: 'der' });
      return fromCertificate.equals(fromPrivateKey);
    } catch (error) {
      this.logger.debug(`Key comparison failed: ${getErrorMessage(error)}`);
      return false;
    }
  }
}

export function formatPermissions(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, '0');
}
