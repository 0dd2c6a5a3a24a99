import { Inject, Injectable, Logger } from '@nestjs/common';
import { existsSync, readdirSync } from 'fs';
import * as path from 'path';
import { ACME_COMPATIBILITY_PATTERNS, CERTIFICATE_DIRECTORIES, CERTIFICATE_FILE_NAMES } from '../certificate.constants';
import type { CertificateType } from '../certificate.constants';
import { CERTIFICATE_CONFIG } from '../certificate.tokens';
import type { CertificateConfig, ManualCertificatePaths } from '../interfaces';
import { GenerationError } from '../errors/certificate.errors';
import { CommandRunnerService } from '../../shared/command-runner.service';
import { CertificateStorageService } from '../storage/certificate-storage.service';

export interface AcmeRequest {
  domain: string;
  certificateType: CertificateType;
  subjectAltNames?: string[];
  /** Replace a lineage the tool still considers current. */
  force?: boolean;
  signal?: AbortSignal;
}

export interface AcmeToolResult {
  /** Files produced by the tool, inside its own state directory. */
  sources: ManualCertificatePaths & { fullchainPath: string };
  output: string;
}

/**
 * Drives the external ACME client (certbot compatible) as a subprocess.
 * The tool keeps account and lineage state under `<root>/accounts/<type directory>`,
 * so staging and production lineages never overwrite each other.
 */
@Injectable()
export class AcmeToolService {
  private readonly logger = new Logger(AcmeToolService.name);

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    private readonly commandRunner: CommandRunnerService,
    private readonly storage: CertificateStorageService,
  ) {}

  configDirectory(certificateType: CertificateType): string {
    return path.join(this.storage.accountsPath, CERTIFICATE_DIRECTORIES[certificateType]);
  }

  buildArguments(request: AcmeRequest): string[] {
    const root = this.storage.rootPath;
    const names = [request.domain, ...(request.subjectAltNames ?? []).filter((name) => name !== request.domain)];

    const args = [
      'certonly',
      '--non-interactive',
      '--agree-tos',
      '--no-eff-email',
      `--email=${this.config.acmeEmail}`,
      request.force ? '--force-renewal' : '--keep-until-expiring',
      '--expand',
    ];

    if (this.config.challengeMethod === 'standalone') {
      args.push('--standalone');
    } else {
      args.push('--webroot', `--webroot-path=${this.config.webrootPath}`);
    }

    for (const name of names) {
      args.push(`--domain=${name}`);
    }

    if (request.certificateType === 'letsencrypt-staging') {
      args.push('--staging');
    }

    args.push(
      `--config-dir=${this.configDirectory(request.certificateType)}`,
      `--work-dir=${path.join(root, 'work')}`,
      `--logs-dir=${path.join(root, 'logs')}`,
    );

    return args;
  }

  async obtain(request: AcmeRequest): Promise<AcmeToolResult> {
    const { domain, certificateType } = request;

    if (!this.config.acmeEmail) {
      throw new GenerationError(`ACME issuance for ${domain} requires CERTD_ACME_EMAIL`, {
        domain,
        certificateType,
        reason: 'unsupported',
      });
    }

    const argv = [this.config.acmeToolPath, ...this.buildArguments(request)];
    this.logger.log(`Requesting ${certificateType} certificate for ${domain}`, {
      challenge: this.config.challengeMethod,
    });

    const result = await this.commandRunner.run(argv, {
      timeoutMs: this.config.acmeTimeoutMs,
      signal: request.signal,
    });

    if (result.aborted) {
      throw new GenerationError(`ACME request for ${domain} was cancelled`, {
        domain,
        certificateType,
        reason: 'cancelled',
        output: result.output,
      });
    }

    if (result.timedOut) {
      throw new GenerationError(`ACME tool timed out after ${this.config.acmeTimeoutMs}ms for ${domain}`, {
        domain,
        certificateType,
        reason: 'timeout',
        output: result.output,
      });
    }

    if (result.exitCode !== 0) {
      throw new GenerationError(`ACME tool failed for ${domain} (exit code ${result.exitCode ?? 'none'})`, {
        domain,
        certificateType,
        reason: 'tool-failed',
        output: result.output,
        exitCode: result.exitCode ?? undefined,
      });
    }

    const lineage = this.findLineage(domain, certificateType);
    if (!lineage) {
      throw new GenerationError(`ACME tool reported success but produced no files for ${domain}`, {
        domain,
        certificateType,
        reason: 'artifact-invalid',
        output: result.output,
      });
    }

    this.logger.log(`ACME tool produced material for ${domain}`, { lineage });

    const certificatePath = path.join(lineage, CERTIFICATE_FILE_NAMES.certificate);
    const chainPath = path.join(lineage, CERTIFICATE_FILE_NAMES.chain);
    const fullchainPath = path.join(lineage, CERTIFICATE_FILE_NAMES.fullchain);

    return {
      sources: {
        certificatePath: existsSync(certificatePath) ? certificatePath : fullchainPath,
        privateKeyPath: path.join(lineage, CERTIFICATE_FILE_NAMES.private_key),
        chainPath: existsSync(chainPath) ? chainPath : undefined,
        fullchainPath,
      },
      output: result.output,
    };
  }

  /**
   * Locates the tool's output directory for a domain. Reissues may land in a
   * suffixed lineage (`example.com-0001`); the newest one wins.
   */
  findLineage(domain: string, certificateType: CertificateType): string | undefined {
    const liveRoot = path.join(this.configDirectory(certificateType), 'live');
    if (!existsSync(liveRoot)) {
      return undefined;
    }

    const newest = readdirSync(liveRoot, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && isLineageOf(entry.name, domain))
      .map((entry) => entry.name)
      .sort()
      .pop();

    return newest ? path.join(liveRoot, newest) : undefined;
  }
}

/**
 * True when the tool's output shows a known environment incompatibility
 * rather than a genuine issuance failure.
 */
export function isCompatibilityFailure(output: string | undefined): boolean {
  return output !== undefined && ACME_COMPATIBILITY_PATTERNS.some((pattern) => pattern.test(output));
}

function isLineageOf(directoryName: string, domain: string): boolean {
  return directoryName === domain || (directoryName.startsWith(domain) && /^-\d{4}$/.test(directoryName.slice(domain.length)));
}
