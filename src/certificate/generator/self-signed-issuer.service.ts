import { Inject, Injectable, Logger } from '@nestjs/common';
import * as acme from 'acme-client';
import { randomBytes } from 'crypto';
import * as forge from 'node-forge';
import { CERTIFICATE_CONFIG, CLOCK } from '../certificate.tokens';
import type { Clock } from '../certificate.tokens';
import type { CertificateConfig } from '../interfaces';
import type { CertificateMaterial } from '../storage/certificate-storage.service';

const DAY_MS = 24 * 60 * 60 * 1000;
const RSA_KEY_SIZE = 2048;

/**
 * Issues self-signed certificates locally. Used when nothing better is
 * available and as the degraded path when ACME issuance cannot work.
 */
@Injectable()
export class SelfSignedIssuerService {
  private readonly logger = new Logger(SelfSignedIssuerService.name);

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async issue(domain: string, subjectAltNames: string[] = []): Promise<CertificateMaterial> {
    const privateKeyPem = (await acme.crypto.createPrivateRsaKey(RSA_KEY_SIZE)).toString();
    const privateKey = forge.pki.privateKeyFromPem(privateKeyPem);

    const certificate = forge.pki.createCertificate();
    certificate.publicKey = forge.pki.rsa.setPublicKey(privateKey.n, privateKey.e);
    // Leading 01 keeps the serial positive.
    certificate.serialNumber = `01${randomBytes(15).toString('hex')}`;

    const notBefore = this.clock.now();
    certificate.validity.notBefore = notBefore;
    certificate.validity.notAfter = new Date(notBefore.getTime() + this.config.selfSignedValidityDays * DAY_MS);

    const attributes = [{ name: 'commonName', value: domain }];
    certificate.setSubject(attributes);
    certificate.setIssuer(attributes);

    const names = [domain, ...subjectAltNames.filter((name) => name !== domain)];
    certificate.setExtensions([
      { name: 'basicConstraints', cA: false },
      { name: 'keyUsage', digitalSignature: true, keyEncipherment: true },
      { name: 'extKeyUsage', serverAuth: true },
      { name: 'subjectAltName', altNames: names.map((value) => ({ type: 2, value })) },
    ]);
    certificate.sign(privateKey, forge.md.sha256.create());

    const certificatePem = forge.pki.certificateToPem(certificate);
    this.logger.log(`Issued self-signed certificate for ${domain}`, {
      names,
      notAfter: certificate.validity.notAfter.toISOString(),
    });

    return {
      certificate: certificatePem,
      privateKey: privateKeyPem,
      chain: certificatePem,
      fullchain: certificatePem,
    };
  }
}
