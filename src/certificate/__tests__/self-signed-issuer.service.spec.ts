import * as forge from 'node-forge';
import { SelfSignedIssuerService } from '../generator/self-signed-issuer.service';
import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { BASE_TIME, FakeClock, createCertificateConfig, daysFrom } from '../../../test/helpers/certificates';

describe('SelfSignedIssuerService', () => {
  let issuer: SelfSignedIssuerService;
  let restoreLogger: () => void;

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
    issuer = new SelfSignedIssuerService(createCertificateConfig({ selfSignedValidityDays: 30 }), new FakeClock());
  });

  afterEach(() => {
    restoreLogger();
  });

  it('should issue a certificate for the domain valid from now for the configured days', async () => {
    const material = await issuer.issue('test.local');
    const certificate = forge.pki.certificateFromPem(material.certificate);

    expect(certificate.subject.getField('CN').value).toBe('test.local');
    expect(certificate.issuer.getField('CN').value).toBe('test.local');
    expect(certificate.validity.notBefore).toEqual(BASE_TIME);
    expect(certificate.validity.notAfter).toEqual(daysFrom(BASE_TIME, 30));
  });

  it('should include the domain and extra names in subjectAltName without duplicates', async () => {
    const material = await issuer.issue('test.local', ['test.local', 'www.test.local']);
    const certificate = forge.pki.certificateFromPem(material.certificate);

    const extension: unknown = certificate.getExtension('subjectAltName');
    const altNames =
      typeof extension === 'object' && extension !== null && 'altNames' in extension && Array.isArray(extension.altNames)
        ? extension.altNames.map((entry: { value: string }) => entry.value)
        : [];
    expect(altNames).toEqual(['test.local', 'www.test.local']);
  });

  it('should produce a key that matches the certificate', async () => {
    const material = await issuer.issue('test.local');

    expect(new ArtifactInspectorService().keyMatchesCertificate(material.certificate, material.privateKey)).toBe(true);
    expect(material.chain).toBe(material.certificate);
    expect(material.fullchain).toBe(material.certificate);
  });
});
