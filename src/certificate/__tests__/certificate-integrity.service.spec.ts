import * as fs from 'fs';
import { CertificateIntegrityService } from '../integrity/certificate-integrity.service';
import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import type { Certificate } from '../interfaces';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { FakeClock, createGeneratorHarness, createTempDir, removeTempDir } from '../../../test/helpers/certificates';
import type { GeneratorHarness } from '../../../test/helpers/certificates';

describe('CertificateIntegrityService', () => {
  let root: string;
  let clock: FakeClock;
  let harness: GeneratorHarness;
  let integrity: CertificateIntegrityService;
  let certificate: Certificate;
  let restoreLogger: () => void;

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    root = createTempDir();
    clock = new FakeClock();
    harness = createGeneratorHarness(root, clock);
    integrity = new CertificateIntegrityService(
      harness.config,
      { watchFiles: false },
      clock,
      harness.store,
      new ArtifactInspectorService(),
    );
    certificate = (await harness.generator.generate('test.local', 'self-signed')).certificate;
  });

  afterEach(async () => {
    await integrity.beforeApplicationShutdown();
    harness.db.close();
    removeTempDir(root);
    restoreLogger();
  });

  it('should verify untouched artifacts and stamp them', async () => {
    clock.advance(60_000);

    const report = await integrity.verify();

    expect(report).toEqual({ checked: 4, verified: 4, drifted: [] });
    const files = harness.store.listFiles(certificate.id);
    expect(files.every((file) => file.lastVerified?.getTime() === clock.now().getTime())).toBe(true);
  });

  it('should flag a file whose size changed', async () => {
    fs.appendFileSync(certificate.certificatePath, 'extra');

    const report = await integrity.verify();

    expect(report.verified).toBe(3);
    expect(report.drifted).toEqual([
      expect.objectContaining({ certificateId: certificate.id, filePath: certificate.certificatePath, problem: 'size' }),
    ]);
    expect(harness.store.listFilesNeedingVerification('test.local').map((file) => file.filePath)).toEqual([
      certificate.certificatePath,
    ]);
  });

  it('should flag same-size content changes by checksum', async () => {
    const content = fs.readFileSync(certificate.privateKeyPath, 'utf-8');
    fs.writeFileSync(certificate.privateKeyPath, content.replace(/[A-Za-z]/, (letter) => (letter === 'A' ? 'B' : 'A')));

    const report = await integrity.verify(certificate.id);

    expect(report.drifted.map((finding) => finding.problem)).toEqual(['checksum']);
  });

  it('should flag a missing file', async () => {
    fs.rmSync(certificate.chainPath ?? '');

    const report = await integrity.verify();

    expect(report.drifted.map((finding) => [finding.filePath, finding.problem])).toEqual([[certificate.chainPath, 'missing']]);
  });

  it('should never rewrite recorded checksums and recover once the file is restored', async () => {
    const original = fs.readFileSync(certificate.certificatePath);
    const [recorded] = harness.store.listFiles(certificate.id);
    fs.writeFileSync(certificate.certificatePath, 'replaced');

    await integrity.verify();
    expect(harness.store.listFiles(certificate.id)[0].checksum).toBe(recorded.checksum);

    fs.writeFileSync(certificate.certificatePath, original);
    const report = await integrity.verify();

    expect(report.drifted).toEqual([]);
    expect(harness.store.listFilesNeedingVerification('test.local')).toEqual([]);
  });

  it('should only check the artifacts recorded at a given path', async () => {
    fs.appendFileSync(certificate.fullchainPath ?? '', 'extra');

    const report = await integrity.verifyPath(certificate.fullchainPath ?? '');

    expect(report.checked).toBe(1);
    expect(report.drifted.map((finding) => finding.problem)).toEqual(['size']);
  });

  it('should report nothing for a path that is not recorded', async () => {
    await expect(integrity.verifyPath('/etc/hosts')).resolves.toEqual({ checked: 0, verified: 0, drifted: [] });
  });

  it('should not watch when file watching is disabled', () => {
    const watchSpy = jest.spyOn(integrity, 'startWatching');

    integrity.onModuleInit();

    expect(watchSpy).not.toHaveBeenCalled();
  });

  it('should start and stop the tree watcher', async () => {
    integrity.startWatching();

    await expect(integrity.stopWatching()).resolves.toBeUndefined();
  });
});
