import * as fs from 'fs';
import { ReloadError } from '../errors/certificate.errors';
import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import type { Certificate } from '../interfaces';
import { ServiceReloaderService } from '../reloader/service-reloader.service';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import {
  FakeClock,
  FakeManagedService,
  createGeneratorHarness,
  createTempDir,
  removeTempDir,
} from '../../../test/helpers/certificates';
import type { GeneratorHarness } from '../../../test/helpers/certificates';

describe('ServiceReloaderService', () => {
  let root: string;
  let harness: GeneratorHarness;
  let reloader: ServiceReloaderService;
  let service: FakeManagedService;
  let certificate: Certificate;
  let restoreLogger: () => void;

  const reloadFailure = async (target: Certificate = certificate): Promise<ReloadError> => {
    try {
      await reloader.reload(service, 'test.local', target);
    } catch (error) {
      if (error instanceof ReloadError) {
        return error;
      }
      throw error;
    }
    throw new Error('reload unexpectedly succeeded');
  };

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    root = createTempDir();
    harness = createGeneratorHarness(root, new FakeClock());
    reloader = new ServiceReloaderService(harness.store, new ArtifactInspectorService());
    service = new FakeManagedService('mail');
    certificate = (await harness.generator.generate('test.local', 'self-signed')).certificate;
  });

  afterEach(() => {
    harness.db.close();
    removeTempDir(root);
    restoreLogger();
  });

  it('should render, validate, reload, probe and then record the binding', async () => {
    const result = await reloader.reload(service, 'test.local', certificate);

    expect(result.outcome).toBe('reloaded');
    expect(service.calls).toEqual(['render', 'validate', 'reload', 'probe']);
    expect(service.live?.certificatePath).toBe(certificate.certificatePath);
    expect(harness.store.getBinding('mail', 'test.local')).toMatchObject({
      certificateId: certificate.id,
      certificateType: 'self-signed',
      certificateRevision: 1,
      tlsEnabled: true,
    });
    expect(harness.store.lastReload('mail', 'test.local')?.outcome).toBe('success');
  });

  it('should not touch the service when it already serves this revision', async () => {
    await reloader.reload(service, 'test.local', certificate);
    service.calls.length = 0;

    const result = await reloader.reload(service, 'test.local', certificate);

    expect(result.outcome).toBe('noop');
    expect(service.calls).toEqual([]);
    expect(service.reloadCount).toBe(1);
    expect(harness.store.lastReload('mail', 'test.local')?.outcome).toBe('noop');
  });

  it('should reload again once the certificate revision moves', async () => {
    await reloader.reload(service, 'test.local', certificate);
    const renewed = (await harness.generator.generate('test.local', 'self-signed', { force: true })).certificate;

    const result = await reloader.reload(service, 'test.local', renewed);

    expect(result.outcome).toBe('reloaded');
    expect(result.binding.certificateRevision).toBe(2);
    expect(service.reloadCount).toBe(2);
  });

  it('should roll back a rejected config and leave the binding alone', async () => {
    service.failOn('validate', new Error('syntax error in ssl.conf'));

    const error = await reloadFailure();

    expect(error.stage).toBe('validate');
    expect(error.severity).toBe('low');
    expect(error.message).toBe('mail validate failed for test.local: syntax error in ssl.conf');
    expect(service.calls).toEqual(['render', 'validate', 'rollback']);
    expect(service.rendered).toBeUndefined();
    expect(harness.store.getBinding('mail', 'test.local')).toBeUndefined();
    expect(harness.store.lastReload('mail', 'test.local')).toMatchObject({
      outcome: 'failed',
      stage: 'validate',
      severity: 'low',
    });
  });

  it('should not roll back when rendering itself fails', async () => {
    service.failOn('render');

    const error = await reloadFailure();

    expect(error.stage).toBe('render');
    expect(service.calls).toEqual(['render']);
  });

  it('should report reload failures as high severity', async () => {
    service.failOn('reload');

    const error = await reloadFailure();

    expect(error.stage).toBe('reload');
    expect(error.severity).toBe('high');
    expect(service.calls).toEqual(['render', 'validate', 'reload']);
    expect(harness.store.getBinding('mail', 'test.local')).toBeUndefined();
  });

  it('should report a failed liveness probe as high severity', async () => {
    service.failOn('probe', new Error('port 993 closed'));

    const error = await reloadFailure();

    expect(error.stage).toBe('liveness');
    expect(error.severity).toBe('high');
    expect(harness.store.lastReload('mail', 'test.local')?.severity).toBe('high');
  });

  it('should treat a failure to record the binding after a live reload as high severity', async () => {
    jest.spyOn(harness.store, 'saveBinding').mockImplementation(() => {
      throw new Error('database is locked');
    });

    const error = await reloadFailure();

    expect(error.stage).toBe('record');
    expect(error.severity).toBe('high');
    expect(error.message).toBe('mail record failed for test.local: database is locked');
    expect(service.reloadCount).toBe(1);
    expect(harness.store.lastReload('mail', 'test.local')).toMatchObject({ outcome: 'failed', stage: 'record', severity: 'high' });
  });

  it('should refuse artifacts that changed on disk and flag them', async () => {
    fs.appendFileSync(certificate.certificatePath, '\n# tampered\n');

    const error = await reloadFailure();

    expect(error.stage).toBe('verify');
    expect(error.message).toBe(`mail verify failed for test.local: ${certificate.certificatePath} changed on disk since it was recorded`);
    expect(service.calls).toEqual([]);
    const flagged = harness.store.listFiles(certificate.id).filter((file) => file.status === 'needs_verification');
    expect(flagged.map((file) => file.filePath)).toEqual([certificate.certificatePath]);
  });

  it('should refuse an inactive certificate', async () => {
    const inactive = harness.store.deactivate(certificate.id, 'test');

    const error = await reloadFailure(inactive);

    expect(error.stage).toBe('verify');
    expect(error.message).toBe(`mail verify failed for test.local: Certificate ${certificate.id} is not active`);
  });
});
