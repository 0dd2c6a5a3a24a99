import { ArtifactInspectorService } from '../generator/artifact-inspector.service';
import { ServiceReloaderService } from '../reloader/service-reloader.service';
import { CertificateWatcherService } from '../watcher/certificate-watcher.service';
import { ManagedServiceRegistry } from '../../services/managed-service.registry';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import {
  FakeClock,
  FakeManagedService,
  createGeneratorHarness,
  createTempDir,
  createWatcherConfig,
  removeTempDir,
} from '../../../test/helpers/certificates';
import type { GeneratorHarness } from '../../../test/helpers/certificates';

describe('CertificateWatcherService', () => {
  let root: string;
  let harness: GeneratorHarness;
  let mail: FakeManagedService;
  let apache: FakeManagedService;
  let watchers: CertificateWatcherService;
  let restoreLogger: () => void;

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
    root = createTempDir();
    const clock = new FakeClock();
    harness = createGeneratorHarness(root, clock, { domains: ['test.local', 'mail.test.local'] });

    mail = new FakeManagedService('mail');
    apache = new FakeManagedService('apache');
    const registry = new ManagedServiceRegistry();
    registry.register(mail);
    registry.register(apache);

    watchers = new CertificateWatcherService(
      harness.config,
      createWatcherConfig({ maxRetryAttempts: 1 }),
      clock,
      registry,
      harness.store,
      harness.selector,
      new ServiceReloaderService(harness.store, new ArtifactInspectorService()),
      harness.notifier,
    );
  });

  afterEach(async () => {
    await watchers.stopAll();
    harness.db.close();
    removeTempDir(root);
    restoreLogger();
  });

  it('should run one watcher per service and domain', async () => {
    await watchers.startAll();

    expect(watchers.snapshot().map((snapshot) => `${snapshot.serviceName}/${snapshot.domain}`)).toEqual([
      'mail/test.local',
      'mail/mail.test.local',
      'apache/test.local',
      'apache/mail.test.local',
    ]);
    expect(watchers.snapshot('mail.test.local')).toHaveLength(2);
  });

  it('should bind every service during the startup reconcile', async () => {
    await harness.generator.generate('test.local', 'self-signed');

    watchers.onApplicationBootstrap();
    await watchers.settled();

    expect(mail.reloadCount).toBe(1);
    expect(apache.reloadCount).toBe(1);
    expect(harness.store.listBindings('test.local').map((binding) => binding.serviceName)).toEqual(['apache', 'mail']);
  });

  it('should keep watchers independent when one service fails', async () => {
    await harness.generator.generate('test.local', 'self-signed');
    apache.failOn('validate');

    await watchers.startAll();

    const states = watchers.snapshot('test.local').map((snapshot) => [snapshot.serviceName, snapshot.state]);
    expect(states).toEqual([
      ['mail', 'idle'],
      ['apache', 'alarmed'],
    ]);
    expect(harness.store.getBinding('mail', 'test.local')).toBeDefined();
    expect(harness.store.getBinding('apache', 'test.local')).toBeUndefined();
  });

  it('should not start twice', async () => {
    await watchers.startAll();
    await watchers.startAll();

    expect(watchers.snapshot()).toHaveLength(4);
  });

  it('should drop every watcher on stop', async () => {
    await watchers.startAll();

    await watchers.beforeApplicationShutdown();

    expect(watchers.snapshot()).toEqual([]);
  });
});
