import { Inject, Injectable, Logger } from '@nestjs/common';
import type { BeforeApplicationShutdown, OnApplicationBootstrap } from '@nestjs/common';
import { CERTIFICATE_CONFIG, CLOCK, WATCHER_CONFIG } from '../certificate.tokens';
import type { Clock } from '../certificate.tokens';
import type { CertificateConfig, WatcherConfig, WatcherSnapshot } from '../interfaces';
import { ChangeNotifierService } from '../notifier/change-notifier.service';
import { ServiceReloaderService } from '../reloader/service-reloader.service';
import { CertificateSelectorService } from '../selector/certificate-selector.service';
import { CertificateStoreService } from '../store/certificate-store.service';
import { ManagedServiceRegistry } from '../../services/managed-service.registry';
import { ServiceWatcher } from './service-watcher';

/**
 * Runs one ServiceWatcher per enabled managed service and configured domain.
 * Watchers are independent: one failing never affects another.
 */
@Injectable()
export class CertificateWatcherService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(CertificateWatcherService.name);
  private readonly watchers: ServiceWatcher[] = [];
  private reconciling: Promise<void> = Promise.resolve();

  constructor(
    @Inject(CERTIFICATE_CONFIG) private readonly certificateConfig: CertificateConfig,
    @Inject(WATCHER_CONFIG) private readonly watcherConfig: WatcherConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly registry: ManagedServiceRegistry,
    private readonly store: CertificateStoreService,
    private readonly selector: CertificateSelectorService,
    private readonly reloader: ServiceReloaderService,
    private readonly notifier: ChangeNotifierService,
  ) {}

  onApplicationBootstrap(): void {
    this.reconciling = this.startAll();
  }

  /** Runs before the store closes in its own shutdown hook. */
  async beforeApplicationShutdown(): Promise<void> {
    await this.stopAll();
  }

  /**
   * Starts every watcher and resolves once each initial reconcile pass is done.
   */
  async startAll(): Promise<void> {
    if (this.watchers.length > 0) {
      return this.reconciling;
    }

    for (const service of this.registry.list()) {
      for (const domain of this.certificateConfig.domains) {
        this.watchers.push(
          new ServiceWatcher({
            service,
            domain,
            typePreference: this.certificateConfig.typePreference,
            config: this.watcherConfig,
            store: this.store,
            selector: this.selector,
            reloader: this.reloader,
            notifier: this.notifier,
            clock: this.clock,
          }),
        );
      }
    }

    this.logger.log(`Starting ${this.watchers.length} service watcher(s)`);
    await Promise.all(this.watchers.map((watcher) => watcher.start()));
  }

  async stopAll(): Promise<void> {
    await Promise.all(this.watchers.map((watcher) => watcher.stop()));
    if (this.watchers.length > 0) {
      this.logger.log(`Stopped ${this.watchers.length} service watcher(s)`);
    }
    this.watchers.length = 0;
  }

  /** Resolves when the startup reconcile has finished. */
  settled(): Promise<void> {
    return this.reconciling;
  }

  snapshot(domain?: string): WatcherSnapshot[] {
    return this.watchers
      .filter((watcher) => domain === undefined || watcher.domain === domain)
      .map((watcher) => watcher.snapshot());
  }
}
