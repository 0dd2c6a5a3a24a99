import { Logger } from '@nestjs/common';
import type { CertificateType } from '../certificate.constants';
import type { Clock } from '../certificate.tokens';
import type { WatcherConfig, WatcherSnapshot, WatcherState } from '../interfaces';
import { ReloadError } from '../errors/certificate.errors';
import type { ChangeNotifierService } from '../notifier/change-notifier.service';
import type { ServiceReloaderService } from '../reloader/service-reloader.service';
import type { CertificateSelectorService } from '../selector/certificate-selector.service';
import type { CertificateStoreService } from '../store/certificate-store.service';
import type { ManagedService } from '../../services/interfaces';
import { getErrorMessage } from '../../shared/error.utils';

export interface ServiceWatcherOptions {
  service: ManagedService;
  domain: string;
  typePreference?: CertificateType;
  config: WatcherConfig;
  store: CertificateStoreService;
  selector: CertificateSelectorService;
  reloader: ServiceReloaderService;
  notifier: ChangeNotifierService;
  clock: Clock;
}

/**
 * Keeps one managed service in step with the selected certificate for one domain.
 *
 * idle → notified → reloading → idle, with reloading → error → (backoff) →
 * notified on failure and error → alarmed once retries run out. Notifications
 * only schedule work: each pass re-reads the store, and notifications arriving
 * mid-pass collapse into a single follow-up pass.
 */
export class ServiceWatcher {
  private readonly logger: Logger;
  private state: WatcherState = 'idle';
  private attempts = 0;
  private pending = false;
  private stopped = false;
  private lastError?: string;
  private lastReloadAt?: Date;
  private running?: Promise<void>;
  private retryTimer?: NodeJS.Timeout;
  private unsubscribe?: () => void;

  constructor(private readonly options: ServiceWatcherOptions) {
    this.logger = new Logger(`ServiceWatcher:${options.service.name}:${options.domain}`);
  }

  get serviceName(): string {
    return this.options.service.name;
  }

  get domain(): string {
    return this.options.domain;
  }

  /**
   * Subscribes and runs the initial reconcile pass, covering changes made
   * while nothing was listening.
   */
  start(): Promise<void> {
    this.stopped = false;
    this.unsubscribe = this.options.notifier.subscribe(this.domain, () => {
      void this.notify();
    });
    this.logger.log(`Watching ${this.domain} for ${this.serviceName}`);
    return this.notify();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
    await this.running;
    if (this.state === 'error') {
      this.state = 'idle';
    }
  }

  /**
   * Schedules a pass. Resolves when the work this notification caused is done.
   */
  notify(): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }

    if (this.state === 'notified' || this.state === 'reloading' || this.state === 'error') {
      // A pass is running or a retry is scheduled; it will re-read the store anyway.
      this.pending = true;
      return this.running ?? Promise.resolve();
    }

    if (this.state === 'alarmed') {
      this.logger.log(`New notification for ${this.domain}; leaving alarmed state`);
      this.attempts = 0;
    }

    this.state = 'notified';
    this.running = this.drain();
    return this.running;
  }

  snapshot(): WatcherSnapshot {
    return {
      serviceName: this.serviceName,
      domain: this.domain,
      state: this.state,
      attempts: this.attempts,
      lastError: this.lastError,
      lastReloadAt: this.lastReloadAt,
    };
  }

  private async drain(): Promise<void> {
    do {
      this.pending = false;
      try {
        await this.pass();
      } catch (error) {
        this.handleFailure(error);
        return;
      }
    } while (this.pending && !this.stopped);

    this.state = 'idle';
  }

  private async pass(): Promise<void> {
    const { store, selector, service } = this.options;
    this.state = 'notified';

    const selection = selector.select(this.domain, this.options.typePreference);
    const binding = store.getBinding(service.name, this.domain);

    if (!selection.found) {
      if (binding) {
        this.logger.warn(`Nothing selectable for ${this.domain} (${selection.reason}); ${service.name} keeps certificate ${binding.certificateId}`);
      } else {
        this.logger.debug(`Nothing selectable for ${this.domain}: ${selection.reason}`);
      }
      return;
    }

    const certificate = selection.certificate;
    if (binding && binding.certificateId === certificate.id && binding.certificateRevision === certificate.revision) {
      this.logger.debug(`${service.name} already bound to certificate ${certificate.id} r${certificate.revision}`);
      this.attempts = 0;
      return;
    }

    this.state = 'reloading';
    await this.options.reloader.reload(service, this.domain, certificate);

    this.attempts = 0;
    this.lastError = undefined;
    this.lastReloadAt = this.options.clock.now();
    const cleared = store.clearAlarms(service.name, this.domain);
    if (cleared > 0) {
      this.logger.log(`Cleared ${cleared} alarm(s) for ${service.name}/${this.domain}`);
    }
  }

  private handleFailure(error: unknown): void {
    const { config, store, service } = this.options;
    this.attempts += 1;
    this.lastError = getErrorMessage(error);

    const highSeverity = error instanceof ReloadError && error.severity === 'high';
    if (highSeverity || this.attempts >= config.maxRetryAttempts) {
      const message = highSeverity
        ? `High severity reload failure needs operator attention: ${this.lastError}`
        : `Reload failed ${this.attempts} time(s): ${this.lastError}`;
      try {
        store.raiseAlarm(service.name, this.domain, message, this.attempts);
      } catch (alarmError) {
        this.logger.error(`Could not persist alarm for ${service.name}/${this.domain}: ${getErrorMessage(alarmError)}`);
      }
      this.state = 'alarmed';
      this.pending = false;
      this.logger.error(`Alarm raised for ${service.name}/${this.domain}: ${message}`);
      return;
    }

    const delay = this.backoffDelay(this.attempts);
    this.state = 'error';
    this.logger.warn(`Reload attempt ${this.attempts}/${config.maxRetryAttempts} failed; retrying in ${delay}ms`, {
      error: this.lastError,
    });

    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      if (this.stopped) {
        return;
      }
      this.state = 'notified';
      this.running = this.drain();
    }, delay);
    this.retryTimer.unref();
  }

  /** `initialBackoffMs * 2^(attempt - 1)`, capped at `maxBackoffMs`. */
  backoffDelay(attempt: number): number {
    const { initialBackoffMs, maxBackoffMs } = this.options.config;
    return Math.min(initialBackoffMs * 2 ** (attempt - 1), maxBackoffMs);
  }
}
