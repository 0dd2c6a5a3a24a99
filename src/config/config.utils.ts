import { Logger } from '@nestjs/common';
import type { CertdConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * Sensitive values (API keys) are redacted.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: CertdConfiguration): void {
  const summaryLogger = new Logger('Configuration');
  const { certificate, watcher, services } = config;

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.main.port}`);
  summaryLogger.log(`Operator API: ${config.main.apiKey ? 'key configured' : 'no key (all requests rejected)'}`);
  summaryLogger.log(`Store: ${config.store.connection}`);

  summaryLogger.log(`Domains: ${certificate.domains.join(', ')} (primary: ${certificate.domains[0]})`);
  summaryLogger.log(`Certificate Root: ${certificate.certificateRootPath}`);
  summaryLogger.log(`Default Type: ${certificate.defaultType}`);
  summaryLogger.log(`Type Preference: ${certificate.typePreference ?? 'priority order'}`);
  summaryLogger.log(`Selection Margin: ${certificate.renewalMarginHours}h`);
  summaryLogger.log(
    `ACME Tool: ${certificate.acmeToolPath} (${certificate.challengeMethod}, timeout ${certificate.acmeTimeoutMs}ms, ` +
      `email ${certificate.acmeEmail ? 'set' : 'unset'})`,
  );

  summaryLogger.log(
    `Watchers: ${services.enabled.join(', ')} (max ${watcher.maxRetryAttempts} attempts, ` +
      `backoff ${watcher.initialBackoffMs}-${watcher.maxBackoffMs}ms)`,
  );
  summaryLogger.log(`Service Definitions: ${services.definitionsPath}`);
  summaryLogger.log(`File Integrity Watching: ${config.integrity.watchFiles ? 'enabled' : 'disabled'}`);

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
