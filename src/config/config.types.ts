import type { CertificateConfig, IntegrityConfig, WatcherConfig } from '../certificate/interfaces';
import type { ServicesConfig } from '../services/interfaces';

/**
 * Configuration type definition for type-safe access
 */
export interface CertdConfiguration {
  environment: string;
  main: {
    port: number;
    apiKey?: string;
  };
  store: {
    connection: string;
  };
  certificate: CertificateConfig;
  watcher: WatcherConfig;
  services: ServicesConfig;
  integrity: IntegrityConfig;
}
