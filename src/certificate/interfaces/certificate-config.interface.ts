import type { CertificateType } from '../certificate.constants';

/**
 * How the ACME tool proves domain control: `http-01` serves the challenge from
 * a webroot, `standalone` lets the tool bind port 80 itself.
 */
export type AcmeChallengeMethod = 'http-01' | 'standalone';

/**
 * Configuration for certificate selection and generation.
 */
export interface CertificateConfig {
  /** Managed domains. The first entry is the primary domain. */
  domains: string[];
  /** Root directory holding the per-type certificate trees. */
  certificateRootPath: string;
  /** Executable of the certbot-compatible ACME tool. */
  acmeToolPath: string;
  /** Contact address passed to the ACME tool. Required for ACME issuance. */
  acmeEmail: string;
  /** Webroot the ACME tool writes HTTP-01 challenge files into. */
  webrootPath: string;
  challengeMethod: AcmeChallengeMethod;
  /** Wall-clock budget for a single ACME tool invocation. */
  acmeTimeoutMs: number;
  /** Certificates expiring within this many hours are not selectable. */
  renewalMarginHours: number;
  /** Scheduled renewal kicks in this many days before expiry. */
  renewDaysBeforeExpiry: number;
  selfSignedValidityDays: number;
  /** Type generated when a domain has nothing selectable. */
  defaultType: CertificateType;
  /** Type watchers ask the selector for. Unset means the fixed priority order. */
  typePreference?: CertificateType;
}

/**
 * Retry policy for service watchers.
 */
export interface WatcherConfig {
  maxRetryAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
}

export interface IntegrityConfig {
  /** Watch the certificate tree for out-of-band modifications. */
  watchFiles: boolean;
}
