import { registerAs } from '@nestjs/config';
import * as process from 'process';
import { Logger } from '@nestjs/common';
import {
  ALLOWED_ACME_CHALLENGES,
  DEFAULT_ACME_CHALLENGE,
  DEFAULT_ACME_TIMEOUT_MS,
  DEFAULT_ACME_TOOL_PATH,
  DEFAULT_ACME_WEBROOT,
  DEFAULT_CERTIFICATE_ROOT,
  DEFAULT_CERTIFICATE_TYPE,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_DOMAINS,
  DEFAULT_ENABLED_SERVICES,
  DEFAULT_ENVIRONMENT,
  DEFAULT_MAX_RETRY_ATTEMPTS,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RENEW_DAYS_BEFORE_EXPIRY,
  DEFAULT_RENEWAL_MARGIN_HOURS,
  DEFAULT_SELF_SIGNED_VALIDITY_DAYS,
  DEFAULT_SERVER_PORT,
  DEFAULT_SERVICES_FILE,
  DEFAULT_STORE_CONNECTION,
  DEFAULT_WATCHER_BACKOFF_MS,
  DEFAULT_WATCHER_MAX_BACKOFF_MS,
} from './config/config.constants';
import {
  parseCertificateType,
  parseDomains,
  parseList,
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseStringWithDefault,
} from './config/config.parsers';
import type { CertdConfiguration } from './config/config.types';
import type { AcmeChallengeMethod, CertificateConfig, WatcherConfig } from './certificate/interfaces';
import type { ServicesConfig } from './services/interfaces';

const logger = new Logger('ConfigValidation');

function isAcmeChallengeMethod(value: string): value is AcmeChallengeMethod {
  return ALLOWED_ACME_CHALLENGES.some((method) => method === value);
}

/**
 * Build Certificate Configuration
 *
 * Optional environment variables:
 * - CERTD_DOMAINS: Comma-separated managed domains, first is primary (default: localhost)
 * - CERTD_CERT_ROOT: Root of the per-type certificate trees (default: /data/certificates)
 * - CERTD_ACME_TOOL: certbot-compatible executable (default: certbot)
 * - CERTD_ACME_EMAIL: ACME account contact, required for Let's Encrypt types
 * - CERTD_ACME_WEBROOT: Webroot for HTTP-01 challenges (default: /var/www)
 * - CERTD_ACME_CHALLENGE: http-01 or standalone (default: http-01)
 * - CERTD_ACME_TIMEOUT_MS: Budget per ACME invocation (default: 120000)
 * - CERTD_RENEWAL_MARGIN_HOURS: Selection safety margin (default: 24)
 * - CERTD_RENEW_DAYS_BEFORE_EXPIRY: Scheduled renewal threshold (default: 30)
 * - CERTD_SELF_SIGNED_DAYS: Self-signed validity (default: 365)
 * - CERTD_DEFAULT_TYPE: Type generated for uncovered domains (default: self-signed)
 * - CERTD_TYPE_PREFERENCE: Type watchers select, unset for the priority order
 *
 * @throws {Error} If a domain, certificate type or challenge method is invalid
 */
function buildCertificateConfig(): CertificateConfig {
  const challengeMethod = parseStringWithDefault(process.env.CERTD_ACME_CHALLENGE, DEFAULT_ACME_CHALLENGE);
  if (!isAcmeChallengeMethod(challengeMethod)) {
    throw new Error(
      `Invalid CERTD_ACME_CHALLENGE: "${challengeMethod}". Must be one of: ${ALLOWED_ACME_CHALLENGES.join(', ')}`,
    );
  }

  const defaultType = parseCertificateType(process.env.CERTD_DEFAULT_TYPE, 'CERTD_DEFAULT_TYPE') ?? DEFAULT_CERTIFICATE_TYPE;
  if (defaultType === 'manual') {
    throw new Error('CERTD_DEFAULT_TYPE cannot be "manual": manual certificates are imported, not generated');
  }

  const acmeEmail = parseStringWithDefault(process.env.CERTD_ACME_EMAIL, '');
  if (defaultType !== 'self-signed' && !acmeEmail.trim()) {
    logger.warn(`CERTD_DEFAULT_TYPE=${defaultType} without CERTD_ACME_EMAIL; ACME issuance will be rejected`);
  }

  return {
    domains: parseDomains(process.env.CERTD_DOMAINS, DEFAULT_DOMAINS),
    certificateRootPath: parseStringWithDefault(process.env.CERTD_CERT_ROOT, DEFAULT_CERTIFICATE_ROOT),
    acmeToolPath: parseStringWithDefault(process.env.CERTD_ACME_TOOL, DEFAULT_ACME_TOOL_PATH),
    acmeEmail,
    webrootPath: parseStringWithDefault(process.env.CERTD_ACME_WEBROOT, DEFAULT_ACME_WEBROOT),
    challengeMethod,
    acmeTimeoutMs: parseNumberWithDefault(process.env.CERTD_ACME_TIMEOUT_MS, DEFAULT_ACME_TIMEOUT_MS),
    renewalMarginHours: parseNumberWithDefault(process.env.CERTD_RENEWAL_MARGIN_HOURS, DEFAULT_RENEWAL_MARGIN_HOURS),
    renewDaysBeforeExpiry: parseNumberWithDefault(
      process.env.CERTD_RENEW_DAYS_BEFORE_EXPIRY,
      DEFAULT_RENEW_DAYS_BEFORE_EXPIRY,
    ),
    selfSignedValidityDays: parseNumberWithDefault(
      process.env.CERTD_SELF_SIGNED_DAYS,
      DEFAULT_SELF_SIGNED_VALIDITY_DAYS,
    ),
    defaultType,
    typePreference: parseCertificateType(process.env.CERTD_TYPE_PREFERENCE, 'CERTD_TYPE_PREFERENCE'),
  };
}

/**
 * Build Watcher Configuration
 *
 * Optional environment variables:
 * - CERTD_MAX_RETRY_ATTEMPTS: Reload attempts before raising an alarm (default: 5)
 * - CERTD_WATCHER_BACKOFF_MS: First retry delay, doubled per attempt (default: 1000)
 * - CERTD_WATCHER_MAX_BACKOFF_MS: Retry delay cap (default: 60000)
 */
function buildWatcherConfig(): WatcherConfig {
  const maxRetryAttempts = parseNumberWithDefault(process.env.CERTD_MAX_RETRY_ATTEMPTS, DEFAULT_MAX_RETRY_ATTEMPTS);
  if (maxRetryAttempts < 1) {
    throw new Error('CERTD_MAX_RETRY_ATTEMPTS must be at least 1');
  }

  const initialBackoffMs = parseNumberWithDefault(process.env.CERTD_WATCHER_BACKOFF_MS, DEFAULT_WATCHER_BACKOFF_MS);
  const maxBackoffMs = parseNumberWithDefault(process.env.CERTD_WATCHER_MAX_BACKOFF_MS, DEFAULT_WATCHER_MAX_BACKOFF_MS);
  if (maxBackoffMs < initialBackoffMs) {
    throw new Error('CERTD_WATCHER_MAX_BACKOFF_MS must not be lower than CERTD_WATCHER_BACKOFF_MS');
  }

  return { maxRetryAttempts, initialBackoffMs, maxBackoffMs };
}

/**
 * Build Services Configuration
 *
 * Optional environment variables:
 * - CERTD_SERVICES_FILE: Managed service definitions (default: config/managed-services.json)
 * - CERTD_SERVICES: Comma-separated services to watch (default: mail,apache)
 * - CERTD_RELOAD_TIMEOUT_MS: Budget per validate/reload command (default: 30000)
 * - CERTD_PROBE_TIMEOUT_MS: Budget per port probe (default: 3000)
 */
function buildServicesConfig(): ServicesConfig {
  return {
    definitionsPath: parseStringWithDefault(process.env.CERTD_SERVICES_FILE, DEFAULT_SERVICES_FILE),
    enabled: parseList(process.env.CERTD_SERVICES, DEFAULT_ENABLED_SERVICES),
    commandTimeoutMs: parseNumberWithDefault(process.env.CERTD_RELOAD_TIMEOUT_MS, DEFAULT_COMMAND_TIMEOUT_MS),
    probeTimeoutMs: parseNumberWithDefault(process.env.CERTD_PROBE_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS),
  };
}

/**
 * Build Main Server Configuration
 *
 * Optional environment variables:
 * - CERTD_PORT: Operator API port (default: 8080)
 * - CERTD_API_KEY: Key expected in X-API-Key; unset rejects every API call
 */
function buildMainConfig(): CertdConfiguration['main'] {
  const apiKey = process.env.CERTD_API_KEY?.trim();
  if (!apiKey) {
    logger.warn('CERTD_API_KEY not configured - operator API will reject all requests');
  }

  return {
    port: parseNumberWithDefault(process.env.CERTD_PORT, DEFAULT_SERVER_PORT),
    apiKey: apiKey || undefined,
  };
}

/**
 * Register Config CERTD
 *
 * Every option has a default, so the service starts with an empty environment
 * and covers `localhost` with a self-signed certificate.
 */
export default registerAs('certd', (): CertdConfiguration => {
  return {
    environment: parseStringWithDefault(
      process.env.CERTD_ENVIRONMENT,
      parseStringWithDefault(process.env.NODE_ENV, DEFAULT_ENVIRONMENT),
    ),
    main: buildMainConfig(),
    store: {
      connection: parseStringWithDefault(process.env.CERTD_STORE, DEFAULT_STORE_CONNECTION),
    },
    certificate: buildCertificateConfig(),
    watcher: buildWatcherConfig(),
    services: buildServicesConfig(),
    integrity: {
      watchFiles: parseOptionalBoolean(process.env.CERTD_WATCH_FILES, true),
    },
  };
});
