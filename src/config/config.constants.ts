export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

// Configuration defaults
export const DEFAULT_ENVIRONMENT = 'production';
export const DEFAULT_SERVER_PORT = 8080;
export const DEFAULT_DOMAINS = ['localhost'];
export const DEFAULT_CERTIFICATE_ROOT = '/data/certificates';
export const DEFAULT_STORE_CONNECTION = '/data/certd.sqlite';
export const DEFAULT_ACME_TOOL_PATH = 'certbot';
export const DEFAULT_ACME_WEBROOT = '/var/www';
export const DEFAULT_ACME_CHALLENGE = 'http-01';
export const ALLOWED_ACME_CHALLENGES = ['http-01', 'standalone'] as const;
export const DEFAULT_ACME_TIMEOUT_MS = 120_000; // 2 minutes
export const DEFAULT_RENEWAL_MARGIN_HOURS = 24;
export const DEFAULT_RENEW_DAYS_BEFORE_EXPIRY = 30;
export const DEFAULT_SELF_SIGNED_VALIDITY_DAYS = 365;
export const DEFAULT_CERTIFICATE_TYPE = 'self-signed';
export const DEFAULT_MAX_RETRY_ATTEMPTS = 5;
export const DEFAULT_WATCHER_BACKOFF_MS = 1_000;
export const DEFAULT_WATCHER_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_SERVICES_FILE = 'config/managed-services.json';
export const DEFAULT_ENABLED_SERVICES = ['mail', 'apache'];
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
export const DEFAULT_PROBE_TIMEOUT_MS = 3_000;
