/**
 * Full schema of the certificate store, created by migration v1.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS certificates (
  id                    INTEGER PRIMARY KEY AUTOINCREMENT,
  domain                TEXT NOT NULL,
  certificate_type      TEXT NOT NULL
                          CHECK (certificate_type IN ('manual', 'letsencrypt-production', 'letsencrypt-staging', 'self-signed')),
  subject_alt_names     TEXT NOT NULL DEFAULT '[]',   -- JSON array
  issuer                TEXT NOT NULL,
  not_before            TEXT NOT NULL,
  not_after             TEXT NOT NULL,
  certificate_path      TEXT NOT NULL,
  private_key_path      TEXT NOT NULL,
  chain_path            TEXT,
  fullchain_path        TEXT,
  is_active             INTEGER NOT NULL DEFAULT 1,
  auto_renew            INTEGER NOT NULL DEFAULT 1,
  renewal_attempt_count INTEGER NOT NULL DEFAULT 0,
  last_renewal_attempt  TEXT,
  last_renewal_success  TEXT,
  last_error            TEXT,
  revision              INTEGER NOT NULL DEFAULT 1,
  acme_staging          INTEGER NOT NULL DEFAULT 0,
  challenge_method      TEXT,
  created_at            TEXT NOT NULL,
  updated_at            TEXT NOT NULL,
  UNIQUE (domain, certificate_type),
  CHECK (not_after > not_before)
);

CREATE INDEX IF NOT EXISTS idx_certificates_domain ON certificates(domain);
CREATE INDEX IF NOT EXISTS idx_certificates_not_after ON certificates(not_after);

CREATE TABLE IF NOT EXISTS certificate_files (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  certificate_id  INTEGER NOT NULL REFERENCES certificates(id) ON DELETE CASCADE,
  file_type       TEXT NOT NULL CHECK (file_type IN ('certificate', 'private_key', 'chain', 'fullchain')),
  file_path       TEXT NOT NULL,
  file_size       INTEGER NOT NULL,
  checksum        TEXT NOT NULL,
  permissions     TEXT NOT NULL,
  status          TEXT NOT NULL DEFAULT 'verified' CHECK (status IN ('verified', 'needs_verification')),
  last_verified   TEXT,
  UNIQUE (certificate_id, file_type)
);

CREATE TABLE IF NOT EXISTS certificate_events (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  certificate_id    INTEGER NOT NULL,
  domain            TEXT NOT NULL,
  certificate_type  TEXT NOT NULL,
  operation         TEXT NOT NULL CHECK (operation IN ('created', 'updated', 'renewed', 'expired', 'deleted')),
  payload           TEXT NOT NULL DEFAULT '{}',   -- JSON object
  created_at        TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_certificate_events_domain ON certificate_events(domain, created_at);
CREATE INDEX IF NOT EXISTS idx_certificate_events_certificate ON certificate_events(certificate_id, id);

CREATE TABLE IF NOT EXISTS certificate_renewals (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  domain            TEXT NOT NULL,
  certificate_type  TEXT NOT NULL,
  certificate_id    INTEGER,
  trigger           TEXT NOT NULL CHECK (trigger IN ('manual', 'scheduled', 'api', 'fallback')),
  started_at        TEXT NOT NULL,
  completed_at      TEXT,
  success           INTEGER,
  error_message     TEXT,
  old_not_after     TEXT,
  new_not_after     TEXT,
  fallback_from     TEXT
);

CREATE INDEX IF NOT EXISTS idx_certificate_renewals_domain ON certificate_renewals(domain, started_at);

CREATE TABLE IF NOT EXISTS service_certificates (
  id                    INTEGER PRIMARY KEY AUTOINCREMENT,
  service_name          TEXT NOT NULL,
  domain                TEXT NOT NULL,
  certificate_id        INTEGER NOT NULL,
  certificate_type      TEXT NOT NULL,
  certificate_revision  INTEGER NOT NULL,
  tls_enabled           INTEGER NOT NULL DEFAULT 1,
  certificate_path      TEXT NOT NULL,
  private_key_path      TEXT NOT NULL,
  updated_at            TEXT NOT NULL,
  UNIQUE (service_name, domain)
);

CREATE TABLE IF NOT EXISTS service_reloads (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  service_name    TEXT NOT NULL,
  domain          TEXT NOT NULL,
  certificate_id  INTEGER NOT NULL,
  revision        INTEGER NOT NULL,
  outcome         TEXT NOT NULL CHECK (outcome IN ('success', 'noop', 'failed')),
  stage           TEXT,
  severity        TEXT,
  message         TEXT,
  created_at      TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_service_reloads_service ON service_reloads(service_name, domain, created_at);

CREATE TABLE IF NOT EXISTS service_alarms (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  service_name  TEXT NOT NULL,
  domain        TEXT NOT NULL,
  message       TEXT NOT NULL,
  attempts      INTEGER NOT NULL,
  raised_at     TEXT NOT NULL,
  cleared_at    TEXT
);

CREATE INDEX IF NOT EXISTS idx_service_alarms_open ON service_alarms(domain, cleared_at);
`;
