import { CERTIFICATE_FILE_TYPES, CERTIFICATE_TYPES, CHANGE_OPERATIONS } from '../certificate.constants';
import type {
  Certificate,
  CertificateFile,
  ChangeEvent,
  RenewalRecord,
  RenewalTrigger,
  ReloadOutcome,
  ReloadRecord,
  ServiceAlarm,
  ServiceCertificateBinding,
} from '../interfaces';
import { CertificateError } from '../errors/certificate.errors';

/**
 * Raw row shapes returned by better-sqlite3. Column names are snake_case as
 * defined in the schema; timestamps are ISO-8601 strings, booleans 0/1.
 */
export interface CertificateRow {
  id: number;
  domain: string;
  certificate_type: string;
  subject_alt_names: string;
  issuer: string;
  not_before: string;
  not_after: string;
  certificate_path: string;
  private_key_path: string;
  chain_path: string | null;
  fullchain_path: string | null;
  is_active: number;
  auto_renew: number;
  renewal_attempt_count: number;
  last_renewal_attempt: string | null;
  last_renewal_success: string | null;
  last_error: string | null;
  revision: number;
  acme_staging: number;
  challenge_method: string | null;
  created_at: string;
  updated_at: string;
}

export const CERTIFICATE_COLUMNS = `id, domain, certificate_type, subject_alt_names, issuer, not_before, not_after,
  certificate_path, private_key_path, chain_path, fullchain_path, is_active, auto_renew,
  renewal_attempt_count, last_renewal_attempt, last_renewal_success, last_error, revision,
  acme_staging, challenge_method, created_at, updated_at`;

export interface CertificateFileRow {
  id: number;
  certificate_id: number;
  file_type: string;
  file_path: string;
  file_size: number;
  checksum: string;
  permissions: string;
  status: string;
  last_verified: string | null;
}

export interface ChangeEventRow {
  id: number;
  certificate_id: number;
  domain: string;
  certificate_type: string;
  operation: string;
  payload: string;
  created_at: string;
}

export interface BindingRow {
  id: number;
  service_name: string;
  domain: string;
  certificate_id: number;
  certificate_type: string;
  certificate_revision: number;
  tls_enabled: number;
  certificate_path: string;
  private_key_path: string;
  updated_at: string;
}

export interface RenewalRow {
  id: number;
  domain: string;
  certificate_type: string;
  certificate_id: number | null;
  trigger: string;
  started_at: string;
  completed_at: string | null;
  success: number | null;
  error_message: string | null;
  old_not_after: string | null;
  new_not_after: string | null;
  fallback_from: string | null;
}

export interface ReloadRow {
  id: number;
  service_name: string;
  domain: string;
  certificate_id: number;
  revision: number;
  outcome: string;
  stage: string | null;
  severity: string | null;
  message: string | null;
  created_at: string;
}

export interface AlarmRow {
  id: number;
  service_name: string;
  domain: string;
  message: string;
  attempts: number;
  raised_at: string;
  cleared_at: string | null;
}

const RENEWAL_TRIGGERS: readonly RenewalTrigger[] = ['manual', 'scheduled', 'api', 'fallback'];
const RELOAD_OUTCOMES: readonly ReloadOutcome[] = ['success', 'noop', 'failed'];
const FILE_STATUSES = ['verified', 'needs_verification'] as const;

function oneOf<T extends string>(values: readonly T[], value: string, column: string): T {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new CertificateError(`Unexpected ${column} value in store: "${value}"`);
  }
  return match;
}

function toDate(value: string | null): Date | undefined {
  return value === null ? undefined : new Date(value);
}

function parseStringList(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((entry): entry is string => typeof entry === 'string');
}

function parsePayload(value: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(value);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function rowToCertificate(row: CertificateRow): Certificate {
  return {
    id: row.id,
    domain: row.domain,
    certificateType: oneOf(CERTIFICATE_TYPES, row.certificate_type, 'certificate_type'),
    subjectAltNames: parseStringList(row.subject_alt_names),
    issuer: row.issuer,
    notBefore: new Date(row.not_before),
    notAfter: new Date(row.not_after),
    certificatePath: row.certificate_path,
    privateKeyPath: row.private_key_path,
    chainPath: row.chain_path ?? undefined,
    fullchainPath: row.fullchain_path ?? undefined,
    isActive: row.is_active === 1,
    autoRenew: row.auto_renew === 1,
    renewalAttemptCount: row.renewal_attempt_count,
    lastRenewalAttempt: toDate(row.last_renewal_attempt),
    lastRenewalSuccess: toDate(row.last_renewal_success),
    lastError: row.last_error ?? undefined,
    revision: row.revision,
    acmeStaging: row.acme_staging === 1,
    challengeMethod: row.challenge_method ?? undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function rowToCertificateFile(row: CertificateFileRow): CertificateFile {
  return {
    id: row.id,
    certificateId: row.certificate_id,
    fileType: oneOf(CERTIFICATE_FILE_TYPES, row.file_type, 'file_type'),
    filePath: row.file_path,
    fileSize: row.file_size,
    checksum: row.checksum,
    permissions: row.permissions,
    status: oneOf(FILE_STATUSES, row.status, 'status'),
    lastVerified: toDate(row.last_verified),
  };
}

export function rowToChangeEvent(row: ChangeEventRow): ChangeEvent {
  return {
    id: row.id,
    certificateId: row.certificate_id,
    domain: row.domain,
    certificateType: oneOf(CERTIFICATE_TYPES, row.certificate_type, 'certificate_type'),
    operation: oneOf(CHANGE_OPERATIONS, row.operation, 'operation'),
    timestamp: new Date(row.created_at),
    payload: parsePayload(row.payload),
  };
}

export function rowToBinding(row: BindingRow): ServiceCertificateBinding {
  return {
    id: row.id,
    serviceName: row.service_name,
    domain: row.domain,
    certificateId: row.certificate_id,
    certificateType: oneOf(CERTIFICATE_TYPES, row.certificate_type, 'certificate_type'),
    certificateRevision: row.certificate_revision,
    tlsEnabled: row.tls_enabled === 1,
    certificatePath: row.certificate_path,
    privateKeyPath: row.private_key_path,
    updatedAt: new Date(row.updated_at),
  };
}

export function rowToRenewal(row: RenewalRow): RenewalRecord {
  return {
    id: row.id,
    domain: row.domain,
    certificateType: oneOf(CERTIFICATE_TYPES, row.certificate_type, 'certificate_type'),
    certificateId: row.certificate_id ?? undefined,
    trigger: oneOf(RENEWAL_TRIGGERS, row.trigger, 'trigger'),
    startedAt: new Date(row.started_at),
    completedAt: toDate(row.completed_at),
    success: row.success === null ? undefined : row.success === 1,
    errorMessage: row.error_message ?? undefined,
    oldNotAfter: toDate(row.old_not_after),
    newNotAfter: toDate(row.new_not_after),
    fallbackFrom: row.fallback_from === null ? undefined : oneOf(CERTIFICATE_TYPES, row.fallback_from, 'fallback_from'),
  };
}

export function rowToReload(row: ReloadRow): ReloadRecord {
  return {
    id: row.id,
    serviceName: row.service_name,
    domain: row.domain,
    certificateId: row.certificate_id,
    revision: row.revision,
    outcome: oneOf(RELOAD_OUTCOMES, row.outcome, 'outcome'),
    stage: row.stage ?? undefined,
    severity: row.severity ?? undefined,
    message: row.message ?? undefined,
    createdAt: new Date(row.created_at),
  };
}

export function rowToAlarm(row: AlarmRow): ServiceAlarm {
  return {
    id: row.id,
    serviceName: row.service_name,
    domain: row.domain,
    message: row.message,
    attempts: row.attempts,
    raisedAt: new Date(row.raised_at),
    clearedAt: toDate(row.cleared_at),
  };
}
