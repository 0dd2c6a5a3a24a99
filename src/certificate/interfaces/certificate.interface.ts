import type { CertificateFileType, CertificateType, ChangeOperation } from '../certificate.constants';

/**
 * A tracked certificate. One row exists per (domain, certificate type).
 * File locations are references to material on disk, never the material itself.
 */
export interface Certificate {
  id: number;
  domain: string;
  certificateType: CertificateType;
  subjectAltNames: string[];
  issuer: string;
  notBefore: Date;
  notAfter: Date;
  certificatePath: string;
  privateKeyPath: string;
  chainPath?: string;
  fullchainPath?: string;
  isActive: boolean;
  autoRenew: boolean;
  renewalAttemptCount: number;
  lastRenewalAttempt?: Date;
  lastRenewalSuccess?: Date;
  lastError?: string;
  /** Bumped whenever validity window, file paths or activity change. */
  revision: number;
  acmeStaging: boolean;
  challengeMethod?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type CertificateFileStatus = 'verified' | 'needs_verification';

/**
 * One physical artifact belonging to a certificate, as last verified.
 */
export interface CertificateFile {
  id: number;
  certificateId: number;
  fileType: CertificateFileType;
  filePath: string;
  fileSize: number;
  /** sha256, hex encoded. */
  checksum: string;
  /** Permission bits as a 3-digit octal string, e.g. `600`. */
  permissions: string;
  status: CertificateFileStatus;
  lastVerified?: Date;
}

/**
 * Artifact facts gathered by the inspector before a certificate is committed.
 */
export interface ArtifactFile {
  fileType: CertificateFileType;
  filePath: string;
  fileSize: number;
  checksum: string;
  permissions: string;
}

/**
 * Change notification. Persisted for audit and published to subscribers.
 * Subscribers treat it as a hint and re-read the store before acting.
 */
export interface ChangeEvent {
  id?: number;
  certificateId: number;
  domain: string;
  certificateType: CertificateType;
  operation: ChangeOperation;
  timestamp: Date;
  payload: Record<string, unknown>;
}

/**
 * Which certificate a running service is configured with for a domain.
 * Written only by the reloader once the new configuration is confirmed live.
 */
export interface ServiceCertificateBinding {
  id: number;
  serviceName: string;
  domain: string;
  certificateId: number;
  certificateType: CertificateType;
  certificateRevision: number;
  tlsEnabled: boolean;
  certificatePath: string;
  privateKeyPath: string;
  updatedAt: Date;
}

export type RenewalTrigger = 'manual' | 'scheduled' | 'api' | 'fallback';

export interface RenewalRecord {
  id: number;
  domain: string;
  certificateType: CertificateType;
  certificateId?: number;
  trigger: RenewalTrigger;
  startedAt: Date;
  completedAt?: Date;
  success?: boolean;
  errorMessage?: string;
  oldNotAfter?: Date;
  newNotAfter?: Date;
  /** Type originally requested when this renewal fell back to self-signed. */
  fallbackFrom?: CertificateType;
}

export type ReloadOutcome = 'success' | 'noop' | 'failed';

export interface ReloadRecord {
  id: number;
  serviceName: string;
  domain: string;
  certificateId: number;
  revision: number;
  outcome: ReloadOutcome;
  stage?: string;
  severity?: string;
  message?: string;
  createdAt: Date;
}

export interface ServiceAlarm {
  id: number;
  serviceName: string;
  domain: string;
  message: string;
  attempts: number;
  raisedAt: Date;
  clearedAt?: Date;
}

/**
 * Input for committing freshly produced and verified material.
 */
export interface IssuedCertificateInput {
  domain: string;
  certificateType: CertificateType;
  subjectAltNames: string[];
  issuer: string;
  notBefore: Date;
  notAfter: Date;
  certificatePath: string;
  privateKeyPath: string;
  chainPath?: string;
  fullchainPath?: string;
  autoRenew?: boolean;
  acmeStaging?: boolean;
  challengeMethod?: string;
  files: ArtifactFile[];
}

export interface BindingInput {
  serviceName: string;
  domain: string;
  certificateId: number;
  certificateType: CertificateType;
  certificateRevision: number;
  tlsEnabled: boolean;
  certificatePath: string;
  privateKeyPath: string;
}

export interface ReloadRecordInput {
  serviceName: string;
  domain: string;
  certificateId: number;
  revision: number;
  outcome: ReloadOutcome;
  stage?: string;
  severity?: string;
  message?: string;
}

/**
 * Outcome of a selection. A miss is a normal signal that generation is needed.
 */
export type SelectionResult = { found: true; certificate: Certificate } | { found: false; reason: string };

export interface SelectionCandidate {
  certificateId: number;
  certificateType: CertificateType;
  notAfter: Date;
  isActive: boolean;
  usable: boolean;
  reason?: string;
}

export interface GenerateOptions {
  /** Regenerate even when the current certificate is still usable. */
  force?: boolean;
  subjectAltNames?: string[];
  trigger?: RenewalTrigger;
  /** Aborting before commit leaves no store rows behind. */
  signal?: AbortSignal;
}

export type GenerationOutcome = 'issued' | 'existing' | 'fallback';

export interface GenerationResult {
  certificate: Certificate;
  outcome: GenerationOutcome;
  /** Present only when an ACME request degraded to self-signed. */
  fallback?: {
    requestedType: CertificateType;
    reason: string;
  };
}

/**
 * Paths of the operator-supplied files for a manual certificate.
 */
export interface ManualCertificatePaths {
  certificatePath: string;
  privateKeyPath: string;
  chainPath?: string;
}

export interface ReloadResult {
  outcome: 'reloaded' | 'noop';
  binding: ServiceCertificateBinding;
}
