import type { CertificateType } from '../certificate.constants';

/**
 * Base class for certificate lifecycle failures.
 */
export class CertificateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type GenerationFailureReason = 'tool-failed' | 'artifact-invalid' | 'io' | 'timeout' | 'cancelled' | 'unsupported';

/**
 * Material could not be produced or did not pass inspection.
 * Nothing was committed to the store.
 */
export class GenerationError extends CertificateError {
  readonly domain: string;
  readonly certificateType: CertificateType;
  readonly reason: GenerationFailureReason;
  /** Combined stdout/stderr of the ACME tool, when it ran. */
  readonly output?: string;
  readonly exitCode?: number;

  constructor(
    message: string,
    details: {
      domain: string;
      certificateType: CertificateType;
      reason: GenerationFailureReason;
      output?: string;
      exitCode?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: details.cause });
    this.domain = details.domain;
    this.certificateType = details.certificateType;
    this.reason = details.reason;
    this.output = details.output;
    this.exitCode = details.exitCode;
  }
}

export type ReloadStage = 'verify' | 'render' | 'validate' | 'reload' | 'liveness' | 'record';
export type ReloadSeverity = 'low' | 'high';

/**
 * Stages from `reload` onwards have touched the running service.
 */
const HIGH_SEVERITY_STAGES: readonly ReloadStage[] = ['reload', 'liveness', 'record'];

export function severityForStage(stage: ReloadStage): ReloadSeverity {
  return HIGH_SEVERITY_STAGES.includes(stage) ? 'high' : 'low';
}

/**
 * A reload sequence stopped at `stage`. Low severity failures left the live
 * configuration untouched; high severity ones may have left the service degraded.
 */
export class ReloadError extends CertificateError {
  readonly serviceName: string;
  readonly domain: string;
  readonly stage: ReloadStage;
  readonly severity: ReloadSeverity;

  constructor(message: string, details: { serviceName: string; domain: string; stage: ReloadStage; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.serviceName = details.serviceName;
    this.domain = details.domain;
    this.stage = details.stage;
    this.severity = severityForStage(details.stage);
  }
}

/**
 * Unknown certificate id or a write against a row that does not exist.
 */
export class CertificateNotFoundError extends CertificateError {
  constructor(readonly certificateId: number) {
    super(`Certificate ${certificateId} not found`);
  }
}
