import type { CertificateType } from '../certificate.constants';
import type { CertificateFile, RenewalRecord, SelectionCandidate, ServiceAlarm } from './certificate.interface';

export type WatcherState = 'idle' | 'notified' | 'reloading' | 'error' | 'alarmed';

export interface WatcherSnapshot {
  serviceName: string;
  domain: string;
  state: WatcherState;
  attempts: number;
  lastError?: string;
  lastReloadAt?: Date;
}

/**
 * One managed service's binding for a domain. The certificate fields are
 * absent when the service has never been bound.
 */
export interface BindingStatus {
  serviceName: string;
  certificateId?: number;
  certificateType?: CertificateType;
  certificateRevision?: number;
  updatedAt?: Date;
  /** Whether the binding matches what selection yields right now. */
  inSync: boolean;
}

/**
 * Operator view of one domain.
 */
export interface DomainStatus {
  domain: string;
  selected?: {
    certificateId: number;
    certificateType: CertificateType;
    notAfter: Date;
    daysUntilExpiry: number;
  };
  selectionMiss?: string;
  candidates: SelectionCandidate[];
  lastRenewal?: RenewalRecord;
  bindings: BindingStatus[];
  watchers: WatcherSnapshot[];
  alarms: ServiceAlarm[];
  filesNeedingVerification: CertificateFile[];
}

export interface IntegrityFinding {
  certificateId: number;
  fileId: number;
  filePath: string;
  problem: 'missing' | 'checksum' | 'size';
}

export interface IntegrityReport {
  checked: number;
  verified: number;
  drifted: IntegrityFinding[];
}
