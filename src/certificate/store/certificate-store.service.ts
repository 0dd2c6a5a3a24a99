import { Inject, Injectable, Logger } from '@nestjs/common';
import type Database from 'better-sqlite3';
import { DATABASE_CONNECTION } from '../../database/database.tokens';
import { CLOCK } from '../certificate.tokens';
import type { Clock } from '../certificate.tokens';
import type { CertificateType, ChangeOperation } from '../certificate.constants';
import type {
  BindingInput,
  Certificate,
  CertificateFile,
  ChangeEvent,
  IssuedCertificateInput,
  RenewalRecord,
  RenewalTrigger,
  ReloadRecord,
  ReloadRecordInput,
  ServiceAlarm,
  ServiceCertificateBinding,
} from '../interfaces';
import { ChangeNotifierService } from '../notifier/change-notifier.service';
import { CertificateError, CertificateNotFoundError } from '../errors/certificate.errors';
import {
  CERTIFICATE_COLUMNS,
  rowToAlarm,
  rowToBinding,
  rowToCertificate,
  rowToCertificateFile,
  rowToChangeEvent,
  rowToReload,
  rowToRenewal,
} from './certificate-store.rows';
import type {
  AlarmRow,
  BindingRow,
  CertificateFileRow,
  CertificateRow,
  ChangeEventRow,
  ReloadRow,
  RenewalRow,
} from './certificate-store.rows';

/**
 * Durable record of certificates, their artifacts, service bindings and the
 * lifecycle history around them. The single source of truth every other
 * component re-reads before acting.
 *
 * Every write runs in a transaction. Writes that change activity, file paths
 * or the validity window insert their change event in the same transaction
 * and publish it once the transaction has committed.
 */
@Injectable()
export class CertificateStoreService {
  private readonly logger = new Logger(CertificateStoreService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: Database.Database,
    private readonly notifier: ChangeNotifierService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  findById(id: number): Certificate | undefined {
    const row = this.db
      .prepare<[number], CertificateRow>(`SELECT ${CERTIFICATE_COLUMNS} FROM certificates WHERE id = ?`)
      .get(id);
    return row ? rowToCertificate(row) : undefined;
  }

  /** The row for (domain, type) regardless of whether it is active. */
  findByDomainAndType(domain: string, certificateType: CertificateType): Certificate | undefined {
    const row = this.db
      .prepare<
        [string, string],
        CertificateRow
      >(`SELECT ${CERTIFICATE_COLUMNS} FROM certificates WHERE domain = ? AND certificate_type = ?`)
      .get(domain, certificateType);
    return row ? rowToCertificate(row) : undefined;
  }

  findActive(domain: string, certificateType: CertificateType): Certificate | undefined {
    const certificate = this.findByDomainAndType(domain, certificateType);
    return certificate?.isActive ? certificate : undefined;
  }

  listByDomain(domain: string): Certificate[] {
    return this.db
      .prepare<
        [string],
        CertificateRow
      >(`SELECT ${CERTIFICATE_COLUMNS} FROM certificates WHERE domain = ? ORDER BY certificate_type`)
      .all(domain)
      .map(rowToCertificate);
  }

  listAll(): Certificate[] {
    return this.db
      .prepare<[], CertificateRow>(`SELECT ${CERTIFICATE_COLUMNS} FROM certificates ORDER BY domain, certificate_type`)
      .all()
      .map(rowToCertificate);
  }

  /**
   * Commits verified material for (domain, type): inserts the row or updates
   * it in place, replaces its file rows and records the change event.
   *
   * @throws {CertificateError} If the validity window is empty or inverted
   */
  upsertIssued(input: IssuedCertificateInput): Certificate {
    if (input.notAfter.getTime() <= input.notBefore.getTime()) {
      throw new CertificateError(
        `Refusing to store ${input.certificateType} certificate for ${input.domain}: not_after must be later than not_before`,
      );
    }

    const now = this.clock.now().toISOString();

    const commit = this.db.transaction((): { certificateId: number; event: ChangeEvent } => {
      const existing = this.db
        .prepare<
          [string, string],
          { id: number }
        >('SELECT id FROM certificates WHERE domain = ? AND certificate_type = ?')
        .get(input.domain, input.certificateType);

      let certificateId: number;
      let operation: ChangeOperation;

      if (!existing) {
        const result = this.db
          .prepare<
            [
              string,
              string,
              string,
              string,
              string,
              string,
              string,
              string,
              string | null,
              string | null,
              number,
              number,
              string,
              string,
              string | null,
              string,
              string,
            ]
          >(
            `INSERT INTO certificates (domain, certificate_type, subject_alt_names, issuer, not_before, not_after,
               certificate_path, private_key_path, chain_path, fullchain_path, auto_renew, acme_staging,
               last_renewal_attempt, last_renewal_success, challenge_method, renewal_attempt_count,
               revision, is_active, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, 1, 1, ?, ?)`,
          )
          .run(
            input.domain,
            input.certificateType,
            JSON.stringify(input.subjectAltNames),
            input.issuer,
            input.notBefore.toISOString(),
            input.notAfter.toISOString(),
            input.certificatePath,
            input.privateKeyPath,
            input.chainPath ?? null,
            input.fullchainPath ?? null,
            input.autoRenew === false ? 0 : 1,
            input.acmeStaging ? 1 : 0,
            now,
            now,
            input.challengeMethod ?? null,
            now,
            now,
          );
        certificateId = Number(result.lastInsertRowid);
        operation = 'created';
      } else {
        certificateId = existing.id;
        this.db
          .prepare<
            [
              string,
              string,
              string,
              string,
              string,
              string,
              string | null,
              string | null,
              number,
              number,
              string,
              string,
              string | null,
              string,
              number,
            ]
          >(
            `UPDATE certificates
                SET subject_alt_names = ?, issuer = ?, not_before = ?, not_after = ?,
                    certificate_path = ?, private_key_path = ?, chain_path = ?, fullchain_path = ?,
                    auto_renew = ?, acme_staging = ?, last_renewal_attempt = ?, last_renewal_success = ?,
                    challenge_method = ?, renewal_attempt_count = renewal_attempt_count + 1,
                    last_error = NULL, is_active = 1, revision = revision + 1, updated_at = ?
              WHERE id = ?`,
          )
          .run(
            JSON.stringify(input.subjectAltNames),
            input.issuer,
            input.notBefore.toISOString(),
            input.notAfter.toISOString(),
            input.certificatePath,
            input.privateKeyPath,
            input.chainPath ?? null,
            input.fullchainPath ?? null,
            input.autoRenew === false ? 0 : 1,
            input.acmeStaging ? 1 : 0,
            now,
            now,
            input.challengeMethod ?? null,
            now,
            certificateId,
          );
        operation = 'renewed';
      }

      this.db.prepare<[number]>('DELETE FROM certificate_files WHERE certificate_id = ?').run(certificateId);
      const insertFile = this.db.prepare<[number, string, string, number, string, string, string]>(
        `INSERT INTO certificate_files (certificate_id, file_type, file_path, file_size, checksum, permissions,
           status, last_verified)
         VALUES (?, ?, ?, ?, ?, ?, 'verified', ?)`,
      );
      for (const file of input.files) {
        insertFile.run(certificateId, file.fileType, file.filePath, file.fileSize, file.checksum, file.permissions, now);
      }

      const event = this.insertEvent(certificateId, input.domain, input.certificateType, operation, now, {
        notBefore: input.notBefore.toISOString(),
        notAfter: input.notAfter.toISOString(),
        certificatePath: input.certificatePath,
        privateKeyPath: input.privateKeyPath,
      });

      return { certificateId, event };
    });

    const { certificateId, event } = commit();
    this.notifier.publish(event);

    const certificate = this.requireCertificate(certificateId);
    this.logger.log(`Stored ${certificate.certificateType} certificate for ${certificate.domain}`, {
      certificateId,
      operation: event.operation,
      revision: certificate.revision,
      notAfter: certificate.notAfter.toISOString(),
    });
    return certificate;
  }

  /**
   * Records a failed renewal attempt on the existing row, if any. Paths,
   * validity and activity are untouched, so no change event is emitted.
   *
   * @returns Whether a row was updated
   */
  recordRenewalFailure(domain: string, certificateType: CertificateType, message: string): boolean {
    const now = this.clock.now().toISOString();
    const result = this.db
      .prepare<[string, string, string, string, string]>(
        `UPDATE certificates
            SET renewal_attempt_count = renewal_attempt_count + 1, last_renewal_attempt = ?, last_error = ?,
                updated_at = ?
          WHERE domain = ? AND certificate_type = ?`,
      )
      .run(now, message, now, domain, certificateType);
    return result.changes > 0;
  }

  /**
   * Marks a certificate inactive so it is never selected again.
   * Deactivating an inactive certificate is a no-op.
   *
   * @throws {CertificateNotFoundError} If the id is unknown
   */
  deactivate(id: number, reason: string): Certificate {
    const now = this.clock.now().toISOString();

    const commit = this.db.transaction((): ChangeEvent | undefined => {
      const current = this.findById(id);
      if (!current) {
        throw new CertificateNotFoundError(id);
      }
      if (!current.isActive) {
        return undefined;
      }

      this.db
        .prepare<[string, number]>(
          'UPDATE certificates SET is_active = 0, revision = revision + 1, updated_at = ? WHERE id = ?',
        )
        .run(now, id);

      return this.insertEvent(id, current.domain, current.certificateType, 'deleted', now, { reason });
    });

    const event = commit();
    if (event) {
      this.notifier.publish(event);
      this.logger.log(`Deactivated certificate ${id}: ${reason}`);
    }
    return this.requireCertificate(id);
  }

  /**
   * Records that a certificate has passed its not_after. Only `updated_at`
   * changes; the event wakes watchers so they move off the expired material.
   */
  markExpired(id: number): ChangeEvent {
    const now = this.clock.now().toISOString();

    const commit = this.db.transaction((): ChangeEvent => {
      const current = this.findById(id);
      if (!current) {
        throw new CertificateNotFoundError(id);
      }
      this.db.prepare<[string, number]>('UPDATE certificates SET updated_at = ? WHERE id = ?').run(now, id);
      return this.insertEvent(id, current.domain, current.certificateType, 'expired', now, {
        notAfter: current.notAfter.toISOString(),
      });
    });

    const event = commit();
    this.notifier.publish(event);
    return event;
  }

  /** Audit trail for a domain, newest first. */
  listEvents(domain: string, limit = 50): ChangeEvent[] {
    return this.db
      .prepare<[string, number], ChangeEventRow>(
        `SELECT id, certificate_id, domain, certificate_type, operation, payload, created_at
           FROM certificate_events WHERE domain = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(domain, limit)
      .map(rowToChangeEvent);
  }

  /** Newest event recorded for one certificate. */
  latestEvent(certificateId: number): ChangeEvent | undefined {
    const row = this.db
      .prepare<[number], ChangeEventRow>(
        `SELECT id, certificate_id, domain, certificate_type, operation, payload, created_at
           FROM certificate_events WHERE certificate_id = ? ORDER BY id DESC LIMIT 1`,
      )
      .get(certificateId);
    return row && rowToChangeEvent(row);
  }

  // ---------------------------------------------------------------------------
  // Artifacts
  // ---------------------------------------------------------------------------

  listFiles(certificateId?: number): CertificateFile[] {
    const columns = 'id, certificate_id, file_type, file_path, file_size, checksum, permissions, status, last_verified';
    if (certificateId === undefined) {
      return this.db
        .prepare<[], CertificateFileRow>(`SELECT ${columns} FROM certificate_files ORDER BY certificate_id, file_type`)
        .all()
        .map(rowToCertificateFile);
    }
    return this.db
      .prepare<[number], CertificateFileRow>(
        `SELECT ${columns} FROM certificate_files WHERE certificate_id = ? ORDER BY file_type`,
      )
      .all(certificateId)
      .map(rowToCertificateFile);
  }

  listFilesNeedingVerification(domain: string): CertificateFile[] {
    return this.db
      .prepare<[string], CertificateFileRow>(
        `SELECT f.id, f.certificate_id, f.file_type, f.file_path, f.file_size, f.checksum, f.permissions, f.status,
                f.last_verified
           FROM certificate_files f
           JOIN certificates c ON c.id = f.certificate_id
          WHERE c.domain = ? AND f.status = 'needs_verification'
          ORDER BY f.certificate_id, f.file_type`,
      )
      .all(domain)
      .map(rowToCertificateFile);
  }

  markFileVerified(fileId: number, verifiedAt: Date = this.clock.now()): void {
    this.db
      .prepare<[string, number]>(
        "UPDATE certificate_files SET status = 'verified', last_verified = ? WHERE id = ?",
      )
      .run(verifiedAt.toISOString(), fileId);
  }

  /** Checksums are never rewritten here: drift stays visible until re-issued. */
  markFileNeedsVerification(fileId: number): void {
    this.db
      .prepare<[number]>("UPDATE certificate_files SET status = 'needs_verification' WHERE id = ?")
      .run(fileId);
  }

  // ---------------------------------------------------------------------------
  // Renewal history
  // ---------------------------------------------------------------------------

  startRenewal(input: {
    domain: string;
    certificateType: CertificateType;
    trigger: RenewalTrigger;
    oldNotAfter?: Date;
    fallbackFrom?: CertificateType;
  }): number {
    const result = this.db
      .prepare<[string, string, string, string, string | null, string | null]>(
        `INSERT INTO certificate_renewals (domain, certificate_type, trigger, started_at, old_not_after, fallback_from)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.domain,
        input.certificateType,
        input.trigger,
        this.clock.now().toISOString(),
        input.oldNotAfter?.toISOString() ?? null,
        input.fallbackFrom ?? null,
      );
    return Number(result.lastInsertRowid);
  }

  completeRenewal(
    renewalId: number,
    outcome: { success: boolean; certificateId?: number; newNotAfter?: Date; errorMessage?: string },
  ): void {
    this.db
      .prepare<[string, number, number | null, string | null, string | null, number]>(
        `UPDATE certificate_renewals
            SET completed_at = ?, success = ?, certificate_id = ?, new_not_after = ?, error_message = ?
          WHERE id = ?`,
      )
      .run(
        this.clock.now().toISOString(),
        outcome.success ? 1 : 0,
        outcome.certificateId ?? null,
        outcome.newNotAfter?.toISOString() ?? null,
        outcome.errorMessage ?? null,
        renewalId,
      );
  }

  lastRenewal(domain: string): RenewalRecord | undefined {
    const row = this.db
      .prepare<[string], RenewalRow>(
        `SELECT id, domain, certificate_type, certificate_id, trigger, started_at, completed_at, success,
                error_message, old_not_after, new_not_after, fallback_from
           FROM certificate_renewals WHERE domain = ? ORDER BY id DESC LIMIT 1`,
      )
      .get(domain);
    return row ? rowToRenewal(row) : undefined;
  }

  // ---------------------------------------------------------------------------
  // Service bindings
  // ---------------------------------------------------------------------------

  getBinding(serviceName: string, domain: string): ServiceCertificateBinding | undefined {
    const row = this.db
      .prepare<[string, string], BindingRow>(
        `SELECT id, service_name, domain, certificate_id, certificate_type, certificate_revision, tls_enabled,
                certificate_path, private_key_path, updated_at
           FROM service_certificates WHERE service_name = ? AND domain = ?`,
      )
      .get(serviceName, domain);
    return row ? rowToBinding(row) : undefined;
  }

  listBindings(domain?: string): ServiceCertificateBinding[] {
    const columns = `id, service_name, domain, certificate_id, certificate_type, certificate_revision, tls_enabled,
      certificate_path, private_key_path, updated_at`;
    if (domain === undefined) {
      return this.db
        .prepare<[], BindingRow>(`SELECT ${columns} FROM service_certificates ORDER BY domain, service_name`)
        .all()
        .map(rowToBinding);
    }
    return this.db
      .prepare<[string], BindingRow>(`SELECT ${columns} FROM service_certificates WHERE domain = ? ORDER BY service_name`)
      .all(domain)
      .map(rowToBinding);
  }

  /**
   * Upserts the binding for (service, domain). Only the reloader calls this,
   * after the service has been confirmed live on the new material.
   */
  saveBinding(input: BindingInput): ServiceCertificateBinding {
    this.db
      .prepare<[string, string, number, string, number, number, string, string, string]>(
        `INSERT INTO service_certificates (service_name, domain, certificate_id, certificate_type,
           certificate_revision, tls_enabled, certificate_path, private_key_path, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (service_name, domain) DO UPDATE SET
           certificate_id = excluded.certificate_id,
           certificate_type = excluded.certificate_type,
           certificate_revision = excluded.certificate_revision,
           tls_enabled = excluded.tls_enabled,
           certificate_path = excluded.certificate_path,
           private_key_path = excluded.private_key_path,
           updated_at = excluded.updated_at`,
      )
      .run(
        input.serviceName,
        input.domain,
        input.certificateId,
        input.certificateType,
        input.certificateRevision,
        input.tlsEnabled ? 1 : 0,
        input.certificatePath,
        input.privateKeyPath,
        this.clock.now().toISOString(),
      );

    const binding = this.getBinding(input.serviceName, input.domain);
    if (!binding) {
      throw new CertificateError(`Binding for ${input.serviceName}/${input.domain} vanished after write`);
    }
    return binding;
  }

  // ---------------------------------------------------------------------------
  // Reload log and alarms
  // ---------------------------------------------------------------------------

  recordReload(input: ReloadRecordInput): void {
    this.db
      .prepare<[string, string, number, number, string, string | null, string | null, string | null, string]>(
        `INSERT INTO service_reloads (service_name, domain, certificate_id, revision, outcome, stage, severity,
           message, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.serviceName,
        input.domain,
        input.certificateId,
        input.revision,
        input.outcome,
        input.stage ?? null,
        input.severity ?? null,
        input.message ?? null,
        this.clock.now().toISOString(),
      );
  }

  lastReload(serviceName: string, domain: string): ReloadRecord | undefined {
    const row = this.db
      .prepare<[string, string], ReloadRow>(
        `SELECT id, service_name, domain, certificate_id, revision, outcome, stage, severity, message, created_at
           FROM service_reloads WHERE service_name = ? AND domain = ? ORDER BY id DESC LIMIT 1`,
      )
      .get(serviceName, domain);
    return row ? rowToReload(row) : undefined;
  }

  raiseAlarm(serviceName: string, domain: string, message: string, attempts: number): ServiceAlarm {
    const raisedAt = this.clock.now();
    const result = this.db
      .prepare<[string, string, string, number, string]>(
        `INSERT INTO service_alarms (service_name, domain, message, attempts, raised_at) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(serviceName, domain, message, attempts, raisedAt.toISOString());

    return {
      id: Number(result.lastInsertRowid),
      serviceName,
      domain,
      message,
      attempts,
      raisedAt,
    };
  }

  /** @returns Number of alarms cleared */
  clearAlarms(serviceName: string, domain: string): number {
    const result = this.db
      .prepare<[string, string, string]>(
        'UPDATE service_alarms SET cleared_at = ? WHERE service_name = ? AND domain = ? AND cleared_at IS NULL',
      )
      .run(this.clock.now().toISOString(), serviceName, domain);
    return result.changes;
  }

  activeAlarms(domain?: string): ServiceAlarm[] {
    const columns = 'id, service_name, domain, message, attempts, raised_at, cleared_at';
    if (domain === undefined) {
      return this.db
        .prepare<[], AlarmRow>(`SELECT ${columns} FROM service_alarms WHERE cleared_at IS NULL ORDER BY id`)
        .all()
        .map(rowToAlarm);
    }
    return this.db
      .prepare<[string], AlarmRow>(
        `SELECT ${columns} FROM service_alarms WHERE domain = ? AND cleared_at IS NULL ORDER BY id`,
      )
      .all(domain)
      .map(rowToAlarm);
  }

  private insertEvent(
    certificateId: number,
    domain: string,
    certificateType: CertificateType,
    operation: ChangeOperation,
    createdAt: string,
    payload: Record<string, unknown>,
  ): ChangeEvent {
    const result = this.db
      .prepare<[number, string, string, string, string, string]>(
        `INSERT INTO certificate_events (certificate_id, domain, certificate_type, operation, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(certificateId, domain, certificateType, operation, JSON.stringify(payload), createdAt);

    return {
      id: Number(result.lastInsertRowid),
      certificateId,
      domain,
      certificateType,
      operation,
      timestamp: new Date(createdAt),
      payload,
    };
  }

  private requireCertificate(id: number): Certificate {
    const certificate = this.findById(id);
    if (!certificate) {
      throw new CertificateNotFoundError(id);
    }
    return certificate;
  }
}
