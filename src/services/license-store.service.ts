import crypto from 'crypto';
import { eq, ne } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { LicenseDb } from '../db';
import { licenseInfo, LicenseInfoRow, NewLicenseInfoRow } from '../db/schema';
import { LicenseRecord, NewAuditEvent, AuditEvent, StoredLicenseRecord, Clock, systemClock } from '../licensing/types';
import { createChildLogger } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import { AuditLog } from './audit.service';

const log = createChildLogger('license-store');

// ─── Integrity ──────────────────────────────────────────────

function canonicalPayload(record: LicenseRecord): string {
  return JSON.stringify([
    record.key,
    record.status,
    record.tier,
    record.hardwareBindings.network,
    record.hardwareBindings.cpu,
    record.hardwareBindings.board,
    record.licenseeName,
    record.licenseeEmail,
    record.expiryDate,
    record.transferCount,
    record.lastVerifiedAt?.getTime() ?? null,
    record.offlineGraceUntil?.getTime() ?? null,
    record.activatedAt.getTime(),
    record.lastTransferAt?.getTime() ?? null,
    record.manualVerificationCount,
    record.manualVerificationResetAt?.getTime() ?? null,
  ]);
}

export function signRecord(record: LicenseRecord, secret: string): string {
  return crypto
    .createHmac('sha256', `license-integrity-v1:${secret}`)
    .update(canonicalPayload(record))
    .digest('hex');
}

export function verifyRecordSignature(record: LicenseRecord, signature: string, secret: string): boolean {
  const expected = Buffer.from(signRecord(record, secret), 'hex');
  const actual = Buffer.from(signature, 'hex');
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}

// ─── Store ──────────────────────────────────────────────────

export interface SaveOptions {
  /** When false the row is written with an invalid signature, keeping it untrusted. */
  trusted?: boolean;
}

/**
 * Durable cache of the current license record.
 *
 * One row per key ever activated on this machine; exactly one is flagged
 * current. Every load-modify-save sequence must run inside `exclusive()`.
 */
export class LocalLicenseStore {
  private readonly lock = new Mutex();

  constructor(
    private readonly db: LicenseDb,
    private readonly audit: AuditLog,
    private readonly integritySecret: string,
    private readonly clock: Clock = systemClock,
  ) {}

  exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(task);
  }

  async load(): Promise<StoredLicenseRecord | null> {
    const row = this.db.select().from(licenseInfo).where(eq(licenseInfo.isCurrent, true)).limit(1).get();
    if (!row) return null;

    const record = toRecord(row);
    const integrityOk = verifyRecordSignature(record, row.integritySignature, this.integritySecret);
    if (!integrityOk) {
      log.warn({ licenseKey: record.key }, 'Local license record failed integrity check');
    }
    return { ...record, integrityOk };
  }

  /**
   * Atomic upsert; the saved record becomes the current one. Pass
   * `trusted: false` to keep a record that failed its integrity check flagged.
   */
  async save(record: LicenseRecord, options: SaveOptions = {}): Promise<void> {
    const values = {
      licenseKey: record.key,
      status: record.status,
      tier: record.tier,
      hwNetwork: record.hardwareBindings.network,
      hwCpu: record.hardwareBindings.cpu,
      hwBoard: record.hardwareBindings.board,
      licenseeName: record.licenseeName,
      licenseeEmail: record.licenseeEmail,
      expiryDate: record.expiryDate,
      transferCount: record.transferCount,
      lastVerifiedAt: record.lastVerifiedAt,
      offlineGraceUntil: record.offlineGraceUntil,
      activatedAt: record.activatedAt,
      lastTransferAt: record.lastTransferAt,
      manualVerificationCount: record.manualVerificationCount,
      manualVerificationResetAt: record.manualVerificationResetAt,
      isCurrent: true,
      integritySignature: options.trusted === false ? '' : signRecord(record, this.integritySecret),
      updatedAt: this.clock.now(),
    } satisfies Omit<NewLicenseInfoRow, 'id'>;

    this.db.transaction((tx) => {
      tx.update(licenseInfo).set({ isCurrent: false }).where(ne(licenseInfo.licenseKey, record.key)).run();
      tx.insert(licenseInfo)
        .values({ id: uuidv4(), ...values })
        .onConflictDoUpdate({ target: licenseInfo.licenseKey, set: values })
        .run();
    });

    log.debug({ licenseKey: record.key, status: record.status }, 'License record saved');
  }

  appendAudit(event: NewAuditEvent): AuditEvent | null {
    return this.audit.append(event);
  }
}

function toRecord(row: LicenseInfoRow): LicenseRecord {
  return {
    key: row.licenseKey,
    status: row.status,
    tier: row.tier,
    hardwareBindings: { network: row.hwNetwork, cpu: row.hwCpu, board: row.hwBoard },
    licenseeName: row.licenseeName,
    licenseeEmail: row.licenseeEmail,
    expiryDate: row.expiryDate,
    transferCount: row.transferCount,
    lastVerifiedAt: row.lastVerifiedAt,
    offlineGraceUntil: row.offlineGraceUntil,
    activatedAt: row.activatedAt,
    lastTransferAt: row.lastTransferAt,
    manualVerificationCount: row.manualVerificationCount,
    manualVerificationResetAt: row.manualVerificationResetAt,
  };
}
