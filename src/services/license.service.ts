import type { LicensingSettings } from '../config';
import {
  AlreadyRevokedError,
  ClockTamperError,
  ExpiredError,
  HardwareMismatchError,
  LicenseError,
  NetworkError,
  NotActivatedError,
  NotActiveError,
  NotFoundError,
  OfflineExpiredError,
  RateLimitedError,
  RevokedError,
} from '../licensing/errors';
import { err, ok, Result } from '../licensing/result';
import {
  Clock,
  HardwareFingerprint,
  LicenseRecord,
  LicenseState,
  LicenseStatusSummary,
  LicenseTier,
  RemoteRecord,
  StoredLicenseRecord,
  systemClock,
  TransferSuccess,
  ValidationMode,
  ValidationSuccess,
  VerificationStatus,
} from '../licensing/types';
import { createChildLogger } from '../utils/logger';
import { addGraceDays, daysUntil, isPastExpiry, nextLocalMidnight } from '../utils/time';
import { HardwareFingerprinter, isBound } from './hardware.service';
import { LocalLicenseStore } from './license-store.service';
import { RemoteRegistryClient } from './registry.client';
import { TransferManager, TransferOptions } from './transfer.service';

const log = createChildLogger('license');

export type ValidationResult = Result<ValidationSuccess, LicenseError>;

type Operation = ValidationMode | 'activate' | 'instant';

interface Outcome {
  key: string | null;
  state: LicenseState;
  message: string;
  warnings: string[];
}

export interface LicenseValidatorDeps {
  store: LocalLicenseStore;
  registry: RemoteRegistryClient;
  fingerprinter: HardwareFingerprinter;
  transfers: TransferManager;
  settings: LicensingSettings;
  clock?: Clock;
}

function withoutIntegrity(record: StoredLicenseRecord): LicenseRecord {
  const { integrityOk: _integrityOk, ...rest } = record;
  return rest;
}

// ─── License Validator ──────────────────────────────────────

/**
 * Reconciles the local license cache with the remote registry.
 *
 * One instance per process, shared by the background scheduler and the
 * local API. Every operation that touches the stored record runs under the
 * store's lock and reports back through a typed result.
 */
export class LicenseValidator {
  private readonly store: LocalLicenseStore;
  private readonly registry: RemoteRegistryClient;
  private readonly fingerprinter: HardwareFingerprinter;
  private readonly transfers: TransferManager;
  private readonly settings: LicensingSettings;
  private readonly clock: Clock;

  private lastOutcome: Outcome | null = null;

  constructor(deps: LicenseValidatorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.fingerprinter = deps.fingerprinter;
    this.transfers = deps.transfers;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
  }

  // ─── Activation ─────────────────────────────────────────

  /**
   * Activate a key on this machine. Requires the registry; binds the current
   * hardware unless the registry already holds a binding for another machine.
   */
  activate(key: string, name: string, email: string): Promise<ValidationResult> {
    return this.store.exclusive(async () => {
      const licenseKey = key.trim();
      const now = this.clock.now();

      const fetched = await this.registry.fetch(licenseKey);
      if (!fetched.ok) return this.fail(fetched.error, licenseKey, 'activate');

      const remote = fetched.value;
      if (!remote) return this.fail(new NotFoundError(licenseKey), licenseKey, 'activate');
      if (remote.status === 'revoked') return this.fail(new AlreadyRevokedError(licenseKey), licenseKey, 'activate');
      if (remote.status === 'expired' || isPastExpiry(remote.expiryDate, now)) {
        return this.fail(new ExpiredError(remote.expiryDate), licenseKey, 'activate');
      }
      if (remote.status !== 'active') {
        return this.fail(new NotActiveError(licenseKey, remote.status), licenseKey, 'activate');
      }

      const current = await this.fingerprinter.probe();
      if (remote.hardwareBindings && !this.fingerprinter.matches(current, remote.hardwareBindings)) {
        return this.fail(this.mismatch(remote.hardwareBindings, current), licenseKey, 'activate');
      }

      const existing = await this.store.load();
      const previous = existing?.key === licenseKey ? existing : null;

      const record: LicenseRecord = {
        key: licenseKey,
        status: 'active',
        tier: remote.tier,
        hardwareBindings: current,
        licenseeName: name.trim() || remote.licenseeName,
        licenseeEmail: email.trim() || remote.licenseeEmail,
        expiryDate: remote.expiryDate,
        transferCount: Math.max(previous?.transferCount ?? 0, remote.transferCount),
        lastVerifiedAt: now,
        offlineGraceUntil: addGraceDays(now, this.settings.offlineGraceDays),
        activatedAt: previous?.activatedAt ?? now,
        lastTransferAt: previous?.lastTransferAt ?? null,
        manualVerificationCount: previous?.manualVerificationCount ?? 0,
        manualVerificationResetAt: previous?.manualVerificationResetAt ?? null,
      };

      await this.store.save(record);
      this.syncBinding(record, 'ACTIVATE');
      this.store.appendAudit({
        eventType: 'ACTIVATE',
        licenseKey,
        details: { tier: record.tier, reactivation: previous !== null },
      });
      log.info({ licenseKey, tier: record.tier }, 'License activated');

      return this.succeed('active', record, 'License activated successfully', now, false);
    });
  }

  // ─── Validation ─────────────────────────────────────────

  /** Full online check at launch. Falls back to auto-recovery with no local record. */
  validateStartup(): Promise<ValidationResult> {
    return this.store.exclusive(async () => {
      const record = await this.store.load();
      if (!record) return this.recover();
      return this.check(record, 'startup');
    });
  }

  /** Periodic check. Same rules as startup; callers treat failures as warnings. */
  validateBackground(): Promise<ValidationResult> {
    return this.store.exclusive(async () => {
      const record = await this.store.load();
      if (!record) return this.fail(new NotActivatedError(), null, 'background');
      return this.check(record, 'background');
    });
  }

  /** User-triggered check, limited per local calendar day. */
  validateManual(): Promise<ValidationResult> {
    return this.store.exclusive(async () => {
      const record = await this.store.load();
      if (!record) return this.fail(new NotActivatedError(), null, 'manual');

      const now = this.clock.now();
      const window = this.verificationWindow(record, now);
      const limit = this.settings.manualVerificationLimit;

      if (window.count >= limit) {
        log.info({ licenseKey: record.key, resetAt: window.resetAt }, 'Manual verification rate limited');
        return err(new RateLimitedError(limit, window.resetAt));
      }

      const counted: LicenseRecord = {
        ...withoutIntegrity(record),
        manualVerificationCount: window.count + 1,
        manualVerificationResetAt: window.resetAt,
      };
      // An untrusted record stays untrusted; only an online success re-signs it
      await this.store.save(counted, { trusted: record.integrityOk });

      return this.check({ ...counted, integrityOk: record.integrityOk }, 'manual');
    });
  }

  async verificationStatus(): Promise<VerificationStatus> {
    const record = await this.store.load();
    const now = this.clock.now();
    const limit = this.settings.manualVerificationLimit;

    if (!record) {
      return { count: 0, limit, canVerify: false, resetAt: null, msUntilReset: 0 };
    }

    const window = this.verificationWindow(record, now);
    return {
      count: window.count,
      limit,
      canVerify: window.count < limit,
      resetAt: window.resetAt,
      msUntilReset: Math.max(0, window.resetAt.getTime() - now.getTime()),
    };
  }

  /**
   * Quick revocation probe before a critical operation. Fails open when the
   * registry cannot be reached; a revocation it does see is recorded.
   */
  checkInstantRevocation(): Promise<boolean> {
    return this.store.exclusive(async () => {
      const record = await this.store.load();
      if (!record) return false;

      const fetched = await this.registry.fetch(record.key);
      if (!fetched.ok) return record.status !== 'revoked';

      if (fetched.value?.status === 'revoked') {
        await this.markRevoked(record, 'instant');
        return false;
      }
      return record.status !== 'revoked';
    });
  }

  // ─── Transfer ───────────────────────────────────────────

  async requestTransfer(
    key: string,
    email: string,
    options: TransferOptions = {},
  ): Promise<Result<TransferSuccess, LicenseError>> {
    const result = await this.transfers.requestTransfer(key, email, options);
    if (result.ok) {
      this.lastOutcome = { key: result.value.record.key, state: 'active', message: result.value.message, warnings: [] };
    }
    return result;
  }

  // ─── Status ─────────────────────────────────────────────

  async getStatus(): Promise<LicenseStatusSummary> {
    const record = await this.store.load();
    const verification = await this.verificationStatus();
    const now = this.clock.now();

    if (!record) {
      // Startup may have been blocked before anything was stored locally
      const blocked = this.lastOutcome;
      return {
        state: blocked?.state ?? 'not_activated',
        statusText: blocked ? this.blockedText(blocked) : 'No license activated',
        licenseKey: blocked?.key ?? null,
        tier: null,
        licenseeName: null,
        licenseeEmail: null,
        expiryDate: null,
        daysToExpiry: null,
        transferCount: 0,
        maxTransfers: this.settings.maxTransfers,
        lastVerifiedAt: null,
        offlineGraceUntil: null,
        warnings: [],
        verification,
      };
    }

    const outcome = this.lastOutcome?.key === record.key ? this.lastOutcome : null;
    const state = outcome?.state ?? this.stateFromRecord(record, now);
    const daysToExpiry = record.expiryDate ? daysUntil(record.expiryDate, now) : null;

    return {
      state,
      statusText: this.statusText(state, record, daysToExpiry, outcome),
      licenseKey: record.key,
      tier: record.tier,
      licenseeName: record.licenseeName,
      licenseeEmail: record.licenseeEmail,
      expiryDate: record.expiryDate,
      daysToExpiry,
      transferCount: record.transferCount,
      maxTransfers: this.settings.maxTransfers,
      lastVerifiedAt: record.lastVerifiedAt,
      offlineGraceUntil: record.offlineGraceUntil,
      warnings: outcome?.warnings ?? [],
      verification,
    };
  }

  async currentTier(): Promise<LicenseTier | null> {
    const record = await this.store.load();
    return record?.tier ?? null;
  }

  // ─── Core check ─────────────────────────────────────────

  private async check(record: StoredLicenseRecord, mode: ValidationMode): Promise<ValidationResult> {
    const now = this.clock.now();
    const current = await this.fingerprinter.probe();

    const fetched = await this.registry.fetch(record.key);
    if (!fetched.ok) return this.checkOffline(record, current, now, mode, fetched.error);

    const remote = fetched.value;
    if (!remote) return this.fail(new NotFoundError(record.key), record.key, mode);
    if (remote.status === 'revoked') return this.markRevoked(record, mode);
    if (remote.status === 'expired' || isPastExpiry(remote.expiryDate, now)) {
      return this.markExpired(record, remote, mode);
    }
    if (remote.status !== 'active') return this.fail(new NotActiveError(record.key, remote.status), record.key, mode);

    // The registry's binding wins; the local one covers a registry that never heard of it
    const reference = remote.hardwareBindings ?? (isBound(record.hardwareBindings) ? record.hardwareBindings : null);
    if (reference && !this.fingerprinter.matches(current, reference)) {
      return this.fail(this.mismatch(reference, current), record.key, mode);
    }

    const updated: LicenseRecord = {
      ...withoutIntegrity(record),
      status: 'active',
      tier: remote.tier,
      hardwareBindings: isBound(record.hardwareBindings) ? record.hardwareBindings : reference ?? current,
      licenseeName: remote.licenseeName || record.licenseeName,
      licenseeEmail: remote.licenseeEmail || record.licenseeEmail,
      expiryDate: remote.expiryDate,
      transferCount: Math.max(record.transferCount, remote.transferCount),
      lastVerifiedAt: now,
      offlineGraceUntil: addGraceDays(now, this.settings.offlineGraceDays),
    };

    await this.store.save(updated);

    if (!remote.hardwareBindings) {
      this.syncBinding(updated, reference ? 'VALIDATE_OK' : 'ACTIVATE');
    }
    if (!reference) {
      this.store.appendAudit({ eventType: 'ACTIVATE', licenseKey: record.key, details: { reason: 'binding_completed' } });
    }
    this.store.appendAudit({ eventType: 'VALIDATE_OK', licenseKey: record.key, details: { mode } });
    log.info({ licenseKey: record.key, mode }, 'License validated online');

    return this.succeed('active', updated, 'License verified', now, false);
  }

  private checkOffline(
    record: StoredLicenseRecord,
    current: HardwareFingerprint,
    now: Date,
    mode: ValidationMode,
    cause: NetworkError,
  ): ValidationResult {
    log.warn({ licenseKey: record.key, mode, reason: cause.reason }, 'Registry unreachable, checking offline grace');

    if (record.status === 'revoked') return this.fail(new RevokedError(), record.key, mode, { offline: true });
    if (record.status === 'expired' || isPastExpiry(record.expiryDate, now)) {
      return this.fail(new ExpiredError(record.expiryDate), record.key, mode, { offline: true });
    }
    if (isBound(record.hardwareBindings) && !this.fingerprinter.matches(current, record.hardwareBindings)) {
      return this.fail(this.mismatch(record.hardwareBindings, current), record.key, mode, { offline: true });
    }

    const lastVerifiedAt = record.lastVerifiedAt;
    if (lastVerifiedAt && now.getTime() < lastVerifiedAt.getTime() - this.settings.clockSkewToleranceMs) {
      this.store.appendAudit({
        eventType: 'TAMPER_DETECTED',
        licenseKey: record.key,
        details: { kind: 'clock_rollback', lastVerifiedAt: lastVerifiedAt.toISOString(), now: now.toISOString() },
      });
      return this.fail(new ClockTamperError(lastVerifiedAt, now), record.key, mode);
    }

    if (!record.integrityOk) {
      this.store.appendAudit({ eventType: 'TAMPER_DETECTED', licenseKey: record.key, details: { kind: 'record_modified' } });
      return this.fail(new OfflineExpiredError(null), record.key, mode, { integrity: 'failed' });
    }

    const graceUntil = record.offlineGraceUntil;
    if (graceUntil && now.getTime() < graceUntil.getTime()) {
      this.store.appendAudit({ eventType: 'VALIDATE_OK', licenseKey: record.key, details: { mode, offline: true } });
      return this.succeed(
        'offline_grace',
        withoutIntegrity(record),
        `Offline grace active until ${graceUntil.toISOString()}`,
        now,
        false,
        ['License could not be verified online. Connect to the internet before the grace period ends.'],
      );
    }

    return this.fail(new OfflineExpiredError(graceUntil), record.key, mode, { offline: true });
  }

  // ─── Auto-recovery ──────────────────────────────────────

  /**
   * With no local record, look for a registry row bound to this hardware and
   * restore it without asking for the key again.
   */
  private async recover(): Promise<ValidationResult> {
    const now = this.clock.now();
    const current = await this.fingerprinter.probe();

    const listed = await this.registry.list();
    if (!listed.ok) {
      return this.fail(
        new NotActivatedError('No license is activated on this machine and the license registry could not be reached.'),
        null,
        'startup',
        { reason: listed.error.reason },
      );
    }

    const bound = listed.value.filter(
      (row) => row.hardwareBindings !== null && this.fingerprinter.matches(current, row.hardwareBindings),
    );
    const match = bound.find((row) => row.status === 'active' && !isPastExpiry(row.expiryDate, now));

    if (!match) {
      const revoked = bound.find((row) => row.status === 'revoked');
      if (revoked) {
        this.store.appendAudit({
          eventType: 'REVOKED_DETECTED',
          licenseKey: revoked.key,
          details: { mode: 'startup', reason: 'auto_recovery' },
        });
        return this.fail(
          new RevokedError('The license bound to this computer has been revoked.'),
          revoked.key,
          'startup',
          undefined,
          false,
        );
      }
      return this.fail(new NotActivatedError(), null, 'startup');
    }

    const record: LicenseRecord = {
      key: match.key,
      status: 'active',
      tier: match.tier,
      hardwareBindings: match.hardwareBindings ?? current,
      licenseeName: match.licenseeName,
      licenseeEmail: match.licenseeEmail,
      expiryDate: match.expiryDate,
      transferCount: match.transferCount,
      lastVerifiedAt: now,
      offlineGraceUntil: addGraceDays(now, this.settings.offlineGraceDays),
      activatedAt: now,
      lastTransferAt: null,
      manualVerificationCount: 0,
      manualVerificationResetAt: null,
    };

    await this.store.save(record);
    this.store.appendAudit({
      eventType: 'AUTO_RECOVERED',
      licenseKey: match.key,
      details: { matched: this.fingerprinter.matchCount(current, record.hardwareBindings) },
    });
    log.info({ licenseKey: match.key }, 'License restored from registry by hardware match');

    return this.succeed('active', record, 'License restored automatically for this computer', now, true);
  }

  // ─── Transitions ────────────────────────────────────────

  private async markRevoked(record: StoredLicenseRecord, mode: Operation): Promise<ValidationResult> {
    if (record.status !== 'revoked') {
      await this.store.save({ ...withoutIntegrity(record), status: 'revoked' });
    }
    this.store.appendAudit({ eventType: 'REVOKED_DETECTED', licenseKey: record.key, details: { mode } });
    log.warn({ licenseKey: record.key, mode }, 'License revoked by registry');
    return this.fail(new RevokedError(), record.key, mode, undefined, false);
  }

  private async markExpired(
    record: StoredLicenseRecord,
    remote: RemoteRecord,
    mode: ValidationMode,
  ): Promise<ValidationResult> {
    await this.store.save({ ...withoutIntegrity(record), status: 'expired', expiryDate: remote.expiryDate });
    return this.fail(new ExpiredError(remote.expiryDate), record.key, mode);
  }

  // ─── Helpers ────────────────────────────────────────────

  private mismatch(reference: HardwareFingerprint, current: HardwareFingerprint): HardwareMismatchError {
    return new HardwareMismatchError(
      this.fingerprinter.matchCount(reference, current),
      this.fingerprinter.describeMismatch(reference, current),
    );
  }

  private syncBinding(record: LicenseRecord, eventType: 'ACTIVATE' | 'VALIDATE_OK'): void {
    this.registry.post({
      key: record.key,
      status: record.status,
      tier: record.tier,
      hardwareBindings: record.hardwareBindings,
      licenseeName: record.licenseeName,
      licenseeEmail: record.licenseeEmail,
      isTransfer: false,
      eventType,
    });
  }

  private verificationWindow(record: LicenseRecord, now: Date): { count: number; resetAt: Date } {
    const resetAt = record.manualVerificationResetAt;
    if (!resetAt || now.getTime() >= resetAt.getTime()) {
      return { count: 0, resetAt: nextLocalMidnight(now) };
    }
    return { count: record.manualVerificationCount, resetAt };
  }

  private expiryWarnings(expiryDate: string | null, now: Date): string[] {
    if (!expiryDate) return [];
    const days = daysUntil(expiryDate, now);
    if (days < 0 || days > this.settings.expiryWarningDays) return [];
    if (days === 0) return [`License expires today (${expiryDate}). Renew to avoid interruption.`];
    return [`License expires in ${days} day(s) on ${expiryDate}. Renew to avoid interruption.`];
  }

  private succeed(
    state: ValidationSuccess['state'],
    record: LicenseRecord,
    message: string,
    now: Date,
    recovered: boolean,
    extraWarnings: string[] = [],
  ): ValidationResult {
    const warnings = [...extraWarnings, ...this.expiryWarnings(record.expiryDate, now)];
    this.lastOutcome = { key: record.key, state, message, warnings };
    return ok({
      state,
      record,
      message,
      warnings,
      daysToExpiry: record.expiryDate ? daysUntil(record.expiryDate, now) : null,
      recovered,
    });
  }

  /**
   * Record a failure and hand it back. Pass `audit=false` when the caller
   * already wrote a more specific event.
   */
  private fail(
    error: LicenseError,
    licenseKey: string | null,
    operation: Operation,
    details: Record<string, unknown> = {},
    audit = true,
  ): ValidationResult {
    if (audit) {
      this.store.appendAudit({
        eventType: 'VALIDATE_FAIL',
        licenseKey,
        details: { mode: operation, code: error.code, message: error.message, ...details },
      });
    }
    log.warn({ licenseKey, mode: operation, code: error.code }, error.message);

    const state = stateForError(error);
    if (state && operation !== 'activate') {
      this.lastOutcome = { key: licenseKey, state, message: error.message, warnings: [] };
    }
    return err(error);
  }

  private stateFromRecord(record: LicenseRecord, now: Date): LicenseState {
    if (record.status === 'revoked') return 'revoked';
    if (record.status === 'expired' || isPastExpiry(record.expiryDate, now)) return 'expired';
    if (record.offlineGraceUntil && now.getTime() >= record.offlineGraceUntil.getTime()) return 'expired';
    return 'active';
  }

  private blockedText(outcome: Outcome): string {
    if (outcome.state === 'not_activated') return outcome.message;
    return `${outcome.message} Contact ${this.settings.supportEmail} for help.`;
  }

  private statusText(
    state: LicenseState,
    record: LicenseRecord,
    daysToExpiry: number | null,
    outcome: Outcome | null,
  ): string {
    const support = `Contact ${this.settings.supportEmail} for help.`;
    switch (state) {
      case 'not_activated':
        return 'No license activated';
      case 'active': {
        const expiry =
          record.expiryDate && daysToExpiry !== null
            ? `expires ${record.expiryDate} (${daysToExpiry} day(s) left)`
            : 'no expiry';
        return `License active (${record.tier}), ${expiry}`;
      }
      case 'offline_grace':
        return `Offline mode, grace period until ${record.offlineGraceUntil?.toISOString() ?? 'unknown'}`;
      case 'revoked':
        return `License revoked. ${support}`;
      case 'expired':
        return outcome ? `${outcome.message} ${support}` : `License expired. ${support}`;
      case 'invalid':
        return `${outcome?.message ?? 'License could not be validated.'} ${support}`;
    }
  }
}

function stateForError(error: LicenseError): LicenseState | null {
  if (error instanceof RevokedError) return 'revoked';
  if (error instanceof ExpiredError || error instanceof OfflineExpiredError) return 'expired';
  if (error instanceof NotActivatedError) return 'not_activated';
  // Transient and user-facing errors leave the last known state alone
  if (error instanceof NetworkError || !error.terminal) return null;
  return 'invalid';
}
