import type { LicensingSettings } from '../config';
import {
  EmailVerificationFailedError,
  ExpiredError,
  LicenseError,
  NotActiveError,
  NotFoundError,
  RevokedError,
  TransferLimitExceededError,
} from '../licensing/errors';
import { err, ok, Result } from '../licensing/result';
import { Clock, LicenseRecord, systemClock, TransferSuccess } from '../licensing/types';
import { createChildLogger } from '../utils/logger';
import { addGraceDays, isPastExpiry } from '../utils/time';
import { HardwareFingerprinter } from './hardware.service';
import { LocalLicenseStore } from './license-store.service';
import { Notifier } from './notification.service';
import { RemoteRegistryClient } from './registry.client';

const log = createChildLogger('transfer');

export type TransferSettings = Pick<LicensingSettings, 'maxTransfers' | 'offlineGraceDays'>;

export interface TransferOptions {
  /** Address the request came from. Defaults to this machine's primary IPv4. */
  sourceIP?: string | null;
}

function sameEmail(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Moves a license binding to the current machine.
 *
 * Checks run in a fixed order and the first failure aborts: transfer limit,
 * then email verification against the registry. Only then is the owner
 * notified and the binding rewritten.
 */
export class TransferManager {
  constructor(
    private readonly registry: RemoteRegistryClient,
    private readonly store: LocalLicenseStore,
    private readonly fingerprinter: HardwareFingerprinter,
    private readonly notifier: Notifier,
    private readonly settings: TransferSettings,
    private readonly clock: Clock = systemClock,
  ) {}

  requestTransfer(
    key: string,
    email: string,
    options: TransferOptions = {},
  ): Promise<Result<TransferSuccess, LicenseError>> {
    return this.store.exclusive(() => this.transfer(key.trim(), email.trim(), options));
  }

  private async transfer(
    licenseKey: string,
    email: string,
    options: TransferOptions,
  ): Promise<Result<TransferSuccess, LicenseError>> {
    const sourceIP = options.sourceIP ?? (await this.fingerprinter.localAddress());
    const now = this.clock.now();

    this.store.appendAudit({
      eventType: 'TRANSFER_REQUESTED',
      licenseKey,
      sourceIP,
      details: { email },
    });

    const deny = (reason: string, error: LicenseError, details: Record<string, unknown> = {}) => {
      this.store.appendAudit({
        eventType: 'TRANSFER_DENIED',
        licenseKey,
        sourceIP,
        details: { reason, ...details },
      });
      log.warn({ licenseKey, reason, sourceIP }, 'Transfer denied');
      return err(error);
    };

    // ─── Registry record ────────────────────────────────────
    const fetched = await this.registry.fetch(licenseKey);
    if (!fetched.ok) return deny('registry_unreachable', fetched.error);

    const remote = fetched.value;
    if (!remote) return deny('not_found', new NotFoundError(licenseKey));
    if (remote.status === 'revoked') {
      return deny('revoked', new RevokedError('This license has been revoked and cannot be transferred.'));
    }
    if (remote.status === 'expired' || isPastExpiry(remote.expiryDate, now)) {
      return deny('expired', new ExpiredError(remote.expiryDate));
    }
    if (remote.status !== 'active') return deny('not_active', new NotActiveError(licenseKey, remote.status));

    const stored = await this.store.load();
    const local = stored?.key === licenseKey ? stored : null;
    const transferCount = Math.max(local?.transferCount ?? 0, remote.transferCount);
    const registeredEmail = remote.licenseeEmail || local?.licenseeEmail || '';

    // ─── 1. Limit ───────────────────────────────────────────
    if (transferCount >= this.settings.maxTransfers) {
      return deny('transfer_limit', new TransferLimitExceededError(transferCount, this.settings.maxTransfers), {
        transferCount,
        maxTransfers: this.settings.maxTransfers,
      });
    }

    // ─── 2. Email verification ──────────────────────────────
    if (!registeredEmail || !sameEmail(email, registeredEmail)) {
      if (registeredEmail) {
        this.notifier
          .transferBlocked({ to: registeredEmail, licenseKey, attemptedEmail: email, timestamp: now, sourceIP })
          .catch((error) => log.error({ err: error }, 'Security alert failed'));
      }
      return deny('email_mismatch', new EmailVerificationFailedError(), {
        registeredEmailPresent: !!registeredEmail,
      });
    }

    const current = await this.fingerprinter.probe();
    const base = {
      key: licenseKey,
      status: 'active' as const,
      tier: remote.tier,
      licenseeName: remote.licenseeName || local?.licenseeName || '',
      licenseeEmail: registeredEmail,
      expiryDate: remote.expiryDate,
      lastVerifiedAt: now,
      offlineGraceUntil: addGraceDays(now, this.settings.offlineGraceDays),
      activatedAt: local?.activatedAt ?? now,
      manualVerificationCount: local?.manualVerificationCount ?? 0,
      manualVerificationResetAt: local?.manualVerificationResetAt ?? null,
    };

    // Already bound here: resync without spending a transfer
    if (remote.hardwareBindings && this.fingerprinter.matches(current, remote.hardwareBindings)) {
      const record: LicenseRecord = {
        ...base,
        hardwareBindings: remote.hardwareBindings,
        transferCount,
        lastTransferAt: local?.lastTransferAt ?? null,
      };
      await this.store.save(record);
      this.store.appendAudit({
        eventType: 'VALIDATE_OK',
        licenseKey,
        sourceIP,
        details: { reason: 'transfer_not_required' },
      });
      return ok({
        record,
        transferred: false,
        transfersRemaining: this.settings.maxTransfers - transferCount,
        message: 'This computer is already bound to the license. No transfer was needed.',
      });
    }

    // ─── 3. Owner notification ──────────────────────────────
    const newCount = transferCount + 1;
    this.notifier
      .transferCompleted({
        to: registeredEmail,
        licenseKey,
        licenseeName: base.licenseeName,
        fingerprint: current,
        timestamp: now,
        sourceIP,
        transferCount: newCount,
        maxTransfers: this.settings.maxTransfers,
      })
      .catch((error) => log.error({ err: error }, 'Transfer notification failed'));

    // ─── 4. Bind + persist ──────────────────────────────────
    const record: LicenseRecord = {
      ...base,
      hardwareBindings: current,
      transferCount: newCount,
      lastTransferAt: now,
    };
    await this.store.save(record);

    // ─── 5. Audit + remote sync ─────────────────────────────
    this.store.appendAudit({
      eventType: 'TRANSFER_APPROVED',
      licenseKey,
      sourceIP,
      details: {
        transferCount: newCount,
        maxTransfers: this.settings.maxTransfers,
        previousBinding: remote.hardwareBindings ? this.fingerprinter.describeMismatch(remote.hardwareBindings, current) : null,
      },
    });
    this.registry.post({
      key: licenseKey,
      status: 'active',
      tier: record.tier,
      hardwareBindings: current,
      licenseeName: record.licenseeName,
      licenseeEmail: record.licenseeEmail,
      isTransfer: true,
      sourceIP: sourceIP ?? undefined,
      eventType: 'TRANSFER_APPROVED',
    });

    const remaining = this.settings.maxTransfers - newCount;
    log.info({ licenseKey, transferCount: newCount, sourceIP }, 'License transferred to this machine');

    return ok({
      record,
      transferred: true,
      transfersRemaining: remaining,
      message: `License transferred to this computer. ${remaining} transfer(s) remaining.`,
    });
  }
}
