export type LicenseErrorCode =
  | 'NETWORK_ERROR'
  | 'NOT_FOUND'
  | 'NOT_ACTIVE'
  | 'NOT_ACTIVATED'
  | 'REVOKED'
  | 'ALREADY_REVOKED'
  | 'EXPIRED'
  | 'OFFLINE_EXPIRED'
  | 'CLOCK_TAMPER'
  | 'HARDWARE_MISMATCH'
  | 'TRANSFER_LIMIT_EXCEEDED'
  | 'EMAIL_VERIFICATION_FAILED'
  | 'RATE_LIMITED';

/**
 * Base class for every failure the engine hands back to the shell.
 *
 * `terminal` failures block entry to the application until the user acts
 * (renews, contacts support, transfers). Non-terminal ones are warnings.
 */
export abstract class LicenseError extends Error {
  abstract readonly code: LicenseErrorCode;
  abstract readonly terminal: boolean;
  abstract readonly httpStatus: number;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): { code: LicenseErrorCode; message: string; terminal: boolean; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      terminal: this.terminal,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

// ─── Transient ──────────────────────────────────────────────

export type NetworkFailureReason = 'timeout' | 'connection' | 'server_error' | 'bad_response';

/** The registry could not be asked. Means "unknown", never "invalid". */
export class NetworkError extends LicenseError {
  readonly code = 'NETWORK_ERROR';
  readonly terminal = false;
  readonly httpStatus = 503;

  constructor(message: string, public readonly reason: NetworkFailureReason, cause?: unknown) {
    super(message, { reason });
    if (cause !== undefined) this.cause = cause;
  }
}

// ─── Terminal ───────────────────────────────────────────────

export class NotFoundError extends LicenseError {
  readonly code = 'NOT_FOUND';
  readonly terminal = true;
  readonly httpStatus = 404;

  constructor(key: string) {
    super('License key not found in the registry. Check the key and try again.', { key });
  }
}

export class NotActiveError extends LicenseError {
  readonly code = 'NOT_ACTIVE';
  readonly terminal = true;
  readonly httpStatus = 403;

  constructor(key: string, status: string) {
    super(`License is not active (status: ${status}).`, { key, status });
  }
}

export class NotActivatedError extends LicenseError {
  readonly code = 'NOT_ACTIVATED';
  readonly terminal = true;
  readonly httpStatus = 401;

  constructor(message = 'No license is activated on this machine. Enter your license key to activate.') {
    super(message);
  }
}

export class RevokedError extends LicenseError {
  readonly code: LicenseErrorCode = 'REVOKED';
  readonly terminal = true;
  readonly httpStatus = 403;

  constructor(message = 'This license has been revoked.', details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class AlreadyRevokedError extends RevokedError {
  readonly code: LicenseErrorCode = 'ALREADY_REVOKED';

  constructor(key: string) {
    super('This license key has been revoked and cannot be activated.', { key });
  }
}

export class ExpiredError extends LicenseError {
  readonly code = 'EXPIRED';
  readonly terminal = true;
  readonly httpStatus = 403;

  constructor(expiryDate: string | null) {
    super(
      expiryDate ? `License expired on ${expiryDate}. Please renew.` : 'License has expired. Please renew.',
      { expiryDate },
    );
  }
}

export class OfflineExpiredError extends LicenseError {
  readonly code = 'OFFLINE_EXPIRED';
  readonly terminal = true;
  readonly httpStatus = 403;

  constructor(graceUntil: Date | null) {
    super('Offline grace period has ended. Connect to the internet to verify your license.', {
      graceUntil: graceUntil?.toISOString() ?? null,
    });
  }
}

export class ClockTamperError extends LicenseError {
  readonly code = 'CLOCK_TAMPER';
  readonly terminal = true;
  readonly httpStatus = 403;

  constructor(lastVerifiedAt: Date, now: Date) {
    super('System time appears to have been changed. Correct the clock and connect to the internet.', {
      lastVerifiedAt: lastVerifiedAt.toISOString(),
      now: now.toISOString(),
    });
  }
}

// ─── Recoverable ────────────────────────────────────────────

export class HardwareMismatchError extends LicenseError {
  readonly code = 'HARDWARE_MISMATCH';
  readonly terminal = true;
  readonly httpStatus = 409;

  constructor(public readonly matched: number, description: string) {
    super(
      `This license is bound to a different machine (${description}). Request a transfer with your registered email.`,
      { matched, description },
    );
  }
}

// ─── User-facing, non-fatal ─────────────────────────────────

export class TransferLimitExceededError extends LicenseError {
  readonly code = 'TRANSFER_LIMIT_EXCEEDED';
  readonly terminal = false;
  readonly httpStatus = 403;

  constructor(transferCount: number, maxTransfers: number) {
    super(`Transfer limit reached (${transferCount}/${maxTransfers}). Contact support.`, {
      transferCount,
      maxTransfers,
    });
  }
}

export class EmailVerificationFailedError extends LicenseError {
  readonly code = 'EMAIL_VERIFICATION_FAILED';
  readonly terminal = false;
  readonly httpStatus = 403;

  constructor() {
    super('Email does not match the registered licensee email.');
  }
}

export class RateLimitedError extends LicenseError {
  readonly code = 'RATE_LIMITED';
  readonly terminal = false;
  readonly httpStatus = 429;

  constructor(limit: number, public readonly resetAt: Date) {
    super(`Daily verification limit reached (${limit}/${limit}). Try again after ${resetAt.toISOString()}.`, {
      limit,
      resetAt: resetAt.toISOString(),
    });
  }
}

export function isLicenseError(value: unknown): value is LicenseError {
  return value instanceof LicenseError;
}
