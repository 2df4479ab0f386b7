// ─── Enumerations ───────────────────────────────────────────

export const LICENSE_STATUSES = ['pending', 'active', 'revoked', 'expired'] as const;
export type LicenseStatus = (typeof LICENSE_STATUSES)[number];

export const LICENSE_TIERS = ['trial', 'standard', 'premium'] as const;
export type LicenseTier = (typeof LICENSE_TIERS)[number];

export const AUDIT_EVENT_TYPES = [
  'ACTIVATE',
  'VALIDATE_OK',
  'VALIDATE_FAIL',
  'TRANSFER_REQUESTED',
  'TRANSFER_APPROVED',
  'TRANSFER_DENIED',
  'REVOKED_DETECTED',
  'AUTO_RECOVERED',
  'TAMPER_DETECTED',
] as const;
export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

// ─── Hardware ───────────────────────────────────────────────

export const HARDWARE_COMPONENTS = ['network', 'cpu', 'board'] as const;
export type HardwareComponent = (typeof HARDWARE_COMPONENTS)[number];

/** SHA-256 hex digests of the three probed identifiers. Empty string = unknown. */
export type HardwareFingerprint = Record<HardwareComponent, string>;

export const EMPTY_FINGERPRINT: HardwareFingerprint = { network: '', cpu: '', board: '' };

// ─── Records ────────────────────────────────────────────────

export interface LicenseRecord {
  key: string;
  status: LicenseStatus;
  tier: LicenseTier;
  hardwareBindings: HardwareFingerprint;
  licenseeName: string;
  licenseeEmail: string;
  /** Calendar date, YYYY-MM-DD. Null means perpetual. */
  expiryDate: string | null;
  transferCount: number;
  lastVerifiedAt: Date | null;
  offlineGraceUntil: Date | null;
  activatedAt: Date;
  lastTransferAt: Date | null;
  manualVerificationCount: number;
  manualVerificationResetAt: Date | null;
}

/** A record as read back from disk, with the result of its integrity check. */
export interface StoredLicenseRecord extends LicenseRecord {
  integrityOk: boolean;
}

export interface RemoteRecord {
  key: string;
  status: LicenseStatus;
  tier: LicenseTier;
  expiryDate: string | null;
  /** Null until the license has been activated somewhere. */
  hardwareBindings: HardwareFingerprint | null;
  licenseeName: string;
  licenseeEmail: string;
  transferCount: number;
  notes: string;
}

export interface RegistryUpdate {
  key: string;
  status: LicenseStatus;
  tier: LicenseTier;
  hardwareBindings: HardwareFingerprint;
  licenseeName: string;
  licenseeEmail: string;
  isTransfer: boolean;
  sourceIP?: string;
  eventType?: AuditEventType;
}

// ─── Audit ──────────────────────────────────────────────────

export interface AuditEvent {
  id: number;
  eventType: AuditEventType;
  timestamp: Date;
  licenseKey: string | null;
  sourceIP: string | null;
  details: Record<string, unknown>;
}

export interface NewAuditEvent {
  eventType: AuditEventType;
  licenseKey?: string | null;
  sourceIP?: string | null;
  details?: Record<string, unknown>;
}

export interface AuditQuery {
  eventTypes?: AuditEventType[];
  licenseKey?: string;
  since?: Date;
  until?: Date;
  limit?: number;
}

// ─── Validation results ─────────────────────────────────────

export type ValidationMode = 'startup' | 'background' | 'manual';

export type LicenseState =
  | 'not_activated'
  | 'active'
  | 'offline_grace'
  | 'revoked'
  | 'expired'
  | 'invalid';

export interface ValidationSuccess {
  state: 'active' | 'offline_grace';
  record: LicenseRecord;
  message: string;
  warnings: string[];
  daysToExpiry: number | null;
  recovered: boolean;
}

export interface TransferSuccess {
  record: LicenseRecord;
  transferred: boolean;
  transfersRemaining: number;
  message: string;
}

export interface VerificationStatus {
  count: number;
  limit: number;
  canVerify: boolean;
  resetAt: Date | null;
  msUntilReset: number;
}

export interface LicenseStatusSummary {
  state: LicenseState;
  statusText: string;
  licenseKey: string | null;
  tier: LicenseTier | null;
  licenseeName: string | null;
  licenseeEmail: string | null;
  expiryDate: string | null;
  daysToExpiry: number | null;
  transferCount: number;
  maxTransfers: number;
  lastVerifiedAt: Date | null;
  offlineGraceUntil: Date | null;
  warnings: string[];
  verification: VerificationStatus;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
