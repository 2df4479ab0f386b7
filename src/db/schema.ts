import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { AUDIT_EVENT_TYPES, LICENSE_STATUSES, LICENSE_TIERS } from '../licensing/types';

// ─── License Info ───────────────────────────────────────────
export const licenseInfo = sqliteTable('license_info', {
  id: text('id').primaryKey(), // UUID
  licenseKey: text('license_key').notNull().unique(),
  status: text('status', { enum: LICENSE_STATUSES }).notNull().default('pending'),
  tier: text('tier', { enum: LICENSE_TIERS }).notNull().default('standard'),
  hwNetwork: text('hw_network').notNull().default(''),
  hwCpu: text('hw_cpu').notNull().default(''),
  hwBoard: text('hw_board').notNull().default(''),
  licenseeName: text('licensee_name').notNull().default(''),
  licenseeEmail: text('licensee_email').notNull().default(''),
  expiryDate: text('expiry_date'), // YYYY-MM-DD
  transferCount: integer('transfer_count').notNull().default(0),
  lastVerifiedAt: integer('last_verified_at', { mode: 'timestamp_ms' }),
  offlineGraceUntil: integer('offline_grace_until', { mode: 'timestamp_ms' }),
  activatedAt: integer('activated_at', { mode: 'timestamp_ms' }).notNull(),
  lastTransferAt: integer('last_transfer_at', { mode: 'timestamp_ms' }),
  manualVerificationCount: integer('manual_verification_count').notNull().default(0),
  manualVerificationResetAt: integer('manual_verification_reset_at', { mode: 'timestamp_ms' }),
  isCurrent: integer('is_current', { mode: 'boolean' }).notNull().default(false),
  integritySignature: text('integrity_signature').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

// ─── License Audit Log ──────────────────────────────────────
export const licenseAuditLog = sqliteTable(
  'license_audit_log',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventType: text('event_type', { enum: AUDIT_EVENT_TYPES }).notNull(),
    licenseKey: text('license_key'),
    sourceIp: text('source_ip'),
    details: text('details').notNull().default('{}'), // JSON
    timestamp: integer('timestamp', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    timestampIdx: index('idx_license_audit_timestamp').on(table.timestamp),
  }),
);

// ─── Type exports ───────────────────────────────────────────
export type LicenseInfoRow = typeof licenseInfo.$inferSelect;
export type NewLicenseInfoRow = typeof licenseInfo.$inferInsert;
export type LicenseAuditRow = typeof licenseAuditLog.$inferSelect;
