import { and, asc, desc, eq, gte, inArray, lte, SQL } from 'drizzle-orm';
import type { LicenseDb } from '../db';
import { licenseAuditLog, LicenseAuditRow } from '../db/schema';
import { AuditEvent, AuditQuery, Clock, NewAuditEvent, systemClock } from '../licensing/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('audit');

/**
 * Append-only log of licensing events. No update or delete method exists;
 * the table's triggers reject both.
 */
export class AuditLog {
  constructor(
    private readonly db: LicenseDb,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Record an event. Write failures are logged, not thrown.
   */
  append(event: NewAuditEvent): AuditEvent | null {
    try {
      const row = this.db
        .insert(licenseAuditLog)
        .values({
          eventType: event.eventType,
          licenseKey: event.licenseKey ?? null,
          sourceIp: event.sourceIP ?? null,
          details: JSON.stringify(event.details ?? {}),
          timestamp: this.clock.now(),
        })
        .returning()
        .get();
      log.debug({ eventType: event.eventType, licenseKey: event.licenseKey }, 'Audit event recorded');
      return toAuditEvent(row);
    } catch (err) {
      log.error({ err, eventType: event.eventType }, 'Failed to write audit log');
      return null;
    }
  }

  /**
   * Events in append order, oldest first. With a `limit`, only the newest
   * `limit` matching events are returned.
   */
  query(filters: AuditQuery = {}): AuditEvent[] {
    const conditions: SQL[] = [];
    if (filters.eventTypes && filters.eventTypes.length > 0) {
      conditions.push(inArray(licenseAuditLog.eventType, filters.eventTypes));
    }
    if (filters.licenseKey) conditions.push(eq(licenseAuditLog.licenseKey, filters.licenseKey));
    if (filters.since) conditions.push(gte(licenseAuditLog.timestamp, filters.since));
    if (filters.until) conditions.push(lte(licenseAuditLog.timestamp, filters.until));

    const where = conditions.length > 0 ? and(...conditions) : undefined;

    if (filters.limit === undefined) {
      return this.db
        .select()
        .from(licenseAuditLog)
        .where(where)
        .orderBy(asc(licenseAuditLog.id))
        .all()
        .map(toAuditEvent);
    }

    return this.db
      .select()
      .from(licenseAuditLog)
      .where(where)
      .orderBy(desc(licenseAuditLog.id))
      .limit(filters.limit)
      .all()
      .reverse()
      .map(toAuditEvent);
  }
}

function toAuditEvent(row: LicenseAuditRow): AuditEvent {
  return {
    id: row.id,
    eventType: row.eventType,
    timestamp: row.timestamp,
    licenseKey: row.licenseKey,
    sourceIP: row.sourceIp,
    details: parseDetails(row.details),
  };
}

function parseDetails(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch (err) {
    log.warn({ err }, 'Unreadable audit details');
  }
  return {};
}
