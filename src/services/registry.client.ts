import { z } from 'zod';
import type { RegistrySettings } from '../config';
import { NetworkError } from '../licensing/errors';
import { err, ok, Result } from '../licensing/result';
import {
  HardwareFingerprint,
  LICENSE_STATUSES,
  LICENSE_TIERS,
  LicenseStatus,
  LicenseTier,
  RegistryUpdate,
  RemoteRecord,
} from '../licensing/types';
import { createChildLogger } from '../utils/logger';
import { normalizeCalendarDate } from '../utils/time';

const log = createChildLogger('registry');

const USER_AGENT = 'WaterBalance-Licensing/1.0';
const POST_RETRY_DELAY_MS = 2000;

// ─── Wire format ────────────────────────────────────────────

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? '' : String(v).trim()));

const registryRowSchema = z.object({
  license_key: z.string().min(1),
  status: optionalText,
  license_tier: optionalText,
  expiry_date: optionalText,
  hw_component_1: optionalText,
  hw_component_2: optionalText,
  hw_component_3: optionalText,
  licensee_name: optionalText,
  licensee_email: optionalText,
  transfer_count: z.coerce.number().int().min(0).catch(0),
  notes: optionalText,
});

type RegistryRow = z.infer<typeof registryRowSchema>;

function isStatus(value: string): value is LicenseStatus {
  return LICENSE_STATUSES.some((s) => s === value);
}

function isTier(value: string): value is LicenseTier {
  return LICENSE_TIERS.some((t) => t === value);
}

export function toRemoteRecord(row: RegistryRow): RemoteRecord {
  const status = row.status.toLowerCase();
  const tier = row.license_tier.toLowerCase();
  const bindings: HardwareFingerprint = {
    network: row.hw_component_1,
    cpu: row.hw_component_2,
    board: row.hw_component_3,
  };
  const bound = bindings.network !== '' || bindings.cpu !== '' || bindings.board !== '';

  return {
    key: row.license_key.trim(),
    status: isStatus(status) ? status : 'pending',
    tier: isTier(tier) ? tier : 'standard',
    expiryDate: normalizeCalendarDate(row.expiry_date),
    hardwareBindings: bound ? bindings : null,
    licenseeName: row.licensee_name,
    licenseeEmail: row.licensee_email,
    transferCount: row.transfer_count,
    notes: row.notes,
  };
}

export function toWebhookPayload(update: RegistryUpdate): Record<string, unknown> {
  return {
    license_key: update.key,
    status: update.status,
    hw1: update.hardwareBindings.network,
    hw2: update.hardwareBindings.cpu,
    hw3: update.hardwareBindings.board,
    licensee_name: update.licenseeName,
    licensee_email: update.licenseeEmail,
    license_tier: update.tier,
    is_transfer: update.isTransfer,
    ...(update.sourceIP ? { source_ip: update.sourceIP } : {}),
    ...(update.eventType ? { event_type: update.eventType } : {}),
  };
}

// ─── Client ─────────────────────────────────────────────────

/**
 * Reads the license registry and pushes best-effort updates to its webhook.
 *
 * Any failure to get an answer (timeout, refused connection, 5xx, garbage
 * body) comes back as a NetworkError. Only an explicit 404 means "absent".
 */
export class RemoteRegistryClient {
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    private readonly settings: RegistrySettings,
    private readonly retryDelayMs = POST_RETRY_DELAY_MS,
  ) {}

  async fetch(key: string): Promise<Result<RemoteRecord | null, NetworkError>> {
    const response = await this.get(`/licenses/${encodeURIComponent(key)}`);
    if (!response.ok) return response;
    if (response.value === null) return ok(null);

    const parsed = registryRowSchema.safeParse(response.value);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.flatten() }, 'Registry returned an unreadable license row');
      return err(new NetworkError('Registry returned an unreadable response', 'bad_response'));
    }
    return ok(toRemoteRecord(parsed.data));
  }

  /** Full scan, used by auto-recovery. Unreadable rows are skipped. */
  async list(): Promise<Result<RemoteRecord[], NetworkError>> {
    const response = await this.get('/licenses');
    if (!response.ok) return response;

    const body = response.value;
    const rows: unknown = Array.isArray(body)
      ? body
      : typeof body === 'object' && body !== null && 'licenses' in body
        ? body.licenses
        : null;

    if (!Array.isArray(rows)) {
      return err(new NetworkError('Registry returned an unreadable license list', 'bad_response'));
    }

    const records: RemoteRecord[] = [];
    for (const row of rows) {
      const parsed = registryRowSchema.safeParse(row);
      if (parsed.success) records.push(toRemoteRecord(parsed.data));
    }
    return ok(records);
  }

  /**
   * Fire-and-forget write. Returns immediately; one retry on failure, then
   * the update is dropped with a warning.
   */
  post(update: RegistryUpdate): void {
    const delivery = this.deliver(toWebhookPayload(update)).finally(() => {
      this.inflight.delete(delivery);
    });
    this.inflight.add(delivery);
  }

  /** Wait for in-flight posts to settle. */
  async flush(): Promise<void> {
    await Promise.allSettled([...this.inflight]);
  }

  // ─── Internals ──────────────────────────────────────────

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };
    if (this.settings.apiKey) headers['X-API-Key'] = this.settings.apiKey;
    return headers;
  }

  /** GET a JSON document; resolves to null on 404. */
  private async get(path: string): Promise<Result<unknown, NetworkError>> {
    const url = `${this.settings.url}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.headers(),
        signal: controller.signal,
      });

      if (response.status === 404) return ok(null);
      if (!response.ok) {
        log.warn({ status: response.status, path }, 'Registry returned non-OK status');
        return err(new NetworkError(`Registry returned HTTP ${response.status}`, 'server_error'));
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (parseErr) {
        return err(new NetworkError('Registry returned an unreadable response', 'bad_response', parseErr));
      }
    } catch (error) {
      const timedOut = controller.signal.aborted;
      log.warn({ err: error, path, timedOut }, 'Registry request failed');
      return err(
        timedOut
          ? new NetworkError(`Registry did not answer within ${this.settings.timeoutMs}ms`, 'timeout', error)
          : new NetworkError('Could not reach the license registry', 'connection', error),
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private async deliver(payload: Record<string, unknown>): Promise<void> {
    if (await this.send(payload)) return;

    await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
    if (await this.send(payload)) return;

    log.warn({ licenseKey: payload.license_key }, 'Registry update dropped after retry');
  }

  private async send(payload: Record<string, unknown>): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    try {
      const response = await fetch(this.settings.webhookUrl, {
        method: 'POST',
        headers: { ...this.headers(), 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        log.warn({ status: response.status }, 'Registry webhook returned non-OK status');
        return false;
      }
      return true;
    } catch (error) {
      log.warn({ err: error }, 'Registry webhook request failed');
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }
}
