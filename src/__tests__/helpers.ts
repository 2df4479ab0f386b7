import { vi } from 'vitest';
import { z } from 'zod';
import type { LicensingSettings, MailSettings, RegistrySettings } from '../config';
import { DatabaseHandle, openDatabase } from '../db';
import { createLicenseEngine, LicenseEngine } from '../engine';
import { Clock, HardwareComponent, HardwareFingerprint } from '../licensing/types';
import { HardwareSource, hashIdentifier, isUsableIdentifier } from '../services/hardware.service';
import { DAY_MS } from '../utils/time';

// ─── Fixed settings ─────────────────────────────────────────

export const REGISTRY_URL = 'http://registry.test/api';
export const WEBHOOK_URL = 'http://registry.test/api/webhook';
export const MAIL_URL = 'http://mail.test/emails';

export const TEST_LICENSING: LicensingSettings = {
  offlineGraceDays: 7,
  maxTransfers: 3,
  hardwareMatchThreshold: 2,
  manualVerificationLimit: 3,
  checkIntervalsMs: {
    trial: 60 * 60 * 1000,
    standard: 24 * 60 * 60 * 1000,
    premium: 168 * 60 * 60 * 1000,
  },
  clockSkewToleranceMs: 5 * 60 * 1000,
  expiryWarningDays: 7,
  supportEmail: 'support@example.test',
};

export const TEST_REGISTRY: RegistrySettings = {
  url: REGISTRY_URL,
  webhookUrl: WEBHOOK_URL,
  apiKey: '',
  timeoutMs: 1000,
};

export const TEST_MAIL: MailSettings = {
  apiUrl: MAIL_URL,
  apiKey: 'test-secret',
  from: 'Licensing <licensing@example.test>',
};

/** Tuesday 10 March 2026, 09:00 local time. */
export const START = new Date(2026, 2, 10, 9, 0, 0);

// ─── Clock ──────────────────────────────────────────────────

export function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export class FakeClock implements Clock {
  constructor(public current: Date = START) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

// ─── Hardware ───────────────────────────────────────────────

export class FakeHardwareSource implements HardwareSource {
  network: string | null = 'aa:bb:cc:dd:ee:01';
  cpu: string | null = 'GenuineIntel|Intel(R) Core(TM) i7-9700|6|158|13';
  board: string | null = '4c4c4544-0042-3510-8052-b4c04f4e3332';
  ip: string | null = '192.168.1.20';
  host = 'survey-laptop';

  async networkId(): Promise<string | null> {
    return this.network;
  }

  async cpuId(): Promise<string | null> {
    return this.cpu;
  }

  async boardId(): Promise<string | null> {
    return this.board;
  }

  async primaryIPv4(): Promise<string | null> {
    return this.ip;
  }

  hostname(): string {
    return this.host;
  }

  /** Swap in a completely different machine. */
  becomeMachine(n: number): void {
    const suffix = String(n).padStart(2, '0');
    this.network = `aa:bb:cc:dd:ee:${suffix}`;
    this.cpu = `AuthenticAMD|AMD Ryzen 7 5800X|25|33|${n}`;
    this.board = `machine-board-${suffix}`;
  }

  /** The fingerprint the engine will compute for the current values. */
  fingerprint(): HardwareFingerprint {
    const hash = (name: HardwareComponent, value: string | null) =>
      isUsableIdentifier(value) ? hashIdentifier(value) : hashIdentifier(`${name}:${this.host || 'fallback-node'}`);
    return {
      network: hash('network', this.network),
      cpu: hash('cpu', this.cpu),
      board: hash('board', this.board),
    };
  }
}

// ─── Registry + mail stand-in ───────────────────────────────

export interface RegistryRow {
  license_key: string;
  status?: string;
  license_tier?: string;
  expiry_date?: string;
  hw_component_1?: string;
  hw_component_2?: string;
  hw_component_3?: string;
  licensee_name?: string;
  licensee_email?: string;
  transfer_count?: number;
  notes?: string;
}

export function registryRow(key: string, overrides: Partial<RegistryRow> = {}): RegistryRow {
  return {
    license_key: key,
    status: 'active',
    license_tier: 'standard',
    expiry_date: '2027-03-31',
    hw_component_1: '',
    hw_component_2: '',
    hw_component_3: '',
    licensee_name: 'Test Licensee',
    licensee_email: 'owner@example.test',
    transfer_count: 0,
    notes: '',
    ...overrides,
  };
}

export function boundRow(key: string, fp: HardwareFingerprint, overrides: Partial<RegistryRow> = {}): RegistryRow {
  return registryRow(key, {
    hw_component_1: fp.network,
    hw_component_2: fp.cpu,
    hw_component_3: fp.board,
    ...overrides,
  });
}

const webhookBodySchema = z
  .object({
    license_key: z.string(),
    status: z.string(),
    hw1: z.string(),
    hw2: z.string(),
    hw3: z.string(),
    licensee_name: z.string(),
    licensee_email: z.string(),
    license_tier: z.string(),
    is_transfer: z.boolean(),
    source_ip: z.string().optional(),
    event_type: z.string().optional(),
  })
  .passthrough();

export type WebhookBody = z.infer<typeof webhookBodySchema>;

const mailBodySchema = z.object({
  from: z.string(),
  to: z.array(z.string()),
  subject: z.string(),
  text: z.string(),
  html: z.string(),
});

export type MailBody = z.infer<typeof mailBodySchema>;

type FetchInput = Parameters<typeof fetch>[0];

function urlOf(input: FetchInput): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function bodyOf(init?: RequestInit): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

/**
 * In-process registry and mail API behind a fetch stub. Webhook posts are
 * applied as upserts the way the real registry does.
 */
export class RegistryStub {
  readonly rows = new Map<string, RegistryRow>();
  readonly posts: WebhookBody[] = [];
  readonly mails: MailBody[] = [];
  online = true;

  readonly fetch = vi.fn((input: FetchInput, init?: RequestInit): Promise<Response> => this.handle(input, init));

  put(row: RegistryRow): void {
    this.rows.set(row.license_key, { ...row });
  }

  row(key: string): RegistryRow | undefined {
    return this.rows.get(key);
  }

  update(key: string, changes: Partial<RegistryRow>): void {
    const row = this.rows.get(key);
    if (!row) throw new Error(`No registry row for ${key}`);
    this.rows.set(key, { ...row, ...changes });
  }

  private async handle(input: FetchInput, init?: RequestInit): Promise<Response> {
    if (!this.online) throw new TypeError('fetch failed');

    const url = urlOf(input);

    if (url === MAIL_URL) {
      this.mails.push(mailBodySchema.parse(bodyOf(init)));
      return json({ id: `em-${this.mails.length}` });
    }

    if (url === WEBHOOK_URL) {
      const body = webhookBodySchema.parse(bodyOf(init));
      this.posts.push(body);
      const existing = this.rows.get(body.license_key);
      if (existing) {
        this.rows.set(body.license_key, {
          ...existing,
          status: body.status,
          hw_component_1: body.hw1,
          hw_component_2: body.hw2,
          hw_component_3: body.hw3,
          transfer_count: (existing.transfer_count ?? 0) + (body.is_transfer ? 1 : 0),
        });
      }
      return new Response('OK', { status: 200 });
    }

    if (url === `${REGISTRY_URL}/licenses`) {
      return json([...this.rows.values()]);
    }

    const prefix = `${REGISTRY_URL}/licenses/`;
    if (url.startsWith(prefix)) {
      const row = this.rows.get(decodeURIComponent(url.slice(prefix.length)));
      return row ? json(row) : json({ error: 'Not found' }, 404);
    }

    return json({ error: 'Not found' }, 404);
  }
}

// ─── Engine ─────────────────────────────────────────────────

export interface TestHarness {
  engine: LicenseEngine;
  database: DatabaseHandle;
  clock: FakeClock;
  hardware: FakeHardwareSource;
  registry: RegistryStub;
}

export function createHarness(licensing: Partial<LicensingSettings> = {}): TestHarness {
  const database = openDatabase(':memory:');
  const clock = new FakeClock();
  const hardware = new FakeHardwareSource();
  const registry = new RegistryStub();
  vi.stubGlobal('fetch', registry.fetch);

  const engine = createLicenseEngine({
    db: database.db,
    licensing: { ...TEST_LICENSING, ...licensing },
    registry: TEST_REGISTRY,
    mail: TEST_MAIL,
    integritySecret: 'test-secret',
    hardwareSource: hardware,
    clock,
    registryRetryDelayMs: 0,
  });

  return { engine, database, clock, hardware, registry };
}

/** Register a key and activate it on the harness machine. */
export async function activateLicense(
  harness: TestHarness,
  key = 'WB-0001',
  overrides: Partial<RegistryRow> = {},
): Promise<void> {
  harness.registry.put(registryRow(key, overrides));
  const result = await harness.engine.validator.activate(key, 'Test Licensee', 'owner@example.test');
  if (!result.ok) throw result.error;
  await harness.engine.registry.flush();
}
