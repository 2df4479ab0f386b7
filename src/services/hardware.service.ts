import crypto from 'crypto';
import os from 'os';
import si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import { HARDWARE_COMPONENTS, HardwareComponent, HardwareFingerprint } from '../licensing/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('hardware');

export const DEFAULT_MATCH_THRESHOLD = 2;

const COMPONENT_LABELS: Record<HardwareComponent, string> = {
  network: 'Network adapter changed',
  cpu: 'CPU changed',
  board: 'Motherboard changed',
};

// Values firmware vendors ship when a field was never filled in
const PLACEHOLDER_VALUES = new Set([
  'default string',
  'to be filled by o.e.m.',
  'system serial number',
  'not specified',
  'not applicable',
  'none',
  'n/a',
  'ff:ff:ff:ff:ff:ff',
  '03000200-0400-0500-0006-000700080009',
]);

export function isUsableIdentifier(value: string | null | undefined): value is string {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  if (/^[0:\-\s]*$/.test(normalized)) return false;
  return !PLACEHOLDER_VALUES.has(normalized);
}

// ─── Hardware Source ────────────────────────────────────────

/** Raw identifiers as reported by the OS. Null when unavailable. */
export interface HardwareSource {
  networkId(): Promise<string | null>;
  cpuId(): Promise<string | null>;
  boardId(): Promise<string | null>;
  primaryIPv4(): Promise<string | null>;
  hostname(): string;
}

async function listInterfaces(): Promise<Systeminformation.NetworkInterfacesData[]> {
  const result = await si.networkInterfaces();
  return Array.isArray(result) ? result : [result];
}

export const systemHardwareSource: HardwareSource = {
  async networkId() {
    const macs = (await listInterfaces())
      .filter((iface) => !iface.internal && !iface.virtual && isUsableIdentifier(iface.mac))
      .map((iface) => iface.mac.toLowerCase())
      .sort(); // deterministic across adapter enumeration order
    return macs[0] ?? null;
  },

  async cpuId() {
    const cpu = await si.cpu();
    if (!isUsableIdentifier(cpu.brand)) return null;
    return [cpu.manufacturer, cpu.brand, cpu.family, cpu.model, cpu.stepping].join('|');
  },

  async boardId() {
    const system = await si.system();
    if (isUsableIdentifier(system.uuid)) return system.uuid.toLowerCase();

    const board = await si.baseboard();
    if (isUsableIdentifier(board.serial)) return board.serial;

    const ids = await si.uuid();
    return isUsableIdentifier(ids.hardware) ? ids.hardware.toLowerCase() : null;
  },

  async primaryIPv4() {
    const iface = (await listInterfaces()).find((i) => !i.internal && i.ip4);
    return iface?.ip4 ?? null;
  },

  hostname() {
    return os.hostname();
  },
};

// ─── Comparison ─────────────────────────────────────────────

export function hashIdentifier(raw: string): string {
  return crypto.createHash('sha256').update(raw.trim()).digest('hex');
}

/** Components that are non-empty on both sides and equal. */
export function countMatches(a: HardwareFingerprint, b: HardwareFingerprint): number {
  return HARDWARE_COMPONENTS.filter((c) => a[c] !== '' && b[c] !== '' && a[c] === b[c]).length;
}

export function fingerprintsMatch(
  a: HardwareFingerprint,
  b: HardwareFingerprint,
  threshold = DEFAULT_MATCH_THRESHOLD,
): boolean {
  return countMatches(a, b) >= threshold;
}

export function isBound(fingerprint: HardwareFingerprint): boolean {
  return HARDWARE_COMPONENTS.some((c) => fingerprint[c] !== '');
}

export function describeMismatch(stored: HardwareFingerprint, current: HardwareFingerprint): string {
  const changed = HARDWARE_COMPONENTS.filter((c) => stored[c] === '' || stored[c] !== current[c]);
  if (changed.length === 0) return 'No hardware changes detected';
  return changed.map((c) => COMPONENT_LABELS[c]).join(', ');
}

// ─── Fingerprinter ──────────────────────────────────────────

export class HardwareFingerprinter {
  constructor(
    private readonly source: HardwareSource = systemHardwareSource,
    readonly threshold = DEFAULT_MATCH_THRESHOLD,
  ) {}

  /**
   * Probe all three components. Never fails: a component the OS will not
   * report is replaced by a hostname-derived pseudo-identifier.
   */
  async probe(): Promise<HardwareFingerprint> {
    const [network, cpu, board] = await Promise.all([
      this.component('network', () => this.source.networkId()),
      this.component('cpu', () => this.source.cpuId()),
      this.component('board', () => this.source.boardId()),
    ]);
    return { network, cpu, board };
  }

  matches(local: HardwareFingerprint, remote: HardwareFingerprint, threshold = this.threshold): boolean {
    return fingerprintsMatch(local, remote, threshold);
  }

  matchCount(a: HardwareFingerprint, b: HardwareFingerprint): number {
    return countMatches(a, b);
  }

  describeMismatch(stored: HardwareFingerprint, current: HardwareFingerprint): string {
    return describeMismatch(stored, current);
  }

  /** Best-effort primary IPv4 address of this machine, for audit trails. */
  async localAddress(): Promise<string | null> {
    try {
      return await this.source.primaryIPv4();
    } catch (err) {
      log.debug({ err }, 'Could not determine local address');
      return null;
    }
  }

  private async component(name: HardwareComponent, read: () => Promise<string | null>): Promise<string> {
    try {
      const value = await read();
      if (isUsableIdentifier(value)) return hashIdentifier(value);
      log.debug({ component: name }, 'Hardware identifier unavailable, using fallback');
    } catch (err) {
      log.debug({ err, component: name }, 'Hardware probe failed, using fallback');
    }
    return hashIdentifier(this.fallback(name));
  }

  private fallback(name: HardwareComponent): string {
    let host = '';
    try {
      host = this.source.hostname().trim();
    } catch (err) {
      log.debug({ err }, 'Hostname unavailable');
    }
    return `${name}:${host || 'fallback-node'}`;
  }
}
