import { config, LicensingSettings, MailSettings, RegistrySettings } from './config';
import type { LicenseDb } from './db';
import { Clock, systemClock } from './licensing/types';
import { AuditLog } from './services/audit.service';
import { HardwareFingerprinter, HardwareSource, systemHardwareSource } from './services/hardware.service';
import { LicenseValidator } from './services/license.service';
import { LocalLicenseStore } from './services/license-store.service';
import { Notifier } from './services/notification.service';
import { RemoteRegistryClient } from './services/registry.client';
import { BackgroundScheduler } from './services/scheduler.service';
import { TransferManager } from './services/transfer.service';

export interface LicenseEngine {
  audit: AuditLog;
  store: LocalLicenseStore;
  registry: RemoteRegistryClient;
  notifier: Notifier;
  fingerprinter: HardwareFingerprinter;
  transfers: TransferManager;
  validator: LicenseValidator;
  scheduler: BackgroundScheduler;
}

export interface LicenseEngineOptions {
  db: LicenseDb;
  licensing?: LicensingSettings;
  registry?: RegistrySettings;
  mail?: MailSettings;
  integritySecret?: string;
  hardwareSource?: HardwareSource;
  clock?: Clock;
  /** Delay before the single retry of a failed registry post. */
  registryRetryDelayMs?: number;
}

/**
 * Build every licensing component once and wire them together. The returned
 * instances are the only ones the process should use.
 */
export function createLicenseEngine(options: LicenseEngineOptions): LicenseEngine {
  const licensing = options.licensing ?? config.licensing;
  const clock = options.clock ?? systemClock;

  const audit = new AuditLog(options.db, clock);
  const store = new LocalLicenseStore(options.db, audit, options.integritySecret ?? config.integrity.secret, clock);
  const registry = new RemoteRegistryClient(options.registry ?? config.registry, options.registryRetryDelayMs);
  const notifier = new Notifier(options.mail ?? config.mail);
  const fingerprinter = new HardwareFingerprinter(
    options.hardwareSource ?? systemHardwareSource,
    licensing.hardwareMatchThreshold,
  );
  const transfers = new TransferManager(registry, store, fingerprinter, notifier, licensing, clock);
  const validator = new LicenseValidator({ store, registry, fingerprinter, transfers, settings: licensing, clock });
  const scheduler = new BackgroundScheduler(validator, licensing.checkIntervalsMs);

  return { audit, store, registry, notifier, fingerprinter, transfers, validator, scheduler };
}
