import { EventEmitter } from 'events';
import { LicenseError, RevokedError } from '../licensing/errors';
import { LicenseTier } from '../licensing/types';
import { createChildLogger } from '../utils/logger';
import { LicenseValidator } from './license.service';

const log = createChildLogger('scheduler');

export interface SchedulerWarning {
  message: string;
  error?: LicenseError;
}

const FALLBACK_TIER: LicenseTier = 'standard';

// Longer delays overflow Node's timer and fire after 1 ms
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Re-runs background validation on a tier-dependent interval.
 *
 * Events: `validated` (ValidationSuccess), `warning` (SchedulerWarning) and
 * `revoked` (RevokedError). Nothing here ends the session: a revocation seen
 * in the background is a passive warning.
 */
export class BackgroundScheduler extends EventEmitter {
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentIntervalMs: number | null = null;
  private inFlight = false;
  private stopped = true;

  constructor(
    private readonly validator: LicenseValidator,
    private readonly intervalsMs: Readonly<Record<LicenseTier, number>>,
  ) {
    super();
  }

  get running(): boolean {
    return !this.stopped;
  }

  get intervalMs(): number | null {
    return this.currentIntervalMs;
  }

  async start(): Promise<void> {
    if (!this.stopped) return;
    this.stopped = false;

    const tier = await this.validator.currentTier();
    this.arm(tier ?? FALLBACK_TIER);
  }

  /** Cancel the timer. A check already in flight finishes but is not reported. */
  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.currentIntervalMs = null;
    log.info('Background license validation stopped');
  }

  /** Run one background check now. Overlapping calls are skipped. */
  async tick(): Promise<void> {
    if (this.stopped || this.inFlight) return;
    this.inFlight = true;

    try {
      const result = await this.validator.validateBackground();
      if (this.stopped) return;

      if (result.ok) {
        this.emit('validated', result.value);
        for (const message of result.value.warnings) this.emit('warning', { message } satisfies SchedulerWarning);
        this.arm(result.value.record.tier);
        return;
      }

      const error = result.error;
      if (error instanceof RevokedError) this.emit('revoked', error);
      this.emit('warning', { message: error.message, error } satisfies SchedulerWarning);
    } catch (err) {
      log.error({ err }, 'Background license validation failed');
    } finally {
      this.inFlight = false;
    }
  }

  private arm(tier: LicenseTier): void {
    const intervalMs = Math.min(this.intervalsMs[tier], MAX_TIMER_MS);
    if (this.stopped || intervalMs === this.currentIntervalMs) return;

    if (this.timer) clearInterval(this.timer);
    this.timer = setInterval(() => {
      this.tick().catch((err) => log.error({ err }, 'Background license validation failed'));
    }, intervalMs);
    this.timer.unref();
    this.currentIntervalMs = intervalMs;

    log.info({ tier, intervalMs }, 'Background license validation scheduled');
  }
}
