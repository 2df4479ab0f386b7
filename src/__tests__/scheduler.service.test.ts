import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RevokedError } from '../licensing/errors';
import { activateLicense, createHarness, TEST_LICENSING, TestHarness } from './helpers';

const HOUR = 60 * 60 * 1000;

describe('BackgroundScheduler', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(async () => {
    h.engine.scheduler.stop();
    h.engine.scheduler.removeAllListeners();
    vi.useRealTimers();
    await h.engine.registry.flush();
    h.database.close();
    vi.unstubAllGlobals();
  });

  it('uses the standard interval before any license exists', async () => {
    await h.engine.scheduler.start();

    expect(h.engine.scheduler.running).toBe(true);
    expect(h.engine.scheduler.intervalMs).toBe(24 * HOUR);
  });

  it('picks the interval from the license tier', async () => {
    await activateLicense(h, 'WB-0001', { license_tier: 'trial' });

    await h.engine.scheduler.start();

    expect(h.engine.scheduler.intervalMs).toBe(HOUR);
  });

  it('caps intervals at the longest delay a timer accepts', async () => {
    h.database.close();
    vi.unstubAllGlobals();
    h = createHarness({ checkIntervalsMs: { ...TEST_LICENSING.checkIntervalsMs, standard: 1000 * HOUR } });

    await h.engine.scheduler.start();

    expect(h.engine.scheduler.intervalMs).toBe(2_147_483_647);
  });

  it('validates on each interval', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    await activateLicense(h, 'WB-0001', { license_tier: 'trial' });
    const spy = vi.spyOn(h.engine.validator, 'validateBackground');
    const validated = vi.fn();
    h.engine.scheduler.on('validated', validated);

    await h.engine.scheduler.start();
    await vi.advanceTimersByTimeAsync(HOUR);
    await vi.waitFor(() => expect(validated).toHaveBeenCalledTimes(1));
    await vi.advanceTimersByTimeAsync(HOUR);
    await vi.waitFor(() => expect(validated).toHaveBeenCalledTimes(2));

    expect(spy).toHaveBeenCalledTimes(2);
    expect(validated).toHaveBeenCalledTimes(2);
  });

  it('stops checking after stop()', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    await activateLicense(h, 'WB-0001', { license_tier: 'trial' });
    const spy = vi.spyOn(h.engine.validator, 'validateBackground');

    await h.engine.scheduler.start();
    h.engine.scheduler.stop();
    await vi.advanceTimersByTimeAsync(3 * HOUR);

    expect(spy).not.toHaveBeenCalled();
    expect(h.engine.scheduler.running).toBe(false);
    expect(h.engine.scheduler.intervalMs).toBeNull();
  });

  it('re-arms when the tier changes', async () => {
    await activateLicense(h);
    await h.engine.scheduler.start();
    h.registry.update('WB-0001', { license_tier: 'premium' });

    await h.engine.scheduler.tick();

    expect(h.engine.scheduler.intervalMs).toBe(168 * HOUR);
  });

  it('reports a revocation as a warning and keeps running', async () => {
    await activateLicense(h);
    await h.engine.scheduler.start();
    const revoked = vi.fn();
    const warning = vi.fn();
    h.engine.scheduler.on('revoked', revoked);
    h.engine.scheduler.on('warning', warning);
    h.registry.update('WB-0001', { status: 'revoked' });

    await h.engine.scheduler.tick();

    expect(revoked).toHaveBeenCalledTimes(1);
    expect(revoked.mock.calls[0][0]).toBeInstanceOf(RevokedError);
    expect(warning).toHaveBeenCalledWith({ message: 'This license has been revoked.', error: expect.any(RevokedError) });
    expect(h.engine.scheduler.running).toBe(true);
  });

  it('passes offline warnings through', async () => {
    await activateLicense(h);
    await h.engine.scheduler.start();
    const warning = vi.fn();
    h.engine.scheduler.on('warning', warning);
    h.registry.online = false;

    await h.engine.scheduler.tick();

    expect(warning).toHaveBeenCalledWith({
      message: 'License could not be verified online. Connect to the internet before the grace period ends.',
    });
  });

  it('skips a tick while another is in flight', async () => {
    await activateLicense(h);
    await h.engine.scheduler.start();
    const spy = vi.spyOn(h.engine.validator, 'validateBackground');

    await Promise.all([h.engine.scheduler.tick(), h.engine.scheduler.tick()]);

    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('does nothing before start()', async () => {
    const spy = vi.spyOn(h.engine.validator, 'validateBackground');

    await h.engine.scheduler.tick();

    expect(spy).not.toHaveBeenCalled();
  });
});
