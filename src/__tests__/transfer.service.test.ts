import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  EmailVerificationFailedError,
  NetworkError,
  NotFoundError,
  RevokedError,
  TransferLimitExceededError,
} from '../licensing/errors';
import { HardwareFingerprint } from '../licensing/types';
import {
  activateLicense,
  boundRow,
  createHarness,
  daysAfter,
  FakeHardwareSource,
  START,
  TestHarness,
} from './helpers';

describe('TransferManager', () => {
  let h: TestHarness;
  let machineA: HardwareFingerprint;

  beforeEach(async () => {
    h = createHarness();
    await activateLicense(h, 'WB-2026-0003');
    machineA = h.hardware.fingerprint();
    h.hardware.becomeMachine(2);
  });

  afterEach(async () => {
    await h.engine.registry.flush();
    h.database.close();
    vi.unstubAllGlobals();
  });

  function transferEvents() {
    return h.engine.audit.query({ eventTypes: ['TRANSFER_REQUESTED', 'TRANSFER_APPROVED', 'TRANSFER_DENIED'] });
  }

  it('moves the binding to this machine', async () => {
    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.transferred).toBe(true);
    expect(result.value.transfersRemaining).toBe(2);
    expect(result.value.message).toBe('License transferred to this computer. 2 transfer(s) remaining.');
    expect(result.value.record).toMatchObject({
      hardwareBindings: h.hardware.fingerprint(),
      transferCount: 1,
      lastTransferAt: START,
      offlineGraceUntil: daysAfter(START, 7),
    });

    const stored = await h.engine.store.load();
    expect(stored?.hardwareBindings).toEqual(h.hardware.fingerprint());
    expect(stored?.transferCount).toBe(1);
    expect(stored?.integrityOk).toBe(true);
  });

  it('matches the registered email case-insensitively', async () => {
    const result = await h.engine.validator.requestTransfer('WB-2026-0003', '  OWNER@Example.TEST ');
    expect(result.ok && result.value.transferred).toBe(true);
  });

  it('audits the request and the approval with the source address', async () => {
    await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    const events = transferEvents();
    expect(events.map((e) => e.eventType)).toEqual(['TRANSFER_REQUESTED', 'TRANSFER_APPROVED']);
    expect(events.every((e) => e.sourceIP === '192.168.1.20')).toBe(true);
    expect(events[1].details).toEqual({
      transferCount: 1,
      maxTransfers: 3,
      previousBinding: 'Network adapter changed, CPU changed, Motherboard changed',
    });
  });

  it('uses the caller-supplied source address', async () => {
    await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test', { sourceIP: '203.0.113.7' });
    await h.engine.registry.flush();

    expect(transferEvents()[0].sourceIP).toBe('203.0.113.7');
    expect(h.registry.posts.at(-1)?.source_ip).toBe('203.0.113.7');
  });

  it('tells the registry about the transfer', async () => {
    await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');
    await h.engine.registry.flush();

    const fp = h.hardware.fingerprint();
    expect(h.registry.posts.at(-1)).toMatchObject({
      license_key: 'WB-2026-0003',
      hw1: fp.network,
      hw2: fp.cpu,
      hw3: fp.board,
      is_transfer: true,
      event_type: 'TRANSFER_APPROVED',
    });
    expect(h.registry.row('WB-2026-0003')?.transfer_count).toBe(1);
  });

  it('emails the registered owner', async () => {
    await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    await vi.waitFor(() => expect(h.registry.mails).toHaveLength(1));
    expect(h.registry.mails[0].to).toEqual(['owner@example.test']);
    expect(h.registry.mails[0].subject).toBe('License ****-0003 was transferred to a new computer');
  });

  it('rejects the wrong email and alerts the owner', async () => {
    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'intruder@example.test');

    expect(!result.ok && result.error).toBeInstanceOf(EmailVerificationFailedError);
    expect((await h.engine.store.load())?.hardwareBindings).toEqual(machineA);
    expect(transferEvents().map((e) => [e.eventType, e.details.reason])).toEqual([
      ['TRANSFER_REQUESTED', undefined],
      ['TRANSFER_DENIED', 'email_mismatch'],
    ]);

    await vi.waitFor(() => expect(h.registry.mails).toHaveLength(1));
    expect(h.registry.mails[0].subject).toBe('Security alert: blocked transfer attempt for license ****-0003');
    expect(h.registry.mails[0].text).toContain('Email used: intruder@example.test');
  });

  it('stops after the transfer limit', async () => {
    for (const machine of [2, 3, 4]) {
      h.hardware.becomeMachine(machine);
      const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');
      expect(result.ok).toBe(true);
      await h.engine.registry.flush();
    }
    const lastBinding = h.hardware.fingerprint();

    h.hardware.becomeMachine(5);
    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TransferLimitExceededError);
    expect(result.error.message).toBe('Transfer limit reached (3/3). Contact support.');
    expect((await h.engine.store.load())?.hardwareBindings).toEqual(lastBinding);
    expect(transferEvents().at(-1)?.details).toEqual({ reason: 'transfer_limit', transferCount: 3, maxTransfers: 3 });
  });

  it('checks the limit before the email', async () => {
    h.registry.update('WB-2026-0003', { transfer_count: 3 });

    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'intruder@example.test');

    expect(!result.ok && result.error).toBeInstanceOf(TransferLimitExceededError);
    expect(h.registry.mails).toHaveLength(0);
  });

  it('counts transfers recorded by the registry', async () => {
    h.registry.update('WB-2026-0003', { transfer_count: 2 });

    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(result.ok && result.value.record.transferCount).toBe(3);
    expect(result.ok && result.value.transfersRemaining).toBe(0);
  });

  it('does not spend a transfer on the machine that already holds the license', async () => {
    h.hardware.becomeMachine(1);
    h.hardware.cpu = 'GenuineIntel|Intel(R) Core(TM) i7-9700|6|158|13';
    h.hardware.board = '4c4c4544-0042-3510-8052-b4c04f4e3332';

    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.transferred).toBe(false);
    expect(result.value.record.transferCount).toBe(0);
    expect(result.value.message).toBe('This computer is already bound to the license. No transfer was needed.');
  });

  it('refuses a revoked license', async () => {
    h.registry.update('WB-2026-0003', { status: 'revoked' });

    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(!result.ok && result.error).toBeInstanceOf(RevokedError);
    expect(transferEvents().at(-1)?.details).toEqual({ reason: 'revoked' });
  });

  it('refuses an unknown key', async () => {
    const result = await h.engine.validator.requestTransfer('WB-0000-0000', 'owner@example.test');
    expect(!result.ok && result.error).toBeInstanceOf(NotFoundError);
  });

  it('requires the registry', async () => {
    h.registry.online = false;

    const result = await h.engine.validator.requestTransfer('WB-2026-0003', 'owner@example.test');

    expect(!result.ok && result.error).toBeInstanceOf(NetworkError);
    expect(transferEvents().at(-1)?.details).toEqual({ reason: 'registry_unreachable' });
    expect((await h.engine.store.load())?.hardwareBindings).toEqual(machineA);
  });

  it('transfers onto a fresh install with no local record', async () => {
    const fresh = createHarness();
    const previous = new FakeHardwareSource();
    previous.becomeMachine(9);
    fresh.registry.put(boundRow('WB-2026-0007', previous.fingerprint()));

    const result = await fresh.engine.validator.requestTransfer('WB-2026-0007', 'owner@example.test');

    expect(result.ok && result.value.record.transferCount).toBe(1);
    expect((await fresh.engine.store.load())?.key).toBe('WB-2026-0007');
    expect((await fresh.engine.validator.getStatus()).state).toBe('active');

    await fresh.engine.registry.flush();
    fresh.database.close();
  });
});
