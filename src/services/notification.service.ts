import type { MailSettings } from '../config';
import { HardwareFingerprint } from '../licensing/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('notifications');

const MAIL_TIMEOUT_MS = 10000;

export interface EmailTemplate {
  subject: string;
  html: string;
  text: string;
}

export interface TransferNotice {
  to: string;
  licenseKey: string;
  licenseeName: string;
  fingerprint: HardwareFingerprint;
  timestamp: Date;
  sourceIP: string | null;
  transferCount: number;
  maxTransfers: number;
}

export interface SuspiciousTransferNotice {
  to: string;
  licenseKey: string;
  attemptedEmail: string;
  timestamp: Date;
  sourceIP: string | null;
}

// ─── Templates ──────────────────────────────────────────────

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Keys are shown with everything but the last block masked. */
export function maskLicenseKey(key: string): string {
  const tail = key.slice(-4);
  return key.length > 4 ? `****-${tail}` : '****';
}

function shortFingerprint(fp: HardwareFingerprint): string {
  return [fp.network, fp.cpu, fp.board].map((h) => h.slice(0, 8) || '-').join(' / ');
}

export function transferNoticeTemplate(notice: TransferNotice): EmailTemplate {
  const key = maskLicenseKey(notice.licenseKey);
  const when = notice.timestamp.toISOString();
  const ip = notice.sourceIP ?? 'unknown';
  const device = shortFingerprint(notice.fingerprint);
  const remaining = Math.max(0, notice.maxTransfers - notice.transferCount);

  return {
    subject: `License ${key} was transferred to a new computer`,
    text: [
      `Hello ${notice.licenseeName || 'licensee'},`,
      '',
      `Your Water Balance license ${key} was moved to a new computer.`,
      '',
      `Time: ${when}`,
      `Source IP: ${ip}`,
      `Device fingerprint: ${device}`,
      `Transfers used: ${notice.transferCount} of ${notice.maxTransfers} (${remaining} remaining)`,
      '',
      'If you did not request this transfer, contact support immediately.',
    ].join('\n'),
    html: `
      <p>Hello ${escapeHtml(notice.licenseeName || 'licensee')},</p>
      <p>Your Water Balance license <strong>${escapeHtml(key)}</strong> was moved to a new computer.</p>
      <ul>
        <li>Time: ${escapeHtml(when)}</li>
        <li>Source IP: ${escapeHtml(ip)}</li>
        <li>Device fingerprint: <code>${escapeHtml(device)}</code></li>
        <li>Transfers used: ${notice.transferCount} of ${notice.maxTransfers} (${remaining} remaining)</li>
      </ul>
      <p>If you did not request this transfer, contact support immediately.</p>
    `,
  };
}

export function suspiciousTransferTemplate(notice: SuspiciousTransferNotice): EmailTemplate {
  const key = maskLicenseKey(notice.licenseKey);
  const when = notice.timestamp.toISOString();
  const ip = notice.sourceIP ?? 'unknown';

  return {
    subject: `Security alert: blocked transfer attempt for license ${key}`,
    text: [
      `Someone tried to transfer your Water Balance license ${key} using a different email address.`,
      '',
      `Time: ${when}`,
      `Source IP: ${ip}`,
      `Email used: ${notice.attemptedEmail}`,
      '',
      'The transfer was blocked. No action is needed unless you believe your key has been shared.',
    ].join('\n'),
    html: `
      <p>Someone tried to transfer your Water Balance license <strong>${escapeHtml(key)}</strong> using a different email address.</p>
      <ul>
        <li>Time: ${escapeHtml(when)}</li>
        <li>Source IP: ${escapeHtml(ip)}</li>
        <li>Email used: ${escapeHtml(notice.attemptedEmail)}</li>
      </ul>
      <p>The transfer was blocked. No action is needed unless you believe your key has been shared.</p>
    `,
  };
}

// ─── Notifier ───────────────────────────────────────────────

/**
 * Owner alerts over an HTTP email API.
 *
 * Set MAIL_API_URL and MAIL_API_KEY in .env to enable. Sends never throw;
 * the boolean result says whether the provider accepted the message.
 */
export class Notifier {
  constructor(private readonly settings: MailSettings) {}

  get enabled(): boolean {
    return !!this.settings.apiUrl && !!this.settings.apiKey;
  }

  // ─── High-level helpers ──────────────────────────────────

  async transferCompleted(notice: TransferNotice): Promise<boolean> {
    return this.send(notice.to, transferNoticeTemplate(notice));
  }

  async transferBlocked(notice: SuspiciousTransferNotice): Promise<boolean> {
    return this.send(notice.to, suspiciousTransferTemplate(notice));
  }

  // ─── Core send ───────────────────────────────────────────

  private async send(to: string, template: EmailTemplate): Promise<boolean> {
    if (!this.enabled) {
      log.debug({ subject: template.subject }, 'Mail not configured, notification skipped');
      return false;
    }
    if (!to) {
      log.warn({ subject: template.subject }, 'No recipient for notification');
      return false;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), MAIL_TIMEOUT_MS);

    try {
      const response = await fetch(this.settings.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          from: this.settings.from,
          to: [to],
          subject: template.subject,
          html: template.html,
          text: template.text,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        log.warn({ status: response.status }, 'Mail API returned non-OK status');
        return false;
      }
      log.info({ subject: template.subject }, 'Notification sent');
      return true;
    } catch (err) {
      log.error({ err }, 'Failed to send notification');
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }
}
