import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { LicenseEngine } from '../engine';
import { LicenseError } from '../licensing/errors';
import { Result } from '../licensing/result';
import { AUDIT_EVENT_TYPES } from '../licensing/types';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('license-routes');

const activateSchema = z.object({
  licenseKey: z.string().trim().min(1).max(128),
  name: z.string().trim().max(200).default(''),
  email: z.string().trim().email(),
});

const transferSchema = z.object({
  licenseKey: z.string().trim().min(1).max(128),
  email: z.string().trim().email(),
});

const auditQuerySchema = z.object({
  eventType: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(',').map((s) => s.trim()).filter(Boolean) : undefined))
    .pipe(z.array(z.enum(AUDIT_EVENT_TYPES)).optional()),
  licenseKey: z.string().trim().min(1).optional(),
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function sendResult<T>(reply: FastifyReply, result: Result<T, LicenseError>) {
  if (result.ok) {
    return reply.send({ ok: true, ...result.value });
  }
  return reply.status(result.error.httpStatus).send({ ok: false, error: result.error.toJSON() });
}

export function registerLicenseRoutes(app: FastifyInstance, engine: LicenseEngine): void {
  const { validator, audit } = engine;

  // ─── Status ───────────────────────────────────────────────
  app.get('/api/license/status', async () => validator.getStatus());

  app.get('/api/license/verification', async () => validator.verificationStatus());

  // ─── Activation ───────────────────────────────────────────
  app.post('/api/license/activate', async (request, reply) => {
    const parsed = activateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.flatten() });
    }

    const { licenseKey, name, email } = parsed.data;
    const result = await validator.activate(licenseKey, name, email);
    return sendResult(reply, result);
  });

  // ─── Manual verification ──────────────────────────────────
  app.post('/api/license/validate', async (_request, reply) => {
    const result = await validator.validateManual();
    return sendResult(reply, result);
  });

  // ─── Transfer ─────────────────────────────────────────────
  app.post('/api/license/transfer', async (request, reply) => {
    const parsed = transferSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.flatten() });
    }

    const { licenseKey, email } = parsed.data;
    log.info({ licenseKey, ip: request.ip }, 'Transfer requested');
    const result = await validator.requestTransfer(licenseKey, email, { sourceIP: request.ip });
    return sendResult(reply, result);
  });

  // ─── Audit trail ──────────────────────────────────────────
  app.get('/api/license/audit', async (request, reply) => {
    const parsed = auditQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Validation failed', details: parsed.error.flatten() });
    }

    const { eventType, licenseKey, since, until, limit } = parsed.data;
    const events = audit.query({
      eventTypes: eventType,
      licenseKey,
      since: since ? new Date(since) : undefined,
      until: until ? new Date(until) : undefined,
      limit,
    });
    return { events };
  });
}
