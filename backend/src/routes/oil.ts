import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticatedClaims, requireRoleHandler } from '../middleware/auth.js';
import { Roles } from '../rbac/index.js';
import type { OilService } from '../services/oilService.js';
import { DEFAULT_PAGE_SIZE } from '../services/oilService.js';
import { OIL_TYPES, type OilResourcePatch } from '../types/oil.js';
import { sendError } from '../utils/errors.js';

const OilParamsSchema = z.object({
  id: z.string().uuid(),
});

const OilListQuerySchema = z.object({
  cursor: z.string().min(1).optional(),
  size: z.coerce.number().int().min(1).max(100).optional().default(DEFAULT_PAGE_SIZE),
});

const CreateOilSchema = z.object({
  date: z.string().date(),
  price: z.number().nonnegative(),
  type: z.enum(OIL_TYPES).default('PETROL'),
  oil_document_url: z.string().min(1).nullable().optional(),
});

// null means "leave unchanged", the same as an absent field.
const UpdateOilSchema = z.object({
  date: z.string().date().nullable().optional(),
  price: z.number().nonnegative().nullable().optional(),
  type: z.enum(OIL_TYPES).nullable().optional(),
  oil_document_url: z.string().min(1).nullable().optional(),
});

const UploadUrlSchema = z.object({
  key: z.string().nullable().optional(),
  metadata: z.record(z.string(), z.string()).nullable().optional(),
});

function toPatch(body: z.infer<typeof UpdateOilSchema>): OilResourcePatch {
  const patch: OilResourcePatch = {};
  if (body.date != null) patch.date = body.date;
  if (body.price != null) patch.price = body.price;
  if (body.type != null) patch.type = body.type;
  if (body.oil_document_url != null) patch.oil_document_url = body.oil_document_url;
  return patch;
}

interface RegisterOilRoutesOptions {
  prefix: string;
  oilService: OilService;
}

export async function registerOilRoutes(app: FastifyInstance, options: RegisterOilRoutesOptions) {
  const { prefix, oilService } = options;
  const adminOnly = { preHandler: requireRoleHandler(Roles.admin) };
  const usersOnly = { preHandler: requireRoleHandler(Roles.user) };

  app.post(`${prefix}/oil`, adminOnly, async (request, reply) => {
    const body = CreateOilSchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 422, 'invalid_payload', 'Invalid payload', body.error.issues);
    }
    const claims = authenticatedClaims(request);
    request.log.info({ date: body.data.date, price: body.data.price }, 'Create oil resource request received');
    const created = await oilService.createOil(body.data, claims.sub, claims.email);
    reply.code(201);
    return created;
  });

  app.get(`${prefix}/oil`, usersOnly, async (request, reply) => {
    const query = OilListQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return sendError(reply, 422, 'invalid_query', 'Invalid query parameters', query.error.issues);
    }
    return oilService.getAllOil(query.data);
  });

  // Registered before /oil/:id so the static segment wins.
  app.post(`${prefix}/oil/upload-url`, adminOnly, async (request, reply) => {
    const body = UploadUrlSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return sendError(reply, 422, 'invalid_payload', 'Invalid payload', body.error.issues);
    }
    request.log.info({ key: body.data.key ?? null }, 'Generate upload URL request received');
    return oilService.generateUploadUrl(body.data);
  });

  app.get(`${prefix}/oil/:id`, usersOnly, async (request, reply) => {
    const params = OilParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendError(reply, 422, 'invalid_id', 'Invalid oil resource ID', params.error.issues);
    }
    return oilService.getOil(params.data.id);
  });

  app.put(`${prefix}/oil/:id`, adminOnly, async (request, reply) => {
    const params = OilParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendError(reply, 422, 'invalid_id', 'Invalid oil resource ID', params.error.issues);
    }
    const body = UpdateOilSchema.safeParse(request.body);
    if (!body.success) {
      return sendError(reply, 422, 'invalid_payload', 'Invalid payload', body.error.issues);
    }
    return oilService.updateOil(params.data.id, toPatch(body.data));
  });

  app.delete(`${prefix}/oil/:id`, adminOnly, async (request, reply) => {
    const params = OilParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendError(reply, 422, 'invalid_id', 'Invalid oil resource ID', params.error.issues);
    }
    await oilService.deleteOil(params.data.id);
    return reply.code(204).send();
  });
}
