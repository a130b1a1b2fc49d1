import { timingSafeEqual } from 'crypto';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z, ZodError } from 'zod';
import {
  BindRequestSchema,
  LinkNameSchema,
  LinkRequestSchema,
  ReconcileRequestSchema,
  SnowflakeSchema,
  UnbindRequestSchema,
} from '@reaction-roles/shared';
import type { ReactRolesEngine } from '../react-roles/engine.js';
import { ReactRolesError } from '../react-roles/errors.js';

export interface AdminRoutesOptions {
  engine: ReactRolesEngine;
  /** Bearer token every admin request must carry */
  token: string;
}

const GuildParamsSchema = z.object({ guildId: SnowflakeSchema });
const LinkParamsSchema = GuildParamsSchema.extend({ name: LinkNameSchema });

const ERROR_STATUS: Record<string, number> = {
  ALREADY_BOUND: 409,
  NOT_BOUND: 404,
  PAIR_INVALID: 400,
  LINK_NOT_FOUND: 404,
  CANNOT_RECONCILE_LINKED: 409,
  MESSAGE_NOT_FOUND: 404,
  ROLE_NOT_FOUND: 404,
  INVALID_SYMBOL: 400,
};

/**
 * Admin API for managing bindings and links. Permission checks beyond the
 * shared bearer token are up to whatever sits in front of it.
 */
export async function registerAdminRoutes(fastify: FastifyInstance, options: AdminRoutesOptions): Promise<void> {
  const { engine } = options;

  fastify.get('/api/health', async () => {
    return { success: true, data: { status: 'ok' } };
  });

  await fastify.register(async (instance) => {
    instance.addHook('onRequest', async (request, reply) => {
      if (!isAuthorized(request.headers.authorization, options.token)) {
        return reply.status(401).send({
          success: false,
          error: { code: 'UNAUTHORIZED', message: 'Missing or invalid admin token' },
        });
      }
    });

    // Current bindings and links
    instance.get('/api/bindings', async () => {
      return { success: true, data: engine.snapshot() };
    });

    // Bind an emoji on a message to a role
    instance.post('/api/bindings', async (request, reply) => {
      try {
        const body = BindRequestSchema.parse(request.body);
        const { symbol: rawSymbol, roleId, ...ref } = body;
        const symbol = await engine.bind(ref, rawSymbol, roleId);
        return reply.status(201).send({ success: true, data: { ...ref, symbol, roleId } });
      } catch (error) {
        return sendError(reply, error);
      }
    });

    // Unbind by emoji or by role
    instance.delete('/api/bindings', async (request, reply) => {
      try {
        const body = UnbindRequestSchema.parse(request.body);
        const { symbol, roleId, clearReactions, ...ref } = body;
        const removed = await engine.unbind(ref, { symbol, roleId, clearReactions });
        return { success: true, data: { ...ref, ...removed } };
      } catch (error) {
        return sendError(reply, error);
      }
    });

    instance.get('/api/links/:guildId', async (request, reply) => {
      try {
        const { guildId } = GuildParamsSchema.parse(request.params);
        return { success: true, data: engine.listLinks(guildId) };
      } catch (error) {
        return sendError(reply, error);
      }
    });

    instance.post('/api/links', async (request, reply) => {
      try {
        const body = LinkRequestSchema.parse(request.body);
        await engine.link(body.guildId, body.name, body.messages);
        return reply.status(201).send({ success: true, data: body });
      } catch (error) {
        return sendError(reply, error);
      }
    });

    instance.delete('/api/links/:guildId/:name', async (request, reply) => {
      try {
        const { guildId, name } = LinkParamsSchema.parse(request.params);
        await engine.unlink(guildId, name);
        return { success: true, data: { guildId, name } };
      } catch (error) {
        return sendError(reply, error);
      }
    });

    // Give roles to reactors who reacted while the bot was away
    instance.post('/api/reconcile', async (request, reply) => {
      try {
        const ref = ReconcileRequestSchema.parse(request.body);
        const result = await engine.reconcile(ref, (progress) => {
          request.log.debug({ messageId: ref.messageId, ...progress }, 'Reconcile progress');
        });
        return { success: true, data: result };
      } catch (error) {
        return sendError(reply, error);
      }
    });

    instance.get('/api/queue', async () => {
      return { success: true, data: engine.status() };
    });
  });
}

function isAuthorized(header: string | undefined, token: string): boolean {
  if (!header?.startsWith('Bearer ')) return false;
  const given = Buffer.from(header.slice('Bearer '.length));
  const expected = Buffer.from(token);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  if (error instanceof ZodError) {
    return reply.status(400).send({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Invalid input', details: error.issues },
    });
  }
  if (error instanceof ReactRolesError) {
    return reply.status(ERROR_STATUS[error.code] ?? 400).send({
      success: false,
      error: { code: error.code, message: error.message },
    });
  }

  reply.log.error(error, 'Admin request failed');
  return reply.status(500).send({
    success: false,
    error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  });
}
