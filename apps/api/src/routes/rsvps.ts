import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@soiree/shared';
import { RsvpError, type RsvpService } from '@soiree/domain';
import { RsvpRequestSchema, EventParamsSchema } from '@soiree/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { parseRequest } from '../validation';
import { serializeRsvp } from '../serializers';

interface RsvpRouteDeps<Tx> {
  rsvpService: RsvpService<Tx>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

function mapRsvpError(err: unknown): never {
  if (err instanceof RsvpError) {
    const codeMap: Record<RsvpError['kind'], ErrorCode> = {
      NOT_FOUND: ErrorCode.NOT_FOUND,
      FORBIDDEN: ErrorCode.FORBIDDEN,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerRsvpRoutes<Tx>(app: FastifyInstance, deps: RsvpRouteDeps<Tx>): void {
  const { rsvpService, authenticate } = deps;

  app.post('/events/:eventId/rsvp', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');
    const { status } = parseRequest(RsvpRequestSchema, request.body, 'Invalid RSVP data');

    try {
      const rsvp = await rsvpService.submitRsvp(user, eventId, status);
      return reply.status(200).send(serializeRsvp(rsvp));
    } catch (err) {
      return mapRsvpError(err);
    }
  });

  app.get('/events/:eventId/rsvp', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');

    try {
      const rsvp = await rsvpService.getMyRsvp(user.id, eventId);
      return reply.status(200).send(serializeRsvp(rsvp));
    } catch (err) {
      return mapRsvpError(err);
    }
  });

  app.get('/events/:eventId/rsvps', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');

    try {
      const rsvps = await rsvpService.listRsvps(user.id, eventId);
      return reply.status(200).send(rsvps.map(serializeRsvp));
    } catch (err) {
      return mapRsvpError(err);
    }
  });
}
