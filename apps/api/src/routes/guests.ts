import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@soiree/shared';
import { GuestError, type GuestService } from '@soiree/domain';
import {
  CreateGuestRequestSchema,
  InviteRequestSchema,
  EventParamsSchema,
  GuestParamsSchema,
  type DetailResponse,
} from '@soiree/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { parseRequest } from '../validation';
import { serializeGuest } from '../serializers';

interface GuestRouteDeps<Tx> {
  guestService: GuestService<Tx>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

function mapGuestError(err: unknown): never {
  if (err instanceof GuestError) {
    throw new AppError(ErrorCode.NOT_FOUND, err.message);
  }
  throw err;
}

export function registerGuestRoutes<Tx>(app: FastifyInstance, deps: GuestRouteDeps<Tx>): void {
  const { guestService, authenticate } = deps;

  app.post('/events/:eventId/guests', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');
    const input = parseRequest(CreateGuestRequestSchema, request.body, 'Invalid guest data');

    try {
      const guest = await guestService.addGuest(user.id, eventId, input);
      return reply.status(200).send(serializeGuest(guest));
    } catch (err) {
      return mapGuestError(err);
    }
  });

  app.get('/events/:eventId/guests', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');

    try {
      const guests = await guestService.listGuests(user.id, eventId);
      return reply.status(200).send(guests.map(serializeGuest));
    } catch (err) {
      return mapGuestError(err);
    }
  });

  app.delete('/events/:eventId/guests/:guestId', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId, guestId } = parseRequest(GuestParamsSchema, request.params, 'Invalid guest id');

    try {
      await guestService.removeGuest(user.id, eventId, guestId);
      const body: DetailResponse = { detail: 'Guest removed' };
      return reply.status(200).send(body);
    } catch (err) {
      return mapGuestError(err);
    }
  });

  app.post('/events/:eventId/invite', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');
    const { guest_emails } = parseRequest(InviteRequestSchema, request.body, 'Invalid invite data');

    try {
      const created = await guestService.inviteByEmail(user.id, eventId, guest_emails);
      return reply.status(200).send(created.map(serializeGuest));
    } catch (err) {
      return mapGuestError(err);
    }
  });
}
