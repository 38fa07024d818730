import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@soiree/shared';
import { EventError, type EventService } from '@soiree/domain';
import {
  CreateEventRequestSchema,
  UpdateEventRequestSchema,
  ListEventsQuerySchema,
  EventParamsSchema,
  type DetailResponse,
} from '@soiree/proto';
import { type createAuthMiddleware, requireUser } from '../plugins/auth';
import { parseRequest } from '../validation';
import { serializeEvent } from '../serializers';

interface EventRouteDeps<Tx> {
  eventService: EventService<Tx>;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

function mapEventError(err: unknown): never {
  if (err instanceof EventError) {
    throw new AppError(ErrorCode.NOT_FOUND, err.message);
  }
  throw err;
}

export function registerEventRoutes<Tx>(app: FastifyInstance, deps: EventRouteDeps<Tx>): void {
  const { eventService, authenticate } = deps;

  app.post('/events', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const input = parseRequest(CreateEventRequestSchema, request.body, 'Invalid event data');

    const event = await eventService.createEvent(user.id, {
      title: input.title,
      description: input.description ?? null,
      date: input.date,
      location: input.location,
    });
    return reply.status(200).send(serializeEvent(event));
  });

  app.get('/events', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const page = parseRequest(ListEventsQuerySchema, request.query, 'Invalid paging parameters');

    const events = await eventService.listEvents(user.id, page);
    return reply.status(200).send(events.map(serializeEvent));
  });

  app.get('/events/:eventId', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');

    try {
      const event = await eventService.getEvent(user.id, eventId);
      return reply.status(200).send(serializeEvent(event));
    } catch (err) {
      return mapEventError(err);
    }
  });

  app.put('/events/:eventId', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');
    const patch = parseRequest(UpdateEventRequestSchema, request.body, 'Invalid event data');

    try {
      const event = await eventService.updateEvent(user.id, eventId, patch);
      return reply.status(200).send(serializeEvent(event));
    } catch (err) {
      return mapEventError(err);
    }
  });

  app.delete('/events/:eventId', { preHandler: [authenticate] }, async (request, reply) => {
    const user = requireUser(request);
    const { eventId } = parseRequest(EventParamsSchema, request.params, 'Invalid event id');

    try {
      await eventService.deleteEvent(user.id, eventId);
      const body: DetailResponse = { detail: 'Event deleted' };
      return reply.status(200).send(body);
    } catch (err) {
      return mapEventError(err);
    }
  });
}
