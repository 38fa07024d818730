export { createDatabase, isUniqueViolation, type Database } from './client';
export { createSchema, SCHEMA_PATH } from './schema';
export { PgUserRepository } from './repositories/user-repository';
export { PgEventRepository } from './repositories/event-repository';
export { PgGuestRepository } from './repositories/guest-repository';
export { PgRsvpRepository } from './repositories/rsvp-repository';
