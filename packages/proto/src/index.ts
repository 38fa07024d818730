export * from './api/common';
export * from './api/auth';
export * from './api/event';
export * from './api/guest';
export * from './api/rsvp';
