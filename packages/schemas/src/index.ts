// @module: shared-schemas-root
// @tags: schemas, exports
export * from './ws/envelope.js';
export * from './ws/media.js';
export * from './ws/command.js';
export * from './ws/reply.js';
export * from './ws/event.js';
export * from './ws/error.js';
export * from './ws/close.js';
export * from './rest/rooms.js';
