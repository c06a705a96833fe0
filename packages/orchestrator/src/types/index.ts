export * from './error.js';
export * from './request.js';
export * from './gateway.js';
export * from './event.js';
export * from './conversation.js';
