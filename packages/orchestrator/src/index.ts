export * from './types/index.js';
export * from './config.js';
export * from './context.js';
export * from './rate-limit/rate-limiter.js';
export * from './gateway/gateway.js';
export * from './tools/tool-spec.js';
export * from './tools/dispatch.js';
export * from './session/events.js';
export * from './session/log.js';
export * from './session/loop.js';
export * from './extract/extract-html.js';
export * from './generate/validate.js';
export * from './generate/generate.js';
export * from './server/errors.js';
export * from './server/handler.js';
export * from './server/http.js';
export * from './server/start.js';
