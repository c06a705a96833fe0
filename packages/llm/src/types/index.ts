export * from './content.js';
export * from './message.js';
export * from './tool.js';
export * from './config.js';
export * from './request.js';
export * from './response.js';
export * from './provider.js';
export * from './error.js';
