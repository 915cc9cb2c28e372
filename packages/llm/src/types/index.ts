export * from './content.js';
export * from './config.js';
export * from './message.js';
export * from './response.js';
export * from './stream.js';
export * from './tool.js';
export * from './error.js';
