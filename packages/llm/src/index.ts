// @cclm/llm — typed streaming client over the claude agent CLI

export * from './types/index.js';
export * from './providers/claude-code/index.js';
export { createLogger, resolveLogLevel, isLogLevel, LOG_LEVEL_ENV_VAR } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
