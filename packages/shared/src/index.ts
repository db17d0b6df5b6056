// Shared types and utilities
export * from './logger.js';
export * from './constants/limits.js';
export * from './types/content.js';
export * from './types/users.js';
export * from './utils/sanitize.js';
export * from './validation/schemas.js';
export * from './env/getTelegramBotToken.js';
