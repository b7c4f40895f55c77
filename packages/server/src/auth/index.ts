/**
 * Authentication module exports
 */

export * from './interfaces/inbound-auth.interface.js';

export * from './implementations/api-key-validator.js';
export * from './implementations/jwt-bearer-validator.js';
export * from './implementations/no-auth-validator.js';

export * from './middleware/auth-middleware.js';

export * from './auth-factory.js';
