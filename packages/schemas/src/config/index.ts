export * from './ApiKeyAuthConfigSchema.js';
export * from './OAuthBearerAuthConfigSchema.js';
export * from './NoAuthConfigSchema.js';
export * from './InboundAuthConfigSchema.js';
export * from './GraphConfigSchema.js';
export * from './PolicySchemas.js';
export * from './ServerConfigSchema.js';
