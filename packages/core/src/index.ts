// Logging with redaction
export * from './logging/index.js';

export * from './backoff/index.js';

export { generateRequestId } from './utils/request/generateRequestId.js';

export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
} from './env/index.js';
export type { EnvVarPatternResolverConfig } from './env/index.js';
