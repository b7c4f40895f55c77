export {
  EnvVarPatternResolver,
  EnvironmentResolutionError,
} from './environment-resolver.js';
export type { EnvVarPatternResolverConfig } from './environment-resolver.js';
