/**
 * Options for {@link EnvVarPatternResolver}.
 * @public
 */
export interface EnvVarPatternResolverConfig {
  /** Nested pattern depth before resolution aborts (default 10) */
  maxDepth?: number;
  /** Throw on undefined variables without a default (default true) */
  strict?: boolean;
  /** Variable source, `process.env` unless given */
  envSource?: Record<string, string | undefined>;
}

/**
 * Error thrown when environment variable resolution fails.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(
    variable: string,
  ): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }
}

/**
 * Resolves `${VAR}` and `${VAR:default}` patterns in configuration strings.
 *
 * Variable names are restricted to upper-case identifiers. Values and
 * defaults are resolved recursively; cycles and runaway nesting throw.
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { TENANT: 'contoso' } });
 * resolver.resolve('https://login.example.com/${TENANT}/${FLOW:v2.0}');
 * // 'https://login.example.com/contoso/v2.0'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Resolves every pattern in `value`.
   * @throws {EnvironmentResolutionError} On a cycle, depth overflow or a missing required variable
   * @public
   */
  public resolve(
    value: string,
    visitedVars: ReadonlySet<string> = new Set(),
    depth: number = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    // ${VAR_NAME} or ${VAR_NAME:default_value}
    const envPattern = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;

    return value.replace(
      envPattern,
      (match, varName: string, defaultValue?: string) => {
        if (visitedVars.has(varName)) {
          throw EnvironmentResolutionError.circularReference(varName);
        }

        const next = new Set(visitedVars).add(varName);
        const envValue = this.envSource[varName];

        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (defaultValue !== undefined) {
          return this.resolve(defaultValue, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(varName);
        }
        return match;
      },
    );
  }

  /**
   * Walks a parsed JSON document and resolves patterns in every string leaf.
   * Arrays and plain objects are copied; other values are returned as-is.
   * @public
   */
  public resolveDeep(value: unknown): unknown {
    if (typeof value === 'string') {
      return EnvVarPatternResolver.containsPattern(value)
        ? this.resolve(value)
        : value;
    }
    if (Array.isArray(value)) {
      return value.map((entry) => this.resolveDeep(entry));
    }
    if (value !== null && typeof value === 'object') {
      return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [
          key,
          this.resolveDeep(entry),
        ]),
      );
    }
    return value;
  }

  public static containsPattern(value: string): boolean {
    return /\$\{[A-Z_][A-Z0-9_]*(?::[^}]*)?\}/.test(value);
  }
}
