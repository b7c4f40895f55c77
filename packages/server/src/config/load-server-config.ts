import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  EnvironmentResolutionError,
  EnvVarPatternResolver,
  logEvent,
} from '@drivebridge/core';
import { type ServerConfig, ServerConfigSchema } from '@drivebridge/schemas';
import { ConfigurationError } from './configuration-error.js';

type Env = Record<string, string | undefined>;
type RawRecord = Record<string, unknown>;

export interface LoadServerConfigOptions {
  readFile?: (path: string) => string;
  cwd?: string;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function list(value: string | undefined): string[] | undefined {
  const items = value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items && items.length > 0 ? items : undefined;
}

function numeric(value: string | undefined): number | undefined {
  const trimmed = nonEmpty(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}

function flag(value: string | undefined): boolean | undefined {
  const trimmed = nonEmpty(value)?.toLowerCase();
  return trimmed === undefined ? undefined : trimmed === 'true' || trimmed === '1';
}

/**
 * Overlays defined values of `overlay` onto `base`, recursing into records.
 */
function mergeDefined(base: RawRecord, overlay: RawRecord): RawRecord {
  const merged: RawRecord = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isRecord(current) && isRecord(value) ? mergeDefined(current, value) : value;
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function readConfigFile(env: Env, options: LoadServerConfigOptions): RawRecord {
  const path = nonEmpty(env.DRIVEBRIDGE_CONFIG_PATH);
  if (!path) {
    return {};
  }

  const absolute = resolve(options.cwd ?? process.cwd(), path);
  let parsed: unknown;
  try {
    parsed = JSON.parse((options.readFile ?? ((p) => readFileSync(p, 'utf8')))(absolute));
  } catch (error) {
    throw ConfigurationError.invalid([
      `DRIVEBRIDGE_CONFIG_PATH ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  try {
    const resolved = new EnvVarPatternResolver({ envSource: env }).resolveDeep(parsed);
    if (!isRecord(resolved)) {
      throw ConfigurationError.invalid([`${absolute} must contain a JSON object`]);
    }
    logEvent('info', 'config:file_loaded', { path: absolute });
    return resolved;
  } catch (error) {
    if (error instanceof EnvironmentResolutionError) {
      throw ConfigurationError.missing([error.variable ?? error.message]);
    }
    throw error;
  }
}

/**
 * Inbound scheme from the environment. An explicit DRIVEBRIDGE_AUTH_MODE wins;
 * otherwise the presence of MCP_API_KEY or DRIVEBRIDGE_AUTH_AUDIENCE decides.
 */
function inboundAuthFromEnv(env: Env, tenantId: string | undefined): RawRecord | undefined {
  const mode =
    nonEmpty(env.DRIVEBRIDGE_AUTH_MODE) ??
    (nonEmpty(env.MCP_API_KEY)
      ? 'api-key'
      : nonEmpty(env.DRIVEBRIDGE_AUTH_AUDIENCE)
        ? 'oauth-bearer'
        : undefined);

  switch (mode) {
    case undefined:
      return undefined;
    case 'api-key':
      return {
        type: 'api-key',
        keys: list(env.MCP_API_KEY),
        header: nonEmpty(env.DRIVEBRIDGE_API_KEY_HEADER),
        allowQueryParam: flag(env.DRIVEBRIDGE_API_KEY_QUERY_PARAM),
      };
    case 'oauth-bearer':
      return {
        type: 'oauth-bearer',
        tenantId: nonEmpty(env.DRIVEBRIDGE_AUTH_TENANT_ID) ?? tenantId,
        audiences: list(env.DRIVEBRIDGE_AUTH_AUDIENCE),
        audienceMismatch: nonEmpty(env.DRIVEBRIDGE_AUDIENCE_MISMATCH),
        jwksUri: nonEmpty(env.DRIVEBRIDGE_AUTH_JWKS_URI),
      };
    default:
      return { type: mode };
  }
}

function missingKeys(raw: RawRecord): string[] {
  const missing: string[] = [];
  const graph = isRecord(raw.graph) ? raw.graph : {};
  if (!graph.tenantId) missing.push('GRAPH_TENANT_ID (or TENANT_ID)');
  if (!graph.clientId) missing.push('GRAPH_CLIENT_ID (or CLIENT_ID)');
  if (!graph.clientSecret) missing.push('GRAPH_CLIENT_SECRET (or CLIENT_SECRET)');

  const auth = raw.inboundAuth;
  if (!isRecord(auth)) {
    missing.push('MCP_API_KEY or DRIVEBRIDGE_AUTH_AUDIENCE');
  } else if (auth.type === 'api-key' && !auth.keys) {
    missing.push('MCP_API_KEY');
  } else if (auth.type === 'oauth-bearer' && !auth.audiences) {
    missing.push('DRIVEBRIDGE_AUTH_AUDIENCE');
  }
  return missing;
}

/**
 * Builds the frozen server configuration from the environment, optionally
 * layered over the JSON file named by DRIVEBRIDGE_CONFIG_PATH.
 * @throws {ConfigurationError} Listing every missing or invalid setting
 */
export function loadServerConfig(
  env: Env = process.env,
  options: LoadServerConfigOptions = {},
): ServerConfig {
  const file = readConfigFile(env, options);
  const fileGraph = isRecord(file.graph) ? file.graph : {};
  const tenantId =
    nonEmpty(env.GRAPH_TENANT_ID) ??
    nonEmpty(env.TENANT_ID) ??
    (typeof fileGraph.tenantId === 'string' ? fileGraph.tenantId : undefined);

  const raw = mergeDefined(file, {
    server: {
      port: numeric(env.PORT),
      host: nonEmpty(env.HOST),
      corsOrigins: list(env.DRIVEBRIDGE_CORS_ORIGINS),
    },
    inboundAuth: inboundAuthFromEnv(env, tenantId),
    graph: {
      tenantId,
      clientId: nonEmpty(env.GRAPH_CLIENT_ID) ?? nonEmpty(env.CLIENT_ID),
      clientSecret: nonEmpty(env.GRAPH_CLIENT_SECRET) ?? nonEmpty(env.CLIENT_SECRET),
      baseUrl: nonEmpty(env.GRAPH_BASE_URL),
      defaultDriveId: nonEmpty(env.GRAPH_DEFAULT_DRIVE_ID),
      defaultUserId: nonEmpty(env.GRAPH_DEFAULT_USER_ID),
    },
    retry: {
      maxAttempts: numeric(env.DRIVEBRIDGE_RETRY_MAX_ATTEMPTS),
      maxRetryAfterMs: numeric(env.DRIVEBRIDGE_RETRY_MAX_WAIT_MS),
    },
    copyPolling: {
      maxAttempts: numeric(env.DRIVEBRIDGE_COPY_MAX_POLLS),
      maxDurationMs: numeric(env.DRIVEBRIDGE_COPY_MAX_DURATION_MS),
    },
    bulk: {
      concurrency: numeric(env.DRIVEBRIDGE_BULK_CONCURRENCY),
      maxItems: numeric(env.DRIVEBRIDGE_BULK_MAX_ITEMS),
    },
  });

  const missing = missingKeys(raw);
  if (missing.length > 0) {
    throw ConfigurationError.missing(missing);
  }

  const parsed = ServerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.invalid(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return deepFreeze(parsed.data);
}
