import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import { LoggerOptionsSchema, parseOrThrow } from "./schema/options";
import type {
  LineSink,
  PrettyAxiosLoggerInit,
  ResolvedLoggerConfig,
} from "./types";
import { log } from "./utils/logger";

export const ENV_PREFIX = "PRETTY_AXIOS_LOGGER_";

const defaults = {
  request: true,
  requestHeader: false,
  requestBody: false,
  responseHeader: false,
  responseBody: true,
  error: true,
  maxWidth: 90,
  compact: true,
  enabled: true,
  defaultColor: "reset",
} as const;

const consoleSink: LineSink = (line) => console.log(line);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readYaml(filePath: string): Record<string, unknown> {
  try {
    const abs = path.resolve(process.cwd(), filePath);

    if (!fs.existsSync(abs)) return {};
    const raw = fs.readFileSync(abs, "utf8");
    const parsed: unknown = yaml.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    log.warn(`Ignoring unreadable rc file ${filePath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }
}

/** "true"/"1" and "false"/"0"; anything else is left for the schema to reject. */
function envFlag(raw: string): boolean | string {
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return raw;
}

export function readEnv(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const enabled = env[`${ENV_PREFIX}ENABLED`];
  const maxWidth = env[`${ENV_PREFIX}MAX_WIDTH`];
  const compact = env[`${ENV_PREFIX}COMPACT`];
  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];

  return {
    ...(enabled ? { enabled: envFlag(enabled) } : {}),
    ...(maxWidth ? { maxWidth: Number(maxWidth) } : {}),
    ...(compact ? { compact: envFlag(compact) } : {}),
    ...(logLevel ? { logLevel } : {}),
  };
}

function definedOnly(obj: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, value]) => value !== undefined)
  );
}

/**
 * Resolves logger options. Precedence, lowest first: built-in defaults, the
 * YAML file named by `PRETTY_AXIOS_LOGGER_RC`, `PRETTY_AXIOS_LOGGER_*`
 * environment variables, then `userCfg`.
 *
 * @throws {Error} listing every invalid field
 */
export function loadConfig(
  userCfg: PrettyAxiosLoggerInit = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedLoggerConfig {
  const rcPath = env[`${ENV_PREFIX}RC`];
  const fileCfg = rcPath ? readYaml(rcPath) : {};

  const data = parseOrThrow(LoggerOptionsSchema, {
    ...defaults,
    ...fileCfg,
    ...readEnv(env),
    ...definedOnly(userCfg),
  });

  const fallback = data.defaultColor;

  return {
    request: data.request,
    requestHeader: data.requestHeader,
    requestBody: data.requestBody,
    responseHeader: data.responseHeader,
    responseBody: data.responseBody,
    error: data.error,
    maxWidth: data.maxWidth,
    compact: data.compact,
    enabled: data.enabled,
    logLevel: data.logLevel,
    logPrint: userCfg.logPrint ?? consoleSink,
    filter: userCfg.filter,
    clock: userCfg.clock ?? (() => Date.now()),
    colors: {
      default: fallback,
      request: data.requestColor ?? fallback,
      header: data.headerColor ?? fallback,
      body: data.bodyColor ?? fallback,
      error: data.errorColor ?? fallback,
      response: data.responseColor ?? fallback,
      responseHeader: data.responseHeaderColor ?? fallback,
      responseStatus: data.responseStatusColor ?? fallback,
    },
  };
}
