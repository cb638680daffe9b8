import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { BatchConfigSchema, type BatchConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { parseBooleanFlag } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type BatchConfigOverrides = Partial<
  Pick<
    BatchConfig,
    | "config_dir"
    | "output_dir"
    | "lock_path"
    | "log_path"
    | "debug"
    | "download"
    | "hardlink"
    | "recipient"
  >
>;

export type LoadBatchConfigInput = {
  configPath?: string;
  overrides?: BatchConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export const CONFIG_PATH_ENV = "CACHE_REFRESH_CONFIG";

const BOOLEAN_ENV_KEYS = {
  DOWNLOAD: "download",
  DEBUG: "debug",
  HARDLINK: "hardlink",
} as const;

// DEBUG is also read by other tools (e.g. `DEBUG=express:*`); a value that is not a boolean is ignored.
const LENIENT_ENV_KEYS: ReadonlySet<string> = new Set(["DEBUG"]);

const PATH_KEYS = ["config_dir", "output_dir", "lock_path", "log_path"] as const;

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// LAYERING
// =============================================================================

export function resolveEnvOverrides(env: NodeJS.ProcessEnv): BatchConfigOverrides {
  const overrides: BatchConfigOverrides = {};

  for (const [envKey, configKey] of Object.entries(BOOLEAN_ENV_KEYS)) {
    const raw = env[envKey];
    const parsed = parseBooleanFlag(raw);
    if (parsed === undefined && raw !== undefined && raw.trim() !== "") {
      const accepted = "use 1/0, true/false, yes/no, on/off";
      if (!LENIENT_ENV_KEYS.has(envKey)) {
        throw new ConfigError(`${envKey}=${raw} is not a boolean (${accepted}).`);
      }
      console.warn(`Warning: ignoring ${envKey}=${raw}; it is not a boolean (${accepted}).`);
      continue;
    }
    if (parsed !== undefined) {
      overrides[configKey] = parsed;
    }
  }

  const recipient = env.MAILTO?.trim();
  if (recipient) {
    overrides.recipient = recipient;
  }

  return overrides;
}

function applyOverrides(doc: Record<string, unknown>, overrides: BatchConfigOverrides): void {
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      doc[key] = value;
    }
  }
}

// Flag paths are relative to the caller's cwd, even when a config file is in play.
function resolveOverridePaths(overrides: BatchConfigOverrides, cwd: string): BatchConfigOverrides {
  const resolved: BatchConfigOverrides = { ...overrides };
  for (const key of PATH_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      resolved[key] = path.resolve(cwd, value);
    }
  }
  return resolved;
}

function resolvePaths(config: BatchConfig, baseDir: string): BatchConfig {
  const resolved: BatchConfig = { ...config };
  for (const key of PATH_KEYS) {
    resolved[key] = path.resolve(baseDir, config[key]);
  }
  return resolved;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const INVALID_CONFIG_HINT = "Fix the config file or environment and rerun.";

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function resolveYamlErrorLine(error: unknown): number | null {
  if (!(error instanceof yaml.YAMLException)) return null;
  return typeof error.mark?.line === "number" ? error.mark.line + 1 : null;
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config file missing.",
    message: `Config file not found at ${configPath}.`,
    hint: `Pass --config <path> or set ${CONFIG_PATH_ENV} to an existing YAML file.`,
  });
}

function toUserFacing(error: unknown, source: string): never {
  if (error instanceof ConfigError) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: error.message,
      hint: INVALID_CONFIG_HINT,
      next: source === "<defaults>" ? undefined : `Edit ${source}`,
      cause: error,
    });
  }
  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadBatchConfig(input: LoadBatchConfigInput = {}): BatchConfig {
  const env = input.env ?? process.env;
  const cwd = input.cwd ?? process.cwd();
  const explicit = input.configPath ?? (env[CONFIG_PATH_ENV]?.trim() || undefined);
  const absolutePath = explicit ? path.resolve(cwd, explicit) : undefined;

  if (absolutePath && !fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  const source = absolutePath ?? "<defaults>";

  try {
    const fileDoc: Record<string, unknown> = absolutePath
      ? readYamlDocument(absolutePath, env)
      : {};
    applyOverrides(fileDoc, resolveEnvOverrides(env));
    applyOverrides(fileDoc, resolveOverridePaths(input.overrides ?? {}, cwd));

    const parsed = BatchConfigSchema.safeParse(fileDoc);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid configuration (${source}):\n${details}`, parsed.error);
    }

    // Relative paths in a config file are relative to that file, not the caller.
    const baseDir = absolutePath ? path.dirname(absolutePath) : cwd;
    return resolvePaths(parsed.data, baseDir);
  } catch (err) {
    toUserFacing(err, source);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function readYamlDocument(filePath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${filePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const line = resolveYamlErrorLine(err);
    const lineDetail = line !== null ? ` (line ${line})` : "";
    throw new ConfigError(`Failed to parse YAML config at ${filePath}${lineDetail}: ${detail}`, err);
  }

  if (doc === undefined || doc === null) {
    return {};
  }

  const expanded = expandEnv(doc, { file: filePath, trail: [], env });
  if (!isPlainObject(expanded)) {
    throw new ConfigError(`Config at ${filePath} must be a YAML mapping.`);
  }

  return { ...expanded };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
