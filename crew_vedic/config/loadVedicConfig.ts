import fs from "node:fs";
import path from "node:path";
import { VedicConfigSchema, type VedicConfig } from "./vedicConfig.schema.js";

export const DEFAULT_CONFIG_PATH = "config/vedic.config.json";

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.name = "ConfigError";
  }
}

export interface LoadVedicConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numericEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Env vars win over the file:
 * VEDIC_LATITUDE, VEDIC_LONGITUDE, VEDIC_UTC_OFFSET, VEDIC_MATCHING_BACKEND.
 */
function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const location = isRecord(raw.location) ? { ...raw.location } : {};
  const corpus = isRecord(raw.corpus) ? { ...raw.corpus } : {};

  const latitude = numericEnv(env, "VEDIC_LATITUDE");
  const longitude = numericEnv(env, "VEDIC_LONGITUDE");
  const utcOffset = numericEnv(env, "VEDIC_UTC_OFFSET");
  if (latitude !== undefined) location.latitude = latitude;
  if (longitude !== undefined) location.longitude = longitude;
  if (utcOffset !== undefined) location.utc_offset_hours = utcOffset;

  const backend = env.VEDIC_MATCHING_BACKEND?.trim();
  if (backend) corpus.matching_backend = backend;

  return { ...raw, location, corpus };
}

/**
 * Load config/vedic.config.json (or VEDIC_CONFIG_PATH), apply env overrides
 * and validate. Relative paths resolve against the working directory.
 */
export function loadVedicConfig(options: LoadVedicConfigOptions = {}): VedicConfig {
  const env = options.env ?? process.env;
  const configPath = options.path ?? env.VEDIC_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const fullPath = path.resolve(configPath);

  let text: string;
  try {
    text = fs.readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Config file not found at ${fullPath}`, [], { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config JSON (${fullPath}): ${err instanceof Error ? err.message : String(err)}`,
      [],
      { cause: err }
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config ${fullPath} must be a JSON object`);
  }

  const result = VedicConfigSchema.safeParse(applyEnvOverrides(parsed, env));
  if (!result.success) {
    throw new ConfigError(
      `Invalid config ${fullPath}`,
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return result.data;
}
