// Config loader: reads ~/.config/dev-profile/config.yaml and deep-merges with defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged result is validated against ProfileConfigSchema; an invalid file falls back to defaults.
// Config shape lives in src/types/config.ts: add new fields there, in the schema and in DEFAULT_CONFIG.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ProfileConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "dev-profile");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: ProfileConfig = {
  availability: { ttl_seconds: 0, extra_paths: [], overrides: {} },
  registration: { mode: "conditional" },
  fragments: { disabled: [] },
  install_hints: { additional_files: [] },
  execution: { timeout_ceiling_seconds: 0, max_output_kb: 1024 },
};

const DEFAULT_CONFIG_YAML = `# dev-profile: Configuration
# Generated automatically on first run. All values shown are defaults.

availability:
  # Seconds before a probed answer is re-checked. 0 = keep for the process lifetime.
  ttl_seconds: 0
  # Directories searched after PATH.
  extra_paths: []
  # Pin a command's availability, e.g. "docker: false".
  overrides: {}

registration:
  # conditional: skip fragments whose commands are missing
  # always: register every fragment; wrappers fail at call time with an install hint
  mode: conditional

fragments:
  disabled: []

install_hints:
  additional_files: []

execution:
  # Upper bound in seconds for any wrapper command. 0 = per-tool defaults only.
  timeout_ceiling_seconds: 0
  max_output_kb: 1024
`;

const ProfileConfigSchema = z.object({
  availability: z.object({
    ttl_seconds: z.number().int().min(0),
    extra_paths: z.array(z.string()),
    overrides: z.record(z.string(), z.boolean()),
  }),
  registration: z.object({
    mode: z.enum(["conditional", "always"]),
  }),
  fragments: z.object({
    disabled: z.array(z.string()),
  }),
  install_hints: z.object({
    additional_files: z.array(z.string()),
  }),
  execution: z.object({
    timeout_ceiling_seconds: z.number().min(0),
    max_output_kb: z.number().int().positive(),
  }),
});

export interface ConfigResult {
  config: ProfileConfig;
  configPath: string;
  firstRun: boolean;
  /** Validation messages when the file was rejected and defaults were used. */
  errors: string[];
}

function defaults(): ProfileConfig {
  return structuredClone(DEFAULT_CONFIG);
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found; generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: defaults(), configPath, firstRun: true, errors: [] };
  }

  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
    const merged = isPlainObject(parsed) ? deepMerge(toRecord(defaults()), parsed) : toRecord(defaults());
    const result = ProfileConfigSchema.safeParse(merged);
    if (!result.success) {
      const errors = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      logger.error({ configPath, errors }, "Invalid config; using defaults");
      return { config: defaults(), configPath, firstRun: false, errors };
    }
    return { config: result.data, configPath, firstRun: false, errors: [] };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ configPath, error: message }, "Failed to parse config; using defaults");
    return { config: defaults(), configPath, firstRun: false, errors: [message] };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: ProfileConfig): Record<string, unknown> {
  return { ...config };
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays replace wholesale; null keeps the default. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined && bVal !== null) {
      result[key] = bVal;
    }
  }
  return result;
}
