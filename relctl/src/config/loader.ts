import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../types/errors.js";
import type { ProjectSpec, ReleaseConfig } from "../types/config.js";
import { resolvePlaceholders } from "./placeholders.js";
import { validateConfig, type RawReleaseConfig } from "./validator.js";

export const DEFAULT_CONFIG_FILE = "release_handler_config.yaml";

const ENV_PREFIX = "RELCTL_";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two mappings. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML mapping, or null if the file does not exist. */
function loadYaml(filePath: string): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Apply RELCTL_ prefixed environment variable overrides to top-level keys.
 * Values are read as YAML scalars, so `RELCTL_TAG_PROGR_SUFFIX=true` is a boolean.
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // RELCTL_BASE_DIR → base_dir
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (configKey === "projects") continue;
    const parsed: unknown = YAML.parse(value);
    result[configKey] = parsed === null ? value : parsed;
  }
  return result;
}

/** Overlay path for an environment name: `release.yaml` + `prod` → `release.prod.yaml`. */
export function overlayPathFor(configPath: string, envName: string): string {
  const ext = path.extname(configPath);
  const stem = configPath.slice(0, configPath.length - ext.length);
  return `${stem}.${envName}${ext || ".yaml"}`;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}

function finalize(raw: RawReleaseConfig, configDir: string): ReleaseConfig {
  const baseDir = path.resolve(configDir, raw.base_dir);
  const seen = new Set<string>();
  const projects: ProjectSpec[] = raw.projects.map((project) => {
    if (seen.has(project.name)) {
      throw new ConfigError(`Duplicate project name '${project.name}'`);
    }
    seen.add(project.name);
    const projectPath = project.project_path
      ? path.resolve(configDir, project.project_path)
      : path.join(baseDir, project.name);
    return { ...project, project_path: projectPath };
  });
  return {
    ...raw,
    base_dir: baseDir,
    log_file: path.resolve(configDir, raw.log_file),
    projects,
  };
}

export type LoadConfigOptions = {
  /** Environment overlay name, loads `<config>.<env>.yaml` on top of the base file. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load the release config once for a run: base file ← env overlay ←
 * environment variables, then placeholder resolution, schema validation with
 * defaults, and derived project paths. The result is deeply frozen.
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_FILE, opts: LoadConfigOptions = {}): ReleaseConfig {
  const absPath = path.resolve(configPath);
  const base = loadYaml(absPath);
  if (base === null) {
    throw new ConfigError(`Config file not found: ${absPath}`);
  }

  let merged = base;
  if (opts.envName) {
    const overlay = loadYaml(overlayPathFor(absPath, opts.envName));
    if (overlay) merged = deepMerge(base, overlay);
  }
  merged = applyEnvOverrides(merged, opts.env);

  const resolved = resolvePlaceholders(merged);
  const result = validateConfig(resolved);
  if (!result.valid) {
    throw new ConfigError(`Invalid config ${absPath}: ${result.errors}`);
  }

  return deepFreeze(finalize(result.config, path.dirname(absPath)));
}
