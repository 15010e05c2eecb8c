import { createAjv } from "../schema/ajv.js";
import type { ProjectSpec, ReleaseConfig } from "../types/config.js";

/** Project entry as written in YAML, before `project_path` is derived. */
export type RawProjectSpec = Omit<ProjectSpec, "project_path"> & { project_path?: string };

export type RawReleaseConfig = Omit<ReleaseConfig, "projects"> & { projects: RawProjectSpec[] };

const stringList = { type: "array", items: { type: "string" }, default: [] };

const PROJECT_SCHEMA = {
  type: "object",
  required: ["name", "project_remote_git_url", "git_branch", "type", "version", "tag"],
  properties: {
    name: { type: "string", minLength: 1 },
    project_path: { type: "string", minLength: 1 },
    project_remote_git_url: { type: "string", minLength: 1 },
    git_branch: { type: "string", minLength: 1 },
    type: { type: "string", enum: ["Maven", "Ant", "Angular"] },
    version: { type: "string", minLength: 1 },
    tag: { type: "string", minLength: 1 },
    reset_type: { type: "string", enum: ["soft", "mixed", "hard"], default: "mixed" },
    skip: { type: "boolean", default: false },
    version_file: { type: "string", minLength: 1 },
    version_key: { type: "string", minLength: 1 },
    parent_version: { type: "string", minLength: 1 },
    properties: {
      type: "array",
      items: {
        type: "object",
        required: ["property_name", "property_value"],
        properties: {
          property_name: { type: "string", minLength: 1 },
          property_value: { type: "string" },
        },
      },
    },
    dependencies: {
      type: "array",
      items: {
        type: "object",
        required: ["dependency_name", "dependency_version"],
        properties: {
          dependency_name: { type: "string", minLength: 1 },
          dependency_version: { type: "string", minLength: 1 },
        },
      },
    },
  },
};

/** Shape of the whole release config; type-specific fields are checked per project. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["base_dir", "projects"],
  properties: {
    base_dir: { type: "string", minLength: 1 },
    maven_namespace: { type: "string", format: "uri" },
    remote_git_repo: { type: "string", minLength: 1, default: "origin" },
    tag_progr_suffix: { type: "boolean", default: false },
    tag_progr_suffix_format: { type: "string", pattern: "^0?[0-9]*d$", default: "03d" },
    tag_progr_suffix_format_prefix: { type: "string", default: "-" },
    dependency_match: { type: "string", enum: ["contains", "exact"], default: "contains" },
    maven_home: { type: "string" },
    maven_settings: { type: "string" },
    maven_compile_options: stringList,
    ant_home: { type: "string" },
    ant_target: { type: "string" },
    ant_compile_options: stringList,
    nodejs_home: { type: "string" },
    nodejs_compile_options: stringList,
    command_timeout_seconds: { type: "integer", minimum: 1, default: 600 },
    log_file: { type: "string", minLength: 1, default: "release-handler.log" },
    projects: { type: "array", items: PROJECT_SCHEMA },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: RawReleaseConfig; errors: null }
  | { valid: false; config: null; errors: string };

/**
 * Validate a parsed config against the config schema. Missing optional keys
 * are filled with their defaults on the returned object.
 */
export function validateConfig(data: unknown): ConfigValidationResult {
  const ajv = createAjv();
  const validate = ajv.compile<RawReleaseConfig>(CONFIG_SCHEMA);
  if (validate(data)) {
    return { valid: true, config: data, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors, { dataVar: "config" }) };
}
