/** Configuration types: one YAML file describes the whole release run. */
export type ProjectType = "Maven" | "Ant" | "Angular";

export type ResetType = "soft" | "mixed" | "hard";

export type DependencyMatch = "contains" | "exact";

export type PropertySpec = {
  property_name: string;
  property_value: string;
};

export type DependencySpec = {
  dependency_name: string;
  dependency_version: string;
};

export type ProjectSpec = {
  name: string;
  project_path: string;
  project_remote_git_url: string;
  git_branch: string;
  type: ProjectType;
  version: string;
  tag: string;
  reset_type: ResetType;
  skip: boolean;
  version_file?: string;
  /** Key rewritten in an Ant property file. */
  version_key?: string;
  parent_version?: string;
  properties?: PropertySpec[];
  dependencies?: DependencySpec[];
};

export type TagSuffixPolicy = {
  format: string;
  prefix: string;
};

export type ReleaseConfig = {
  base_dir: string;
  maven_namespace?: string;
  remote_git_repo: string;
  tag_progr_suffix: boolean;
  tag_progr_suffix_format: string;
  tag_progr_suffix_format_prefix: string;
  dependency_match: DependencyMatch;
  maven_home?: string;
  maven_settings?: string;
  maven_compile_options: string[];
  ant_home?: string;
  ant_target?: string;
  ant_compile_options: string[];
  nodejs_home?: string;
  nodejs_compile_options: string[];
  command_timeout_seconds: number;
  log_file: string;
  projects: ProjectSpec[];
};

/** Returns the progressive suffix policy when the run enables it. */
export function tagSuffixPolicy(config: ReleaseConfig): TagSuffixPolicy | null {
  if (!config.tag_progr_suffix) return null;
  return {
    format: config.tag_progr_suffix_format,
    prefix: config.tag_progr_suffix_format_prefix,
  };
}
