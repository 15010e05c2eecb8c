import type { ProjectSpec, ReleaseConfig } from "../types/config.js";
import type { RewriteResult } from "../types/descriptor.js";
import { ConfigError } from "../types/errors.js";
import { rewriteAngularManifest } from "./angular.js";
import { rewriteAntProperty } from "./ant.js";
import { rewriteMavenProject, type PomTarget } from "./pom.js";

export { rewriteAngularManifest, rewriteManifestText } from "./angular.js";
export { rewriteAntProperty, rewritePropertyText } from "./ant.js";
export { dependencyMatches, rewriteMavenProject, rewritePom, rewritePomText, type PomTarget } from "./pom.js";

function required<T>(value: T | undefined, field: string, project: ProjectSpec): T {
  if (value === undefined) {
    throw new ConfigError(`Project '${project.name}' of type ${project.type} requires '${field}'`);
  }
  return value;
}

/** POM rewrite target for a Maven project; missing Maven fields are a ConfigError. */
export function pomTargetFor(project: ProjectSpec, config: ReleaseConfig): PomTarget {
  if (!config.maven_namespace) {
    throw new ConfigError(`Project '${project.name}' of type Maven requires top-level 'maven_namespace'`);
  }
  return {
    namespace: config.maven_namespace,
    version: project.version,
    parentVersion: required(project.parent_version, "parent_version", project),
    properties: required(project.properties, "properties", project),
    dependencies: required(project.dependencies, "dependencies", project),
    dependencyMatch: config.dependency_match,
  };
}

/**
 * Rewrite the build descriptors of one project according to its type.
 * Returns one result per descriptor file visited.
 */
export function rewriteProjectDescriptors(project: ProjectSpec, config: ReleaseConfig): RewriteResult[] {
  switch (project.type) {
    case "Maven":
      return rewriteMavenProject(project.project_path, pomTargetFor(project, config));
    case "Ant":
      return [
        rewriteAntProperty(
          project.project_path,
          required(project.version_file, "version_file", project),
          project.version_key ?? "version",
          project.version,
        ),
      ];
    case "Angular":
      return [
        rewriteAngularManifest(
          project.project_path,
          required(project.version_file, "version_file", project),
          project.version,
          project.dependencies ?? [],
        ),
      ];
  }
}
