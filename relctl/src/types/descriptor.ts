/** Descriptor rewrite records: what changed in a build file, for logging. */
export type VersionField =
  | "project.version"
  | "parent.version"
  | "property"
  | "dependency"
  | "manifest.version"
  | "manifest.dependency"
  | "ant.property";

export type VersionEdit = {
  file: string;
  field: VersionField;
  /** Property, dependency or key name for fields that carry one. */
  name?: string;
  oldValue: string;
  newValue: string;
};

export type RewriteResult = {
  file: string;
  changed: boolean;
  edits: VersionEdit[];
  /** Configured property names with no matching element in this file. */
  missing: string[];
};

export function describeEdit(edit: VersionEdit): string {
  const label = edit.name ? `${edit.field} ${edit.name}` : edit.field;
  return `${label}: ${edit.oldValue || "(empty)"} -> ${edit.newValue}`;
}
