/** Git state types: derived on demand, never persisted. */
export type WorkingTreeChanges = {
  modified: string[];
  added: string[];
  deleted: string[];
};

export type ResetMode = "soft" | "mixed" | "hard";

export type TagScope = { local: boolean; remote: boolean };

export type GitOptions = {
  /** Remote name used for ls-remote, fetch and push. */
  remote: string;
  /** Upper bound for a single git command; unset means no limit. */
  timeoutMs?: number;
};

export function hasChanges(changes: WorkingTreeChanges): boolean {
  return changes.modified.length + changes.added.length + changes.deleted.length > 0;
}
