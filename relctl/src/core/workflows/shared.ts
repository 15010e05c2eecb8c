import type { ProjectSpec } from "../../types/config.js";
import { GitError } from "../../types/errors.js";
import type { WorkingTreeChanges } from "../../types/git.js";
import type { WorkflowContext } from "../ports.js";
import type { ProjectOutcome, WorkflowProgress } from "../state-machine.js";

export type Workflow = (project: ProjectSpec, ctx: WorkflowContext, progress: WorkflowProgress) => Promise<ProjectOutcome>;

/** Shared wording for configured skips and declined prompts; only the log level differs. */
export function skipMessage(project: string): string {
  return `Project ${project} skipped`;
}

/**
 * Ask before a mutating step. A "no" moves the run to `declined` and
 * returns the outcome to hand back; a "yes" returns null.
 */
export async function ask(
  ctx: WorkflowContext,
  progress: WorkflowProgress,
  question: string,
  defaultAnswer: boolean,
): Promise<ProjectOutcome | null> {
  if (await ctx.confirm(question, defaultAnswer)) return null;
  progress.to("declined");
  return progress.finish("declined", skipMessage(progress.project));
}

export async function requireRepository(project: ProjectSpec, ctx: WorkflowContext): Promise<void> {
  if (!(await ctx.inspector(project).isRepository())) {
    throw new GitError(`${project.project_path} is not a git working tree; run update_versions or checkout_and_pull first`);
  }
}

export function commitMessage(version: string): string {
  return `Update project with version ${version}`;
}

export function describeChanges(changes: WorkingTreeChanges): string {
  const parts: string[] = [];
  if (changes.modified.length > 0) parts.push(`modified: ${changes.modified.join(", ")}`);
  if (changes.added.length > 0) parts.push(`added: ${changes.added.join(", ")}`);
  if (changes.deleted.length > 0) parts.push(`deleted: ${changes.deleted.join(", ")}`);
  return parts.length > 0 ? parts.join("; ") : "none";
}
