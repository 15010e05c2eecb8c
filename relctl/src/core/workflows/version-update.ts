import { describeEdit, type RewriteResult } from "../../types/descriptor.js";
import { hasChanges } from "../../types/git.js";
import { ask, commitMessage, describeChanges, requireRepository, type Workflow } from "./shared.js";

/** Configured properties that no visited descriptor declares. */
export function missingEverywhere(results: readonly RewriteResult[]): string[] {
  if (results.length === 0) return [];
  return results
    .map((r) => r.missing)
    .reduce((acc, names) => acc.filter((n) => names.includes(n)));
}

/**
 * Clean clone, checkout, descriptor rewrite, then a confirmed commit.
 * A rewrite that leaves the tree clean ends in `no_changes`.
 */
export const updateVersions: Workflow = async (project, ctx, progress) => {
  const log = (message: string) => ctx.logger.info(message, project.name);

  const declined = await ask(ctx, progress, `Update version for project ${project.name}?`, true);
  if (declined) return declined;

  const actions = ctx.actions(project);
  await actions.clone(project.project_remote_git_url);
  progress.to("cloned");
  log(`Cloned ${project.project_remote_git_url} into ${project.project_path}`);

  await actions.checkout(project.git_branch);
  progress.to("checked_out");

  const results = ctx.rewrite(project, ctx.config);
  for (const result of results) {
    for (const edit of result.edits) log(`${edit.file}: ${describeEdit(edit)}`);
  }
  for (const name of missingEverywhere(results)) {
    ctx.logger.warn(`Property ${name} not found in any descriptor`, project.name);
  }
  progress.to("version_rewritten");

  const changes = await ctx.inspector(project).listWorkingTreeChanges();
  if (!hasChanges(changes)) {
    progress.to("no_changes");
    return progress.finish("no_op", `No changes to commit for project ${project.name}`);
  }
  log(`Changes to commit: ${describeChanges(changes)}`);

  const declinedCommit = await ask(ctx, progress, `Commit changes for project ${project.name}?`, false);
  if (declinedCommit) return declinedCommit;

  await actions.commit(commitMessage(project.version));
  progress.to("committed");
  return progress.finish("done", `Updated project ${project.name} with version ${project.version}`);
};

/** Commit whatever the working tree holds with the release message. */
export const commitChanges: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);

  const changes = await ctx.inspector(project).listWorkingTreeChanges();
  progress.to("tree_checked");
  if (!hasChanges(changes)) {
    progress.to("no_changes");
    return progress.finish("no_op", `No changes to commit for project ${project.name}`);
  }
  ctx.logger.info(`Changes to commit: ${describeChanges(changes)}`, project.name);

  const declined = await ask(ctx, progress, `Commit changes for project ${project.name}?`, false);
  if (declined) return declined;

  await ctx.actions(project).commit(commitMessage(project.version));
  progress.to("committed");
  return progress.finish("done", `Updated project ${project.name} with version ${project.version}`);
};
