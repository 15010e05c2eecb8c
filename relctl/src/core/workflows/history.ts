import { ask, requireRepository, type Workflow } from "./shared.js";

/** Undo the last commit with the project's reset mode, refused once that commit is on the remote. */
export const removeLastCommit: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);

  const pushed = await ctx.inspector(project).isLastCommitPushed();
  progress.to("push_checked");
  if (pushed) {
    progress.to("refused");
    return progress.finish(
      "refused",
      `Reset aborted because the last commit for project ${project.name} was already pushed`,
    );
  }

  const declined = await ask(ctx, progress, `Reset last commit for ${project.name}?`, false);
  if (declined) return declined;

  await ctx.actions(project).reset(project.reset_type, "HEAD~1");
  progress.to("reset_done");
  return progress.finish("done", `Removed last commit for project ${project.name} (--${project.reset_type})`);
};

/** Reset to the last commit. No pushed-history guard: nothing published is rewritten. */
export const resetProject: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);

  const declined = await ask(ctx, progress, `Reset ${project.name} (--${project.reset_type})?`, true);
  if (declined) return declined;

  await ctx.actions(project).reset(project.reset_type);
  progress.to("reset_done");
  return progress.finish("done", `Reset project ${project.name} (--${project.reset_type})`);
};
