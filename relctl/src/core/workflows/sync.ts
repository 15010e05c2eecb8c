import type { ProjectSpec } from "../../types/config.js";
import type { BuildResult, WorkflowContext } from "../ports.js";
import { ask, requireRepository, type Workflow } from "./shared.js";

async function build(project: ProjectSpec, ctx: WorkflowContext): Promise<BuildResult> {
  ctx.logger.info(`Compiling project ${project.name} ...`, project.name);
  const result = await ctx.builder.compile(project);
  if (!result.ok && result.output) ctx.logger.error(result.output, project.name);
  return result;
}

/**
 * Check out the configured branch and pull; a missing working copy is cloned
 * first. A branch the remote does not advertise is refused before checkout.
 */
export const checkoutAndPull: Workflow = async (project, ctx, progress) => {
  const declined = await ask(ctx, progress, `Check out and pull project ${project.name}?`, true);
  if (declined) return declined;

  const actions = ctx.actions(project);
  if (!(await ctx.inspector(project).isRepository())) {
    await actions.clone(project.project_remote_git_url);
    progress.to("cloned");
    ctx.logger.info(`Cloned ${project.project_remote_git_url} into ${project.project_path}`, project.name);
  }
  if (!(await ctx.inspector(project).isBranchOnRemote(project.git_branch))) {
    progress.to("refused");
    return progress.finish(
      "refused",
      `Branch ${project.git_branch} not found on ${ctx.config.remote_git_repo} for project ${project.name}`,
    );
  }
  await actions.checkout(project.git_branch);
  progress.to("checked_out");
  await actions.pull();
  progress.to("pulled");
  return progress.finish("done", `Project ${project.name} checked out on ${project.git_branch} and pulled`);
};

export const compileCheck: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);

  const declined = await ask(ctx, progress, `Compile ${project.name}?`, true);
  if (declined) return declined;

  const result = await build(project, ctx);
  if (!result.ok) {
    progress.to("compile_failed");
    return progress.finish("failed", `${project.type} build failed for project ${project.name}`);
  }
  progress.to("compiled");
  return progress.finish("done", `${project.type} project ${project.name} compiled successfully`);
};

/**
 * Fetch, then push local-only commits. With the compile gate on, a failed
 * build stops the push.
 */
export const pushChanges: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);
  const inspector = ctx.inspector(project);

  const unpushed = await inspector.hasUnpushedCommits();
  progress.to("fetched");
  if (!unpushed) {
    progress.to("nothing_to_push");
    return progress.finish("no_op", `No unpushed commits for project ${project.name}`);
  }
  const ahead = await inspector.aheadCount();

  if (ctx.options.compile) {
    const result = await build(project, ctx);
    if (!result.ok) {
      progress.to("compile_failed");
      return progress.finish("failed", `Push aborted: ${project.type} build failed for project ${project.name}`);
    }
    progress.to("compiled");
  }

  const declined = await ask(ctx, progress, `Push committed changes for ${project.name}?`, true);
  if (declined) return declined;

  await ctx.actions(project).pushCommits();
  progress.to("pushed");
  return progress.finish("done", `Pushed ${ahead} commit(s) for project ${project.name}`);
};
