import { tagSuffixPolicy, type ProjectSpec, type ReleaseConfig } from "../../types/config.js";
import type { RepoInspector } from "../ports.js";
import { latestProgressiveTag, nextProgressiveTag } from "../tag-suffix.js";
import { ask, requireRepository, type Workflow } from "./shared.js";

/** Tag to create: the configured tag, plus the next free suffix when progressive tagging is on. */
export async function tagToCreate(project: ProjectSpec, config: ReleaseConfig, inspector: RepoInspector): Promise<string> {
  const policy = tagSuffixPolicy(config);
  if (!policy) return project.tag;
  return nextProgressiveTag(project.tag, await inspector.listTags(project.tag), policy);
}

/** Tag an existing release carries: the highest suffixed tag when progressive tagging is on. */
export async function existingTag(project: ProjectSpec, config: ReleaseConfig, inspector: RepoInspector): Promise<string> {
  const policy = tagSuffixPolicy(config);
  if (!policy) return project.tag;
  return latestProgressiveTag(project.tag, await inspector.listTags(project.tag), policy) ?? project.tag;
}

/**
 * Clean clone, tag the branch head unless the tag exists, push it unless
 * the remote already has it.
 */
export const createAndPushTag: Workflow = async (project, ctx, progress) => {
  const log = (message: string) => ctx.logger.info(message, project.name);

  const declined = await ask(ctx, progress, `Create tag ${project.tag} for project ${project.name}?`, true);
  if (declined) return declined;

  const actions = ctx.actions(project);
  await actions.clone(project.project_remote_git_url);
  progress.to("cloned");
  await actions.checkout(project.git_branch);
  progress.to("checked_out");

  const inspector = ctx.inspector(project);
  const tag = await tagToCreate(project, ctx.config, inspector);
  progress.to("tag_checked");

  let created = false;
  if (await inspector.isTagCommitted(tag)) {
    progress.to("already_tagged");
    log(`Tag ${tag} of project ${project.name} already committed`);
  } else {
    await actions.createTag(tag);
    created = true;
    progress.to("tag_created");
    log(`Tagged ${project.name} with ${tag}`);
  }

  if (await inspector.isTagPushed(tag)) {
    progress.to("already_pushed");
    return progress.finish(created ? "done" : "no_op", `Tag ${tag} of project ${project.name} is already pushed`);
  }
  await actions.pushTag(tag);
  progress.to("tag_pushed");
  return progress.finish("done", `Pushed tag ${tag} for project ${project.name}`);
};

/** Push an existing local tag unless the remote already advertises it. */
export const pushTag: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);
  const inspector = ctx.inspector(project);
  const tag = await existingTag(project, ctx.config, inspector);

  const declined = await ask(ctx, progress, `Push tag ${tag} for project ${project.name}?`, true);
  if (declined) return declined;
  progress.to("tag_checked");

  if (!(await inspector.isTagCommitted(tag))) {
    progress.to("tag_absent");
    return progress.finish("no_op", `Tag ${tag} does not exist locally for project ${project.name}`);
  }
  if (await inspector.isTagPushed(tag)) {
    progress.to("already_pushed");
    return progress.finish("no_op", `Tag ${tag} of project ${project.name} is already pushed`);
  }
  await ctx.actions(project).pushTag(tag);
  progress.to("tag_pushed");
  return progress.finish("done", `Pushed tag ${tag} for project ${project.name}`);
};

/** Delete the local tag; a tag that is not there is a no-op. */
export const deleteLocalTag: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);
  const inspector = ctx.inspector(project);
  const tag = await existingTag(project, ctx.config, inspector);

  const declined = await ask(ctx, progress, `Delete tag ${tag} for project ${project.name}?`, true);
  if (declined) return declined;
  progress.to("tag_checked");

  if (!(await inspector.isTagCommitted(tag))) {
    progress.to("tag_absent");
    return progress.finish("no_op", `Tag ${tag} does not exist locally for project ${project.name}`);
  }
  await ctx.actions(project).deleteTag(tag, { local: true, remote: false });
  progress.to("tag_deleted");
  return progress.finish("done", `Deleted tag ${tag} for project ${project.name}`);
};

/** Delete the tag on the remote and locally, wherever it exists. */
export const deleteRemoteTag: Workflow = async (project, ctx, progress) => {
  await requireRepository(project, ctx);
  const inspector = ctx.inspector(project);
  const tag = await existingTag(project, ctx.config, inspector);
  const remote = ctx.config.remote_git_repo;

  const declined = await ask(ctx, progress, `Delete tag ${tag} for project ${project.name} on ${remote} and locally?`, true);
  if (declined) return declined;
  progress.to("tag_checked");

  const scope = {
    remote: await inspector.isTagPushed(tag),
    local: await inspector.isTagCommitted(tag),
  };
  if (!scope.remote && !scope.local) {
    progress.to("tag_absent");
    return progress.finish("no_op", `Tag ${tag} exists neither on ${remote} nor locally for project ${project.name}`);
  }
  await ctx.actions(project).deleteTag(tag, scope);
  progress.to("tag_deleted");
  const where = [scope.remote ? remote : null, scope.local ? "local" : null].filter((w) => w !== null).join(", ");
  return progress.finish("done", `Deleted tag ${tag} for project ${project.name} (${where})`);
};
