import type { ProjectSpec } from "../types/config.js";
import { errorMessage } from "../types/errors.js";
import type { Logger } from "./logger.js";
import type { WorkflowContext } from "./ports.js";
import { WorkflowProgress, type OutcomeStatus, type ProjectOutcome, type WorkflowName } from "./state-machine.js";
import { WORKFLOW_HANDLERS, type Workflow } from "./workflows/index.js";
import { skipMessage } from "./workflows/shared.js";

/**
 * Projects a run applies to, in configuration order. A filter naming no
 * configured project selects nothing and is reported.
 */
export function selectProjects(
  projects: readonly ProjectSpec[],
  filter: string | undefined,
  logger: Logger,
): ProjectSpec[] {
  if (!filter) return [...projects];
  const selected = projects.filter((p) => p.name === filter);
  if (selected.length === 0) logger.warn(`No project named '${filter}' in configuration`);
  return selected;
}

const LEVEL: Record<OutcomeStatus, keyof Logger> = {
  done: "info",
  no_op: "info",
  refused: "info",
  skipped: "info",
  declined: "warn",
  failed: "error",
};

/**
 * Drives one workflow across the configured projects, strictly in order.
 * Each project is isolated: an error ends that project's run as `failed`
 * and the loop moves on.
 */
export class Reconciler {
  private readonly ctx: WorkflowContext;
  private readonly handlers: Record<WorkflowName, Workflow>;

  constructor(ctx: WorkflowContext, handlers: Record<WorkflowName, Workflow> = WORKFLOW_HANDLERS) {
    this.ctx = ctx;
    this.handlers = handlers;
  }

  async run(workflow: WorkflowName, filter?: string): Promise<ProjectOutcome[]> {
    const outcomes: ProjectOutcome[] = [];
    for (const project of selectProjects(this.ctx.config.projects, filter, this.ctx.logger)) {
      const outcome = await this.runProject(workflow, project);
      this.ctx.logger[LEVEL[outcome.status]](outcome.message, project.name);
      outcomes.push(outcome);
    }
    return outcomes;
  }

  private async runProject(workflow: WorkflowName, project: ProjectSpec): Promise<ProjectOutcome> {
    const progress = new WorkflowProgress(workflow, project.name);
    if (project.skip) {
      return progress.skip(skipMessage(project.name));
    }
    try {
      return await this.handlers[workflow](project, this.ctx, progress);
    } catch (err: unknown) {
      return progress.fail(`${workflow} failed for project ${project.name}: ${errorMessage(err)}`);
    }
  }
}
