import { loadConfig } from "../config/loader.js";
import { CommandBuildRunner } from "../build/compile.js";
import { RunLogger, type Logger, type OutputFormat } from "../core/logger.js";
import type { Confirm, WorkflowContext } from "../core/ports.js";
import { Reconciler } from "../core/reconciler.js";
import type { OutcomeStatus, ProjectOutcome, WorkflowName } from "../core/state-machine.js";
import { rewriteProjectDescriptors } from "../descriptors/index.js";
import { GitExecutor } from "../git/executor.js";
import { GitInspector } from "../git/inspector.js";
import { defaultReportPath, extractGitInfo } from "../report/git-info.js";
import type { ReleaseConfig } from "../types/config.js";
import { ConfigError, errorMessage } from "../types/errors.js";
import type { GitOptions } from "../types/git.js";
import { EXIT } from "./exit-codes.js";

export type CommonOpts = {
  configPath?: string;
  envName?: string;
  project?: string;
  format?: OutputFormat;
  confirm: Confirm;
};

export type ReleaseOpts = CommonOpts & {
  workflow: WorkflowName;
  compile?: boolean;
};

export type ReleaseResult =
  | { ok: true; outcomes: ProjectOutcome[] }
  | { ok: false; error: string; exitCode: number };

export type ReportResult =
  | { ok: true; file: string; rows: number }
  | { ok: false; error: string; exitCode: number };

/** Wire the real git, build and descriptor collaborators around a loaded config. */
export function createContext(
  config: ReleaseConfig,
  opts: { logger: Logger; confirm: Confirm; compile?: boolean },
): WorkflowContext {
  const git: GitOptions = {
    remote: config.remote_git_repo,
    timeoutMs: config.command_timeout_seconds * 1000,
  };
  return {
    config,
    logger: opts.logger,
    confirm: opts.confirm,
    inspector: (project) => new GitInspector(project.project_path, git),
    actions: (project) => new GitExecutor(project.project_path, git),
    builder: new CommandBuildRunner(config),
    rewrite: rewriteProjectDescriptors,
    options: { compile: opts.compile ?? false },
  };
}

function load(opts: CommonOpts): { ok: true; config: ReleaseConfig } | { ok: false; error: string; exitCode: number } {
  try {
    return { ok: true, config: loadConfig(opts.configPath, { envName: opts.envName }) };
  } catch (err: unknown) {
    const exitCode = err instanceof ConfigError ? EXIT.CONFIG_INVALID : EXIT.INVALID_ARGS;
    return { ok: false, error: errorMessage(err), exitCode };
  }
}

/** Load the configuration once and drive one workflow across the selected projects. */
export async function runRelease(opts: ReleaseOpts): Promise<ReleaseResult> {
  const loaded = load(opts);
  if (!loaded.ok) return loaded;

  const logger = new RunLogger({ logFile: loaded.config.log_file, format: opts.format });
  const ctx = createContext(loaded.config, { logger, confirm: opts.confirm, compile: opts.compile });
  const outcomes = await new Reconciler(ctx).run(opts.workflow, opts.project);
  return { ok: true, outcomes };
}

export async function runGitInfoReport(opts: CommonOpts & { out?: string }): Promise<ReportResult> {
  const loaded = load(opts);
  if (!loaded.ok) return loaded;

  const logger = new RunLogger({ logFile: loaded.config.log_file, format: opts.format });
  const ctx = createContext(loaded.config, { logger, confirm: opts.confirm });
  const { file, rows } = await extractGitInfo(ctx, opts.project, opts.out ?? defaultReportPath());
  return { ok: true, file, rows: rows.length };
}

/** Count of outcomes per status, every status present. */
export function summarize(outcomes: readonly ProjectOutcome[]): Record<OutcomeStatus, number> {
  const counts: Record<OutcomeStatus, number> = { done: 0, no_op: 0, refused: 0, declined: 0, skipped: 0, failed: 0 };
  for (const o of outcomes) counts[o.status] += 1;
  return counts;
}

export function formatSummary(workflow: string, outcomes: readonly ProjectOutcome[]): string {
  const counts = summarize(outcomes);
  const parts = Object.entries(counts)
    .filter(([, n]) => n > 0)
    .map(([status, n]) => `${status}=${n}`);
  return `${workflow}: ${outcomes.length} project(s)${parts.length > 0 ? ` (${parts.join(", ")})` : ""}`;
}
