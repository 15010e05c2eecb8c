#!/usr/bin/env node

import { Command } from "commander";
import { createConfirm } from "./commands/confirm.js";
import { EXIT } from "./commands/exit-codes.js";
import {
  formatSummary,
  runGitInfoReport,
  runRelease,
  summarize,
  type ReleaseResult,
  type ReportResult,
} from "./commands/release.js";
import { DEFAULT_CONFIG_FILE } from "./config/loader.js";
import type { OutputFormat } from "./core/logger.js";
import type { WorkflowName } from "./core/state-machine.js";

type SharedOpts = {
  config: string;
  env?: string;
  yes?: boolean;
  format: string;
};

const SUBCOMMANDS: { name: string; workflow: WorkflowName; description: string }[] = [
  { name: "update_versions", workflow: "update_versions", description: "Clone, rewrite descriptor versions and commit" },
  { name: "create_tags", workflow: "create_tags", description: "Create the release tag and push it" },
  { name: "update_tags", workflow: "create_tags", description: "Alias of create_tags" },
  { name: "push_tags", workflow: "push_tags", description: "Push existing local release tags" },
  { name: "delete_tags", workflow: "delete_tags", description: "Delete local release tags" },
  { name: "delete_tags_remotely", workflow: "delete_tags_remotely", description: "Delete release tags on the remote and locally" },
  { name: "commit", workflow: "commit", description: "Commit working-tree changes with the release message" },
  { name: "remove_last_commit", workflow: "remove_last_commit", description: "Undo the last commit unless it is pushed" },
  { name: "reset", workflow: "reset", description: "Reset working copies with each project's reset_type" },
  { name: "checkout_and_pull", workflow: "checkout_and_pull", description: "Check out the configured branch and pull" },
  { name: "compile_check", workflow: "compile_check", description: "Build each project with its build tool" },
  { name: "push_changes", workflow: "push_changes", description: "Push local-only commits" },
];

function parseFormat(value: string): OutputFormat {
  if (value === "human" || value === "jsonl") return value;
  process.stderr.write(`Unknown format '${value}' (expected human|jsonl)\n`);
  process.exit(EXIT.INVALID_ARGS);
}

function fail(format: OutputFormat, error: string, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error }) + "\n");
  } else {
    console.error(error);
  }
  process.exit(exitCode);
}

function withSharedOptions(cmd: Command): Command {
  return cmd
    .argument("[project]", "Restrict the run to the project with this name")
    .option("--config <path>", "Path to the configuration file", DEFAULT_CONFIG_FILE)
    .option("--env <name>", "Overlay <config>.<name>.yaml on the configuration")
    .option("-y, --yes", "Answer yes to every confirmation")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

const program = new Command();

program
  .name("relctl")
  .description("Synchronize versions, tags and commits across a fleet of repositories")
  .version("0.1.0")
  .showHelpAfterError()
  // subcommands inherit this: help and version exit cleanly, every other parse error is a usage error
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

for (const sub of SUBCOMMANDS) {
  const cmd = withSharedOptions(program.command(sub.name).description(sub.description));
  if (sub.workflow === "push_changes") cmd.option("--compile", "Build each project and push only when it compiles");

  cmd.action(async (project: string | undefined, opts: SharedOpts & { compile?: boolean }) => {
    const format = parseFormat(opts.format);
    const prompt = createConfirm({ assumeYes: opts.yes ?? false });
    let res: ReleaseResult;
    try {
      res = await runRelease({
        workflow: sub.workflow,
        project,
        configPath: opts.config,
        envName: opts.env,
        format,
        compile: opts.compile,
        confirm: prompt.confirm,
      });
    } finally {
      prompt.close();
    }
    if (!res.ok) fail(format, res.error, res.exitCode);

    if (format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", workflow: sub.name, summary: summarize(res.outcomes) }) + "\n");
    } else {
      console.log(formatSummary(sub.name, res.outcomes));
    }
  });
}

withSharedOptions(program.command("extract_git_info_to_excel").description("Write a CSV report of each project's git state"))
  .option("--out <path>", "Report file (default git-info-<timestamp>.csv)")
  .action(async (project: string | undefined, opts: SharedOpts & { out?: string }) => {
    const format = parseFormat(opts.format);
    const prompt = createConfirm({ assumeYes: opts.yes ?? false });
    let res: ReportResult;
    try {
      res = await runGitInfoReport({
        project,
        configPath: opts.config,
        envName: opts.env,
        format,
        out: opts.out,
        confirm: prompt.confirm,
      });
    } finally {
      prompt.close();
    }
    if (!res.ok) fail(format, res.error, res.exitCode);

    if (format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", file: res.file, rows: res.rows }) + "\n");
    } else {
      console.log(`Wrote ${res.rows} row(s) to ${res.file}`);
    }
  });

if (process.argv.length <= 2) {
  program.outputHelp({ error: true });
  process.exit(EXIT.INVALID_ARGS);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
