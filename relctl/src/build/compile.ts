import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import type { BuildResult, BuildRunner } from "../core/ports.js";
import { redactSensitiveInfo } from "../core/sanitize.js";
import type { ProjectSpec, ReleaseConfig } from "../types/config.js";
import { BuildError, CommandTimeoutError } from "../types/errors.js";

const pExecFile = promisify(execFile);

export type BuildCommand = {
  command: string;
  args: string[];
};

export type ExecOptions = {
  cwd: string;
  timeout: number;
  env: NodeJS.ProcessEnv;
  shell: boolean;
};

export type ExecFn = (command: string, args: string[], opts: ExecOptions) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = async (command, args, opts) => {
  const { stdout, stderr } = await pExecFile(command, args, {
    ...opts,
    encoding: "utf8",
    maxBuffer: 50 * 1024 * 1024,
  });
  return { stdout, stderr };
};

function tool(home: string | undefined, subdir: string | null, name: string): string {
  if (!home) return name;
  return subdir ? path.join(home, subdir, name) : path.join(home, name);
}

/** Build tool invocation for a project; tools are taken from PATH when no home is configured. */
export function buildCommandFor(
  project: ProjectSpec,
  config: ReleaseConfig,
  platform: NodeJS.Platform = process.platform,
): BuildCommand {
  const windows = platform === "win32";
  switch (project.type) {
    case "Maven": {
      const args = ["clean", "compile", ...config.maven_compile_options];
      if (config.maven_settings) args.push("--settings", config.maven_settings);
      return { command: tool(config.maven_home, "bin", windows ? "mvn.cmd" : "mvn"), args };
    }
    case "Ant": {
      const args = config.ant_target ? [config.ant_target] : [];
      return {
        command: tool(config.ant_home, "bin", windows ? "ant.bat" : "ant"),
        args: [...args, ...config.ant_compile_options],
      };
    }
    case "Angular":
      return {
        command: tool(config.nodejs_home, null, windows ? "ng.cmd" : "ng"),
        args: ["build", ...config.nodejs_compile_options],
      };
  }
}

type ExecFailure = {
  code: unknown;
  killed: boolean;
  stdout: string;
  stderr: string;
  message: string;
};

function execFailure(err: unknown): ExecFailure {
  if (typeof err !== "object" || err === null) {
    return { code: undefined, killed: false, stdout: "", stderr: "", message: String(err) };
  }
  return {
    code: "code" in err ? err.code : undefined,
    killed: "killed" in err && err.killed === true,
    stdout: "stdout" in err && typeof err.stdout === "string" ? err.stdout : "",
    stderr: "stderr" in err && typeof err.stderr === "string" ? err.stderr : "",
    message: err instanceof Error ? err.message : String(err),
  };
}

function joinOutput(stdout: string, stderr: string): string {
  return [stdout.trim(), stderr.trim()].filter((s) => s.length > 0).join("\n");
}

/**
 * Compiles projects with their native build tool. A non-zero exit (or Ant's
 * `BUILD FAILED` banner) is a failed build, not an error; a tool that cannot
 * be started raises BuildError and a run past the timeout CommandTimeoutError.
 */
export class CommandBuildRunner implements BuildRunner {
  private readonly timeoutMs: number;

  constructor(
    private readonly config: ReleaseConfig,
    private readonly exec: ExecFn = defaultExec,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {
    this.timeoutMs = config.command_timeout_seconds * 1000;
  }

  async compile(project: ProjectSpec): Promise<BuildResult> {
    const { command, args } = buildCommandFor(project, this.config, this.platform);
    const display = redactSensitiveInfo([command, ...args].join(" "));
    try {
      const { stdout, stderr } = await this.exec(command, args, {
        cwd: project.project_path,
        timeout: this.timeoutMs,
        // build tools read MAVEN_OPTS, ANT_OPTS, proxy settings and the like
        env: process.env,
        // .cmd/.bat launchers only start through a shell on Windows
        shell: this.platform === "win32",
      });
      const output = joinOutput(stdout, stderr);
      const ok = !(project.type === "Ant" && output.includes("BUILD FAILED"));
      return { ok, output };
    } catch (err: unknown) {
      const failure = execFailure(err);
      if (failure.killed) throw new CommandTimeoutError(display, this.timeoutMs);
      if (typeof failure.code === "number") {
        return { ok: false, output: joinOutput(failure.stdout, failure.stderr) };
      }
      throw new BuildError(`Cannot run ${display}: ${failure.message}`, joinOutput(failure.stdout, failure.stderr));
    }
  }
}
