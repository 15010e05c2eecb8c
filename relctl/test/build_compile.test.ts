import { describe, expect, it, vi } from "vitest";
import path from "node:path";
import { CommandBuildRunner, buildCommandFor, type ExecFn } from "../src/build/compile.js";
import { BuildError, CommandTimeoutError } from "../src/types/errors.js";
import { projectSpec, releaseConfig } from "./fakes.js";

describe("buildCommandFor", () => {
  it("runs tools from PATH when no home is configured", () => {
    const config = releaseConfig();
    expect(buildCommandFor(projectSpec({ type: "Maven" }), config, "linux")).toEqual({
      command: "mvn",
      args: ["clean", "compile"],
    });
    expect(buildCommandFor(projectSpec({ type: "Ant" }), config, "linux")).toEqual({ command: "ant", args: [] });
    expect(buildCommandFor(projectSpec({ type: "Angular" }), config, "linux")).toEqual({
      command: "ng",
      args: ["build"],
    });
  });

  it("uses configured homes, options and settings", () => {
    const config = releaseConfig({
      maven_home: "/opt/maven",
      maven_settings: "/opt/maven/settings.xml",
      maven_compile_options: ["-DskipTests"],
      ant_home: "/opt/ant",
      ant_target: "compile",
      ant_compile_options: ["-q"],
      nodejs_home: "/opt/node/bin",
      nodejs_compile_options: ["--configuration", "production"],
    });
    expect(buildCommandFor(projectSpec({ type: "Maven" }), config, "linux")).toEqual({
      command: path.join("/opt/maven", "bin", "mvn"),
      args: ["clean", "compile", "-DskipTests", "--settings", "/opt/maven/settings.xml"],
    });
    expect(buildCommandFor(projectSpec({ type: "Ant" }), config, "linux")).toEqual({
      command: path.join("/opt/ant", "bin", "ant"),
      args: ["compile", "-q"],
    });
    expect(buildCommandFor(projectSpec({ type: "Angular" }), config, "linux")).toEqual({
      command: path.join("/opt/node/bin", "ng"),
      args: ["build", "--configuration", "production"],
    });
  });

  it("uses the Windows launchers on win32", () => {
    const config = releaseConfig();
    expect(buildCommandFor(projectSpec({ type: "Maven" }), config, "win32").command).toBe("mvn.cmd");
    expect(buildCommandFor(projectSpec({ type: "Ant" }), config, "win32").command).toBe("ant.bat");
    expect(buildCommandFor(projectSpec({ type: "Angular" }), config, "win32").command).toBe("ng.cmd");
  });
});

describe("CommandBuildRunner", () => {
  const config = releaseConfig({ command_timeout_seconds: 30 });

  it("runs the build in the project directory with a timeout", async () => {
    const exec = vi.fn<ExecFn>(async () => ({ stdout: "BUILD SUCCESS\n", stderr: "" }));
    const runner = new CommandBuildRunner(config, exec, "linux");

    const result = await runner.compile(projectSpec({ type: "Maven", project_path: "/work/billing" }));
    expect(result).toEqual({ ok: true, output: "BUILD SUCCESS" });

    const [command, args, opts] = exec.mock.calls[0];
    expect(command).toBe("mvn");
    expect(args).toEqual(["clean", "compile"]);
    expect(opts).toMatchObject({ cwd: "/work/billing", timeout: 30000, shell: false });
  });

  it("passes the caller's environment to the build tool", async () => {
    vi.stubEnv("MAVEN_OPTS", "-Xmx2g");
    try {
      const exec = vi.fn<ExecFn>(async () => ({ stdout: "", stderr: "" }));
      await new CommandBuildRunner(config, exec, "linux").compile(projectSpec({ type: "Maven" }));
      expect(exec.mock.calls[0][2].env.MAVEN_OPTS).toBe("-Xmx2g");
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it("starts launchers through a shell on win32", async () => {
    const exec = vi.fn<ExecFn>(async () => ({ stdout: "", stderr: "" }));
    await new CommandBuildRunner(config, exec, "win32").compile(projectSpec({ type: "Angular" }));
    expect(exec.mock.calls[0][2].shell).toBe(true);
  });

  it("treats Ant's BUILD FAILED banner as a failure even on exit code 0", async () => {
    const exec = vi.fn<ExecFn>(async () => ({ stdout: "compile:\nBUILD FAILED\n", stderr: "" }));
    const result = await new CommandBuildRunner(config, exec, "linux").compile(projectSpec({ type: "Ant" }));
    expect(result).toEqual({ ok: false, output: "compile:\nBUILD FAILED" });
  });

  it("reports a non-zero exit as a failed build with its output", async () => {
    const exec = vi.fn<ExecFn>(async () => {
      throw Object.assign(new Error("Command failed"), { code: 1, stdout: "[ERROR] x\n", stderr: "boom\n" });
    });
    const result = await new CommandBuildRunner(config, exec, "linux").compile(projectSpec({ type: "Maven" }));
    expect(result).toEqual({ ok: false, output: "[ERROR] x\nboom" });
  });

  it("raises CommandTimeoutError when the tool is killed", async () => {
    const exec = vi.fn<ExecFn>(async () => {
      throw Object.assign(new Error("killed"), { killed: true, signal: "SIGTERM" });
    });
    const attempt = new CommandBuildRunner(config, exec, "linux").compile(projectSpec({ type: "Ant" }));
    await expect(attempt).rejects.toBeInstanceOf(CommandTimeoutError);
  });

  it("raises BuildError when the tool cannot be started", async () => {
    const exec = vi.fn<ExecFn>(async () => {
      throw Object.assign(new Error("spawn mvn ENOENT"), { code: "ENOENT" });
    });
    const attempt = new CommandBuildRunner(config, exec, "linux").compile(projectSpec({ type: "Maven" }));
    await expect(attempt).rejects.toThrow(new BuildError("Cannot run mvn clean compile: spawn mvn ENOENT"));
  });
});
