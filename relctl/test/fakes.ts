import type { Logger, LogLevel } from "../src/core/logger.js";
import type { BuildResult, BuildRunner, RepoActions, RepoInspector, WorkflowContext } from "../src/core/ports.js";
import type { ProjectSpec, ReleaseConfig } from "../src/types/config.js";
import type { RewriteResult } from "../src/types/descriptor.js";
import type { ResetMode, TagScope, WorkingTreeChanges } from "../src/types/git.js";

/** In-memory stand-in for one local clone and its remote. */
export type FakeRepo = {
  exists: boolean;
  localTags: string[];
  remoteTags: string[];
  remoteBranches: string[];
  changes: WorkingTreeChanges;
  headPushed: boolean;
  ahead: number;
  calls: string[];
};

export function fakeRepo(overrides: Partial<FakeRepo> = {}): FakeRepo {
  return {
    exists: true,
    localTags: [],
    remoteTags: [],
    remoteBranches: ["main"],
    changes: { modified: [], added: [], deleted: [] },
    headPushed: false,
    ahead: 0,
    calls: [],
    ...overrides,
  };
}

export class FakeInspector implements RepoInspector {
  constructor(private readonly repo: FakeRepo) {}

  async isRepository(): Promise<boolean> {
    return this.repo.exists;
  }

  async currentCommit(): Promise<string> {
    return "0123abcd";
  }

  async currentBranch(): Promise<string | null> {
    return "main";
  }

  async isTagCommitted(tag: string): Promise<boolean> {
    return this.repo.localTags.includes(tag);
  }

  async listTags(prefix = ""): Promise<string[]> {
    return this.repo.localTags.filter((t) => t.startsWith(prefix)).sort((a, b) => b.localeCompare(a));
  }

  async latestTag(prefix = ""): Promise<string | null> {
    return (await this.listTags(prefix))[0] ?? null;
  }

  async isTagPushed(tag: string): Promise<boolean> {
    return this.repo.remoteTags.includes(tag);
  }

  async isBranchOnRemote(branch: string): Promise<boolean> {
    return this.repo.remoteBranches.includes(branch);
  }

  async isLastCommitPushed(): Promise<boolean> {
    return this.repo.headPushed;
  }

  async aheadCount(): Promise<number> {
    return this.repo.ahead;
  }

  async hasUnpushedCommits(): Promise<boolean> {
    this.repo.calls.push("fetch");
    return this.repo.ahead > 0;
  }

  async listWorkingTreeChanges(): Promise<WorkingTreeChanges> {
    return this.repo.changes;
  }
}

export class FakeActions implements RepoActions {
  constructor(private readonly repo: FakeRepo) {}

  async clone(url: string): Promise<void> {
    this.repo.calls.push(`clone ${url}`);
    this.repo.exists = true;
  }

  async checkout(branch: string): Promise<void> {
    this.repo.calls.push(`checkout ${branch}`);
  }

  async pull(): Promise<void> {
    this.repo.calls.push("pull");
  }

  async commit(message: string): Promise<void> {
    this.repo.calls.push(`commit ${message}`);
    this.repo.changes = { modified: [], added: [], deleted: [] };
    this.repo.ahead += 1;
  }

  async createTag(tag: string): Promise<void> {
    this.repo.calls.push(`createTag ${tag}`);
    this.repo.localTags.push(tag);
  }

  async deleteTag(tag: string, scope: TagScope): Promise<void> {
    this.repo.calls.push(`deleteTag ${tag} remote=${scope.remote} local=${scope.local}`);
    if (scope.remote) this.repo.remoteTags = this.repo.remoteTags.filter((t) => t !== tag);
    if (scope.local) this.repo.localTags = this.repo.localTags.filter((t) => t !== tag);
  }

  async pushCommits(): Promise<void> {
    this.repo.calls.push("pushCommits");
    this.repo.ahead = 0;
  }

  async pushTag(tag: string): Promise<void> {
    this.repo.calls.push(`pushTag ${tag}`);
    this.repo.remoteTags.push(tag);
  }

  async reset(mode: ResetMode, target?: string): Promise<void> {
    this.repo.calls.push(target ? `reset ${mode} ${target}` : `reset ${mode}`);
  }
}

export type LogEntry = { level: LogLevel; message: string; project?: string };

export class MemoryLogger implements Logger {
  readonly entries: LogEntry[] = [];

  info(message: string, project?: string): void {
    this.entries.push({ level: "info", message, project });
  }

  warn(message: string, project?: string): void {
    this.entries.push({ level: "warn", message, project });
  }

  error(message: string, project?: string): void {
    this.entries.push({ level: "error", message, project });
  }
}

export class FakeBuilder implements BuildRunner {
  readonly built: string[] = [];

  constructor(private readonly result: BuildResult = { ok: true, output: "" }) {}

  async compile(project: ProjectSpec): Promise<BuildResult> {
    this.built.push(project.name);
    return this.result;
  }
}

export function projectSpec(overrides: Partial<ProjectSpec> = {}): ProjectSpec {
  const name = overrides.name ?? "app";
  return {
    name,
    project_path: `/work/${name}`,
    project_remote_git_url: `https://git.example.com/${name}.git`,
    git_branch: "main",
    type: "Ant",
    version: "2.0.0",
    tag: "rel-2.0.0",
    reset_type: "mixed",
    skip: false,
    version_file: "build.properties",
    ...overrides,
  };
}

export function releaseConfig(overrides: Partial<ReleaseConfig> = {}): ReleaseConfig {
  return {
    base_dir: "/work",
    remote_git_repo: "origin",
    tag_progr_suffix: false,
    tag_progr_suffix_format: "03d",
    tag_progr_suffix_format_prefix: "-",
    dependency_match: "contains",
    maven_compile_options: [],
    ant_compile_options: [],
    nodejs_compile_options: [],
    command_timeout_seconds: 600,
    log_file: "/work/release.log",
    projects: [projectSpec()],
    ...overrides,
  };
}

export type FakeContext = WorkflowContext & { logger: MemoryLogger; questions: string[] };

/**
 * Workflow context over fake repositories keyed by project name. `answer`
 * decides every confirmation; the default says yes to all of them.
 */
export function fakeContext(opts: {
  config: ReleaseConfig;
  repos: Record<string, FakeRepo>;
  answer?: (question: string, defaultAnswer: boolean) => boolean;
  builder?: BuildRunner;
  rewrite?: (project: ProjectSpec, config: ReleaseConfig) => RewriteResult[];
  compile?: boolean;
}): FakeContext {
  const questions: string[] = [];
  const repoFor = (project: ProjectSpec): FakeRepo => {
    const repo = opts.repos[project.name];
    if (!repo) throw new Error(`no fake repository for ${project.name}`);
    return repo;
  };
  const answer = opts.answer ?? (() => true);
  return {
    config: opts.config,
    logger: new MemoryLogger(),
    questions,
    confirm: async (question, defaultAnswer) => {
      questions.push(question);
      return answer(question, defaultAnswer);
    },
    inspector: (project) => new FakeInspector(repoFor(project)),
    actions: (project) => new FakeActions(repoFor(project)),
    builder: opts.builder ?? new FakeBuilder(),
    rewrite: opts.rewrite ?? (() => []),
    options: { compile: opts.compile ?? false },
  };
}
