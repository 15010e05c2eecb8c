import type { ProjectSpec, ReleaseConfig } from "../types/config.js";
import type { RewriteResult } from "../types/descriptor.js";
import type { ResetMode, TagScope, WorkingTreeChanges } from "../types/git.js";
import type { Logger } from "./logger.js";

/** Read-only repository queries the workflows depend on (implemented by GitInspector). */
export interface RepoInspector {
  isRepository(): Promise<boolean>;
  currentCommit(): Promise<string>;
  currentBranch(): Promise<string | null>;
  isTagCommitted(tag: string): Promise<boolean>;
  listTags(prefix?: string): Promise<string[]>;
  latestTag(prefix?: string): Promise<string | null>;
  isTagPushed(tag: string): Promise<boolean>;
  isBranchOnRemote(branch: string): Promise<boolean>;
  isLastCommitPushed(): Promise<boolean>;
  aheadCount(): Promise<number>;
  hasUnpushedCommits(): Promise<boolean>;
  listWorkingTreeChanges(): Promise<WorkingTreeChanges>;
}

/** Mutating repository operations (implemented by GitExecutor). */
export interface RepoActions {
  clone(url: string): Promise<void>;
  checkout(branch: string): Promise<void>;
  pull(): Promise<void>;
  commit(message: string): Promise<void>;
  createTag(tag: string): Promise<void>;
  deleteTag(tag: string, scope: TagScope): Promise<void>;
  pushCommits(): Promise<void>;
  pushTag(tag: string): Promise<void>;
  reset(mode: ResetMode, target?: string): Promise<void>;
}

/** Asks the operator a yes/no question; resolves to the answer. */
export type Confirm = (question: string, defaultAnswer: boolean) => Promise<boolean>;

export type BuildResult = {
  ok: boolean;
  /** Captured stdout and stderr. */
  output: string;
};

export interface BuildRunner {
  compile(project: ProjectSpec): Promise<BuildResult>;
}

export type DescriptorRewriter = (project: ProjectSpec, config: ReleaseConfig) => RewriteResult[];

export type WorkflowOptions = {
  /** Gate push_changes on a successful build. */
  compile: boolean;
};

/** Everything a workflow may touch, bound once per invocation. */
export type WorkflowContext = {
  config: ReleaseConfig;
  logger: Logger;
  confirm: Confirm;
  inspector: (project: ProjectSpec) => RepoInspector;
  actions: (project: ProjectSpec) => RepoActions;
  builder: BuildRunner;
  rewrite: DescriptorRewriter;
  options: WorkflowOptions;
};
