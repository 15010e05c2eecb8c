import fs from "node:fs";
import { CheckRepoActions, type SimpleGit } from "simple-git";
import type { GitOptions, WorkingTreeChanges } from "../types/git.js";
import { createGit, outputLines, wrapGitOperation } from "./client.js";

/**
 * Classify `git status --porcelain` lines. A path is modified for `M`/`MM`,
 * added for `A`/`AM` and deleted for `D`/`DM`; every other status code
 * (untracked, renamed, copied, unmerged, ...) is left out.
 */
export function classifyPorcelain(lines: readonly string[]): WorkingTreeChanges {
  const changes: WorkingTreeChanges = { modified: [], added: [], deleted: [] };
  for (const line of lines) {
    if (line.length < 4) continue;
    const status = line.slice(0, 2).trim();
    let file = line.slice(3).trim();
    if (file.length > 1 && file.startsWith('"') && file.endsWith('"')) file = file.slice(1, -1);

    if (status === "M" || status === "MM") changes.modified.push(file);
    else if (status === "A" || status === "AM") changes.added.push(file);
    else if (status === "D" || status === "DM") changes.deleted.push(file);
  }
  return changes;
}

/** Tag names advertised by `git ls-remote --tags`, peeled `^{}` entries folded in. */
export function parseRemoteTags(output: string): string[] {
  const tags = new Set<string>();
  for (const line of outputLines(output)) {
    const ref = line.split(/\s+/)[1];
    if (!ref || !ref.startsWith("refs/tags/")) continue;
    tags.add(ref.slice("refs/tags/".length).replace(/\^\{\}$/, ""));
  }
  return [...tags];
}

/**
 * Read-only queries against one local clone. Queries that do not apply
 * (no tags, no remote-tracking branches) answer false or empty.
 */
export class GitInspector {
  private client: SimpleGit | null = null;
  private readonly repoPath: string;
  private readonly remote: string;
  private readonly timeoutMs: number | undefined;

  constructor(repoPath: string, opts: GitOptions) {
    this.repoPath = repoPath;
    this.remote = opts.remote;
    this.timeoutMs = opts.timeoutMs;
  }

  private get git(): SimpleGit {
    this.client ??= createGit(this.repoPath, this.timeoutMs);
    return this.client;
  }

  /** The bound path exists and is the root of a working tree. */
  async isRepository(): Promise<boolean> {
    if (!fs.existsSync(this.repoPath)) return false;
    return wrapGitOperation(
      () => this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT),
      `Failed to inspect ${this.repoPath}`,
    );
  }

  /** HEAD commit hash. */
  async currentCommit(): Promise<string> {
    return wrapGitOperation(async () => (await this.git.revparse(["HEAD"])).trim(), "Failed to read HEAD");
  }

  /** Current branch name, null on a detached HEAD. */
  async currentBranch(): Promise<string | null> {
    return wrapGitOperation(async () => {
      const name = (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
      return name === "HEAD" ? null : name;
    }, "Failed to read current branch");
  }

  async isTagCommitted(tag: string): Promise<boolean> {
    return wrapGitOperation(async () => {
      const out = await this.git.raw(["tag", "--list", tag]);
      return outputLines(out).includes(tag);
    }, `Failed to look up tag ${tag}`);
  }

  /** Local tags starting with `prefix`, highest version first. */
  async listTags(prefix = ""): Promise<string[]> {
    return wrapGitOperation(async () => {
      const out = await this.git.raw(["tag", "--list", `${prefix}*`, "--sort=-v:refname"]);
      return outputLines(out);
    }, `Failed to list tags ${prefix}*`);
  }

  async latestTag(prefix = ""): Promise<string | null> {
    const tags = await this.listTags(prefix);
    return tags[0] ?? null;
  }

  /** Tag present in the remote's advertised refs (queried live, not from local refs). */
  async isTagPushed(tag: string): Promise<boolean> {
    return wrapGitOperation(async () => {
      const out = await this.git.listRemote(["--tags", this.remote]);
      return parseRemoteTags(out).includes(tag);
    }, `Failed to list tags on ${this.remote}`);
  }

  /** Branch advertised by the remote (queried live). */
  async isBranchOnRemote(branch: string): Promise<boolean> {
    return wrapGitOperation(async () => {
      const out = await this.git.listRemote(["--heads", this.remote, branch]);
      return outputLines(out).some((line) => line.endsWith(`refs/heads/${branch}`));
    }, `Failed to list branches on ${this.remote}`);
  }

  /** Commit contained in some remote-tracking branch. */
  async isCommitOnRemote(hash: string): Promise<boolean> {
    return wrapGitOperation(async () => {
      const out = await this.git.raw(["branch", "-r", "--contains", hash]);
      return outputLines(out).length > 0;
    }, `Failed to check remote branches for ${hash}`);
  }

  async isLastCommitPushed(): Promise<boolean> {
    return this.isCommitOnRemote(await this.currentCommit());
  }

  /** Commits reachable from HEAD that no remote-tracking branch of the remote contains. */
  async aheadCount(): Promise<number> {
    return wrapGitOperation(async () => {
      const out = await this.git.raw(["rev-list", "--count", "HEAD", "--not", `--remotes=${this.remote}`]);
      const count = Number.parseInt(out.trim(), 10);
      return Number.isNaN(count) ? 0 : count;
    }, "Failed to count unpushed commits");
  }

  private async fetch(): Promise<void> {
    await wrapGitOperation(() => this.git.fetch(this.remote), `Failed to fetch ${this.remote}`);
  }

  /** Fetch from the remote, then report whether local commits are missing there. */
  async hasUnpushedCommits(): Promise<boolean> {
    await this.fetch();
    return (await this.aheadCount()) > 0;
  }

  async listWorkingTreeChanges(): Promise<WorkingTreeChanges> {
    return wrapGitOperation(async () => {
      const out = await this.git.raw(["status", "--porcelain"]);
      return classifyPorcelain(out.split(/\r?\n/));
    }, "Failed to read working tree status");
  }
}
