import fs from "node:fs";
import path from "node:path";
import type { SimpleGit } from "simple-git";
import { GitError } from "../types/errors.js";
import type { GitOptions, ResetMode, TagScope } from "../types/git.js";
import { createGit, wrapGitOperation } from "./client.js";

/** Remove a directory tree, clearing read-only bits on the way when the first attempt is refused. */
export function removeTree(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch (err: unknown) {
    makeWritable(dir);
    fs.rmSync(dir, { recursive: true, force: true });
    if (fs.existsSync(dir)) throw err;
  }
}

function makeWritable(target: string): void {
  const stat = fs.lstatSync(target);
  if (stat.isSymbolicLink()) return;
  fs.chmodSync(target, stat.mode | 0o200);
  if (!stat.isDirectory()) return;
  for (const entry of fs.readdirSync(target)) {
    makeWritable(path.join(target, entry));
  }
}

export function isHttpsUrl(url: string): boolean {
  try {
    return new URL(url).protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Mutating git operations on one local clone. Callers check state through
 * GitInspector first; these methods do not re-check.
 */
export class GitExecutor {
  private client: SimpleGit | null = null;
  private readonly repoPath: string;
  private readonly remote: string;
  private readonly timeoutMs: number | undefined;

  constructor(repoPath: string, opts: GitOptions) {
    this.repoPath = repoPath;
    this.remote = opts.remote;
    this.timeoutMs = opts.timeoutMs;
  }

  /** Bound lazily: the directory may not exist until clone() creates it. */
  private get git(): SimpleGit {
    this.client ??= createGit(this.repoPath, this.timeoutMs);
    return this.client;
  }

  /**
   * Clean-slate clone into the bound path: any existing directory is removed
   * first, then recreated empty. Only HTTPS remotes are accepted.
   */
  async clone(url: string): Promise<void> {
    if (!isHttpsUrl(url)) {
      throw new GitError(`Refusing to clone ${url}: only https:// remotes are supported`);
    }
    this.client = null;
    if (fs.existsSync(this.repoPath)) removeTree(this.repoPath);
    fs.mkdirSync(this.repoPath, { recursive: true });

    const parent = createGit(path.dirname(this.repoPath), this.timeoutMs);
    await wrapGitOperation(() => parent.clone(url, this.repoPath), `Failed to clone ${url}`);
  }

  async checkout(branch: string): Promise<void> {
    await wrapGitOperation(() => this.git.checkout(branch), `Failed to checkout ${branch}`);
  }

  async pull(): Promise<void> {
    await wrapGitOperation(() => this.git.pull(), "Failed to pull");
  }

  /** Commit every tracked change (`git commit -a`). */
  async commit(message: string): Promise<void> {
    await wrapGitOperation(() => this.git.commit(message, undefined, { "--all": null }), "Failed to commit");
  }

  async createTag(tag: string): Promise<void> {
    await wrapGitOperation(() => this.git.addTag(tag), `Failed to create tag ${tag}`);
  }

  /** Remote deletion runs before local so a failed push leaves the local tag to retry with. */
  async deleteTag(tag: string, scope: TagScope): Promise<void> {
    if (scope.remote) {
      await wrapGitOperation(
        () => this.git.push(this.remote, `:refs/tags/${tag}`),
        `Failed to delete tag ${tag} on ${this.remote}`,
      );
    }
    if (scope.local) {
      await wrapGitOperation(() => this.git.tag(["-d", tag]), `Failed to delete tag ${tag}`);
    }
  }

  async pushCommits(): Promise<void> {
    await wrapGitOperation(() => this.git.push(this.remote), `Failed to push to ${this.remote}`);
  }

  async pushTag(tag: string): Promise<void> {
    await wrapGitOperation(
      () => this.git.push(this.remote, `refs/tags/${tag}`),
      `Failed to push tag ${tag} to ${this.remote}`,
    );
  }

  /** `git reset --<mode> [target]`; no target resets to HEAD. */
  async reset(mode: ResetMode, target?: string): Promise<void> {
    const args = target ? [`--${mode}`, target] : [`--${mode}`];
    await wrapGitOperation(() => this.git.reset(args), `Failed to reset (${mode}${target ? ` ${target}` : ""})`);
  }
}
