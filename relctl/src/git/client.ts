import { simpleGit, type SimpleGit, type SimpleGitOptions } from "simple-git";
import { GitError } from "../types/errors.js";

/** simple-git instance bound to a directory, with an optional block timeout. */
export function createGit(baseDir: string, timeoutMs?: number): SimpleGit {
  const options: Partial<SimpleGitOptions> = {
    baseDir,
    binary: "git",
    maxConcurrentProcesses: 1,
    trimmed: false,
  };
  if (timeoutMs !== undefined) options.timeout = { block: timeoutMs };
  return simpleGit(options);
}

/**
 * Wrap a simple-git operation and convert errors to GitError.
 */
export async function wrapGitOperation<T>(operation: () => Promise<T>, errorMessage: string): Promise<T> {
  try {
    return await operation();
  } catch (error: unknown) {
    if (error instanceof GitError) throw error;
    const message = error instanceof Error ? `${errorMessage}: ${error.message.trim()}` : errorMessage;
    throw new GitError(message);
  }
}

export function outputLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
