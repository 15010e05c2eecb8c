import fs from "node:fs";
import path from "node:path";
import { XMLParser } from "fast-xml-parser";
import type { WorkflowContext, RepoInspector } from "../core/ports.js";
import { selectProjects } from "../core/reconciler.js";
import { skipMessage } from "../core/workflows/shared.js";
import { readPropertyText } from "../descriptors/ant.js";
import { findFirstFile } from "../descriptors/walk.js";
import type { ProjectSpec } from "../types/config.js";
import { errorMessage } from "../types/errors.js";

export type GitInfoRow = {
  project: string;
  type: string;
  branch: string;
  head: string;
  configured_version: string;
  declared_version: string;
  latest_tag: string;
  unpushed_commits: string;
  modified: string;
  added: string;
  deleted: string;
  error: string;
};

export const GIT_INFO_COLUMNS = [
  "project",
  "type",
  "branch",
  "head",
  "configured_version",
  "declared_version",
  "latest_tag",
  "unpushed_commits",
  "modified",
  "added",
  "deleted",
  "error",
] as const satisfies readonly (keyof GitInfoRow)[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: unknown, key: string): string | null {
  if (!isRecord(record)) return null;
  const value = record[key];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return null;
}

/** Version the project's main descriptor declares right now, null when it cannot be read. */
export function readDeclaredVersion(project: ProjectSpec): string | null {
  switch (project.type) {
    case "Maven": {
      const pom = path.join(project.project_path, "pom.xml");
      if (!fs.existsSync(pom)) return null;
      const parser = new XMLParser({ ignoreAttributes: true, removeNSPrefix: true, parseTagValue: false });
      const doc: unknown = parser.parse(fs.readFileSync(pom, "utf8"));
      return isRecord(doc) ? stringField(doc.project, "version") : null;
    }
    case "Ant": {
      if (!project.version_file) return null;
      const file = findFirstFile(project.project_path, project.version_file);
      return file ? readPropertyText(fs.readFileSync(file, "utf8"), project.version_key ?? "version") : null;
    }
    case "Angular": {
      if (!project.version_file) return null;
      const file = findFirstFile(project.project_path, project.version_file);
      if (!file) return null;
      const manifest: unknown = JSON.parse(fs.readFileSync(file, "utf8").replace(/^\uFEFF/, ""));
      return stringField(manifest, "version");
    }
  }
}

function emptyRow(project: ProjectSpec): GitInfoRow {
  return {
    project: project.name,
    type: project.type,
    branch: "",
    head: "",
    configured_version: project.version,
    declared_version: "",
    latest_tag: "",
    unpushed_commits: "",
    modified: "",
    added: "",
    deleted: "",
    error: "",
  };
}

export async function collectGitInfo(project: ProjectSpec, inspector: RepoInspector): Promise<GitInfoRow> {
  const row = emptyRow(project);
  if (!(await inspector.isRepository())) {
    row.error = `${project.project_path} is not a git working tree`;
    return row;
  }
  const changes = await inspector.listWorkingTreeChanges();
  row.branch = (await inspector.currentBranch()) ?? "(detached)";
  row.head = await inspector.currentCommit();
  row.declared_version = readDeclaredVersion(project) ?? "";
  row.latest_tag = (await inspector.latestTag()) ?? "";
  row.unpushed_commits = String(await inspector.aheadCount());
  row.modified = String(changes.modified.length);
  row.added = String(changes.added.length);
  row.deleted = String(changes.deleted.length);
  return row;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180 CSV with a UTF-8 BOM so spreadsheet tools detect the encoding. */
export function toCsv(rows: readonly GitInfoRow[]): string {
  const lines = [GIT_INFO_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(GIT_INFO_COLUMNS.map((col) => csvField(row[col])).join(","));
  }
  return "\uFEFF" + lines.join("\r\n") + "\r\n";
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function defaultReportPath(now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `git-info-${stamp}.csv`;
}

/**
 * Collect one row per selected, non-skipped project and write the CSV.
 * A project that cannot be read gets a row carrying the error.
 */
export async function extractGitInfo(
  ctx: WorkflowContext,
  filter: string | undefined,
  outPath: string,
): Promise<{ file: string; rows: GitInfoRow[] }> {
  const rows: GitInfoRow[] = [];
  for (const project of selectProjects(ctx.config.projects, filter, ctx.logger)) {
    if (project.skip) {
      ctx.logger.info(skipMessage(project.name), project.name);
      continue;
    }
    try {
      rows.push(await collectGitInfo(project, ctx.inspector(project)));
    } catch (err: unknown) {
      const row = emptyRow(project);
      row.error = errorMessage(err);
      ctx.logger.error(`Cannot collect git info for project ${project.name}: ${row.error}`, project.name);
      rows.push(row);
    }
  }

  const file = path.resolve(outPath);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, toCsv(rows), "utf8");
  ctx.logger.info(`Wrote git info for ${rows.length} project(s) to ${file}`);
  return { file, rows };
}
