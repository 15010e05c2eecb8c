import fs from "node:fs";
import type { DependencySpec } from "../types/config.js";
import type { RewriteResult, VersionEdit } from "../types/descriptor.js";
import { DescriptorError } from "../types/errors.js";
import { findFirstFile } from "./walk.js";
import { applyEdits, type TextEdit } from "./xml-scanner.js";

export const DEPENDENCY_SECTIONS = [
  "dependencies",
  "devDependencies",
  "peerDependencies",
  "optionalDependencies",
] as const;

const BOM = "\uFEFF";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Indentation of the first indented line, defaulting to two spaces. */
export function detectIndent(text: string): string {
  return /^([ \t]+)"/m.exec(text)?.[1] ?? "  ";
}

type ValueSpan = { start: number; end: number };

/**
 * Offsets of the root object's members and of the members of its nested
 * objects, keyed by path. The text has already been accepted by JSON.parse,
 * so the scan only tracks structure. A repeated key keeps its last span, as
 * JSON.parse does.
 */
class ManifestSpans {
  private i = 0;
  readonly spans = new Map<string, ValueSpan>();
  readonly rootOpen: number;
  rootEmpty = true;

  constructor(private readonly text: string) {
    if (text.startsWith(BOM)) this.i = 1;
    this.skipSpace();
    this.rootOpen = this.i;
    this.value([]);
  }

  span(...path: string[]): ValueSpan | undefined {
    return this.spans.get(path.join("\0"));
  }

  private skipSpace(): void {
    while (this.i < this.text.length && /\s/.test(this.text[this.i])) this.i++;
  }

  private value(path: string[] | null): void {
    this.skipSpace();
    const start = this.i;
    const ch = this.text[this.i];
    if (ch === "{") this.object(path);
    else if (ch === "[") this.array();
    else if (ch === '"') this.string();
    else while (this.i < this.text.length && /[^\s,\]}]/.test(this.text[this.i])) this.i++;
    if (path && path.length > 0) this.spans.set(path.join("\0"), { start, end: this.i });
  }

  private object(path: string[] | null): void {
    this.i++;
    this.skipSpace();
    if (this.text[this.i] === "}") {
      this.i++;
      return;
    }
    if (path?.length === 0) this.rootEmpty = false;
    for (;;) {
      this.skipSpace();
      const key = this.string();
      this.skipSpace();
      this.i++; // ':'
      this.value(path && path.length < 2 ? [...path, key] : null);
      this.skipSpace();
      if (this.text[this.i++] === "}") return;
    }
  }

  private array(): void {
    this.i++;
    this.skipSpace();
    if (this.text[this.i] === "]") {
      this.i++;
      return;
    }
    for (;;) {
      this.value(null);
      this.skipSpace();
      if (this.text[this.i++] === "]") return;
    }
  }

  private string(): string {
    const start = this.i++;
    while (this.i < this.text.length && this.text[this.i] !== '"') {
      this.i += this.text[this.i] === "\\" ? 2 : 1;
    }
    this.i++;
    const decoded: unknown = JSON.parse(this.text.slice(start, this.i));
    return typeof decoded === "string" ? decoded : "";
  }
}

/**
 * Set the manifest `version` and the version of every configured dependency
 * present in one of the dependency sections. Only the changed values are
 * spliced into the text; the original comes back unchanged when no value
 * differs.
 */
export function rewriteManifestText(
  text: string,
  version: string,
  dependencies: readonly DependencySpec[],
  file = "package.json",
): { text: string; edits: VersionEdit[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.startsWith(BOM) ? text.slice(1) : text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DescriptorError(`Invalid JSON in ${file}: ${reason}`, file);
  }
  if (!isRecord(parsed)) {
    throw new DescriptorError(`${file} must contain a JSON object`, file);
  }

  const spans = new ManifestSpans(text);
  const edits: VersionEdit[] = [];
  const textEdits: TextEdit[] = [];

  const current = typeof parsed.version === "string" ? parsed.version : "";
  if (current !== version) {
    const at = spans.span("version");
    if (at) {
      textEdits.push({ ...at, replacement: JSON.stringify(version) });
    } else {
      const eol = text.includes("\r\n") ? "\r\n" : "\n";
      const member = `${eol}${detectIndent(text)}"version": ${JSON.stringify(version)}`;
      const insert = spans.rootEmpty ? `${member}${eol}` : `${member},`;
      textEdits.push({ start: spans.rootOpen + 1, end: spans.rootOpen + 1, replacement: insert });
    }
    edits.push({ file, field: "manifest.version", oldValue: current, newValue: version });
  }

  for (const section of DEPENDENCY_SECTIONS) {
    const block = parsed[section];
    if (!isRecord(block)) continue;
    for (const dep of dependencies) {
      if (!Object.prototype.hasOwnProperty.call(block, dep.dependency_name)) continue;
      const old = block[dep.dependency_name];
      const at = spans.span(section, dep.dependency_name);
      if (old === dep.dependency_version || !at) continue;
      textEdits.push({ ...at, replacement: JSON.stringify(dep.dependency_version) });
      edits.push({
        file,
        field: "manifest.dependency",
        name: `${section}.${dep.dependency_name}`,
        oldValue: typeof old === "string" ? old : "",
        newValue: dep.dependency_version,
      });
    }
  }

  return { text: textEdits.length > 0 ? applyEdits(text, textEdits) : text, edits };
}

/** Rewrite the Angular/npm manifest found under the project root. */
export function rewriteAngularManifest(
  projectRoot: string,
  fileName: string,
  version: string,
  dependencies: readonly DependencySpec[],
): RewriteResult {
  const file = findFirstFile(projectRoot, fileName);
  if (!file) {
    throw new DescriptorError(`Version file ${fileName} not found under ${projectRoot}`);
  }
  const original = fs.readFileSync(file, "utf8");
  const result = rewriteManifestText(original, version, dependencies, file);
  const changed = result.text !== original;
  if (changed) fs.writeFileSync(file, result.text, "utf8");
  return { file, changed, edits: result.edits, missing: [] };
}
