import fs from "node:fs";
import type { RewriteResult, VersionEdit } from "../types/descriptor.js";
import { DescriptorError } from "../types/errors.js";
import { findFirstFile } from "./walk.js";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function assignmentPattern(key: string): RegExp {
  return new RegExp(`^([ \\t]*${escapeRegExp(key)}[ \\t]*[=:][ \\t]*)(.*)$`, "m");
}

/** Value of the first assignment of `key`, or null when the key is not set. */
export function readPropertyText(text: string, key: string): string | null {
  const m = assignmentPattern(key).exec(text);
  return m ? m[2].trimEnd() : null;
}

/**
 * Set the first `key = value` (or `key: value`) line of a property file.
 * Indentation, separator and line ending of that line are kept.
 */
export function rewritePropertyText(
  text: string,
  key: string,
  value: string,
): { text: string; oldValue: string } | null {
  const m = assignmentPattern(key).exec(text);
  if (!m) return null;
  const start = m.index + m[1].length;
  const oldValue = m[2].trimEnd();
  const end = start + oldValue.length;
  return { text: text.slice(0, start) + value + text.slice(end), oldValue };
}

/**
 * Rewrite the version key of an Ant property file found anywhere under the
 * project root (first match by walk order).
 */
export function rewriteAntProperty(projectRoot: string, fileName: string, key: string, value: string): RewriteResult {
  const file = findFirstFile(projectRoot, fileName);
  if (!file) {
    throw new DescriptorError(`Version file ${fileName} not found under ${projectRoot}`);
  }

  const original = fs.readFileSync(file, "utf8");
  const result = rewritePropertyText(original, key, value);
  if (!result) {
    throw new DescriptorError(`Key '${key}' not found in ${file}`, file);
  }

  const edits: VersionEdit[] = [];
  const changed = result.text !== original;
  if (changed) {
    fs.writeFileSync(file, result.text, "utf8");
    edits.push({ file, field: "ant.property", name: key, oldValue: result.oldValue, newValue: value });
  }
  return { file, changed, edits, missing: [] };
}
