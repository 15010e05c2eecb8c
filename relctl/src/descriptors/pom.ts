import fs from "node:fs";
import type { DependencyMatch, DependencySpec, PropertySpec } from "../types/config.js";
import type { RewriteResult, VersionEdit, VersionField } from "../types/descriptor.js";
import { DescriptorError } from "../types/errors.js";
import { findFiles } from "./walk.js";
import {
  applyEdits,
  assertWellFormed,
  elementText,
  scanXml,
  setElementText,
  type TextEdit,
  type XmlElement,
} from "./xml-scanner.js";

export type PomTarget = {
  /** POM namespace URI; elements in any other namespace are ignored. */
  namespace: string;
  version?: string;
  parentVersion?: string;
  properties: readonly PropertySpec[];
  dependencies: readonly DependencySpec[];
  dependencyMatch: DependencyMatch;
};

/**
 * Whether a `<dependency>`'s artifactId selects a configured dependency.
 * `contains` keeps the historical rule: the artifactId only has to occur
 * inside the configured name, so `core` also selects `core-utils`.
 */
export function dependencyMatches(artifactId: string, configuredName: string, mode: DependencyMatch): boolean {
  if (artifactId.length === 0) return false;
  return mode === "exact" ? artifactId === configuredName : configuredName.includes(artifactId);
}

class PomIndex {
  private readonly children = new Map<number, XmlElement[]>();

  constructor(
    readonly elements: XmlElement[],
    private readonly namespace: string,
  ) {
    for (const el of elements) {
      if (el.parent === -1) continue;
      const list = this.children.get(el.parent) ?? [];
      list.push(el);
      this.children.set(el.parent, list);
    }
  }

  is(el: XmlElement, localName: string): boolean {
    return el.localName === localName && el.namespace === this.namespace;
  }

  root(): XmlElement | undefined {
    return this.elements.find((el) => el.parent === -1);
  }

  child(parent: XmlElement, localName: string): XmlElement | undefined {
    return (this.children.get(parent.index) ?? []).find((el) => this.is(el, localName));
  }

  childrenOf(parent: XmlElement): XmlElement[] {
    return (this.children.get(parent.index) ?? []).filter((el) => el.namespace === this.namespace);
  }

  all(localName: string): XmlElement[] {
    return this.elements.filter((el) => this.is(el, localName));
  }
}

/**
 * Rewrite the declared versions of one POM held in memory. Only the text of
 * matched elements changes; every other byte of the document is kept.
 */
export function rewritePomText(
  text: string,
  target: PomTarget,
  file = "pom.xml",
): { text: string; edits: VersionEdit[]; missing: string[] } {
  assertWellFormed(text, file);
  const index = new PomIndex(scanXml(text, file), target.namespace);
  const textEdits: TextEdit[] = [];
  const edits: VersionEdit[] = [];

  const set = (el: XmlElement, value: string, field: VersionField, name?: string): void => {
    const current = elementText(text, el);
    if (current === null) {
      throw new DescriptorError(`<${el.name}> in ${file} holds markup, cannot set ${field} text`, file);
    }
    if (current === value) return;
    textEdits.push(setElementText(text, el, value));
    edits.push({ file, field, name, oldValue: current, newValue: value });
  };

  const root = index.root();
  if (!root || !index.is(root, "project")) {
    return { text, edits, missing: target.properties.map((p) => p.property_name) };
  }

  if (target.version !== undefined) {
    const version = index.child(root, "version");
    if (version) set(version, target.version, "project.version");
  }

  if (target.parentVersion !== undefined) {
    const parent = index.child(root, "parent");
    const parentVersion = parent ? index.child(parent, "version") : undefined;
    if (parentVersion) set(parentVersion, target.parentVersion, "parent.version");
  }

  const sections = index.all("properties");
  const missing: string[] = [];
  for (const prop of target.properties) {
    let found = false;
    for (const section of sections) {
      for (const el of index.childrenOf(section)) {
        if (el.localName !== prop.property_name) continue;
        found = true;
        set(el, prop.property_value, "property", prop.property_name);
      }
    }
    if (!found) missing.push(prop.property_name);
  }

  if (target.dependencies.length > 0) {
    for (const dependency of index.all("dependency")) {
      const artifactEl = index.child(dependency, "artifactId");
      const versionEl = index.child(dependency, "version");
      if (!artifactEl || !versionEl) continue;
      const artifactId = elementText(text, artifactEl);
      if (artifactId === null) continue;
      // overlapping matches: the last configured entry wins
      let configured: DependencySpec | undefined;
      for (const d of target.dependencies) {
        if (dependencyMatches(artifactId, d.dependency_name, target.dependencyMatch)) configured = d;
      }
      if (configured) set(versionEl, configured.dependency_version, "dependency", artifactId);
    }
  }

  return { text: applyEdits(text, textEdits), edits, missing };
}

/** Rewrite one pom.xml in place; the file is only written when its text changes. */
export function rewritePom(filePath: string, target: PomTarget): RewriteResult {
  if (!fs.existsSync(filePath)) {
    throw new DescriptorError(`POM not found: ${filePath}`, filePath);
  }
  const original = fs.readFileSync(filePath, "utf8");
  const result = rewritePomText(original, target, filePath);
  const changed = result.text !== original;
  if (changed) fs.writeFileSync(filePath, result.text, "utf8");
  return { file: filePath, changed, edits: result.edits, missing: result.missing };
}

/**
 * Rewrite every pom.xml under a project root (multi-module builds). All POMs
 * are rewritten in memory first, so a malformed module leaves every file of
 * the project untouched. Build output under `target/` is not visited.
 */
export function rewriteMavenProject(projectRoot: string, target: PomTarget): RewriteResult[] {
  const poms = findFiles(projectRoot, "pom.xml", ["target"]);
  if (poms.length === 0) {
    throw new DescriptorError(`No pom.xml found under ${projectRoot}`, projectRoot);
  }

  const planned = poms.map((file) => {
    const original = fs.readFileSync(file, "utf8");
    return { file, original, ...rewritePomText(original, target, file) };
  });

  return planned.map((p) => {
    const changed = p.text !== p.original;
    if (changed) fs.writeFileSync(p.file, p.text, "utf8");
    return { file: p.file, changed, edits: p.edits, missing: p.missing };
  });
}
