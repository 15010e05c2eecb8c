import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { dependencyMatches, rewriteMavenProject, rewritePom, rewritePomText, type PomTarget } from "../src/descriptors/pom.js";
import { DescriptorError } from "../src/types/errors.js";

const NS = "http://maven.apache.org/POM/4.0.0";

const POM = `<?xml version="1.0" encoding="UTF-8"?>
<!-- release-managed -->
<project xmlns="${NS}" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <modelVersion>4.0.0</modelVersion>
  <parent>
    <groupId>com.example</groupId>
    <artifactId>platform-parent</artifactId>
    <version>1.0.0</version>
  </parent>
  <artifactId>billing</artifactId>
  <version>1.0.0-SNAPSHOT</version>
  <properties>
    <commons.version>1.0.0</commons.version>
    <java.version>17</java.version>
  </properties>
  <dependencies>
    <!-- keep this comment -->
    <dependency>
      <groupId>com.example</groupId>
      <artifactId>billing-commons</artifactId>
      <version>1.0.0</version>
    </dependency>
    <dependency>
      <groupId>org.other</groupId>
      <artifactId>jackson</artifactId>
      <version>2.17.0</version>
    </dependency>
  </dependencies>
</project>
`;

function target(overrides: Partial<PomTarget> = {}): PomTarget {
  return {
    namespace: NS,
    version: "2.0.0",
    parentVersion: "1.5.0",
    properties: [{ property_name: "commons.version", property_value: "2.0.0" }],
    dependencies: [{ dependency_name: "billing-commons", dependency_version: "2.0.0" }],
    dependencyMatch: "contains",
    ...overrides,
  };
}

describe("dependencyMatches", () => {
  it("contains mode matches an artifactId occurring inside the configured name", () => {
    expect(dependencyMatches("core", "core-utils", "contains")).toBe(true);
    expect(dependencyMatches("core-utils", "core", "contains")).toBe(false);
  });

  it("exact mode needs equality", () => {
    expect(dependencyMatches("core", "core-utils", "exact")).toBe(false);
    expect(dependencyMatches("core-utils", "core-utils", "exact")).toBe(true);
  });

  it("never matches an empty artifactId", () => {
    expect(dependencyMatches("", "anything", "contains")).toBe(false);
  });
});

describe("rewritePomText", () => {
  it("updates project, parent, property and dependency versions and nothing else", () => {
    const result = rewritePomText(POM, target());
    const expected = POM.replace("<version>1.0.0-SNAPSHOT</version>", "<version>2.0.0</version>")
      .replace(
        "<artifactId>platform-parent</artifactId>\n    <version>1.0.0</version>",
        "<artifactId>platform-parent</artifactId>\n    <version>1.5.0</version>",
      )
      .replace("<commons.version>1.0.0</commons.version>", "<commons.version>2.0.0</commons.version>")
      .replace(
        "<artifactId>billing-commons</artifactId>\n      <version>1.0.0</version>",
        "<artifactId>billing-commons</artifactId>\n      <version>2.0.0</version>",
      );
    expect(result.text).toBe(expected);
    expect(result.missing).toEqual([]);
    expect(result.edits.map((e) => [e.field, e.name ?? null, e.oldValue, e.newValue])).toEqual([
      ["project.version", null, "1.0.0-SNAPSHOT", "2.0.0"],
      ["parent.version", null, "1.0.0", "1.5.0"],
      ["property", "commons.version", "1.0.0", "2.0.0"],
      ["dependency", "billing-commons", "1.0.0", "2.0.0"],
    ]);
  });

  it("keeps parent version untouched when none is configured", () => {
    const result = rewritePomText(POM, target({ parentVersion: undefined }));
    expect(result.text).toContain("<artifactId>platform-parent</artifactId>\n    <version>1.0.0</version>");
    expect(result.edits.some((e) => e.field === "parent.version")).toBe(false);
  });

  it("reports configured properties that the POM does not declare", () => {
    const result = rewritePomText(
      POM,
      target({ properties: [{ property_name: "missing.version", property_value: "1" }] }),
    );
    expect(result.missing).toEqual(["missing.version"]);
  });

  it("takes the last configured dependency when several match", () => {
    const result = rewritePomText(
      POM,
      target({
        dependencies: [
          { dependency_name: "billing-commons", dependency_version: "2.0.0" },
          { dependency_name: "billing-commons-client", dependency_version: "3.0.0" },
        ],
      }),
    );
    expect(result.edits.filter((e) => e.field === "dependency")).toMatchObject([
      { name: "billing-commons", oldValue: "1.0.0", newValue: "3.0.0" },
    ]);
  });

  it("ignores elements outside the configured namespace", () => {
    const result = rewritePomText(POM, target({ namespace: "urn:other" }));
    expect(result.text).toBe(POM);
    expect(result.edits).toEqual([]);
  });

  it("returns the text unchanged when every value is already set", () => {
    const once = rewritePomText(POM, target()).text;
    const twice = rewritePomText(once, target());
    expect(twice.text).toBe(once);
    expect(twice.edits).toEqual([]);
  });

  it("works with a prefixed POM namespace", () => {
    const prefixed = `<m:project xmlns:m="${NS}"><m:version>1</m:version></m:project>`;
    const result = rewritePomText(prefixed, target({ properties: [], dependencies: [] }));
    expect(result.text).toBe(`<m:project xmlns:m="${NS}"><m:version>2.0.0</m:version></m:project>`);
  });

  it("rejects malformed XML", () => {
    expect(() => rewritePomText("<project><version>1</project>", target())).toThrow(DescriptorError);
  });
});

describe("rewritePom / rewriteMavenProject", () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "relctl-pom-"));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("writes the file only when a value changes", () => {
    const file = path.join(tmp, "pom.xml");
    fs.writeFileSync(file, POM, "utf8");

    const first = rewritePom(file, target());
    expect(first.changed).toBe(true);
    const second = rewritePom(file, target());
    expect(second.changed).toBe(false);
    expect(second.edits).toEqual([]);
  });

  it("rewrites every module and skips build output", () => {
    fs.writeFileSync(path.join(tmp, "pom.xml"), POM, "utf8");
    fs.mkdirSync(path.join(tmp, "module-a"));
    fs.writeFileSync(path.join(tmp, "module-a", "pom.xml"), POM, "utf8");
    fs.mkdirSync(path.join(tmp, "target"));
    fs.writeFileSync(path.join(tmp, "target", "pom.xml"), POM, "utf8");

    const results = rewriteMavenProject(tmp, target());
    expect(results.map((r) => path.relative(tmp, r.file))).toEqual(["pom.xml", path.join("module-a", "pom.xml")]);
    expect(results.every((r) => r.changed)).toBe(true);
    expect(fs.readFileSync(path.join(tmp, "target", "pom.xml"), "utf8")).toBe(POM);
  });

  it("leaves every module untouched when one is malformed", () => {
    fs.writeFileSync(path.join(tmp, "pom.xml"), POM, "utf8");
    fs.mkdirSync(path.join(tmp, "broken"));
    fs.writeFileSync(path.join(tmp, "broken", "pom.xml"), "<project><version>", "utf8");

    expect(() => rewriteMavenProject(tmp, target())).toThrow(DescriptorError);
    expect(fs.readFileSync(path.join(tmp, "pom.xml"), "utf8")).toBe(POM);
  });

  it("fails when the project has no pom.xml", () => {
    expect(() => rewriteMavenProject(tmp, target())).toThrow(/No pom.xml found/);
  });
});
