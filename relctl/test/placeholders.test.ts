import { describe, expect, it } from "vitest";
import { parseFieldPath, resolvePlaceholders } from "../src/config/placeholders.js";

describe("parseFieldPath", () => {
  it("splits dotted and bracketed paths", () => {
    expect(parseFieldPath("name")).toEqual(["name"]);
    expect(parseFieldPath("projects.0.name")).toEqual(["projects", "0", "name"]);
    expect(parseFieldPath("projects[0][name]")).toEqual(["projects", "0", "name"]);
  });

  it("rejects malformed paths", () => {
    expect(parseFieldPath("")).toBeNull();
    expect(parseFieldPath("a..b")).toBeNull();
    expect(parseFieldPath("a.")).toBeNull();
    expect(parseFieldPath("[0]")).toBeNull();
  });
});

describe("resolvePlaceholders", () => {
  it("resolves a self-reference", () => {
    expect(resolvePlaceholders({ name: "svc", tag: "rel-{name}" })).toEqual({ name: "svc", tag: "rel-svc" });
  });

  it("leaves a string with an unknown field verbatim", () => {
    expect(resolvePlaceholders({ tag: "rel-{missing}" })).toEqual({ tag: "rel-{missing}" });
  });

  it("keeps the whole string when only one of its placeholders fails", () => {
    expect(resolvePlaceholders({ name: "svc", tag: "{name}-{missing}" })).toEqual({
      name: "svc",
      tag: "{name}-{missing}",
    });
  });

  it("looks up the enclosing project before the root", () => {
    const config = {
      name: "fleet",
      release: "2024.1",
      projects: [
        { name: "billing", tag: "{name}-{release}" },
        { name: "ui", tag: "{name}-{release}" },
      ],
    };
    expect(resolvePlaceholders(config)).toEqual({
      name: "fleet",
      release: "2024.1",
      projects: [
        { name: "billing", tag: "billing-2024.1" },
        { name: "ui", tag: "ui-2024.1" },
      ],
    });
  });

  it("follows cross-entry references and resolves referenced templates", () => {
    const config = {
      version: "3.0.0",
      projects: [
        { name: "core", tag: "core-{version}" },
        { name: "app", tag: "after-{projects[0][tag]}" },
      ],
    };
    const resolved = resolvePlaceholders(config);
    expect(resolved).toEqual({
      version: "3.0.0",
      projects: [
        { name: "core", tag: "core-3.0.0" },
        { name: "app", tag: "after-core-3.0.0" },
      ],
    });
  });

  it("leaves cycles verbatim", () => {
    expect(resolvePlaceholders({ a: "{b}", b: "{a}" })).toEqual({ a: "{b}", b: "{a}" });
  });

  it("treats doubled braces as literals and stringifies numbers and booleans", () => {
    expect(resolvePlaceholders({ n: 3, flag: true, s: "{{x}} {n} {flag}" })).toEqual({
      n: 3,
      flag: true,
      s: "{x} 3 true",
    });
  });

  it("does not substitute mappings, lists or null", () => {
    const config = { list: [1], map: { a: 1 }, none: null, s: "{list}|{map}|{none}" };
    expect(resolvePlaceholders(config)).toEqual(config);
  });

  it("does not modify its input", () => {
    const config = { name: "svc", tag: "rel-{name}" };
    resolvePlaceholders(config);
    expect(config.tag).toBe("rel-{name}");
  });
});
