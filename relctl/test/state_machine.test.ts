import { describe, expect, it } from "vitest";
import {
  WORKFLOWS,
  WorkflowProgress,
  allowedTransitions,
  isTerminal,
  nextState,
} from "../src/core/state-machine.js";

describe("workflow transitions", () => {
  it("every workflow can leave start", () => {
    for (const workflow of WORKFLOWS) {
      expect(allowedTransitions(workflow, "start").length).toBeGreaterThan(0);
    }
  });

  it("accepts a defined transition", () => {
    expect(nextState("update_versions", "start", "cloned")).toBe("cloned");
    expect(nextState("push_changes", "compiled", "pushed")).toBe("pushed");
  });

  it("rejects a transition the workflow does not define", () => {
    expect(() => nextState("update_versions", "start", "committed")).toThrow(
      "Invalid transition in update_versions: start -> committed",
    );
    expect(() => nextState("reset", "reset_done", "declined")).toThrow(/reset_done -> declined/);
  });

  it("knows terminal states per workflow", () => {
    expect(isTerminal("create_tags", "tag_pushed")).toBe(true);
    expect(isTerminal("create_tags", "tag_created")).toBe(false);
    expect(isTerminal("push_changes", "compiled")).toBe(false);
    expect(isTerminal("compile_check", "compiled")).toBe(true);
  });
});

describe("WorkflowProgress", () => {
  it("records the trail and builds the outcome", () => {
    const progress = new WorkflowProgress("create_tags", "billing");
    progress.to("cloned").to("checked_out").to("tag_checked").to("tag_created").to("tag_pushed");

    expect(progress.finish("done", "Pushed")).toEqual({
      project: "billing",
      workflow: "create_tags",
      status: "done",
      state: "tag_pushed",
      trail: ["cloned", "checked_out", "tag_checked", "tag_created", "tag_pushed"],
      message: "Pushed",
    });
  });

  it("refuses to finish in a non-terminal state", () => {
    const progress = new WorkflowProgress("update_versions", "billing").to("cloned");
    expect(() => progress.finish("done", "x")).toThrow("update_versions finished in non-terminal state cloned");
  });

  it("fails and skips from any state", () => {
    const progress = new WorkflowProgress("checkout_and_pull", "ui").to("cloned");
    expect(progress.fail("boom")).toMatchObject({ status: "failed", state: "cloned", trail: ["cloned"] });
    expect(new WorkflowProgress("reset", "ui").skip("skipped")).toMatchObject({
      status: "skipped",
      state: "start",
      trail: [],
    });
  });

  it("returns a copy of the trail", () => {
    const progress = new WorkflowProgress("reset", "ui");
    progress.trail.push("declined");
    expect(progress.trail).toEqual([]);
  });
});
