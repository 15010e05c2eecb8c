import type { WorkflowName } from "../state-machine.js";
import { deleteLocalTag, deleteRemoteTag, createAndPushTag, pushTag } from "./tags.js";
import { removeLastCommit, resetProject } from "./history.js";
import type { Workflow } from "./shared.js";
import { checkoutAndPull, compileCheck, pushChanges } from "./sync.js";
import { commitChanges, updateVersions } from "./version-update.js";

export type { Workflow } from "./shared.js";

export const WORKFLOW_HANDLERS: Record<WorkflowName, Workflow> = {
  update_versions: updateVersions,
  create_tags: createAndPushTag,
  push_tags: pushTag,
  delete_tags: deleteLocalTag,
  delete_tags_remotely: deleteRemoteTag,
  commit: commitChanges,
  remove_last_commit: removeLastCommit,
  reset: resetProject,
  checkout_and_pull: checkoutAndPull,
  compile_check: compileCheck,
  push_changes: pushChanges,
};
