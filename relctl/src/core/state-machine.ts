/**
 * Workflows the reconciler can drive, in CLI order.
 */
export const WORKFLOWS = [
  "update_versions",
  "create_tags",
  "push_tags",
  "delete_tags",
  "delete_tags_remotely",
  "commit",
  "remove_last_commit",
  "reset",
  "checkout_and_pull",
  "compile_check",
  "push_changes",
] as const;

export type WorkflowName = (typeof WORKFLOWS)[number];

/**
 * Per-project workflow states. Every run starts at `start`; a state with no
 * outgoing transitions is terminal.
 */
export type WorkflowState =
  | "start"
  | "cloned"
  | "checked_out"
  | "pulled"
  | "version_rewritten"
  | "tree_checked"
  | "committed"
  | "no_changes"
  | "tag_checked"
  | "already_tagged"
  | "tag_created"
  | "tag_absent"
  | "tag_deleted"
  | "tag_pushed"
  | "already_pushed"
  | "push_checked"
  | "refused"
  | "reset_done"
  | "fetched"
  | "nothing_to_push"
  | "compiled"
  | "compile_failed"
  | "pushed"
  | "declined";

type TransitionTable = Partial<Record<WorkflowState, readonly WorkflowState[]>>;

const TRANSITIONS: Record<WorkflowName, TransitionTable> = {
  update_versions: {
    start: ["declined", "cloned"],
    cloned: ["checked_out"],
    checked_out: ["version_rewritten"],
    version_rewritten: ["no_changes", "declined", "committed"],
  },
  create_tags: {
    start: ["declined", "cloned"],
    cloned: ["checked_out"],
    checked_out: ["tag_checked"],
    tag_checked: ["already_tagged", "tag_created"],
    already_tagged: ["already_pushed", "tag_pushed"],
    tag_created: ["already_pushed", "tag_pushed"],
  },
  push_tags: {
    start: ["declined", "tag_checked"],
    tag_checked: ["tag_absent", "already_pushed", "tag_pushed"],
  },
  delete_tags: {
    start: ["declined", "tag_checked"],
    tag_checked: ["tag_absent", "tag_deleted"],
  },
  delete_tags_remotely: {
    start: ["declined", "tag_checked"],
    tag_checked: ["tag_absent", "tag_deleted"],
  },
  commit: {
    start: ["tree_checked"],
    tree_checked: ["no_changes", "declined", "committed"],
  },
  remove_last_commit: {
    start: ["push_checked"],
    push_checked: ["refused", "declined", "reset_done"],
  },
  reset: {
    start: ["declined", "reset_done"],
  },
  checkout_and_pull: {
    start: ["declined", "cloned", "refused", "checked_out"],
    cloned: ["refused", "checked_out"],
    checked_out: ["pulled"],
  },
  compile_check: {
    start: ["declined", "compiled", "compile_failed"],
  },
  push_changes: {
    start: ["fetched"],
    fetched: ["nothing_to_push", "declined", "compiled", "compile_failed", "pushed"],
    compiled: ["declined", "pushed"],
  },
};

/** Allowed next states; empty for terminal states. */
export function allowedTransitions(workflow: WorkflowName, from: WorkflowState): readonly WorkflowState[] {
  return TRANSITIONS[workflow][from] ?? [];
}

export function isTerminal(workflow: WorkflowName, state: WorkflowState): boolean {
  return allowedTransitions(workflow, state).length === 0;
}

/**
 * Pure function: validate a transition and return the new state.
 * Throws on a transition the workflow does not define.
 */
export function nextState(workflow: WorkflowName, current: WorkflowState, next: WorkflowState): WorkflowState {
  if (!allowedTransitions(workflow, current).includes(next)) {
    throw new Error(`Invalid transition in ${workflow}: ${current} -> ${next}`);
  }
  return next;
}

/**
 * How a project's run ended. `refused` is a state-conflict refusal and
 * `declined` a negative confirmation; neither is an error.
 */
export type OutcomeStatus = "done" | "no_op" | "refused" | "declined" | "skipped" | "failed";

export type ProjectOutcome = {
  project: string;
  workflow: WorkflowName;
  status: OutcomeStatus;
  /** Last state reached. */
  state: WorkflowState;
  /** States visited after `start`, in order. */
  trail: WorkflowState[];
  message: string;
};

/** Tracks one project's walk through a workflow. */
export class WorkflowProgress {
  private current: WorkflowState = "start";
  private readonly visited: WorkflowState[] = [];

  constructor(
    readonly workflow: WorkflowName,
    readonly project: string,
  ) {}

  get state(): WorkflowState {
    return this.current;
  }

  get trail(): WorkflowState[] {
    return [...this.visited];
  }

  to(next: WorkflowState): this {
    this.current = nextState(this.workflow, this.current, next);
    this.visited.push(next);
    return this;
  }

  finish(status: OutcomeStatus, message: string): ProjectOutcome {
    if (!isTerminal(this.workflow, this.current)) {
      throw new Error(`${this.workflow} finished in non-terminal state ${this.current}`);
    }
    return this.outcome(status, message);
  }

  /** Outcome for a run cut short by an error, in whatever state it reached. */
  fail(message: string): ProjectOutcome {
    return this.outcome("failed", message);
  }

  /** Outcome for a project the configuration excludes; nothing ran. */
  skip(message: string): ProjectOutcome {
    return this.outcome("skipped", message);
  }

  private outcome(status: OutcomeStatus, message: string): ProjectOutcome {
    return {
      project: this.project,
      workflow: this.workflow,
      status,
      state: this.current,
      trail: this.trail,
      message,
    };
  }
}
