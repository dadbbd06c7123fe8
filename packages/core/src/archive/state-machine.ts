/**
 * Per-file archival state machine.
 *
 * States:
 * - eligible: never archived, or last archived before today
 * - skipped: already archived today (terminal)
 * - waiting: content hashed, sitting out the randomized delay
 * - submitting: capture requested from the archive service
 * - recorded: capture succeeded and the record was rewritten (terminal)
 * - failed: nothing persisted; re-evaluated next cycle (terminal)
 */

export type ArchiveState =
  | "eligible"
  | "skipped"
  | "waiting"
  | "submitting"
  | "recorded"
  | "failed";

const VALID_TRANSITIONS: Record<ArchiveState, ReadonlySet<ArchiveState>> = {
  eligible: new Set(["skipped", "waiting", "failed"]),
  waiting: new Set(["submitting", "failed"]),
  submitting: new Set(["recorded", "failed"]),
  skipped: new Set(),
  recorded: new Set(),
  failed: new Set(),
};

export interface ArchiveTransitionEvent {
  path: string;
  from: ArchiveState;
  to: ArchiveState;
  timestamp: Date;
  reason?: string;
}

export type ArchiveTransitionListener = (event: ArchiveTransitionEvent) => void;

export class ArchiveStateMachine {
  private state: ArchiveState = "eligible";
  private listeners: ArchiveTransitionListener[] = [];

  constructor(readonly path: string) {}

  getState(): ArchiveState {
    return this.state;
  }

  canTransition(to: ArchiveState): boolean {
    return VALID_TRANSITIONS[this.state].has(to);
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].size === 0;
  }

  /** Throws if the transition is not valid. */
  transition(to: ArchiveState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new Error(
        `Invalid archive transition for ${this.path}: ${this.state} -> ${to}`,
      );
    }

    const event: ArchiveTransitionEvent = {
      path: this.path,
      from: this.state,
      to,
      timestamp: new Date(),
      reason,
    };

    this.state = to;

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Returns an unsubscribe function. */
  onTransition(listener: ArchiveTransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}
