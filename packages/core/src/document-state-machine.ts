import type { DocumentState } from "@docindex/types";
import { InvalidTransitionError } from "@docindex/errors";

export type StateChangeListener = (key: string, from: DocumentState, to: DocumentState) => void;

const NEXT: Record<DocumentState, DocumentState | undefined> = {
  pending: "extracting",
  extracting: "chunking",
  chunking: "embedding",
  embedding: "writing",
  writing: "transitioning",
  transitioning: "completed",
  completed: undefined,
  failed: undefined,
};

export function isTerminal(state: DocumentState): boolean {
  return state === "completed" || state === "failed";
}

export function canTransition(from: DocumentState, to: DocumentState): boolean {
  if (to === "failed") {
    return !isTerminal(from);
  }
  return NEXT[from] === to;
}

/** Lifecycle of one document within a run. */
export class DocumentStateMachine {
  private current: DocumentState = "pending";

  constructor(
    readonly key: string,
    private readonly onChange?: StateChangeListener,
  ) {}

  get state(): DocumentState {
    return this.current;
  }

  transition(to: DocumentState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    this.onChange?.(this.key, from, to);
  }

  fail(): void {
    this.transition("failed");
  }
}
