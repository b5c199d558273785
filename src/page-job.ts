import type { ExtractionMode, ExtractionResult, JobState } from "./types";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ["loading", "done"],
  loading: ["settling", "extracting"],
  settling: ["extracting"],
  extracting: ["done"],
  done: [],
};

let nextJobId = 1;

/**
 * One extraction request. The dispatcher is the only writer; producers keep
 * a reference and read `completion` (or `result` once done).
 */
export class PageJob {
  readonly id = nextJobId++;
  readonly completion: Promise<ExtractionResult>;
  startedAt: number | null = null;
  finishedAt: number | null = null;

  private _state: JobState = "pending";
  private _result: ExtractionResult | null = null;
  private resolveCompletion: (result: ExtractionResult) => void = () => {};

  constructor(
    readonly url: string,
    readonly mode: ExtractionMode = "page",
  ) {
    this.completion = new Promise((resolve) => {
      this.resolveCompletion = resolve;
    });
  }

  get state(): JobState {
    return this._state;
  }

  get result(): ExtractionResult | null {
    return this._result;
  }

  get isDone(): boolean {
    return this._state === "done";
  }

  canTransition(next: JobState): boolean {
    return TRANSITIONS[this._state].includes(next);
  }

  /**
   * Move to a non-terminal state. Returns false (and changes nothing) when
   * the move is not allowed from the current state; use `complete` for done.
   */
  transition(next: Exclude<JobState, "done">): boolean {
    if (!this.canTransition(next)) {
      return false;
    }
    if (this._state === "pending") {
      this.startedAt = Date.now();
    }
    this._state = next;
    return true;
  }

  /** Write-once. The first call wins; later calls return false. */
  complete(result: ExtractionResult): boolean {
    if (!this.canTransition("done")) {
      return false;
    }
    const now = Date.now();
    this.startedAt ??= now;
    this.finishedAt = now;
    this._result = Object.freeze({ ...result });
    this._state = "done";
    this.resolveCompletion(this._result);
    return true;
  }
}
