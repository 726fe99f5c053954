import { ReleaseError, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import {
  type PipelineStatus,
  type StageDefinition,
  expectedStage,
  isTerminal,
  nextState,
} from "./state-machine.js";

export type StepRecord = {
  status: "success" | "failed" | "skipped";
  duration_ms: number;
  code?: string;
  error?: string;
};

export type PipelineFailure = {
  code: string;
  message: string;
};

export type PipelineReport<S extends string, M extends string> = {
  pipeline: string;
  status: PipelineStatus<M>;
  failed_at: S | null;
  error: PipelineFailure | null;
  /** Every status visited, starting with "init". */
  history: PipelineStatus<M>[];
  step_results: Partial<Record<S, StepRecord>>;
};

export function toFailure(e: unknown): PipelineFailure {
  if (e instanceof ReleaseError) return { code: e.code, message: e.message };
  return { code: "UNEXPECTED", message: errorMessage(e) };
}

/**
 * Orchestrator — drives one pipeline run through the state machine.
 *
 * Each `step` call executes one stage, records its result and advances the
 * status. A failing stage moves the run to "failed" and rethrows, so the
 * caller stops at once. Nothing is retried or rolled back.
 */
export class Orchestrator<S extends string, M extends string> {
  private status: PipelineStatus<M> = "init";
  private readonly history: PipelineStatus<M>[] = ["init"];
  private readonly stepResults: Partial<Record<S, StepRecord>> = {};
  private failedAt: S | null = null;
  private error: PipelineFailure | null = null;
  private readonly skip: ReadonlySet<S>;

  constructor(
    private readonly name: string,
    private readonly stages: readonly StageDefinition<S, M>[],
    private readonly logger: Logger,
    skip: Iterable<S> = [],
    private readonly now: () => number = Date.now,
  ) {
    this.skip = new Set(skip);
    for (const id of this.skip) {
      this.stepResults[id] = { status: "skipped", duration_ms: 0 };
    }
  }

  get current(): PipelineStatus<M> {
    return this.status;
  }

  isSkipped(id: S): boolean {
    return this.skip.has(id);
  }

  async step<T>(id: S, fn: () => Promise<T> | T): Promise<T> {
    if (isTerminal(this.status, this.stages)) {
      throw new Error(`${this.name}: cannot run ${id}, pipeline already ${this.status}`);
    }
    const expected = expectedStage(this.stages, this.status, this.skip);
    if (!expected || expected.id !== id) {
      throw new Error(`${this.name}: stage ${id} out of order (expected ${expected?.id ?? "none"})`);
    }

    const started = this.now();
    try {
      const value = await fn();
      this.stepResults[id] = { status: "success", duration_ms: this.now() - started };
      this.advance(nextState(this.stages, this.status, id, "success", this.skip));
      return value;
    } catch (e) {
      const failure = toFailure(e);
      this.stepResults[id] = {
        status: "failed",
        duration_ms: this.now() - started,
        code: failure.code,
        error: failure.message,
      };
      this.failedAt = id;
      this.error = failure;
      this.advance(nextState(this.stages, this.status, id, "failure", this.skip));
      this.logger.error(failure.message, { code: failure.code, details: { pipeline: this.name, stage: id } });
      throw e;
    }
  }

  report(): PipelineReport<S, M> {
    return {
      pipeline: this.name,
      status: this.status,
      failed_at: this.failedAt,
      error: this.error,
      history: [...this.history],
      step_results: { ...this.stepResults },
    };
  }

  private advance(next: PipelineStatus<M>): void {
    this.status = next;
    this.history.push(next);
  }
}
