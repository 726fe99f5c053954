/**
 * Pure pipeline state machine. A pipeline is an ordered list of stages; each
 * stage, on success, moves the pipeline to the milestone it `reaches`. Any
 * failure moves it to "failed". Skipped stages are removed from the
 * effective list, so their milestone is never visited.
 */
export type StageDefinition<S extends string = string, M extends string = string> = {
  readonly id: S;
  readonly reaches: M;
};

export type PipelineStatus<M extends string> = "init" | M | "failed";

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "success" | "failure";

export const RELEASE_STAGES = [
  { id: "validate", reaches: "validated" },
  { id: "resolve_version", reaches: "version_resolved" },
  { id: "update_artifacts", reaches: "artifacts_updated" },
  { id: "commit", reaches: "committed" },
  { id: "changelog", reaches: "changelog_ready" },
  { id: "publish_tag", reaches: "tagged" },
  { id: "report", reaches: "done" },
] as const satisfies readonly StageDefinition[];

export type ReleaseStage = (typeof RELEASE_STAGES)[number]["id"];
export type ReleaseMilestone = (typeof RELEASE_STAGES)[number]["reaches"];

export const BUILD_STAGES = [
  { id: "resolve_version", reaches: "version_resolved" },
  { id: "prepare_builder", reaches: "builder_ready" },
  { id: "build_push", reaches: "built" },
  { id: "verify_manifest", reaches: "verified" },
  { id: "publish_tag", reaches: "tagged" },
  { id: "report", reaches: "done" },
] as const satisfies readonly StageDefinition[];

export type BuildStage = (typeof BUILD_STAGES)[number]["id"];
export type BuildMilestone = (typeof BUILD_STAGES)[number]["reaches"];

/**
 * Determine the effective stage list, applying skip rules.
 */
export function getEffectiveStages<S extends string, M extends string>(
  stages: readonly StageDefinition<S, M>[],
  skip: ReadonlySet<S>,
): StageDefinition<S, M>[] {
  return stages.filter((s) => !skip.has(s.id));
}

export function isTerminal<M extends string>(status: PipelineStatus<M>, stages: readonly StageDefinition<string, M>[]): boolean {
  if (status === "failed") return true;
  const last = stages[stages.length - 1];
  return last !== undefined && status === last.reaches;
}

/** The stage that must run next from `status`, or null when none can. */
export function expectedStage<S extends string, M extends string>(
  stages: readonly StageDefinition<S, M>[],
  status: PipelineStatus<M>,
  skip: ReadonlySet<S>,
): StageDefinition<S, M> | null {
  const effective = getEffectiveStages(stages, skip);
  if (status === "init") return effective[0] ?? null;
  if (status === "failed") return null;
  const idx = effective.findIndex((s) => s.reaches === status);
  if (idx === -1 || idx >= effective.length - 1) return null;
  return effective[idx + 1];
}

/**
 * Pure function: given the current status, the stage that ran and its
 * outcome, return the next status.
 */
export function nextState<S extends string, M extends string>(
  stages: readonly StageDefinition<S, M>[],
  status: PipelineStatus<M>,
  stage: S,
  event: TransitionEvent,
  skip: ReadonlySet<S> = new Set(),
): PipelineStatus<M> {
  if (event === "failure") return "failed";
  const expected = expectedStage(stages, status, skip);
  if (!expected || expected.id !== stage) return "failed";
  return expected.reaches;
}
