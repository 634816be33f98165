import { effectiveLimits, type ResearchConfig } from "../config.js";
import type { PipelineFn, PipelineInput, PipelineOptions, RunOutcome } from "../executor.js";
import type { RunFailure, RunManager } from "../run_manager.js";
import { allSegments, ArtifactBuilder, rollingSummary, type DroppedItem, type ResearchArtifact } from "./artifact.js";
import { STAGE_AGENT_NAMES, type GenerativeBackend } from "./backend.js";
import { buildJuryVerdict } from "./jury.js";
import type { ConcurrencyLimiter } from "./limiter.js";
import { renderReport } from "./report.js";
import { FAN_OUT_STAGES, STAGE_ORDER, type StageRole } from "./schemas.js";
import { runStage } from "./stage_runner.js";
import { STAGE_DEFINITIONS, type StageDefinition, type StageItems, type StageOutputs } from "./stages.js";
import { StructuredCallClient, type StructuredClientOptions } from "./structured_client.js";
import {
  ARTIFACT_FILE_NAME,
  artifactAbsPath,
  DROPPED_ITEMS_FILE_NAME,
  REPORT_FILE_NAME,
  writeJsonFile,
  writeTextFile
} from "./utils.js";

export type ResearchPipelineDeps = {
  backend: GenerativeBackend;
  limiter: ConcurrencyLimiter;
  config: ResearchConfig;
  clientOptions?: Pick<StructuredClientOptions, "sleep" | "random">;
};

type StageVerdict = { ok: true } | { ok: false; failure: RunFailure };

export function makeResearchPipeline(deps: ResearchPipelineDeps): PipelineFn {
  return (input, runs, options) => runResearchPipeline(deps, input, runs, options);
}

export async function runResearchPipeline(
  deps: ResearchPipelineDeps,
  input: PipelineInput,
  runs: RunManager,
  options: PipelineOptions
): Promise<RunOutcome> {
  const { runId } = input;
  const { signal } = options;
  const { config, limiter } = deps;
  const limits = effectiveLimits(config, input.settings);
  const client = new StructuredCallClient(deps.backend, {
    ...deps.clientOptions,
    log: (message, stage) => runs.log(runId, message, stage)
  });
  const artifact = new ArtifactBuilder(input.industry);
  let lastStage: StageRole = "taxonomy";

  async function persistArtifact(stage: StageRole, value: ResearchArtifact): Promise<void> {
    await writeJsonFile(artifactAbsPath(runId, ARTIFACT_FILE_NAME), value);
    await runs.addArtifact(runId, stage, ARTIFACT_FILE_NAME);
  }

  async function executeStage<R extends StageRole>(
    role: R,
    items: Array<StageItems[R]>,
    attach: (item: StageItems[R], value: StageOutputs[R]) => void
  ): Promise<StageVerdict> {
    if (signal.aborted) return { ok: false, failure: { reason: "cancelled", message: "Cancelled" } };

    const definition: StageDefinition<R> = STAGE_DEFINITIONS[role];
    const position = STAGE_ORDER.indexOf(role) + 1;
    lastStage = role;
    await runs.startStage(runId, role, items.length);
    runs.log(runId, `Stage ${position}/${STAGE_ORDER.length}: ${STAGE_AGENT_NAMES[role]} (${items.length} item(s))`, role);

    if (items.length === 0) {
      const message = "No upstream items to process";
      await runs.finishStage(runId, role, "failed", message);
      return { ok: false, failure: { reason: "stage_failed", stage: role, message } };
    }

    const outcomes = await runStage({
      role,
      items,
      summary: rollingSummary(artifact.snapshot()),
      client,
      limiter,
      model: config.models[role],
      policy: config.retry[role],
      signal,
      onItemSettled: (outcome) => runs.recordItem(runId, role, outcome.result.ok)
    });

    let fatal: string | null = null;
    for (const { result } of outcomes) {
      if (!result.ok && result.kind === "fatal") {
        fatal = result.message;
        break;
      }
    }
    const cancelled = signal.aborted;
    // A halted stage attaches nothing, so the artifact never holds children of a failed stage.
    const halted = fatal !== null || cancelled;

    let succeeded = 0;
    for (const { item, result } of outcomes) {
      if (result.ok) {
        succeeded += 1;
        if (!halted) attach(item, result.value);
        continue;
      }
      const label = definition.describeItem(item);
      runs.error(runId, `Dropped ${label}: ${result.kind} (${result.message})`, role);
      if (!FAN_OUT_STAGES.has(role)) continue;
      const dropped: DroppedItem = {
        stage: role,
        itemId: item.id,
        label,
        kind: result.kind,
        message: result.message,
        attempts: result.attempts
      };
      artifact.recordDropped(dropped);
      runs.recordDropped(runId, dropped);
    }
    if (halted && succeeded > 0) runs.log(runId, `Discarded ${succeeded} result(s) from the halted ${role} stage`, role);

    await persistArtifact(role, artifact.snapshot());

    if (fatal !== null) {
      await runs.finishStage(runId, role, "failed", fatal);
      return { ok: false, failure: { reason: "fatal", stage: role, message: fatal } };
    }
    if (cancelled) {
      await runs.finishStage(runId, role, "failed", "Cancelled");
      return { ok: false, failure: { reason: "cancelled", stage: role, message: "Cancelled" } };
    }
    if (succeeded === 0) {
      const message = `All ${items.length} item(s) failed`;
      await runs.finishStage(runId, role, "failed", message);
      return { ok: false, failure: { reason: "stage_failed", stage: role, message } };
    }

    const status = succeeded === items.length ? "completed" : "partially_completed";
    await runs.finishStage(runId, role, status);
    return { ok: true };
  }

  async function markSkipped(failure: RunFailure): Promise<void> {
    const reason = failure.reason === "cancelled" ? "Skipped: run cancelled" : `Skipped: upstream stage ${failure.stage} failed`;
    const from = failure.stage ? STAGE_ORDER.indexOf(failure.stage) + 1 : 0;
    const current = runs.getRun(runId);
    for (const stage of STAGE_ORDER.slice(from)) {
      if (current?.stages[stage].status !== "pending") continue;
      await runs.finishStage(runId, stage, "failed", reason);
    }
  }

  async function runStages(): Promise<StageVerdict> {
    let verdict = await executeStage("taxonomy", [{ id: "taxonomy", industry: input.industry }], (_item, value) => {
      artifact.attachTaxonomy(value, limits.maxCategories);
      const cap = limits.maxCategories;
      if (cap !== null && value.categories.length > cap) {
        runs.log(runId, `Kept ${cap} of ${value.categories.length} categories`, "taxonomy");
      }
    });
    if (!verdict.ok) return verdict;

    verdict = await executeStage(
      "segment",
      artifact.snapshot().categories.map(({ segments: _segments, ...category }) => ({ id: category.id, category })),
      (item, value) => {
        artifact.attachSegments(item.id, value.segments, limits.maxSegmentsPerCategory);
      }
    );
    if (!verdict.ok) return verdict;

    verdict = await executeStage(
      "behavioral",
      allSegments(artifact.snapshot()).map(({ behavior: _behavior, competition: _competition, ...segment }) => ({
        id: segment.id,
        segment
      })),
      (item, value) => artifact.attachBehavior(item.id, value)
    );
    if (!verdict.ok) return verdict;

    const profiled = allSegments(artifact.snapshot()).flatMap((s) =>
      s.behavior ? [{ id: s.id, categoryName: s.categoryName, segmentName: s.name, behavior: s.behavior }] : []
    );
    verdict = await executeStage("competitive", profiled, (item, value) => artifact.attachCompetition(item.id, value));
    if (!verdict.ok) return verdict;

    return executeStage("jury", [{ id: "jury", artifact: artifact.snapshot(), budgetUsd: config.budgetUsd }], (item, value) => {
      const jury = buildJuryVerdict(value, item.artifact, item.budgetUsd);
      artifact.attachJury(jury);
      for (const issue of jury.consistency.issues) runs.log(runId, `Consistency check: ${issue}`, "jury");
    });
  }

  const verdict = await runStages();
  if (!verdict.ok) await markSkipped(verdict.failure);

  const frozen = artifact.freeze();
  const outcome: RunOutcome = !verdict.ok
    ? { status: "failed", failure: verdict.failure, artifact: frozen }
    : { status: frozen.coverage.partial ? "partial" : "completed", artifact: frozen };

  await persistArtifact(lastStage, frozen);
  await writeTextFile(artifactAbsPath(runId, REPORT_FILE_NAME), renderReport(frozen, outcome));
  await runs.addArtifact(runId, lastStage, REPORT_FILE_NAME);
  if (frozen.dropped.length > 0) {
    await writeJsonFile(artifactAbsPath(runId, DROPPED_ITEMS_FILE_NAME), frozen.dropped);
    await runs.addArtifact(runId, lastStage, DROPPED_ITEMS_FILE_NAME);
  }

  if (frozen.coverage.partial && outcome.status !== "failed") {
    runs.log(runId, `Completed with partial coverage: ${frozen.coverage.droppedCount} item(s) dropped`);
  }
  return outcome;
}
