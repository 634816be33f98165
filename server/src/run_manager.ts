import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import type { DroppedItem } from "./pipeline/artifact.js";
import { STAGE_ORDER, StageRoleSchema, type StageRole } from "./pipeline/schemas.js";
import {
  ensureDir,
  nowIso,
  outputRootAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  slug,
  tryReadJsonFile,
  writeJsonFile
} from "./pipeline/utils.js";

export { STAGE_ORDER };

export const RunSettingsSchema = z
  .object({
    maxCategories: z.number().int().min(0).max(50).optional(),
    maxSegmentsPerCategory: z.number().int().min(0).max(50).optional()
  })
  .strict();

export type RunSettings = z.infer<typeof RunSettingsSchema>;

const StageStatusSchema = z.enum(["pending", "running", "completed", "partially_completed", "failed"]);
export type StageStatus = z.infer<typeof StageStatusSchema>;

const StageRecordSchema = z.object({
  name: StageRoleSchema,
  status: StageStatusSchema,
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  itemsTotal: z.number().int().nonnegative(),
  itemsSettled: z.number().int().nonnegative(),
  itemsSucceeded: z.number().int().nonnegative(),
  itemsFailed: z.number().int().nonnegative(),
  artifacts: z.array(z.string())
});
export type StageRecord = z.infer<typeof StageRecordSchema>;

const DroppedItemSchema = z.object({
  stage: StageRoleSchema,
  itemId: z.string(),
  label: z.string(),
  kind: z.enum(["rate_limited", "schema_invalid", "fatal", "cancelled"]),
  message: z.string(),
  attempts: z.number().int().nonnegative()
});

const RunFailureSchema = z.object({
  reason: z.enum(["fatal", "stage_failed", "cancelled", "internal"]),
  stage: StageRoleSchema.optional(),
  message: z.string()
});
export type RunFailure = z.infer<typeof RunFailureSchema>;

const RunStateSchema = z.enum(["queued", "running", "completed", "partial", "failed"]);
export type RunState = z.infer<typeof RunStateSchema>;

const RunStatusSchema = z.object({
  runId: z.string().min(1),
  industry: z.string(),
  settings: RunSettingsSchema.optional(),
  status: RunStateSchema,
  failure: RunFailureSchema.optional(),
  currentStage: StageRoleSchema.optional(),
  stages: z.object({
    taxonomy: StageRecordSchema,
    segment: StageRecordSchema,
    behavioral: StageRecordSchema,
    competitive: StageRecordSchema,
    jury: StageRecordSchema
  }),
  dropped: z.array(DroppedItemSchema).default([]),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  outputFolder: z.string()
});
export type RunStatus = z.infer<typeof RunStatusSchema>;

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "industry" | "status" | "startedAt" | "finishedAt">;

export const RUN_EVENT_TYPES = [
  "run_status",
  "stage_started",
  "stage_progress",
  "stage_finished",
  "item_dropped",
  "artifact_written",
  "log",
  "error"
] as const;
export type RunEventType = (typeof RUN_EVENT_TYPES)[number];

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const RECOVERED_MESSAGE = "Recovered after server restart while run was active.";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const byte of bytes) {
    out += RUN_ID_SUFFIX_ALPHABET[byte % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalRunState(status: RunState): boolean {
  return status === "completed" || status === "partial" || status === "failed";
}

function emptyStage(name: StageRole): StageRecord {
  return { name, status: "pending", itemsTotal: 0, itemsSettled: 0, itemsSucceeded: 0, itemsFailed: 0, artifacts: [] };
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunState(run.status)) return run;
  const recoveredAt = nowIso();
  const stages = { ...run.stages };

  for (const name of STAGE_ORDER) {
    const stage = stages[name];
    if (stage.status === "running" || stage.status === "pending") {
      stages[name] = {
        ...stage,
        status: "failed",
        error: stage.error ?? RECOVERED_MESSAGE,
        finishedAt: stage.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "failed",
    failure: run.failure ?? { reason: "internal", message: RECOVERED_MESSAGE },
    finishedAt: run.finishedAt ?? recoveredAt,
    stages
  };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // An "error" event without listeners would throw; run errors are an optional stream.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runJsonPath = path.join(runOutputDirAbs(ent.name), "run.json");
      const parsed = RunStatusSchema.safeParse(await tryReadJsonFile(runJsonPath));
      if (!parsed.success || parsed.data.runId !== ent.name) continue;
      const recovered = recoverStaleLoadedRun(parsed.data);
      if (recovered !== parsed.data) {
        await writeJsonFile(runJsonPath, recovered);
      }
      this.runs.set(recovered.runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, industry: r.industry, status: r.status, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    return r ? this.snapshot(r) : null;
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    return fs
      .stat(runOutputDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
  }

  private async nextRunId(industry: string): Promise<string> {
    const industrySlug = (slug(industry).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled").toLowerCase();
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${industrySlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(industry: string, settings?: RunSettings): Promise<RunStatus> {
    const runId = await this.nextRunId(industry);

    const run: RunInternal = {
      runId,
      industry,
      settings,
      status: "queued",
      stages: {
        taxonomy: emptyStage("taxonomy"),
        segment: emptyStage("segment"),
        behavioral: emptyStage("behavioral"),
        competitive: emptyStage("competitive"),
        jury: emptyStage("jury")
      },
      dropped: [],
      startedAt: nowIso(),
      outputFolder: path.join("output", runId),
      emitter: newEmitter()
    };

    await ensureDir(runIntermediateDirAbs(runId));
    await ensureDir(runFinalDirAbs(runId));
    await this.persist(run);

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunState, patch?: { finishedAt?: string; failure?: RunFailure }): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.failure) r.failure = patch.failure;
    await this.persist(r);
    r.emitter.emit("run_status", { status, failure: r.failure, at: nowIso() });
  }

  async startStage(runId: string, stage: StageRole, itemsTotal: number): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.stages[stage];
    s.status = "running";
    s.startedAt = nowIso();
    s.itemsTotal = itemsTotal;
    r.currentStage = stage;
    await this.persist(r);
    r.emitter.emit("stage_started", { stage, itemsTotal, at: s.startedAt });
  }

  /** Item counters change in memory only; the next stage transition persists them. */
  recordItem(runId: string, stage: StageRole, ok: boolean): void {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.stages[stage];
    s.itemsSettled += 1;
    if (ok) s.itemsSucceeded += 1;
    else s.itemsFailed += 1;
    r.emitter.emit("stage_progress", {
      stage,
      itemsTotal: s.itemsTotal,
      itemsSettled: s.itemsSettled,
      itemsSucceeded: s.itemsSucceeded,
      itemsFailed: s.itemsFailed,
      at: nowIso()
    });
  }

  recordDropped(runId: string, item: DroppedItem): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.dropped.push({ ...item });
    r.emitter.emit("item_dropped", { ...item, at: nowIso() });
  }

  async finishStage(
    runId: string,
    stage: StageRole,
    status: Extract<StageStatus, "completed" | "partially_completed" | "failed">,
    error?: string
  ): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.stages[stage];
    s.status = status;
    s.finishedAt = nowIso();
    if (error) s.error = error;
    await this.persist(r);
    r.emitter.emit("stage_finished", { stage, status, at: s.finishedAt });
    if (status === "failed" && error) r.emitter.emit("error", { stage, message: error, at: s.finishedAt });
  }

  async addArtifact(runId: string, stage: StageRole, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.stages[stage];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { stage, name, at: nowIso() });
  }

  log(runId: string, message: string, stage?: StageRole): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, stage, at: nowIso() });
  }

  error(runId: string, message: string, stage?: StageRole): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, stage, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }
}
