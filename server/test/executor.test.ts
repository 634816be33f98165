import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunExecutor, type PipelineFn, type RunOutcome } from "../src/executor.js";
import { RunManager } from "../src/run_manager.js";
import { ArtifactBuilder } from "../src/pipeline/artifact.js";
import { deferred, dropTmpOutputDir, sleep, useTmpOutputDir, waitFor, type Deferred } from "./helpers.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await useTmpOutputDir();
});

afterEach(async () => {
  await dropTmpOutputDir(tmpOut);
  tmpOut = null;
});

function completed(industry: string): RunOutcome {
  return { status: "completed", artifact: new ArtifactBuilder(industry).freeze() };
}

function isFinished(runs: RunManager, runId: string): boolean {
  const status = runs.getRun(runId)?.status;
  return status === "completed" || status === "partial" || status === "failed";
}

describe("RunExecutor", () => {
  it("defaults concurrency to 1 when options are omitted", async () => {
    const runs = new RunManager();
    const gate = deferred();
    let firstRunId: string | null = null;

    const pipeline: PipelineFn = async (input) => {
      if (!firstRunId) firstRunId = input.runId;
      if (input.runId === firstRunId) await gate.promise;
      return completed(input.industry);
    };

    const exec = new RunExecutor(runs, pipeline);
    const r1 = await runs.createRun("Industry one");
    const r2 = await runs.createRun("Industry two");

    exec.enqueue(r1.runId);
    exec.enqueue(r2.runId);

    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(runs.getRun(r2.runId)?.status).toBe("queued");
    expect(exec.isQueued(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "completed");
    expect(runs.getRun(r1.runId)?.finishedAt).toBeTruthy();
  });

  it("runs up to the concurrency cap at once", async () => {
    const runs = new RunManager();
    const gates = new Map<string, Deferred>();
    const pipeline: PipelineFn = async (input) => {
      const gate = deferred();
      gates.set(input.runId, gate);
      await gate.promise;
      return completed(input.industry);
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 2 });
    const ids: string[] = [];
    for (const name of ["Industry one", "Industry two", "Industry three"]) {
      const run = await runs.createRun(name);
      ids.push(run.runId);
      exec.enqueue(run.runId);
    }
    const [a = "", b = "", c = ""] = ids;

    await waitFor(() => gates.size === 2);
    expect(exec.isRunning(a) && exec.isRunning(b)).toBe(true);
    expect(runs.getRun(c)?.status).toBe("queued");

    gates.get(a)?.resolve();
    await waitFor(() => gates.has(c));
    gates.get(b)?.resolve();
    gates.get(c)?.resolve();
    await waitFor(() => ids.every((id) => runs.getRun(id)?.status === "completed"));
  });

  it("enqueue is idempotent for already-queued runs", async () => {
    const runs = new RunManager();
    const gate = deferred();
    const calls = new Map<string, number>();
    let firstRunId: string | null = null;

    const pipeline: PipelineFn = async (input) => {
      calls.set(input.runId, (calls.get(input.runId) ?? 0) + 1);
      if (!firstRunId) firstRunId = input.runId;
      if (input.runId === firstRunId) await gate.promise;
      return completed(input.industry);
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");
    const r2 = await runs.createRun("Industry two");

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    exec.enqueue(r2.runId);
    expect(exec.enqueue(r2.runId)).toBe(true);

    gate.resolve();
    await waitFor(() => runs.getRun(r2.runId)?.status === "completed");
    expect(calls.get(r2.runId)).toBe(1);
  });

  it("refuses runs that are not queued", async () => {
    const runs = new RunManager();
    const pipeline: PipelineFn = async (input) => {
      await sleep(30);
      return completed(input.industry);
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    expect(exec.enqueue(r1.runId)).toBe(false);
    await waitFor(() => runs.getRun(r1.runId)?.status === "completed");
    expect(exec.enqueue(r1.runId)).toBe(false);
    expect(exec.enqueue("missing")).toBe(false);
  });

  it("passes the run settings to the pipeline", async () => {
    const runs = new RunManager();
    let seen: unknown = null;
    const exec = new RunExecutor(runs, async (input) => {
      seen = input.settings;
      return completed(input.industry);
    });
    const run = await runs.createRun("Industry one", { maxCategories: 2 });
    exec.enqueue(run.runId);
    await waitFor(() => isFinished(runs, run.runId));
    expect(seen).toEqual({ maxCategories: 2 });
  });

  it("records partial and failed outcomes", async () => {
    const runs = new RunManager();
    const pipeline: PipelineFn = async (input) => {
      const artifact = new ArtifactBuilder(input.industry).freeze();
      if (input.industry === "Partial industry") return { status: "partial", artifact };
      return { status: "failed", failure: { reason: "stage_failed", stage: "jury", message: "All 1 item(s) failed" }, artifact };
    };
    const exec = new RunExecutor(runs, pipeline, { concurrency: 2 });
    const partial = await runs.createRun("Partial industry");
    const failed = await runs.createRun("Failed industry");
    const errors: string[] = [];
    runs.subscribe(failed.runId, (type, payload) => {
      if (type === "error" && payload && typeof payload === "object" && "message" in payload) errors.push(String(payload.message));
    });

    exec.enqueue(partial.runId);
    exec.enqueue(failed.runId);
    await waitFor(() => isFinished(runs, partial.runId) && isFinished(runs, failed.runId));

    expect(runs.getRun(partial.runId)?.status).toBe("partial");
    expect(runs.getRun(failed.runId)).toMatchObject({
      status: "failed",
      failure: { reason: "stage_failed", stage: "jury", message: "All 1 item(s) failed" }
    });
    expect(errors).toContain("Run failed (stage_failed): All 1 item(s) failed");
  });

  it("turns a thrown error into an internal failure", async () => {
    const runs = new RunManager();
    let which = 0;
    const pipeline: PipelineFn = async () => {
      which += 1;
      if (which === 1) throw new Error("Boom");
      throw "string-fail";
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");
    const r2 = await runs.createRun("Industry two");
    exec.enqueue(r1.runId);
    await waitFor(() => isFinished(runs, r1.runId));
    exec.enqueue(r2.runId);
    await waitFor(() => isFinished(runs, r2.runId));

    expect(runs.getRun(r1.runId)?.failure).toEqual({ reason: "internal", message: "Boom" });
    expect(runs.getRun(r2.runId)?.failure).toEqual({ reason: "internal", message: "string-fail" });
  });

  it("can cancel a running run", async () => {
    const runs = new RunManager();
    const pipeline: PipelineFn = async (_input, _runs, options) =>
      new Promise<RunOutcome>((_resolve, reject) => {
        if (options.signal.aborted) return reject(new Error("aborted"));
        options.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");

    const pending = exec.cancel(r1.runId);
    expect(pending).not.toBeNull();
    await pending;
    await waitFor(() => isFinished(runs, r1.runId));
    expect(runs.getRun(r1.runId)?.failure).toEqual({ reason: "cancelled", message: "Cancelled" });
    expect(exec.isRunning(r1.runId)).toBe(false);
  });

  it("can cancel a queued run", async () => {
    const runs = new RunManager();
    const gate = deferred();
    let firstRunId: string | null = null;
    const started: string[] = [];

    const pipeline: PipelineFn = async (input) => {
      started.push(input.runId);
      if (!firstRunId) firstRunId = input.runId;
      if (input.runId === firstRunId) await gate.promise;
      return completed(input.industry);
    };

    const exec = new RunExecutor(runs, pipeline, { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");
    const r2 = await runs.createRun("Industry two");

    exec.enqueue(r1.runId);
    await waitFor(() => runs.getRun(r1.runId)?.status === "running");
    exec.enqueue(r2.runId);

    await exec.cancel(r2.runId);
    expect(runs.getRun(r2.runId)).toMatchObject({
      status: "failed",
      failure: { reason: "cancelled", message: "Cancelled while queued" }
    });
    expect(exec.isQueued(r2.runId)).toBe(false);

    gate.resolve();
    await waitFor(() => runs.getRun(r1.runId)?.status === "completed");
    expect(started).toEqual([r1.runId]);
  });

  it("returns null when there is nothing to cancel", async () => {
    const runs = new RunManager();
    const exec = new RunExecutor(runs, async (input) => completed(input.industry), { concurrency: 1 });
    const r1 = await runs.createRun("Industry one");

    expect(exec.cancel(r1.runId)).toBeNull();
    expect(exec.cancel("missing")).toBeNull();
  });
});
