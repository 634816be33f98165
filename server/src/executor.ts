import type { ResearchArtifact } from "./pipeline/artifact.js";
import { nowIso, toErrorMessage } from "./pipeline/utils.js";
import type { RunFailure, RunManager, RunSettings } from "./run_manager.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineInput = { runId: string; industry: string; settings?: RunSettings };

export type RunOutcome =
  | { status: "completed" | "partial"; artifact: ResearchArtifact }
  | { status: "failed"; failure: RunFailure; artifact: ResearchArtifact | null };

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<RunOutcome>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  isQueued(runId: string): boolean {
    return this.queue.includes(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  /** Returns a promise for the cancelled-while-queued status write, or null when there was nothing to cancel. */
  cancel(runId: string): Promise<void> | null {
    const run = this.runs.getRun(runId);
    if (!run) return null;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return Promise.resolve();
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      return this.runs.setRunStatus(runId, "failed", {
        finishedAt: nowIso(),
        failure: { reason: "cancelled", message: "Cancelled while queued" }
      });
    }

    return null;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      this.start(next).catch((err: unknown) => {
        console.error(`run ${next} could not be finalized: ${toErrorMessage(err)}`);
      });
    }
  }

  private async start(runId: string): Promise<void> {
    const run = this.runs.getRun(runId);
    if (!run) return;

    const controller = new AbortController();
    this.running.set(runId, controller);

    try {
      await this.runs.setRunStatus(runId, "running");
      const outcome = await this.pipeline({ runId, industry: run.industry, settings: run.settings }, this.runs, {
        signal: controller.signal
      });
      if (outcome.status === "failed") {
        this.runs.error(runId, `Run failed (${outcome.failure.reason}): ${outcome.failure.message}`, outcome.failure.stage);
        await this.runs.setRunStatus(runId, "failed", { finishedAt: nowIso(), failure: outcome.failure });
      } else {
        await this.runs.setRunStatus(runId, outcome.status, { finishedAt: nowIso() });
      }
    } catch (err) {
      const aborted = controller.signal.aborted;
      const message = aborted ? "Cancelled" : toErrorMessage(err);
      this.runs.error(runId, message);
      await this.runs.setRunStatus(runId, "failed", {
        finishedAt: nowIso(),
        failure: { reason: aborted ? "cancelled" : "internal", message }
      });
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
