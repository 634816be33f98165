import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import { RunSettingsSchema, type RunManager, type RunSettings } from "./run_manager.js";
import {
  ARTIFACT_FILE_NAME,
  isSafeArtifactName,
  REPORT_FILE_NAME,
  resolveArtifactPathAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  toErrorMessage
} from "./pipeline/utils.js";

export type PipelineMode = "live" | "fake";

type ArtifactFolder = "root" | "intermediate" | "final";

const CreateRunBodySchema = z
  .object({
    industry: z.string().trim().min(2).max(200),
    options: RunSettingsSchema.optional()
  })
  .strict();

function normalizeSettings(settings: RunSettings | undefined): RunSettings | undefined {
  if (!settings) return undefined;
  const s: RunSettings = {};
  if (typeof settings.maxCategories === "number") s.maxCategories = settings.maxCategories;
  if (typeof settings.maxSegmentsPerCategory === "number") s.maxSegmentsPerCategory = settings.maxSegmentsPerCategory;
  return Object.keys(s).length > 0 ? s : undefined;
}

function hasApiKey(): boolean {
  return Boolean(process.env.OPENAI_API_KEY && process.env.OPENAI_API_KEY.trim().length > 0);
}

export type AppOptions = {
  pipelineMode?: PipelineMode;
};

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  const pipelineMode = options.pipelineMode ?? "live";

  async function sendRunFile(res: express.Response, runId: string, name: string, contentType: string): Promise<void> {
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).json({ error: `${name} not written yet` });
      return;
    }
    const data = await fs.readFile(filePath);
    res.setHeader("Content-Type", contentType);
    res.send(data);
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, hasKey: hasApiKey(), pipelineMode });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const run = await runs.createRun(parsed.data.industry, normalizeSettings(parsed.data.options));
      res.json({ runId: run.runId });
      executor.enqueue(run.runId);
    } catch (err) {
      res.status(500).json({ error: toErrorMessage(err) });
    }
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", async (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const pending = executor.cancel(run.runId);
    if (!pending) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    try {
      await pending;
      res.json({ ok: true });
    } catch (err) {
      res.status(500).json({ error: toErrorMessage(err) });
    }
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/artifact", async (req, res) => {
    try {
      await sendRunFile(res, req.params.runId, ARTIFACT_FILE_NAME, "application/json; charset=utf-8");
    } catch (err) {
      res.status(500).json({ error: toErrorMessage(err) });
    }
  });

  app.get("/api/runs/:runId/report", async (req, res) => {
    try {
      await sendRunFile(res, req.params.runId, REPORT_FILE_NAME, "text/markdown; charset=utf-8");
    } catch (err) {
      res.status(500).json({ error: toErrorMessage(err) });
    }
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const dir = runOutputDirAbs(runId);

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(dir, false);
    archive.finalize().catch((err: unknown) => {
      runs.error(runId, `zip error: ${toErrorMessage(err)}`);
    });
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const scanDirs: Array<{ dir: string; folder: ArtifactFolder }> = [
      { dir: runOutputDirAbs(runId), folder: "root" },
      { dir: runIntermediateDirAbs(runId), folder: "intermediate" },
      { dir: runFinalDirAbs(runId), folder: "final" }
    ];
    const byName = new Map<string, { name: string; size: number; mtimeMs: number; folder: ArtifactFolder }>();

    for (const scan of scanDirs) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile()) continue;
        const st = await fs.stat(path.join(scan.dir, ent.name)).catch(() => null);
        if (!st) continue;

        const next = { name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder };
        const prev = byName.get(ent.name);
        if (!prev || next.mtimeMs >= prev.mtimeMs) byName.set(ent.name, next);
      }
    }

    res.json([...byName.values()].sort((a, b) => b.mtimeMs - a.mtimeMs));
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    try {
      const data = await fs.readFile(filePath);
      const lower = name.toLowerCase();
      if (lower.endsWith(".json")) res.setHeader("Content-Type", "application/json; charset=utf-8");
      else if (lower.endsWith(".md")) res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      else res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send(data);
    } catch {
      res.status(404).send("artifact not found");
    }
  });

  return app;
}
