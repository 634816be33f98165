import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { GenerativeBackend } from "./pipeline/backend.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { ConfigError, loadResearchConfig } = await import("./config.js");
const { ConcurrencyLimiter } = await import("./pipeline/limiter.js");
const { OpenAIAgentsBackend } = await import("./pipeline/backend.js");
const { FakeBackend } = await import("./pipeline/fake_backend.js");
const { makeResearchPipeline } = await import("./pipeline/research_pipeline.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

function useFakeBackend(): boolean {
  return process.env.ATLAS_PIPELINE_MODE?.trim().toLowerCase() === "fake";
}

const config = await loadResearchConfig().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exit(1);
  }
  throw err;
});

const runs = new RunManager();
await runs.initFromDisk();

const fake = useFakeBackend();
const backend: GenerativeBackend = fake ? new FakeBackend() : new OpenAIAgentsBackend({ apiKey: process.env.OPENAI_API_KEY });
console.log(`server pipeline mode: ${fake ? "fake (ATLAS_PIPELINE_MODE=fake)" : "live"}`);
console.log(`max concurrent backend calls: ${config.concurrency.maxConcurrentCalls}`);

const limiter = new ConcurrencyLimiter(config.concurrency.maxConcurrentCalls);
const pipeline = makeResearchPipeline({ backend, limiter, config });

const maxConcurrentRuns = process.env.MAX_CONCURRENT_RUNS ? Number(process.env.MAX_CONCURRENT_RUNS) : 1;
const executor = new RunExecutor(runs, pipeline, {
  concurrency: Number.isFinite(maxConcurrentRuns) && maxConcurrentRuns > 0 ? maxConcurrentRuns : 1
});
const app = createApp(runs, executor, { pipelineMode: fake ? "fake" : "live" });

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
});
