import { Agent, MaxTurnsExceededError, ModelBehaviorError, Runner, setDefaultOpenAIKey } from "@openai/agents";
import { APIConnectionError } from "openai";
import type { StageRole } from "./schemas.js";

export type BackendErrorKind = "rate_limited" | "transient" | "fatal";

export class BackendError extends Error {
  readonly kind: BackendErrorKind;
  readonly status?: number;
  constructor(kind: BackendErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BackendError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export type GenerateRequest = {
  stage: StageRole;
  model: string;
  instructions: string;
  prompt: string;
  temperature: number;
  signal: AbortSignal;
};

/** One request/response round trip to a text-generating model. */
export interface GenerativeBackend {
  readonly name: string;
  generate(request: GenerateRequest): Promise<string>;
}

export const STAGE_AGENT_NAMES: Record<StageRole, string> = {
  taxonomy: "Taxonomy Architect",
  segment: "Segment Specialist",
  behavioral: "Behavioral Ethologist",
  competitive: "Competitive Strategist",
  jury: "Decision Jury"
};

function statusOf(err: unknown): number | null {
  if (!err || typeof err !== "object" || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && Number.isFinite(status) ? status : null;
}

function kindFromStatus(status: number): BackendErrorKind {
  if (status === 429) return "rate_limited";
  if (status === 408 || status === 409 || status >= 500) return "transient";
  return "fatal";
}

export function classifyBackendError(err: unknown): BackendError {
  if (err instanceof BackendError) return err;
  const message = err instanceof Error ? err.message : String(err);

  // Agents SDK gives up on a turn it could not finish; the same request may succeed next time.
  if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
    return new BackendError("transient", message, { cause: err });
  }

  const status = statusOf(err);
  if (status !== null) return new BackendError(kindFromStatus(status), message, { status, cause: err });

  // Covers APIConnectionTimeoutError as well.
  if (err instanceof APIConnectionError) return new BackendError("transient", message, { cause: err });

  const lower = message.toLowerCase();
  if (lower.includes("rate limit") || lower.includes("too many requests")) {
    return new BackendError("rate_limited", message, { cause: err });
  }
  if (lower.includes("overloaded") || lower.includes("econnreset") || lower.includes("socket hang up")) {
    return new BackendError("transient", message, { cause: err });
  }
  return new BackendError("fatal", message, { cause: err });
}

export class OpenAIAgentsBackend implements GenerativeBackend {
  readonly name = "openai-agents";
  private readonly runner: Runner;
  private readonly apiKey: string | null;

  constructor(options: { apiKey?: string; runner?: Runner } = {}) {
    const key = options.apiKey?.trim();
    this.apiKey = key && key.length > 0 ? key : null;
    if (this.apiKey) setDefaultOpenAIKey(this.apiKey);
    this.runner = options.runner ?? new Runner();
  }

  async generate(request: GenerateRequest): Promise<string> {
    if (!this.apiKey) {
      throw new BackendError("fatal", "Missing required env var: OPENAI_API_KEY");
    }

    const agent = new Agent({
      name: STAGE_AGENT_NAMES[request.stage],
      model: request.model,
      modelSettings: { temperature: request.temperature },
      tools: [],
      instructions: request.instructions
    });

    try {
      const result = await this.runner.run(agent, request.prompt, { maxTurns: 2, signal: request.signal });
      const out = result.finalOutput;
      return typeof out === "string" ? out : "";
    } catch (err) {
      throw classifyBackendError(err);
    }
  }
}
