import type { z } from "zod";
import { BackendError, classifyBackendError, type GenerativeBackend } from "./backend.js";
import type { StageRole } from "./schemas.js";

export type FailureKind = "rate_limited" | "schema_invalid" | "fatal" | "cancelled";

export type StageResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; kind: FailureKind; message: string; raw?: string; attempts: number };

export type RetryPolicy = {
  /** Attempts spent on rate-limit, overload or deadline failures before giving up. */
  maxAttempts: number;
  /** Attempts spent on output that fails schema validation. */
  maxSchemaAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier: number;
  /** Extra random delay as a fraction of the base delay (0 disables jitter). */
  jitterRatio: number;
  attemptTimeoutMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  maxSchemaAttempts: 2,
  initialBackoffMs: 2_000,
  maxBackoffMs: 30_000,
  backoffMultiplier: 2,
  jitterRatio: 0.25,
  attemptTimeoutMs: 120_000
};

export type StructuredCallRequest<T> = {
  stage: StageRole;
  /** Human readable item name, used in log lines. */
  label: string;
  model: string;
  instructions: string;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  policy: RetryPolicy;
  temperature?: number;
  signal?: AbortSignal;
};

export type StructuredClientOptions = {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  log?: (message: string, stage: StageRole) => void;
};

class DeadlineExceeded extends Error {
  constructor(ms: number) {
    super(`Attempt exceeded ${ms}ms deadline`);
    this.name = "DeadlineExceeded";
  }
}

class Cancelled extends Error {
  constructor() {
    super("Cancelled");
    this.name = "Cancelled";
  }
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Cancelled());
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Cancelled());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Pulls the JSON object out of a model reply that may be wrapped in prose or a markdown fence. */
export function extractJsonBlock(text: string): string | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1] && fenced[1].trim().length > 0) return fenced[1].trim();
  const braced = text.match(/\{[\s\S]*\}/);
  return braced ? braced[0] : null;
}

function stripTrailingCommas(blob: string): string {
  return blob.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
}

export function parseJsonLenient(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  const blob = extractJsonBlock(text);
  if (!blob) return { ok: false, error: "No JSON object found in model response" };
  for (const candidate of [blob, stripTrailingCommas(blob)]) {
    try {
      return { ok: true, value: JSON.parse(candidate) };
    } catch {
      continue;
    }
  }
  return { ok: false, error: "Model response is not valid JSON" };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 8)
    .map((issue) => `- ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

function correctiveHint(problem: string, previousOutput: string): string {
  return (
    `\n\nYour previous response failed JSON/schema validation for the required output schema.\n` +
    `Problems:\n${problem}\n\n` +
    `Rules:\n` +
    `- Return ONLY JSON (no markdown fences)\n` +
    `- Do not add extra top-level keys\n` +
    `- Fill every required field\n\n` +
    `PREVIOUS OUTPUT:\n${previousOutput.slice(0, 4000)}`
  );
}

export function backoffDelayMs(policy: RetryPolicy, retryIndex: number, previousDelayMs: number, random: () => number): number {
  const base = policy.initialBackoffMs * Math.pow(policy.backoffMultiplier, retryIndex);
  const jittered = base * (1 + Math.max(0, policy.jitterRatio) * random());
  const capped = Math.min(policy.maxBackoffMs, Math.round(jittered));
  return Math.max(previousDelayMs, capped);
}

/**
 * Issues one validated request to the backend. Transient failures and deadline breaches back off and
 * retry; malformed output is retried with a corrective hint; anything fatal returns at once.
 * A success always carries a payload that passed `schema`.
 */
export class StructuredCallClient {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly log: (message: string, stage: StageRole) => void;

  constructor(
    private readonly backend: GenerativeBackend,
    options: StructuredClientOptions = {}
  ) {
    this.sleep = options.sleep ?? abortableSleep;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? (() => undefined);
  }

  async invoke<T>(request: StructuredCallRequest<T>): Promise<StageResult<T>> {
    const { stage, label, policy, schema, signal } = request;
    let attempts = 0;
    let transientFailures = 0;
    let schemaFailures = 0;
    let lastDelayMs = 0;
    let prompt = request.prompt;

    while (true) {
      if (signal?.aborted) return { ok: false, kind: "cancelled", message: "Cancelled", attempts };
      attempts += 1;

      let text: string;
      try {
        text = await this.attempt(request, prompt);
      } catch (err) {
        const classified = err instanceof DeadlineExceeded ? new BackendError("transient", err.message) : classifyBackendError(err);
        if (classified.kind === "fatal") {
          this.log(`${label}: fatal backend error (${classified.message})`, stage);
          return { ok: false, kind: "fatal", message: classified.message, attempts };
        }

        transientFailures += 1;
        if (transientFailures >= policy.maxAttempts) {
          this.log(`${label}: giving up after ${transientFailures} transient failures (${classified.message})`, stage);
          return { ok: false, kind: "rate_limited", message: classified.message, attempts };
        }

        const delayMs = backoffDelayMs(policy, transientFailures - 1, lastDelayMs, this.random);
        lastDelayMs = delayMs;
        this.log(`${label}: ${classified.kind} (${classified.message}); retrying in ${delayMs}ms`, stage);
        try {
          await this.sleep(delayMs, signal);
        } catch {
          return { ok: false, kind: "cancelled", message: "Cancelled during backoff", attempts };
        }
        continue;
      }

      const parsed = parseJsonLenient(text);
      const problem = parsed.ok ? null : parsed.error;
      if (parsed.ok) {
        const validated = schema.safeParse(parsed.value);
        if (validated.success) {
          if (attempts > 1) this.log(`${label}: succeeded after ${attempts} attempts`, stage);
          return { ok: true, value: validated.data, attempts };
        }
        schemaFailures += 1;
        if (schemaFailures >= policy.maxSchemaAttempts) {
          this.log(`${label}: output failed schema validation ${schemaFailures} times; dropping`, stage);
          return { ok: false, kind: "schema_invalid", message: formatIssues(validated.error), raw: text, attempts };
        }
        this.log(`${label}: schema validation failed. Retrying with corrective hint...`, stage);
        prompt = request.prompt + correctiveHint(formatIssues(validated.error), text);
        continue;
      }

      schemaFailures += 1;
      if (schemaFailures >= policy.maxSchemaAttempts) {
        this.log(`${label}: output was not parseable JSON ${schemaFailures} times; dropping`, stage);
        return { ok: false, kind: "schema_invalid", message: problem ?? "Invalid output", raw: text, attempts };
      }
      this.log(`${label}: ${problem}. Retrying with corrective hint...`, stage);
      prompt = request.prompt + correctiveHint(`- ${problem}`, text);
    }
  }

  private async attempt<T>(request: StructuredCallRequest<T>, prompt: string): Promise<string> {
    const deadline = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        deadline.abort();
        reject(new DeadlineExceeded(request.policy.attemptTimeoutMs));
      }, request.policy.attemptTimeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.generate({
          stage: request.stage,
          model: request.model,
          instructions: request.instructions,
          prompt,
          temperature: request.temperature ?? 0.2,
          signal: deadline.signal
        }),
        expired
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
