import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  backoffDelayMs,
  DEFAULT_RETRY_POLICY,
  extractJsonBlock,
  parseJsonLenient,
  StructuredCallClient,
  type RetryPolicy,
  type StructuredCallRequest
} from "../src/pipeline/structured_client.js";
import { httpError, ScriptedBackend, type Responder } from "./helpers.js";

const Shape = z.object({ name: z.string(), score: z.number() });
type Shape = z.infer<typeof Shape>;

const policy: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  initialBackoffMs: 100,
  maxBackoffMs: 1000,
  jitterRatio: 0,
  attemptTimeoutMs: 1000
};

function req(overrides: Partial<StructuredCallRequest<Shape>> = {}): StructuredCallRequest<Shape> {
  return {
    stage: "taxonomy",
    label: "FinTech",
    model: "test-model",
    instructions: "Return JSON.",
    prompt: "INDUSTRY:\nFinTech",
    schema: Shape,
    policy,
    ...overrides
  };
}

function setup(respond: Responder) {
  const backend = new ScriptedBackend(respond);
  const sleeps: number[] = [];
  const logs: string[] = [];
  const client = new StructuredCallClient(backend, {
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
    log: (message) => logs.push(message)
  });
  return { backend, client, sleeps, logs };
}

describe("extractJsonBlock / parseJsonLenient", () => {
  it("prefers a fenced block over surrounding prose", () => {
    expect(extractJsonBlock('Sure:\n```json\n{"a": 1}\n```\nDone {"b": 2}')).toBe('{"a": 1}');
  });

  it("falls back to the outermost braces", () => {
    expect(extractJsonBlock('Result: {"a": {"b": 2}} thanks')).toBe('{"a": {"b": 2}}');
  });

  it("tolerates trailing commas", () => {
    expect(parseJsonLenient('{"a": [1, 2,], "b": 3,}')).toEqual({ ok: true, value: { a: [1, 2], b: 3 } });
  });

  it("reports text without any JSON object", () => {
    expect(parseJsonLenient("I cannot help with that")).toEqual({ ok: false, error: "No JSON object found in model response" });
  });
});

describe("backoffDelayMs", () => {
  it("grows exponentially and stops at the cap", () => {
    const p = { ...policy, maxBackoffMs: 250 };
    expect(backoffDelayMs(p, 0, 0, () => 0)).toBe(100);
    expect(backoffDelayMs(p, 1, 100, () => 0)).toBe(200);
    expect(backoffDelayMs(p, 2, 200, () => 0)).toBe(250);
  });

  it("never goes below the previous delay even when jitter shrinks", () => {
    const p = { ...policy, backoffMultiplier: 1, jitterRatio: 0.5 };
    const first = backoffDelayMs(p, 0, 0, () => 1);
    expect(first).toBe(150);
    expect(backoffDelayMs(p, 1, first, () => 0)).toBe(150);
  });
});

describe("StructuredCallClient", () => {
  it("returns a validated value on the first attempt", async () => {
    const { client, sleeps } = setup(() => 'Here you go:\n```json\n{"name": "a", "score": 1}\n```');
    const out = await client.invoke(req());
    expect(out).toEqual({ ok: true, value: { name: "a", score: 1 }, attempts: 1 });
    expect(sleeps).toEqual([]);
  });

  it("retries rate limits with growing delays, then succeeds", async () => {
    const { client, sleeps, logs } = setup((_r, call) => {
      if (call < 3) throw httpError(429, "Too Many Requests");
      return '{"name": "a", "score": 2}';
    });
    const out = await client.invoke(req());
    expect(out).toEqual({ ok: true, value: { name: "a", score: 2 }, attempts: 3 });
    expect(sleeps).toEqual([100, 200]);
    expect(logs).toContain("FinTech: rate_limited (Too Many Requests); retrying in 100ms");
    expect(logs).toContain("FinTech: succeeded after 3 attempts");
  });

  it("gives up with rate_limited after maxAttempts transient failures", async () => {
    const { client, backend, sleeps } = setup(() => {
      throw httpError(503, "Service Unavailable");
    });
    const out = await client.invoke(req());
    expect(out).toEqual({ ok: false, kind: "rate_limited", message: "Service Unavailable", attempts: 4 });
    expect(backend.calls).toHaveLength(4);
    expect(sleeps).toEqual([100, 200, 400]);
  });

  it("keeps backoff delays non-decreasing and capped", async () => {
    const { client, sleeps } = setup(() => {
      throw httpError(429, "slow down");
    });
    await client.invoke(req({ policy: { ...policy, maxAttempts: 5, maxBackoffMs: 250 } }));
    expect(sleeps).toEqual([100, 200, 250, 250]);
  });

  it("returns fatal errors at once without retrying", async () => {
    const { client, backend, sleeps } = setup(() => {
      throw httpError(401, "Incorrect API key provided");
    });
    const out = await client.invoke(req());
    expect(out).toEqual({ ok: false, kind: "fatal", message: "Incorrect API key provided", attempts: 1 });
    expect(backend.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("retries malformed output immediately with a corrective hint", async () => {
    const { client, backend, sleeps } = setup((_r, call) => (call === 1 ? '{"name": "a"}' : '{"name": "a", "score": 3}'));
    const out = await client.invoke(req());
    expect(out).toEqual({ ok: true, value: { name: "a", score: 3 }, attempts: 2 });
    expect(sleeps).toEqual([]);

    const retryPrompt = backend.calls[1]?.prompt ?? "";
    expect(retryPrompt.startsWith("INDUSTRY:\nFinTech\n\nYour previous response failed")).toBe(true);
    expect(retryPrompt).toContain("- score: Required");
    expect(retryPrompt).toContain('PREVIOUS OUTPUT:\n{"name": "a"}');
  });

  it("drops the item as schema_invalid once schema attempts are used up", async () => {
    const { client, backend } = setup(() => '{"name": 3, "score": 1}');
    const out = await client.invoke(req());
    expect(out).toEqual({
      ok: false,
      kind: "schema_invalid",
      message: "- name: Expected string, received number",
      raw: '{"name": 3, "score": 1}',
      attempts: 2
    });
    expect(backend.calls).toHaveLength(2);
  });

  it("treats replies without JSON as schema failures", async () => {
    const { client } = setup(() => "I cannot help with that");
    const out = await client.invoke(req());
    expect(out).toEqual({
      ok: false,
      kind: "schema_invalid",
      message: "No JSON object found in model response",
      raw: "I cannot help with that",
      attempts: 2
    });
  });

  it("counts a missed attempt deadline as a transient failure", async () => {
    const { client, backend } = setup(() => new Promise<string>(() => undefined));
    const out = await client.invoke(req({ policy: { ...policy, maxAttempts: 2, attemptTimeoutMs: 20 } }));
    expect(out).toEqual({ ok: false, kind: "rate_limited", message: "Attempt exceeded 20ms deadline", attempts: 2 });
    expect(backend.calls[0]?.signal.aborted).toBe(true);
  });

  it("does not call the backend when the signal is already aborted", async () => {
    const { client, backend } = setup(() => '{"name": "a", "score": 1}');
    const controller = new AbortController();
    controller.abort();
    const out = await client.invoke(req({ signal: controller.signal }));
    expect(out).toEqual({ ok: false, kind: "cancelled", message: "Cancelled", attempts: 0 });
    expect(backend.calls).toHaveLength(0);
  });

  it("stops waiting when the signal aborts during backoff", async () => {
    const controller = new AbortController();
    const backend = new ScriptedBackend(() => {
      controller.abort();
      throw httpError(429, "Too Many Requests");
    });
    const client = new StructuredCallClient(backend);
    const started = Date.now();
    const out = await client.invoke(req({ signal: controller.signal, policy: { ...policy, initialBackoffMs: 10_000 } }));
    expect(out).toEqual({ ok: false, kind: "cancelled", message: "Cancelled during backoff", attempts: 1 });
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("passes model, instructions and temperature through to the backend", async () => {
    const { client, backend } = setup(() => '{"name": "a", "score": 1}');
    await client.invoke(req({ temperature: 0.7 }));
    expect(backend.calls[0]).toMatchObject({
      stage: "taxonomy",
      model: "test-model",
      instructions: "Return JSON.",
      prompt: "INDUSTRY:\nFinTech",
      temperature: 0.7
    });
  });
});
