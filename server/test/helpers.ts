import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { GenerateRequest, GenerativeBackend } from "../src/pipeline/backend.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export type Deferred<T = void> = { promise: Promise<T>; resolve: (value: T) => void; reject: (err: Error) => void };

export function deferred<T = void>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** An Error carrying an HTTP status, shaped like the openai SDK's APIError. */
export function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

export type Responder = (request: GenerateRequest, call: number) => string | Promise<string>;

/** In-process backend whose answers come from a test-supplied function. */
export class ScriptedBackend implements GenerativeBackend {
  readonly name = "scripted";
  readonly calls: GenerateRequest[] = [];

  constructor(private readonly respond: Responder) {}

  async generate(request: GenerateRequest): Promise<string> {
    this.calls.push(request);
    return this.respond(request, this.calls.length);
  }
}

export async function useTmpOutputDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "atlas-out-"));
  process.env.ATLAS_OUTPUT_DIR = dir;
  return dir;
}

export async function dropTmpOutputDir(dir: string | null): Promise<void> {
  delete process.env.ATLAS_OUTPUT_DIR;
  if (dir) await fs.rm(dir, { recursive: true, force: true }).catch(() => undefined);
}
