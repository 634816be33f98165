import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const ARTIFACT_FILE_NAME = "research_artifact.json";
export const REPORT_FILE_NAME = "research_report.md";
export const DROPPED_ITEMS_FILE_NAME = "dropped_items.json";

// Deliverables land in <run>/final; everything else is intermediate.
const FINAL_ARTIFACT_NAMES: ReadonlySet<string> = new Set([ARTIFACT_FILE_NAME, REPORT_FILE_NAME, DROPPED_ITEMS_FILE_NAME]);

let writeSeq = 0;

export function nowIso(): string {
  return new Date().toISOString();
}

/** server/src/pipeline -> repo root */
export function repoRoot(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../..");
}

export function outputRootAbs(): string {
  const configured = process.env.ATLAS_OUTPUT_DIR?.trim();
  return configured ? path.resolve(configured) : path.join(repoRoot(), "output");
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), runId);
}

export function runIntermediateDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), "intermediate");
}

export function runFinalDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), "final");
}

export function artifactAbsPath(runId: string, name: string): string {
  const dir = FINAL_ARTIFACT_NAMES.has(name) ? runFinalDirAbs(runId) : runIntermediateDirAbs(runId);
  return path.join(dir, name);
}

/** Looks in the folder the name belongs to first, then in the other one. */
export async function resolveArtifactPathAbs(runId: string, name: string): Promise<string | null> {
  const preferred = artifactAbsPath(runId, name);
  const candidates = [preferred, ...[runIntermediateDirAbs(runId), runFinalDirAbs(runId)].map((dir) => path.join(dir, name))];
  for (const candidate of new Set(candidates)) {
    const stat = await fs.stat(candidate).catch(() => null);
    if (stat?.isFile()) return candidate;
  }
  return null;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  // Concurrent writers of the same file must never share a tmp path.
  writeSeq += 1;
  const tmpPath = `${filePath}.tmp.${process.pid}.${writeSeq}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await atomicWrite(filePath, text.endsWith("\n") ? text : `${text}\n`);
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, "utf8"));
}

/** null when the file is missing or not JSON. */
export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  return readJsonFile(filePath).catch(() => null);
}

export function isSafeArtifactName(name: string): boolean {
  return !name.includes("..") && /^[A-Za-z0-9._-]+$/.test(name);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
