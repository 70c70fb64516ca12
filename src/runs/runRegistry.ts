import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { config } from "../config";
import { ExperimentRunSchema, type ExperimentRun } from "../models/schemas";
import { logWarn } from "../utils/logger";

export function defaultRunsFile() {
  return path.join(config.dataDir, "runs.json");
}

export function loadRuns(file: string = defaultRunsFile()): ExperimentRun[] {
  ensureRunsFile(file);
  try {
    const raw = fs.readFileSync(file, "utf-8");
    const parsed = z.array(ExperimentRunSchema).safeParse(JSON.parse(raw));
    if (!parsed.success) {
      logWarn(`Run registry ${file} has an unexpected shape; treating as empty`);
      return [];
    }
    return parsed.data;
  } catch (e) {
    logWarn(`Run registry ${file} unreadable; treating as empty`, e);
    return [];
  }
}

export function saveRuns(runs: ExperimentRun[], file: string = defaultRunsFile()) {
  ensureRunsFile(file);
  fs.writeFileSync(file, JSON.stringify(runs, null, 2));
}

export function findRun(runId: string, file: string = defaultRunsFile()): ExperimentRun | undefined {
  return loadRuns(file).find(r => r.runId === runId);
}

export function upsertRun(
  runId: string,
  updater: (current: ExperimentRun | undefined) => ExperimentRun,
  file: string = defaultRunsFile()
) {
  const runs = loadRuns(file);
  const idx = runs.findIndex(r => r.runId === runId);
  const current = idx >= 0 ? runs[idx] : undefined;
  const next = updater(current);
  if (idx >= 0) runs[idx] = next;
  else runs.push(next);
  saveRuns(runs, file);
  return next;
}

export function recordRunStart(
  params: { scopeId: string; variantId: string | null },
  file: string = defaultRunsFile()
): ExperimentRun {
  const runId = `run_${uuidv4()}`;
  return upsertRun(runId, () => ({
    runId,
    scopeId: params.scopeId,
    variantId: params.variantId,
    qualityScore: null,
    startedAt: new Date().toISOString(),
    finishedAt: null,
    status: "running",
    stub: false
  }), file);
}

export function recordRunFinish(
  runId: string,
  outcome:
    | { status: "completed"; qualityScore: number; stub: boolean }
    | { status: "failed"; error: string },
  file: string = defaultRunsFile()
) {
  return upsertRun(runId, current => {
    if (!current) {
      throw new Error(`Unknown run ${runId}`);
    }
    const finishedAt = new Date().toISOString();
    if (outcome.status === "failed") {
      return { ...current, status: "failed", finishedAt, error: outcome.error };
    }
    return {
      ...current,
      status: "completed",
      finishedAt,
      qualityScore: outcome.qualityScore,
      stub: outcome.stub
    };
  }, file);
}

export function runsInScope(runs: readonly ExperimentRun[], scopeId: string) {
  return runs.filter(r => r.scopeId === scopeId);
}

function ensureRunsFile(file: string) {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  if (!fs.existsSync(file)) {
    fs.writeFileSync(file, JSON.stringify([], null, 2));
  }
}
