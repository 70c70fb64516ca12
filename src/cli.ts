#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { config } from "./config";
import { CorpusItemSchema, StorySchema, type CorpusItem } from "./models/schemas";
import { processDecomposition, processRegeneration } from "./engine/decomposeEpic";
import { allocateVariant } from "./engine/allocateVariant";
import { createOpenAIEmbeddingProvider } from "./indexing/openaiClient";
import { createLanceEmbeddingStore } from "./indexing/vectorStore";
import { computeVariantStats } from "./experiments/experimentStats";
import { listScopeVariants, loadVariants, NewVariantSchema, upsertVariant } from "./experiments/variantRegistry";
import { loadRuns, recordRunFinish, recordRunStart, runsInScope } from "./runs/runRegistry";
import { exportVariantStatsToExcel } from "./export/exportExcel";
import { createSeededRandom } from "./utils/random";
import { logError } from "./utils/logger";

const USAGE = [
  "Usage:",
  "  npm run cli -- process <raw.txt> --epic <title> --scope <id> [--max N] [--corpus corpus.json] [--variant id] [--seed s]",
  "  npm run cli -- regenerate <raw.txt> --story story.json --index N [--corpus corpus.json] [--self id]",
  "  npm run cli -- allocate --scope <id> [--variant id] [--seed s]",
  "  npm run cli -- stats --scope <id> [--days N] [--excel out.xlsx]",
  "  npm run cli -- variants add <variant.json>",
  "  npm run cli -- variants list [--scope id]"
].join("\n");

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case "process":
      await runProcess(rest);
      return;
    case "regenerate":
      await runRegenerate(rest);
      return;
    case "allocate":
      runAllocate(rest);
      return;
    case "stats":
      runStats(rest);
      return;
    case "variants":
      runVariants(rest);
      return;
    default:
      fail(USAGE);
  }
}

async function runProcess(args: string[]) {
  const rawFile = positional(args);
  const epicTitle = getFlagValue(args, "--epic");
  const scopeId = getFlagValue(args, "--scope");
  if (!rawFile || !epicTitle || !scopeId) fail(USAGE);

  const raw = readText(rawFile);
  const corpus = readCorpus(getFlagValue(args, "--corpus"));
  const seed = getFlagValue(args, "--seed");

  const allocation = allocateVariant(getFlagValue(args, "--variant") || null, scopeId, {
    random: seed ? createSeededRandom(seed) : undefined,
    defaultMultiplier: config.defaultVariantMultiplier,
    runWindow: config.allocatorRunWindow
  });

  const run = recordRunStart({ scopeId, variantId: allocation.chosenVariantId });

  try {
    const envelope = await processDecomposition(raw, {
      epicTitle,
      maxStories: Number(getFlagValue(args, "--max") || 6),
      corpus,
      provider: createOpenAIEmbeddingProvider(config),
      duplicateThreshold: config.duplicateThreshold,
      warningDivisor: config.qualityWarningDivisor,
      batchSize: config.embedBatchSize,
      variantId: allocation.chosenVariantId
    });

    recordRunFinish(run.runId, {
      status: "completed",
      qualityScore: envelope.qualityScore,
      stub: envelope.stub
    });

    console.log(JSON.stringify({ runId: run.runId, allocation, ...envelope }, null, 2));
  } catch (e) {
    recordRunFinish(run.runId, {
      status: "failed",
      error: e instanceof Error ? e.message : String(e)
    });
    throw e;
  }
}

async function runRegenerate(args: string[]) {
  const rawFile = positional(args);
  const storyFile = getFlagValue(args, "--story");
  if (!rawFile || !storyFile) fail(USAGE);

  const previous = StorySchema.parse(JSON.parse(readText(storyFile)));
  const provider = createOpenAIEmbeddingProvider(config);

  const result = await processRegeneration(readText(rawFile), {
    previous,
    storyIndex: Number(getFlagValue(args, "--index") || 0),
    corpus: readCorpus(getFlagValue(args, "--corpus")),
    selfId: getFlagValue(args, "--self") || undefined,
    cache: new Map(),
    store: provider ? createLanceEmbeddingStore(config.dataDir, provider.model) : null,
    provider,
    duplicateThreshold: config.duplicateThreshold,
    warningDivisor: config.qualityWarningDivisor,
    batchSize: config.embedBatchSize
  });

  const { cache, ...envelope } = result;
  console.log(JSON.stringify({ ...envelope, cachedEmbeddings: cache.size }, null, 2));
}

function runAllocate(args: string[]) {
  const scopeId = getFlagValue(args, "--scope");
  if (!scopeId) fail(USAGE);

  const seed = getFlagValue(args, "--seed");
  const result = allocateVariant(getFlagValue(args, "--variant") || null, scopeId, {
    random: seed ? createSeededRandom(seed) : undefined,
    defaultMultiplier: config.defaultVariantMultiplier,
    runWindow: config.allocatorRunWindow
  });
  console.log(JSON.stringify(result, null, 2));
}

function runStats(args: string[]) {
  const scopeId = getFlagValue(args, "--scope");
  if (!scopeId) fail(USAGE);

  const days = Number(getFlagValue(args, "--days") || config.statsWindowDays);
  const stats = computeVariantStats(runsInScope(loadRuns(), scopeId), days);

  const excel = getFlagValue(args, "--excel");
  if (excel) {
    exportVariantStatsToExcel(stats, path.resolve(excel), listScopeVariants(scopeId));
  }

  console.log(JSON.stringify(stats, null, 2));
}

function runVariants(args: string[]) {
  const sub = args[0];

  if (sub === "add") {
    const file = args[1];
    if (!file) fail(USAGE);
    const result = upsertVariant(NewVariantSchema.parse(JSON.parse(readText(file))));
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (sub === "list") {
    const scopeId = getFlagValue(args, "--scope");
    const variants = scopeId ? listScopeVariants(scopeId) : loadVariants();
    console.log(JSON.stringify(variants, null, 2));
    return;
  }

  fail(USAGE);
}

function readCorpus(file: string): CorpusItem[] {
  if (!file) return [];
  return z.array(CorpusItemSchema).parse(JSON.parse(readText(file)));
}

function readText(file: string) {
  if (!fs.existsSync(file)) fail(`File not found: ${file}`);
  return fs.readFileSync(file, "utf-8");
}

function positional(args: string[]) {
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      i++;
      continue;
    }
    return args[i];
  }
  return "";
}

function getFlagValue(args: string[], flag: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return "";
  return args[idx + 1] || "";
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

main().catch((e) => {
  logError("Command failed", e);
  process.exit(1);
});
