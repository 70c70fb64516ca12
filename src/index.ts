export * from "./models/schemas";
export { loadConfig, type AppConfig } from "./config";
export { parseModelOutput } from "./parser/parseModelOutput";
export { validateStoryBatch, type ValidationOutcome } from "./quality/schemaValidator";
export { lintAcceptanceCriteria, VAGUE_TERMS } from "./quality/criteriaLinter";
export { normalizeStories, clampDecompositionCount } from "./quality/normalizeStories";
export { computeQualityScore, deriveQualityInputs } from "./quality/qualityScore";
export { cosineSimilarity } from "./indexing/similarity";
export { embedTexts, embedTextsDetailed, pseudoVector, type EmbeddingProvider } from "./indexing/embedder";
export { createOpenAIEmbeddingProvider } from "./indexing/openaiClient";
export { createLanceEmbeddingStore, type EmbeddingStore } from "./indexing/vectorStore";
export {
  findDuplicates,
  findDuplicatesIncremental,
  recentCorpus,
  DUPLICATE_SIMILARITY_THRESHOLD
} from "./duplicates/duplicateDetector";
export { selectVariant, computeCandidateWeights } from "./experiments/variantAllocator";
export { computeVariantStats, betaPosterior } from "./experiments/experimentStats";
export { processDecomposition, processRegeneration, stubBatch } from "./engine/decomposeEpic";
export { allocateVariant } from "./engine/allocateVariant";
export { upsertVariant, listScopeVariants, type VariantUpsert } from "./experiments/variantRegistry";
export { diffPrompts, promptRiskFlags, type PromptDiff } from "./experiments/promptDiff";
export { estimateTokens, estimateBatch } from "./utils/tokenizer";
export { exportVariantStatsToExcel } from "./export/exportExcel";
export { createSeededRandom, type RandomSource } from "./utils/random";
