import type { AllocationResult } from "../models/schemas";
import { selectVariant, type AllocatorOptions } from "../experiments/variantAllocator";
import { listScopeVariants } from "../experiments/variantRegistry";
import { loadRuns, runsInScope } from "../runs/runRegistry";
import { logInfo } from "../utils/logger";

export type AllocateDeps = AllocatorOptions & {
  variantsFile?: string;
  runsFile?: string;
};

/** Reads the scope's variants and run history, then delegates to selectVariant. */
export function allocateVariant(
  requestedId: string | null,
  scopeId: string,
  deps: AllocateDeps = {}
): AllocationResult {
  const variants = listScopeVariants(scopeId, deps.variantsFile);
  const runs = runsInScope(loadRuns(deps.runsFile), scopeId);

  const result = selectVariant({ requestedId, variants, recentRuns: runs }, deps);
  logInfo("Prompt variant allocated", { scopeId, requestedId, ...result });
  return result;
}
