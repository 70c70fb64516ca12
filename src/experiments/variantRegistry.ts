import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { config } from "../config";
import { PromptVariantSchema, type PromptVariant } from "../models/schemas";
import { logInfo, logWarn } from "../utils/logger";
import { diffPrompts, type PromptDiff } from "./promptDiff";

type VariantFile = {
  version: number;
  variants: PromptVariant[];
};

const VariantFileSchema = z.object({
  version: z.number(),
  variants: z.array(PromptVariantSchema)
});

export const NewVariantSchema = PromptVariantSchema.omit({ createdAt: true }).extend({
  id: z.string().min(1).optional()
});

export type NewVariant = z.input<typeof NewVariantSchema>;

export function defaultVariantsFile() {
  return path.join(config.dataDir, "prompt_variants.json");
}

export function loadVariants(file: string = defaultVariantsFile()): PromptVariant[] {
  ensureVariantsFile(file);
  try {
    const parsed = VariantFileSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
    if (!parsed.success) {
      logWarn(`Variant registry ${file} has an unexpected shape; treating as empty`);
      return [];
    }
    return parsed.data.variants;
  } catch (e) {
    logWarn(`Variant registry ${file} unreadable; treating as empty`, e);
    return [];
  }
}

export function saveVariants(variants: PromptVariant[], file: string = defaultVariantsFile()) {
  ensureVariantsFile(file);
  const data: VariantFile = { version: 1, variants };
  fs.writeFileSync(file, JSON.stringify(data, null, 2));
}

export function findVariant(id: string, file: string = defaultVariantsFile()) {
  return loadVariants(file).find(v => v.id === id);
}

export type VariantUpsert = {
  variant: PromptVariant;
  /** Present when an existing variant's template was replaced. */
  templateDiff: PromptDiff | null;
};

/** Admin-side write. Keeps the original createdAt when updating. */
export function upsertVariant(input: NewVariant, file: string = defaultVariantsFile()): VariantUpsert {
  const parsed = NewVariantSchema.parse(input);
  const variants = loadVariants(file);
  const id = parsed.id ?? `pv_${uuidv4()}`;
  const idx = variants.findIndex(v => v.id === id);
  const previous = idx >= 0 ? variants[idx] : undefined;

  const variant: PromptVariant = {
    ...parsed,
    id,
    createdAt: previous ? previous.createdAt : new Date().toISOString()
  };

  if (idx >= 0) variants[idx] = variant;
  else variants.push(variant);
  saveVariants(variants, file);

  const templateDiff = previous && previous.template !== variant.template
    ? diffPrompts(previous.template, variant.template)
    : null;

  if (templateDiff && templateDiff.riskFlags.length > 0) {
    logWarn(`Prompt variant ${id} template changed with risk flags`, templateDiff.riskFlags);
  } else if (templateDiff) {
    logInfo(`Prompt variant ${id} template changed`, {
      oldLength: templateDiff.oldLength,
      newLength: templateDiff.newLength
    });
  }

  return { variant, templateDiff };
}

export function listScopeVariants(scopeId: string, file: string = defaultVariantsFile()) {
  return loadVariants(file).filter(v => v.scopeId === scopeId);
}

function ensureVariantsFile(file: string) {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  if (!fs.existsSync(file)) {
    const init: VariantFile = { version: 1, variants: [] };
    fs.writeFileSync(file, JSON.stringify(init, null, 2));
  }
}
