// src/mcp/tools.ts
// Tool definitions exposed by kegg-mcp over JSON-RPC (POST /mcp) and GET /mcp/:toolName.

import { z } from "zod";
import type { AppConfig } from "../config.js";
import { matchBatch, formatProgress } from "../matching/match_batch.js";
import { matchCompound } from "../matching/match_compound.js";
import { nameSimilarity } from "../matching/similarity.js";
import { standardizeFormula, standardizeName } from "../matching/standardize.js";
import type { BatchProgress, CompoundDatabaseClient } from "../matching/types.js";

export type Tool = {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  handler: (args: unknown) => Promise<unknown>;
};

function defineTool<S extends z.ZodTypeAny>(
  name: string,
  description: string,
  inputSchema: S,
  run: (input: z.output<S>) => Promise<unknown> | unknown
): Tool {
  return {
    name,
    description,
    inputSchema,
    handler: async (args: unknown) => run(inputSchema.parse(args)),
  };
}

// -------- Schemas --------
const StandardizeNameInput = z.object({
  names: z.union([z.string(), z.array(z.string())]),
});

const StandardizeFormulaInput = z.object({
  formulas: z.union([z.string(), z.array(z.string())]),
});

const NameSimilarityInput = z.object({
  name1: z.string(),
  name2: z.string(),
});

const FindByFormulaInput = z.object({
  formula: z.string().min(1),            // e.g. "C6H12O6"
});

const CompoundGetInput = z.object({
  id: z.string().min(1),                 // e.g. "C00031" or "cpd:C00031"
});

const Threshold = z.number().min(0).max(1);

const MatchInput = (defaults: ToolDefaults) => z.object({
  name: z.string(),
  formula: z.string().min(1),
  similarity_threshold: Threshold.default(defaults.similarityThreshold),
});

const MatchBatchInput = (defaults: ToolDefaults) => z.object({
  rows: z.array(z.record(z.unknown())).max(500),
  columns: z.array(z.string()).optional(),   // defaults to the keys of rows[0]
  similarity_threshold: Threshold.default(defaults.similarityThreshold),
  delay: z.number().min(0).max(60).default(defaults.delaySeconds),
});

export type ToolDefaults = Pick<AppConfig, "similarityThreshold" | "delaySeconds">;

const toArray = (v: string | string[]) => (Array.isArray(v) ? v : [v]);

export function buildTools(
  client: CompoundDatabaseClient,
  defaults: ToolDefaults = { similarityThreshold: 0.8, delaySeconds: 1 },
  onProgress: (p: BatchProgress) => void = p => console.log(`[kegg.compound.match_batch] ${formatProgress(p)}`)
): Tool[] {
  const tools: Tool[] = [];

  tools.push(defineTool(
    "kegg.standardize_name",
    "Strip KEGG annotation noise ([...], (...), numeric-dash artifacts) from compound names.",
    StandardizeNameInput,
    p => ({ names: standardizeName(toArray(p.names)) })
  ));

  tools.push(defineTool(
    "kegg.standardize_formula",
    "Remove whitespace from molecular formulas.",
    StandardizeFormulaInput,
    p => ({ formulas: standardizeFormula(toArray(p.formulas)) })
  ));

  tools.push(defineTool(
    "kegg.name_similarity",
    "Case-insensitive Levenshtein similarity (0-1) between two names.",
    NameSimilarityInput,
    p => ({ similarity: nameSimilarity(p.name1, p.name2) })
  ));

  tools.push(defineTool(
    "kegg.compound.find_by_formula",
    "KEGG compound ids whose formula equals the given formula exactly.",
    FindByFormulaInput,
    async p => {
      const ids = await client.findByFormula(p.formula);
      return { count: ids.length, ids };
    }
  ));

  tools.push(defineTool(
    "kegg.compound.get",
    "Parsed KEGG compound entry (names, formula, masses).",
    CompoundGetInput,
    p => client.fetchRecord(p.id)
  ));

  tools.push(defineTool(
    "kegg.compound.match",
    "Best KEGG compound for a name + formula, classified Auto-accepted / Needs verification / No match / Error.",
    MatchInput(defaults),
    p => matchCompound(client, p.name, p.formula, p.similarity_threshold)
  ));

  tools.push(defineTool(
    "kegg.compound.match_batch",
    "Match rows with Standardized_Name and Formula columns; appends KEGG_ID, KEGG_Name, Similarity, Status.",
    MatchBatchInput(defaults),
    p => matchBatch(
      client,
      { columns: p.columns ?? Object.keys(p.rows[0] ?? {}), rows: p.rows },
      { similarityThreshold: p.similarity_threshold, delaySeconds: p.delay, onProgress }
    )
  ));

  return tools;
}

// Minimal JSON Schema for tools/list: property names and required keys only.
export function describeInput(schema: z.ZodTypeAny): Record<string, unknown> {
  if (!(schema instanceof z.ZodObject)) return { type: "object" };
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const properties: Record<string, { description?: string }> = {};
  const required: string[] = [];
  for (const [key, field] of Object.entries(shape)) {
    properties[key] = field.description ? { description: field.description } : {};
    if (!field.isOptional()) required.push(key);
  }
  return { type: "object", properties, required };
}
