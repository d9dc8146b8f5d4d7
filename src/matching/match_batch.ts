// src/matching/match_batch.ts
import { MissingColumnsError } from "../errors.js";
import { DEFAULT_SIMILARITY_THRESHOLD, matchCompound, statusLabel } from "./match_compound.js";
import type { BatchProgress, CompoundDatabaseClient, CompoundRow, CompoundTable, MatchResult } from "./types.js";

export const NAME_COLUMN = "Standardized_Name";
export const FORMULA_COLUMN = "Formula";
export const RESULT_COLUMNS = ["KEGG_ID", "KEGG_Name", "Similarity", "Status"] as const;

export type MatchBatchOptions = {
  similarityThreshold?: number;
  delaySeconds?: number;               // pause between rows, default 1
  onProgress?: (p: BatchProgress) => void;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function formatProgress(p: BatchProgress): string {
  return `Processed ${p.index}/${p.total}: ${p.name} - Status: ${p.status}`;
}

const logProgress = (p: BatchProgress) => console.log(formatProgress(p));

/** Throws MissingColumnsError naming every absent column. */
export function requireColumns(columns: readonly string[], required: readonly string[]): void {
  const missing = required.filter(c => !columns.includes(c));
  if (missing.length) throw new MissingColumnsError(missing);
}

function resultColumns(result: MatchResult): CompoundRow {
  if (result.status === "No match" || result.status === "Error") {
    return { KEGG_ID: null, KEGG_Name: null, Similarity: null, Status: statusLabel(result) };
  }
  return {
    KEGG_ID: result.keggId,
    KEGG_Name: result.keggName,
    Similarity: result.similarity,
    Status: result.status,
  };
}

function cellText(v: unknown): string {
  return v === null || v === undefined ? "" : String(v);
}

/**
 * Match every row of `table` against KEGG, strictly one row at a time with a
 * pause of `delaySeconds` between rows.
 *
 * Requires Standardized_Name and Formula columns and fails before any lookup
 * when they are missing. Returns a new table with KEGG_ID, KEGG_Name,
 * Similarity and Status appended; row count and order are unchanged and a
 * failing row only gets an "Error: ..." status.
 */
export async function matchBatch(
  client: CompoundDatabaseClient,
  table: CompoundTable,
  {
    similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
    delaySeconds = 1,
    onProgress = logProgress,
    sleep = defaultSleep,
  }: MatchBatchOptions = {}
): Promise<CompoundTable> {
  requireColumns(table.columns, [NAME_COLUMN, FORMULA_COLUMN]);

  const total = table.rows.length;
  const rows: CompoundRow[] = [];

  for (let i = 0; i < total; i++) {
    const row = table.rows[i];
    const name = cellText(row[NAME_COLUMN]);
    const formula = cellText(row[FORMULA_COLUMN]);

    const result = await matchCompound(client, name, formula, similarityThreshold);
    rows.push({ ...row, ...resultColumns(result) });
    onProgress({ index: i + 1, total, name, status: statusLabel(result) });

    if (i < total - 1 && delaySeconds > 0) await sleep(delaySeconds * 1000);
  }

  const columns = [...table.columns, ...RESULT_COLUMNS.filter(c => !table.columns.includes(c))];
  return { columns, rows };
}
