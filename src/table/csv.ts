// src/table/csv.ts
// Delimited-text <-> CompoundTable. Matching itself only sees in-memory tables.

import PapaParse from "papaparse";
import { CsvParseError } from "../errors.js";
import type { CompoundTable } from "../matching/types.js";

const { parse, unparse } = PapaParse;

export type CsvOptions = { delimiter?: string };

export function parseCompoundCsv(text: string, { delimiter }: CsvOptions = {}): CompoundTable {
  const result = parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
    ...(delimiter ? { delimiter } : {}),
  });

  // a one-column file has no delimiter to detect; papaparse falls back to ","
  const errors = result.errors.filter(e => e.type !== "Delimiter");
  if (errors.length) {
    const first = errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : "";
    throw new CsvParseError(`CSV parse failed${where}: ${first.message}`);
  }

  return {
    columns: result.meta.fields ?? [],
    rows: result.data,
  };
}

function cell(v: unknown): string | number | boolean {
  if (v === null || v === undefined) return "";
  if (typeof v === "number" || typeof v === "boolean") return v;
  return String(v);
}

export function formatCompoundCsv(table: CompoundTable, { delimiter = "," }: CsvOptions = {}): string {
  return unparse(
    {
      fields: table.columns,
      data: table.rows.map(r => table.columns.map(c => cell(r[c]))),
    },
    { delimiter, newline: "\n" }
  );
}
