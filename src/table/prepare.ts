// src/table/prepare.ts
import { FORMULA_COLUMN, NAME_COLUMN, requireColumns } from "../matching/match_batch.js";
import { standardizeFormula, standardizeName } from "../matching/standardize.js";
import type { CompoundTable } from "../matching/types.js";

export type PrepareOptions = {
  nameColumn?: string;     // raw vendor name, default "Name"
  formulaColumn?: string;  // raw formula, default "Formula"
};

/**
 * Derive the columns matchBatch needs from a raw export: Standardized_Name
 * from the name column, and Formula with its spaces removed.
 */
export function addStandardizedColumns(
  table: CompoundTable,
  { nameColumn = "Name", formulaColumn = FORMULA_COLUMN }: PrepareOptions = {}
): CompoundTable {
  requireColumns(table.columns, [nameColumn, formulaColumn]);

  const names = standardizeName(table.rows.map(r => String(r[nameColumn] ?? "")));
  const formulas = standardizeFormula(table.rows.map(r => String(r[formulaColumn] ?? "")));

  const rows = table.rows.map((r, i) => ({
    ...r,
    [NAME_COLUMN]: names[i],
    [FORMULA_COLUMN]: formulas[i],
  }));

  const columns = [...table.columns];
  for (const c of [NAME_COLUMN, FORMULA_COLUMN]) {
    if (!columns.includes(c)) columns.push(c);
  }
  return { columns, rows };
}
