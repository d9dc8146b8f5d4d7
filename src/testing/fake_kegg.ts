// src/testing/fake_kegg.ts
// In-process stand-in for KEGG used by the tests.

import type { CompoundDatabaseClient, CompoundRecord } from "../matching/types.js";

export function compound(entry: string, ...names: string[]): CompoundRecord {
  return { entry, names };
}

export class FakeKeggClient implements CompoundDatabaseClient {
  readonly calls: string[] = [];

  constructor(
    private readonly formulas: Record<string, string[] | Error> = {},
    private readonly records: Record<string, CompoundRecord | Error> = {}
  ) {}

  async findByFormula(formula: string): Promise<string[]> {
    this.calls.push(`find:${formula}`);
    const hit = this.formulas[formula];
    if (hit === undefined) return [];
    if (hit instanceof Error) throw hit;
    return [...hit];
  }

  async fetchRecord(id: string): Promise<CompoundRecord> {
    this.calls.push(`get:${id}`);
    const rec = this.records[id];
    if (rec === undefined) throw new Error(`no such entry: ${id}`);
    if (rec instanceof Error) throw rec;
    return rec;
  }
}

/** C6H12O6 with glucose listed after fructose, plus one failing formula. */
export function sugarClient(): FakeKeggClient {
  return new FakeKeggClient(
    {
      C6H12O6: ["C00095", "C00031"],
      C8H10N4O2: ["C07481"],
      C0FAIL: ["C99999"],
    },
    {
      C00095: compound("C00095", "D-Fructose", "Levulose"),
      C00031: compound("C00031", "D-Glucose", "Grape sugar", "Dextrose"),
      C07481: compound("C07481", "Caffeine", "1,3,7-Trimethylxanthine"),
      C99999: new Error("socket hang up"),
    }
  );
}
