// src/matching/types.ts

export type CompoundQuery = {
  name: string;
  formula: string;
};

/** One formula-search hit, scored by its official name. */
export type CandidateCompound = {
  id: string;
  officialName: string;
};

/** Parsed KEGG compound entry; names[0] is the official name. */
export type CompoundRecord = {
  entry: string;
  names: string[];
  formula?: string;
  exactMass?: number;
  molWeight?: number;
};

export interface CompoundDatabaseClient {
  /** Compound ids (no "cpd:" prefix) whose formula equals `formula`, in service order. */
  findByFormula(formula: string): Promise<string[]>;
  fetchRecord(id: string): Promise<CompoundRecord>;
}

export type MatchedStatus = "Auto-accepted" | "Needs verification";

export type MatchedResult = {
  status: MatchedStatus;
  keggId: string;
  keggName: string;
  similarity: number;
};
export type NoMatchResult = { status: "No match" };
export type ErrorResult = { status: "Error"; message: string };

export type MatchResult = MatchedResult | NoMatchResult | ErrorResult;
export type MatchStatus = MatchResult["status"];

/** In-memory table: column order plus rows keyed by column name. */
export type CompoundRow = Record<string, unknown>;
export type CompoundTable = {
  columns: string[];
  rows: CompoundRow[];
};

export type BatchProgress = {
  index: number;   // 1-based
  total: number;
  name: string;
  status: string;
};
