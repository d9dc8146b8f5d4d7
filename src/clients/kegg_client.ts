// src/clients/kegg_client.ts
// KEGG REST adapter (Node >=20 for global fetch and AbortSignal.timeout).
// Only the two calls the matcher needs: formula search and entry retrieval.

import { KeggHttpError, KeggParseError } from "../errors.js";
import type { CompoundDatabaseClient, CompoundRecord } from "../matching/types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface KeggClientOptions {
  baseUrl?: string;          // default https://rest.kegg.jp
  userAgent?: string;
  timeoutMs?: number;        // per request, default 30000
  fetchImpl?: FetchLike;
}

const FIELD_WIDTH = 12;

/**
 * Parse a `find/compound/<q>/formula` body ("cpd:C00031\tC6H12O6" per line).
 * KEGG matches formulas partially, so when `exactFormula` is given only rows
 * with that exact formula are kept.
 */
export function parseFindResponse(body: string, exactFormula?: string): string[] {
  const ids: string[] = [];
  for (const line of body.split("\n")) {
    if (!line.trim()) continue;
    const tab = line.indexOf("\t");
    if (tab <= 0) throw new KeggParseError(`Unexpected KEGG find line: ${line}`);
    const ref = line.slice(0, tab).trim();
    const formula = line.slice(tab + 1).trim();
    if (exactFormula !== undefined && formula !== exactFormula) continue;
    ids.push(ref.replace(/^cpd:/, ""));
  }
  return ids;
}

function toNumber(s: string | undefined): number | undefined {
  if (s === undefined) return undefined;
  const n = Number.parseFloat(s);
  return Number.isFinite(n) ? n : undefined;
}

/** Parse a KEGG compound flat file; stops at the first "///". */
export function parseCompoundEntry(body: string): CompoundRecord {
  const fields = new Map<string, string[]>();
  let current = "";

  for (const line of body.split("\n")) {
    if (line.startsWith("///")) break;
    if (!line.trim()) continue;
    const key = line.slice(0, FIELD_WIDTH).trim();
    if (key) current = key;
    if (!current) continue;
    const value = line.slice(FIELD_WIDTH).trim();
    const values = fields.get(current) ?? [];
    values.push(value);
    fields.set(current, values);
  }

  const entry = fields.get("ENTRY")?.[0]?.split(/\s+/)[0];
  if (!entry) throw new KeggParseError("KEGG entry has no ENTRY field");

  const names = (fields.get("NAME") ?? [])
    .map(n => n.replace(/;$/, "").trim())
    .filter(Boolean);
  if (!names.length) throw new KeggParseError(`KEGG entry ${entry} has no NAME field`);

  return {
    entry,
    names,
    formula: fields.get("FORMULA")?.[0],
    exactMass: toNumber(fields.get("EXACT_MASS")?.[0]),
    molWeight: toNumber(fields.get("MOL_WEIGHT")?.[0]),
  };
}

export class KeggRestClient implements CompoundDatabaseClient {
  name = "KEGG" as const;

  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(opts: KeggClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? "https://rest.kegg.jp").replace(/\/+$/, "");
    this.userAgent = opts.userAgent ?? "kegg-idmatch/0.1";
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async findByFormula(formula: string): Promise<string[]> {
    const body = await this.getText(`/find/compound/${encodeURIComponent(formula)}/formula`, true);
    return parseFindResponse(body, formula);
  }

  async fetchRecord(id: string): Promise<CompoundRecord> {
    const ref = id.includes(":") ? id : `cpd:${id}`;
    const body = await this.getText(`/get/${ref.split(":").map(encodeURIComponent).join(":")}`, false);
    if (!body.trim()) throw new KeggParseError(`KEGG returned an empty entry for ${ref}`);
    return parseCompoundEntry(body);
  }

  // KEGG answers "no hits" with an empty 200 or a 404, depending on the operation.
  private async getText(path: string, notFoundIsEmpty: boolean): Promise<string> {
    const url = this.baseUrl + path;
    const res = await this.fetchImpl(url, {
      headers: { "User-Agent": this.userAgent, Accept: "text/plain" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (res.status === 404 && notFoundIsEmpty) return "";
    if (!res.ok) throw new KeggHttpError(res.status, url, res.statusText);
    return res.text();
  }
}
