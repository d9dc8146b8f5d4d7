// src/matching/match_compound.ts
import { errorMessage } from "../errors.js";
import { nameSimilarity } from "./similarity.js";
import type { CandidateCompound, CompoundDatabaseClient, MatchResult } from "./types.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

/**
 * Find the KEGG compound for a name/formula pair.
 *
 * Searches KEGG by formula, scores each hit's official name against `name`
 * and keeps the best one (the first hit wins a tie). A best score at or above
 * `similarityThreshold` is "Auto-accepted", anything lower "Needs verification".
 *
 * Never rejects: lookup failures come back as `{ status: "Error", message }`.
 */
export async function matchCompound(
  client: CompoundDatabaseClient,
  name: string,
  formula: string,
  similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD
): Promise<MatchResult> {
  try {
    const ids = await client.findByFormula(formula);
    if (!ids.length) return { status: "No match" };

    let best: CandidateCompound | undefined;
    let bestSimilarity = -Infinity;

    // sequential, in search order
    for (const id of ids) {
      const record = await client.fetchRecord(id);
      const candidate: CandidateCompound = { id, officialName: record.names[0] ?? "" };
      const similarity = nameSimilarity(name, candidate.officialName);
      if (similarity > bestSimilarity) {
        bestSimilarity = similarity;
        best = candidate;
      }
    }

    if (!best) return { status: "No match" };
    return {
      status: bestSimilarity >= similarityThreshold ? "Auto-accepted" : "Needs verification",
      keggId: best.id,
      keggName: best.officialName,
      similarity: bestSimilarity,
    };
  } catch (e: unknown) {
    return { status: "Error", message: errorMessage(e) };
  }
}

/** Status as written to the Status column: "Error: <message>" for failures. */
export function statusLabel(result: MatchResult): string {
  return result.status === "Error" ? `Error: ${result.message}` : result.status;
}
