// src/matching/standardize.ts
// Name/formula cleanup tuned for KEGG compound names. Not meant for HMDB or
// PubChem, which name things differently.

const BRACKETED = /\[.*?\]/g;                     // "[Similar to ...]" annotations
const PARENTHESIZED = /\s*\(.*?\)/g;              // stereo descriptors, e.g. " (2S,3R)"
const LEADING_NUMERIC = /(?:^|\s)-\d+[-A-Za-z]*/g; // export-tool artifacts, e.g. "-123-"
const TRAILING_NUMERIC = /-\d+(-|$)/g;
const NORCHOL = /norchol(?!ane)/;
const HYPHEN_RUN = /--+/g;

/** Drop all spaces from each formula: " C6 H12 O6 " -> "C6H12O6". */
export function standardizeFormula(formulas: readonly string[]): string[] {
  return formulas.map(f => f.replace(/ /g, "").trim());
}

export function standardizeOneName(name: string): string {
  return name
    .replace(BRACKETED, "")
    .replace(PARENTHESIZED, "")
    .replace(LEADING_NUMERIC, "")
    .replace(TRAILING_NUMERIC, "$1")
    .replace(NORCHOL, "norcholane")
    .trim()
    .replace(HYPHEN_RUN, "-");
}

/**
 * Strip KEGG-specific noise from compound names so they compare well against
 * official KEGG names:
 *   "Testosterone [Similar to Androgen]" -> "Testosterone"
 *   "D-Glucose (2S,3R)"                  -> "D-Glucose"
 *   "norchol derivative"                 -> "norcholane derivative"
 */
export function standardizeName(names: readonly string[]): string[] {
  return names.map(standardizeOneName);
}
