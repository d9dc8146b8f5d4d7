// src/errors.ts
// Errors that are allowed to escape a call. Per-compound lookup failures never
// show up here: matchCompound turns them into a { status: "Error" } result.

export class MissingColumnsError extends Error {
  override name = "MissingColumnsError";
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Input table is missing required column(s): ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class KeggHttpError extends Error {
  override name = "KeggHttpError";
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, statusText = "") {
    super(`KEGG http ${status}${statusText ? " " + statusText : ""} for ${url}`);
    this.status = status;
    this.url = url;
  }
}

export class KeggParseError extends Error {
  override name = "KeggParseError";
}

export class CsvParseError extends Error {
  override name = "CsvParseError";
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Message text of anything thrown, for logging or for an Error status. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "object" && e !== null && "message" in e) return String(e.message);
  return String(e);
}
