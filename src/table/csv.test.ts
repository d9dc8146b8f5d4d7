import { describe, expect, it } from "vitest";
import { CsvParseError } from "../errors.js";
import { formatCompoundCsv, parseCompoundCsv } from "./csv.js";

describe("parseCompoundCsv", () => {
  it("reads headers and rows", () => {
    expect(parseCompoundCsv("Name,Formula\nGlucose,C6H12O6\nCaffeine,C8H10N4O2\n")).toEqual({
      columns: ["Name", "Formula"],
      rows: [
        { Name: "Glucose", Formula: "C6H12O6" },
        { Name: "Caffeine", Formula: "C8H10N4O2" },
      ],
    });
  });

  it("keeps quoted commas inside a name", () => {
    const table = parseCompoundCsv('Name,Formula\n"D-Glucose (2S,3R)",C6H12O6\n');
    expect(table.rows[0].Name).toBe("D-Glucose (2S,3R)");
  });

  it("trims header names", () => {
    expect(parseCompoundCsv(" Name , Formula\nx,y\n").columns).toEqual(["Name", "Formula"]);
  });

  it("reads tab-separated text", () => {
    expect(parseCompoundCsv("Name\tFormula\nWater\tH2O\n", { delimiter: "\t" }).rows).toEqual([
      { Name: "Water", Formula: "H2O" },
    ]);
  });

  it("accepts a single-column file", () => {
    expect(parseCompoundCsv("Name\nGlucose\n").rows).toEqual([{ Name: "Glucose" }]);
  });

  it("rejects rows with the wrong field count", () => {
    expect(() => parseCompoundCsv("Name,Formula\nGlucose,C6H12O6,extra\n")).toThrow(CsvParseError);
  });
});

describe("formatCompoundCsv", () => {
  it("writes columns in table order and blanks nulls", () => {
    const csv = formatCompoundCsv({
      columns: ["Name", "KEGG_ID", "Similarity", "Status"],
      rows: [
        { Status: "Needs verification", Similarity: 0.75, KEGG_ID: "C00001", Name: "a,b" },
        { Name: "c", KEGG_ID: null, Similarity: null, Status: "No match" },
      ],
    });
    expect(csv).toBe('Name,KEGG_ID,Similarity,Status\n"a,b",C00001,0.75,Needs verification\nc,,,No match');
  });

  it("writes tab-separated text", () => {
    const tsv = formatCompoundCsv({ columns: ["A", "B"], rows: [{ A: "1", B: "2" }] }, { delimiter: "\t" });
    expect(tsv).toBe("A\tB\n1\t2");
  });
});
