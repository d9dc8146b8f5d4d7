import { describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { sugarClient } from "../testing/fake_kegg.js";
import { buildTools, type Tool } from "./tools.js";

function tool(tools: Tool[], name: string): Tool {
  const t = tools.find(x => x.name === name);
  if (!t) throw new Error(`missing tool ${name}`);
  return t;
}

describe("buildTools", () => {
  const tools = buildTools(sugarClient(), { similarityThreshold: 0.8, delaySeconds: 0 }, () => {});

  it("exposes every tool once", () => {
    expect(tools.map(t => t.name)).toEqual([
      "kegg.standardize_name",
      "kegg.standardize_formula",
      "kegg.name_similarity",
      "kegg.compound.find_by_formula",
      "kegg.compound.get",
      "kegg.compound.match",
      "kegg.compound.match_batch",
    ]);
  });

  it("standardizes a single name or a list", async () => {
    const t = tool(tools, "kegg.standardize_name");
    await expect(t.handler({ names: "D-Glucose (2S,3R)" })).resolves.toEqual({ names: ["D-Glucose"] });
    await expect(t.handler({ names: ["norchol derivative", "N--Acetylserotonin"] }))
      .resolves.toEqual({ names: ["norcholane derivative", "N-Acetylserotonin"] });
  });

  it("standardizes formulas", async () => {
    await expect(tool(tools, "kegg.standardize_formula").handler({ formulas: ["Na Cl"] }))
      .resolves.toEqual({ formulas: ["NaCl"] });
  });

  it("scores names", async () => {
    await expect(tool(tools, "kegg.name_similarity").handler({ name1: "abcd", name2: "ABCE" }))
      .resolves.toEqual({ similarity: 0.75 });
  });

  it("searches and fetches through the client", async () => {
    await expect(tool(tools, "kegg.compound.find_by_formula").handler({ formula: "C6H12O6" }))
      .resolves.toEqual({ count: 2, ids: ["C00095", "C00031"] });
    await expect(tool(tools, "kegg.compound.get").handler({ id: "C07481" }))
      .resolves.toEqual({ entry: "C07481", names: ["Caffeine", "1,3,7-Trimethylxanthine"] });
  });

  it("matches with the default threshold", async () => {
    await expect(tool(tools, "kegg.compound.match").handler({ name: "D-Glucoze", formula: "C6H12O6" }))
      .resolves.toMatchObject({ status: "Auto-accepted", keggId: "C00031" });
    await expect(tool(tools, "kegg.compound.match").handler({ name: "D-Glucoze", formula: "C6H12O6", similarity_threshold: 0.95 }))
      .resolves.toMatchObject({ status: "Needs verification", keggId: "C00031" });
  });

  it("rejects arguments that fail validation", async () => {
    await expect(tool(tools, "kegg.compound.match").handler({ name: "x", formula: "H2O", similarity_threshold: 2 }))
      .rejects.toBeInstanceOf(ZodError);
  });

  it("matches a batch, taking columns from the first row", async () => {
    const onProgress = vi.fn();
    const t = tool(buildTools(sugarClient(), { similarityThreshold: 0.8, delaySeconds: 0 }, onProgress), "kegg.compound.match_batch");
    const out = await t.handler({
      rows: [
        { Standardized_Name: "D-Glucose", Formula: "C6H12O6" },
        { Standardized_Name: "Mystery", Formula: "Xyz123" },
      ],
    });
    expect(out).toEqual({
      columns: ["Standardized_Name", "Formula", "KEGG_ID", "KEGG_Name", "Similarity", "Status"],
      rows: [
        { Standardized_Name: "D-Glucose", Formula: "C6H12O6", KEGG_ID: "C00031", KEGG_Name: "D-Glucose", Similarity: 1, Status: "Auto-accepted" },
        { Standardized_Name: "Mystery", Formula: "Xyz123", KEGG_ID: null, KEGG_Name: null, Similarity: null, Status: "No match" },
      ],
    });
    expect(onProgress).toHaveBeenCalledTimes(2);
  });

  it("reports missing batch columns", async () => {
    const t = tool(tools, "kegg.compound.match_batch");
    await expect(t.handler({ rows: [{ Standardized_Name: "D-Glucose" }] }))
      .rejects.toThrow("Input table is missing required column(s): Formula");
  });
});
