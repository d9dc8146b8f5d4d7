import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8788,
      userAgent: "kegg-idmatch/0.1 (anonymous@example.org)",
      keggBaseUrl: "https://rest.kegg.jp",
      keggTimeoutMs: 30000,
      similarityThreshold: 0.8,
      delaySeconds: 1,
    });
  });

  it("reads overrides and treats blanks as unset", () => {
    const config = loadConfig({
      PORT: "9000",
      EMAIL: "lab@example.org",
      KEGG_BASE_URL: "http://localhost:9100/",
      SIMILARITY_THRESHOLD: "0.9",
      KEGG_DELAY_SECONDS: "0",
      KEGG_TIMEOUT_MS: "",
    });
    expect(config).toEqual({
      port: 9000,
      userAgent: "kegg-idmatch/0.1 (lab@example.org)",
      keggBaseUrl: "http://localhost:9100",
      keggTimeoutMs: 30000,
      similarityThreshold: 0.9,
      delaySeconds: 0,
    });
  });

  it("prefers an explicit USER_AGENT", () => {
    expect(loadConfig({ USER_AGENT: "my-pipeline/2.0" }).userAgent).toBe("my-pipeline/2.0");
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ SIMILARITY_THRESHOLD: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ KEGG_DELAY_SECONDS: "-1" })).toThrow(/KEGG_DELAY_SECONDS/);
  });
});
