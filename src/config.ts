// src/config.ts
import { z } from "zod";
import { ConfigError } from "./errors.js";

// -------- Config --------
// Environment variables, validated once. Empty strings count as unset.
const blank = (v: unknown) => (v === "" ? undefined : v);

const EnvSchema = z.object({
  PORT: z.preprocess(blank, z.coerce.number().int().min(0).max(65535).default(8788)),
  EMAIL: z.preprocess(blank, z.string().default("anonymous@example.org")),
  USER_AGENT: z.preprocess(blank, z.string().optional()),
  KEGG_BASE_URL: z.preprocess(blank, z.string().url().default("https://rest.kegg.jp")),
  KEGG_TIMEOUT_MS: z.preprocess(blank, z.coerce.number().int().positive().default(30_000)),
  SIMILARITY_THRESHOLD: z.preprocess(blank, z.coerce.number().min(0).max(1).default(0.8)),
  KEGG_DELAY_SECONDS: z.preprocess(blank, z.coerce.number().min(0).default(1)),
});

export type AppConfig = {
  port: number;
  userAgent: string;
  keggBaseUrl: string;
  keggTimeoutMs: number;
  similarityThreshold: number;
  delaySeconds: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    userAgent: e.USER_AGENT ?? `kegg-idmatch/0.1 (${e.EMAIL})`,
    keggBaseUrl: e.KEGG_BASE_URL.replace(/\/+$/, ""),
    keggTimeoutMs: e.KEGG_TIMEOUT_MS,
    similarityThreshold: e.SIMILARITY_THRESHOLD,
    delaySeconds: e.KEGG_DELAY_SECONDS,
  };
}
