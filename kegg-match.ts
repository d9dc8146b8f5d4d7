#!/usr/bin/env node
// kegg-match.ts
// CSV in, CSV out: adds KEGG_ID, KEGG_Name, Similarity and Status to every row.
//
//   kegg-match compounds.csv --standardize --output mapped.csv
//
// Progress goes to stderr so stdout carries only the CSV.

import { readFile, writeFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { KeggRestClient } from './src/clients/kegg_client.js';
import { loadConfig, type AppConfig } from './src/config.js';
import { ConfigError, CsvParseError, errorMessage, MissingColumnsError } from './src/errors.js';
import { formatProgress, matchBatch } from './src/matching/match_batch.js';
import type { CompoundDatabaseClient } from './src/matching/types.js';
import { formatCompoundCsv, parseCompoundCsv } from './src/table/csv.js';
import { addStandardizedColumns } from './src/table/prepare.js';

export const USAGE =
  'Usage: kegg-match <input.csv> [--output out.csv] [--threshold 0.8] [--delay 1] ' +
  '[--standardize] [--name-column Name] [--tsv]';

const CliArgs = z.object({
  input: z.string().min(1),
  output: z.string().optional(),
  threshold: z.coerce.number().min(0).max(1).optional(),
  delay: z.coerce.number().min(0).optional(),
  standardize: z.boolean().default(false),
  nameColumn: z.string().min(1).default('Name'),
  tsv: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliArgs>;

const OPTIONS = {
  output: { type: 'string', short: 'o' },
  threshold: { type: 'string', short: 't' },
  delay: { type: 'string', short: 'd' },
  standardize: { type: 'boolean', short: 's' },
  'name-column': { type: 'string' },
  tsv: { type: 'boolean' },
} as const;

function readArgv(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
  } catch (e: unknown) {
    throw new ConfigError(`${errorMessage(e)}\n${USAGE}`);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgv(argv);
  if (positionals.length !== 1) throw new ConfigError(USAGE);

  const parsed = CliArgs.safeParse({
    input: positionals[0],
    output: values.output,
    threshold: values.threshold,
    delay: values.delay,
    standardize: values.standardize,
    nameColumn: values['name-column'],
    tsv: values.tsv,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `--${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

/** Whole CLI run minus process concerns; returns the CSV that was written. */
export async function runCli(
  opts: CliOptions,
  client: CompoundDatabaseClient,
  config: Pick<AppConfig, 'similarityThreshold' | 'delaySeconds'>,
  io: {
    readText: (path: string) => Promise<string>;
    writeText: (path: string, text: string) => Promise<void>;
    stdout: (text: string) => void;
    log: (line: string) => void;
  }
): Promise<string> {
  const delimiter = opts.tsv ? '\t' : ',';
  let table = parseCompoundCsv(await io.readText(opts.input), { delimiter });
  if (opts.standardize) table = addStandardizedColumns(table, { nameColumn: opts.nameColumn });

  const mapped = await matchBatch(client, table, {
    similarityThreshold: opts.threshold ?? config.similarityThreshold,
    delaySeconds: opts.delay ?? config.delaySeconds,
    onProgress: p => io.log(formatProgress(p)),
  });

  const csv = formatCompoundCsv(mapped, { delimiter }) + '\n';
  if (opts.output) {
    await io.writeText(opts.output, csv);
    io.log(`Wrote ${mapped.rows.length} rows to ${opts.output}`);
  } else {
    io.stdout(csv);
  }
  return csv;
}

async function main(): Promise<number> {
  try {
    const opts = parseCliArgs(process.argv.slice(2));
    const config = loadConfig();
    const client = new KeggRestClient({
      baseUrl: config.keggBaseUrl,
      userAgent: config.userAgent,
      timeoutMs: config.keggTimeoutMs,
    });
    await runCli(opts, client, config, {
      readText: path => readFile(path, 'utf8'),
      writeText: (path, text) => writeFile(path, text, 'utf8'),
      stdout: text => process.stdout.write(text),
      log: line => console.error(line),
    });
    return 0;
  } catch (e: unknown) {
    if (e instanceof ConfigError || e instanceof MissingColumnsError || e instanceof CsvParseError) {
      console.error(`kegg-match: ${e.message}`);
      return 1;
    }
    console.error(`kegg-match: ${errorMessage(e)}`);
    return 2;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().then(code => { process.exitCode = code; }, (e: unknown) => {
    console.error(e);
    process.exitCode = 2;
  });
}
