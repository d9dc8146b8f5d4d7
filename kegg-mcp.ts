/**
 * KEGG compound ID matcher: JSON-RPC tool server
 * ----------------------------------------------
 * Exposes name/formula standardization, name similarity and formula-based
 * KEGG compound matching as tools on an MCP-style JSON-RPC endpoint.
 *
 * HOW TO USE
 * 1) `npm install && npm run build`
 * 2) `npm start` (runs dist/kegg-mcp.js)
 * 3) Env vars (optional):
 *    - PORT=8788
 *    - EMAIL=you@example.org  (for polite API usage headers)
 *    - USER_AGENT="kegg-idmatch/0.1 (you@example.org)"
 *    - KEGG_BASE_URL, KEGG_TIMEOUT_MS, SIMILARITY_THRESHOLD, KEGG_DELAY_SECONDS
 * 4) POST http://<host>:8788/mcp  { "jsonrpc": "2.0", "id": 1, "method": "tools/list" }
 */

import express, { type Express } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { pathToFileURL } from 'node:url';
import { registerGetWrapper } from './registerGetWrapper.js';
import { KeggRestClient } from './src/clients/kegg_client.js';
import { loadConfig, type AppConfig } from './src/config.js';
import { errorMessage } from './src/errors.js';
import type { CompoundDatabaseClient } from './src/matching/types.js';
import { dispatchRpc, err, RPC_INTERNAL_ERROR } from './src/mcp/rpc.js';
import { buildTools } from './src/mcp/tools.js';

export function createApp(client: CompoundDatabaseClient, config: Pick<AppConfig, 'similarityThreshold' | 'delaySeconds'>): Express {
  const tools = buildTools(client, config);

  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => { res.json({ ok: true }); });

  app.post('/mcp', async (req, res) => {
    try {
      const { status, payload } = await dispatchRpc(tools, req.body);
      res.status(status).json(payload);
    } catch (e: unknown) {
      res.status(500).json(err(null, RPC_INTERNAL_ERROR, 'Internal error', { message: errorMessage(e) }));
    }
  });

  // ---- HTTP GET wrapper for tools ----
  registerGetWrapper(app, tools);
  return app;
}

function main(): void {
  const config = loadConfig();
  const client = new KeggRestClient({
    baseUrl: config.keggBaseUrl,
    userAgent: config.userAgent,
    timeoutMs: config.keggTimeoutMs,
  });
  const app = createApp(client, config);
  app.listen(config.port, () => console.log(`KEGG MCP listening on http://localhost:${config.port}/mcp`));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
