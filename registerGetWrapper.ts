/*
 * registerGetWrapper.ts
 *
 * REST-style GET access to the kegg-mcp tools. Attaches `/mcp/:toolName`,
 * coerces query parameters (numbers, booleans, arrays via comma-separated
 * values or a `[]` key suffix), validates them against the tool's Zod schema
 * and answers with JSON.
 *
 * Usage:
 *   registerGetWrapper(app, tools);
 *   // http://localhost:8788/mcp/kegg.compound.match?name=Glucose&formula=C6H12O6
 *   // http://localhost:8788/mcp/kegg.standardize_formula?formulas[]=C6%20H12%20O6
 */

import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { errorMessage } from './src/errors.js';
import { formatZodIssues } from './src/mcp/rpc.js';
import type { Tool } from './src/mcp/tools.js';

export type QueryValue = string | number | boolean | QueryValue[];

// Name/formula/id parameters are taken verbatim: no comma splitting, no number coercion.
// "2,3-Butanediol" stays one name.
const TEXT_KEYS = new Set(['name', 'name1', 'name2', 'names', 'formula', 'formulas', 'id']);

export function coerceValue(value: unknown): QueryValue | undefined {
  if (Array.isArray(value)) {
    return value.map(coerceValue).filter((v): v is QueryValue => v !== undefined);
  }
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(v => coerceValue(v)).filter((v): v is QueryValue => v !== undefined);
  }
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  return trimmed;
}

function textValue(value: unknown, asArray: boolean): string | string[] | undefined {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  if (typeof value !== 'string') return undefined;
  return asArray ? [value] : value;
}

/** Express req.query -> tool arguments. */
export function parseQuery(query: Record<string, unknown>): Record<string, QueryValue | string[]> {
  const result: Record<string, QueryValue | string[]> = {};
  for (const key of Object.keys(query)) {
    const isArray = key.endsWith('[]');
    const cleanKey = isArray ? key.slice(0, -2) : key;
    const value = TEXT_KEYS.has(cleanKey) ? textValue(query[key], isArray) : coerceValue(query[key]);
    if (value === undefined) continue;
    result[cleanKey] = isArray && !Array.isArray(value) ? [value] : value;
  }
  return result;
}

/**
 * Register a GET route on the Express app to call tools by name.
 *
 * @param app The Express application instance
 * @param tools The tool definitions served by POST /mcp
 */
export function registerGetWrapper(app: Express, tools: Tool[]): void {
  app.get('/mcp/:toolName', async (req: Request, res: Response) => {
    const { toolName } = req.params;
    const tool = tools.find(t => t.name === toolName);
    if (!tool) {
      return res.status(404).json({ error: `Unknown tool: ${toolName}` });
    }
    try {
      const args = parseQuery(req.query);
      const result = await tool.handler(args);
      return res.json(result);
    } catch (e: unknown) {
      const message = e instanceof z.ZodError ? formatZodIssues(e) : errorMessage(e) || 'Invalid input';
      return res.status(400).json({ error: message });
    }
  });
}
