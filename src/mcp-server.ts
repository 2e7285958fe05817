#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for xbrl-quarters.
 *
 * Tools:
 *   - reconstruct_quarters: select and derive Q1-Q4/FY values from a fact set
 *   - classify_period: duration class of a reporting interval
 *   - classify_derivability: whether a concept may be derived by subtraction
 *
 * Resources:
 *   - xbrl-quarters://derivability-rules: the ordered derivability rules
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { parseFactSet, parseFactSetJson } from './core/fact-loader.js';
import { ConfigError, FactSetError } from './core/errors.js';
import { reconstructFactSet, periodsFor } from './processing/engine.js';
import { parseDateConstraints } from './processing/date-filter.js';
import { classifyDerivability, DERIVABILITY_RULE_DESCRIPTIONS } from './processing/derivability.js';
import { classifyPeriod, durationDays } from './processing/period-classifier.js';
import { serializeReconstruction } from './output/json-renderer.js';

const config = loadConfig();

const server = new McpServer(
  { name: 'xbrl-quarters', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {} } }
);

function errorResult(err: unknown) {
  const text = err instanceof FactSetError || err instanceof ConfigError
    ? err.message
    : `Error: ${err instanceof Error ? err.message : String(err)}`;
  return { content: [{ type: 'text' as const, text }], isError: true };
}

function jsonResult(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'reconstruct_quarters',
  'Reconstruct a consistent Q1-Q4/FY series per concept and fiscal year from as-filed financial facts. Missing quarters are derived from 6-month/9-month cumulative and annual figures when subtraction is valid for the concept; every value carries a provenance tag (direct, derived:<formula>, copied:<source>).',
  {
    fact_set_json: z.string().describe('JSON fact set: { "concepts": [...], "facts": [...] }'),
    mode: z.enum(['raw', 'derived']).optional().default('derived').describe('raw = as-filed only, derived = fill gaps'),
    q3_policy: z.enum(['cumulative_first', 'direct_first']).optional().describe('Prefer the 9-month cumulative or the direct quarter for Q3'),
    periods: z.enum(['all', 'quarterly', 'yearly']).optional().default('all'),
    concepts: z.array(z.string()).optional().describe('Restrict to these concept names'),
    dates: z.array(z.string()).optional().describe("End-date constraints such as '>=2024-01-01' or '<2025-01-01'"),
  },
  async ({ fact_set_json, mode, q3_policy, periods, concepts, dates }) => {
    try {
      const dateConstraints = parseDateConstraints(dates);
      const factSet = parseFactSetJson(fact_set_json, 'fact_set_json');
      const result = reconstructFactSet(factSet, {
        mode,
        q3Policy: q3_policy ?? config.q3Policy,
        roundDerived: config.roundDerived,
        concepts,
        dates: dateConstraints,
      });
      return jsonResult(serializeReconstruction(result, periodsFor(periods)));
    } catch (err) {
      return errorResult(err);
    }
  }
);

server.tool(
  'classify_period',
  'Classify a reporting interval as instant, quarter, semester (6-month YTD), three_quarter (9-month YTD), year or other.',
  {
    end: z.string().describe('End date (YYYY-MM-DD)'),
    start: z.string().optional().describe('Start date (YYYY-MM-DD); omit for instant facts'),
  },
  async ({ start, end }) => {
    return jsonResult({
      start: start ?? null,
      end,
      days: start ? durationDays(start, end) : null,
      mode: classifyPeriod(start ?? null, end),
    });
  }
);

server.tool(
  'classify_derivability',
  'Decide whether a concept may be reconstructed by subtracting cumulative periods (derivable) or must be copied (copy_only).',
  {
    concept: z.string().describe('Qualified concept name, e.g. us-gaap:Revenues'),
    duration_nature: z.enum(['instant', 'duration']),
    sign_convention: z.enum(['debit', 'credit', 'none']).optional(),
    tag_text: z.string().optional().describe('Disclosure label or tag; defaults to the concept local name'),
    derivability: z.enum(['derivable', 'copy_only']).optional().describe('Explicit override'),
  },
  async (args) => {
    try {
      const { concepts } = parseFactSet({ concepts: [args], facts: [] }, 'concept');
      return jsonResult({ concept: args.concept, ...classifyDerivability(concepts[0]) });
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'derivability-rules',
  'xbrl-quarters://derivability-rules',
  { description: 'Ordered rules deciding derivable vs copy-only concepts', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(DERIVABILITY_RULE_DESCRIPTIONS, null, 2),
    }],
  })
);

// ── Start ──────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
