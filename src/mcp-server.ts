#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for roce-yield.
 *
 * Tools:
 *   - get_financials: canonical income statement and balance sheet periods
 *   - get_metrics: ROCE, enterprise value and earnings yield
 *   - list_providers: configured providers and the active default
 *
 * Resources:
 *   - roce-yield://providers: provider status
 *
 * Prompts:
 *   - analyze_stock: quality-and-value review of a single ticker
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { createServices, listProviders } from './core/services.js';
import { createConsoleObserver } from './output/console-observer.js';
import {
  getFinancialsShape,
  getMetricsShape,
  handleGetFinancials,
  handleGetMetrics,
  handleListProviders,
} from './mcp/tools.js';

// stdout carries the protocol; diagnostics go to stderr
const services = createServices(loadConfig(), createConsoleObserver());

const server = new McpServer(
  { name: 'roce-yield', version: '0.1.0' },
  { capabilities: { tools: {}, resources: {}, prompts: {} } }
);

// ── Tools ──────────────────────────────────────────────────────────────

server.tool(
  'get_financials',
  'Fetch normalized income statement and balance sheet data for a stock ticker. Falls back to Yahoo Finance when the chosen provider fails. Each period includes working capital and ROCE.',
  getFinancialsShape,
  async args => handleGetFinancials(services, args)
);

server.tool(
  'get_metrics',
  'Calculate Return on Capital Employed, enterprise value and earnings yield (EBIT / EV) for a stock ticker from its latest period. Notes explain any missing or substituted inputs.',
  getMetricsShape,
  async args => handleGetMetrics(services, args)
);

server.tool(
  'list_providers',
  'List the market-data providers, whether each is configured, and which one is used by default.',
  async () => handleListProviders(services)
);

// ── Resources ──────────────────────────────────────────────────────────

server.resource(
  'providers',
  'roce-yield://providers',
  { description: 'Provider configuration, priority and remaining daily quota', mimeType: 'application/json' },
  async (uri) => ({
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(listProviders(services), null, 2),
    }],
  })
);

// ── Prompts ────────────────────────────────────────────────────────────

server.prompt(
  'analyze_stock',
  'Quality and value review of a stock using ROCE and earnings yield',
  { ticker: z.string().describe('Stock ticker (e.g., AAPL)') },
  async ({ ticker }) => ({
    messages: [{
      role: 'user' as const,
      content: {
        type: 'text' as const,
        text: `Review ${ticker.toUpperCase()} as a quality-and-value investment:

1. **Quality**: Call get_metrics for ${ticker} and report ROCE. Above 20% is usually a sign of a durable business.

2. **Value**: From the same result, report earnings yield (EBIT / enterprise value) and the EV components.

3. **Trend**: Call get_financials with limit 5 and describe how operating income and capital employed moved.

4. **Caveats**: Repeat every note returned with the metrics, and say which provider served the data.`,
      },
    }],
  })
);

// ── Start Server ───────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
