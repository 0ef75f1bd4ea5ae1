#!/usr/bin/env node

/**
 * REST API server for roce-yield.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 *   roce-yield-web               # If globally linked
 */

import { loadConfig } from '../core/config.js';
import { closeServices, createServices } from '../core/services.js';
import { createConsoleObserver } from '../output/console-observer.js';
import { buildServer } from './app.js';

const config = loadConfig();
const services = createServices(config, createConsoleObserver());
const server = buildServer(services);

server.addHook('onClose', async () => closeServices(services));

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  roce-yield API
  http://localhost:${config.port}/api/v1

  Metrics: http://localhost:${config.port}/api/v1/metrics/AAPL?timeframe=annual
  Press Ctrl+C to stop
`);
