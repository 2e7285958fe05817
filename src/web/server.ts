#!/usr/bin/env node

/**
 * HTTP API server for xbrl-quarters.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 */

import { loadConfig } from '../core/config.js';
import { buildServer } from './app.js';

const config = loadConfig();
const server = buildServer(config);

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  xbrl-quarters API
  http://localhost:${config.port}

  POST /api/reconstruct   { fact_set, mode?, q3_policy?, periods? }
  Press Ctrl+C to stop
`);
