#!/usr/bin/env node
import { configureLogger, loadConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { VoiceCartMCPServer } from './mcp.js';

// ─── Entry point ───────────────────────────────────────────────────────────

const config = loadConfig();
configureLogger(config);

const mcpServer = new VoiceCartMCPServer({ config });

process.on('SIGINT', () => {
  mcpServer.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    },
  );
});

await mcpServer.start();
