#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { OpenDtuError } from './errors.js';
import { createLogger } from './logger.js';
import { AuditStore } from './audit/auditStore.js';
import { OpenDtuClient } from './opendtu/client.js';
import { ToolDispatcher } from './tools/dispatcher.js';
import { buildMcpServer } from './mcp/server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, config.logPretty);

  const client = new OpenDtuClient({
    baseUrl: config.opendtuBaseUrl,
    user: config.opendtuUser,
    password: config.opendtuPassword,
    timeoutMs: config.requestTimeoutMs,
    readRetries: config.readRetries,
    readRetryBackoffMs: config.readRetryBackoffMs,
    logger
  });
  const audit = new AuditStore(config.auditMaxEntries);
  const dispatcher = new ToolDispatcher({ config, logger, client, audit });

  const server = buildMcpServer({ logger, dispatcher });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      transport: 'stdio',
      baseUrl: config.opendtuBaseUrl,
      timeoutMs: config.requestTimeoutMs,
      enforceMaxPower: config.enforceMaxPower
    },
    'mcp-opendtu running on stdio'
  );

  const shutdown = () => {
    logger.info('Shutting down stdio server');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to close MCP server');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof OpenDtuError && error.kind === 'ConfigurationError') {
    console.error(`${error.message}\nExample: export OPENDTU_HOST=192.168.1.100`);
    process.exit(1);
  }
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
