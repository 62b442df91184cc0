#!/usr/bin/env node

/**
 * Ticket Bulk Operations MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigValidationError } from './core/errors.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    mcpServer = new McpServer(config);
    await mcpServer.start();
    mcpServer.printStats();

    const shutdown = async (signal: string) => {
      console.error(`\n📛 Received ${signal}, shutting down gracefully...`);
      try {
        await mcpServer?.shutdown();
      } catch (error) {
        console.error('💥 Error during shutdown:', error);
        process.exit(1);
      }
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(`\n❌ ${error.message}\n`);
      console.error('💡 Check your .env file and CLI arguments');
    } else {
      console.error('💥 Fatal error in main():', error);
    }
    await mcpServer?.shutdown().catch((shutdownError: unknown) => {
      console.error('💥 Error during shutdown:', shutdownError);
    });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
