/**
 * gcl serve - Start the MCP server on stdio
 */

import { Command } from 'commander';
import { applyLogLevel, resolveGlobalOptions } from '../utils/global-options.js';
import { createClosenessEngine } from '../../../core/engine.js';
import { resolveGclDir } from '../../../config/config.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { closeServeLogger, initServeLogger, logToStderr } from '../../mcp/logger.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server (stdio transport)')
    .action(async (_options, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await createClosenessEngine(globals.cwd);
        applyLogLevel(globals);

        if (engine.initialized) {
          initServeLogger(resolveGclDir(globals.cwd));
        }

        // Occupies stdout
        const server = await startMcpServer(engine);

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          logToStderr(`[gcl] Received ${signal}. Shutting down...`);

          try {
            await server.close();
            await engine.close();
          } catch (err) {
            logToStderr(
              `[gcl] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`,
              'error',
            );
            process.exitCode = 1;
          }

          closeServeLogger();
          process.exit();
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
