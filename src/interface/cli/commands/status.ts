/**
 * gcl status - Display project status
 */

import { Command } from 'commander';
import { applyLogLevel, resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { createClosenessEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import {
  formatBold,
  formatBytes,
  formatDim,
  formatSuccess,
  formatWarning,
} from '../output/formatter.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Display project status')
    .action(async (_options, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const status = await withEngine(await createClosenessEngine(globals.cwd), (engine) => {
          applyLogLevel(globals);
          return engine.getStatus();
        });

        if (globals.json) {
          printJson(status);
        } else if (!globals.quiet) {
          process.stderr.write('\n');
          process.stderr.write(
            `  ${formatBold('Graph Status')} ${status.initialized ? formatSuccess('initialized') : formatWarning('not initialized')}\n`,
          );
          process.stderr.write(`  ${formatBold('Directed:')}  ${status.directed}\n`);
          process.stderr.write(`  ${formatBold('Nodes:')}     ${status.total_nodes}\n`);
          process.stderr.write(`  ${formatBold('Edges:')}     ${status.total_edges}\n`);
          if (status.isolated_nodes > 0) {
            process.stderr.write(
              `  ${formatWarning(`${status.isolated_nodes} isolated node(s)`)}\n`,
            );
          }
          process.stderr.write(`  ${formatBold('Runs:')}      ${status.total_runs}\n`);
          if (status.last_run) {
            const run = status.last_run;
            process.stderr.write(
              `  ${formatBold('Last run:')}  #${run.run_id} ${run.oracle}/${run.node_policy}, ${run.node_count} nodes ${formatDim(run.finished_at)}\n`,
            );
          }
          process.stderr.write(
            `  ${formatBold('DB size:')}   ${formatBytes(status.db_size_bytes)}\n`,
          );
          process.stderr.write('\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
