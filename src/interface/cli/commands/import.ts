/**
 * gcl import - Load an edge list file into the graph database
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { applyLogLevel, resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { createClosenessEngine } from '../../../core/engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold } from '../output/formatter.js';

export function importCommand(): Command {
  return new Command('import')
    .description('Import edges from a "from to [distance]" edge list file; a lone id declares a node')
    .argument('<file>', 'Edge list file')
    .option('--replace', 'Delete the stored graph before importing', false)
    .action(async (file: string, options: { replace: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const result = await withEngine(await createClosenessEngine(globals.cwd), (engine) => {
          applyLogLevel(globals);
          return engine.importEdges(resolve(globals.cwd, file), { replace: options.replace });
        });

        if (globals.json) {
          printJson(result);
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess(`Imported ${result.filepath}`) + '\n');
          process.stderr.write(`  ${formatBold('Edges imported:')} ${result.edges_imported}\n`);
          process.stderr.write(`  ${formatBold('Nodes declared:')} ${result.nodes_declared}\n`);
          process.stderr.write(`  ${formatBold('Nodes added:')}    ${result.nodes_added}\n`);
          process.stderr.write(
            `  ${formatBold('Graph:')}          ${result.total_nodes} nodes, ${result.total_edges} edges\n`,
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
