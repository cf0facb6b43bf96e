/**
 * gcl init - Create .gcl/config.json and an empty graph database
 */

import { Command, Option } from 'commander';
import { applyLogLevel, resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { ClosenessEngine } from '../../../core/engine.js';
import { resolveGclDir } from '../../../config/config.js';
import { NODE_POLICIES, ORACLE_KINDS } from '../../../config/types.js';
import type { NodePolicy, OracleKind } from '../../../shared/types.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold } from '../output/formatter.js';

interface InitCommandOptions {
  directed: boolean;
  oracle: OracleKind;
  nodePolicy: NodePolicy;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Initialize a graph project in the working directory')
    .option('--directed', 'Treat imported edges as one-way', false)
    .addOption(
      new Option('--oracle <kind>', 'Default shortest-path oracle')
        .choices(ORACLE_KINDS)
        .default('dijkstra'),
    )
    .addOption(
      new Option('--node-policy <policy>', 'Default node set policy')
        .choices(NODE_POLICIES)
        .default('edges'),
    )
    .action(async (options: InitCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const config = await withEngine(new ClosenessEngine(globals.cwd), async (engine) => {
          const created = await engine.initialize({
            directed: options.directed,
            oracle: options.oracle,
            nodePolicy: options.nodePolicy,
          });
          applyLogLevel(globals);
          return created;
        });

        if (globals.json) {
          printJson({ directory: resolveGclDir(globals.cwd), config });
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess('Project initialized') + '\n');
          process.stderr.write(`  ${formatBold('Directory:')}   ${resolveGclDir(globals.cwd)}\n`);
          process.stderr.write(`  ${formatBold('Directed:')}    ${config.graph.directed}\n`);
          process.stderr.write(`  ${formatBold('Oracle:')}      ${config.closeness.oracle}\n`);
          process.stderr.write(`  ${formatBold('Node policy:')} ${config.closeness.node_policy}\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
