/**
 * gcl closeness - Compute and rank closeness centrality
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { applyLogLevel, resolveGlobalOptions } from '../utils/global-options.js';
import { withEngine } from '../utils/with-engine.js';
import { createClosenessEngine } from '../../../core/engine.js';
import { NODE_POLICIES, ORACLE_KINDS } from '../../../config/types.js';
import type { NodePolicy, OracleKind } from '../../../shared/types.js';
import { renderProgressBar } from '../output/progress.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatCloseness, formatDim, formatSuccess } from '../output/formatter.js';

interface ClosenessCommandOptions {
  oracle?: OracleKind;
  nodePolicy?: NodePolicy;
  top?: number;
  /** false with --no-save */
  save: boolean;
  /** Show a stored run instead of computing */
  run?: number;
}

export function parseTop(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer (0 lists every node).');
  }
  return n;
}

export function parseRunId(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive run id.');
  }
  return n;
}

export function closenessCommand(): Command {
  return new Command('closeness')
    .description('Compute closeness centrality for every node')
    .addOption(new Option('--oracle <kind>', 'Shortest-path oracle').choices(ORACLE_KINDS))
    .addOption(
      new Option('--node-policy <policy>', 'Which nodes form the node set').choices(NODE_POLICIES),
    )
    .option('--top <n>', 'Number of ranked nodes to show (0 = all)', parseTop)
    .option('--no-save', 'Do not store the run in the database')
    .option('--run <id>', 'Show a stored run instead of computing a new one', parseRunId)
    .action(async (options: ClosenessCommandOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const stored = options.run;
        const result = await withEngine(await createClosenessEngine(globals.cwd), (engine) => {
          applyLogLevel(globals);
          if (stored !== undefined) {
            return engine.getRun(stored, options.top);
          }
          return engine.computeCloseness({
            oracle: options.oracle,
            nodePolicy: options.nodePolicy,
            top: options.top,
            save: options.save,
            onProgress: (event) =>
              renderProgressBar(
                { current: event.index, total: event.total, label: 'Closeness' },
                globals,
              ),
          });
        });

        if (globals.json) {
          printJson(result);
          return;
        }
        if (globals.quiet) return;

        process.stderr.write(
          formatSuccess(
            `${result.node_count} nodes in ${result.elapsed_ms.toFixed(1)}ms (${result.oracle}, ${result.node_policy})`,
          ) + '\n',
        );
        if (result.unreachable_count > 0) {
          process.stderr.write(
            formatDim(`  ${result.unreachable_count} node(s) cannot reach the whole node set`) + '\n',
          );
        }

        process.stdout.write(`${formatBold('rank')}\t${formatBold('node')}\t${formatBold('closeness')}\n`);
        result.ranking.forEach((score, i) => {
          process.stdout.write(`${i + 1}\t${score.node_id}\t${formatCloseness(score.closeness)}\n`);
        });
        if (result.run_id !== null) {
          const label = stored === undefined ? 'saved as' : 'stored';
          process.stderr.write(formatDim(`  ${label} run #${result.run_id}`) + '\n');
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
