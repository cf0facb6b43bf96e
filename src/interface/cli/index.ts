/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { initCommand } from './commands/init.js';
import { importCommand } from './commands/import.js';
import { statusCommand } from './commands/status.js';
import { closenessCommand } from './commands/closeness.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('gcl')
    .description('Closeness centrality for weighted graphs')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(initCommand());
  program.addCommand(importCommand());
  program.addCommand(statusCommand());
  program.addCommand(closenessCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
