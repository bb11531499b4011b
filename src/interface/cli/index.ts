/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions, resolveGlobalOptions } from './utils/global-options.js';
import { setColorEnabled } from './output/formatter.js';
import { findCommand } from './commands/find.js';
import { batchCommand } from './commands/batch.js';
import { statusCommand } from './commands/status.js';
import { cacheCommand } from './commands/cache.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('concept-path')
    .description('Find chains of labeled relations between concepts in a remote semantic graph')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);
  program.hook('preAction', (_program, actionCommand) => {
    setColorEnabled(!resolveGlobalOptions(actionCommand).noColor);
  });

  program.addCommand(findCommand());
  program.addCommand(batchCommand());
  program.addCommand(statusCommand());
  program.addCommand(cacheCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
