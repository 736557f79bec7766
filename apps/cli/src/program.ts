import { Command } from 'commander';
import type { CliContext } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createDoneCommand } from './commands/done.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';

export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('taskkeeper')
    .description('Task manager backed by a JSON file or a SQLite database')
    .version('1.0.0')
    .option('-b, --backend <name>', 'Storage backend: file or sqlite')
    .option('-f, --file <path>', 'Task file used by the file backend')
    .option('--db <path>', 'Database file used by the sqlite backend');

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createGetCommand(ctx));
  program.addCommand(createDoneCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createSearchCommand(ctx));
  program.addCommand(createStatsCommand(ctx));

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
  });

  return program;
}
