import { Command } from 'commander';
import { toDict } from '@taskkeeper/core';
import * as out from '../output.js';
import { $try, parseStatusOption, serviceFor, type CliContext } from '../helpers.js';

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List all tasks')
    .option('-s, --status <status>', 'Show only pending or completed tasks')
    .option('--json', 'Output in JSON format')
    .action((opts: { status?: string; json?: boolean }, cmd: Command) => $try(ctx, () => {
      const status = parseStatusOption(opts.status);
      const tasks = serviceFor(ctx, cmd).listAll().filter(t => status == null || t.status === status);

      if (opts.json) {
        out.printJson(tasks.map(toDict));
        return;
      }
      if (tasks.length === 0) {
        out.info('No tasks found.');
        return;
      }
      out.printTaskTable(tasks);
    }));
}
