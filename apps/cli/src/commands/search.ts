import { Command } from 'commander';
import { toDict } from '@taskkeeper/core';
import * as out from '../output.js';
import { $try, parseStatusOption, serviceFor, type CliContext } from '../helpers.js';

export function createSearchCommand(ctx: CliContext): Command {
  return new Command('search')
    .description('Find tasks whose title or description mention a keyword')
    .argument('<keyword>', 'Word or phrase to look for')
    .option('-s, --status <status>', 'Only pending or completed tasks')
    .option('--json', 'Output in JSON format')
    .action((keyword: string, opts: { status?: string; json?: boolean }, cmd: Command) => $try(ctx, () => {
      const tasks = serviceFor(ctx, cmd).search(keyword, parseStatusOption(opts.status));

      if (opts.json) {
        out.printJson(tasks.map(toDict));
        return;
      }
      if (tasks.length === 0) {
        out.info(`No tasks found matching '${keyword}'`);
        return;
      }
      out.info(`Found ${tasks.length} matching task(s):`);
      out.printTaskTable(tasks);
    }));
}
