import { Command } from 'commander';
import { toDict } from '@taskkeeper/core';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createGetCommand(ctx: CliContext): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }, cmd: Command) => $try(ctx, () => {
      const task = serviceFor(ctx, cmd).find(taskId);
      if (opts.json) {
        out.printJson(toDict(task));
      } else {
        out.printTaskDetails(task);
      }
    }));
}
