import { Command } from 'commander';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<taskId>', 'The id of the task to delete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(ctx, () => {
      const removed = serviceFor(ctx, cmd).delete(taskId);
      out.success(`Task '${removed.title}' deleted`);
    }));
}
