import { Command } from 'commander';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createDoneCommand(ctx: CliContext): Command {
  return new Command('done')
    .alias('complete')
    .description('Mark a task as completed')
    .argument('<taskId>', 'The task ID to complete')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(ctx, () => {
      const task = serviceFor(ctx, cmd).markComplete(taskId);
      out.success(`Task '${task.title}' marked as completed`);
    }));
}
