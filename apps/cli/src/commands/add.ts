import { Command } from 'commander';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Short title, at most 50 characters')
    .argument('<description>', 'What the task is about')
    .action((title: string, description: string, _opts: unknown, cmd: Command) => $try(ctx, () => {
      const task = serviceFor(ctx, cmd).add(title, description);
      out.success(`Task '${task.title}' added with ID ${task.id}`);
    }));
}
