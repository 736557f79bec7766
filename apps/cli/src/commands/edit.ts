import { Command } from 'commander';
import { ValidationError } from '@taskkeeper/core';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change the title or description of a task')
    .argument('<taskId>', 'The task ID to edit')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <description>', 'New description')
    .action((taskId: string, opts: { title?: string; description?: string }, cmd: Command) => $try(ctx, () => {
      if (opts.title == null && opts.description == null) {
        throw new ValidationError('Nothing to change: pass --title and/or --description');
      }

      const service = serviceFor(ctx, cmd);
      const current = service.find(taskId);
      const task = service.edit(current.id, opts.title ?? current.title, opts.description ?? current.description);
      out.success(`Task ${task.id} updated`);
    }));
}
