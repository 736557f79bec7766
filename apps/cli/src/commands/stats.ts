import { Command } from 'commander';
import * as out from '../output.js';
import { $try, serviceFor, type CliContext } from '../helpers.js';

export function createStatsCommand(ctx: CliContext): Command {
  return new Command('stats')
    .description('Show task counts')
    .option('--json', 'Output in JSON format')
    .action((opts: { json?: boolean }, cmd: Command) => $try(ctx, () => {
      const service = serviceFor(ctx, cmd);
      const stats = service.statistics();
      if (opts.json) {
        out.printJson(stats);
      } else {
        out.printStatistics(stats, service.backend);
      }
    }));
}
