import { vi, type MockInstance } from 'vitest';
import { createLogger, createTaskService, loadConfig } from '@taskkeeper/core';
import { toOverrides, type CliContext } from '../src/helpers.js';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface TestContext {
  ctx: CliContext;
  exit: MockInstance<(code: number) => void>;
  logLines: LogLine[];
}

/** Context whose services live under `home`, with logs kept in memory */
export function makeContext(home: string): TestContext {
  const logLines: LogLine[] = [];
  const logger = createLogger({ level: 'debug' }, {
    write(msg: string) {
      logLines.push(JSON.parse(msg) as LogLine);
    },
  });
  const exit = vi.fn<(code: number) => void>();
  const ctx: CliContext = {
    createService: options => createTaskService(loadConfig({ TASKKEEPER_HOME: home }, toOverrides(options)), logger),
    logger,
    exit,
  };
  return { ctx, exit, logLines };
}

/** Everything printed through console.log, one entry per call */
export function printed(log: { mock: { calls: unknown[][] } }): string[] {
  return log.mock.calls.map(args => args.map(String).join(' '));
}
