#!/usr/bin/env node

import 'dotenv/config';
import {
  createLogger, createTaskService, isTaskKeeperError, loadConfig,
  type AppConfig,
} from '@taskkeeper/core';
import { createProgram } from './program.js';
import { toOverrides } from './helpers.js';
import * as out from './output.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err: unknown) {
  if (!isTaskKeeperError(err)) throw err;
  out.error(`Error: ${err.message}`);
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, file: config.logFile });

const program = createProgram({
  createService: options => createTaskService(loadConfig(process.env, toOverrides(options)), logger),
  logger,
  exit: code => {
    process.exitCode = code;
  },
});

program.parse();
