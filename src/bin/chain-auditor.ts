#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from '../cli.js';
import { logger } from '../core/logger.js';

runCli(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'Audit aborted');
    process.exitCode = 1;
  });
