#!/usr/bin/env node
import { runCli } from './cli/Commands';
import { EXIT_GENERIC } from './utils/errors';
import { Logger } from './utils/Logger';

const controller = new AbortController();
const interrupt = () => controller.abort();
process.once('SIGINT', interrupt);
process.once('SIGTERM', interrupt);

runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  out: (line) => process.stdout.write(line + '\n'),
  signal: controller.signal,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    Logger.error('Unexpected failure', error);
    process.exitCode = EXIT_GENERIC;
  },
).finally(() => {
  process.off('SIGINT', interrupt);
  process.off('SIGTERM', interrupt);
});
