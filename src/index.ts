#!/usr/bin/env node
import 'dotenv/config';
import { runQuery } from './app/usecases/run_query';
import { parseArgs, USAGE, UsageError } from './infra/cli/args';
import { bootstrap } from './infra/bootstrap';
import { loadEnv } from './infra/config/env';
import { createLogger } from './infra/logging/logger';

const EXIT_USAGE = 2;
const logger = createLogger('ml-query');

async function main(): Promise<number> {
  const env = loadEnv();
  const parsed = parseArgs(process.argv.slice(2), env);
  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  return runQuery(parsed.options, bootstrap(parsed.options, env, logger));
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      logger.error(error.message);
      console.error(`\n${USAGE}`);
      process.exitCode = EXIT_USAGE;
      return;
    }

    logger.error('query failed', { error });
    process.exitCode = 1;
  });
