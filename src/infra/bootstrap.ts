import { FileTradeExporter } from '../adapters/export/file_trade_exporter';
import { MlApiClient } from '../adapters/http/ml_api_client';
import type { LoggerPort } from '../app/ports/logger_port';
import type { RunQueryDependencies } from '../app/usecases/run_query';
import type { Env } from './config/env';
import type { CliOptions } from './config/schema';

export function bootstrap(options: CliOptions, env: Env, logger: LoggerPort): RunQueryDependencies {
  return {
    mlData: new MlApiClient(options.database_url),
    exporter: new FileTradeExporter({ directory: env.ML_EXPORT_DIR }),
    logger,
    write: (line) => {
      console.log(line);
    }
  };
}
