import type { LoggerPort } from '../../app/ports/logger_port';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

function contextValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return value.message;
  }

  return typeof value === 'bigint' ? value.toString() : value;
}

export function formatLogLine(
  level: LogLevel,
  component: string,
  message: string,
  context?: Record<string, unknown>
): string {
  const suffix =
    context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context, contextValue)}` : '';
  return `[${level}] [${component}] ${message}${suffix}`;
}

/** Info goes to stdout; warnings and errors go to stderr so reports stay clean. */
export function createLogger(component = 'ml-query', sink: LogSink = console): LoggerPort {
  return {
    info(message, context) {
      sink.log(formatLogLine('INFO', component, message, context));
    },
    warn(message, context) {
      sink.warn(formatLogLine('WARN', component, message, context));
    },
    error(message, context) {
      sink.error(formatLogLine('ERROR', component, message, context));
    }
  };
}
