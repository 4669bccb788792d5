import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: string): Logger {
  const options: LoggerOptions = {
    level,
    base: { lib: 'came-domotic' }
  };

  // Library output never goes to stdout: the host application owns it.
  const stderrDestination = pino.destination({ fd: 2, sync: false });

  if (process.env.CAMEDOMOTIC_LOG_PRETTY === 'true') {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: false,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2
        }
      })
    );
  }

  return pino(options, stderrDestination);
}

let defaultLogger: Logger | undefined;

/** Shared `warn`-level logger used when a component is built without one. */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger('warn');
  return defaultLogger;
}
