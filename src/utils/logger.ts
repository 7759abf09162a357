/**
 * Logger utility using Pino
 *
 * Everything goes to stderr so the CLI's stdout only carries lookup results.
 */
import pino from 'pino';

const STDERR_FD = 2;

const level = process.env.LOG_LEVEL || 'info';

function createDestination(): pino.DestinationStream {
  if (!process.stderr.isTTY) {
    return pino.destination(STDERR_FD);
  }
  try {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD,
      },
    });
  } catch (err) {
    process.stderr.write(`pino-pretty unavailable, using plain JSON logs: ${String(err)}\n`);
    return pino.destination(STDERR_FD);
  }
}

const rootLogger = pino({ level }, createDestination());

export function createLogger(name: string): pino.Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
