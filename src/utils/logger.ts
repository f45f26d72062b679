/**
 * Logger utility using Pino
 */
import pino from 'pino';

const underTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const level = process.env.LOG_LEVEL || (underTest ? 'silent' : 'info');

let transport: pino.DestinationStream | undefined;
let prettyError: unknown;
if (process.stdout.isTTY && !underTest) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch (err) {
    prettyError = err;
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });
if (prettyError) {
  rootLogger.debug({ err: prettyError }, 'pino-pretty unavailable, logging JSON');
}

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
