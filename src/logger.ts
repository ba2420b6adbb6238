import pino from 'pino';

import { LOG_LEVEL } from './config.js';

export type { Logger } from 'pino';

const pretty =
  process.env.NODE_ENV !== 'test' &&
  (process.stdout.isTTY || process.env.NODE_ENV === 'development');

const transport = pretty
  ? pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, destination: 2 },
    })
  : pino.destination(2);

// Logs go to stderr so they never mix with streamed template output.
export const logger = pino({ level: LOG_LEVEL }, transport);
