import pino from 'pino';

import { config } from '../config';

/**
 * Credentials and card data never reach the log stream
 */
const REDACTED_PATHS = [
  'password',
  'passwordHash',
  'cardNumber',
  'cvv',
  'cardNumberEncrypted',
  'cvvEncrypted',
  'req.headers.authorization',
  '*.password',
  '*.passwordHash',
  '*.cardNumberEncrypted',
  '*.cvvEncrypted',
];

/**
 * JSON in production, pretty printed in development, silent under test
 * unless LOG_LEVEL says otherwise
 */
export const logger = pino({
  level: config.logging.level,
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'ledger-bank',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export const createServiceLogger = (component: string) => {
  return logger.child({ component });
};
