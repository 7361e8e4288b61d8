import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.VITEST !== undefined;
const level = process.env.LISTING_VALIDATOR_LOG_LEVEL ?? 'info';

// stdout is reserved for the report and CI annotations
export const logger = isProduction || isTest
  ? pino({ level }, pino.destination(2))
  : pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2 },
      },
    });

export function createLogger(name: string) {
  return logger.child({ component: name });
}
