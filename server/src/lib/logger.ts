import pino from 'pino';

const isTest = process.env['NODE_ENV'] === 'test';
const level = isTest ? 'silent' : (process.env['LOG_LEVEL'] ?? '').trim() || 'info';

const enablePretty =
  !isTest &&
  (process.env['LOG_PRETTY'] === '1' ||
    (process.env['NODE_ENV'] !== 'production' && process.stdout.isTTY));

let logger: ReturnType<typeof pino>;

if (enablePretty) {
  try {
    logger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          singleLine: false,
        },
      },
    });
  } catch {
    // pino-pretty could not be resolved
    logger = pino({ level });
  }
} else {
  logger = pino({ level, base: { service: 'station-weather-api' } });
}

export { logger };
