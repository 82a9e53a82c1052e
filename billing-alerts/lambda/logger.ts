import pino from 'pino';

/**
 * JSON logger for the billing alert Lambda. Lines go to stdout and land
 * in the function's CloudWatch log group.
 */
export function createLogger(
  destination?: pino.DestinationStream,
  level: string = process.env.LOG_LEVEL ?? 'info',
): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { service: 'billing-alerts' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Incoming webhook URLs embed their credential in the path
    redact: {
      paths: ['webhookUrl', '*.webhookUrl', 'config.webhookUrl'],
      censor: '[REDACTED]',
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
