import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true, destination: 2 } }
      : undefined,
  redact: {
    paths: ['token', 'apiKey', 'api_key', 'authorization', '*.token', '*.api_key', '*.authorization'],
    censor: '***REDACTED***',
  },
});
