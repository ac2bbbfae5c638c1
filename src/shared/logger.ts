import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL']?.toLowerCase() ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: [
      'access_token',
      'accessToken',
      'private_key',
      'privateKey',
      'proxy',
      '*.access_token',
      '*.private_key',
      '*.proxy',
    ],
    censor: '***REDACTED***',
  },
});

export function setLogLevel(level: string): void {
  logger.level = level.toLowerCase();
}
