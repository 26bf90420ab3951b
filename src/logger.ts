import pino, { type Logger, type LoggerOptions } from 'pino';

export function createLogger(level: string, pretty = false): Logger {
  const options: LoggerOptions = {
    level,
    base: undefined,
    redact: {
      paths: ['password', '*.password', 'authorization', '*.authorization'],
      censor: '[REDACTED]'
    }
  };

  // MCP stdio requires stdout to be reserved for JSON-RPC frames only.
  // Send logs to stderr to avoid corrupting protocol messages.
  if (pretty) {
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

  return pino(options, pino.destination({ fd: 2, sync: false }));
}
