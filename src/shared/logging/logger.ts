import pino from 'pino';
import { config } from '../config/env';

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'compound-prioritizer',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.Authorization',
      '*.apiKey',
      '*.api_key',
      '*.token',
      '*.secret',
      'config.LLM_API_KEY',
      'config.TAVILY_API_KEY',
      'config.NCBI_API_KEY',
    ],
    remove: true,
  },
  transport:
    config.NODE_ENV === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            // stdout carries CLI results
            destination: 2,
          },
        },
});

/** Correlation fields carried by every line of one prioritization run. */
export interface RunLogBindings {
  traceId: string;
  compound?: string;
  role?: string;
}

export const childLogger = (bindings: RunLogBindings) => logger.child(bindings);
