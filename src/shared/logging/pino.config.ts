import { Params } from 'nestjs-pino';
import { destination, multistream, type StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'pdf-summary-bot';
const logDir = process.env.LOG_DIR;

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    // Console output, pretty outside production
    {
      level: 'info',
      stream:
        process.env.NODE_ENV !== 'production'
          ? pinoPretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              singleLine: false,
            })
          : process.stdout,
    },
  ];

  // JSON file output for log shippers
  if (logDir) {
    streams.push({
      level: 'debug',
      stream: destination({
        dest: join(logDir, `${serviceName}.log`),
        mkdir: true,
        sync: false,
      }),
    });
  }

  return streams;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'token',
        'botToken',
        'apiKey',
        'configuration.apiKey',
        'downloadUrl',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    stream: multistream(buildStreams()),
  },
};
