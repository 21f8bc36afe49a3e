import pino from 'pino';

export class Logger {
  private static instance: pino.Logger;

  public static getInstance(): pino.Logger {
    if (!Logger.instance) {
      const environment = process.env.NODE_ENV || 'development';

      Logger.instance = pino({
        name: 'model-gateway',
        level: process.env.LOG_LEVEL || (environment === 'development' ? 'debug' : 'info'),
        transport: environment === 'development' ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        } : undefined,
        formatters: {
          level: (label) => {
            return { level: label.toUpperCase() };
          },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: {
          err: pino.stdSerializers.err,
        },
      });
    }

    return Logger.instance;
  }

  public static child(bindings: pino.Bindings): pino.Logger {
    return Logger.getInstance().child(bindings);
  }
}
