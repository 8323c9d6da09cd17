import pino from 'pino';

export const log = pino({
  level: process.env.LOG_LEVEL?.trim() || 'info',
  base: { service: 'sip-dispatch-runtime' },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export type Logger = typeof log;
