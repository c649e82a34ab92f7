import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const plain = process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test';

export const logger = pino({
  name: 'fseq-audio',
  level,
  transport: plain
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,name',
        },
      },
});
